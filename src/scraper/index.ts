import { rateLimitedFetch } from '../util/queues';
import { retryOperation } from '../util/retry';
import { TransportError, UpstreamError } from '../util/errors';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../util/constants';
import logger from '../util/logger';

export { extractTitles, filterTitles, isExcludedTitle } from './titles';

/**
 * Fetches the raw HTML of the wiki page listing the segment's movies.
 *
 * The page is the only input of a run, so transient failures are retried
 * before giving up. A non-200 status throws {@link UpstreamError}; timeouts and
 * connection failures throw {@link TransportError}.
 */
export async function fetchWikiPage(url: string, timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS): Promise<string> {
    logger.info(`Scraping wiki page: ${url}`);

    return await retryOperation(async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        let response: Response;
        try {
            // Use rate-limited fetch - automatically queued through Bottleneck
            response = await rateLimitedFetch(url, { signal: controller.signal });
        } catch (e) {
            if (e instanceof Error && e.name === 'AbortError') {
                throw new TransportError('fetch wiki page', new Error(`Timeout after ${timeoutMs}ms fetching ${url}`));
            }
            throw new TransportError('fetch wiki page', e);
        } finally {
            clearTimeout(timeoutId);
        }

        if (!response.ok) {
            throw new UpstreamError('fetch wiki page', response.status);
        }

        return await response.text();
    }, 'fetch wiki page');
}
