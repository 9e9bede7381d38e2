import PQueue from 'p-queue';
import { ResolvedMovie } from '../resolver';
import { createAdmissionQueue } from '../util/queues';
import { createJobId, runWithJobId } from '../util/context';
import { describeError } from '../util/errors';
import { DEFAULT_CONCURRENCY, DEFAULT_RATE_LIMIT_MS } from '../util/constants';
import logger from '../util/logger';

export type ResolveFn = (title: string) => Promise<ResolvedMovie>;

export interface ResolveAllOptions {
    /** Admission gate to run tasks through. Created from `concurrency` when absent. */
    queue?: PQueue;
    concurrency?: number;
    /** Pause each task takes after its lookups, while still holding its slot. */
    rateLimitMs?: number;
}

export interface ResolveAllResult {
    entries: ResolvedMovie[];
    successful: number;
    failed: number;
}

/**
 * Results shared by all resolution tasks. Every method is synchronous, so a
 * call can never interleave with another task's; all awaiting happens outside.
 */
class ResultSet {
    private readonly entries: ResolvedMovie[] = [];
    private successful = 0;
    private failed = 0;

    add(movie: ResolvedMovie): void {
        this.entries.push(movie);
        this.successful++;
    }

    recordFailure(): void {
        this.failed++;
    }

    toResult(): ResolveAllResult {
        return {
            entries: [...this.entries],
            successful: this.successful,
            failed: this.failed,
        };
    }
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Resolves every title, at most `concurrency` at a time, and returns once all
 * of them have settled. A failed title only increments `failed`; it never
 * rejects the whole call. Entries come back in completion order.
 */
export async function resolveAll(
    titles: readonly string[],
    resolve: ResolveFn,
    options: ResolveAllOptions = {}
): Promise<ResolveAllResult> {
    const queue = options.queue ?? createAdmissionQueue(options.concurrency ?? DEFAULT_CONCURRENCY);
    const rateLimitMs = options.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS;
    const results = new ResultSet();
    const total = titles.length;

    const processTitle = async (title: string, index: number): Promise<void> => {
        logger.info(`Processing ${index + 1}/${total}: ${title}`);

        try {
            const movie = await resolve(title);

            // The IMDb id is what the list consumer matches on
            if (movie.imdbId) {
                results.add(movie);
                if (movie.posterUrl) {
                    logger.info(`✓ Found: ${movie.title} (IMDb: ${movie.imdbId})`);
                } else {
                    logger.info(`✓ Found: ${movie.title} (IMDb: ${movie.imdbId}) - No poster`);
                }
            } else {
                results.recordFailure();
                logger.warn(`✗ Missing IMDb ID: ${title}`);
            }
        } catch (error) {
            results.recordFailure();
            logger.warn(`✗ Not found: ${title} (${describeError(error)})`);
        }

        if (rateLimitMs > 0) {
            await sleep(rateLimitMs);
        }
    };

    await Promise.all(titles.map((title, index) =>
        queue.add(() => runWithJobId(createJobId(), () => processTitle(title, index)))
    ));

    const result = results.toResult();
    logger.info(`Resolution finished. Successful: ${result.successful}, Failed: ${result.failed}`);
    return result;
}
