import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import logger from './logger';
import { DEFAULT_CONCURRENCY } from './constants';

// ============================================================================
// P-QUEUE: Admission Gate
// ============================================================================

/**
 * Creates the admission gate for title resolution.
 * A task holds one of the `concurrency` slots from the moment it starts until
 * its promise settles.
 */
export function createAdmissionQueue(concurrency: number = DEFAULT_CONCURRENCY): PQueue {
    return new PQueue({ concurrency });
}

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

/**
 * TMDB Rate Limiter
 * Max 10 concurrent requests, min 25ms between requests (40 req/sec ceiling).
 */
export const tmdbLimiter = new Bottleneck({
    maxConcurrent: 10,
    minTime: 25
});

/**
 * Scraper Rate Limiter
 * Min 200ms between requests (approx 5 req/sec).
 */
export const scraperLimiter = new Bottleneck({
    minTime: 200
});

// ============================================================================
// ERROR HANDLERS - Prevent queue hangs from unhandled rejections
// ============================================================================

tmdbLimiter.on('error', (err) => {
    logger.error('[TMDB Limiter] Unhandled error in queue:', err);
});

scraperLimiter.on('error', (err) => {
    logger.error('[Scraper Limiter] Unhandled error in queue:', err);
});

// Log failed jobs for debugging. No retry inside Bottleneck: a failed lookup is final for the run.
tmdbLimiter.on('failed', (err: Error) => {
    logger.debug(`[TMDB] Job failed: ${err.message}`);
    return null;
});

scraperLimiter.on('failed', (err: Error) => {
    logger.warn(`[Scraper] Job failed: ${err.message}`);
    return null;
});

// ============================================================================
// RATE-LIMITED HTTP FACTORIES
// ============================================================================

export interface RateLimitedAxios {
    get: <T = unknown>(url: string, config?: AxiosRequestConfig) => Promise<AxiosResponse<T>>;
}

/**
 * Creates a rate-limited axios wrapper using the provided limiter.
 * All HTTP calls through this wrapper will be queued through Bottleneck.
 */
export function createRateLimitedAxios(
    baseAxios: AxiosInstance,
    limiter: Bottleneck,
    serviceName: string
): RateLimitedAxios {
    return {
        get: <T = unknown>(url: string, config?: AxiosRequestConfig) => {
            logger.debug(`[${serviceName}] Scheduling GET ${url}`);
            return limiter.schedule(() => baseAxios.get<T>(url, config));
        },
    };
}

/**
 * Creates a rate-limited fetch function for scrapers.
 * All fetch calls through this will be queued through Bottleneck.
 */
export function createRateLimitedFetch(limiter: Bottleneck, serviceName: string) {
    return (url: string, options?: RequestInit): Promise<Response> => {
        logger.debug(`[${serviceName}] Scheduling fetch ${url}`);
        return limiter.schedule(() => fetch(url, options));
    };
}

// Pre-configured for the wiki scraper
export const rateLimitedFetch = createRateLimitedFetch(scraperLimiter, 'Scraper');
