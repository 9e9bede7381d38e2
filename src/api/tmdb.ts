import Axios from 'axios';
import { z } from 'zod';
import logger from '../util/logger';
import { createRateLimitedAxios, RateLimitedAxios, tmdbLimiter } from '../util/queues';
import { DecodeError, TransportError, UpstreamError } from '../util/errors';
import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_TMDB_BASE_URL } from '../util/constants';

const SearchResultSchema = z.object({
    id: z.number().int(),
    title: z.string(),
    poster_path: z.string().nullable().optional(),
    release_date: z.string().nullable().optional(),
    genre_ids: z.array(z.number().int()).default([]),
});

// Entries are checked one by one so a single bad entry cannot fail the search
const SearchResponseSchema = z.object({
    results: z.array(z.unknown()),
});

const ExternalIdsSchema = z.object({
    imdb_id: z.string().nullable().optional(),
});

export interface TmdbSearchResult {
    id: number;
    title: string;
    posterPath: string | null;
    releaseDate: string | null;
    genreIds: number[];
}

/**
 * The two TMDB calls a title resolution needs.
 */
export interface TmdbClient {
    /**
     * Searches movies by title (first page, adult titles excluded).
     * @returns results in TMDB's relevance order; empty when nothing matched
     */
    searchMovies(title: string): Promise<TmdbSearchResult[]>;

    /**
     * Looks up the IMDb id cross-referenced by a TMDB movie.
     * @returns the id, or an empty string when TMDB has none
     */
    getImdbId(tmdbId: number): Promise<string>;
}

export interface TmdbClientOptions {
    apiKey: string;
    baseUrl?: string;
    timeoutMs?: number;
}

function toRequestError(operation: string, error: unknown): Error {
    if (Axios.isAxiosError(error)) {
        if (error.response) {
            return new UpstreamError(operation, error.response.status);
        }
        return new TransportError(operation, error);
    }
    return error instanceof Error ? error : new TransportError(operation, error);
}

function decode<T extends z.ZodTypeAny>(schema: T, data: unknown, operation: string): z.output<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new DecodeError(operation, issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid payload');
    }
    return result.data;
}

/**
 * Creates a TMDB v3 client. Every request carries the API key and goes through
 * the shared TMDB limiter unless another transport is passed in.
 */
export function createTmdbClient(options: TmdbClientOptions, http?: RateLimitedAxios): TmdbClient {
    const transport = http ?? createRateLimitedAxios(
        Axios.create({
            baseURL: options.baseUrl ?? DEFAULT_TMDB_BASE_URL,
            timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        }),
        tmdbLimiter,
        'TMDB'
    );

    async function get(path: string, params: Record<string, string>, operation: string): Promise<unknown> {
        try {
            const response = await transport.get<unknown>(path, {
                params: { api_key: options.apiKey, ...params }
            });
            return response.data;
        } catch (error) {
            throw toRequestError(operation, error);
        }
    }

    return {
        async searchMovies(title: string): Promise<TmdbSearchResult[]> {
            const operation = `search movie '${title}'`;
            const data = await get('/search/movie', {
                query: title,
                language: 'en-US',
                page: '1',
                include_adult: 'false',
            }, operation);

            const { results } = decode(SearchResponseSchema, data, operation);
            logger.debug(`TMDB returned ${results.length} results for '${title}'`);

            const movies: TmdbSearchResult[] = [];
            results.forEach((entry, index) => {
                const parsed = SearchResultSchema.safeParse(entry);
                if (!parsed.success) {
                    logger.debug(`Skipping malformed result ${index} for '${title}'`);
                    return;
                }
                movies.push({
                    id: parsed.data.id,
                    title: parsed.data.title,
                    posterPath: parsed.data.poster_path ?? null,
                    releaseDate: parsed.data.release_date ?? null,
                    genreIds: parsed.data.genre_ids,
                });
            });
            return movies;
        },

        async getImdbId(tmdbId: number): Promise<string> {
            const operation = `get external ids for movie ${tmdbId}`;
            const data = await get(`/movie/${tmdbId}/external_ids`, {}, operation);
            const externalIds = decode(ExternalIdsSchema, data, operation);
            return externalIds.imdb_id ?? '';
        },
    };
}
