import { TmdbClient, TmdbSearchResult } from '../api/tmdb';
import { describeError, NotFoundError } from '../util/errors';
import { GENRE_NAMES, TMDB_POSTER_BASE_URL } from '../util/constants';
import logger from '../util/logger';

export interface ResolvedMovie {
    readonly title: string;
    readonly tmdbId: number;
    /** Empty when TMDB has no IMDb cross-reference; such entries are never written. */
    readonly imdbId: string;
    /** Empty when TMDB has no poster. */
    readonly posterUrl: string;
    readonly releaseDate: string | null;
    readonly genres: readonly string[];
}

export function buildPosterUrl(posterPath: string | null): string {
    return posterPath ? `${TMDB_POSTER_BASE_URL}${posterPath}` : '';
}

/**
 * Maps TMDB genre ids to lowercase names, dropping ids the table doesn't know.
 */
export function mapGenres(genreIds: readonly number[]): string[] {
    const genres: string[] = [];
    for (const id of genreIds) {
        const name = GENRE_NAMES.get(id);
        if (name) genres.push(name);
    }
    return genres;
}

async function toResolvedMovie(result: TmdbSearchResult, client: TmdbClient): Promise<ResolvedMovie> {
    const imdbId = await client.getImdbId(result.id);

    return Object.freeze({
        title: result.title,
        tmdbId: result.id,
        imdbId,
        posterUrl: buildPosterUrl(result.posterPath),
        releaseDate: result.releaseDate,
        genres: Object.freeze(mapGenres(result.genreIds)),
    });
}

/**
 * Searches TMDB for the title and takes the first result.
 * @throws NotFoundError when the search comes back empty
 */
export async function searchMovieExact(title: string, client: TmdbClient): Promise<ResolvedMovie> {
    const results = await client.searchMovies(title);

    const [first] = results;
    if (!first) {
        throw new NotFoundError(title, `no results found for '${title}'`);
    }

    return await toResolvedMovie(first, client);
}

/**
 * Resolves a wiki title to a TMDB movie and its IMDb id.
 *
 * Titles like "Face/Off" are searched as written first. When that fails for
 * any reason, the part before the first "/" is tried on its own, which covers
 * wiki entries that list a double feature or an alternate title.
 */
export async function resolveMovie(title: string, client: TmdbClient): Promise<ResolvedMovie> {
    if (!title.includes('/')) {
        return await searchMovieExact(title, client);
    }

    try {
        return await searchMovieExact(title, client);
    } catch (error) {
        logger.debug(`Full title search failed for '${title}' (${describeError(error)}), trying first part`);
    }

    const firstPart = title.split('/')[0].trim();
    if (firstPart) {
        try {
            return await searchMovieExact(firstPart, client);
        } catch (error) {
            logger.debug(`First part search failed for '${firstPart}' (${describeError(error)})`);
        }
    }

    throw new NotFoundError(title, `no results found for '${title}' (tried full title and first part)`);
}
