import { z } from 'zod';
import { ResolvedMovie } from '../resolver';
import { DecodeError } from '../util/errors';

const MovieListItemSchema = z.object({
    title: z.string(),
    imdb_id: z.string().min(1),
    poster_url: z.string(),
});

const MovieListSchema = z.array(MovieListItemSchema);

/**
 * One entry of a Radarr "StevenLu Custom" list.
 */
export type MovieListItem = z.infer<typeof MovieListItemSchema>;

// UTF-8 byte order is code point order; no locale collation
function compareText(a: string, b: string): number {
    return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Sorts resolved movies by title and drops repeated IMDb ids, keeping the
 * first in sorted order. Two wiki titles can resolve to the same movie.
 * The result only depends on the entries, never on the order they arrived in.
 */
export function buildList(entries: readonly ResolvedMovie[]): ResolvedMovie[] {
    const sorted = [...entries].sort((a, b) =>
        compareText(a.title, b.title) || compareText(a.imdbId, b.imdbId) || compareText(a.posterUrl, b.posterUrl)
    );

    const seen = new Set<string>();
    return sorted.filter(movie => {
        if (seen.has(movie.imdbId)) return false;
        seen.add(movie.imdbId);
        return true;
    });
}

export function toListItem(movie: ResolvedMovie): MovieListItem {
    return {
        title: movie.title,
        imdb_id: movie.imdbId,
        poster_url: movie.posterUrl,
    };
}

export function serializeMovieList(entries: readonly ResolvedMovie[]): string {
    return JSON.stringify(entries.map(toListItem)) + '\n';
}

/**
 * Parses a file written by {@link serializeMovieList}.
 * @throws DecodeError when the text is not a valid movie list
 */
export function parseMovieList(text: string): MovieListItem[] {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (e) {
        throw new DecodeError('movie list', e instanceof Error ? e.message : 'invalid JSON');
    }

    const result = MovieListSchema.safeParse(data);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new DecodeError('movie list', issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid list');
    }
    return result.data;
}
