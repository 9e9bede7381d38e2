export const DEFAULT_WIKI_URL = "https://comedybangbang.fandom.com/wiki/Scott_Hasn%27t_Seen";
export const DEFAULT_TMDB_BASE_URL = 'https://api.themoviedb.org/3';

// Poster paths from TMDB start with "/", so this is joined without a separator
export const TMDB_POSTER_BASE_URL = 'https://www.themoviedb.org/t/p/w300_and_h450_bestv2';

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_RATE_LIMIT_MS = 250;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

// Italic text on the wiki that is not a movie: other shows, award segments, cast, labels.
// Matched as lowercase substrings.
export const TITLE_DENYLIST: readonly string[] = Object.freeze([
    'cobra kai',
    'season',
    'episodes',
    'pilot',
    'watchalong',
    'awards',
    "the scott hasn't seenies",
    'march of the penguins',
    'september 5',
    'twin peaks',
    'martin',
    "sprague hasn't seen",
    'did',
    'next',
    "the scott hasn't seenies awards",
    "scott hasn't seen",
]);

export const EPISODE_PATTERN = /episode|season|part \d+/i;

// TMDB movie genre ids
export const GENRE_NAMES: ReadonlyMap<number, string> = new Map([
    [28, 'action'],
    [12, 'adventure'],
    [16, 'animation'],
    [35, 'comedy'],
    [80, 'crime'],
    [99, 'documentary'],
    [18, 'drama'],
    [10751, 'family'],
    [14, 'fantasy'],
    [36, 'history'],
    [27, 'horror'],
    [10402, 'music'],
    [9648, 'mystery'],
    [10749, 'romance'],
    [878, 'science_fiction'],
    [10770, 'tv_movie'],
    [53, 'thriller'],
    [10752, 'war'],
    [37, 'western'],
]);
