import * as cheerio from 'cheerio';
import logger from '../util/logger';
import { EPISODE_PATTERN, TITLE_DENYLIST } from '../util/constants';

const MIN_TITLE_LENGTH = 3;
const MIN_SINGLE_WORD_LENGTH = 4;

// Counts code points, so a character outside the BMP counts once
function characterCount(text: string): number {
    return [...text].length;
}

/**
 * Returns why a trimmed candidate is not a movie title, or null if it passes.
 */
export function isExcludedTitle(title: string): string | null {
    const length = characterCount(title);
    if (length < MIN_TITLE_LENGTH) {
        return 'too short';
    }

    const titleLower = title.toLowerCase();
    const keyword = TITLE_DENYLIST.find(k => titleLower.includes(k));
    if (keyword) {
        return `denylisted (${keyword})`;
    }

    if (EPISODE_PATTERN.test(title)) {
        return 'episode or season reference';
    }

    const words = title.split(/\s+/).filter(w => w.length > 0);
    if (words.length <= 1 && length < MIN_SINGLE_WORD_LENGTH) {
        return 'short single word';
    }

    return null;
}

/**
 * Filters raw italic texts down to movie titles, keeping first-appearance order.
 * Duplicates are detected within this call only. A candidate counts as seen
 * even when it is rejected, so a later copy of it is rejected too.
 */
export function filterTitles(candidates: Iterable<string>): string[] {
    const seen = new Set<string>();
    const titles: string[] = [];

    for (const candidate of candidates) {
        const title = candidate.trim();

        if (seen.has(title)) continue;
        seen.add(title);

        const reason = isExcludedTitle(title);
        if (reason) {
            logger.debug(`Skipping "${title}": ${reason}`);
            continue;
        }

        titles.push(title);
    }

    return titles;
}

/**
 * Extracts candidate movie titles from the wiki page. The wiki italicizes
 * every title it mentions.
 */
export function extractTitles(html: string): string[] {
    const $ = cheerio.load(html);
    const candidates: string[] = [];

    $('i').each((_, element) => {
        candidates.push($(element).text());
    });

    logger.debug(`Found ${candidates.length} italic candidates.`);
    return filterTitles(candidates);
}
