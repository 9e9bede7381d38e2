#!/usr/bin/env node
import 'dotenv/config';

import { loadConfig } from './util/config';
import logger from './util/logger';
import { describeError } from './util/errors';
import { fetchWikiPage, extractTitles } from './scraper';
import { createTmdbClient } from './api/tmdb';
import { resolveMovie } from './resolver';
import { resolveAll } from './pipeline';
import { buildList } from './list';
import { writeMovieList } from './list/writer';

export interface RunSummary {
    titles: number;
    successful: number;
    failed: number;
    written: string[];
}

/**
 * One full pass: scrape the wiki, resolve every title, write the list.
 * Throws only when the wiki page itself can't be fetched or parsed.
 */
export async function run(now: Date = new Date()): Promise<RunSummary> {
    const config = loadConfig();

    const html = await fetchWikiPage(config.wikiUrl, config.tmdb.timeoutMs);

    logger.info('Extracting movie titles...');
    const titles = extractTitles(html);
    logger.info(`Found ${titles.length} unique movies`);

    const client = createTmdbClient(config.tmdb);
    const { entries, successful, failed } = await resolveAll(
        titles,
        title => resolveMovie(title, client),
        config.pipeline
    );

    const movies = buildList(entries);
    logger.info('Movies sorted by title for consistent output order');
    logger.info(`Summary: Successful: ${successful}, Failed: ${failed}, Total: ${movies.length}`);

    if (movies.length === 0) {
        logger.warn('No movies found to save');
        return { titles: titles.length, successful, failed, written: [] };
    }

    const written = writeMovieList(movies, {
        outputDir: config.output.dir,
        baseName: config.output.baseName,
        timestamped: config.output.timestamped,
        dryRun: config.dryRun,
        now,
    });

    return { titles: titles.length, successful, failed, written };
}

export async function main(): Promise<void> {
    try {
        await run();
    } catch (e) {
        logger.fatal(`Failed to generate movie list: ${describeError(e)}`);
        process.exitCode = 1;
    }
}

if (require.main === module) {
    main().catch((e) => {
        logger.error(e);
        process.exitCode = 1;
    });
}
