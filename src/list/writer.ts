import fs from 'fs';
import path from 'path';
import { ResolvedMovie } from '../resolver';
import { serializeMovieList } from '.';
import { describeError } from '../util/errors';
import logger from '../util/logger';

export interface WriteOptions {
    outputDir: string;
    baseName: string;
    /** Also write a `<baseName>_YYYYMMDD_HHmmss.json` copy. */
    timestamped: boolean;
    dryRun?: boolean;
    now?: Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Writes the list to `<baseName>.json` (and the timestamped copy).
 * A file that fails to write is logged and skipped.
 * @returns paths that were written
 */
export function writeMovieList(entries: readonly ResolvedMovie[], options: WriteOptions): string[] {
    const content = serializeMovieList(entries);

    const fileNames = [`${options.baseName}.json`];
    if (options.timestamped) {
        fileNames.unshift(`${options.baseName}_${formatTimestamp(options.now ?? new Date())}.json`);
    }

    const written: string[] = [];
    for (const fileName of fileNames) {
        const filePath = path.join(options.outputDir, fileName);

        if (options.dryRun) {
            logger.info(`[DRY RUN] Would save ${entries.length} movies to ${filePath}`);
            continue;
        }

        try {
            fs.mkdirSync(options.outputDir, { recursive: true });
            fs.writeFileSync(filePath, content);
            logger.info(`Saved ${entries.length} movies to ${filePath}`);
            written.push(filePath);
        } catch (e) {
            logger.error(`Failed to save ${filePath}: ${describeError(e)}`);
        }
    }

    return written;
}
