import PQueue from 'p-queue';
import { resolveAll } from '.';
import { ResolvedMovie } from '../resolver';
import { getJobId } from '../util/context';
import { NotFoundError } from '../util/errors';

jest.mock('../util/logger', () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

function movie(title: string, imdbId: string = `tt-${title}`): ResolvedMovie {
    return { title, tmdbId: 1, imdbId, posterUrl: '', releaseDate: null, genres: [] };
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('resolveAll', () => {
    it('should aggregate successes and count every kind of failure', async () => {
        const resolve = jest.fn(async (title: string) => {
            if (title === 'Unknown Film') throw new NotFoundError(title, `no results found for '${title}'`);
            if (title === 'No Imdb') return movie(title, '');
            return movie(title);
        });

        const result = await resolveAll(['Movie A', 'Unknown Film', 'No Imdb', 'Movie C'], resolve, { rateLimitMs: 0 });

        expect(result.successful).toBe(2);
        expect(result.failed).toBe(2);
        expect(result.entries.map(e => e.title).sort()).toEqual(['Movie A', 'Movie C']);
        expect(resolve).toHaveBeenCalledTimes(4);
    });

    it('should never drop an entry with an empty IMDb id into the results', async () => {
        const result = await resolveAll(['No Imdb'], async (title) => movie(title, ''), { rateLimitMs: 0 });

        expect(result).toEqual({ entries: [], successful: 0, failed: 1 });
    });

    it('should return an empty result for no titles', async () => {
        const resolve = jest.fn();

        await expect(resolveAll([], resolve)).resolves.toEqual({ entries: [], successful: 0, failed: 0 });
        expect(resolve).not.toHaveBeenCalled();
    });

    it('should hold at most 5 slots at once for 12 titles', async () => {
        const queue = new PQueue({ concurrency: 5 });
        const titles = Array.from({ length: 12 }, (_, i) => `Movie ${i + 1}`);
        let inFlight = 0;
        let maxInFlight = 0;
        let maxPending = 0;

        const result = await resolveAll(titles, async (title) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            maxPending = Math.max(maxPending, queue.pending);
            await sleep(10);
            inFlight--;
            return movie(title);
        }, { queue, rateLimitMs: 20 });

        expect(maxInFlight).toBe(5);
        expect(maxPending).toBeLessThanOrEqual(5);
        expect(result.successful).toBe(12);
        expect(result.entries).toHaveLength(12);
        expect(queue.pending).toBe(0);
    });

    it('should keep the slot through the pause after a success', async () => {
        const starts: number[] = [];

        await resolveAll(['Movie A', 'Movie B'], async (title) => {
            starts.push(Date.now());
            return movie(title);
        }, { concurrency: 1, rateLimitMs: 100 });

        expect(starts).toHaveLength(2);
        expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(90);
    });

    it('should keep the slot through the pause after a failure', async () => {
        const starts: number[] = [];

        const result = await resolveAll(['Unknown Film', 'Movie B'], async (title) => {
            starts.push(Date.now());
            if (title === 'Unknown Film') throw new Error('boom');
            return movie(title);
        }, { concurrency: 1, rateLimitMs: 100 });

        expect(result.failed).toBe(1);
        expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(90);
    });

    it('should wait for slow tasks before returning', async () => {
        const result = await resolveAll(['Slow', 'Fast'], async (title) => {
            await sleep(title === 'Slow' ? 50 : 1);
            return movie(title);
        }, { rateLimitMs: 0 });

        expect(result.entries.map(e => e.title)).toEqual(['Fast', 'Slow']);
    });

    it('should run each task under its own job id', async () => {
        const jobIds: Array<string | undefined> = [];

        await resolveAll(['Movie A', 'Movie B', 'Movie C'], async (title) => {
            jobIds.push(getJobId());
            return movie(title);
        }, { rateLimitMs: 0 });

        expect(jobIds).toHaveLength(3);
        expect(jobIds.every(id => typeof id === 'string' && id.length > 0)).toBe(true);
        expect(getJobId()).toBeUndefined();
    });
});
