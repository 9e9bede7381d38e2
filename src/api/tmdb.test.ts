import { AxiosError, AxiosHeaders } from 'axios';
import { createTmdbClient } from './tmdb';
import { RateLimitedAxios } from '../util/queues';
import { DecodeError, TransportError, UpstreamError } from '../util/errors';

jest.mock('../util/logger', () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

const mockGet = jest.fn();
const http: RateLimitedAxios = { get: mockGet };

function httpError(status?: number): AxiosError {
    const config = { headers: new AxiosHeaders() };
    const response = status === undefined ? undefined : {
        data: {},
        status,
        statusText: 'error',
        headers: {},
        config,
    };
    return new AxiosError('Request failed', status ? 'ERR_BAD_RESPONSE' : 'ECONNREFUSED', config, undefined, response);
}

describe('TMDB client', () => {
    const client = createTmdbClient({ apiKey: 'test-key' }, http);

    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('searchMovies', () => {
        it('should query the movie search endpoint with the key and fixed filters', async () => {
            mockGet.mockResolvedValueOnce({ data: { results: [] } });

            await client.searchMovies('Space Jam');

            expect(mockGet).toHaveBeenCalledWith('/search/movie', {
                params: {
                    api_key: 'test-key',
                    query: 'Space Jam',
                    language: 'en-US',
                    page: '1',
                    include_adult: 'false',
                },
            });
        });

        it('should map results and default missing fields', async () => {
            mockGet.mockResolvedValueOnce({
                data: {
                    results: [
                        { id: 2300, title: 'Space Jam', poster_path: '/sj.jpg', release_date: '1996-11-15', genre_ids: [16, 35] },
                        { id: 9999, title: 'Space Jam 2', poster_path: null },
                    ],
                },
            });

            const results = await client.searchMovies('Space Jam');

            expect(results).toEqual([
                { id: 2300, title: 'Space Jam', posterPath: '/sj.jpg', releaseDate: '1996-11-15', genreIds: [16, 35] },
                { id: 9999, title: 'Space Jam 2', posterPath: null, releaseDate: null, genreIds: [] },
            ]);
        });

        it('should throw UpstreamError with the status on a non-2xx response', async () => {
            mockGet.mockRejectedValueOnce(httpError(401));

            const error = await client.searchMovies('Ghost').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(UpstreamError);
            expect(error).toMatchObject({ operation: "search movie 'Ghost'", status: 401 });
        });

        it('should throw TransportError when no response arrives', async () => {
            mockGet.mockRejectedValueOnce(httpError());

            await expect(client.searchMovies('Ghost')).rejects.toBeInstanceOf(TransportError);
        });

        it('should skip malformed entries and keep the valid ones', async () => {
            mockGet.mockResolvedValueOnce({
                data: {
                    results: [
                        { id: 1, title: 'Ghost' },
                        { id: 2, title: null },
                        'junk',
                        { id: 3, title: 'Ghost Town', genre_ids: [35] },
                    ],
                },
            });

            const results = await client.searchMovies('Ghost');

            expect(results).toEqual([
                { id: 1, title: 'Ghost', posterPath: null, releaseDate: null, genreIds: [] },
                { id: 3, title: 'Ghost Town', posterPath: null, releaseDate: null, genreIds: [35] },
            ]);
        });

        it('should throw DecodeError on a malformed payload', async () => {
            mockGet.mockResolvedValueOnce({ data: { results: 'nope' } });

            const error = await client.searchMovies('Ghost').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(DecodeError);
            expect(error).toMatchObject({ operation: "search movie 'Ghost'" });
        });
    });

    describe('getImdbId', () => {
        it('should fetch the external ids of the movie', async () => {
            mockGet.mockResolvedValueOnce({ data: { id: 2300, imdb_id: 'tt0117705' } });

            await expect(client.getImdbId(2300)).resolves.toBe('tt0117705');
            expect(mockGet).toHaveBeenCalledWith('/movie/2300/external_ids', {
                params: { api_key: 'test-key' },
            });
        });

        it('should return an empty string when TMDB has no IMDb id', async () => {
            mockGet.mockResolvedValueOnce({ data: { id: 2300, imdb_id: null } });

            await expect(client.getImdbId(2300)).resolves.toBe('');
        });

        it('should throw UpstreamError when the lookup fails', async () => {
            mockGet.mockRejectedValueOnce(httpError(404));

            await expect(client.getImdbId(1)).rejects.toMatchObject({
                operation: 'get external ids for movie 1',
                status: 404,
            });
        });
    });
});
