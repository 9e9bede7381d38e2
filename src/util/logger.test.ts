import pino from 'pino';
import { prefixJobId } from './logger';
import { runWithJobId } from './context';

jest.mock('pino', () => jest.fn(() => ({})));

jest.mock('./env', () => ({
    __esModule: true,
    default: { LOG_LEVEL: 'debug' },
}));

describe('logger', () => {
    it('should be created at the configured level with a log method hook', () => {
        expect(pino).toHaveBeenCalledWith(expect.objectContaining({
            level: 'debug',
            hooks: { logMethod: expect.any(Function) },
        }));
    });

    it('should leave messages outside a task unchanged', () => {
        expect(prefixJobId('Fetching wiki page')).toBe('Fetching wiki page');
    });

    it('should prefix messages inside a task with its job id', () => {
        expect(runWithJobId('k3x9q1', () => prefixJobId('✓ Found: Heat'))).toBe('[k3x9q1] ✓ Found: Heat');
    });
});
