import pino from 'pino';
import env from './env';
import { getJobId } from './context';

/** Prefixes a message logged inside a resolution task with the task's job id. */
export function prefixJobId(message: string): string {
    const jobId = getJobId();
    return jobId ? `[${jobId}] ${message}` : message;
}

const logger = pino({
    level: env.LOG_LEVEL,
    hooks: {
        logMethod(args, method) {
            if (typeof args[0] === 'string') {
                args[0] = prefixJobId(args[0]);
            }
            method.apply(this, args);
        },
    },
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    },
});

export default logger;
