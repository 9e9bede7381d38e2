import { AsyncLocalStorage } from 'async_hooks';

const jobIds = new AsyncLocalStorage<string>();

/** Id of the resolution task the caller runs in, if any. */
export function getJobId(): string | undefined {
    return jobIds.getStore();
}

export function runWithJobId<T>(jobId: string, callback: () => T): T {
    return jobIds.run(jobId, callback);
}

export function createJobId(): string {
    return Math.random().toString(36).substring(2, 8);
}
