/**
 * Base class for every failure the list generator raises on purpose.
 */
export class ListError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The request never produced a response: DNS, refused connection, timeout.
 */
export class TransportError extends ListError {
    constructor(public readonly operation: string, cause?: unknown) {
        super(`${operation} failed: ${cause instanceof Error ? cause.message : 'network error'}`, { cause });
    }
}

/**
 * The remote answered with a non-success HTTP status.
 */
export class UpstreamError extends ListError {
    constructor(public readonly operation: string, public readonly status: number) {
        super(`${operation} returned status ${status}`);
    }
}

/**
 * A search produced nothing usable for the title.
 */
export class NotFoundError extends ListError {
    constructor(public readonly title: string, public readonly reason: string) {
        super(reason);
    }
}

/**
 * A payload did not have the shape we expected.
 */
export class DecodeError extends ListError {
    constructor(public readonly operation: string, detail: string) {
        super(`Failed to decode ${operation}: ${detail}`);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
