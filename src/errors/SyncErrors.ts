export class VersionConflictError extends Error {
    public readonly path: string;
    public readonly expectedToken: string | null;
    public readonly actualToken?: string;

    constructor(message: string, details: { path: string; expectedToken: string | null; actualToken?: string }) {
        super(message);
        this.name = "VersionConflictError";
        this.path = details.path;
        this.expectedToken = details.expectedToken;
        this.actualToken = details.actualToken;
    }
}

/** Network, timeout, auth or any other store failure that is not a version conflict. */
export class TransportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "TransportError";
    }
}

export class InvalidInputError extends Error {
    public readonly details?: Record<string, unknown>;

    constructor(message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "InvalidInputError";
        this.details = details;
    }
}

export class OperationCancelledError extends Error {
    constructor(message: string = "Operation cancelled") {
        super(message);
        this.name = "OperationCancelledError";
    }
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof OperationCancelledError) return true;
    return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
