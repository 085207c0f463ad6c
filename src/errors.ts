// ── Error types raised by pipeline stages ──

export class FetchError extends Error {
    constructor(
        message: string,
        readonly url: string,
        readonly status?: number,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = "FetchError";
    }
}

export class FrameShapeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "FrameShapeError";
    }
}

export class ReadinessTimeoutError extends Error {
    constructor(readonly timeoutSeconds: number, readonly attempts: number) {
        super(
            `Timed out after ${timeoutSeconds}s waiting for the document store to be ready ` +
            `(${attempts} attempt(s))`
        );
        this.name = "ReadinessTimeoutError";
    }
}

export class BatchInsertError extends Error {
    constructor(readonly failed: number, readonly total: number, firstMessage?: string) {
        super(
            `${failed} of ${total} object(s) were rejected by the document store` +
            (firstMessage ? `: ${firstMessage}` : "")
        );
        this.name = "BatchInsertError";
    }
}

export class EngineBusyError extends Error {
    constructor() {
        super("Compute engine is already running in this process");
        this.name = "EngineBusyError";
    }
}

/** One-line description of any thrown value, including a cause if present. */
export function describeError(err: unknown): string {
    if (!(err instanceof Error)) {
        return String(err);
    }
    const cause = err.cause;
    if (cause instanceof Error) {
        return `${err.message} (cause: ${cause.message})`;
    }
    return err.message;
}
