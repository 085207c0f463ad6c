import { describeError } from "./errors.js";
import type { Logger } from "./logs.js";

export interface ScopedResource<R> {
    /** What is being held, for log lines. */
    label: string;
    acquire: () => Promise<R>;
    release: (resource: R) => Promise<void> | void;
}

/**
 * Acquire a resource, hand it to `use`, and release it on every exit path.
 *
 * A failing release is logged as a warning and never rethrown, so the result
 * (or the error) of `use` is what the caller sees.
 */
export async function withResource<R, T>(
    scope: ScopedResource<R>,
    log: Logger,
    use: (resource: R) => Promise<T>
): Promise<T> {
    const resource = await scope.acquire();
    try {
        return await use(resource);
    } finally {
        try {
            await scope.release(resource);
        } catch (err) {
            log.warn(`Error while releasing ${scope.label} (ignored): ${describeError(err)}`);
        }
    }
}
