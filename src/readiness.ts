import { setTimeout as delay } from "node:timers/promises";
import { describeError, ReadinessTimeoutError } from "./errors.js";
import { createLogger } from "./logs.js";
import type { DocumentStoreConnection, DocumentStoreConnector } from "./types.js";

const log = createLogger("readiness");

export const DEFAULT_READY_TIMEOUT_SECONDS = 120;
export const DEFAULT_READY_INTERVAL_SECONDS = 5;

export interface ReadinessOptions {
    timeoutSeconds?: number;
    pollIntervalSeconds?: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

/**
 * Warm-up failures are retried the same way; only the log line differs.
 * The client's error classes are matched by name.
 */
export function describeWarmupError(err: unknown): string {
    const name = err instanceof Error ? `${err.constructor.name} ${err.name}` : "";
    const detail = describeError(err);

    if (/InsufficientPermissions|Leader/i.test(name) || /leader/i.test(detail)) {
        return `Document store not ready yet (leader/permissions issue): ${detail}`;
    }
    if (/UnexpectedStatusCode/i.test(name)) {
        return `Document store returned unexpected status while warming up: ${detail}`;
    }
    if (/\bWeaviate/.test(name)) {
        return `General document store error while waiting: ${detail}`;
    }
    return `Error while waiting for document store: ${detail}`;
}

/**
 * Block until the document store accepts a connection and can list its
 * collections, then return that connection. Retries on any error until the
 * wall-clock timeout is exceeded; there is no attempt limit.
 */
export async function waitUntilReady(
    connect: DocumentStoreConnector,
    options: ReadinessOptions = {}
): Promise<DocumentStoreConnection> {
    const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_READY_TIMEOUT_SECONDS;
    const intervalSeconds = options.pollIntervalSeconds ?? DEFAULT_READY_INTERVAL_SECONDS;
    const sleep = options.sleep ?? ((ms: number) => delay(ms));
    const now = options.now ?? (() => Date.now());

    const start = now();
    let attempts = 0;

    log.info("Waiting for document store ...");

    for (;;) {
        attempts++;
        let connection: DocumentStoreConnection | undefined;
        try {
            connection = await connect();
            await connection.listCollections();
            log.info(`Document store is ready (attempt ${attempts})`);
            return connection;
        } catch (err) {
            log.warn(describeWarmupError(err));
            if (connection) {
                await connection.close().catch((closeErr: unknown) => {
                    log.warn(`Failed to close connection after failed probe: ${describeError(closeErr)}`);
                });
            }
        }

        if (now() - start > timeoutSeconds * 1000) {
            throw new ReadinessTimeoutError(timeoutSeconds, attempts);
        }

        log.info(`Waiting for document store... retrying in ${intervalSeconds} seconds`);
        await sleep(intervalSeconds * 1000);
    }
}
