import { describe, it, expect, beforeEach } from "vitest";
import { describeWarmupError, waitUntilReady } from "../src/readiness.js";
import { ReadinessTimeoutError } from "../src/errors.js";
import { clearLogs } from "../src/logs.js";
import type { DocumentStoreConnection } from "../src/types.js";
import { fakeClock } from "./fakes.js";

class WeaviateUnexpectedStatusCodeError extends Error {}

type TrackedConnection = DocumentStoreConnection & { closed: number };

function connection(overrides: Partial<DocumentStoreConnection> = {}): TrackedConnection {
    const conn: TrackedConnection = {
        closed: 0,
        listCollections: async () => [],
        createCollection: async () => {},
        insertMany: async () => {},
        close: async () => {
            conn.closed++;
        },
        ...overrides,
    };
    return conn;
}

describe("waitUntilReady", () => {
    beforeEach(() => {
        clearLogs();
    });

    it("returns the first connection that can list collections", async () => {
        const clock = fakeClock();
        const conn = connection();
        let attempts = 0;

        const ready = await waitUntilReady(
            async () => {
                attempts++;
                return conn;
            },
            clock
        );

        expect(ready).toBe(conn);
        expect(attempts).toBe(1);
        expect(clock.sleeps).toEqual([]);
    });

    it("retries after connection errors, sleeping the poll interval", async () => {
        const clock = fakeClock();
        const conn = connection();
        let attempts = 0;

        const ready = await waitUntilReady(
            async () => {
                attempts++;
                if (attempts < 3) throw new Error("connect ECONNREFUSED");
                return conn;
            },
            { ...clock, pollIntervalSeconds: 2 }
        );

        expect(ready).toBe(conn);
        expect(attempts).toBe(3);
        expect(clock.sleeps).toEqual([2000, 2000]);
    });

    it("closes a connection whose probe failed", async () => {
        const clock = fakeClock();
        let probes = 0;
        const flaky = connection({
            listCollections: async () => {
                probes++;
                if (probes === 1) throw new WeaviateUnexpectedStatusCodeError("503");
                return [];
            },
        });

        const ready = await waitUntilReady(async () => flaky, clock);

        expect(ready).toBe(flaky);
        expect(flaky.closed).toBe(1);
    });

    it("times out on wall-clock time, not on a retry count", async () => {
        const clock = fakeClock();
        let attempts = 0;

        const wait = waitUntilReady(
            async () => {
                attempts++;
                throw new Error("connect ECONNREFUSED");
            },
            { ...clock, timeoutSeconds: 10, pollIntervalSeconds: 5 }
        );

        await expect(wait).rejects.toThrow(ReadinessTimeoutError);
        // failures at t=0, 5, 10 are within the window; t=15 exceeds it
        expect(attempts).toBe(4);
        expect(clock.sleeps).toEqual([5000, 5000, 5000]);
    });
});

describe("describeWarmupError", () => {
    it("names unexpected status codes", () => {
        expect(describeWarmupError(new WeaviateUnexpectedStatusCodeError("503"))).toBe(
            "Document store returned unexpected status while warming up: 503"
        );
    });

    it("names leader election problems", () => {
        expect(describeWarmupError(new Error("leader not found"))).toBe(
            "Document store not ready yet (leader/permissions issue): leader not found"
        );
    });

    it("falls back to a generic message", () => {
        expect(describeWarmupError(new Error("connect ECONNREFUSED"))).toBe(
            "Error while waiting for document store: connect ECONNREFUSED"
        );
    });
});
