import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { addLog, clearLogs, createLogger, getLogs } from "../src/logs.js";

describe("createLogger", () => {
    beforeEach(() => {
        clearLogs();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("prefixes console output with the source and records the entry", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

        createLogger("fetch").warn("retrying in %d seconds", 5);

        expect(warn).toHaveBeenCalledWith("[fetch] retrying in 5 seconds");
        expect(getLogs()).toMatchObject([
            { level: "warn", source: "fetch", message: "retrying in 5 seconds" },
        ]);
    });
});

describe("getLogs", () => {
    beforeEach(() => {
        clearLogs();
    });

    it("filters by level and returns the most recent entries", () => {
        addLog("info", "one");
        addLog("error", "two");
        addLog("info", "three");

        expect(getLogs({ level: "info" }).map((e) => e.message)).toEqual(["one", "three"]);
        expect(getLogs({ limit: 2 }).map((e) => e.message)).toEqual(["two", "three"]);
    });

    it("returns entries after a given id", () => {
        addLog("info", "first");
        const [first] = getLogs();
        addLog("info", "second");

        expect(getLogs({ sinceId: first.id }).map((e) => e.message)).toEqual(["second"]);
    });
});
