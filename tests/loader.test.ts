import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { gzipSync } from "node:zlib";
import { formatCsv, isGzip, loadFrame, parseCsv, writeFrame } from "../src/loader.js";
import { columnNames, createFrame, getColumn, rowCount } from "../src/frame.js";

const CSV = "location,city,parameter,value,unit\nLocA,CityA,pm25,10,ug/m3\nLocB,CityB,pm10,,ug/m3\n";

describe("parseCsv", () => {
    it("infers numeric columns and turns empty cells into null", () => {
        const frame = parseCsv(CSV);

        expect(columnNames(frame)).toEqual(["location", "city", "parameter", "value", "unit"]);
        expect(getColumn(frame, "value")).toEqual([10, null]);
        expect(getColumn(frame, "location")).toEqual(["LocA", "LocB"]);
    });

    it("keeps a column as text when any cell is not a number", () => {
        const frame = parseCsv("code\n1\nx\n");
        expect(getColumn(frame, "code")).toEqual(["1", "x"]);
    });

    it("reads quoted fields padded with spaces after the delimiter", () => {
        const frame = parseCsv('"Month", "2001", "2002"\n"JAN",  12,  15\n"FEB",  11,  14\n');

        expect(columnNames(frame)).toEqual(["Month", "2001", "2002"]);
        expect(getColumn(frame, "Month")).toEqual(["JAN", "FEB"]);
        expect(getColumn(frame, "2001")).toEqual([12, 11]);
        expect(getColumn(frame, "2002")).toEqual([15, 14]);
    });

    it("reads missing-value tokens as null", () => {
        const frame = parseCsv("location,value\na,10\nb,NaN\nc,NA\nd,null\ne,N/A\n");

        expect(getColumn(frame, "value")).toEqual([10, null, null, null, null]);
        expect(getColumn(frame, "location")).toEqual(["a", "b", "c", "d", "e"]);
    });

    it("returns an empty frame for empty input", () => {
        expect(parseCsv("").columns).toEqual([]);
    });
});

describe("loadFrame", () => {
    let tempDir: string;

    afterEach(() => {
        if (tempDir) {
            rmSync(tempDir, { recursive: true, force: true });
        }
    });

    function makeTempDir(): string {
        tempDir = mkdtempSync(join(tmpdir(), "airq-loader-test-"));
        return tempDir;
    }

    function tempFile(name: string, content: Buffer | string): string {
        const path = join(makeTempDir(), name);
        writeFileSync(path, content);
        return path;
    }

    it("reads gzip-compressed CSV", () => {
        const compressed = gzipSync(Buffer.from(CSV, "utf-8"));
        expect(isGzip(compressed)).toBe(true);

        const frame = loadFrame(tempFile("opendata.csv.gz", compressed));
        expect(frame).toEqual(parseCsv(CSV));
    });

    it("reads plain CSV even under a .gz name", () => {
        const frame = loadFrame(tempFile("opendata.csv.gz", CSV));
        expect(rowCount(frame)).toBe(2);
    });

    it("round-trips a frame through the processed file", () => {
        const processedPath = join(makeTempDir(), "processed", "clean.csv");
        const frame = parseCsv(CSV);

        writeFrame(frame, processedPath);
        const reread = loadFrame(processedPath);

        expect(rowCount(reread)).toBe(rowCount(frame));
        expect(columnNames(reread)).toEqual(columnNames(frame));
    });

    it("writes null cells as empty fields", () => {
        const frame = createFrame([
            { name: "a", values: [1, null] },
            { name: "b", values: ["x", "y"] },
        ]);

        expect(formatCsv(frame)).toBe("a,b\n1,x\n,y\n");

        const out = join(makeTempDir(), "out.csv");
        writeFrame(frame, out);
        expect(readFileSync(out, "utf-8")).toBe("a,b\n1,x\n,y\n");
    });
});
