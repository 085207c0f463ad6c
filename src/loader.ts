import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { gunzipSync } from "node:zlib";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { columnNames, createFrame, frameRows, rowCount } from "./frame.js";
import { createLogger } from "./logs.js";
import type { Frame, Scalar } from "./types.js";

const log = createLogger("loader");

const GZIP_MAGIC = [0x1f, 0x8b];

/** Cell texts read as missing, in addition to the empty cell. */
export const MISSING_TOKENS: ReadonlySet<string> = new Set([
    "#N/A",
    "#N/A N/A",
    "#NA",
    "-1.#IND",
    "-1.#QNAN",
    "-NaN",
    "-nan",
    "1.#IND",
    "1.#QNAN",
    "<NA>",
    "N/A",
    "NA",
    "NULL",
    "NaN",
    "None",
    "n/a",
    "nan",
    "null",
]);

/** Detected from the magic bytes only; the file extension is not consulted. */
export function isGzip(bytes: Buffer): boolean {
    return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

function toRows(parsed: unknown): string[][] {
    if (!Array.isArray(parsed)) return [];
    return parsed.map((record: unknown) =>
        Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? "")) : []
    );
}

function isMissing(cell: string): boolean {
    return cell === "" || MISSING_TOKENS.has(cell);
}

/**
 * Infer a column's cell types: empty cells and missing-value tokens become
 * null, and the column is numeric when every other cell parses as a finite
 * number.
 */
function inferColumn(cells: string[]): Scalar[] {
    const present = cells.map((c) => c.trim()).filter((c) => !isMissing(c));
    const numeric =
        present.length > 0 && present.every((c) => Number.isFinite(Number(c)));

    return cells.map((cell) => {
        const trimmed = cell.trim();
        if (isMissing(trimmed)) return null;
        return numeric ? Number(trimmed) : cell;
    });
}

/** Parse CSV text (header row first) into a frame. */
export function parseCsv(text: string): Frame {
    const rows = toRows(
        parse(text, {
            bom: true,
            // `"a", "b"` style files pad fields after the delimiter.
            trim: true,
            skip_empty_lines: true,
            relax_column_count: true,
        })
    );
    if (rows.length === 0) {
        return createFrame([]);
    }

    const [header, ...body] = rows;
    return createFrame(
        header.map((name, i) => ({
            name,
            values: inferColumn(body.map((row) => row[i] ?? "")),
        }))
    );
}

/** Read a CSV or gzip-compressed CSV file into a frame. */
export function loadFrame(path: string): Frame {
    log.info(`Loading raw data from ${path}`);
    const bytes = readFileSync(path);
    const text = isGzip(bytes) ? gunzipSync(bytes).toString("utf-8") : bytes.toString("utf-8");

    const frame = parseCsv(text);
    log.info(`Raw frame shape: (${rowCount(frame)}, ${frame.columns.length})`);
    return frame;
}

export function formatCsv(frame: Frame): string {
    return stringify([columnNames(frame), ...frameRows(frame)]);
}

/** Write a frame as UTF-8 CSV with a header row, replacing the file. */
export function writeFrame(frame: Frame, path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, formatCsv(frame), "utf-8");
}
