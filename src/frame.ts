import { FrameShapeError } from "./errors.js";
import type { Frame, FrameColumn, Scalar } from "./types.js";

/**
 * Build a frame from columns, checking that all columns have the same length.
 * Values are copied so the result shares no arrays with the input.
 */
export function createFrame(columns: FrameColumn[]): Frame {
    const lengths = new Set(columns.map((c) => c.values.length));
    if (lengths.size > 1) {
        const detail = columns.map((c) => `${c.name}=${c.values.length}`).join(", ");
        throw new FrameShapeError(`Columns have different lengths: ${detail}`);
    }
    return {
        columns: columns.map((c) => ({ name: c.name, values: [...c.values] })),
    };
}

export function frameFromRows(names: string[], rows: Scalar[][]): Frame {
    return createFrame(
        names.map((name, i) => ({
            name,
            values: rows.map((row) => row[i] ?? null),
        }))
    );
}

export function rowCount(frame: Frame): number {
    return frame.columns.length > 0 ? frame.columns[0].values.length : 0;
}

export function columnNames(frame: Frame): string[] {
    return frame.columns.map((c) => c.name);
}

export function getColumn(frame: Frame, name: string): Scalar[] | undefined {
    return frame.columns.find((c) => c.name === name)?.values;
}

/** Row-major view of the frame, in column order. */
export function frameRows(frame: Frame): Scalar[][] {
    const rows: Scalar[][] = [];
    const count = rowCount(frame);
    for (let i = 0; i < count; i++) {
        rows.push(frame.columns.map((c) => c.values[i]));
    }
    return rows;
}

/** Keep the named columns, in the order given. Unknown names are ignored. */
export function selectColumns(frame: Frame, names: string[]): Frame {
    const picked: FrameColumn[] = [];
    for (const name of names) {
        const column = frame.columns.find((c) => c.name === name);
        if (column) picked.push(column);
    }
    return createFrame(picked);
}

export function filterRows(
    frame: Frame,
    predicate: (row: Record<string, Scalar>, index: number) => boolean
): Frame {
    const keep: number[] = [];
    const count = rowCount(frame);
    for (let i = 0; i < count; i++) {
        const row: Record<string, Scalar> = {};
        for (const column of frame.columns) {
            row[column.name] = column.values[i];
        }
        if (predicate(row, i)) keep.push(i);
    }

    return createFrame(
        frame.columns.map((c) => ({
            name: c.name,
            values: keep.map((i) => c.values[i]),
        }))
    );
}

/** Drop rows in which every cell is null. */
export function dropEmptyRows(frame: Frame): Frame {
    return filterRows(frame, (row) => Object.values(row).some((v) => v !== null));
}
