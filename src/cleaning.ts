import { columnNames, filterRows, rowCount, selectColumns } from "./frame.js";
import { writeFrame } from "./loader.js";
import { createLogger, type Logger } from "./logs.js";
import type { Frame } from "./types.js";

/** Columns kept by the cleaning step, when present in the input. */
export const SELECTED_COLUMNS = [
    "location",
    "city",
    "country",
    "parameter",
    "value",
    "unit",
] as const;

export const VALUE_COLUMN = "value";

export type ProcessorKind = "engine" | "in-memory";

/**
 * A way of cleaning a frame. Both implementations apply the same plan and
 * write their result to the processed-data path before returning it.
 */
export interface FrameProcessor {
    readonly kind: ProcessorKind;
    process(frame: Frame): Promise<Frame>;
}

export interface CleaningPlan {
    /** Columns to keep, in input order. */
    keep: string[];
    /** Whether rows with a null `value` are dropped. */
    filterValue: boolean;
}

export function planCleaning(columns: string[], log: Logger): CleaningPlan {
    const allowed = new Set<string>(SELECTED_COLUMNS);
    let keep = columns.filter((name) => allowed.has(name));

    if (keep.length > 0) {
        log.info(`Keeping columns: ${JSON.stringify(keep)}`);
    } else {
        log.warn(
            `None of the expected columns ${JSON.stringify(SELECTED_COLUMNS)} found; keeping all columns`
        );
        keep = [...columns];
    }

    const filterValue = keep.includes(VALUE_COLUMN);
    if (!filterValue) {
        log.warn(`'${VALUE_COLUMN}' column not found; no row filtering performed`);
    }

    return { keep, filterValue };
}

export function createInMemoryProcessor(options: { processedPath: string }): FrameProcessor {
    const log = createLogger("process:in-memory");

    return {
        kind: "in-memory",
        async process(input: Frame): Promise<Frame> {
            log.info("Processing in memory (engine disabled or failed)");

            const plan = planCleaning(columnNames(input), log);
            let frame = selectColumns(input, plan.keep);

            if (plan.filterValue) {
                const before = rowCount(frame);
                frame = filterRows(frame, (row) => row[VALUE_COLUMN] !== null);
                log.info(`Dropped ${before - rowCount(frame)} row(s) with missing '${VALUE_COLUMN}'`);
            }

            writeFrame(frame, options.processedPath);
            log.info(
                `Saved processed data to ${options.processedPath} ` +
                `(shape=(${rowCount(frame)}, ${frame.columns.length}))`
            );
            return frame;
        },
    };
}
