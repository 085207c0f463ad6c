import Database from "better-sqlite3";
import { planCleaning, type CleaningPlan, type FrameProcessor } from "./cleaning.js";
import { EngineBusyError } from "./errors.js";
import { columnNames, createFrame, frameFromRows, frameRows, rowCount } from "./frame.js";
import { writeFrame } from "./loader.js";
import { createLogger } from "./logs.js";
import { withResource } from "./scope.js";
import type { Frame, Scalar } from "./types.js";

const log = createLogger("process:engine");

/** A started compute engine, good for one processing attempt. */
export interface ComputeEngine {
    clean(frame: Frame, plan: CleaningPlan): Frame;
    shutdown(): void;
}

// The engine is a process-wide singleton; at most one may be held at a time.
let engineHeld = false;

function toScalar(value: unknown): Scalar {
    if (value === null || value === undefined) return null;
    if (typeof value === "number" || typeof value === "string") return value;
    if (typeof value === "bigint") return Number(value);
    return String(value);
}

/**
 * Embedded SQL engine over an in-memory database. The frame is loaded into a
 * table whose columns are named positionally (c0, c1, ...), so any header text,
 * duplicates included, is safe to load.
 */
export class SqlEngine implements ComputeEngine {
    private closed = false;

    private constructor(private readonly db: Database.Database) {}

    static async start(): Promise<SqlEngine> {
        if (engineHeld) {
            throw new EngineBusyError();
        }
        const db = new Database(":memory:");
        engineHeld = true;
        return new SqlEngine(db);
    }

    static isRunning(): boolean {
        return engineHeld;
    }

    clean(frame: Frame, plan: CleaningPlan): Frame {
        const names = columnNames(frame);
        if (names.length === 0) {
            return createFrame([]);
        }

        const slots = names.map((_, i) => `c${i}`);
        this.db.exec(`CREATE TABLE frame (${slots.join(", ")})`);

        const insert = this.db.prepare(
            `INSERT INTO frame VALUES (${slots.map(() => "?").join(", ")})`
        );
        const insertAll = this.db.transaction((rows: Scalar[][]) => {
            for (const row of rows) insert.run(...row);
        });
        insertAll(frameRows(frame));
        log.info(`Loaded frame into engine with ${rowCount(frame)} rows, ${names.length} cols`);

        const selected = plan.keep.map((name) => slots[names.indexOf(name)]);
        let sql = `SELECT ${selected.join(", ")} FROM frame`;
        if (plan.filterValue) {
            log.info("Dropping rows with missing 'value'");
            sql += ` WHERE ${slots[names.indexOf("value")]} IS NOT NULL`;
        }
        sql += " ORDER BY rowid";

        const rows = this.db.prepare(sql).raw(true).all();
        return frameFromRows(
            plan.keep,
            rows.map((row) => (Array.isArray(row) ? row.map(toScalar) : []))
        );
    }

    shutdown(): void {
        if (this.closed) return;
        this.closed = true;
        try {
            this.db.close();
        } finally {
            engineHeld = false;
        }
    }
}

export function createEngineProcessor(options: {
    processedPath: string;
    start?: () => Promise<ComputeEngine>;
}): FrameProcessor {
    const start = options.start ?? (() => SqlEngine.start());

    return {
        kind: "engine",
        async process(input: Frame): Promise<Frame> {
            const engine = {
                label: "compute engine",
                acquire: async () => {
                    log.info("Starting compute engine...");
                    return start();
                },
                release: (running: ComputeEngine) => {
                    log.info("Shutting down compute engine...");
                    running.shutdown();
                },
            };

            return withResource(engine, log, async (running) => {
                const plan = planCleaning(columnNames(input), log);
                const frame = running.clean(input, plan);

                writeFrame(frame, options.processedPath);
                log.info(
                    `Saved processed data (engine) to ${options.processedPath} ` +
                    `(shape=(${rowCount(frame)}, ${frame.columns.length}))`
                );
                return frame;
            });
        },
    };
}
