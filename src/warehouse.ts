import pg from "pg";
import { maskUri } from "./config.js";
import { describeError } from "./errors.js";
import { frameRows, rowCount } from "./frame.js";
import { createLogger } from "./logs.js";
import { withResource } from "./scope.js";
import type { Frame, Scalar, WarehouseConnector, WarehouseSession } from "./types.js";

const log = createLogger("warehouse");

const DEFAULT_BATCH_SIZE = 500;
// Postgres caps bind parameters per statement at 65535.
const MAX_PARAMETERS = 65535;

export type SqlColumnType = "DOUBLE PRECISION" | "TEXT";

export const connectPostgres: WarehouseConnector = async (uri) => {
    const client = new pg.Client({ connectionString: uri });
    await client.connect();

    return {
        async query(text: string, values?: Scalar[]): Promise<void> {
            await client.query(text, values);
        },
        close: () => client.end(),
    };
};

export function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

/** Numeric columns (every non-null cell a number, at least one present) map to DOUBLE PRECISION. */
export function inferColumnType(values: Scalar[]): SqlColumnType {
    const present = values.filter((v) => v !== null);
    if (present.length > 0 && present.every((v) => typeof v === "number")) {
        return "DOUBLE PRECISION";
    }
    return "TEXT";
}

export function createTableSql(table: string, frame: Frame): string {
    const columns = frame.columns.map(
        (c) => `${quoteIdentifier(c.name)} ${inferColumnType(c.values)}`
    );
    return `CREATE TABLE ${quoteIdentifier(table)} (${columns.join(", ")})`;
}

/** Multi-row INSERT with positional parameters for `rows`. */
export function insertSql(table: string, columns: string[], rows: number): string {
    const tuples: string[] = [];
    for (let r = 0; r < rows; r++) {
        const params = columns.map((_, c) => `$${r * columns.length + c + 1}`);
        tuples.push(`(${params.join(", ")})`);
    }
    return (
        `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(", ")}) ` +
        `VALUES ${tuples.join(", ")}`
    );
}

export interface WarehouseLoadOptions {
    uri: string;
    connect?: WarehouseConnector;
    batchSize?: number;
}

/**
 * Replace the contents of `table` with the frame: drop, recreate and insert
 * inside one transaction. Returns the number of rows written.
 */
export async function loadIntoWarehouse(
    frame: Frame,
    table: string,
    options: WarehouseLoadOptions
): Promise<number> {
    const connect = options.connect ?? connectPostgres;
    const names = frame.columns.map((c) => c.name);
    const types = frame.columns.map((c) => inferColumnType(c.values));
    const perStatement = names.length > 0 ? Math.floor(MAX_PARAMETERS / names.length) : 1;
    const batchSize = Math.max(1, Math.min(options.batchSize ?? DEFAULT_BATCH_SIZE, perStatement));

    const rows = frameRows(frame).map((row) =>
        row.map((value, i) =>
            types[i] === "TEXT" && typeof value === "number" ? String(value) : value
        )
    );

    log.info(`Connecting to warehouse: ${maskUri(options.uri)}`);

    const session = {
        label: "warehouse connection",
        acquire: () => connect(options.uri),
        release: (s: WarehouseSession) => s.close(),
    };

    return withResource(session, log, async (db) => {
        log.info(`Writing ${rowCount(frame)} rows to table '${table}' ...`);
        await db.query("BEGIN");
        try {
            await db.query(`DROP TABLE IF EXISTS ${quoteIdentifier(table)}`);
            await db.query(createTableSql(table, frame));

            if (names.length > 0) {
                for (let start = 0; start < rows.length; start += batchSize) {
                    const batch = rows.slice(start, start + batchSize);
                    await db.query(insertSql(table, names, batch.length), batch.flat());
                }
            }

            await db.query("COMMIT");
        } catch (err) {
            await db.query("ROLLBACK").catch((rollbackErr: unknown) => {
                log.warn(`Rollback failed: ${describeError(rollbackErr)}`);
            });
            throw err;
        }

        log.info(`Finished writing ${rows.length} rows to table '${table}'`);
        return rows.length;
    });
}
