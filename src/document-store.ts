import { getColumn, rowCount } from "./frame.js";
import { createLogger } from "./logs.js";
import { waitUntilReady, type ReadinessOptions } from "./readiness.js";
import { withResource } from "./scope.js";
import type {
    AttributeSpec,
    DocumentRecord,
    DocumentStoreConnection,
    DocumentStoreConnector,
    Frame,
    Scalar,
} from "./types.js";

const log = createLogger("documents");

export const MEASUREMENT_ATTRIBUTES: AttributeSpec[] = [
    { name: "location", dataType: "text" },
    { name: "city", dataType: "text" },
    { name: "country", dataType: "text" },
    { name: "parameter", dataType: "text" },
    { name: "value", dataType: "number" },
    { name: "unit", dataType: "text" },
];

/**
 * Create the collection with the measurement attributes unless it is already
 * listed. An existing collection is used as-is, whatever its attributes.
 */
export async function ensureSchema(
    connection: DocumentStoreConnection,
    collection: string
): Promise<void> {
    const existing = await connection.listCollections();

    if (existing.includes(collection)) {
        log.info(`Collection '${collection}' already exists`);
        return;
    }

    log.info(`Creating collection '${collection}' ...`);
    await connection.createCollection(collection, MEASUREMENT_ATTRIBUTES);
}

function toText(value: Scalar | undefined): string {
    if (value === null || value === undefined) return "";
    return String(value);
}

function toNumber(value: Scalar | undefined): number | undefined {
    if (typeof value === "number") {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

/**
 * One record per row. Missing columns and null cells become empty text;
 * `value` is left out when it is not a number.
 */
export function toDocumentRecords(frame: Frame): DocumentRecord[] {
    const location = getColumn(frame, "location");
    const city = getColumn(frame, "city");
    const country = getColumn(frame, "country");
    const parameter = getColumn(frame, "parameter");
    const value = getColumn(frame, "value");
    const unit = getColumn(frame, "unit");

    const records: DocumentRecord[] = [];
    for (let i = 0; i < rowCount(frame); i++) {
        const record: DocumentRecord = {
            location: toText(location?.[i]),
            city: toText(city?.[i]),
            country: toText(country?.[i]),
            parameter: toText(parameter?.[i]),
            unit: toText(unit?.[i]),
        };
        const numeric = toNumber(value?.[i]);
        if (numeric !== undefined) {
            record.value = numeric;
        }
        records.push(record);
    }
    return records;
}

export interface IngestOptions extends ReadinessOptions {
    connect: DocumentStoreConnector;
    collection: string;
}

/**
 * Wait for the store, make sure the collection exists and bulk-insert every
 * row of the frame. The connection is closed however this ends; any other
 * error is the caller's to handle.
 */
export async function ingestDocuments(frame: Frame, options: IngestOptions): Promise<number> {
    const { connect, collection, ...readiness } = options;

    const store = {
        label: "document store connection",
        acquire: () => waitUntilReady(connect, readiness),
        release: (connection: DocumentStoreConnection) => connection.close(),
    };

    return withResource(store, log, async (connection) => {
        await ensureSchema(connection, collection);

        const records = toDocumentRecords(frame);
        log.info(`Ingesting ${records.length} rows into collection '${collection}' ...`);
        await connection.insertMany(collection, records);
        log.info("Document ingestion complete.");
        return records.length;
    });
}
