import { createInMemoryProcessor, type FrameProcessor, type ProcessorKind } from "./cleaning.js";
import { ingestDocuments } from "./document-store.js";
import { createEngineProcessor } from "./engine.js";
import { describeError } from "./errors.js";
import { fetchDataset } from "./fetcher.js";
import { rowCount } from "./frame.js";
import { loadFrame } from "./loader.js";
import { createLogger } from "./logs.js";
import { loadIntoWarehouse } from "./warehouse.js";
import { connectWeaviate } from "./weaviate.js";
import type { AppConfig, Frame, RawDataset } from "./types.js";

const log = createLogger("pipeline");

export type ExitStatus = 0 | 1;

/** Stage implementations; tests swap these for fakes. */
export interface PipelineDeps {
    fetch(): Promise<RawDataset>;
    load(raw: RawDataset): Promise<Frame>;
    primary: FrameProcessor;
    fallback: FrameProcessor;
    ingestDocuments(frame: Frame): Promise<number>;
    loadWarehouse(frame: Frame): Promise<number>;
}

export type DocumentOutcome =
    | { status: "ingested"; records: number }
    | { status: "skipped" }
    | { status: "failed"; error: string };

export type WarehouseOutcome =
    | { status: "loaded"; rows: number }
    | { status: "skipped" };

export interface PipelineReport {
    rawRows: number;
    processedRows: number;
    processor: ProcessorKind;
    documents: DocumentOutcome;
    warehouse: WarehouseOutcome;
}

export function createDefaultDeps(config: AppConfig): PipelineDeps {
    const processedPath = config.paths.processed;
    const store = config.document_store;

    return {
        fetch: () =>
            fetchDataset(config.source.url, config.paths.raw, {
                timeoutSeconds: config.source.fetch_timeout_seconds,
            }),
        load: async (raw) => loadFrame(raw.path),
        primary: createEngineProcessor({ processedPath }),
        fallback: createInMemoryProcessor({ processedPath }),
        ingestDocuments: (frame) =>
            ingestDocuments(frame, {
                connect: () => connectWeaviate(store.url, store.grpc_port),
                collection: store.collection,
                timeoutSeconds: store.ready_timeout_seconds,
                pollIntervalSeconds: store.ready_interval_seconds,
            }),
        loadWarehouse: (frame) =>
            loadIntoWarehouse(frame, config.warehouse.table, { uri: config.warehouse.uri }),
    };
}

/**
 * Clean the frame with the primary engine, falling back to the in-memory
 * processor on any engine failure. A fallback failure is not caught.
 */
async function processFrame(
    frame: Frame,
    config: AppConfig,
    deps: PipelineDeps
): Promise<{ frame: Frame; processor: ProcessorKind }> {
    if (config.engine.skip) {
        log.info("SKIP_ENGINE=true: processing without the compute engine");
        return { frame: await deps.fallback.process(frame), processor: deps.fallback.kind };
    }

    try {
        return { frame: await deps.primary.process(frame), processor: deps.primary.kind };
    } catch (err) {
        log.error(`Engine processing failed: ${describeError(err)}. Falling back to in-memory processing.`);
        return { frame: await deps.fallback.process(frame), processor: deps.fallback.kind };
    }
}

/**
 * Run every stage once, in order: fetch → load → process → documents → warehouse.
 *
 * Fetch, load, the fallback processor and the warehouse write are fatal and
 * propagate. Document-store failures are logged and the run carries on.
 */
export async function runPipeline(
    config: AppConfig,
    deps: PipelineDeps = createDefaultDeps(config)
): Promise<PipelineReport> {
    log.info("===== Ingestion pipeline starting =====");

    const raw = await deps.fetch();
    const input = await deps.load(raw);

    const { frame, processor } = await processFrame(input, config, deps);

    let documents: DocumentOutcome;
    if (config.document_store.skip) {
        log.info("SKIP_WEAVIATE=true: skipping document store ingestion");
        documents = { status: "skipped" };
    } else {
        try {
            const records = await deps.ingestDocuments(frame);
            documents = { status: "ingested", records };
        } catch (err) {
            const error = describeError(err);
            log.error(`Document store ingestion FAILED (${error}). Continuing without vector store ingestion.`);
            documents = { status: "failed", error };
        }
    }

    let warehouse: WarehouseOutcome;
    if (config.warehouse.skip) {
        log.info("SKIP_POSTGRES=true: skipping warehouse load");
        warehouse = { status: "skipped" };
    } else {
        warehouse = { status: "loaded", rows: await deps.loadWarehouse(frame) };
    }

    log.info("===== Ingestion pipeline completed =====");

    return {
        rawRows: rowCount(input),
        processedRows: rowCount(frame),
        processor,
        documents,
        warehouse,
    };
}

/** Run the pipeline and map the outcome to a process exit status. */
export async function run(
    config: AppConfig,
    deps: PipelineDeps = createDefaultDeps(config)
): Promise<ExitStatus> {
    try {
        const report = await runPipeline(config, deps);
        log.info(
            `Processed ${report.rawRows} → ${report.processedRows} rows with the ${report.processor} processor ` +
            `(documents: ${report.documents.status}, warehouse: ${report.warehouse.status})`
        );
        return 0;
    } catch (err) {
        log.error(`Fatal: ${describeError(err)}`);
        return 1;
    }
}
