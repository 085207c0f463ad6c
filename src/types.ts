// ── Shared types for the ingest pipeline ──

export interface SourceConfig {
    url: string;
    fetch_timeout_seconds: number;
}

export interface PathsConfig {
    raw: string;
    processed: string;
}

export interface EngineConfig {
    skip: boolean;
}

export interface DocumentStoreConfig {
    url: string;
    grpc_port: number;
    collection: string;
    ready_timeout_seconds: number;
    ready_interval_seconds: number;
    skip: boolean;
}

export interface WarehouseConfig {
    uri: string;
    table: string;
    skip: boolean;
}

export interface SecondaryConfig {
    url: string;
    raw_path: string;
    processed_path: string;
}

export interface AppConfig {
    source: SourceConfig;
    paths: PathsConfig;
    engine: EngineConfig;
    document_store: DocumentStoreConfig;
    warehouse: WarehouseConfig;
    secondary: SecondaryConfig;
}

// ── Frame types ──

export type Scalar = string | number | null;

export interface FrameColumn {
    name: string;
    values: Scalar[];
}

/** Column-oriented table; every column holds the same number of values. */
export interface Frame {
    columns: FrameColumn[];
}

export interface RawDataset {
    url: string;
    path: string;
    bytes: number;
}

// ── Document store types ──

export type AttributeType = "text" | "number";

export interface AttributeSpec {
    name: string;
    dataType: AttributeType;
}

export type DocumentRecord = {
    location: string;
    city: string;
    country: string;
    parameter: string;
    value?: number;
    unit: string;
};

/** The subset of a document-store client the pipeline talks to. */
export interface DocumentStoreConnection {
    listCollections(): Promise<string[]>;
    createCollection(name: string, attributes: AttributeSpec[]): Promise<void>;
    insertMany(collection: string, records: DocumentRecord[]): Promise<void>;
    close(): Promise<void>;
}

export type DocumentStoreConnector = () => Promise<DocumentStoreConnection>;

// ── Warehouse types ──

export interface WarehouseSession {
    query(text: string, values?: Scalar[]): Promise<void>;
    close(): Promise<void>;
}

export type WarehouseConnector = (uri: string) => Promise<WarehouseSession>;
