import weaviate, { type WeaviateClient } from "weaviate-client";
import { BatchInsertError } from "./errors.js";
import { createLogger } from "./logs.js";
import type { AttributeSpec, DocumentRecord, DocumentStoreConnection } from "./types.js";

const log = createLogger("weaviate");

export const DEFAULT_GRPC_PORT = 50051;

export interface WeaviateEndpoint {
    host: string;
    httpPort: number;
    grpcPort: number;
    secure: boolean;
}

/**
 * Split a store URL such as `http://weaviate:8080` into connection settings.
 * gRPC runs on the same host, on its own port.
 */
export function parseEndpoint(url: string, grpcPort = DEFAULT_GRPC_PORT): WeaviateEndpoint {
    const parsed = new URL(url);
    const secure = parsed.protocol === "https:";
    const httpPort = parsed.port ? parseInt(parsed.port, 10) : secure ? 443 : 8080;

    return {
        host: parsed.hostname || "weaviate",
        httpPort,
        grpcPort,
        secure,
    };
}

class WeaviateConnection implements DocumentStoreConnection {
    constructor(private readonly client: WeaviateClient) {}

    async listCollections(): Promise<string[]> {
        const collections = await this.client.collections.listAll();
        return collections.map((collection) => collection.name);
    }

    async createCollection(name: string, attributes: AttributeSpec[]): Promise<void> {
        await this.client.collections.create({
            name,
            properties: attributes.map((attribute) => ({
                name: attribute.name,
                dataType: attribute.dataType,
            })),
        });
    }

    async insertMany(collection: string, records: DocumentRecord[]): Promise<void> {
        const result = await this.client.collections.get(collection).data.insertMany(records);
        if (result.hasErrors) {
            const errors = Object.values(result.errors);
            throw new BatchInsertError(errors.length, records.length, errors[0]?.message);
        }
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}

export async function connectWeaviate(
    url: string,
    grpcPort = DEFAULT_GRPC_PORT
): Promise<DocumentStoreConnection> {
    const endpoint = parseEndpoint(url, grpcPort);

    log.info(
        `Connecting (host=${endpoint.host}, http_port=${endpoint.httpPort}, ` +
        `secure=${endpoint.secure}, grpc_port=${endpoint.grpcPort})`
    );

    const client = await weaviate.connectToCustom({
        httpHost: endpoint.host,
        httpPort: endpoint.httpPort,
        httpSecure: endpoint.secure,
        grpcHost: endpoint.host,
        grpcPort: endpoint.grpcPort,
        grpcSecure: endpoint.secure,
    });

    return new WeaviateConnection(client);
}
