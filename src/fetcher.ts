import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { FetchError } from "./errors.js";
import { createLogger } from "./logs.js";
import type { RawDataset } from "./types.js";

const log = createLogger("fetch");

/**
 * Download the dataset at `url` and store the bytes at `rawPath`,
 * replacing any previous download.
 */
export async function fetchDataset(
    url: string,
    rawPath: string,
    options: { timeoutSeconds: number }
): Promise<RawDataset> {
    log.info(`Downloading open data from ${url} ...`);

    let response: Response;
    try {
        response = await fetch(url, {
            signal: AbortSignal.timeout(options.timeoutSeconds * 1000),
        });
    } catch (err) {
        throw new FetchError(`Download of ${url} failed`, url, undefined, { cause: err });
    }

    if (!response.ok) {
        throw new FetchError(
            `Download of ${url} failed with HTTP ${response.status}`,
            url,
            response.status
        );
    }

    const body = Buffer.from(await response.arrayBuffer());

    mkdirSync(dirname(rawPath), { recursive: true });
    writeFileSync(rawPath, body);
    log.info(`Saved raw data to ${rawPath} (${body.length} bytes)`);

    return { url, path: rawPath, bytes: body.length };
}
