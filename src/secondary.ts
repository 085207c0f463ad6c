import { loadConfig } from "./config.js";
import { fetchDataset } from "./fetcher.js";
import { dropEmptyRows, rowCount } from "./frame.js";
import { loadFrame, writeFrame } from "./loader.js";
import { createLogger } from "./logs.js";
import type { AppConfig, Frame } from "./types.js";

const log = createLogger("secondary");

/**
 * Fetch the secondary dataset, drop rows with no values at all and write the
 * result. This job has no sinks.
 */
export async function runSecondaryIngest(config: AppConfig): Promise<Frame> {
    const { url, raw_path, processed_path } = config.secondary;

    const raw = await fetchDataset(url, raw_path, {
        timeoutSeconds: config.source.fetch_timeout_seconds,
    });
    const input = loadFrame(raw.path);
    const frame = dropEmptyRows(input);

    writeFrame(frame, processed_path);
    log.info(
        `Saved secondary processed data to ${processed_path} ` +
        `(${rowCount(frame)} of ${rowCount(input)} rows kept)`
    );
    return frame;
}

/** Load the config and run the job; config errors surface as a rejection. */
export async function startSecondaryIngest(
    configPath?: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<Frame> {
    return runSecondaryIngest(loadConfig(configPath, env));
}
