/**
 * pipeline-runner.ts — Runs the ingest pipeline once, then exits.
 *
 * Reads config from CONFIG_PATH (optional) and the environment. The exit code
 * is 1 only when a fatal stage failed.
 */
import { describeConfig, loadConfig } from "./config.js";
import { createLogger } from "./logs.js";
import { run } from "./pipeline.js";

const log = createLogger("pipeline-runner");

async function main(): Promise<number> {
    const config = loadConfig();
    log.info(describeConfig(config));

    return run(config);
}

main()
    .then((status) => {
        process.exit(status);
    })
    .catch((err: unknown) => {
        log.error("Fatal:", err);
        process.exit(1);
    });
