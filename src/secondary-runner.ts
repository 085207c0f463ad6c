/**
 * secondary-runner.ts — Fetches and cleans the secondary dataset once, then exits.
 */
import { createLogger } from "./logs.js";
import { startSecondaryIngest } from "./secondary.js";

const log = createLogger("secondary-runner");

async function main(): Promise<void> {
    await startSecondaryIngest();
}

main()
    .then(() => {
        process.exit(0);
    })
    .catch((err: unknown) => {
        log.error("Fatal:", err);
        process.exit(1);
    });
