#!/usr/bin/env node
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { DEFAULT_CONFIG_PATH, ENV_CONFIG_PATH, loadConfig } from "../../../libs/bootstrap/config/loader.js";
import { logger } from "../../../libs/logging/logger.js";
import { describeError } from "../../../libs/errors/errors.js";
import { AttributionWorker } from "../../../libs/attribution/attributionWorker.js";

async function main() {
    const configPath = process.argv[2] ?? process.env[ENV_CONFIG_PATH] ?? DEFAULT_CONFIG_PATH;
    const config = await loadConfig(configPath);
    const runtime = await bootstrap("attribution-worker", config);

    const worker = new AttributionWorker(runtime.repo, runtime.attributor, runtime.scanIntervalMinutes);

    if (process.env['SCAN_ONCE'] === 'true') {
        const result = await worker.runCycle();
        if (result.errors.length > 0) {
            process.exitCode = 1;
        }
        return;
    }

    worker.start();
    const shutdown = () => {
        worker.stop();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch(err => {
    logger.fatal({ error: describeError(err) }, "Attribution worker failed to start");
    process.exit(1);
});
