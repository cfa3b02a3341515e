import { loadConfig } from "../../config/loader.js";
import { describeCause } from "../../errors.js";
import { SyncEngine } from "../../sync/engine.js";
import { exitCodeFor, formatReport } from "../../sync/report.js";
import { createLogger, type GlobalOptions } from "./options.js";

export interface SyncOptions extends GlobalOptions {
    dryRun?: boolean;
}

/**
 * Load the configuration, synchronise every source file to every target and
 * print the report.
 * @returns The process exit code
 */
export function syncCommand(options: SyncOptions): number {
    const logger = createLogger(options);
    try {
        const config = loadConfig(options.config);
        const engine = new SyncEngine({ dryRun: options.dryRun, logger });
        const report = engine.run(config);

        for (const line of formatReport(report, { verbose: options.verbose })) {
            console.log(line);
        }
        return exitCodeFor(report);
    } catch (err) {
        const message = describeCause(err);
        logger.error(`Sync failed: ${message}`);
        console.error(`Error: ${message}`);
        return 1;
    }
}
