import { Logger } from "../../utils/logger.js";

/**
 * Options every command accepts, set on the program itself.
 */
export interface GlobalOptions {
    config?: string;
    verbose?: boolean;
    logFile?: string;
}

export function createLogger(options: GlobalOptions): Logger {
    return new Logger({ verbose: options.verbose, logFile: options.logFile });
}
