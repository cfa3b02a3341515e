import * as fs from "node:fs";
import * as path from "node:path";
import { describeCause } from "../errors.js";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
    /** Emit INFO and DEBUG lines on the console */
    verbose?: boolean;
    /** Also append every line to this file */
    logFile?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Console sink, defaults to stderr */
    write?: (line: string) => void;
}

export class Logger {
    private verbose: boolean;
    private logFile: string | undefined;
    private maxLogSize: number;
    private maxLogFiles: number;
    private sink: (line: string) => void;

    constructor(options: LoggerOptions = {}) {
        this.verbose = options.verbose ?? false;
        this.logFile = options.logFile;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.sink = options.write ?? ((line) => process.stderr.write(line));
        if (this.logFile) {
            fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
        }
    }

    /**
     * Get the path to the current log file, if any.
     */
    getLogFilePath(): string | undefined {
        return this.logFile;
    }

    debug(message: string): void {
        this.write("DEBUG", message);
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: LogLevel, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        if (level === "WARN" || level === "ERROR" || this.verbose) {
            this.sink(line);
        }

        if (this.logFile) {
            this.rotateIfNeeded(this.logFile);
            fs.appendFileSync(this.logFile, line, "utf-8");
        }
    }

    private rotateIfNeeded(logFile: string): void {
        try {
            if (!fs.existsSync(logFile)) return;

            const stat = fs.statSync(logFile);
            if (stat.size < this.maxLogSize) return;

            const ext = path.extname(logFile);
            const base = logFile.slice(0, logFile.length - ext.length);
            const numbered = (i: number): string => `${base}.${i}${ext}`;

            // Shift existing numbered logs, dropping the oldest
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = numbered(i);
                if (!fs.existsSync(from)) continue;
                if (i + 1 >= this.maxLogFiles) {
                    fs.unlinkSync(from);
                } else {
                    fs.renameSync(from, numbered(i + 1));
                }
            }

            fs.renameSync(logFile, numbered(1));
        } catch (err) {
            // Rotation failure leaves the current file in place
            this.sink(`[${new Date().toISOString()}] [WARN] Log rotation failed: ${describeCause(err)}\n`);
        }
    }
}
