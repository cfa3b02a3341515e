/**
 * Error classes raised by rulerelay.
 *
 * Token-level failures (AnchorResolutionError) are absorbed by the rewriter,
 * decision-level failures (SyncIOError) are recorded on the decision, and
 * run-level failures (ConfigurationError, DiscoveryError) abort before planning.
 */

/**
 * Base error class for rulerelay operations
 */
export class RulerelayError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

/**
 * An anchor directory could not be resolved to an absolute path.
 */
export class AnchorResolutionError extends RulerelayError {
    constructor(
        public readonly anchor: string,
        cause: unknown,
    ) {
        super(`Cannot resolve anchor directory "${anchor}": ${describeCause(cause)}`, { cause });
    }
}

/** Filesystem operations a sync decision can fail on */
export type IOOperation = "mkdir" | "read" | "write" | "copy";

/**
 * A filesystem failure while executing one sync decision.
 */
export class SyncIOError extends RulerelayError {
    public readonly code?: string;

    constructor(
        public readonly operation: IOOperation,
        public readonly filePath: string,
        cause: unknown,
    ) {
        super(`Failed to ${operation} ${filePath}: ${describeCause(cause)}`, { cause });
        this.code = errnoCode(cause);
    }
}

/**
 * The configuration file is missing, unparsable or invalid.
 */
export class ConfigurationError extends RulerelayError {}

/**
 * A source directory could not be scanned for files.
 */
export class DiscoveryError extends RulerelayError {}

/**
 * Render an unknown thrown value as a message.
 */
export function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The errno code carried by a Node.js system error, if any.
 */
export function errnoCode(cause: unknown): string | undefined {
    if (typeof cause === "object" && cause !== null && "code" in cause) {
        const { code } = cause;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}
