import { SyncIOError } from "../errors.js";
import { ContentRewriter } from "../relocate/rewriter.js";
import { copyFileRaw, describeIOError, readFileContent, writeFileContent } from "../utils/fileops.js";
import type { Logger } from "../utils/logger.js";
import type { CopyRawDecision, CopyRewrittenDecision, ErrorDecision, SyncDecision } from "./types.js";

/**
 * Performs the write for a scheduled copy decision. Failures are recorded on
 * the returned decision and never thrown, so one bad file does not stop a run.
 */
export class SyncExecutor {
    private rewriter: ContentRewriter;
    private logger: Logger | undefined;

    constructor(rewriter: ContentRewriter = new ContentRewriter(), logger?: Logger) {
        this.rewriter = rewriter;
        this.logger = logger;
    }

    execute(decision: SyncDecision): SyncDecision {
        if (decision.action === "skip" || decision.action === "error" || !decision.scheduled) {
            return decision;
        }

        try {
            return decision.action === "copy-raw"
                ? this.copyRaw(decision)
                : this.copyRewritten(decision);
        } catch (err) {
            if (err instanceof SyncIOError) {
                return this.failed(decision, err);
            }
            throw err;
        }
    }

    private copyRaw(decision: CopyRawDecision): CopyRawDecision {
        copyFileRaw(decision.source.absolutePath, decision.targetPath);
        this.logger?.debug(`Copied ${decision.source.absolutePath} -> ${decision.targetPath}`);
        return { ...decision, written: true };
    }

    private copyRewritten(decision: CopyRewrittenDecision): CopyRewrittenDecision {
        const content = readFileContent(decision.source.absolutePath);
        const result = this.rewriter.rewrite(content, decision.source.sourceDir, decision.target.path);
        writeFileContent(decision.targetPath, result.content);
        this.logger?.debug(
            `Rewrote ${decision.source.absolutePath} -> ${decision.targetPath} ` +
            `(${result.relocations.length} path(s) adjusted)`,
        );
        return { ...decision, written: true, relocations: result.relocations };
    }

    private failed(decision: CopyRawDecision | CopyRewrittenDecision, error: SyncIOError): ErrorDecision {
        this.logger?.error(`${decision.source.absolutePath} -> ${decision.targetPath}: ${error.message}`);
        return {
            source: decision.source,
            target: decision.target,
            targetPath: decision.targetPath,
            action: "error",
            reason: describeIOError(error),
            error,
            attempted: decision.action,
        };
    }
}
