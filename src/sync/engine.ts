import type { RulerelayConfig, TargetDir } from "../config/types.js";
import { DiscoveryError } from "../errors.js";
import { PathRelocator } from "../relocate/relocator.js";
import { ContentRewriter } from "../relocate/rewriter.js";
import { discoverSourceFiles, type SourceFile } from "../scanner/discovery.js";
import type { Logger } from "../utils/logger.js";
import { SyncExecutor } from "./executor.js";
import { SyncPlanner } from "./planner.js";
import type { SyncDecision, SyncReport } from "./types.js";

export interface SyncEngineOptions {
    /** Plan only; never touch the target filesystem */
    dryRun?: boolean;
    logger?: Logger;
    relocator?: PathRelocator;
    /** Existence probe handed to the planner */
    exists?: (filePath: string) => boolean;
}

/**
 * Core sync engine. Plans and executes one decision per (source file, target)
 * pair, files in discovery order and targets in configured order.
 */
export class SyncEngine {
    private planner: SyncPlanner;
    private executor: SyncExecutor;
    private logger: Logger | undefined;

    constructor(options: SyncEngineOptions = {}) {
        this.logger = options.logger;
        this.planner = new SyncPlanner({ dryRun: options.dryRun, exists: options.exists });
        const rewriter = new ContentRewriter(options.relocator ?? new PathRelocator(), options.logger);
        this.executor = new SyncExecutor(rewriter, options.logger);
    }

    get dryRun(): boolean {
        return this.planner.dryRun;
    }

    /**
     * Discover the configured source files and synchronise them to every target.
     * @throws DiscoveryError if a source directory cannot be read or nothing matches
     */
    run(config: RulerelayConfig): SyncReport {
        const files = discoverSourceFiles(config);
        if (files.length === 0) {
            throw new DiscoveryError("No files matched the configured source patterns");
        }
        this.logger?.info(
            `Discovered ${files.length} file(s) for ${config.targetDirs.length} target(s)` +
            (this.dryRun ? " (dry run)" : ""),
        );
        return this.syncFiles(files, config.targetDirs);
    }

    /**
     * Synchronise already-discovered files to the given targets.
     */
    syncFiles(files: readonly SourceFile[], targets: readonly TargetDir[]): SyncReport {
        const decisions: SyncDecision[] = [];

        for (const file of files) {
            for (const target of targets) {
                decisions.push(this.syncFile(file, target));
            }
        }

        return { dryRun: this.dryRun, decisions };
    }

    private syncFile(file: SourceFile, target: TargetDir): SyncDecision {
        const decision = this.planner.plan(file, target);
        if (decision.action === "skip") {
            this.logger?.debug(`Skip ${file.relativePath} -> ${target.path}: ${decision.reason}`);
            return decision;
        }
        return this.executor.execute(decision);
    }
}
