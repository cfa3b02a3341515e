import * as fs from "node:fs";
import * as path from "node:path";
import { minimatch } from "minimatch";
import type { TargetDir } from "../config/types.js";
import type { SourceFile } from "../scanner/discovery.js";
import { SKIP_REASONS, type SyncDecision } from "./types.js";

export interface PlannerOptions {
    /** Record what would happen without scheduling any write */
    dryRun?: boolean;
    /** Existence probe for target files (defaults to fs.existsSync) */
    exists?: (filePath: string) => boolean;
}

/**
 * Decides, for each (source file, target directory) pair, whether the file is
 * copied as-is, copied with its paths rewritten, or skipped. Writes nothing.
 */
export class SyncPlanner {
    readonly dryRun: boolean;
    private exists: (filePath: string) => boolean;

    constructor(options: PlannerOptions = {}) {
        this.dryRun = options.dryRun ?? false;
        this.exists = options.exists ?? fs.existsSync;
    }

    /**
     * Where a source file lands under a target directory.
     */
    static targetPathFor(file: SourceFile, target: TargetDir): string {
        return path.join(target.path, file.relativePath);
    }

    /**
     * Decide the action for one pair. The first matching rule wins:
     * target ignore pattern, existing file with overwrite off, then copy.
     * Copies planned in a dry run are not scheduled.
     */
    plan(file: SourceFile, target: TargetDir): SyncDecision {
        const targetPath = SyncPlanner.targetPathFor(file, target);
        const base = { source: file, target, targetPath };

        const ignoredBy = target.ignoreFiles.find((pattern) =>
            minimatch(file.relativePath, pattern, { dot: true }),
        );
        if (ignoredBy !== undefined) {
            return { ...base, action: "skip", reason: SKIP_REASONS.ignored(ignoredBy) };
        }

        if (!file.overwrite && this.exists(targetPath)) {
            return { ...base, action: "skip", reason: SKIP_REASONS.exists };
        }

        // A dry run records the action a real run would take, unscheduled
        const copy = { ...base, scheduled: !this.dryRun, written: false };
        if (file.adjustPaths) {
            return { ...copy, action: "copy-rewritten", relocations: null };
        }
        return { ...copy, action: "copy-raw" };
    }
}
