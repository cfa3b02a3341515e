import type { TargetDir } from "../config/types.js";
import type { SyncIOError } from "../errors.js";
import type { RelocationResult } from "../relocate/rewriter.js";
import type { SourceFile } from "../scanner/discovery.js";

/**
 * What happens to one (source file, target directory) pair.
 * - `copy-raw`: byte-for-byte copy
 * - `copy-rewritten`: copy with relative paths adjusted for the target
 * - `skip`: ignored by the target, or kept because overwrite is off
 * - `error`: the copy was attempted and failed
 */
export type SyncAction = "copy-raw" | "copy-rewritten" | "skip" | "error";

export type CopyAction = Extract<SyncAction, "copy-raw" | "copy-rewritten">;

interface DecisionBase {
    source: SourceFile;
    target: TargetDir;
    /** Where the file lands: the target directory joined with the relative path */
    targetPath: string;
}

interface CopyDecisionBase extends DecisionBase {
    /** False in a dry run: the copy is recorded but never performed */
    scheduled: boolean;
    /** False until executed, and always false in a dry run */
    written: boolean;
}

export interface CopyRawDecision extends CopyDecisionBase {
    action: "copy-raw";
}

export interface CopyRewrittenDecision extends CopyDecisionBase {
    action: "copy-rewritten";
    /** Paths changed in the written file; null until executed */
    relocations: RelocationResult[] | null;
}

export interface SkipDecision extends DecisionBase {
    action: "skip";
    reason: string;
}

export interface ErrorDecision extends DecisionBase {
    action: "error";
    reason: string;
    error: SyncIOError;
    /** The copy that was attempted */
    attempted: CopyAction;
}

export type SyncDecision = CopyRawDecision | CopyRewrittenDecision | SkipDecision | ErrorDecision;

/**
 * Every decision of one run, in the order they were made.
 */
export interface SyncReport {
    readonly dryRun: boolean;
    readonly decisions: readonly SyncDecision[];
}

export const SKIP_REASONS = {
    exists: "file exists and overwrite=false",
    ignored: (pattern: string) => `file matches ignore pattern ${pattern} in target directory`,
} as const;
