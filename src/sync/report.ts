import * as path from "node:path";
import type { TargetDir } from "../config/types.js";
import type { SyncDecision, SyncReport } from "./types.js";

export interface ReportSummary {
    synced: number;
    skipped: number;
    errored: number;
}

export interface FormatOptions {
    /** Include per-line path adjustments and error messages */
    verbose?: boolean;
}

/**
 * Count decisions by outcome. Copies count as synced in a dry run too.
 */
export function summarizeReport(report: SyncReport): ReportSummary {
    const summary: ReportSummary = { synced: 0, skipped: 0, errored: 0 };
    for (const decision of report.decisions) {
        switch (decision.action) {
            case "copy-raw":
            case "copy-rewritten":
                summary.synced++;
                break;
            case "skip":
                summary.skipped++;
                break;
            case "error":
                summary.errored++;
                break;
        }
    }
    return summary;
}

/**
 * Process exit code for a finished run: 1 if any decision failed.
 */
export function exitCodeFor(report: SyncReport): number {
    return report.decisions.some((d) => d.action === "error") ? 1 : 0;
}

/**
 * Whether a target lies outside the current repository, in which case
 * rewritten paths may need checking by hand.
 */
export function isExternalTarget(target: TargetDir): boolean {
    return target.external || target.path === ".." || target.path.startsWith("../") || path.isAbsolute(target.path);
}

function groupBySource(decisions: readonly SyncDecision[]): Map<string, SyncDecision[]> {
    const groups = new Map<string, SyncDecision[]>();
    for (const decision of decisions) {
        const key = decision.source.absolutePath;
        const group = groups.get(key);
        if (group) {
            group.push(decision);
        } else {
            groups.set(key, [decision]);
        }
    }
    return groups;
}

function describeCopy(decision: SyncDecision, verbose: boolean): string[] {
    const lines: string[] = [];
    if (decision.action === "copy-rewritten") {
        if (decision.relocations === null) {
            lines.push("  * Path adjustment: enabled");
        } else {
            lines.push(`  * Path adjustments: ${decision.relocations.length} locations`);
            if (verbose) {
                for (const r of decision.relocations) {
                    lines.push(`    - Line ${r.lineNumber}: '${r.originalPath}' -> '${r.adjustedPath}'`);
                }
            }
        }
    } else {
        lines.push("  * No path adjustment (as configured)");
    }
    if (isExternalTarget(decision.target)) {
        lines.push("  * Warning: Cross-repository paths may require manual verification");
    }
    return lines;
}

/**
 * Render a report as human-readable lines, grouped by source file in the
 * order files were discovered.
 */
export function formatReport(report: SyncReport, options: FormatOptions = {}): string[] {
    const verbose = options.verbose ?? false;
    const groups = [...groupBySource(report.decisions).values()];
    const body: string[] = [];

    body.push("Synchronization report", "");
    body.push("Files to synchronize:");
    for (const group of groups) {
        for (const d of group) {
            if (d.action !== "copy-raw" && d.action !== "copy-rewritten") continue;
            body.push(`- '${d.source.absolutePath}' -> '${d.targetPath}'`);
            body.push(...describeCopy(d, verbose));
        }
    }

    body.push("", "Files to skip:");
    for (const group of groups) {
        for (const d of group) {
            if (d.action !== "skip") continue;
            body.push(`- '${d.source.absolutePath}' -> '${d.targetPath}' (${d.reason})`);
        }
    }

    const summary = summarizeReport(report);
    body.push("", "Synchronization completed");
    body.push(`- Files synchronized: ${summary.synced}`);
    body.push(`- Files skipped: ${summary.skipped}`);

    if (summary.errored > 0) {
        body.push(`- Errors encountered: ${summary.errored}`);
        if (verbose) {
            body.push("", "Errors:");
            for (const d of report.decisions) {
                if (d.action !== "error") continue;
                body.push(`- '${d.source.absolutePath}' -> '${d.targetPath}': ${d.reason}`);
            }
        }
    }

    const prefix = report.dryRun ? "[DRY-RUN] " : "";
    return body.map((line) => (line === "" ? line : prefix + line));
}
