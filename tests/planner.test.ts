import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { SyncPlanner } from "../src/sync/planner.js";
import { SKIP_REASONS } from "../src/sync/types.js";
import type { TargetDir } from "../src/config/types.js";
import type { SourceFile } from "../src/scanner/discovery.js";

function sourceFile(overrides: Partial<SourceFile> = {}): SourceFile {
    return {
        absolutePath: "/repo/rules/.clinerules",
        sourceDir: "/repo/rules",
        relativePath: ".clinerules",
        pattern: ".clinerules",
        adjustPaths: true,
        overwrite: true,
        ...overrides,
    };
}

function targetDir(overrides: Partial<TargetDir> = {}): TargetDir {
    return { path: "/repo/packages/web", external: false, ignoreFiles: [], ...overrides };
}

const nothingExists = (): boolean => false;
const everythingExists = (): boolean => true;

describe("SyncPlanner", () => {
    it("should join the target directory with the relative path", () => {
        const file = sourceFile({ relativePath: ".cursor/rules/style.mdc" });
        expect(SyncPlanner.targetPathFor(file, targetDir())).toBe(
            path.join("/repo/packages/web", ".cursor/rules/style.mdc"),
        );
    });

    it("should plan a rewritten copy when path adjustment is on", () => {
        const planner = new SyncPlanner({ exists: nothingExists });
        const decision = planner.plan(sourceFile(), targetDir());
        expect(decision).toEqual({
            source: sourceFile(),
            target: targetDir(),
            targetPath: path.join("/repo/packages/web", ".clinerules"),
            action: "copy-rewritten",
            scheduled: true,
            written: false,
            relocations: null,
        });
    });

    it("should plan a raw copy when path adjustment is off", () => {
        const planner = new SyncPlanner({ exists: nothingExists });
        const decision = planner.plan(sourceFile({ adjustPaths: false }), targetDir());
        expect(decision.action).toBe("copy-raw");
        expect(decision).not.toHaveProperty("relocations");
    });

    describe("ignore patterns", () => {
        it("should skip a file matching a target ignore pattern", () => {
            const planner = new SyncPlanner({ exists: nothingExists });
            const decision = planner.plan(
                sourceFile({ relativePath: ".cursor/rules/local.mdc" }),
                targetDir({ ignoreFiles: ["*.md", ".cursor/rules/*.mdc"] }),
            );
            expect(decision.action).toBe("skip");
            expect(decision).toHaveProperty(
                "reason",
                "file matches ignore pattern .cursor/rules/*.mdc in target directory",
            );
        });

        it("should not let a single star cross directories", () => {
            const planner = new SyncPlanner({ exists: nothingExists });
            const decision = planner.plan(
                sourceFile({ relativePath: ".cursor/rules/local.mdc" }),
                targetDir({ ignoreFiles: ["*.mdc"] }),
            );
            expect(decision.action).toBe("copy-rewritten");
        });

        it("should take precedence over overwrite and existence", () => {
            const planner = new SyncPlanner({ exists: everythingExists });
            for (const overwrite of [true, false]) {
                const decision = planner.plan(
                    sourceFile({ overwrite }),
                    targetDir({ ignoreFiles: [".clinerules"] }),
                );
                expect(decision).toHaveProperty("reason", SKIP_REASONS.ignored(".clinerules"));
            }
        });
    });

    describe("overwrite", () => {
        it("should skip an existing target when overwrite is off", () => {
            const planner = new SyncPlanner({ exists: everythingExists });
            const decision = planner.plan(sourceFile({ overwrite: false }), targetDir());
            expect(decision.action).toBe("skip");
            expect(decision).toHaveProperty("reason", "file exists and overwrite=false");
        });

        it("should copy when overwrite is off but nothing exists yet", () => {
            const planner = new SyncPlanner({ exists: nothingExists });
            const decision = planner.plan(sourceFile({ overwrite: false }), targetDir());
            expect(decision.action).toBe("copy-rewritten");
        });

        it("should probe the computed target path", () => {
            const probed: string[] = [];
            const planner = new SyncPlanner({
                exists: (p) => {
                    probed.push(p);
                    return false;
                },
            });
            planner.plan(sourceFile({ overwrite: false }), targetDir());
            expect(probed).toEqual([path.join("/repo/packages/web", ".clinerules")]);
        });

        it("should not probe when overwrite is on", () => {
            const probed: string[] = [];
            const planner = new SyncPlanner({
                exists: (p) => {
                    probed.push(p);
                    return true;
                },
            });
            expect(planner.plan(sourceFile(), targetDir()).action).toBe("copy-rewritten");
            expect(probed).toEqual([]);
        });
    });

    describe("dry run", () => {
        it("should record the same actions as a real run, unscheduled", () => {
            const dry = new SyncPlanner({ dryRun: true, exists: nothingExists });
            const real = new SyncPlanner({ exists: nothingExists });
            const files = [sourceFile(), sourceFile({ adjustPaths: false })];

            const dryPlans = files.map((f) => dry.plan(f, targetDir()));
            const realPlans = files.map((f) => real.plan(f, targetDir()));

            expect(dryPlans.map((d) => d.action)).toEqual(["copy-rewritten", "copy-raw"]);
            expect(realPlans.map((d) => d.action)).toEqual(["copy-rewritten", "copy-raw"]);
            expect(dryPlans.map((d) => ("scheduled" in d ? d.scheduled : undefined))).toEqual([false, false]);
            expect(realPlans.map((d) => ("scheduled" in d ? d.scheduled : undefined))).toEqual([true, true]);
        });

        it("should still skip ignored and kept files", () => {
            const dry = new SyncPlanner({ dryRun: true, exists: everythingExists });
            expect(dry.plan(sourceFile({ overwrite: false }), targetDir()).action).toBe("skip");
        });
    });
});
