import * as fs from "node:fs";
import * as path from "node:path";
import { Minimatch, minimatch } from "minimatch";
import { resolveSetting } from "../config/settings.js";
import type { FileSpec, RulerelayConfig, SourceDir } from "../config/types.js";
import { CONFIG_DEFAULTS } from "../config/types.js";
import { DiscoveryError, describeCause, errnoCode } from "../errors.js";

/**
 * A source file selected for synchronisation, with its settings resolved.
 */
export interface SourceFile {
    /** Path of the file, as reachable from the working directory */
    absolutePath: string;
    /** The configured source directory the file was found in */
    sourceDir: string;
    /** Path relative to `sourceDir`, `/`-separated */
    relativePath: string;
    /** The file spec pattern that selected it */
    pattern: string;
    adjustPaths: boolean;
    overwrite: boolean;
}

const GLOB_CHARS = /[*?[]/;

export function isGlobPattern(pattern: string): boolean {
    return GLOB_CHARS.test(pattern);
}

function toPosix(p: string): string {
    return p.split(path.sep).join("/");
}

/**
 * Whether a source-level ignore pattern excludes a file, by basename or relative path.
 */
export function isIgnoredInSource(relativePath: string, ignorePatterns: string[]): boolean {
    const basename = path.posix.basename(relativePath);
    return ignorePatterns.some(
        (pattern) =>
            minimatch(basename, pattern, { dot: true }) ||
            minimatch(relativePath, pattern, { dot: true }),
    );
}

/**
 * Walk `dirPath` and collect regular files whose relative path matches `pattern`.
 * Directories that cannot lead to a match are not entered. Symlinks are skipped.
 */
export function findGlobMatches(dirPath: string, pattern: string): string[] {
    // Relative paths are matched without a leading "./"
    const matcher = new Minimatch(path.posix.normalize(pattern), { dot: true });
    const matches: string[] = [];

    function walk(currentPath: string): void {
        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(currentPath, { withFileTypes: true });
        } catch (err) {
            if (currentPath === dirPath) {
                throw new DiscoveryError(`Cannot read source directory ${dirPath}: ${describeCause(err)}`, {
                    cause: err,
                });
            }
            // Unreadable subdirectory, skip
            return;
        }

        for (const entry of entries) {
            const fullPath = path.join(currentPath, entry.name);
            const relativePath = toPosix(path.relative(dirPath, fullPath));

            if (entry.isDirectory()) {
                if (matcher.match(relativePath, true)) {
                    walk(fullPath);
                }
            } else if (entry.isFile() && matcher.match(relativePath)) {
                matches.push(relativePath);
            }
        }
    }

    walk(dirPath);
    return matches.sort();
}

function describeFile(sourceDir: SourceDir, spec: FileSpec, relativePath: string): SourceFile {
    return {
        absolutePath: path.resolve(sourceDir.path, relativePath),
        sourceDir: sourceDir.path,
        relativePath,
        pattern: spec.pattern,
        adjustPaths: resolveSetting(CONFIG_DEFAULTS.adjustPaths, spec.adjustPaths),
        overwrite: resolveSetting(CONFIG_DEFAULTS.overwrite, spec.overwrite, sourceDir.overwrite),
    };
}

/**
 * Expand the file patterns of one source directory, in configured order.
 */
export function scanSourceDir(sourceDir: SourceDir): SourceFile[] {
    const files: SourceFile[] = [];

    for (const spec of sourceDir.files) {
        if (isGlobPattern(spec.pattern)) {
            for (const relativePath of findGlobMatches(sourceDir.path, spec.pattern)) {
                if (isIgnoredInSource(relativePath, sourceDir.ignoreFiles)) continue;
                files.push(describeFile(sourceDir, spec, relativePath));
            }
            continue;
        }

        const relativePath = toPosix(path.normalize(spec.pattern));
        if (isIgnoredInSource(relativePath, sourceDir.ignoreFiles)) continue;

        const fullPath = path.join(sourceDir.path, relativePath);
        let stat: fs.Stats;
        try {
            stat = fs.statSync(fullPath);
        } catch (err) {
            if (errnoCode(err) === "ENOENT") continue;
            throw new DiscoveryError(`Cannot stat ${fullPath}: ${describeCause(err)}`, { cause: err });
        }
        if (stat.isFile()) {
            files.push(describeFile(sourceDir, spec, relativePath));
        }
    }

    return files;
}

/**
 * Discover every source file named by the configuration, in configured order.
 */
export function discoverSourceFiles(config: RulerelayConfig): SourceFile[] {
    return config.sourceDirs.flatMap(scanSourceDir);
}
