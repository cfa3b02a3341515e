/**
 * An optional boolean from the config file.
 * - `inherit`: not set, falls back to the enclosing level
 * - `enabled` / `disabled`: explicitly set
 */
export type Setting = "inherit" | "enabled" | "disabled";

/**
 * One `files` entry of a source directory.
 */
export interface FileSpec {
    /** File path or glob pattern, relative to the source directory */
    pattern: string;
    /** Rewrite relative paths when copying (default: enabled) */
    adjustPaths: Setting;
    /** Overwrite existing target files (default: the directory setting) */
    overwrite: Setting;
}

/**
 * A directory holding rule files to propagate.
 */
export interface SourceDir {
    path: string;
    /** Directory-level overwrite default (default: enabled) */
    overwrite: Setting;
    files: FileSpec[];
    /** Basename or relative-path patterns excluded from discovery */
    ignoreFiles: string[];
}

/**
 * A directory rule files are propagated to.
 */
export interface TargetDir {
    path: string;
    /** Marks a directory outside the current repository */
    external: boolean;
    /** Relative-path globs never copied to this target */
    ignoreFiles: string[];
}

/**
 * Top-level rulerelay configuration (maps to .rulerelay.yaml).
 */
export interface RulerelayConfig {
    sourceDirs: SourceDir[];
    targetDirs: TargetDir[];
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    configFileName: ".rulerelay.yaml",
    adjustPaths: true,
    overwrite: true,
    schemaUrl: "https://json-schema.org/draft/2020-12/schema",
} as const;
