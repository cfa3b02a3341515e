import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { ConfigurationError, describeCause } from "../errors.js";
import { toSetting } from "./settings.js";
import type { FileSpec, RulerelayConfig, SourceDir, TargetDir } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

const SCHEMA_HEADER = `# yaml-language-server: $schema=${CONFIG_DEFAULTS.schemaUrl}`;

/**
 * Clean a configured directory path: collapse `.` and `..` segments and drop
 * any trailing separator. Relative paths stay relative to the working directory.
 */
export function normalizeDirPath(dirPath: string): string {
    const normalized = path.normalize(dirPath);
    if (normalized.length > 1 && normalized.endsWith(path.sep)) {
        return normalized.slice(0, -1);
    }
    return normalized;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readOptionalBoolean(raw: Record<string, unknown>, key: string, where: string): boolean | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "boolean") {
        throw new ConfigurationError(`${where}.${key} must be true or false`);
    }
    return value;
}

function readPath(raw: Record<string, unknown>, where: string): string {
    if (typeof raw.path !== "string" || raw.path.trim() === "") {
        throw new ConfigurationError(`${where}.path must be a non-empty string`);
    }
    return normalizeDirPath(raw.path.trim());
}

function readIgnoreFiles(raw: Record<string, unknown>, where: string): string[] {
    const value = raw.ignore_files ?? [];
    if (!Array.isArray(value)) {
        throw new ConfigurationError(`${where}.ignore_files must be an array`);
    }
    return value.filter((i): i is string => typeof i === "string" && i.trim() !== "");
}

function validateFileSpec(entry: unknown, where: string): FileSpec {
    // A bare string is shorthand for { pattern }
    if (typeof entry === "string") {
        if (entry.trim() === "") {
            throw new ConfigurationError(`${where} must be a non-empty pattern`);
        }
        return { pattern: entry.trim(), adjustPaths: "inherit", overwrite: "inherit" };
    }
    if (!isRecord(entry)) {
        throw new ConfigurationError(`${where} must be a pattern string or an object`);
    }
    if (typeof entry.pattern !== "string" || entry.pattern.trim() === "") {
        throw new ConfigurationError(`${where}.pattern must be a non-empty string`);
    }
    return {
        pattern: entry.pattern.trim(),
        adjustPaths: toSetting(readOptionalBoolean(entry, "adjust_paths", where)),
        overwrite: toSetting(readOptionalBoolean(entry, "overwrite", where)),
    };
}

function validateSourceDir(entry: unknown, index: number): SourceDir {
    const where = `source_dirs[${index}]`;
    if (!isRecord(entry)) {
        throw new ConfigurationError(`${where} must be an object`);
    }

    const dirPath = readPath(entry, where);

    if (!Array.isArray(entry.files) || entry.files.length === 0) {
        throw new ConfigurationError(`${where}.files must list at least one file pattern`);
    }
    const files = entry.files.map((file: unknown, fileIndex: number) =>
        validateFileSpec(file, `${where}.files[${fileIndex}]`),
    );

    return {
        path: dirPath,
        overwrite: toSetting(readOptionalBoolean(entry, "overwrite", where)),
        files,
        ignoreFiles: readIgnoreFiles(entry, where),
    };
}

function validateTargetDir(entry: unknown, index: number): TargetDir {
    const where = `target_dirs[${index}]`;
    if (!isRecord(entry)) {
        throw new ConfigurationError(`${where} must be an object`);
    }
    return {
        path: readPath(entry, where),
        external: readOptionalBoolean(entry, "external", where) ?? false,
        ignoreFiles: readIgnoreFiles(entry, where),
    };
}

/**
 * Validate a parsed configuration object. Throws ConfigurationError on invalid config.
 */
export function validateConfig(config: unknown): RulerelayConfig {
    if (!isRecord(config)) {
        throw new ConfigurationError("Configuration must be a YAML object");
    }

    const rawSources = config.source_dirs;
    if (!Array.isArray(rawSources) || rawSources.length === 0) {
        throw new ConfigurationError("source_dirs must list at least one source directory");
    }

    const rawTargets = config.target_dirs;
    if (!Array.isArray(rawTargets) || rawTargets.length === 0) {
        throw new ConfigurationError("target_dirs must list at least one target directory");
    }

    return {
        sourceDirs: rawSources.map(validateSourceDir),
        targetDirs: rawTargets.map(validateTargetDir),
    };
}

/**
 * Load and validate a rulerelay config from a YAML file.
 * @param configPath Path to the config file (defaults to .rulerelay.yaml in the working directory)
 */
export function loadConfig(configPath: string = CONFIG_DEFAULTS.configFileName): RulerelayConfig {
    if (!fs.existsSync(configPath)) {
        throw new ConfigurationError(`Config file not found: ${configPath}`);
    }

    let parsed: unknown;
    try {
        parsed = yaml.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
        throw new ConfigurationError(`Failed to parse config file ${configPath}: ${describeCause(err)}`, {
            cause: err,
        });
    }
    return validateConfig(parsed);
}

/**
 * Write a default .rulerelay.yaml configuration file.
 * @param dir Directory to write the config file to (defaults to the working directory)
 * @returns The path of the created file
 */
export function writeDefaultConfig(dir: string = process.cwd()): string {
    if (!fs.existsSync(dir)) {
        throw new ConfigurationError(`Directory does not exist: ${dir}`);
    }

    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);
    if (fs.existsSync(configPath)) {
        throw new ConfigurationError(`Config file already exists: ${configPath}`);
    }

    const template = [
        SCHEMA_HEADER,
        "# rulerelay configuration",
        "",
        "# Directories holding the rule files to propagate.",
        "# Paths are relative to the directory rulerelay runs in.",
        "source_dirs:",
        "  - path: .",
        "    # overwrite: true        # Overwrite existing target files (default: true)",
        "    # ignore_files:          # Files never picked up from this directory",
        "    #   - \"*.bak\"",
        "    files:",
        "      - .clinerules",
        "      - pattern: \".cursor/rules/*.mdc\"",
        "        # adjust_paths: true # Rewrite ./ and ../ references for each target (default: true)",
        "        # overwrite: false   # Overrides the directory setting",
        "",
        "# Directories the rule files are copied to. Directory structure is preserved.",
        "target_dirs:",
        "  - path: packages/app",
        "    # external: false        # Set for directories outside this repository",
        "    # ignore_files:          # Relative paths never copied to this target",
        "    #   - \".cursor/rules/local-*.mdc\"",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
