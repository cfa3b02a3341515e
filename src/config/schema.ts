import { CONFIG_DEFAULTS } from "./types.js";

const ignoreFiles = {
    type: "array",
    items: { type: "string" },
} as const;

/**
 * JSON Schema describing .rulerelay.yaml, for editor completion and validation.
 */
export const configSchema = {
    $schema: CONFIG_DEFAULTS.schemaUrl,
    title: "rulerelay configuration",
    description: `Schema for the rulerelay configuration file (${CONFIG_DEFAULTS.configFileName})`,
    type: "object",
    required: ["source_dirs", "target_dirs"],
    additionalProperties: false,
    properties: {
        source_dirs: {
            description: "Source directories containing rule files to be synchronized",
            type: "array",
            minItems: 1,
            items: { $ref: "#/$defs/SourceDir" },
        },
        target_dirs: {
            description: "Target directories rule files are synchronized to",
            type: "array",
            minItems: 1,
            items: { $ref: "#/$defs/TargetDir" },
        },
    },
    $defs: {
        SourceDir: {
            type: "object",
            required: ["path", "files"],
            additionalProperties: false,
            properties: {
                path: { type: "string", minLength: 1, description: "Path to the source directory" },
                overwrite: {
                    type: "boolean",
                    description: "Whether to overwrite existing files in target directories (default: true)",
                },
                files: {
                    type: "array",
                    minItems: 1,
                    description: "Files to synchronize from this source directory",
                    items: { $ref: "#/$defs/FileSpec" },
                },
                ignore_files: { ...ignoreFiles, description: "File patterns to ignore in this directory" },
            },
        },
        TargetDir: {
            type: "object",
            required: ["path"],
            additionalProperties: false,
            properties: {
                path: { type: "string", minLength: 1, description: "Path to the target directory" },
                external: {
                    type: "boolean",
                    description: "Whether this directory is outside the project (default: false)",
                },
                ignore_files: { ...ignoreFiles, description: "File patterns never copied to this target" },
            },
        },
        FileSpec: {
            oneOf: [
                { type: "string", minLength: 1, description: "File path or glob pattern" },
                {
                    type: "object",
                    required: ["pattern"],
                    additionalProperties: false,
                    properties: {
                        pattern: { type: "string", minLength: 1, description: "File path or glob pattern" },
                        adjust_paths: {
                            type: "boolean",
                            description: "Whether to adjust relative paths in the file (default: true)",
                        },
                        overwrite: {
                            type: "boolean",
                            description: "Whether to overwrite existing files (overrides the directory setting)",
                        },
                    },
                },
            ],
        },
    },
} as const;
