import type { Setting } from "./types.js";

/**
 * Turn an optional YAML boolean into a Setting.
 */
export function toSetting(value: boolean | undefined): Setting {
    if (value === undefined) return "inherit";
    return value ? "enabled" : "disabled";
}

/**
 * Resolve a setting: the first explicit level wins, in the order given,
 * otherwise the global default applies.
 *
 * @example resolveSetting(true, fileSpec.overwrite, sourceDir.overwrite)
 */
export function resolveSetting(globalDefault: boolean, ...levels: Setting[]): boolean {
    for (const level of levels) {
        if (level === "enabled") return true;
        if (level === "disabled") return false;
    }
    return globalDefault;
}
