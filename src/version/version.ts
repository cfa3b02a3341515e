import * as os from "node:os";

/**
 * Build metadata printed by `rulerelay version`. Values come from the
 * environment the release build sets, falling back to development defaults.
 */
export interface BuildInfo {
    readonly version: string;
    readonly commit: string;
    readonly buildTime: string;
    readonly nodeVersion: string;
    readonly platform: string;
}

export const DEFAULT_VERSION = "0.1.0";

export function readBuildInfo(env: NodeJS.ProcessEnv = process.env): BuildInfo {
    return Object.freeze({
        version: env.RULERELAY_VERSION || DEFAULT_VERSION,
        commit: env.RULERELAY_COMMIT || "none",
        buildTime: env.RULERELAY_BUILD_TIME || "",
        nodeVersion: process.version,
        platform: `${os.platform()}/${os.arch()}`,
    });
}

/**
 * Render build info. An unset build time shows the current time.
 */
export function formatBuildInfo(info: BuildInfo, now: Date = new Date()): string {
    const buildTime = info.buildTime || now.toISOString();
    return [
        `rulerelay version ${info.version}`,
        `commit: ${info.commit}`,
        `built: ${buildTime}`,
        `node version: ${info.nodeVersion}`,
        `platform: ${info.platform}`,
    ].join("\n");
}
