import { formatBuildInfo, type BuildInfo } from "../../version/version.js";

export function versionCommand(info: BuildInfo): number {
    console.log(formatBuildInfo(info));
    return 0;
}
