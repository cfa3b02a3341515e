export { readBuildInfo, formatBuildInfo, DEFAULT_VERSION, type BuildInfo } from "./version.js";
