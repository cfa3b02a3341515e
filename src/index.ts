export { loadConfig, validateConfig, writeDefaultConfig, resolveSetting, configSchema } from "./config/index.js";
export type { RulerelayConfig, SourceDir, TargetDir, FileSpec, Setting } from "./config/index.js";
export { PathRelocator, ContentRewriter, findTokens, TOKEN_PATTERNS } from "./relocate/index.js";
export type { PathToken, TokenCategory, RelocationResult, RewriteResult } from "./relocate/index.js";
export { discoverSourceFiles, type SourceFile } from "./scanner/index.js";
export { SyncEngine, SyncPlanner, SyncExecutor, formatReport, summarizeReport, exitCodeFor } from "./sync/index.js";
export type { SyncAction, SyncDecision, SyncReport } from "./sync/index.js";
export {
    RulerelayError,
    AnchorResolutionError,
    SyncIOError,
    ConfigurationError,
    DiscoveryError,
} from "./errors.js";
export { Logger, type LoggerOptions } from "./utils/logger.js";
export { readBuildInfo, formatBuildInfo, type BuildInfo } from "./version/index.js";
