export { SyncEngine, type SyncEngineOptions } from "./engine.js";
export { SyncPlanner, type PlannerOptions } from "./planner.js";
export { SyncExecutor } from "./executor.js";
export {
    formatReport,
    summarizeReport,
    exitCodeFor,
    isExternalTarget,
    type ReportSummary,
    type FormatOptions,
} from "./report.js";
export { SKIP_REASONS } from "./types.js";
export type {
    SyncAction,
    CopyAction,
    SyncDecision,
    CopyRawDecision,
    CopyRewrittenDecision,
    SkipDecision,
    ErrorDecision,
    SyncReport,
} from "./types.js";
