export {
    discoverSourceFiles,
    scanSourceDir,
    findGlobMatches,
    isGlobPattern,
    isIgnoredInSource,
    type SourceFile,
} from "./discovery.js";
