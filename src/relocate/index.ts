export { PathRelocator, isRelativeReference, type RelocatorOptions } from "./relocator.js";
export {
    TOKEN_PATTERNS,
    findTokens,
    findCategoryTokens,
    type PathToken,
    type TokenCategory,
    type TokenPattern,
} from "./token-scanner.js";
export {
    ContentRewriter,
    splitLines,
    type RelocationResult,
    type RewriteResult,
    type LineRewriteResult,
} from "./rewriter.js";
