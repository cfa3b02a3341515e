import { isRelativeReference } from "./relocator.js";

/**
 * Kinds of path reference the scanner recognises, in the order they are applied.
 * - `import`: `import "./x"`, `from './x'`, `require("./x")`
 * - `key-value`: `"path": "./x"` and the other quoted keys
 * - `attribute`: `file="./x"`, `href='./x'` and the other attribute keys
 * - `markdown-link`: `[text](./x)`, everything up to the closing parenthesis
 * - `quoted-file`: any quoted string ending in a known file extension
 */
export type TokenCategory = "import" | "key-value" | "attribute" | "markdown-link" | "quoted-file";

/**
 * A relative path reference found on one line.
 */
export interface PathToken {
    /** The path text as written */
    raw: string;
    /** Offset of the first character within the line */
    start: number;
    /** Offset just past the last character */
    end: number;
    category: TokenCategory;
}

/**
 * One entry of the dispatch table: a matcher and the capture group holding the path.
 */
export interface TokenPattern {
    category: TokenCategory;
    matcher: RegExp;
    /** Capture group index of the path within a match */
    group: number;
}

const FILE_EXTENSIONS = [
    "md", "txt", "json", "yaml", "yml", "js", "ts", "go", "py",
    "java", "c", "cpp", "h", "hpp", "css", "html", "xml",
];

const KEY_VALUE_KEYS = ["path", "file", "src", "source", "location", "include"];
const ATTRIBUTE_KEYS = ["file", "path", "source", "target", "output", "input", "href", "src"];

export const TOKEN_PATTERNS: readonly TokenPattern[] = [
    {
        category: "import",
        matcher: /\b(?:import|from|require)(?:\s+|\s*\(\s*)["']([./][^"']+)["']/dg,
        group: 1,
    },
    {
        category: "key-value",
        matcher: new RegExp(`["'](?:${KEY_VALUE_KEYS.join("|")})["']\\s*:\\s*["']([./][^"']+)["']`, "dg"),
        group: 1,
    },
    {
        category: "attribute",
        matcher: new RegExp(`(?:${ATTRIBUTE_KEYS.join("|")})=["']([./][^"']+)["']`, "dg"),
        group: 1,
    },
    {
        category: "markdown-link",
        matcher: /\[.*?\]\(([./][^)]+)\)/dg,
        group: 1,
    },
    {
        category: "quoted-file",
        matcher: new RegExp(`["']([./][^"']+\\.(?:${FILE_EXTENSIONS.join("|")}))["']`, "dg"),
        group: 1,
    },
];

/**
 * Find the relative path tokens of a single category on a line.
 * Tokens are returned right-to-left so they can be spliced in order
 * without shifting the offsets of those still pending.
 */
export function findCategoryTokens(line: string, pattern: TokenPattern): PathToken[] {
    const tokens: PathToken[] = [];

    for (const match of line.matchAll(pattern.matcher)) {
        const span = match.indices?.[pattern.group];
        const raw = match[pattern.group];
        if (span === undefined || raw === undefined) continue;
        if (!isRelativeReference(raw)) continue;

        tokens.push({ raw, start: span[0], end: span[1], category: pattern.category });
    }

    return tokens.sort((a, b) => b.start - a.start);
}

/**
 * Find every relative path token on a line, category by category in table order.
 * Categories may overlap; the same text can be reported by more than one.
 */
export function findTokens(line: string): PathToken[] {
    return TOKEN_PATTERNS.flatMap((pattern) => findCategoryTokens(line, pattern));
}
