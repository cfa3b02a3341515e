import { describeCause } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import { PathRelocator } from "./relocator.js";
import { TOKEN_PATTERNS, findCategoryTokens } from "./token-scanner.js";

/**
 * One path reference that was changed during a rewrite.
 */
export interface RelocationResult {
    readonly originalPath: string;
    readonly adjustedPath: string;
    /** 1-based line number */
    readonly lineNumber: number;
}

export interface RewriteResult {
    content: string;
    relocations: RelocationResult[];
}

export interface LineRewriteResult {
    line: string;
    relocations: RelocationResult[];
}

/**
 * Rewrites every relative path reference in a file's content so that it
 * resolves from the target anchor as it did from the source anchor.
 */
export class ContentRewriter {
    private relocator: PathRelocator;
    private logger: Logger | undefined;

    constructor(relocator: PathRelocator = new PathRelocator(), logger?: Logger) {
        this.relocator = relocator;
        this.logger = logger;
    }

    rewrite(content: string | Buffer, sourceAnchor: string, targetAnchor: string): RewriteResult {
        const lines = splitLines(typeof content === "string" ? content : content.toString("utf-8"));
        const relocations: RelocationResult[] = [];
        let output = "";

        lines.forEach((line, index) => {
            const rewritten = this.rewriteLine(line, index + 1, sourceAnchor, targetAnchor);
            relocations.push(...rewritten.relocations);
            output += `${rewritten.line}\n`;
        });

        return { content: output, relocations };
    }

    /**
     * Rewrite a single line. Each category runs against the line as left by
     * the previous one, so text rewritten early may be matched again later.
     */
    rewriteLine(
        line: string,
        lineNumber: number,
        sourceAnchor: string,
        targetAnchor: string,
    ): LineRewriteResult {
        const relocations: RelocationResult[] = [];
        let current = line;

        for (const pattern of TOKEN_PATTERNS) {
            for (const token of findCategoryTokens(current, pattern)) {
                let adjusted: string;
                try {
                    adjusted = this.relocator.relocate(token.raw, sourceAnchor, targetAnchor);
                } catch (err) {
                    this.logger?.warn(`Failed to adjust path ${token.raw} on line ${lineNumber}: ${describeCause(err)}`);
                    continue;
                }

                if (adjusted === token.raw) continue;

                current = current.slice(0, token.start) + adjusted + current.slice(token.end);
                relocations.push({ originalPath: token.raw, adjustedPath: adjusted, lineNumber });
            }
        }

        return { line: current, relocations };
    }
}

/**
 * Split content into lines on `\n`, dropping a `\r` before it.
 * A trailing newline does not start another line.
 */
export function splitLines(content: string): string[] {
    if (content === "") return [];
    const lines = content.split("\n");
    if (lines[lines.length - 1] === "") {
        lines.pop();
    }
    return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}
