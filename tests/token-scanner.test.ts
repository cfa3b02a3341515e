import { describe, it, expect } from "vitest";
import { TOKEN_PATTERNS, findCategoryTokens, findTokens } from "../src/relocate/token-scanner.js";

function patternFor(category: string) {
    const pattern = TOKEN_PATTERNS.find((p) => p.category === category);
    if (!pattern) throw new Error(`no pattern for ${category}`);
    return pattern;
}

describe("TokenScanner", () => {
    it("should apply categories in a fixed order", () => {
        expect(TOKEN_PATTERNS.map((p) => p.category)).toEqual([
            "import",
            "key-value",
            "attribute",
            "markdown-link",
            "quoted-file",
        ]);
    });

    describe("import", () => {
        it("should find an import path with its offsets", () => {
            const tokens = findCategoryTokens('import "./relative/path/file.js"', patternFor("import"));
            expect(tokens).toEqual([
                { raw: "./relative/path/file.js", start: 8, end: 31, category: "import" },
            ]);
        });

        it("should find from and require forms", () => {
            const pattern = patternFor("import");
            expect(findCategoryTokens("export { a } from '../lib/a'", pattern).map((t) => t.raw)).toEqual(["../lib/a"]);
            expect(findCategoryTokens('const m = require("./module.js")', pattern)).toEqual([
                { raw: "./module.js", start: 19, end: 30, category: "import" },
            ]);
        });
    });

    describe("key-value", () => {
        it("should find quoted keys from the fixed set", () => {
            const pattern = patternFor("key-value");
            expect(findCategoryTokens('"path": "./config.json"', pattern).map((t) => t.raw)).toEqual(["./config.json"]);
            expect(findCategoryTokens("'include' : '../shared/base.yaml'", pattern).map((t) => t.raw)).toEqual([
                "../shared/base.yaml",
            ]);
        });

        it("should ignore keys outside the set", () => {
            expect(findCategoryTokens('"name": "./config.json"', patternFor("key-value"))).toEqual([]);
        });
    });

    describe("attribute", () => {
        it("should find key= attributes including href and src", () => {
            const pattern = patternFor("attribute");
            expect(findCategoryTokens('file="./data.txt"', pattern).map((t) => t.raw)).toEqual(["./data.txt"]);
            expect(findCategoryTokens("<a href='./page.html'>", pattern).map((t) => t.raw)).toEqual(["./page.html"]);
            expect(findCategoryTokens('<img src="./image.png">', pattern).map((t) => t.raw)).toEqual(["./image.png"]);
        });
    });

    describe("markdown-link", () => {
        it("should return matches right-to-left", () => {
            const tokens = findCategoryTokens("See [a](./a.md) and [b](./b.md)", patternFor("markdown-link"));
            expect(tokens).toEqual([
                { raw: "./b.md", start: 24, end: 30, category: "markdown-link" },
                { raw: "./a.md", start: 8, end: 14, category: "markdown-link" },
            ]);
        });

        it("should take everything up to the closing parenthesis", () => {
            const pattern = patternFor("markdown-link");
            expect(findCategoryTokens('See [guide](./guide.md "Guide")', pattern)).toEqual([
                { raw: './guide.md "Guide"', start: 12, end: 30, category: "markdown-link" },
            ]);
            expect(findCategoryTokens("[n](./My Notes.md)", pattern).map((t) => t.raw)).toEqual(["./My Notes.md"]);
        });

        it("should allow brackets inside the link text", () => {
            const tokens = findCategoryTokens("[a [b] c](./x.md)", patternFor("markdown-link"));
            expect(tokens).toEqual([{ raw: "./x.md", start: 10, end: 16, category: "markdown-link" }]);
        });
    });

    describe("quoted-file", () => {
        it("should only match known file extensions", () => {
            const pattern = patternFor("quoted-file");
            expect(findCategoryTokens('"./notes.md" "./image.png" "../x.yml"', pattern).map((t) => t.raw)).toEqual([
                "../x.yml",
                "./notes.md",
            ]);
        });
    });

    describe("findTokens", () => {
        it("should report overlapping categories separately", () => {
            const tokens = findTokens('import "./lib/util.ts"');
            expect(tokens.map((t) => [t.category, t.raw, t.start])).toEqual([
                ["import", "./lib/util.ts", 8],
                ["quoted-file", "./lib/util.ts", 8],
            ]);
        });

        it("should never return non-relative references", () => {
            const lines = [
                'import "/abs/path/file.js"',
                '"path": "config.json"',
                'href="https://example.com/page.html"',
                "[docs](/docs/index.md)",
                "[site](https://example.com/readme.md)",
                '"/etc/hosts.txt"',
                '".hidden/file.md"',
                "plain ./words.md without quotes",
            ];
            for (const line of lines) {
                expect(findTokens(line)).toEqual([]);
            }
        });

        it("should carry no state between lines", () => {
            const first = findTokens('src="./a.js"');
            const second = findTokens('src="./a.js"');
            expect(second).toEqual(first);
        });
    });
});
