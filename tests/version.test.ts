import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import { DEFAULT_VERSION, formatBuildInfo, readBuildInfo } from "../src/version/version.js";

describe("Build info", () => {
    it("should fall back to development defaults", () => {
        const info = readBuildInfo({});
        expect(info).toEqual({
            version: DEFAULT_VERSION,
            commit: "none",
            buildTime: "",
            nodeVersion: process.version,
            platform: `${os.platform()}/${os.arch()}`,
        });
        expect(Object.isFrozen(info)).toBe(true);
    });

    it("should default to the package version", () => {
        const pkg: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
        expect(pkg).toMatchObject({ version: DEFAULT_VERSION });
    });

    it("should read release values from the environment", () => {
        const info = readBuildInfo({
            RULERELAY_VERSION: "1.2.3",
            RULERELAY_COMMIT: "abc1234",
            RULERELAY_BUILD_TIME: "2026-03-01T10:00:00Z",
        });
        expect(info.version).toBe("1.2.3");
        expect(info.commit).toBe("abc1234");
        expect(info.buildTime).toBe("2026-03-01T10:00:00Z");
    });

    it("should format one field per line", () => {
        const info = {
            version: "1.2.3",
            commit: "abc1234",
            buildTime: "",
            nodeVersion: "v20.11.0",
            platform: "linux/x64",
        };
        expect(formatBuildInfo(info, new Date("2026-01-02T03:04:05.000Z"))).toBe(
            [
                "rulerelay version 1.2.3",
                "commit: abc1234",
                "built: 2026-01-02T03:04:05.000Z",
                "node version: v20.11.0",
                "platform: linux/x64",
            ].join("\n"),
        );
        expect(formatBuildInfo({ ...info, buildTime: "release" })).toContain("built: release");
    });
});
