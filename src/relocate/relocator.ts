import * as path from "node:path";
import { AnchorResolutionError } from "../errors.js";

export interface RelocatorOptions {
    /** Working directory provider used to make relative anchors absolute */
    cwd?: () => string;
}

/**
 * Whether a path reference is relative in the `./` or `../` sense.
 * Bare names, absolute paths and URLs are not.
 */
export function isRelativeReference(reference: string): boolean {
    return reference.startsWith("./") || reference.startsWith("../");
}

/**
 * Recomputes relative path references so they keep pointing at the same
 * location after the file containing them moves to another directory.
 */
export class PathRelocator {
    private cwd: () => string;

    constructor(options: RelocatorOptions = {}) {
        this.cwd = options.cwd ?? (() => process.cwd());
    }

    /**
     * Relocate `reference`, written relative to `sourceAnchor`, so that it
     * resolves to the same place from `targetAnchor`.
     *
     * @throws AnchorResolutionError if an anchor cannot be made absolute
     */
    relocate(reference: string, sourceAnchor: string, targetAnchor: string): string {
        const absSource = this.resolveAnchor(sourceAnchor);
        const absTarget = this.resolveAnchor(targetAnchor);

        const pointsAt = path.resolve(absSource, reference);
        const relative = path.relative(absTarget, pointsAt).split(path.sep).join("/");

        if (relative === "" || relative === "..") {
            return `${relative || "."}/`;
        }
        return isRelativeReference(relative) ? relative : `./${relative}`;
    }

    private resolveAnchor(anchor: string): string {
        if (path.isAbsolute(anchor)) {
            return path.resolve(anchor);
        }
        let cwd: string;
        try {
            cwd = this.cwd();
        } catch (err) {
            throw new AnchorResolutionError(anchor, err);
        }
        return path.resolve(cwd, anchor);
    }
}
