import * as fs from "node:fs";
import * as path from "node:path";
import { SyncIOError } from "../errors.js";

/**
 * Create the parent directory of a file, recursively.
 * @throws SyncIOError on failure
 */
export function ensureParentDir(filePath: string): void {
    const parent = path.dirname(filePath);
    try {
        fs.mkdirSync(parent, { recursive: true });
    } catch (err) {
        throw new SyncIOError("mkdir", parent, err);
    }
}

/**
 * Copy a file byte for byte, overwriting the destination.
 * Creates parent directories as needed.
 * @throws SyncIOError on failure
 */
export function copyFileRaw(srcPath: string, destPath: string): void {
    ensureParentDir(destPath);
    try {
        fs.copyFileSync(srcPath, destPath);
    } catch (err) {
        throw new SyncIOError("copy", destPath, err);
    }
}

/**
 * Read a whole file.
 * @throws SyncIOError on failure
 */
export function readFileContent(filePath: string): Buffer {
    try {
        return fs.readFileSync(filePath);
    } catch (err) {
        throw new SyncIOError("read", filePath, err);
    }
}

/**
 * Write text to a file, creating parent directories as needed.
 * @throws SyncIOError on failure
 */
export function writeFileContent(filePath: string, content: string): void {
    ensureParentDir(filePath);
    try {
        fs.writeFileSync(filePath, content, "utf-8");
    } catch (err) {
        throw new SyncIOError("write", filePath, err);
    }
}

/**
 * Short, human-readable explanation of a filesystem failure.
 */
export function describeIOError(error: SyncIOError): string {
    switch (error.code) {
        case "EACCES":
        case "EPERM":
            return `Permission denied: ${error.filePath}`;
        case "EBUSY":
            return `File locked/in use: ${error.filePath}`;
        case "ENOSPC":
            return `No space left on device: ${error.filePath}`;
        case "EISDIR":
            return `Is a directory: ${error.filePath}`;
        default:
            return error.message;
    }
}
