import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { errorCode, errorMessage } from "./guards.js";

/** Threshold above which we use streaming copy (10 MB) */
const STREAMING_THRESHOLD = 10 * 1024 * 1024;

/**
 * Copy a file, using streaming for large files.
 * Creates parent directories as needed and preserves mtime.
 */
export async function copyFileRobust(srcPath: string, destPath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(destPath), { recursive: true });

    const stat = await fs.promises.stat(srcPath);

    if (stat.size > STREAMING_THRESHOLD) {
        await pipeline(fs.createReadStream(srcPath), fs.createWriteStream(destPath));
    } else {
        await fs.promises.copyFile(srcPath, destPath);
    }

    await fs.promises.utimes(destPath, stat.atime, stat.mtime);
}

/**
 * Write a file through a temporary sibling and a rename, so readers never see
 * a half-written file.
 */
export function writeFileAtomic(filePath: string, content: string | Buffer): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
        fs.writeFileSync(tmpPath, content);
        fs.renameSync(tmpPath, filePath);
    } catch (err) {
        fs.rmSync(tmpPath, { force: true });
        throw err;
    }
}

/**
 * Safely delete a file, handling permission and lock errors.
 * Returns whether the file is gone, with a reason when it is not.
 */
export function safeDelete(filePath: string): { deleted: boolean; error?: string } {
    try {
        fs.rmSync(filePath, { force: true });
        return { deleted: true };
    } catch (err) {
        const code = errorCode(err);
        if (code === "EACCES" || code === "EPERM") {
            return { deleted: false, error: `Permission denied: ${filePath}` };
        }
        if (code === "EBUSY") {
            return { deleted: false, error: `File locked/in use: ${filePath}` };
        }
        return { deleted: false, error: `Failed to delete ${filePath}: ${errorMessage(err)}` };
    }
}

/**
 * Remove empty directories below dirPath, deepest first.
 * The directory itself is removed too when removeSelf is set and it ends up empty.
 */
export function removeEmptyDirs(dirPath: string, removeSelf = false): void {
    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(dirPath, { withFileTypes: true });
    } catch {
        return; // Missing or unreadable
    }

    for (const entry of entries) {
        if (entry.isDirectory()) {
            removeEmptyDirs(path.join(dirPath, entry.name), true);
        }
    }

    if (removeSelf && fs.readdirSync(dirPath).length === 0) {
        fs.rmdirSync(dirPath);
    }
}
