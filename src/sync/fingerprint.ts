import * as fs from "node:fs";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { minimatch } from "minimatch";
import type { SyncItem } from "../config/types.js";
import { errorCode } from "../utils/guards.js";

/**
 * A file that belongs to a sync item.
 */
export interface ItemFile {
    /** Path relative to the configuration root (POSIX separators) */
    relativePath: string;
    /** Path relative to the item itself; the base name for file items */
    itemRelativePath: string;
    absolutePath: string;
}

/**
 * Whether a base name matches one of the exclusion patterns.
 */
export function isExcluded(baseName: string, patterns: readonly string[]): boolean {
    return patterns.some((pattern) => minimatch(baseName, pattern, { dot: true }));
}

/**
 * MD5 hex digest of a document or blob.
 */
export function fingerprintContent(content: string | Buffer): string {
    return crypto.createHash("md5").update(content).digest("hex");
}

async function lstatOrNull(p: string): Promise<fs.Stats | null> {
    try {
        return await fs.promises.lstat(p);
    } catch (err) {
        if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") {
            return null;
        }
        throw err;
    }
}

/**
 * List the non-excluded files of an item, sorted by item-relative path.
 * Symlinks and unreadable directories are skipped.
 */
export async function collectItemFiles(root: string, item: SyncItem): Promise<ItemFile[]> {
    const itemPath = path.join(root, item.path);
    const stat = await lstatOrNull(itemPath);
    if (stat === null) return [];

    if (item.type === "file") {
        const baseName = path.posix.basename(item.path);
        if (!stat.isFile() || isExcluded(baseName, item.exclude)) return [];
        return [{ relativePath: item.path, itemRelativePath: baseName, absolutePath: itemPath }];
    }

    if (!stat.isDirectory()) return [];

    const files: ItemFile[] = [];

    async function walk(dirPath: string, relative: string): Promise<void> {
        let entries: fs.Dirent[];
        try {
            entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
        } catch {
            // Permission denied or removed while walking
            return;
        }

        for (const entry of entries) {
            if (isExcluded(entry.name, item.exclude)) continue;
            if (entry.isSymbolicLink()) continue;

            const entryRelative = relative === "" ? entry.name : `${relative}/${entry.name}`;
            const fullPath = path.join(dirPath, entry.name);
            if (entry.isDirectory()) {
                await walk(fullPath, entryRelative);
            } else if (entry.isFile()) {
                files.push({
                    relativePath: `${item.path}/${entryRelative}`,
                    itemRelativePath: entryRelative,
                    absolutePath: fullPath,
                });
            }
        }
    }

    await walk(itemPath, "");
    files.sort((a, b) => (a.itemRelativePath < b.itemRelativePath ? -1 : a.itemRelativePath > b.itemRelativePath ? 1 : 0));
    return files;
}

/**
 * Fingerprint a sync item, or null when it does not exist.
 *
 * Directories are hashed over each file's item-relative path followed by its
 * bytes, in sorted path order. Unreadable files inside a directory are skipped;
 * an unreadable single-file item throws.
 */
export async function fingerprintItem(root: string, item: SyncItem): Promise<string | null> {
    const itemPath = path.join(root, item.path);
    const stat = await lstatOrNull(itemPath);
    if (stat === null) return null;

    if (item.type === "file") {
        const files = await collectItemFiles(root, item);
        if (files.length === 0) return null;
        return fingerprintContent(await fs.promises.readFile(files[0].absolutePath));
    }

    if (!stat.isDirectory()) return null;

    const hash = crypto.createHash("md5");
    for (const file of await collectItemFiles(root, item)) {
        let content: Buffer;
        try {
            content = await fs.promises.readFile(file.absolutePath);
        } catch {
            continue; // locked or permission denied
        }
        hash.update(file.itemRelativePath);
        hash.update(content);
    }
    return hash.digest("hex");
}

/**
 * Fingerprint several items in parallel, keyed by item name.
 */
export async function fingerprintItems(
    root: string,
    items: readonly SyncItem[],
): Promise<Map<string, string | null>> {
    const fingerprints = await Promise.all(items.map((item) => fingerprintItem(root, item)));
    return new Map(items.map((item, index) => [item.name, fingerprints[index]]));
}

/**
 * Newest modification time (ms) among the item's files; 0 when it has none.
 */
export async function latestModification(root: string, item: SyncItem): Promise<number> {
    let latest = 0;
    for (const file of await collectItemFiles(root, item)) {
        try {
            const stat = await fs.promises.stat(file.absolutePath);
            latest = Math.max(latest, stat.mtimeMs);
        } catch {
            // Removed between listing and stat
        }
    }
    return latest;
}
