import * as fs from "node:fs";
import * as path from "node:path";
import JSZip from "jszip";
import type { SyncItem } from "../config/types.js";
import { collectItemFiles } from "./fingerprint.js";
import { IntegrityError } from "./errors.js";
import { errorCode, errorMessage } from "../utils/guards.js";

const LOCAL_FILE_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
/** An archive with no entries starts with the end-of-central-directory record */
const EMPTY_ARCHIVE_SIGNATURE = Buffer.from([0x50, 0x4b, 0x05, 0x06]);

export interface UnpackOptions {
    /** Reject entries outside this root-relative path */
    within?: string;
}

/**
 * Bundle every non-excluded file of the given items into one ZIP archive.
 * Entry names are relative to the configuration root; unreadable files are left out.
 */
export async function pack(root: string, items: readonly SyncItem[]): Promise<Buffer> {
    const zip = new JSZip();

    for (const item of items) {
        for (const file of await collectItemFiles(root, item)) {
            let content: Buffer;
            let mtime: Date;
            try {
                content = await fs.promises.readFile(file.absolutePath);
                mtime = (await fs.promises.stat(file.absolutePath)).mtime;
            } catch {
                continue;
            }
            zip.file(file.relativePath, content, { date: mtime });
        }
    }

    return zip.generateAsync({
        type: "nodebuffer",
        compression: "DEFLATE",
        compressionOptions: { level: 9 },
    });
}

/**
 * Whether a buffer starts like a ZIP archive.
 */
export function isZipArchive(blob: Buffer): boolean {
    if (blob.length < 4) return false;
    const head = blob.subarray(0, 4);
    return head.equals(LOCAL_FILE_SIGNATURE) || head.equals(EMPTY_ARCHIVE_SIGNATURE);
}

function checkEntryName(name: string, within: string | undefined): string {
    const normalized = path.posix.normalize(name.replace(/\\/g, "/"));
    if (
        path.posix.isAbsolute(normalized) ||
        normalized === ".." ||
        normalized.startsWith("../") ||
        /^[A-Za-z]:/.test(normalized)
    ) {
        throw new IntegrityError(`Archive entry escapes the destination: ${name}`);
    }
    if (within !== undefined && normalized !== within && !normalized.startsWith(`${within}/`)) {
        throw new IntegrityError(`Archive entry ${name} is outside ${within}`);
    }
    return normalized;
}

/**
 * Throws IntegrityError when any existing component of the entry's path below
 * destinationRoot is a symbolic link.
 */
async function checkNoLinks(destinationRoot: string, relativePath: string): Promise<void> {
    let current = destinationRoot;
    for (const segment of relativePath.split("/")) {
        current = path.join(current, segment);
        let stat: fs.Stats;
        try {
            stat = await fs.promises.lstat(current);
        } catch (err) {
            if (errorCode(err) === "ENOENT") return;
            throw err;
        }
        if (stat.isSymbolicLink()) {
            throw new IntegrityError(`Refusing to extract ${relativePath} through symbolic link ${current}`);
        }
    }
}

/**
 * Extract every entry of an archive below destinationRoot, in parallel.
 *
 * Entry names are checked before anything is written, and so is every existing
 * path they would be written through: a symbolic link on the way is refused. If an entry then fails to
 * extract, the remaining entries still finish and an IntegrityError is thrown:
 * the destination holds a partial extraction and must be rolled back.
 * @returns Root-relative paths of the extracted files, sorted
 */
export async function unpack(
    blob: Buffer,
    destinationRoot: string,
    options: UnpackOptions = {},
): Promise<string[]> {
    if (!isZipArchive(blob)) {
        throw new IntegrityError("Content is not a ZIP archive");
    }

    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(blob);
    } catch (err) {
        throw new IntegrityError(`Corrupt archive: ${errorMessage(err)}`, { cause: err });
    }

    const entries = Object.values(zip.files)
        .filter((entry) => !entry.dir)
        .map((entry) => ({ entry, relativePath: checkEntryName(entry.name, options.within) }));
    for (const { relativePath } of entries) {
        await checkNoLinks(destinationRoot, relativePath);
    }

    const results = await Promise.allSettled(
        entries.map(async ({ entry, relativePath }) => {
            const destPath = path.join(destinationRoot, relativePath);
            await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
            await fs.promises.writeFile(destPath, await entry.async("nodebuffer"));
            await fs.promises.utimes(destPath, entry.date, entry.date);
            return relativePath;
        }),
    );

    const failures = results.flatMap((result, index) =>
        result.status === "rejected"
            ? [`${entries[index].relativePath}: ${errorMessage(result.reason)}`]
            : [],
    );
    if (failures.length > 0) {
        throw new IntegrityError(
            `Extracted ${results.length - failures.length}/${results.length} entries; failed: ${failures.join("; ")}`,
        );
    }

    return entries.map((e) => e.relativePath).sort();
}
