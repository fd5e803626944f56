import * as fs from "node:fs";
import * as path from "node:path";
import type { SyncItem, SyncItemType } from "../config/types.js";
import { CONFIG_DEFAULTS } from "../config/types.js";
import type { Log } from "../daemon/logger.js";
import { silentLog } from "../daemon/logger.js";
import { collectItemFiles } from "./fingerprint.js";
import { BackupError, IntegrityError, SyncError } from "./errors.js";
import { copyFileRobust, removeEmptyDirs, safeDelete, writeFileAtomic } from "../utils/fileops.js";
import { errorCode, errorMessage, isRecord } from "../utils/guards.js";

const MANIFEST_FILE = "backup.json";
const FILES_DIR = "files";
const OFFLINE_DIR = "offline";

export interface BackupItemRecord {
    name: string;
    path: string;
    type: SyncItemType;
    /** Whether the item was present when the backup was taken */
    existed: boolean;
    /** Number of files copied into the backup for this item */
    fileCount: number;
}

export interface BackupEntry {
    id: string;
    /** ms since epoch */
    createdAt: number;
    reason: string;
    items: BackupItemRecord[];
}

export interface RestoreResult {
    entry: BackupEntry;
    /** Backup of the state the restore replaced */
    safety: BackupEntry;
}

function parseEntry(value: unknown): BackupEntry | null {
    if (!isRecord(value)) return null;
    if (typeof value.id !== "string" || typeof value.createdAt !== "number") return null;
    if (typeof value.reason !== "string" || !Array.isArray(value.items)) return null;

    const items: BackupItemRecord[] = [];
    for (const item of value.items) {
        if (
            !isRecord(item) ||
            typeof item.name !== "string" ||
            typeof item.path !== "string" ||
            (item.type !== "file" && item.type !== "directory") ||
            typeof item.existed !== "boolean" ||
            typeof item.fileCount !== "number"
        ) {
            return null;
        }
        items.push({
            name: item.name,
            path: item.path,
            type: item.type,
            existed: item.existed,
            fileCount: item.fileCount,
        });
    }
    return { id: value.id, createdAt: value.createdAt, reason: value.reason, items };
}

function countFiles(target: string): number {
    let stat: fs.Stats;
    try {
        stat = fs.statSync(target);
    } catch {
        return 0;
    }
    if (stat.isFile()) return 1;
    return fs.readdirSync(target).reduce((sum, name) => sum + countFiles(path.join(target, name)), 0);
}

function compareEntries(a: BackupEntry, b: BackupEntry): number {
    if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function timestampId(now: Date): string {
    return now.toISOString().replace(/[-:.]/g, "");
}

/**
 * Point-in-time copies of sync items under `<root>/.termsync-backups/`.
 */
export class BackupManager {
    readonly backupDir: string;
    private root: string;
    private items: Map<string, SyncItem>;
    private maxBackups: number;
    private log: Log;

    constructor(root: string, items: readonly SyncItem[], maxBackups: number, log: Log = silentLog) {
        this.root = root;
        this.backupDir = path.join(root, CONFIG_DEFAULTS.backupDirName);
        this.items = new Map(items.map((item) => [item.name, item]));
        this.maxBackups = maxBackups;
        this.log = log;
    }

    /**
     * Copy the current state of the items. On any failure the partial
     * snapshot is removed and a BackupError is thrown.
     */
    async snapshot(items: readonly SyncItem[], reason: string): Promise<BackupEntry> {
        const now = new Date();
        let id = timestampId(now);
        for (let n = 1; fs.existsSync(path.join(this.backupDir, id)); n++) {
            id = `${timestampId(now)}-${n}`;
        }
        const dir = path.join(this.backupDir, id);

        try {
            fs.mkdirSync(path.join(dir, FILES_DIR), { recursive: true });
            const records: BackupItemRecord[] = [];

            for (const item of items) {
                const existed = fs.existsSync(path.join(this.root, item.path));
                const files = await collectItemFiles(this.root, item);
                for (const file of files) {
                    await copyFileRobust(file.absolutePath, path.join(dir, FILES_DIR, file.relativePath));
                }
                records.push({ name: item.name, path: item.path, type: item.type, existed, fileCount: files.length });
            }

            const entry: BackupEntry = { id, createdAt: now.getTime(), reason, items: records };
            // Written last: a directory without a manifest is not a backup
            writeFileAtomic(path.join(dir, MANIFEST_FILE), JSON.stringify(entry, null, 2));
            this.log.info(`Backup ${id} created (${reason}): ${records.map((r) => r.name).join(", ")}`);
            return entry;
        } catch (err) {
            if (fs.existsSync(dir)) {
                fs.rmSync(dir, { recursive: true, force: true });
            }
            throw new BackupError(`Backup failed: ${errorMessage(err)}`, { cause: err });
        }
    }

    /**
     * All complete backups, newest first.
     */
    list(): BackupEntry[] {
        let names: string[];
        try {
            names = fs.readdirSync(this.backupDir);
        } catch {
            return [];
        }

        const entries: BackupEntry[] = [];
        for (const name of names) {
            if (name === OFFLINE_DIR) continue;
            const entry = this.readEntry(name);
            if (entry !== null) entries.push(entry);
        }
        return entries.sort((a, b) => compareEntries(b, a));
    }

    get(id: string): BackupEntry | null {
        if (id === "" || id === OFFLINE_DIR || id !== path.basename(id)) return null;
        return this.readEntry(id);
    }

    /**
     * Keep the newest maxCount backups.
     * @returns Ids of the removed backups
     */
    prune(maxCount: number = this.maxBackups): string[] {
        const removed: string[] = [];
        const oldestFirst = this.list().reverse();
        for (const entry of oldestFirst.slice(0, Math.max(0, oldestFirst.length - maxCount))) {
            fs.rmSync(path.join(this.backupDir, entry.id), { recursive: true, force: true });
            removed.push(entry.id);
        }
        if (removed.length > 0) {
            this.log.debug(`Pruned backups: ${removed.join(", ")}`);
        }
        return removed;
    }

    /**
     * Put the captured state back: current files of each item are replaced by
     * the backed-up copies, and items that did not exist are removed.
     * Excluded files are left alone. The copies are checked against the
     * manifest first; a damaged backup throws BackupError before anything changes.
     */
    async apply(entry: BackupEntry): Promise<void> {
        const filesDir = path.join(this.backupDir, entry.id, FILES_DIR);
        this.verifyCopies(entry, filesDir);
        const failures: string[] = [];

        for (const record of entry.items) {
            const item: SyncItem = this.items.get(record.name) ?? {
                name: record.name,
                path: record.path,
                type: record.type,
                exclude: [],
                primary: false,
            };
            const target: SyncItem = { ...item, path: record.path, type: record.type };

            for (const file of await collectItemFiles(this.root, target)) {
                const result = safeDelete(file.absolutePath);
                if (!result.deleted && result.error !== undefined) failures.push(result.error);
            }

            if (record.existed) {
                const source = path.join(filesDir, record.path);
                try {
                    await this.copyBack(source, path.join(this.root, record.path));
                } catch (err) {
                    failures.push(`${record.name}: ${errorMessage(err)}`);
                }
            }

            if (record.type === "directory") {
                removeEmptyDirs(path.join(this.root, record.path), !record.existed);
                if (record.existed) {
                    fs.mkdirSync(path.join(this.root, record.path), { recursive: true });
                }
            }
        }

        if (failures.length > 0) {
            throw new BackupError(`Rollback to ${entry.id} incomplete: ${failures.join("; ")}`);
        }
        this.log.info(`Applied backup ${entry.id}`);
    }

    /**
     * Restore a backup. The current state is captured first; if applying or
     * validate throws afterwards, an IntegrityError names that safety backup.
     */
    async restore(id: string, validate: (entry: BackupEntry) => void | Promise<void>): Promise<RestoreResult> {
        const entry = this.get(id);
        if (entry === null) {
            throw new SyncError(`Backup not found: ${id}`);
        }

        const current = entry.items.map((record): SyncItem => this.items.get(record.name) ?? {
            name: record.name,
            path: record.path,
            type: record.type,
            exclude: [],
            primary: false,
        });
        const safety = await this.snapshot(current, "pre-restore");

        try {
            await this.apply(entry);
        } catch (err) {
            throw new IntegrityError(`Restore of ${id} failed: ${errorMessage(err)}`, {
                cause: err,
                rollbackId: safety.id,
            });
        }

        try {
            await validate(entry);
        } catch (err) {
            throw new IntegrityError(
                `Restored configuration failed validation: ${errorMessage(err)}`,
                { cause: err, rollbackId: safety.id },
            );
        }

        this.prune();
        return { entry, safety };
    }

    /**
     * Keep an undeliverable upload payload under offline/, with its own retention.
     * @returns Path of the written file
     */
    saveOffline(payload: string): string {
        const dir = path.join(this.backupDir, OFFLINE_DIR);
        const stamp = timestampId(new Date());
        let filePath = path.join(dir, `offline-${stamp}.json`);
        for (let n = 1; fs.existsSync(filePath); n++) {
            filePath = path.join(dir, `offline-${stamp}-${n}.json`);
        }
        writeFileAtomic(filePath, payload);

        const files = fs.readdirSync(dir)
            .filter((name) => name.startsWith("offline-") && name.endsWith(".json"))
            .sort();
        for (const name of files.slice(0, Math.max(0, files.length - this.maxBackups))) {
            fs.rmSync(path.join(dir, name), { force: true });
        }
        return filePath;
    }

    private readEntry(id: string): BackupEntry | null {
        try {
            const raw: unknown = JSON.parse(
                fs.readFileSync(path.join(this.backupDir, id, MANIFEST_FILE), "utf-8"),
            );
            const entry = parseEntry(raw);
            return entry !== null && entry.id === id ? entry : null;
        } catch {
            return null;
        }
    }

    private verifyCopies(entry: BackupEntry, filesDir: string): void {
        for (const record of entry.items) {
            if (!record.existed) continue;
            const found = countFiles(path.join(filesDir, record.path));
            if (found !== record.fileCount) {
                throw new BackupError(
                    `Backup ${entry.id} is damaged: ${record.name} has ${found} of ${record.fileCount} files`,
                );
            }
        }
    }

    private async copyBack(source: string, target: string): Promise<void> {
        let stat: fs.Stats;
        try {
            stat = await fs.promises.stat(source);
        } catch (err) {
            // Existed but had no non-excluded files
            if (errorCode(err) === "ENOENT") return;
            throw err;
        }
        if (stat.isFile()) {
            await copyFileRobust(source, target);
            return;
        }
        for (const entry of await fs.promises.readdir(source, { withFileTypes: true })) {
            await this.copyBack(path.join(source, entry.name), path.join(target, entry.name));
        }
    }
}
