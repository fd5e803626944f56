import * as fs from "node:fs";
import * as path from "node:path";
import type { HistoryAction, ItemSyncState, SyncItem, SyncMetadata, TermsyncConfig } from "../config/types.js";
import { CONFIG_DEFAULTS } from "../config/types.js";
import type { Log } from "../daemon/logger.js";
import { silentLog } from "../daemon/logger.js";
import { RunLock } from "../daemon/lock.js";
import { pack, unpack } from "./archive.js";
import type { BackupEntry, BackupManager } from "./backup.js";
import { BackupError, IntegrityError, ParseError, SyncError, TransportError } from "./errors.js";
import { collectItemFiles, fingerprintContent, fingerprintItem, fingerprintItems, latestModification } from "./fingerprint.js";
import { mergeDocuments, parseConfigDocument } from "./merge.js";
import type { MetadataStore } from "./metadata.js";
import { resolveConflict } from "./strategy.js";
import type { CloudTransport, RemoteFileChanges, RemoteSnapshot } from "./transport.js";
import { decodeBase64, encodeBase64 } from "./transport.js";
import { removeEmptyDirs, safeDelete, writeFileAtomic } from "../utils/fileops.js";
import { errorMessage } from "../utils/guards.js";

/**
 * What a cycle is allowed to do.
 * - `auto`: reconcile both sides
 * - `force-upload`: push every local item, whatever the remote holds
 * - `force-download`: pull every item the remote record holds
 */
export type SyncMode = "auto" | "force-upload" | "force-download";

export type SyncStatus = "unchanged" | "synced" | "offline" | "pending" | "failed";

export interface ItemAction {
    item: string;
    action: HistoryAction;
    /** e.g. "deleted", "conflict: local wins" */
    detail?: string;
}

export interface SyncResult {
    status: SyncStatus;
    actions: ItemAction[];
    errors: string[];
    /** Backup taken before local files were replaced */
    backupId?: string;
    /** Where the payload went when the store could not take it */
    offlinePath?: string;
    recordId?: string;
    /** Items or key paths waiting for a manual decision */
    conflicts?: string[];
}

export type RestoreOutcome =
    | { ok: true; entry: BackupEntry; safety: BackupEntry }
    | { ok: false; error: string; rollbackId?: string };

export interface ItemStatus {
    name: string;
    path: string;
    type: SyncItem["type"];
    exists: boolean;
    fingerprint: string | null;
    state: ItemSyncState | null;
    /** Local fingerprint differs from the last synchronized one */
    changed: boolean;
}

export interface EngineStatus {
    deviceId: string;
    lastSyncTime: number | null;
    recordId: string;
    items: ItemStatus[];
    /** Newest first */
    history: SyncMetadata["history"];
    backups: number;
    /** PID of another process syncing right now */
    lockedBy: number | null;
}

export interface EngineOptions {
    config: TermsyncConfig;
    transport: CloudTransport;
    backups: BackupManager;
    metadata: MetadataStore;
    log?: Log;
    /** Called when an upload created the remote record */
    onRecordCreated?: (recordId: string) => void;
}

type PlannedAction = "none" | "upload" | "download" | "merge";

interface ItemPlan {
    item: SyncItem;
    fileName: string;
    localFingerprint: string | null;
    remoteFingerprint: string | null;
    remoteContent: string | null;
    action: PlannedAction;
    detail?: string;
    /** Merged primary document */
    mergedText?: string;
    /** Local text at planning time (primary document only) */
    localText?: string;
}

const HISTORY_SHOWN = 10;

/**
 * Remote file name of an item: the primary document keeps its base name,
 * everything else travels as `<name>.zip`.
 */
export function remoteFileName(item: SyncItem): string {
    return item.primary ? path.posix.basename(item.path) : `${item.name}.zip`;
}

function failed(message: string, extra: Partial<SyncResult> = {}): SyncResult {
    return { status: "failed", actions: [], errors: [message], ...extra };
}

/**
 * Decides, per item, whether to upload, download or merge, and carries the
 * decision out with a backup before every local replacement.
 */
export class ReconciliationEngine {
    private config: TermsyncConfig;
    private transport: CloudTransport;
    private backups: BackupManager;
    private metadata: MetadataStore;
    private lock: RunLock;
    private log: Log;
    private onRecordCreated?: (recordId: string) => void;
    private primary: SyncItem;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(options: EngineOptions) {
        this.config = options.config;
        this.transport = options.transport;
        this.backups = options.backups;
        this.metadata = options.metadata;
        this.log = options.log ?? silentLog;
        this.onRecordCreated = options.onRecordCreated;
        this.lock = new RunLock(path.join(options.config.configRoot, CONFIG_DEFAULTS.lockFileName));

        const primary = options.config.items.find((item) => item.primary);
        if (primary === undefined) {
            throw new Error("Configuration has no primary document");
        }
        this.primary = primary;
    }

    private get root(): string {
        return this.config.configRoot;
    }

    /**
     * Run one reconciliation cycle. Never throws: failures come back as a
     * `failed` result.
     */
    async sync(mode: SyncMode = "auto"): Promise<SyncResult> {
        try {
            const result = await this.exclusive(() => this.runCycle(mode));
            this.log.info(
                `Sync (${mode}) ${result.status}` +
                (result.actions.length > 0
                    ? `: ${result.actions.map((a) => `${a.action} ${a.item}`).join(", ")}`
                    : ""),
            );
            for (const error of result.errors) {
                this.log.error(`  ${error}`);
            }
            return result;
        } catch (err) {
            this.log.error(`Sync (${mode}) failed: ${errorMessage(err)}`);
            return failed(errorMessage(err));
        }
    }

    /**
     * Restore a backup, validating the primary document afterwards.
     */
    async restore(id: string): Promise<RestoreOutcome> {
        try {
            const { entry, safety } = await this.exclusive(() =>
                this.backups.restore(id, (restored) => {
                    const record = restored.items.find((r) => r.name === this.primary.name);
                    if (record !== undefined) this.validatePrimary(record.existed);
                }),
            );
            this.log.info(`Restored backup ${entry.id} (safety backup: ${safety.id})`);
            return { ok: true, entry, safety };
        } catch (err) {
            this.log.error(`Restore of ${id} failed: ${errorMessage(err)}`);
            return {
                ok: false,
                error: errorMessage(err),
                rollbackId: err instanceof IntegrityError ? err.rollbackId : undefined,
            };
        }
    }

    /**
     * Put a backup back without validation (undo of a failed restore).
     */
    async rollback(id: string): Promise<BackupEntry> {
        return this.exclusive(async () => {
            const entry = this.backups.get(id);
            if (entry === null) {
                throw new SyncError(`Backup not found: ${id}`);
            }
            await this.backups.apply(entry);
            this.log.info(`Rolled back to backup ${id}`);
            return entry;
        });
    }

    listBackups(): BackupEntry[] {
        return this.backups.list();
    }

    localFingerprints(): Promise<Map<string, string | null>> {
        return fingerprintItems(this.root, this.config.items);
    }

    async status(): Promise<EngineStatus> {
        const metadata = this.metadata.load();
        const fingerprints = await this.localFingerprints();
        const owner = this.lock.isHeldElsewhere() ? this.lock.readOwner() : null;

        return {
            deviceId: metadata.deviceId,
            lastSyncTime: metadata.lastSyncTime,
            recordId: this.transport.recordId,
            items: this.config.items.map((item) => {
                const fingerprint = fingerprints.get(item.name) ?? null;
                const state = metadata.items[item.name] ?? null;
                return {
                    name: item.name,
                    path: item.path,
                    type: item.type,
                    exists: fingerprint !== null,
                    fingerprint,
                    state,
                    changed: state === null ? fingerprint !== null : state.lastLocal !== fingerprint,
                };
            }),
            history: metadata.history.slice(-HISTORY_SHOWN).reverse(),
            backups: this.backups.list().length,
            lockedBy: owner,
        };
    }

    /**
     * Run a task after every earlier one, holding the lock file meanwhile.
     */
    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(async () => {
            this.lock.acquire();
            try {
                return await task();
            } finally {
                this.lock.release();
            }
        });
        this.queue = run.catch(() => undefined);
        return run;
    }

    private async runCycle(mode: SyncMode): Promise<SyncResult> {
        const metadata = this.metadata.load();
        const items = this.config.items;
        const local = await fingerprintItems(this.root, items);

        if (mode === "force-upload" && (local.get(this.primary.name) ?? null) === null) {
            return failed(`Cannot upload: ${this.primary.path} does not exist in ${this.root}`);
        }

        let remote: RemoteSnapshot | null;
        try {
            remote = await this.transport.fetch();
        } catch (err) {
            if (!(err instanceof TransportError)) throw err;
            return this.unreachable(mode, metadata, local, err);
        }

        if (mode === "force-download" && remote === null) {
            return failed("Cannot download: there is no remote record yet");
        }

        const conflicts: string[] = [];
        const plans = await this.plan(mode, metadata, local, remote, conflicts);
        if (conflicts.length > 0) {
            // Manual strategy: nothing is written until the user decides
            return { status: "pending", actions: [], errors: [], conflicts };
        }

        return this.execute(mode, metadata, plans, remote);
    }

    /**
     * The store could not be reached: keep local changes offline, or give up.
     */
    private async unreachable(
        mode: SyncMode,
        metadata: SyncMetadata,
        local: Map<string, string | null>,
        err: TransportError,
    ): Promise<SyncResult> {
        if (mode !== "force-download") {
            const changed = this.config.items.filter((item) => {
                const fingerprint = local.get(item.name) ?? null;
                if (mode === "force-upload") return fingerprint !== null;
                const state = metadata.items[item.name];
                return state === undefined ? fingerprint !== null : state.lastLocal !== fingerprint;
            });
            if (changed.length > 0) {
                const changes: RemoteFileChanges = {};
                for (const item of changed) {
                    changes[remoteFileName(item)] = await this.localContent(item);
                }
                const offlinePath = this.transport.saveOffline(changes);
                return {
                    status: "offline",
                    actions: [],
                    errors: [err.message],
                    offlinePath,
                };
            }
        }
        return failed(`Cannot sync: ${err.message}`);
    }

    private async plan(
        mode: SyncMode,
        metadata: SyncMetadata,
        local: Map<string, string | null>,
        remote: RemoteSnapshot | null,
        conflicts: string[],
    ): Promise<ItemPlan[]> {
        const plans: ItemPlan[] = [];

        for (const item of this.config.items) {
            const fileName = remoteFileName(item);
            const remoteContent = remote?.files[fileName] ?? null;
            const plan: ItemPlan = {
                item,
                fileName,
                localFingerprint: local.get(item.name) ?? null,
                remoteFingerprint: remoteContent === null ? null : fingerprintContent(remoteContent),
                remoteContent,
                action: "none",
            };
            plans.push(plan);

            if (mode === "force-upload") {
                if (plan.localFingerprint !== null) plan.action = "upload";
                continue;
            }
            if (mode === "force-download") {
                if (plan.remoteFingerprint !== null) plan.action = "download";
                continue;
            }

            // No record at all: everything that exists locally goes up
            if (remote === null) {
                if (plan.localFingerprint !== null) plan.action = "upload";
                continue;
            }

            const state = metadata.items[item.name];
            let localChanged: boolean;
            let remoteChanged: boolean;
            if (state === undefined) {
                localChanged = plan.localFingerprint !== null;
                remoteChanged = !localChanged && plan.remoteFingerprint !== null;
                // Identical on both sides already
                if (localChanged && item.primary && plan.localFingerprint === plan.remoteFingerprint) {
                    localChanged = false;
                }
            } else {
                localChanged = plan.localFingerprint !== state.lastLocal;
                remoteChanged = plan.remoteFingerprint !== state.lastRemote;
            }

            if (localChanged && !remoteChanged) {
                plan.action = "upload";
            } else if (!localChanged && remoteChanged) {
                plan.action = "download";
            } else if (localChanged && remoteChanged) {
                await this.resolve(plan, remote.updatedAt, conflicts);
            }
        }

        return plans;
    }

    /**
     * Both sides changed: merge the primary document, or let the strategy
     * pick a side for the whole item. Undecided conflicts are added to `conflicts`.
     */
    private async resolve(plan: ItemPlan, remoteTime: number, conflicts: string[]): Promise<void> {
        const { item } = plan;
        const strategy = this.config.conflictStrategy;
        const times = { localTime: await latestModification(this.root, item), remoteTime };

        if (plan.localFingerprint === null && plan.remoteFingerprint === null) {
            return; // Deleted on both sides
        }
        if (plan.localFingerprint === plan.remoteFingerprint && item.primary) {
            return; // Same change on both sides
        }

        if (item.primary && plan.localFingerprint !== null && plan.remoteContent !== null) {
            const localText = fs.readFileSync(path.join(this.root, item.path), "utf-8");
            try {
                const outcome = mergeDocuments(localText, plan.remoteContent, strategy, times);
                if (outcome.status === "pending") {
                    conflicts.push(...outcome.conflicts.map((key) => `${item.name}: ${key}`));
                    return;
                }
                plan.action = "merge";
                plan.localText = localText;
                plan.mergedText = outcome.text;
                plan.detail = outcome.conflicts.length > 0
                    ? `merged, ${outcome.conflicts.length} conflicting value(s) resolved by ${strategy}`
                    : "merged";
                return;
            } catch (err) {
                if (!(err instanceof ParseError)) throw err;
                this.log.warn(`Cannot merge ${item.name} (${err.message}); applying ${strategy} to the whole document`);
            }
        }

        const resolution = resolveConflict(strategy, times, "item");
        if (resolution === "pending") {
            conflicts.push(item.name);
            return;
        }
        plan.action = resolution === "local" ? "upload" : "download";
        plan.detail = `conflict: ${resolution} wins`;
    }

    private async execute(
        mode: SyncMode,
        metadata: SyncMetadata,
        plans: ItemPlan[],
        remote: RemoteSnapshot | null,
    ): Promise<SyncResult> {
        const result: SyncResult = { status: "unchanged", actions: [], errors: [] };
        const states: Record<string, ItemSyncState> = {};
        const history: HistoryAction[] = [];
        const historyItems: string[] = [];

        // 1. Local replacements, behind a backup
        const replacing = plans.filter(
            (p) => p.action === "download" || (p.action === "merge" && p.mergedText !== p.localText),
        );
        if (replacing.length > 0) {
            let backup: BackupEntry;
            try {
                backup = await this.backups.snapshot(
                    replacing.map((p) => p.item),
                    mode === "force-download"
                        ? "force-download"
                        : replacing.some((p) => p.action === "download") ? "pre-download" : "pre-merge",
                );
            } catch (err) {
                if (!(err instanceof BackupError)) throw err;
                return failed(`${err.message}; nothing was changed`);
            }
            result.backupId = backup.id;

            try {
                for (const plan of replacing) {
                    await this.writeLocal(plan);
                }
            } catch (err) {
                const message = `Writing local files failed: ${errorMessage(err)}`;
                try {
                    await this.backups.apply(backup);
                    return failed(`${message}; restored backup ${backup.id}`, { backupId: backup.id });
                } catch (rollbackErr) {
                    return failed(`${message}; rollback to ${backup.id} failed: ${errorMessage(rollbackErr)}`, {
                        backupId: backup.id,
                    });
                }
            }
        }

        for (const plan of plans.filter((p) => p.action === "download")) {
            states[plan.item.name] = {
                lastLocal: await fingerprintItem(this.root, plan.item),
                lastRemote: plan.remoteFingerprint,
            };
            result.actions.push({
                item: plan.item.name,
                action: "download",
                detail: plan.remoteContent === null ? "deleted" : plan.detail,
            });
            history.push("download");
            historyItems.push(plan.item.name);
        }

        // 2. One upload for everything that changed remotely
        const changes: RemoteFileChanges = {};
        const uploads = plans.filter((p) => p.action === "upload");
        const merges = plans.filter((p) => p.action === "merge");
        for (const plan of uploads) {
            changes[plan.fileName] = await this.localContent(plan.item);
        }
        for (const plan of merges) {
            if (plan.mergedText !== undefined && plan.mergedText !== plan.remoteContent) {
                changes[plan.fileName] = plan.mergedText;
            }
        }

        let uploaded = true;
        if (Object.keys(changes).length > 0) {
            const outcome = await this.transport.upload(changes);
            if (outcome.kind === "offline") {
                uploaded = false;
                result.offlinePath = outcome.path;
                result.errors.push(outcome.reason);
            } else {
                result.recordId = outcome.recordId;
                if (outcome.created) {
                    this.log.info(`Created remote record ${outcome.recordId}`);
                    try {
                        this.onRecordCreated?.(outcome.recordId);
                    } catch (err) {
                        result.errors.push(`Could not save record id ${outcome.recordId}: ${errorMessage(err)}`);
                    }
                }
            }
        }

        for (const plan of uploads) {
            result.actions.push({
                item: plan.item.name,
                action: "upload",
                detail: plan.localFingerprint === null ? "deleted" : plan.detail,
            });
            if (!uploaded) continue;
            const content = changes[plan.fileName];
            states[plan.item.name] = {
                lastLocal: plan.localFingerprint,
                lastRemote: content === null || content === undefined ? null : fingerprintContent(content),
            };
            history.push("upload");
            historyItems.push(plan.item.name);
        }

        for (const plan of merges) {
            result.actions.push({ item: plan.item.name, action: "merge", detail: plan.detail });
            const merged = plan.mergedText ?? "";
            if (uploaded) {
                states[plan.item.name] = {
                    lastLocal: await fingerprintItem(this.root, plan.item),
                    lastRemote: fingerprintContent(merged),
                };
                history.push("merge");
                historyItems.push(plan.item.name);
            } else {
                // Merged locally only: leave it looking changed so the next cycle uploads it
                states[plan.item.name] = {
                    lastLocal: metadata.items[plan.item.name]?.lastLocal ?? null,
                    lastRemote: plan.remoteFingerprint,
                };
            }
        }

        for (const plan of plans.filter((p) => p.action === "none")) {
            if (mode !== "auto") continue;
            if (remote === null && plan.localFingerprint === null) continue;
            states[plan.item.name] = {
                lastLocal: plan.localFingerprint,
                lastRemote: plan.remoteFingerprint,
            };
        }

        // 3. Metadata last
        const actionsTaken = result.actions.length > 0;
        const statesChanged = Object.entries(states).some(([name, state]) => {
            const previous = metadata.items[name];
            return previous === undefined ||
                previous.lastLocal !== state.lastLocal ||
                previous.lastRemote !== state.lastRemote;
        });

        if (actionsTaken || statesChanged) {
            const now = new Date();
            await this.metadata.commit((current) => {
                Object.assign(current.items, states);
                for (let i = 0; i < history.length; i++) {
                    current.history.push({
                        time: now.toISOString(),
                        action: history[i],
                        item: historyItems[i],
                        deviceId: current.deviceId,
                    });
                }
                if (uploaded) {
                    current.lastSyncTime = now.getTime();
                }
            });
        }

        this.backups.prune();

        if (!uploaded) {
            result.status = "offline";
        } else if (actionsTaken) {
            result.status = "synced";
        }
        return result;
    }

    /**
     * Replace one item on disk with what the plan says. Throws on failure;
     * the caller rolls back.
     */
    private async writeLocal(plan: ItemPlan): Promise<void> {
        const { item } = plan;
        const target = path.join(this.root, item.path);

        const content = plan.action === "merge" ? plan.mergedText ?? null : plan.remoteContent;
        if (content === null) {
            await this.removeLocal(item);
            return;
        }

        if (item.primary) {
            writeFileAtomic(target, content);
            this.validatePrimary();
            return;
        }

        const extracted = new Set(await unpack(decodeBase64(content), this.root, { within: item.path }));
        for (const file of await collectItemFiles(this.root, item)) {
            if (extracted.has(file.relativePath)) continue;
            const removal = safeDelete(file.absolutePath);
            if (!removal.deleted) {
                throw new IntegrityError(removal.error ?? `Cannot remove ${file.relativePath}`);
            }
        }
        if (item.type === "directory") {
            removeEmptyDirs(target);
        }
    }

    private async removeLocal(item: SyncItem): Promise<void> {
        for (const file of await collectItemFiles(this.root, item)) {
            const removal = safeDelete(file.absolutePath);
            if (!removal.deleted) {
                throw new IntegrityError(removal.error ?? `Cannot remove ${file.relativePath}`);
            }
        }
        if (item.type === "directory") {
            removeEmptyDirs(path.join(this.root, item.path), true);
        }
    }

    /**
     * Remote representation of an item as it is on disk now; null when absent.
     */
    private async localContent(item: SyncItem): Promise<string | null> {
        const target = path.join(this.root, item.path);
        if ((await fingerprintItem(this.root, item)) === null) return null;
        if (item.primary) {
            return fs.readFileSync(target, "utf-8");
        }
        return encodeBase64(await pack(this.root, [item]));
    }

    /**
     * Throws IntegrityError when the primary document on disk does not parse,
     * or is missing while required.
     */
    private validatePrimary(required = false): void {
        const target = path.join(this.root, this.primary.path);
        if (!fs.existsSync(target)) {
            if (required) throw new IntegrityError(`${this.primary.path} is missing`);
            return;
        }
        try {
            parseConfigDocument(fs.readFileSync(target, "utf-8"), this.primary.path);
        } catch (err) {
            throw new IntegrityError(errorMessage(err), { cause: err });
        }
    }
}
