import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as crypto from "node:crypto";
import type { HistoryEntry, ItemSyncState, SyncMetadata } from "../config/types.js";
import { CONFIG_DEFAULTS } from "../config/types.js";
import type { Log } from "../daemon/logger.js";
import { silentLog } from "../daemon/logger.js";
import { MetadataError } from "./errors.js";
import { writeFileAtomic } from "../utils/fileops.js";
import { errorCode, errorMessage, isRecord } from "../utils/guards.js";

/**
 * Stable identifier of this machine: MD5 of host name, architecture and CPU model.
 */
export function generateDeviceId(): string {
    const cpu = os.cpus()[0]?.model ?? "";
    return crypto.createHash("md5").update(`${os.hostname()}${os.arch()}${cpu}`).digest("hex");
}

/**
 * Create initial empty metadata (no prior sync).
 */
export function createEmptyMetadata(deviceId: string = generateDeviceId()): SyncMetadata {
    return {
        version: 1,
        deviceId,
        lastSyncTime: null,
        items: {},
        history: [],
    };
}

function fingerprintOrNull(value: unknown, key: string): string | null {
    if (value === null || typeof value === "string") return value;
    throw new MetadataError(`${key} must be a string or null`);
}

/**
 * Validate parsed metadata. Throws MetadataError naming the first bad field.
 */
export function parseMetadata(value: unknown): SyncMetadata {
    if (!isRecord(value)) {
        throw new MetadataError("metadata must be an object");
    }
    if (value.version !== 1) {
        throw new MetadataError(`unsupported metadata version: ${String(value.version)}`);
    }
    if (typeof value.deviceId !== "string") {
        throw new MetadataError("deviceId must be a string");
    }
    if (value.lastSyncTime !== null && typeof value.lastSyncTime !== "number") {
        throw new MetadataError("lastSyncTime must be a number or null");
    }
    if (!isRecord(value.items)) {
        throw new MetadataError("items must be an object");
    }

    const items: Record<string, ItemSyncState> = {};
    for (const [name, state] of Object.entries(value.items)) {
        if (!isRecord(state)) {
            throw new MetadataError(`items.${name} must be an object`);
        }
        items[name] = {
            lastLocal: fingerprintOrNull(state.lastLocal, `items.${name}.lastLocal`),
            lastRemote: fingerprintOrNull(state.lastRemote, `items.${name}.lastRemote`),
        };
    }

    const history: HistoryEntry[] = [];
    const rawHistory: unknown[] = Array.isArray(value.history) ? value.history : [];
    for (const entry of rawHistory) {
        if (
            isRecord(entry) &&
            typeof entry.time === "string" &&
            (entry.action === "upload" || entry.action === "download" || entry.action === "merge") &&
            typeof entry.item === "string" &&
            typeof entry.deviceId === "string"
        ) {
            history.push({ time: entry.time, action: entry.action, item: entry.item, deviceId: entry.deviceId });
        }
    }

    return {
        version: 1,
        deviceId: value.deviceId,
        lastSyncTime: value.lastSyncTime,
        items,
        history,
    };
}

/**
 * Last-synchronized state, kept in `<root>/.termsync-metadata.json`.
 */
export class MetadataStore {
    readonly filePath: string;
    private deviceId: string;
    private log: Log;
    private writes: Promise<unknown> = Promise.resolve();

    constructor(root: string, log: Log = silentLog, deviceId: string = generateDeviceId()) {
        this.filePath = path.join(root, CONFIG_DEFAULTS.metadataFileName);
        this.deviceId = deviceId;
        this.log = log;
    }

    /**
     * Read the metadata. A missing file means no prior sync; a corrupt one is
     * reported and treated the same way.
     */
    load(): SyncMetadata {
        let raw: string;
        try {
            raw = fs.readFileSync(this.filePath, "utf-8");
        } catch (err) {
            if (errorCode(err) === "ENOENT") {
                return createEmptyMetadata(this.deviceId);
            }
            throw new MetadataError(`Cannot read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
        }

        try {
            return parseMetadata(JSON.parse(raw));
        } catch (err) {
            this.log.warn(`Ignoring corrupt metadata ${this.filePath}: ${errorMessage(err)}`);
            return createEmptyMetadata(this.deviceId);
        }
    }

    /**
     * Atomically replace the metadata file.
     */
    save(metadata: SyncMetadata): void {
        try {
            writeFileAtomic(this.filePath, JSON.stringify(metadata, null, 2));
        } catch (err) {
            throw new MetadataError(`Cannot write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
        }
    }

    /**
     * Load, change and save the metadata. Concurrent commits run one after another.
     */
    commit(mutate: (metadata: SyncMetadata) => void): Promise<SyncMetadata> {
        const next = this.writes.then(() => {
            const metadata = this.load();
            mutate(metadata);
            this.save(metadata);
            return metadata;
        });
        this.writes = next.catch(() => undefined);
        return next;
    }
}
