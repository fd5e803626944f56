/**
 * Conflict strategy applied when both sides changed since the last sync.
 * - `newest`: the side with the most recent modification wins
 * - `oldest`: the side with the older modification wins
 * - `local`: this machine always wins
 * - `cloud`: the hosted copy always wins
 * - `merge`: structured merge of the primary document, local entries preferred
 * - `manual`: suspend the cycle and leave the decision to the user
 */
export type ConflictStrategy = "newest" | "oldest" | "local" | "cloud" | "merge" | "manual";

export const CONFLICT_STRATEGIES: readonly ConflictStrategy[] = [
    "newest",
    "oldest",
    "local",
    "cloud",
    "merge",
    "manual",
];

/**
 * Delivery mechanism names for the transport fallback chain.
 * - `fetch`: Node's built-in fetch
 * - `curl`: a spawned curl process
 * - `node-http`: a plain node:https request
 */
export type MechanismName = "fetch" | "curl" | "node-http";

export const MECHANISM_NAMES: readonly MechanismName[] = ["fetch", "curl", "node-http"];

/**
 * Sync item type.
 * - `file`: a single file
 * - `directory`: a whole subtree
 */
export type SyncItemType = "file" | "directory";

/**
 * A file or directory under the configuration root that is kept in sync.
 */
export interface SyncItem {
    /** Label used in metadata, logs and the remote file name */
    name: string;
    /** Path relative to the configuration root (POSIX separators) */
    path: string;
    type: SyncItemType;
    /** Glob patterns matched against base names at any depth */
    exclude: string[];
    /** True for the primary settings document (merged structurally, stored as text) */
    primary: boolean;
}

/**
 * Hosted store settings (maps to the `store:` section).
 */
export interface StoreConfig {
    /** Collection URL; records live at `${endpoint}/${id}` */
    endpoint: string;
    /** Bearer-style token sent as `Authorization: token <token>` */
    token: string;
    /** Remote record id, empty until the first upload creates one */
    recordId: string;
    /** Per-mechanism request timeout in milliseconds */
    timeoutMs: number;
    /** Ordered fallback chain */
    mechanisms: MechanismName[];
}

/**
 * Monitored application settings for watch mode.
 */
export interface MonitorConfig {
    /** Process name to look for (case-insensitive, `.exe` optional) */
    processName: string;
    /** Poll interval in milliseconds */
    pollInterval: number;
}

/**
 * Top-level termsync configuration (maps to .termsync.yml).
 */
export interface TermsyncConfig {
    /** Absolute path of the terminal application's configuration directory */
    configRoot: string;
    /** Every synced item; the primary document is always first */
    items: SyncItem[];
    conflictStrategy: ConflictStrategy;
    /** Number of backups kept by retention pruning */
    maxBackups: number;
    store: StoreConfig;
    monitor: MonitorConfig;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
}

/**
 * Last synchronized fingerprints of one item. `null` records an absent item.
 */
export interface ItemSyncState {
    lastLocal: string | null;
    lastRemote: string | null;
}

export type HistoryAction = "upload" | "download" | "merge";

export interface HistoryEntry {
    /** ISO-8601 timestamp */
    time: string;
    action: HistoryAction;
    item: string;
    deviceId: string;
}

/**
 * Sync metadata stored in the configuration root (.termsync-metadata.json).
 */
export interface SyncMetadata {
    version: 1;
    deviceId: string;
    /** Timestamp of the last completed sync (ms since epoch) */
    lastSyncTime: number | null;
    items: Record<string, ItemSyncState>;
    history: HistoryEntry[];
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    primaryDocument: "config.yaml",
    items: ["keymaps.yaml", "window-config.yaml", "vault/", "profiles/", "plugins/", "themes/"],
    exclude: ["*.log", "*.tmp", "*.cache", "node_modules", "*.gitkeep"],
    conflictStrategy: "newest" as ConflictStrategy,
    maxBackups: 10,
    endpoint: "https://api.github.com/gists",
    timeoutMs: 30000,
    mechanisms: ["fetch", "curl", "node-http"] as MechanismName[],
    processName: "tabby",
    pollInterval: 5000,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: ".termsync.yml",
    metadataFileName: ".termsync-metadata.json",
    backupDirName: ".termsync-backups",
    lockFileName: ".termsync.lock",
    tokenEnvVar: "TERMSYNC_TOKEN",
} as const;
