export {
    loadConfig,
    writeDefaultConfig,
    validateConfig,
    saveRecordId,
    getConfigHome,
    defaultConfigRoot,
} from "./loader.js";
export type {
    TermsyncConfig,
    SyncItem,
    SyncItemType,
    StoreConfig,
    MonitorConfig,
    ConflictStrategy,
    MechanismName,
    SyncMetadata,
    ItemSyncState,
    HistoryEntry,
    HistoryAction,
} from "./types.js";
export { CONFIG_DEFAULTS, CONFLICT_STRATEGIES, MECHANISM_NAMES } from "./types.js";
