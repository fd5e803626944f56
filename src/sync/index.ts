export { ReconciliationEngine, remoteFileName } from "./engine.js";
export type {
    SyncMode,
    SyncStatus,
    SyncResult,
    ItemAction,
    RestoreOutcome,
    EngineStatus,
    ItemStatus,
    EngineOptions,
} from "./engine.js";
export { CloudTransport, encodeBase64, decodeBase64, RECORD_DESCRIPTION } from "./transport.js";
export type {
    HttpMechanism,
    HttpRequest,
    HttpResponse,
    RemoteSnapshot,
    RemoteFileChanges,
    UploadOutcome,
} from "./transport.js";
export { FetchMechanism, CurlMechanism, NodeHttpMechanism, createMechanisms } from "./mechanisms.js";
export { BackupManager } from "./backup.js";
export type { BackupEntry, BackupItemRecord, RestoreResult } from "./backup.js";
export { MetadataStore, createEmptyMetadata, generateDeviceId, parseMetadata } from "./metadata.js";
export { fingerprintItem, fingerprintItems, fingerprintContent, collectItemFiles, isExcluded } from "./fingerprint.js";
export { pack, unpack, isZipArchive } from "./archive.js";
export { mergeDocuments, parseConfigDocument, serializeConfigDocument } from "./merge.js";
export type { MergeOutcome } from "./merge.js";
export { resolveConflict } from "./strategy.js";
export type { Resolution, ConflictTimes, ConflictScope } from "./strategy.js";
export { ProcessMonitor } from "./monitor.js";
export type { ProcessProbe, LifecycleEvent } from "./monitor.js";
export { LifecycleSync } from "./lifecycle.js";
export type { SyncRunner } from "./lifecycle.js";
export {
    SyncError,
    TransportError,
    ParseError,
    IntegrityError,
    BackupError,
    MetadataError,
    LockError,
} from "./errors.js";
