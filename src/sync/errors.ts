/**
 * Base class of every failure raised by the sync core.
 */
export class SyncError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Every delivery mechanism failed, or the store refused the request.
 */
export class TransportError extends SyncError {
    /** HTTP status when the store answered, undefined when nothing got through */
    readonly status?: number;

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super(message, options);
        this.status = options?.status;
    }
}

/**
 * A document failed structured validation.
 */
export class ParseError extends SyncError {}

/**
 * A replacing write produced content that failed validation.
 */
export class IntegrityError extends SyncError {
    /** Backup that restores the state from before the write, when one exists */
    readonly rollbackId?: string;

    constructor(message: string, options?: { cause?: unknown; rollbackId?: string }) {
        super(message, options);
        this.rollbackId = options?.rollbackId;
    }
}

/**
 * A snapshot could not be captured; the write it guards must not happen.
 */
export class BackupError extends SyncError {}

/**
 * Local metadata is unreadable or could not be written.
 */
export class MetadataError extends SyncError {}

/**
 * Another cycle holds the lock on the configuration root.
 */
export class LockError extends SyncError {}
