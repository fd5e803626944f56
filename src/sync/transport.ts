import type { StoreConfig } from "../config/types.js";
import type { Log } from "../daemon/logger.js";
import { silentLog } from "../daemon/logger.js";
import { IntegrityError, TransportError } from "./errors.js";
import { errorMessage, isRecord } from "../utils/guards.js";

export type HttpMethod = "GET" | "POST" | "PATCH";

export interface HttpRequest {
    method: HttpMethod;
    url: string;
    headers: Record<string, string>;
    body?: string;
    timeoutMs: number;
}

export interface HttpResponse {
    status: number;
    body: string;
}

/**
 * One way of getting a request to the store. Throwing means "this mechanism
 * could not deliver"; any HTTP answer is returned as is.
 */
export interface HttpMechanism {
    readonly name: string;
    send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * The remote record as last seen. Archive items hold base64 text.
 */
export interface RemoteSnapshot {
    id: string;
    /** Last modification of the record (ms since epoch) */
    updatedAt: number;
    files: Record<string, string>;
}

/** File name to new content; null removes the remote file. */
export type RemoteFileChanges = Record<string, string | null>;

export type UploadOutcome =
    | { kind: "synced"; recordId: string; created: boolean; updatedAt: number }
    | { kind: "offline"; path: string; reason: string };

/** Where payloads go when the store cannot take them. */
export interface OfflineSink {
    saveOffline(payload: string): string;
}

export const RECORD_DESCRIPTION = "Terminal configuration (termsync)";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function encodeBase64(content: Buffer): string {
    return content.toString("base64");
}

/**
 * Decode base64 text, ignoring whitespace. Throws IntegrityError on anything else.
 */
export function decodeBase64(text: string): Buffer {
    const compact = text.replace(/\s+/g, "");
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
        throw new IntegrityError("Content is not valid base64");
    }
    return Buffer.from(compact, "base64");
}

function isArchiveName(fileName: string): boolean {
    return fileName.endsWith(".zip");
}

function parseJson(body: string, what: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (err) {
        throw new TransportError(`Malformed ${what} response: ${errorMessage(err)}`, { cause: err });
    }
    if (!isRecord(parsed)) {
        throw new TransportError(`Malformed ${what} response: expected an object`);
    }
    return parsed;
}

function parseTimestamp(value: unknown): number {
    const time = typeof value === "string" ? Date.parse(value) : NaN;
    return Number.isNaN(time) ? 0 : time;
}

/**
 * Client of the hosted record store with an ordered mechanism fallback chain.
 */
export class CloudTransport {
    private store: StoreConfig;
    private mechanisms: HttpMechanism[];
    private offline: OfflineSink;
    private log: Log;

    constructor(store: StoreConfig, mechanisms: HttpMechanism[], offline: OfflineSink, log: Log = silentLog) {
        if (mechanisms.length === 0) {
            throw new Error("At least one delivery mechanism is required");
        }
        this.store = { ...store };
        this.mechanisms = mechanisms;
        this.offline = offline;
        this.log = log;
    }

    get recordId(): string {
        return this.store.recordId;
    }

    /** Adopt the id of a record created elsewhere (e.g. by a previous upload). */
    setRecordId(recordId: string): void {
        this.store.recordId = recordId;
    }

    /**
     * Fetch the remote record, or null when it has not been created yet.
     * A record id the store does not know is dropped, so the next upload
     * creates a new record.
     */
    async fetch(): Promise<RemoteSnapshot | null> {
        if (this.store.recordId === "") return null;

        const response = await this.request("GET", this.recordUrl());
        if (response.status === 404) {
            this.log.warn(`Remote record ${this.store.recordId} not found; a new one will be created`);
            this.store.recordId = "";
            return null;
        }
        if (response.status < 200 || response.status >= 300) {
            throw new TransportError(`Fetching record failed with HTTP ${response.status}`, {
                status: response.status,
            });
        }

        const record = parseJson(response.body, "record");
        const files: Record<string, string> = {};
        const rawFiles = isRecord(record.files) ? record.files : {};

        for (const [fileName, entry] of Object.entries(rawFiles)) {
            if (!isRecord(entry)) continue;
            if (entry.truncated === true) {
                if (typeof entry.raw_url !== "string") {
                    throw new TransportError(`${fileName} is truncated and has no raw_url`);
                }
                files[fileName] = await this.fetchRaw(entry.raw_url, fileName);
            } else if (typeof entry.content === "string") {
                files[fileName] = entry.content;
            }
        }

        return {
            id: typeof record.id === "string" ? record.id : this.store.recordId,
            updatedAt: parseTimestamp(record.updated_at),
            files,
        };
    }

    /**
     * Send changed files in one request, creating the record when there is none.
     * Falls back to an offline save when the store cannot take the payload.
     */
    async upload(changes: RemoteFileChanges): Promise<UploadOutcome> {
        const creating = this.store.recordId === "";
        const files: Record<string, { content: string; encoding?: "base64" } | null> = {};
        for (const [fileName, content] of Object.entries(changes)) {
            if (content === null) {
                if (!creating) files[fileName] = null;
            } else if (isArchiveName(fileName)) {
                files[fileName] = { content, encoding: "base64" };
            } else {
                files[fileName] = { content };
            }
        }

        const body = creating
            ? { description: RECORD_DESCRIPTION, public: false, files }
            : { description: RECORD_DESCRIPTION, files };

        try {
            const response = creating
                ? await this.request("POST", this.store.endpoint, JSON.stringify(body))
                : await this.request("PATCH", this.recordUrl(), JSON.stringify(body));
            if (response.status < 200 || response.status >= 300) {
                throw new TransportError(`Store refused the upload with HTTP ${response.status}`, {
                    status: response.status,
                });
            }

            const record = parseJson(response.body, "upload");
            const recordId = typeof record.id === "string" ? record.id : this.store.recordId;
            if (recordId === "") {
                throw new TransportError("Store did not return a record id");
            }
            this.store.recordId = recordId;
            return {
                kind: "synced",
                recordId,
                created: creating,
                updatedAt: parseTimestamp(record.updated_at),
            };
        } catch (err) {
            if (!(err instanceof TransportError)) throw err;
            const path = this.saveOffline(changes);
            this.log.warn(`Upload failed (${err.message}); payload saved to ${path}`);
            return { kind: "offline", path, reason: err.message };
        }
    }

    /**
     * Last modification time of the remote record, or null when there is none.
     */
    async probeRemoteTimestamp(): Promise<number | null> {
        const snapshot = await this.fetch();
        return snapshot === null ? null : snapshot.updatedAt;
    }

    /**
     * Keep a payload that could not be delivered.
     * @returns Path of the offline file
     */
    saveOffline(changes: RemoteFileChanges): string {
        const payload = {
            recordId: this.store.recordId || null,
            savedAt: new Date().toISOString(),
            files: changes,
        };
        return this.offline.saveOffline(JSON.stringify(payload, null, 2));
    }

    private recordUrl(): string {
        return `${this.store.endpoint}/${encodeURIComponent(this.store.recordId)}`;
    }

    private headers(): Record<string, string> {
        const headers: Record<string, string> = {
            Accept: "application/vnd.github+json",
            "User-Agent": "termsync",
            "Content-Type": "application/json",
        };
        if (this.store.token !== "") {
            headers.Authorization = `token ${this.store.token}`;
        }
        return headers;
    }

    private async fetchRaw(url: string, fileName: string): Promise<string> {
        const response = await this.request("GET", url);
        if (response.status < 200 || response.status >= 300) {
            throw new TransportError(`Fetching ${fileName} failed with HTTP ${response.status}`, {
                status: response.status,
            });
        }
        return response.body;
    }

    /**
     * Try each mechanism in order. A throw or a 5xx answer moves on to the next;
     * any other answer is final.
     */
    private async request(method: HttpRequest["method"], url: string, body?: string): Promise<HttpResponse> {
        const failures: string[] = [];

        for (const mechanism of this.mechanisms) {
            try {
                const response = await mechanism.send({
                    method,
                    url,
                    headers: this.headers(),
                    body,
                    timeoutMs: this.store.timeoutMs,
                });
                if (response.status >= 500) {
                    failures.push(`${mechanism.name}: HTTP ${response.status}`);
                    this.log.debug(`${method} ${url} via ${mechanism.name}: HTTP ${response.status}, trying next`);
                    continue;
                }
                this.log.debug(`${method} ${url} via ${mechanism.name}: HTTP ${response.status}`);
                return response;
            } catch (err) {
                failures.push(`${mechanism.name}: ${errorMessage(err)}`);
                this.log.debug(`${method} ${url} via ${mechanism.name} failed: ${errorMessage(err)}`);
            }
        }

        throw new TransportError(`All delivery mechanisms failed (${failures.join("; ")})`);
    }
}
