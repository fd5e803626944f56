import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import type { SyncMetadata } from "../src/config/types.js";
import { MetadataError } from "../src/sync/errors.js";
import {
    MetadataStore,
    createEmptyMetadata,
    generateDeviceId,
    parseMetadata,
} from "../src/sync/metadata.js";
import type { Log } from "../src/daemon/logger.js";
import { createTempDir, cleanupDir, writeFile } from "./helpers/temp.js";

function recordingLog(): Log & { warnings: string[] } {
    const warnings: string[] = [];
    return {
        warnings,
        debug: () => undefined,
        info: () => undefined,
        warn: (message: string) => {
            warnings.push(message);
        },
        error: () => undefined,
    };
}

describe("Sync Metadata", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    describe("generateDeviceId", () => {
        it("should be a stable md5 digest", () => {
            expect(generateDeviceId()).toMatch(/^[0-9a-f]{32}$/);
            expect(generateDeviceId()).toBe(generateDeviceId());
        });
    });

    describe("parseMetadata", () => {
        it("should accept valid metadata", () => {
            const metadata: SyncMetadata = {
                version: 1,
                deviceId: "device-a",
                lastSyncTime: 1234567890,
                items: { "config.yaml": { lastLocal: "abc", lastRemote: null } },
                history: [{ time: "2025-01-01T00:00:00.000Z", action: "upload", item: "config.yaml", deviceId: "device-a" }],
            };
            expect(parseMetadata(JSON.parse(JSON.stringify(metadata)))).toEqual(metadata);
        });

        it("should drop malformed history entries", () => {
            const parsed = parseMetadata({
                version: 1,
                deviceId: "device-a",
                lastSyncTime: null,
                items: {},
                history: [{ time: "t", action: "teleport", item: "x", deviceId: "d" }, "junk"],
            });
            expect(parsed.history).toEqual([]);
        });

        it("should name the first bad field", () => {
            expect(() => parseMetadata({ version: 2 })).toThrow("unsupported metadata version: 2");
            expect(() =>
                parseMetadata({
                    version: 1,
                    deviceId: "d",
                    lastSyncTime: null,
                    items: { profiles: { lastLocal: 5, lastRemote: null } },
                }),
            ).toThrow("items.profiles.lastLocal must be a string or null");
            expect(() => parseMetadata([])).toThrow(MetadataError);
        });
    });

    describe("MetadataStore", () => {
        it("should return empty metadata when there is no file", () => {
            const store = new MetadataStore(tempDir, undefined, "device-a");
            expect(store.load()).toEqual(createEmptyMetadata("device-a"));
        });

        it("should round-trip through the metadata file", () => {
            const store = new MetadataStore(tempDir, undefined, "device-a");
            const metadata = createEmptyMetadata("device-a");
            metadata.lastSyncTime = 42;
            metadata.items.profiles = { lastLocal: "aaa", lastRemote: "bbb" };

            store.save(metadata);

            expect(store.filePath).toBe(path.join(tempDir, ".termsync-metadata.json"));
            expect(store.load()).toEqual(metadata);
        });

        it("should treat corrupt metadata as no prior sync and warn", () => {
            const log = recordingLog();
            writeFile(tempDir, ".termsync-metadata.json", "{ not json");
            const store = new MetadataStore(tempDir, log, "device-a");

            expect(store.load()).toEqual(createEmptyMetadata("device-a"));
            expect(log.warnings).toHaveLength(1);
            expect(log.warnings[0]).toContain("Ignoring corrupt metadata");
        });

        it("should raise MetadataError when the file cannot be written", () => {
            const store = new MetadataStore(path.join(tempDir, "missing", "deeper"), undefined, "device-a");
            fs.writeFileSync(path.join(tempDir, "missing"), "a file in the way");

            expect(() => store.save(createEmptyMetadata("device-a"))).toThrow(MetadataError);
        });

        it("should apply concurrent commits one after another", async () => {
            const store = new MetadataStore(tempDir, undefined, "device-a");

            await Promise.all([
                store.commit((m) => {
                    m.items.a = { lastLocal: "1", lastRemote: "1" };
                }),
                store.commit((m) => {
                    m.items.b = { lastLocal: "2", lastRemote: "2" };
                }),
            ]);

            expect(Object.keys(store.load().items).sort()).toEqual(["a", "b"]);
        });

        it("should keep committing after a failed commit", async () => {
            const store = new MetadataStore(tempDir, undefined, "device-a");

            await expect(
                store.commit(() => {
                    throw new Error("boom");
                }),
            ).rejects.toThrow("boom");
            const saved = await store.commit((m) => {
                m.lastSyncTime = 7;
            });

            expect(saved.lastSyncTime).toBe(7);
        });
    });
});
