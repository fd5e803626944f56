import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import type { TermsyncConfig } from "../src/config/types.js";
import { BackupManager } from "../src/sync/backup.js";
import { BackupError, IntegrityError, SyncError } from "../src/sync/errors.js";
import { makeConfig } from "./helpers/config.js";
import { createTempDir, cleanupDir, writeFile, readFile, exists } from "./helpers/temp.js";

describe("BackupManager", () => {
    let root: string;
    let config: TermsyncConfig;
    let backups: BackupManager;

    beforeEach(() => {
        root = createTempDir();
        config = makeConfig(root);
        backups = new BackupManager(root, config.items, 3);

        writeFile(root, "config.yaml", "theme: dark\n");
        writeFile(root, "profiles/work.yaml", "host: work\n");
        writeFile(root, "profiles/debug.log", "noise\n");
    });

    afterEach(() => {
        cleanupDir(root);
    });

    describe("snapshot", () => {
        it("should copy the items and record which existed", async () => {
            const entry = await backups.snapshot(config.items, "manual");

            expect(entry.reason).toBe("manual");
            expect(entry.items).toEqual([
                { name: "config.yaml", path: "config.yaml", type: "file", existed: true, fileCount: 1 },
                { name: "keymaps.yaml", path: "keymaps.yaml", type: "file", existed: false, fileCount: 0 },
                { name: "profiles", path: "profiles", type: "directory", existed: true, fileCount: 1 },
            ]);

            const files = path.join(backups.backupDir, entry.id, "files");
            expect(fs.readFileSync(path.join(files, "config.yaml"), "utf-8")).toBe("theme: dark\n");
            expect(fs.readFileSync(path.join(files, "profiles", "work.yaml"), "utf-8")).toBe("host: work\n");
            expect(fs.existsSync(path.join(files, "profiles", "debug.log"))).toBe(false);
        });

        it("should give backups taken together distinct ids", async () => {
            const first = await backups.snapshot(config.items, "one");
            const second = await backups.snapshot(config.items, "two");
            expect(second.id).not.toBe(first.id);
        });

        it("should raise BackupError when the backup directory cannot be created", async () => {
            writeFile(root, ".termsync-backups", "not a directory");

            await expect(backups.snapshot(config.items, "manual")).rejects.toThrow(BackupError);
            expect(readFile(root, ".termsync-backups")).toBe("not a directory");
        });
    });

    describe("list and get", () => {
        it("should list backups newest first", async () => {
            const first = await backups.snapshot(config.items, "one");
            const second = await backups.snapshot(config.items, "two");

            expect(backups.list().map((e) => e.id)).toEqual([second.id, first.id]);
            expect(backups.get(first.id)).toEqual(first);
        });

        it("should ignore directories without a manifest and the offline area", async () => {
            const entry = await backups.snapshot(config.items, "one");
            fs.mkdirSync(path.join(backups.backupDir, "partial", "files"), { recursive: true });
            backups.saveOffline("{}");

            expect(backups.list().map((e) => e.id)).toEqual([entry.id]);
        });

        it("should return null for unknown or path-like ids", () => {
            expect(backups.get("nope")).toBeNull();
            expect(backups.get("")).toBeNull();
            expect(backups.get("offline")).toBeNull();
            expect(backups.get("../outside")).toBeNull();
        });

        it("should return an empty list before any backup", () => {
            expect(backups.list()).toEqual([]);
        });
    });

    describe("prune", () => {
        it("should keep the newest backups", async () => {
            const ids: string[] = [];
            for (const reason of ["a", "b", "c", "d", "e"]) {
                ids.push((await backups.snapshot(config.items, reason)).id);
            }

            const removed = backups.prune();

            expect(removed).toEqual([ids[0], ids[1]]);
            expect(backups.list().map((e) => e.id)).toEqual([ids[4], ids[3], ids[2]]);
        });
    });

    describe("apply", () => {
        it("should put back the captured state", async () => {
            const entry = await backups.snapshot(config.items, "manual");

            writeFile(root, "config.yaml", "theme: light\n");
            writeFile(root, "profiles/home.yaml", "host: home\n");
            fs.rmSync(path.join(root, "profiles", "work.yaml"));
            writeFile(root, "keymaps.yaml", "copy: ctrl+c\n");

            await backups.apply(entry);

            expect(readFile(root, "config.yaml")).toBe("theme: dark\n");
            expect(readFile(root, "profiles/work.yaml")).toBe("host: work\n");
            expect(exists(root, "profiles/home.yaml")).toBe(false);
            expect(exists(root, "keymaps.yaml")).toBe(false);
        });

        it("should leave excluded files alone", async () => {
            const entry = await backups.snapshot(config.items, "manual");
            writeFile(root, "profiles/debug.log", "newer noise\n");

            await backups.apply(entry);

            expect(readFile(root, "profiles/debug.log")).toBe("newer noise\n");
        });

        it("should refuse a backup whose copies are missing before changing anything", async () => {
            const entry = await backups.snapshot(config.items, "manual");
            fs.rmSync(path.join(backups.backupDir, entry.id, "files", "config.yaml"));
            writeFile(root, "config.yaml", "theme: light\n");

            await expect(backups.apply(entry)).rejects.toThrow(
                `Backup ${entry.id} is damaged: config.yaml has 0 of 1 files`,
            );
            expect(readFile(root, "config.yaml")).toBe("theme: light\n");
        });

        it("should accept a directory that held only excluded files", async () => {
            fs.rmSync(path.join(root, "profiles", "work.yaml"));
            const entry = await backups.snapshot(config.items, "manual");
            writeFile(root, "profiles/home.yaml", "host: home\n");

            await backups.apply(entry);

            expect(exists(root, "profiles/home.yaml")).toBe(false);
            expect(readFile(root, "profiles/debug.log")).toBe("noise\n");
        });

        it("should remove a directory that did not exist", async () => {
            fs.rmSync(path.join(root, "profiles"), { recursive: true });
            const entry = await backups.snapshot(config.items, "manual");
            writeFile(root, "profiles/nested/new.yaml", "x: 1\n");

            await backups.apply(entry);

            expect(exists(root, "profiles")).toBe(false);
        });
    });

    describe("restore", () => {
        it("should restore and keep a safety backup of the replaced state", async () => {
            const entry = await backups.snapshot(config.items, "manual");
            writeFile(root, "config.yaml", "theme: light\n");

            const result = await backups.restore(entry.id, () => undefined);

            expect(readFile(root, "config.yaml")).toBe("theme: dark\n");
            expect(result.entry).toEqual(entry);
            expect(result.safety.reason).toBe("pre-restore");
            const safetyCopy = path.join(backups.backupDir, result.safety.id, "files", "config.yaml");
            expect(fs.readFileSync(safetyCopy, "utf-8")).toBe("theme: light\n");
        });

        it("should name the safety backup when validation fails", async () => {
            const entry = await backups.snapshot(config.items, "manual");

            const error = await backups
                .restore(entry.id, () => {
                    throw new Error("bad document");
                })
                .catch((err: unknown) => err);

            expect(error).toBeInstanceOf(IntegrityError);
            if (!(error instanceof IntegrityError)) return;
            expect(error.message).toBe("Restored configuration failed validation: bad document");
            expect(error.rollbackId).toBeDefined();
            expect(backups.get(error.rollbackId ?? "")?.reason).toBe("pre-restore");
        });

        it("should name the safety backup when the backup cannot be applied", async () => {
            const entry = await backups.snapshot(config.items, "manual");
            fs.rmSync(path.join(backups.backupDir, entry.id, "files", "config.yaml"));
            let validated = false;

            const error = await backups
                .restore(entry.id, () => {
                    validated = true;
                })
                .catch((err: unknown) => err);

            expect(error).toBeInstanceOf(IntegrityError);
            if (!(error instanceof IntegrityError)) return;
            expect(error.message).toBe(
                `Restore of ${entry.id} failed: Backup ${entry.id} is damaged: config.yaml has 0 of 1 files`,
            );
            expect(backups.get(error.rollbackId ?? "")?.reason).toBe("pre-restore");
            expect(validated).toBe(false);
            expect(readFile(root, "config.yaml")).toBe("theme: dark\n");
        });

        it("should reject an unknown backup", async () => {
            await expect(backups.restore("20200101T000000000Z", () => undefined)).rejects.toThrow(SyncError);
            await expect(backups.restore("20200101T000000000Z", () => undefined)).rejects.toThrow(
                "Backup not found: 20200101T000000000Z",
            );
        });
    });

    describe("saveOffline", () => {
        it("should write the payload under offline/", () => {
            const filePath = backups.saveOffline('{"files":{}}');

            expect(path.dirname(filePath)).toBe(path.join(backups.backupDir, "offline"));
            expect(path.basename(filePath)).toMatch(/^offline-\d{8}T\d{9}Z(-\d+)?\.json$/);
            expect(fs.readFileSync(filePath, "utf-8")).toBe('{"files":{}}');
        });

        it("should keep at most maxBackups payloads", () => {
            for (let i = 0; i < 5; i++) {
                backups.saveOffline(`{"n":${i}}`);
            }
            const files = fs.readdirSync(path.join(backups.backupDir, "offline"));
            expect(files).toHaveLength(3);
        });
    });
});
