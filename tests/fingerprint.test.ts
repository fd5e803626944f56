import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import type { SyncItem } from "../src/config/types.js";
import {
    collectItemFiles,
    fingerprintContent,
    fingerprintItem,
    fingerprintItems,
    isExcluded,
    latestModification,
} from "../src/sync/fingerprint.js";
import { createTempDir, cleanupDir, writeFile } from "./helpers/temp.js";

const keymaps: SyncItem = { name: "keymaps", path: "keymaps.yaml", type: "file", exclude: [], primary: false };
const profiles: SyncItem = {
    name: "profiles",
    path: "profiles",
    type: "directory",
    exclude: ["*.log", "node_modules"],
    primary: false,
};

describe("fingerprint", () => {
    let root: string;

    beforeEach(() => {
        root = createTempDir();
    });

    afterEach(() => {
        cleanupDir(root);
    });

    describe("isExcluded", () => {
        it("should match base names against glob patterns", () => {
            expect(isExcluded("debug.log", ["*.log"])).toBe(true);
            expect(isExcluded("notes.txt", ["*.log"])).toBe(false);
            expect(isExcluded("node_modules", ["*.log", "node_modules"])).toBe(true);
        });

        it("should match dot files", () => {
            expect(isExcluded(".gitkeep", ["*.gitkeep"])).toBe(true);
        });
    });

    describe("fingerprintContent", () => {
        it("should be the MD5 hex digest", () => {
            expect(fingerprintContent("hello")).toBe("5d41402abc4b2a76b9719d911017c592");
            expect(fingerprintContent(Buffer.from("hello"))).toBe("5d41402abc4b2a76b9719d911017c592");
        });
    });

    describe("fingerprintItem", () => {
        it("should return null for a missing item", async () => {
            expect(await fingerprintItem(root, keymaps)).toBeNull();
            expect(await fingerprintItem(root, profiles)).toBeNull();
        });

        it("should hash a file item over its bytes", async () => {
            writeFile(root, "keymaps.yaml", "copy: ctrl-c\n");
            expect(await fingerprintItem(root, keymaps)).toBe(fingerprintContent("copy: ctrl-c\n"));
        });

        it("should hash a directory over sorted relative paths and contents", async () => {
            writeFile(root, "profiles/sub/b.yaml", "B");
            writeFile(root, "profiles/a.yaml", "A");

            expect(await fingerprintItem(root, profiles)).toBe(fingerprintContent("a.yamlAsub/b.yamlB"));
        });

        it("should ignore excluded files and directories", async () => {
            writeFile(root, "profiles/a.yaml", "A");
            const before = await fingerprintItem(root, profiles);

            writeFile(root, "profiles/debug.log", "noise");
            writeFile(root, "profiles/node_modules/pkg/index.js", "module.exports = 1;");

            expect(await fingerprintItem(root, profiles)).toBe(before);
        });

        it("should change when a file is renamed", async () => {
            writeFile(root, "profiles/a.yaml", "A");
            const before = await fingerprintItem(root, profiles);

            fs.renameSync(path.join(root, "profiles/a.yaml"), path.join(root, "profiles/c.yaml"));

            expect(await fingerprintItem(root, profiles)).not.toBe(before);
        });

        it("should hash an empty directory as the digest of nothing", async () => {
            fs.mkdirSync(path.join(root, "profiles"));
            expect(await fingerprintItem(root, profiles)).toBe(fingerprintContent(""));
        });

        it.skipIf(process.platform === "win32")("should skip symlinks", async () => {
            writeFile(root, "profiles/a.yaml", "A");
            writeFile(root, "outside.yaml", "outside");
            fs.symlinkSync(path.join(root, "outside.yaml"), path.join(root, "profiles/link.yaml"));

            expect(await fingerprintItem(root, profiles)).toBe(fingerprintContent("a.yamlA"));
        });
    });

    describe("collectItemFiles", () => {
        it("should list non-excluded files with root- and item-relative paths", async () => {
            writeFile(root, "profiles/b.yaml", "B");
            writeFile(root, "profiles/nested/a.yaml", "A");
            writeFile(root, "profiles/skip.log", "L");

            const files = await collectItemFiles(root, profiles);

            expect(files.map((f) => [f.relativePath, f.itemRelativePath])).toEqual([
                ["profiles/b.yaml", "b.yaml"],
                ["profiles/nested/a.yaml", "nested/a.yaml"],
            ]);
            expect(files[0].absolutePath).toBe(path.join(root, "profiles", "b.yaml"));
        });

        it("should return a file item as a single entry", async () => {
            writeFile(root, "keymaps.yaml", "k");
            const files = await collectItemFiles(root, keymaps);
            expect(files).toEqual([
                { relativePath: "keymaps.yaml", itemRelativePath: "keymaps.yaml", absolutePath: path.join(root, "keymaps.yaml") },
            ]);
        });
    });

    describe("fingerprintItems", () => {
        it("should key fingerprints by item name", async () => {
            writeFile(root, "keymaps.yaml", "k");

            const fingerprints = await fingerprintItems(root, [keymaps, profiles]);

            expect([...fingerprints.entries()]).toEqual([
                ["keymaps", fingerprintContent("k")],
                ["profiles", null],
            ]);
        });
    });

    describe("latestModification", () => {
        it("should return the newest mtime of the item's files", async () => {
            writeFile(root, "profiles/a.yaml", "A");
            writeFile(root, "profiles/b.yaml", "B");
            fs.utimesSync(path.join(root, "profiles/a.yaml"), new Date(1_000_000), new Date(1_000_000));
            fs.utimesSync(path.join(root, "profiles/b.yaml"), new Date(2_000_000), new Date(2_000_000));

            expect(await latestModification(root, profiles)).toBe(2_000_000);
        });

        it("should return 0 for a missing item", async () => {
            expect(await latestModification(root, keymaps)).toBe(0);
        });
    });
});
