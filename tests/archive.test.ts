import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import JSZip from "jszip";
import type { SyncItem } from "../src/config/types.js";
import { pack, unpack, isZipArchive } from "../src/sync/archive.js";
import { IntegrityError } from "../src/sync/errors.js";
import { fingerprintItem } from "../src/sync/fingerprint.js";
import { createTempDir, cleanupDir, writeFile, readFile, exists } from "./helpers/temp.js";

const profiles: SyncItem = { name: "profiles", path: "profiles", type: "directory", exclude: ["*.log"], primary: false };
const keymaps: SyncItem = { name: "keymaps.yaml", path: "keymaps.yaml", type: "file", exclude: ["*.log"], primary: false };

describe("archive", () => {
    let source: string;
    let destination: string;

    beforeEach(() => {
        source = createTempDir();
        destination = createTempDir();
    });

    afterEach(() => {
        cleanupDir(source);
        cleanupDir(destination);
    });

    it("should round-trip the non-excluded files of several items", async () => {
        writeFile(source, "profiles/a.yaml", "A");
        writeFile(source, "profiles/nested/b.yaml", "B");
        writeFile(source, "profiles/debug.log", "noise");
        writeFile(source, "keymaps.yaml", "copy: ctrl-c\n");

        const blob = await pack(source, [profiles, keymaps]);
        const extracted = await unpack(blob, destination);

        expect(extracted).toEqual(["keymaps.yaml", "profiles/a.yaml", "profiles/nested/b.yaml"]);
        expect(readFile(destination, "profiles/nested/b.yaml")).toBe("B");
        expect(readFile(destination, "keymaps.yaml")).toBe("copy: ctrl-c\n");
        expect(exists(destination, "profiles/debug.log")).toBe(false);
        expect(await fingerprintItem(destination, profiles)).toBe(await fingerprintItem(source, profiles));
    });

    it("should recognize its own output as a ZIP archive", async () => {
        writeFile(source, "keymaps.yaml", "k");
        expect(isZipArchive(await pack(source, [keymaps]))).toBe(true);
        expect(isZipArchive(Buffer.from("hello world"))).toBe(false);
        expect(isZipArchive(Buffer.from("PK"))).toBe(false);
    });

    it("should reject content without a ZIP signature", async () => {
        await expect(unpack(Buffer.from("not an archive"), destination)).rejects.toThrow(
            new IntegrityError("Content is not a ZIP archive"),
        );
    });

    it("should reject a corrupt archive", async () => {
        const blob = Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.from("garbage garbage garbage")]);
        await expect(unpack(blob, destination)).rejects.toThrow(/^Corrupt archive: /);
    });

    it("should reject entries outside the expected item", async () => {
        writeFile(source, "keymaps.yaml", "k");
        const blob = await pack(source, [keymaps]);

        await expect(unpack(blob, destination, { within: "profiles" })).rejects.toThrow(
            "Archive entry keymaps.yaml is outside profiles",
        );
        expect(exists(destination, "keymaps.yaml")).toBe(false);
    });

    it("should accept a file item as its own root", async () => {
        writeFile(source, "keymaps.yaml", "k");
        const blob = await pack(source, [keymaps]);

        expect(await unpack(blob, destination, { within: "keymaps.yaml" })).toEqual(["keymaps.yaml"]);
    });

    it("should never write outside the destination", async () => {
        const zip = new JSZip();
        zip.file("../evil.txt", "x");
        const blob = await zip.generateAsync({ type: "nodebuffer" });

        await unpack(blob, destination).catch((err: unknown) => {
            expect(err).toBeInstanceOf(IntegrityError);
        });
        expect(fs.existsSync(path.join(destination, "..", "evil.txt"))).toBe(false);
    });

    it("should refuse to write through a symbolic link in the destination", async () => {
        const outside = createTempDir();
        try {
            writeFile(outside, "victim.yaml", "original\n");
            fs.mkdirSync(path.join(destination, "profiles"));
            fs.symlinkSync(path.join(outside, "victim.yaml"), path.join(destination, "profiles", "work.yaml"));
            const zip = new JSZip();
            zip.file("profiles/work.yaml", "overwritten\n");
            zip.file("profiles/other.yaml", "other\n");
            const blob = await zip.generateAsync({ type: "nodebuffer" });

            await expect(unpack(blob, destination, { within: "profiles" })).rejects.toThrow(IntegrityError);

            expect(readFile(outside, "victim.yaml")).toBe("original\n");
            expect(exists(destination, "profiles/other.yaml")).toBe(false);
        } finally {
            cleanupDir(outside);
        }
    });

    it("should refuse a linked directory on the way to an entry", async () => {
        const outside = createTempDir();
        try {
            fs.symlinkSync(outside, path.join(destination, "profiles"));
            const zip = new JSZip();
            zip.file("profiles/work.yaml", "overwritten\n");
            const blob = await zip.generateAsync({ type: "nodebuffer" });

            await expect(unpack(blob, destination)).rejects.toThrow("through symbolic link");

            expect(fs.readdirSync(outside)).toEqual([]);
        } finally {
            cleanupDir(outside);
        }
    });

    it("should restore modification times from the archive", async () => {
        writeFile(source, "keymaps.yaml", "k");
        const mtime = new Date(2024, 0, 15, 10, 30, 0);
        fs.utimesSync(path.join(source, "keymaps.yaml"), mtime, mtime);

        await unpack(await pack(source, [keymaps]), destination);

        expect(fs.statSync(path.join(destination, "keymaps.yaml")).mtime.getTime()).toBe(mtime.getTime());
    });
});
