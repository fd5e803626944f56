import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
    loadConfig,
    writeDefaultConfig,
    validateConfig,
    saveRecordId,
    defaultConfigRoot,
} from "../src/config/loader.js";
import { CONFIG_DEFAULTS } from "../src/config/types.js";
import { createTempDir, cleanupDir } from "./helpers/temp.js";

describe("Config Loader", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    describe("writeDefaultConfig", () => {
        it("should create a default config file", () => {
            const configPath = writeDefaultConfig(tempDir);
            expect(configPath).toBe(path.join(tempDir, ".termsync.yml"));

            const content = fs.readFileSync(configPath, "utf-8");
            expect(content).toContain("conflictStrategy: newest");
            expect(content).toContain("  - profiles/");
            expect(content).toContain("  mechanisms: [fetch, curl, node-http]");
        });

        it("should throw if config already exists", () => {
            writeDefaultConfig(tempDir);
            expect(() => writeDefaultConfig(tempDir)).toThrow("already exists");
        });
    });

    describe("loadConfig", () => {
        it("should load the default template", () => {
            writeDefaultConfig(tempDir);
            const config = loadConfig(tempDir, {});

            expect(config.conflictStrategy).toBe("newest");
            expect(config.maxBackups).toBe(10);
            expect(config.items.map((item) => item.name)).toEqual([
                "config.yaml",
                "keymaps.yaml",
                "window-config.yaml",
                "vault",
                "profiles",
                "plugins",
                "themes",
            ]);
            expect(config.store.endpoint).toBe("https://api.github.com/gists");
            expect(config.store.token).toBe("");
            expect(config.monitor).toEqual({ processName: "tabby", pollInterval: 5000 });
        });

        it("should throw if config file does not exist", () => {
            expect(() => loadConfig(tempDir)).toThrow("Config file not found");
        });
    });

    describe("validateConfig", () => {
        it("should put the primary document first with no exclusions", () => {
            const config = validateConfig({ configRoot: tempDir, items: [] }, {});
            expect(config.items).toEqual([
                { name: "config.yaml", path: "config.yaml", type: "file", exclude: [], primary: true },
            ]);
            expect(config.configRoot).toBe(path.resolve(tempDir));
        });

        it("should parse string and object items", () => {
            const config = validateConfig(
                {
                    configRoot: tempDir,
                    exclude: ["*.log"],
                    items: [
                        "keymaps.yaml",
                        "profiles/",
                        { name: "plugins", path: "plugins", type: "directory", exclude: ["*.node"] },
                        { path: "themes/dark/" },
                    ],
                },
                {},
            );

            expect(config.items.slice(1)).toEqual([
                { name: "keymaps.yaml", path: "keymaps.yaml", type: "file", exclude: ["*.log"], primary: false },
                { name: "profiles", path: "profiles", type: "directory", exclude: ["*.log"], primary: false },
                { name: "plugins", path: "plugins", type: "directory", exclude: ["*.log", "*.node"], primary: false },
                { name: "themes-dark", path: "themes/dark", type: "directory", exclude: ["*.log"], primary: false },
            ]);
        });

        it("should use the default exclusions when none are given", () => {
            const config = validateConfig({ configRoot: tempDir, items: ["profiles/"] }, {});
            expect(config.items[1].exclude).toEqual([...CONFIG_DEFAULTS.exclude]);
        });

        it("should reject items outside the configuration root", () => {
            expect(() => validateConfig({ configRoot: tempDir, items: ["../secrets"] }, {})).toThrow(
                "items[0] must be a path inside configRoot",
            );
        });

        it("should reject duplicate item paths", () => {
            expect(() =>
                validateConfig({ configRoot: tempDir, items: ["profiles/", { path: "profiles", name: "p2" }] }, {}),
            ).toThrow('items[1] duplicates path "profiles"');
        });

        it("should reject duplicate item names", () => {
            expect(() =>
                validateConfig(
                    { configRoot: tempDir, items: [{ path: "a", name: "same" }, { path: "b", name: "same" }] },
                    {},
                ),
            ).toThrow('items[1] duplicates name "same"');
        });

        it("should reject an unknown conflict strategy", () => {
            expect(() => validateConfig({ configRoot: tempDir, conflictStrategy: "keep-both" }, {})).toThrow(
                "conflictStrategy must be one of",
            );
        });

        it("should reject an unknown mechanism", () => {
            expect(() =>
                validateConfig({ configRoot: tempDir, store: { mechanisms: ["fetch", "carrier-pigeon"] } }, {}),
            ).toThrow("store.mechanisms[1] must be one of: fetch, curl, node-http");
        });

        it("should reject a non-positive maxBackups", () => {
            expect(() => validateConfig({ configRoot: tempDir, maxBackups: 0 }, {})).toThrow(
                "maxBackups must be a positive integer",
            );
        });

        it("should strip a trailing slash from the endpoint", () => {
            const config = validateConfig(
                { configRoot: tempDir, store: { endpoint: "https://store.test/gists/" } },
                {},
            );
            expect(config.store.endpoint).toBe("https://store.test/gists");
        });

        it("should let TERMSYNC_TOKEN override the configured token", () => {
            const config = validateConfig(
                { configRoot: tempDir, store: { token: "from-file" } },
                { TERMSYNC_TOKEN: "test-secret" },
            );
            expect(config.store.token).toBe("test-secret");
        });

        it("should expand ~ in configRoot", () => {
            const config = validateConfig({ configRoot: "~/tabby-test" }, {});
            expect(config.configRoot).toBe(path.join(os.homedir(), "tabby-test"));
        });

        it("should reject a non-object config", () => {
            expect(() => validateConfig("just a string", {})).toThrow("Configuration must be a YAML object");
        });
    });

    describe("defaultConfigRoot", () => {
        it("should follow the platform conventions", () => {
            expect(defaultConfigRoot("linux")).toBe(path.join(os.homedir(), ".config", "tabby"));
            expect(defaultConfigRoot("darwin")).toBe(
                path.join(os.homedir(), "Library", "Application Support", "tabby"),
            );
        });
    });

    describe("saveRecordId", () => {
        it("should write the record id and keep comments", () => {
            writeDefaultConfig(tempDir);
            saveRecordId(tempDir, "rec42");

            const content = fs.readFileSync(path.join(tempDir, ".termsync.yml"), "utf-8");
            expect(content).toContain("# termsync configuration");
            expect(loadConfig(tempDir, {}).store.recordId).toBe("rec42");
        });
    });
});
