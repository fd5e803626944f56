import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import type {
    ConflictStrategy,
    MechanismName,
    MonitorConfig,
    StoreConfig,
    SyncItem,
    TermsyncConfig,
} from "./types.js";
import { CONFIG_DEFAULTS, CONFLICT_STRATEGIES, MECHANISM_NAMES } from "./types.js";
import { isRecord } from "../utils/guards.js";

const ITEM_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Returns the termsync config home directory: ~/.termsync
 * This is where the default config file and the log directory live.
 */
export function getConfigHome(): string {
    return path.join(os.homedir(), ".termsync");
}

/**
 * Default configuration directory of the terminal application for this platform.
 */
export function defaultConfigRoot(platform: NodeJS.Platform = process.platform): string {
    if (platform === "win32") {
        const appData = process.env.APPDATA ?? path.join(os.homedir(), "AppData", "Roaming");
        return path.join(appData, "tabby");
    }
    if (platform === "darwin") {
        return path.join(os.homedir(), "Library", "Application Support", "tabby");
    }
    return path.join(os.homedir(), ".config", "tabby");
}

function expandHome(p: string): string {
    if (p === "~") return os.homedir();
    if (p.startsWith("~/") || p.startsWith("~\\")) {
        return path.join(os.homedir(), p.slice(2));
    }
    return p;
}

function isStrategy(value: unknown): value is ConflictStrategy {
    return CONFLICT_STRATEGIES.some((s) => s === value);
}

function isMechanism(value: unknown): value is MechanismName {
    return MECHANISM_NAMES.some((m) => m === value);
}

function stringList(value: unknown, key: string): string[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw new Error(`${key} must be an array of strings`);
    }
    return value.map((entry, index) => {
        if (typeof entry !== "string" || entry.trim() === "") {
            throw new Error(`${key}[${index}] must be a non-empty string`);
        }
        return entry;
    });
}

/**
 * Normalize an item path: POSIX separators, no leading "./", no trailing "/",
 * and never absolute or escaping the configuration root.
 */
function normalizeItemPath(raw: string, key: string): string {
    const posix = path.posix.normalize(raw.replace(/\\/g, "/")).replace(/\/+$/, "");
    if (posix === "" || posix === "." || path.posix.isAbsolute(posix) || posix.startsWith("..")) {
        throw new Error(`${key} must be a path inside configRoot`);
    }
    return posix;
}

function positiveNumber(value: unknown, fallback: number, key: string): number {
    const result = typeof value === "number" ? value : fallback;
    if (!(result > 0)) {
        throw new Error(`${key} must be a positive number`);
    }
    return result;
}

function parseItem(raw: unknown, index: number, globalExclude: string[]): SyncItem {
    const key = `items[${index}]`;

    if (typeof raw === "string") {
        const isDirectory = raw.endsWith("/") || raw.endsWith("\\");
        const itemPath = normalizeItemPath(raw, key);
        return {
            name: itemPath.replace(/\//g, "-"),
            path: itemPath,
            type: isDirectory ? "directory" : "file",
            exclude: [...globalExclude],
            primary: false,
        };
    }

    if (!isRecord(raw)) {
        throw new Error(`${key} must be a string or an object`);
    }
    if (typeof raw.path !== "string") {
        throw new Error(`${key}.path must be a string`);
    }
    const itemPath = normalizeItemPath(raw.path, `${key}.path`);

    let type: SyncItem["type"];
    if (raw.type === undefined) {
        type = raw.path.endsWith("/") ? "directory" : "file";
    } else if (raw.type === "file" || raw.type === "directory") {
        type = raw.type;
    } else {
        throw new Error(`${key}.type must be "file" or "directory"`);
    }

    const name =
        typeof raw.name === "string" && raw.name.trim() !== ""
            ? raw.name.trim()
            : itemPath.replace(/\//g, "-");

    return {
        name,
        path: itemPath,
        type,
        exclude: [...globalExclude, ...stringList(raw.exclude, `${key}.exclude`)],
        primary: false,
    };
}

function parseStore(raw: unknown, env: NodeJS.ProcessEnv): StoreConfig {
    const s = raw === undefined || raw === null ? {} : raw;
    if (!isRecord(s)) {
        throw new Error("store must be an object");
    }

    const endpoint = typeof s.endpoint === "string" && s.endpoint.trim() !== ""
        ? s.endpoint.trim().replace(/\/+$/, "")
        : CONFIG_DEFAULTS.endpoint;
    try {
        new URL(endpoint);
    } catch {
        throw new Error(`store.endpoint is not a valid URL: ${endpoint}`);
    }

    const envToken = env[CONFIG_DEFAULTS.tokenEnvVar];
    const token = envToken !== undefined && envToken !== ""
        ? envToken
        : typeof s.token === "string" ? s.token : "";

    const recordId = typeof s.recordId === "string" ? s.recordId.trim() : "";

    let mechanisms: MechanismName[] = [...CONFIG_DEFAULTS.mechanisms];
    if (s.mechanisms !== undefined) {
        if (!Array.isArray(s.mechanisms) || s.mechanisms.length === 0) {
            throw new Error("store.mechanisms must be a non-empty array");
        }
        mechanisms = s.mechanisms.map((m: unknown, index: number) => {
            if (!isMechanism(m)) {
                throw new Error(
                    `store.mechanisms[${index}] must be one of: ${MECHANISM_NAMES.join(", ")}`,
                );
            }
            return m;
        });
    }

    return {
        endpoint,
        token,
        recordId,
        timeoutMs: positiveNumber(s.timeoutMs, CONFIG_DEFAULTS.timeoutMs, "store.timeoutMs"),
        mechanisms,
    };
}

function parseMonitor(raw: unknown): MonitorConfig {
    const m = raw === undefined || raw === null ? {} : raw;
    if (!isRecord(m)) {
        throw new Error("monitor must be an object");
    }
    return {
        processName:
            typeof m.processName === "string" && m.processName.trim() !== ""
                ? m.processName.trim()
                : CONFIG_DEFAULTS.processName,
        pollInterval: positiveNumber(
            m.pollInterval,
            CONFIG_DEFAULTS.pollInterval,
            "monitor.pollInterval",
        ),
    };
}

/**
 * Validate a loaded configuration object. Throws on invalid config.
 * @param env Environment consulted for the token override
 */
export function validateConfig(config: unknown, env: NodeJS.ProcessEnv = process.env): TermsyncConfig {
    if (!isRecord(config)) {
        throw new Error("Configuration must be a YAML object");
    }

    const configRoot = path.resolve(
        typeof config.configRoot === "string" && config.configRoot.trim() !== ""
            ? expandHome(config.configRoot.trim())
            : defaultConfigRoot(),
    );

    const exclude = config.exclude === undefined
        ? [...CONFIG_DEFAULTS.exclude]
        : stringList(config.exclude, "exclude");

    const primaryPath = normalizeItemPath(
        typeof config.primaryDocument === "string"
            ? config.primaryDocument
            : CONFIG_DEFAULTS.primaryDocument,
        "primaryDocument",
    );
    const primary: SyncItem = {
        name: primaryPath.replace(/\//g, "-"),
        path: primaryPath,
        type: "file",
        exclude: [],
        primary: true,
    };

    // null means "items:" with nothing below it; undefined means the default set
    let rawItems: unknown[];
    if (config.items === undefined) {
        rawItems = [...CONFIG_DEFAULTS.items];
    } else if (config.items === null) {
        rawItems = [];
    } else if (Array.isArray(config.items)) {
        rawItems = config.items;
    } else {
        throw new Error("items must be an array");
    }

    const items: SyncItem[] = [primary];
    const seenNames = new Set([primary.name]);
    const seenPaths = new Set([primary.path]);
    rawItems.forEach((raw, index) => {
        const item = parseItem(raw, index, exclude);
        if (!ITEM_NAME_PATTERN.test(item.name)) {
            throw new Error(`items[${index}].name may only contain letters, digits, ".", "_" and "-"`);
        }
        if (seenPaths.has(item.path)) {
            throw new Error(`items[${index}] duplicates path "${item.path}"`);
        }
        if (seenNames.has(item.name)) {
            throw new Error(`items[${index}] duplicates name "${item.name}"`);
        }
        seenNames.add(item.name);
        seenPaths.add(item.path);
        items.push(item);
    });

    let conflictStrategy = CONFIG_DEFAULTS.conflictStrategy;
    if (config.conflictStrategy !== undefined) {
        if (!isStrategy(config.conflictStrategy)) {
            throw new Error(`conflictStrategy must be one of: ${CONFLICT_STRATEGIES.join(", ")}`);
        }
        conflictStrategy = config.conflictStrategy;
    }

    const maxBackups =
        typeof config.maxBackups === "number" ? config.maxBackups : CONFIG_DEFAULTS.maxBackups;
    if (maxBackups < 1 || !Number.isInteger(maxBackups)) {
        throw new Error("maxBackups must be a positive integer");
    }

    const maxLogSizeMB = positiveNumber(config.maxLogSizeMB, CONFIG_DEFAULTS.maxLogSizeMB, "maxLogSizeMB");

    const maxLogFiles =
        typeof config.maxLogFiles === "number" ? config.maxLogFiles : CONFIG_DEFAULTS.maxLogFiles;
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new Error("maxLogFiles must be a positive integer");
    }

    return {
        configRoot,
        items,
        conflictStrategy,
        maxBackups,
        store: parseStore(config.store, env),
        monitor: parseMonitor(config.monitor),
        maxLogSizeMB,
        maxLogFiles,
    };
}

/**
 * Load and validate a termsync config from a YAML file.
 * @param configDir Directory containing the config file (defaults to ~/.termsync)
 */
export function loadConfig(configDir?: string, env: NodeJS.ProcessEnv = process.env): TermsyncConfig {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        throw new Error(`Config file not found: ${configPath}`);
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = yaml.parse(raw);
    return validateConfig(parsed, env);
}

/**
 * Persist the id of a newly created remote record into store.recordId,
 * keeping the rest of the file (comments included) as it is.
 */
export function saveRecordId(configDir: string, recordId: string): void {
    const configPath = path.join(configDir, CONFIG_DEFAULTS.configFileName);
    const doc = yaml.parseDocument(fs.readFileSync(configPath, "utf-8"));
    if (doc.errors.length > 0) {
        throw new Error(`Cannot update ${configPath}: ${doc.errors[0].message}`);
    }
    doc.setIn(["store", "recordId"], recordId);
    const tmpPath = `${configPath}.tmp`;
    fs.writeFileSync(tmpPath, doc.toString(), "utf-8");
    fs.renameSync(tmpPath, configPath);
}

/**
 * Write a default .termsync.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to ~/.termsync)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new Error(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# termsync configuration",
        "",
        "# Terminal application config directory (defaults to the platform location)",
        "# configRoot: ~/.config/tabby",
        "",
        "# Primary settings document, merged structurally on conflicts",
        `primaryDocument: ${CONFIG_DEFAULTS.primaryDocument}`,
        "",
        "# Auxiliary items; entries ending in '/' are directories",
        "items:",
        ...CONFIG_DEFAULTS.items.map((item) => `  - ${item}`),
        "",
        "# Base-name patterns never synced, at any depth",
        "exclude:",
        ...CONFIG_DEFAULTS.exclude.map((pattern) => `  - "${pattern}"`),
        "",
        "# Conflict strategy: newest | oldest | local | cloud | merge | manual",
        `conflictStrategy: ${CONFIG_DEFAULTS.conflictStrategy}`,
        "",
        "# Number of backups to keep",
        `maxBackups: ${CONFIG_DEFAULTS.maxBackups}`,
        "",
        "store:",
        `  endpoint: ${CONFIG_DEFAULTS.endpoint}`,
        `  # Access token (the ${CONFIG_DEFAULTS.tokenEnvVar} environment variable takes precedence)`,
        '  token: ""',
        "  # Filled in automatically when the first upload creates the record",
        '  recordId: ""',
        `  timeoutMs: ${CONFIG_DEFAULTS.timeoutMs}`,
        `  mechanisms: [${CONFIG_DEFAULTS.mechanisms.join(", ")}]`,
        "",
        "# Watch mode: sync when the application starts and stops",
        "monitor:",
        `  processName: ${CONFIG_DEFAULTS.processName}`,
        `  pollInterval: ${CONFIG_DEFAULTS.pollInterval}`,
        "",
        "# Log rotation settings (optional)",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
