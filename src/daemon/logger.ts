import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigHome } from "../config/loader.js";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * What the sync core needs from a logger.
 */
export interface Log {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/** Discards everything; the default when no logger is wired in. */
export const silentLog: Log = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Lowest level written (default: info) */
    level?: LogLevel;
    /** Also print info and above to the console */
    echo?: boolean;
}

export class Logger implements Log {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;
    private level: LogLevel;
    private echo: boolean;
    private fd: number | null = null;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? path.join(getConfigHome(), "logs");
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.level = options.level ?? "info";
        this.echo = options.echo ?? false;
        this.logFile = path.join(this.logDir, "termsync.log");
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    debug(message: string): void {
        this.write("debug", message);
    }

    info(message: string): void {
        this.write("info", message);
    }

    warn(message: string): void {
        this.write("warn", message);
    }

    error(message: string): void {
        this.write("error", message);
    }

    /**
     * Release the log file. Later writes reopen it.
     */
    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }

    private write(level: LogLevel, message: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level.toUpperCase()}] ${message}\n`;

        this.rotateIfNeeded();
        if (this.fd === null) {
            this.fd = fs.openSync(this.logFile, "a");
        }
        fs.writeSync(this.fd, line);

        if (this.echo && level !== "debug") {
            if (level === "error" || level === "warn") {
                console.error(message);
            } else {
                console.log(message);
            }
        }
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile)) return;

            const stat = fs.statSync(this.logFile);
            if (stat.size < this.maxLogSize) return;

            this.close();

            // Shift existing numbered logs; the oldest falls off
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = path.join(this.logDir, `termsync.${i}.log`);
                const to = path.join(this.logDir, `termsync.${i + 1}.log`);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, to);
                    }
                }
            }

            fs.renameSync(this.logFile, path.join(this.logDir, "termsync.1.log"));
        } catch {
            // If rotation fails, continue writing to current log
        }
    }
}
