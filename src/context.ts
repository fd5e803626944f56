import * as path from "node:path";
import { getConfigHome, loadConfig, saveRecordId } from "./config/loader.js";
import type { TermsyncConfig } from "./config/types.js";
import { Logger, type LogLevel } from "./daemon/logger.js";
import { BackupManager } from "./sync/backup.js";
import { ReconciliationEngine } from "./sync/engine.js";
import { createMechanisms } from "./sync/mechanisms.js";
import { MetadataStore } from "./sync/metadata.js";
import { CloudTransport, type HttpMechanism } from "./sync/transport.js";

export interface ContextOptions {
    /** Directory containing .termsync.yml (defaults to ~/.termsync) */
    configDir?: string;
    env?: NodeJS.ProcessEnv;
    /** Log directory (defaults to <configDir>/logs) */
    logDir?: string;
    logLevel?: LogLevel;
    /** Echo log lines to the console */
    echo?: boolean;
    /** Replaces the configured fallback chain */
    mechanisms?: HttpMechanism[];
}

/**
 * Everything one sync target needs, built once and torn down with close().
 */
export interface SyncContext {
    configDir: string;
    config: TermsyncConfig;
    logger: Logger;
    metadata: MetadataStore;
    backups: BackupManager;
    transport: CloudTransport;
    engine: ReconciliationEngine;
    close(): void;
}

/**
 * Load the configuration and wire up the sync components.
 */
export function openContext(options: ContextOptions = {}): SyncContext {
    const configDir = options.configDir ?? getConfigHome();
    const config = loadConfig(configDir, options.env ?? process.env);

    const logger = new Logger({
        logDir: options.logDir ?? path.join(configDir, "logs"),
        maxLogSizeMB: config.maxLogSizeMB,
        maxLogFiles: config.maxLogFiles,
        level: options.logLevel,
        echo: options.echo,
    });

    const metadata = new MetadataStore(config.configRoot, logger);
    const backups = new BackupManager(config.configRoot, config.items, config.maxBackups, logger);
    const transport = new CloudTransport(
        config.store,
        options.mechanisms ?? createMechanisms(config.store.mechanisms),
        backups,
        logger,
    );
    const engine = new ReconciliationEngine({
        config,
        transport,
        backups,
        metadata,
        log: logger,
        onRecordCreated: (recordId) => {
            saveRecordId(configDir, recordId);
            logger.info(`Saved record id ${recordId} to ${configDir}`);
        },
    });

    logger.debug(`Context opened for ${config.configRoot} (${config.items.length} item(s))`);

    return {
        configDir,
        config,
        logger,
        metadata,
        backups,
        transport,
        engine,
        close: () => {
            logger.debug("Context closed");
            logger.close();
        },
    };
}
