import { openContext } from "../../context.js";
import type { SyncMode, SyncResult } from "../../sync/engine.js";
import { errorMessage } from "../../utils/guards.js";

interface SyncOptions {
    config?: string;
    forceUpload?: boolean;
    forceDownload?: boolean;
    verbose?: boolean;
}

const STATUS_LINES: Record<SyncResult["status"], string> = {
    unchanged: "Everything is up to date.",
    synced: "Sync complete.",
    offline: "Store unreachable; changes saved offline.",
    pending: "Conflicts need a decision; nothing was changed.",
    failed: "Sync failed; local files are unchanged.",
};

/**
 * Print a sync result the way every sync-like command reports it.
 */
export function printResult(result: SyncResult): void {
    console.log(STATUS_LINES[result.status]);
    for (const action of result.actions) {
        const symbol = action.action === "upload" ? "↑" : action.action === "download" ? "↓" : "⇅";
        console.log(`  ${symbol} ${action.item}${action.detail ? ` (${action.detail})` : ""}`);
    }
    for (const conflict of result.conflicts ?? []) {
        console.log(`  ! ${conflict}`);
    }
    if (result.status === "pending") {
        console.log("Run 'termsync force-upload' or 'termsync force-download' to decide.");
    }
    if (result.backupId) {
        console.log(`Backup: ${result.backupId}`);
    }
    if (result.offlinePath) {
        console.log(`Offline copy: ${result.offlinePath}`);
    }
    for (const error of result.errors) {
        console.error(`  ✗ ${error}`);
    }
}

async function runSync(mode: SyncMode, options: SyncOptions): Promise<void> {
    try {
        const context = openContext({
            configDir: options.config,
            logLevel: options.verbose ? "debug" : "info",
        });
        try {
            const result = await context.engine.sync(mode);
            printResult(result);
            if (result.status === "failed") {
                process.exitCode = 1;
            }
        } finally {
            context.close();
        }
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}

export async function syncCommand(options: SyncOptions): Promise<void> {
    if (options.forceUpload && options.forceDownload) {
        console.error("Error: --force-upload and --force-download cannot be combined");
        process.exit(1);
    }
    const mode: SyncMode = options.forceUpload
        ? "force-upload"
        : options.forceDownload
            ? "force-download"
            : "auto";
    await runSync(mode, options);
}

export async function forceUploadCommand(options: SyncOptions): Promise<void> {
    await runSync("force-upload", options);
}

export async function forceDownloadCommand(options: SyncOptions): Promise<void> {
    await runSync("force-download", options);
}
