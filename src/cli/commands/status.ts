import { openContext, type SyncContext } from "../../context.js";
import { getConfigHome } from "../../config/loader.js";
import { errorMessage } from "../../utils/guards.js";

interface StatusOptions {
    config?: string;
    remote?: boolean;
}

function formatTime(ms: number | null): string {
    return ms === null || ms === 0 ? "never" : new Date(ms).toLocaleString();
}

export async function statusCommand(options: StatusOptions = {}): Promise<void> {
    const configDir = options.config ?? getConfigHome();
    console.log("=== termsync Status ===\n");
    console.log(`Config dir: ${configDir}`);

    let context: SyncContext;
    try {
        context = openContext({ configDir });
    } catch (err) {
        console.log(`Config: not loaded (${errorMessage(err)})`);
        console.log("Run 'termsync init' to create one.");
        return;
    }

    try {
        const { config, engine, transport } = context;
        const status = await engine.status();

        console.log(`Config root: ${config.configRoot}`);
        console.log(`Conflict strategy: ${config.conflictStrategy}`);
        console.log(`Token: ${config.store.token !== "" ? "set" : "missing"}`);
        console.log(`Record: ${status.recordId !== "" ? status.recordId : "not created yet"}`);
        console.log(`Device: ${status.deviceId}`);
        console.log(`Last sync: ${formatTime(status.lastSyncTime)}`);
        console.log(`Backups: ${status.backups}`);
        console.log(
            status.lockedBy !== null
                ? `Lock: held by PID ${status.lockedBy}`
                : "Lock: free",
        );

        if (options.remote !== false && status.recordId !== "") {
            try {
                console.log(`Remote updated: ${formatTime(await transport.probeRemoteTimestamp())}`);
            } catch (err) {
                console.log(`Remote: unreachable (${errorMessage(err)})`);
            }
        }
        console.log();

        console.log("Items:");
        for (const item of status.items) {
            const icon = item.exists ? "✓" : "✗";
            const change = item.state === null ? "never synced" : item.changed ? "changed" : "in sync";
            console.log(`  ${icon} ${item.name} (${item.type}: ${item.path}) ${change}`);
        }

        if (status.history.length > 0) {
            console.log("\nRecent history:");
            for (const entry of status.history) {
                console.log(`  ${entry.time} ${entry.action} ${entry.item}`);
            }
        }
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
    } finally {
        context.close();
    }
}
