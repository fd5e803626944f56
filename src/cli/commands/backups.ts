import { openContext } from "../../context.js";
import { errorMessage } from "../../utils/guards.js";

interface BackupOptions {
    config?: string;
    rollback?: boolean;
}

export function listBackupsCommand(options: BackupOptions): void {
    try {
        const context = openContext({ configDir: options.config });
        try {
            const backups = context.engine.listBackups();
            if (backups.length === 0) {
                console.log("No backups.");
                return;
            }
            for (const entry of backups) {
                const names = entry.items.map((item) => item.name).join(", ");
                console.log(`${entry.id}  ${new Date(entry.createdAt).toLocaleString()}  ${entry.reason}  [${names}]`);
            }
        } finally {
            context.close();
        }
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}

export async function restoreCommand(id: string, options: BackupOptions): Promise<void> {
    try {
        const context = openContext({ configDir: options.config });
        try {
            if (options.rollback) {
                const entry = await context.engine.rollback(id);
                console.log(`Rolled back to backup ${entry.id}.`);
                return;
            }

            const outcome = await context.engine.restore(id);
            if (outcome.ok) {
                console.log(`Restored backup ${outcome.entry.id}.`);
                console.log(`Previous state saved as backup ${outcome.safety.id}.`);
                return;
            }

            console.error(`Error: ${outcome.error}`);
            if (outcome.rollbackId !== undefined) {
                console.error(`To undo the restore, run: termsync restore ${outcome.rollbackId} --rollback`);
            }
            process.exitCode = 1;
        } finally {
            context.close();
        }
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}
