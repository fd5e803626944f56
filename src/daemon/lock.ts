import * as fs from "node:fs";
import * as path from "node:path";
import { LockError } from "../sync/errors.js";
import { errorCode } from "../utils/guards.js";
import { isProcessRunning } from "./process.js";

/**
 * Cross-process lock on a configuration root: a file holding the owner's PID.
 * A lock left behind by a process that is no longer running is taken over.
 */
export class RunLock {
    readonly filePath: string;
    private held = false;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    /**
     * Read the PID from the lock file.
     * Returns null if there is no lock file or it holds no PID.
     */
    readOwner(): number | null {
        let content: string;
        try {
            content = fs.readFileSync(this.filePath, "utf-8").trim();
        } catch {
            return null;
        }
        const pid = parseInt(content, 10);
        return isNaN(pid) ? null : pid;
    }

    /**
     * Whether a running process other than this one holds the lock.
     */
    isHeldElsewhere(): boolean {
        const owner = this.readOwner();
        return owner !== null && owner !== process.pid && isProcessRunning(owner);
    }

    /**
     * Take the lock. Throws LockError when a running process holds it.
     */
    acquire(): void {
        if (this.held) {
            throw new LockError(`Lock ${this.filePath} is already held by this process`);
        }
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        for (let attempt = 0; attempt < 2; attempt++) {
            try {
                fs.writeFileSync(this.filePath, String(process.pid), { encoding: "utf-8", flag: "wx" });
                this.held = true;
                return;
            } catch (err) {
                if (errorCode(err) !== "EEXIST") throw err;
            }

            const owner = this.readOwner();
            if (owner !== null && isProcessRunning(owner)) {
                throw new LockError(`Another sync is in progress (PID: ${owner})`);
            }
            // Stale lock from a process that is gone
            fs.rmSync(this.filePath, { force: true });
        }

        throw new LockError(`Could not acquire ${this.filePath}`);
    }

    /**
     * Remove the lock file if this instance holds it.
     */
    release(): void {
        if (!this.held) return;
        this.held = false;
        if (this.readOwner() === process.pid) {
            fs.rmSync(this.filePath, { force: true });
        }
    }
}
