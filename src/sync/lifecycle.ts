import type { Log } from "../daemon/logger.js";
import { silentLog } from "../daemon/logger.js";
import type { SyncMode, SyncResult } from "./engine.js";
import type { LifecycleEvent, ProcessMonitor } from "./monitor.js";
import { errorMessage } from "../utils/guards.js";

/**
 * The part of the engine watch mode drives.
 */
export interface SyncRunner {
    sync(mode?: SyncMode): Promise<SyncResult>;
    localFingerprints(): Promise<Map<string, string | null>>;
}

function sameFingerprints(a: Map<string, string | null>, b: Map<string, string | null>): boolean {
    if (a.size !== b.size) return false;
    for (const [name, fingerprint] of a) {
        if (b.get(name) !== fingerprint) return false;
    }
    return true;
}

/**
 * Watch mode: a reconciliation cycle when the application starts (picking up
 * remote changes before it reads its configuration), and another when it
 * stops, but only if the configuration changed in the meantime.
 *
 * Events are handled one at a time; stop() waits for the cycle in flight.
 */
export class LifecycleSync {
    private monitor: ProcessMonitor;
    private runner: SyncRunner;
    private log: Log;
    private baseline: Map<string, string | null> | null = null;
    private chain: Promise<void> = Promise.resolve();
    private active = false;
    private lastResult: SyncResult | null = null;

    private readonly onStarted = (event: LifecycleEvent): void => {
        this.enqueue(() => this.handleStarted(event));
    };

    private readonly onStopped = (event: LifecycleEvent): void => {
        this.enqueue(() => this.handleStopped(event));
    };

    constructor(monitor: ProcessMonitor, runner: SyncRunner, log: Log = silentLog) {
        this.monitor = monitor;
        this.runner = runner;
        this.log = log;
    }

    /**
     * Record the current fingerprints and start listening.
     */
    async start(): Promise<void> {
        if (this.active) return;
        this.active = true;
        this.baseline = await this.runner.localFingerprints();
        this.monitor.on("started", this.onStarted);
        this.monitor.on("stopped", this.onStopped);
        this.monitor.start();
    }

    /**
     * Stop listening and wait for the cycle in flight, if any.
     */
    async stop(): Promise<void> {
        this.active = false;
        this.monitor.stop();
        this.monitor.off("started", this.onStarted);
        this.monitor.off("stopped", this.onStopped);
        await this.chain;
    }

    /**
     * Result of the most recent cycle this instance ran.
     */
    getLastResult(): SyncResult | null {
        return this.lastResult;
    }

    async handleStarted(event: LifecycleEvent): Promise<SyncResult> {
        this.log.info(`${event.processName} started; syncing`);
        return this.runCycle();
    }

    /**
     * @returns The cycle's result, or null when nothing changed locally
     */
    async handleStopped(event: LifecycleEvent): Promise<SyncResult | null> {
        const current = await this.runner.localFingerprints();
        if (this.baseline !== null && sameFingerprints(this.baseline, current)) {
            this.log.info(`${event.processName} stopped; configuration unchanged, nothing to upload`);
            return null;
        }
        this.log.info(`${event.processName} stopped; configuration changed, syncing`);
        return this.runCycle();
    }

    private async runCycle(): Promise<SyncResult> {
        const result = await this.runner.sync("auto");
        this.lastResult = result;
        this.baseline = await this.runner.localFingerprints();
        return result;
    }

    private enqueue(task: () => Promise<unknown>): void {
        this.chain = this.chain.then(task).then(
            () => undefined,
            (err: unknown) => {
                this.log.error(`Watch cycle failed: ${errorMessage(err)}`);
            },
        );
    }
}
