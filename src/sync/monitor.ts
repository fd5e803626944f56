import { EventEmitter } from "node:events";
import { findProcesses } from "../daemon/process.js";

/** Whether the monitored application is running right now. */
export type ProcessProbe = () => boolean | Promise<boolean>;

export interface ProcessMonitorOptions {
    /** Process name to look for (case-insensitive, `.exe` optional) */
    processName: string;
    /** Poll interval in milliseconds */
    pollInterval: number;
    /** Replaces the process table lookup */
    probe?: ProcessProbe;
}

export interface LifecycleEvent {
    type: "started" | "stopped";
    processName: string;
    /** ms since epoch */
    time: number;
}

/**
 * Polls for the monitored application and emits 'started' / 'stopped' on
 * transitions only. The first poll sets the baseline without emitting.
 * Probe failures are emitted as 'error'.
 */
export class ProcessMonitor extends EventEmitter {
    private options: ProcessMonitorOptions;
    private probe: ProcessProbe;
    private timer: NodeJS.Timeout | null = null;
    private polling = false;
    private lastRunning: boolean | null = null;

    constructor(options: ProcessMonitorOptions) {
        super();
        this.options = options;
        this.probe = options.probe ?? (() => findProcesses(options.processName).length > 0);
    }

    /**
     * Start polling.
     */
    start(): void {
        if (this.timer !== null) return;

        this.timer = setInterval(() => {
            this.poll().catch((err: unknown) => {
                this.emit("error", err);
            });
        }, this.options.pollInterval);
    }

    /**
     * Stop polling. The baseline is forgotten.
     */
    stop(): void {
        if (this.timer !== null) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.lastRunning = null;
    }

    /**
     * Check if the monitor is currently polling.
     */
    isRunning(): boolean {
        return this.timer !== null;
    }

    /**
     * Last observed state; null before the first poll.
     */
    isApplicationRunning(): boolean | null {
        return this.lastRunning;
    }

    /**
     * Probe once and emit on a transition. Overlapping calls are skipped.
     */
    async poll(): Promise<void> {
        if (this.polling) return;
        this.polling = true;
        try {
            const running = await this.probe();
            const previous = this.lastRunning;
            this.lastRunning = running;

            if (previous !== null && running !== previous) {
                this.emit(running ? "started" : "stopped", {
                    type: running ? "started" : "stopped",
                    processName: this.options.processName,
                    time: Date.now(),
                } satisfies LifecycleEvent);
            }
        } finally {
            this.polling = false;
        }
    }
}
