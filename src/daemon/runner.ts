import { openContext, type SyncContext } from "../context.js";
import { LifecycleSync } from "../sync/lifecycle.js";
import { ProcessMonitor, type ProcessProbe } from "../sync/monitor.js";
import { errorMessage } from "../utils/guards.js";

export interface WatchHandle {
    monitor: ProcessMonitor;
    lifecycle: LifecycleSync;
    /** Stop polling and wait for the cycle in flight */
    stop(): Promise<void>;
}

/**
 * Run an initial sync, then follow the monitored application's lifecycle.
 */
export async function startWatch(context: SyncContext, probe?: ProcessProbe): Promise<WatchHandle> {
    const { config, engine, logger } = context;

    const monitor = new ProcessMonitor({
        processName: config.monitor.processName,
        pollInterval: config.monitor.pollInterval,
        probe,
    });
    monitor.on("error", (err: unknown) => {
        logger.warn(`Process probe failed: ${errorMessage(err)}`);
    });

    logger.info("Initial sync...");
    await engine.sync("auto");

    // Baseline before the first event so a start during setup is not missed
    await monitor.poll();

    const lifecycle = new LifecycleSync(monitor, engine, logger);
    await lifecycle.start();
    logger.info(
        `Watching for ${config.monitor.processName} (poll: ${config.monitor.pollInterval}ms)`,
    );

    return {
        monitor,
        lifecycle,
        stop: () => lifecycle.stop(),
    };
}

/**
 * Run watch mode in the foreground until SIGINT or SIGTERM.
 * @param configDir Directory containing the config file (defaults to ~/.termsync)
 */
export async function runWatch(configDir?: string): Promise<void> {
    const context = openContext({ configDir, echo: true });
    const { logger } = context;

    let handle: WatchHandle;
    try {
        handle = await startWatch(context);
    } catch (err) {
        context.close();
        throw err;
    }

    await new Promise<void>((resolve) => {
        let stopping = false;
        const shutdown = (): void => {
            if (stopping) return;
            stopping = true;
            logger.info("Shutdown signal received. Waiting for the current sync...");
            process.off("SIGTERM", shutdown);
            process.off("SIGINT", shutdown);
            handle.stop().then(
                () => logger.info("Watch stopped."),
                (err: unknown) => logger.error(`Error while stopping: ${errorMessage(err)}`),
            ).finally(() => {
                context.close();
                resolve();
            });
        };

        process.on("SIGTERM", shutdown);
        process.on("SIGINT", shutdown);
    });
}
