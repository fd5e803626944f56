export { Logger, silentLog } from "./logger.js";
export type { Log, LogLevel, LoggerOptions } from "./logger.js";
export { RunLock } from "./lock.js";
export { runWatch, startWatch } from "./runner.js";
export type { WatchHandle } from "./runner.js";
export { findProcesses, isProcessRunning, matchesProcessName } from "./process.js";
