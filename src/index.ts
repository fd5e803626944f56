export * from "./config/index.js";
export { openContext } from "./context.js";
export type { SyncContext, ContextOptions } from "./context.js";
export * from "./daemon/index.js";
export * from "./sync/index.js";
