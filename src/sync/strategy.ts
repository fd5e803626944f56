import type { ConflictStrategy } from "../config/types.js";

/** Which side wins a conflict; pending leaves the decision to the user. */
export type Resolution = "local" | "remote" | "pending";

export interface ConflictTimes {
    /** Local modification time (ms since epoch) */
    localTime: number;
    /** Remote record modification time (ms since epoch) */
    remoteTime: number;
}

/**
 * Where the conflict was found.
 * - `item`: a whole item (an unparseable document or an archive)
 * - `value`: a single value inside a structured merge
 */
export type ConflictScope = "item" | "value";

/**
 * Decide a conflict according to the configured strategy.
 * `merge` prefers local for single values and falls back to `newest` for whole
 * items. Ties between equal timestamps go to local.
 */
export function resolveConflict(
    strategy: ConflictStrategy,
    times: ConflictTimes,
    scope: ConflictScope = "item",
): Resolution {
    switch (strategy) {
        case "local":
            return "local";
        case "cloud":
            return "remote";
        case "manual":
            return "pending";
        case "oldest":
            return times.localTime <= times.remoteTime ? "local" : "remote";
        case "newest":
            return times.localTime >= times.remoteTime ? "local" : "remote";
        case "merge":
            return scope === "value" ? "local" : resolveConflict("newest", times, scope);
    }
}
