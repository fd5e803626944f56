import { isDeepStrictEqual } from "node:util";
import * as yaml from "yaml";
import type { ConflictStrategy } from "../config/types.js";
import { ParseError } from "./errors.js";
import { resolveConflict, type ConflictTimes } from "./strategy.js";
import { errorMessage, isRecord } from "../utils/guards.js";

export type MergeOutcome =
    | {
          status: "merged";
          /** Serialized document, map keys sorted */
          text: string;
          /** Key paths where both sides differed and the strategy picked one */
          conflicts: string[];
      }
    | {
          status: "pending";
          /** Key paths that need a decision */
          conflicts: string[];
      };

/**
 * Parse a settings document. The top level must be a map; an empty document
 * counts as an empty map.
 */
export function parseConfigDocument(text: string, label = "document"): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = yaml.parse(text);
    } catch (err) {
        throw new ParseError(`${label} is not valid YAML: ${errorMessage(err)}`, { cause: err });
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
        throw new ParseError(`${label} must contain a map at the top level`);
    }
    return parsed;
}

/**
 * Serialize a settings document with sorted map keys.
 */
export function serializeConfigDocument(document: Record<string, unknown>): string {
    return yaml.stringify(document, { sortMapEntries: true });
}

type Identifier = "id" | "name";

function identifierOf(list: unknown[]): Identifier | null {
    for (const key of ["id", "name"] as const) {
        const seen = new Set<unknown>();
        const usable = list.every((entry) => {
            if (!isRecord(entry)) return false;
            const value = entry[key];
            if (typeof value !== "string" && typeof value !== "number") return false;
            if (seen.has(value)) return false;
            seen.add(value);
            return true;
        });
        if (usable) return key;
    }
    return null;
}

class DocumentMerger {
    readonly conflicts: string[] = [];
    pending = false;

    constructor(
        private strategy: ConflictStrategy,
        private times: ConflictTimes,
    ) {}

    mergeMaps(local: Record<string, unknown>, remote: Record<string, unknown>, at: string): Record<string, unknown> {
        const merged: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(local)) {
            merged[key] = Object.hasOwn(remote, key)
                ? this.mergeValues(value, remote[key], at ? `${at}.${key}` : key)
                : value;
        }
        for (const [key, value] of Object.entries(remote)) {
            if (!Object.hasOwn(local, key)) merged[key] = value;
        }
        return merged;
    }

    private mergeValues(local: unknown, remote: unknown, at: string): unknown {
        if (isDeepStrictEqual(local, remote)) return local;

        if (isRecord(local) && isRecord(remote)) {
            return this.mergeMaps(local, remote, at);
        }

        if (Array.isArray(local) && Array.isArray(remote)) {
            const key = identifierOf(local);
            if (key !== null && identifierOf(remote) === key) {
                return this.mergeLists(local, remote, key, at);
            }
        }

        return this.decide(local, remote, at);
    }

    /**
     * Local entries in local order, then entries only the remote has.
     */
    private mergeLists(local: unknown[], remote: unknown[], key: Identifier, at: string): unknown[] {
        const remoteById = new Map<unknown, unknown>();
        for (const entry of remote) {
            if (isRecord(entry)) remoteById.set(entry[key], entry);
        }

        const localIds = new Set<unknown>();
        const merged = local.map((entry) => {
            if (!isRecord(entry)) return entry;
            const id = entry[key];
            localIds.add(id);
            if (!remoteById.has(id)) return entry;
            const other = remoteById.get(id);
            return isDeepStrictEqual(entry, other) ? entry : this.decide(entry, other, `${at}[${key}=${String(id)}]`);
        });

        for (const entry of remote) {
            if (isRecord(entry) && !localIds.has(entry[key])) merged.push(entry);
        }
        return merged;
    }

    private decide(local: unknown, remote: unknown, at: string): unknown {
        this.conflicts.push(at);
        const resolution = resolveConflict(this.strategy, this.times, "value");
        if (resolution === "pending") {
            this.pending = true;
            return local;
        }
        return resolution === "local" ? local : remote;
    }
}

/**
 * Structurally merge two versions of the settings document.
 * Throws ParseError when either side does not parse to a map.
 */
export function mergeDocuments(
    localText: string,
    remoteText: string,
    strategy: ConflictStrategy,
    times: ConflictTimes,
): MergeOutcome {
    const local = parseConfigDocument(localText, "local document");
    const remote = parseConfigDocument(remoteText, "remote document");

    const merger = new DocumentMerger(strategy, times);
    const merged = merger.mergeMaps(local, remote, "");

    if (merger.pending) {
        return { status: "pending", conflicts: merger.conflicts };
    }
    return { status: "merged", text: serializeConfigDocument(merged), conflicts: merger.conflicts };
}
