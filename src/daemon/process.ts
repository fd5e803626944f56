/**
 * Platform-specific process discovery.
 *
 * Used by watch mode to tell whether the terminal application is running,
 * and by the run lock to detect stale owners.
 */
import * as child_process from "node:child_process";
import { errorCode } from "../utils/guards.js";

export interface ProcessInfo {
    pid: number;
    name: string;
}

/**
 * List running processes by executable name. Returns an empty list when the
 * process table cannot be read.
 */
export function listProcesses(): ProcessInfo[] {
    try {
        if (process.platform === "win32") {
            return listProcessesWindows();
        }
        return listProcessesUnix();
    } catch {
        // ps/tasklist missing or not permitted
        return [];
    }
}

function listProcessesWindows(): ProcessInfo[] {
    const output = child_process.execSync("tasklist /FO CSV /NH", {
        encoding: "utf-8",
        timeout: 5000,
        windowsHide: true,
    });
    return parseTasklist(output);
}

/**
 * Parse `tasklist /FO CSV /NH` output: "name","pid",...
 */
export function parseTasklist(output: string): ProcessInfo[] {
    const results: ProcessInfo[] = [];
    for (const line of output.split("\n")) {
        const match = line.trim().match(/^"([^"]+)","(\d+)"/);
        if (match) {
            results.push({ name: match[1], pid: parseInt(match[2], 10) });
        }
    }
    return results;
}

function listProcessesUnix(): ProcessInfo[] {
    const output = child_process.execSync("ps -eo pid,comm", { encoding: "utf-8", timeout: 5000 });
    return parsePs(output);
}

/**
 * Parse `ps -eo pid,comm` output. The command may be a full path.
 */
export function parsePs(output: string): ProcessInfo[] {
    const results: ProcessInfo[] = [];
    for (const line of output.split("\n")) {
        const match = line.trim().match(/^(\d+)\s+(.+)$/);
        if (match) {
            const command = match[2].trim();
            const name = command.split(/[/\\]/).pop() ?? command;
            results.push({ pid: parseInt(match[1], 10), name });
        }
    }
    return results;
}

/**
 * Whether a process name matches, case-insensitively and with `.exe` optional.
 */
export function matchesProcessName(actual: string, wanted: string): boolean {
    const normalize = (name: string): string => name.toLowerCase().replace(/\.exe$/, "");
    return normalize(actual) === normalize(wanted);
}

/**
 * Find running processes with the given name, excluding the current process.
 */
export function findProcesses(name: string): ProcessInfo[] {
    return listProcesses().filter((p) => p.pid !== process.pid && matchesProcessName(p.name, name));
}

/**
 * Check whether a process with the given PID is alive.
 */
export function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (err) {
        // EPERM: alive but owned by another user
        return errorCode(err) === "EPERM";
    }
}
