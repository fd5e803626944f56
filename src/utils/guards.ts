/**
 * Narrow an unknown value to a plain string-keyed object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Error code of a failed Node.js system call, if any.
 */
export function errorCode(err: unknown): string | undefined {
    if (isRecord(err) && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}
