export const DANGEROUS_KEYS: ReadonlySet<string> = new Set([
    "__proto__",
    "constructor",
    "prototype",
]);
export const MAX_DEPTH = 64;

function describePath(path: readonly string[]): string {
    return path.length === 0 ? "(root)" : path.join(".");
}

function strip(value: unknown, path: string[]): unknown {
    if (value === null || typeof value !== "object") {
        return value;
    }
    if (path.length > MAX_DEPTH) {
        throw new Error(
            `Document nesting exceeds ${MAX_DEPTH} levels at ${describePath(path)}`,
        );
    }
    if (Array.isArray(value)) {
        return value.map((item, index) => strip(item, [...path, String(index)]));
    }
    const result: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
        if (!DANGEROUS_KEYS.has(key)) {
            result[key] = strip(member, [...path, key]);
        }
    }
    return result;
}

/**
 * Returns a copy of a parsed JSON document without prototype-polluting keys.
 * Throws when the document nests deeper than {@link MAX_DEPTH}.
 */
export function stripDangerousKeys(value: unknown): unknown {
    return strip(value, []);
}

export function parseSanitizedJson(jsonString: string, label: string): unknown {
    let rawData: unknown;
    try {
        rawData = JSON.parse(jsonString);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid ${label}: not valid JSON (${message})`);
    }
    try {
        return stripDangerousKeys(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid ${label}: could not sanitize input (${message})`);
    }
}
