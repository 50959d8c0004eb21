export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
    | JsonPrimitive
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function jsonEquals(
    left: JsonValue | undefined,
    right: JsonValue | undefined,
): boolean {
    if (left === right) {
        return true;
    }
    if (Array.isArray(left) || Array.isArray(right)) {
        if (!Array.isArray(left) || !Array.isArray(right)) {
            return false;
        }
        return (
            left.length === right.length &&
            left.every((item, index) => jsonEquals(item, right[index]))
        );
    }
    if (isJsonObject(left) && isJsonObject(right)) {
        const leftKeys = Object.keys(left);
        if (leftKeys.length !== Object.keys(right).length) {
            return false;
        }
        return leftKeys.every(
            (key) => Object.hasOwn(right, key) && jsonEquals(left[key], right[key]),
        );
    }
    return false;
}

/**
 * Serializes with object keys sorted at every level, so that two structurally
 * equal values always produce the same text.
 */
export function canonicalJson(value: JsonValue): string {
    if (Array.isArray(value)) {
        return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
    }
    if (isJsonObject(value)) {
        const members = Object.keys(value)
            .sort()
            .map((key) => {
                const member = value[key];
                return `${JSON.stringify(key)}:${member === undefined ? "null" : canonicalJson(member)}`;
            });
        return `{${members.join(",")}}`;
    }
    return JSON.stringify(value);
}

export function toJsonValue(value: unknown): JsonValue {
    if (
        value === null ||
        typeof value === "string" ||
        typeof value === "boolean"
    ) {
        return value;
    }
    if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw new Error(`Non-finite number is not valid JSON: ${value}`);
        }
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((item) => toJsonValue(item));
    }
    if (typeof value === "object") {
        const result: Record<string, JsonValue> = {};
        for (const [key, member] of Object.entries(value)) {
            if (member !== undefined) {
                result[key] = toJsonValue(member);
            }
        }
        return result;
    }
    throw new Error(`Value of type ${typeof value} is not valid JSON`);
}
