import type { JsonValue } from "./json-value.js";

export interface StateRecord {
    readonly kind: string;
    readonly physicalId: string;
    /** properties as resolved and sent to the provider on the last apply */
    readonly properties: Readonly<Record<string, JsonValue>>;
    readonly outputs: Readonly<Record<string, JsonValue>>;
    /** logical ids this resource referenced when it was last applied */
    readonly dependencies: readonly string[];
    readonly templateHash: string;
    readonly updatedAt: string;
}

export interface StackSnapshot {
    readonly stackName: string;
    readonly serial: number;
    readonly templateHash: string | null;
    readonly outputs: Readonly<Record<string, JsonValue>>;
    readonly records: Readonly<Record<string, StateRecord>>;
}

export function emptySnapshot(stackName: string): StackSnapshot {
    return {
        stackName,
        serial: 0,
        templateHash: null,
        outputs: {},
        records: {},
    };
}
