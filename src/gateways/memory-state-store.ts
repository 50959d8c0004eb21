import type { JsonValue } from "../entities/json-value.js";
import {
    emptySnapshot,
    type StackSnapshot,
    type StateRecord,
} from "../entities/state-record.js";
import type { StateStore } from "../use-cases/state-store.port.js";

export function createMemoryStateStore(
    stackName: string,
    initial: StackSnapshot = emptySnapshot(stackName),
): StateStore {
    let state: StackSnapshot = { ...initial, records: { ...initial.records } };

    const commit = (next: Omit<StackSnapshot, "serial" | "stackName">) => {
        state = { ...next, stackName: state.stackName, serial: state.serial + 1 };
    };

    return {
        get: (resourceId) => state.records[resourceId],
        async put(resourceId: string, record: StateRecord): Promise<void> {
            commit({ ...state, records: { ...state.records, [resourceId]: record } });
        },
        async delete(resourceId: string): Promise<void> {
            const { [resourceId]: _removed, ...records } = state.records;
            commit({ ...state, records });
        },
        snapshot: () => state,
        async recordApply(
            templateHash: string,
            outputs: Readonly<Record<string, JsonValue>>,
        ): Promise<void> {
            commit({ ...state, templateHash, outputs });
        },
    };
}
