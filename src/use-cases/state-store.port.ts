import type { JsonValue } from "../entities/json-value.js";
import type { StackSnapshot, StateRecord } from "../entities/state-record.js";

/**
 * Durable record of what was last applied for one stack.
 *
 * Only the executor and the apply flow write; planning and drift detection
 * work from {@link StateStore.snapshot}, which never changes after it is taken.
 */
export interface StateStore {
    get(resourceId: string): StateRecord | undefined;
    put(resourceId: string, record: StateRecord): Promise<void>;
    delete(resourceId: string): Promise<void>;
    snapshot(): StackSnapshot;
    recordApply(
        templateHash: string,
        outputs: Readonly<Record<string, JsonValue>>,
    ): Promise<void>;
}
