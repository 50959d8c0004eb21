import type { JsonValue } from "./json-value.js";

export interface FieldDifference {
    readonly path: string;
    readonly expected: JsonValue | undefined;
    readonly actual: JsonValue | undefined;
}

interface DriftEventBase {
    readonly resourceId: string;
    readonly resourceKind: string;
    readonly physicalId: string;
}

export interface ModifiedDriftEvent extends DriftEventBase {
    readonly type: "modified";
    readonly differences: readonly FieldDifference[];
}

export interface DeletedDriftEvent extends DriftEventBase {
    readonly type: "deleted";
}

export interface UnreadableDriftEvent extends DriftEventBase {
    readonly type: "unreadable";
    readonly error: string;
}

export type DriftEvent =
    | ModifiedDriftEvent
    | DeletedDriftEvent
    | UnreadableDriftEvent;

export interface DriftReport {
    readonly stackName: string;
    readonly checkedAt: string;
    readonly checked: number;
    readonly events: readonly DriftEvent[];
}

export function hasDrift(report: DriftReport): boolean {
    return report.events.some((event) => event.type !== "unreadable");
}
