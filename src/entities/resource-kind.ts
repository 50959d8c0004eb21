export type TerminalState = "ready" | "failed" | "in-progress";

export interface ResourceKindDefinition {
    readonly kind: string;
    readonly service: string;
    /** properties whose change forces a replacement; every other property updates in place */
    readonly replaceOnly: readonly string[];
    /** property that carries a caller-chosen physical name, if the kind has one */
    readonly nameProperty?: string | undefined;
    readonly readyStatuses: readonly string[];
    readonly failedStatuses: readonly string[];
}

const DEFAULT_READY_STATUSES: readonly string[] = ["active", "available"];
const DEFAULT_FAILED_STATUSES: readonly string[] = ["failed"];

export function isMutableProperty(
    definition: ResourceKindDefinition | undefined,
    property: string,
): boolean {
    // unknown kinds are never updated in place
    if (definition === undefined) {
        return false;
    }
    return !definition.replaceOnly.includes(property);
}

export function classifyStatus(
    definition: ResourceKindDefinition | undefined,
    status: string,
): TerminalState {
    const ready = definition?.readyStatuses ?? DEFAULT_READY_STATUSES;
    const failed = definition?.failedStatuses ?? DEFAULT_FAILED_STATUSES;

    if (ready.includes(status)) {
        return "ready";
    }
    if (failed.includes(status)) {
        return "failed";
    }
    return "in-progress";
}
