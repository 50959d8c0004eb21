export type ChangeAction = "create" | "update" | "replace" | "delete" | "no-op";

/** Replacements run create-before-destroy as two entries. */
export type ReplacePhase = "create-new" | "delete-old";

export interface ChangeSetEntry {
    readonly entryId: string;
    readonly nodeId: string;
    readonly kind: string;
    readonly action: ChangeAction;
    readonly phase?: ReplacePhase | undefined;
    readonly prerequisites: readonly string[];
    readonly changedProperties: readonly string[];
    /** physical id of the resource this entry removes */
    readonly priorPhysicalId?: string | undefined;
}

export interface ChangeSet {
    readonly stackName: string;
    readonly templateHash: string;
    readonly entries: readonly ChangeSetEntry[];
}

export function entryIdFor(
    nodeId: string,
    phase?: ReplacePhase | undefined,
): string {
    return phase === undefined ? nodeId : `${nodeId}#${phase}`;
}

export function isDeletePhase(entry: ChangeSetEntry): boolean {
    return entry.action === "delete" || entry.phase === "delete-old";
}

export function hasChanges(changeSet: ChangeSet): boolean {
    return changeSet.entries.some((entry) => entry.action !== "no-op");
}
