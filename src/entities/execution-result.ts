import type { ChangeAction, ReplacePhase } from "./change-set.js";

export type EntryStatus =
    | "succeeded"
    | "failed"
    | "skipped"
    | "cancelled"
    | "no-op";

export interface EntryOutcome {
    readonly entryId: string;
    readonly nodeId: string;
    readonly action: ChangeAction;
    readonly phase?: ReplacePhase | undefined;
    readonly status: EntryStatus;
    readonly attempts: number;
    readonly durationMs: number;
    readonly physicalId?: string | undefined;
    readonly error?: string | undefined;
    /** entry id whose failure or cancellation prevented this one from starting */
    readonly skippedBecause?: string | undefined;
}

export type RunStatus = "succeeded" | "partial-failure";

export interface RunSummary {
    readonly status: RunStatus;
    readonly outcomes: readonly EntryOutcome[];
    readonly succeeded: number;
    readonly failed: number;
    readonly skipped: number;
    readonly cancelled: number;
}

export function summarize(outcomes: readonly EntryOutcome[]): RunSummary {
    const count = (status: EntryStatus) =>
        outcomes.filter((outcome) => outcome.status === status).length;
    const failed = count("failed");
    const skipped = count("skipped");
    const cancelled = count("cancelled");

    return {
        status:
            failed + skipped + cancelled === 0 ? "succeeded" : "partial-failure",
        outcomes,
        succeeded: count("succeeded"),
        failed,
        skipped,
        cancelled,
    };
}
