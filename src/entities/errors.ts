export type ReconcileErrorCode =
    | "CYCLE"
    | "UNRESOLVED_REFERENCE"
    | "PLAN_CONFLICT"
    | "PROVIDER"
    | "TIMEOUT"
    | "LEASE_CONFLICT";

export abstract class ReconcileError extends Error {
    abstract readonly code: ReconcileErrorCode;
}

export class CycleError extends ReconcileError {
    override readonly code = "CYCLE";

    constructor(readonly cycle: readonly string[]) {
        super(`Dependency cycle detected: ${cycle.join(" -> ")}`);
        this.name = "CycleError";
    }
}

export class UnresolvedReferenceError extends ReconcileError {
    override readonly code = "UNRESOLVED_REFERENCE";

    constructor(
        readonly referencedBy: string,
        readonly target: string,
        detail = "is not declared in the template",
    ) {
        super(`${referencedBy} references "${target}", which ${detail}`);
        this.name = "UnresolvedReferenceError";
    }
}

export class PlanConflictError extends ReconcileError {
    override readonly code = "PLAN_CONFLICT";

    constructor(
        readonly physicalName: string,
        readonly claimants: readonly string[],
        reason: string,
    ) {
        super(
            `Physical name "${physicalName}" is claimed by ${claimants.join(", ")}: ${reason}`,
        );
        this.name = "PlanConflictError";
    }
}

export interface ProviderErrorOptions {
    readonly transient: boolean;
    readonly cause?: unknown;
}

export class ProviderError extends ReconcileError {
    override readonly code = "PROVIDER";
    readonly transient: boolean;

    constructor(message: string, options: ProviderErrorOptions) {
        super(message, { cause: options.cause });
        this.name = "ProviderError";
        this.transient = options.transient;
    }
}

export class TimeoutError extends ReconcileError {
    override readonly code = "TIMEOUT";

    constructor(
        readonly resourceId: string,
        readonly timeoutMs: number,
    ) {
        super(
            `${resourceId} did not reach a terminal state within ${timeoutMs}ms`,
        );
        this.name = "TimeoutError";
    }
}

export class LeaseConflictError extends ReconcileError {
    override readonly code = "LEASE_CONFLICT";

    constructor(
        readonly resourceId: string,
        readonly holder: string,
    ) {
        super(`${resourceId} is leased by ${holder}`);
        this.name = "LeaseConflictError";
    }
}

export function isTransientProviderError(error: unknown): boolean {
    return error instanceof ProviderError && error.transient;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
