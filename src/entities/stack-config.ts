import type { JsonValue } from "./json-value.js";

export interface StackConfig {
    readonly stackName: string;
    readonly stateDir: string;
    readonly parameters: Readonly<Record<string, string | number | boolean>>;
    readonly imports: Readonly<Record<string, JsonValue>>;
    readonly parallelism: number;
    readonly maxAttempts: number;
    readonly initialBackoffMs: number;
    readonly maxBackoffMs: number;
    readonly operationTimeoutMs: number;
    readonly leaseTtlMs: number;
    readonly driftIntervalMs: number;
    readonly rollbackFailedCreates: boolean;
}
