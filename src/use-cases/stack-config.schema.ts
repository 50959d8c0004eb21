import { z } from "zod";

const STACK_NAME_REGEX = /^[A-Za-z][A-Za-z0-9-]{0,127}$/;

const JsonValueSchema: z.ZodType<unknown> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ]),
);

export const StackNameSchema = z
    .string()
    .regex(
        STACK_NAME_REGEX,
        "stack_name must start with a letter and contain only letters, numbers, and hyphens",
    );

export const StackConfigSchema = z.object({
    stackName: StackNameSchema.default("main"),
    stateDir: z.string().min(1).default(".stack-reconciler"),
    parameters: z
        .record(z.union([z.string(), z.number(), z.boolean()]))
        .default({}),
    imports: z.record(JsonValueSchema).default({}),
    parallelism: z.number().int().min(1).max(64).default(4),
    maxAttempts: z.number().int().min(1).max(20).default(5),
    initialBackoffMs: z.number().int().min(1).default(250),
    maxBackoffMs: z.number().int().min(1).default(10_000),
    operationTimeoutMs: z.number().int().min(1).default(300_000),
    leaseTtlMs: z.number().int().min(1).default(600_000),
    driftIntervalMs: z.number().int().min(1_000).default(60_000),
    rollbackFailedCreates: z.boolean().default(true),
});
