import { z } from "zod";

export const STATE_FILE_VERSION = 1;

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

// State files use snake_case like the other documents this tool reads and writes
const StateRecordFileSchema = z.object({
    kind: z.string().min(1),
    physical_id: z.string().min(1),
    properties: z.record(JsonValueSchema),
    outputs: z.record(JsonValueSchema),
    dependencies: z.array(z.string()),
    template_hash: z.string(),
    updated_at: z.string(),
});

export const StateFileSchema = z.object({
    version: z.literal(STATE_FILE_VERSION),
    serial: z.number().int().min(0),
    stack_name: z.string().min(1),
    template_hash: z.string().nullable(),
    outputs: z.record(JsonValueSchema),
    records: z.record(StateRecordFileSchema),
});

export type StateFile = z.infer<typeof StateFileSchema>;
export type StateRecordFile = z.infer<typeof StateRecordFileSchema>;
