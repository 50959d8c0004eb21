import { z } from "zod";

const LOGICAL_ID_REGEX = /^[A-Za-z0-9]+$/;

const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// Template documents use the CloudFormation PascalCase keys
const ParameterSchema = z.object({
    Type: z.string().min(1),
    Default: ParameterValueSchema.optional(),
    Description: z.string().optional(),
});

const ResourceSchema = z.object({
    Type: z.string().min(1),
    Properties: z.record(z.unknown()).default({}),
    DependsOn: z.union([z.string(), z.array(z.string())]).optional(),
});

const OutputSchema = z.object({
    Value: z.unknown().refine((value) => value !== undefined, {
        message: "Required",
    }),
    Description: z.string().optional(),
    Export: z.object({ Name: z.string().min(1) }).optional(),
});

const LogicalIdSchema = z
    .string()
    .regex(LOGICAL_ID_REGEX, "logical ids must be alphanumeric");

export const StackTemplateSchema = z.object({
    AWSTemplateFormatVersion: z.string().optional(),
    Description: z.string().optional(),
    Parameters: z.record(LogicalIdSchema, ParameterSchema).default({}),
    Resources: z
        .record(LogicalIdSchema, ResourceSchema)
        .refine((resources) => Object.keys(resources).length > 0, {
            message: "template must declare at least one resource",
        }),
    Outputs: z.record(LogicalIdSchema, OutputSchema).default({}),
});

export type TemplateDocument = z.infer<typeof StackTemplateSchema>;
export type ParameterValue = z.infer<typeof ParameterValueSchema>;
