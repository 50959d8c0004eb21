import { ZodError } from "zod";
import { type JsonValue, toJsonValue } from "../entities/json-value.js";
import { parseSanitizedJson } from "../entities/sanitize-json.js";
import type { StackConfig } from "../entities/stack-config.js";
import { StackConfigSchema } from "./stack-config.schema.js";

export interface StackConfigParser {
    parse(jsonString: string): StackConfig;
    defaults(): StackConfig;
}

// configuration files use snake_case keys
const KEY_MAP: Readonly<Record<string, string>> = {
    stack_name: "stackName",
    state_dir: "stateDir",
    parameters: "parameters",
    imports: "imports",
    parallelism: "parallelism",
    max_attempts: "maxAttempts",
    initial_backoff_ms: "initialBackoffMs",
    max_backoff_ms: "maxBackoffMs",
    operation_timeout_ms: "operationTimeoutMs",
    lease_ttl_ms: "leaseTtlMs",
    drift_interval_ms: "driftIntervalMs",
    rollback_failed_creates: "rollbackFailedCreates",
};

function transformSnakeToCamel(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        result[KEY_MAP[key] ?? key] = value;
    }
    return result;
}

function validate(data: unknown): StackConfig {
    try {
        const config = StackConfigSchema.parse(data);
        if (config.maxBackoffMs < config.initialBackoffMs) {
            throw new Error(
                "Invalid configuration: max_backoff_ms must not be less than initial_backoff_ms",
            );
        }
        const imports: Record<string, JsonValue> = {};
        for (const [name, value] of Object.entries(config.imports)) {
            imports[name] = toJsonValue(value);
        }
        return { ...config, imports };
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new Error(`Invalid configuration: ${details}`);
        }
        throw error;
    }
}

export function createStackConfigParser(): StackConfigParser {
    return {
        parse(jsonString: string): StackConfig {
            const sanitized = parseSanitizedJson(jsonString, "configuration");
            return validate(transformSnakeToCamel(sanitized));
        },
        defaults(): StackConfig {
            return validate({});
        },
    };
}
