import { readFile } from "node:fs/promises";
import type { ArgsDef } from "citty";
import { errorMessage, ReconcileError } from "../entities/errors.js";
import type { StackConfig } from "../entities/stack-config.js";
import type { StackTemplate } from "../entities/stack-template.js";
import type { DriftDetector } from "../use-cases/detect-drift.js";
import type { TemplateParser } from "../use-cases/parse-template.js";
import type { StackConfigParser } from "../use-cases/parse-stack-config.js";
import type { StackReconciler } from "../use-cases/reconcile-stack.js";
import type { StateStore } from "../use-cases/state-store.port.js";

export interface ConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface StackRuntime {
    readonly store: StateStore;
    readonly reconciler: StackReconciler;
    readonly driftDetector: DriftDetector;
}

export type OpenStackRuntime = (config: StackConfig) => Promise<StackRuntime>;

export interface ConfigOptions {
    readonly configPath?: string | undefined;
    readonly stackName?: string | undefined;
    readonly stateDir?: string | undefined;
}

export interface StackOptions extends ConfigOptions {
    readonly templatePath: string;
    readonly json?: boolean | undefined;
}

export const EXIT_SUCCESS = 0;
export const EXIT_PARTIAL_FAILURE = 1;
export const EXIT_HARD_FAILURE = 2;

export const configArgs = {
    config: {
        type: "string",
        description: "Path to a stack configuration JSON file",
    },
    stack: {
        type: "string",
        description: "Stack name (overrides stack_name from the configuration)",
    },
    "state-dir": {
        type: "string",
        description: "Directory holding stack state (overrides state_dir)",
    },
    json: {
        type: "boolean",
        description: "Print machine-readable JSON",
        default: false,
    },
} satisfies ArgsDef;

export const stackArgs = {
    template: {
        type: "string",
        description: "Path to the stack template JSON file",
        required: true,
    },
    ...configArgs,
} satisfies ArgsDef;

export async function loadConfig(
    parser: StackConfigParser,
    options: ConfigOptions,
): Promise<StackConfig> {
    const base =
        options.configPath === undefined
            ? parser.defaults()
            : parser.parse(await readFile(options.configPath, "utf-8"));
    return {
        ...base,
        stackName: options.stackName ?? base.stackName,
        stateDir: options.stateDir ?? base.stateDir,
    };
}

export async function loadTemplate(
    parser: TemplateParser,
    templatePath: string,
    config: StackConfig,
): Promise<StackTemplate> {
    const content = await readFile(templatePath, "utf-8");
    return parser.parse(content, { parameters: config.parameters });
}

/** Prints a failure that stops a command before or outside execution. */
export function reportHardFailure(output: ConsoleOutput, error: unknown): number {
    const prefix = error instanceof ReconcileError ? `[${error.code}] ` : "";
    output.error(`${prefix}${errorMessage(error)}`);
    return EXIT_HARD_FAILURE;
}
