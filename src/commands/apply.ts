import { defineCommand } from "citty";
import { consola } from "consola";
import type { EntryOutcome } from "../entities/execution-result.js";
import type { TemplateParser } from "../use-cases/parse-template.js";
import type { StackConfigParser } from "../use-cases/parse-stack-config.js";
import {
    type ConsoleOutput,
    EXIT_PARTIAL_FAILURE,
    EXIT_SUCCESS,
    loadConfig,
    loadTemplate,
    type OpenStackRuntime,
    reportHardFailure,
    type StackOptions,
    stackArgs,
} from "./stack-inputs.js";

export interface ApplyCommandDeps {
    readonly templateParser: TemplateParser;
    readonly configParser: StackConfigParser;
    readonly openRuntime: OpenStackRuntime;
}

export interface ApplyOptions extends StackOptions {
    readonly signal?: AbortSignal | undefined;
}

export interface ApplyCommand {
    /** Resolves to 0 when every entry succeeded, 1 on partial failure and 2 when nothing could run. */
    execute(options: ApplyOptions, output: ConsoleOutput): Promise<number>;
}

export function formatOutcome(outcome: EntryOutcome): string {
    const detail = outcome.error === undefined ? "" : `: ${outcome.error}`;
    return `${outcome.status.padEnd(9)} ${outcome.entryId}${detail}`;
}

export function createApplyCommand(deps: ApplyCommandDeps): ApplyCommand {
    return {
        async execute(options: ApplyOptions, output: ConsoleOutput): Promise<number> {
            try {
                const config = await loadConfig(deps.configParser, options);
                const template = await loadTemplate(
                    deps.templateParser,
                    options.templatePath,
                    config,
                );
                const runtime = await deps.openRuntime(config);
                const result = await runtime.reconciler.apply({
                    template,
                    store: runtime.store,
                    imports: config.imports,
                    signal: options.signal,
                });
                const { summary } = result;

                if (options.json) {
                    output.log(
                        JSON.stringify(
                            { summary, outputs: result.outputs ?? null },
                            null,
                            2,
                        ),
                    );
                } else {
                    for (const outcome of summary.outcomes) {
                        const line = formatOutcome(outcome);
                        if (outcome.status === "failed" || outcome.status === "skipped") {
                            output.warn(line);
                        } else {
                            output.log(line);
                        }
                    }
                    output.log(
                        `Apply ${summary.status}: ${summary.succeeded} succeeded, ${summary.failed} failed, ` +
                            `${summary.skipped} skipped, ${summary.cancelled} cancelled`,
                    );
                    for (const [name, value] of Object.entries(result.outputs ?? {})) {
                        output.log(`${name} = ${JSON.stringify(value)}`);
                    }
                }

                return summary.status === "succeeded"
                    ? EXIT_SUCCESS
                    : EXIT_PARTIAL_FAILURE;
            } catch (error) {
                return reportHardFailure(output, error);
            }
        },
    };
}

export function createApplyCittyCommand(deps: ApplyCommandDeps) {
    const applyCommand = createApplyCommand(deps);

    return defineCommand({
        meta: {
            name: "apply",
            description:
                "Plan and execute the change set, recording state as resources settle",
        },
        args: stackArgs,
        async run({ args }) {
            const controller = new AbortController();
            const cancel = () => {
                consola.warn("Cancelling: running operations finish, nothing new starts");
                controller.abort();
            };
            process.once("SIGINT", cancel);
            try {
                process.exitCode = await applyCommand.execute(
                    {
                        templatePath: args.template,
                        configPath: args.config,
                        stackName: args.stack,
                        stateDir: args["state-dir"],
                        json: args.json,
                        signal: controller.signal,
                    },
                    {
                        log: (msg) => consola.log(msg),
                        warn: (msg) => consola.warn(msg),
                        error: (msg) => consola.error(msg),
                    },
                );
            } finally {
                process.off("SIGINT", cancel);
            }
        },
    });
}
