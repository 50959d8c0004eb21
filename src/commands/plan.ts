import { defineCommand } from "citty";
import { consola } from "consola";
import type { ChangeSet, ChangeSetEntry } from "../entities/change-set.js";
import type { TemplateParser } from "../use-cases/parse-template.js";
import type { StackConfigParser } from "../use-cases/parse-stack-config.js";
import {
    type ConsoleOutput,
    EXIT_SUCCESS,
    loadConfig,
    loadTemplate,
    type OpenStackRuntime,
    reportHardFailure,
    type StackOptions,
    stackArgs,
} from "./stack-inputs.js";

export interface PlanCommandDeps {
    readonly templateParser: TemplateParser;
    readonly configParser: StackConfigParser;
    readonly openRuntime: OpenStackRuntime;
}

export interface PlanCommand {
    /** Resolves to the process exit code. */
    execute(options: StackOptions, output: ConsoleOutput): Promise<number>;
}

export function formatEntry(entry: ChangeSetEntry): string {
    const action = entry.phase ? `${entry.action}:${entry.phase}` : entry.action;
    const changed =
        entry.changedProperties.length > 0
            ? ` (${entry.changedProperties.join(", ")})`
            : "";
    const after =
        entry.prerequisites.length > 0
            ? ` after ${entry.prerequisites.join(", ")}`
            : "";
    return `${action.padEnd(18)} ${entry.nodeId} [${entry.kind}]${changed}${after}`;
}

export function summarizeChangeSet(changeSet: ChangeSet): string {
    const nodesFor = (action: ChangeSetEntry["action"]) =>
        new Set(
            changeSet.entries
                .filter((entry) => entry.action === action)
                .map((entry) => entry.nodeId),
        ).size;
    return (
        `Plan: ${nodesFor("create")} to create, ${nodesFor("update")} to update, ` +
        `${nodesFor("replace")} to replace, ${nodesFor("delete")} to delete, ` +
        `${nodesFor("no-op")} unchanged`
    );
}

export function createPlanCommand(deps: PlanCommandDeps): PlanCommand {
    return {
        async execute(options: StackOptions, output: ConsoleOutput): Promise<number> {
            try {
                const config = await loadConfig(deps.configParser, options);
                const template = await loadTemplate(
                    deps.templateParser,
                    options.templatePath,
                    config,
                );
                const runtime = await deps.openRuntime(config);
                const { changeSet } = runtime.reconciler.plan({
                    template,
                    store: runtime.store,
                    imports: config.imports,
                });

                if (options.json) {
                    output.log(JSON.stringify(changeSet, null, 2));
                } else {
                    for (const entry of changeSet.entries) {
                        output.log(formatEntry(entry));
                    }
                    output.log(summarizeChangeSet(changeSet));
                }
                return EXIT_SUCCESS;
            } catch (error) {
                return reportHardFailure(output, error);
            }
        },
    };
}

export function createPlanCittyCommand(deps: PlanCommandDeps) {
    const planCommand = createPlanCommand(deps);

    return defineCommand({
        meta: {
            name: "plan",
            description:
                "Compare a template with recorded state and print the ordered change set",
        },
        args: stackArgs,
        async run({ args }) {
            process.exitCode = await planCommand.execute(
                {
                    templatePath: args.template,
                    configPath: args.config,
                    stackName: args.stack,
                    stateDir: args["state-dir"],
                    json: args.json,
                },
                {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                    error: (msg) => consola.error(msg),
                },
            );
        },
    });
}
