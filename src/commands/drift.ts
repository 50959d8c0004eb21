import { defineCommand } from "citty";
import { consola } from "consola";
import { type DriftEvent, type DriftReport, hasDrift } from "../entities/drift.js";
import type { StackConfigParser } from "../use-cases/parse-stack-config.js";
import {
    type ConfigOptions,
    type ConsoleOutput,
    configArgs,
    EXIT_PARTIAL_FAILURE,
    EXIT_SUCCESS,
    loadConfig,
    type OpenStackRuntime,
    reportHardFailure,
} from "./stack-inputs.js";

export interface DriftCommandDeps {
    readonly configParser: StackConfigParser;
    readonly openRuntime: OpenStackRuntime;
}

export interface DriftOptions extends ConfigOptions {
    readonly json?: boolean | undefined;
    /** keep checking every drift interval until the signal aborts */
    readonly watch?: boolean | undefined;
    readonly signal?: AbortSignal | undefined;
}

export interface DriftCommand {
    /** Resolves to 0 when nothing drifted, 1 when drift was found and 2 on failure. */
    execute(options: DriftOptions, output: ConsoleOutput): Promise<number>;
}

export function formatDriftEvent(event: DriftEvent): string[] {
    const subject = `${event.resourceId} (${event.physicalId}) [${event.resourceKind}]`;
    switch (event.type) {
        case "deleted":
            return [`deleted    ${subject}`];
        case "unreadable":
            return [`unreadable ${subject}: ${event.error}`];
        case "modified":
            return [
                `modified   ${subject}`,
                ...event.differences.map(
                    (difference) =>
                        `  ${difference.path}: expected ${JSON.stringify(difference.expected ?? null)}, found ${JSON.stringify(difference.actual ?? null)}`,
                ),
            ];
    }
}

function printReport(report: DriftReport, json: boolean, output: ConsoleOutput) {
    if (json) {
        output.log(JSON.stringify(report, null, 2));
        return;
    }
    for (const event of report.events) {
        for (const line of formatDriftEvent(event)) {
            output.warn(line);
        }
    }
    output.log(
        `Checked ${report.checked} resource(s) of stack ${report.stackName} at ${report.checkedAt}: ` +
            (hasDrift(report) ? "drift detected" : "no drift"),
    );
}

export function createDriftCommand(deps: DriftCommandDeps): DriftCommand {
    return {
        async execute(options: DriftOptions, output: ConsoleOutput): Promise<number> {
            try {
                const config = await loadConfig(deps.configParser, options);
                const runtime = await deps.openRuntime(config);
                const json = options.json ?? false;

                if (options.watch && options.signal) {
                    let drifted = false;
                    await runtime.driftDetector.watch({
                        intervalMs: config.driftIntervalMs,
                        signal: options.signal,
                        snapshot: () => runtime.store.snapshot(),
                        onReport: (report) => {
                            drifted = drifted || hasDrift(report);
                            printReport(report, json, output);
                        },
                    });
                    return drifted ? EXIT_PARTIAL_FAILURE : EXIT_SUCCESS;
                }

                const report = await runtime.driftDetector.detect(
                    runtime.store.snapshot(),
                );
                printReport(report, json, output);
                return hasDrift(report) ? EXIT_PARTIAL_FAILURE : EXIT_SUCCESS;
            } catch (error) {
                return reportHardFailure(output, error);
            }
        },
    };
}

export function createDriftCittyCommand(deps: DriftCommandDeps) {
    const driftCommand = createDriftCommand(deps);

    return defineCommand({
        meta: {
            name: "drift",
            description:
                "Compare recorded state with live resources and report differences",
        },
        args: {
            ...configArgs,
            watch: {
                type: "boolean",
                description: "Repeat the check every drift_interval_ms until interrupted",
                default: false,
            },
        },
        async run({ args }) {
            const controller = new AbortController();
            const stop = () => controller.abort();
            process.once("SIGINT", stop);
            try {
                process.exitCode = await driftCommand.execute(
                    {
                        configPath: args.config,
                        stackName: args.stack,
                        stateDir: args["state-dir"],
                        json: args.json,
                        watch: args.watch,
                        signal: controller.signal,
                    },
                    {
                        log: (msg) => consola.log(msg),
                        warn: (msg) => consola.warn(msg),
                        error: (msg) => consola.error(msg),
                    },
                );
            } finally {
                process.off("SIGINT", stop);
            }
        },
    });
}
