import type { ChangeSet } from "../entities/change-set.js";
import type { RunSummary } from "../entities/execution-result.js";
import type { JsonValue } from "../entities/json-value.js";
import type { StackTemplate } from "../entities/stack-template.js";
import type { ResourceGraph, ResourceGraphBuilder } from "./build-resource-graph.js";
import type { OutputEvaluator } from "./evaluate-outputs.js";
import type { ChangeSetExecutor } from "./execute-change-set.js";
import type { ReconcileLogger } from "./logger.port.js";
import type { ChangePlanner } from "./plan-changes.js";
import { stateResolutionContext } from "./resolve-properties.js";
import type { StateStore } from "./state-store.port.js";

export interface StackReconcilerDeps {
    readonly graphBuilder: ResourceGraphBuilder;
    readonly planner: ChangePlanner;
    readonly executor: ChangeSetExecutor;
    readonly outputEvaluator: OutputEvaluator;
    readonly logger: ReconcileLogger;
}

export interface ReconcileRequest {
    readonly template: StackTemplate;
    readonly store: StateStore;
    readonly imports: Readonly<Record<string, JsonValue>>;
    readonly signal?: AbortSignal | undefined;
}

export interface PlanResult {
    readonly graph: ResourceGraph;
    readonly changeSet: ChangeSet;
}

export interface ApplyResult {
    readonly changeSet: ChangeSet;
    readonly summary: RunSummary;
    /** recorded only when every entry succeeded */
    readonly outputs?: Readonly<Record<string, JsonValue>> | undefined;
}

export interface StackReconciler {
    /** @throws CycleError, UnresolvedReferenceError or PlanConflictError before anything runs */
    plan(request: ReconcileRequest): PlanResult;
    apply(request: ReconcileRequest): Promise<ApplyResult>;
}

export function createStackReconciler(deps: StackReconcilerDeps): StackReconciler {
    const plan = (request: ReconcileRequest): PlanResult => {
        const graph = deps.graphBuilder.build(request.template.resources);
        const changeSet = deps.planner.plan({
            graph,
            snapshot: request.store.snapshot(),
            imports: request.imports,
            templateHash: request.template.hash,
        });
        return { graph, changeSet };
    };

    return {
        plan,
        async apply(request: ReconcileRequest): Promise<ApplyResult> {
            const { graph, changeSet } = plan(request);
            const summary = await deps.executor.execute(changeSet, {
                graph,
                store: request.store,
                imports: request.imports,
                signal: request.signal,
            });

            if (summary.status !== "succeeded") {
                deps.logger.warn(
                    `Apply finished with ${summary.failed} failed, ${summary.skipped} skipped and ${summary.cancelled} cancelled entries`,
                );
                return { changeSet, summary };
            }

            const outputs = deps.outputEvaluator.evaluate(
                request.template.outputs,
                stateResolutionContext(
                    (resourceId) => request.store.get(resourceId),
                    request.imports,
                ),
            );
            await request.store.recordApply(request.template.hash, outputs);
            deps.logger.info(`Applied ${changeSet.entries.length} entries`);
            return { changeSet, summary, outputs };
        },
    };
}
