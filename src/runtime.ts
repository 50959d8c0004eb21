import { join } from "node:path";
import type { StackConfig } from "./entities/stack-config.js";
import type { OpenStackRuntime, StackRuntime } from "./commands/stack-inputs.js";
import { openFileStateStore } from "./gateways/file-state-store.js";
import { openLocalCloud } from "./gateways/local-cloud-provider.js";
import type { ProviderRegistry } from "./use-cases/cloud-provider.port.js";
import { createResourceGraphBuilder } from "./use-cases/build-resource-graph.js";
import { createDriftDetector } from "./use-cases/detect-drift.js";
import { createOutputEvaluator } from "./use-cases/evaluate-outputs.js";
import { createChangeSetExecutor } from "./use-cases/execute-change-set.js";
import { createLeaseManager } from "./use-cases/lease-manager.js";
import type { ReconcileLogger } from "./use-cases/logger.port.js";
import { createChangePlanner } from "./use-cases/plan-changes.js";
import { createStackReconciler } from "./use-cases/reconcile-stack.js";
import type { ResourceKindCatalog } from "./use-cases/resource-kind-catalog.port.js";
import type { Sleep } from "./use-cases/retry-policy.js";
import type { StateStore } from "./use-cases/state-store.port.js";

export const LOCAL_CLOUD_FILE = "local-cloud.json";
const BACKOFF_MULTIPLIER = 2;

export interface StackRuntimeDeps {
    readonly catalog: ResourceKindCatalog;
    readonly logger: (stackName: string) => ReconcileLogger;
    /** defaults to the local cloud persisted beside the stack state */
    readonly providers?: ((config: StackConfig) => Promise<ProviderRegistry>) | undefined;
    /** defaults to the state file under the configured state directory */
    readonly store?: ((config: StackConfig) => Promise<StateStore>) | undefined;
    readonly sleep?: Sleep | undefined;
    readonly now?: (() => Date) | undefined;
}

export function createStackRuntimeOpener(deps: StackRuntimeDeps): OpenStackRuntime {
    const openProviders =
        deps.providers ??
        ((config: StackConfig) =>
            openLocalCloud({
                catalog: deps.catalog,
                filePath: join(config.stateDir, LOCAL_CLOUD_FILE),
            }));
    const openStore =
        deps.store ??
        ((config: StackConfig) =>
            openFileStateStore({
                stateDir: config.stateDir,
                stackName: config.stackName,
            }));

    return async (config: StackConfig): Promise<StackRuntime> => {
        const logger = deps.logger(config.stackName);
        const store = await openStore(config);
        const providers = await openProviders(config);

        const executor = createChangeSetExecutor({
            providers,
            catalog: deps.catalog,
            leases: createLeaseManager(),
            logger,
            sleep: deps.sleep,
            settings: {
                parallelism: config.parallelism,
                operationTimeoutMs: config.operationTimeoutMs,
                leaseTtlMs: config.leaseTtlMs,
                rollbackFailedCreates: config.rollbackFailedCreates,
                retry: {
                    maxAttempts: config.maxAttempts,
                    initialDelayMs: config.initialBackoffMs,
                    maxDelayMs: config.maxBackoffMs,
                    multiplier: BACKOFF_MULTIPLIER,
                },
            },
        });

        return {
            store,
            reconciler: createStackReconciler({
                graphBuilder: createResourceGraphBuilder(),
                planner: createChangePlanner({ catalog: deps.catalog }),
                executor,
                outputEvaluator: createOutputEvaluator(),
                logger,
            }),
            driftDetector: createDriftDetector({
                providers,
                logger,
                sleep: deps.sleep,
                now: deps.now,
            }),
        };
    };
}
