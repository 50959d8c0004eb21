import { randomUUID } from "node:crypto";
import type { ChangeSet, ChangeSetEntry } from "../entities/change-set.js";
import { errorMessage, ProviderError, TimeoutError } from "../entities/errors.js";
import {
    type EntryOutcome,
    type RunSummary,
    summarize,
} from "../entities/execution-result.js";
import type { JsonValue } from "../entities/json-value.js";
import { classifyStatus } from "../entities/resource-kind.js";
import type { ResourceNode } from "../entities/resource-node.js";
import type { StateRecord } from "../entities/state-record.js";
import type { ResourceGraph } from "./build-resource-graph.js";
import type {
    LiveResource,
    ProviderRegistry,
    ResourceProvider,
} from "./cloud-provider.port.js";
import type { Lease, LeaseManager } from "./lease-manager.js";
import type { ReconcileLogger } from "./logger.port.js";
import { resolveBagFully, stateResolutionContext } from "./resolve-properties.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";
import {
    backoffDelay,
    RetryAbortedError,
    RetryDeadlineError,
    type RetryPolicy,
    type Sleep,
    sleep as defaultSleep,
    withRetry,
} from "./retry-policy.js";
import type { StateStore } from "./state-store.port.js";

export interface ExecutorSettings {
    readonly parallelism: number;
    readonly operationTimeoutMs: number;
    readonly leaseTtlMs: number;
    readonly rollbackFailedCreates: boolean;
    readonly retry: RetryPolicy;
}

export interface ChangeSetExecutorDeps {
    readonly providers: ProviderRegistry;
    readonly catalog: ResourceKindCatalog;
    readonly leases: LeaseManager;
    readonly logger: ReconcileLogger;
    readonly settings: ExecutorSettings;
    readonly sleep?: Sleep | undefined;
    readonly now?: (() => number) | undefined;
}

export interface ExecutionContext {
    readonly graph: ResourceGraph;
    readonly store: StateStore;
    readonly imports: Readonly<Record<string, JsonValue>>;
    readonly signal?: AbortSignal | undefined;
}

export interface ChangeSetExecutor {
    execute(changeSet: ChangeSet, context: ExecutionContext): Promise<RunSummary>;
}

/** Raised inside an entry when cancellation arrives between provider calls. */
class EntryCancelledError extends Error {
    constructor(nodeId: string) {
        super(`${nodeId} stopped waiting because the run was cancelled`);
        this.name = "EntryCancelledError";
    }
}

interface EntryProgress {
    attempts: number;
    physicalId?: string | undefined;
}

function validateEntries(entries: readonly ChangeSetEntry[]): void {
    const ids = new Set<string>();
    for (const entry of entries) {
        if (ids.has(entry.entryId)) {
            throw new Error(`Change set lists entry "${entry.entryId}" twice`);
        }
        ids.add(entry.entryId);
    }
    for (const entry of entries) {
        for (const prerequisite of entry.prerequisites) {
            if (prerequisite === entry.entryId) {
                throw new Error(`Entry "${entry.entryId}" lists itself as a prerequisite`);
            }
            if (!ids.has(prerequisite)) {
                throw new Error(
                    `Entry "${entry.entryId}" lists unknown prerequisite "${prerequisite}"`,
                );
            }
        }
    }
}

function describeEntry(entry: ChangeSetEntry): string {
    const action = entry.phase ? `${entry.action} (${entry.phase})` : entry.action;
    return `${action} ${entry.nodeId} [${entry.kind}]`;
}

export function createChangeSetExecutor(
    deps: ChangeSetExecutorDeps,
): ChangeSetExecutor {
    const { settings, logger } = deps;
    const sleep = deps.sleep ?? defaultSleep;
    const now = deps.now ?? Date.now;

    function runEntry(
        entry: ChangeSetEntry,
        changeSet: ChangeSet,
        context: ExecutionContext,
        runId: string,
    ): Promise<EntryOutcome> {
        const startedAt = now();
        const deadline = startedAt + settings.operationTimeoutMs;
        const progress: EntryProgress = { attempts: 0 };
        const { graph, store, signal } = context;
        const resolution = stateResolutionContext(
            (resourceId) => store.get(resourceId),
            context.imports,
        );

        const outcome = (
            status: EntryOutcome["status"],
            error?: unknown,
        ): EntryOutcome => ({
            entryId: entry.entryId,
            nodeId: entry.nodeId,
            action: entry.action,
            phase: entry.phase,
            status,
            attempts: progress.attempts,
            durationMs: now() - startedAt,
            physicalId: progress.physicalId,
            error: error === undefined ? undefined : errorMessage(error),
        });

        const call = async <T>(operation: () => Promise<T>): Promise<T> => {
            try {
                const result = await withRetry(operation, {
                    policy: settings.retry,
                    sleep,
                    signal,
                    deadline,
                    now,
                    onRetry: (attempt, error) =>
                        logger.warn(
                            `${entry.entryId}: attempt ${attempt} failed (${errorMessage(error)}), retrying`,
                        ),
                });
                progress.attempts += result.attempts;
                return result.value;
            } catch (error) {
                if (error instanceof RetryDeadlineError) {
                    progress.attempts += error.attempts;
                    throw new TimeoutError(entry.nodeId, settings.operationTimeoutMs);
                }
                if (error instanceof RetryAbortedError) {
                    progress.attempts += error.attempts;
                }
                throw error;
            }
        };

        const pause = async (round: number): Promise<void> => {
            const ms = Math.min(
                backoffDelay(settings.retry, round),
                Math.max(0, deadline - now()),
            );
            try {
                await sleep(ms, signal);
            } catch (error) {
                if (signal?.aborted) {
                    throw new EntryCancelledError(entry.nodeId);
                }
                throw error;
            }
        };

        const checkpoint = () => {
            if (signal?.aborted) {
                throw new EntryCancelledError(entry.nodeId);
            }
            if (now() >= deadline) {
                throw new TimeoutError(entry.nodeId, settings.operationTimeoutMs);
            }
        };

        const awaitSettled = async (
            provider: ResourceProvider,
            physicalId: string,
        ): Promise<LiveResource> => {
            const definition = deps.catalog.lookupByKind(entry.kind);
            for (let round = 1; ; round++) {
                checkpoint();
                const live = await call(() => provider.describe(physicalId));
                if (live === undefined) {
                    throw new ProviderError(
                        `${entry.nodeId} (${physicalId}) disappeared before it settled`,
                        { transient: false },
                    );
                }
                const state = classifyStatus(definition, live.status);
                if (state === "failed") {
                    throw new ProviderError(
                        `${entry.nodeId} (${physicalId}) reached failed status "${live.status}"`,
                        { transient: false },
                    );
                }
                if (state === "ready") {
                    return live;
                }
                await pause(round);
            }
        };

        const awaitGone = async (
            provider: ResourceProvider,
            physicalId: string,
        ): Promise<void> => {
            const definition = deps.catalog.lookupByKind(entry.kind);
            for (let round = 1; ; round++) {
                checkpoint();
                const live = await call(() => provider.describe(physicalId));
                if (live === undefined) {
                    return;
                }
                if (classifyStatus(definition, live.status) === "failed") {
                    throw new ProviderError(
                        `${entry.nodeId} (${physicalId}) failed to delete: status "${live.status}"`,
                        { transient: false },
                    );
                }
                await pause(round);
            }
        };

        const requireNode = (): ResourceNode => {
            const node = graph.node(entry.nodeId);
            if (node === undefined) {
                throw new Error(`${entry.nodeId} is not part of the resource graph`);
            }
            return node;
        };

        const toRecord = (
            node: ResourceNode,
            physicalId: string,
            properties: Record<string, JsonValue>,
            outputs: Record<string, JsonValue>,
        ): StateRecord => ({
            kind: node.kind,
            physicalId,
            properties,
            outputs,
            dependencies: graph.dependenciesOf(node.logicalId),
            templateHash: changeSet.templateHash,
            updatedAt: new Date(now()).toISOString(),
        });

        /** Resolves to whether the resource is gone. */
        const rollbackCreate = async (
            provider: ResourceProvider,
            physicalId: string,
        ): Promise<boolean> => {
            try {
                await call(() => provider.delete(physicalId));
                logger.info(`Rolled back failed create of ${entry.nodeId} (${physicalId})`);
                return true;
            } catch (error) {
                logger.warn(
                    `Rollback of ${entry.nodeId} (${physicalId}) failed: ${errorMessage(error)}`,
                );
                return false;
            }
        };

        const create = async (): Promise<void> => {
            const node = requireNode();
            graph.setLifecycle(node.logicalId, "creating");
            const properties = resolveBagFully(node.properties, resolution, node.logicalId);
            const provider = deps.providers.forKind(node.kind);
            // a replacement keeps the old record until the new resource settles
            const replacing = store.get(node.logicalId) !== undefined;
            const created = await call(() => provider.create(properties));
            progress.physicalId = created.physicalId;

            if (!replacing) {
                // recorded as soon as it exists, so a later run can adopt it
                await store.put(
                    node.logicalId,
                    toRecord(node, created.physicalId, properties, { ...created.outputs }),
                );
            }

            let live: LiveResource;
            try {
                live = await awaitSettled(provider, created.physicalId);
            } catch (error) {
                if (settings.rollbackFailedCreates || replacing) {
                    const removed = await rollbackCreate(provider, created.physicalId);
                    if (removed && !replacing) {
                        await store.delete(node.logicalId);
                    }
                }
                throw error;
            }

            await store.put(
                node.logicalId,
                toRecord(node, created.physicalId, properties, {
                    ...created.outputs,
                    ...live.outputs,
                }),
            );
        };

        const update = async (): Promise<void> => {
            const node = requireNode();
            const record = store.get(node.logicalId);
            if (record === undefined) {
                throw new Error(`${node.logicalId} has no recorded state to update`);
            }
            graph.setLifecycle(node.logicalId, "updating");
            progress.physicalId = record.physicalId;
            const properties = resolveBagFully(node.properties, resolution, node.logicalId);
            const provider = deps.providers.forKind(node.kind);
            const updated = await call(() => provider.update(record.physicalId, properties));
            const live = await awaitSettled(provider, record.physicalId);

            await store.put(
                node.logicalId,
                toRecord(node, record.physicalId, properties, {
                    ...record.outputs,
                    ...updated.outputs,
                    ...live.outputs,
                }),
            );
        };

        const remove = async (): Promise<void> => {
            const physicalId =
                entry.priorPhysicalId ?? store.get(entry.nodeId)?.physicalId;
            if (physicalId === undefined) {
                throw new Error(`${entry.nodeId} has no physical id to delete`);
            }
            progress.physicalId = physicalId;
            if (entry.action === "delete") {
                graph.setLifecycle(entry.nodeId, "deleting");
            }
            const provider = deps.providers.forKind(entry.kind);
            await call(() => provider.delete(physicalId));
            await awaitGone(provider, physicalId);

            // after a replacement the record already describes the new resource
            if (entry.action === "delete") {
                await store.delete(entry.nodeId);
                graph.setLifecycle(entry.nodeId, "deleted");
            }
        };

        const apply = async (): Promise<void> => {
            if (entry.action === "delete" || entry.phase === "delete-old") {
                await remove();
            } else if (entry.action === "update") {
                await update();
            } else {
                await create();
            }
        };

        return (async (): Promise<EntryOutcome> => {
            if (entry.action === "no-op") {
                graph.setLifecycle(entry.nodeId, "active");
                return outcome("no-op");
            }

            let lease: Lease;
            try {
                lease = deps.leases.acquire(
                    entry.nodeId,
                    `${runId}/${entry.entryId}`,
                    settings.leaseTtlMs,
                );
            } catch (error) {
                graph.setLifecycle(entry.nodeId, "failed");
                logger.warn(`${describeEntry(entry)} failed: ${errorMessage(error)}`);
                return outcome("failed", error);
            }

            logger.info(`Starting ${describeEntry(entry)}`);
            try {
                await apply();
                if (entry.action !== "delete") {
                    graph.setLifecycle(entry.nodeId, "active");
                }
                logger.info(`Finished ${describeEntry(entry)}`);
                return outcome("succeeded");
            } catch (error) {
                if (
                    error instanceof EntryCancelledError ||
                    error instanceof RetryAbortedError
                ) {
                    logger.warn(`Cancelled ${describeEntry(entry)}`);
                    return outcome("cancelled", error);
                }
                graph.setLifecycle(entry.nodeId, "failed");
                logger.warn(`${describeEntry(entry)} failed: ${errorMessage(error)}`);
                return outcome("failed", error);
            } finally {
                deps.leases.release(lease);
            }
        })();
    }

    return {
        async execute(
            changeSet: ChangeSet,
            context: ExecutionContext,
        ): Promise<RunSummary> {
            const { entries } = changeSet;
            validateEntries(entries);

            const runId = randomUUID();
            const outcomes = new Map<string, EntryOutcome>();
            const running = new Map<string, Promise<void>>();

            const skip = (entry: ChangeSetEntry, blocker: string | undefined, reason: string) => {
                outcomes.set(entry.entryId, {
                    entryId: entry.entryId,
                    nodeId: entry.nodeId,
                    action: entry.action,
                    phase: entry.phase,
                    status: "skipped",
                    attempts: 0,
                    durationMs: 0,
                    error: reason,
                    skippedBecause: blocker,
                });
                logger.warn(`Skipped ${describeEntry(entry)}: ${reason}`);
            };

            const blockerOf = (entry: ChangeSetEntry): string | undefined =>
                entry.prerequisites.find((prerequisite) => {
                    const status = outcomes.get(prerequisite)?.status;
                    return status !== undefined && status !== "succeeded" && status !== "no-op";
                });

            const isReady = (entry: ChangeSetEntry): boolean =>
                entry.prerequisites.every((prerequisite) => {
                    const status = outcomes.get(prerequisite)?.status;
                    return status === "succeeded" || status === "no-op";
                });

            while (outcomes.size < entries.length) {
                let progressed = false;

                for (const entry of entries) {
                    if (outcomes.has(entry.entryId) || running.has(entry.entryId)) {
                        continue;
                    }
                    const blocker = blockerOf(entry);
                    if (blocker !== undefined) {
                        skip(entry, blocker, `prerequisite ${blocker} did not succeed`);
                        progressed = true;
                        continue;
                    }
                    if (context.signal?.aborted) {
                        skip(entry, undefined, "run was cancelled");
                        progressed = true;
                        continue;
                    }
                    if (isReady(entry) && running.size < settings.parallelism) {
                        const task = runEntry(entry, changeSet, context, runId).then(
                            (result) => {
                                outcomes.set(entry.entryId, result);
                                running.delete(entry.entryId);
                            },
                        );
                        running.set(entry.entryId, task);
                        progressed = true;
                    }
                }

                if (running.size > 0) {
                    await Promise.race(running.values());
                } else if (!progressed) {
                    throw new Error(
                        "Change set cannot make progress: prerequisites form a cycle",
                    );
                }
            }

            return summarize(
                entries.flatMap((entry) => outcomes.get(entry.entryId) ?? []),
            );
        },
    };
}
