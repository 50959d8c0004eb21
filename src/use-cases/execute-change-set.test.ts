import { describe, expect, it, vi } from "vitest";
import { ProviderError } from "../entities/errors.js";
import {
    getAttribute,
    literal,
    type PropertyBag,
    ref,
} from "../entities/reference-expression.js";
import type { ResourceKindDefinition } from "../entities/resource-kind.js";
import type { ResourceDeclaration } from "../entities/resource-node.js";
import { createLocalCloud, type LocalCloud } from "../gateways/local-cloud-provider.js";
import { createMemoryStateStore } from "../gateways/memory-state-store.js";
import { buildChangeSet, buildEntry } from "../lib/test-template-builder.js";
import { createResourceGraphBuilder } from "./build-resource-graph.js";
import type { ProviderRegistry } from "./cloud-provider.port.js";
import { createChangeSetExecutor, type ExecutorSettings } from "./execute-change-set.js";
import { createLeaseManager, type LeaseManager } from "./lease-manager.js";
import { createChangePlanner } from "./plan-changes.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";
import type { Sleep } from "./retry-policy.js";
import type { StateStore } from "./state-store.port.js";

const QUEUE = "Test::Messaging::Queue";
const BUCKET = "Test::Storage::Bucket";

const KINDS: readonly ResourceKindDefinition[] = [
    {
        kind: QUEUE,
        service: "messaging",
        replaceOnly: ["Fifo"],
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
    {
        kind: BUCKET,
        service: "storage",
        replaceOnly: ["BucketName"],
        nameProperty: "BucketName",
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
];

const catalog: ResourceKindCatalog = {
    lookupByKind: (kind) => KINDS.find((definition) => definition.kind === kind),
};

const settings: ExecutorSettings = {
    parallelism: 4,
    operationTimeoutMs: 60_000,
    leaseTtlMs: 60_000,
    rollbackFailedCreates: true,
    retry: { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 100, multiplier: 2 },
};

function declare(
    logicalId: string,
    kind: string,
    properties: PropertyBag = {},
): ResourceDeclaration {
    return { logicalId, kind, properties, dependsOn: [] };
}

interface RunOptions {
    readonly providers?: ProviderRegistry;
    readonly store?: StateStore;
    readonly settings?: Partial<ExecutorSettings>;
    readonly sleep?: Sleep;
    readonly now?: () => number;
    readonly leases?: LeaseManager;
    readonly signal?: AbortSignal;
}

function buildHarness(settleAfterPolls = 0) {
    const cloud = createLocalCloud({ catalog, settleAfterPolls });
    const logger = { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
    const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);

    const run = async (
        declarations: readonly ResourceDeclaration[],
        options: RunOptions = {},
    ) => {
        const store = options.store ?? createMemoryStateStore("test-stack");
        const graph = createResourceGraphBuilder().build(declarations);
        const changeSet = createChangePlanner({ catalog }).plan({
            graph,
            snapshot: store.snapshot(),
            imports: {},
            templateHash: "template-hash",
        });
        const executor = createChangeSetExecutor({
            providers: options.providers ?? cloud,
            catalog,
            leases: options.leases ?? createLeaseManager(),
            logger,
            settings: { ...settings, ...options.settings },
            sleep: options.sleep ?? sleep,
            now: options.now ?? (() => 0),
        });
        const summary = await executor.execute(changeSet, {
            graph,
            store,
            imports: {},
            signal: options.signal,
        });
        return { summary, store, graph };
    };

    return { cloud, logger, sleep, run };
}

function statuses(summary: { readonly outcomes: readonly { entryId: string; status: string }[] }) {
    return summary.outcomes.map((outcome) => [outcome.entryId, outcome.status]);
}

describe("ExecuteChangeSet", () => {
    describe("given A and B where B reads an output of A", () => {
        const a = declare("A", QUEUE, { Retention: literal(60) });
        const declarations = [
            a,
            declare("B", QUEUE, { DeadLetterArn: getAttribute("A", "Arn"), Retention: literal(30) }),
        ];

        it("should create both and record their state", async () => {
            const { run } = buildHarness();

            const { summary, store, graph } = await run(declarations);

            expect(summary.status).toBe("succeeded");
            expect(statuses(summary)).toEqual([
                ["A", "succeeded"],
                ["B", "succeeded"],
            ]);
            expect(store.get("B")).toEqual({
                kind: QUEUE,
                physicalId: "queue-00000002",
                properties: {
                    DeadLetterArn: "arn:local:messaging:::queue/queue-00000001",
                    Retention: 30,
                },
                outputs: { Arn: "arn:local:messaging:::queue/queue-00000002" },
                dependencies: ["A"],
                templateHash: "template-hash",
                updatedAt: "1970-01-01T00:00:00.000Z",
            });
            expect(graph.node("B")?.lifecycle).toBe("active");
        });

        it("should leave nothing to do on a second run", async () => {
            const { run } = buildHarness();
            const { store } = await run(declarations);

            const { summary } = await run(declarations, { store });

            expect(statuses(summary)).toEqual([
                ["A", "no-op"],
                ["B", "no-op"],
            ]);
            expect(summary.status).toBe("succeeded");
        });

        it("should delete B and its record when B leaves the template", async () => {
            const { run, cloud } = buildHarness();
            const { store } = await run(declarations);

            const { summary } = await run([a], { store });

            expect(statuses(summary)).toEqual([
                ["A", "no-op"],
                ["B", "succeeded"],
            ]);
            expect(store.get("B")).toBeUndefined();
            expect(cloud.list().map((resource) => resource.physicalId)).toEqual([
                "queue-00000001",
            ]);
        });
    });

    describe("given a permanent failure", () => {
        const declarations = [
            declare("A", BUCKET),
            declare("B", QUEUE, { Source: ref("A") }),
            declare("C", QUEUE, { Source: ref("B") }),
            declare("D", QUEUE),
        ];

        it("should skip every transitive dependent and finish independent entries", async () => {
            const { run, cloud } = buildHarness();
            cloud.injectFault(BUCKET, "create", new ProviderError("Access denied", { transient: false }));

            const { summary, store, graph } = await run(declarations);

            expect(summary).toMatchObject({
                status: "partial-failure",
                succeeded: 1,
                failed: 1,
                skipped: 2,
                cancelled: 0,
            });
            expect(summary.outcomes).toMatchObject([
                { entryId: "A", status: "failed", error: "Access denied" },
                {
                    entryId: "B",
                    status: "skipped",
                    skippedBecause: "A",
                    error: "prerequisite A did not succeed",
                },
                { entryId: "C", status: "skipped", skippedBecause: "B" },
                { entryId: "D", status: "succeeded" },
            ]);
            expect(store.get("A")).toBeUndefined();
            expect(store.get("D")?.physicalId).toBe("queue-00000001");
            expect(graph.node("A")?.lifecycle).toBe("failed");
        });
    });

    describe("given a transient failure", () => {
        it("should retry and succeed", async () => {
            const { run, cloud, logger, sleep } = buildHarness();
            cloud.injectFault(QUEUE, "create", new ProviderError("Rate exceeded", { transient: true }));

            const { summary } = await run([declare("A", QUEUE)]);

            expect(summary.outcomes[0]).toMatchObject({ status: "succeeded", attempts: 3 });
            expect(sleep).toHaveBeenCalledWith(10, undefined);
            expect(logger.warn).toHaveBeenCalledWith(
                "A: attempt 1 failed (Rate exceeded), retrying",
            );
        });
    });

    describe("given a resource that takes a while to settle", () => {
        it("should poll with backoff until it is ready", async () => {
            const { run, sleep } = buildHarness(2);

            const { summary } = await run([declare("A", QUEUE)]);

            expect(summary.outcomes[0]).toMatchObject({ status: "succeeded", attempts: 4 });
            expect(sleep.mock.calls).toEqual([
                [10, undefined],
                [20, undefined],
            ]);
        });
    });

    describe("given a resource that never settles", () => {
        it("should fail the entry with a TimeoutError once the operation timeout passes", async () => {
            const { run, cloud } = buildHarness(100);
            let clock = 0;

            const { summary, store } = await run([declare("A", QUEUE)], {
                settings: { operationTimeoutMs: 25 },
                now: () => clock,
                sleep: async (ms) => {
                    clock += ms;
                },
            });

            expect(summary.outcomes[0]).toMatchObject({
                status: "failed",
                error: "A did not reach a terminal state within 25ms",
            });
            expect(store.get("A")).toBeUndefined();
            expect(cloud.list()).toEqual([]);
        });

        it("should record the named resource when rollback is disabled so the next run adopts it", async () => {
            const { run, cloud } = buildHarness(100);
            let clock = 0;
            const declarations = [declare("A", BUCKET, { BucketName: literal("logs") })];

            const first = await run(declarations, {
                settings: { operationTimeoutMs: 25, rollbackFailedCreates: false },
                now: () => clock,
                sleep: async (ms) => {
                    clock += ms;
                },
            });
            const second = await run(declarations, { store: first.store });

            expect(first.summary.outcomes[0]).toMatchObject({
                status: "failed",
                physicalId: "logs",
            });
            expect(first.store.get("A")?.physicalId).toBe("logs");
            expect(statuses(second.summary)).toEqual([["A", "no-op"]]);
            expect(second.summary.status).toBe("succeeded");
            expect(cloud.list().map((resource) => resource.physicalId)).toEqual(["logs"]);
        });

        it("should free a rolled back name for the next run", async () => {
            const { run } = buildHarness(100);
            let clock = 0;
            const declarations = [declare("A", BUCKET, { BucketName: literal("logs") })];

            const first = await run(declarations, {
                settings: { operationTimeoutMs: 25 },
                now: () => clock,
                sleep: async (ms) => {
                    clock += ms;
                },
            });
            const second = await run(declarations, { store: first.store });

            expect(first.store.get("A")).toBeUndefined();
            expect(statuses(second.summary)).toEqual([["A", "succeeded"]]);
            expect(second.store.get("A")?.physicalId).toBe("logs");
        });
    });

    describe("given transient failures that outlast the operation timeout", () => {
        it("should stop retrying at the deadline with a TimeoutError", async () => {
            const { run, cloud } = buildHarness();
            const throttled = new ProviderError("Rate exceeded", { transient: true });
            cloud.injectFault(QUEUE, "create", throttled);
            cloud.injectFault(QUEUE, "create", throttled);
            let clock = 0;
            const sleep = vi.fn<Sleep>(async (ms) => {
                clock += ms;
            });

            const { summary } = await run([declare("A", QUEUE)], {
                settings: {
                    operationTimeoutMs: 25,
                    retry: { ...settings.retry, initialDelayMs: 100, maxDelayMs: 1_000 },
                },
                now: () => clock,
                sleep,
            });

            expect(summary.outcomes[0]).toMatchObject({
                status: "failed",
                attempts: 1,
                error: "A did not reach a terminal state within 25ms",
            });
            expect(sleep.mock.calls).toEqual([[25, undefined]]);
            expect(cloud.list()).toEqual([]);
        });
    });

    describe("given a create that fails while settling", () => {
        const failure = new ProviderError("Instance limit exceeded", { transient: false });

        it("should delete the half-created resource", async () => {
            const { run, cloud, logger } = buildHarness();
            cloud.injectFault(QUEUE, "describe", failure);

            const { summary } = await run([declare("A", QUEUE)]);

            expect(summary.outcomes[0]).toMatchObject({
                status: "failed",
                error: "Instance limit exceeded",
                physicalId: "queue-00000001",
            });
            expect(cloud.list()).toEqual([]);
            expect(logger.info).toHaveBeenCalledWith(
                "Rolled back failed create of A (queue-00000001)",
            );
        });

        it("should keep it when rollback is disabled", async () => {
            const { run, cloud } = buildHarness();
            cloud.injectFault(QUEUE, "describe", failure);

            const { store } = await run([declare("A", QUEUE)], {
                settings: { rollbackFailedCreates: false },
            });

            expect(cloud.list().map((resource) => resource.physicalId)).toEqual([
                "queue-00000001",
            ]);
            expect(store.get("A")?.physicalId).toBe("queue-00000001");
        });
    });

    describe("given a run cancelled before it starts", () => {
        it("should skip every entry", async () => {
            const { run, cloud } = buildHarness();
            const controller = new AbortController();
            controller.abort();

            const { summary } = await run([declare("A", QUEUE), declare("B", QUEUE)], {
                signal: controller.signal,
            });

            expect(summary.outcomes).toMatchObject([
                { entryId: "A", status: "skipped", error: "run was cancelled" },
                { entryId: "B", status: "skipped", error: "run was cancelled" },
            ]);
            expect(cloud.list()).toEqual([]);
        });
    });

    describe("given a run cancelled while an entry is in flight", () => {
        function abortingAfterCreate(
            cloud: LocalCloud,
            controller: AbortController,
        ): ProviderRegistry {
            return {
                forKind(kind) {
                    const provider = cloud.forKind(kind);
                    return {
                        ...provider,
                        async create(properties) {
                            const created = await provider.create(properties);
                            controller.abort();
                            return created;
                        },
                    };
                },
            };
        }

        it("should let the provider call finish, then roll back before polling", async () => {
            const { run, cloud } = buildHarness();
            const controller = new AbortController();

            const { summary, store } = await run(
                [declare("A", QUEUE), declare("B", QUEUE, { Source: ref("A") })],
                { providers: abortingAfterCreate(cloud, controller), signal: controller.signal },
            );

            expect(summary.outcomes).toMatchObject([
                { entryId: "A", status: "cancelled", physicalId: "queue-00000001" },
                { entryId: "B", status: "skipped", skippedBecause: "A" },
            ]);
            expect(summary.cancelled).toBe(1);
            expect(store.get("A")).toBeUndefined();
            expect(cloud.list()).toEqual([]);
        });

        it("should keep the record when rollback is disabled", async () => {
            const { run, cloud } = buildHarness();
            const controller = new AbortController();

            const { summary, store } = await run([declare("A", QUEUE)], {
                providers: abortingAfterCreate(cloud, controller),
                signal: controller.signal,
                settings: { rollbackFailedCreates: false },
            });

            expect(summary.outcomes[0]).toMatchObject({ status: "cancelled" });
            expect(store.get("A")?.physicalId).toBe("queue-00000001");
            expect(cloud.list()).toHaveLength(1);
        });

        it("should end a poll sleep early and roll back", async () => {
            const { run, cloud } = buildHarness(5);
            const controller = new AbortController();
            const sleep = vi.fn<Sleep>(async () => {
                controller.abort();
                throw new Error("sleep aborted");
            });

            const { summary, store } = await run([declare("A", QUEUE)], {
                sleep,
                signal: controller.signal,
            });

            expect(summary.outcomes[0]).toMatchObject({
                status: "cancelled",
                error: "A stopped waiting because the run was cancelled",
            });
            expect(sleep).toHaveBeenCalledWith(10, controller.signal);
            expect(store.get("A")).toBeUndefined();
            expect(cloud.list()).toEqual([]);
        });
    });

    describe("given more ready entries than the parallelism limit", () => {
        it("should never run more than the limit at once", async () => {
            const { run, cloud } = buildHarness();
            let active = 0;
            let peak = 0;
            const providers: ProviderRegistry = {
                forKind(kind) {
                    const provider = cloud.forKind(kind);
                    return {
                        ...provider,
                        async create(properties) {
                            active += 1;
                            peak = Math.max(peak, active);
                            await new Promise((resolve) => setImmediate(resolve));
                            active -= 1;
                            return provider.create(properties);
                        },
                    };
                },
            };

            const { summary } = await run(
                [declare("A", QUEUE), declare("B", QUEUE), declare("C", QUEUE), declare("D", QUEUE)],
                { providers, settings: { parallelism: 2 } },
            );

            expect(summary.status).toBe("succeeded");
            expect(peak).toBe(2);
        });
    });

    describe("given a resource leased by another run", () => {
        it("should fail that entry with a LeaseConflictError", async () => {
            const { run } = buildHarness();
            const leases = createLeaseManager(() => 0);
            leases.acquire("A", "other-run/A", 60_000);

            const { summary } = await run([declare("A", QUEUE)], { leases });

            expect(summary.outcomes[0]).toMatchObject({
                status: "failed",
                error: "A is leased by other-run/A",
            });
        });
    });

    describe("given a replace-only change with a dependent", () => {
        it("should create the replacement, re-point the dependent and delete the old resource", async () => {
            const { run, cloud } = buildHarness();
            const { store } = await run([
                declare("Bucket", BUCKET, { BucketName: literal("logs-v1") }),
                declare("Consumer", QUEUE, { Target: ref("Bucket") }),
            ]);

            const { summary } = await run(
                [
                    declare("Bucket", BUCKET, { BucketName: literal("logs-v2") }),
                    declare("Consumer", QUEUE, { Target: ref("Bucket") }),
                ],
                { store },
            );

            expect(statuses(summary)).toEqual([
                ["Bucket#create-new", "succeeded"],
                ["Consumer", "succeeded"],
                ["Bucket#delete-old", "succeeded"],
            ]);
            expect(store.get("Bucket")?.physicalId).toBe("logs-v2");
            expect(store.get("Consumer")?.properties).toEqual({ Target: "logs-v2" });
            expect(cloud.list().map((resource) => resource.physicalId)).toEqual([
                "logs-v2",
                "queue-00000002",
            ]);
        });

        it("should delete a replacement that fails to settle and keep the old record", async () => {
            const { run, cloud } = buildHarness();
            const { store } = await run([
                declare("Bucket", BUCKET, { BucketName: literal("logs-v1") }),
            ]);
            cloud.injectFault(
                BUCKET,
                "describe",
                new ProviderError("Bucket quota exceeded", { transient: false }),
            );

            const { summary } = await run(
                [declare("Bucket", BUCKET, { BucketName: literal("logs-v2") })],
                { store, settings: { rollbackFailedCreates: false } },
            );

            expect(summary.outcomes[0]).toMatchObject({
                entryId: "Bucket#create-new",
                status: "failed",
                error: "Bucket quota exceeded",
            });
            expect(store.get("Bucket")?.physicalId).toBe("logs-v1");
            expect(cloud.list().map((resource) => resource.physicalId)).toEqual(["logs-v1"]);
        });
    });

    describe("given a change set with an unknown prerequisite", () => {
        it("should reject it before running anything", async () => {
            const executor = createChangeSetExecutor({
                providers: createLocalCloud({ catalog }),
                catalog,
                leases: createLeaseManager(),
                logger: { info: vi.fn(), warn: vi.fn(), debug: vi.fn() },
                settings,
            });
            const changeSet = buildChangeSet([buildEntry({ nodeId: "A", prerequisites: ["Z"] })]);

            await expect(
                executor.execute(changeSet, {
                    graph: createResourceGraphBuilder().build([declare("A", QUEUE)]),
                    store: createMemoryStateStore("test-stack"),
                    imports: {},
                }),
            ).rejects.toThrow('Entry "A" lists unknown prerequisite "Z"');
        });
    });
});
