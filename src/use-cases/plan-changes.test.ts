import { describe, expect, it } from "vitest";
import type { ChangeSet } from "../entities/change-set.js";
import { PlanConflictError, UnresolvedReferenceError } from "../entities/errors.js";
import {
    getAttribute,
    importValue,
    literal,
    type PropertyBag,
    ref,
} from "../entities/reference-expression.js";
import type { ResourceKindDefinition } from "../entities/resource-kind.js";
import type { ResourceDeclaration } from "../entities/resource-node.js";
import type { StackSnapshot, StateRecord } from "../entities/state-record.js";
import { buildRecord, buildSnapshot } from "../lib/test-state-builder.js";
import { createResourceGraphBuilder } from "./build-resource-graph.js";
import { createChangePlanner } from "./plan-changes.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";

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
        replaceOnly: ["BucketName", "Region"],
        nameProperty: "BucketName",
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
];

const catalog: ResourceKindCatalog = {
    lookupByKind: (kind) => KINDS.find((definition) => definition.kind === kind),
};

function declare(
    logicalId: string,
    kind: string,
    properties: PropertyBag,
    dependsOn: readonly string[] = [],
): ResourceDeclaration {
    return { logicalId, kind, properties, dependsOn };
}

function record(
    kind: string,
    physicalId: string,
    properties: StateRecord["properties"],
    extra?: Partial<StateRecord>,
): StateRecord {
    return buildRecord({ kind, physicalId, properties, ...extra });
}

function plan(
    declarations: readonly ResourceDeclaration[],
    snapshot: StackSnapshot = buildSnapshot({}),
    imports: Readonly<Record<string, string>> = {},
): ChangeSet {
    const graph = createResourceGraphBuilder().build(declarations);
    return createChangePlanner({ catalog }).plan({
        graph,
        snapshot,
        imports,
        templateHash: "template-hash",
    });
}

function indexOf(changeSet: ChangeSet, entryId: string): number {
    return changeSet.entries.findIndex((entry) => entry.entryId === entryId);
}

describe("PlanChanges", () => {
    describe("given A and B where B reads an output of A", () => {
        const a = declare("A", QUEUE, { Fifo: literal(false), Retention: literal(60) });
        const template = (retention: number) => [
            a,
            declare("B", QUEUE, {
                DeadLetterArn: getAttribute("A", "Arn"),
                Retention: literal(retention),
            }),
        ];
        const applied = buildSnapshot({
            A: record(QUEUE, "queue-a", { Fifo: false, Retention: 60 }, {
                outputs: { Arn: "arn:queue-a" },
            }),
            B: record(QUEUE, "queue-b", { DeadLetterArn: "arn:queue-a", Retention: 30 }, {
                dependencies: ["A"],
            }),
        });

        it("should create both, A first, on an empty state", () => {
            const result = plan(template(30));

            expect(result.stackName).toBe("test-stack");
            expect(result.templateHash).toBe("template-hash");
            expect(result.entries).toEqual([
                {
                    entryId: "A",
                    nodeId: "A",
                    kind: QUEUE,
                    action: "create",
                    prerequisites: [],
                    changedProperties: ["Fifo", "Retention"],
                },
                {
                    entryId: "B",
                    nodeId: "B",
                    kind: QUEUE,
                    action: "create",
                    prerequisites: ["A"],
                    changedProperties: ["DeadLetterArn", "Retention"],
                },
            ]);
        });

        it("should plan nothing but no-ops right after an apply", () => {
            const result = plan(template(30), applied);

            expect(result.entries.map((entry) => [entry.entryId, entry.action])).toEqual([
                ["A", "no-op"],
                ["B", "no-op"],
            ]);
        });

        it("should update only B when B's own property changes", () => {
            const result = plan(template(45), applied);

            expect(result.entries.map((entry) => [entry.entryId, entry.action])).toEqual([
                ["A", "no-op"],
                ["B", "update"],
            ]);
            expect(result.entries[1]?.changedProperties).toEqual(["Retention"]);
        });

        it("should delete only B when B leaves the template", () => {
            const result = plan([a], applied);

            expect(result.entries).toEqual([
                {
                    entryId: "A",
                    nodeId: "A",
                    kind: QUEUE,
                    action: "no-op",
                    prerequisites: [],
                    changedProperties: [],
                },
                {
                    entryId: "B",
                    nodeId: "B",
                    kind: QUEUE,
                    action: "delete",
                    prerequisites: [],
                    changedProperties: [],
                    priorPhysicalId: "queue-b",
                },
            ]);
        });
    });

    describe("given an update to a referenced resource", () => {
        const snapshot = buildSnapshot({
            A: record(QUEUE, "queue-a", { Retention: 60 }, { outputs: { Arn: "arn:queue-a" } }),
            ByRef: record(QUEUE, "queue-r", { Source: "queue-a" }, { dependencies: ["A"] }),
            ByAttribute: record(QUEUE, "queue-t", { Source: "arn:queue-a" }, {
                dependencies: ["A"],
            }),
        });

        it("should keep Ref readers unchanged and update attribute readers", () => {
            const result = plan(
                [
                    declare("A", QUEUE, { Retention: literal(90) }),
                    declare("ByRef", QUEUE, { Source: ref("A") }),
                    declare("ByAttribute", QUEUE, { Source: getAttribute("A", "Arn") }),
                ],
                snapshot,
            );

            expect(result.entries.map((entry) => [entry.entryId, entry.action])).toEqual([
                ["A", "update"],
                ["ByAttribute", "update"],
                ["ByRef", "no-op"],
            ]);
        });
    });

    describe("given a replace-only change with a dependent", () => {
        const snapshot = buildSnapshot({
            Bucket: record(BUCKET, "logs-v1", { BucketName: "logs-v1" }),
            Consumer: record(QUEUE, "queue-c", { Target: "logs-v1" }, {
                dependencies: ["Bucket"],
            }),
        });
        const declarations = [
            declare("Bucket", BUCKET, { BucketName: literal("logs-v2") }),
            declare("Consumer", QUEUE, { Target: ref("Bucket") }),
        ];

        it("should create the new resource, re-point the dependent, then delete the old one", () => {
            const result = plan(declarations, snapshot);

            expect(result.entries).toEqual([
                {
                    entryId: "Bucket#create-new",
                    nodeId: "Bucket",
                    kind: BUCKET,
                    action: "replace",
                    phase: "create-new",
                    prerequisites: [],
                    changedProperties: ["BucketName"],
                },
                {
                    entryId: "Consumer",
                    nodeId: "Consumer",
                    kind: QUEUE,
                    action: "update",
                    prerequisites: ["Bucket#create-new"],
                    changedProperties: ["Target"],
                },
                {
                    entryId: "Bucket#delete-old",
                    nodeId: "Bucket",
                    kind: BUCKET,
                    action: "replace",
                    phase: "delete-old",
                    prerequisites: ["Bucket#create-new", "Consumer"],
                    changedProperties: [],
                    priorPhysicalId: "logs-v1",
                },
            ]);
        });

        it("should order create-new before the dependent and the dependent before delete-old", () => {
            const result = plan(declarations, snapshot);

            expect(indexOf(result, "Bucket#create-new")).toBeLessThan(
                indexOf(result, "Consumer"),
            );
            expect(indexOf(result, "Consumer")).toBeLessThan(
                indexOf(result, "Bucket#delete-old"),
            );
        });
    });

    describe("given a resource whose kind changed", () => {
        it("should replace it", () => {
            const snapshot = buildSnapshot({
                Store: record(QUEUE, "queue-s", { Retention: 60 }),
            });

            const result = plan(
                [declare("Store", BUCKET, { BucketName: literal("store") })],
                snapshot,
            );

            expect(result.entries.map((entry) => entry.entryId)).toEqual([
                "Store#create-new",
                "Store#delete-old",
            ]);
            expect(result.entries[0]?.changedProperties).toEqual(["BucketName", "Retention"]);
            expect(result.entries[1]?.kind).toBe(QUEUE);
        });
    });

    describe("given a kind the catalog does not know", () => {
        it("should replace on any property change", () => {
            const snapshot = buildSnapshot({
                Thing: record("Test::Unknown::Thing", "thing-1", { Size: 1 }),
            });

            const result = plan(
                [declare("Thing", "Test::Unknown::Thing", { Size: literal(2) })],
                snapshot,
            );

            expect(result.entries[0]?.action).toBe("replace");
        });
    });

    describe("given several removed resources that depend on each other", () => {
        it("should delete dependents before what they depended on", () => {
            const snapshot = buildSnapshot({
                X: record(QUEUE, "queue-x", {}),
                Y: record(QUEUE, "queue-y", { Source: "queue-x" }, { dependencies: ["X"] }),
            });

            const result = plan([declare("Keep", QUEUE, {})], snapshot);

            expect(
                result.entries.map((entry) => [entry.entryId, entry.action, entry.prerequisites]),
            ).toEqual([
                ["Keep", "create", []],
                ["Y", "delete", []],
                ["X", "delete", ["Y"]],
            ]);
        });
    });

    describe("given two resources claiming the same physical name", () => {
        it("should throw a PlanConflictError", () => {
            const declarations = [
                declare("First", BUCKET, { BucketName: literal("logs") }),
                declare("Second", BUCKET, { BucketName: literal("logs") }),
            ];

            expect(() => plan(declarations)).toThrow(PlanConflictError);
            expect(() => plan(declarations)).toThrow(
                'Physical name "logs" is claimed by First, Second: resources of kind Test::Storage::Bucket cannot share a physical name',
            );
        });
    });

    describe("given a replacement that keeps its physical name", () => {
        it("should throw a PlanConflictError", () => {
            const snapshot = buildSnapshot({
                Bucket: record(BUCKET, "logs", { BucketName: "logs", Region: "us" }),
            });

            expect(() =>
                plan(
                    [
                        declare("Bucket", BUCKET, {
                            BucketName: literal("logs"),
                            Region: literal("eu"),
                        }),
                    ],
                    snapshot,
                ),
            ).toThrow(
                'Physical name "logs" is claimed by Bucket: the replacement is created before the old resource is deleted, so it needs a new name',
            );
        });
    });

    describe("given a new resource taking the name of a removed one", () => {
        it("should throw a PlanConflictError", () => {
            const snapshot = buildSnapshot({
                Old: record(BUCKET, "logs", { BucketName: "logs" }),
            });

            expect(() =>
                plan([declare("New", BUCKET, { BucketName: literal("logs") })], snapshot),
            ).toThrow('Physical name "logs" is claimed by New, Old: Old is deleted only after New is created');
        });
    });

    describe("given a cross-stack import", () => {
        it("should resolve it from the supplied exports", () => {
            const snapshot = buildSnapshot({
                Group: record(QUEUE, "queue-g", { VpcId: "vpc-1" }),
            });
            const declarations = [declare("Group", QUEUE, { VpcId: importValue("shared-vpc") })];

            const result = plan(declarations, snapshot, { "shared-vpc": "vpc-2" });

            expect(result.entries[0]).toMatchObject({
                action: "update",
                changedProperties: ["VpcId"],
            });
        });

        it("should fail when the export is missing", () => {
            const declarations = [declare("Group", QUEUE, { VpcId: importValue("shared-vpc") })];

            expect(() => plan(declarations)).toThrow(UnresolvedReferenceError);
        });
    });

    describe("given any valid graph", () => {
        it("should list every dependency's entry before its dependents", () => {
            const declarations = [
                declare("Alarm", QUEUE, { Policy: ref("Policy"), Group: ref("Group") }),
                declare("Policy", QUEUE, { Group: ref("Group") }),
                declare("Group", QUEUE, { Template: getAttribute("Template", "Arn") }, [
                    "Listener",
                ]),
                declare("Listener", QUEUE, { Lb: ref("Lb") }),
                declare("Template", QUEUE, {}),
                declare("Lb", QUEUE, {}),
            ];

            const result = plan(declarations);

            for (const entry of result.entries) {
                for (const prerequisite of entry.prerequisites) {
                    expect(indexOf(result, prerequisite)).toBeLessThan(
                        indexOf(result, entry.entryId),
                    );
                }
            }
            expect(result.entries).toHaveLength(6);
        });
    });
});
