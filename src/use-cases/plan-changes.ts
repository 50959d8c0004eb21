import {
    type ChangeAction,
    type ChangeSet,
    type ChangeSetEntry,
    entryIdFor,
} from "../entities/change-set.js";
import { CycleError, PlanConflictError } from "../entities/errors.js";
import { type JsonValue, jsonEquals } from "../entities/json-value.js";
import {
    isMutableProperty,
    type ResourceKindDefinition,
} from "../entities/resource-kind.js";
import type { ResourceNode } from "../entities/resource-node.js";
import type { StackSnapshot, StateRecord } from "../entities/state-record.js";
import type { ResourceGraph } from "./build-resource-graph.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";
import {
    type ResolutionContext,
    type ResolvedProperty,
    resolvePropertyBag,
} from "./resolve-properties.js";

export interface ChangePlannerDeps {
    readonly catalog: ResourceKindCatalog;
}

export interface PlanRequest {
    readonly graph: ResourceGraph;
    readonly snapshot: StackSnapshot;
    readonly imports: Readonly<Record<string, JsonValue>>;
    readonly templateHash: string;
}

export interface ChangePlanner {
    plan(request: PlanRequest): ChangeSet;
}

type ForwardAction = Exclude<ChangeAction, "delete">;

interface Decision {
    readonly node: ResourceNode;
    readonly action: ForwardAction;
    readonly changed: readonly string[];
    readonly physicalName?: string | undefined;
}

interface DeleteCandidate {
    readonly nodeId: string;
    readonly entryId: string;
    readonly record: StateRecord;
    readonly replaced: boolean;
}

function physicalNameOf(
    definition: ResourceKindDefinition | undefined,
    value: JsonValue | undefined,
): string | undefined {
    if (definition?.nameProperty === undefined) {
        return undefined;
    }
    return typeof value === "string" ? value : undefined;
}

function recordedName(
    catalog: ResourceKindCatalog,
    record: StateRecord,
): string | undefined {
    const definition = catalog.lookupByKind(record.kind);
    const nameProperty = definition?.nameProperty;
    if (nameProperty === undefined) {
        return undefined;
    }
    return physicalNameOf(definition, record.properties[nameProperty]);
}

function changedProperties(
    resolved: Readonly<Record<string, ResolvedProperty>>,
    record: StateRecord,
): string[] {
    const names = new Set([
        ...Object.keys(resolved),
        ...Object.keys(record.properties),
    ]);
    return [...names].sort().filter((name) => {
        const current = resolved[name];
        if (current === undefined || current.status === "pending") {
            return true;
        }
        return !jsonEquals(current.value, record.properties[name]);
    });
}

function decide(
    node: ResourceNode,
    record: StateRecord | undefined,
    resolved: Readonly<Record<string, ResolvedProperty>>,
    definition: ResourceKindDefinition | undefined,
): Omit<Decision, "node" | "physicalName"> {
    if (record === undefined) {
        return { action: "create", changed: Object.keys(resolved).sort() };
    }
    if (record.kind !== node.kind) {
        const names = new Set([
            ...Object.keys(resolved),
            ...Object.keys(record.properties),
        ]);
        return { action: "replace", changed: [...names].sort() };
    }

    const changed = changedProperties(resolved, record);
    if (changed.length === 0) {
        return { action: "no-op", changed };
    }
    const inPlace = changed.every((name) => isMutableProperty(definition, name));
    return { action: inPlace ? "update" : "replace", changed };
}

function checkNameConflicts(
    decisions: ReadonlyMap<string, Decision>,
    snapshot: StackSnapshot,
    removed: readonly string[],
    catalog: ResourceKindCatalog,
): void {
    const claims = new Map<string, string[]>();
    const claimKey = (kind: string, name: string) => `${kind}\u0000${name}`;

    for (const [id, decision] of decisions) {
        if (decision.physicalName !== undefined) {
            const key = claimKey(decision.node.kind, decision.physicalName);
            claims.set(key, [...(claims.get(key) ?? []), id]);
        }
    }
    for (const [key, claimants] of claims) {
        if (claimants.length > 1) {
            const [kind = "", name = ""] = key.split("\u0000");
            throw new PlanConflictError(
                name,
                claimants,
                `resources of kind ${kind} cannot share a physical name`,
            );
        }
    }

    for (const [id, decision] of decisions) {
        const record = snapshot.records[id];
        if (
            decision.action !== "replace" ||
            decision.physicalName === undefined ||
            record === undefined ||
            record.kind !== decision.node.kind
        ) {
            continue;
        }
        if (recordedName(catalog, record) === decision.physicalName) {
            throw new PlanConflictError(
                decision.physicalName,
                [id],
                "the replacement is created before the old resource is deleted, so it needs a new name",
            );
        }
    }

    for (const id of removed) {
        const record = snapshot.records[id];
        const name = record && recordedName(catalog, record);
        if (record === undefined || name === undefined) {
            continue;
        }
        const claimants = (claims.get(claimKey(record.kind, name)) ?? []).filter(
            (claimant) => {
                const action = decisions.get(claimant)?.action;
                return action === "create" || action === "replace";
            },
        );
        if (claimants.length > 0) {
            throw new PlanConflictError(
                name,
                [...claimants, id],
                `${id} is deleted only after ${claimants.join(", ")} is created`,
            );
        }
    }
}

function orderDeletePhase(entries: readonly ChangeSetEntry[]): ChangeSetEntry[] {
    const byId = new Map(entries.map((entry) => [entry.entryId, entry]));
    const emitted = new Set<string>();
    const ordered: ChangeSetEntry[] = [];
    const isReady = (entry: ChangeSetEntry) =>
        entry.prerequisites.every(
            (prerequisite) => !byId.has(prerequisite) || emitted.has(prerequisite),
        );

    while (ordered.length < entries.length) {
        const next = entries
            .filter((entry) => !emitted.has(entry.entryId) && isReady(entry))
            .sort((a, b) => a.nodeId.localeCompare(b.nodeId))[0];
        if (next === undefined) {
            throw new CycleError(
                entries
                    .filter((entry) => !emitted.has(entry.entryId))
                    .map((entry) => entry.entryId),
            );
        }
        emitted.add(next.entryId);
        ordered.push(next);
    }
    return ordered;
}

export function createChangePlanner(deps: ChangePlannerDeps): ChangePlanner {
    return {
        plan(request: PlanRequest): ChangeSet {
            const { graph, snapshot } = request;
            const order = graph.topologicalOrder();
            const decisions = new Map<string, Decision>();

            const context: ResolutionContext = {
                record: (resourceId) => snapshot.records[resourceId],
                importValue: (exportName) => request.imports[exportName],
                isPending(reference) {
                    const action = decisions.get(reference.resourceId)?.action;
                    if (action === "create" || action === "replace") {
                        return true;
                    }
                    // attributes may change on update; physical ids do not
                    return reference.kind === "get-attribute" && action === "update";
                },
            };

            for (const id of order) {
                const node = graph.node(id);
                if (node === undefined) {
                    continue;
                }
                const definition = deps.catalog.lookupByKind(node.kind);
                const resolved = resolvePropertyBag(node.properties, context, id);
                const nameProperty = definition?.nameProperty;
                const nameValue =
                    nameProperty === undefined ? undefined : resolved[nameProperty];

                decisions.set(id, {
                    node,
                    ...decide(node, snapshot.records[id], resolved, definition),
                    physicalName: physicalNameOf(
                        definition,
                        nameValue?.status === "resolved" ? nameValue.value : undefined,
                    ),
                });
            }

            const removed = Object.keys(snapshot.records)
                .filter((id) => !graph.has(id))
                .sort();
            checkNameConflicts(decisions, snapshot, removed, deps.catalog);

            const forwardEntryId = (id: string) =>
                entryIdFor(
                    id,
                    decisions.get(id)?.action === "replace" ? "create-new" : undefined,
                );

            const forward = order.flatMap((id): ChangeSetEntry[] => {
                const decision = decisions.get(id);
                if (decision === undefined) {
                    return [];
                }
                return [
                    {
                        entryId: forwardEntryId(id),
                        nodeId: id,
                        kind: decision.node.kind,
                        action: decision.action,
                        phase: decision.action === "replace" ? "create-new" : undefined,
                        prerequisites: graph.dependenciesOf(id).map(forwardEntryId),
                        changedProperties: decision.changed,
                    },
                ];
            });

            const candidates: DeleteCandidate[] = [];
            for (const id of removed) {
                const record = snapshot.records[id];
                if (record) {
                    candidates.push({ nodeId: id, entryId: id, record, replaced: false });
                }
            }
            for (const id of order) {
                const record = snapshot.records[id];
                if (record && decisions.get(id)?.action === "replace") {
                    candidates.push({
                        nodeId: id,
                        entryId: entryIdFor(id, "delete-old"),
                        record,
                        replaced: true,
                    });
                }
            }

            const deletePhase = candidates.map((candidate): ChangeSetEntry => {
                const prerequisites = new Set<string>();
                if (candidate.replaced) {
                    prerequisites.add(entryIdFor(candidate.nodeId, "create-new"));
                    for (const dependent of graph.dependentsOf(candidate.nodeId)) {
                        prerequisites.add(forwardEntryId(dependent));
                    }
                }
                // whatever referenced the old resource must have moved off it first
                for (const id of order) {
                    if (
                        id !== candidate.nodeId &&
                        snapshot.records[id]?.dependencies.includes(candidate.nodeId)
                    ) {
                        prerequisites.add(forwardEntryId(id));
                    }
                }
                for (const other of candidates) {
                    if (
                        other.nodeId !== candidate.nodeId &&
                        other.record.dependencies.includes(candidate.nodeId)
                    ) {
                        prerequisites.add(other.entryId);
                    }
                }

                return {
                    entryId: candidate.entryId,
                    nodeId: candidate.nodeId,
                    kind: candidate.record.kind,
                    action: candidate.replaced ? "replace" : "delete",
                    phase: candidate.replaced ? "delete-old" : undefined,
                    prerequisites: [...prerequisites].sort(),
                    changedProperties: [],
                    priorPhysicalId: candidate.record.physicalId,
                };
            });

            return {
                stackName: snapshot.stackName,
                templateHash: request.templateHash,
                entries: [...forward, ...orderDeletePhase(deletePhase)],
            };
        },
    };
}
