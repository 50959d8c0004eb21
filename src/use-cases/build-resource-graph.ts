import { CycleError, UnresolvedReferenceError } from "../entities/errors.js";
import {
    collectBagReferences,
    EXTERNAL_IMPORT_PREFIX,
    externalImportId,
} from "../entities/reference-expression.js";
import type {
    LifecycleState,
    ResourceDeclaration,
    ResourceNode,
} from "../entities/resource-node.js";

/**
 * Resources and the edges between them. An edge runs from the referencing
 * resource to the one it references; cross-stack imports end at synthetic
 * `import:<name>` nodes that never appear in {@link ResourceGraph.nodes}.
 */
export interface ResourceGraph {
    nodes(): readonly ResourceNode[];
    node(logicalId: string): ResourceNode | undefined;
    has(logicalId: string): boolean;
    /** resource ids this node depends on, imports excluded, sorted */
    dependenciesOf(logicalId: string): readonly string[];
    /** resource ids that depend directly on this node, sorted */
    dependentsOf(logicalId: string): readonly string[];
    externalImportsOf(logicalId: string): readonly string[];
    transitiveDependentsOf(logicalId: string): ReadonlySet<string>;
    /** dependencies before dependents; independent nodes by logical id */
    topologicalOrder(): readonly string[];
    setLifecycle(logicalId: string, state: LifecycleState): void;
}

export interface ResourceGraphBuilder {
    build(declarations: readonly ResourceDeclaration[]): ResourceGraph;
}

export function isExternalImportId(id: string): boolean {
    return id.startsWith(EXTERNAL_IMPORT_PREFIX);
}

function collectEdges(
    declaration: ResourceDeclaration,
    declared: ReadonlySet<string>,
): Set<string> {
    const targets = new Set<string>();

    for (const reference of collectBagReferences(declaration.properties)) {
        if (reference.kind === "import-value") {
            targets.add(externalImportId(reference.exportName));
            continue;
        }
        if (!declared.has(reference.resourceId)) {
            throw new UnresolvedReferenceError(
                declaration.logicalId,
                reference.resourceId,
            );
        }
        targets.add(reference.resourceId);
    }

    for (const dependency of declaration.dependsOn) {
        if (!declared.has(dependency)) {
            throw new UnresolvedReferenceError(
                declaration.logicalId,
                dependency,
                "is named in DependsOn but not declared in the template",
            );
        }
        targets.add(dependency);
    }

    return targets;
}

function findCycle(
    ids: readonly string[],
    edges: ReadonlyMap<string, readonly string[]>,
): string[] | undefined {
    const visited = new Set<string>();
    const onStack = new Set<string>();
    const stack: string[] = [];

    const visit = (id: string): string[] | undefined => {
        visited.add(id);
        onStack.add(id);
        stack.push(id);

        for (const target of edges.get(id) ?? []) {
            if (onStack.has(target)) {
                return [...stack.slice(stack.indexOf(target)), target];
            }
            if (!visited.has(target)) {
                const cycle = visit(target);
                if (cycle) {
                    return cycle;
                }
            }
        }

        stack.pop();
        onStack.delete(id);
        return undefined;
    };

    for (const id of ids) {
        if (!visited.has(id)) {
            const cycle = visit(id);
            if (cycle) {
                return cycle;
            }
        }
    }
    return undefined;
}

function sortTopologically(
    ids: readonly string[],
    dependencies: ReadonlyMap<string, readonly string[]>,
    dependents: ReadonlyMap<string, readonly string[]>,
): string[] {
    const remaining = new Map<string, number>();
    for (const id of ids) {
        remaining.set(id, dependencies.get(id)?.length ?? 0);
    }

    const ready = ids.filter((id) => remaining.get(id) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
        ready.sort();
        const next = ready.shift();
        if (next === undefined) {
            break;
        }
        order.push(next);
        for (const dependent of dependents.get(next) ?? []) {
            const count = (remaining.get(dependent) ?? 0) - 1;
            remaining.set(dependent, count);
            if (count === 0) {
                ready.push(dependent);
            }
        }
    }
    return order;
}

export function createResourceGraphBuilder(): ResourceGraphBuilder {
    return {
        build(declarations: readonly ResourceDeclaration[]): ResourceGraph {
            const nodes = new Map<string, ResourceNode>();
            for (const declaration of declarations) {
                if (nodes.has(declaration.logicalId)) {
                    throw new Error(
                        `Duplicate logical id "${declaration.logicalId}" in template`,
                    );
                }
                nodes.set(declaration.logicalId, {
                    ...declaration,
                    lifecycle: "pending",
                });
            }

            const ids = [...nodes.keys()].sort();
            const declared = new Set(ids);
            const edges = new Map<string, string[]>();
            const dependencies = new Map<string, string[]>();
            const dependents = new Map<string, string[]>();
            const imports = new Map<string, string[]>();

            for (const id of ids) {
                dependents.set(id, []);
            }
            for (const node of nodes.values()) {
                const targets = [...collectEdges(node, declared)].sort();
                edges.set(node.logicalId, targets);
                dependencies.set(
                    node.logicalId,
                    targets.filter((target) => !isExternalImportId(target)),
                );
                imports.set(
                    node.logicalId,
                    targets.filter((target) => isExternalImportId(target)),
                );
            }
            for (const id of ids) {
                for (const dependency of dependencies.get(id) ?? []) {
                    dependents.get(dependency)?.push(id);
                }
            }

            const cycle = findCycle(ids, edges);
            if (cycle) {
                throw new CycleError(cycle);
            }

            const order = sortTopologically(ids, dependencies, dependents);

            return {
                nodes: () => ids.flatMap((id) => nodes.get(id) ?? []),
                node: (logicalId) => nodes.get(logicalId),
                has: (logicalId) => nodes.has(logicalId),
                dependenciesOf: (logicalId) => dependencies.get(logicalId) ?? [],
                dependentsOf: (logicalId) => dependents.get(logicalId) ?? [],
                externalImportsOf: (logicalId) => imports.get(logicalId) ?? [],
                transitiveDependentsOf(logicalId) {
                    const found = new Set<string>();
                    const queue = [...(dependents.get(logicalId) ?? [])];
                    for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
                        if (!found.has(id)) {
                            found.add(id);
                            queue.push(...(dependents.get(id) ?? []));
                        }
                    }
                    return found;
                },
                topologicalOrder: () => order,
                setLifecycle(logicalId, state) {
                    const node = nodes.get(logicalId);
                    if (node) {
                        node.lifecycle = state;
                    }
                },
            };
        },
    };
}
