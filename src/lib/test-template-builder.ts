import Chance from "chance";
import type { ChangeSet, ChangeSetEntry } from "../entities/change-set.js";
import type { ResourceDeclaration } from "../entities/resource-node.js";

const chance = new Chance();

interface TemplateResourceInput {
    readonly Type: string;
    readonly Properties?: Record<string, unknown>;
    readonly DependsOn?: string | readonly string[];
}

interface TemplateInput {
    readonly Description?: string;
    readonly Parameters?: Record<
        string,
        { readonly Type: string; readonly Default?: string | number | boolean }
    >;
    readonly Resources: Record<string, TemplateResourceInput>;
    readonly Outputs?: Record<
        string,
        {
            readonly Value: unknown;
            readonly Description?: string;
            readonly Export?: { readonly Name: string };
        }
    >;
}

// Template documents keep their PascalCase keys
export function buildTemplateJson(template: TemplateInput): string {
    return JSON.stringify(template);
}

export function buildLogicalId(): string {
    return chance.string({ length: 10, pool: "ABCDEFGHIJKLMNOPQRSTUVWXYZ" });
}

export function buildDeclaration(
    overrides?: Partial<ResourceDeclaration>,
): ResourceDeclaration {
    return {
        logicalId: buildLogicalId(),
        kind: "AWS::ElasticLoadBalancingV2::TargetGroup",
        properties: {},
        dependsOn: [],
        ...overrides,
    };
}

export function buildEntry(overrides?: Partial<ChangeSetEntry>): ChangeSetEntry {
    const nodeId = overrides?.nodeId ?? buildLogicalId();
    return {
        entryId: nodeId,
        nodeId,
        kind: "AWS::ElasticLoadBalancingV2::TargetGroup",
        action: "create",
        prerequisites: [],
        changedProperties: [],
        ...overrides,
    };
}

export function buildChangeSet(
    entries: readonly ChangeSetEntry[],
    overrides?: Partial<ChangeSet>,
): ChangeSet {
    return {
        stackName: "test-stack",
        templateHash: chance.hash({ length: 64 }),
        entries,
        ...overrides,
    };
}
