import type { PropertyBag } from "./reference-expression.js";

export type LifecycleState =
    | "pending"
    | "creating"
    | "active"
    | "updating"
    | "deleting"
    | "failed"
    | "deleted";

export interface ResourceDeclaration {
    readonly logicalId: string;
    readonly kind: string;
    readonly properties: PropertyBag;
    readonly dependsOn: readonly string[];
}

export interface ResourceNode extends ResourceDeclaration {
    lifecycle: LifecycleState;
}
