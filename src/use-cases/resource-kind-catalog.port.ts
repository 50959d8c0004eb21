import type { ResourceKindDefinition } from "../entities/resource-kind.js";

export interface ResourceKindCatalog {
    lookupByKind(kind: string): ResourceKindDefinition | undefined;
}
