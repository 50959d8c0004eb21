import type { JsonValue } from "../entities/json-value.js";

export type ResolvedProperties = Readonly<Record<string, JsonValue>>;

export interface CreateResult {
    readonly physicalId: string;
    readonly outputs: Readonly<Record<string, JsonValue>>;
}

export interface UpdateResult {
    readonly outputs: Readonly<Record<string, JsonValue>>;
}

export interface LiveResource {
    readonly status: string;
    readonly properties: ResolvedProperties;
    readonly outputs: Readonly<Record<string, JsonValue>>;
}

/**
 * Operations for one resource kind. Implementations signal failures with
 * `ProviderError`, marking throttling and other retryable conditions transient.
 */
export interface ResourceProvider {
    create(properties: ResolvedProperties): Promise<CreateResult>;
    update(physicalId: string, properties: ResolvedProperties): Promise<UpdateResult>;
    /** Deleting a resource that no longer exists succeeds. */
    delete(physicalId: string): Promise<void>;
    describe(physicalId: string): Promise<LiveResource | undefined>;
}

export interface ProviderRegistry {
    forKind(kind: string): ResourceProvider;
}
