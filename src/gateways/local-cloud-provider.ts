import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { ProviderError } from "../entities/errors.js";
import { type JsonValue, toJsonValue } from "../entities/json-value.js";
import type { ResourceKindDefinition } from "../entities/resource-kind.js";
import { parseSanitizedJson } from "../entities/sanitize-json.js";
import type {
    LiveResource,
    ProviderRegistry,
    ResolvedProperties,
    ResourceProvider,
} from "../use-cases/cloud-provider.port.js";
import type { ResourceKindCatalog } from "../use-cases/resource-kind-catalog.port.js";

export type LocalCloudOperation = "create" | "update" | "delete" | "describe";

export interface LocalCloudOptions {
    readonly catalog: ResourceKindCatalog;
    /** number of describe calls that report a resource as still in progress after a create or update */
    readonly settleAfterPolls?: number | undefined;
}

export interface OpenLocalCloudOptions extends LocalCloudOptions {
    readonly filePath: string;
}

export interface LocalResource {
    readonly kind: string;
    readonly physicalId: string;
    readonly status: string;
    readonly properties: Readonly<Record<string, JsonValue>>;
    readonly outputs: Readonly<Record<string, JsonValue>>;
}

/**
 * An in-process stand-in for a cloud account. Besides the provider
 * operations it lets callers change resources behind the reconciler's back
 * and queue failures for the next call of an operation.
 */
export interface LocalCloud extends ProviderRegistry {
    list(): LocalResource[];
    modify(physicalId: string, patch: Readonly<Record<string, JsonValue>>): Promise<void>;
    setStatus(physicalId: string, status: string): Promise<void>;
    remove(physicalId: string): Promise<void>;
    injectFault(kind: string, operation: LocalCloudOperation, error: Error): void;
}

interface StoredResource {
    kind: string;
    physicalId: string;
    status: string;
    pendingPolls: number;
    properties: Record<string, JsonValue>;
    outputs: Record<string, JsonValue>;
}

interface CloudState {
    nextId: number;
    resources: Map<string, StoredResource>;
}

const JsonRecordSchema = z.record(z.unknown());

const LocalCloudFileSchema = z.object({
    next_id: z.number().int().min(1),
    resources: z.array(
        z.object({
            kind: z.string().min(1),
            physical_id: z.string().min(1),
            status: z.string(),
            pending_polls: z.number().int().min(0),
            properties: JsonRecordSchema,
            outputs: JsonRecordSchema,
        }),
    ),
});

const DEFAULT_READY_STATUS = "active";

function toJsonRecord(values: Readonly<Record<string, unknown>>): Record<string, JsonValue> {
    const result: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(values)) {
        result[key] = toJsonValue(value);
    }
    return result;
}

function shortName(kind: string): string {
    return (kind.split("::").at(-1) ?? kind).toLowerCase();
}

function readyStatus(definition: ResourceKindDefinition | undefined): string {
    return definition?.readyStatuses[0] ?? DEFAULT_READY_STATUS;
}

function chosenName(
    definition: ResourceKindDefinition | undefined,
    properties: ResolvedProperties,
): string | undefined {
    if (definition?.nameProperty === undefined) {
        return undefined;
    }
    const name = properties[definition.nameProperty];
    return typeof name === "string" && name.length > 0 ? name : undefined;
}

function outputsFor(
    definition: ResourceKindDefinition | undefined,
    resource: Pick<StoredResource, "kind" | "physicalId" | "outputs">,
    sequence: number,
): Record<string, JsonValue> {
    const service = definition?.service ?? "local";
    const arn = `arn:local:${service}:::${shortName(resource.kind)}/${resource.physicalId}`;
    switch (resource.kind) {
        case "AWS::EC2::Instance":
            return {
                Arn: arn,
                PrivateIp: `10.0.${Math.floor(sequence / 250) % 250}.${(sequence % 250) + 1}`,
                PublicIp: `198.51.100.${(sequence % 250) + 1}`,
            };
        case "AWS::EC2::LaunchTemplate": {
            const previous = Number(resource.outputs.LatestVersionNumber ?? "0");
            return {
                Arn: arn,
                DefaultVersionNumber: "1",
                LatestVersionNumber: String(previous + 1),
            };
        }
        case "AWS::ElasticLoadBalancingV2::LoadBalancer":
            return {
                Arn: arn,
                DNSName: `${resource.physicalId}.elb.localhost`,
                LoadBalancerFullName: `app/${resource.physicalId}`,
            };
        case "AWS::ElasticLoadBalancingV2::TargetGroup":
            return {
                Arn: arn,
                TargetGroupFullName: `targetgroup/${resource.physicalId}`,
            };
        default:
            return { Arn: arn };
    }
}

function createCloud(
    options: LocalCloudOptions,
    state: CloudState,
    persist: (state: CloudState) => Promise<void>,
): LocalCloud {
    const settleAfterPolls = options.settleAfterPolls ?? 0;
    const faults = new Map<string, Error[]>();

    const takeFault = (kind: string, operation: LocalCloudOperation) => {
        const queued = faults.get(`${kind}/${operation}`);
        const fault = queued?.shift();
        if (fault !== undefined) {
            throw fault;
        }
    };

    const requireResource = (physicalId: string): StoredResource => {
        const resource = state.resources.get(physicalId);
        if (resource === undefined) {
            throw new ProviderError(`${physicalId} does not exist`, {
                transient: false,
            });
        }
        return resource;
    };

    const statusOf = (resource: StoredResource, pending: string): string =>
        resource.pendingPolls > 0 ? pending : resource.status;

    const providerFor = (kind: string): ResourceProvider => {
        const definition = options.catalog.lookupByKind(kind);

        return {
            async create(properties) {
                takeFault(kind, "create");
                const sequence = state.nextId;
                const physicalId =
                    chosenName(definition, properties) ??
                    `${shortName(kind)}-${sequence.toString(16).padStart(8, "0")}`;
                if (state.resources.has(physicalId)) {
                    throw new ProviderError(`${kind} "${physicalId}" already exists`, {
                        transient: false,
                    });
                }
                const resource: StoredResource = {
                    kind,
                    physicalId,
                    status: readyStatus(definition),
                    pendingPolls: settleAfterPolls,
                    properties: { ...properties },
                    outputs: {},
                };
                resource.outputs = outputsFor(definition, resource, sequence);
                state.nextId = sequence + 1;
                state.resources.set(physicalId, resource);
                await persist(state);
                return { physicalId, outputs: resource.outputs };
            },
            async update(physicalId, properties) {
                takeFault(kind, "update");
                const resource = requireResource(physicalId);
                resource.properties = { ...properties };
                resource.outputs = outputsFor(definition, resource, state.nextId);
                resource.status = readyStatus(definition);
                resource.pendingPolls = settleAfterPolls;
                await persist(state);
                return { outputs: resource.outputs };
            },
            async delete(physicalId) {
                takeFault(kind, "delete");
                if (state.resources.delete(physicalId)) {
                    await persist(state);
                }
            },
            async describe(physicalId): Promise<LiveResource | undefined> {
                takeFault(kind, "describe");
                const resource = state.resources.get(physicalId);
                if (resource === undefined) {
                    return undefined;
                }
                const status = statusOf(resource, "pending");
                if (resource.pendingPolls > 0) {
                    resource.pendingPolls -= 1;
                    await persist(state);
                }
                return {
                    status,
                    properties: { ...resource.properties },
                    outputs: { ...resource.outputs },
                };
            },
        };
    };

    return {
        forKind: providerFor,
        list: () =>
            [...state.resources.values()]
                .map((resource) => ({
                    kind: resource.kind,
                    physicalId: resource.physicalId,
                    status: statusOf(resource, "pending"),
                    properties: { ...resource.properties },
                    outputs: { ...resource.outputs },
                }))
                .sort((a, b) => a.physicalId.localeCompare(b.physicalId)),
        async modify(physicalId, patch) {
            const resource = requireResource(physicalId);
            resource.properties = { ...resource.properties, ...patch };
            await persist(state);
        },
        async setStatus(physicalId, status) {
            const resource = requireResource(physicalId);
            resource.status = status;
            resource.pendingPolls = 0;
            await persist(state);
        },
        async remove(physicalId) {
            requireResource(physicalId);
            state.resources.delete(physicalId);
            await persist(state);
        },
        injectFault(kind, operation, error) {
            const key = `${kind}/${operation}`;
            faults.set(key, [...(faults.get(key) ?? []), error]);
        },
    };
}

export function createLocalCloud(options: LocalCloudOptions): LocalCloud {
    return createCloud(
        options,
        { nextId: 1, resources: new Map() },
        async () => undefined,
    );
}

async function loadCloudState(filePath: string): Promise<CloudState> {
    let content: string;
    try {
        content = await readFile(filePath, "utf-8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return { nextId: 1, resources: new Map() };
        }
        throw error;
    }
    const result = LocalCloudFileSchema.safeParse(
        parseSanitizedJson(content, `local cloud file ${filePath}`),
    );
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid local cloud file ${filePath}: ${details}`);
    }
    return {
        nextId: result.data.next_id,
        resources: new Map(
            result.data.resources.map((resource) => [
                resource.physical_id,
                {
                    kind: resource.kind,
                    physicalId: resource.physical_id,
                    status: resource.status,
                    pendingPolls: resource.pending_polls,
                    properties: toJsonRecord(resource.properties),
                    outputs: toJsonRecord(resource.outputs),
                },
            ]),
        ),
    };
}

/**
 * Opens a local cloud whose resources live in a JSON file, so that
 * successive CLI runs see the same account.
 */
export async function openLocalCloud(
    options: OpenLocalCloudOptions,
): Promise<LocalCloud> {
    const { filePath } = options;
    const state = await loadCloudState(filePath);
    let writes: Promise<void> = Promise.resolve();
    let writeCount = 0;

    const persist = (current: CloudState): Promise<void> => {
        const content = `${JSON.stringify(
            {
                next_id: current.nextId,
                resources: [...current.resources.values()].map((resource) => ({
                    kind: resource.kind,
                    physical_id: resource.physicalId,
                    status: resource.status,
                    pending_polls: resource.pendingPolls,
                    properties: resource.properties,
                    outputs: resource.outputs,
                })),
            },
            null,
            2,
        )}\n`;
        writeCount += 1;
        const temporary = `${filePath}.${writeCount}.tmp`;
        const write = writes.then(async () => {
            await mkdir(dirname(filePath), { recursive: true });
            await writeFile(temporary, content, "utf-8");
            await rename(temporary, filePath);
        });
        writes = write.catch(() => undefined);
        return write;
    };

    return createCloud(options, state, persist);
}
