import { UnresolvedReferenceError } from "../entities/errors.js";
import type { JsonValue } from "../entities/json-value.js";
import type {
    PropertyBag,
    PropertyValue,
    ResourceReference,
} from "../entities/reference-expression.js";
import type { StateRecord } from "../entities/state-record.js";

export interface ResolutionContext {
    record(resourceId: string): StateRecord | undefined;
    importValue(exportName: string): JsonValue | undefined;
    /** true when the referenced value will change before the referrer is applied */
    isPending(reference: ResourceReference): boolean;
}

export type ResolvedProperty =
    | { readonly status: "resolved"; readonly value: JsonValue }
    | { readonly status: "pending"; readonly waitingOn: readonly string[] };

type Resolution =
    | { readonly pending: false; readonly value: JsonValue }
    | { readonly pending: true; readonly waitingOn: readonly string[] };

function resolveReference(
    reference: ResourceReference,
    context: ResolutionContext,
    referencedBy: string,
): Resolution {
    const record = context.record(reference.resourceId);
    if (record === undefined || context.isPending(reference)) {
        return { pending: true, waitingOn: [reference.resourceId] };
    }
    if (reference.kind === "ref") {
        return { pending: false, value: record.physicalId };
    }
    const attribute = record.outputs[reference.attribute];
    if (attribute === undefined) {
        throw new UnresolvedReferenceError(
            referencedBy,
            `${reference.resourceId}.${reference.attribute}`,
            `is not an output of ${record.kind}`,
        );
    }
    return { pending: false, value: attribute };
}

function combine(
    parts: readonly Resolution[],
    build: (values: JsonValue[]) => JsonValue,
): Resolution {
    const waitingOn = parts.flatMap((part) => (part.pending ? part.waitingOn : []));
    if (waitingOn.length > 0) {
        return { pending: true, waitingOn: [...new Set(waitingOn)] };
    }
    return {
        pending: false,
        value: build(parts.flatMap((part) => (part.pending ? [] : [part.value]))),
    };
}

function resolveValue(
    value: PropertyValue,
    context: ResolutionContext,
    referencedBy: string,
): Resolution {
    switch (value.kind) {
        case "literal":
            return { pending: false, value: value.value };
        case "ref":
        case "get-attribute":
            return resolveReference(value, context, referencedBy);
        case "import-value": {
            const imported = context.importValue(value.exportName);
            if (imported === undefined) {
                throw new UnresolvedReferenceError(
                    referencedBy,
                    value.exportName,
                    "is not an available export",
                );
            }
            return { pending: false, value: imported };
        }
        case "list":
            return combine(
                value.items.map((item) => resolveValue(item, context, referencedBy)),
                (values) => values,
            );
        case "object": {
            const entries = Object.entries(value.fields);
            return combine(
                entries.map(([, field]) => resolveValue(field, context, referencedBy)),
                (values) => {
                    const result: Record<string, JsonValue> = {};
                    entries.forEach(([key], index) => {
                        result[key] = values[index] ?? null;
                    });
                    return result;
                },
            );
        }
    }
}

/** Resolves each top-level property independently so unaffected ones still compare. */
export function resolvePropertyBag(
    bag: PropertyBag,
    context: ResolutionContext,
    referencedBy: string,
): Record<string, ResolvedProperty> {
    const result: Record<string, ResolvedProperty> = {};
    for (const [name, value] of Object.entries(bag)) {
        const resolution = resolveValue(value, context, referencedBy);
        result[name] = resolution.pending
            ? { status: "pending", waitingOn: resolution.waitingOn }
            : { status: "resolved", value: resolution.value };
    }
    return result;
}

export function resolveValueFully(
    value: PropertyValue,
    context: ResolutionContext,
    referencedBy: string,
): JsonValue {
    const resolution = resolveValue(value, context, referencedBy);
    if (resolution.pending) {
        throw new UnresolvedReferenceError(
            referencedBy,
            resolution.waitingOn.join(", "),
            "is not active yet",
        );
    }
    return resolution.value;
}

export function resolveBagFully(
    bag: PropertyBag,
    context: ResolutionContext,
    referencedBy: string,
): Record<string, JsonValue> {
    const result: Record<string, JsonValue> = {};
    for (const [name, value] of Object.entries(bag)) {
        result[name] = resolveValueFully(value, context, referencedBy);
    }
    return result;
}

/** A context over committed state, where nothing is pending. */
export function stateResolutionContext(
    record: (resourceId: string) => StateRecord | undefined,
    imports: Readonly<Record<string, JsonValue>>,
): ResolutionContext {
    return {
        record,
        importValue: (exportName) => imports[exportName],
        isPending: () => false,
    };
}
