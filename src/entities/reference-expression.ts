import type { JsonPrimitive } from "./json-value.js";

export interface LiteralExpression {
    readonly kind: "literal";
    readonly value: JsonPrimitive;
}

export interface RefExpression {
    readonly kind: "ref";
    readonly resourceId: string;
}

export interface GetAttributeExpression {
    readonly kind: "get-attribute";
    readonly resourceId: string;
    readonly attribute: string;
}

export interface ImportValueExpression {
    readonly kind: "import-value";
    readonly exportName: string;
}

export type ReferenceExpression =
    | LiteralExpression
    | RefExpression
    | GetAttributeExpression
    | ImportValueExpression;

export interface ListValue {
    readonly kind: "list";
    readonly items: readonly PropertyValue[];
}

export interface ObjectValue {
    readonly kind: "object";
    readonly fields: Readonly<Record<string, PropertyValue>>;
}

export type PropertyValue = ReferenceExpression | ListValue | ObjectValue;

export type PropertyBag = Readonly<Record<string, PropertyValue>>;

export type ResourceReference = RefExpression | GetAttributeExpression;

export const EXTERNAL_IMPORT_PREFIX = "import:";

export function literal(value: JsonPrimitive): LiteralExpression {
    return { kind: "literal", value };
}

export function ref(resourceId: string): RefExpression {
    return { kind: "ref", resourceId };
}

export function getAttribute(
    resourceId: string,
    attribute: string,
): GetAttributeExpression {
    return { kind: "get-attribute", resourceId, attribute };
}

export function importValue(exportName: string): ImportValueExpression {
    return { kind: "import-value", exportName };
}

export function list(items: readonly PropertyValue[]): ListValue {
    return { kind: "list", items };
}

export function object(fields: Readonly<Record<string, PropertyValue>>): ObjectValue {
    return { kind: "object", fields };
}

export function externalImportId(exportName: string): string {
    return `${EXTERNAL_IMPORT_PREFIX}${exportName}`;
}

/** Every non-literal expression reachable from `value`, depth first. */
export function collectReferences(
    value: PropertyValue,
): (ResourceReference | ImportValueExpression)[] {
    switch (value.kind) {
        case "literal":
            return [];
        case "ref":
        case "get-attribute":
        case "import-value":
            return [value];
        case "list":
            return value.items.flatMap((item) => collectReferences(item));
        case "object":
            return Object.values(value.fields).flatMap((field) =>
                collectReferences(field),
            );
    }
}

export function collectBagReferences(
    bag: PropertyBag,
): (ResourceReference | ImportValueExpression)[] {
    return Object.values(bag).flatMap((value) => collectReferences(value));
}
