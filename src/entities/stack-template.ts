import type { JsonPrimitive } from "./json-value.js";
import type { PropertyValue } from "./reference-expression.js";
import type { ResourceDeclaration } from "./resource-node.js";

export interface ParameterDeclaration {
    readonly name: string;
    readonly type: string;
    readonly description?: string | undefined;
    readonly value: JsonPrimitive;
}

export interface OutputDeclaration {
    readonly name: string;
    readonly description?: string | undefined;
    readonly value: PropertyValue;
    readonly exportName?: string | undefined;
}

export interface StackTemplate {
    readonly description?: string | undefined;
    readonly parameters: readonly ParameterDeclaration[];
    readonly resources: readonly ResourceDeclaration[];
    readonly outputs: readonly OutputDeclaration[];
    /** sha256 over the canonical template and its resolved parameter values */
    readonly hash: string;
}
