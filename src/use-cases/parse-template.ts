import { createHash } from "node:crypto";
import { ZodError } from "zod";
import { canonicalJson, type JsonValue, toJsonValue } from "../entities/json-value.js";
import {
    getAttribute,
    importValue,
    list,
    literal,
    object,
    type PropertyValue,
    ref,
} from "../entities/reference-expression.js";
import type { ResourceDeclaration } from "../entities/resource-node.js";
import { parseSanitizedJson } from "../entities/sanitize-json.js";
import type {
    OutputDeclaration,
    ParameterDeclaration,
    StackTemplate,
} from "../entities/stack-template.js";
import {
    type ParameterValue,
    StackTemplateSchema,
    type TemplateDocument,
} from "./template.schema.js";

export interface TemplateParseOptions {
    readonly parameters?: Readonly<Record<string, ParameterValue>> | undefined;
}

export interface TemplateParser {
    parse(jsonString: string, options?: TemplateParseOptions): StackTemplate;
}

const PSEUDO_PARAMETER_PREFIX = "AWS::";
const SUB_VARIABLE_REGEX = /\$\{(!?)([^}]*)\}/g;

class TemplateSyntaxError extends Error {
    constructor(path: string, message: string) {
        super(`Invalid template: ${path}: ${message}`);
        this.name = "TemplateSyntaxError";
    }
}

type ParameterLookup = ReadonlyMap<string, ParameterValue>;

function validateTemplate(data: unknown): TemplateDocument {
    try {
        return StackTemplateSchema.parse(data);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new Error(`Invalid template: ${details}`);
        }
        throw error;
    }
}

function resolveParameters(
    document: TemplateDocument,
    supplied: Readonly<Record<string, ParameterValue>>,
): (ParameterDeclaration & { readonly value: ParameterValue })[] {
    return Object.entries(document.Parameters).map(([name, declaration]) => {
        const value = supplied[name] ?? declaration.Default;
        if (value === undefined) {
            throw new Error(
                `Invalid template: parameter "${name}" has no value and no default`,
            );
        }
        return {
            name,
            type: declaration.Type,
            description: declaration.Description,
            value,
        };
    });
}

function substitute(
    template: string,
    parameters: ParameterLookup,
    path: string,
): string {
    return template.replace(
        SUB_VARIABLE_REGEX,
        (_match, escape: string, name: string) => {
            if (escape === "!") {
                return `\${${name}}`;
            }
            const value = parameters.get(name);
            if (value === undefined) {
                throw new TemplateSyntaxError(
                    path,
                    `Fn::Sub variable "${name}" is not a parameter`,
                );
            }
            return String(value);
        },
    );
}

function requireString(value: unknown, path: string, intrinsic: string): string {
    if (typeof value !== "string" || value.length === 0) {
        throw new TemplateSyntaxError(path, `${intrinsic} expects a non-empty string`);
    }
    return value;
}

function toGetAttribute(value: unknown, path: string): PropertyValue {
    if (typeof value === "string") {
        const separator = value.indexOf(".");
        if (separator > 0 && separator < value.length - 1) {
            return getAttribute(
                value.slice(0, separator),
                value.slice(separator + 1),
            );
        }
    }
    if (
        Array.isArray(value) &&
        value.length === 2 &&
        typeof value[0] === "string" &&
        typeof value[1] === "string"
    ) {
        return getAttribute(value[0], value[1]);
    }
    throw new TemplateSyntaxError(
        path,
        'Fn::GetAtt expects ["Resource", "Attribute"] or "Resource.Attribute"',
    );
}

function toLiteralString(
    value: PropertyValue,
    path: string,
    intrinsic: string,
): string {
    if (value.kind !== "literal" || typeof value.value !== "string") {
        throw new TemplateSyntaxError(
            path,
            `${intrinsic} only accepts a string or an Fn::Sub over parameters`,
        );
    }
    return value.value;
}

function toIntrinsic(
    name: string,
    argument: unknown,
    parameters: ParameterLookup,
    path: string,
): PropertyValue {
    switch (name) {
        case "Ref": {
            const target = requireString(argument, path, "Ref");
            const parameter = parameters.get(target);
            return parameter === undefined ? ref(target) : literal(parameter);
        }
        case "Fn::GetAtt":
            return toGetAttribute(argument, path);
        case "Fn::ImportValue": {
            const exportName = toPropertyValue(argument, parameters, path);
            return importValue(toLiteralString(exportName, path, name));
        }
        case "Fn::Sub":
            return literal(
                substitute(requireString(argument, path, name), parameters, path),
            );
        case "Fn::Base64": {
            const text = toPropertyValue(argument, parameters, path);
            return literal(
                Buffer.from(toLiteralString(text, path, name), "utf-8").toString(
                    "base64",
                ),
            );
        }
        default:
            throw new TemplateSyntaxError(path, `unsupported intrinsic ${name}`);
    }
}

function toPropertyValue(
    raw: unknown,
    parameters: ParameterLookup,
    path: string,
): PropertyValue {
    if (
        raw === null ||
        typeof raw === "string" ||
        typeof raw === "number" ||
        typeof raw === "boolean"
    ) {
        return literal(raw);
    }
    if (Array.isArray(raw)) {
        return list(
            raw.map((item, index) =>
                toPropertyValue(item, parameters, `${path}.${index}`),
            ),
        );
    }
    if (typeof raw === "object") {
        const entries = Object.entries(raw);
        const [first] = entries;
        if (
            entries.length === 1 &&
            first !== undefined &&
            (first[0] === "Ref" || first[0].startsWith("Fn::"))
        ) {
            return toIntrinsic(first[0], first[1], parameters, path);
        }
        const fields: Record<string, PropertyValue> = {};
        for (const [key, member] of entries) {
            fields[key] = toPropertyValue(member, parameters, `${path}.${key}`);
        }
        return object(fields);
    }
    throw new TemplateSyntaxError(path, `unsupported value of type ${typeof raw}`);
}

function toResourceDeclarations(
    document: TemplateDocument,
    parameters: ParameterLookup,
): ResourceDeclaration[] {
    return Object.entries(document.Resources).map(([logicalId, resource]) => {
        const properties: Record<string, PropertyValue> = {};
        for (const [name, value] of Object.entries(resource.Properties)) {
            properties[name] = toPropertyValue(
                value,
                parameters,
                `Resources.${logicalId}.Properties.${name}`,
            );
        }
        const dependsOn =
            resource.DependsOn === undefined
                ? []
                : typeof resource.DependsOn === "string"
                  ? [resource.DependsOn]
                  : [...resource.DependsOn];
        return { logicalId, kind: resource.Type, properties, dependsOn };
    });
}

function toOutputDeclarations(
    document: TemplateDocument,
    parameters: ParameterLookup,
): OutputDeclaration[] {
    return Object.entries(document.Outputs).map(([name, output]) => ({
        name,
        description: output.Description,
        value: toPropertyValue(output.Value, parameters, `Outputs.${name}.Value`),
        exportName: output.Export?.Name,
    }));
}

function hashTemplate(
    sanitized: unknown,
    parameters: ParameterLookup,
): string {
    const resolved: Record<string, JsonValue> = {};
    for (const [name, value] of parameters) {
        resolved[name] = value;
    }
    const canonical = canonicalJson({
        template: toJsonValue(sanitized),
        parameters: resolved,
    });
    return createHash("sha256").update(canonical).digest("hex");
}

export function createTemplateParser(): TemplateParser {
    return {
        parse(jsonString: string, options?: TemplateParseOptions): StackTemplate {
            const sanitized = parseSanitizedJson(jsonString, "template");
            const document = validateTemplate(sanitized);
            const parameters = resolveParameters(
                document,
                options?.parameters ?? {},
            );
            const lookup = new Map<string, ParameterValue>(
                parameters.map((parameter) => [parameter.name, parameter.value]),
            );
            // pseudo parameters such as AWS::Region are supplied, never declared
            for (const [name, value] of Object.entries(options?.parameters ?? {})) {
                if (name.startsWith(PSEUDO_PARAMETER_PREFIX)) {
                    lookup.set(name, value);
                }
            }

            return {
                description: document.Description,
                parameters,
                resources: toResourceDeclarations(document, lookup),
                outputs: toOutputDeclarations(document, lookup),
                hash: hashTemplate(sanitized, lookup),
            };
        },
    };
}
