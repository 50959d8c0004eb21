import type { JsonValue } from "../entities/json-value.js";
import type { OutputDeclaration } from "../entities/stack-template.js";
import { type ResolutionContext, resolveValueFully } from "./resolve-properties.js";

export interface OutputEvaluator {
    evaluate(
        outputs: readonly OutputDeclaration[],
        context: ResolutionContext,
    ): Record<string, JsonValue>;
}

export function createOutputEvaluator(): OutputEvaluator {
    return {
        evaluate(outputs, context) {
            const result: Record<string, JsonValue> = {};
            for (const output of outputs) {
                result[output.name] = resolveValueFully(
                    output.value,
                    context,
                    `Outputs.${output.name}`,
                );
            }
            return result;
        },
    };
}
