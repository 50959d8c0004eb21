#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { consola } from "consola";
import { createApplyCittyCommand } from "./commands/apply.js";
import { createDriftCittyCommand } from "./commands/drift.js";
import { createPlanCittyCommand } from "./commands/plan.js";
import { createResourceKindCatalog } from "./gateways/resource-kind-catalog.js";
import { createStackRuntimeOpener } from "./runtime.js";
import { createStackConfigParser } from "./use-cases/parse-stack-config.js";
import { createTemplateParser } from "./use-cases/parse-template.js";

const configParser = createStackConfigParser();
const openRuntime = createStackRuntimeOpener({
    catalog: createResourceKindCatalog(),
    logger: (stackName) => consola.withTag(stackName),
});

const plan = createPlanCittyCommand({
    templateParser: createTemplateParser(),
    configParser,
    openRuntime,
});

const apply = createApplyCittyCommand({
    templateParser: createTemplateParser(),
    configParser,
    openRuntime,
});

const drift = createDriftCittyCommand({ configParser, openRuntime });

const main = defineCommand({
    meta: {
        name: "stack-reconciler",
        description:
            "Reconcile declarative stack templates against recorded state: plan, apply and detect drift",
    },
    subCommands: {
        plan,
        apply,
        drift,
    },
});

runMain(main);
