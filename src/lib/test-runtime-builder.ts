import { vi } from "vitest";
import type { OpenStackRuntime } from "../commands/stack-inputs.js";
import { createLocalCloud, type LocalCloud } from "../gateways/local-cloud-provider.js";
import { createMemoryStateStore } from "../gateways/memory-state-store.js";
import { createResourceKindCatalog } from "../gateways/resource-kind-catalog.js";
import { createStackRuntimeOpener } from "../runtime.js";
import type { StateStore } from "../use-cases/state-store.port.js";

export const TEST_CHECKED_AT = "2026-01-15T08:30:00.000Z";

export interface TestRuntime {
    readonly cloud: LocalCloud;
    readonly store: StateStore;
    readonly openRuntime: OpenStackRuntime;
}

// in-memory state and cloud that survive across runs of the same test
export function buildTestRuntime(stackName = "test-stack"): TestRuntime {
    const catalog = createResourceKindCatalog();
    const cloud = createLocalCloud({ catalog });
    const store = createMemoryStateStore(stackName);

    return {
        cloud,
        store,
        openRuntime: createStackRuntimeOpener({
            catalog,
            logger: () => ({ info: vi.fn(), warn: vi.fn(), debug: vi.fn() }),
            providers: async () => cloud,
            store: async () => store,
            sleep: async () => undefined,
            now: () => new Date(TEST_CHECKED_AT),
        }),
    };
}
