import Chance from "chance";
import type { StackSnapshot, StateRecord } from "../entities/state-record.js";

const chance = new Chance();

export function buildRecord(overrides?: Partial<StateRecord>): StateRecord {
    return {
        kind: "AWS::ElasticLoadBalancingV2::TargetGroup",
        physicalId: `targetgroup-${chance.hash({ length: 8 })}`,
        properties: {},
        outputs: {},
        dependencies: [],
        templateHash: chance.hash({ length: 64 }),
        updatedAt: chance.date().toISOString(),
        ...overrides,
    };
}

export function buildSnapshot(
    records: Readonly<Record<string, StateRecord>>,
    overrides?: Partial<StackSnapshot>,
): StackSnapshot {
    return {
        stackName: "test-stack",
        serial: chance.integer({ min: 1, max: 100 }),
        templateHash: chance.hash({ length: 64 }),
        outputs: {},
        records,
        ...overrides,
    };
}
