import { describe, expect, it } from "vitest";
import {
    classifyStatus,
    isMutableProperty,
    type ResourceKindDefinition,
} from "./resource-kind.js";

const definition: ResourceKindDefinition = {
    kind: "AWS::AutoScaling::AutoScalingGroup",
    service: "autoscaling",
    replaceOnly: ["AutoScalingGroupName"],
    nameProperty: "AutoScalingGroupName",
    readyStatuses: ["InService"],
    failedStatuses: ["Failed"],
};

describe("isMutableProperty", () => {
    it("should allow properties outside the replace-only list", () => {
        expect(isMutableProperty(definition, "MaxSize")).toBe(true);
    });

    it("should reject replace-only properties", () => {
        expect(isMutableProperty(definition, "AutoScalingGroupName")).toBe(false);
    });

    it("should treat every property of an unknown kind as replace-only", () => {
        expect(isMutableProperty(undefined, "MaxSize")).toBe(false);
    });
});

describe("classifyStatus", () => {
    it("should map ready statuses", () => {
        expect(classifyStatus(definition, "InService")).toBe("ready");
    });

    it("should map failed statuses", () => {
        expect(classifyStatus(definition, "Failed")).toBe("failed");
    });

    it("should treat anything else as in progress", () => {
        expect(classifyStatus(definition, "Pending")).toBe("in-progress");
    });

    describe("given an unknown kind", () => {
        it("should fall back to the default statuses", () => {
            expect(classifyStatus(undefined, "available")).toBe("ready");
            expect(classifyStatus(undefined, "failed")).toBe("failed");
        });
    });
});
