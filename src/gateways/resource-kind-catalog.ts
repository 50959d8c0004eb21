import type { ResourceKindDefinition } from "../entities/resource-kind.js";
import type { ResourceKindCatalog } from "../use-cases/resource-kind-catalog.port.js";

const RESOURCE_KINDS: readonly ResourceKindDefinition[] = [
    {
        kind: "AWS::EC2::Instance",
        service: "ec2",
        replaceOnly: [
            "AvailabilityZone",
            "ImageId",
            "KeyName",
            "NetworkInterfaces",
            "PrivateIpAddress",
            "SecurityGroups",
            "SubnetId",
        ],
        readyStatuses: ["running"],
        failedStatuses: ["terminated", "shutting-down"],
    },
    {
        kind: "AWS::EC2::LaunchTemplate",
        service: "ec2",
        replaceOnly: ["LaunchTemplateName"],
        nameProperty: "LaunchTemplateName",
        readyStatuses: ["available"],
        failedStatuses: ["failed"],
    },
    {
        kind: "AWS::ElasticLoadBalancingV2::LoadBalancer",
        service: "elasticloadbalancing",
        replaceOnly: ["Name", "Scheme", "Type"],
        nameProperty: "Name",
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
    {
        kind: "AWS::ElasticLoadBalancingV2::TargetGroup",
        service: "elasticloadbalancing",
        replaceOnly: [
            "Name",
            "Port",
            "Protocol",
            "ProtocolVersion",
            "TargetType",
            "VpcId",
        ],
        nameProperty: "Name",
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
    {
        kind: "AWS::ElasticLoadBalancingV2::Listener",
        service: "elasticloadbalancing",
        replaceOnly: ["LoadBalancerArn"],
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
    {
        kind: "AWS::AutoScaling::AutoScalingGroup",
        service: "autoscaling",
        replaceOnly: ["AutoScalingGroupName", "InstanceId"],
        nameProperty: "AutoScalingGroupName",
        readyStatuses: ["InService"],
        failedStatuses: ["Failed"],
    },
    {
        kind: "AWS::AutoScaling::ScalingPolicy",
        service: "autoscaling",
        replaceOnly: ["AutoScalingGroupName"],
        readyStatuses: ["active"],
        failedStatuses: ["failed"],
    },
    {
        kind: "AWS::CloudWatch::Alarm",
        service: "cloudwatch",
        replaceOnly: ["AlarmName"],
        nameProperty: "AlarmName",
        readyStatuses: ["OK", "ALARM", "INSUFFICIENT_DATA"],
        failedStatuses: [],
    },
];

export function createResourceKindCatalog(
    definitions: readonly ResourceKindDefinition[] = RESOURCE_KINDS,
): ResourceKindCatalog {
    const byKind = new Map(
        definitions.map((definition) => [definition.kind, definition]),
    );

    return {
        lookupByKind(kind: string): ResourceKindDefinition | undefined {
            return byKind.get(kind);
        },
    };
}
