import type {
    DriftEvent,
    DriftReport,
    FieldDifference,
} from "../entities/drift.js";
import { errorMessage } from "../entities/errors.js";
import { isJsonObject, type JsonValue, jsonEquals } from "../entities/json-value.js";
import type { StackSnapshot, StateRecord } from "../entities/state-record.js";
import type { ProviderRegistry } from "./cloud-provider.port.js";
import type { ReconcileLogger } from "./logger.port.js";
import { type Sleep, sleep as defaultSleep } from "./retry-policy.js";

export interface DriftDetectorDeps {
    readonly providers: ProviderRegistry;
    readonly logger: ReconcileLogger;
    readonly sleep?: Sleep | undefined;
    readonly now?: (() => Date) | undefined;
}

export interface DriftWatchOptions {
    readonly intervalMs: number;
    readonly signal: AbortSignal;
    /** called before every round so each check sees the latest recorded state */
    readonly snapshot: () => StackSnapshot;
    readonly onReport: (report: DriftReport) => void;
}

export interface DriftDetector {
    detect(snapshot: StackSnapshot): Promise<DriftReport>;
    watch(options: DriftWatchOptions): Promise<void>;
}

/**
 * Compares the fields present in `expected`. Nested objects are compared
 * field by field; lists compare as a whole. Live fields the template never
 * set are ignored.
 */
export function diffFields(
    expected: Readonly<Record<string, JsonValue>>,
    actual: Readonly<Record<string, JsonValue>>,
    prefix = "",
): FieldDifference[] {
    return Object.keys(expected)
        .sort()
        .flatMap((key): FieldDifference[] => {
            const path = prefix === "" ? key : `${prefix}.${key}`;
            const expectedValue = expected[key];
            const actualValue = actual[key];
            if (isJsonObject(expectedValue) && isJsonObject(actualValue)) {
                return diffFields(expectedValue, actualValue, path);
            }
            if (jsonEquals(expectedValue, actualValue)) {
                return [];
            }
            return [{ path, expected: expectedValue, actual: actualValue }];
        });
}

export function createDriftDetector(deps: DriftDetectorDeps): DriftDetector {
    const sleep = deps.sleep ?? defaultSleep;
    const now = deps.now ?? (() => new Date());

    const inspect = async (
        resourceId: string,
        record: StateRecord,
    ): Promise<DriftEvent | undefined> => {
        const identity = {
            resourceId,
            resourceKind: record.kind,
            physicalId: record.physicalId,
        };
        try {
            const live = await deps.providers
                .forKind(record.kind)
                .describe(record.physicalId);
            if (live === undefined) {
                return { type: "deleted", ...identity };
            }
            const differences = diffFields(record.properties, live.properties);
            return differences.length === 0
                ? undefined
                : { type: "modified", ...identity, differences };
        } catch (error) {
            deps.logger.warn(
                `Could not describe ${resourceId} (${record.physicalId}): ${errorMessage(error)}`,
            );
            return { type: "unreadable", ...identity, error: errorMessage(error) };
        }
    };

    const detect = async (snapshot: StackSnapshot): Promise<DriftReport> => {
        const ids = Object.keys(snapshot.records).sort();
        const events = await Promise.all(
            ids.map((id) => {
                const record = snapshot.records[id];
                return record ? inspect(id, record) : Promise.resolve(undefined);
            }),
        );
        const report: DriftReport = {
            stackName: snapshot.stackName,
            checkedAt: now().toISOString(),
            checked: ids.length,
            events: events.flatMap((event) => (event ? [event] : [])),
        };
        deps.logger.debug(
            `Drift check of ${report.checked} resource(s) found ${report.events.length} event(s)`,
        );
        return report;
    };

    return {
        detect,
        async watch(options: DriftWatchOptions): Promise<void> {
            const { signal } = options;
            while (!signal.aborted) {
                options.onReport(await detect(options.snapshot()));
                try {
                    await sleep(options.intervalMs, signal);
                } catch (error) {
                    if (signal.aborted) {
                        return;
                    }
                    throw error;
                }
            }
        },
    };
}
