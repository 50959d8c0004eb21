import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ZodError } from "zod";
import { type JsonValue, toJsonValue } from "../entities/json-value.js";
import { parseSanitizedJson } from "../entities/sanitize-json.js";
import {
    emptySnapshot,
    type StackSnapshot,
    type StateRecord,
} from "../entities/state-record.js";
import {
    STATE_FILE_VERSION,
    type StateFile,
    StateFileSchema,
    type StateRecordFile,
} from "../use-cases/state-file.schema.js";
import { StackNameSchema } from "../use-cases/stack-config.schema.js";
import type { StateStore } from "../use-cases/state-store.port.js";

export interface FileStateStoreOptions {
    readonly stateDir: string;
    readonly stackName: string;
}

export function stateFilePath(stateDir: string, stackName: string): string {
    return join(stateDir, `${StackNameSchema.parse(stackName)}.state.json`);
}

function toJsonRecord(
    values: Readonly<Record<string, unknown>>,
): Record<string, JsonValue> {
    const result: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(values)) {
        result[key] = toJsonValue(value);
    }
    return result;
}

function fromFile(file: StateFile): StackSnapshot {
    const records: Record<string, StateRecord> = {};
    for (const [id, record] of Object.entries(file.records)) {
        records[id] = {
            kind: record.kind,
            physicalId: record.physical_id,
            properties: toJsonRecord(record.properties),
            outputs: toJsonRecord(record.outputs),
            dependencies: record.dependencies,
            templateHash: record.template_hash,
            updatedAt: record.updated_at,
        };
    }
    return {
        stackName: file.stack_name,
        serial: file.serial,
        templateHash: file.template_hash,
        outputs: toJsonRecord(file.outputs),
        records,
    };
}

function toFile(snapshot: StackSnapshot): StateFile {
    const records: Record<string, StateRecordFile> = {};
    for (const [id, record] of Object.entries(snapshot.records)) {
        records[id] = {
            kind: record.kind,
            physical_id: record.physicalId,
            properties: record.properties,
            outputs: record.outputs,
            dependencies: [...record.dependencies],
            template_hash: record.templateHash,
            updated_at: record.updatedAt,
        };
    }
    return {
        version: STATE_FILE_VERSION,
        serial: snapshot.serial,
        stack_name: snapshot.stackName,
        template_hash: snapshot.templateHash,
        outputs: snapshot.outputs,
        records,
    };
}

async function load(path: string, stackName: string): Promise<StackSnapshot> {
    let content: string;
    try {
        content = await readFile(path, "utf-8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return emptySnapshot(stackName);
        }
        throw error;
    }

    const label = `state file ${path}`;
    try {
        const file = StateFileSchema.parse(parseSanitizedJson(content, label));
        if (file.stack_name !== stackName) {
            throw new Error(
                `Invalid ${label}: belongs to stack "${file.stack_name}", not "${stackName}"`,
            );
        }
        return fromFile(file);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new Error(`Invalid ${label}: ${details}`);
        }
        throw error;
    }
}

/**
 * Opens the state of one stack, stored as `<stateDir>/<stackName>.state.json`.
 *
 * Reads are served from memory. Every mutation bumps the serial and rewrites
 * the file through a temporary file and a rename; writes are queued so they
 * land in the order they were made.
 */
export async function openFileStateStore(
    options: FileStateStoreOptions,
): Promise<StateStore> {
    const path = stateFilePath(options.stateDir, options.stackName);
    let state = await load(path, options.stackName);
    let writes: Promise<void> = Promise.resolve();

    const persist = async (snapshot: StackSnapshot): Promise<void> => {
        await mkdir(options.stateDir, { recursive: true });
        const temporary = `${path}.${snapshot.serial}.tmp`;
        await writeFile(
            temporary,
            `${JSON.stringify(toFile(snapshot), null, 2)}\n`,
            "utf-8",
        );
        await rename(temporary, path);
    };

    const commit = (
        change: (current: StackSnapshot) => Omit<StackSnapshot, "serial">,
    ): Promise<void> => {
        state = { ...change(state), serial: state.serial + 1 };
        const snapshot = state;
        const write = writes.then(() => persist(snapshot));
        // the caller of this write receives its failure; later writes still run
        writes = write.catch(() => undefined);
        return write;
    };

    return {
        get: (resourceId) => state.records[resourceId],
        put: (resourceId, record) =>
            commit((current) => ({
                ...current,
                records: { ...current.records, [resourceId]: record },
            })),
        delete: (resourceId) =>
            commit((current) => {
                const { [resourceId]: _removed, ...records } = current.records;
                return { ...current, records };
            }),
        snapshot: () => state,
        recordApply: (templateHash, outputs) =>
            commit((current) => ({ ...current, templateHash, outputs })),
    };
}
