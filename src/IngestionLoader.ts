import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { IngestionError } from './errors.js';
import { HistoryStore } from './HistoryStore.js';
import { logger } from './logger.js';
import type { JsonObject, JsonValue, PackageInfo } from './types.js';
import { isJsonObject } from './values.js';

export const PACKAGE_DUMP_FILE = 'prototypes.json';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
]));

const PrototypeSchema = z.object({
    type: z.string().min(1),
    name: z.string().min(1)
}).catchall(JsonValueSchema);

const AddOperationSchema = z.object({
    op: z.literal('add'),
    file: z.string().optional(),
    line: z.number().int().nonnegative().optional(),
    prototypes: z.array(PrototypeSchema)
});

const ModifyOperationSchema = z.object({
    op: z.literal('modify'),
    file: z.string().optional(),
    line: z.number().int().nonnegative().optional(),
    kind: z.string().min(1),
    name: z.string().min(1),
    field: z.string().min(1),
    old: JsonValueSchema.optional(),
    new: JsonValueSchema
});

const OperationSchema = z.discriminatedUnion('op', [AddOperationSchema, ModifyOperationSchema]);

export const IngestionBatchSchema = z.object({
    package: z.string().min(1).optional(),
    file: z.string().optional(),
    operations: z.array(OperationSchema)
});

const IngestFileSchema = z.union([z.array(IngestionBatchSchema), IngestionBatchSchema]);

export type IngestionOperation = z.infer<typeof OperationSchema>;
export type IngestionBatch = z.infer<typeof IngestionBatchSchema>;

export interface IngestionStats {
    package: string;
    additions: number;
    modifications: number;
    dropped: number;
}

const DEFAULT_FILE = 'data.lua';

/**
 * Rewrites the ingredient shapes a package may use into `{type, name, amount}`:
 * `[name, amount]` pairs, `{name, amount}` without a type, and results given
 * as `amount_min`/`amount_max` ranges.
 */
export function normalizeIngredientList(value: JsonValue): JsonValue {
    if (!Array.isArray(value)) return value;
    return value.map(normalizeIngredient);
}

function normalizeIngredient(entry: JsonValue): JsonValue {
    if (Array.isArray(entry)) {
        const [name, amount] = entry;
        if (typeof name === 'string') {
            return { type: 'item', name, amount: typeof amount === 'number' ? amount : 1 };
        }
        return entry;
    }

    if (!isJsonObject(entry) || typeof entry.name !== 'string') return entry;

    const normalized: JsonObject = { ...entry, type: typeof entry.type === 'string' ? entry.type : 'item' };
    if (typeof entry.amount !== 'number') {
        const min = typeof entry.amount_min === 'number' ? entry.amount_min : undefined;
        const max = typeof entry.amount_max === 'number' ? entry.amount_max : undefined;
        normalized.amount = min !== undefined && max !== undefined ? (min + max) / 2 : min ?? max ?? 1;
    }
    return normalized;
}

function normalizeUnit(unit: JsonValue): JsonValue {
    if (!isJsonObject(unit) || unit.ingredients === undefined) return unit;
    return { ...unit, ingredients: normalizeIngredientList(unit.ingredients) };
}

export function normalizePrototype(kind: string, value: JsonObject): JsonObject {
    const normalized: JsonObject = { ...value };

    if (kind === 'recipe') {
        const { ingredients, results, result, result_count: resultCount } = value;
        if (ingredients !== undefined) {
            normalized.ingredients = normalizeIngredientList(ingredients);
        }
        if (results !== undefined) {
            normalized.results = normalizeIngredientList(results);
        } else if (typeof result === 'string') {
            normalized.results = [{ type: 'item', name: result, amount: typeof resultCount === 'number' ? resultCount : 1 }];
            delete normalized.result;
            delete normalized.result_count;
        }
    } else if (kind === 'technology' && normalized.unit !== undefined) {
        normalized.unit = normalizeUnit(normalized.unit);
    }

    return normalized;
}

/** Same normalization for a single field edit. */
export function normalizeField(kind: string, fieldPath: string, value: JsonValue): JsonValue {
    if (kind === 'recipe' && (fieldPath === 'ingredients' || fieldPath === 'results')) {
        return normalizeIngredientList(value);
    }
    if (kind === 'recipe' && /^(ingredients|results)\[\d+\]$/.test(fieldPath)) {
        return normalizeIngredient(value);
    }
    if (kind === 'technology' && fieldPath === 'unit') {
        return normalizeUnit(value);
    }
    if (kind === 'technology' && fieldPath === 'unit.ingredients') {
        return normalizeIngredientList(value);
    }
    return value;
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export class IngestionLoader {
    constructor(private readonly store: HistoryStore) {}

    /** Replays one batch; every operation gets its own package context. */
    applyBatch(batch: IngestionBatch, packageName: string | undefined = batch.package): IngestionStats {
        if (!packageName) {
            throw new IngestionError('batch has no package name', 'batch');
        }

        const stats: IngestionStats = { package: packageName, additions: 0, modifications: 0, dropped: 0 };

        for (const operation of batch.operations) {
            const context = this.store.beginContext(packageName, operation.file ?? batch.file ?? DEFAULT_FILE, operation.line);
            try {
                if (operation.op === 'add') {
                    for (const prototype of operation.prototypes) {
                        const record = this.store.recordAddition(
                            context, prototype.type, prototype.name, normalizePrototype(prototype.type, prototype)
                        );
                        if (record) stats.additions++;
                        else stats.dropped++;
                    }
                } else {
                    const record = this.store.recordModification(
                        context,
                        operation.kind,
                        operation.name,
                        operation.field,
                        normalizeField(operation.kind, operation.field, operation.old ?? null),
                        normalizeField(operation.kind, operation.field, operation.new)
                    );
                    if (record) stats.modifications++;
                    else stats.dropped++;
                }
            } finally {
                this.store.endContext(context);
            }
        }

        logger.info(`Ingested ${packageName}: ${stats.additions} additions, ${stats.modifications} modifications`, {
            dropped: stats.dropped
        });
        return stats;
    }

    parseBatches(raw: unknown, source: string): IngestionBatch[] {
        const parsed = IngestFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new IngestionError(describeIssues(parsed.error), source);
        }
        return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    }

    /** Ingests a file holding one batch or a list of batches, each naming its package. */
    async ingestFile(path: string): Promise<IngestionStats[]> {
        const batches = this.parseBatches(await readJson(path), path);
        const stats: IngestionStats[] = [];
        for (const batch of batches) {
            if (!batch.package) {
                throw new IngestionError('every batch needs a package name', path);
            }
            stats.push(this.applyBatch(batch));
        }
        return stats;
    }

    /** Ingests `prototypes.json` from a package directory, if it has one. */
    async ingestPackage(info: PackageInfo): Promise<IngestionStats | null> {
        const dumpPath = join(info.path, PACKAGE_DUMP_FILE);
        if (!await exists(dumpPath)) {
            logger.debug(`No ${PACKAGE_DUMP_FILE} in ${info.name}`);
            return null;
        }

        const batches = this.parseBatches(await readJson(dumpPath), dumpPath);
        const total: IngestionStats = { package: info.name, additions: 0, modifications: 0, dropped: 0 };
        for (const batch of batches) {
            if (batch.package && batch.package !== info.name) {
                logger.warn(`${dumpPath} names package ${batch.package}; recording it under ${info.name}`);
            }
            const stats = this.applyBatch(batch, info.name);
            total.additions += stats.additions;
            total.modifications += stats.modifications;
            total.dropped += stats.dropped;
        }
        return total;
    }

    /** Packages are replayed strictly in load order; a package with an invalid dump is skipped. */
    async ingestPackages(packages: PackageInfo[], loadOrder: string[]): Promise<IngestionStats[]> {
        const byName = new Map(packages.map(info => [info.name, info]));
        const stats: IngestionStats[] = [];
        for (const name of loadOrder) {
            const info = byName.get(name);
            if (!info) continue;
            try {
                const result = await this.ingestPackage(info);
                if (result) stats.push(result);
            } catch (error) {
                if (!(error instanceof IngestionError)) throw error;
                logger.warn(`Skipping package ${name}: ${error.message}`);
            }
        }
        return stats;
    }
}

async function readJson(path: string): Promise<unknown> {
    try {
        return JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
        throw new IngestionError(error instanceof Error ? error.message : String(error), path);
    }
}

async function exists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch {
        return false;
    }
}
