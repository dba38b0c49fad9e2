import { logger } from './logger.js';
import { formatPrototypeKey, parsePrototypeKey } from './PrototypeKey.js';
import type { JsonValue, ModificationRecord, Operation, SourceLocation } from './types.js';
import { cloneJson, isJsonObject } from './values.js';

export class PrototypeHistory {
    private readonly records: ModificationRecord[] = [];
    private value: JsonValue = null;

    constructor(readonly kind: string, readonly name: string) {}

    get key(): string {
        return formatPrototypeKey(this.kind, this.name);
    }

    get modifications(): readonly ModificationRecord[] {
        return this.records;
    }

    /** Always the `newValue` of the latest record. */
    get currentValue(): JsonValue {
        return this.value;
    }

    get packages(): string[] {
        const packages: string[] = [];
        for (const record of this.records) {
            if (!packages.includes(record.package)) {
                packages.push(record.package);
            }
        }
        return packages;
    }

    append(record: ModificationRecord): void {
        this.records.push(record);
        this.value = record.newValue;
    }
}

/**
 * Handle returned by {@link HistoryStore.beginContext}. Records are attributed
 * to the package named here until the handle is passed to `endContext`.
 */
export interface PackageContext {
    readonly package: string;
    readonly location: SourceLocation;
    readonly id: number;
}

export interface HistoryConflict {
    key: string;
    packages: string[];
}

export interface HistorySummary {
    totalPrototypes: number;
    totalModifications: number;
    totalConflicts: number;
    modificationsByPackage: Record<string, number>;
    prototypesByKind: Record<string, number>;
}

export interface HistoryExport {
    metadata: {
        exportTimestamp: string;
        totalPrototypes: number;
    };
    prototypes: Record<string, {
        kind: string;
        name: string;
        modifications: ModificationRecord[];
    }>;
}

export type Clock = () => Date;

export class HistoryStore {
    private readonly historyMap = new Map<string, PrototypeHistory>();
    private readonly openContexts = new Set<number>();
    private nextContextId = 1;

    constructor(private readonly clock: Clock = () => new Date()) {}

    beginContext(packageName: string, file: string, line?: number): PackageContext {
        const context: PackageContext = Object.freeze({
            package: packageName,
            location: line === undefined ? { file } : { file, line },
            id: this.nextContextId++
        });
        this.openContexts.add(context.id);
        logger.debug(`Begin package context ${packageName} (${file})`);
        return context;
    }

    endContext(context: PackageContext): void {
        this.openContexts.delete(context.id);
    }

    recordAddition(context: PackageContext, kind: string, name: string, value: JsonValue): ModificationRecord | undefined {
        const key = formatPrototypeKey(kind, name);
        if (!this.isOpen(context, key)) return undefined;

        if (!isJsonObject(value)) {
            logger.warn(`Skipping ${key} from ${context.package}: prototype value is not a table`, {
                valueType: Array.isArray(value) ? 'array' : typeof value
            });
            return undefined;
        }

        const existing = this.historyMap.get(key);
        const operation: Operation = existing ? 'overwrite' : 'create';
        const oldValue = existing ? existing.currentValue : null;

        if (existing) {
            logger.info(`Prototype ${key} overwritten by ${context.package}`);
        } else {
            logger.debug(`Prototype ${key} created by ${context.package}`);
        }

        return this.append(context, kind, name, operation, '', oldValue, value);
    }

    recordModification(
        context: PackageContext,
        kind: string,
        name: string,
        fieldPath: string,
        oldValue: JsonValue,
        newValue: JsonValue
    ): ModificationRecord | undefined {
        const key = formatPrototypeKey(kind, name);
        if (!this.isOpen(context, key)) return undefined;

        logger.debug(`Tracked modification ${key}.${fieldPath} by ${context.package}`);
        return this.append(context, kind, name, 'modify', fieldPath, oldValue, newValue);
    }

    historyFor(kind: string, name: string): PrototypeHistory | undefined {
        return this.historyMap.get(formatPrototypeKey(kind, name));
    }

    historyForKey(key: string): PrototypeHistory | undefined {
        const { kind, name } = parsePrototypeKey(key);
        return this.historyFor(kind, name);
    }

    has(kind: string, name: string): boolean {
        return this.historyMap.has(formatPrototypeKey(kind, name));
    }

    keys(): string[] {
        return Array.from(this.historyMap.keys());
    }

    histories(): PrototypeHistory[] {
        return Array.from(this.historyMap.values());
    }

    get size(): number {
        return this.historyMap.size;
    }

    /** Every package that authored at least one record, in first-seen order. */
    packages(): string[] {
        const packages = new Set<string>();
        for (const history of this.historyMap.values()) {
            for (const record of history.modifications) {
                packages.add(record.package);
            }
        }
        return Array.from(packages);
    }

    conflicts(): HistoryConflict[] {
        const conflicts: HistoryConflict[] = [];
        for (const history of this.historyMap.values()) {
            const packages = history.packages;
            if (packages.length > 1) {
                conflicts.push({ key: history.key, packages });
            }
        }
        return conflicts;
    }

    modificationsBy(packageName: string): ModificationRecord[] {
        const modifications: ModificationRecord[] = [];
        for (const history of this.historyMap.values()) {
            for (const record of history.modifications) {
                if (record.package === packageName) {
                    modifications.push(record);
                }
            }
        }
        return modifications;
    }

    /** Distinct packages that touched the prototype, in record order. */
    modificationChain(kind: string, name: string): string[] {
        return this.historyFor(kind, name)?.packages ?? [];
    }

    summary(): HistorySummary {
        const modificationsByPackage: Record<string, number> = {};
        const prototypesByKind: Record<string, number> = {};
        let totalModifications = 0;

        for (const history of this.historyMap.values()) {
            prototypesByKind[history.kind] = (prototypesByKind[history.kind] || 0) + 1;
            for (const record of history.modifications) {
                modificationsByPackage[record.package] = (modificationsByPackage[record.package] || 0) + 1;
                totalModifications++;
            }
        }

        return {
            totalPrototypes: this.historyMap.size,
            totalModifications,
            totalConflicts: this.conflicts().length,
            modificationsByPackage,
            prototypesByKind
        };
    }

    exportHistory(): HistoryExport {
        const prototypes: HistoryExport['prototypes'] = {};
        for (const history of this.historyMap.values()) {
            prototypes[history.key] = {
                kind: history.kind,
                name: history.name,
                modifications: [...history.modifications]
            };
        }

        return {
            metadata: {
                exportTimestamp: this.clock().toISOString(),
                totalPrototypes: this.historyMap.size
            },
            prototypes
        };
    }

    reset(): void {
        this.historyMap.clear();
        this.openContexts.clear();
    }

    private isOpen(context: PackageContext, key: string): boolean {
        if (this.openContexts.has(context.id)) return true;
        logger.warn(`No active package context for ${key}; record dropped`, { package: context.package });
        return false;
    }

    private append(
        context: PackageContext,
        kind: string,
        name: string,
        operation: Operation,
        fieldPath: string,
        oldValue: JsonValue,
        newValue: JsonValue
    ): ModificationRecord {
        const key = formatPrototypeKey(kind, name);
        let history = this.historyMap.get(key);
        if (!history) {
            history = new PrototypeHistory(kind, name);
            this.historyMap.set(key, history);
        }

        const record: ModificationRecord = Object.freeze({
            kind,
            name,
            package: context.package,
            location: { ...context.location },
            timestamp: this.clock().toISOString(),
            operation,
            fieldPath,
            oldValue: cloneJson(oldValue),
            newValue: cloneJson(newValue)
        });

        history.append(record);
        return record;
    }
}
