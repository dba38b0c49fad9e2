import { type AnalysisConfig, type ContextConfig, DEFAULT_ANALYSIS_CONFIG } from './config.js';
import { HistoryStore } from './HistoryStore.js';
import { logger } from './logger.js';
import { formatPrototypeKey } from './PrototypeKey.js';
import type { AvailabilityContext, Dependency, DependencyGraph, JsonValue } from './types.js';
import { isJsonObject, readIngredients, readStringList } from './values.js';

export interface AvailabilitySplit {
    available: AvailabilityContext[];
    unavailable: AvailabilityContext[];
}

export function createContext(config: ContextConfig): AvailabilityContext {
    return {
        id: config.id,
        availableResources: new Set(config.resources),
        knownTechnologies: new Set(config.technologies ?? []),
        knownMachines: new Set(config.machines ?? [])
    };
}

/**
 * Builds contexts from tracked prototypes of the configured kinds (planets by
 * default). Resources come from a `resources` list or from the autoplace
 * settings of the planet's map generation.
 */
export function deriveContexts(store: HistoryStore, kinds: string[]): AvailabilityContext[] {
    const contexts: AvailabilityContext[] = [];

    for (const history of store.histories()) {
        if (!kinds.includes(history.kind)) continue;
        const value = history.currentValue;
        if (!isJsonObject(value)) continue;

        const resources = new Set(readStringList(value.resources));
        const mapGen = value.map_gen_settings;
        if (isJsonObject(mapGen)) {
            for (const name of objectKeys(mapGen.autoplace_controls)) {
                resources.add(name);
            }
            const autoplace = mapGen.autoplace_settings;
            if (isJsonObject(autoplace) && isJsonObject(autoplace.entity)) {
                for (const name of objectKeys(autoplace.entity.settings)) {
                    resources.add(name);
                }
            }
        }

        contexts.push({
            id: history.name,
            availableResources: resources,
            knownTechnologies: new Set(),
            knownMachines: new Set()
        });
    }

    return contexts;
}

function objectKeys(value: JsonValue | undefined): string[] {
    return isJsonObject(value) ? Object.keys(value) : [];
}

interface Verdict {
    available: boolean;
    cutByCycle: boolean;
}

export class AvailabilityAnalyzer {
    private readonly producers = new Map<string, string>();
    /** Settled recipe verdicts per context; the graph is fixed for the analyzer's lifetime. */
    private readonly verdicts = new WeakMap<AvailabilityContext, Map<string, boolean>>();

    constructor(
        private readonly store: HistoryStore,
        private readonly graph: DependencyGraph,
        readonly contexts: readonly AvailabilityContext[],
        private readonly threshold: number = DEFAULT_ANALYSIS_CONFIG.wideAvailabilityThreshold
    ) {
        this.indexProducers();
    }

    static fromConfig(store: HistoryStore, graph: DependencyGraph, config: AnalysisConfig): AvailabilityAnalyzer {
        const contexts = config.contexts
            ? config.contexts.map(createContext)
            : deriveContexts(store, config.contextKinds);
        logger.debug(`Availability contexts: ${contexts.map(c => c.id).join(', ') || '(none)'}`);
        return new AvailabilityAnalyzer(store, graph, contexts, config.wideAvailabilityThreshold);
    }

    context(id: string): AvailabilityContext | undefined {
        return this.contexts.find(context => context.id === id);
    }

    /** First recipe, in store order, whose results include the item. */
    producerOf(itemName: string): string | undefined {
        return this.producers.get(itemName);
    }

    isItemAvailable(itemName: string, context: AvailabilityContext): boolean {
        return this.resolveItem(itemName, context, new Set()).available;
    }

    isRecipeAvailable(recipeKey: string, context: AvailabilityContext): boolean {
        return this.resolveRecipe(recipeKey, context, new Set()).available;
    }

    private resolveItem(itemName: string, context: AvailabilityContext, path: Set<string>): Verdict {
        if (context.availableResources.has(itemName)) {
            return { available: true, cutByCycle: false };
        }

        const node = `item\u0000${itemName}`;
        if (path.has(node)) {
            return { available: false, cutByCycle: true };
        }

        const recipeKey = this.producers.get(itemName);
        if (!recipeKey) {
            return { available: false, cutByCycle: false };
        }

        path.add(node);
        try {
            return this.resolveRecipe(recipeKey, context, path);
        } finally {
            path.delete(node);
        }
    }

    private resolveRecipe(recipeKey: string, context: AvailabilityContext, path: Set<string>): Verdict {
        const cache = this.cacheFor(context);
        const cached = cache.get(recipeKey);
        if (cached !== undefined) {
            return { available: cached, cutByCycle: false };
        }

        if (path.has(recipeKey)) {
            return { available: false, cutByCycle: true };
        }

        path.add(recipeKey);
        let verdict: Verdict = { available: true, cutByCycle: false };
        try {
            for (const dependency of this.graph.get(recipeKey) ?? []) {
                if (dependency.kind !== 'ingredient') continue;
                const ingredient = this.resolveItem(dependency.targetName, context, path);
                if (!ingredient.available) {
                    verdict = ingredient;
                    break;
                }
            }
        } finally {
            path.delete(recipeKey);
        }

        // A false reached through the path set only holds for this path.
        if (!verdict.cutByCycle) {
            cache.set(recipeKey, verdict.available);
        }
        return verdict;
    }

    private cacheFor(context: AvailabilityContext): Map<string, boolean> {
        let cache = this.verdicts.get(context);
        if (!cache) {
            cache = new Map();
            this.verdicts.set(context, cache);
        }
        return cache;
    }

    analyze(_key: string, dependencies: Dependency[]): AvailabilitySplit {
        const available: AvailabilityContext[] = [];
        const unavailable: AvailabilityContext[] = [];

        for (const context of this.contexts) {
            const ok = dependencies.every(dependency =>
                dependency.kind !== 'ingredient' || this.isItemAvailable(dependency.targetName, context)
            );
            (ok ? available : unavailable).push(context);
        }

        return { available, unavailable };
    }

    availabilityMatrix(itemName: string): Record<string, boolean> {
        const matrix: Record<string, boolean> = {};
        for (const context of this.contexts) {
            matrix[context.id] = this.isItemAvailable(itemName, context);
        }
        return matrix;
    }

    isWidelyAvailable(itemName: string): boolean {
        let availableCount = 0;
        for (const context of this.contexts) {
            if (this.isItemAvailable(itemName, context)) {
                availableCount++;
            }
        }
        return availableCount >= this.contexts.length * this.threshold;
    }

    private indexProducers(): void {
        for (const history of this.store.histories()) {
            if (history.kind !== 'recipe') continue;
            const value = history.currentValue;
            if (!isJsonObject(value)) continue;

            for (const result of readIngredients(value.results)) {
                if (!this.producers.has(result.name)) {
                    this.producers.set(result.name, formatPrototypeKey('recipe', history.name));
                }
            }
        }
    }
}
