import { type AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from './config.js';
import { HistoryStore } from './HistoryStore.js';
import { logger } from './logger.js';
import { formatPrototypeKey } from './PrototypeKey.js';
import type { Dependency, DependencyGraph, JsonObject } from './types.js';
import { isJsonObject, readIngredients, readString, readStringList } from './values.js';

export class DependencyGraphBuilder {
    constructor(private readonly config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG) {}

    build(store: HistoryStore): DependencyGraph {
        const graph: DependencyGraph = new Map();

        for (const history of store.histories()) {
            const current = history.currentValue;
            if (!isJsonObject(current)) {
                logger.debug(`Skipping ${history.key}: current value is not a table`);
                continue;
            }

            const dependencies = this.extract(history.kind, history.name, current);
            if (dependencies.length > 0) {
                graph.set(history.key, dependencies);
            }
        }

        return graph;
    }

    extract(kind: string, name: string, value: JsonObject): Dependency[] {
        switch (kind) {
            case 'recipe':
                return this.recipeDependencies(name, value);
            case 'technology':
                return this.technologyDependencies(name, value);
            case 'item':
                return this.itemDependencies(name, value);
            case 'resource':
                return this.resourceDependencies(name, value);
            default:
                return [];
        }
    }

    private recipeDependencies(name: string, recipe: JsonObject): Dependency[] {
        const dependencies: Dependency[] = [];

        for (const ingredient of readIngredients(recipe.ingredients)) {
            dependencies.push({
                sourceKind: 'recipe',
                sourceName: name,
                targetKind: ingredient.type,
                targetName: ingredient.name,
                kind: 'ingredient',
                required: true,
                amount: ingredient.amount
            });
        }

        for (const result of readIngredients(recipe.results)) {
            dependencies.push({
                sourceKind: 'recipe',
                sourceName: name,
                targetKind: result.type,
                targetName: result.name,
                kind: 'result',
                required: false,
                amount: result.amount
            });
        }

        const category = readString(recipe, 'category') ?? this.config.defaultCraftingCategory;
        if (category !== this.config.defaultCraftingCategory) {
            dependencies.push({
                sourceKind: 'recipe',
                sourceName: name,
                targetKind: 'recipe-category',
                targetName: category,
                kind: 'crafting_category',
                required: true
            });
        }

        return dependencies;
    }

    private technologyDependencies(name: string, technology: JsonObject): Dependency[] {
        const dependencies: Dependency[] = [];

        for (const prerequisite of readStringList(technology.prerequisites)) {
            dependencies.push({
                sourceKind: 'technology',
                sourceName: name,
                targetKind: 'technology',
                targetName: prerequisite,
                kind: 'tech_prerequisite',
                required: true
            });
        }

        const effects = Array.isArray(technology.effects) ? technology.effects : [];
        for (const effect of effects) {
            if (!isJsonObject(effect) || effect.type !== 'unlock-recipe') continue;
            const recipe = readString(effect, 'recipe');
            if (!recipe) continue;
            dependencies.push({
                sourceKind: 'technology',
                sourceName: name,
                targetKind: 'recipe',
                targetName: recipe,
                kind: 'tech_unlock',
                required: false
            });
        }

        return dependencies;
    }

    private itemDependencies(name: string, item: JsonObject): Dependency[] {
        const fuelCategory = readString(item, 'fuel_category');
        if (!fuelCategory) return [];

        return [{
            sourceKind: 'item',
            sourceName: name,
            targetKind: 'fuel-category',
            targetName: fuelCategory,
            kind: 'fuel_category',
            required: true
        }];
    }

    private resourceDependencies(name: string, resource: JsonObject): Dependency[] {
        const category = readString(resource, 'category');
        if (!category) return [];

        return [{
            sourceKind: 'resource',
            sourceName: name,
            targetKind: 'resource-category',
            targetName: category,
            kind: 'resource_category',
            required: true
        }];
    }
}

/** Reverse index: target key -> edges pointing at it. */
export function dependentsOf(graph: DependencyGraph): Map<string, Dependency[]> {
    const dependents = new Map<string, Dependency[]>();
    for (const dependencies of graph.values()) {
        for (const dependency of dependencies) {
            const target = formatPrototypeKey(dependency.targetKind, dependency.targetName);
            const list = dependents.get(target);
            if (list) {
                list.push(dependency);
            } else {
                dependents.set(target, [dependency]);
            }
        }
    }
    return dependents;
}
