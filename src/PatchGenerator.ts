import { type AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from './config.js';
import { compareSeverity } from './ConflictDetector.js';
import { HistoryStore, PrototypeHistory } from './HistoryStore.js';
import { logger } from './logger.js';
import { LuaPatchRenderer } from './LuaPatchRenderer.js';
import { parsePrototypeKey } from './PrototypeKey.js';
import type {
    ConflictIssue, GenericVariant, GenericVariantPlan, Ingredient, JsonObject, JsonValue, PatchPlan,
    PatchSuggestion, RecipeVariant, RecipeVariantPlan, TechnologyAlternative, TechnologyPathPlan, VariantRecipe
} from './types.js';
import {
    cloneJson, dedupeIngredients, isJsonObject, parseFieldPath, readIngredients, readNumber, readString,
    readStringList, setAtPath
} from './values.js';

type Bucket = 'recipe' | 'technology' | 'other';

const BUCKET_ORDER: readonly Bucket[] = ['recipe', 'technology', 'other'];

/**
 * Replays one package's records for a prototype. Whole-object records replace
 * the snapshot, field records are written at their path.
 */
export function replayPackage(history: PrototypeHistory, packageName: string): JsonObject {
    let snapshot: JsonValue = {};
    for (const record of history.modifications) {
        if (record.package !== packageName) continue;
        if (record.fieldPath === '') {
            if (isJsonObject(record.newValue)) snapshot = cloneJson(record.newValue);
        } else {
            snapshot = setAtPath(snapshot, parseFieldPath(record.fieldPath), record.newValue);
        }
    }
    return isJsonObject(snapshot) ? snapshot : {};
}

/** Latest whole-object definition of the prototype, from any package. */
export function originalDefinition(history: PrototypeHistory): JsonObject | undefined {
    if (isJsonObject(history.currentValue)) {
        return history.currentValue;
    }
    let original: JsonObject | undefined;
    for (const record of history.modifications) {
        if (record.fieldPath === '' && isJsonObject(record.newValue)) {
            original = record.newValue;
        }
    }
    return original;
}

export function packageSlug(packageName: string): string {
    const slug = packageName.toLowerCase().replace(/[^a-z0-9-]+/g, '-').replace(/^-+|-+$/g, '');
    return slug || 'package';
}

export class PatchGenerator {
    private readonly renderer = new LuaPatchRenderer();

    constructor(
        private readonly store: HistoryStore,
        private readonly config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
    ) {}

    generate(issues: readonly ConflictIssue[]): PatchSuggestion[] {
        const buckets: Record<Bucket, ConflictIssue[]> = { recipe: [], technology: [], other: [] };

        for (const issue of issues) {
            if (issue.affectedKeys.length === 0) continue;
            const { kind } = parsePrototypeKey(issue.affectedKeys[0]);
            const bucket: Bucket = kind === 'recipe' || kind === 'technology' ? kind : 'other';
            buckets[bucket].push(issue);
        }

        const patches: PatchSuggestion[] = [];
        const seen = new Set<string>();

        for (const bucket of BUCKET_ORDER) {
            const ordered = [...buckets[bucket]].sort((a, b) => compareSeverity(a.severity, b.severity));

            for (const issue of ordered) {
                const key = issue.affectedKeys[0];
                if (seen.has(key)) continue;
                if (issue.detector === 'missing_dependency' || issue.contributingPackages.length === 0) continue;

                const patch = this.generateFor(bucket, key, issue);
                if (patch) {
                    seen.add(key);
                    patches.push(patch);
                }
            }
        }

        logger.info(`Generated ${patches.length} patch suggestions`);
        return patches;
    }

    private generateFor(bucket: Bucket, key: string, issue: ConflictIssue): PatchSuggestion | null {
        const history = this.store.historyForKey(key);
        if (!history) return null;

        try {
            let plan: PatchPlan | null;
            switch (bucket) {
                case 'recipe':
                    plan = this.recipePlan(history, issue.contributingPackages);
                    break;
                case 'technology':
                    plan = this.technologyPlan(history, issue.contributingPackages);
                    break;
                default:
                    plan = this.genericPlan(history);
            }

            if (!plan) {
                logger.debug(`No usable data to patch ${key} for ${issue.issueId}`);
                return null;
            }

            return {
                patchId: `PATCH:${key}`,
                targetPackage: this.config.patchPackage,
                targetFile: this.config.patchFile,
                fixes: [issue.issueId],
                kind: plan.kind,
                description: describePlan(plan, issue),
                generatedArtifact: this.renderer.render(plan, [issue.issueId], issue.contributingPackages),
                structuredOverrides: plan,
                estimatedImpact: issue.severity
            };
        } catch (error) {
            logger.warn(`Patch generation failed for ${key}`, { error: error instanceof Error ? error.message : String(error) });
            return null;
        }
    }

    private recipePlan(history: PrototypeHistory, packages: string[]): RecipeVariantPlan | null {
        const original = originalDefinition(history) ?? {};
        const usedNames = new Set<string>();
        const variants: RecipeVariant[] = [];

        // The resolved recipe stays in place, so base packages need no variant.
        for (const packageName of packages) {
            if (this.config.basePackages.includes(packageName)) continue;
            const snapshot = replayPackage(history, packageName);
            const ingredients = readIngredients(snapshot.ingredients);
            const results = readIngredients(snapshot.results);
            const category = readString(snapshot, 'category');

            if (ingredients.length === 0 && results.length === 0 && !category) {
                logger.debug(`Skipping ${packageName} for ${history.key}: nothing to carry into a variant`);
                continue;
            }

            const fallbackResults: Ingredient[] = readIngredients(original.results);
            const variant: RecipeVariant = {
                name: uniqueName(`${history.name}-${packageSlug(packageName)}`, usedNames),
                package: packageName,
                ingredients: dedupeIngredients(ingredients.length > 0 ? ingredients : readIngredients(original.ingredients)),
                results: dedupeIngredients(
                    results.length > 0 ? results
                        : fallbackResults.length > 0 ? fallbackResults
                            : [{ type: 'item', name: history.name, amount: 1 }]
                ),
                enabled: readBoolean(snapshot, 'enabled') ?? readBoolean(original, 'enabled') ?? true
            };

            const energy = readNumber(snapshot, 'energy_required') ?? readNumber(original, 'energy_required');
            if (energy !== undefined) variant.energyRequired = energy;
            const resolvedCategory = category ?? readString(original, 'category');
            if (resolvedCategory !== undefined) variant.category = resolvedCategory;

            variants.push(variant);
        }

        if (variants.length === 0) return null;
        return { kind: 'recipe-variants', target: history.key, recipeName: history.name, variants };
    }

    private technologyPlan(history: PrototypeHistory, packages: string[]): TechnologyPathPlan | null {
        const original = originalDefinition(history) ?? {};
        const usedNames = new Set<string>();
        const alternatives: TechnologyAlternative[] = [];

        for (const packageName of packages) {
            const snapshot = replayPackage(history, packageName);
            const hasPrerequisites = Array.isArray(snapshot.prerequisites);
            const hasUnit = isJsonObject(snapshot.unit);
            const effects = Array.isArray(snapshot.effects) ? snapshot.effects : [];

            if (!hasPrerequisites && !hasUnit && effects.length === 0) continue;

            const prerequisites = hasPrerequisites
                ? readStringList(snapshot.prerequisites)
                : readStringList(original.prerequisites);
            alternatives.push({
                name: uniqueName(`${history.name}-${packageSlug(packageName)}-path`, usedNames),
                package: packageName,
                prerequisites,
                requires: prerequisites,
                unit: hasUnit ? snapshot.unit : original.unit ?? null,
                effects: effects.length > 0 ? effects : Array.isArray(original.effects) ? original.effects : []
            });
        }

        if (alternatives.length === 0) return null;

        const effects: JsonValue[] = [];
        const effectIds = new Set<string>();
        for (const alternative of alternatives) {
            for (const effect of alternative.effects) {
                const id = JSON.stringify(effect);
                if (effectIds.has(id)) continue;
                effectIds.add(id);
                effects.push(effect);
            }
        }

        // A technology without a research unit is not loadable.
        const unit = alternatives[0].unit;
        if (unit === null) {
            logger.debug(`No research unit for ${history.key}; skipping fallback technologies`);
        }
        const ladder = unit === null ? [] : this.config.technologyFallbackLadder;
        const fallbacks: TechnologyAlternative[] = ladder.map(tier => ({
            name: uniqueName(`${history.name}-fallback-${tier.tier}`, usedNames),
            tier: tier.tier,
            prerequisites: [...tier.prerequisites],
            requires: [...tier.prerequisites],
            unit,
            effects
        }));

        return { kind: 'technology-paths', target: history.key, technologyName: history.name, alternatives, fallbacks };
    }

    private genericPlan(history: PrototypeHistory): GenericVariantPlan | null {
        const original = originalDefinition(history);
        if (!original) return null;

        const icon = readString(original, 'icon');
        if (!icon) {
            logger.debug(`Skipping generic variants for ${history.key}: original has no icon`);
            return null;
        }

        const presentation: JsonObject = { icon };
        for (const field of ['icon_size', 'subgroup', 'order', 'category']) {
            const value = original[field];
            if (value !== undefined) presentation[field] = cloneJson(value);
        }

        const { costMultiplier, sizeMultiplier } = this.config.genericVariantFactors;
        const reinforced: JsonObject = { ...presentation };
        for (const field of ['stack_size', 'durability', 'max_health']) {
            const value = readNumber(original, field);
            if (value !== undefined) reinforced[field] = Math.max(1, Math.round(value * sizeMultiplier));
        }

        const economy: JsonObject = { ...presentation };
        const stackSize = readNumber(original, 'stack_size');
        if (stackSize !== undefined) economy.stack_size = stackSize;

        const economyVariant: GenericVariant = { name: `${history.name}-economy`, variant: 'economy', multiplier: costMultiplier, fields: economy };
        const economyRecipe = this.economyRecipe(history.name, economyVariant.name, costMultiplier);
        if (economyRecipe) economyVariant.recipe = economyRecipe;

        const variants: GenericVariant[] = [
            economyVariant,
            { name: `${history.name}-reinforced`, variant: 'reinforced', multiplier: sizeMultiplier, fields: reinforced }
        ];

        return {
            kind: 'generic-variants',
            target: history.key,
            prototypeKind: history.kind,
            prototypeName: history.name,
            variants
        };
    }

    /**
     * Copy of the first recipe producing `productName`, with every ingredient
     * amount scaled by `multiplier` (rounded, at least 1) and its result renamed.
     */
    private economyRecipe(productName: string, variantName: string, multiplier: number): VariantRecipe | null {
        for (const producer of this.store.histories()) {
            if (producer.kind !== 'recipe') continue;
            const value = producer.currentValue;
            if (!isJsonObject(value)) continue;

            const product = readIngredients(value.results).find(result => result.name === productName);
            if (!product) continue;

            const owners = producer.packages;
            const recipe: VariantRecipe = {
                source: producer.name,
                name: variantName,
                package: owners[owners.length - 1] ?? '',
                ingredients: readIngredients(value.ingredients).map(ingredient => ({
                    ...ingredient,
                    amount: Math.max(1, Math.round(ingredient.amount * multiplier))
                })),
                results: [{ ...product, name: variantName }],
                enabled: readBoolean(value, 'enabled') ?? true
            };
            const energy = readNumber(value, 'energy_required');
            if (energy !== undefined) recipe.energyRequired = energy;
            const category = readString(value, 'category');
            if (category !== undefined) recipe.category = category;
            return recipe;
        }
        return null;
    }
}

function readBoolean(value: JsonObject, field: string): boolean | undefined {
    const raw = value[field];
    return typeof raw === 'boolean' ? raw : undefined;
}

function uniqueName(base: string, used: Set<string>): string {
    let name = base;
    let suffix = 2;
    while (used.has(name)) {
        name = `${base}-${suffix++}`;
    }
    used.add(name);
    return name;
}

function describePlan(plan: PatchPlan, issue: ConflictIssue): string {
    switch (plan.kind) {
        case 'recipe-variants':
            return `Add ${plan.variants.length} variant recipe(s) for ${plan.recipeName} (${plan.variants.map(v => v.package).join(', ')}) alongside the resolved recipe`;
        case 'technology-paths':
            return `Add ${plan.alternatives.length} alternative research path(s) and ${plan.fallbacks.length} fallback technologies for ${plan.technologyName}`;
        case 'generic-variants':
            return `Add economy and reinforced variants of ${plan.prototypeKind} ${plan.prototypeName} for ${issue.issueId}`;
    }
}
