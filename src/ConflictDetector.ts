import { AvailabilityAnalyzer } from './AvailabilityAnalyzer.js';
import type { AnalysisConfig } from './config.js';
import { HistoryStore, PrototypeHistory } from './HistoryStore.js';
import { logger } from './logger.js';
import { formatPrototypeKey } from './PrototypeKey.js';
import {
    type ConflictIssue, type Dependency, type DependencyGraph, type DetectorPass, type Ingredient, type JsonObject,
    type PrototypeAnalysis, type Severity, SEVERITY_ORDER
} from './types.js';
import { ingredientsToJson, isJsonObject, readIngredients } from './values.js';

export const ISSUE_PREFIXES: Record<DetectorPass, string> = {
    essential_recipe: 'ESSENTIAL_RECIPE',
    availability: 'AVAILABILITY',
    missing_dependency: 'MISSING_DEPENDENCY',
    broken_chain: 'BROKEN_CHAIN',
    multi_package_recipe: 'MULTI_PACKAGE_RECIPE',
    recipe_variant: 'RECIPE_VARIANT',
    generic: 'CONFLICT',
    package: 'PACKAGE'
};

const GENERIC_SEVERITY: Record<string, Severity> = {
    recipe: 'high',
    item: 'medium',
    technology: 'medium'
};

export interface DetectionInput {
    store: HistoryStore;
    graph: DependencyGraph;
    availability: AvailabilityAnalyzer;
    analyses: Map<string, PrototypeAnalysis>;
    config: AnalysisConfig;
}

export function issueId(pass: DetectorPass, key: string): string {
    return `${ISSUE_PREFIXES[pass]}:${key}`;
}

export function compareSeverity(a: Severity, b: Severity): number {
    return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}

/** Required edges whose target has no history; built-in category kinds are assumed present. */
export function findMissingDependencies(dependencies: Dependency[], store: HistoryStore, config: AnalysisConfig): Dependency[] {
    return dependencies.filter(dependency =>
        dependency.required &&
        !config.builtInCategoryKinds.includes(dependency.targetKind) &&
        !store.has(dependency.targetKind, dependency.targetName)
    );
}

/** Latest `ingredients` value per package, in order of each package's first such record. */
export function reconstructIngredients(history: PrototypeHistory): Map<string, Ingredient[]> {
    const byPackage = new Map<string, Ingredient[]>();
    for (const record of history.modifications) {
        if (record.fieldPath === 'ingredients') {
            byPackage.set(record.package, readIngredients(record.newValue));
        }
    }
    return byPackage;
}

/**
 * Runs the detector passes in a fixed order. Passes only read their inputs;
 * a prototype can legitimately collect issues from several passes, each with
 * its own id prefix, and those are not merged.
 */
export class ConflictDetector {
    detect(input: DetectionInput): ConflictIssue[] {
        const issues: ConflictIssue[] = [];
        const multiPackageKeys = new Set<string>();

        const passes: Array<[DetectorPass, () => void]> = [
            ['essential_recipe', () => this.detectEssentialRecipes(input, issues)],
            ['availability', () => this.detectAvailability(input, issues)],
            ['missing_dependency', () => this.detectMissingDependencies(input, issues)],
            ['broken_chain', () => this.detectBrokenResearchChains(input, issues)],
            ['multi_package_recipe', () => this.detectMultiPackageRecipes(input, issues, multiPackageKeys)],
            ['recipe_variant', () => this.detectRecipeVariants(input, issues, multiPackageKeys)],
            ['generic', () => this.detectGenericConflicts(input, issues)]
        ];

        for (const [pass, run] of passes) {
            const before = issues.length;
            run();
            logger.debug(`Pass ${pass}: ${issues.length - before} issues`);
        }

        for (const issue of issues) {
            for (const key of issue.affectedKeys) {
                input.analyses.get(key)?.issues.push(issue);
            }
        }

        logger.info(`Conflict detection found ${issues.length} issues`);
        return issues;
    }

    private detectEssentialRecipes({ store, availability, config }: DetectionInput, issues: ConflictIssue[]): void {
        for (const recipeName of config.essentialRecipes) {
            const history = store.historyFor('recipe', recipeName);
            if (!history) continue;

            isolate('essential_recipe', history.key, () => {
                const packages = history.packages;
                if (packages.length <= 1) return;

                const ingredientChanges = history.modifications.filter(record => record.fieldPath === 'ingredients');
                if (ingredientChanges.length === 0) return;

                const finalIngredients = readIngredients(ingredientChanges[ingredientChanges.length - 1].newValue);
                const problematic = finalIngredients
                    .map(ingredient => ingredient.name)
                    .filter(name => !availability.isWidelyAvailable(name));

                let description = `Essential recipe '${recipeName}' modified by multiple packages with potentially incompatible ingredients`;
                if (problematic.length > 0) {
                    description += `. Problematic ingredients: ${problematic.join(', ')}`;
                }

                issues.push({
                    issueId: issueId('essential_recipe', history.key),
                    detector: 'essential_recipe',
                    severity: problematic.length > 0 ? 'critical' : 'high',
                    title: `Critical Recipe Conflict: ${recipeName}`,
                    description,
                    affectedKeys: [history.key],
                    contributingPackages: packages,
                    rootCause: `Multiple packages modify the ${recipeName} recipe, potentially making it uncraftable in some contexts`,
                    suggestedFixes: [
                        'Create conditional recipe based on available items',
                        'Add alternative recipes for different contexts',
                        'Use compatibility patch to resolve ingredient conflicts'
                    ],
                    fieldPath: 'ingredients',
                    evidence: {
                        final_ingredients: ingredientsToJson(finalIngredients),
                        problematic_ingredients: problematic
                    }
                });
            });
        }
    }

    private detectAvailability({ analyses, config }: DetectionInput, issues: ConflictIssue[]): void {
        for (const analysis of analyses.values()) {
            if (analysis.unavailableContexts.length === 0) continue;

            const unavailable = analysis.unavailableContexts;
            const critical = config.referenceContext !== undefined && unavailable.includes(config.referenceContext);

            issues.push({
                issueId: issueId('availability', analysis.key),
                detector: 'availability',
                severity: critical ? 'critical' : 'high',
                title: `Availability Conflict: ${analysis.name}`,
                description: `${analysis.kind} '${analysis.name}' not available in contexts: ${unavailable.join(', ')}`,
                affectedKeys: [analysis.key],
                contributingPackages: [...analysis.packages],
                rootCause: 'Requires ingredients that cannot be obtained in some contexts',
                suggestedFixes: [
                    'Add context-specific alternative recipes',
                    'Modify ingredients to use locally available items',
                    'Add resource processing chains for missing items'
                ],
                fieldPath: 'ingredients',
                evidence: {
                    unavailable_contexts: [...unavailable],
                    available_contexts: [...analysis.availableContexts]
                }
            });
        }
    }

    private detectMissingDependencies({ analyses }: DetectionInput, issues: ConflictIssue[]): void {
        for (const analysis of analyses.values()) {
            if (analysis.missingDependencies.length === 0) continue;

            const missing = analysis.missingDependencies.map(dependency =>
                formatPrototypeKey(dependency.targetKind, dependency.targetName)
            );

            issues.push({
                issueId: issueId('missing_dependency', analysis.key),
                detector: 'missing_dependency',
                severity: 'high',
                title: `Missing Dependencies: ${analysis.name}`,
                description: `${analysis.kind} '${analysis.name}' references undefined prototypes: ${missing.join(', ')}`,
                affectedKeys: [analysis.key],
                contributingPackages: [...analysis.packages],
                rootCause: 'Referenced prototypes are not defined by any loaded package',
                suggestedFixes: [
                    'Install the package that defines the missing prototypes',
                    'Remove or replace the references',
                    'Check the package load order'
                ],
                fieldPath: '',
                evidence: {
                    missing_targets: missing
                }
            });
        }
    }

    private detectBrokenResearchChains({ store, graph }: DetectionInput, issues: ConflictIssue[]): void {
        const technologies = store.histories().filter(history => history.kind === 'technology');
        const prerequisites = new Map<string, string[]>();
        const dependents = new Map<string, string[]>();

        for (const technology of technologies) {
            const names: string[] = [];
            for (const dependency of graph.get(technology.key) ?? []) {
                if (dependency.kind === 'tech_prerequisite' && !names.includes(dependency.targetName)) {
                    names.push(dependency.targetName);
                }
            }
            prerequisites.set(technology.name, names);
            for (const name of names) {
                const list = dependents.get(name);
                if (list) list.push(technology.name);
                else dependents.set(name, [technology.name]);
            }
        }

        const remaining = new Map<string, number>();
        const queue: string[] = [];
        for (const [name, names] of prerequisites) {
            remaining.set(name, names.length);
            if (names.length === 0) queue.push(name);
        }

        const reachable = new Set<string>();
        while (queue.length > 0) {
            const name = queue.shift();
            if (name === undefined || reachable.has(name)) continue;
            reachable.add(name);

            for (const dependent of dependents.get(name) ?? []) {
                const count = (remaining.get(dependent) ?? 0) - 1;
                remaining.set(dependent, count);
                if (count === 0) queue.push(dependent);
            }
        }

        for (const technology of technologies) {
            if (reachable.has(technology.name)) continue;

            isolate('broken_chain', technology.key, () => {
                const undefinedPrereqs = (prerequisites.get(technology.name) ?? [])
                    .filter(name => !store.has('technology', name));
                if (undefinedPrereqs.length === 0) return;

                issues.push({
                    issueId: issueId('broken_chain', technology.key),
                    detector: 'broken_chain',
                    severity: 'high',
                    title: `Broken Research Chain: ${technology.name}`,
                    description: `Technology '${technology.name}' cannot be researched: prerequisites ${undefinedPrereqs.join(', ')} are not defined`,
                    affectedKeys: [technology.key],
                    contributingPackages: technology.packages,
                    rootCause: `Prerequisite technologies with no definition: ${undefinedPrereqs.join(', ')}`,
                    suggestedFixes: [
                        'Restore the removed prerequisite technologies',
                        'Point the prerequisites at technologies that exist',
                        'Add alternative research paths'
                    ],
                    fieldPath: 'prerequisites',
                    evidence: {
                        missing_prereqs: undefinedPrereqs
                    }
                });
            });
        }
    }

    private detectMultiPackageRecipes({ store, config }: DetectionInput, issues: ConflictIssue[], covered: Set<string>): void {
        for (const history of store.histories()) {
            if (history.kind !== 'recipe') continue;

            isolate('multi_package_recipe', history.key, () => {
                if (history.packages.length < 2) return;

                const byPackage = reconstructIngredients(history);
                if (byPackage.size < 2) return;

                const packages = Array.from(byPackage.keys());
                const essential = config.essentialRecipes.includes(history.name);
                const packageIngredients: JsonObject = {};
                for (const [packageName, ingredients] of byPackage) {
                    packageIngredients[packageName] = ingredientsToJson(ingredients);
                }

                covered.add(history.key);
                issues.push({
                    issueId: issueId('multi_package_recipe', history.key),
                    detector: 'multi_package_recipe',
                    severity: essential ? 'critical' : 'high',
                    title: `Recipe Conflict: ${history.name}`,
                    description: `Recipe '${history.name}' ingredients changed by ${packages.join(', ')}; only the last change survives`,
                    affectedKeys: [history.key],
                    contributingPackages: packages,
                    rootCause: `Packages ${packages.join(', ')} each replace the ingredient list of ${history.name}`,
                    suggestedFixes: [
                        'Add one recipe variant per package so every version stays craftable',
                        'Make the ingredient change conditional on the other package',
                        'Agree on a shared ingredient list between the packages'
                    ],
                    fieldPath: 'ingredients',
                    evidence: {
                        package_ingredients: packageIngredients
                    }
                });
            });
        }
    }

    private detectRecipeVariants({ store, config }: DetectionInput, issues: ConflictIssue[], covered: Set<string>): void {
        for (const history of store.histories()) {
            if (history.kind !== 'recipe' || covered.has(history.key)) continue;

            isolate('recipe_variant', history.key, () => {
                if (history.packages.length < 2) return;

                const changes = Array.from(reconstructIngredients(history))
                    .filter(([packageName]) => !config.basePackages.includes(packageName));
                if (changes.length !== 1) return;

                const [packageName, ingredients] = changes[0];
                const essential = config.essentialRecipes.includes(history.name);
                const evidence: JsonObject = {
                    package: packageName,
                    ingredients: ingredientsToJson(ingredients)
                };
                const original = originalIngredients(history, packageName);
                if (original) {
                    evidence.original_ingredients = ingredientsToJson(original);
                }

                issues.push({
                    issueId: issueId('recipe_variant', history.key),
                    detector: 'recipe_variant',
                    severity: essential ? 'high' : 'medium',
                    title: `Recipe Variant: ${history.name}`,
                    description: `Recipe '${history.name}' ingredients replaced by ${packageName}`,
                    affectedKeys: [history.key],
                    contributingPackages: [packageName],
                    rootCause: `${packageName} diverges from the original ${history.name} recipe`,
                    suggestedFixes: [
                        'Keep the original recipe and add the changed one as a variant',
                        'Check the new ingredients are obtainable in every context'
                    ],
                    fieldPath: 'ingredients',
                    evidence
                });
            });
        }
    }

    private detectGenericConflicts({ store }: DetectionInput, issues: ConflictIssue[]): void {
        const covered = new Set<string>();
        for (const issue of issues) {
            for (const key of issue.affectedKeys) covered.add(key);
        }

        for (const conflict of store.conflicts()) {
            if (covered.has(conflict.key)) continue;
            const history = store.historyForKey(conflict.key);
            if (!history) continue;

            const kind = history.kind;
            const title = kind.charAt(0).toUpperCase() + kind.slice(1);
            issues.push({
                issueId: issueId('generic', conflict.key),
                detector: 'generic',
                severity: GENERIC_SEVERITY[kind] ?? 'low',
                title: `${title} Conflict: ${history.name}`,
                description: `${title} '${history.name}' modified by multiple packages`,
                affectedKeys: [conflict.key],
                contributingPackages: conflict.packages,
                rootCause: `Multiple packages modify the same ${kind}`,
                suggestedFixes: [
                    'Review modification order',
                    'Create compatibility patch',
                    'Use conditional modifications'
                ],
                fieldPath: '',
                evidence: {
                    packages: conflict.packages
                }
            });
        }
    }
}

function originalIngredients(history: PrototypeHistory, exceptPackage: string): Ingredient[] | undefined {
    let original: Ingredient[] | undefined;
    for (const record of history.modifications) {
        if (record.package === exceptPackage || record.fieldPath !== '') continue;
        if (isJsonObject(record.newValue)) {
            original = readIngredients(record.newValue.ingredients);
        }
    }
    return original;
}

function isolate(pass: DetectorPass, key: string, run: () => void): void {
    try {
        run();
    } catch (error) {
        logger.warn(`Pass ${pass} failed for ${key}`, { error: error instanceof Error ? error.message : String(error) });
    }
}
