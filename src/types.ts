export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';

// Highest first.
export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info'];

export type Operation = 'create' | 'overwrite' | 'modify';

export type DependencyKind = 'ingredient' | 'result' | 'tech_prerequisite' | 'tech_unlock' |
    'crafting_category' | 'fuel_category' | 'resource_category';

export interface PrototypeKey {
    kind: string;
    name: string;
}

export interface SourceLocation {
    file: string;
    line?: number;
}

export interface ModificationRecord {
    readonly kind: string;
    readonly name: string;
    readonly package: string;
    readonly location: SourceLocation;
    readonly timestamp: string;
    readonly operation: Operation;
    readonly fieldPath: string;
    readonly oldValue: JsonValue;
    readonly newValue: JsonValue;
}

export interface Ingredient {
    type: string;
    name: string;
    amount: number;
}

export interface Dependency {
    sourceKind: string;
    sourceName: string;
    targetKind: string;
    targetName: string;
    kind: DependencyKind;
    required: boolean;
    amount?: number;
}

export type DependencyGraph = Map<string, Dependency[]>;

export interface AvailabilityContext {
    id: string;
    availableResources: ReadonlySet<string>;
    knownTechnologies: ReadonlySet<string>;
    knownMachines: ReadonlySet<string>;
}

export type DetectorPass = 'essential_recipe' | 'availability' | 'missing_dependency' | 'broken_chain' |
    'multi_package_recipe' | 'recipe_variant' | 'generic' | 'package';

export interface ConflictIssue {
    issueId: string;
    detector: DetectorPass;
    severity: Severity;
    title: string;
    description: string;
    affectedKeys: string[];
    contributingPackages: string[];
    rootCause: string;
    suggestedFixes: string[];
    fieldPath: string;
    evidence: JsonObject;
}

export interface PrototypeAnalysis {
    key: string;
    kind: string;
    name: string;
    modificationCount: number;
    packages: string[];
    isConflicted: boolean;
    dependencies: Dependency[];
    dependents: Dependency[];
    missingDependencies: Dependency[];
    availableContexts: string[];
    unavailableContexts: string[];
    issues: ConflictIssue[];
}

export interface RecipeVariant {
    name: string;
    package: string;
    ingredients: Ingredient[];
    results: Ingredient[];
    energyRequired?: number;
    category?: string;
    enabled: boolean;
}

export interface RecipeVariantPlan {
    kind: 'recipe-variants';
    target: string;
    recipeName: string;
    variants: RecipeVariant[];
}

export interface TechnologyAlternative {
    name: string;
    package?: string;
    tier?: string;
    prerequisites: string[];
    requires: string[];
    unit: JsonValue;
    effects: JsonValue[];
}

export interface TechnologyPathPlan {
    kind: 'technology-paths';
    target: string;
    technologyName: string;
    alternatives: TechnologyAlternative[];
    fallbacks: TechnologyAlternative[];
}

/** A recipe for a variant prototype, derived from the recipe named by `source`. */
export interface VariantRecipe extends RecipeVariant {
    source: string;
}

export interface GenericVariant {
    name: string;
    variant: 'economy' | 'reinforced';
    multiplier: number;
    fields: JsonObject;
    recipe?: VariantRecipe;
}

export interface GenericVariantPlan {
    kind: 'generic-variants';
    target: string;
    prototypeKind: string;
    prototypeName: string;
    variants: GenericVariant[];
}

export type PatchPlan = RecipeVariantPlan | TechnologyPathPlan | GenericVariantPlan;

export interface PatchSuggestion {
    patchId: string;
    targetPackage: string;
    targetFile: string;
    fixes: string[];
    kind: PatchPlan['kind'];
    description: string;
    generatedArtifact: string;
    structuredOverrides: PatchPlan;
    estimatedImpact: Severity;
}

export type PackageDependencyKind = 'required' | 'optional' | 'hidden-optional' | 'incompatible' | 'no-load-order';

export interface PackageDependency {
    name: string;
    kind: PackageDependencyKind;
    operator?: '<' | '<=' | '=' | '>=' | '>';
    version?: string;
}

export interface PackageInfo {
    name: string;
    version: string;
    title: string;
    author?: string;
    path: string;
    isBase: boolean;
    dependencies: PackageDependency[];
}

export interface ReportSummary {
    total: number;
    conflicted: number;
    critical: number;
    high: number;
    medium: number;
    low: number;
    info: number;
}

export interface CompatibilityReport {
    readonly analyzedPackages: readonly string[];
    readonly analysisTimestamp: string;
    readonly summary: ReportSummary;
    readonly analyses: ReadonlyMap<string, PrototypeAnalysis>;
    readonly issues: readonly ConflictIssue[];
    readonly dependencyGraph: ReadonlyMap<string, Dependency[]>;
    readonly contexts: readonly AvailabilityContext[];
    readonly patches: readonly PatchSuggestion[];
    readonly loadOrder: readonly string[];
    readonly packageDependencies: Readonly<Record<string, string[]>>;
}
