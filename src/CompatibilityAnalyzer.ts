import { AvailabilityAnalyzer } from './AvailabilityAnalyzer.js';
import { type AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from './config.js';
import { compareSeverity, ConflictDetector, findMissingDependencies } from './ConflictDetector.js';
import { DependencyGraphBuilder, dependentsOf } from './DependencyGraphBuilder.js';
import { type Clock, HistoryStore } from './HistoryStore.js';
import { logger } from './logger.js';
import { PatchGenerator } from './PatchGenerator.js';
import type { CompatibilityReport, ConflictIssue, PrototypeAnalysis, ReportSummary } from './types.js';

export interface AnalysisOptions {
    /** Issues raised outside the prototype passes, such as package metadata checks. */
    packageIssues?: ConflictIssue[];
    loadOrder?: string[];
    packageDependencies?: Record<string, string[]>;
}

export class CompatibilityAnalyzer {
    constructor(
        private readonly config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
        private readonly clock: Clock = () => new Date()
    ) {}

    analyze(store: HistoryStore, options: AnalysisOptions = {}): CompatibilityReport {
        const startTime = Date.now();

        const graph = new DependencyGraphBuilder(this.config).build(store);
        const dependents = dependentsOf(graph);
        const availability = AvailabilityAnalyzer.fromConfig(store, graph, this.config);

        const analyses = new Map<string, PrototypeAnalysis>();
        for (const history of store.histories()) {
            const dependencies = graph.get(history.key) ?? [];
            const split = availability.analyze(history.key, dependencies);
            const packages = history.packages;

            analyses.set(history.key, {
                key: history.key,
                kind: history.kind,
                name: history.name,
                modificationCount: history.modifications.length,
                packages,
                isConflicted: packages.length > 1,
                dependencies,
                dependents: dependents.get(history.key) ?? [],
                missingDependencies: findMissingDependencies(dependencies, store, this.config),
                availableContexts: split.available.map(context => context.id),
                unavailableContexts: split.unavailable.map(context => context.id),
                issues: []
            });
        }

        const issues = new ConflictDetector().detect({ store, graph, availability, analyses, config: this.config });
        issues.push(...(options.packageIssues ?? []));

        const patches = new PatchGenerator(store, this.config).generate(issues);

        const report: CompatibilityReport = Object.freeze({
            analyzedPackages: store.packages(),
            analysisTimestamp: this.clock().toISOString(),
            summary: summarize(analyses, issues),
            analyses,
            issues: Object.freeze(issues),
            dependencyGraph: graph,
            contexts: availability.contexts,
            patches: Object.freeze(patches),
            loadOrder: options.loadOrder ?? [],
            packageDependencies: options.packageDependencies ?? {}
        });

        logger.info(`Analyzed ${analyses.size} prototypes in ${Date.now() - startTime}ms`, {
            issues: issues.length,
            patches: patches.length
        });
        return report;
    }
}

export function summarize(analyses: ReadonlyMap<string, PrototypeAnalysis>, issues: readonly ConflictIssue[]): ReportSummary {
    const summary: ReportSummary = { total: analyses.size, conflicted: 0, critical: 0, high: 0, medium: 0, low: 0, info: 0 };
    for (const analysis of analyses.values()) {
        if (analysis.isConflicted) summary.conflicted++;
    }
    for (const issue of issues) {
        summary[issue.severity]++;
    }
    return summary;
}

export function criticalIssues(report: CompatibilityReport): ConflictIssue[] {
    return report.issues.filter(issue => issue.severity === 'critical');
}

export function issuesByPackage(report: CompatibilityReport): Map<string, ConflictIssue[]> {
    const byPackage = new Map<string, ConflictIssue[]>();
    for (const issue of report.issues) {
        for (const packageName of issue.contributingPackages) {
            const list = byPackage.get(packageName);
            if (list) list.push(issue);
            else byPackage.set(packageName, [issue]);
        }
    }
    return byPackage;
}

export function conflictedKeys(report: CompatibilityReport): string[] {
    const keys: string[] = [];
    for (const analysis of report.analyses.values()) {
        if (analysis.isConflicted) keys.push(analysis.key);
    }
    return keys;
}

export function issuesBySeverity(report: CompatibilityReport): ConflictIssue[] {
    return [...report.issues].sort((a, b) => compareSeverity(a.severity, b.severity));
}
