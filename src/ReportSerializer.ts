import type { CompatibilityReport, ConflictIssue, Dependency, JsonObject, PatchSuggestion } from './types.js';
import { toJsonValue } from './values.js';

export function serializeDependency(dependency: Dependency): JsonObject {
    return {
        target_kind: dependency.targetKind,
        target_name: dependency.targetName,
        dependency_kind: dependency.kind,
        required: dependency.required,
        amount: dependency.amount ?? null
    };
}

export function serializeIssue(issue: ConflictIssue): JsonObject {
    return {
        issue_id: issue.issueId,
        severity: issue.severity,
        title: issue.title,
        description: issue.description,
        affected_keys: [...issue.affectedKeys],
        contributing_packages: [...issue.contributingPackages],
        root_cause: issue.rootCause,
        suggested_fixes: [...issue.suggestedFixes],
        field_path: issue.fieldPath,
        evidence: issue.evidence
    };
}

export function serializePatch(patch: PatchSuggestion): JsonObject {
    return {
        patch_id: patch.patchId,
        target_package: patch.targetPackage,
        target_file: patch.targetFile,
        fixes: [...patch.fixes],
        kind: patch.kind,
        description: patch.description,
        generated_artifact: patch.generatedArtifact,
        structured_overrides: toJsonValue(patch.structuredOverrides),
        estimated_impact: patch.estimatedImpact
    };
}

/** Plain JSON form of a report, with snake_case fields and `kind.name` keys. */
export function serializeReport(report: CompatibilityReport): JsonObject {
    const dependencyGraph: JsonObject = {};
    for (const [key, dependencies] of report.dependencyGraph) {
        dependencyGraph[key] = dependencies.map(serializeDependency);
    }

    const packageDependencies: JsonObject = {};
    for (const [name, dependencies] of Object.entries(report.packageDependencies)) {
        packageDependencies[name] = [...dependencies];
    }

    return {
        analyzed_packages: [...report.analyzedPackages],
        analysis_timestamp: report.analysisTimestamp,
        summary: { ...report.summary },
        issues: report.issues.map(serializeIssue),
        dependency_graph: dependencyGraph,
        patches: report.patches.map(serializePatch),
        load_order: [...report.loadOrder],
        package_dependencies: packageDependencies
    };
}
