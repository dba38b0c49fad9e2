import { compareSeverity } from './ConflictDetector.js';
import { formatPrototypeKey, parsePrototypeKey } from './PrototypeKey.js';
import type { CompatibilityReport, DependencyKind, Severity } from './types.js';

export interface GraphNode {
    id: string;
    kind: string;
    name: string;
    packages: string[];
    modificationCount: number;
    isConflicted: boolean;
    /** Highest severity among the node's issues. */
    severity: Severity | null;
    issueCount: number;
    defined: boolean;
}

export interface GraphEdge {
    source: string;
    target: string;
    kind: DependencyKind;
    required: boolean;
    amount: number | null;
}

export interface GraphData {
    nodes: GraphNode[];
    edges: GraphEdge[];
    byPackage: Record<string, string[]>;
    byKind: Record<string, string[]>;
}

export interface GraphFilter {
    kinds?: string[];
    conflictedOnly?: boolean;
}

/**
 * Nodes for every analysed prototype plus placeholder nodes for dependency
 * targets with no definition.
 */
export function buildGraphData(report: CompatibilityReport, filter: GraphFilter = {}): GraphData {
    const nodes = new Map<string, GraphNode>();

    for (const analysis of report.analyses.values()) {
        let severity: Severity | null = null;
        for (const issue of analysis.issues) {
            if (severity === null || compareSeverity(issue.severity, severity) < 0) {
                severity = issue.severity;
            }
        }
        nodes.set(analysis.key, {
            id: analysis.key,
            kind: analysis.kind,
            name: analysis.name,
            packages: [...analysis.packages],
            modificationCount: analysis.modificationCount,
            isConflicted: analysis.isConflicted,
            severity,
            issueCount: analysis.issues.length,
            defined: true
        });
    }

    const edges: GraphEdge[] = [];
    for (const [source, dependencies] of report.dependencyGraph) {
        for (const dependency of dependencies) {
            const target = formatPrototypeKey(dependency.targetKind, dependency.targetName);
            if (!nodes.has(target)) {
                nodes.set(target, {
                    id: target,
                    kind: dependency.targetKind,
                    name: dependency.targetName,
                    packages: [],
                    modificationCount: 0,
                    isConflicted: false,
                    severity: null,
                    issueCount: 0,
                    defined: false
                });
            }
            edges.push({
                source,
                target,
                kind: dependency.kind,
                required: dependency.required,
                amount: dependency.amount ?? null
            });
        }
    }

    const included = Array.from(nodes.values()).filter(node =>
        (!filter.kinds || filter.kinds.includes(node.kind)) &&
        (!filter.conflictedOnly || node.isConflicted)
    );
    const ids = new Set(included.map(node => node.id));

    const byPackage: Record<string, string[]> = {};
    const byKind: Record<string, string[]> = {};
    for (const node of included) {
        for (const packageName of node.packages) {
            (byPackage[packageName] ??= []).push(node.id);
        }
        (byKind[parsePrototypeKey(node.id).kind] ??= []).push(node.id);
    }

    return {
        nodes: included,
        edges: edges.filter(edge => ids.has(edge.source) && ids.has(edge.target)),
        byPackage,
        byKind
    };
}
