import { compareSeverity } from './ConflictDetector.js';
import { kindOfKey } from './PrototypeKey.js';
import type { CompatibilityReport, ConflictIssue, Severity } from './types.js';

const SEVERITY_ICONS: Record<Severity, string> = {
    critical: '🚨',
    high: '🔶',
    medium: '📋',
    low: 'ℹ️',
    info: '💬'
};

interface Section {
    heading: string;
    issues: ConflictIssue[];
}

function sectionsFor(issues: readonly ConflictIssue[]): Section[] {
    const recipes: ConflictIssue[] = [];
    const research: ConflictIssue[] = [];
    const other: ConflictIssue[] = [];

    for (const issue of issues) {
        const kinds = issue.affectedKeys.map(kindOfKey);
        if (kinds.includes('recipe')) recipes.push(issue);
        else if (kinds.includes('technology')) research.push(issue);
        else other.push(issue);
    }

    const bySeverity = (a: ConflictIssue, b: ConflictIssue) => compareSeverity(a.severity, b.severity);
    return [
        { heading: '🍳 RECIPE CONFLICTS', issues: recipes.sort(bySeverity) },
        { heading: '🔬 RESEARCH CONFLICTS', issues: research.sort(bySeverity) },
        { heading: '⚙️ OTHER CONFLICTS', issues: other.sort(bySeverity) }
    ];
}

function formatIssue(index: number, issue: ConflictIssue): string[] {
    const lines = [
        `${index}. ${SEVERITY_ICONS[issue.severity]} ${issue.title}`,
        `   Id: ${issue.issueId}`,
        `   Severity: ${issue.severity.toUpperCase()}`
    ];
    if (issue.affectedKeys.length > 0) {
        lines.push(`   Affected: ${issue.affectedKeys.join(', ')}`);
    }
    lines.push(
        `   Packages: ${issue.contributingPackages.join(' → ')}`,
        `   Problem: ${issue.description}`,
        `   Root Cause: ${issue.rootCause}`,
        '   Suggested Solutions:',
        ...issue.suggestedFixes.map(fix => `     • ${fix}`),
        ''
    );
    return lines;
}

/** Human-readable report; `includeArtifacts` appends the generated patch code. */
export function formatTextReport(report: CompatibilityReport, includeArtifacts = false): string {
    const { summary } = report;
    const lines = [
        'MOD COMPATIBILITY REPORT',
        '='.repeat(40),
        `Analyzed Packages: ${report.analyzedPackages.join(', ') || '(none)'}`,
        `Analysis Time: ${report.analysisTimestamp}`,
        ''
    ];

    if (report.loadOrder.length > 0) {
        lines.push(`Load Order: ${report.loadOrder.join(' → ')}`, '');
    }

    lines.push(
        'SUMMARY',
        '-'.repeat(20),
        `Total Prototypes: ${summary.total}`,
        `Conflicted Prototypes: ${summary.conflicted}`,
        `Critical Issues: ${summary.critical}`,
        `High Priority Issues: ${summary.high}`,
        `Medium Priority Issues: ${summary.medium}`,
        `Low Priority Issues: ${summary.low}`,
        ''
    );

    for (const section of sectionsFor(report.issues)) {
        if (section.issues.length === 0) continue;
        lines.push(section.heading, '='.repeat(40));
        section.issues.forEach((issue, i) => lines.push(...formatIssue(i + 1, issue)));
    }

    if (report.patches.length > 0) {
        lines.push('🔧 GENERATED PATCHES', '-'.repeat(40));
        report.patches.forEach((patch, i) => {
            lines.push(
                `${i + 1}. ${patch.patchId}`,
                `   Description: ${patch.description}`,
                `   Target: ${patch.targetPackage}/${patch.targetFile}`,
                `   Impact Level: ${patch.estimatedImpact.toUpperCase()}`,
                `   Fixes Issues: ${patch.fixes.join(', ')}`
            );
            if (includeArtifacts) {
                lines.push('', ...patch.generatedArtifact.trimEnd().split('\n').map(line => `   ${line}`));
            }
            lines.push('');
        });
    }

    if (report.issues.length === 0) {
        lines.push('✅ No compatibility issues found.');
    }

    return lines.join('\n');
}
