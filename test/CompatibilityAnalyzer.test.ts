import { describe, expect, it } from 'vitest';
import {
    CompatibilityAnalyzer, conflictedKeys, criticalIssues, issuesByPackage, issuesBySeverity
} from '../src/CompatibilityAnalyzer.js';
import { resolveAnalysisConfig } from '../src/config.js';
import type { ConflictIssue } from '../src/types.js';
import { steppingClock, twoPackageRecipeStore } from './helpers.js';

const packageIssue: ConflictIssue = {
    issueId: 'PACKAGE_DEPENDENCY:A->needed',
    detector: 'package',
    severity: 'critical',
    title: 'Missing Package: needed',
    description: 'A requires needed which is not installed',
    affectedKeys: [],
    contributingPackages: ['A'],
    rootCause: 'Required dependency needed is not loaded',
    suggestedFixes: ['Install and enable needed'],
    fieldPath: '',
    evidence: { package: 'A', dependency: 'needed' }
};

describe('CompatibilityAnalyzer', () => {
    const analyzer = new CompatibilityAnalyzer(resolveAnalysisConfig(), steppingClock());

    it('builds a frozen report with per-prototype analyses', () => {
        const report = analyzer.analyze(twoPackageRecipeStore());

        expect(Object.isFrozen(report)).toBe(true);
        expect(Object.isFrozen(report.issues)).toBe(true);
        expect(Object.isFrozen(report.patches)).toBe(true);
        expect(report.analyzedPackages).toEqual(['base', 'A', 'B']);
        const analysis = report.analyses.get('recipe.r');
        expect(analysis).toMatchObject({
            kind: 'recipe',
            name: 'r',
            modificationCount: 3,
            packages: ['base', 'A', 'B'],
            isConflicted: true,
            dependencies: [],
            missingDependencies: []
        });
        expect(report.loadOrder).toEqual([]);
        expect(report.packageDependencies).toEqual({});
    });

    it('appends package issues and counts them in the summary', () => {
        const report = analyzer.analyze(twoPackageRecipeStore(), {
            packageIssues: [packageIssue],
            loadOrder: ['base', 'A', 'B'],
            packageDependencies: { A: ['base'], B: ['base'] }
        });

        expect(report.issues.map(issue => issue.issueId)).toEqual(['MULTI_PACKAGE_RECIPE:recipe.r', 'PACKAGE_DEPENDENCY:A->needed']);
        expect(report.summary).toEqual({ total: 1, conflicted: 1, critical: 1, high: 1, medium: 0, low: 0, info: 0 });
        expect(report.patches).toHaveLength(1);
        expect(report.packageDependencies).toEqual({ A: ['base'], B: ['base'] });
    });

    it('offers report queries', () => {
        const report = analyzer.analyze(twoPackageRecipeStore(), { packageIssues: [packageIssue] });

        expect(criticalIssues(report).map(issue => issue.issueId)).toEqual(['PACKAGE_DEPENDENCY:A->needed']);
        expect(issuesBySeverity(report).map(issue => issue.severity)).toEqual(['critical', 'high']);
        expect(conflictedKeys(report)).toEqual(['recipe.r']);

        const byPackage = issuesByPackage(report);
        expect(byPackage.get('A')?.map(issue => issue.issueId)).toEqual(['MULTI_PACKAGE_RECIPE:recipe.r', 'PACKAGE_DEPENDENCY:A->needed']);
        expect(byPackage.get('B')?.map(issue => issue.issueId)).toEqual(['MULTI_PACKAGE_RECIPE:recipe.r']);
        expect(byPackage.has('base')).toBe(false);
    });
});
