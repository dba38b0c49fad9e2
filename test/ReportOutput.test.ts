import { describe, expect, it } from 'vitest';
import { CompatibilityAnalyzer } from '../src/CompatibilityAnalyzer.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../src/config.js';
import { buildGraphData } from '../src/GraphExporter.js';
import { HistoryStore } from '../src/HistoryStore.js';
import { formatTextReport } from '../src/ReportFormatter.js';
import { serializeDependency, serializeReport } from '../src/ReportSerializer.js';
import type { CompatibilityReport } from '../src/types.js';
import { addPrototypes, item, recipe, steppingClock, twoPackageRecipeStore } from './helpers.js';

function analyze(store: HistoryStore, loadOrder?: string[]): CompatibilityReport {
    return new CompatibilityAnalyzer(DEFAULT_ANALYSIS_CONFIG, steppingClock()).analyze(store, { loadOrder });
}

function gearStore(): HistoryStore {
    const store = new HistoryStore(steppingClock());
    addPrototypes(store, 'base', [recipe('gear', [item('iron-plate', 2)]), { type: 'item', name: 'gear' }]);
    addPrototypes(store, 'tweak', [{ type: 'item', name: 'gear', stack_size: 200 }]);
    return store;
}

describe('serializeReport', () => {
    it('writes snake_case fields', () => {
        const json = serializeReport(analyze(twoPackageRecipeStore(), ['base', 'A', 'B']));

        expect(json.analyzed_packages).toEqual(['base', 'A', 'B']);
        expect(json.analysis_timestamp).toBe('2024-01-01T00:00:00.000Z');
        expect(json.summary).toEqual({ total: 1, conflicted: 1, critical: 0, high: 1, medium: 0, low: 0, info: 0 });
        expect(json.load_order).toEqual(['base', 'A', 'B']);
        expect(json.issues).toEqual([{
            issue_id: 'MULTI_PACKAGE_RECIPE:recipe.r',
            severity: 'high',
            title: 'Recipe Conflict: r',
            description: "Recipe 'r' ingredients changed by A, B; only the last change survives",
            affected_keys: ['recipe.r'],
            contributing_packages: ['A', 'B'],
            root_cause: 'Packages A, B each replace the ingredient list of r',
            suggested_fixes: [
                'Add one recipe variant per package so every version stays craftable',
                'Make the ingredient change conditional on the other package',
                'Agree on a shared ingredient list between the packages'
            ],
            field_path: 'ingredients',
            evidence: { package_ingredients: { A: [item('iron'), item('wood')], B: [item('iron'), item('steel')] } }
        }]);
    });

    it('includes patches with their structured overrides', () => {
        const json = serializeReport(analyze(twoPackageRecipeStore()));
        const patches = json.patches;
        if (!Array.isArray(patches)) throw new Error('expected a patch list');

        expect(patches).toHaveLength(1);
        expect(patches[0]).toMatchObject({
            patch_id: 'PATCH:recipe.r',
            target_package: 'mod-harmonizer-patch',
            fixes: ['MULTI_PACKAGE_RECIPE:recipe.r'],
            kind: 'recipe-variants',
            estimated_impact: 'high',
            structured_overrides: { kind: 'recipe-variants', recipeName: 'r' }
        });
    });

    it('writes null for a missing amount', () => {
        expect(serializeDependency({
            sourceKind: 'technology', sourceName: 'rail', targetKind: 'technology', targetName: 'logistics',
            kind: 'tech_prerequisite', required: true
        })).toEqual({
            target_kind: 'technology',
            target_name: 'logistics',
            dependency_kind: 'tech_prerequisite',
            required: true,
            amount: null
        });
    });
});

describe('formatTextReport', () => {
    it('lists the header, summary and issues by section', () => {
        const lines = formatTextReport(analyze(twoPackageRecipeStore(), ['base', 'A', 'B'])).split('\n');

        expect(lines.slice(0, 24)).toEqual([
            'MOD COMPATIBILITY REPORT',
            '='.repeat(40),
            'Analyzed Packages: base, A, B',
            'Analysis Time: 2024-01-01T00:00:00.000Z',
            '',
            'Load Order: base → A → B',
            '',
            'SUMMARY',
            '-'.repeat(20),
            'Total Prototypes: 1',
            'Conflicted Prototypes: 1',
            'Critical Issues: 0',
            'High Priority Issues: 1',
            'Medium Priority Issues: 0',
            'Low Priority Issues: 0',
            '',
            '🍳 RECIPE CONFLICTS',
            '='.repeat(40),
            '1. 🔶 Recipe Conflict: r',
            '   Id: MULTI_PACKAGE_RECIPE:recipe.r',
            '   Severity: HIGH',
            '   Affected: recipe.r',
            '   Packages: A → B',
            "   Problem: Recipe 'r' ingredients changed by A, B; only the last change survives"
        ]);
        expect(lines).toContain('🔧 GENERATED PATCHES');
        expect(lines).toContain('   Target: mod-harmonizer-patch/data-final-fixes.lua');
        expect(lines).not.toContain('   if data.raw.recipe["r"] then');
    });

    it('appends patch code on request', () => {
        const lines = formatTextReport(analyze(twoPackageRecipeStore()), true).split('\n');
        expect(lines).toContain('   if data.raw.recipe["r"] then');
    });

    it('says so when nothing was found', () => {
        const text = formatTextReport(analyze(new HistoryStore(steppingClock())));
        expect(text.split('\n')[2]).toBe('Analyzed Packages: (none)');
        expect(text.endsWith('✅ No compatibility issues found.')).toBe(true);
    });
});

describe('buildGraphData', () => {
    it('adds placeholder nodes for undefined targets', () => {
        const graph = buildGraphData(analyze(gearStore()));

        expect(graph.nodes.map(node => [node.id, node.defined, node.severity, node.issueCount])).toEqual([
            ['recipe.gear', true, 'high', 1],
            ['item.gear', true, 'medium', 1],
            ['item.iron-plate', false, null, 0]
        ]);
        expect(graph.edges).toEqual([
            { source: 'recipe.gear', target: 'item.iron-plate', kind: 'ingredient', required: true, amount: 2 },
            { source: 'recipe.gear', target: 'item.gear', kind: 'result', required: false, amount: 1 }
        ]);
        expect(graph.byPackage).toEqual({ base: ['recipe.gear', 'item.gear'], tweak: ['item.gear'] });
        expect(graph.byKind).toEqual({ recipe: ['recipe.gear'], item: ['item.gear', 'item.iron-plate'] });
    });

    it('filters nodes and drops edges that leave the selection', () => {
        const report = analyze(gearStore());

        const conflicted = buildGraphData(report, { conflictedOnly: true });
        expect(conflicted.nodes.map(node => node.id)).toEqual(['item.gear']);
        expect(conflicted.edges).toEqual([]);

        const items = buildGraphData(report, { kinds: ['item'] });
        expect(items.nodes.map(node => node.id)).toEqual(['item.gear', 'item.iron-plate']);
        expect(items.edges).toEqual([]);
    });
});
