import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IngestionError } from '../src/errors.js';
import { HistoryStore } from '../src/HistoryStore.js';
import {
    IngestionLoader, normalizeField, normalizeIngredientList, normalizePrototype
} from '../src/IngestionLoader.js';
import type { PackageInfo } from '../src/types.js';
import { steppingClock } from './helpers.js';

function packageInfo(name: string, path: string): PackageInfo {
    return { name, version: '1.0.0', title: name, path, isBase: false, dependencies: [] };
}

describe('normalization', () => {
    it('rewrites pairs, untyped entries and amount ranges', () => {
        expect(normalizeIngredientList([
            ['iron-plate', 2],
            { type: 'fluid', name: 'water', amount: 10 },
            { name: 'ore', amount_min: 1, amount_max: 3 },
            { name: 'scrap', amount_max: 4 },
            { name: 'bolt' }
        ])).toEqual([
            { type: 'item', name: 'iron-plate', amount: 2 },
            { type: 'fluid', name: 'water', amount: 10 },
            { type: 'item', name: 'ore', amount_min: 1, amount_max: 3, amount: 2 },
            { type: 'item', name: 'scrap', amount_max: 4, amount: 4 },
            { type: 'item', name: 'bolt', amount: 1 }
        ]);
    });

    it('turns a single result into a results list', () => {
        expect(normalizePrototype('recipe', {
            type: 'recipe',
            name: 'gear',
            ingredients: [['iron-plate', 2]],
            result: 'gear',
            result_count: 2
        })).toEqual({
            type: 'recipe',
            name: 'gear',
            ingredients: [{ type: 'item', name: 'iron-plate', amount: 2 }],
            results: [{ type: 'item', name: 'gear', amount: 2 }]
        });
    });

    it('normalizes research unit ingredients', () => {
        expect(normalizePrototype('technology', {
            type: 'technology',
            name: 'rail',
            unit: { count: 10, ingredients: [['red-pack', 1]] }
        }).unit).toEqual({ count: 10, ingredients: [{ type: 'item', name: 'red-pack', amount: 1 }] });
    });

    it('normalizes single field edits by path', () => {
        expect(normalizeField('recipe', 'ingredients[0]', ['wood', 3])).toEqual({ type: 'item', name: 'wood', amount: 3 });
        expect(normalizeField('technology', 'unit.ingredients', [['red-pack', 2]])).toEqual([{ type: 'item', name: 'red-pack', amount: 2 }]);
        expect(normalizeField('item', 'ingredients', [['wood', 3]])).toEqual([['wood', 3]]);
    });
});

describe('IngestionLoader', () => {
    let store: HistoryStore;
    let loader: IngestionLoader;
    let testDir: string;

    beforeEach(async () => {
        store = new HistoryStore(steppingClock());
        loader = new IngestionLoader(store);
        testDir = await mkdtemp(join(tmpdir(), 'ingestion-loader-test-'));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    describe('applyBatch', () => {
        it('replays additions and modifications under the package', () => {
            const [batch] = loader.parseBatches({
                package: 'alt',
                file: 'prototypes/recipe.lua',
                operations: [
                    { op: 'add', prototypes: [{ type: 'recipe', name: 'gear', ingredients: [['iron-plate', 2]] }] },
                    { op: 'modify', line: 4, kind: 'recipe', name: 'gear', field: 'ingredients', old: [['iron-plate', 2]], new: [['wood', 4]] }
                ]
            }, 'inline');

            expect(loader.applyBatch(batch)).toEqual({ package: 'alt', additions: 1, modifications: 1, dropped: 0 });

            const history = store.historyFor('recipe', 'gear');
            expect(history?.currentValue).toEqual([{ type: 'item', name: 'wood', amount: 4 }]);
            expect(history?.modifications[1].oldValue).toEqual([{ type: 'item', name: 'iron-plate', amount: 2 }]);
            expect(history?.modifications[1].location).toEqual({ file: 'prototypes/recipe.lua', line: 4 });
        });

        it('defaults a missing old value to null', () => {
            const [batch] = loader.parseBatches({
                operations: [{ op: 'modify', kind: 'item', name: 'plate', field: 'stack_size', new: 200 }]
            }, 'inline');
            loader.applyBatch(batch, 'tweaks');

            expect(store.historyFor('item', 'plate')?.modifications[0].oldValue).toBeNull();
        });

        it('requires a package name', () => {
            const [batch] = loader.parseBatches({ operations: [] }, 'inline');
            expect(() => loader.applyBatch(batch)).toThrow('batch: batch has no package name');
        });
    });

    describe('parseBatches', () => {
        it('accepts a single batch or a list', () => {
            expect(loader.parseBatches({ package: 'a', operations: [] }, 'x')).toHaveLength(1);
            expect(loader.parseBatches([{ package: 'a', operations: [] }, { package: 'b', operations: [] }], 'x')).toHaveLength(2);
        });

        it('throws IngestionError naming the source', () => {
            let caught: unknown;
            try {
                loader.parseBatches({ operations: [{ op: 'remove' }] }, 'dump.json');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(IngestionError);
            expect(caught instanceof IngestionError && caught.source).toBe('dump.json');
        });

        it('rejects prototypes without a name', () => {
            expect(() => loader.parseBatches({
                package: 'a',
                operations: [{ op: 'add', prototypes: [{ type: 'item' }] }]
            }, 'dump.json')).toThrow(IngestionError);
        });
    });

    describe('ingestFile', () => {
        it('applies batches in file order', async () => {
            const path = join(testDir, 'dump.json');
            await writeFile(path, JSON.stringify([
                { package: 'base', operations: [{ op: 'add', prototypes: [{ type: 'item', name: 'plate', stack_size: 100 }] }] },
                { package: 'tweaks', operations: [{ op: 'modify', kind: 'item', name: 'plate', field: 'stack_size', old: 100, new: 200 }] }
            ]));

            const stats = await loader.ingestFile(path);
            expect(stats.map(entry => entry.package)).toEqual(['base', 'tweaks']);
            expect(store.conflicts()).toEqual([{ key: 'item.plate', packages: ['base', 'tweaks'] }]);
        });

        it('rejects batches without a package', async () => {
            const path = join(testDir, 'dump.json');
            await writeFile(path, JSON.stringify({ operations: [] }));
            await expect(loader.ingestFile(path)).rejects.toThrow(`${path}: every batch needs a package name`);
        });

        it('wraps unreadable JSON in IngestionError', async () => {
            const path = join(testDir, 'broken.json');
            await writeFile(path, '{ not json');
            await expect(loader.ingestFile(path)).rejects.toBeInstanceOf(IngestionError);
        });
    });

    describe('ingestPackages', () => {
        async function writePackage(name: string, batch: unknown): Promise<PackageInfo> {
            const dir = join(testDir, name);
            await mkdir(dir, { recursive: true });
            await writeFile(join(dir, 'prototypes.json'), JSON.stringify(batch));
            return packageInfo(name, dir);
        }

        it('records batches under the package that ships them', async () => {
            const info = await writePackage('alt', {
                package: 'someone-else',
                operations: [{ op: 'add', prototypes: [{ type: 'item', name: 'plate' }] }]
            });

            expect(await loader.ingestPackage(info)).toEqual({ package: 'alt', additions: 1, modifications: 0, dropped: 0 });
            expect(store.packages()).toEqual(['alt']);
        });

        it('returns null for a package without a dump', async () => {
            expect(await loader.ingestPackage(packageInfo('empty', testDir))).toBeNull();
        });

        it('replays packages in load order', async () => {
            const a = await writePackage('a', { operations: [{ op: 'add', prototypes: [{ type: 'item', name: 'plate' }] }] });
            const b = await writePackage('b', { operations: [{ op: 'add', prototypes: [{ type: 'item', name: 'plate', stack_size: 5 }] }] });

            const stats = await loader.ingestPackages([a, b], ['b', 'missing', 'a']);
            expect(stats.map(entry => entry.package)).toEqual(['b', 'a']);
            expect(store.historyFor('item', 'plate')?.currentValue).toEqual({ type: 'item', name: 'plate' });
        });

        it('skips a package whose dump fails validation', async () => {
            const broken = await writePackage('broken', { operations: [{ op: 'rename' }] });
            const good = await writePackage('good', { operations: [{ op: 'add', prototypes: [{ type: 'item', name: 'bolt' }] }] });

            const stats = await loader.ingestPackages([broken, good], ['broken', 'good']);
            expect(stats.map(entry => entry.package)).toEqual(['good']);
            expect(store.packages()).toEqual(['good']);
        });
    });
});
