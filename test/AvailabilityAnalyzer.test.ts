import { describe, expect, it } from 'vitest';
import { AvailabilityAnalyzer, createContext, deriveContexts } from '../src/AvailabilityAnalyzer.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../src/config.js';
import { DependencyGraphBuilder } from '../src/DependencyGraphBuilder.js';
import { HistoryStore } from '../src/HistoryStore.js';
import { addPrototypes, item, recipe, steppingClock } from './helpers.js';

function chainStore(): HistoryStore {
    const store = new HistoryStore(steppingClock());
    addPrototypes(store, 'base', [
        recipe('iron-plate', [item('iron-ore')]),
        recipe('gear', [item('iron-plate', 2)]),
        recipe('frame', [item('gear'), item('iron-plate')]),
        recipe('loop-a', [item('loop-b')]),
        recipe('loop-b', [item('loop-a')])
    ]);
    return store;
}

function analyzerFor(store: HistoryStore, contexts = [
    createContext({ id: 'home', resources: ['iron-ore'] }),
    createContext({ id: 'desert', resources: ['sand'] })
]): AvailabilityAnalyzer {
    const graph = new DependencyGraphBuilder().build(store);
    return new AvailabilityAnalyzer(store, graph, contexts);
}

describe('AvailabilityAnalyzer', () => {
    it('treats context resources as available regardless of recipes', () => {
        const analyzer = analyzerFor(chainStore());
        const desert = analyzer.context('desert');
        expect(desert && analyzer.isItemAvailable('sand', desert)).toBe(true);
    });

    it('follows producing recipes down to resources', () => {
        const analyzer = analyzerFor(chainStore());
        expect(analyzer.availabilityMatrix('gear')).toEqual({ home: true, desert: false });
        expect(analyzer.availabilityMatrix('frame')).toEqual({ home: true, desert: false });
    });

    it('returns false for items nobody produces', () => {
        expect(analyzerFor(chainStore()).availabilityMatrix('unobtainium')).toEqual({ home: false, desert: false });
    });

    it('terminates on cyclic recipes', () => {
        const analyzer = analyzerFor(chainStore());
        expect(analyzer.availabilityMatrix('loop-a')).toEqual({ home: false, desert: false });
        expect(analyzer.availabilityMatrix('loop-b')).toEqual({ home: false, desert: false });
    });

    it('splits contexts for a dependency list', () => {
        const store = chainStore();
        const graph = new DependencyGraphBuilder().build(store);
        const analyzer = analyzerFor(store);

        const split = analyzer.analyze('recipe.gear', graph.get('recipe.gear') ?? []);
        expect(split.available.map(context => context.id)).toEqual(['home']);
        expect(split.unavailable.map(context => context.id)).toEqual(['desert']);
    });

    it('resolves deep chains of shared intermediates once per context', () => {
        const store = new HistoryStore(steppingClock());
        const prototypes = [recipe('x0', [item('ore')])];
        for (let level = 1; level <= 40; level++) {
            prototypes.push(recipe(`y${level}`, [item(`x${level - 1}`)]));
            prototypes.push(recipe(`x${level}`, [item(`x${level - 1}`), item(`y${level}`)]));
        }
        addPrototypes(store, 'base', prototypes);
        const analyzer = analyzerFor(store, [
            createContext({ id: 'home', resources: ['ore'] }),
            createContext({ id: 'desert', resources: ['sand'] })
        ]);

        const started = Date.now();
        expect(analyzer.availabilityMatrix('x40')).toEqual({ home: true, desert: false });
        expect(Date.now() - started).toBeLessThan(1000);
    });

    it('applies the wide availability threshold', () => {
        const contexts = [
            createContext({ id: 'a', resources: ['iron-ore'] }),
            createContext({ id: 'b', resources: ['iron-ore'] }),
            createContext({ id: 'c', resources: ['iron-ore'] }),
            createContext({ id: 'd', resources: [] })
        ];
        const analyzer = analyzerFor(chainStore(), contexts);
        expect(analyzer.isWidelyAvailable('gear')).toBe(true);

        const narrow = analyzerFor(chainStore());
        expect(narrow.isWidelyAvailable('gear')).toBe(false);
    });

    it('uses the first recipe in store order as producer', () => {
        const store = new HistoryStore(steppingClock());
        addPrototypes(store, 'base', [
            recipe('plate-a', [item('ore')], { results: [item('plate')] }),
            recipe('plate-b', [item('scrap')], { results: [item('plate')] })
        ]);
        const analyzer = analyzerFor(store);
        expect(analyzer.producerOf('plate')).toBe('recipe.plate-a');
    });

    it('yields no verdicts without contexts', () => {
        const analyzer = analyzerFor(chainStore(), []);
        expect(analyzer.analyze('recipe.gear', [])).toEqual({ available: [], unavailable: [] });
    });

    it('derives contexts from planet prototypes', () => {
        const store = new HistoryStore(steppingClock());
        addPrototypes(store, 'space', [{
            type: 'planet',
            name: 'rocky',
            resources: ['wood'],
            map_gen_settings: {
                autoplace_controls: { 'iron-ore': {} },
                autoplace_settings: { entity: { settings: { stone: {} } } }
            }
        }]);

        const contexts = deriveContexts(store, ['planet']);
        expect(contexts.map(context => context.id)).toEqual(['rocky']);
        expect([...contexts[0].availableResources]).toEqual(['wood', 'iron-ore', 'stone']);

        const analyzer = AvailabilityAnalyzer.fromConfig(store, new Map(), DEFAULT_ANALYSIS_CONFIG);
        expect(analyzer.contexts.map(context => context.id)).toEqual(['rocky']);
    });
});
