import { type Clock, HistoryStore } from '../src/HistoryStore.js';
import type { JsonObject, JsonValue } from '../src/types.js';

export interface PrototypeFixture extends JsonObject {
    type: string;
    name: string;
}

/** One second per call, starting at 2024-01-01T00:00:00Z. */
export function steppingClock(): Clock {
    let tick = 0;
    return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

export function item(name: string, amount = 1): JsonObject {
    return { type: 'item', name, amount };
}

export function recipe(name: string, ingredients: JsonObject[], extra: JsonObject = {}): PrototypeFixture {
    return { type: 'recipe', name, ingredients, results: [item(name)], ...extra };
}

export function addPrototypes(store: HistoryStore, packageName: string, prototypes: PrototypeFixture[]): void {
    const context = store.beginContext(packageName, 'data.lua');
    for (const prototype of prototypes) {
        store.recordAddition(context, prototype.type, prototype.name, prototype);
    }
    store.endContext(context);
}

export function modifyField(
    store: HistoryStore,
    packageName: string,
    kind: string,
    name: string,
    field: string,
    oldValue: JsonValue,
    newValue: JsonValue
): void {
    const context = store.beginContext(packageName, 'data-updates.lua');
    store.recordModification(context, kind, name, field, oldValue, newValue);
    store.endContext(context);
}

/**
 * base defines `r` from iron; A switches it to iron + wood, B to iron + steel.
 */
export function twoPackageRecipeStore(): HistoryStore {
    const store = new HistoryStore(steppingClock());
    addPrototypes(store, 'base', [recipe('r', [item('iron')])]);
    modifyField(store, 'A', 'recipe', 'r', 'ingredients', [item('iron')], [item('iron'), item('wood')]);
    modifyField(store, 'B', 'recipe', 'r', 'ingredients', [item('iron'), item('wood')], [item('iron'), item('steel')]);
    return store;
}
