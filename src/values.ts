import type { Ingredient, JsonObject, JsonValue } from './types.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function cloneJson<T extends JsonValue>(value: T): T {
    return structuredClone(value);
}

export function readString(value: JsonObject, field: string): string | undefined {
    const raw = value[field];
    return typeof raw === 'string' ? raw : undefined;
}

export function readNumber(value: JsonObject, field: string): number | undefined {
    const raw = value[field];
    return typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined;
}

export function readStringList(value: JsonValue | undefined): string[] {
    if (!Array.isArray(value)) return [];
    return value.filter((entry): entry is string => typeof entry === 'string');
}

export function isIngredient(value: JsonValue): value is JsonObject & { type: string; name: string; amount: number } {
    return isJsonObject(value) &&
        typeof value.type === 'string' &&
        typeof value.name === 'string' &&
        typeof value.amount === 'number';
}

/**
 * Reads a list already normalized to `{type, name, amount}` entries.
 * Anything else in the list is ignored.
 */
export function readIngredients(value: JsonValue | undefined): Ingredient[] {
    if (!Array.isArray(value)) return [];
    const ingredients: Ingredient[] = [];
    for (const entry of value) {
        if (isIngredient(entry)) {
            ingredients.push({ type: entry.type, name: entry.name, amount: entry.amount });
        }
    }
    return ingredients;
}

export function dedupeIngredients(ingredients: Ingredient[]): Ingredient[] {
    const seen = new Set<string>();
    const result: Ingredient[] = [];
    for (const ingredient of ingredients) {
        const id = `${ingredient.type}\u0000${ingredient.name}`;
        if (seen.has(id)) continue;
        seen.add(id);
        result.push(ingredient);
    }
    return result;
}

export function ingredientsToJson(ingredients: Ingredient[]): JsonValue[] {
    return ingredients.map(ingredient => ({ type: ingredient.type, name: ingredient.name, amount: ingredient.amount }));
}

export type PathSegment = string | number;

/** `ingredients[0].amount` -> `['ingredients', 0, 'amount']` */
export function parseFieldPath(path: string): PathSegment[] {
    const segments: PathSegment[] = [];
    const pattern = /([^.[\]]+)|\[(\d+)\]/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(path)) !== null) {
        if (match[2] !== undefined) {
            segments.push(Number(match[2]));
        } else if (match[1] !== undefined) {
            segments.push(match[1]);
        }
    }
    return segments;
}

/**
 * Returns a copy of `target` with `value` written at `path`, creating
 * intermediate objects or arrays as the next segment requires.
 */
export function setAtPath(target: JsonValue, path: PathSegment[], value: JsonValue): JsonValue {
    if (path.length === 0) {
        return cloneJson(value);
    }

    const [head, ...rest] = path;

    if (typeof head === 'number') {
        const list = Array.isArray(target) ? [...target] : [];
        while (list.length < head) {
            list.push(null);
        }
        list[head] = setAtPath(list[head] ?? null, rest, value);
        return list;
    }

    const object: JsonObject = isJsonObject(target) ? { ...target } : {};
    object[head] = setAtPath(object[head] ?? null, rest, value);
    return object;
}

/** Copies a typed structure into plain JSON, dropping `undefined` fields. */
export function toJsonValue(value: unknown): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (Array.isArray(value)) return value.map(toJsonValue);
    if (typeof value === 'object') {
        const object: JsonObject = {};
        for (const [key, entry] of Object.entries(value)) {
            if (entry !== undefined) object[key] = toJsonValue(entry);
        }
        return object;
    }
    return null;
}
