import { KeyFormatError } from './errors.js';
import type { PrototypeKey } from './types.js';

export const KEY_SEPARATOR = '.';

export function formatPrototypeKey(kind: string, name: string): string {
    return `${kind}${KEY_SEPARATOR}${name}`;
}

/**
 * Splits on the first separator, so names may themselves contain dots.
 * Throws {@link KeyFormatError} when there is no separator at all.
 */
export function parsePrototypeKey(key: string): PrototypeKey {
    const index = key.indexOf(KEY_SEPARATOR);
    if (index === -1) {
        throw new KeyFormatError(key);
    }
    return { kind: key.slice(0, index), name: key.slice(index + 1) };
}

export function kindOfKey(key: string): string {
    return parsePrototypeKey(key).kind;
}
