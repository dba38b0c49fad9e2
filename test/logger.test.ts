import { afterEach, describe, expect, it } from 'vitest';
import { logger, renderMeta, setLogLevel } from '../src/logger.js';

describe('renderMeta', () => {
    it('is empty without metadata', () => {
        expect(renderMeta({})).toBe('');
    });

    it('writes errors as their message', () => {
        expect(renderMeta({ key: 'item.plate', error: new Error('boom') })).toBe(' {"key":"item.plate","error":"boom"}');
    });

    it('marks circular references', () => {
        const node: Record<string, unknown> = { name: 'a' };
        node.self = node;
        expect(renderMeta({ node })).toBe(' {"node":{"name":"a","self":"[Circular]"}}');
    });

    it('falls back to inspection for values JSON cannot hold', () => {
        expect(renderMeta({ size: 10n })).toBe(' { size: 10n }');
    });
});

describe('setLogLevel', () => {
    afterEach(() => {
        logger.level = 'error';
    });

    it('accepts known levels and keeps the current one otherwise', () => {
        expect(setLogLevel('error')).toBe(true);
        expect(setLogLevel('loud')).toBe(false);
        expect(logger.level).toBe('error');

        expect(setLogLevel('debug')).toBe(true);
        expect(logger.level).toBe('debug');
    });
});
