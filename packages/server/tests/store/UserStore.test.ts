import { describe, it, expect } from 'vitest';
import { UserStore } from '../../src/store/UserStore.js';

describe('UserStore', () => {
    it('creates an empty table on first reference', () => {
        const store = new UserStore();
        expect(store.has('alice')).toBe(false);

        const table = store.table('alice');

        expect(table.size).toBe(0);
        expect(store.has('alice')).toBe(true);
    });

    it('returns the same table on every reference', () => {
        const store = new UserStore();
        store.table('alice').set('color', 'blue');
        expect(store.table('alice').get('color')).toBe('blue');
        expect(store.table('alice')).toBe(store.table('alice'));
    });

    it('keeps users apart', () => {
        const store = new UserStore();
        store.table('alice').set('color', 'blue');
        expect(store.table('bob').get('color')).toBeUndefined();
    });

    it('keeps insertion order', () => {
        const store = new UserStore();
        const table = store.table('alice');
        table.set('b', '2');
        table.set('a', '1');
        table.set('b', '3');
        expect([...table.keys()]).toEqual(['b', 'a']);
    });
});
