/**
 * UserStore — Per-User Key-Value Tables
 *
 * Owns one {@link KVTable} per user, created on first reference.
 * Tables live for as long as the store does; nothing is persisted.
 *
 * A store is shared by every server built in the process and handed to
 * them explicitly.
 *
 * @example
 * ```ts
 * const store = new UserStore();
 * store.table('alice').set('color', 'blue');
 * store.table('bob').get('color'); // undefined
 * ```
 */

/** String keys to string values, in insertion order. */
export type KVTable = Map<string, string>;

export class UserStore {
    private readonly _tables = new Map<string, KVTable>();

    /** The user's table, created empty if the user has none yet. */
    table(userId: string): KVTable {
        let table = this._tables.get(userId);
        if (!table) {
            table = new Map<string, string>();
            this._tables.set(userId, table);
        }
        return table;
    }

    /** Whether a table has been created for the user. */
    has(userId: string): boolean {
        return this._tables.has(userId);
    }
}
