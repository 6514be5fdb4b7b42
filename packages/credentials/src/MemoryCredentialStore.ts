/**
 * In-process credential store. Contents vanish with the process.
 */
import type { AuthClient, StoredCredentials } from './types.js';

export class MemoryCredentialStore implements AuthClient {
    private readonly _entries = new Map<string, StoredCredentials>();

    constructor(seed?: Iterable<readonly [service: string, userId: string, credentials: StoredCredentials]>) {
        if (seed) {
            for (const [service, userId, credentials] of seed) {
                this._entries.set(MemoryCredentialStore.entryKey(service, userId), credentials);
            }
        }
    }

    async getUserCredentials(service: string, userId: string): Promise<StoredCredentials | null> {
        return this._entries.get(MemoryCredentialStore.entryKey(service, userId)) ?? null;
    }

    async saveUserCredentials(service: string, userId: string, credentials: StoredCredentials): Promise<void> {
        this._entries.set(MemoryCredentialStore.entryKey(service, userId), credentials);
    }

    /** Number of stored (service, user) pairs. */
    get size(): number {
        return this._entries.size;
    }

    private static entryKey(service: string, userId: string): string {
        return JSON.stringify([service, userId]);
    }
}
