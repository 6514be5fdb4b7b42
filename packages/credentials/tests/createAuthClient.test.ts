/**
 * createAuthClient Tests
 *
 * Covers:
 * - Backend selection (option, environment variable, default)
 * - Pre-supplied key priority over stored credentials
 * - MemoryCredentialStore behaviour
 */
import { describe, it, expect, afterEach } from 'vitest';
import { createAuthClient, parseBackend } from '../src/createAuthClient.js';
import { MemoryCredentialStore } from '../src/MemoryCredentialStore.js';
import { FileCredentialStore } from '../src/FileCredentialStore.js';

const ENV_KEY = 'SIMPLE_TOOLS_AUTH_BACKEND';

afterEach(() => {
    delete process.env[ENV_KEY];
});

describe('parseBackend', () => {
    it('defaults to file', () => {
        expect(parseBackend(undefined)).toBe('file');
        expect(parseBackend('')).toBe('file');
    });

    it('accepts memory', () => {
        expect(parseBackend('memory')).toBe('memory');
    });

    it('rejects unknown backends', () => {
        expect(() => parseBackend('redis')).toThrow(
            'SIMPLE_TOOLS_AUTH_BACKEND must be "file" or "memory", got "redis"',
        );
    });
});

describe('createAuthClient', () => {
    it('builds a memory store when asked', () => {
        expect(createAuthClient({ backend: 'memory' })).toBeInstanceOf(MemoryCredentialStore);
    });

    it('builds a file store by default', () => {
        expect(createAuthClient()).toBeInstanceOf(FileCredentialStore);
    });

    it('reads the backend from the environment', () => {
        process.env[ENV_KEY] = 'memory';
        expect(createAuthClient()).toBeInstanceOf(MemoryCredentialStore);
    });

    it('returns the supplied client untouched when no key is given', () => {
        const client = new MemoryCredentialStore();
        expect(createAuthClient({ client })).toBe(client);
    });

    describe('pre-supplied key', () => {
        it('wins over stored credentials', async () => {
            const client = new MemoryCredentialStore([
                ['simple-tools', 'local', { api_key: 'stored-key' }],
            ]);
            const auth = createAuthClient({ client, apiKey: 'session-key' });

            expect(await auth.getUserCredentials('simple-tools', 'local')).toEqual({ api_key: 'session-key' });
        });

        it('is ignored when empty', async () => {
            const client = new MemoryCredentialStore([
                ['simple-tools', 'local', { api_key: 'stored-key' }],
            ]);
            const auth = createAuthClient({ client, apiKey: '' });

            expect(await auth.getUserCredentials('simple-tools', 'local')).toEqual({ api_key: 'stored-key' });
        });

        it('still saves through to the backend', async () => {
            const client = new MemoryCredentialStore();
            const auth = createAuthClient({ client, apiKey: 'session-key' });

            await auth.saveUserCredentials('simple-tools', 'local', { api_key: 'new-key' });
            expect(await client.getUserCredentials('simple-tools', 'local')).toEqual({ api_key: 'new-key' });
        });
    });
});

describe('MemoryCredentialStore', () => {
    it('returns null for unknown pairs', async () => {
        const store = new MemoryCredentialStore();
        expect(await store.getUserCredentials('simple-tools', 'nobody')).toBeNull();
    });

    it('keys entries by service and user', async () => {
        const store = new MemoryCredentialStore();
        await store.saveUserCredentials('a', 'b-c', 'one');
        await store.saveUserCredentials('a-b', 'c', 'two');

        expect(store.size).toBe(2);
        expect(await store.getUserCredentials('a', 'b-c')).toBe('one');
        expect(await store.getUserCredentials('a-b', 'c')).toBe('two');
    });
});
