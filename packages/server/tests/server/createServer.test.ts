/**
 * createServer — End-to-End over an in-process MCP transport
 *
 * A real SDK `Client` talks to the server through
 * `InMemoryTransport.createLinkedPair()`, so every request goes through
 * JSON-RPC framing and the registered handlers.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { MemoryCredentialStore } from '@simple-tools/credentials';
import { createServer, type CreateServerOptions } from '../../src/server/createServer.js';
import { UserStore } from '../../src/store/UserStore.js';

// ── Helpers ──────────────────────────────────────────────

const TextResultSchema = z.object({
    content: z.array(z.object({ type: z.literal('text'), text: z.string() })).nonempty(),
    isError: z.boolean().optional(),
});

const BodySchema = z.record(z.unknown());

const clients: Client[] = [];

afterEach(async () => {
    await Promise.all(clients.splice(0).map(c => c.close()));
});

function credentials() {
    return new MemoryCredentialStore([
        ['simple-tools', 'alice', { api_key: 'test-key-a' }],
        ['simple-tools', 'bob', 'test-key-b'],
    ]);
}

async function connect(options: CreateServerOptions): Promise<Client> {
    const server = createServer(options);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    clients.push(client);
    return client;
}

async function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
    const result = TextResultSchema.parse(await client.callTool({ name, arguments: args }));
    return { isError: result.isError, text: result.content[0].text };
}

async function callJson(client: Client, name: string, args: Record<string, unknown> = {}) {
    const { text } = await callTool(client, name, args);
    return BodySchema.parse(JSON.parse(text));
}

// ============================================================================
// Tests
// ============================================================================

describe('createServer', () => {
    it('identifies itself to the client', async () => {
        const client = await connect({ userId: 'alice', authClient: credentials() });
        expect(client.getServerVersion()).toMatchObject({ name: 'simple-tools-server', version: '1.0.0' });
        expect(client.getServerCapabilities()).toMatchObject({ tools: {}, prompts: {} });
    });

    it('lists the three tools', async () => {
        const client = await connect({ userId: 'alice', authClient: credentials() });
        const { tools } = await client.listTools();
        expect(tools.map(t => t.name)).toEqual(['store_data', 'retrieve_data', 'list_data']);
        expect(tools[0]?.inputSchema.required).toEqual(['key', 'value']);
    });

    it('runs store → retrieve → list for one user', async () => {
        const client = await connect({
            userId: 'alice',
            authClient: credentials(),
            idGenerator: (action) => `${action}_0000abcd`,
            clock: () => 1_700_000_000,
        });

        const stored = await callJson(client, 'store_data', { key: 'test_key', value: 'test_value' });
        expect(stored).toMatchObject({
            id: 'store_0000abcd',
            status: 'success',
            message: "Stored 'test_key' with value: test_value",
            timestamp: 1_700_000_000,
        });

        const retrieved = await callJson(client, 'retrieve_data', { key: 'test_key' });
        expect(retrieved).toMatchObject({ status: 'success', value: 'test_value' });

        const listed = await callJson(client, 'list_data');
        expect(listed).toMatchObject({
            status: 'success',
            data: { test_key: 'test_value' },
            count: 1,
            formatted_list: '- test_key: test_value',
        });
    });

    it('reports bad arguments as InvalidParams with a single prefix', async () => {
        const client = await connect({ userId: 'alice', authClient: credentials() });

        await expect(client.callTool({ name: 'store_data', arguments: { key: 'k' } })).rejects.toMatchObject({
            code: ErrorCode.InvalidParams,
            message: 'MCP error -32602: Missing key or value',
        });
    });

    it('reports unknown tools as InvalidParams with a single prefix', async () => {
        const client = await connect({ userId: 'alice', authClient: credentials() });

        await expect(client.callTool({ name: 'delete_data', arguments: {} })).rejects.toMatchObject({
            code: ErrorCode.InvalidParams,
            message: 'MCP error -32602: Unknown tool: delete_data',
        });
    });

    it('returns a readable error result when the user has no key', async () => {
        const client = await connect({ userId: 'mallory', authClient: credentials() });
        const result = await callTool(client, 'store_data', { key: 'k', value: 'v' });
        expect(result).toEqual({
            isError: true,
            text: 'Authentication error: Simple Tools API key not found for user mallory. Please run authentication first.',
        });
    });

    it('accepts a key held by the host', async () => {
        const client = await connect({
            userId: 'mallory',
            apiKey: 'test-key-m',
            authClient: new MemoryCredentialStore(),
        });
        const listed = await callJson(client, 'list_data');
        expect(listed).toMatchObject({ status: 'empty', count: 0, message: 'No data stored' });
    });

    it('keeps users apart on a shared store', async () => {
        const store = new UserStore();
        const authClient = credentials();
        const alice = await connect({ userId: 'alice', store, authClient });
        const bob = await connect({ userId: 'bob', store, authClient });

        await callJson(alice, 'store_data', { key: 'color', value: 'blue' });

        expect(await callJson(bob, 'retrieve_data', { key: 'color' })).toMatchObject({
            status: 'not_found',
            message: "Key 'color' not found",
        });
        expect(store.table('alice').get('color')).toBe('blue');
        expect(store.table('bob').size).toBe(0);
    });

    it("creates the user's table when the server is built", () => {
        const store = new UserStore();
        createServer({ userId: 'carol', store, authClient: credentials() });
        expect(store.has('carol')).toBe(true);
    });

    it('serves the system prompt', async () => {
        const client = await connect({ userId: 'alice', authClient: credentials() });

        const { prompts } = await client.listPrompts();
        expect(prompts.map(p => [p.name, p.description])).toEqual([['system', 'Sample system prompt']]);

        const prompt = await client.getPrompt({ name: 'system' });
        expect(prompt.messages).toEqual([
            { role: 'user', content: { type: 'text', text: 'Sample system prompt' } },
        ]);
    });
});
