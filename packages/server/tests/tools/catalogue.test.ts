/**
 * Tool catalogue — names, descriptions and JSON Schema projection.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { listTools, toInputSchema } from '../../src/tools/catalogue.js';
import { TOOL_NAMES } from '../../src/tools/schemas.js';

describe('listTools', () => {
    it('lists exactly the three tools in order', () => {
        expect(listTools().map(t => t.name)).toEqual([...TOOL_NAMES]);
        expect(TOOL_NAMES).toEqual(['store_data', 'retrieve_data', 'list_data']);
    });

    it('describes each tool', () => {
        expect(listTools().map(t => t.description)).toEqual([
            'Store a key-value pair in the server',
            'Retrieve a value by its key',
            'List all stored key-value pairs',
        ]);
    });

    it('requires key and value for store_data', () => {
        const [store] = listTools();
        expect(store?.inputSchema.type).toBe('object');
        expect(store?.inputSchema.required).toEqual(['key', 'value']);
        expect(store?.inputSchema.properties).toEqual({
            key: { type: 'string', minLength: 1 },
            value: { type: 'string', minLength: 1 },
        });
    });

    it('requires key for retrieve_data', () => {
        const retrieve = listTools()[1];
        expect(retrieve?.inputSchema.required).toEqual(['key']);
    });

    it('takes no arguments for list_data', () => {
        const list = listTools()[2];
        expect(list?.inputSchema).toEqual({ type: 'object', properties: {} });
    });
});

describe('toInputSchema', () => {
    it('omits required when every field is optional', () => {
        const schema = toInputSchema(z.object({ note: z.string().optional() }));
        expect(schema).toEqual({ type: 'object', properties: { note: { type: 'string' } } });
    });
});
