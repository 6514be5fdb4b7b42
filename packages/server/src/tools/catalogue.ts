/**
 * Tool Catalogue — `tools/list` Payload
 *
 * Pure-function module: projects the zod argument schemas onto the MCP
 * tool definitions.
 */
import { type ZodObject, type ZodRawShape } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { type Tool as McpTool } from '@modelcontextprotocol/sdk/types.js';
import {
    ListDataArgsSchema,
    RetrieveDataArgsSchema,
    StoreDataArgsSchema,
    type ToolName,
} from './schemas.js';

/** Shape of an object-level JSON Schema emitted by zod-to-json-schema */
interface JsonSchemaObject {
    properties?: Record<string, object>;
    required?: string[];
}

interface ToolSpec {
    readonly name: ToolName;
    readonly description: string;
    readonly schema: ZodObject<ZodRawShape>;
}

const TOOL_SPECS: readonly ToolSpec[] = [
    {
        name: 'store_data',
        description: 'Store a key-value pair in the server',
        schema: StoreDataArgsSchema,
    },
    {
        name: 'retrieve_data',
        description: 'Retrieve a value by its key',
        schema: RetrieveDataArgsSchema,
    },
    {
        name: 'list_data',
        description: 'List all stored key-value pairs',
        schema: ListDataArgsSchema,
    },
];

export function toInputSchema(schema: ZodObject<ZodRawShape>): McpTool['inputSchema'] {
    const jsonSchema = zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' }) as JsonSchemaObject;
    const required = jsonSchema.required ?? [];
    return {
        type: 'object' as const,
        properties: jsonSchema.properties ?? {},
        ...(required.length > 0 ? { required } : {}),
    };
}

/** The three tool definitions, in a fixed order. */
export function listTools(): McpTool[] {
    return TOOL_SPECS.map(spec => ({
        name: spec.name,
        description: spec.description,
        inputSchema: toInputSchema(spec.schema),
    }));
}
