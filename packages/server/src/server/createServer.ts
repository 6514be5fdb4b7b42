/**
 * createServer — MCP Server Assembly
 *
 * Builds a low-level MCP SDK `Server` for one user and registers the
 * `tools/list`, `tools/call`, `prompts/list` and `prompts/get` handlers.
 *
 * The {@link UserStore} is passed in so that every server built in the
 * process shares one set of tables. Each `tools/call` gets its own
 * {@link RequestContext}; nothing is stored on the server object.
 *
 * @module
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createAuthClient, type AuthClient } from '@simple-tools/credentials';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { getPrompt, listPrompts } from '../prompts/systemPrompt.js';
import { UserStore } from '../store/UserStore.js';
import { listTools } from '../tools/catalogue.js';
import { dispatchToolCall, type DispatchDeps, type RequestContext } from '../tools/dispatch.js';
import { type Clock, type IdGenerator } from '../tools/ids.js';

// ============================================================================
// Types
// ============================================================================

export const SERVER_NAME = 'simple-tools-server';
export const SERVER_VERSION = '1.0.0';

export interface CreateServerOptions {
    /** User every call on this server acts for. */
    readonly userId: string;

    /** Key the host already holds for the user. */
    readonly apiKey?: string | undefined;

    /** Shared tables. Default: a fresh store private to this server. */
    readonly store?: UserStore | undefined;

    /** Credential backend. Default: `createAuthClient()` */
    readonly authClient?: AuthClient | undefined;

    /** Deployment environment. Default: 'local' */
    readonly environment?: string | undefined;

    /** Debug observer for routing, auth and execution events. */
    readonly debug?: DebugObserverFn | undefined;

    readonly idGenerator?: IdGenerator | undefined;
    readonly clock?: Clock | undefined;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * @example
 * ```typescript
 * const store = new UserStore();
 * const server = createServer({ userId: 'local', store });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createServer(options: CreateServerOptions): Server {
    const { userId, apiKey, debug } = options;
    const store = options.store ?? new UserStore();

    const deps: DispatchDeps = {
        store,
        authClient: options.authClient ?? createAuthClient(),
        environment: options.environment,
        debug,
        idGenerator: options.idGenerator,
        clock: options.clock,
    };

    // The user's table exists from the moment their server does.
    store.table(userId);

    const server = new Server(
        { name: SERVER_NAME, version: SERVER_VERSION },
        { capabilities: { tools: {}, prompts: {} } },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        debug?.({ type: 'route', tool: 'tools/list', userId, timestamp: Date.now() });
        return { tools: listTools() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const ctx: RequestContext = { userId, apiKey };
        const response = await dispatchToolCall(deps, ctx, request.params.name, request.params.arguments);
        return {
            content: [...response.content],
            ...(response.isError ? { isError: true } : {}),
        };
    });

    server.setRequestHandler(ListPromptsRequestSchema, async () => ({
        prompts: listPrompts(),
    }));

    server.setRequestHandler(GetPromptRequestSchema, async (request) => getPrompt(request.params.name));

    return server;
}
