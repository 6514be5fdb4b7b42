/**
 * @simple-tools/server — Per-User Key-Value Tools over MCP
 *
 * Three tools (`store_data`, `retrieve_data`, `list_data`) backed by an
 * in-memory table per user, each call gated by an API-key lookup.
 *
 * @example
 * ```ts
 * import { createServer, UserStore } from '@simple-tools/server';
 * import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
 *
 * const store = new UserStore();
 * const server = createServer({ userId: 'local', store });
 * await server.connect(new StdioServerTransport());
 * ```
 *
 * @module @simple-tools/server
 * @license Apache-2.0
 */

// ── Server ───────────────────────────────────────────────
export { createServer, SERVER_NAME, SERVER_VERSION } from './server/createServer.js';
export type { CreateServerOptions } from './server/createServer.js';
export { startServer } from './server/startServer.js';
export type { StartServerOptions, StartServerResult } from './server/startServer.js';

// ── Store ────────────────────────────────────────────────
export { UserStore } from './store/UserStore.js';
export type { KVTable } from './store/UserStore.js';

// ── Tools ────────────────────────────────────────────────
export { dispatchToolCall, storeData, retrieveData, listData } from './tools/dispatch.js';
export type { DispatchDeps, RequestContext, ToolArguments } from './tools/dispatch.js';
export { listTools } from './tools/catalogue.js';
export { TOOL_NAMES } from './tools/schemas.js';
export type {
    ToolName,
    ToolResult,
    StoreResult,
    RetrieveResult,
    ListResult,
    ListEmptyResult,
    ResultStatus,
} from './tools/schemas.js';
export { randomId, epochSeconds } from './tools/ids.js';
export type { IdGenerator, Clock } from './tools/ids.js';

// ── Prompts ──────────────────────────────────────────────
export { listPrompts, getPrompt } from './prompts/systemPrompt.js';

// ── Auth ─────────────────────────────────────────────────
export { resolveApiKey, SERVICE_NAME } from './auth/resolveApiKey.js';
export type { ResolveApiKeyOptions } from './auth/resolveApiKey.js';

// ── Errors & Responses ───────────────────────────────────
export { AuthenticationError, InvalidArgumentError, UnknownToolError } from './errors.js';
export { success, error } from './response.js';
export type { ToolResponse } from './response.js';

// ── Observability & Config ───────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type { DebugEvent, DebugObserverFn } from './observability/DebugObserver.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
