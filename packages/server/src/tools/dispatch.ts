/**
 * Tool Dispatch — `tools/call` Handler Core
 *
 * Every call runs the same pipeline:
 *
 *   route → authenticate → validate arguments → read/mutate the caller's table → respond
 *
 * A failed authentication ends the call with a readable text response and
 * leaves the store untouched. Bad arguments and unknown tool names are
 * thrown as `McpError`s for the SDK to report.
 *
 * The caller's identity arrives as an explicit {@link RequestContext};
 * the store and auth client arrive as {@link DispatchDeps}.
 *
 * @module
 */
import { type ZodType } from 'zod';
import { createAuthClient, type AuthClient } from '@simple-tools/credentials';
import { resolveApiKey } from '../auth/resolveApiKey.js';
import { AuthenticationError, InvalidArgumentError, UnknownToolError } from '../errors.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { success, error, type ToolResponse } from '../response.js';
import { type KVTable, type UserStore } from '../store/UserStore.js';
import { epochSeconds, randomId, type Clock, type IdGenerator } from './ids.js';
import {
    RetrieveDataArgsSchema,
    StoreDataArgsSchema,
    type ListEmptyResult,
    type ListResult,
    type RetrieveResult,
    type StoreResult,
    type ToolResult,
} from './schemas.js';

// ============================================================================
// Types
// ============================================================================

/** Who is calling. Built fresh for every request. */
export interface RequestContext {
    readonly userId: string;
    /** Key the host already holds for this user; wins over stored credentials. */
    readonly apiKey?: string | undefined;
}

export interface DispatchDeps {
    readonly store: UserStore;
    /** Credential backend queried on every call. */
    readonly authClient: AuthClient;
    /** Deployment environment, forwarded to the auth gate. Default: 'local' */
    readonly environment?: string | undefined;
    readonly debug?: DebugObserverFn | undefined;
    readonly idGenerator?: IdGenerator | undefined;
    readonly clock?: Clock | undefined;
}

/** Raw tool arguments as received from the client. */
export type ToolArguments = Readonly<Record<string, unknown>> | undefined;

// ============================================================================
// Dispatch
// ============================================================================

export async function dispatchToolCall(
    deps: DispatchDeps,
    ctx: RequestContext,
    name: string,
    args: ToolArguments,
): Promise<ToolResponse> {
    const debug = deps.debug;
    const startedAt = performance.now();
    debug?.({ type: 'route', tool: name, userId: ctx.userId, timestamp: Date.now() });

    // ── Authenticate ─────────────────────────────────────
    const authClient = createAuthClient({ client: deps.authClient, apiKey: ctx.apiKey });
    try {
        await resolveApiKey(authClient, ctx.userId, { environment: deps.environment ?? 'local' });
    } catch (err) {
        if (!(err instanceof AuthenticationError)) throw err;
        debug?.({ type: 'auth', tool: name, userId: ctx.userId, ok: false, error: err.message, timestamp: Date.now() });
        return error(`Authentication error: ${err.message}`);
    }
    debug?.({ type: 'auth', tool: name, userId: ctx.userId, ok: true, timestamp: Date.now() });

    // ── Execute ──────────────────────────────────────────
    const table = deps.store.table(ctx.userId);
    const nextId = deps.idGenerator ?? randomId;
    const now = deps.clock ?? epochSeconds;

    let result: ToolResult;
    try {
        result = executeTool(name, args, table, nextId, now);
    } catch (err) {
        if (err instanceof InvalidArgumentError || err instanceof UnknownToolError) {
            debug?.({
                type: 'error',
                tool: name,
                userId: ctx.userId,
                error: err.message,
                step: err instanceof UnknownToolError ? 'route' : 'validate',
                timestamp: Date.now(),
            });
        }
        throw err;
    }

    debug?.({
        type: 'execute',
        tool: name,
        userId: ctx.userId,
        status: result.status,
        durationMs: performance.now() - startedAt,
        timestamp: Date.now(),
    });
    return success(result);
}

function executeTool(
    name: string,
    args: ToolArguments,
    table: KVTable,
    nextId: IdGenerator,
    now: Clock,
): ToolResult {
    switch (name) {
        case 'store_data': {
            const { key, value } = parseArguments(StoreDataArgsSchema, args, 'Missing key or value');
            return storeData(table, key, value, nextId, now);
        }
        case 'retrieve_data': {
            const { key } = parseArguments(RetrieveDataArgsSchema, args, 'Missing key');
            return retrieveData(table, key, nextId, now);
        }
        case 'list_data':
            return listData(table, nextId, now);
        default:
            throw new UnknownToolError(name);
    }
}

// ============================================================================
// Operations
// ============================================================================

export function storeData(table: KVTable, key: string, value: string, nextId: IdGenerator, now: Clock): StoreResult {
    table.set(key, value);
    return {
        id: nextId('store'),
        status: 'success',
        action: 'store',
        key,
        value,
        message: `Stored '${key}' with value: ${value}`,
        authenticated: true,
        timestamp: now(),
    };
}

export function retrieveData(table: KVTable, key: string, nextId: IdGenerator, now: Clock): RetrieveResult {
    const value = table.get(key);
    if (value === undefined) {
        return {
            id: nextId('retrieve'),
            status: 'not_found',
            action: 'retrieve',
            key,
            message: `Key '${key}' not found`,
            timestamp: now(),
        };
    }
    return {
        id: nextId('retrieve'),
        status: 'success',
        action: 'retrieve',
        key,
        value,
        message: `Value for '${key}': ${value}`,
        timestamp: now(),
    };
}

export function listData(table: KVTable, nextId: IdGenerator, now: Clock): ListResult | ListEmptyResult {
    if (table.size === 0) {
        return {
            id: nextId('list'),
            status: 'empty',
            action: 'list',
            data: {},
            count: 0,
            message: 'No data stored',
            timestamp: now(),
        };
    }

    const entries = [...table.entries()];
    return {
        id: nextId('list'),
        status: 'success',
        action: 'list',
        data: Object.fromEntries(entries),
        count: entries.length,
        message: `Found ${entries.length} items`,
        formatted_list: entries.map(([k, v]) => `- ${k}: ${v}`).join('\n'),
        timestamp: now(),
    };
}

// ============================================================================
// Argument Validation
// ============================================================================

/**
 * Validate `args` against `schema`.
 *
 * Absent or empty arguments report `Missing arguments`; any other
 * mismatch reports `reason` with the zod issues attached.
 */
function parseArguments<T>(schema: ZodType<T>, args: ToolArguments, reason: string): T {
    if (!args || Object.keys(args).length === 0) {
        throw new InvalidArgumentError('Missing arguments');
    }
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        throw new InvalidArgumentError(
            reason,
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    return parsed.data;
}
