/**
 * startServer — One-Call Bootstrap
 *
 *   1. Loads configuration from the environment
 *   2. Builds the auth client and (optionally) the debug observer
 *   3. Creates the MCP server for the configured user
 *   4. Connects the transport (stdio unless one is supplied)
 *
 * @module
 */
import { type Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { type Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { createAuthClient, type AuthClient } from '@simple-tools/credentials';
import { loadConfig, type ServerConfig } from '../config.js';
import { createDebugObserver, type DebugObserverFn } from '../observability/DebugObserver.js';
import { UserStore } from '../store/UserStore.js';
import { createServer, SERVER_NAME } from './createServer.js';

// ============================================================================
// Types
// ============================================================================

export interface StartServerOptions {
    /** Configuration. Default: `loadConfig()` */
    readonly config?: ServerConfig;

    /** Transport to connect. Default: stdio */
    readonly transport?: Transport;

    /** Shared tables. Default: a fresh store */
    readonly store?: UserStore;

    /** Credential backend. Default: built from `config.authBackend` */
    readonly authClient?: AuthClient;

    /** Observer used instead of the stderr one when debugging is on. */
    readonly debug?: DebugObserverFn;
}

export interface StartServerResult {
    readonly server: Server;
    readonly store: UserStore;
    /** Close the server and its transport. */
    readonly close: () => Promise<void>;
}

// ============================================================================
// Implementation
// ============================================================================

export async function startServer(options: StartServerOptions = {}): Promise<StartServerResult> {
    const config = options.config ?? loadConfig();
    const store = options.store ?? new UserStore();

    const authClient = options.authClient ?? createAuthClient({
        backend: config.authBackend,
        configDir: config.configDir,
    });
    const debug = config.debug ? createDebugObserver(options.debug) : undefined;

    const server = createServer({
        userId: config.userId,
        apiKey: config.apiKey,
        store,
        authClient,
        environment: config.environment,
        debug,
    });

    const transport = options.transport ?? new StdioServerTransport();
    await server.connect(transport);
    process.stderr.write(`⚡ ${SERVER_NAME} running for user ${config.userId}\n`);

    async function close(): Promise<void> {
        await server.close();
    }

    return { server, store, close };
}
