/**
 * Auth Client Factory
 *
 * Selects a credential backend and, when the caller already holds an
 * API key, layers it over the backend.
 *
 * Resolution priority for reads:
 *   1. Pre-supplied API key
 *   2. Backend (file or memory)
 *
 * @example
 * ```ts
 * // Backend from SIMPLE_TOOLS_AUTH_BACKEND (default: file)
 * const client = createAuthClient();
 *
 * // Host already received a key for this session
 * const client = createAuthClient({ apiKey: 'test-key' });
 * ```
 */
import { FileCredentialStore } from './FileCredentialStore.js';
import { MemoryCredentialStore } from './MemoryCredentialStore.js';
import type { AuthClient, StoredCredentials } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type AuthBackend = 'file' | 'memory';

export interface CreateAuthClientOptions {
    /** Key reported ahead of stored credentials for every user. */
    readonly apiKey?: string | undefined;

    /** Backend to use. Default: `SIMPLE_TOOLS_AUTH_BACKEND`, then 'file'. */
    readonly backend?: AuthBackend;

    /** Directory under the home directory for the file backend. */
    readonly configDir?: string;

    /** Use this client as the backend instead of building one. */
    readonly client?: AuthClient;
}

const BACKEND_ENV_VAR = 'SIMPLE_TOOLS_AUTH_BACKEND';

// ============================================================================
// Pre-supplied Key Layer
// ============================================================================

class PresuppliedKeyClient implements AuthClient {
    constructor(
        private readonly apiKey: string,
        private readonly inner: AuthClient,
    ) {}

    async getUserCredentials(_service: string, _userId: string): Promise<StoredCredentials | null> {
        return { api_key: this.apiKey };
    }

    saveUserCredentials(service: string, userId: string, credentials: StoredCredentials): Promise<void> {
        return this.inner.saveUserCredentials(service, userId, credentials);
    }
}

// ============================================================================
// Factory
// ============================================================================

export function createAuthClient(options: CreateAuthClientOptions = {}): AuthClient {
    const inner = options.client ?? createBackend(options);
    return options.apiKey ? new PresuppliedKeyClient(options.apiKey, inner) : inner;
}

function createBackend(options: CreateAuthClientOptions): AuthClient {
    const backend = options.backend ?? parseBackend(process.env[BACKEND_ENV_VAR]);
    switch (backend) {
        case 'memory':
            return new MemoryCredentialStore();
        case 'file':
            return new FileCredentialStore(options.configDir ? { configDir: options.configDir } : undefined);
    }
}

/** @internal exported for testing */
export function parseBackend(raw: string | undefined): AuthBackend {
    if (raw === undefined || raw === '') return 'file';
    if (raw === 'file' || raw === 'memory') return raw;
    throw new Error(`${BACKEND_ENV_VAR} must be "file" or "memory", got "${raw}"`);
}
