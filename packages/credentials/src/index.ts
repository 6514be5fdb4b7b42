/**
 * @simple-tools/credentials — Credential Storage for simple-tools
 *
 * The auth collaborator behind the simple-tools MCP server: a narrow
 * {@link AuthClient} interface plus file-backed and in-memory stores.
 *
 * @example
 * ```ts
 * import { createAuthClient } from '@simple-tools/credentials';
 *
 * const client = createAuthClient();
 * await client.saveUserCredentials('simple-tools', 'local', { api_key: 'test-key' });
 * ```
 *
 * @module @simple-tools/credentials
 * @license Apache-2.0
 */

export { StoredCredentialsSchema } from './types.js';
export type { AuthClient, StoredCredentials } from './types.js';

export { FileCredentialStore, DEFAULT_CONFIG_DIR } from './FileCredentialStore.js';
export type { FileCredentialStoreConfig } from './FileCredentialStore.js';

export { MemoryCredentialStore } from './MemoryCredentialStore.js';

export { createAuthClient } from './createAuthClient.js';
export type { AuthBackend, CreateAuthClientOptions } from './createAuthClient.js';
