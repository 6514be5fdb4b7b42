/**
 * Credential Types — Auth Collaborator Contract
 *
 * The server only ever talks to credentials through {@link AuthClient}.
 * How and where credentials live is up to the implementation.
 */
import { z } from 'zod';

// ============================================================================
// Credential Payload
// ============================================================================

/**
 * Credentials as stored by the collaborator.
 *
 * Either the API key itself, or an object carrying it under `api_key`.
 * Extra fields on the object are kept verbatim.
 */
export const StoredCredentialsSchema = z.union([
    z.string(),
    z.object({ api_key: z.string().optional() }).passthrough(),
]);

export type StoredCredentials = z.infer<typeof StoredCredentialsSchema>;

// ============================================================================
// AuthClient
// ============================================================================

/**
 * Narrow interface to the credential backend.
 *
 * @example
 * ```ts
 * const client = createAuthClient();
 * await client.saveUserCredentials('simple-tools', 'local', { api_key: 'test-key' });
 * const creds = await client.getUserCredentials('simple-tools', 'local');
 * ```
 */
export interface AuthClient {
    /** Returns `null` when nothing is stored for the pair. */
    getUserCredentials(service: string, userId: string): Promise<StoredCredentials | null>;

    saveUserCredentials(service: string, userId: string, credentials: StoredCredentials): Promise<void>;
}
