/**
 * API Key Resolution — Authentication Gate
 *
 * Looks up the caller's API key with the auth collaborator under the
 * `simple-tools` service. Credentials may be stored as the bare key or
 * as `{ api_key }`; anything else counts as missing.
 *
 * @example
 * ```ts
 * const apiKey = await resolveApiKey(createAuthClient(), 'local');
 * ```
 */
import { StoredCredentialsSchema, type AuthClient } from '@simple-tools/credentials';
import { AuthenticationError } from '../errors.js';

export const SERVICE_NAME = 'simple-tools';

export interface ResolveApiKeyOptions {
    /** Deployment environment. `local` adds a hint to run `simple-tools auth`. Default: 'local' */
    readonly environment?: string;
}

/**
 * Resolve a usable API key for `userId`.
 *
 * @throws {AuthenticationError} when nothing usable is stored
 */
export async function resolveApiKey(
    client: AuthClient,
    userId: string,
    options: ResolveApiKeyOptions = {},
): Promise<string> {
    const raw = await client.getUserCredentials(SERVICE_NAME, userId);
    const parsed = StoredCredentialsSchema.safeParse(raw);

    const apiKey = parsed.success
        ? (typeof parsed.data === 'string' ? parsed.data : parsed.data.api_key)
        : undefined;

    if (!apiKey) {
        throw missingCredentials(userId, options.environment ?? 'local');
    }
    return apiKey;
}

function missingCredentials(userId: string, environment: string): AuthenticationError {
    let message = `Simple Tools API key not found for user ${userId}.`;
    if (environment === 'local') {
        message += ' Please run authentication first.';
    }
    return new AuthenticationError(message, userId);
}
