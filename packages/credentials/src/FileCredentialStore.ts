/**
 * File Credential Store — Local Credential Persistence
 *
 * Stores credentials in a single JSON file inside the user's home directory,
 * keyed by service and then by user:
 *
 * ```json
 * {
 *   "simple-tools": {
 *     "local": { "credentials": { "api_key": "..." }, "savedAt": "2026-01-01T00:00:00.000Z" }
 *   }
 * }
 * ```
 *
 * The directory is created with 0o700 and the file written with 0o600.
 * Entries are validated one at a time: a malformed entry reads as absent
 * and is carried through saves untouched.
 *
 * @example
 * ```ts
 * const store = new FileCredentialStore({ configDir: '.simple-tools' });
 * await store.saveUserCredentials('simple-tools', 'local', { api_key: 'test-key' });
 * ```
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { StoredCredentialsSchema, type AuthClient, type StoredCredentials } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface FileCredentialStoreConfig {
    /** Directory name inside user's home. Default: '.simple-tools' */
    readonly configDir?: string;
    /** Credentials filename. Default: 'credentials.json' */
    readonly credentialsFile?: string;
}

const CredentialEntrySchema = z.object({
    credentials: StoredCredentialsSchema,
    savedAt: z.string(),
});

/** Entries stay opaque at file level so one bad entry cannot hide its siblings. */
const CredentialDocumentSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

type CredentialDocument = z.infer<typeof CredentialDocumentSchema>;

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONFIG_DIR = '.simple-tools';
const DEFAULT_CREDENTIALS_FILE = 'credentials.json';
const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

// ============================================================================
// FileCredentialStore
// ============================================================================

export class FileCredentialStore implements AuthClient {
    private readonly configDirPath: string;
    private readonly filePath: string;

    constructor(config?: FileCredentialStoreConfig) {
        this.configDirPath = path.join(os.homedir(), config?.configDir ?? DEFAULT_CONFIG_DIR);
        this.filePath = path.join(this.configDirPath, config?.credentialsFile ?? DEFAULT_CREDENTIALS_FILE);
    }

    /** Absolute path of the credentials file. */
    getFilePath(): string {
        return this.filePath;
    }

    async getUserCredentials(service: string, userId: string): Promise<StoredCredentials | null> {
        const document = await this.readDocument();
        if (!document) return null;

        const entry = CredentialEntrySchema.safeParse(document[service]?.[userId]);
        return entry.success ? entry.data.credentials : null;
    }

    /**
     * @throws {Error} when the file exists but is not a credentials document;
     *   it is left as found rather than replaced
     */
    async saveUserCredentials(service: string, userId: string, credentials: StoredCredentials): Promise<void> {
        const document = await this.readDocument();
        if (!document) {
            throw new Error(`Credentials file ${this.filePath} is unreadable; fix or remove it before saving.`);
        }
        document[service] = {
            ...document[service],
            [userId]: { credentials, savedAt: new Date().toISOString() },
        };

        await this.ensureConfigDir();
        await fs.promises.writeFile(this.filePath, JSON.stringify(document, null, 2), { mode: FILE_MODE });
    }

    // ========================================================================
    // Private Helpers
    // ========================================================================

    private async ensureConfigDir(): Promise<void> {
        if (!fs.existsSync(this.configDirPath)) {
            await fs.promises.mkdir(this.configDirPath, { recursive: true, mode: DIR_MODE });
        }
    }

    /** `{}` when there is no file yet, `null` when the file is not valid JSON of the expected shape. */
    private async readDocument(): Promise<CredentialDocument | null> {
        if (!fs.existsSync(this.filePath)) return {};
        const content = await fs.promises.readFile(this.filePath, 'utf-8');

        let json: unknown;
        try {
            json = JSON.parse(content);
        } catch {
            return null;
        }
        const parsed = CredentialDocumentSchema.safeParse(json);
        return parsed.success ? parsed.data : null;
    }
}
