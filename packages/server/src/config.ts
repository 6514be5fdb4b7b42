/**
 * Server Configuration
 *
 * Read once from the environment and validated with zod.
 *
 * | Variable                    | Field           | Default          |
 * |-----------------------------|-----------------|------------------|
 * | `ENVIRONMENT`               | `environment`   | `local`          |
 * | `SIMPLE_TOOLS_USER_ID`      | `userId`        | `local`          |
 * | `SIMPLE_TOOLS_API_KEY`      | `apiKey`        | unset            |
 * | `SIMPLE_TOOLS_AUTH_BACKEND` | `authBackend`   | `file`           |
 * | `SIMPLE_TOOLS_CONFIG_DIR`   | `configDir`     | `.simple-tools`  |
 * | `SIMPLE_TOOLS_DEBUG`        | `debug`         | `false`          |
 */
import { z } from 'zod';
import { DEFAULT_CONFIG_DIR } from '@simple-tools/credentials';

const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const ConfigSchema = z.object({
    ENVIRONMENT: z.preprocess(emptyAsUndefined, z.string().default('local')),
    SIMPLE_TOOLS_USER_ID: z.preprocess(emptyAsUndefined, z.string().default('local')),
    SIMPLE_TOOLS_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
    SIMPLE_TOOLS_AUTH_BACKEND: z.preprocess(emptyAsUndefined, z.enum(['file', 'memory']).default('file')),
    SIMPLE_TOOLS_CONFIG_DIR: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_CONFIG_DIR)),
    SIMPLE_TOOLS_DEBUG: z.preprocess(
        emptyAsUndefined,
        z.enum(['1', '0', 'true', 'false']).default('false').transform(v => v === '1' || v === 'true'),
    ),
});

export interface ServerConfig {
    readonly environment: string;
    readonly userId: string;
    readonly apiKey?: string;
    readonly authBackend: 'file' | 'memory';
    readonly configDir: string;
    readonly debug: boolean;
}

/**
 * @throws {Error} naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        throw new Error(`Invalid simple-tools configuration:\n${details}`);
    }

    const c = parsed.data;
    return {
        environment: c.ENVIRONMENT,
        userId: c.SIMPLE_TOOLS_USER_ID,
        ...(c.SIMPLE_TOOLS_API_KEY !== undefined ? { apiKey: c.SIMPLE_TOOLS_API_KEY } : {}),
        authBackend: c.SIMPLE_TOOLS_AUTH_BACKEND,
        configDir: c.SIMPLE_TOOLS_CONFIG_DIR,
        debug: c.SIMPLE_TOOLS_DEBUG,
    };
}
