#!/usr/bin/env node
/**
 * simple-tools CLI
 *
 * Commands:
 *
 *   simple-tools auth [--user <id>]
 *       Prompt for a Simple Tools API key and save it for the user
 *       (default user: `local`).
 *
 * Without a command the usage is printed and nothing is started; the
 * server is launched by the MCP host or by `simple-tools-server`.
 *
 * @module
 */
import * as readline from 'node:readline';
import pc from 'picocolors';
import { createAuthClient, type AuthClient } from '@simple-tools/credentials';
import { SERVICE_NAME } from '../auth/resolveApiKey.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_USER_ID = 'local';

export const API_KEY_PROMPT = 'Please enter your Simple Tools API key: ';

/** @internal exported for testing */
export const HELP = `
simple-tools — Simple Tools MCP server CLI

USAGE
  simple-tools auth                   Save your Simple Tools API key

OPTIONS
  --user, -u <id>     User to save the key for (default: ${DEFAULT_USER_ID})
  --help, -h          Show this help message

Note: the server itself is started by your MCP host (or \`simple-tools-server\`).
`.trim();

// ============================================================================
// Arg Parser
// ============================================================================

/** @internal exported for testing */
export interface CliArgs {
    command: string;
    user: string;
    help: boolean;
}

/** @internal exported for testing */
export function parseArgs(argv: string[]): CliArgs {
    const args = argv.slice(2);
    const result: CliArgs = {
        command: '',
        user: DEFAULT_USER_ID,
        help: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-u':
            case '--user':
                result.user = args[++i] ?? DEFAULT_USER_ID;
                break;
            case '-h':
            case '--help':
                result.help = true;
                break;
            case undefined:
                break;
            default:
                if (!result.command) result.command = arg.toLowerCase();
                break;
        }
    }

    return result;
}

// ============================================================================
// Prompting
// ============================================================================

/** The slice of `readline.Interface` the CLI needs. */
export interface PromptInterface {
    question(query: string, callback: (answer: string) => void): void;
    once(event: 'close', listener: () => void): unknown;
    close(): void;
}

/**
 * Ask one question and resolve with the trimmed answer.
 * Rejects if input closes first (Ctrl-D, exhausted pipe).
 */
export function ask(rl: Pick<PromptInterface, 'question' | 'once'>, question: string): Promise<string> {
    return new Promise((resolve, reject) => {
        rl.once('close', () => reject(new Error('Input closed before an answer was entered')));
        rl.question(question, (answer) => resolve(answer.trim()));
    });
}

// ============================================================================
// Commands
// ============================================================================

export interface CliDeps {
    /** Credential backend. Default: `createAuthClient()` */
    readonly authClient?: AuthClient;
    /** Terminal prompt. Default: readline over stdin/stdout */
    readonly createPrompt?: () => PromptInterface;
    /** Line writer for normal output. Default: `console.log` */
    readonly out?: (line: string) => void;
    /** Line writer for errors. Default: `console.error` */
    readonly err?: (line: string) => void;
}

/**
 * Prompt for an API key and save it as `{ api_key }`.
 *
 * @throws {Error} when the entered key is empty
 * @internal exported for testing
 */
export async function commandAuth(args: CliArgs, deps: CliDeps = {}): Promise<string> {
    const out = deps.out ?? console.log;
    const authClient = deps.authClient ?? createAuthClient();
    const rl = (deps.createPrompt ?? defaultPrompt)();

    out(`Starting simple-tools authentication for user ${args.user}...`);

    let apiKey: string;
    try {
        apiKey = await ask(rl, API_KEY_PROMPT);
    } finally {
        rl.close();
    }

    if (!apiKey) {
        throw new Error('API key cannot be empty');
    }

    await authClient.saveUserCredentials(SERVICE_NAME, args.user, { api_key: apiKey });
    out(pc.green(`Simple Tools API key saved for user ${args.user}. You can now run the server.`));
    return apiKey;
}

function defaultPrompt(): PromptInterface {
    return readline.createInterface({ input: process.stdin, output: process.stdout });
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Run the CLI and resolve with the process exit code.
 * @internal exported for testing
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
    const out = deps.out ?? console.log;
    const err = deps.err ?? console.error;
    const args = parseArgs(argv);

    if (args.help || !args.command) {
        out(HELP);
        return 0;
    }

    switch (args.command) {
        case 'auth':
            try {
                await commandAuth(args, deps);
                return 0;
            } catch (e) {
                err(pc.red(`Error: ${e instanceof Error ? e.message : String(e)}`));
                return 1;
            }
        default:
            err(`Unknown command: "${args.command}"\n`);
            out(HELP);
            return 1;
    }
}

const entry = process.argv[1] ?? '';
const isCLI = /simple-tools(\.[cm]?[jt]s)?$/.test(entry);
if (isCLI) {
    run(process.argv).then(
        (code) => process.exit(code),
        (e: unknown) => {
            console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
            process.exit(1);
        },
    );
}
