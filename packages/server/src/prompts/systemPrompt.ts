/**
 * Prompts exposed alongside the tools. Only `system` exists.
 */
import { type GetPromptResult, type Prompt } from '@modelcontextprotocol/sdk/types.js';
import { InvalidArgumentError } from '../errors.js';

const SYSTEM_PROMPT = 'Sample system prompt';

export function listPrompts(): Prompt[] {
    return [{ name: 'system', description: SYSTEM_PROMPT }];
}

/** @throws {InvalidArgumentError} for any name other than `system` */
export function getPrompt(name: string): GetPromptResult {
    if (name !== 'system') {
        throw new InvalidArgumentError(`Unknown prompt: ${name}`);
    }
    return {
        description: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: { type: 'text', text: SYSTEM_PROMPT } }],
    };
}
