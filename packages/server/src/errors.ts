/**
 * Error kinds raised by the simple-tools server.
 *
 * `AuthenticationError` never leaves dispatch: it is turned into a readable
 * text response. The other two are `McpError`s so the SDK maps them onto
 * JSON-RPC errors. Their `message` is the bare reason: `McpError` prefixes
 * `MCP error <code>: `, and the client adds that prefix itself when it
 * rebuilds the error from the wire.
 *
 * @module
 */
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

/** No usable API key for the caller. */
export class AuthenticationError extends Error {
    override readonly name = 'AuthenticationError';

    constructor(
        message: string,
        readonly userId: string,
    ) {
        super(message);
    }
}

/** Missing or malformed tool/prompt arguments. */
export class InvalidArgumentError extends McpError {
    constructor(
        readonly reason: string,
        readonly issues: readonly string[] = [],
    ) {
        super(ErrorCode.InvalidParams, reason, issues.length > 0 ? { issues } : undefined);
        this.name = 'InvalidArgumentError';
        this.message = reason;
    }
}

/** Tool name matches none of the registered tools. */
export class UnknownToolError extends McpError {
    constructor(readonly toolName: string) {
        super(ErrorCode.InvalidParams, `Unknown tool: ${toolName}`);
        this.name = 'UnknownToolError';
        this.message = `Unknown tool: ${toolName}`;
    }
}
