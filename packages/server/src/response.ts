/**
 * Response Helpers
 *
 * Build the MCP tool response shape: an array of text content blocks.
 *
 * @example
 * ```typescript
 * // Object response (JSON in a single text block)
 * return success({ id: 'store_1a2b3c4d', status: 'success' });
 *
 * // Readable failure
 * return error('Authentication error: Simple Tools API key not found for user local.');
 * ```
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/** Standard MCP tool response. */
export interface ToolResponse {
    readonly content: ReadonlyArray<{ readonly type: 'text'; readonly text: string }>;
    readonly isError?: boolean;
}

// ============================================================================
// Response Builders
// ============================================================================

/**
 * Create a success response from a JSON-serializable object.
 * Objects are serialized with `JSON.stringify(data, null, 2)`.
 */
export function success(data: object): ToolResponse {
    return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error response carrying `message` verbatim.
 * Sets `isError: true` so the client sees the call failed.
 */
export function error(message: string): ToolResponse {
    return { content: [{ type: 'text', text: message }], isError: true };
}
