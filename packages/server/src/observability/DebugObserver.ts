/**
 * DebugObserver — Opt-in Observability for simple-tools
 *
 * Typed debug events emitted while a tool call is routed, authenticated
 * and executed. When no observer is attached nothing is emitted.
 *
 * @example
 * ```typescript
 * import { createDebugObserver } from '@simple-tools/server';
 *
 * // Default: compact lines on stderr
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. collect in tests)
 * const debug = createDebugObserver((event) => events.push(event));
 *
 * createServer({ userId: 'local', debug });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** An incoming `tools/list` or `tools/call` reached the server. */
export interface RouteEvent {
    readonly type: 'route';
    readonly tool: string;
    readonly userId: string;
    readonly timestamp: number;
}

/** Outcome of the API-key lookup for a tool call. */
export interface AuthEvent {
    readonly type: 'auth';
    readonly tool: string;
    readonly userId: string;
    readonly ok: boolean;
    /** Failure reason when `ok` is false */
    readonly error?: string;
    readonly timestamp: number;
}

/** A tool call produced a result. */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly tool: string;
    readonly userId: string;
    /** Result status (`success`, `not_found`, `empty`) */
    readonly status: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** A tool call raised instead of returning. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly tool: string;
    readonly userId: string;
    readonly error: string;
    readonly step: 'validate' | 'route';
    readonly timestamp: number;
}

export type DebugEvent =
    | RouteEvent
    | AuthEvent
    | ExecuteEvent
    | ErrorEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Formatting
// ============================================================================

const PREFIX = '[simple-tools]';

/** @internal exported for testing */
export function formatDebugEvent(event: DebugEvent): string {
    const path = `${event.userId}/${event.tool}`;

    switch (event.type) {
        case 'route':
            return `${PREFIX} route     ${path}`;

        case 'auth': {
            const status = event.ok ? '✓' : `✗ ${event.error ?? ''}`;
            return `${PREFIX} auth      ${path} ${status}`;
        }

        case 'execute':
            return `${PREFIX} execute   ${path} ${event.status} ${event.durationMs.toFixed(1)}ms`;

        case 'error':
            return `${PREFIX} ERROR     ${path} [${event.step}] ${event.error}`;
    }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * Without a handler, events are written to stderr (stdout carries the
 * stdio transport):
 *
 * ```
 * [simple-tools] route     local/store_data
 * [simple-tools] auth      local/store_data ✓
 * [simple-tools] execute   local/store_data success 0.4ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        process.stderr.write(`${formatDebugEvent(event)}\n`);
    };
}
