/**
 * Tool Contracts — Argument Schemas and Result Shapes
 *
 * Argument schemas are zod objects; `tools/list` projects them to JSON
 * Schema. Results are discriminated on `action` then `status`.
 */
import { z } from 'zod';

// ============================================================================
// Tool Names
// ============================================================================

export const TOOL_NAMES = ['store_data', 'retrieve_data', 'list_data'] as const;

export type ToolName = typeof TOOL_NAMES[number];

// ============================================================================
// Argument Schemas
// ============================================================================

export const StoreDataArgsSchema = z.object({
    key: z.string().min(1),
    value: z.string().min(1),
});

export const RetrieveDataArgsSchema = z.object({
    key: z.string().min(1),
});

export const ListDataArgsSchema = z.object({});

export type StoreDataArgs = z.infer<typeof StoreDataArgsSchema>;
export type RetrieveDataArgs = z.infer<typeof RetrieveDataArgsSchema>;

// ============================================================================
// Results
// ============================================================================

interface ResultBase {
    /** `<action>_<8 hex>`, best-effort unique */
    readonly id: string;
    readonly message: string;
    /** Epoch seconds */
    readonly timestamp: number;
}

export interface StoreResult extends ResultBase {
    readonly status: 'success';
    readonly action: 'store';
    readonly key: string;
    readonly value: string;
    readonly authenticated: true;
}

export interface RetrieveFoundResult extends ResultBase {
    readonly status: 'success';
    readonly action: 'retrieve';
    readonly key: string;
    readonly value: string;
}

export interface RetrieveNotFoundResult extends ResultBase {
    readonly status: 'not_found';
    readonly action: 'retrieve';
    readonly key: string;
}

export interface ListResult extends ResultBase {
    readonly status: 'success';
    readonly action: 'list';
    readonly data: Record<string, string>;
    readonly count: number;
    readonly formatted_list: string;
}

export interface ListEmptyResult extends ResultBase {
    readonly status: 'empty';
    readonly action: 'list';
    readonly data: Record<string, never>;
    readonly count: 0;
}

export type RetrieveResult = RetrieveFoundResult | RetrieveNotFoundResult;

export type ToolResult =
    | StoreResult
    | RetrieveResult
    | ListResult
    | ListEmptyResult;

export type ResultStatus = ToolResult['status'];
