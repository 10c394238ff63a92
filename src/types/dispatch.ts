/**
 * Request, response and session types shared by the backend services
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type EndpointState = 'disconnected' | 'connecting' | 'connected' | 'failed';

/**
 * One operation sent to an endpoint. Frozen by createRequest().
 */
export interface DispatchRequest {
    readonly id:        string
    /** MCP tool name */
    readonly operation: string
    /** Tool arguments */
    readonly payload:   Readonly<Record<string, unknown>>
}

export interface DispatchResponse {
    requestId:  string
    endpointId: string
    /** Decoded result: structured content, parsed JSON text, plain text, or raw content */
    payload:    unknown
    content:    CallToolResult['content']
    durationMs: number
}

/**
 * Handle for an open connection to one endpoint. Holders must not assume it
 * stays live; check `isOpen()` or let `send()` report a closed session.
 */
export interface Session {
    readonly id:         string
    readonly endpointId: string
    readonly openedAt:   number
    isOpen(): boolean
}

export interface SendOptions {
    signal?:    AbortSignal
    timeoutMs?: number
}

export interface ConnectOptions {
    signal?: AbortSignal
}

export interface DispatchOptions {
    /** Endpoint id; skips round-robin selection and never falls back */
    target?:    string
    signal?:    AbortSignal
    timeoutMs?: number
}

export type DispatchOutcome
    = | { success: true, response: DispatchResponse }
      | { success: false, error: Error };
