/**
 * In-process MCP endpoints for tests
 *
 * Each StubEndpoint runs a low-level MCP Server over an InMemoryTransport pair,
 * one server per client connection, so sessions can be opened, closed and
 * reopened without subprocesses or network.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolResult,
    type ListToolsResult,
    type Tool
} from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import type { TransportFactory } from '../../src/backend/transport-factory.js';

export type ToolHandler = (
    args: Record<string, unknown>,
    extra: { signal: AbortSignal }
) => CallToolResult | Promise<CallToolResult>;

export interface RecordedCall {
    operation: string
    args:      Record<string, unknown>
}

/** Text result carrying a JSON document, the way most servers answer */
export function jsonResult(payload: unknown, isError = false): CallToolResult {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload) }],
        ...(isError ? { isError: true } : {}),
    };
}

export class StubEndpoint {
    readonly calls: RecordedCall[] = [];
    connectionCount = 0;

    private handlers = new Map<string, { handler: ToolHandler, description: string }>();
    private servers: Server[] = [];

    constructor(readonly endpointId: string) {}

    tool(name: string, handler: ToolHandler, description = `Stub tool ${name}`): this {
        this.handlers.set(name, { handler, description });
        return this;
    }

    listTools(): Tool[] {
        return _.map(Array.from(this.handlers.entries()), ([name, { description }]): Tool => ({
            name,
            description,
            inputSchema: { type: 'object', properties: {} },
        }));
    }

    async createClientTransport(): Promise<Transport> {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

        const server = new Server(
            { name: `stub-${this.endpointId}`, version: '1.0.0' },
            { capabilities: { tools: {} } }
        );

        server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({
            tools: this.listTools(),
        }));

        server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
            const { name, arguments: args } = request.params;
            this.calls.push({ operation: name, args: args ?? {} });

            const entry = this.handlers.get(name);
            if(!entry) {
                throw new Error(`Unknown tool: ${name}`);
            }
            return entry.handler(args ?? {}, { signal: extra.signal });
        });

        await server.connect(serverTransport);
        this.servers.push(server);
        this.connectionCount += 1;

        return clientTransport;
    }

    async close(): Promise<void> {
        await Promise.all(_.map(this.servers, server => server.close()));
        this.servers = [];
    }
}

/**
 * TransportFactory backed by stub endpoints. Ids listed in `unreachable` fail
 * the way a refused connection does.
 */
export function stubTransportFactory(stubs: StubEndpoint[], unreachable: ReadonlySet<string> = new Set()): TransportFactory {
    return async (endpointId) => {
        if(unreachable.has(endpointId)) {
            throw new Error(`connect ECONNREFUSED ${endpointId}`);
        }
        const stub = _.find(stubs, { endpointId });
        if(!stub) {
            throw new Error(`No stub endpoint for ${endpointId}`);
        }
        return stub.createClientTransport();
    };
}
