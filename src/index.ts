/**
 * mcp-dispatch
 *
 * Request/response client for one or more MCP server endpoints:
 * - ConnectionManager opens and closes one session per endpoint
 * - RequestDispatcher routes each request to an endpoint and returns its response
 * - DiscoveryService lists the operations each endpoint exposes
 */

import { ConnectionManager, type ConnectionManagerOptions } from './backend/connection-manager.js';
import { RequestDispatcher, type DispatcherOptions } from './backend/dispatcher.js';
import { DiscoveryService } from './backend/discovery.js';
import type { ClientConfig } from './types/config.js';

export { ConnectionManager, CLIENT_INFO } from './backend/connection-manager.js';
export type { ConnectionManagerOptions, EndpointStatus } from './backend/connection-manager.js';
export { RequestDispatcher, createRequest, isConnectPhaseError } from './backend/dispatcher.js';
export type { DispatcherOptions } from './backend/dispatcher.js';
export { DiscoveryService } from './backend/discovery.js';
export type { EndpointTools } from './backend/discovery.js';
export { decodeToolResult, extractPayload, MalformedResultError } from './backend/response-decoder.js';
export {
    createDefaultTransport,
    buildHttpHeaders,
    buildStdioParameters,
    redactHeaders,
    resolveStdioCommand
} from './backend/transport-factory.js';
export type { TransportFactory } from './backend/transport-factory.js';
export * from './errors.js';
export * from './types/config.js';
export type * from './types/dispatch.js';
export { loadClientConfig, parseClientConfig, substituteEnvVars } from './utils/config-loader.js';
export { getEndpointsConfigPath } from './utils/config-paths.js';

export interface McpDispatchClient {
    connections: ConnectionManager
    dispatcher:  RequestDispatcher
    discovery:   DiscoveryService
    /** Close every open session */
    close():     Promise<void>
}

export interface CreateClientOptions extends ConnectionManagerOptions {
    shouldRetry?: DispatcherOptions['shouldRetry']
    onRetry?:     DispatcherOptions['onRetry']
}

/**
 * Wire the services from one explicit configuration object
 */
export function createMcpDispatchClient(config: ClientConfig, options: CreateClientOptions = {}): McpDispatchClient {
    const connections = new ConnectionManager(config, {
        ...(options.transportFactory ? { transportFactory: options.transportFactory } : {}),
    });

    const dispatcher = new RequestDispatcher(connections, {
        failurePolicy: config.dispatch.failurePolicy,
        maxRetries:    config.dispatch.retry.maxRetries,
        retryDelayMs:  config.dispatch.retry.retryDelayMs,
        ...(options.shouldRetry ? { shouldRetry: options.shouldRetry } : {}),
        ...(options.onRetry ? { onRetry: options.onRetry } : {}),
    });

    const discovery = new DiscoveryService(connections);

    return {
        connections,
        dispatcher,
        discovery,
        close: () => connections.disconnectAll(),
    };
}
