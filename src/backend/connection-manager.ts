/**
 * MCP Connection Manager
 *
 * Owns one MCP client session per configured endpoint:
 * - Opens sessions on demand through a pluggable TransportFactory
 * - Tracks connection state (disconnected, connecting, connected, failed)
 * - Sends one tools/call per request and maps failures to typed errors
 * - Releases the session when a pending operation is cancelled
 *
 * State changes for an endpoint (connect, disconnect, release) run one at a
 * time; sends share the live session concurrently.
 */

import { randomUUID } from 'node:crypto';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { ConnectionError, DispatchError, RequestError } from '../errors.js';
import type { ClientConfig, EndpointConfig } from '../types/config.js';
import type {
    ConnectOptions,
    DispatchRequest,
    DispatchResponse,
    EndpointState,
    SendOptions,
    Session
} from '../types/dispatch.js';
import { errorMessage, logger } from '../utils/logger.js';
import { TimeoutError, abortable, cancellableDelay, withTimeout } from '../utils/timeout.js';
import { MalformedResultError, decodeToolResult } from './response-decoder.js';
import { createDefaultTransport, type TransportFactory } from './transport-factory.js';

export const CLIENT_INFO = {
    name:    'mcp-dispatch',
    version: '0.1.0',
} as const;

export interface ConnectionManagerOptions {
    transportFactory?: TransportFactory
}

class ManagedSession implements Session {
    readonly id = randomUUID();
    readonly openedAt = Date.now();
    closed = false;

    constructor(
        readonly endpointId: string,
        readonly client: Client
    ) {}

    isOpen(): boolean {
        return !this.closed;
    }
}

/**
 * One connection attempt shared by every caller that asked for it. The
 * attempt is aborted only when all callers holding a signal have aborted and
 * no caller without a signal is waiting.
 */
interface PendingConnect {
    promise:    Promise<Session>
    controller: AbortController
    waiters:    number
}

interface EndpointEntry {
    endpointId:      string
    config:          EndpointConfig
    state:           EndpointState
    session?:        ManagedSession
    pendingConnect?: PendingConnect
    lastError?:      string
    mutations:       Promise<void>
}

export interface EndpointStatus {
    endpointId: string
    type:       EndpointConfig['type']
    state:      EndpointState
    sessionId?: string
    lastError?: string
}

/**
 * Manages MCP sessions to the configured endpoints
 */
export class ConnectionManager {
    private endpoints = new Map<string, EndpointEntry>();
    private readonly transportFactory: TransportFactory;
    private readonly requestTimeoutMs: number;
    private readonly connectTimeoutMs: number;
    private readonly connectAttempts: number;

    // Backoff between connect attempts: 500ms, 1000ms, 2000ms, ...
    private readonly CONNECT_BACKOFF_INITIAL_MS = 500;
    private readonly CONNECT_BACKOFF_MAX_MS = 10000;

    constructor(config: ClientConfig, options: ConnectionManagerOptions = {}) {
        this.transportFactory = options.transportFactory ?? createDefaultTransport;
        this.requestTimeoutMs = config.dispatch.requestTimeoutMs;
        this.connectTimeoutMs = config.dispatch.connectTimeoutMs;
        this.connectAttempts = config.dispatch.connectAttempts;

        for(const [endpointId, endpointConfig] of Object.entries(config.endpoints)) {
            this.endpoints.set(endpointId, {
                endpointId,
                config:    endpointConfig,
                state:     'disconnected',
                mutations: Promise.resolve(),
            });
        }
    }

    /**
     * Open a transport and run the MCP initialize handshake (single attempt)
     */
    protected async attemptConnection(endpointId: string, config: EndpointConfig, signal?: AbortSignal): Promise<Client> {
        const transport = await abortable(
            Promise.resolve(this.transportFactory(endpointId, config)),
            signal,
            (late) => {
                late.close().catch((error: unknown) => {
                    logger.debug({ endpointId, error: errorMessage(error) }, 'Error closing transport opened after cancellation');
                });
            }
        );

        const client = new Client({ ...CLIENT_INFO }, { capabilities: {} });

        const onAbort = (): void => {
            client.close().catch((error: unknown) => {
                logger.debug({ endpointId, error: errorMessage(error) }, 'Error closing transport after cancellation');
            });
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            await withTimeout(
                client.connect(transport, signal ? { signal } : undefined),
                this.connectTimeoutMs,
                `Handshake with endpoint ${endpointId} timed out after ${this.connectTimeoutMs}ms`
            );
            return client;
        } catch (error) {
            await client.close().catch((closeError: unknown) => {
                logger.debug({ endpointId, error: errorMessage(closeError) }, 'Error closing transport after failed connection');
            });
            throw error;
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Wait between connect attempts; an abort ends the wait early
     */
    protected async delay(ms: number, signal?: AbortSignal): Promise<void> {
        const { promise, cancel } = cancellableDelay(ms);
        signal?.addEventListener('abort', cancel, { once: true });
        try {
            await promise;
        } finally {
            signal?.removeEventListener('abort', cancel);
        }
    }

    private getEntry(endpointId: string): EndpointEntry {
        const entry = this.endpoints.get(endpointId);
        if(!entry) {
            throw new ConnectionError(`Unknown endpoint: ${endpointId}`, {
                reason: 'unknown-endpoint',
                endpointId,
            });
        }
        return entry;
    }

    /**
     * Run a state change after every earlier one for the same endpoint
     */
    private serialize<T>(entry: EndpointEntry, task: () => Promise<T>): Promise<T> {
        const run = entry.mutations.then(task);
        entry.mutations = run.then(_.noop, _.noop);
        return run;
    }

    private async openSession(entry: EndpointEntry, signal?: AbortSignal): Promise<Session> {
        const { endpointId } = entry;

        // An earlier queued connect may already have finished the job
        if(entry.state === 'connected' && entry.session?.isOpen()) {
            return entry.session;
        }

        if(signal?.aborted) {
            throw connectCancelled(endpointId);
        }

        entry.state = 'connecting';
        logger.info({ endpointId, type: entry.config.type }, 'Connecting to endpoint');

        let lastError: unknown;

        for(let attempt = 1; attempt <= this.connectAttempts; attempt++) {
            try {
                const client = await this.attemptConnection(endpointId, entry.config, signal);

                if(signal?.aborted) {
                    await client.close();
                    throw new Error('cancelled after handshake');
                }

                const session = new ManagedSession(endpointId, client);
                this.attachClientHandlers(entry, session);

                entry.session = session;
                entry.state = 'connected';
                entry.lastError = undefined;

                logger.info({ endpointId, attempt, sessionId: session.id }, 'Connected to endpoint');
                return session;
            } catch (error) {
                lastError = error;

                if(signal?.aborted) {
                    throw this.cancelConnect(entry, attempt, error);
                }

                if(attempt < this.connectAttempts) {
                    const delayMs = Math.min(
                        this.CONNECT_BACKOFF_INITIAL_MS * Math.pow(2, attempt - 1),
                        this.CONNECT_BACKOFF_MAX_MS
                    );
                    logger.warn(
                        { endpointId, attempt, maxAttempts: this.connectAttempts, delayMs, error: errorMessage(error) },
                        'Connection attempt failed, retrying'
                    );
                    await this.delay(delayMs, signal);

                    if(signal?.aborted) {
                        throw this.cancelConnect(entry, attempt, error);
                    }
                }
            }
        }

        entry.state = 'failed';
        entry.lastError = errorMessage(lastError);

        logger.error(
            { endpointId, attempts: this.connectAttempts, error: entry.lastError },
            'Failed to connect to endpoint'
        );

        const reason = lastError instanceof TimeoutError ? 'handshake' : 'unreachable';
        throw new ConnectionError(`Failed to connect to endpoint ${endpointId}: ${entry.lastError}`, {
            reason,
            endpointId,
            cause: lastError,
        });
    }

    private cancelConnect(entry: EndpointEntry, attempt: number, cause: unknown): ConnectionError {
        entry.state = 'disconnected';
        logger.warn({ endpointId: entry.endpointId, attempt }, 'Connection cancelled by caller');
        return new ConnectionError(`Connection to endpoint ${entry.endpointId} cancelled`, {
            reason:     'cancelled',
            endpointId: entry.endpointId,
            cause,
        });
    }

    private attachClientHandlers(entry: EndpointEntry, session: ManagedSession): void {
        session.client.onclose = () => {
            if(entry.session !== session) {
                return;
            }
            logger.warn({ endpointId: entry.endpointId, sessionId: session.id }, 'Endpoint session closed');
            session.closed = true;
            entry.session = undefined;
            entry.state = 'disconnected';
        };

        session.client.onerror = (error: Error) => {
            entry.lastError = error.message;
            logger.error({ endpointId: entry.endpointId, error: error.message }, 'Endpoint transport error');
        };
    }

    /**
     * Connect to an endpoint, reusing its session when one is open
     *
     * Concurrent callers share one connection attempt. A caller's signal
     * only stops that caller waiting; the attempt itself is cancelled once
     * every waiting caller has cancelled.
     */
    async connect(endpointId: string, options: ConnectOptions = {}): Promise<Session> {
        const entry = this.getEntry(endpointId);
        const { signal } = options;

        if(entry.state === 'connected' && entry.session?.isOpen()) {
            logger.debug({ endpointId }, 'Reusing open session');
            return entry.session;
        }

        if(signal?.aborted) {
            throw connectCancelled(endpointId);
        }

        let pending = entry.pendingConnect;
        if(!pending) {
            const controller = new AbortController();
            const promise = this.serialize(entry, () => this.openSession(entry, controller.signal));
            const created: PendingConnect = { promise, controller, waiters: 0 };
            entry.pendingConnect = created;

            promise
                .catch(() => undefined)
                .finally(() => {
                    if(entry.pendingConnect === created) {
                        entry.pendingConnect = undefined;
                    }
                })
                .catch(() => undefined);

            pending = created;
        }

        return this.waitForConnect(entry, pending, signal);
    }

    private waitForConnect(entry: EndpointEntry, pending: PendingConnect, signal?: AbortSignal): Promise<Session> {
        pending.waiters += 1;

        // Without a signal this caller waits to the end, so the attempt is never aborted
        if(!signal) {
            return pending.promise;
        }

        return new Promise<Session>((resolve, reject) => {
            const onAbort = (): void => {
                pending.waiters -= 1;
                if(pending.waiters === 0) {
                    logger.debug({ endpointId: entry.endpointId }, 'Every caller cancelled, aborting connection attempt');
                    if(entry.pendingConnect === pending) {
                        entry.pendingConnect = undefined;
                    }
                    pending.controller.abort();
                }
                reject(connectCancelled(entry.endpointId));
            };
            signal.addEventListener('abort', onAbort, { once: true });

            pending.promise.then(
                (session) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(session);
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    /**
     * Send one request over a session and wait for its single response
     */
    async send(session: Session, request: DispatchRequest, options: SendOptions = {}): Promise<DispatchResponse> {
        const entry = this.getEntry(session.endpointId);
        const { endpointId } = entry;
        const requestId = request.id;
        const { signal } = options;
        const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;

        const managed = entry.session;
        if(!managed || managed !== session || !managed.isOpen()) {
            throw new ConnectionError(`Session for endpoint ${endpointId} is closed`, { reason: 'closed', endpointId, requestId });
        }

        if(signal?.aborted) {
            throw new RequestError(`Request ${requestId} cancelled before it was sent`, { reason: 'cancelled', endpointId, requestId });
        }

        const onAbort = (): void => {
            logger.warn({ endpointId, requestId, sessionId: managed.id }, 'Request cancelled, releasing session');
            this.disconnect(managed).catch((error: unknown) => {
                logger.error({ endpointId, error: errorMessage(error) }, 'Failed to release session after cancellation');
            });
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        const startTime = Date.now();
        logger.debug({ endpointId, requestId, operation: request.operation, timeoutMs }, 'Sending request');

        try {
            const raw: unknown = await managed.client.callTool(
                { name: request.operation, arguments: { ...request.payload } },
                undefined,
                { signal, timeout: timeoutMs }
            );

            if(signal?.aborted) {
                throw new RequestError(`Request ${requestId} cancelled`, { reason: 'cancelled', endpointId, requestId });
            }

            const decoded = decodeToolResult(raw);
            if(decoded.isError) {
                throw new RequestError(
                    `Endpoint ${endpointId} rejected ${request.operation}: ${decoded.errorMessage ?? 'Remote operation failed'}`,
                    { reason: 'remote', endpointId, requestId }
                );
            }

            return {
                requestId,
                endpointId,
                payload:    decoded.payload,
                content:    decoded.content,
                durationMs: Date.now() - startTime,
            };
        } catch (error) {
            throw toSendError(error, { endpointId, requestId, operation: request.operation, timeoutMs, signal });
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Close a session. Closing an already closed session does nothing.
     */
    async disconnect(session: Session): Promise<void> {
        const entry = this.getEntry(session.endpointId);

        await this.serialize(entry, async () => {
            const managed = entry.session;
            if(!managed || managed !== session || !managed.isOpen()) {
                logger.debug({ endpointId: entry.endpointId, sessionId: session.id }, 'Session already closed');
                return;
            }

            logger.info({ endpointId: entry.endpointId, sessionId: managed.id }, 'Disconnecting from endpoint');

            // Detach first so the close callback does not treat this as a remote close
            managed.closed = true;
            entry.session = undefined;
            entry.state = 'disconnected';

            try {
                await managed.client.close();
                logger.info({ endpointId: entry.endpointId }, 'Disconnected from endpoint');
            } catch (error) {
                logger.error(
                    { endpointId: entry.endpointId, error: errorMessage(error) },
                    'Error closing endpoint session'
                );
            }
        });
    }

    /**
     * Connect to every endpoint; failures are reported, not thrown
     */
    async connectAll(): Promise<{ successful: string[], failed: { endpointId: string, error: string }[] }> {
        const endpointIds = this.getEndpointIds();

        logger.info({ endpointCount: endpointIds.length }, 'Connecting to all endpoints');

        const outcomes = await Promise.allSettled(_.map(endpointIds, endpointId => this.connect(endpointId)));

        const successful: string[] = [];
        const failed: { endpointId: string, error: string }[] = [];

        _.forEach(outcomes, (outcome, index) => {
            const endpointId = endpointIds[index] ?? '';
            if(outcome.status === 'fulfilled') {
                successful.push(endpointId);
            } else {
                failed.push({ endpointId, error: errorMessage(outcome.reason) });
            }
        });

        if(failed.length > 0) {
            logger.warn({ successful, failures: failed }, 'Finished connecting to endpoints with some failures');
        } else {
            logger.info({ connectedCount: successful.length }, 'Finished connecting to endpoints');
        }

        return { successful, failed };
    }

    async disconnectAll(): Promise<void> {
        const sessions = _.compact(_.map(Array.from(this.endpoints.values()), 'session'));

        logger.info({ sessionCount: sessions.length }, 'Disconnecting from all endpoints');

        await Promise.all(_.map(sessions, session => this.disconnect(session)));
    }

    getEndpointIds(): string[] {
        return Array.from(this.endpoints.keys());
    }

    hasEndpoint(endpointId: string): boolean {
        return this.endpoints.has(endpointId);
    }

    getEndpointConfig(endpointId: string): EndpointConfig {
        return this.getEntry(endpointId).config;
    }

    getState(endpointId: string): EndpointState {
        return this.getEntry(endpointId).state;
    }

    getSession(endpointId: string): Session | undefined {
        const session = this.getEntry(endpointId).session;
        return session?.isOpen() ? session : undefined;
    }

    /**
     * The MCP client behind an open session, for discovery calls
     */
    getClient(session: Session): Client {
        const entry = this.getEntry(session.endpointId);
        if(!entry.session || entry.session !== session || !entry.session.isOpen()) {
            throw new ConnectionError(`Session for endpoint ${entry.endpointId} is closed`, {
                reason:     'closed',
                endpointId: entry.endpointId,
            });
        }
        return entry.session.client;
    }

    isConnected(endpointId: string): boolean {
        return this.endpoints.get(endpointId)?.state === 'connected';
    }

    getConnectedEndpointIds(): string[] {
        return _.map(_.filter(Array.from(this.endpoints.values()), { state: 'connected' }), 'endpointId');
    }

    getStatuses(): EndpointStatus[] {
        return _.map(Array.from(this.endpoints.values()), (entry): EndpointStatus => ({
            endpointId: entry.endpointId,
            type:       entry.config.type,
            state:      entry.state,
            ...(entry.session ? { sessionId: entry.session.id } : {}),
            ...(entry.lastError ? { lastError: entry.lastError } : {}),
        }));
    }

    getStats(): Record<EndpointState, number> & { total: number } {
        const states = _.map(Array.from(this.endpoints.values()), 'state');
        return {
            total:        states.length,
            disconnected: _.filter(states, state => state === 'disconnected').length,
            connecting:   _.filter(states, state => state === 'connecting').length,
            connected:    _.filter(states, state => state === 'connected').length,
            failed:       _.filter(states, state => state === 'failed').length,
        };
    }
}

function connectCancelled(endpointId: string): ConnectionError {
    return new ConnectionError(`Connection to endpoint ${endpointId} cancelled`, { reason: 'cancelled', endpointId });
}

interface SendContext {
    endpointId: string
    requestId:  string
    operation:  string
    timeoutMs:  number
    signal?:    AbortSignal
}

function isZodError(error: unknown): boolean {
    // The SDK validates results with its own copy of zod, so match by name
    return _.isError(error) && error.name === 'ZodError';
}

function toSendError(error: unknown, context: SendContext): DispatchError {
    const { endpointId, requestId, operation, timeoutMs, signal } = context;

    if(error instanceof DispatchError) {
        return error;
    }

    if(signal?.aborted) {
        return new RequestError(`Request ${requestId} cancelled`, { reason: 'cancelled', endpointId, requestId, cause: error });
    }

    if(error instanceof MalformedResultError || isZodError(error)) {
        return new RequestError(
            `Malformed response from endpoint ${endpointId} for ${operation}: ${errorMessage(error)}`,
            { reason: 'malformed', endpointId, requestId, cause: error }
        );
    }

    if(error instanceof McpError) {
        if(error.code === ErrorCode.RequestTimeout) {
            return new RequestError(
                `Request ${operation} to endpoint ${endpointId} timed out after ${timeoutMs}ms`,
                { reason: 'timeout', endpointId, requestId, cause: error }
            );
        }
        if(error.code === ErrorCode.ConnectionClosed) {
            return new ConnectionError(
                `Connection to endpoint ${endpointId} closed during ${operation}`,
                { reason: 'closed', endpointId, requestId, cause: error }
            );
        }
    }

    return new RequestError(
        `Endpoint ${endpointId} failed ${operation}: ${errorMessage(error)}`,
        { reason: 'remote', endpointId, requestId, cause: error }
    );
}

export default ConnectionManager;
