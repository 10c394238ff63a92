/**
 * Request Dispatcher
 *
 * Routes requests to endpoints through the ConnectionManager:
 * - Explicit target, or round-robin over endpoints in configuration order
 * - fail-fast or skip on unreachable endpoints
 * - Optional retry of connect-phase failures
 * - Logs every dispatch with timing information
 */

import { randomUUID } from 'node:crypto';
import _ from 'lodash';
import { ConnectionError, DispatchError, isConnectionError } from '../errors.js';
import type { FailurePolicy } from '../types/config.js';
import type { DispatchOptions, DispatchOutcome, DispatchRequest, DispatchResponse } from '../types/dispatch.js';
import { errorMessage, logger } from '../utils/logger.js';
import { retryOperation } from '../utils/retry.js';
import type { ConnectionManager } from './connection-manager.js';

export interface DispatcherOptions {
    failurePolicy?: FailurePolicy
    /** Extra attempts after the first; 0 disables retry */
    maxRetries?:    number
    retryDelayMs?:  number
    /** Replaces the default retry predicate (connect-phase ConnectionErrors only) */
    shouldRetry?:   (error: Error, attempt: number) => boolean
    onRetry?:       (attempt: number, error: Error, request: DispatchRequest) => void
}

/**
 * Errors raised before anything reached the endpoint. Retrying these cannot
 * deliver a request twice.
 */
export function isConnectPhaseError(error: unknown): boolean {
    return isConnectionError(error) && (error.reason === 'unreachable' || error.reason === 'handshake');
}

/**
 * Build an immutable request
 */
export function createRequest(operation: string, payload: Record<string, unknown> = {}, id: string = randomUUID()): DispatchRequest {
    if(_.trim(operation) === '') {
        throw new Error('Request operation cannot be empty');
    }

    return Object.freeze({
        id,
        operation,
        payload: Object.freeze({ ...payload }),
    });
}

export class RequestDispatcher {
    private connectionManager: ConnectionManager;
    private readonly failurePolicy: FailurePolicy;
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;
    private readonly shouldRetry: (error: Error, attempt: number) => boolean;
    private readonly onRetry?: (attempt: number, error: Error, request: DispatchRequest) => void;
    private cursor = 0;

    constructor(connectionManager: ConnectionManager, options: DispatcherOptions = {}) {
        this.connectionManager = connectionManager;
        this.failurePolicy = options.failurePolicy ?? 'fail-fast';
        this.maxRetries = options.maxRetries ?? 0;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
        this.shouldRetry = options.shouldRetry ?? isConnectPhaseError;
        this.onRetry = options.onRetry;
    }

    /**
     * Endpoints to try for one dispatch, in order. Advances the round-robin
     * cursor once per untargeted dispatch.
     */
    private selectCandidates(target?: string): string[] {
        if(target !== undefined) {
            if(!this.connectionManager.hasEndpoint(target)) {
                throw new ConnectionError(`Unknown endpoint: ${target}`, { reason: 'unknown-endpoint', endpointId: target });
            }
            return [target];
        }

        const endpointIds = this.connectionManager.getEndpointIds();
        if(endpointIds.length === 0) {
            throw new ConnectionError('No endpoints configured', { reason: 'no-endpoints' });
        }

        const start = this.cursor % endpointIds.length;
        this.cursor = (start + 1) % endpointIds.length;

        const rotated = [..._.slice(endpointIds, start), ..._.slice(endpointIds, 0, start)];
        return this.failurePolicy === 'skip' ? rotated : _.take(rotated, 1);
    }

    private async sendTo(endpointId: string, request: DispatchRequest, options: DispatchOptions): Promise<DispatchResponse> {
        const session = await this.connectionManager.connect(endpointId, options.signal ? { signal: options.signal } : {});
        return this.connectionManager.send(session, request, {
            ...(options.signal ? { signal: options.signal } : {}),
            ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
        });
    }

    private async tryCandidates(candidates: string[], request: DispatchRequest, options: DispatchOptions): Promise<DispatchResponse> {
        const failures: { endpointId: string, error: string }[] = [];

        for(const endpointId of candidates) {
            try {
                return await this.sendTo(endpointId, request, options);
            } catch (error) {
                if(candidates.length === 1 || !isConnectPhaseError(error)) {
                    throw error;
                }

                failures.push({ endpointId, error: errorMessage(error) });
                logger.warn(
                    { requestId: request.id, endpointId, error: errorMessage(error) },
                    'Endpoint unreachable, skipping to next endpoint'
                );
            }
        }

        throw new ConnectionError(
            `All endpoints unreachable: ${_.join(_.map(failures, f => `${f.endpointId} (${f.error})`), '; ')}`,
            { reason: 'unreachable', requestId: request.id }
        );
    }

    /**
     * Dispatch one request and wait for its response
     *
     * @throws ConnectionError or RequestError
     */
    async dispatch(request: DispatchRequest, options: DispatchOptions = {}): Promise<DispatchResponse> {
        const startTime = Date.now();
        const candidates = this.selectCandidates(options.target);

        logger.info(
            { requestId: request.id, operation: request.operation, endpointId: candidates[0], policy: this.failurePolicy },
            'Dispatching request'
        );

        try {
            const response = await retryOperation(
                () => this.tryCandidates(candidates, request, options),
                {
                    maxRetries:   this.maxRetries,
                    retryDelayMs: this.retryDelayMs,
                    shouldRetry:  this.shouldRetry,
                    ...(options.signal ? { signal: options.signal } : {}),
                    onRetry:      (attempt, error) => {
                        logger.warn(
                            { requestId: request.id, attempt, maxRetries: this.maxRetries, error: error.message },
                            'Dispatch failed, will retry'
                        );
                        this.onRetry?.(attempt, error, request);
                    },
                }
            );

            logger.info(
                { requestId: request.id, endpointId: response.endpointId, durationMs: Date.now() - startTime },
                'Request completed'
            );

            return response;
        } catch (error) {
            const meta = {
                requestId:  request.id,
                operation:  request.operation,
                durationMs: Date.now() - startTime,
                error:      errorMessage(error),
            };
            // Typed failures reach the caller, and connect failures are logged by the connection manager
            if(error instanceof DispatchError) {
                logger.debug({ ...meta, reason: error.reason }, 'Request failed');
            } else {
                logger.error(meta, 'Request failed');
            }
            throw error;
        }
    }

    /**
     * Build and dispatch a request in one call
     */
    async call(operation: string, payload: Record<string, unknown> = {}, options: DispatchOptions = {}): Promise<DispatchResponse> {
        return this.dispatch(createRequest(operation, payload), options);
    }

    /**
     * Dispatch several requests in parallel; each gets its own outcome
     */
    async dispatchBatch(items: { request: DispatchRequest, options?: DispatchOptions }[]): Promise<DispatchOutcome[]> {
        logger.info({ requestCount: items.length }, 'Dispatching request batch');

        const results = await Promise.allSettled(
            _.map(items, ({ request, options }) => this.dispatch(request, options))
        );

        return _.map(results, (result): DispatchOutcome => {
            if(result.status === 'fulfilled') {
                return { success: true, response: result.value };
            }
            return { success: false, error: _.isError(result.reason) ? result.reason : new Error(String(result.reason)) };
        });
    }

    getFailurePolicy(): FailurePolicy {
        return this.failurePolicy;
    }
}

export default RequestDispatcher;
