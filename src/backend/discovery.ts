/**
 * Endpoint Discovery Service
 *
 * Lists the tools (operations) each endpoint exposes:
 * - Calls listTools() over the endpoint's session
 * - Caches results per endpoint with a TTL
 * - Gathers from every endpoint, reporting failures without aborting
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { ConnectionError, DispatchError, RequestError } from '../errors.js';
import { errorMessage, logger } from '../utils/logger.js';
import type { ConnectionManager } from './connection-manager.js';

interface DiscoveryCacheEntry {
    tools:          Tool[]
    lastDiscovered: number
}

export interface EndpointTools {
    endpointId: string
    tools:      Tool[]
}

export class DiscoveryService {
    private connectionManager: ConnectionManager;
    private cache = new Map<string, DiscoveryCacheEntry>();
    private readonly cacheTtlMs: number;

    constructor(connectionManager: ConnectionManager, options: { cacheTtlMs?: number } = {}) {
        this.connectionManager = connectionManager;
        this.cacheTtlMs = options.cacheTtlMs ?? 5 * 60 * 1000;
    }

    private getCached(endpointId: string): Tool[] | undefined {
        const entry = this.cache.get(endpointId);
        if(!entry) {
            return undefined;
        }
        if(Date.now() - entry.lastDiscovered > this.cacheTtlMs) {
            this.cache.delete(endpointId);
            return undefined;
        }
        return entry.tools;
    }

    /**
     * Tools exposed by one endpoint, following pagination cursors
     */
    async listTools(endpointId: string): Promise<Tool[]> {
        const cached = this.getCached(endpointId);
        if(cached) {
            logger.debug({ endpointId, toolCount: cached.length }, 'Returning cached tools');
            return cached;
        }

        logger.info({ endpointId }, 'Discovering tools from endpoint');

        const session = await this.connectionManager.connect(endpointId);

        try {
            const client = this.connectionManager.getClient(session);
            const tools: Tool[] = [];
            let cursor: string | undefined;

            do {
                const page = await client.listTools(cursor === undefined ? undefined : { cursor });
                tools.push(...page.tools);
                cursor = page.nextCursor;
            } while(cursor !== undefined);

            this.cache.set(endpointId, { tools, lastDiscovered: Date.now() });

            logger.info({ endpointId, toolCount: tools.length }, 'Discovered tools');
            return tools;
        } catch (error) {
            logger.error({ endpointId, error: errorMessage(error) }, 'Failed to discover tools from endpoint');

            if(error instanceof DispatchError) {
                throw error;
            }
            throw new RequestError(`Failed to discover tools from ${endpointId}: ${errorMessage(error)}`, {
                reason: 'remote',
                endpointId,
                cause:  error,
            });
        }
    }

    /**
     * Tools from every endpoint; unreachable endpoints land in `failed`
     */
    async listAllTools(): Promise<{ endpoints: EndpointTools[], failed: { endpointId: string, error: string }[] }> {
        const endpointIds = this.connectionManager.getEndpointIds();

        logger.info({ endpointCount: endpointIds.length }, 'Discovering tools from all endpoints');

        const results = await Promise.allSettled(_.map(endpointIds, endpointId => this.listTools(endpointId)));

        const endpoints: EndpointTools[] = [];
        const failed: { endpointId: string, error: string }[] = [];

        _.forEach(results, (result, index) => {
            const endpointId = endpointIds[index] ?? '';
            if(result.status === 'fulfilled') {
                endpoints.push({ endpointId, tools: result.value });
            } else {
                failed.push({ endpointId, error: errorMessage(result.reason) });
            }
        });

        return { endpoints, failed };
    }

    /**
     * Endpoint that exposes a tool with this name, from cached discovery only
     */
    findEndpointForOperation(operation: string): string | undefined {
        for(const [endpointId, entry] of this.cache) {
            if(_.some(entry.tools, { name: operation })) {
                return endpointId;
            }
        }
        return undefined;
    }

    /**
     * Drop cached tools for one endpoint, or for all of them
     */
    refresh(endpointId?: string): void {
        if(endpointId === undefined) {
            this.cache.clear();
            logger.debug('Cleared discovery cache');
            return;
        }

        if(!this.connectionManager.hasEndpoint(endpointId)) {
            throw new ConnectionError(`Unknown endpoint: ${endpointId}`, { reason: 'unknown-endpoint', endpointId });
        }
        this.cache.delete(endpointId);
    }
}

export default DiscoveryService;
