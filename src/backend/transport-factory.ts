/**
 * Transport construction for configured endpoints
 *
 * stdio endpoints spawn a subprocess; http endpoints use Streamable HTTP with
 * credentials sent as request headers. Tests and embedders can pass their own
 * TransportFactory to the ConnectionManager instead.
 */

import { StdioClientTransport, type StdioServerParameters } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import _ from 'lodash';
import type { EndpointConfig, HttpEndpointConfig, StdioEndpointConfig } from '../types/config.js';
import { isSilent, logger } from '../utils/logger.js';

export type TransportFactory = (endpointId: string, config: EndpointConfig) => Transport | Promise<Transport>;

/** Environment variable a stdio endpoint receives its credentials token in */
export const TOKEN_ENV_VAR = 'MCP_API_TOKEN';

const SENSITIVE_HEADER = /^(authorization|proxy-authorization|cookie|x-[\w-]*(token|key|secret)[\w-]*)$/i;

/**
 * Copy of headers with credential values masked, for logs and CLI output
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
    return _.mapValues(headers, (value, name) => {
        if(!SENSITIVE_HEADER.test(name)) {
            return value;
        }
        return /^Bearer\s+/i.test(value) ? 'Bearer ***' : '***';
    });
}

/**
 * Headers for an http endpoint; `credentials.token` becomes a bearer
 * Authorization header unless one was configured explicitly
 */
export function buildHttpHeaders(config: HttpEndpointConfig): Record<string, string> {
    const headers: Record<string, string> = { ...config.headers };
    const hasAuthorization = _.some(_.keys(headers), name => _.toLower(name) === 'authorization');

    if(config.credentials?.token && !hasAuthorization) {
        headers.Authorization = `Bearer ${config.credentials.token}`;
    }

    return headers;
}

/**
 * Command line for a stdio endpoint. With only `path`, python runs .py
 * scripts and node runs everything else.
 */
export function resolveStdioCommand(config: StdioEndpointConfig): { command: string, args: string[] } {
    const args = config.args ?? [];

    if(config.command) {
        return {
            command: config.command,
            args:    config.path ? [config.path, ...args] : args,
        };
    }

    if(!config.path) {
        throw new Error('A stdio endpoint needs either "command" or "path"');
    }

    return {
        command: _.endsWith(config.path, '.py') ? 'python' : 'node',
        args:    [config.path, ...args],
    };
}

export function buildStdioParameters(config: StdioEndpointConfig): StdioServerParameters {
    const { command, args } = resolveStdioCommand(config);

    const env: Record<string, string> = {
        ...config.env,
        ...(config.credentials?.token ? { [TOKEN_ENV_VAR]: config.credentials.token } : {}),
        // Propagate silent mode to the subprocess
        ...(process.env.LOG_LEVEL ? { LOG_LEVEL: process.env.LOG_LEVEL } : {}),
    };

    const params: StdioServerParameters = {
        command,
        args,
        env,
        stderr: isSilent() ? 'ignore' : 'inherit',
    };

    if(config.cwd !== undefined) {
        params.cwd = config.cwd;
    }

    return params;
}

export const createDefaultTransport: TransportFactory = (endpointId, config) => {
    if(config.type === 'http') {
        const headers = buildHttpHeaders(config);

        logger.debug({ endpointId, url: config.url, headers: redactHeaders(headers) }, 'Creating Streamable HTTP transport');

        return new StreamableHTTPClientTransport(new URL(config.url), {
            requestInit: { headers },
        });
    }

    const params = buildStdioParameters(config);

    logger.debug({ endpointId, command: params.command, args: params.args }, 'Creating stdio transport');

    return new StdioClientTransport(params);
};
