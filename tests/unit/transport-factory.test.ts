/**
 * Unit tests for transport construction helpers
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import {
    TOKEN_ENV_VAR,
    buildHttpHeaders,
    buildStdioParameters,
    createDefaultTransport,
    redactHeaders,
    resolveStdioCommand
} from '../../src/backend/transport-factory.js';

describe('redactHeaders', () => {
    it('should mask credential headers and keep the rest', () => {
        expect(redactHeaders({
            'Authorization':          'Bearer test-secret',
            'x-whatsapp-token':       'test-secret',
            'X-Api-Key':              'test-secret',
            'x-whatsapp-phone-id':    '123',
            'x-whatsapp-api-version': 'v18.0',
        })).toEqual({
            'Authorization':          'Bearer ***',
            'x-whatsapp-token':       '***',
            'X-Api-Key':              '***',
            'x-whatsapp-phone-id':    '123',
            'x-whatsapp-api-version': 'v18.0',
        });
    });
});

describe('buildHttpHeaders', () => {
    it('should add a bearer Authorization header from the token', () => {
        expect(buildHttpHeaders({
            type:        'http',
            url:         'http://localhost/mcp',
            headers:     { 'x-whatsapp-api-version': 'v18.0' },
            credentials: { token: 'test-secret' },
        })).toEqual({
            'x-whatsapp-api-version': 'v18.0',
            'Authorization':          'Bearer test-secret',
        });
    });

    it('should keep an explicitly configured Authorization header', () => {
        expect(buildHttpHeaders({
            type:        'http',
            url:         'http://localhost/mcp',
            headers:     { authorization: 'Basic dGVzdA==' },
            credentials: { token: 'test-secret' },
        })).toEqual({ authorization: 'Basic dGVzdA==' });
    });

    it('should return no headers when nothing is configured', () => {
        expect(buildHttpHeaders({ type: 'http', url: 'http://localhost/mcp' })).toEqual({});
    });
});

describe('resolveStdioCommand', () => {
    it('should use the configured command and args', () => {
        expect(resolveStdioCommand({ type: 'stdio', command: 'uvx', args: ['whatsapp-mcp'] }))
            .toEqual({ command: 'uvx', args: ['whatsapp-mcp'] });
    });

    it('should put the path first when both command and path are given', () => {
        expect(resolveStdioCommand({ type: 'stdio', command: 'python3', path: 'server.py', args: ['--verbose'] }))
            .toEqual({ command: 'python3', args: ['server.py', '--verbose'] });
    });

    it('should run .py scripts with python', () => {
        expect(resolveStdioCommand({ type: 'stdio', path: 'servers/whatsapp.py' }))
            .toEqual({ command: 'python', args: ['servers/whatsapp.py'] });
    });

    it('should run other scripts with node', () => {
        expect(resolveStdioCommand({ type: 'stdio', path: 'servers/whatsapp.js' }))
            .toEqual({ command: 'node', args: ['servers/whatsapp.js'] });
    });

    it('should reject a config with neither command nor path', () => {
        expect(() => resolveStdioCommand({ type: 'stdio' })).toThrow('A stdio endpoint needs either "command" or "path"');
    });
});

describe('buildStdioParameters', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('should pass the token and env to the subprocess', () => {
        vi.stubEnv('LOG_LEVEL', 'silent');

        const params = buildStdioParameters({
            type:        'stdio',
            command:     'node',
            args:        ['server.js'],
            env:         { PHONE_NUMBER_ID: '123' },
            cwd:         '/srv/whatsapp',
            credentials: { token: 'test-secret' },
        });

        expect(params).toEqual({
            command: 'node',
            args:    ['server.js'],
            env:     { PHONE_NUMBER_ID: '123', [TOKEN_ENV_VAR]: 'test-secret', LOG_LEVEL: 'silent' },
            stderr:  'ignore',
            cwd:     '/srv/whatsapp',
        });
    });

    it('should inherit stderr when not silent', () => {
        vi.stubEnv('LOG_LEVEL', 'debug');
        vi.stubEnv('MCP_DISPATCH_SILENT', '');

        const params = buildStdioParameters({ type: 'stdio', command: 'node' });

        expect(params.stderr).toBe('inherit');
        expect(params.env).toEqual({ LOG_LEVEL: 'debug' });
        expect(params.cwd).toBeUndefined();
    });
});

describe('createDefaultTransport', () => {
    it('should build a Streamable HTTP transport for http endpoints', async () => {
        const transport = await createDefaultTransport('whatsapp', { type: 'http', url: 'http://127.0.0.1:2001/mcp' });

        expect(transport).toBeInstanceOf(StreamableHTTPClientTransport);
    });

    it('should build a stdio transport for stdio endpoints', async () => {
        const transport = await createDefaultTransport('local', { type: 'stdio', command: 'node', args: ['server.js'] });

        expect(transport).toBeInstanceOf(StdioClientTransport);
    });
});
