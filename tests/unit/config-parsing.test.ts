/**
 * Unit tests for configuration parsing and validation
 */

import { describe, it, expect } from 'vitest';
import {
    ClientConfigSchema,
    DispatchConfigSchema,
    EndpointConfigSchema,
    type StdioEndpointConfig
} from '../../src/types/config.js';

describe('Config Parsing', () => {
    describe('EndpointConfigSchema', () => {
        it('should parse an http endpoint with headers and credentials', () => {
            const result = EndpointConfigSchema.parse({
                type:        'http',
                url:         'http://127.0.0.1:2001/mcp',
                headers:     { 'x-whatsapp-api-version': 'v18.0' },
                credentials: { token: 'test-secret' },
            });

            expect(result).toEqual({
                type:        'http',
                url:         'http://127.0.0.1:2001/mcp',
                headers:     { 'x-whatsapp-api-version': 'v18.0' },
                credentials: { token: 'test-secret' },
            });
        });

        it('should default an endpoint without type to stdio', () => {
            const result = EndpointConfigSchema.parse({ command: 'node', args: ['server.js'] });

            expect(result.type).toBe('stdio');
            const stdio = result as StdioEndpointConfig;
            expect(stdio.command).toBe('node');
            expect(stdio.args).toEqual(['server.js']);
        });

        it('should accept a stdio endpoint given only a script path', () => {
            const result = EndpointConfigSchema.parse({ type: 'stdio', path: './servers/whatsapp.py' });

            expect(result).toEqual({ type: 'stdio', path: './servers/whatsapp.py' });
        });

        it('should reject a stdio endpoint with neither command nor path', () => {
            const result = EndpointConfigSchema.safeParse({ type: 'stdio', args: ['x'] });

            expect(result.success).toBe(false);
            expect(result.error?.issues[0]?.message).toBe('A stdio endpoint needs either "command" or "path"');
        });

        it('should reject an http endpoint with an invalid url', () => {
            const result = EndpointConfigSchema.safeParse({ type: 'http', url: 'not a url' });

            expect(result.success).toBe(false);
        });

        it('should reject an empty token', () => {
            const result = EndpointConfigSchema.safeParse({ type: 'http', url: 'http://localhost/mcp', credentials: { token: '' } });

            expect(result.success).toBe(false);
        });
    });

    describe('DispatchConfigSchema', () => {
        it('should apply defaults', () => {
            expect(DispatchConfigSchema.parse({})).toEqual({
                failurePolicy:    'fail-fast',
                requestTimeoutMs: 30000,
                connectTimeoutMs: 15000,
                connectAttempts:  1,
                retry:            { maxRetries: 0, retryDelayMs: 1000 },
            });
        });

        it('should reject an unknown failure policy', () => {
            expect(DispatchConfigSchema.safeParse({ failurePolicy: 'random' }).success).toBe(false);
        });

        it('should reject a non-positive request timeout', () => {
            expect(DispatchConfigSchema.safeParse({ requestTimeoutMs: 0 }).success).toBe(false);
        });

        it('should reject zero connect attempts', () => {
            expect(DispatchConfigSchema.safeParse({ connectAttempts: 0 }).success).toBe(false);
        });
    });

    describe('ClientConfigSchema', () => {
        it('should parse a configuration with several endpoints in order', () => {
            const result = ClientConfigSchema.parse({
                endpoints: {
                    primary:   { type: 'http', url: 'http://localhost:2001/mcp' },
                    secondary: { command: 'python', args: ['server.py'] },
                },
                dispatch: { failurePolicy: 'skip' },
            });

            expect(Object.keys(result.endpoints)).toEqual(['primary', 'secondary']);
            expect(result.dispatch.failurePolicy).toBe('skip');
            expect(result.dispatch.retry.maxRetries).toBe(0);
        });

        it('should default the dispatch section', () => {
            const result = ClientConfigSchema.parse({ endpoints: {} });

            expect(result.dispatch.failurePolicy).toBe('fail-fast');
            expect(result.endpoints).toEqual({});
        });

        it('should require the endpoints section', () => {
            expect(ClientConfigSchema.safeParse({ dispatch: {} }).success).toBe(false);
        });
    });
});
