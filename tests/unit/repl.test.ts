/**
 * Unit tests for the interactive dispatch loop
 */

import { Readable, Writable } from 'node:stream';
import { afterEach, describe, it, expect } from 'vitest';
import { ConnectionManager } from '../../src/backend/connection-manager.js';
import { RequestDispatcher } from '../../src/backend/dispatcher.js';
import { formatFailure, parsePayload, parseReplLine, runRepl } from '../../src/cli/repl.js';
import { ConnectionError, RequestError } from '../../src/errors.js';
import { StubEndpoint, configWithEndpoints, jsonResult, stubTransportFactory } from '../helpers/index.js';

describe('parsePayload', () => {
    it('should parse a JSON object', () => {
        expect(parsePayload('{"to":"10000000000","text":"hi"}')).toEqual({ to: '10000000000', text: 'hi' });
    });

    it('should reject invalid JSON', () => {
        expect(() => parsePayload('{to:1}')).toThrow(/^Payload is not valid JSON: /);
    });

    it('should reject JSON that is not an object', () => {
        expect(() => parsePayload('[1,2]')).toThrow('Payload must be a JSON object');
        expect(() => parsePayload('"text"')).toThrow('Payload must be a JSON object');
        expect(() => parsePayload('null')).toThrow('Payload must be a JSON object');
    });
});

describe('parseReplLine', () => {
    it('should skip blank lines', () => {
        expect(parseReplLine('   ')).toEqual({ kind: 'skip' });
    });

    it('should recognise exit words in any case', () => {
        expect(parseReplLine('exit')).toEqual({ kind: 'exit' });
        expect(parseReplLine(' QUIT ')).toEqual({ kind: 'exit' });
    });

    it('should read an operation without payload', () => {
        expect(parseReplLine('ping')).toEqual({ kind: 'request', operation: 'ping', payload: {} });
    });

    it('should read an operation with a JSON payload', () => {
        expect(parseReplLine('send_text_message {"to": "10000000000", "text": "hello there"}')).toEqual({
            kind:      'request',
            operation: 'send_text_message',
            payload:   { to: '10000000000', text: 'hello there' },
        });
    });

    it('should report a bad payload', () => {
        expect(parseReplLine('ping [1]')).toEqual({ kind: 'invalid', error: 'Payload must be a JSON object' });
    });
});

describe('formatFailure', () => {
    it('should show the error class and reason', () => {
        const error = new RequestError('Endpoint a rejected ping: nope', { reason: 'remote' });

        expect(formatFailure(error)).toBe('RequestError [remote]: Endpoint a rejected ping: nope');
    });

    it('should show connection errors the same way', () => {
        expect(formatFailure(new ConnectionError('No endpoints configured', { reason: 'no-endpoints' })))
            .toBe('ConnectionError [no-endpoints]: No endpoints configured');
    });

    it('should fall back to the message of other errors', () => {
        expect(formatFailure(new Error('boom'))).toBe('Error: boom');
        expect(formatFailure('text')).toBe('Error: text');
    });
});

describe('runRepl', () => {
    let stub: StubEndpoint | undefined;
    let manager: ConnectionManager | undefined;

    afterEach(async () => {
        await manager?.disconnectAll();
        await stub?.close();
    });

    async function run(lines: string[]): Promise<{ dispatched: number, output: string }> {
        stub = new StubEndpoint('mock://server')
            .tool('ping', () => jsonResult({ status: 'ok' }))
            .tool('fail', () => jsonResult({ status: 'error' }, true));
        manager = new ConnectionManager(configWithEndpoints(['mock://server']), {
            transportFactory: stubTransportFactory([stub]),
        });
        const dispatcher = new RequestDispatcher(manager);

        const chunks: string[] = [];
        const output = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                chunks.push(chunk.toString('utf-8'));
                callback();
            },
        });

        const dispatched = await runRepl(dispatcher, { input: Readable.from([`${lines.join('\n')}\n`]), output });
        return { dispatched, output: chunks.join('') };
    }

    it('should dispatch each line and print the payload', async () => {
        const { dispatched, output } = await run(['ping', '', 'fail', 'ping {oops', 'exit', 'ping']);

        expect(dispatched).toBe(2);
        expect(output).toBe([
            '{',
            '  "status": "ok"',
            '}',
            'RequestError [remote]: Endpoint mock://server rejected fail: {"status":"error"}',
            'Error: Payload is not valid JSON: ' + jsonErrorMessage('{oops'),
            '',
        ].join('\n'));
    });

    it('should stop at the end of input', async () => {
        const { dispatched } = await run(['ping', 'ping']);

        expect(dispatched).toBe(2);
    });
});

function jsonErrorMessage(text: string): string {
    try {
        JSON.parse(text);
    } catch (error) {
        return error instanceof Error ? error.message : String(error);
    }
    return '';
}
