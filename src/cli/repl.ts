/**
 * Interactive dispatch loop
 *
 * Reads `<operation> [json payload]` lines, dispatches each one and prints the
 * response payload. Blank lines are ignored; `exit` or `quit` ends the loop.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import _ from 'lodash';
import type { RequestDispatcher } from '../backend/dispatcher.js';
import { DispatchError } from '../errors.js';
import { errorMessage } from '../utils/logger.js';

export type ReplCommand
    = | { kind: 'skip' }
      | { kind: 'exit' }
      | { kind: 'request', operation: string, payload: Record<string, unknown> }
      | { kind: 'invalid', error: string };

const EXIT_WORDS = ['exit', 'quit'];

/**
 * Parse a JSON object payload given on the command line or in the REPL
 */
export function parsePayload(text: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new Error(`Payload is not valid JSON: ${errorMessage(error)}`);
    }

    if(!_.isPlainObject(parsed) || !_.isObject(parsed)) {
        throw new Error('Payload must be a JSON object');
    }

    return { ...parsed };
}

export function parseReplLine(line: string): ReplCommand {
    const trimmed = _.trim(line);

    if(trimmed === '') {
        return { kind: 'skip' };
    }

    if(_.includes(EXIT_WORDS, _.toLower(trimmed))) {
        return { kind: 'exit' };
    }

    const match = /^(\S+)\s*(.*)$/s.exec(trimmed);
    const operation = match?.[1] ?? trimmed;
    const rest = _.trim(match?.[2] ?? '');

    if(rest === '') {
        return { kind: 'request', operation, payload: {} };
    }

    try {
        return { kind: 'request', operation, payload: parsePayload(rest) };
    } catch (error) {
        return { kind: 'invalid', error: errorMessage(error) };
    }
}

/**
 * Render a caught dispatch failure for the terminal
 */
export function formatFailure(error: unknown): string {
    if(error instanceof DispatchError) {
        return `${error.name} [${error.reason}]: ${error.message}`;
    }
    return `Error: ${errorMessage(error)}`;
}

export interface ReplIo {
    input:  Readable
    output: Writable
}

/**
 * Run the loop until input ends or an exit word is read
 *
 * @returns number of requests dispatched
 */
export async function runRepl(dispatcher: RequestDispatcher, io: ReplIo): Promise<number> {
    const rl = createInterface({ input: io.input, terminal: false });
    const write = (text: string): void => {
        io.output.write(`${text}\n`);
    };

    let dispatched = 0;

    try {
        for await (const line of rl) {
            const command = parseReplLine(line);

            if(command.kind === 'skip') {
                continue;
            }
            if(command.kind === 'exit') {
                break;
            }
            if(command.kind === 'invalid') {
                write(`Error: ${command.error}`);
                continue;
            }

            dispatched += 1;
            try {
                const response = await dispatcher.call(command.operation, command.payload);
                write(JSON.stringify(response.payload, null, 2));
            } catch (error) {
                write(formatFailure(error));
            }
        }
    } finally {
        rl.close();
    }

    return dispatched;
}
