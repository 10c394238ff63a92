/**
 * Decoding of MCP tool results into dispatch payloads
 */

import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';

export interface DecodedToolResult {
    payload:       unknown
    content:       CallToolResult['content']
    isError:       boolean
    errorMessage?: string
}

export class MalformedResultError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedResultError';
    }
}

function textParts(content: CallToolResult['content']): string[] | undefined {
    const texts: string[] = [];
    for(const item of content) {
        if(item.type !== 'text') {
            return undefined;
        }
        texts.push(item.text);
    }
    return texts;
}

function parseJsonOrText(text: string): unknown {
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch{
        return text;
    }
}

/**
 * Payload precedence: structuredContent, then a single text item parsed as
 * JSON (falling back to the raw string), then several text items joined by
 * newlines, then the content array as-is.
 */
export function extractPayload(result: CallToolResult): unknown {
    if(result.structuredContent !== undefined) {
        return result.structuredContent;
    }

    const texts = textParts(result.content);
    if(!texts || texts.length === 0) {
        return result.content;
    }

    if(texts.length === 1) {
        return parseJsonOrText(texts[0] ?? '');
    }

    return _.join(texts, '\n');
}

function describeError(result: CallToolResult): string {
    const texts = textParts(result.content);
    const text = _.trim(_.join(texts ?? [], '\n'));
    return text === '' ? 'Remote operation failed' : text;
}

/**
 * Validate a raw `tools/call` result and decode its payload
 *
 * @throws MalformedResultError when the result is not a valid CallToolResult
 */
export function decodeToolResult(raw: unknown): DecodedToolResult {
    const parsed = CallToolResultSchema.safeParse(raw);
    if(!parsed.success) {
        const issues = _.map(parsed.error.issues, issue => `${_.join(issue.path, '.') || '(root)'}: ${issue.message}`);
        throw new MalformedResultError(`Malformed tool result: ${_.join(issues, ', ')}`);
    }

    const result = parsed.data;
    const isError = result.isError === true;

    return {
        payload: extractPayload(result),
        content: result.content,
        isError,
        ...(isError ? { errorMessage: describeError(result) } : {}),
    };
}
