/**
 * Typed failures surfaced by the Connection Manager and Request Dispatcher
 */

export type ConnectionErrorReason
    = | 'unknown-endpoint' // no endpoint with that id is configured
      | 'no-endpoints'     // nothing configured to dispatch to
      | 'unreachable'      // transport could not be opened
      | 'handshake'        // transport opened but MCP initialization did not finish in time
      | 'closed'           // session closed underneath an operation
      | 'cancelled';       // caller aborted while connecting

export type RequestErrorReason
    = | 'remote'     // server rejected or failed the operation
      | 'malformed'  // response could not be validated or decoded
      | 'timeout'    // no response within the request timeout
      | 'cancelled'; // caller aborted while waiting for the response

interface DispatchErrorDetails<TReason extends string> {
    reason:      TReason
    endpointId?: string
    requestId?:  string
    cause?:      unknown
}

export abstract class DispatchError<TReason extends string = string> extends Error {
    readonly reason:      TReason;
    readonly endpointId?: string;
    readonly requestId?:  string;

    constructor(message: string, details: DispatchErrorDetails<TReason>) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = new.target.name;
        this.reason = details.reason;
        this.endpointId = details.endpointId;
        this.requestId = details.requestId;
    }
}

export class ConnectionError extends DispatchError<ConnectionErrorReason> {}

export class RequestError extends DispatchError<RequestErrorReason> {}

export function isConnectionError(error: unknown): error is ConnectionError {
    return error instanceof ConnectionError;
}

export function isRequestError(error: unknown): error is RequestError {
    return error instanceof RequestError;
}
