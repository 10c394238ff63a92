/**
 * Generic retry wrapper for async operations
 */

import _ from 'lodash';
import { cancellableDelay } from './timeout.js';

export interface RetryOptions {
    maxRetries?:   number
    retryDelayMs?: number
    /** Return false to stop retrying and rethrow this error */
    shouldRetry?:  (error: Error, attempt: number) => boolean
    onRetry?:      (attempt: number, error: Error) => void
    onFailure?:    (finalError: Error) => void
    /** Aborting cuts the current wait short and stops further attempts */
    signal?:       AbortSignal
}

/**
 * Run `operation`, retrying up to `maxRetries` times with linear backoff
 * (retryDelayMs, 2 x retryDelayMs, ...)
 */
export async function retryOperation<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const maxRetries = options.maxRetries ?? 0;
    const retryDelayMs = options.retryDelayMs ?? 1000;
    const { signal } = options;

    for(let attempt = 0; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            const lastError = _.isError(error) ? error : new Error(String(error));

            const retryable = attempt < maxRetries
                && !signal?.aborted
                && (options.shouldRetry?.(lastError, attempt + 1) ?? true);

            if(!retryable) {
                if(attempt > 0) {
                    options.onFailure?.(lastError);
                }
                throw lastError;
            }

            options.onRetry?.(attempt + 1, lastError);

            if(signal?.aborted) {
                throw lastError;
            }

            const { promise, cancel } = cancellableDelay(retryDelayMs * (attempt + 1));
            signal?.addEventListener('abort', cancel, { once: true });
            await promise;
            signal?.removeEventListener('abort', cancel);

            if(signal?.aborted) {
                throw lastError;
            }
        }
    }
}
