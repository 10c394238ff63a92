/**
 * Timeout Utilities
 *
 * Timeouts for async operations that always clear their timer, and a delay
 * that can be cut short.
 */

export class TimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(message: string, timeoutMs: number) {
        super(message);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Race a promise against a timeout, clearing the timer whichever settles first.
 *
 * @throws TimeoutError carrying `timeoutMessage` if the timeout wins
 *
 * @example
 * const client = await withTimeout(
 *   connectToEndpoint('whatsapp'),
 *   15000,
 *   'Handshake with whatsapp timed out after 15000ms'
 * );
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutMessage: string
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(new TimeoutError(timeoutMessage, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}

/**
 * Create a cancellable delay. Cancelling resolves the promise immediately.
 *
 * @example
 * const { promise, cancel } = cancellableDelay(5000);
 * signal.addEventListener('abort', cancel);
 * await promise;
 */
export function cancellableDelay(delayMs: number): {
    promise: Promise<void>
    cancel:  () => void
} {
    let timeoutHandle: NodeJS.Timeout | undefined;
    let resolveFn: (() => void) | undefined;

    const promise = new Promise<void>((resolve) => {
        resolveFn = resolve;
        timeoutHandle = setTimeout(() => {
            resolve();
        }, delayMs);
    });

    const cancel = (): void => {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
        if(resolveFn !== undefined) {
            resolveFn();
        }
    };

    return { promise, cancel };
}

export class AbortedError extends Error {
    constructor(message = 'Operation aborted') {
        super(message);
        this.name = 'AbortedError';
    }
}

/**
 * Stop waiting on `promise` once `signal` aborts. A value that arrives after
 * the abort is handed to `onLate` so it can be released.
 *
 * @throws AbortedError when the signal aborts first
 */
export function abortable<T>(
    promise: Promise<T>,
    signal: AbortSignal | undefined,
    onLate?: (value: T) => void
): Promise<T> {
    if(!signal) {
        return promise;
    }

    if(signal.aborted) {
        promise.then(value => onLate?.(value), () => undefined);
        return Promise.reject(new AbortedError());
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(new AbortedError());
        signal.addEventListener('abort', onAbort, { once: true });

        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                if(signal.aborted) {
                    onLate?.(value);
                    return;
                }
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}
