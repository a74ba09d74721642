/**
 * Retry timing helpers: exponential backoff, Retry-After parsing and an
 * abortable sleep.
 */

export interface BackoffOptions {
    baseDelayMs: number;
    maxDelayMs: number;
    jitter: boolean;
}

export class OperationAbortedError extends Error {
    constructor(public readonly reason: string) {
        super(`Operation aborted: ${reason}`);
        this.name = 'OperationAbortedError';
    }
}

/**
 * Delay before retrying after the given (1-indexed) attempt failed:
 * base * 2^(attempt-1), capped. With jitter the upper half of the delay is
 * randomized so concurrent batch retries spread out.
 */
export function computeBackoffDelay(
    attempt: number,
    options: BackoffOptions,
    random: () => number = Math.random
): number {
    const exponential = options.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const capped = Math.min(exponential, options.maxDelayMs);
    if (!options.jitter) return capped;

    const half = capped / 2;
    return Math.round(half + random() * half);
}

/**
 * Retry-After is either delta-seconds or an HTTP date. Returns milliseconds,
 * or null when absent or unparsable.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | null {
    if (!value) return null;
    const trimmed = value.trim();

    if (/^\d+(\.\d+)?$/.test(trimmed)) {
        return Math.round(Number(trimmed) * 1000);
    }

    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) return null;
    return Math.max(0, date - now);
}

export function abortReason(signal: AbortSignal): string {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) {
        return reason.name === 'TimeoutError' ? 'timeout' : reason.message;
    }
    return typeof reason === 'string' ? reason : 'aborted';
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout as a promise. Rejects with OperationAbortedError when the signal
 * fires first.
 */
export const sleep: Sleep = (ms, signal) => {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new OperationAbortedError(abortReason(signal)));
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new OperationAbortedError(signal ? abortReason(signal) : 'aborted'));
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
};
