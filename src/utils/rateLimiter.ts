/**
 * Rate Limiter Utility
 *
 * Fixed-window limiter for outbound lead-inbox API calls.
 *
 * Features:
 * - N requests per window, both configurable
 * - FIFO queue when the window is saturated (backpressure, not loss)
 * - Waiters are released at the window boundary
 * - Bounded waits: a caller still queued after maxWaitMs is rejected
 * - Abortable waits; an aborted waiter never consumes a slot
 * - One instance per downstream tenant, no shared module state
 */

import { logger } from '../services/observabilityService';
import { OperationAbortedError, abortReason } from './backoff';

export interface RateLimiterConfig {
    maxRequests: number;      // Maximum requests allowed per window
    windowMs: number;         // Window length in milliseconds
    queueLimit?: number;      // Maximum queued requests (default: 1000)
    maxWaitMs?: number;       // Longest a caller may wait for a slot (default: windowMs)
    name?: string;
}

interface Waiter {
    resolve: () => void;
    reject: (error: Error) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
    deadline?: NodeJS.Timeout;
}

export class RateLimitQueueFullError extends Error {
    constructor(public readonly queueLimit: number) {
        super(`Rate limiter queue full (${queueLimit} requests)`);
        this.name = 'RateLimitQueueFullError';
    }
}

export class RateLimitWaitTimeoutError extends Error {
    constructor(public readonly maxWaitMs: number) {
        super(`Rate limiter wait exceeded ${maxWaitMs}ms`);
        this.name = 'RateLimitWaitTimeoutError';
    }
}

export class FixedWindowRateLimiter {
    private readonly maxRequests: number;
    private readonly windowMs: number;
    private readonly queueLimit: number;
    private readonly maxWaitMs: number;
    private readonly name: string;
    private windowStart: number;
    private used = 0;
    private queue: Waiter[] = [];
    private timer: NodeJS.Timeout | null = null;

    constructor(config: RateLimiterConfig) {
        this.maxRequests = config.maxRequests;
        this.windowMs = config.windowMs;
        this.queueLimit = config.queueLimit ?? 1000;
        this.maxWaitMs = config.maxWaitMs ?? config.windowMs;
        this.name = config.name ?? 'lead-inbox';
        this.windowStart = Date.now();

        logger.info('[RATE_LIMITER] Initialized', {
            limiter: this.name,
            maxRequests: this.maxRequests,
            windowMs: this.windowMs,
            queueLimit: this.queueLimit,
            maxWaitMs: this.maxWaitMs
        });
    }

    /**
     * Take one slot in the current window, waiting for the next window when this
     * one is full. Resolves once the caller may issue its request.
     */
    acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(new OperationAbortedError(abortReason(signal)));
        }

        if (this.queue.length >= this.queueLimit) {
            return Promise.reject(new RateLimitQueueFullError(this.queueLimit));
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = { resolve, reject, signal };

            if (signal) {
                waiter.onAbort = () => {
                    this.dequeue(waiter);
                    reject(new OperationAbortedError(abortReason(signal)));
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }

            this.queue.push(waiter);
            this.drain();

            // Armed after drain so a window release due at the same instant wins
            if (this.queue.includes(waiter)) {
                waiter.deadline = setTimeout(() => {
                    this.dequeue(waiter);
                    logger.warn('[RATE_LIMITER] Slot wait exceeded, rejecting caller', {
                        limiter: this.name,
                        maxWaitMs: this.maxWaitMs,
                        queueLength: this.queue.length
                    });
                    reject(new RateLimitWaitTimeoutError(this.maxWaitMs));
                }, this.maxWaitMs);
                waiter.deadline.unref();
            }
        });
    }

    private dequeue(waiter: Waiter): void {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) {
            this.queue.splice(index, 1);
        }
        this.settle(waiter);
    }

    private settle(waiter: Waiter): void {
        if (waiter.deadline) {
            clearTimeout(waiter.deadline);
        }
        if (waiter.signal && waiter.onAbort) {
            waiter.signal.removeEventListener('abort', waiter.onAbort);
        }
    }

    /**
     * Release as many queued callers as the current window allows. The check
     * and increment run in one synchronous step, so concurrent callers can
     * never push the window past its ceiling.
     */
    private drain(): void {
        this.rollWindow();

        while (this.queue.length > 0 && this.used < this.maxRequests) {
            const waiter = this.queue.shift();
            if (!waiter) break;

            this.used++;
            this.settle(waiter);
            waiter.resolve();
        }

        if (this.queue.length > 0 && this.timer === null) {
            const waitMs = Math.max(0, this.windowStart + this.windowMs - Date.now());

            logger.debug('[RATE_LIMITER] Window saturated, queueing', {
                limiter: this.name,
                queueLength: this.queue.length,
                waitMs
            });

            this.timer = setTimeout(() => {
                this.timer = null;
                this.drain();
            }, waitMs);
            this.timer.unref();
        }
    }

    private rollWindow(): void {
        const now = Date.now();
        if (now - this.windowStart >= this.windowMs) {
            // Windows stay on their grid even when the timer fires late
            const elapsedWindows = Math.floor((now - this.windowStart) / this.windowMs);
            this.windowStart += elapsedWindows * this.windowMs;
            this.used = 0;
        }
    }

    /**
     * Get current rate limiter stats (for monitoring).
     */
    getStats(): {
        used: number;
        limit: number;
        queueLength: number;
        windowResetsInMs: number;
    } {
        this.rollWindow();
        return {
            used: this.used,
            limit: this.maxRequests,
            queueLength: this.queue.length,
            windowResetsInMs: Math.max(0, this.windowStart + this.windowMs - Date.now())
        };
    }
}
