/**
 * Lead Inbox Client
 *
 * The only component that talks to the downstream lead-inbox API. Every call
 * (lead dispatch and sync page fetches alike) goes through the same owned
 * rate limiter and retry loop, and every response is classified into the
 * DispatchOutcome taxonomy.
 *
 *   2xx           → Created
 *   401 / 403     → AuthRejected        (never retried)
 *   422           → ValidationRejected  (never retried)
 *   429           → retry after Retry-After, or RateLimited when the wait is too long
 *   5xx / network → retry with backoff, then TransientFailure
 *   other         → FatalFailure
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { logger } from './observabilityService';
import { toInboxLeadRequest } from './fieldMapper';
import { FixedWindowRateLimiter, RateLimitQueueFullError, RateLimitWaitTimeoutError } from '../utils/rateLimiter';
import {
    BackoffOptions,
    OperationAbortedError,
    Sleep,
    computeBackoffDelay,
    parseRetryAfter,
    sleep as defaultSleep
} from '../utils/backoff';
import {
    DispatchOutcome,
    FieldErrors,
    NormalizedLead,
    OutcomeKind,
    PageResponse,
    TerminalOutcome,
    isJsonObject
} from '../types';

export interface RetryPolicy extends BackoffOptions {
    maxAttempts: number;
    retryAfterMaxMs: number;
}

export interface LeadInboxClientOptions {
    url: string;
    token: string;
    timeoutMs: number;
    retry: RetryPolicy;
    rateLimiter: FixedWindowRateLimiter;
    http?: AxiosInstance;
    sleep?: Sleep;
    random?: () => number;
}

export interface RequestOptions {
    signal?: AbortSignal;
}

interface HttpRequest {
    method: 'GET' | 'POST';
    url: string;
    params?: Record<string, string | number>;
    data?: unknown;
    headers?: Record<string, string>;
}

type AttemptResult =
    | { type: 'response'; response: PageResponse; text: string; attempts: number }
    | { type: 'terminal'; outcome: TerminalOutcome };

export type PageFetchResult =
    | { ok: true; page: PageResponse; attempts: number }
    | { ok: false; outcome: TerminalOutcome };

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const MAX_LOGGED_BODY = 2000;

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

function flattenHeaders(headers: object): Record<string, string> {
    const flat: Record<string, string> = {};
    const entries: [string, unknown][] = Object.entries(headers);
    for (const [name, value] of entries) {
        if (typeof value === 'string') {
            flat[name.toLowerCase()] = value;
        } else if (typeof value === 'number' || typeof value === 'boolean') {
            flat[name.toLowerCase()] = String(value);
        } else if (Array.isArray(value)) {
            flat[name.toLowerCase()] = value.join(', ');
        }
    }
    return flat;
}

function parseBody(text: string): unknown {
    if (text.trim().length === 0) return null;
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

function toText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === undefined || data === null) return '';
    if (Buffer.isBuffer(data)) return data.toString('utf-8');
    return JSON.stringify(data);
}

function readRemoteId(body: unknown): string | null {
    if (!isJsonObject(body)) return null;

    const wrapped = body.inbox_lead;
    const candidates = [isJsonObject(wrapped) ? wrapped.id : undefined, body.id];
    for (const id of candidates) {
        if (typeof id === 'string' && id.length > 0) return id;
        if (typeof id === 'number' && Number.isFinite(id)) return String(id);
    }
    return null;
}

/**
 * `{ inbox_lead: { errors: { field: [messages] } } }`, or null when the body
 * does not carry that structure.
 */
export function readFieldErrors(body: unknown): FieldErrors | null {
    if (!isJsonObject(body) || !isJsonObject(body.inbox_lead)) return null;

    const errors = body.inbox_lead.errors;
    if (!isJsonObject(errors)) return null;

    const fieldErrors: FieldErrors = {};
    for (const [field, messages] of Object.entries(errors)) {
        if (typeof messages === 'string') {
            fieldErrors[field] = [messages];
        } else if (Array.isArray(messages)) {
            fieldErrors[field] = messages.map(message => typeof message === 'string' ? message : JSON.stringify(message));
        } else {
            return null;
        }
    }
    return fieldErrors;
}

function truncate(text: string): string {
    return text.length > MAX_LOGGED_BODY ? `${text.slice(0, MAX_LOGGED_BODY)}...` : text;
}

// ============================================================================
// CLIENT
// ============================================================================

export class LeadInboxClient {
    private readonly http: AxiosInstance;
    private readonly sleep: Sleep;
    private readonly random: () => number;
    private readonly log = logger.child({ component: 'lead-inbox-client' });

    constructor(private readonly options: LeadInboxClientOptions) {
        this.http = options.http ?? axios.create();
        this.sleep = options.sleep ?? defaultSleep;
        this.random = options.random ?? Math.random;

        this.log.info('[LEAD_INBOX] Client initialized', {
            url: options.url,
            tokenLength: options.token.length,
            timeoutMs: options.timeoutMs,
            maxAttempts: options.retry.maxAttempts
        });
    }

    get rateLimiter(): FixedWindowRateLimiter {
        return this.options.rateLimiter;
    }

    /**
     * POST one normalized lead. Always resolves with an outcome; never throws
     * for downstream behaviour.
     */
    async dispatch(lead: NormalizedLead, requestOptions: RequestOptions = {}): Promise<DispatchOutcome> {
        const result = await this.execute({
            method: 'POST',
            url: this.options.url,
            data: toInboxLeadRequest(lead, this.options.token),
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' }
        }, requestOptions.signal);

        if (result.type === 'terminal') {
            return result.outcome;
        }

        const { response, text, attempts } = result;
        const { status } = response;

        if (status >= 200 && status < 300) {
            const remoteId = readRemoteId(response.body);
            if (remoteId === null) {
                this.log.warn('[LEAD_INBOX] Lead accepted without an id in the response', { status, attempts });
            }
            return { kind: OutcomeKind.CREATED, remoteId, attempts };
        }

        if (status === 422) {
            const fieldErrors = readFieldErrors(response.body);
            if (fieldErrors) {
                this.log.warn('[LEAD_INBOX] Lead rejected by downstream validation', { fields: Object.keys(fieldErrors), attempts });
                return { kind: OutcomeKind.VALIDATION_REJECTED, origin: 'downstream', fieldErrors, attempts };
            }
        }

        return this.nonRetryable(status, text, attempts);
    }

    /**
     * GET one page for the bulk sync engine. Accepts a path relative to the
     * configured base or an absolute next-link URL.
     */
    async fetchPage(
        url: string,
        params: Record<string, string | number> | undefined,
        headers: Record<string, string>,
        signal?: AbortSignal
    ): Promise<PageFetchResult> {
        const result = await this.execute({ method: 'GET', url, params, headers }, signal);

        if (result.type === 'terminal') {
            return { ok: false, outcome: result.outcome };
        }

        const { response, text, attempts } = result;
        if (response.status >= 200 && response.status < 300) {
            return { ok: true, page: response, attempts };
        }
        return { ok: false, outcome: this.nonRetryable(response.status, text, attempts) };
    }

    private nonRetryable(status: number, text: string, attempts: number): TerminalOutcome {
        if (status === 401 || status === 403) {
            this.log.error('[LEAD_INBOX] Authentication rejected, check the inbox token', undefined, { status });
            return { kind: OutcomeKind.AUTH_REJECTED, status, attempts };
        }

        this.log.error('[LEAD_INBOX] Unexpected response', undefined, { status, attempts, body: truncate(text) });
        return { kind: OutcomeKind.FATAL_FAILURE, cause: `Unexpected HTTP status ${status}`, status, attempts };
    }

    // ========================================================================
    // RETRY LOOP
    // ========================================================================

    /**
     * Issue a request with slot acquisition, per-call timeout and bounded
     * retries. Returns the first non-retryable response, or a terminal outcome.
     */
    private async execute(request: HttpRequest, signal?: AbortSignal): Promise<AttemptResult> {
        const { retry } = this.options;
        let lastCause = 'no attempt made';

        for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
            try {
                await this.rateLimiter.acquire(signal);
            } catch (error) {
                return { type: 'terminal', outcome: this.waitFailed(error, attempt - 1) };
            }

            let delayMs: number;
            try {
                const response = await this.send(request, signal);
                const { status } = response.response;

                if (status === 429) {
                    const retryAfterMs = parseRetryAfter(response.response.headers['retry-after']);
                    if (retryAfterMs !== null && retryAfterMs > retry.retryAfterMaxMs) {
                        this.log.warn('[LEAD_INBOX] Rate limited beyond the allowed wait', { retryAfterMs, attempt });
                        return {
                            type: 'terminal',
                            outcome: { kind: OutcomeKind.RATE_LIMITED, retryAfterMs, attempts: attempt }
                        };
                    }
                    lastCause = 'HTTP 429';
                    delayMs = retryAfterMs ?? computeBackoffDelay(attempt, retry, this.random);
                } else if (status >= 500) {
                    lastCause = `HTTP ${status}`;
                    delayMs = computeBackoffDelay(attempt, retry, this.random);
                } else {
                    return { type: 'response', ...response, attempts: attempt };
                }
            } catch (error) {
                if (signal?.aborted) {
                    return { type: 'terminal', outcome: { kind: OutcomeKind.TRANSIENT_FAILURE, cause: 'timeout', attempts: attempt } };
                }
                if (!(error instanceof AxiosError)) {
                    throw error;
                }
                lastCause = error.code && TIMEOUT_CODES.has(error.code) ? 'timeout' : `network error: ${error.message}`;
                delayMs = computeBackoffDelay(attempt, retry, this.random);
            }

            if (attempt === retry.maxAttempts) break;

            this.log.warn('[LEAD_INBOX] Retryable failure, backing off', {
                method: request.method,
                cause: lastCause,
                attempt,
                delayMs
            });

            try {
                await this.sleep(delayMs, signal);
            } catch (error) {
                return { type: 'terminal', outcome: this.waitFailed(error, attempt) };
            }
        }

        this.log.warn('[LEAD_INBOX] Retries exhausted', { method: request.method, cause: lastCause, attempts: retry.maxAttempts });
        return {
            type: 'terminal',
            outcome: { kind: OutcomeKind.TRANSIENT_FAILURE, cause: lastCause, attempts: retry.maxAttempts }
        };
    }

    private waitFailed(error: unknown, attempts: number): TerminalOutcome {
        if (error instanceof OperationAbortedError) {
            return { kind: OutcomeKind.TRANSIENT_FAILURE, cause: 'timeout', attempts };
        }
        if (error instanceof RateLimitQueueFullError || error instanceof RateLimitWaitTimeoutError) {
            return { kind: OutcomeKind.TRANSIENT_FAILURE, cause: error.message, attempts };
        }
        throw error;
    }

    private async send(request: HttpRequest, signal?: AbortSignal): Promise<{ response: PageResponse; text: string }> {
        const response: AxiosResponse<unknown> = await this.http.request<unknown>({
            method: request.method,
            url: request.url,
            params: request.params,
            data: request.data,
            headers: request.headers,
            timeout: this.options.timeoutMs,
            signal,
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true
        });

        const text = toText(response.data);
        return {
            response: {
                status: response.status,
                headers: flattenHeaders(response.headers),
                body: parseBody(text)
            },
            text
        };
    }
}
