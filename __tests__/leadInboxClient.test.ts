import { LeadInboxClient, RetryPolicy, readFieldErrors } from '../src/services/leadInboxClient';
import { logger } from '../src/services/observabilityService';
import { FixedWindowRateLimiter } from '../src/utils/rateLimiter';
import { OperationAbortedError } from '../src/utils/backoff';
import { NormalizedLead, OutcomeKind } from '../src/types';
import { FakeReply, fakeHttp } from './helpers/fakeHttp';

jest.mock('../src/services/observabilityService', () => {
    const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn(), child: jest.fn() };
    mockLogger.child.mockReturnValue(mockLogger);
    return { logger: mockLogger };
});

const lead: NormalizedLead = {
    firstName: 'Jane',
    lastName: 'Doe',
    message: 'Please call',
    email: 'jane@example.com',
    phone: '555',
    referringUrl: 'https://example.com',
    source: 'Web'
};

function buildClient(replies: FakeReply[], retry: Partial<RetryPolicy> = {}) {
    const { http, requests } = fakeHttp(replies);

    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);

    const client = new LeadInboxClient({
        url: 'https://inbox.test/inbox_leads',
        token: 'test-token',
        timeoutMs: 1000,
        retry: {
            maxAttempts: 3,
            baseDelayMs: 1000,
            maxDelayMs: 30000,
            jitter: false,
            retryAfterMaxMs: 60000,
            ...retry
        },
        rateLimiter: new FixedWindowRateLimiter({ maxRequests: 100, windowMs: 60000 }),
        http,
        sleep
    });

    return { client, requests, sleep };
}

function sleptFor(sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>): number[] {
    return sleep.mock.calls.map(([ms]) => ms);
}

describe('LeadInboxClient', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('dispatch', () => {
        it('should POST the lead-inbox body and return Created with the remote id', async () => {
            const { client, requests } = buildClient([{ status: 201, body: { inbox_lead: { id: 987 } } }]);

            const outcome = await client.dispatch(lead);

            expect(outcome).toEqual({ kind: OutcomeKind.CREATED, remoteId: '987', attempts: 1 });
            expect(requests).toHaveLength(1);
            expect(requests[0].method).toBe('post');
            expect(requests[0].url).toBe('https://inbox.test/inbox_leads');
            expect(JSON.parse(String(requests[0].data))).toEqual({
                inbox_lead: {
                    from_first: 'Jane',
                    from_last: 'Doe',
                    from_message: 'Please call',
                    from_email: 'jane@example.com',
                    from_phone: '555',
                    referring_url: 'https://example.com',
                    from_source: 'Web'
                },
                inbox_lead_token: 'test-token'
            });
        });

        it('should fall back to a top-level id', async () => {
            const { client } = buildClient([{ status: 200, body: { id: 'abc-1' } }]);

            expect(await client.dispatch(lead)).toEqual({ kind: OutcomeKind.CREATED, remoteId: 'abc-1', attempts: 1 });
        });

        it('should report Created with a null id when the response carries none', async () => {
            const { client } = buildClient([{ status: 201, body: 'created' }]);

            expect(await client.dispatch(lead)).toEqual({ kind: OutcomeKind.CREATED, remoteId: null, attempts: 1 });
            expect(logger.warn).toHaveBeenCalledWith(
                '[LEAD_INBOX] Lead accepted without an id in the response',
                { status: 201, attempts: 1 }
            );
        });

        it('should retry 5xx responses with backoff and give up after the attempt ceiling', async () => {
            const { client, requests, sleep } = buildClient([{ status: 500 }, { status: 502 }, { status: 500 }]);

            const outcome = await client.dispatch(lead);

            expect(outcome).toEqual({ kind: OutcomeKind.TRANSIENT_FAILURE, cause: 'HTTP 500', attempts: 3 });
            expect(requests).toHaveLength(3);
            expect(sleptFor(sleep)).toEqual([1000, 2000]);
        });

        it('should wait for Retry-After on 429 and then succeed', async () => {
            const { client, sleep } = buildClient([
                { status: 429, headers: { 'Retry-After': '2' } },
                { status: 201, body: { inbox_lead: { id: 5 } } }
            ]);

            const outcome = await client.dispatch(lead);

            expect(outcome).toEqual({ kind: OutcomeKind.CREATED, remoteId: '5', attempts: 2 });
            expect(sleptFor(sleep)).toEqual([2000]);
        });

        it('should exhaust to TransientFailure when every attempt is rate limited', async () => {
            const limited = { status: 429, headers: { 'Retry-After': '2' } };
            const { client, requests, sleep } = buildClient([limited, limited, limited]);

            const outcome = await client.dispatch(lead);

            expect(outcome).toEqual({ kind: OutcomeKind.TRANSIENT_FAILURE, cause: 'HTTP 429', attempts: 3 });
            expect(requests).toHaveLength(3);
            expect(sleptFor(sleep)).toEqual([2000, 2000]);
        });

        it('should use its own backoff for 429 without Retry-After', async () => {
            const { client, sleep } = buildClient([{ status: 429 }, { status: 201, body: { id: 1 } }]);

            await client.dispatch(lead);

            expect(sleptFor(sleep)).toEqual([1000]);
        });

        it('should surface RateLimited instead of waiting longer than allowed', async () => {
            const { client, requests, sleep } = buildClient([{ status: 429, headers: { 'Retry-After': '120' } }]);

            const outcome = await client.dispatch(lead);

            expect(outcome).toEqual({ kind: OutcomeKind.RATE_LIMITED, retryAfterMs: 120000, attempts: 1 });
            expect(requests).toHaveLength(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it.each([401, 403])('should return AuthRejected for %i without retrying', async (status) => {
            const { client, requests } = buildClient([{ status }]);

            expect(await client.dispatch(lead)).toEqual({ kind: OutcomeKind.AUTH_REJECTED, status, attempts: 1 });
            expect(requests).toHaveLength(1);
        });

        it('should return downstream ValidationRejected with field errors for 422', async () => {
            const { client, requests } = buildClient([{
                status: 422,
                body: { inbox_lead: { errors: { from_email: ['is invalid'], from_phone: 'is too short' } } }
            }]);

            expect(await client.dispatch(lead)).toEqual({
                kind: OutcomeKind.VALIDATION_REJECTED,
                origin: 'downstream',
                fieldErrors: { from_email: ['is invalid'], from_phone: ['is too short'] },
                attempts: 1
            });
            expect(requests).toHaveLength(1);
        });

        it('should treat a 422 without structured errors as fatal', async () => {
            const { client } = buildClient([{ status: 422, body: 'Unprocessable' }]);

            expect(await client.dispatch(lead)).toEqual({
                kind: OutcomeKind.FATAL_FAILURE,
                cause: 'Unexpected HTTP status 422',
                status: 422,
                attempts: 1
            });
        });

        it('should return FatalFailure for other statuses and log the raw body', async () => {
            const { client, requests } = buildClient([{ status: 418, body: 'teapot' }]);

            const outcome = await client.dispatch(lead);

            expect(outcome).toEqual({
                kind: OutcomeKind.FATAL_FAILURE,
                cause: 'Unexpected HTTP status 418',
                status: 418,
                attempts: 1
            });
            expect(requests).toHaveLength(1);
            expect(logger.error).toHaveBeenCalledWith(
                '[LEAD_INBOX] Unexpected response',
                undefined,
                { status: 418, attempts: 1, body: 'teapot' }
            );
        });

        it('should retry network errors', async () => {
            const { client } = buildClient(['network', 'network', { status: 201, body: { id: 7 } }]);

            expect(await client.dispatch(lead)).toEqual({ kind: OutcomeKind.CREATED, remoteId: '7', attempts: 3 });
        });

        it('should report per-call timeouts as a transient timeout', async () => {
            const { client } = buildClient(['timeout', 'timeout', 'timeout']);

            expect(await client.dispatch(lead)).toEqual({
                kind: OutcomeKind.TRANSIENT_FAILURE,
                cause: 'timeout',
                attempts: 3
            });
        });

        it('should honour a configured attempt ceiling', async () => {
            const { client, requests } = buildClient([{ status: 503 }], { maxAttempts: 1 });

            expect(await client.dispatch(lead)).toEqual({
                kind: OutcomeKind.TRANSIENT_FAILURE,
                cause: 'HTTP 503',
                attempts: 1
            });
            expect(requests).toHaveLength(1);
        });

        it('should not call out when the signal is already aborted', async () => {
            const { client, requests } = buildClient([]);

            const outcome = await client.dispatch(lead, { signal: AbortSignal.abort() });

            expect(outcome).toEqual({ kind: OutcomeKind.TRANSIENT_FAILURE, cause: 'timeout', attempts: 0 });
            expect(requests).toHaveLength(0);
        });

        it('should give up with TransientFailure when no rate-limit slot frees up in time', async () => {
            const { http, requests } = fakeHttp([{ status: 201, body: { id: 1 } }]);
            const rateLimiter = new FixedWindowRateLimiter({ maxRequests: 1, windowMs: 60000, maxWaitMs: 0 });
            await rateLimiter.acquire();
            const client = new LeadInboxClient({
                url: 'https://inbox.test/inbox_leads',
                token: 'test-token',
                timeoutMs: 1000,
                retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000, jitter: false, retryAfterMaxMs: 60000 },
                rateLimiter,
                http
            });

            expect(await client.dispatch(lead)).toEqual({
                kind: OutcomeKind.TRANSIENT_FAILURE,
                cause: 'Rate limiter wait exceeded 0ms',
                attempts: 0
            });
            expect(requests).toHaveLength(0);
        });

        it('should stop backing off when the signal fires', async () => {
            const { client, sleep } = buildClient([{ status: 500 }]);
            sleep.mockRejectedValueOnce(new OperationAbortedError('timeout'));

            expect(await client.dispatch(lead)).toEqual({
                kind: OutcomeKind.TRANSIENT_FAILURE,
                cause: 'timeout',
                attempts: 1
            });
        });
    });

    describe('fetchPage', () => {
        it('should GET with params and headers and return the parsed page', async () => {
            const { client, requests } = buildClient([{
                status: 200,
                body: { data: [{ id: 1 }] },
                headers: { 'X-Has-Next-Page': 'false' }
            }]);

            const result = await client.fetchPage(
                'https://app.test/api/v4/contacts.json',
                { page: 1, per_page: 50 },
                { Authorization: 'Bearer test-access' }
            );

            expect(result).toEqual({
                ok: true,
                attempts: 1,
                page: { status: 200, headers: { 'x-has-next-page': 'false' }, body: { data: [{ id: 1 }] } }
            });
            expect(requests[0].method).toBe('get');
            expect(requests[0].params).toEqual({ page: 1, per_page: 50 });
            expect(requests[0].headers.Authorization).toBe('Bearer test-access');
        });

        it('should turn non-success pages into terminal outcomes', async () => {
            const { client } = buildClient([{ status: 404, body: 'missing' }]);

            expect(await client.fetchPage('https://app.test/x', undefined, {})).toEqual({
                ok: false,
                outcome: { kind: OutcomeKind.FATAL_FAILURE, cause: 'Unexpected HTTP status 404', status: 404, attempts: 1 }
            });
        });
    });

    describe('readFieldErrors', () => {
        it('should return null for bodies without the errors structure', () => {
            expect(readFieldErrors(null)).toBeNull();
            expect(readFieldErrors({ inbox_lead: {} })).toBeNull();
            expect(readFieldErrors({ inbox_lead: { errors: { from_email: 3 } } })).toBeNull();
        });
    });
});
