/**
 * Configuration
 *
 * Read once at start-up from the environment (after dotenv has run), validated
 * with Zod and frozen. Nothing mutates it afterwards.
 */

import { z } from 'zod';
import { ConfigError } from './utils/appError';
import { FallbackPolicy, LEAD_FIELDS } from './types';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const DEFAULT_FALLBACK_POLICY: FallbackPolicy = Object.freeze({
    firstName: 'Unknown',
    lastName: 'Contact',
    message: 'Voice agent intake submission',
    email: 'unknown@intake-system.local',
    phone: '0000000000',
    referringUrl: 'https://intake-system.local',
    source: 'Voice Agent Bot'
});

export interface PaginationHeaderNames {
    currentPage: string;
    perPage: string;
    totalCount: string;
    hasNext: string;
}

export interface AppConfig {
    nodeEnv: string;
    port: number;
    logLevel: LogLevel;
    frontendUrl: string | null;
    requestBudgetMs: number;
    fallbackPolicy: FallbackPolicy;
    leadInbox: {
        url: string;
        token: string;
        timeoutMs: number;
    };
    rateLimit: {
        maxRequests: number;
        windowMs: number;
        maxWaitMs: number;
        queueLimit: number;
    };
    retry: {
        maxAttempts: number;
        baseDelayMs: number;
        maxDelayMs: number;
        jitter: boolean;
        retryAfterMaxMs: number;
    };
    sync: {
        baseUrl: string;
        pathTemplate: string;
        accessToken: string | null;
        resources: readonly string[];
        pageSize: number;
        maxPages: number;
        itemsPath: string;
        nextLinkPath: string;
        headers: PaginationHeaderNames;
    };
    security: {
        apiKeyHashes: readonly string[];
        inboundPoints: number;
        inboundDurationSeconds: number;
    };
}

// ============================================================================
// SCHEMA
// ============================================================================

const flag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

const list = z.string().transform(value =>
    value.split(',').map(item => item.trim()).filter(item => item.length > 0)
);

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: positiveInt.default(8000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    FRONTEND_URL: z.string().url().optional(),

    LEAD_INBOX_URL: z.string().url().default('https://grow.clio.com/inbox_leads'),
    LEAD_INBOX_TOKEN: z.string().default(''),
    REQUEST_TIMEOUT_MS: positiveInt.default(30_000),
    REQUEST_BUDGET_MS: nonNegativeInt.default(0),

    RATE_LIMIT_MAX_REQUESTS: positiveInt.default(100),
    RATE_LIMIT_WINDOW_MS: positiveInt.default(60_000),
    RATE_LIMIT_MAX_WAIT_MS: nonNegativeInt.optional(),
    RATE_LIMIT_QUEUE_LIMIT: positiveInt.default(1_000),

    RETRY_MAX_ATTEMPTS: positiveInt.default(3),
    RETRY_BASE_DELAY_MS: nonNegativeInt.default(1_000),
    RETRY_MAX_DELAY_MS: nonNegativeInt.default(30_000),
    RETRY_JITTER: flag.default('true'),
    RETRY_AFTER_MAX_MS: nonNegativeInt.default(60_000),

    FALLBACK_POLICY: z.string().optional(),

    SYNC_BASE_URL: z.string().url().default('https://app.clio.com'),
    SYNC_PATH_TEMPLATE: z.string().includes('{resource}').default('/api/v4/{resource}.json'),
    SYNC_ACCESS_TOKEN: z.string().optional(),
    SYNC_RESOURCES: list.default('contacts'),
    SYNC_PAGE_SIZE: positiveInt.default(50),
    SYNC_MAX_PAGES: positiveInt.default(1_000),
    SYNC_ITEMS_PATH: z.string().default('data'),
    SYNC_NEXT_LINK_PATH: z.string().default('meta.paging.next'),
    SYNC_HEADER_CURRENT_PAGE: z.string().default('X-Current-Page'),
    SYNC_HEADER_PER_PAGE: z.string().default('X-Per-Page'),
    SYNC_HEADER_TOTAL_COUNT: z.string().default('X-Total-Count'),
    SYNC_HEADER_HAS_NEXT: z.string().default('X-Has-Next-Page'),

    INTAKE_API_KEY_HASHES: list.default(''),
    INBOUND_RATE_LIMIT_POINTS: positiveInt.default(200),
    INBOUND_RATE_LIMIT_DURATION_S: positiveInt.default(60)
});

const nonEmpty = z.string().trim().min(1, 'must be a non-empty string');

const fallbackOverrideSchema = z.object({
    firstName: nonEmpty,
    lastName: nonEmpty,
    message: nonEmpty,
    email: nonEmpty,
    phone: nonEmpty,
    referringUrl: nonEmpty,
    source: nonEmpty
}).partial().strict();

// ============================================================================
// LOADING
// ============================================================================

function formatIssues(error: z.ZodError, prefix = ''): string[] {
    return error.issues.map(issue => `${prefix}${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Merge an optional JSON override onto the default policy and audit the result:
 * every field must end up with a non-empty default.
 */
export function buildFallbackPolicy(override?: string): FallbackPolicy {
    if (!override) return DEFAULT_FALLBACK_POLICY;

    let parsed: unknown;
    try {
        parsed = JSON.parse(override);
    } catch {
        throw new ConfigError(['FALLBACK_POLICY: not valid JSON']);
    }

    const result = fallbackOverrideSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigError(formatIssues(result.error, 'FALLBACK_POLICY.'));
    }

    const policy = { ...DEFAULT_FALLBACK_POLICY, ...result.data };
    const empty = LEAD_FIELDS.filter(field => policy[field].trim().length === 0);
    if (empty.length > 0) {
        throw new ConfigError(empty.map(field => `FALLBACK_POLICY.${field}: empty default`));
    }
    return Object.freeze(policy);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Blank lines in .env files arrive as empty strings; treat them as unset
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const result = envSchema.safeParse(present);
    if (!result.success) {
        throw new ConfigError(formatIssues(result.error));
    }
    const vars = result.data;

    if (vars.NODE_ENV === 'production' && !vars.LEAD_INBOX_TOKEN) {
        throw new ConfigError(['LEAD_INBOX_TOKEN: required in production']);
    }

    const config: AppConfig = {
        nodeEnv: vars.NODE_ENV,
        port: vars.PORT,
        logLevel: vars.LOG_LEVEL,
        frontendUrl: vars.FRONTEND_URL ?? null,
        requestBudgetMs: vars.REQUEST_BUDGET_MS,
        fallbackPolicy: buildFallbackPolicy(vars.FALLBACK_POLICY),
        leadInbox: Object.freeze({
            url: vars.LEAD_INBOX_URL,
            token: vars.LEAD_INBOX_TOKEN,
            timeoutMs: vars.REQUEST_TIMEOUT_MS
        }),
        rateLimit: Object.freeze({
            maxRequests: vars.RATE_LIMIT_MAX_REQUESTS,
            windowMs: vars.RATE_LIMIT_WINDOW_MS,
            maxWaitMs: vars.RATE_LIMIT_MAX_WAIT_MS ?? vars.RATE_LIMIT_WINDOW_MS,
            queueLimit: vars.RATE_LIMIT_QUEUE_LIMIT
        }),
        retry: Object.freeze({
            maxAttempts: vars.RETRY_MAX_ATTEMPTS,
            baseDelayMs: vars.RETRY_BASE_DELAY_MS,
            maxDelayMs: Math.max(vars.RETRY_MAX_DELAY_MS, vars.RETRY_BASE_DELAY_MS),
            jitter: vars.RETRY_JITTER,
            retryAfterMaxMs: vars.RETRY_AFTER_MAX_MS
        }),
        sync: Object.freeze({
            baseUrl: vars.SYNC_BASE_URL,
            pathTemplate: vars.SYNC_PATH_TEMPLATE,
            accessToken: vars.SYNC_ACCESS_TOKEN ?? null,
            resources: Object.freeze([...vars.SYNC_RESOURCES]),
            pageSize: vars.SYNC_PAGE_SIZE,
            maxPages: vars.SYNC_MAX_PAGES,
            itemsPath: vars.SYNC_ITEMS_PATH,
            nextLinkPath: vars.SYNC_NEXT_LINK_PATH,
            headers: Object.freeze({
                currentPage: vars.SYNC_HEADER_CURRENT_PAGE,
                perPage: vars.SYNC_HEADER_PER_PAGE,
                totalCount: vars.SYNC_HEADER_TOTAL_COUNT,
                hasNext: vars.SYNC_HEADER_HAS_NEXT
            })
        }),
        security: Object.freeze({
            apiKeyHashes: vars.INTAKE_API_KEY_HASHES.map(hash => hash.toLowerCase()),
            inboundPoints: vars.INBOUND_RATE_LIMIT_POINTS,
            inboundDurationSeconds: vars.INBOUND_RATE_LIMIT_DURATION_S
        })
    };

    return Object.freeze(config);
}
