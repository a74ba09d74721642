/**
 * Observability Service
 *
 * JSON-line logging, in-process counters for HTTP traffic and lead dispatch
 * outcomes, and the health report served on /health. Everything here is
 * per-process; nothing is exported to an external backend.
 */

import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { LOG_LEVELS, LogLevel } from '../config';
import { OutcomeKind, OutcomeRecord, OutcomeSink } from '../types';

// ============================================================================
// CORRELATION IDS
// ============================================================================

const CORRELATION_HEADERS = ['x-correlation-id', 'x-request-id'] as const;

/**
 * Reuse the caller's correlation id when it sends one, mint one otherwise, and
 * echo it back so producers can match our logs to their call.
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
    let correlationId: string | undefined;
    for (const header of CORRELATION_HEADERS) {
        const value = req.headers[header];
        if (typeof value === 'string' && value.trim().length > 0) {
            correlationId = value.trim();
            break;
        }
    }

    req.correlationId = correlationId ?? randomUUID();
    res.setHeader('X-Correlation-ID', req.correlationId);
    next();
}

// ============================================================================
// STRUCTURED LOGGING
// ============================================================================

type LogFields = Record<string, unknown>;
type EmitLevel = Exclude<LogLevel, 'silent'>;

interface LogLine {
    timestamp: string;
    level: EmitLevel;
    message: string;
    correlationId?: string;
    context: LogFields;
    error?: { name: string; message: string; stack?: string };
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function levelFromEnv(): LogLevel {
    const raw = process.env.LOG_LEVEL;
    return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

/**
 * Writes one JSON object per line. Child loggers carry extra bound fields and
 * share the root's threshold, so `setLevel` at start-up reaches every child
 * created at import time.
 */
export class StructuredLogger {
    private constructor(
        private readonly threshold: { level: LogLevel },
        private readonly bound: LogFields
    ) { }

    static create(level: LogLevel = levelFromEnv()): StructuredLogger {
        return new StructuredLogger({ level }, {});
    }

    child(fields: LogFields): StructuredLogger {
        return new StructuredLogger(this.threshold, { ...this.bound, ...fields });
    }

    setLevel(level: LogLevel): void {
        this.threshold.level = level;
    }

    getLevel(): LogLevel {
        return this.threshold.level;
    }

    debug(message: string, fields?: LogFields): void {
        this.write('debug', message, fields);
    }

    info(message: string, fields?: LogFields): void {
        this.write('info', message, fields);
    }

    warn(message: string, fields?: LogFields): void {
        this.write('warn', message, fields);
    }

    error(message: string, error?: Error, fields?: LogFields): void {
        this.write('error', message, fields, error);
    }

    private write(level: EmitLevel, message: string, fields?: LogFields, error?: Error): void {
        if (SEVERITY[level] < SEVERITY[this.threshold.level]) return;

        const { correlationId, ...context } = { ...this.bound, ...fields };
        const line: LogLine = { timestamp: new Date().toISOString(), level, message, context };
        if (typeof correlationId === 'string') {
            line.correlationId = correlationId;
        }
        if (error) {
            line.error = { name: error.name, message: error.message, stack: error.stack };
        }

        const text = JSON.stringify(line);
        if (level === 'error' || level === 'warn') {
            process.stderr.write(`${text}\n`);
        } else {
            process.stdout.write(`${text}\n`);
        }
    }
}

export const logger = StructuredLogger.create();

// ============================================================================
// COUNTERS
// ============================================================================

const LATENCY_WINDOW = 1000;

type Tally = Record<string, number>;

interface Counters {
    startTime: number;
    requests: { total: number; serverErrors: number; byRoute: Tally; byStatus: Tally };
    latencies: number[];
    dispatch: { total: number; attempts: number; byOutcome: Tally; byShape: Tally; fallbacksApplied: Tally };
}

function freshCounters(): Counters {
    return {
        startTime: Date.now(),
        requests: { total: 0, serverErrors: 0, byRoute: {}, byStatus: {} },
        latencies: [],
        dispatch: { total: 0, attempts: 0, byOutcome: {}, byShape: {}, fallbacksApplied: {} }
    };
}

let counters = freshCounters();

function bump(tally: Tally, key: string, by = 1): void {
    tally[key] = (tally[key] ?? 0) + by;
}

function percentile(sorted: number[], fraction: number): number {
    if (sorted.length === 0) return 0;
    return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))];
}

/**
 * Counts every finished response by route template and status, and keeps the
 * latest latencies for the percentile figures.
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const startedAt = Date.now();

    res.on('finish', () => {
        const template: unknown = req.route?.path;
        const route = typeof template === 'string' ? `${req.baseUrl}${template}` : req.path;

        counters.requests.total++;
        bump(counters.requests.byRoute, `${req.method} ${route}`);
        bump(counters.requests.byStatus, String(res.statusCode));
        if (res.statusCode >= 500) counters.requests.serverErrors++;

        counters.latencies.push(Date.now() - startedAt);
        if (counters.latencies.length > LATENCY_WINDOW) {
            counters.latencies.splice(0, counters.latencies.length - LATENCY_WINDOW);
        }
    });

    next();
}

export interface MetricsSnapshot {
    startTime: number;
    requests: Counters['requests'];
    latency: { avg: number; p95: number; p99: number };
    dispatch: Counters['dispatch'];
}

export function getMetrics(): MetricsSnapshot {
    const sorted = [...counters.latencies].sort((a, b) => a - b);
    const sum = sorted.reduce((total, value) => total + value, 0);
    const { requests, dispatch } = counters;

    return {
        startTime: counters.startTime,
        requests: {
            ...requests,
            byRoute: { ...requests.byRoute },
            byStatus: { ...requests.byStatus }
        },
        latency: {
            avg: sorted.length > 0 ? Math.round(sum / sorted.length) : 0,
            p95: percentile(sorted, 0.95),
            p99: percentile(sorted, 0.99)
        },
        dispatch: {
            ...dispatch,
            byOutcome: { ...dispatch.byOutcome },
            byShape: { ...dispatch.byShape },
            fallbacksApplied: { ...dispatch.fallbacksApplied }
        }
    };
}

export function resetMetrics(): void {
    counters = freshCounters();
}

// ============================================================================
// DISPATCH OUTCOME SINK
// ============================================================================

/**
 * Default pipeline sink: one log line and one counter update per lead.
 */
export const outcomeLogSink: OutcomeSink = {
    record(entry: OutcomeRecord): void {
        const { dispatch } = counters;
        dispatch.total++;
        dispatch.attempts += entry.attempts;
        bump(dispatch.byOutcome, entry.outcome);
        bump(dispatch.byShape, entry.shape);
        for (const field of entry.appliedFallbacks) {
            bump(dispatch.fallbacksApplied, field);
        }

        const fields = { ...entry, fallbackCount: entry.appliedFallbacks.length };
        if (entry.outcome === OutcomeKind.CREATED) {
            logger.info('[PIPELINE] Lead dispatch outcome', fields);
        } else {
            logger.warn('[PIPELINE] Lead dispatch outcome', fields);
        }
    }
};

// ============================================================================
// HEALTH
// ============================================================================

type HealthState = 'healthy' | 'degraded' | 'unhealthy';

interface ComponentHealth {
    status: HealthState;
    lastCheck: string;
    details: Record<string, unknown>;
}

export interface HealthStatus {
    status: HealthState;
    components: Record<string, ComponentHealth>;
    uptime: number;
    version: string;
}

export interface RateLimiterHealthSource {
    getStats(): { used: number; limit: number; queueLength: number; windowResetsInMs: number };
}

const STATE_ORDER: HealthState[] = ['healthy', 'degraded', 'unhealthy'];

/**
 * Dispatch is degraded while callers wait behind a saturated window; the lead
 * inbox is degraded once it has rejected our credentials.
 */
export function getHealthStatus(rateLimiter: RateLimiterHealthSource): HealthStatus {
    const lastCheck = new Date().toISOString();
    const limiter = rateLimiter.getStats();
    const { byOutcome } = counters.dispatch;

    const components: Record<string, ComponentHealth> = {
        dispatch: {
            status: limiter.queueLength > 0 ? 'degraded' : 'healthy',
            lastCheck,
            details: { ...limiter }
        },
        leadInbox: {
            status: (byOutcome[OutcomeKind.AUTH_REJECTED] ?? 0) > 0 ? 'degraded' : 'healthy',
            lastCheck,
            details: { outcomes: { ...byOutcome } }
        }
    };

    const worst = Math.max(...Object.values(components).map(component => STATE_ORDER.indexOf(component.status)));

    return {
        status: STATE_ORDER[worst],
        components,
        uptime: Date.now() - counters.startTime,
        version: process.env.APP_VERSION || '1.0.0'
    };
}

// ============================================================================
// REQUEST LOGGING
// ============================================================================

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
    const startedAt = Date.now();

    res.on('finish', () => {
        logger.info('[HTTP] Request completed', {
            correlationId: req.correlationId,
            method: req.method,
            path: req.path,
            status: res.statusCode,
            latencyMs: Date.now() - startedAt
        });
    });

    next();
}

declare global {
    namespace Express {
        interface Request {
            correlationId?: string;
        }
    }
}
