/**
 * Security Middleware
 *
 * Implements:
 * - In-memory inbound rate limiting per client
 * - API key gate for admin routes (sha-256 hashes from configuration)
 * - Security headers
 */

import { createHash, timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '../services/observabilityService';

// ============================================================================
// RATE LIMITING
// ============================================================================

export interface InboundRateLimit {
    points: number;    // Max requests
    duration: number;  // Window in seconds
}

function getClientIdentifier(req: Request): string {
    const apiKey = readApiKey(req);
    if (apiKey) {
        return `key:${hashApiKey(apiKey).substring(0, 16)}`;
    }
    return `ip:${req.ip || req.socket.remoteAddress || 'unknown'}`;
}

/**
 * Rate limiting middleware. One limiter per app instance.
 */
export function createRateLimit(config: InboundRateLimit): RequestHandler {
    const limiter = new RateLimiterMemory({
        keyPrefix: 'rl:inbound',
        points: config.points,
        duration: config.duration
    });

    logger.info('Rate limiter initialized', { backend: 'memory', ...config });

    return (req: Request, res: Response, next: NextFunction): void => {
        limiter.consume(getClientIdentifier(req))
            .then(result => {
                res.setHeader('X-RateLimit-Limit', config.points);
                res.setHeader('X-RateLimit-Remaining', result.remainingPoints);
                res.setHeader('X-RateLimit-Reset', new Date(Date.now() + result.msBeforeNext).toISOString());
                next();
            })
            .catch((rejection: unknown) => {
                if (!(rejection instanceof RateLimiterRes)) {
                    next(rejection);
                    return;
                }

                const retryAfter = Math.ceil((rejection.msBeforeNext || 60000) / 1000);

                res.setHeader('Retry-After', retryAfter);
                res.setHeader('X-RateLimit-Limit', config.points);
                res.setHeader('X-RateLimit-Remaining', 0);

                res.status(429).json({
                    success: false,
                    error: 'Too Many Requests',
                    retryAfter
                });
            });
    };
}

// ============================================================================
// API KEY GATE
// ============================================================================

/**
 * Hash an API key for lookup.
 */
export function hashApiKey(key: string): string {
    return createHash('sha256').update(key).digest('hex');
}

function readApiKey(req: Request): string | null {
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
        const token = authHeader.substring(7).trim();
        return token.length > 0 ? token : null;
    }
    const header = req.headers['x-api-key'];
    return typeof header === 'string' && header.length > 0 ? header : null;
}

function matchesAny(hash: string, allowed: readonly string[]): boolean {
    const candidate = Buffer.from(hash, 'hex');
    let matched = false;
    for (const entry of allowed) {
        const expected = Buffer.from(entry, 'hex');
        if (expected.length === candidate.length && timingSafeEqual(expected, candidate)) {
            matched = true;
        }
    }
    return matched;
}

/**
 * Require an API key whose sha-256 hash is configured. With no hashes
 * configured every request is rejected.
 */
export function requireApiKey(allowedHashes: readonly string[]): RequestHandler {
    if (allowedHashes.length === 0) {
        logger.warn('[SECURITY] No API key hashes configured, gated routes will reject every request');
    }

    return (req: Request, res: Response, next: NextFunction): void => {
        const apiKey = readApiKey(req);

        if (!apiKey) {
            res.status(401).json({ success: false, error: 'API key required' });
            return;
        }

        if (!matchesAny(hashApiKey(apiKey), allowedHashes)) {
            logger.warn('[SECURITY] Invalid API key', { correlationId: req.correlationId, path: req.path });
            res.status(401).json({ success: false, error: 'Invalid API key' });
            return;
        }

        next();
    };
}

// ============================================================================
// SECURITY HEADERS
// ============================================================================

/**
 * Apply security headers middleware.
 */
export function securityHeaders(req: Request, res: Response, next: NextFunction): void {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-XSS-Protection', '1; mode=block');
    res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    res.setHeader('Content-Security-Policy', "default-src 'self'");
    next();
}
