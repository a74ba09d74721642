import express from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import { LeadPipeline } from './services/leadPipeline';
import { BulkSyncService } from './services/bulkSyncService';
import {
    RateLimiterHealthSource,
    correlationMiddleware,
    getHealthStatus,
    getMetrics,
    metricsMiddleware,
    requestLoggingMiddleware
} from './services/observabilityService';
import { createIntakeController } from './controllers/intakeController';
import { createSyncController } from './controllers/syncController';
import { createWebhookRouter, createValidateRouter } from './routes/webhooks';
import { createSyncRouter } from './routes/sync';
import { createRateLimit, requireApiKey, securityHeaders } from './middleware/security';
import { asyncHandler } from './middleware/asyncHandler';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppDeps {
    config: AppConfig;
    pipeline: LeadPipeline;
    syncService: BulkSyncService;
    dispatchLimiter: RateLimiterHealthSource;
}

/**
 * Build the Express application. No listening, no process wiring; index.ts
 * does that, tests drive the app directly.
 */
export function createApp(deps: AppDeps): express.Express {
    const { config } = deps;
    const app = express();

    // Middleware
    app.use(cors({
        origin: config.frontendUrl ?? false,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Correlation-ID']
    }));
    app.use(express.json({ limit: '1mb' }));
    app.use(express.text({ type: 'text/*', limit: '1mb' }));

    // Security headers on all responses
    app.use(securityHeaders);

    // Correlation ID and metrics middleware
    app.use(correlationMiddleware);
    app.use(metricsMiddleware);
    app.use(requestLoggingMiddleware);

    // Inbound rate limiting on intake and admin routes
    const rateLimit = createRateLimit({
        points: config.security.inboundPoints,
        duration: config.security.inboundDurationSeconds
    });
    app.use('/webhook', rateLimit);
    app.use('/api', rateLimit);

    // ========================================================================
    // HEALTH & METRICS
    // ========================================================================

    app.get('/health', (req, res) => {
        const health = getHealthStatus(deps.dispatchLimiter);
        res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    });

    app.get('/metrics', (req, res) => {
        res.json(getMetrics());
    });

    // ========================================================================
    // ROUTES
    // ========================================================================

    const intake = createIntakeController({ pipeline: deps.pipeline, policy: config.fallbackPolicy });
    const sync = createSyncController(deps.syncService);
    const apiKeyGate = requireApiKey(config.security.apiKeyHashes);

    app.use('/webhook', createWebhookRouter(intake));
    app.use('/validate', createValidateRouter(intake));

    app.post('/api/intake', apiKeyGate, asyncHandler(intake.handleIntake));
    app.use('/api/sync', apiKeyGate, createSyncRouter(sync));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
