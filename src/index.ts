import dotenv from 'dotenv';

dotenv.config();

import { loadConfig } from './config';
import { createApp } from './app';
import { logger, outcomeLogSink } from './services/observabilityService';
import { LeadInboxClient } from './services/leadInboxClient';
import { LeadPipeline } from './services/leadPipeline';
import { BulkSyncService } from './services/bulkSyncService';
import { FixedWindowRateLimiter } from './utils/rateLimiter';

// ============================================================================
// STARTUP
// ============================================================================

const config = loadConfig();
logger.setLevel(config.logLevel);

const dispatchLimiter = new FixedWindowRateLimiter({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowMs,
    maxWaitMs: config.rateLimit.maxWaitMs,
    queueLimit: config.rateLimit.queueLimit,
    name: 'lead-inbox'
});

const client = new LeadInboxClient({
    url: config.leadInbox.url,
    token: config.leadInbox.token,
    timeoutMs: config.leadInbox.timeoutMs,
    retry: config.retry,
    rateLimiter: dispatchLimiter
});

const pipeline = new LeadPipeline({
    client,
    policy: config.fallbackPolicy,
    sink: outcomeLogSink,
    requestBudgetMs: config.requestBudgetMs
});

const syncService = new BulkSyncService(client, config.sync);

const app = createApp({ config, pipeline, syncService, dispatchLimiter });

const server = app.listen(config.port, () => {
    logger.info(`Server started on port ${config.port}`, {
        port: config.port,
        env: config.nodeEnv,
        leadInboxUrl: config.leadInbox.url,
        syncResources: config.sync.resources
    });
});

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

function gracefulShutdown(signal: string): void {
    logger.info(`${signal} received, shutting down gracefully`);

    // Stop accepting new connections; in-flight requests finish
    server.close(error => {
        if (error) {
            logger.error('Error closing HTTP server', error);
            process.exit(1);
        }
        logger.info('HTTP server closed');
        process.exit(0);
    });

    setTimeout(() => {
        logger.warn('Forcing shutdown after timeout');
        process.exit(1);
    }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
