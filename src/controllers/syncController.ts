import { Request, Response } from 'express';
import { BulkSyncService } from '../services/bulkSyncService';
import { logger } from '../services/observabilityService';
import { successResponse } from '../utils/response';
import { SyncCollection } from '../types';

/**
 * Bulk sync: drains every page of one allow-listed resource. A run cut short
 * by a downstream failure still returns what it collected, with the terminal
 * outcome alongside (HTTP 207).
 */
export function createSyncController(syncService: BulkSyncService) {
    const syncResource = async (req: Request, res: Response): Promise<Response> => {
        const resource = req.params.resource;
        const startedAt = Date.now();

        // Response closed before we answered: the caller has gone away
        const controller = new AbortController();
        const onClose = (): void => {
            if (!res.writableFinished) {
                controller.abort(new Error('Client disconnected'));
            }
        };
        res.on('close', onClose);

        let collection: SyncCollection;
        try {
            collection = await syncService.collectAll(resource, controller.signal);
        } finally {
            res.off('close', onClose);
        }

        if (controller.signal.aborted) {
            logger.warn('[SYNC] Client disconnected, run abandoned', {
                correlationId: req.correlationId,
                resource,
                records: collection.records.length,
                pages: collection.pages
            });
            return res;
        }

        logger.info('[SYNC] Resource collected', {
            correlationId: req.correlationId,
            resource,
            records: collection.records.length,
            pages: collection.pages,
            terminal: collection.terminal?.kind ?? null,
            durationMs: Date.now() - startedAt
        });

        return successResponse(res, {
            resource: collection.resource,
            count: collection.records.length,
            pages: collection.pages,
            terminal: collection.terminal,
            records: collection.records
        }, collection.terminal ? 207 : 200);
    };

    const listResources = async (req: Request, res: Response): Promise<Response> => {
        return successResponse(res, { resources: syncService.resources });
    };

    return { syncResource, listResources };
}
