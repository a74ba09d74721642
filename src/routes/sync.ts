import { Router } from 'express';
import { createSyncController } from '../controllers/syncController';
import { asyncHandler } from '../middleware/asyncHandler';
import { validateParams, syncParamsSchema } from '../middleware/validation';

type SyncController = ReturnType<typeof createSyncController>;

/**
 * Mounted under /api/sync behind the API key gate.
 */
export function createSyncRouter(sync: SyncController): Router {
    const router = Router();

    router.get('/', asyncHandler(sync.listResources));
    router.get('/:resource', validateParams(syncParamsSchema), asyncHandler(sync.syncResource));

    return router;
}
