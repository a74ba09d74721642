import { Router } from 'express';
import { createIntakeController } from '../controllers/intakeController';
import { asyncHandler } from '../middleware/asyncHandler';
import {
    validateBody,
    validateParams,
    legacySchema,
    transportEnvelopeSchema,
    validateEndpointParamsSchema,
    voiceAgentSchema,
    webFormSchema
} from '../middleware/validation';

type IntakeController = ReturnType<typeof createIntakeController>;

export function createWebhookRouter(intake: IntakeController): Router {
    const router = Router();

    // Any of the four payload shapes or a transport envelope, JSON or text
    router.post('/unified', asyncHandler(intake.handleIntake));

    // Web forms post the lead-inbox schema directly
    router.post('/web-form', validateBody(webFormSchema), asyncHandler(intake.handleIntake));

    // Voice agent: single record, batch or transport envelope
    router.post('/capture-now', validateBody(voiceAgentSchema), asyncHandler(intake.handleIntake));

    router.post('/encoded', validateBody(transportEnvelopeSchema), asyncHandler(intake.handleIntake));

    // Older integrations: one flat object, no envelope
    router.post('/legacy', validateBody(legacySchema), asyncHandler(intake.handleIntake));

    return router;
}

export function createValidateRouter(intake: IntakeController): Router {
    const router = Router();

    router.get('/:endpoint', validateParams(validateEndpointParamsSchema), asyncHandler(intake.validateEndpoint));

    return router;
}
