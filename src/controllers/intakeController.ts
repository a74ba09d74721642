/**
 * Intake Controller
 *
 * Webhook entry points. Every route hands its body to the lead pipeline and
 * translates the PipelineResult into the `{ success, data | error }` contract.
 */

import { Request, Response } from 'express';
import { LeadPipeline, summarize } from '../services/leadPipeline';
import { mapLead, toInboxLeadRequest } from '../services/fieldMapper';
import { logger } from '../services/observabilityService';
import { errorResponse, successResponse } from '../utils/response';
import {
    DispatchOutcome,
    FallbackPolicy,
    JsonObject,
    LeadField,
    OutcomeKind,
    PayloadShape,
    PipelineResult
} from '../types';

/** Fields a producer is expected to send; email and phone are optional. */
const REQUIRED_LEAD_FIELDS: readonly LeadField[] = ['firstName', 'lastName', 'message', 'referringUrl', 'source'];

export interface IntakeControllerDeps {
    pipeline: LeadPipeline;
    policy: FallbackPolicy;
}

/**
 * HTTP status for a single-lead outcome.
 */
export function statusForOutcome(outcome: DispatchOutcome): number {
    switch (outcome.kind) {
        case OutcomeKind.CREATED:
            return 201;
        case OutcomeKind.VALIDATION_REJECTED:
            return outcome.origin === 'local' ? 400 : 422;
        case OutcomeKind.AUTH_REJECTED:
        case OutcomeKind.FATAL_FAILURE:
            return 502;
        case OutcomeKind.RATE_LIMITED:
        case OutcomeKind.TRANSIENT_FAILURE:
            return 503;
    }
}

function describeOutcome(outcome: DispatchOutcome): string {
    switch (outcome.kind) {
        case OutcomeKind.CREATED:
            return 'Lead created';
        case OutcomeKind.VALIDATION_REJECTED:
            return outcome.origin === 'local' ? 'Lead payload rejected' : 'Lead rejected by the lead inbox';
        case OutcomeKind.AUTH_REJECTED:
            return 'Lead inbox rejected our credentials';
        case OutcomeKind.RATE_LIMITED:
            return 'Lead inbox is rate limiting requests';
        case OutcomeKind.TRANSIENT_FAILURE:
            return 'Lead inbox is temporarily unavailable';
        case OutcomeKind.FATAL_FAILURE:
            return 'Lead inbox returned an unexpected response';
    }
}

function respondWithResult(res: Response, result: PipelineResult): Response {
    const meta = { shape: result.shape, encoded: result.encoded, transport: result.transport };

    if (result.shape === PayloadShape.ENVELOPE_BATCH) {
        if (result.leads.length === 0) {
            return errorResponse(res, 'Batch contains no leads', 400, meta);
        }
        const summary = summarize(result);
        const status = summary.created === summary.total ? 201 : 207;
        return successResponse(res, { ...meta, summary, leads: result.leads }, status);
    }

    const [lead] = result.leads;
    if (!lead) {
        return errorResponse(res, 'No lead found in payload', 400, meta);
    }

    const status = statusForOutcome(lead.outcome);
    if (lead.outcome.kind === OutcomeKind.CREATED) {
        return successResponse(res, { ...meta, lead }, status);
    }

    if (lead.outcome.kind === OutcomeKind.RATE_LIMITED && lead.outcome.retryAfterMs !== null) {
        res.setHeader('Retry-After', Math.ceil(lead.outcome.retryAfterMs / 1000));
    }
    return errorResponse(res, describeOutcome(lead.outcome), status, { ...meta, lead });
}

// ============================================================================
// HANDLERS
// ============================================================================

export function createIntakeController(deps: IntakeControllerDeps) {
    const { pipeline, policy } = deps;

    const handleIntake = async (req: Request, res: Response): Promise<Response> => {
        const body: unknown = req.body;
        const result = await pipeline.handle(body, { correlationId: req.correlationId });

        logger.info('[INTAKE] Request handled', {
            correlationId: req.correlationId,
            route: req.path,
            shape: result.shape,
            encoded: result.encoded,
            ...summarize(result)
        });

        return respondWithResult(res, result);
    };

    /**
     * Maps a fixed sample envelope and reports which fields would fall back
     * and the structure that would be sent downstream.
     */
    const validateEndpoint = async (req: Request, res: Response): Promise<Response> => {
        const sample: JsonObject = {
            first_name: 'Test',
            last_name: 'User',
            message: 'Test message',
            referring_url: 'https://test.com',
            source: 'API Test'
        };

        const { lead, appliedFallbacks } = mapLead(sample, PayloadShape.FLAT_LEGACY, policy);
        const request = toInboxLeadRequest(lead, '');
        const missingFields = REQUIRED_LEAD_FIELDS.filter(field => appliedFallbacks.includes(field));

        return successResponse(res, {
            endpoint: req.params.endpoint,
            validation: {
                missingFields,
                isValid: missingFields.length === 0,
                fallbackFields: appliedFallbacks,
                mappedPayloadStructure: Object.keys(request),
                inboxLeadFields: Object.keys(request.inbox_lead)
            }
        });
    };

    return { handleIntake, validateEndpoint };
}
