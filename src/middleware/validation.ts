/**
 * Request Validation Middleware
 *
 * Uses Zod schemas to validate request bodies and route params.
 * Returns structured 400 errors with field-level details on validation failure.
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

// ============================================================================
// VALIDATION MIDDLEWARE
// ============================================================================

function formatIssues(error: z.ZodError): Array<{ field: string; message: string }> {
    return error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message
    }));
}

/**
 * Validate request body against a Zod schema.
 */
export function validateBody(schema: z.ZodTypeAny) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            res.status(400).json({
                success: false,
                error: 'Validation failed',
                details: formatIssues(result.error)
            });
            return;
        }
        req.body = result.data;
        next();
    };
}

/**
 * Validate route params against a Zod schema.
 */
export function validateParams(schema: z.ZodTypeAny) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.params);
        if (!result.success) {
            res.status(404).json({
                success: false,
                error: 'Not found',
                details: formatIssues(result.error)
            });
            return;
        }
        next();
    };
}

// ============================================================================
// SCHEMAS: Webhooks
// ============================================================================

/**
 * Web forms post the lead-inbox schema directly.
 */
export const webFormSchema = z.object({
    inbox_lead: z.record(z.string(), z.unknown()),
    inbox_lead_token: z.string().optional()
}).passthrough();

/**
 * Voice agents post a single record, an `inbox_leads` batch, a bare array or
 * a transport envelope.
 */
export const voiceAgentSchema = z.union([
    z.record(z.string(), z.unknown()),
    z.array(z.unknown())
]);

/**
 * Legacy producers post one flat object of producer-native names.
 */
export const legacySchema = z.record(z.string(), z.unknown());

export const transportEnvelopeSchema = z.object({
    timestamp: z.number().int().optional(),
    callId: z.number().int().optional(),
    message: z.string().min(1, 'Encoded message is required')
}).strict();

// ============================================================================
// SCHEMAS: Route params
// ============================================================================

export const INTAKE_ENDPOINTS = ['web-form', 'capture-now', 'unified', 'encoded', 'legacy'] as const;

export const validateEndpointParamsSchema = z.object({
    endpoint: z.enum(INTAKE_ENDPOINTS)
});

export const syncParamsSchema = z.object({
    resource: z.string().regex(/^[a-z0-9_]+$/, 'Resource must be lowercase letters, digits or underscores')
});
