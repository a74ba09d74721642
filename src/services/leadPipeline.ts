/**
 * Lead Pipeline
 *
 * Decoder → Classifier → Mapper → Dispatch, once per inbound request.
 *
 * Exactly one LeadResult per logical lead. Batch items are dispatched in input
 * order and fail independently. Decode and classification failures never reach
 * the network.
 */

import { decodeEnvelope } from './envelopeDecoder';
import { classifyPayload, recordShapeOf } from './payloadClassifier';
import { mapLead } from './fieldMapper';
import { logger } from './observabilityService';
import { DecodeError, ValidationError } from '../utils/appError';
import {
    DispatchOutcome,
    FallbackPolicy,
    FieldErrors,
    JsonObject,
    JsonValue,
    LeadField,
    LeadResult,
    MappedLead,
    NormalizedLead,
    OutcomeKind,
    OutcomeSink,
    PayloadShape,
    PipelineResult,
    PipelineSummary,
    RawPayload,
    RecordShape,
    TransportMetadata,
    isJsonObject
} from '../types';

export interface LeadDispatcher {
    dispatch(lead: NormalizedLead, options: { signal?: AbortSignal }): Promise<DispatchOutcome>;
}

export interface LeadPipelineDeps {
    client: LeadDispatcher;
    policy: FallbackPolicy;
    sink: OutcomeSink;
    /** Abort budget covering every dispatch of one request; 0 disables it. */
    requestBudgetMs: number;
}

export interface HandleOptions {
    signal?: AbortSignal;
    correlationId?: string;
}

function localRejection(fieldErrors: FieldErrors): DispatchOutcome {
    return { kind: OutcomeKind.VALIDATION_REJECTED, origin: 'local', fieldErrors, attempts: 0 };
}

/**
 * One abort signal for the whole request: fires on the caller's signal or
 * when the budget runs out.
 */
function requestSignal(budgetMs: number, upstream?: AbortSignal): { signal?: AbortSignal; release: () => void } {
    if (budgetMs <= 0) {
        return { signal: upstream, release: () => undefined };
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
        const reason = new Error('Request budget exhausted');
        reason.name = 'TimeoutError';
        controller.abort(reason);
    }, budgetMs);

    const onUpstreamAbort = (): void => controller.abort(upstream?.reason);
    if (upstream?.aborted) {
        onUpstreamAbort();
    } else {
        upstream?.addEventListener('abort', onUpstreamAbort, { once: true });
    }

    return {
        signal: controller.signal,
        release: () => {
            clearTimeout(timer);
            upstream?.removeEventListener('abort', onUpstreamAbort);
        }
    };
}

export class LeadPipeline {
    constructor(private readonly deps: LeadPipelineDeps) { }

    async handle(raw: RawPayload, options: HandleOptions = {}): Promise<PipelineResult> {
        const log = logger.child({ correlationId: options.correlationId });

        let payload: RawPayload;
        let encoded = false;
        let transport: TransportMetadata | null = null;

        try {
            const decoded = decodeEnvelope(raw);
            payload = decoded.payload;
            if (decoded.encoded) {
                encoded = true;
                transport = decoded.transport;
            }
        } catch (error) {
            if (!(error instanceof DecodeError)) throw error;

            log.warn('[PIPELINE] Payload could not be decoded', { reason: error.message, rawLength: error.raw.length });
            const lead = this.report(options, PayloadShape.UNKNOWN, 0, localRejection({ payload: [error.message] }), [], 0);
            return { shape: PayloadShape.UNKNOWN, encoded: false, transport: null, leads: [lead] };
        }

        const classified = classifyPayload(payload);
        log.debug('[PIPELINE] Payload classified', { shape: classified.shape, encoded });

        if (classified.shape === PayloadShape.UNKNOWN) {
            const keys = classified.keys.length > 0 ? classified.keys.join(', ') : 'none';
            log.warn('[PIPELINE] Unrecognized payload shape', { keys: classified.keys });
            const outcome = localRejection({ payload: [`Unrecognized payload shape (keys: ${keys})`] });
            const lead = this.report(options, PayloadShape.UNKNOWN, 0, outcome, [], 0);
            return { shape: PayloadShape.UNKNOWN, encoded, transport, leads: [lead] };
        }

        const { signal, release } = requestSignal(this.deps.requestBudgetMs, options.signal);
        try {
            const leads: LeadResult[] = [];

            if (classified.shape === PayloadShape.ENVELOPE_BATCH) {
                for (const [index, item] of classified.items.entries()) {
                    const recordShape = isJsonObject(item) ? recordShapeOf(item) : PayloadShape.FLAT_LEGACY;
                    leads.push(await this.processLead(
                        item, recordShape, PayloadShape.ENVELOPE_BATCH, index, signal, options, classified.root
                    ));
                }
                log.info('[PIPELINE] Batch processed', {
                    ...summarize({ shape: classified.shape, encoded, transport, leads })
                });
            } else {
                leads.push(await this.processLead(
                    classified.record, classified.shape, classified.shape, 0, signal, options
                ));
            }

            return { shape: classified.shape, encoded, transport, leads };
        } finally {
            release();
        }
    }

    private async processLead(
        record: JsonValue,
        recordShape: RecordShape,
        shape: PayloadShape,
        index: number,
        signal: AbortSignal | undefined,
        options: HandleOptions,
        root?: JsonObject
    ): Promise<LeadResult> {
        const start = Date.now();

        let mapped: MappedLead;
        try {
            mapped = mapLead(record, recordShape, this.deps.policy, root);
        } catch (error) {
            if (!(error instanceof ValidationError)) throw error;

            if (error.fields.includes('record')) {
                logger.warn('[PIPELINE] Lead record is not an object', { correlationId: options.correlationId, index });
            } else {
                logger.error('[PIPELINE] Fallback policy left fields empty', error, {
                    correlationId: options.correlationId,
                    fields: error.fields
                });
            }

            const fieldErrors: FieldErrors = Object.fromEntries(error.fields.map(field => [field, [error.message]]));
            return this.report(options, shape, index, localRejection(fieldErrors), [], Date.now() - start);
        }

        const outcome = await this.deps.client.dispatch(mapped.lead, { signal });
        return this.report(options, shape, index, outcome, mapped.appliedFallbacks, Date.now() - start);
    }

    private report(
        options: HandleOptions,
        shape: PayloadShape,
        index: number,
        outcome: DispatchOutcome,
        appliedFallbacks: LeadField[],
        latencyMs: number
    ): LeadResult {
        try {
            this.deps.sink.record({
                correlationId: options.correlationId,
                shape,
                index,
                outcome: outcome.kind,
                attempts: outcome.attempts,
                appliedFallbacks,
                latencyMs
            });
        } catch (error) {
            logger.error('[PIPELINE] Outcome sink failed', error instanceof Error ? error : undefined, {
                correlationId: options.correlationId
            });
        }

        return { index, shape, outcome, appliedFallbacks, latencyMs };
    }
}

/**
 * Created / rejected (validation, local or downstream) / failed (everything else).
 */
export function summarize(result: PipelineResult): PipelineSummary {
    const summary: PipelineSummary = { total: result.leads.length, created: 0, rejected: 0, failed: 0 };
    for (const lead of result.leads) {
        if (lead.outcome.kind === OutcomeKind.CREATED) {
            summary.created++;
        } else if (lead.outcome.kind === OutcomeKind.VALIDATION_REJECTED) {
            summary.rejected++;
        } else {
            summary.failed++;
        }
    }
    return summary;
}
