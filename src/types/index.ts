/**
 * Lead Intake Type Definitions
 *
 * Central location for the enums, tagged variants and interfaces shared by the
 * normalization pipeline, the dispatch client and the HTTP surface.
 */

// ============================================================================
// RAW INPUT
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

/**
 * Whatever arrived at the boundary. Only the decoder and classifier look inside it.
 */
export type RawPayload = unknown;

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// PAYLOAD SHAPES
// ============================================================================

/**
 * Every raw payload gets exactly one of these.
 * - DIRECT: already in the lead-inbox schema (`inbox_lead.from_*`)
 * - ENVELOPE_SINGLE: producer-native names from a voice agent envelope
 * - ENVELOPE_BATCH: `inbox_leads: [...]` or a bare array of envelope records
 * - FLAT_LEGACY: producer-native names at the top level, no envelope markers
 * - UNKNOWN: none of the above
 */
export enum PayloadShape {
    DIRECT = 'Direct',
    ENVELOPE_SINGLE = 'EnvelopeSingle',
    ENVELOPE_BATCH = 'EnvelopeBatch',
    FLAT_LEGACY = 'FlatLegacy',
    UNKNOWN = 'Unknown'
}

/** Shapes a single lead record can be mapped from. */
export type RecordShape = PayloadShape.DIRECT | PayloadShape.ENVELOPE_SINGLE | PayloadShape.FLAT_LEGACY;

export type ClassifiedPayload =
    | { shape: PayloadShape.DIRECT; record: JsonObject }
    | { shape: PayloadShape.ENVELOPE_SINGLE; record: JsonObject }
    | { shape: PayloadShape.FLAT_LEGACY; record: JsonObject }
    | { shape: PayloadShape.ENVELOPE_BATCH; items: JsonValue[]; root: JsonObject }
    | { shape: PayloadShape.UNKNOWN; keys: string[] };

// ============================================================================
// NORMALIZED LEAD
// ============================================================================

export const LEAD_FIELDS = [
    'firstName',
    'lastName',
    'message',
    'email',
    'phone',
    'referringUrl',
    'source'
] as const;

export type LeadField = typeof LEAD_FIELDS[number];

/**
 * The seven semantic fields of the lead-inbox schema. Every value is non-empty
 * by the time the lead reaches the dispatch client.
 */
export type NormalizedLead = Record<LeadField, string>;

export type FallbackPolicy = Readonly<Record<LeadField, string>>;

export interface MappedLead {
    lead: NormalizedLead;
    appliedFallbacks: LeadField[];
}

/**
 * Exact request body of the lead-inbox API.
 */
export interface InboxLeadRequest {
    inbox_lead: {
        from_first: string;
        from_last: string;
        from_message: string;
        from_email: string;
        from_phone: string;
        referring_url: string;
        from_source: string;
    };
    inbox_lead_token: string;
}

// ============================================================================
// DISPATCH OUTCOMES
// ============================================================================

export enum OutcomeKind {
    CREATED = 'Created',
    VALIDATION_REJECTED = 'ValidationRejected',
    AUTH_REJECTED = 'AuthRejected',
    RATE_LIMITED = 'RateLimited',
    TRANSIENT_FAILURE = 'TransientFailure',
    FATAL_FAILURE = 'FatalFailure'
}

export type FieldErrors = Record<string, string[]>;

/**
 * Where a validation rejection came from: our own decode/classify/map stages
 * ('local') or the lead-inbox API's 422 ('downstream').
 */
export type RejectionOrigin = 'local' | 'downstream';

export type DispatchOutcome =
    | { kind: OutcomeKind.CREATED; remoteId: string | null; attempts: number }
    | { kind: OutcomeKind.VALIDATION_REJECTED; origin: RejectionOrigin; fieldErrors: FieldErrors; attempts: number }
    | { kind: OutcomeKind.AUTH_REJECTED; status: number; attempts: number }
    | { kind: OutcomeKind.RATE_LIMITED; retryAfterMs: number | null; attempts: number }
    | { kind: OutcomeKind.TRANSIENT_FAILURE; cause: string; attempts: number }
    | { kind: OutcomeKind.FATAL_FAILURE; cause: string; status: number | null; attempts: number };

export type TerminalOutcome = Exclude<DispatchOutcome, { kind: OutcomeKind.CREATED }>;

// ============================================================================
// PIPELINE RESULTS
// ============================================================================

export interface TransportMetadata {
    timestamp: number | null;
    callId: number | null;
}

export interface LeadResult {
    index: number;
    shape: PayloadShape;
    outcome: DispatchOutcome;
    appliedFallbacks: LeadField[];
    latencyMs: number;
}

export interface PipelineResult {
    shape: PayloadShape;
    encoded: boolean;
    transport: TransportMetadata | null;
    leads: LeadResult[];
}

export interface PipelineSummary {
    total: number;
    created: number;
    rejected: number;
    failed: number;
}

/**
 * One record per dispatch outcome, handed to the observability sink.
 */
export interface OutcomeRecord {
    correlationId?: string;
    shape: PayloadShape;
    index: number;
    outcome: OutcomeKind;
    attempts: number;
    appliedFallbacks: LeadField[];
    latencyMs: number;
}

export interface OutcomeSink {
    record(entry: OutcomeRecord): void;
}

// ============================================================================
// BULK SYNC
// ============================================================================

export type RemoteRecord = JsonObject;

export type PageCursor =
    | { type: 'page'; page: number }
    | { type: 'link'; url: string };

export interface PageResponse {
    status: number;
    headers: Record<string, string>;
    body: unknown;
}

export interface SyncCollection {
    resource: string;
    records: RemoteRecord[];
    pages: number;
    terminal: TerminalOutcome | null;
}
