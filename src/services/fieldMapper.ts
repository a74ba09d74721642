/**
 * Field Mapper & Validator
 *
 * Extracts the seven lead fields from a classified record, repairs what is
 * missing from the fallback policy and reports which defaults were used.
 * Missing data never rejects a lead; only an incomplete policy or a record that
 * is not an object does.
 */

import { ValidationError } from '../utils/appError';
import {
    FallbackPolicy,
    InboxLeadRequest,
    JsonObject,
    JsonValue,
    LEAD_FIELDS,
    LeadField,
    MappedLead,
    NormalizedLead,
    PayloadShape,
    RecordShape,
    isJsonObject
} from '../types';

type KeyTable = Record<LeadField, readonly string[]>;

const DIRECT_KEYS: KeyTable = {
    firstName: ['from_first', 'first_name'],
    lastName: ['from_last', 'last_name'],
    message: ['from_message', 'message'],
    email: ['from_email', 'email'],
    phone: ['from_phone', 'phone_number'],
    referringUrl: ['referring_url'],
    source: ['from_source', 'source']
};

const NATIVE_KEYS: KeyTable = {
    firstName: ['first_name'],
    lastName: ['last_name'],
    message: ['message'],
    email: ['email'],
    phone: ['phone_number', 'phone'],
    referringUrl: ['referring_url'],
    source: ['source']
};

export function keyTableFor(shape: RecordShape): KeyTable {
    return shape === PayloadShape.DIRECT ? DIRECT_KEYS : NATIVE_KEYS;
}

// ============================================================================
// VALUE COERCION
// ============================================================================

/**
 * Strings are trimmed, finite numbers become their decimal form. Booleans
 * (voice agents send `message: false` when nothing was captured), null,
 * objects and arrays count as absent.
 */
export function coerceText(value: JsonValue | undefined): string | null {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length > 0 ? trimmed : null;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    return null;
}

export function normalizeReferringUrl(value: string): string | null {
    if (value.toLowerCase() === 'vonage') {
        return 'https://vonage.com/';
    }
    if (/^https?:\/\//i.test(value)) {
        return value;
    }
    if (value.includes('.') && !/\s/.test(value)) {
        return `https://${value}`;
    }
    return null;
}

function extractField(record: JsonObject, keys: readonly string[], field: LeadField): string | null {
    for (const key of keys) {
        const text = coerceText(record[key]);
        if (text === null) continue;

        if (field === 'referringUrl') {
            const url = normalizeReferringUrl(text);
            if (url !== null) return url;
            continue;
        }
        return text;
    }
    return null;
}

// ============================================================================
// MAPPING
// ============================================================================

/**
 * Map one record into a NormalizedLead.
 *
 * @param root - envelope root of a batch; consulted for fields the item lacks
 * @throws ValidationError when the record is not an object or a field has no default
 */
export function mapLead(
    record: JsonValue,
    shape: RecordShape,
    policy: FallbackPolicy,
    root?: JsonObject
): MappedLead {
    if (!isJsonObject(record)) {
        throw new ValidationError(['record'], 'Lead record must be a JSON object');
    }

    const keys = keyTableFor(shape);
    const lead: Partial<NormalizedLead> = {};
    const appliedFallbacks: LeadField[] = [];
    const unsatisfied: LeadField[] = [];

    for (const field of LEAD_FIELDS) {
        let value = extractField(record, keys[field], field);

        if (value === null && root) {
            value = extractField(root, NATIVE_KEYS[field], field);
        }

        if (value === null) {
            const fallback = policy[field].trim();
            if (fallback.length === 0) {
                unsatisfied.push(field);
                continue;
            }
            value = fallback;
            appliedFallbacks.push(field);
        }

        lead[field] = value;
    }

    if (unsatisfied.length > 0) {
        throw new ValidationError(unsatisfied);
    }

    return {
        lead: {
            firstName: lead.firstName ?? '',
            lastName: lead.lastName ?? '',
            message: lead.message ?? '',
            email: lead.email ?? '',
            phone: lead.phone ?? '',
            referringUrl: lead.referringUrl ?? '',
            source: lead.source ?? ''
        },
        appliedFallbacks
    };
}

/**
 * Serialize a lead into the exact lead-inbox request body.
 */
export function toInboxLeadRequest(lead: NormalizedLead, token: string): InboxLeadRequest {
    return {
        inbox_lead: {
            from_first: lead.firstName,
            from_last: lead.lastName,
            from_message: lead.message,
            from_email: lead.email,
            from_phone: lead.phone,
            referring_url: lead.referringUrl,
            from_source: lead.source
        },
        inbox_lead_token: token
    };
}
