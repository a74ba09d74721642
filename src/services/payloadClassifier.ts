/**
 * Payload Classifier
 *
 * Assigns every raw payload exactly one PayloadShape and extracts the records
 * for it. After this point nothing handles the raw dictionary.
 *
 * Precedence:
 *   1. `inbox_leads: [...]` or a bare array       → EnvelopeBatch
 *   2. `inbox_lead: {from_*...}`                  → Direct
 *      `inbox_lead: {first_name...}`              → EnvelopeSingle
 *   3. native names / voice-agent markers on top  → EnvelopeSingle (markers) | FlatLegacy
 *   4. anything else                              → Unknown
 */

import {
    ClassifiedPayload,
    JsonObject,
    PayloadShape,
    RawPayload,
    RecordShape,
    isJsonObject
} from '../types';

export const DOWNSTREAM_FIELD_NAMES: readonly string[] = [
    'from_first',
    'from_last',
    'from_message',
    'from_email',
    'from_phone',
    'referring_url',
    'from_source'
];

export const NATIVE_FIELD_NAMES: readonly string[] = [
    'first_name',
    'last_name',
    'message',
    'email',
    'phone_number',
    'phone',
    'source',
    'referring_url'
];

/** Keys only a voice-agent envelope carries. */
export const ENVELOPE_MARKER_KEYS: readonly string[] = [
    'call_duration',
    'call_recording_url',
    'chat_conversation_id',
    'dispute_status',
    'google_lead_id',
    'inboxable',
    'lead_type'
];

function hasAnyKey(record: JsonObject, keys: readonly string[]): boolean {
    return keys.some(key => Object.prototype.hasOwnProperty.call(record, key));
}

/**
 * Key table for one batch item: the downstream vocabulary when any `from_*`
 * name is present, the producer-native one otherwise. referring_url belongs to
 * both vocabularies and decides nothing here.
 */
export function recordShapeOf(record: JsonObject): RecordShape {
    if (Object.keys(record).some(key => key.startsWith('from_'))) return PayloadShape.DIRECT;
    return hasAnyKey(record, ENVELOPE_MARKER_KEYS) ? PayloadShape.ENVELOPE_SINGLE : PayloadShape.FLAT_LEGACY;
}

export function classifyPayload(raw: RawPayload): ClassifiedPayload {
    if (Array.isArray(raw)) {
        return { shape: PayloadShape.ENVELOPE_BATCH, items: raw, root: {} };
    }

    if (!isJsonObject(raw)) {
        return { shape: PayloadShape.UNKNOWN, keys: [] };
    }

    const batch = raw.inbox_leads;
    if (Array.isArray(batch)) {
        const root: JsonObject = { ...raw };
        delete root.inbox_leads;
        return { shape: PayloadShape.ENVELOPE_BATCH, items: batch, root };
    }

    const wrapped = raw.inbox_lead;
    if (isJsonObject(wrapped)) {
        if (hasAnyKey(wrapped, DOWNSTREAM_FIELD_NAMES)) {
            return { shape: PayloadShape.DIRECT, record: wrapped };
        }
        if (hasAnyKey(wrapped, NATIVE_FIELD_NAMES) || hasAnyKey(wrapped, ENVELOPE_MARKER_KEYS)) {
            return { shape: PayloadShape.ENVELOPE_SINGLE, record: wrapped };
        }
    }

    if (hasAnyKey(raw, ENVELOPE_MARKER_KEYS)) {
        return { shape: PayloadShape.ENVELOPE_SINGLE, record: raw };
    }
    if (hasAnyKey(raw, NATIVE_FIELD_NAMES)) {
        return { shape: PayloadShape.FLAT_LEGACY, record: raw };
    }

    return { shape: PayloadShape.UNKNOWN, keys: Object.keys(raw) };
}
