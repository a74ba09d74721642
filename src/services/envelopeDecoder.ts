/**
 * Envelope Decoder
 *
 * Some producers (voice agents in particular) wrap the lead payload in a
 * transport envelope:
 *
 *   { "timestamp": 1722195360, "callId": 4411, "message": "<base64 of JSON>" }
 *
 * decodeEnvelope() unwraps it; anything else passes through unchanged.
 * Pure: no logging, no network.
 */

import { DecodeError } from '../utils/appError';
import { JsonObject, JsonValue, RawPayload, TransportMetadata, isJsonObject } from '../types';

const TRANSPORT_KEYS = new Set(['timestamp', 'callId', 'message']);

// Standard or URL-safe alphabet, padding optional
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]|[A-Za-z0-9\-_])*={0,2}$/;

export interface TransportEnvelope {
    timestamp: number;
    callId?: number;
    message: string;
}

export type DecodedPayload =
    | { encoded: false; payload: RawPayload }
    | { encoded: true; payload: JsonObject | JsonValue[]; transport: TransportMetadata };

function optionalInteger(value: unknown): boolean {
    return value === undefined || (typeof value === 'number' && Number.isInteger(value));
}

/**
 * A transport envelope has nothing but transport keys, a string message and
 * integer metadata.
 */
export function isTransportEnvelope(value: unknown): value is JsonObject & { message: string } {
    if (!isJsonObject(value)) return false;
    if (typeof value.message !== 'string') return false;
    if (!Object.keys(value).every(key => TRANSPORT_KEYS.has(key))) return false;
    return optionalInteger(value.timestamp) && optionalInteger(value.callId);
}

function decodeBase64Json(message: string, raw: string): JsonObject | JsonValue[] {
    const compact = message.replace(/\s+/g, '');

    if (compact.length === 0 || compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) {
        throw new DecodeError('Transport message is not valid base64', raw);
    }

    const bytes = Buffer.from(compact.replace(/-/g, '+').replace(/_/g, '/'), 'base64');

    let text: string;
    try {
        text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
        throw new DecodeError('Transport message is not valid UTF-8', raw);
    }

    let inner: unknown;
    try {
        inner = JSON.parse(text);
    } catch {
        throw new DecodeError('Transport message does not contain valid JSON', raw);
    }

    if (isJsonObject(inner) || Array.isArray(inner)) {
        return inner;
    }
    throw new DecodeError('Transport message must contain a JSON object or array', raw);
}

function stringify(input: unknown): string {
    if (typeof input === 'string') return input;
    try {
        return JSON.stringify(input) ?? String(input);
    } catch {
        return String(input);
    }
}

/**
 * Turn boundary input into a RawPayload.
 *
 * Strings are parsed as JSON first. Transport envelopes are unwrapped; a
 * failure at any step throws DecodeError with the original input as text.
 */
export function decodeEnvelope(input: unknown): DecodedPayload {
    let value: unknown = input;

    if (typeof input === 'string') {
        try {
            value = JSON.parse(input);
        } catch {
            throw new DecodeError('Request body is not valid JSON', input);
        }
    }

    if (!isTransportEnvelope(value)) {
        return { encoded: false, payload: value };
    }

    const raw = stringify(input);
    const payload = decodeBase64Json(value.message, raw);

    return {
        encoded: true,
        payload,
        transport: {
            timestamp: typeof value.timestamp === 'number' ? value.timestamp : null,
            callId: typeof value.callId === 'number' ? value.callId : null
        }
    };
}

/**
 * Wrap a payload the way producers do. decodeEnvelope(encodeEnvelope(x)) gives x back.
 */
export function encodeEnvelope(
    payload: JsonObject | JsonValue[],
    options: { timestamp?: number; callId?: number } = {}
): TransportEnvelope {
    const message = Buffer.from(JSON.stringify(payload), 'utf-8').toString('base64');
    const envelope: TransportEnvelope = {
        timestamp: options.timestamp ?? Math.floor(Date.now() / 1000),
        message
    };
    if (options.callId !== undefined) {
        envelope.callId = options.callId;
    }
    return envelope;
}
