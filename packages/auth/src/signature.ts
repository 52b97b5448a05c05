import { createHmac, timingSafeEqual } from 'node:crypto';

function hmacHex(data: string, secret: string): string {
  return createHmac('sha256', secret).update(data).digest('hex');
}

function safeEqualHex(providedHex: string, expectedHex: string): boolean {
  if (providedHex.length !== expectedHex.length || !/^[0-9a-fA-F]*$/.test(providedHex)) {
    return false;
  }
  const provided = Buffer.from(providedHex, 'hex');
  const computed = Buffer.from(expectedHex, 'hex');
  return provided.length === computed.length && timingSafeEqual(provided, computed);
}

export function createSignedPayloadSignature(payload: string, timestamp: string, secret: string): string {
  return hmacHex(`${timestamp}.${payload}`, secret);
}

/**
 * Parses a callback timestamp header into epoch milliseconds. Accepts unix
 * seconds, unix milliseconds (13+ digits) or an ISO-8601 date.
 */
export function parseSignatureTimestamp(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const [whole = ''] = trimmed.split('.');
    const numeric = Number(trimmed);
    return whole.length >= 13 ? numeric : numeric * 1000;
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

export type SignatureCheck = { valid: true } | { valid: false; reason: 'invalid_timestamp' | 'stale_timestamp' | 'signature_mismatch' };

/** HMAC-SHA256 over `${timestamp}.${payload}`, with a freshness window on the timestamp. */
export function verifySignedPayloadSignature(params: {
  payload: string;
  timestamp: string;
  signatureHex: string;
  secret: string;
  toleranceSeconds: number;
  nowMs?: number;
}): SignatureCheck {
  const now = params.nowMs ?? Date.now();
  const timestampMs = parseSignatureTimestamp(params.timestamp);
  if (timestampMs === null) {
    return { valid: false, reason: 'invalid_timestamp' };
  }

  if (Math.abs(now - timestampMs) > params.toleranceSeconds * 1000) {
    return { valid: false, reason: 'stale_timestamp' };
  }

  const expected = createSignedPayloadSignature(params.payload, params.timestamp, params.secret);
  return safeEqualHex(params.signatureHex, expected) ? { valid: true } : { valid: false, reason: 'signature_mismatch' };
}

/** HMAC-SHA256 over the plain concatenation of `fields`. */
export function createFieldSignature(fields: readonly string[], secret: string): string {
  return hmacHex(fields.join(''), secret);
}

export function verifyFieldSignature(params: { fields: readonly string[]; signatureHex: string; secret: string }): boolean {
  return safeEqualHex(params.signatureHex, createFieldSignature(params.fields, params.secret));
}
