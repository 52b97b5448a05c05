import { createHmac } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import {
  createFieldSignature,
  createSignedPayloadSignature,
  parseSignatureTimestamp,
  verifyFieldSignature,
  verifySignedPayloadSignature
} from '../src/signature.js';

const nowMs = Date.parse('2026-03-02T10:00:00.000Z');
const nowSeconds = String(nowMs / 1000);

describe('parseSignatureTimestamp', () => {
  it('accepts unix seconds, unix milliseconds and ISO dates', () => {
    expect(parseSignatureTimestamp(nowSeconds)).toBe(nowMs);
    expect(parseSignatureTimestamp(String(nowMs))).toBe(nowMs);
    expect(parseSignatureTimestamp('2026-03-02T10:00:00Z')).toBe(nowMs);
  });

  it('rejects garbage', () => {
    expect(parseSignatureTimestamp('')).toBeNull();
    expect(parseSignatureTimestamp('yesterday')).toBeNull();
  });
});

describe('verifySignedPayloadSignature', () => {
  const payload = '{"data":{"status":"success"}}';

  it('accepts a fresh, correctly signed payload', () => {
    const signatureHex = createHmac('sha256', 'test-secret').update(`${nowSeconds}.${payload}`).digest('hex');
    expect(signatureHex).toBe(createSignedPayloadSignature(payload, nowSeconds, 'test-secret'));

    expect(
      verifySignedPayloadSignature({ payload, timestamp: nowSeconds, signatureHex, secret: 'test-secret', toleranceSeconds: 300, nowMs })
    ).toEqual({ valid: true });
  });

  it('rejects timestamps outside the tolerance', () => {
    const stale = String(nowMs / 1000 - 301);
    const signatureHex = createSignedPayloadSignature(payload, stale, 'test-secret');

    expect(
      verifySignedPayloadSignature({ payload, timestamp: stale, signatureHex, secret: 'test-secret', toleranceSeconds: 300, nowMs })
    ).toEqual({ valid: false, reason: 'stale_timestamp' });
  });

  it('rejects a signature padded with an odd trailing digit', () => {
    const signatureHex = `${createSignedPayloadSignature(payload, nowSeconds, 'test-secret')}0`;

    expect(
      verifySignedPayloadSignature({ payload, timestamp: nowSeconds, signatureHex, secret: 'test-secret', toleranceSeconds: 300, nowMs })
    ).toEqual({ valid: false, reason: 'signature_mismatch' });
  });

  it('rejects a tampered body', () => {
    const signatureHex = createSignedPayloadSignature(payload, nowSeconds, 'test-secret');

    expect(
      verifySignedPayloadSignature({
        payload: '{"data":{"status":"failed"}}',
        timestamp: nowSeconds,
        signatureHex,
        secret: 'test-secret',
        toleranceSeconds: 300,
        nowMs
      })
    ).toEqual({ valid: false, reason: 'signature_mismatch' });
  });
});

describe('field signatures', () => {
  it('signs the plain concatenation of the fields', () => {
    const expected = createHmac('sha256', 'test-secret').update('TRF-0000000000AAcompleted20000').digest('hex');
    expect(createFieldSignature(['TRF-0000000000AA', 'completed', '20000'], 'test-secret')).toBe(expected);
  });

  it('rejects a valid signature with an extra hex digit appended', () => {
    const fields = ['TRF-0000000000AA', 'completed', '20000'];
    const signatureHex = createFieldSignature(fields, 'test-secret');

    expect(verifyFieldSignature({ fields, signatureHex, secret: 'test-secret' })).toBe(true);
    expect(verifyFieldSignature({ fields, signatureHex: `${signatureHex}f`, secret: 'test-secret' })).toBe(false);
    expect(verifyFieldSignature({ fields, signatureHex: signatureHex.slice(0, -1), secret: 'test-secret' })).toBe(false);
  });

  it('rejects a non-hex signature without throwing', () => {
    expect(verifyFieldSignature({ fields: ['a', 'b'], signatureHex: 'not-hex', secret: 'test-secret' })).toBe(false);
  });
});
