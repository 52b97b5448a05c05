import { verifyFieldSignature, verifySignedPayloadSignature } from '@mobiremit/auth';
import type { DepositCallback } from './parsers.js';

export interface WebhookVerifierConfig {
  /** HMAC secret shared with the payment processor. */
  secret: string;
  signatureHeader: string;
  timestampHeader: string;
  toleranceSeconds: number;
}

export type WebhookVerificationResult = { valid: true } | { valid: false; reason: string };

type HeaderBag = Record<string, string | string[] | undefined>;

function headerValue(headers: HeaderBag, name: string): string | null {
  const value = headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : null;
}

/** Deposit callbacks carry `signature = HMAC(reference + status + amount)` in the body. */
export function verifyDepositCallback(callback: DepositCallback, config: WebhookVerifierConfig): WebhookVerificationResult {
  if (!callback.signature) {
    return { valid: false, reason: 'missing_signature' };
  }

  const valid = verifyFieldSignature({
    fields: callback.signedFields,
    signatureHex: callback.signature,
    secret: config.secret
  });

  return valid ? { valid: true } : { valid: false, reason: 'signature_mismatch' };
}

/** Withdrawal callbacks sign `${timestamp}.${rawBody}` and send both in headers. */
export function verifyWithdrawalCallback(params: {
  rawBody: string;
  headers: HeaderBag;
  config: WebhookVerifierConfig;
  nowMs?: number;
}): WebhookVerificationResult {
  const signature = headerValue(params.headers, params.config.signatureHeader);
  const timestamp = headerValue(params.headers, params.config.timestampHeader);

  if (!signature) {
    return { valid: false, reason: 'missing_signature' };
  }
  if (!timestamp) {
    return { valid: false, reason: 'missing_timestamp' };
  }

  return verifySignedPayloadSignature({
    payload: params.rawBody,
    timestamp,
    signatureHex: signature,
    secret: params.config.secret,
    toleranceSeconds: params.config.toleranceSeconds,
    nowMs: params.nowMs
  });
}
