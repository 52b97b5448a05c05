import { z } from 'zod';

export type CallbackPhase = 'deposit' | 'withdrawal';

interface CallbackBase {
  format: string;
  /** Internal transfer reference echoed back through the request metadata. */
  reference: string;
  /** Lower-cased provider status. */
  status: string;
  providerReference: string | null;
  event: string | null;
}

export interface DepositCallback extends CallbackBase {
  phase: 'deposit';
  signature: string | null;
  /** `reference`, `status` and `amount` exactly as sent, in signing order. */
  signedFields: [string, string, string];
}

export interface WithdrawalCallback extends CallbackBase {
  phase: 'withdrawal';
  failureReason: string | null;
  failureMessage: string | null;
}

export type ParsedCallback = DepositCallback | WithdrawalCallback;

interface CallbackParser<T extends ParsedCallback> {
  format: string;
  parse(payload: unknown, rawBody?: string): T | null;
}

function skipWhitespace(json: string, index: number): number {
  let cursor = index;
  while (cursor < json.length && /\s/.test(json.charAt(cursor))) {
    cursor += 1;
  }
  return cursor;
}

function stringEnd(json: string, start: number): number {
  for (let cursor = start + 1; cursor < json.length; cursor += 1) {
    const char = json.charAt(cursor);
    if (char === '\\') {
      cursor += 1;
    } else if (char === '"') {
      return cursor;
    }
  }
  return -1;
}

/** Source text of the number stored under `key` on the outermost object (last occurrence wins, as in `JSON.parse`). */
export function topLevelNumberLiteral(json: string, key: string): string | null {
  let depth = 0;
  let found: string | null = null;
  let cursor = 0;
  while (cursor < json.length) {
    const char = json.charAt(cursor);
    if (char === '"') {
      const end = stringEnd(json, cursor);
      if (end === -1) {
        return null;
      }
      const colon = skipWhitespace(json, end + 1);
      if (depth === 1 && json.charAt(colon) === ':' && json.slice(cursor + 1, end) === key) {
        const literal = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/.exec(json.slice(skipWhitespace(json, colon + 1)));
        found = literal ? literal[0] : null;
      }
      cursor = end + 1;
      continue;
    }
    if (char === '{' || char === '[') {
      depth += 1;
    } else if (char === '}' || char === ']') {
      depth -= 1;
    }
    cursor += 1;
  }
  return found;
}

/** A decimal literal keeps its fractional part, so `1000.0` is signed as "1000.0". */
function signedAmount(amount: number | string | null | undefined, literal: string | null): string {
  if (amount === null || amount === undefined) {
    return '';
  }
  if (typeof amount === 'string') {
    return amount;
  }
  if (literal !== null && /[.eE]/.test(literal) && Number.isInteger(amount) && Math.abs(amount) < 1e16) {
    return `${amount}.0`;
  }
  return String(amount);
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));

const depositV1Schema = z.object({
  event: optionalText,
  reference: z.string().nullish(),
  status: z.string().min(1),
  amount: z.union([z.number(), z.string()]).nullish(),
  currency: z.string().nullish(),
  signature: optionalText,
  metadata: z.object({ order_id: z.string().trim().min(1) })
});

const withdrawalV1Schema = z.object({
  event: optionalText,
  timestamp: z.unknown().optional(),
  data: z.object({
    reference: optionalText,
    status: z.string().min(1),
    amount: z.union([z.number(), z.string()]).nullish(),
    failureReason: optionalText,
    failureMessage: optionalText,
    metadata: z.object({ withdrawal_id: z.string().trim().min(1) })
  })
});

const depositV1: CallbackParser<DepositCallback> = {
  format: 'awdpay.deposit.v1',
  parse(payload, rawBody) {
    const parsed = depositV1Schema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    const body = parsed.data;
    const providerReference = body.reference ?? '';
    return {
      phase: 'deposit',
      format: 'awdpay.deposit.v1',
      reference: body.metadata.order_id,
      status: body.status.toLowerCase(),
      providerReference: providerReference.length > 0 ? providerReference : null,
      event: body.event,
      signature: body.signature,
      signedFields: [
        providerReference,
        body.status,
        signedAmount(body.amount, rawBody === undefined ? null : topLevelNumberLiteral(rawBody, 'amount'))
      ]
    };
  }
};

const withdrawalV1: CallbackParser<WithdrawalCallback> = {
  format: 'awdpay.withdrawal.v1',
  parse(payload) {
    const parsed = withdrawalV1Schema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    const { data, event } = parsed.data;
    return {
      phase: 'withdrawal',
      format: 'awdpay.withdrawal.v1',
      reference: data.metadata.withdrawal_id,
      status: data.status.toLowerCase(),
      providerReference: data.reference,
      event,
      failureReason: data.failureReason,
      failureMessage: data.failureMessage
    };
  }
};

const DEPOSIT_PARSERS: ReadonlyArray<CallbackParser<DepositCallback>> = [depositV1];
const WITHDRAWAL_PARSERS: ReadonlyArray<CallbackParser<WithdrawalCallback>> = [withdrawalV1];

function firstMatch<T extends ParsedCallback>(
  parsers: ReadonlyArray<CallbackParser<T>>,
  payload: unknown,
  rawBody?: string
): T | null {
  for (const parser of parsers) {
    const parsed = parser.parse(payload, rawBody);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

/** `rawBody`, when given, supplies the amount's text for the signature. */
export function parseDepositCallback(payload: unknown, rawBody?: string): DepositCallback | null {
  return firstMatch(DEPOSIT_PARSERS, payload, rawBody);
}

export function parseWithdrawalCallback(payload: unknown): WithdrawalCallback | null {
  return firstMatch(WITHDRAWAL_PARSERS, payload);
}

export function parseCallback(phase: CallbackPhase, payload: unknown, rawBody?: string): ParsedCallback | null {
  return phase === 'deposit' ? parseDepositCallback(payload, rawBody) : parseWithdrawalCallback(payload);
}
