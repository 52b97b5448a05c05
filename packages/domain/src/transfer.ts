import { randomBytes, randomUUID } from 'node:crypto';
import { PROVIDER_NAME, TRANSFER_REFERENCE_HEX_LENGTH, TRANSFER_REFERENCE_PREFIX } from './constants.js';
import { addMoney, roundMoney } from './money.js';

export const TRANSFER_STATES = [
  'PENDING',
  'DEPOSIT_PENDING',
  'DEPOSIT_CONFIRMED',
  'DEPOSIT_FAILED',
  'WITHDRAWAL_PENDING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'REVERSED'
] as const;

export type TransferState = (typeof TRANSFER_STATES)[number];

export const TERMINAL_STATES: readonly TransferState[] = ['COMPLETED', 'DEPOSIT_FAILED', 'FAILED', 'CANCELLED', 'REVERSED'];

// CANCELLED and REVERSED are set by operators outside this engine.
const TRANSITIONS: Record<TransferState, readonly TransferState[]> = {
  PENDING: ['DEPOSIT_PENDING', 'FAILED'],
  DEPOSIT_PENDING: ['DEPOSIT_CONFIRMED', 'DEPOSIT_FAILED'],
  DEPOSIT_CONFIRMED: ['WITHDRAWAL_PENDING', 'FAILED'],
  DEPOSIT_FAILED: [],
  WITHDRAWAL_PENDING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
  REVERSED: []
};

export function isTransferState(value: string): value is TransferState {
  return TRANSFER_STATES.some((state) => state === value);
}

export function canTransition(from: TransferState, to: TransferState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: TransferState): boolean {
  return TERMINAL_STATES.includes(state);
}

export const AUDIT_EVENTS = [
  'created',
  'provider_init',
  'deposit_initiated',
  'deposit_confirmed',
  'deposit_failed',
  'withdrawal_initiated',
  'withdrawal_confirmed',
  'withdrawal_failed',
  'completed',
  'failed',
  'webhook_received',
  'webhook_processed'
] as const;

export type AuditEvent = (typeof AUDIT_EVENTS)[number];

export function isAuditEvent(value: string): value is AuditEvent {
  return AUDIT_EVENTS.some((event) => event === value);
}

export interface Transfer {
  transferId: string;
  reference: string;
  userId: string;
  status: TransferState;
  senderPhone: string;
  senderName: string;
  senderEmail: string | null;
  fundingProvider: string;
  payoutProvider: string;
  corridorId: string | null;
  amount: number;
  currency: string;
  serviceFee: number;
  totalAmount: number;
  destinationAmount: number;
  destinationCurrency: string;
  recipientName: string;
  recipientPhone: string;
  recipientEmail: string | null;
  provider: string;
  depositReference: string | null;
  depositStatus: string | null;
  depositGateway: string | null;
  depositInitiatedAt: Date | null;
  depositConfirmedAt: Date | null;
  withdrawalReference: string | null;
  withdrawalStatus: string | null;
  withdrawalGateway: string | null;
  withdrawalInitiatedAt: Date | null;
  withdrawalConfirmedAt: Date | null;
  description: string | null;
  deviceId: string | null;
  completedAt: Date | null;
  errorCode: string | null;
  errorMessage: string | null;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TransferDraft {
  userId: string;
  senderPhone: string;
  senderName: string;
  senderEmail?: string | null;
  fundingProvider: string;
  payoutProvider: string;
  corridorId: string | null;
  amount: number;
  currency: string;
  serviceFee: number;
  destinationCurrency: string;
  recipientName: string;
  recipientPhone: string;
  recipientEmail?: string | null;
  description?: string | null;
  deviceId?: string | null;
}

/** Provider call whose outcome is unknown (timeout or transport failure). */
export interface UnconfirmedInitiation {
  errorCode: string;
  errorMessage: string;
}

export type TransferEvent =
  | { type: 'deposit_initiated'; depositReference: string | null; gateway: string; unconfirmed?: UnconfirmedInitiation }
  | { type: 'deposit_init_failed'; errorCode: string; errorMessage: string }
  | { type: 'deposit_confirmed'; depositReference?: string | null }
  | { type: 'deposit_failed'; errorCode: string; errorMessage: string; providerStatus: string }
  | {
      type: 'withdrawal_initiated';
      withdrawalReference: string | null;
      gateway: string;
      unconfirmed?: UnconfirmedInitiation;
    }
  | { type: 'withdrawal_init_failed'; errorCode: string; errorMessage: string }
  | { type: 'withdrawal_succeeded'; withdrawalReference?: string | null }
  | { type: 'withdrawal_failed'; errorCode: string; errorMessage: string };

export type TransferEventType = TransferEvent['type'];

export type TransferEffect =
  | { kind: 'audit'; event: AuditEvent; metadata: Record<string, unknown> }
  | { kind: 'initiate_withdrawal' };

export interface TransitionResult {
  transfer: Transfer;
  effects: TransferEffect[];
}

export class InvalidTransitionError extends Error {
  readonly code = 'TRANSFER_STATE_INVALID';

  constructor(
    readonly reference: string,
    readonly from: TransferState,
    readonly eventType: TransferEventType
  ) {
    super(`Transfer ${reference} cannot apply ${eventType} from ${from}.`);
    this.name = 'InvalidTransitionError';
  }
}

export const PAYOUT_GATEWAY_MISSING = 'PAYOUT_GATEWAY_MISSING';
export const DEPOSIT_INIT_ERROR = 'DEPOSIT_INIT_ERROR';
export const WITHDRAWAL_INIT_ERROR = 'WITHDRAWAL_INIT_ERROR';

export function generateTransferReference(random: (size: number) => Buffer = randomBytes): string {
  const hex = random(TRANSFER_REFERENCE_HEX_LENGTH / 2).toString('hex').toUpperCase();
  return `${TRANSFER_REFERENCE_PREFIX}${hex}`;
}

export function computeTotalAmount(amount: number, serviceFee: number): number {
  return addMoney(amount, serviceFee);
}

export function createTransferRecord(
  draft: TransferDraft,
  now: Date,
  ids: { transferId?: string; reference?: string } = {}
): Transfer {
  const amount = roundMoney(draft.amount);
  const serviceFee = roundMoney(draft.serviceFee);

  return {
    transferId: ids.transferId ?? randomUUID(),
    reference: ids.reference ?? generateTransferReference(),
    userId: draft.userId,
    status: 'PENDING',
    senderPhone: draft.senderPhone,
    senderName: draft.senderName,
    senderEmail: draft.senderEmail ?? null,
    fundingProvider: draft.fundingProvider,
    payoutProvider: draft.payoutProvider,
    corridorId: draft.corridorId,
    amount,
    currency: draft.currency,
    serviceFee,
    totalAmount: computeTotalAmount(amount, serviceFee),
    // no FX: the receiver is credited the sent amount
    destinationAmount: amount,
    destinationCurrency: draft.destinationCurrency,
    recipientName: draft.recipientName,
    recipientPhone: draft.recipientPhone,
    recipientEmail: draft.recipientEmail ?? null,
    provider: PROVIDER_NAME,
    depositReference: null,
    depositStatus: null,
    depositGateway: null,
    depositInitiatedAt: null,
    depositConfirmedAt: null,
    withdrawalReference: null,
    withdrawalStatus: null,
    withdrawalGateway: null,
    withdrawalInitiatedAt: null,
    withdrawalConfirmedAt: null,
    description: draft.description ?? null,
    deviceId: draft.deviceId ?? null,
    completedAt: null,
    errorCode: null,
    errorMessage: null,
    deletedAt: null,
    createdAt: now,
    updatedAt: now
  };
}

const EVENT_TARGET: Record<TransferEventType, TransferState> = {
  deposit_initiated: 'DEPOSIT_PENDING',
  deposit_init_failed: 'FAILED',
  deposit_confirmed: 'DEPOSIT_CONFIRMED',
  deposit_failed: 'DEPOSIT_FAILED',
  withdrawal_initiated: 'WITHDRAWAL_PENDING',
  withdrawal_init_failed: 'FAILED',
  withdrawal_succeeded: 'COMPLETED',
  withdrawal_failed: 'FAILED'
};

function audit(event: AuditEvent, metadata: Record<string, unknown>): TransferEffect {
  return { kind: 'audit', event, metadata };
}

/** A confirmation supersedes an earlier "outcome unknown" marker. */
function clearUnconfirmed(transfer: Transfer, code: string): Pick<Transfer, 'errorCode' | 'errorMessage'> {
  if (transfer.errorCode === code) {
    return { errorCode: null, errorMessage: null };
  }
  return { errorCode: transfer.errorCode, errorMessage: transfer.errorMessage };
}

export const DEPOSIT_INIT_TIMEOUT = 'DEPOSIT_INIT_TIMEOUT';
export const WITHDRAWAL_INIT_TIMEOUT = 'WITHDRAWAL_INIT_TIMEOUT';

function step(transfer: Transfer, event: TransferEvent, base: Transfer, now: Date): [Transfer, TransferEffect[]] {
  switch (event.type) {
    case 'deposit_initiated':
      return [
        {
          ...base,
          depositReference: event.depositReference,
          depositGateway: event.gateway,
          depositStatus: event.unconfirmed ? 'unknown' : 'pending',
          depositInitiatedAt: now,
          errorCode: event.unconfirmed?.errorCode ?? null,
          errorMessage: event.unconfirmed?.errorMessage ?? null
        },
        [
          audit('deposit_initiated', {
            deposit_reference: event.depositReference,
            gateway: event.gateway,
            ...(event.unconfirmed ? { outcome: 'unknown', error_code: event.unconfirmed.errorCode } : {})
          })
        ]
      ];
    case 'deposit_init_failed':
      return [
        { ...base, depositStatus: 'failed', errorCode: event.errorCode, errorMessage: event.errorMessage },
        [audit('failed', { phase: 'deposit', error_code: event.errorCode, error_message: event.errorMessage })]
      ];
    case 'deposit_confirmed': {
      const depositReference = event.depositReference ?? transfer.depositReference;
      return [
        {
          ...base,
          depositReference,
          depositStatus: 'completed',
          depositConfirmedAt: now,
          ...clearUnconfirmed(transfer, DEPOSIT_INIT_TIMEOUT)
        },
        [audit('deposit_confirmed', { deposit_reference: depositReference }), { kind: 'initiate_withdrawal' }]
      ];
    }
    case 'deposit_failed':
      return [
        { ...base, depositStatus: 'failed', errorCode: event.errorCode, errorMessage: event.errorMessage },
        [audit('deposit_failed', { status: event.providerStatus, error_code: event.errorCode })]
      ];
    case 'withdrawal_initiated':
      return [
        {
          ...base,
          withdrawalReference: event.withdrawalReference,
          withdrawalGateway: event.gateway,
          withdrawalStatus: event.unconfirmed ? 'unknown' : 'pending',
          withdrawalInitiatedAt: now,
          errorCode: event.unconfirmed?.errorCode ?? null,
          errorMessage: event.unconfirmed?.errorMessage ?? null
        },
        [
          audit('withdrawal_initiated', {
            withdrawal_reference: event.withdrawalReference,
            gateway: event.gateway,
            ...(event.unconfirmed ? { outcome: 'unknown', error_code: event.unconfirmed.errorCode } : {})
          })
        ]
      ];
    case 'withdrawal_init_failed':
      return [
        { ...base, withdrawalStatus: 'failed', errorCode: event.errorCode, errorMessage: event.errorMessage },
        [
          audit(event.errorCode === PAYOUT_GATEWAY_MISSING ? 'failed' : 'withdrawal_failed', {
            phase: 'withdrawal',
            error_code: event.errorCode,
            error_message: event.errorMessage
          })
        ]
      ];
    case 'withdrawal_succeeded': {
      const withdrawalReference = event.withdrawalReference ?? transfer.withdrawalReference;
      return [
        {
          ...base,
          withdrawalReference,
          withdrawalStatus: 'completed',
          withdrawalConfirmedAt: now,
          completedAt: now,
          ...clearUnconfirmed(transfer, WITHDRAWAL_INIT_TIMEOUT)
        },
        [audit('completed', { withdrawal_reference: withdrawalReference })]
      ];
    }
    case 'withdrawal_failed':
      return [
        { ...base, withdrawalStatus: 'failed', errorCode: event.errorCode, errorMessage: event.errorMessage },
        [audit('withdrawal_failed', { failure_reason: event.errorCode, failure_message: event.errorMessage })]
      ];
  }
}

/**
 * Applies one lifecycle event. Pure: the caller persists the returned
 * transfer and executes the effects inside the same unit of work.
 */
export function applyTransferEvent(transfer: Transfer, event: TransferEvent, now: Date): TransitionResult {
  const target = EVENT_TARGET[event.type];
  if (!canTransition(transfer.status, target)) {
    throw new InvalidTransitionError(transfer.reference, transfer.status, event.type);
  }

  const [next, effects] = step(transfer, event, { ...transfer, status: target, updatedAt: now }, now);

  return {
    transfer: { ...next, totalAmount: computeTotalAmount(next.amount, next.serviceFee) },
    effects
  };
}
