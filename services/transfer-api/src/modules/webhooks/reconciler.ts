import type { PaymentProviderClient } from '@mobiremit/adapters';
import type { TransferEvent, TransferState } from '@mobiremit/domain';
import type { ServiceLogger } from '@mobiremit/observability';
import { commitTransition, requestsWithdrawal, startWithdrawal, type TransferStore } from '../transfers/index.js';
import { parseDepositCallback, parseWithdrawalCallback, type DepositCallback, type ParsedCallback, type WithdrawalCallback } from './parsers.js';
import { verifyDepositCallback, verifyWithdrawalCallback, type WebhookVerifierConfig } from './verifier.js';

export type WebhookOutcome =
  | { kind: 'invalid_payload' }
  | { kind: 'invalid_signature'; reason: string }
  | { kind: 'not_found'; reference: string }
  | { kind: 'duplicate'; reference: string; status: TransferState }
  | { kind: 'ignored'; reference: string; status: TransferState }
  | { kind: 'applied'; reference: string; status: TransferState };

export interface WebhookReconcilerDeps {
  store: TransferStore;
  provider: PaymentProviderClient;
  verifier: WebhookVerifierConfig;
  logger: ServiceLogger;
  clock?: () => Date;
}

const PRECONDITION: Record<ParsedCallback['phase'], TransferState> = {
  deposit: 'DEPOSIT_PENDING',
  withdrawal: 'WITHDRAWAL_PENDING'
};

function depositEvent(callback: DepositCallback): TransferEvent | null {
  switch (callback.status) {
    case 'completed':
      return { type: 'deposit_confirmed', depositReference: callback.providerReference };
    case 'failed':
      return {
        type: 'deposit_failed',
        errorCode: 'DEPOSIT_CALLBACK_FAILED',
        errorMessage: 'Deposit failed via callback',
        providerStatus: callback.status
      };
    case 'expired':
      return {
        type: 'deposit_failed',
        errorCode: 'DEPOSIT_CALLBACK_EXPIRED',
        errorMessage: 'Deposit expired via callback',
        providerStatus: callback.status
      };
    default:
      return null;
  }
}

function withdrawalEvent(callback: WithdrawalCallback): TransferEvent | null {
  switch (callback.status) {
    case 'success':
      return { type: 'withdrawal_succeeded', withdrawalReference: callback.providerReference };
    case 'failed':
      return {
        type: 'withdrawal_failed',
        errorCode: callback.failureReason ?? 'WITHDRAWAL_CALLBACK_FAILED',
        errorMessage: callback.failureMessage ?? 'Withdrawal failed via callback'
      };
    default:
      return null;
  }
}

function receivedMetadata(callback: ParsedCallback, payload: unknown): Record<string, unknown> {
  return {
    phase: callback.phase,
    format: callback.format,
    event: callback.event,
    callback_status: callback.status,
    provider_reference: callback.providerReference,
    ...(callback.phase === 'withdrawal'
      ? { failure_reason: callback.failureReason, failure_message: callback.failureMessage }
      : {}),
    raw: payload
  };
}

/**
 * Applies processor callbacks to transfers. Each delivery runs in one unit of
 * work with the transfer row locked; a callback whose phase precondition no
 * longer holds is acknowledged without a transition.
 */
export class WebhookReconciler {
  private readonly clock: () => Date;

  constructor(private readonly deps: WebhookReconcilerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async handleDeposit(params: { payload: unknown; rawBody?: string; ipAddress: string | null }): Promise<WebhookOutcome> {
    const callback = parseDepositCallback(params.payload, params.rawBody);
    if (!callback) {
      this.deps.logger.warn('Deposit callback not recognised');
      return { kind: 'invalid_payload' };
    }

    const verification = verifyDepositCallback(callback, this.deps.verifier);
    if (!verification.valid) {
      this.deps.logger.warn('Deposit callback signature rejected', { reference: callback.reference, reason: verification.reason });
      return { kind: 'invalid_signature', reason: verification.reason };
    }

    return this.reconcile(callback, params.payload, params.ipAddress);
  }

  async handleWithdrawal(params: {
    payload: unknown;
    rawBody: string;
    headers: Record<string, string | string[] | undefined>;
    ipAddress: string | null;
  }): Promise<WebhookOutcome> {
    const callback = parseWithdrawalCallback(params.payload);
    if (!callback) {
      this.deps.logger.warn('Withdrawal callback not recognised');
      return { kind: 'invalid_payload' };
    }

    const verification = verifyWithdrawalCallback({
      rawBody: params.rawBody,
      headers: params.headers,
      config: this.deps.verifier,
      nowMs: this.clock().getTime()
    });
    if (!verification.valid) {
      this.deps.logger.warn('Withdrawal callback signature rejected', { reference: callback.reference, reason: verification.reason });
      return { kind: 'invalid_signature', reason: verification.reason };
    }

    return this.reconcile(callback, params.payload, params.ipAddress);
  }

  private async reconcile(callback: ParsedCallback, payload: unknown, ipAddress: string | null): Promise<WebhookOutcome> {
    const { store, provider, logger } = this.deps;
    const now = this.clock();
    const context = { now, ipAddress };

    const outcome = await store.transaction(async (uow): Promise<WebhookOutcome> => {
      const transfer = await uow.findByReferenceForUpdate(callback.reference);
      if (!transfer) {
        return { kind: 'not_found', reference: callback.reference };
      }

      await uow.appendAudit({
        transferId: transfer.transferId,
        event: 'webhook_received',
        metadata: receivedMetadata(callback, payload),
        ipAddress,
        createdAt: now
      });

      if (transfer.status !== PRECONDITION[callback.phase]) {
        return { kind: 'duplicate', reference: transfer.reference, status: transfer.status };
      }

      const event = callback.phase === 'deposit' ? depositEvent(callback) : withdrawalEvent(callback);
      if (!event) {
        return { kind: 'ignored', reference: transfer.reference, status: transfer.status };
      }

      const result = await commitTransition(uow, transfer, event, context);
      const current = requestsWithdrawal(result)
        ? await startWithdrawal(uow, result.transfer, provider, context, logger)
        : result.transfer;

      return { kind: 'applied', reference: current.reference, status: current.status };
    });

    logger.info('Callback reconciled', {
      phase: callback.phase,
      reference: callback.reference,
      callbackStatus: callback.status,
      outcome: outcome.kind,
      ...('status' in outcome ? { status: outcome.status } : {})
    });

    return outcome;
  }
}
