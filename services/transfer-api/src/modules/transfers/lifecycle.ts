import { AwdPayApiError, isAwdPayError, type AwdPayError, type PaymentProviderClient } from '@mobiremit/adapters';
import {
  applyTransferEvent,
  PAYOUT_GATEWAY_MISSING,
  resolveGateway,
  WITHDRAWAL_INIT_ERROR,
  WITHDRAWAL_INIT_TIMEOUT,
  type Transfer,
  type TransferEvent,
  type TransitionResult
} from '@mobiremit/domain';
import type { ServiceLogger } from '@mobiremit/observability';
import type { TransferUnitOfWork } from './types.js';

export interface TransitionContext {
  now: Date;
  ipAddress: string | null;
}

/**
 * Applies `event`, persists the transfer and writes its audit entries through
 * `uow`. Effects other than audits are returned for the caller to run.
 */
export async function commitTransition(
  uow: TransferUnitOfWork,
  transfer: Transfer,
  event: TransferEvent,
  context: TransitionContext
): Promise<TransitionResult> {
  const result = applyTransferEvent(transfer, event, context.now);
  await uow.updateTransfer(result.transfer);

  for (const effect of result.effects) {
    if (effect.kind === 'audit') {
      await uow.appendAudit({
        transferId: result.transfer.transferId,
        event: effect.event,
        metadata: effect.metadata,
        ipAddress: context.ipAddress,
        createdAt: context.now
      });
    }
  }

  return result;
}

export function requestsWithdrawal(result: TransitionResult): boolean {
  return result.effects.some((effect) => effect.kind === 'initiate_withdrawal');
}

function withdrawalFailureEvent(error: AwdPayError, gateway: string): TransferEvent {
  if (error instanceof AwdPayApiError && error.ambiguous) {
    return {
      type: 'withdrawal_initiated',
      withdrawalReference: null,
      gateway,
      unconfirmed: { errorCode: WITHDRAWAL_INIT_TIMEOUT, errorMessage: error.message }
    };
  }
  return { type: 'withdrawal_init_failed', errorCode: WITHDRAWAL_INIT_ERROR, errorMessage: error.message };
}

/**
 * Starts the payout leg of a transfer whose deposit has just been confirmed.
 * Provider failures are recorded on the transfer, never rethrown.
 */
export async function startWithdrawal(
  uow: TransferUnitOfWork,
  transfer: Transfer,
  provider: PaymentProviderClient,
  context: TransitionContext,
  logger: ServiceLogger
): Promise<Transfer> {
  const payout = resolveGateway(transfer.payoutProvider);
  if (!payout) {
    const message = `No gateway mapping for payout provider: ${transfer.payoutProvider}.`;
    logger.error('Withdrawal not started', { reference: transfer.reference, errorCode: PAYOUT_GATEWAY_MISSING });
    const failed = await commitTransition(
      uow,
      transfer,
      { type: 'withdrawal_init_failed', errorCode: PAYOUT_GATEWAY_MISSING, errorMessage: message },
      context
    );
    return failed.transfer;
  }

  try {
    const initiation = await provider.initiateWithdrawal({
      reference: transfer.reference,
      amount: transfer.destinationAmount,
      currency: payout.currency,
      gatewayName: payout.gatewayName,
      country: payout.country,
      beneficiaryPhone: transfer.recipientPhone,
      description: `Payout for ${transfer.reference}`
    });

    logger.info('Withdrawal initiated', {
      reference: transfer.reference,
      withdrawalReference: initiation.withdrawalReference,
      gateway: payout.gatewayName
    });

    const initiated = await commitTransition(
      uow,
      transfer,
      { type: 'withdrawal_initiated', withdrawalReference: initiation.withdrawalReference, gateway: payout.gatewayName },
      context
    );
    return initiated.transfer;
  } catch (error) {
    if (!isAwdPayError(error)) {
      throw error;
    }

    const event = withdrawalFailureEvent(error, payout.gatewayName);
    logger.error('Withdrawal initiation failed', {
      reference: transfer.reference,
      outcome: event.type === 'withdrawal_initiated' ? 'unknown' : 'failed',
      error: error.message
    });

    const recorded = await commitTransition(uow, transfer, event, context);
    return recorded.transfer;
  }
}
