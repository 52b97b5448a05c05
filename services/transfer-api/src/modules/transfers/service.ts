import { AwdPayApiError, isAwdPayError, type PaymentProviderClient } from '@mobiremit/adapters';
import {
  createTransferRecord,
  DEPOSIT_INIT_ERROR,
  DEPOSIT_INIT_TIMEOUT,
  DEPOSIT_PROMPT_DELAYED_MESSAGE,
  DEPOSIT_PROMPT_MESSAGE,
  evaluateLimits,
  formatAmount,
  quoteServiceFee,
  requireGateway,
  roundMoney,
  type KycLevel,
  type LimitSnapshot,
  type RemainingLimits,
  type Transfer
} from '@mobiremit/domain';
import type { ServiceLogger } from '@mobiremit/observability';
import type { CatalogPort } from '../catalog/index.js';
import type { LimitAccountant } from '../limits/index.js';
import {
  AmountOutOfRangeError,
  CorridorNotSupportedError,
  DepositInitiationError,
  KycProfileRequiredError,
  LimitExceededError,
  TransferNotFoundError
} from './errors.js';
import { commitTransition } from './lifecycle.js';
import type {
  CreateTransferInput,
  CreateTransferResult,
  TransferDetail,
  TransferHistory,
  TransferListFilter,
  TransferStore
} from './types.js';

export interface TransferServiceDeps {
  store: TransferStore;
  catalog: CatalogPort;
  provider: PaymentProviderClient;
  limits: LimitAccountant;
  logger: ServiceLogger;
  clock?: () => Date;
}

export interface LimitsOverview {
  kycLevel: KycLevel | null;
  kycVerified: boolean;
  snapshot: LimitSnapshot;
  remaining: RemainingLimits | null;
}

type CreationOutcome =
  | { kind: 'initiated' | 'unconfirmed'; transfer: Transfer }
  | { kind: 'failed'; transfer: Transfer; providerMessage: string };

export class TransferService {
  private readonly clock: () => Date;

  constructor(private readonly deps: TransferServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async createTransfer(input: CreateTransferInput): Promise<CreateTransferResult> {
    const { store, catalog, provider, limits, logger } = this.deps;
    const now = this.clock();
    const amount = roundMoney(input.amount);

    const funding = requireGateway(input.fundingProvider);
    const payout = requireGateway(input.payoutProvider);
    const currency = input.currency ?? funding.currency;

    const corridor = await catalog.findActiveCorridor(funding.country, payout.country);
    if (!corridor) {
      throw new CorridorNotSupportedError(funding.country, payout.country);
    }

    const bounds = { minAmount: corridor.minAmount, maxAmount: corridor.maxAmount };
    if (amount < corridor.minAmount) {
      throw new AmountOutOfRangeError(`Minimum amount for this corridor is ${formatAmount(corridor.minAmount, currency)}.`, bounds);
    }
    if (amount > corridor.maxAmount) {
      throw new AmountOutOfRangeError(`Maximum amount for this corridor is ${formatAmount(corridor.maxAmount, currency)}.`, bounds);
    }

    const profile = await catalog.findKycProfile(input.userId);
    if (!profile) {
      throw new KycProfileRequiredError();
    }
    const kycLimits = limits.limitsFor(profile.kycLevel);
    const fee = quoteServiceFee(amount, corridor);

    const outcome = await store.transaction(async (uow): Promise<CreationOutcome> => {
      const snapshot = await limits.forUser(uow, input.userId, now);
      const evaluation = evaluateLimits(snapshot, kycLimits, amount, currency);
      if (!evaluation.allowed) {
        logger.warn('Transfer rejected by limits', { userId: input.userId, scope: evaluation.scope, remaining: evaluation.remaining });
        throw new LimitExceededError(evaluation.message, {
          scope: evaluation.scope,
          limit: evaluation.limit,
          remaining: evaluation.remaining
        });
      }

      const transfer = createTransferRecord(
        {
          userId: input.userId,
          senderPhone: input.senderPhone,
          senderName: input.senderName,
          senderEmail: input.senderEmail,
          fundingProvider: input.fundingProvider,
          payoutProvider: input.payoutProvider,
          corridorId: corridor.corridorId,
          amount,
          currency,
          serviceFee: fee.serviceFee,
          destinationCurrency: payout.currency,
          recipientName: input.recipientName,
          recipientPhone: input.recipientPhone,
          recipientEmail: input.recipientEmail,
          description: input.description,
          deviceId: input.deviceId
        },
        now
      );

      await uow.insertTransfer(transfer);
      await uow.appendAudit({
        transferId: transfer.transferId,
        event: 'created',
        metadata: {
          device_id: input.deviceId,
          kyc_level: profile.kycLevel,
          corridor_id: corridor.corridorId,
          fee_source: fee.source
        },
        ipAddress: input.ipAddress,
        createdAt: now
      });

      const context = { now, ipAddress: input.ipAddress };

      try {
        const deposit = await provider.initiateDeposit({
          reference: transfer.reference,
          amount: transfer.amount,
          currency: transfer.currency,
          gatewayName: funding.gatewayName,
          country: funding.country,
          senderPhone: transfer.senderPhone,
          customerName: transfer.senderName,
          customerEmail: transfer.senderEmail,
          description: transfer.description
        });

        const initiated = await commitTransition(
          uow,
          transfer,
          { type: 'deposit_initiated', depositReference: deposit.depositReference, gateway: funding.gatewayName },
          context
        );
        await limits.reserve(uow, snapshot, transfer.amount);

        logger.info('Deposit initiated', {
          reference: transfer.reference,
          depositReference: deposit.depositReference,
          gateway: funding.gatewayName
        });
        return { kind: 'initiated', transfer: initiated.transfer };
      } catch (error) {
        if (!isAwdPayError(error)) {
          throw error;
        }

        if (error instanceof AwdPayApiError && error.ambiguous) {
          const pending = await commitTransition(
            uow,
            transfer,
            {
              type: 'deposit_initiated',
              depositReference: null,
              gateway: funding.gatewayName,
              unconfirmed: { errorCode: DEPOSIT_INIT_TIMEOUT, errorMessage: error.message }
            },
            context
          );
          await limits.reserve(uow, snapshot, transfer.amount);

          logger.warn('Deposit outcome unknown', { reference: transfer.reference, error: error.message });
          return { kind: 'unconfirmed', transfer: pending.transfer };
        }

        const failed = await commitTransition(
          uow,
          transfer,
          { type: 'deposit_init_failed', errorCode: DEPOSIT_INIT_ERROR, errorMessage: error.message },
          context
        );

        logger.error('Deposit initiation failed', { reference: transfer.reference, status: error.status, error: error.message });
        return { kind: 'failed', transfer: failed.transfer, providerMessage: error.message };
      }
    });

    if (outcome.kind === 'failed') {
      throw new DepositInitiationError(outcome.transfer, outcome.providerMessage);
    }

    return {
      transfer: outcome.transfer,
      outcome: outcome.kind,
      message: outcome.kind === 'initiated' ? DEPOSIT_PROMPT_MESSAGE : DEPOSIT_PROMPT_DELAYED_MESSAGE
    };
  }

  async getTransfer(userId: string, transferId: string): Promise<TransferDetail> {
    const transfer = await this.deps.store.findForUser(userId, transferId);
    if (!transfer) {
      throw new TransferNotFoundError(transferId);
    }
    const auditLogs = await this.deps.store.listAudit(transfer.transferId);
    return { transfer, auditLogs };
  }

  async listTransfers(userId: string, filter: TransferListFilter): Promise<TransferHistory> {
    const page = await this.deps.store.listForUser(userId, filter);
    return {
      items: page.items,
      pagination: {
        total: page.total,
        limit: filter.limit,
        offset: filter.offset,
        hasMore: filter.offset + filter.limit < page.total
      }
    };
  }

  async getLimits(userId: string): Promise<LimitsOverview> {
    const [stored, profile] = await Promise.all([
      this.deps.store.findLimitSnapshot(userId),
      this.deps.catalog.findKycProfile(userId)
    ]);
    const snapshot = this.deps.limits.view(stored, userId, this.clock());

    return {
      kycLevel: profile?.kycLevel ?? null,
      kycVerified: profile?.verificationStatus === 'approved',
      snapshot,
      remaining: profile ? this.deps.limits.remaining(snapshot, profile.kycLevel) : null
    };
  }
}
