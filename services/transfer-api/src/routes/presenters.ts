import type { Transfer } from '@mobiremit/domain';
import type { AuditRecord, LimitsOverview } from '../modules/transfers/index.js';

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function presentTransfer(transfer: Transfer) {
  return {
    transferId: transfer.transferId,
    reference: transfer.reference,
    status: transfer.status,
    amount: transfer.amount,
    currency: transfer.currency,
    serviceFee: transfer.serviceFee,
    totalAmount: transfer.totalAmount,
    destinationAmount: transfer.destinationAmount,
    destinationCurrency: transfer.destinationCurrency,
    senderName: transfer.senderName,
    senderPhone: transfer.senderPhone,
    recipientName: transfer.recipientName,
    recipientPhone: transfer.recipientPhone,
    fundingProvider: transfer.fundingProvider,
    payoutProvider: transfer.payoutProvider,
    depositReference: transfer.depositReference,
    depositStatus: transfer.depositStatus,
    withdrawalReference: transfer.withdrawalReference,
    withdrawalStatus: transfer.withdrawalStatus,
    description: transfer.description,
    errorCode: transfer.errorCode,
    errorMessage: transfer.errorMessage,
    depositInitiatedAt: iso(transfer.depositInitiatedAt),
    depositConfirmedAt: iso(transfer.depositConfirmedAt),
    withdrawalInitiatedAt: iso(transfer.withdrawalInitiatedAt),
    withdrawalConfirmedAt: iso(transfer.withdrawalConfirmedAt),
    completedAt: iso(transfer.completedAt),
    createdAt: transfer.createdAt.toISOString(),
    updatedAt: transfer.updatedAt.toISOString()
  };
}

/** List rows omit provider bookkeeping. */
export function presentTransferSummary(transfer: Transfer) {
  return {
    transferId: transfer.transferId,
    reference: transfer.reference,
    status: transfer.status,
    amount: transfer.amount,
    currency: transfer.currency,
    serviceFee: transfer.serviceFee,
    totalAmount: transfer.totalAmount,
    recipientName: transfer.recipientName,
    recipientPhone: transfer.recipientPhone,
    payoutProvider: transfer.payoutProvider,
    createdAt: transfer.createdAt.toISOString(),
    completedAt: iso(transfer.completedAt)
  };
}

export function presentAuditRecord(record: AuditRecord) {
  return {
    event: record.event,
    metadata: record.metadata,
    createdAt: record.createdAt.toISOString()
  };
}

export function presentLimits(overview: LimitsOverview) {
  const { snapshot } = overview;
  return {
    kycLevel: overview.kycLevel,
    kycVerified: overview.kycVerified,
    usage: {
      periodStart: snapshot.periodStart,
      periodEnd: snapshot.periodEnd,
      totalSent: snapshot.totalSent,
      transferCount: snapshot.transferCount,
      dailyDate: snapshot.dailyDate,
      dailySent: snapshot.dailySent,
      dailyCount: snapshot.dailyCount
    },
    remaining: overview.remaining
  };
}
