import type { AuditEvent, LimitSnapshot, Transfer, TransferState } from '@mobiremit/domain';

export interface AuditEntry {
  transferId: string;
  event: AuditEvent;
  metadata: Record<string, unknown>;
  ipAddress: string | null;
  createdAt: Date;
}

export interface AuditRecord extends AuditEntry {
  id: number;
}

/** Writes that must commit or roll back together. */
export interface TransferUnitOfWork {
  /** Creates `initial` when the user has no row yet, then locks the row until the unit of work ends. */
  lockLimitSnapshot(userId: string, initial: LimitSnapshot): Promise<LimitSnapshot>;
  saveLimitSnapshot(snapshot: LimitSnapshot): Promise<void>;
  insertTransfer(transfer: Transfer): Promise<void>;
  updateTransfer(transfer: Transfer): Promise<void>;
  appendAudit(entry: AuditEntry): Promise<void>;
  findByReferenceForUpdate(reference: string): Promise<Transfer | null>;
}

export interface TransferListFilter {
  status?: TransferState;
  limit: number;
  offset: number;
}

export interface TransferPage {
  items: Transfer[];
  total: number;
}

export interface TransferStore {
  transaction<T>(fn: (uow: TransferUnitOfWork) => Promise<T>): Promise<T>;
  findForUser(userId: string, transferId: string): Promise<Transfer | null>;
  listForUser(userId: string, filter: TransferListFilter): Promise<TransferPage>;
  listAudit(transferId: string): Promise<AuditRecord[]>;
  findLimitSnapshot(userId: string): Promise<LimitSnapshot | null>;
}

export interface CreateTransferInput {
  userId: string;
  senderPhone: string;
  senderName: string;
  senderEmail?: string | null;
  recipientName: string;
  recipientPhone: string;
  recipientEmail?: string | null;
  amount: number;
  /** Defaults to the funding gateway's currency. */
  currency?: string;
  description?: string | null;
  fundingProvider: string;
  payoutProvider: string;
  deviceId: string;
  ipAddress: string | null;
}

export type CreateTransferOutcome = 'initiated' | 'unconfirmed';

export interface CreateTransferResult {
  transfer: Transfer;
  outcome: CreateTransferOutcome;
  message: string;
}

export interface TransferDetail {
  transfer: Transfer;
  auditLogs: AuditRecord[];
}

export interface TransferHistory {
  items: Transfer[];
  pagination: {
    total: number;
    limit: number;
    offset: number;
    hasMore: boolean;
  };
}
