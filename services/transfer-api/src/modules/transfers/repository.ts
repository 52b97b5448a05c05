import { getDb, schema, withTransaction, type QueryFn } from '@mobiremit/db';
import { isAuditEvent, isTransferState, parseMoney, type LimitSnapshot, type Transfer } from '@mobiremit/domain';
import { and, asc, count, desc, eq, isNull } from 'drizzle-orm';
import type {
  AuditEntry,
  AuditRecord,
  TransferListFilter,
  TransferPage,
  TransferStore,
  TransferUnitOfWork
} from './types.js';

type TransferRow = typeof schema.transfers.$inferSelect;

// a type alias (not an interface) so it satisfies the query row constraint
type LimitSnapshotRow = {
  userId: string;
  periodStart: string;
  periodEnd: string;
  totalSent: string;
  transferCount: number;
  dailyDate: string;
  dailySent: string;
  dailyCount: number;
};

// column name -> Transfer property, shared by the select list and the mapper
const TRANSFER_COLUMNS = [
  ['transfer_id', 'transferId'],
  ['reference', 'reference'],
  ['user_id', 'userId'],
  ['status', 'status'],
  ['sender_phone', 'senderPhone'],
  ['sender_name', 'senderName'],
  ['sender_email', 'senderEmail'],
  ['funding_provider', 'fundingProvider'],
  ['payout_provider', 'payoutProvider'],
  ['corridor_id', 'corridorId'],
  ['amount', 'amount'],
  ['currency', 'currency'],
  ['service_fee', 'serviceFee'],
  ['total_amount', 'totalAmount'],
  ['destination_amount', 'destinationAmount'],
  ['destination_currency', 'destinationCurrency'],
  ['recipient_name', 'recipientName'],
  ['recipient_phone', 'recipientPhone'],
  ['recipient_email', 'recipientEmail'],
  ['provider', 'provider'],
  ['deposit_reference', 'depositReference'],
  ['deposit_status', 'depositStatus'],
  ['deposit_gateway', 'depositGateway'],
  ['deposit_initiated_at', 'depositInitiatedAt'],
  ['deposit_confirmed_at', 'depositConfirmedAt'],
  ['withdrawal_reference', 'withdrawalReference'],
  ['withdrawal_status', 'withdrawalStatus'],
  ['withdrawal_gateway', 'withdrawalGateway'],
  ['withdrawal_initiated_at', 'withdrawalInitiatedAt'],
  ['withdrawal_confirmed_at', 'withdrawalConfirmedAt'],
  ['description', 'description'],
  ['device_id', 'deviceId'],
  ['completed_at', 'completedAt'],
  ['error_code', 'errorCode'],
  ['error_message', 'errorMessage'],
  ['deleted_at', 'deletedAt'],
  ['created_at', 'createdAt'],
  ['updated_at', 'updatedAt']
] as const satisfies ReadonlyArray<readonly [string, keyof Transfer]>;

const TRANSFER_SELECT = TRANSFER_COLUMNS.map(([column, property]) => `${column} as "${property}"`).join(', ');

const TRANSFER_INSERT_COLUMNS = TRANSFER_COLUMNS.map(([column]) => column).join(', ');
const TRANSFER_INSERT_VALUES = TRANSFER_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');

// identity and creation columns never change after insert
const IMMUTABLE_COLUMNS = new Set(['transfer_id', 'reference', 'user_id', 'created_at']);
const TRANSFER_UPDATE_COLUMNS = TRANSFER_COLUMNS.filter(([column]) => !IMMUTABLE_COLUMNS.has(column));

function transferValues(transfer: Transfer, columns: ReadonlyArray<readonly [string, keyof Transfer]>): unknown[] {
  return columns.map(([, property]) => transfer[property]);
}

export function mapTransferRow(row: TransferRow): Transfer {
  if (!isTransferState(row.status)) {
    throw new Error(`Transfer ${row.reference} has unknown status ${row.status}.`);
  }

  return {
    ...row,
    status: row.status,
    amount: parseMoney(row.amount),
    serviceFee: parseMoney(row.serviceFee),
    totalAmount: parseMoney(row.totalAmount),
    destinationAmount: parseMoney(row.destinationAmount)
  };
}

function mapSnapshotRow(row: LimitSnapshotRow): LimitSnapshot {
  return {
    userId: row.userId,
    periodStart: row.periodStart,
    periodEnd: row.periodEnd,
    totalSent: parseMoney(row.totalSent),
    transferCount: row.transferCount,
    dailyDate: row.dailyDate,
    dailySent: parseMoney(row.dailySent),
    dailyCount: row.dailyCount
  };
}

class PostgresTransferUnitOfWork implements TransferUnitOfWork {
  constructor(private readonly query: QueryFn) {}

  async lockLimitSnapshot(userId: string, initial: LimitSnapshot): Promise<LimitSnapshot> {
    await this.query(
      `
      insert into transfer_limit_snapshot (
        user_id, period_start, period_end, total_sent, transfer_count, daily_date, daily_sent, daily_count
      )
      values ($1, $2::date, $3::date, $4, $5, $6::date, $7, $8)
      on conflict (user_id) do nothing
      `,
      [
        initial.userId,
        initial.periodStart,
        initial.periodEnd,
        initial.totalSent,
        initial.transferCount,
        initial.dailyDate,
        initial.dailySent,
        initial.dailyCount
      ]
    );

    const result = await this.query<LimitSnapshotRow>(
      `
      select
        user_id as "userId",
        period_start::text as "periodStart",
        period_end::text as "periodEnd",
        total_sent::text as "totalSent",
        transfer_count as "transferCount",
        daily_date::text as "dailyDate",
        daily_sent::text as "dailySent",
        daily_count as "dailyCount"
      from transfer_limit_snapshot
      where user_id = $1
      for update
      `,
      [userId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Limit snapshot for ${userId} vanished while locking.`);
    }
    return mapSnapshotRow(row);
  }

  async saveLimitSnapshot(snapshot: LimitSnapshot): Promise<void> {
    await this.query(
      `
      update transfer_limit_snapshot
      set period_start = $2::date,
          period_end = $3::date,
          total_sent = $4,
          transfer_count = $5,
          daily_date = $6::date,
          daily_sent = $7,
          daily_count = $8,
          updated_at = now()
      where user_id = $1
      `,
      [
        snapshot.userId,
        snapshot.periodStart,
        snapshot.periodEnd,
        snapshot.totalSent,
        snapshot.transferCount,
        snapshot.dailyDate,
        snapshot.dailySent,
        snapshot.dailyCount
      ]
    );
  }

  async insertTransfer(transfer: Transfer): Promise<void> {
    await this.query(
      `insert into transfer (${TRANSFER_INSERT_COLUMNS}) values (${TRANSFER_INSERT_VALUES})`,
      transferValues(transfer, TRANSFER_COLUMNS)
    );
  }

  async updateTransfer(transfer: Transfer): Promise<void> {
    const assignments = TRANSFER_UPDATE_COLUMNS.map(([column], index) => `${column} = $${index + 2}`).join(', ');
    const result = await this.query(`update transfer set ${assignments} where transfer_id = $1`, [
      transfer.transferId,
      ...transferValues(transfer, TRANSFER_UPDATE_COLUMNS)
    ]);

    if (result.rowCount !== 1) {
      throw new Error(`Transfer ${transfer.reference} was not updated.`);
    }
  }

  async appendAudit(entry: AuditEntry): Promise<void> {
    await this.query(
      `
      insert into transfer_audit_log (transfer_id, event, metadata, ip_address, created_at)
      values ($1, $2, $3::jsonb, $4, $5)
      `,
      [entry.transferId, entry.event, entry.metadata, entry.ipAddress, entry.createdAt]
    );
  }

  async findByReferenceForUpdate(reference: string): Promise<Transfer | null> {
    const result = await this.query<TransferRow>(`select ${TRANSFER_SELECT} from transfer where reference = $1 for update`, [reference]);
    const row = result.rows[0];
    return row ? mapTransferRow(row) : null;
  }
}

export class TransferRepository implements TransferStore {
  private readonly db = getDb();

  async transaction<T>(fn: (uow: TransferUnitOfWork) => Promise<T>): Promise<T> {
    return withTransaction((tx) => fn(new PostgresTransferUnitOfWork(tx.query)));
  }

  async findForUser(userId: string, transferId: string): Promise<Transfer | null> {
    const rows = await this.db
      .select()
      .from(schema.transfers)
      .where(
        and(eq(schema.transfers.transferId, transferId), eq(schema.transfers.userId, userId), isNull(schema.transfers.deletedAt))
      )
      .limit(1);

    const row = rows[0];
    return row ? mapTransferRow(row) : null;
  }

  async listForUser(userId: string, filter: TransferListFilter): Promise<TransferPage> {
    const where = and(
      eq(schema.transfers.userId, userId),
      isNull(schema.transfers.deletedAt),
      filter.status ? eq(schema.transfers.status, filter.status) : undefined
    );

    const [rows, totals] = await Promise.all([
      this.db
        .select()
        .from(schema.transfers)
        .where(where)
        .orderBy(desc(schema.transfers.createdAt), desc(schema.transfers.transferId))
        .limit(filter.limit)
        .offset(filter.offset),
      this.db.select({ total: count() }).from(schema.transfers).where(where)
    ]);

    return {
      items: rows.map(mapTransferRow),
      total: totals[0]?.total ?? 0
    };
  }

  async listAudit(transferId: string): Promise<AuditRecord[]> {
    const rows = await this.db
      .select()
      .from(schema.transferAuditLogs)
      .where(eq(schema.transferAuditLogs.transferId, transferId))
      .orderBy(asc(schema.transferAuditLogs.createdAt), asc(schema.transferAuditLogs.id));

    return rows.flatMap((row) => {
      if (!isAuditEvent(row.event)) {
        return [];
      }
      return [
        {
          id: row.id,
          transferId: row.transferId,
          event: row.event,
          metadata: row.metadata,
          ipAddress: row.ipAddress,
          createdAt: row.createdAt
        }
      ];
    });
  }

  async findLimitSnapshot(userId: string): Promise<LimitSnapshot | null> {
    const rows = await this.db
      .select()
      .from(schema.transferLimitSnapshots)
      .where(eq(schema.transferLimitSnapshots.userId, userId))
      .limit(1);

    const row = rows[0];
    return row ? mapSnapshotRow(row) : null;
  }
}
