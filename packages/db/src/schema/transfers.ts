import { sql } from 'drizzle-orm';
import { bigserial, boolean, check, date, index, integer, jsonb, numeric, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const corridors = pgTable(
  'corridor',
  {
    corridorId: text('corridor_id').primaryKey(),
    sourceCountry: text('source_country').notNull(),
    destinationCountry: text('destination_country').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    fixedFee: numeric('fixed_fee', { precision: 15, scale: 2 }).notNull().default('0'),
    percentageFee: numeric('percentage_fee', { precision: 5, scale: 2 }).notNull().default('0'),
    minAmount: numeric('min_amount', { precision: 15, scale: 2 }).notNull().default('100'),
    maxAmount: numeric('max_amount', { precision: 15, scale: 2 }).notNull().default('10000000'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    routeIdx: index('idx_corridor_route').on(table.sourceCountry, table.destinationCountry)
  })
);

export const kycProfiles = pgTable('kyc_profile', {
  userId: text('user_id').primaryKey(),
  kycLevel: text('kyc_level').notNull(),
  verificationStatus: text('verification_status').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
});

export const transfers = pgTable(
  'transfer',
  {
    transferId: text('transfer_id').primaryKey(),
    reference: text('reference').notNull().unique(),
    userId: text('user_id').notNull(),
    status: text('status').notNull(),
    senderPhone: text('sender_phone').notNull(),
    senderName: text('sender_name').notNull(),
    senderEmail: text('sender_email'),
    fundingProvider: text('funding_provider').notNull(),
    payoutProvider: text('payout_provider').notNull(),
    corridorId: text('corridor_id').references(() => corridors.corridorId),
    amount: numeric('amount', { precision: 15, scale: 2 }).notNull(),
    currency: text('currency').notNull(),
    serviceFee: numeric('service_fee', { precision: 15, scale: 2 }).notNull(),
    totalAmount: numeric('total_amount', { precision: 15, scale: 2 }).notNull(),
    destinationAmount: numeric('destination_amount', { precision: 15, scale: 2 }).notNull(),
    destinationCurrency: text('destination_currency').notNull(),
    recipientName: text('recipient_name').notNull(),
    recipientPhone: text('recipient_phone').notNull(),
    recipientEmail: text('recipient_email'),
    provider: text('provider').notNull(),
    depositReference: text('deposit_reference'),
    depositStatus: text('deposit_status'),
    depositGateway: text('deposit_gateway'),
    depositInitiatedAt: timestamp('deposit_initiated_at', { withTimezone: true }),
    depositConfirmedAt: timestamp('deposit_confirmed_at', { withTimezone: true }),
    withdrawalReference: text('withdrawal_reference'),
    withdrawalStatus: text('withdrawal_status'),
    withdrawalGateway: text('withdrawal_gateway'),
    withdrawalInitiatedAt: timestamp('withdrawal_initiated_at', { withTimezone: true }),
    withdrawalConfirmedAt: timestamp('withdrawal_confirmed_at', { withTimezone: true }),
    description: text('description'),
    deviceId: text('device_id'),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    errorCode: text('error_code'),
    errorMessage: text('error_message'),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    userCreatedIdx: index('idx_transfer_user_created').on(table.userId, table.createdAt),
    statusIdx: index('idx_transfer_status').on(table.status),
    totalCheck: check('transfer_total_amount_check', sql`${table.totalAmount} = ${table.amount} + ${table.serviceFee}`)
  })
);

export const transferAuditLogs = pgTable(
  'transfer_audit_log',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    transferId: text('transfer_id')
      .notNull()
      .references(() => transfers.transferId, { onDelete: 'cascade' }),
    event: text('event').notNull(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
    ipAddress: text('ip_address'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    transferIdx: index('idx_transfer_audit_log_transfer').on(table.transferId, table.createdAt)
  })
);

export const transferLimitSnapshots = pgTable('transfer_limit_snapshot', {
  userId: text('user_id').primaryKey(),
  periodStart: date('period_start', { mode: 'string' }).notNull(),
  periodEnd: date('period_end', { mode: 'string' }).notNull(),
  totalSent: numeric('total_sent', { precision: 15, scale: 2 }).notNull().default('0'),
  transferCount: integer('transfer_count').notNull().default(0),
  dailyDate: date('daily_date', { mode: 'string' }).notNull(),
  dailySent: numeric('daily_sent', { precision: 15, scale: 2 }).notNull().default('0'),
  dailyCount: integer('daily_count').notNull().default(0),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
});
