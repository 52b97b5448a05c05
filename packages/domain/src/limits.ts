import { formatAmount } from './currency.js';
import { addMoney, roundMoney } from './money.js';

export const KYC_LEVELS = ['basic', 'intermediate', 'advanced'] as const;
export type KycLevel = (typeof KYC_LEVELS)[number];

export interface KycLimits {
  transactionLimit: number;
  dailyLimit: number;
  monthlyLimit: number;
}

export const KYC_LIMITS: Record<KycLevel, KycLimits> = {
  basic: { transactionLimit: 50_000, dailyLimit: 100_000, monthlyLimit: 500_000 },
  intermediate: { transactionLimit: 200_000, dailyLimit: 500_000, monthlyLimit: 2_000_000 },
  advanced: { transactionLimit: 1_000_000, dailyLimit: 2_000_000, monthlyLimit: 10_000_000 }
};

export function isKycLevel(value: string): value is KycLevel {
  return KYC_LEVELS.some((level) => level === value);
}

/**
 * Per-user usage for the current calendar month and day. Dates are
 * `YYYY-MM-DD` strings in UTC.
 */
export interface LimitSnapshot {
  userId: string;
  periodStart: string;
  periodEnd: string;
  totalSent: number;
  transferCount: number;
  dailyDate: string;
  dailySent: number;
  dailyCount: number;
}

export interface UsageWindow {
  limit: number;
  used: number;
  remaining: number;
}

export interface RemainingLimits {
  perTransactionLimit: number;
  daily: UsageWindow;
  monthly: UsageWindow;
}

export type LimitScope = 'transaction' | 'daily' | 'monthly';

export type LimitEvaluation =
  | { allowed: true }
  | { allowed: false; scope: LimitScope; limit: number; remaining: number; message: string };

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function calendarMonth(now: Date): { start: string; end: string } {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  return {
    start: isoDate(new Date(Date.UTC(year, month, 1))),
    // day 0 of the next month is the last day of this one
    end: isoDate(new Date(Date.UTC(year, month + 1, 0)))
  };
}

export function createLimitSnapshot(userId: string, now: Date): LimitSnapshot {
  const month = calendarMonth(now);
  return {
    userId,
    periodStart: month.start,
    periodEnd: month.end,
    totalSent: 0,
    transferCount: 0,
    dailyDate: isoDate(now),
    dailySent: 0,
    dailyCount: 0
  };
}

/** Resets whichever window the clock has left. `changed` tells the caller to persist. */
export function rollLimitSnapshot(snapshot: LimitSnapshot, now: Date): { snapshot: LimitSnapshot; changed: boolean } {
  const month = calendarMonth(now);
  const today = isoDate(now);
  let next = snapshot;

  if (next.periodStart !== month.start) {
    next = { ...next, periodStart: month.start, periodEnd: month.end, totalSent: 0, transferCount: 0 };
  }

  if (next.dailyDate !== today) {
    next = { ...next, dailyDate: today, dailySent: 0, dailyCount: 0 };
  }

  return { snapshot: next, changed: next !== snapshot };
}

function usageWindow(limit: number, used: number): UsageWindow {
  return { limit, used, remaining: Math.max(roundMoney(limit - used), 0) };
}

export function remainingLimits(snapshot: LimitSnapshot, limits: KycLimits): RemainingLimits {
  return {
    perTransactionLimit: limits.transactionLimit,
    daily: usageWindow(limits.dailyLimit, snapshot.dailySent),
    monthly: usageWindow(limits.monthlyLimit, snapshot.totalSent)
  };
}

/** Checks per-transaction, then daily, then monthly headroom. */
export function evaluateLimits(
  snapshot: LimitSnapshot,
  limits: KycLimits,
  amount: number,
  currency: string
): LimitEvaluation {
  if (amount > limits.transactionLimit) {
    return {
      allowed: false,
      scope: 'transaction',
      limit: limits.transactionLimit,
      remaining: limits.transactionLimit,
      message: `Max per transaction for your KYC level is ${formatAmount(limits.transactionLimit, currency)}.`
    };
  }

  const remaining = remainingLimits(snapshot, limits);

  if (addMoney(snapshot.dailySent, amount) > limits.dailyLimit) {
    return {
      allowed: false,
      scope: 'daily',
      limit: limits.dailyLimit,
      remaining: remaining.daily.remaining,
      message: `Daily limit exceeded. Remaining today: ${formatAmount(remaining.daily.remaining, currency)}.`
    };
  }

  if (addMoney(snapshot.totalSent, amount) > limits.monthlyLimit) {
    return {
      allowed: false,
      scope: 'monthly',
      limit: limits.monthlyLimit,
      remaining: remaining.monthly.remaining,
      message: `Monthly limit exceeded. Remaining this month: ${formatAmount(remaining.monthly.remaining, currency)}.`
    };
  }

  return { allowed: true };
}

export function reserveUsage(snapshot: LimitSnapshot, amount: number): LimitSnapshot {
  return {
    ...snapshot,
    totalSent: addMoney(snapshot.totalSent, amount),
    transferCount: snapshot.transferCount + 1,
    dailySent: addMoney(snapshot.dailySent, amount),
    dailyCount: snapshot.dailyCount + 1
  };
}
