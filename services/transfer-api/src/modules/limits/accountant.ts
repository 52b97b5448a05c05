import {
  createLimitSnapshot,
  KYC_LIMITS,
  remainingLimits,
  reserveUsage,
  rollLimitSnapshot,
  type KycLevel,
  type KycLimits,
  type LimitSnapshot,
  type RemainingLimits
} from '@mobiremit/domain';

export interface LimitSnapshotWriter {
  lockLimitSnapshot(userId: string, initial: LimitSnapshot): Promise<LimitSnapshot>;
  saveLimitSnapshot(snapshot: LimitSnapshot): Promise<void>;
}

/**
 * Per-user spending windows. `forUser` must run inside the unit of work that
 * later reserves usage: the snapshot row stays locked until it commits.
 */
export class LimitAccountant {
  constructor(private readonly tiers: Record<KycLevel, KycLimits> = KYC_LIMITS) {}

  limitsFor(level: KycLevel): KycLimits {
    return this.tiers[level];
  }

  async forUser(writer: LimitSnapshotWriter, userId: string, now: Date): Promise<LimitSnapshot> {
    const locked = await writer.lockLimitSnapshot(userId, createLimitSnapshot(userId, now));
    const rolled = rollLimitSnapshot(locked, now);
    if (rolled.changed) {
      await writer.saveLimitSnapshot(rolled.snapshot);
    }
    return rolled.snapshot;
  }

  async reserve(writer: LimitSnapshotWriter, snapshot: LimitSnapshot, amount: number): Promise<LimitSnapshot> {
    const next = reserveUsage(snapshot, amount);
    await writer.saveLimitSnapshot(next);
    return next;
  }

  /** Read-only view: rolls a stored snapshot forward in memory without persisting it. */
  view(stored: LimitSnapshot | null, userId: string, now: Date): LimitSnapshot {
    return stored ? rollLimitSnapshot(stored, now).snapshot : createLimitSnapshot(userId, now);
  }

  remaining(snapshot: LimitSnapshot, level: KycLevel): RemainingLimits {
    return remainingLimits(snapshot, this.limitsFor(level));
  }
}
