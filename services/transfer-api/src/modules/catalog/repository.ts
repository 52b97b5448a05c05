import { getDb, schema } from '@mobiremit/db';
import { isKycLevel, parseMoney } from '@mobiremit/domain';
import { log } from '@mobiremit/observability';
import { and, asc, eq } from 'drizzle-orm';
import type { CatalogPort, Corridor, KycProfile } from './types.js';

export class CatalogRepository implements CatalogPort {
  private readonly db = getDb();

  async findActiveCorridor(sourceCountry: string, destinationCountry: string): Promise<Corridor | null> {
    const rows = await this.db
      .select({
        corridorId: schema.corridors.corridorId,
        sourceCountry: schema.corridors.sourceCountry,
        destinationCountry: schema.corridors.destinationCountry,
        fixedFee: schema.corridors.fixedFee,
        percentageFee: schema.corridors.percentageFee,
        minAmount: schema.corridors.minAmount,
        maxAmount: schema.corridors.maxAmount
      })
      .from(schema.corridors)
      .where(
        and(
          eq(schema.corridors.sourceCountry, sourceCountry),
          eq(schema.corridors.destinationCountry, destinationCountry),
          eq(schema.corridors.isActive, true)
        )
      )
      .orderBy(asc(schema.corridors.corridorId))
      .limit(1);

    const row = rows[0];
    if (!row) {
      return null;
    }

    return {
      ...row,
      fixedFee: parseMoney(row.fixedFee),
      percentageFee: parseMoney(row.percentageFee),
      minAmount: parseMoney(row.minAmount),
      maxAmount: parseMoney(row.maxAmount)
    };
  }

  async findKycProfile(userId: string): Promise<KycProfile | null> {
    const rows = await this.db
      .select({
        userId: schema.kycProfiles.userId,
        kycLevel: schema.kycProfiles.kycLevel,
        verificationStatus: schema.kycProfiles.verificationStatus
      })
      .from(schema.kycProfiles)
      .where(eq(schema.kycProfiles.userId, userId))
      .limit(1);

    const row = rows[0];
    if (!row) {
      return null;
    }

    if (!isKycLevel(row.kycLevel)) {
      log('warn', 'Unknown KYC level on profile', { userId, kycLevel: row.kycLevel });
      return null;
    }

    return { userId: row.userId, kycLevel: row.kycLevel, verificationStatus: row.verificationStatus };
  }
}
