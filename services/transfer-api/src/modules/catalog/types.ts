import type { CorridorFeeRule, KycLevel } from '@mobiremit/domain';

export interface Corridor extends CorridorFeeRule {
  corridorId: string;
  sourceCountry: string;
  destinationCountry: string;
  minAmount: number;
  maxAmount: number;
}

export interface KycProfile {
  userId: string;
  kycLevel: KycLevel;
  verificationStatus: string;
}

/** Read-only lookups owned by other parts of the platform. Absence is explicit. */
export interface CatalogPort {
  findActiveCorridor(sourceCountry: string, destinationCountry: string): Promise<Corridor | null>;
  findKycProfile(userId: string): Promise<KycProfile | null>;
}
