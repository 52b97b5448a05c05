import { addMoney, clamp, roundMoney } from './money.js';

interface FeeTier {
  /** Inclusive upper bound; the last tier is open-ended. */
  upTo: number;
  rate: number;
  floor: number;
  cap: number;
}

const FLAT_FEE_TIERS: readonly FeeTier[] = [
  { upTo: 10_000, rate: 0, floor: 50, cap: 50 },
  { upTo: 50_000, rate: 0.01, floor: 100, cap: 500 },
  { upTo: 200_000, rate: 0.008, floor: 500, cap: 1_500 },
  { upTo: Number.POSITIVE_INFINITY, rate: 0.005, floor: 1_500, cap: 5_000 }
];

export interface CorridorFeeRule {
  fixedFee: number;
  /** Percent of the amount, e.g. 1.5 for 1.5%. */
  percentageFee: number;
}

export type FeeSource = 'corridor' | 'flat_schedule';

export interface FeeQuote {
  serviceFee: number;
  totalAmount: number;
  source: FeeSource;
}

export function calculateFlatFee(amount: number): number {
  const tier = FLAT_FEE_TIERS.find((candidate) => amount <= candidate.upTo);
  if (!tier) {
    throw new RangeError(`No fee tier matches amount ${amount}.`);
  }
  return roundMoney(clamp(amount * tier.rate, tier.floor, tier.cap));
}

export function calculateCorridorFee(amount: number, rule: CorridorFeeRule): number {
  return roundMoney(rule.fixedFee + (amount * rule.percentageFee) / 100);
}

export function hasCorridorFee(rule: CorridorFeeRule | null | undefined): rule is CorridorFeeRule {
  return rule !== null && rule !== undefined && (rule.fixedFee > 0 || rule.percentageFee > 0);
}

/** A corridor with a configured fee supersedes the flat schedule. */
export function quoteServiceFee(amount: number, corridor?: CorridorFeeRule | null): FeeQuote {
  const normalizedAmount = roundMoney(amount);
  const source: FeeSource = hasCorridorFee(corridor) ? 'corridor' : 'flat_schedule';
  const serviceFee = hasCorridorFee(corridor)
    ? calculateCorridorFee(normalizedAmount, corridor)
    : calculateFlatFee(normalizedAmount);

  return {
    serviceFee,
    totalAmount: addMoney(normalizedAmount, serviceFee),
    source
  };
}
