import { describe, expect, it } from 'vitest';
import { calculateCorridorFee, calculateFlatFee, quoteServiceFee } from '../src/fees.js';
import { roundMoney } from '../src/money.js';

describe('flat fee schedule', () => {
  it('charges a flat 50 up to and including 10,000', () => {
    expect(calculateFlatFee(100)).toBe(50);
    expect(calculateFlatFee(10_000)).toBe(50);
  });

  it('moves to the 1% tier just above 10,000', () => {
    expect(calculateFlatFee(10_000.01)).toBe(100);
    expect(calculateFlatFee(20_000)).toBe(200);
    expect(calculateFlatFee(50_000)).toBe(500);
  });

  it('applies the floors and caps of the upper tiers', () => {
    expect(calculateFlatFee(50_000.01)).toBe(500);
    expect(calculateFlatFee(100_000)).toBe(800);
    expect(calculateFlatFee(200_000)).toBe(1_500);
    expect(calculateFlatFee(200_001)).toBe(1_500);
    expect(calculateFlatFee(600_000)).toBe(3_000);
    expect(calculateFlatFee(2_000_000)).toBe(5_000);
  });
});

describe('corridor fees', () => {
  it('adds the fixed part to the percentage of the amount', () => {
    expect(calculateCorridorFee(20_000, { fixedFee: 150, percentageFee: 1 })).toBe(350);
    expect(calculateCorridorFee(1_000, { fixedFee: 0, percentageFee: 1.5 })).toBe(15);
  });

  it('supersedes the flat schedule only when configured', () => {
    expect(quoteServiceFee(20_000, { fixedFee: 150, percentageFee: 1 })).toEqual({
      serviceFee: 350,
      totalAmount: 20_350,
      source: 'corridor'
    });
    expect(quoteServiceFee(20_000, { fixedFee: 0, percentageFee: 0 })).toEqual({
      serviceFee: 200,
      totalAmount: 20_200,
      source: 'flat_schedule'
    });
    expect(quoteServiceFee(20_000)).toEqual({ serviceFee: 200, totalAmount: 20_200, source: 'flat_schedule' });
  });
});

describe('roundMoney', () => {
  it('rounds half away from zero to cents', () => {
    expect(roundMoney(1.005)).toBe(1.01);
    expect(roundMoney(-1.005)).toBe(-1.01);
    expect(roundMoney(100.0001)).toBe(100);
  });
});
