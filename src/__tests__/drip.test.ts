import { describe, it, expect } from 'vitest';
import { calculateDrip, summarizeDrip } from '../services/drip.ts';
import { InvalidBaselineError, InvalidGrowthRateError, InvalidHorizonError } from '../shared/errors.ts';
import type { DripInput } from '../types.ts';

const base: DripInput = {
  initialShares: 100,
  sharePrice: 10,
  annualDividend: 1,
  dividendGrowthRate: 0,
  sharePriceGrowthRate: 0,
  years: 1,
  paymentsPerYear: 1,
};

describe('calculateDrip', () => {
  it('reinvests each payment at the current price', () => {
    const rows = calculateDrip(base);
    expect(rows).toEqual([
      {
        yearOffset: 0, shares: 110, sharesAdded: 10, sharePrice: 10, annualDividend: 1,
        dividendIncome: 100, portfolioValue: 1100, valueWithoutDrip: 1000, dripBenefit: 100,
      },
      {
        yearOffset: 1, shares: 121, sharesAdded: 11, sharePrice: 10, annualDividend: 1,
        dividendIncome: 110, portfolioValue: 1210, valueWithoutDrip: 1000, dripBenefit: 210,
      },
    ]);
  });

  it('compounds within the year for quarterly payments', () => {
    const [first] = calculateDrip({ ...base, paymentsPerYear: 4 });
    expect(first?.dividendIncome).toBe(100);
    expect(first?.shares).toBeCloseTo(110.3812890625, 8);
    expect(first?.sharesAdded).toBeCloseTo(10.3812890625, 8);
  });

  it('grows price and dividend from the starting values', () => {
    const rows = calculateDrip({ ...base, years: 2, sharePriceGrowthRate: 0.1, dividendGrowthRate: 0.5 });
    expect(rows.map(r => r.sharePrice)).toEqual([10, 10 * 1.1, 10 * Math.pow(1.1, 2)]);
    expect(rows.map(r => r.annualDividend)).toEqual([1, 1.5, 2.25]);
    expect(rows.map(r => r.valueWithoutDrip)).toEqual(rows.map(r => 100 * r.sharePrice));
  });

  it('stops reinvesting once the dividend is clamped to zero', () => {
    const rows = calculateDrip({ ...base, years: 2, dividendGrowthRate: -4 });
    expect(rows.map(r => r.annualDividend)).toEqual([1, 0, 0]);
    expect(rows.map(r => r.sharesAdded)).toEqual([10, 0, 0]);
  });

  it('rejects a share price that would fall to zero', () => {
    expect(() => calculateDrip({ ...base, sharePriceGrowthRate: -1 })).toThrow(InvalidGrowthRateError);
    expect(() => calculateDrip({ ...base, sharePriceGrowthRate: -3 })).toThrow(InvalidGrowthRateError);
  });

  it('rejects growth that overflows the share price or dividend', () => {
    expect(() => calculateDrip({ ...base, years: 30, sharePrice: 1e300, sharePriceGrowthRate: 10 })).toThrow(InvalidGrowthRateError);
    expect(() => calculateDrip({ ...base, years: 30, annualDividend: 1e300, dividendGrowthRate: 10 })).toThrow(InvalidGrowthRateError);
  });

  it('validates starting values and horizon', () => {
    expect(() => calculateDrip({ ...base, sharePrice: 0 })).toThrow(InvalidBaselineError);
    expect(() => calculateDrip({ ...base, initialShares: -5 })).toThrow(InvalidBaselineError);
    expect(() => calculateDrip({ ...base, annualDividend: Number.NaN })).toThrow(InvalidBaselineError);
    expect(() => calculateDrip({ ...base, years: 0 })).toThrow(InvalidHorizonError);
  });
});

describe('summarizeDrip', () => {
  it('reports return, DRIP advantage and income', () => {
    const stats = summarizeDrip(calculateDrip(base));
    expect(stats.totalReturnRate).toBeCloseTo(0.1, 10);
    expect(stats.dripAdvantageRate).toBeCloseTo(0.21, 10);
    expect(stats.sharesGained).toBe(11);
    expect(stats.totalDividends).toBe(210);
  });

  it('has no rates for an empty simulation', () => {
    expect(summarizeDrip([])).toEqual({ totalReturnRate: null, dripAdvantageRate: null, sharesGained: 0, totalDividends: 0 });
  });
});
