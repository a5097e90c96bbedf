/**
 * drip.ts — Dividend reinvestment (DRIP) simulation
 *
 * Year 0 is the first simulated year. Each year pays `paymentsPerYear`
 * instalments of the annual dividend and every instalment buys shares at
 * that year's price, so later instalments earn on the shares bought by
 * earlier ones. Price and dividend per share for a year come from the
 * closed form on the starting values.
 */
import { defaultEngineConfig } from '../config/engine.ts';
import { InvalidBaselineError, InvalidGrowthRateError } from '../shared/errors.ts';
import { assertFiniteGrowth, assertHorizon, clampGrowthRate } from './projection.ts';
import { sum, ratioOrNull } from './helpers.ts';
import type { DripInput, DripStats, DripYear, EngineConfig, PaymentsPerYear } from '../types.ts';

const PAYMENT_FREQUENCIES: readonly PaymentsPerYear[] = [1, 2, 4, 12];

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) throw new InvalidBaselineError(value, field);
}

export function calculateDrip(
  input: DripInput,
  config: Pick<EngineConfig, 'maxHorizonYears' | 'maxGrowthRate'> = defaultEngineConfig,
): DripYear[] {
  const { initialShares, sharePrice, annualDividend, years, paymentsPerYear = 4 } = input;

  assertNonNegative(initialShares, 'initialShares');
  assertNonNegative(annualDividend, 'annualDividend');
  if (!Number.isFinite(sharePrice) || sharePrice <= 0) {
    throw new InvalidBaselineError(sharePrice, 'sharePrice', 'a finite number > 0');
  }
  if (!PAYMENT_FREQUENCIES.includes(paymentsPerYear)) {
    throw new InvalidBaselineError(paymentsPerYear, 'paymentsPerYear', `one of ${PAYMENT_FREQUENCIES.join(', ')}`);
  }
  assertHorizon(years, config.maxHorizonYears);

  const dividendGrowth = clampGrowthRate(input.dividendGrowthRate, config.maxGrowthRate);
  const priceGrowth = clampGrowthRate(input.sharePriceGrowthRate, config.maxGrowthRate);
  if (priceGrowth <= -1) {
    throw new InvalidGrowthRateError(input.sharePriceGrowthRate, 'share price would reach zero');
  }
  assertFiniteGrowth(sharePrice, priceGrowth, years, input.sharePriceGrowthRate);
  assertFiniteGrowth(annualDividend, dividendGrowth, years, input.dividendGrowthRate);

  const rows: DripYear[] = [];
  let shares = initialShares;

  for (let year = 0; year <= years; year++) {
    const price = sharePrice * Math.pow(1 + priceGrowth, year);
    const dividend = annualDividend * Math.pow(1 + dividendGrowth, year);
    const perPayment = dividend / paymentsPerYear;
    const dividendIncome = shares * dividend;

    let sharesAdded = 0;
    for (let p = 0; p < paymentsPerYear; p++) {
      const bought = (shares * perPayment) / price;
      sharesAdded += bought;
      shares += bought;
    }

    const portfolioValue = shares * price;
    const valueWithoutDrip = initialShares * price;
    rows.push({
      yearOffset: year,
      shares,
      sharesAdded,
      sharePrice: price,
      annualDividend: dividend,
      dividendIncome,
      portfolioValue,
      valueWithoutDrip,
      dripBenefit: portfolioValue - valueWithoutDrip,
    });
  }

  return rows;
}

export function summarizeDrip(rows: readonly DripYear[]): DripStats {
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (!first || !last) {
    return { totalReturnRate: null, dripAdvantageRate: null, sharesGained: 0, totalDividends: 0 };
  }
  return {
    totalReturnRate: ratioOrNull(last.portfolioValue - first.portfolioValue, first.portfolioValue),
    dripAdvantageRate: ratioOrNull(last.portfolioValue - last.valueWithoutDrip, last.valueWithoutDrip),
    sharesGained: last.shares - first.shares,
    totalDividends: sum(rows.map(r => r.dividendIncome)),
  };
}
