/**
 * projection.ts — Deterministic compounding forecast
 *
 * amount(year) = baseline × (1 + g)^year for year = 1..horizon, computed
 * from the closed form each year so long horizons carry no accumulated
 * multiplication error. Rates below -100% floor at -1: a payout can fall
 * to zero but never below it.
 */
import { defaultEngineConfig } from '../config/engine.ts';
import { InvalidBaselineError, InvalidGrowthRateError, InvalidHorizonError } from '../shared/errors.ts';
import { sum, ratioOrNull } from './helpers.ts';
import type { EngineConfig, ProjectionPoint, ProjectionSeries, ProjectionStats } from '../types.ts';

export interface ProjectOptions {
  ticker?: string;
  /** Adds calendarYear = startYear + yearOffset to each point */
  startYear?: number;
  config?: Pick<EngineConfig, 'maxHorizonYears' | 'maxGrowthRate'>;
}

export const MIN_GROWTH_RATE = -1;

export function assertHorizon(horizonYears: number, maxHorizonYears: number): void {
  if (!Number.isInteger(horizonYears) || horizonYears < 1 || horizonYears > maxHorizonYears) {
    throw new InvalidHorizonError(horizonYears, maxHorizonYears);
  }
}

/** Validate a growth rate and floor it at -1. */
export function clampGrowthRate(growthRate: number, maxGrowthRate: number): number {
  if (!Number.isFinite(growthRate)) throw new InvalidGrowthRateError(growthRate, 'not a finite number');
  if (growthRate > maxGrowthRate) {
    throw new InvalidGrowthRateError(growthRate, `above the configured maximum of ${maxGrowthRate}`);
  }
  return Math.max(MIN_GROWTH_RATE, growthRate);
}

/** Reject a (start, rate, years) combination whose last compounded value overflows. */
export function assertFiniteGrowth(start: number, rate: number, years: number, requestedRate: number): void {
  if (!Number.isFinite(start * Math.pow(1 + rate, years))) {
    throw new InvalidGrowthRateError(requestedRate, `compounding ${start} over ${years} years overflows`);
  }
}

export function project(
  baselineAmount: number,
  growthRate: number,
  horizonYears: number,
  options: ProjectOptions = {},
): ProjectionSeries {
  const { ticker = '', startYear, config = defaultEngineConfig } = options;

  if (!Number.isFinite(baselineAmount) || baselineAmount < 0) throw new InvalidBaselineError(baselineAmount);
  assertHorizon(horizonYears, config.maxHorizonYears);
  const rate = clampGrowthRate(growthRate, config.maxGrowthRate);
  assertFiniteGrowth(baselineAmount, rate, horizonYears, growthRate);

  const values: ProjectionPoint[] = [];
  for (let year = 1; year <= horizonYears; year++) {
    const amount = baselineAmount === 0 ? 0 : baselineAmount * Math.pow(1 + rate, year);
    values.push(Object.freeze(startYear === undefined
      ? { yearOffset: year, amount }
      : { yearOffset: year, amount, calendarYear: startYear + year }));
  }

  return Object.freeze({
    ticker,
    baselineAmount,
    growthRate: rate,
    horizonYears,
    values: Object.freeze(values),
  });
}

/** Headline figures for a projection: where it ends and how far it moved. */
export function summarizeProjection(series: ProjectionSeries): ProjectionStats {
  const last = series.values[series.values.length - 1];
  const finalAmount = last?.amount ?? series.baselineAmount;
  const totalIncrease = finalAmount - series.baselineAmount;
  return {
    finalAmount,
    totalIncrease,
    totalGrowthRate: ratioOrNull(totalIncrease, series.baselineAmount),
    cumulativeAmount: sum(series.values.map(v => v.amount)),
  };
}

/** 4 (percent) → 0.04 */
export const percentToRate = (percent: number): number => percent / 100;
