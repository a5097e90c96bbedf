/**
 * aggregator.ts — Per-ticker summary statistics
 *
 * Groups normalized records by ticker and rebuilds every TickerSummary
 * from scratch on each call. Within a ticker, records are ordered by date
 * with input sequence as the tie-breaker, so the result does not depend
 * on the order the records arrive in.
 */
import { sum, mean, currencySymbol } from './helpers.ts';
import type { DividendRecord, TickerSummary, SummaryMap } from '../types.ts';

const byDateThenSequence = (a: DividendRecord, b: DividendRecord): number =>
  a.date < b.date ? -1 : a.date > b.date ? 1 : a.sequence - b.sequence;

/**
 * Period-over-period growth for each adjacent pair whose earlier amount is
 * positive. Pairs starting from a zero payout have no defined rate and are skipped.
 */
export function periodGrowthRates(ordered: readonly DividendRecord[]): number[] {
  const rates: number[] = [];
  for (let i = 1; i < ordered.length; i++) {
    const prev = ordered[i - 1];
    const curr = ordered[i];
    if (!prev || !curr || prev.amount <= 0) continue;
    rates.push((curr.amount - prev.amount) / prev.amount);
  }
  return rates;
}

function summarize(ticker: string, group: DividendRecord[]): TickerSummary {
  const ordered = [...group].sort(byDateThenSequence);
  const first = ordered[0];
  const last = ordered[ordered.length - 1];
  if (!first || !last) throw new Error(`Empty record group for ${ticker}`);

  const rates = periodGrowthRates(ordered);
  const shares = ordered.flatMap(r => r.shares === null ? [] : [r.shares]);

  return Object.freeze({
    ticker,
    recordCount: ordered.length,
    firstDate: first.date,
    latestDate: last.date,
    firstAmount: first.amount,
    latestAmount: last.amount,
    trailingTotal: sum(ordered.map(r => r.amount)),
    averageGrowthRate: mean(rates),
    growthSampleSize: rates.length,
    totalShares: shares.length > 0 ? sum(shares) : null,
    currency: currencySymbol(ticker),
  });
}

export function aggregate(records: readonly DividendRecord[]): SummaryMap {
  const groups = new Map<string, DividendRecord[]>();
  for (const r of records) {
    const group = groups.get(r.ticker);
    if (group) group.push(r);
    else groups.set(r.ticker, [r]);
  }

  const result: SummaryMap = {};
  for (const ticker of [...groups.keys()].sort()) {
    const group = groups.get(ticker);
    if (group) result[ticker] = summarize(ticker, group);
  }
  return result;
}
