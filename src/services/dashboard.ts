/**
 * dashboard.ts — One pass of the full pipeline for a dashboard view
 *
 * rows → normalize → (ticker filter) → aggregate → project each ticker
 * → rank. Every view setting comes in through `options`; nothing is
 * remembered between calls. A projection that fails for one ticker is
 * recorded against that ticker and the rest carry on.
 */
import { normalize, filterRecords } from './normalizer.ts';
import { aggregate } from './aggregator.ts';
import { project, percentToRate } from './projection.ts';
import { rank } from './ranking.ts';
import { DashboardOptionsSchema, type DashboardOptionsInput } from '../schemas.ts';
import { defaultEngineConfig } from '../config/engine.ts';
import { env } from '../config/env.ts';
import { childLogger } from '../shared/logger.ts';
import { ConfigError, isEngineError } from '../shared/errors.ts';
import type {
  DashboardResult, EngineConfig, ProjectionFailure, ProjectionSeries, RawDividendRow,
} from '../types.ts';

const log = childLogger({ module: 'dashboard' });

/** Growth and horizon the view opens with (DEFAULT_GROWTH_PERCENT / DEFAULT_HORIZON_YEARS). */
export function defaultDashboardOptions(): DashboardOptionsInput {
  return {
    growthRate: percentToRate(env.DEFAULT_GROWTH_PERCENT),
    horizonYears: env.DEFAULT_HORIZON_YEARS,
  };
}

export function buildDashboard(
  rawRows: readonly RawDividendRow[],
  options: DashboardOptionsInput = defaultDashboardOptions(),
  config: EngineConfig = defaultEngineConfig,
): DashboardResult {
  const parsed = DashboardOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const opts = parsed.data;

  const { records: allRecords, rejected } = normalize(rawRows, config);
  if (rejected.length > 0) {
    log.warn({
      rejected: rejected.length,
      reasons: rejected.map(r => ({ index: r.index, reason: r.reason })),
    }, `Rejected ${rejected.length} of ${rawRows.length} rows`);
  }

  const records = opts.tickers ? filterRecords(allRecords, opts.tickers) : allRecords;
  const summaries = aggregate(records);

  const projections: Record<string, ProjectionSeries> = {};
  const projectionErrors: Record<string, ProjectionFailure> = {};

  for (const summary of Object.values(summaries)) {
    const baseline = opts.baseline === 'first' ? summary.firstAmount : summary.latestAmount;
    try {
      projections[summary.ticker] = project(baseline, opts.growthRate, opts.horizonYears, {
        ticker: summary.ticker,
        startYear: opts.startYear,
        config,
      });
    } catch (err) {
      if (!isEngineError(err)) throw err;
      projectionErrors[summary.ticker] = { code: err.code, message: err.message };
      log.warn({ ticker: summary.ticker, code: err.code }, err.message);
    }
  }

  const ranking = rank(summaries, opts.rankBy, config);

  log.info({
    rows: rawRows.length,
    records: records.length,
    tickers: ranking.length,
    projected: Object.keys(projections).length,
    horizonYears: opts.horizonYears,
  }, 'Dashboard built');

  return { records, rejected, summaries, projections, projectionErrors, ranking };
}
