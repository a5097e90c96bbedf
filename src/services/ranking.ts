/**
 * ranking.ts — Stable rank + colour assignment
 *
 * Descending by the chosen metric, ties by ticker name, tickers without a
 * value last. colorKey cycles through the palette by rank.
 */
import { defaultEngineConfig } from '../config/engine.ts';
import { contrastText } from '../theme.ts';
import type { EngineConfig, MetricSelector, RankedTicker, SummaryMap, TickerSummary } from '../types.ts';

export function metricValue(summary: TickerSummary, metric: MetricSelector): number | null {
  const value = typeof metric === 'function' ? metric(summary) : summary[metric];
  return value !== null && Number.isFinite(value) ? value : null;
}

function compareRanked(a: { ticker: string; value: number | null }, b: { ticker: string; value: number | null }): number {
  if (a.value !== b.value) {
    if (a.value === null) return 1;
    if (b.value === null) return -1;
    return b.value - a.value;
  }
  return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
}

export function rank(
  summaries: SummaryMap,
  metric: MetricSelector = 'trailingTotal',
  config: Pick<EngineConfig, 'palette'> = defaultEngineConfig,
): RankedTicker[] {
  const { palette } = config;
  return Object.values(summaries)
    .map(s => ({ ticker: s.ticker, value: metricValue(s, metric) }))
    .sort(compareRanked)
    .map((entry, rank) => {
      const colorKey = palette[rank % palette.length] ?? '#000000';
      return Object.freeze({
        ticker: entry.ticker,
        rank,
        colorKey,
        textColor: contrastText(colorKey),
        metricValue: entry.value,
      });
    });
}

/** ticker → colour, for renderers that look colours up by name */
export function colorMap(ranking: readonly RankedTicker[]): Record<string, string> {
  return Object.fromEntries(ranking.map(r => [r.ticker, r.colorKey]));
}
