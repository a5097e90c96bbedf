// ═══════════════════════════════════════════════════════
// Public API — what the presentation layer calls into
// ═══════════════════════════════════════════════════════

export { normalize, rowFromColumns, filterRecords } from './services/normalizer.ts';
export { aggregate, periodGrowthRates } from './services/aggregator.ts';
export { project, summarizeProjection, percentToRate, clampGrowthRate } from './services/projection.ts';
export type { ProjectOptions } from './services/projection.ts';
export { rank, colorMap, metricValue } from './services/ranking.ts';
export { calculateDrip, summarizeDrip } from './services/drip.ts';
export { buildDashboard, defaultDashboardOptions } from './services/dashboard.ts';
export { parseCalendarDate, currencySymbol, DATE_FORMATS, DEFAULT_DATE_FORMATS } from './services/helpers.ts';

export { createEngineConfig, defaultEngineConfig } from './config/engine.ts';
export { loadEnv } from './config/env.ts';
export type { Env } from './config/env.ts';
export { logger, childLogger } from './shared/logger.ts';
export {
  EngineError, InvalidHorizonError, InvalidGrowthRateError, InvalidBaselineError, ConfigError, isEngineError,
} from './shared/errors.ts';
export type { EngineErrorCode } from './shared/errors.ts';
export type { DashboardOptions, DashboardOptionsInput } from './schemas.ts';

export {
  colors, tickerPalette, growthColor, contrastText, lighten, hexToRgba, relativeLuminance,
} from './theme.ts';

export type * from './types.ts';
