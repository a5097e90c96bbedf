/**
 * config/engine.ts — Explicit configuration for the core calls
 *
 * Nothing in the engine reads env or module state; callers pass an
 * EngineConfig (or rely on defaultEngineConfig) into each operation.
 */
import { EngineConfigSchema } from '../schemas.ts';
import { tickerPalette } from '../theme.ts';
import { ConfigError } from '../shared/errors.ts';
import { env } from './env.ts';
import type { EngineConfig } from '../types.ts';

export const defaultEngineConfig: EngineConfig = Object.freeze({
  maxHorizonYears: env.ENGINE_MAX_HORIZON_YEARS,
  maxGrowthRate: env.ENGINE_MAX_GROWTH_RATE,
  palette: [...tickerPalette],
  dateFormats: env.ENGINE_DATE_FORMATS,
});

/** Merge overrides onto the defaults and validate the result. */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse({ ...defaultEngineConfig, ...overrides });
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  return Object.freeze(result.data);
}
