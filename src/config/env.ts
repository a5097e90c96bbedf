/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast on import if a variable is present but malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';
import { DateFormatEnum, HORIZON_YEARS_CAP } from '../schemas.ts';
import { DEFAULT_DATE_FORMATS } from '../services/helpers.ts';
import { ConfigError } from '../shared/errors.ts';

const envSchema = z.object({
  // ── Runtime ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Projection limits ──
  ENGINE_MAX_HORIZON_YEARS: z.coerce.number().int().min(1).max(HORIZON_YEARS_CAP).default(30),
  ENGINE_MAX_GROWTH_RATE: z.coerce.number().positive().default(10),   // 1000 %/yr

  // ── Normalizer ──
  ENGINE_DATE_FORMATS: z.string().optional()
    .transform(v => v ? v.split(',').map(s => s.trim()).filter(Boolean) : [...DEFAULT_DATE_FORMATS])
    .pipe(z.array(DateFormatEnum).min(1)),

  // ── Dashboard defaults ──
  DEFAULT_GROWTH_PERCENT: z.coerce.number().default(4.0),
  DEFAULT_HORIZON_YEARS: z.coerce.number().int().min(1).default(15),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment.
 * Empty strings count as unset so `FOO=` in a .env file falls back to the default.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  if (result.data.DEFAULT_HORIZON_YEARS > result.data.ENGINE_MAX_HORIZON_YEARS) {
    throw new ConfigError([
      `DEFAULT_HORIZON_YEARS: ${result.data.DEFAULT_HORIZON_YEARS} exceeds ENGINE_MAX_HORIZON_YEARS (${result.data.ENGINE_MAX_HORIZON_YEARS})`,
    ]);
  }

  return result.data;
}

export const env = loadEnv();
