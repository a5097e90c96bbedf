// ═══════════════════════════════════════════════════════
// Zod Schemas — Validation at every engine boundary
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { DATE_FORMATS, parseCalendarDate } from './services/helpers.ts';
import type { DateFormat } from './types.ts';

// ── Shared enums ──

export const DateFormatEnum = z.enum(DATE_FORMATS);

export const RankMetricEnum = z.enum([
  'trailingTotal', 'latestAmount', 'recordCount', 'averageGrowthRate', 'totalShares',
]);

// ── Row fields (normalizer) ──

// "0.25 USD" as exported by brokers
const CURRENCY_SUFFIX = /\s*[A-Z]{3}$/;
const NUMERIC_TEXT = /^\+?(\d+(\.\d*)?|\.\d+)$/;

export const TickerSchema = z.string().trim().min(1, 'ticker is empty').transform(s => s.toUpperCase());

export const AmountSchema = z.union([
  z.number(),
  z.string()
    .trim()
    .transform(s => s.replace(CURRENCY_SUFFIX, ''))
    .refine(s => NUMERIC_TEXT.test(s), 'not a non-negative number')
    .transform(Number),
]).pipe(z.number().finite().nonnegative());

export const SharesSchema = z.union([z.null(), z.undefined(), z.literal('')])
  .transform(() => null)
  .or(AmountSchema);

export function dateSchema(formats: readonly DateFormat[]) {
  return z.string().transform((text, ctx) => {
    const date = parseCalendarDate(text, formats);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${text}" matches none of ${formats.join(', ')}` });
      return z.NEVER;
    }
    return date;
  });
}

// ── Engine config ──

/** Upper bound for any configured horizon */
export const HORIZON_YEARS_CAP = 200;

const HexColor = z.string().regex(/^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'expected #RGB or #RRGGBB');

export const EngineConfigSchema = z.object({
  maxHorizonYears: z.number().int().min(1).max(HORIZON_YEARS_CAP),
  maxGrowthRate: z.number().positive(),
  palette: z.array(HexColor).min(1),
  dateFormats: z.array(DateFormatEnum).min(1),
});

// ── Dashboard options ──

export const DashboardOptionsSchema = z.object({
  growthRate: z.number(),
  horizonYears: z.number(),
  rankBy: RankMetricEnum.default('trailingTotal'),
  tickers: z.array(z.string()).optional(),
  startYear: z.number().int().optional(),
  baseline: z.enum(['latest', 'first']).default('latest'),
});

export type DashboardOptionsInput = z.input<typeof DashboardOptionsSchema>;
export type DashboardOptions = z.output<typeof DashboardOptionsSchema>;
