/**
 * normalizer.ts — Raw rows → typed DividendRecords
 *
 * Every input row lands in exactly one of the two outputs: an accepted
 * record (input order kept) or a rejected row with a single reason code.
 * Checks run ticker → date → amount → shares; the first failure wins.
 */
import type { z, ZodTypeAny } from 'zod';
import { TickerSchema, AmountSchema, SharesSchema, dateSchema } from '../schemas.ts';
import { defaultEngineConfig } from '../config/engine.ts';
import type {
  RawDividendRow, DividendRecord, RejectedRow, RejectReason, NormalizeResult, EngineConfig,
} from '../types.ts';

type FieldCheck<T> = { ok: true; value: T } | { ok: false; message: string };

function check<S extends ZodTypeAny>(schema: S, value: unknown): FieldCheck<z.output<S>> {
  const result = schema.safeParse(value);
  if (result.success) return { ok: true, value: result.data };
  return { ok: false, message: result.error.issues[0]?.message ?? 'invalid value' };
}

export function normalize(
  rawRows: readonly RawDividendRow[],
  config: Pick<EngineConfig, 'dateFormats'> = defaultEngineConfig,
): NormalizeResult {
  const DateSchema = dateSchema(config.dateFormats);
  const records: DividendRecord[] = [];
  const rejected: RejectedRow[] = [];

  rawRows.forEach((row, index) => {
    const reject = (reason: RejectReason, message: string) => {
      rejected.push(Object.freeze({ index, row, reason, message }));
    };

    const ticker = check(TickerSchema, row.ticker);
    if (!ticker.ok) return reject('InvalidTicker', ticker.message);
    const date = check(DateSchema, row.date);
    if (!date.ok) return reject('InvalidDate', date.message);
    const amount = check(AmountSchema, row.amount);
    if (!amount.ok) return reject('InvalidAmount', amount.message);
    const shares = check(SharesSchema, row.shares);
    if (!shares.ok) return reject('InvalidShares', shares.message);

    records.push(Object.freeze({
      ticker: ticker.value,
      date: date.value,
      amount: amount.value,
      shares: shares.value,
      sequence: index,
    }));
  });

  return { records, rejected };
}

// ── Header-keyed rows ──

// Column names seen in broker exports, matched after trimming
const COLUMN_ALIASES: Record<keyof RawDividendRow, readonly string[]> = {
  ticker: ['Ticker', 'ticker', 'Symbol', 'symbol'],
  date: ['Date', 'date', 'Payment Date', 'Pay Date', 'Ex Date'],
  amount: ['Net Dividend', 'Amount', 'amount', 'Dividend', 'dividend'],
  shares: ['Shares', 'shares', 'Quantity'],
};

/** Map a CSV-style row ({ " Ticker ": "KO", "Net Dividend": "0.46 USD" }) to a RawDividendRow. */
export function rowFromColumns(row: Record<string, unknown>): RawDividendRow {
  const trimmed = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) trimmed.set(key.trim(), value);

  const pick = (field: keyof RawDividendRow) => {
    const name = COLUMN_ALIASES[field].find(alias => trimmed.has(alias));
    return name === undefined ? undefined : trimmed.get(name);
  };

  return { ticker: pick('ticker'), date: pick('date'), amount: pick('amount'), shares: pick('shares') };
}

/** Keep only the selected tickers; an empty selection selects nothing. */
export function filterRecords(records: readonly DividendRecord[], tickers: readonly string[]): DividendRecord[] {
  const wanted = new Set(tickers.map(t => t.trim().toUpperCase()));
  return records.filter(r => wanted.has(r.ticker));
}
