// ═══════════════════════════════════════════════════════
// Dividend Engine — Core Type Definitions
// Every data shape passed between the pipeline stages.
// ═══════════════════════════════════════════════════════

// ── Raw input ──

/** Loosely typed row as handed over by the ingestion layer. */
export interface RawDividendRow {
  ticker?: unknown;
  date?: unknown;
  amount?: unknown;
  shares?: unknown;
}

// ── Normalized records ──

/** ISO calendar day, "2024-03-15" */
export type CalendarDate = string;

export type DateFormat =
  | 'YYYY-MM-DD'
  | 'YYYY/MM/DD'
  | 'DD/MM/YYYY'
  | 'MM/DD/YYYY'
  | 'DD.MM.YYYY'
  | 'YYYY-MM-DD HH:mm:ss';

export interface DividendRecord {
  readonly ticker: string;
  readonly date: CalendarDate;
  readonly amount: number;
  readonly shares: number | null;
  readonly sequence: number;   // position in normalizer input
}

export type RejectReason = 'InvalidTicker' | 'InvalidDate' | 'InvalidAmount' | 'InvalidShares';

export interface RejectedRow {
  readonly index: number;
  readonly row: RawDividendRow;
  readonly reason: RejectReason;
  readonly message: string;
}

export interface NormalizeResult {
  records: DividendRecord[];
  rejected: RejectedRow[];
}

// ── Aggregation ──

export interface TickerSummary {
  readonly ticker: string;
  readonly recordCount: number;
  readonly firstDate: CalendarDate;
  readonly latestDate: CalendarDate;
  readonly firstAmount: number;
  readonly latestAmount: number;
  readonly trailingTotal: number;
  readonly averageGrowthRate: number | null;   // null = not enough history
  readonly growthSampleSize: number;
  readonly totalShares: number | null;
  readonly currency: string;
}

export type SummaryMap = Record<string, TickerSummary>;

// ── Projection ──

export interface ProjectionPoint {
  readonly yearOffset: number;
  readonly amount: number;
  readonly calendarYear?: number;
}

export interface ProjectionSeries {
  readonly ticker: string;
  readonly baselineAmount: number;
  readonly growthRate: number;
  readonly horizonYears: number;
  readonly values: readonly ProjectionPoint[];
}

export interface ProjectionStats {
  finalAmount: number;
  totalIncrease: number;
  totalGrowthRate: number | null;
  cumulativeAmount: number;
}

// ── Ranking ──

export type RankMetric = 'trailingTotal' | 'latestAmount' | 'recordCount' | 'averageGrowthRate' | 'totalShares';
export type MetricSelector = RankMetric | ((summary: TickerSummary) => number | null);

export interface RankedTicker {
  readonly ticker: string;
  readonly rank: number;
  readonly colorKey: string;
  readonly textColor: string;
  readonly metricValue: number | null;
}

// ── DRIP ──

export type PaymentsPerYear = 1 | 2 | 4 | 12;

export interface DripInput {
  initialShares: number;
  sharePrice: number;
  annualDividend: number;
  dividendGrowthRate: number;
  sharePriceGrowthRate: number;
  years: number;
  paymentsPerYear?: PaymentsPerYear;
}

export interface DripYear {
  yearOffset: number;
  shares: number;
  sharesAdded: number;
  sharePrice: number;
  annualDividend: number;
  dividendIncome: number;
  portfolioValue: number;
  valueWithoutDrip: number;
  dripBenefit: number;
}

export interface DripStats {
  totalReturnRate: number | null;
  dripAdvantageRate: number | null;
  sharesGained: number;
  totalDividends: number;
}

// ── Config ──

export interface EngineConfig {
  readonly maxHorizonYears: number;
  readonly maxGrowthRate: number;
  readonly palette: readonly string[];
  readonly dateFormats: readonly DateFormat[];
}

// ── Dashboard ──

export interface ProjectionFailure {
  code: string;
  message: string;
}

export interface DashboardResult {
  records: DividendRecord[];
  rejected: RejectedRow[];
  summaries: SummaryMap;
  projections: Record<string, ProjectionSeries>;
  projectionErrors: Record<string, ProjectionFailure>;
  ranking: RankedTicker[];
}
