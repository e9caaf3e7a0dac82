/**
 * Basket Records: typed input snapshots for the calculation engines.
 *
 * Loader rows (one object per CSV/spreadsheet line, keyed by the column
 * headers below) are validated with zod and normalized into strongly-typed
 * records with explicit defaults:
 *   - numeric fields → 0 when missing, blank or unparseable
 *   - nullable numerics (exposure, rate, share counts, prices) → null
 *   - identifiers → ""
 *   - dates → null
 *
 * Only structural problems (not an object, missing identifying column,
 * unknown position type) reject a row. Sparse numeric data never does.
 */

import { z } from "zod";
import { parseDate } from "./dayCount";

// ============================================================
// ENUMS
// ============================================================

export const POSITION_TYPES = [
  "FUTURE",
  "EQUITY",
  "EQUITY_BASKET",
  "CASH_BORROW",
  "CASH_LEND",
  "STOCK_BORROW",
] as const;

export type PositionType = (typeof POSITION_TYPES)[number];

export const STRATEGY_TYPES = ["Simple Carry", "Reverse Carry", "Calendar Spread"] as const;

export type StrategyType = (typeof STRATEGY_TYPES)[number] | "";

export type LongShort = "LONG" | "SHORT" | "";

// ============================================================
// RECORD TYPES
// ============================================================

export interface Position {
  basketId: string;
  positionId: string;
  positionType: PositionType;
  strategyType: StrategyType;
  longShort: LongShort;
  quantity: number;                  // signed shares / contracts
  priceOrLevel: number;
  notionalUsd: number;
  marketValueUsd: number;
  equityExposureUsd: number | null;  // null = column absent for this row
  financingRatePct: number | null;   // percent, e.g. 5.4
  financingRateType: string;
  startDate: Date | null;
  endDate: Date | null;
  pnlUsd: number;
  underlying: string;                // ticker, EQUITY / STOCK_BORROW
  contractMonth: string;             // FUTURE only
  counterparty: string;
  instrumentName: string;
  rollEventFlag: boolean;
}

export interface Basket {
  basketId: string;
  strategyType: StrategyType;
  positions: Position[];
}

export interface BenchmarkConstituent {
  ticker: string;
  company: string;
  indexWeight: number;  // decimal fraction, weights sum to ~1
  localPrice: number;
}

export interface FuturesContract {
  code: string;
  price: number | null;
  daysToMaturityStatic: number | null;
  maturityDate: Date | null;
}

export interface CorporateActionEvent {
  ticker: string;
  effectiveDate: Date | null;
  priorShares: number | null;
  postShares: number | null;
  actionType: string;
  comments: string;
}

// ============================================================
// CELL PARSING
// ============================================================

/**
 * Parse a numeric cell. Numbers pass through; strings may carry thousands
 * separators, a leading "$" or a trailing "%" (the value is kept in the
 * unit written, so "5.4%" → 5.4). Anything else is null.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  let text = value.trim().replace(/,/g, "").replace(/^\$/, "");
  if (text.endsWith("%")) text = text.slice(0, -1).trim();
  if (text === "" || text.toLowerCase() === "nan") return null;

  // Accounting negatives: (1234.5)
  const paren = /^\((.*)\)$/.exec(text);
  if (paren) text = `-${paren[1]}`;

  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

function parseText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && !Number.isFinite(value)) return "";
  return String(value).trim();
}

function parseFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  const text = parseText(value).toUpperCase();
  return text === "Y" || text === "YES" || text === "TRUE" || text === "1";
}

function parseLongShort(value: unknown): LongShort {
  const text = parseText(value).toUpperCase();
  return text === "LONG" || text === "SHORT" ? text : "";
}

function parseStrategyType(value: unknown): StrategyType {
  const text = parseText(value).toLowerCase().replace(/[_\s]+/g, " ");
  return STRATEGY_TYPES.find(s => s.toLowerCase() === text) ?? "";
}

const numberOrZero = z.unknown().transform(v => parseNumeric(v) ?? 0);
const nullableNumber = z.unknown().transform(parseNumeric);
const text = z.unknown().transform(parseText);
const dateCell = z.unknown().transform(parseDate);

const requiredText = (column: string) =>
  z.unknown()
    .transform(parseText)
    .refine(v => v.length > 0, { message: `${column} is required` });

// ============================================================
// ROW SCHEMAS
// ============================================================

export const positionRowSchema = z.object({
  BASKET_ID: requiredText("BASKET_ID"),
  POSITION_ID: text,
  POSITION_TYPE: z.preprocess(
    v => (typeof v === "string" ? v.trim().toUpperCase() : v),
    z.enum(POSITION_TYPES)
  ),
  STRATEGY_TYPE: z.unknown().transform(parseStrategyType),
  LONG_SHORT: z.unknown().transform(parseLongShort),
  QUANTITY: numberOrZero,
  PRICE_OR_LEVEL: numberOrZero,
  NOTIONAL_USD: numberOrZero,
  MARKET_VALUE_USD: numberOrZero,
  EQUITY_EXPOSURE_USD: nullableNumber,
  "FINANCING_RATE_%": nullableNumber,
  FINANCING_RATE_TYPE: text,
  START_DATE: dateCell,
  END_DATE: dateCell,
  PNL_USD: numberOrZero,
  UNDERLYING: text,
  CONTRACT_MONTH: text,
  EXCHANGE_OR_COUNTERPARTY: text,
  ROLL_EVENT_FLAG: z.unknown().transform(parseFlag),
  INSTRUMENT_NAME: text,
});

export const benchmarkRowSchema = z.object({
  BLOOMBERG_TICKER: requiredText("BLOOMBERG_TICKER"),
  COMPANY: text,
  LOCAL_PRICE: numberOrZero,
  INDEX_WEIGHT: numberOrZero,
});

export const futuresCurveRowSchema = z.object({
  Contract_Code: requiredText("Contract_Code"),
  Days_to_maturity: nullableNumber,
  last_price: nullableNumber,
  Maturity: dateCell,
});

export const corporateActionRowSchema = z.object({
  CURRENT_BLOOMBERG_TICKER: requiredText("CURRENT_BLOOMBERG_TICKER"),
  EFFECTIVE_DATE: dateCell,
  INDEX_SHARES_PRIOR_EVENTS: nullableNumber,
  INDEX_SHARES_POST_EVENTS: nullableNumber,
  ACTION_TYPE: text,
  COMMENTS: text,
});

// ============================================================
// ERRORS
// ============================================================

export class RecordValidationError extends Error {
  readonly rowIndex: number;
  readonly issues: z.ZodIssue[];

  constructor(recordType: string, rowIndex: number, issues: z.ZodIssue[]) {
    const detail = issues
      .map(i => `${i.path.join(".") || "(row)"}: ${i.message}`)
      .join("; ");
    super(`Invalid ${recordType} row ${rowIndex}: ${detail}`);
    this.name = "RecordValidationError";
    this.rowIndex = rowIndex;
    this.issues = issues;
  }
}

export interface RejectedRow {
  index: number;
  reason: string;
}

export interface NormalizedRecords<T> {
  records: T[];
  rejected: RejectedRow[];
}

// ============================================================
// ROW → RECORD
// ============================================================

function parseWith<S extends z.ZodTypeAny, T>(
  schema: S,
  recordType: string,
  map: (row: z.output<S>) => T
) {
  return (row: unknown, rowIndex = 0): T => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new RecordValidationError(recordType, rowIndex, result.error.issues);
    }
    return map(result.data);
  };
}

export const parsePositionRow = parseWith(positionRowSchema, "position", (r): Position => ({
  basketId: r.BASKET_ID,
  positionId: r.POSITION_ID,
  positionType: r.POSITION_TYPE,
  strategyType: r.STRATEGY_TYPE,
  longShort: r.LONG_SHORT,
  quantity: r.QUANTITY,
  priceOrLevel: r.PRICE_OR_LEVEL,
  notionalUsd: r.NOTIONAL_USD,
  marketValueUsd: r.MARKET_VALUE_USD,
  equityExposureUsd: r.EQUITY_EXPOSURE_USD,
  financingRatePct: r["FINANCING_RATE_%"],
  financingRateType: r.FINANCING_RATE_TYPE,
  startDate: r.START_DATE,
  endDate: r.END_DATE,
  pnlUsd: r.PNL_USD,
  underlying: r.UNDERLYING,
  contractMonth: r.CONTRACT_MONTH,
  counterparty: r.EXCHANGE_OR_COUNTERPARTY,
  instrumentName: r.INSTRUMENT_NAME,
  rollEventFlag: r.ROLL_EVENT_FLAG,
}));

export const parseBenchmarkRow = parseWith(benchmarkRowSchema, "benchmark", (r): BenchmarkConstituent => ({
  ticker: r.BLOOMBERG_TICKER,
  company: r.COMPANY,
  indexWeight: r.INDEX_WEIGHT,
  localPrice: r.LOCAL_PRICE,
}));

export const parseFuturesCurveRow = parseWith(futuresCurveRowSchema, "futures curve", (r): FuturesContract => ({
  code: r.Contract_Code,
  price: r.last_price,
  daysToMaturityStatic: r.Days_to_maturity,
  maturityDate: r.Maturity,
}));

export const parseCorporateActionRow = parseWith(
  corporateActionRowSchema,
  "corporate action",
  (r): CorporateActionEvent => ({
    ticker: r.CURRENT_BLOOMBERG_TICKER,
    effectiveDate: r.EFFECTIVE_DATE,
    priorShares: r.INDEX_SHARES_PRIOR_EVENTS,
    postShares: r.INDEX_SHARES_POST_EVENTS,
    actionType: r.ACTION_TYPE,
    comments: r.COMMENTS,
  })
);

function normalizeRows<T>(
  rows: readonly unknown[],
  parse: (row: unknown, rowIndex?: number) => T,
  label: string
): NormalizedRecords<T> {
  const records: T[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((row, index) => {
    try {
      records.push(parse(row, index));
    } catch (error) {
      if (!(error instanceof RecordValidationError)) throw error;
      rejected.push({ index, reason: error.message });
    }
  });

  if (rejected.length > 0) {
    console.warn(`[Records] Rejected ${rejected.length} of ${rows.length} ${label} rows`);
  }

  return { records, rejected };
}

export const normalizePositionRows = (rows: readonly unknown[]) =>
  normalizeRows(rows, parsePositionRow, "position");

export const normalizeBenchmarkRows = (rows: readonly unknown[]) =>
  normalizeRows(rows, parseBenchmarkRow, "benchmark");

export const normalizeFuturesCurveRows = (rows: readonly unknown[]) =>
  normalizeRows(rows, parseFuturesCurveRow, "futures curve");

export const normalizeCorporateActionRows = (rows: readonly unknown[]) =>
  normalizeRows(rows, parseCorporateActionRow, "corporate action");

// ============================================================
// CONSTRUCTION HELPERS
// ============================================================

/**
 * Build a Position from a partial record, filling every omitted field with
 * its documented default.
 */
export function createPosition(
  fields: Partial<Position> & Pick<Position, "basketId" | "positionType">
): Position {
  return {
    positionId: "",
    strategyType: "",
    longShort: "",
    quantity: 0,
    priceOrLevel: 0,
    notionalUsd: 0,
    marketValueUsd: 0,
    equityExposureUsd: null,
    financingRatePct: null,
    financingRateType: "",
    startDate: null,
    endDate: null,
    pnlUsd: 0,
    underlying: "",
    contractMonth: "",
    counterparty: "",
    instrumentName: "",
    rollEventFlag: false,
    ...fields,
  };
}

// ============================================================
// BASKET GROUPING & LOOKUPS
// ============================================================

/** Basket ids in order of first appearance. */
export function getBasketIds(positions: readonly Position[]): string[] {
  const seen = new Set<string>();
  for (const p of positions) seen.add(p.basketId);
  return [...seen];
}

export function getBasketPositions(positions: readonly Position[], basketId: string): Position[] {
  return positions.filter(p => p.basketId === basketId);
}

export function groupBaskets(positions: readonly Position[]): Basket[] {
  return getBasketIds(positions).map(basketId => {
    const basketPositions = getBasketPositions(positions, basketId);
    return {
      basketId,
      strategyType: basketPositions.find(p => p.strategyType !== "")?.strategyType ?? "",
      positions: basketPositions,
    };
  });
}

export function positionsOfType(
  positions: readonly Position[],
  ...types: PositionType[]
): Position[] {
  return positions.filter(p => types.includes(p.positionType));
}

/** Exact-ticker lookup; a duplicated ticker resolves to its last row. */
export function indexBenchmark(
  benchmark: readonly BenchmarkConstituent[]
): Map<string, BenchmarkConstituent> {
  const lookup = new Map<string, BenchmarkConstituent>();
  for (const row of benchmark) {
    if (row.ticker) lookup.set(row.ticker, row);
  }
  return lookup;
}
