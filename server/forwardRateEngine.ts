/**
 * Forward-Rate & Carry Engine: implied forward financing rates between
 * futures maturities on a financing-futures curve (prices quoted in bps).
 *
 * Matrix convention: rows are the near (FROM) leg, columns the far (TO) leg.
 * A cell is null unless FROM matures strictly before TO and both legs have
 * a price. The matrices are directional and never mirrored.
 */

import type { FuturesContract } from "./basketRecords";
import { BASIS_POINT, DAYS_IN_YEAR, daysBetween } from "./dayCount";

// ============================================================
// TYPES
// ============================================================

export interface ContractMatrix {
  contracts: string[];             // axis order = input order
  cells: (number | null)[][];      // cells[from][to]
}

export type ForwardRateMatrix = ContractMatrix;
export type CarryMatrix = ContractMatrix;

export interface Opportunity {
  fromContract: string;
  toContract: string;
  forwardRate: number;
  annualizedCarry: number;
  periodDays: number;
}

export interface OpportunityCriteria {
  minForwardRate?: number;
  minAnnualizedCarry?: number;
  minMaturityDays?: number;        // inclusive, on periodDays
  maxMaturityDays?: number;        // inclusive, on periodDays
}

export interface ForwardRateInput {
  fromPrice: number;
  toPrice: number;
  daysFrom: number;                // dynamic, from delivery dates
  daysTo: number;
  daysFromStatic?: number | null;  // curve-sheet days, used for the day-count fraction
  daysToStatic?: number | null;
}

// ============================================================
// IMPLIED FORWARD RATE
// ============================================================

/**
 * forward = (toPrice − fromPrice × daysFrom/daysTo) / ((staticTo − staticFrom) / staticTo)
 *
 * The time ratio uses dynamic days, the day-count fraction static days
 * (falling back to dynamic). Returns null for an invalid pair.
 */
export function calculateImpliedForwardRate(input: ForwardRateInput): number | null {
  const { fromPrice, toPrice, daysFrom, daysTo } = input;
  const staticFrom = input.daysFromStatic ?? daysFrom;
  const staticTo = input.daysToStatic ?? daysTo;

  if (daysFrom >= daysTo) return null;
  if (daysTo <= 0 || staticTo <= 0) return null;

  const timeRatio = daysFrom / daysTo;
  const dayCountFraction = (staticTo - staticFrom) / staticTo;
  if (dayCountFraction === 0) return null;

  return (toPrice - fromPrice * timeRatio) / dayCountFraction;
}

// ============================================================
// MATRICES
// ============================================================

/** Days from `asOf` to the contract's maturity date; null without one. */
export function dynamicDaysToMaturity(contract: FuturesContract, asOf: Date = new Date()): number | null {
  return contract.maturityDate ? daysBetween(asOf, contract.maturityDate) : null;
}

/**
 * Days to maturity for every contract on a curve. A curve that carries
 * maturity dates is dated per contract, and an undated contract gets null.
 * A curve with no maturity dates at all uses the static days column.
 */
export function curveDaysToMaturity(
  contracts: readonly FuturesContract[],
  asOf: Date = new Date()
): (number | null)[] {
  const dated = contracts.some(c => c.maturityDate !== null);
  return contracts.map(c => (dated ? dynamicDaysToMaturity(c, asOf) : c.daysToMaturityStatic));
}

function buildMatrix(
  contracts: readonly FuturesContract[],
  asOf: Date,
  cell: (from: FuturesContract, to: FuturesContract, daysFrom: number, daysTo: number) => number | null
): ContractMatrix {
  const dynamicDays = curveDaysToMaturity(contracts, asOf);

  const cells = contracts.map((from, i) =>
    contracts.map((to, j) => {
      const daysFrom = dynamicDays[i];
      const daysTo = dynamicDays[j];
      if (from.price === null || to.price === null) return null;
      if (daysFrom === null || daysFrom === undefined || daysTo === null || daysTo === undefined) return null;
      return cell(from, to, daysFrom, daysTo);
    })
  );

  return { contracts: contracts.map(c => c.code), cells };
}

export function computeForwardRateMatrix(
  contracts: readonly FuturesContract[],
  asOf: Date = new Date()
): ForwardRateMatrix {
  return buildMatrix(contracts, asOf, (from, to, daysFrom, daysTo) =>
    calculateImpliedForwardRate({
      fromPrice: from.price ?? 0,
      toPrice: to.price ?? 0,
      daysFrom,
      daysTo,
      daysFromStatic: from.daysToMaturityStatic,
      daysToStatic: to.daysToMaturityStatic,
    })
  );
}

/**
 * Annualized carry = (priceTo − priceFrom) / periodDays × 365,
 * periodDays = dynamic daysTo − daysFrom.
 */
export function computeCarryMatrix(
  contracts: readonly FuturesContract[],
  asOf: Date = new Date()
): CarryMatrix {
  return buildMatrix(contracts, asOf, (from, to, daysFrom, daysTo) => {
    if (daysFrom >= daysTo) return null;
    const spreadBps = (to.price ?? 0) - (from.price ?? 0);
    return (spreadBps / (daysTo - daysFrom)) * 365;
  });
}

/** Cell lookup by contract code; null when either code is not on the axis. */
export function matrixValue(matrix: ContractMatrix, from: string, to: string): number | null {
  const i = matrix.contracts.indexOf(from);
  const j = matrix.contracts.indexOf(to);
  if (i < 0 || j < 0) return null;
  return matrix.cells[i]?.[j] ?? null;
}

// ============================================================
// OPPORTUNITY FILTER
// ============================================================

/**
 * Cells valued in both matrices that pass every supplied threshold, in
 * row-major order over the forward matrix axes.
 */
export function filterOpportunities(
  forwardMatrix: ForwardRateMatrix,
  carryMatrix: CarryMatrix,
  contracts: readonly FuturesContract[],
  criteria: OpportunityCriteria = {},
  asOf: Date = new Date()
): Opportunity[] {
  const daysByCode = new Map<string, number | null>();
  const curveDays = curveDaysToMaturity(contracts, asOf);
  contracts.forEach((c, i) => daysByCode.set(c.code, curveDays[i] ?? null));

  const { minForwardRate, minAnnualizedCarry, minMaturityDays, maxMaturityDays } = criteria;
  const opportunities: Opportunity[] = [];

  forwardMatrix.contracts.forEach((fromContract, i) => {
    forwardMatrix.contracts.forEach((toContract, j) => {
      const forwardRate = forwardMatrix.cells[i]?.[j] ?? null;
      const annualizedCarry = matrixValue(carryMatrix, fromContract, toContract);
      if (forwardRate === null || annualizedCarry === null) return;

      const daysFrom = daysByCode.get(fromContract);
      const daysTo = daysByCode.get(toContract);
      if (daysFrom === null || daysFrom === undefined || daysTo === null || daysTo === undefined) return;
      const periodDays = daysTo - daysFrom;

      if (minForwardRate !== undefined && forwardRate < minForwardRate) return;
      if (minAnnualizedCarry !== undefined && annualizedCarry < minAnnualizedCarry) return;
      if (minMaturityDays !== undefined && periodDays < minMaturityDays) return;
      if (maxMaturityDays !== undefined && periodDays > maxMaturityDays) return;

      opportunities.push({ fromContract, toContract, forwardRate, annualizedCarry, periodDays });
    });
  });

  return opportunities;
}

// ============================================================
// CALENDAR SPREAD ANALYTICS
// ============================================================

export interface CalendarSpreadCarry {
  spreadBps: number;
  dailyCarryBps: number;
  dailyCarryUsd: number;
  totalCarryBps: number;
  totalCarryUsd: number;
  annualizedCarryBps: number;
  holdingPeriodDays: number;
  daysBetweenContracts: number;
}

/**
 * Carry of long FROM / short TO, earned linearly over the days between the
 * two maturities. Holding period defaults to that full span.
 */
export function calculateCalendarSpreadCarry(
  fromPrice: number,
  toPrice: number,
  daysBetweenContracts: number,
  notional: number,
  holdingPeriodDays: number = daysBetweenContracts
): CalendarSpreadCarry {
  const spreadBps = toPrice - fromPrice;
  const dailyCarryBps = daysBetweenContracts > 0 ? spreadBps / daysBetweenContracts : 0;
  const dailyCarryUsd = dailyCarryBps * BASIS_POINT * Math.abs(notional);

  return {
    spreadBps,
    dailyCarryBps,
    dailyCarryUsd,
    totalCarryBps: dailyCarryBps * holdingPeriodDays,
    totalCarryUsd: dailyCarryUsd * holdingPeriodDays,
    annualizedCarryBps: dailyCarryBps * 365,
    holdingPeriodDays,
    daysBetweenContracts,
  };
}

/** USD value of a 1 bp move in the forward rate over the period. */
export function calculateCalendarSpreadDv01(notional: number, periodDays: number): number {
  return Math.abs(notional) * (periodDays / DAYS_IN_YEAR) * BASIS_POINT;
}

/** Notional that spends a DV01 budget over `periodDays`. */
export function calculateNotionalFromDv01Budget(dv01Budget: number, periodDays: number): number {
  if (periodDays <= 0) return 0;
  return dv01Budget / ((periodDays / DAYS_IN_YEAR) * BASIS_POINT);
}

export type SpreadSignal = "RICH" | "CHEAP";

export interface CalendarSpreadSignal {
  fromContract: string;
  toContract: string;
  forwardRate: number;
  signal: SpreadSignal;
  tradeAction: "SELL_SPREAD" | "BUY_SPREAD";
  description: string;
}

/**
 * Flag forward rates at or above `thresholdHigh` as rich (sell the spread)
 * and at or below `thresholdLow` as cheap (buy it). Most extreme first.
 */
export function identifyCalendarSpreadOpportunities(
  matrix: ForwardRateMatrix,
  thresholdHigh = 100,
  thresholdLow = 20
): CalendarSpreadSignal[] {
  const signals: CalendarSpreadSignal[] = [];

  matrix.contracts.forEach((fromContract, i) => {
    matrix.contracts.forEach((toContract, j) => {
      const rate = matrix.cells[i]?.[j] ?? null;
      if (rate === null) return;

      if (rate >= thresholdHigh) {
        signals.push({
          fromContract,
          toContract,
          forwardRate: rate,
          signal: "RICH",
          tradeAction: "SELL_SPREAD",
          description: `Sell ${fromContract}/${toContract} spread - implied rate ${rate.toFixed(1)} bps is high`,
        });
      } else if (rate <= thresholdLow) {
        signals.push({
          fromContract,
          toContract,
          forwardRate: rate,
          signal: "CHEAP",
          tradeAction: "BUY_SPREAD",
          description: `Buy ${fromContract}/${toContract} spread - implied rate ${rate.toFixed(1)} bps is low`,
        });
      }
    });
  });

  const neutral = (thresholdHigh + thresholdLow) / 2;
  return signals.sort(
    (a, b) => Math.abs(b.forwardRate - neutral) - Math.abs(a.forwardRate - neutral)
  );
}

// ============================================================
// TENOR BUCKETS
// ============================================================

export interface TenorBucket {
  key: string;
  name: string;
  minDays: number;
  maxDays: number;
}

const LONGEST_BUCKET: TenorBucket = { key: "12M+", name: "12M+", minDays: 366, maxDays: 9999 };

export const TENOR_BUCKETS: readonly TenorBucket[] = [
  { key: "1-3M", name: "1-3 Month", minDays: 0, maxDays: 90 },
  { key: "3-6M", name: "3-6 Month", minDays: 91, maxDays: 180 },
  { key: "6-12M", name: "6-12 Month", minDays: 181, maxDays: 365 },
  LONGEST_BUCKET,
];

/** Bucket containing `days`; anything outside every range lands in the longest. */
export function getTenorBucket(days: number): TenorBucket {
  return TENOR_BUCKETS.find(b => b.minDays <= days && days <= b.maxDays) ?? LONGEST_BUCKET;
}

/** Highest annualized carry among opportunities whose period falls in the bucket. */
export function getBestOpportunityForTenor(
  opportunities: readonly Opportunity[],
  bucketKey: string
): Opportunity | null {
  let best: Opportunity | null = null;
  for (const opp of opportunities) {
    if (getTenorBucket(opp.periodDays).key !== bucketKey) continue;
    if (!best || opp.annualizedCarry > best.annualizedCarry) best = opp;
  }
  return best;
}
