/**
 * Metrics Engine: basket-level exposure, notional, P&L, carry and DV01.
 *
 * Every function here is pure: the valuation date is always passed in
 * (`asOf`), and incomplete positions degrade to zero contributions instead
 * of raising.
 */

import { ENGINE_CONFIG, type EngineConfig } from "./_core/env";
import {
  positionsOfType,
  type Position,
} from "./basketRecords";
import {
  BASIS_POINT,
  DAYS_IN_YEAR,
  clampedDaysBetween,
  maxDate,
  minDate,
} from "./dayCount";

// ============================================================
// CARRY
// ============================================================

/**
 * Carry = (implied futures financing rate − funding rate) × |notional| × days / 360
 * Rates are decimals (0.054 = 5.4%).
 */
export function calculateCarry(
  impliedRate: number,
  fundingRate: number,
  notional: number,
  days: number
): number {
  return (impliedRate - fundingRate) * Math.abs(notional) * days / DAYS_IN_YEAR;
}

export function calculateDailyCarry(impliedRate: number, fundingRate: number, notional: number): number {
  return calculateCarry(impliedRate, fundingRate, notional, 1);
}

/** Carry accrued from `startDate` to `asOf`; a future start accrues nothing. */
export function calculateAccruedCarry(
  impliedRate: number,
  fundingRate: number,
  notional: number,
  startDate: Date,
  asOf: Date = new Date()
): number {
  return calculateCarry(impliedRate, fundingRate, notional, clampedDaysBetween(startDate, asOf));
}

/** Carry still to be earned from `asOf` to `endDate`; matured trades earn nothing. */
export function calculateExpectedCarryToMaturity(
  impliedRate: number,
  fundingRate: number,
  notional: number,
  endDate: Date,
  asOf: Date = new Date()
): number {
  return calculateCarry(impliedRate, fundingRate, notional, clampedDaysBetween(asOf, endDate));
}

/** Carry over the full life of the trade. */
export function calculateTotalExpectedCarry(
  impliedRate: number,
  fundingRate: number,
  notional: number,
  startDate: Date,
  endDate: Date
): number {
  return calculateCarry(impliedRate, fundingRate, notional, clampedDaysBetween(startDate, endDate));
}

// ============================================================
// P&L / RISK PRIMITIVES
// ============================================================

export interface ProfitAndLoss {
  pnlUsd: number;
  pnlBps: number;
}

/**
 * P&L in dollars and in bps of `notional` (defaults to |initialValue|).
 */
export function calculateProfitAndLoss(
  currentValue: number,
  initialValue: number,
  notional?: number
): ProfitAndLoss {
  const pnlUsd = currentValue - initialValue;
  const reference = notional ?? Math.abs(initialValue);
  return {
    pnlUsd,
    pnlBps: reference !== 0 ? (pnlUsd / reference) * 10_000 : 0,
  };
}

export function convertToBps(value: number, notional: number): number {
  if (notional === 0) return 0;
  return (value / Math.abs(notional)) * 10_000;
}

/** DV01 = |notional| × (days / 360) × 0.0001 */
export function calculateDv01(notional: number, daysToMaturity: number): number {
  return Math.abs(notional) * (daysToMaturity / DAYS_IN_YEAR) * BASIS_POINT;
}

/** Fair value F = S × (1 + (r − d) × T/360) */
export function calculateFuturesTheoreticalPrice(
  spotPrice: number,
  financingRate: number,
  dividendYield: number,
  daysToMaturity: number
): number {
  return spotPrice * (1 + (financingRate - dividendYield) * (daysToMaturity / DAYS_IN_YEAR));
}

/** r = (F/S − 1) × 360/T + d, the inverse of the fair-value formula. */
export function calculateImpliedFinancingRate(
  futuresPrice: number,
  spotPrice: number,
  dividendYield: number,
  daysToMaturity: number
): number {
  if (spotPrice === 0 || daysToMaturity === 0) return 0;
  return (futuresPrice / spotPrice - 1) * (DAYS_IN_YEAR / daysToMaturity) + dividendYield;
}

/**
 * Shares to trade to move a holding from its current portfolio weight to a
 * target weight. Positive = buy.
 */
export function calculateSharesToRebalance(
  currentWeight: number,
  targetWeight: number,
  portfolioValue: number,
  sharePrice: number
): number {
  if (sharePrice <= 0) return 0;
  return ((targetWeight - currentWeight) * portfolioValue) / sharePrice;
}

/** Absolute trade value; sign of `shares` is ignored. */
export function calculateTradeValue(shares: number, price: number): number {
  const value = Math.abs(shares) * price;
  return Number.isFinite(value) ? value : 0;
}

export function checkHedgeAlert(
  netEquityExposure: number,
  thresholdUsd: number = ENGINE_CONFIG.hedgeAlertThresholdUsd
): boolean {
  return Math.abs(netEquityExposure) > thresholdUsd;
}

// ============================================================
// BASKET METRICS
// ============================================================

export interface BasketMetrics {
  // Exposure
  futuresEquityExposure: number;
  physicalEquityExposure: number;
  netEquityExposure: number;
  totalEquityExposure: number;    // |futures| + |physical|
  hedgeAlert: boolean;
  // Notional
  longFuturesNotional: number;
  shortFuturesNotional: number;
  totalNotional: number;
  // P&L
  totalPnlUsd: number;
  totalPnlBps: number;
  // Carry
  impliedRate: number | null;     // mean futures financing rate, decimal
  fundingRate: number | null;     // mean cash-borrow rate or the configured default
  dailyCarry: number;
  accruedCarry: number;
  expectedCarryToMaturity: number;
  // Risk
  totalDv01: number;
  // Dates
  startDate: Date | null;
  endDate: Date | null;
  daysElapsed: number;
  daysToMaturity: number;
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function ratesOf(positions: Position[]): number[] {
  const rates: number[] = [];
  for (const p of positions) {
    if (p.financingRatePct !== null) rates.push(p.financingRatePct);
  }
  return rates;
}

/**
 * Aggregate one basket's positions into its risk/P&L metrics.
 */
export function computeBasketMetrics(
  positions: readonly Position[],
  asOf: Date = new Date(),
  config: EngineConfig = ENGINE_CONFIG
): BasketMetrics {
  const futures = positionsOfType(positions, "FUTURE");
  const equities = positionsOfType(positions, "EQUITY", "EQUITY_BASKET");
  const cashBorrows = positionsOfType(positions, "CASH_BORROW");

  let futuresEquityExposure = 0;
  let longFuturesNotional = 0;
  let shortFuturesNotional = 0;
  for (const fut of futures) {
    futuresEquityExposure += fut.equityExposureUsd ?? 0;
    if (fut.longShort === "LONG") {
      longFuturesNotional += Math.abs(fut.notionalUsd);
    } else {
      shortFuturesNotional += Math.abs(fut.notionalUsd);
    }
  }

  let physicalEquityExposure = 0;
  for (const eq of equities) {
    // Exposure column first, market value when it is absent or zero
    physicalEquityExposure += eq.equityExposureUsd || eq.marketValueUsd || 0;
  }

  const netEquityExposure = futuresEquityExposure + physicalEquityExposure;
  const totalNotional = longFuturesNotional + shortFuturesNotional;
  const totalPnlUsd = positions.reduce((s, p) => s + p.pnlUsd, 0);

  const startDate = minDate(positions.map(p => p.startDate));
  const endDate = maxDate(positions.map(p => p.endDate));
  const daysElapsed = startDate ? clampedDaysBetween(startDate, asOf) : 0;
  const daysToMaturity = endDate ? clampedDaysBetween(asOf, endDate) : 0;

  const futuresRate = mean(ratesOf(futures));
  const borrowRate = mean(ratesOf(cashBorrows));
  const impliedRate = futuresRate !== null ? futuresRate / 100 : null;
  const fundingRate = impliedRate !== null
    ? (borrowRate !== null ? borrowRate / 100 : config.defaultFundingRate)
    : null;

  let dailyCarry = 0;
  let accruedCarry = 0;
  let expectedCarryToMaturity = 0;
  if (impliedRate !== null && fundingRate !== null && totalNotional > 0 && startDate && endDate) {
    dailyCarry = calculateDailyCarry(impliedRate, fundingRate, totalNotional);
    accruedCarry = calculateCarry(impliedRate, fundingRate, totalNotional, daysElapsed);
    expectedCarryToMaturity = calculateCarry(impliedRate, fundingRate, totalNotional, daysToMaturity);
  }

  return {
    futuresEquityExposure,
    physicalEquityExposure,
    netEquityExposure,
    totalEquityExposure: Math.abs(futuresEquityExposure) + Math.abs(physicalEquityExposure),
    hedgeAlert: checkHedgeAlert(netEquityExposure, config.hedgeAlertThresholdUsd),
    longFuturesNotional,
    shortFuturesNotional,
    totalNotional,
    totalPnlUsd,
    totalPnlBps: totalNotional > 0 ? (totalPnlUsd / totalNotional) * 10_000 : 0,
    impliedRate,
    fundingRate,
    dailyCarry,
    accruedCarry,
    expectedCarryToMaturity,
    totalDv01: endDate ? calculateDv01(totalNotional, daysToMaturity) : 0,
    startDate,
    endDate,
    daysElapsed,
    daysToMaturity,
  };
}

// ============================================================
// COMPONENT TOTALS
// ============================================================

export interface BasketComponentTotals {
  futuresNotional: number;       // signed sum
  futuresContracts: number;      // signed, whole contracts
  cashBorrowNotional: number;
  cashLendNotional: number;
  stockBorrowNotional: number;   // market value
  equityMarketValue: number;
  equityPositionCount: number;
  hasFutures: boolean;
  hasCashBorrow: boolean;
  hasCashLend: boolean;
  hasStockBorrow: boolean;
  hasEquities: boolean;
}

/**
 * Current size of each leg of a basket, used to seed unwind/resize forms.
 */
export function computeBasketComponentTotals(
  positions: readonly Position[],
  basketId: string
): BasketComponentTotals {
  const totals: BasketComponentTotals = {
    futuresNotional: 0,
    futuresContracts: 0,
    cashBorrowNotional: 0,
    cashLendNotional: 0,
    stockBorrowNotional: 0,
    equityMarketValue: 0,
    equityPositionCount: 0,
    hasFutures: false,
    hasCashBorrow: false,
    hasCashLend: false,
    hasStockBorrow: false,
    hasEquities: false,
  };

  for (const pos of positions) {
    if (pos.basketId !== basketId) continue;
    switch (pos.positionType) {
      case "FUTURE":
        totals.futuresNotional += pos.notionalUsd;
        totals.futuresContracts += Math.trunc(pos.quantity);
        totals.hasFutures = true;
        break;
      case "CASH_BORROW":
        totals.cashBorrowNotional += pos.notionalUsd;
        totals.hasCashBorrow = true;
        break;
      case "CASH_LEND":
        totals.cashLendNotional += pos.notionalUsd;
        totals.hasCashLend = true;
        break;
      case "STOCK_BORROW":
        totals.stockBorrowNotional += pos.marketValueUsd;
        totals.hasStockBorrow = true;
        break;
      case "EQUITY":
        totals.equityMarketValue += pos.marketValueUsd;
        totals.equityPositionCount += 1;
        totals.hasEquities = true;
        break;
      case "EQUITY_BASKET":
        break;
    }
  }

  return totals;
}
