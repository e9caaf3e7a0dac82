/**
 * Rebalancing Engine: keeps the physical equity leg proportional to the
 * index weights implied by the futures hedge.
 *
 *   1. Hedge: basket notional = Σ|futures notional|, physical direction is
 *      the opposite of the net futures direction
 *   2. Target shares = (basket notional × index weight / price) × direction
 *   3. Diff vs current shares → BUY / SELL / NONE, flagged above a threshold
 *
 * Simple Carry (short futures, long stock) gives positive targets; Reverse
 * Carry (long futures, short stock) gives negative ones.
 */

import { ENGINE_CONFIG } from "./_core/env";
import {
  getBasketIds,
  getBasketPositions,
  indexBenchmark,
  positionsOfType,
  type BenchmarkConstituent,
  type Position,
} from "./basketRecords";

export type TradeAction = "BUY" | "SELL" | "NONE";

// ============================================================
// HEDGE DIRECTION
// ============================================================

export interface BasketHedge {
  basketNotional: number;       // Σ|futures notional|, or |Σ equity MV| without futures
  netFuturesExposure: number;   // + LONG, − SHORT
  physicalDirection: 1 | -1;    // +1 long stock, −1 short stock
  hasFutures: boolean;
}

export function computeBasketHedge(positions: readonly Position[]): BasketHedge {
  const futures = positionsOfType(positions, "FUTURE");

  if (futures.length === 0) {
    const equityValue = positionsOfType(positions, "EQUITY")
      .reduce((s, p) => s + p.marketValueUsd, 0);
    return {
      basketNotional: Math.abs(equityValue),
      netFuturesExposure: 0,
      physicalDirection: 1,
      hasFutures: false,
    };
  }

  let basketNotional = 0;
  let netFuturesExposure = 0;
  for (const fut of futures) {
    const size = Math.abs(fut.notionalUsd);
    basketNotional += size;
    if (fut.longShort === "LONG") netFuturesExposure += size;
    else if (fut.longShort === "SHORT") netFuturesExposure -= size;
  }

  return {
    basketNotional,
    netFuturesExposure,
    physicalDirection: netFuturesExposure > 0 ? -1 : 1,
    hasFutures: true,
  };
}

/**
 * Signed target holding for one constituent. Falls back to `currentShares`
 * (no trade) when weight, price or notional is not positive.
 */
export function computeTargetShares(
  basketNotional: number,
  indexWeight: number,
  price: number,
  physicalDirection: number,
  currentShares: number
): number {
  if (indexWeight > 0 && price > 0 && basketNotional > 0) {
    return ((basketNotional * indexWeight) / price) * physicalDirection;
  }
  return currentShares;
}

export function actionForDiff(sharesDiff: number): TradeAction {
  if (sharesDiff > 0) return "BUY";
  if (sharesDiff < 0) return "SELL";
  return "NONE";
}

// ============================================================
// REBALANCING RECORDS
// ============================================================

export interface RebalancingRecord {
  ticker: string;
  basketId: string;
  currentShares: number;
  targetShares: number;
  sharesDiff: number;           // target − current
  price: number;
  marketValueUsd: number;
  pnlUsd: number;
  indexWeightPct: number;       // indexWeight × 100
  action: TradeAction;
  needsRebalancing: boolean;    // |sharesDiff| ≥ threshold
  tradeValue: number;           // |sharesDiff × price|
  weightResolved: boolean;      // false = ticker not in benchmark
}

/**
 * One record per EQUITY position, in input order. Tickers match the
 * benchmark exactly; an unmatched ticker keeps its current holding.
 */
export function computeRebalancingNeeds(
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[],
  thresholdShares: number = ENGINE_CONFIG.rebalancingThresholdShares
): RebalancingRecord[] {
  const equities = positionsOfType(positions, "EQUITY");
  if (equities.length === 0) return [];

  const hedge = computeBasketHedge(positions);
  const weights = indexBenchmark(benchmark);

  return equities.map(pos => {
    const constituent = weights.get(pos.underlying);
    const indexWeight = constituent?.indexWeight ?? 0;
    const targetShares = computeTargetShares(
      hedge.basketNotional,
      indexWeight,
      pos.priceOrLevel,
      hedge.physicalDirection,
      pos.quantity
    );
    const sharesDiff = targetShares - pos.quantity;

    return {
      ticker: pos.underlying,
      basketId: pos.basketId,
      currentShares: pos.quantity,
      targetShares,
      sharesDiff,
      price: pos.priceOrLevel,
      marketValueUsd: pos.marketValueUsd,
      pnlUsd: pos.pnlUsd,
      indexWeightPct: indexWeight * 100,
      action: actionForDiff(sharesDiff),
      needsRebalancing: Math.abs(sharesDiff) >= thresholdShares,
      tradeValue: Math.abs(sharesDiff * pos.priceOrLevel),
      weightResolved: constituent !== undefined,
    };
  });
}

/** Tickers that found no benchmark row, deduplicated, in input order. */
export function getUnresolvedTickers(records: readonly RebalancingRecord[]): string[] {
  const unresolved = new Set<string>();
  for (const r of records) {
    if (!r.weightResolved) unresolved.add(r.ticker);
  }
  return [...unresolved];
}

// ============================================================
// ALERTS
// ============================================================

export interface RebalancingAlert {
  basketId: string;
  positionId: string;
  ticker: string;
  action: TradeAction;
  shares: number;               // |trunc(sharesDiff)|
  message: string;
  currentShares: number;
  targetShares: number;
  price: number;
  tradeValue: number;
}

export interface RebalancingAlertOptions {
  basketId?: string;
  thresholdShares?: number;
}

const SHARE_FORMAT = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function formatAlertMessage(ticker: string, shares: number, action: TradeAction): string {
  return `${ticker} – ${SHARE_FORMAT.format(shares)} share ${titleCase(action)} needed`;
}

export function getRebalancingAlerts(
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[],
  options: RebalancingAlertOptions = {}
): RebalancingAlert[] {
  const scoped = options.basketId ? getBasketPositions(positions, options.basketId) : positions;
  const records = computeRebalancingNeeds(scoped, benchmark, options.thresholdShares);

  return records
    .filter(r => r.needsRebalancing)
    .map(r => {
      const shares = Math.abs(Math.trunc(r.sharesDiff));
      return {
        basketId: r.basketId,
        positionId: `${r.basketId}_${r.ticker.replace(/ /g, "_")}`,
        ticker: r.ticker,
        action: r.action,
        shares,
        message: formatAlertMessage(r.ticker, shares, r.action),
        currentShares: r.currentShares,
        targetShares: r.targetShares,
        price: r.price,
        tradeValue: r.tradeValue,
      };
    });
}

// ============================================================
// LEG SUMMARIES
// ============================================================

export interface EquityBasketSummary {
  positionCount: number;
  totalMarketValue: number;
  totalPnl: number;
  longPositions: number;
  shortPositions: number;
  longMarketValue: number;
  shortMarketValue: number;
  direction: "LONG" | "SHORT";  // majority of positions, LONG on a tie
  alertsCount: number;
}

export function computeEquityBasketSummary(
  positions: readonly Position[],
  benchmark?: readonly BenchmarkConstituent[]
): EquityBasketSummary {
  const equities = positionsOfType(positions, "EQUITY");

  let longPositions = 0;
  let shortPositions = 0;
  let longMarketValue = 0;
  let shortMarketValue = 0;
  for (const eq of equities) {
    if (eq.longShort === "LONG") {
      longPositions++;
      longMarketValue += eq.marketValueUsd;
    } else if (eq.longShort === "SHORT") {
      shortPositions++;
      shortMarketValue += eq.marketValueUsd;
    }
  }

  // Each basket is hedged against its own futures
  let alertsCount = 0;
  if (benchmark && benchmark.length > 0) {
    for (const basketId of getBasketIds(equities)) {
      alertsCount += getRebalancingAlerts(positions, benchmark, { basketId }).length;
    }
  }

  return {
    positionCount: equities.length,
    totalMarketValue: equities.reduce((s, p) => s + p.marketValueUsd, 0),
    totalPnl: equities.reduce((s, p) => s + p.pnlUsd, 0),
    longPositions,
    shortPositions,
    longMarketValue,
    shortMarketValue,
    direction: longPositions >= shortPositions ? "LONG" : "SHORT",
    alertsCount,
  };
}

export interface StockBorrowSummary {
  positionCount: number;
  totalMarketValue: number;
  totalQuantity: number;
  uniqueTickers: number;
}

export function computeStockBorrowSummary(positions: readonly Position[]): StockBorrowSummary {
  const borrows = positionsOfType(positions, "STOCK_BORROW");
  const tickers = new Set(borrows.map(p => p.underlying).filter(t => t !== ""));

  return {
    positionCount: borrows.length,
    totalMarketValue: borrows.reduce((s, p) => s + p.marketValueUsd, 0),
    totalQuantity: Math.trunc(borrows.reduce((s, p) => s + p.quantity, 0)),
    uniqueTickers: tickers.size,
  };
}
