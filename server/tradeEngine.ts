/**
 * Trade Generation Engine: unwind / resize instructions for every leg of a
 * basket.
 *
 * Sign convention: a transaction notional > 0 buys (more long / less short),
 * < 0 sells. Resize feeds the same notional to every leg so the futures hedge
 * and the physical/financing legs move together.
 *
 * For every instruction: current + transacted = new.
 */

import { ENGINE_CONFIG, type EngineConfig } from "./_core/env";
import {
  getBasketPositions,
  indexBenchmark,
  positionsOfType,
  type BenchmarkConstituent,
  type LongShort,
  type Position,
} from "./basketRecords";
import { actionForDiff, type TradeAction } from "./rebalancingEngine";

// ============================================================
// TRADE INSTRUCTION TYPES
// ============================================================

export interface FuturesTrade {
  basketId: string;
  positionId: string;
  positionType: "FUTURE";
  instrument: string;
  contractMonth: string;
  ticker: string;            // "SPX <contractMonth>"
  action: TradeAction;
  contracts: number;         // rounded, absolute
  contractsSigned: number;   // unrounded, signed
  notional: number;          // signed transacted notional
  price: number;
  currentNotional: number;
  currentContracts: number;
  currentDirection: LongShort;
  newNotional: number;
  newContracts: number;
}

export type CashAction = "REPAY" | "BORROW" | "LEND" | "RECALL" | "NONE";

export interface CashTrade {
  basketId: string;
  positionId: string;
  positionType: "CASH_BORROW" | "CASH_LEND";
  ticker: "Cash";
  action: CashAction;
  notional: number;
  currentNotional: number;
  newNotional: number;
  ratePct: number;
  counterparty: string;
}

export type StockBorrowAction = "BORROW" | "RETURN" | "NONE";

export interface StockBorrowTrade {
  basketId: string;
  positionId: "STOCK_BORROW_AGGREGATE";
  positionType: "STOCK_BORROW";
  ticker: "Stock Borrow (Aggregate)";
  action: StockBorrowAction;
  notional: number;
  currentNotional: number;
  newNotional: number;
  positionCount: number;
  ratePct: number;
  counterparty: string;
}

export interface EquityTrade {
  ticker: string;
  company: string;
  currentShares: number;
  currentMarketValue: number;
  price: number;
  indexWeight: number;
  transactionValue: number;
  sharesTransacted: number;
  sharesAfter: number;
  marketValueAfter: number;      // currentMarketValue + transactionValue
  action: TradeAction;
}

export type TradeInstruction = FuturesTrade | CashTrade | StockBorrowTrade;

export interface BasketTradePlan {
  basketId: string;
  mode: "unwind" | "resize";
  transactionNotional: number;   // 0 for unwind
  futuresTrades: FuturesTrade[];
  cashTrades: CashTrade[];
  stockBorrowTrades: StockBorrowTrade[];
  equityTrades: EquityTrade[];
}

// ============================================================
// ALLOCATION
// ============================================================

/** Opposite-signed amount; a zero stays +0. */
function flip(value: number): number {
  return value === 0 ? 0 : -value;
}

/**
 * Split `total` across slots proportionally to |weight|. With all-zero
 * weights a single slot takes everything and several slots share equally.
 */
export function allocate(total: number, weights: readonly number[]): number[] {
  if (weights.length === 0) return [];
  if (weights.length === 1) return [total];

  const sum = weights.reduce((s, w) => s + Math.abs(w), 0);
  if (sum <= 0) {
    return weights.map(() => total / weights.length);
  }
  return weights.map(w => total * (Math.abs(w) / sum));
}

// ============================================================
// FUTURES LEG
// ============================================================

/** contracts = notional / (price × multiplier); 0 when price ≤ 0. */
export function contractsFromNotional(
  notional: number,
  futuresPrice: number,
  multiplier: number = ENGINE_CONFIG.futuresContractMultiplier
): number {
  if (futuresPrice <= 0 || multiplier <= 0) return 0;
  return notional / (futuresPrice * multiplier);
}

export function notionalFromContracts(
  contracts: number,
  futuresPrice: number,
  multiplier: number = ENGINE_CONFIG.futuresContractMultiplier
): number {
  return contracts * futuresPrice * multiplier;
}

function futuresTrade(
  pos: Position,
  basketId: string,
  notional: number,
  contractsSigned: number
): FuturesTrade {
  return {
    basketId,
    positionId: pos.positionId,
    positionType: "FUTURE",
    instrument: pos.instrumentName || "SPX Futures",
    contractMonth: pos.contractMonth,
    ticker: `SPX ${pos.contractMonth}`,
    action: actionForDiff(notional),
    contracts: Math.round(Math.abs(contractsSigned)),
    contractsSigned,
    notional,
    price: pos.priceOrLevel,
    currentNotional: pos.notionalUsd,
    currentContracts: pos.quantity,
    currentDirection: pos.longShort,
    newNotional: pos.notionalUsd + notional,
    newContracts: pos.quantity + contractsSigned,
  };
}

function basketFutures(positions: readonly Position[], basketId: string): Position[] {
  return positionsOfType(getBasketPositions(positions, basketId), "FUTURE");
}

/** Close every futures leg: notional and contracts are negated. */
export function computeFuturesUnwind(positions: readonly Position[], basketId: string): FuturesTrade[] {
  return basketFutures(positions, basketId).map(pos =>
    futuresTrade(pos, basketId, flip(pos.notionalUsd), flip(pos.quantity))
  );
}

/**
 * Apply `transactionNotional` across the basket's futures, split by each
 * leg's |notional|.
 */
export function computeFuturesResize(
  positions: readonly Position[],
  basketId: string,
  transactionNotional: number,
  multiplier: number = ENGINE_CONFIG.futuresContractMultiplier
): FuturesTrade[] {
  const futures = basketFutures(positions, basketId);
  const split = allocate(transactionNotional, futures.map(f => f.notionalUsd));

  return futures.map((pos, i) => {
    const notional = split[i] ?? 0;
    return futuresTrade(pos, basketId, notional, contractsFromNotional(notional, pos.priceOrLevel, multiplier));
  });
}

// ============================================================
// CASH LEG
// ============================================================

/**
 * Cash borrow carries a negative notional: adding to it repays.
 * Cash lend carries a positive notional: adding to it lends more.
 */
export function cashAction(positionType: CashTrade["positionType"], delta: number): CashAction {
  if (delta === 0) return "NONE";
  if (positionType === "CASH_BORROW") return delta > 0 ? "REPAY" : "BORROW";
  return delta > 0 ? "LEND" : "RECALL";
}

function cashTrade(pos: Position, basketId: string, notional: number): CashTrade | null {
  if (pos.positionType !== "CASH_BORROW" && pos.positionType !== "CASH_LEND") return null;
  return {
    basketId,
    positionId: pos.positionId,
    positionType: pos.positionType,
    ticker: "Cash",
    action: cashAction(pos.positionType, notional),
    notional,
    currentNotional: pos.notionalUsd,
    newNotional: pos.notionalUsd + notional,
    ratePct: pos.financingRatePct ?? 0,
    counterparty: pos.counterparty || "N/A",
  };
}

function collectCashTrades(
  positions: readonly Position[],
  basketId: string,
  notionalFor: (pos: Position) => number
): CashTrade[] {
  const trades: CashTrade[] = [];
  for (const pos of getBasketPositions(positions, basketId)) {
    const trade = cashTrade(pos, basketId, notionalFor(pos));
    if (trade) trades.push(trade);
  }
  return trades;
}

export function computeCashUnwind(positions: readonly Position[], basketId: string): CashTrade[] {
  return collectCashTrades(positions, basketId, pos => flip(pos.notionalUsd));
}

/** Every cash leg receives the full delta. */
export function computeCashResize(
  positions: readonly Position[],
  basketId: string,
  transactionNotional: number
): CashTrade[] {
  return collectCashTrades(positions, basketId, () => transactionNotional);
}

// ============================================================
// STOCK BORROW LEG (aggregated per basket)
// ============================================================

interface StockBorrowAggregate {
  marketValue: number;
  positionCount: number;
  ratePct: number;
  counterparty: string;
}

function aggregateStockBorrow(positions: readonly Position[], basketId: string): StockBorrowAggregate | null {
  const borrows = positionsOfType(getBasketPositions(positions, basketId), "STOCK_BORROW");
  const first = borrows[0];
  if (!first) return null;

  return {
    marketValue: borrows.reduce((s, p) => s + p.marketValueUsd, 0),
    positionCount: borrows.length,
    ratePct: first.financingRatePct ?? 0,
    counterparty: first.counterparty || "N/A",
  };
}

export function stockBorrowAction(delta: number): StockBorrowAction {
  if (delta > 0) return "BORROW";
  if (delta < 0) return "RETURN";
  return "NONE";
}

function stockBorrowTrade(agg: StockBorrowAggregate, basketId: string, notional: number): StockBorrowTrade {
  return {
    basketId,
    positionId: "STOCK_BORROW_AGGREGATE",
    positionType: "STOCK_BORROW",
    ticker: "Stock Borrow (Aggregate)",
    action: stockBorrowAction(notional),
    notional,
    currentNotional: agg.marketValue,
    newNotional: agg.marketValue + notional,
    positionCount: agg.positionCount,
    ratePct: agg.ratePct,
    counterparty: agg.counterparty,
  };
}

export function computeStockBorrowUnwind(positions: readonly Position[], basketId: string): StockBorrowTrade[] {
  const agg = aggregateStockBorrow(positions, basketId);
  if (!agg) return [];
  return [stockBorrowTrade(agg, basketId, flip(agg.marketValue))];
}

export function computeStockBorrowResize(
  positions: readonly Position[],
  basketId: string,
  transactionNotional: number
): StockBorrowTrade[] {
  const agg = aggregateStockBorrow(positions, basketId);
  if (!agg) return [];
  return [stockBorrowTrade(agg, basketId, transactionNotional)];
}

// ============================================================
// EQUITY LEG
// ============================================================

/**
 * Spread `transactionNotional` over every benchmark constituent with a
 * positive weight and price. Constituents the basket does not hold start
 * from zero shares.
 */
export function computeEquityTrades(
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[],
  basketId: string,
  transactionNotional: number
): EquityTrade[] {
  const held = new Map<string, Position>();
  for (const pos of positionsOfType(getBasketPositions(positions, basketId), "EQUITY")) {
    held.set(pos.underlying, pos);
  }

  const trades: EquityTrade[] = [];
  for (const constituent of indexBenchmark(benchmark).values()) {
    const { indexWeight, localPrice: price } = constituent;
    if (indexWeight <= 0 || price <= 0) continue;

    const current = held.get(constituent.ticker);
    const currentShares = current?.quantity ?? 0;
    const currentMarketValue = current?.marketValueUsd ?? 0;
    const transactionValue = transactionNotional * indexWeight;
    const sharesTransacted = transactionValue / price;
    const sharesAfter = currentShares + sharesTransacted;

    trades.push({
      ticker: constituent.ticker,
      company: constituent.company,
      currentShares,
      currentMarketValue,
      price,
      indexWeight,
      transactionValue,
      sharesTransacted,
      sharesAfter,
      marketValueAfter: currentMarketValue + transactionValue,
      action: actionForDiff(sharesTransacted),
    });
  }
  return trades;
}

/**
 * Flatten each held equity position one-for-one. The marked market value is
 * what gets unwound, so the after-state is zero in shares and value.
 */
export function computeEquityUnwind(
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[],
  basketId: string
): EquityTrade[] {
  const names = indexBenchmark(benchmark);

  return positionsOfType(getBasketPositions(positions, basketId), "EQUITY").map(pos => {
    const sharesTransacted = flip(pos.quantity);
    return {
      ticker: pos.underlying,
      company: names.get(pos.underlying)?.company ?? "",
      currentShares: pos.quantity,
      currentMarketValue: pos.marketValueUsd,
      price: pos.priceOrLevel,
      indexWeight: 0,
      transactionValue: flip(pos.marketValueUsd),
      sharesTransacted,
      sharesAfter: 0,
      marketValueAfter: 0,
      action: actionForDiff(sharesTransacted),
    };
  });
}

// ============================================================
// WHOLE BASKET
// ============================================================

export function computeBasketUnwind(
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[],
  basketId: string
): BasketTradePlan {
  return {
    basketId,
    mode: "unwind",
    transactionNotional: 0,
    futuresTrades: computeFuturesUnwind(positions, basketId),
    cashTrades: computeCashUnwind(positions, basketId),
    stockBorrowTrades: computeStockBorrowUnwind(positions, basketId),
    equityTrades: computeEquityUnwind(positions, benchmark, basketId),
  };
}

/**
 * Resize every leg by the same signed notional.
 */
export function computeBasketResize(
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[],
  basketId: string,
  transactionNotional: number,
  config: EngineConfig = ENGINE_CONFIG
): BasketTradePlan {
  return {
    basketId,
    mode: "resize",
    transactionNotional,
    futuresTrades: computeFuturesResize(positions, basketId, transactionNotional, config.futuresContractMultiplier),
    cashTrades: computeCashResize(positions, basketId, transactionNotional),
    stockBorrowTrades: computeStockBorrowResize(positions, basketId, transactionNotional),
    equityTrades: computeEquityTrades(positions, benchmark, basketId, transactionNotional),
  };
}

/**
 * Contracts equivalent to `notional` at the basket's mean futures price
 * (configured reference level when the basket holds no futures).
 */
export function computeEquivalentFuturesContracts(
  notional: number,
  positions: readonly Position[],
  basketId: string,
  config: EngineConfig = ENGINE_CONFIG
): number {
  const futures = basketFutures(positions, basketId);
  const price = futures.length > 0
    ? futures.reduce((s, f) => s + f.priceOrLevel, 0) / futures.length
    : config.defaultFuturesPrice;
  return contractsFromNotional(notional, price, config.futuresContractMultiplier);
}
