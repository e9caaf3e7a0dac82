/**
 * Corporate-Action Engine: index share changes → new index weights →
 * per-basket trade recommendations.
 *
 * A change in index shares scales the constituent's weight proportionally:
 *   newWeight = currentWeight × (1 + sharesChangePct / 100)
 * Each basket holding the ticker is then re-targeted with the same formula
 * the Rebalancing Engine uses.
 */

import {
  getBasketPositions,
  indexBenchmark,
  positionsOfType,
  type BenchmarkConstituent,
  type CorporateActionEvent,
  type Position,
} from "./basketRecords";
import { addDays, formatIsoDate } from "./dayCount";
import {
  computeBasketHedge,
  computeTargetShares,
  type TradeAction,
} from "./rebalancingEngine";

/** Share-count changes at or below this (in %) leave the weight unchanged. */
const WEIGHT_CHANGE_TOLERANCE_PCT = 0.01;

// ============================================================
// IMPACT
// ============================================================

export interface CorpActionImpact {
  ticker: string;
  priorShares: number;
  postShares: number;
  sharesChangePct: number;
  currentIndexWeight: number;
  newIndexWeight: number;
  currentPrice: number;
  hasWeightChange: boolean;
}

export function computeCorpActionImpact(
  event: CorporateActionEvent,
  benchmark: readonly BenchmarkConstituent[]
): CorpActionImpact {
  const impact: CorpActionImpact = {
    ticker: event.ticker,
    priorShares: event.priorShares ?? 0,
    postShares: event.postShares ?? 0,
    sharesChangePct: 0,
    currentIndexWeight: 0,
    newIndexWeight: 0,
    currentPrice: 0,
    hasWeightChange: false,
  };

  const { priorShares, postShares } = event;
  if (priorShares === null || postShares === null) return impact;
  if (priorShares === 0 || priorShares === postShares) return impact;

  const sharesChangePct = ((postShares - priorShares) / priorShares) * 100;
  impact.sharesChangePct = sharesChangePct;
  impact.hasWeightChange = Math.abs(sharesChangePct) > WEIGHT_CHANGE_TOLERANCE_PCT;

  const constituent = event.ticker ? indexBenchmark(benchmark).get(event.ticker) : undefined;
  if (constituent) {
    impact.currentIndexWeight = constituent.indexWeight;
    impact.newIndexWeight = constituent.indexWeight * (1 + sharesChangePct / 100);
    impact.currentPrice = constituent.localPrice;
  }

  return impact;
}

/** Baskets holding `ticker` as an EQUITY position, first appearance first. */
export function getAffectedBaskets(ticker: string, positions: readonly Position[]): string[] {
  if (!ticker) return [];
  const baskets = new Set<string>();
  for (const pos of positions) {
    if (pos.positionType === "EQUITY" && pos.underlying === ticker) baskets.add(pos.basketId);
  }
  return [...baskets];
}

// ============================================================
// TRADE RECOMMENDATIONS
// ============================================================

export interface EventRecommendation {
  basketId: string;
  ticker: string;
  strategyType: "SIMPLE_CARRY" | "REVERSE_CARRY";
  currentShares: number;
  targetShares: number;
  sharesDiff: number;              // signed, target − current
  action: TradeAction;             // NONE below one share
  tradeValue: number;
  price: number;
  indexWeightChangePct: number;
  currentIndexWeight: number;
  newIndexWeight: number;
}

export function computeEventTradeRecommendations(
  event: CorporateActionEvent,
  positions: readonly Position[],
  benchmark: readonly BenchmarkConstituent[]
): EventRecommendation[] {
  const impact = computeCorpActionImpact(event, benchmark);
  if (!impact.hasWeightChange) return [];

  const recommendations: EventRecommendation[] = [];

  for (const basketId of getAffectedBaskets(impact.ticker, positions)) {
    const basketPositions = getBasketPositions(positions, basketId);
    const holding = positionsOfType(basketPositions, "EQUITY").find(p => p.underlying === impact.ticker);
    if (!holding) continue;

    const hedge = computeBasketHedge(basketPositions);
    if (!hedge.hasFutures) continue;

    const targetShares = computeTargetShares(
      hedge.basketNotional,
      impact.newIndexWeight,
      impact.currentPrice,
      hedge.physicalDirection,
      holding.quantity
    );
    const sharesDiff = targetShares - holding.quantity;

    let action: TradeAction = "NONE";
    if (Math.abs(sharesDiff) >= 1) action = sharesDiff > 0 ? "BUY" : "SELL";

    recommendations.push({
      basketId,
      ticker: impact.ticker,
      strategyType: hedge.physicalDirection === -1 ? "REVERSE_CARRY" : "SIMPLE_CARRY",
      currentShares: holding.quantity,
      targetShares,
      sharesDiff,
      action,
      tradeValue: Math.abs(sharesDiff * impact.currentPrice),
      price: impact.currentPrice,
      indexWeightChangePct: impact.sharesChangePct,
      currentIndexWeight: impact.currentIndexWeight,
      newIndexWeight: impact.newIndexWeight,
    });
  }

  return recommendations;
}

// ============================================================
// BASKET EVENT CALENDAR
// ============================================================

export interface BasketCalendarOptions {
  asOf?: Date;
  daysBack?: number;
  daysForward?: number;
  maxEvents?: number;
}

export interface BasketCalendarEntry {
  basketId: string;
  ticker: string;
  company: string;
  eventType: string;
  effectiveDate: string;           // YYYY-MM-DD
  executionDate: string;           // effective date, forward-starting
  comments: string;
  action: "BUY" | "SELL";
  shares: number;                  // |round(sharesDiff)|
  price: number;
  value: number;
  currentShares: number;
  targetShares: number;
}

const MAX_COMMENT_LENGTH = 120;

/**
 * Actionable corporate-action trades for one basket: events on tickers the
 * basket holds, effective within [asOf − daysBack, asOf + daysForward],
 * earliest first.
 */
export function computeBasketEventCalendar(
  basketId: string,
  positions: readonly Position[],
  events: readonly CorporateActionEvent[],
  benchmark: readonly BenchmarkConstituent[],
  options: BasketCalendarOptions = {}
): BasketCalendarEntry[] {
  const { asOf = new Date(), daysBack = 120, daysForward = 365, maxEvents = 25 } = options;
  if (!basketId) return [];

  const held = new Set(
    positionsOfType(getBasketPositions(positions, basketId), "EQUITY")
      .map(p => p.underlying)
      .filter(t => t !== "")
  );
  if (held.size === 0) return [];

  const windowStart = addDays(asOf, -daysBack).getTime();
  const windowEnd = addDays(asOf, daysForward).getTime();
  const companies = indexBenchmark(benchmark);

  const inWindow: { event: CorporateActionEvent; effectiveDate: Date }[] = [];
  for (const event of events) {
    const effectiveDate = event.effectiveDate;
    if (!effectiveDate || !held.has(event.ticker)) continue;
    const t = effectiveDate.getTime();
    if (t < windowStart || t > windowEnd) continue;
    inWindow.push({ event, effectiveDate });
  }
  inWindow.sort((a, b) => a.effectiveDate.getTime() - b.effectiveDate.getTime());

  const entries: BasketCalendarEntry[] = [];
  for (const { event, effectiveDate } of inWindow) {
    const date = formatIsoDate(effectiveDate);
    for (const rec of computeEventTradeRecommendations(event, positions, benchmark)) {
      if (rec.basketId !== basketId || rec.action === "NONE") continue;
      entries.push({
        basketId,
        ticker: rec.ticker,
        company: companies.get(rec.ticker)?.company ?? "",
        eventType: event.actionType || "Corporate Action",
        effectiveDate: date,
        executionDate: date,
        comments: event.comments.slice(0, MAX_COMMENT_LENGTH),
        action: rec.action,
        shares: Math.abs(Math.round(rec.sharesDiff)),
        price: rec.price,
        value: rec.tradeValue,
        currentShares: rec.currentShares,
        targetShares: rec.targetShares,
      });
    }
    if (entries.length >= maxEvents) break;
  }

  return entries.slice(0, maxEvents);
}
