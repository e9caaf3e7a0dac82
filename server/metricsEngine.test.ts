import { describe, it, expect } from "vitest";
import { createPosition, type Position } from "./basketRecords";
import {
  calculateAccruedCarry,
  calculateCarry,
  calculateDailyCarry,
  calculateDv01,
  calculateExpectedCarryToMaturity,
  calculateFuturesTheoreticalPrice,
  calculateImpliedFinancingRate,
  calculateProfitAndLoss,
  calculateSharesToRebalance,
  calculateTotalExpectedCarry,
  calculateTradeValue,
  checkHedgeAlert,
  computeBasketComponentTotals,
  computeBasketMetrics,
  convertToBps,
} from "./metricsEngine";
import { readEngineConfig } from "./_core/env";

const utc = (y: number, m: number, d: number) => new Date(Date.UTC(y, m - 1, d));

const AS_OF = utc(2026, 2, 28);
const START = utc(2026, 1, 29);   // 30 days before AS_OF
const END = utc(2026, 6, 18);     // 110 days after AS_OF

// Simple carry basket: short futures hedging a long stock leg, financed by a cash borrow
function simpleCarryBasket(): Position[] {
  return [
    createPosition({
      basketId: "Basket1",
      positionType: "FUTURE",
      longShort: "SHORT",
      quantity: -800,
      priceOrLevel: 5000,
      notionalUsd: -100_000_000,
      equityExposureUsd: -100_000_000,
      financingRatePct: 5.4,
      startDate: START,
      endDate: END,
      pnlUsd: 12_000,
    }),
    createPosition({
      basketId: "Basket1",
      positionType: "EQUITY",
      longShort: "LONG",
      underlying: "AAPL UW Equity",
      marketValueUsd: 60_000_000,
      pnlUsd: -2_000,
    }),
    createPosition({
      basketId: "Basket1",
      positionType: "EQUITY",
      longShort: "LONG",
      underlying: "MSFT UW Equity",
      marketValueUsd: 39_950_000,
      equityExposureUsd: 0,
    }),
    createPosition({
      basketId: "Basket1",
      positionType: "CASH_BORROW",
      notionalUsd: -100_000_000,
      financingRatePct: 5.0,
      startDate: START,
      endDate: END,
      pnlUsd: -1_000,
    }),
  ];
}

describe("Carry helpers", () => {
  it("scales the rate spread by |notional| and days over 360", () => {
    expect(calculateCarry(0.054, 0.05, -100_000_000, 90)).toBeCloseTo(100_000, 6);
  });

  it("is negative when funding costs more than the futures imply", () => {
    expect(calculateCarry(0.05, 0.054, 100_000_000, 90)).toBeCloseTo(-100_000, 6);
  });

  it("computes daily carry over one day", () => {
    expect(calculateDailyCarry(0.054, 0.05, 360_000)).toBeCloseTo(4, 10);
  });

  it("accrues from start to asOf and clamps a future start", () => {
    expect(calculateAccruedCarry(0.054, 0.05, 360_000, START, AS_OF)).toBeCloseTo(120, 8);
    expect(calculateAccruedCarry(0.054, 0.05, 360_000, END, AS_OF)).toBe(0);
  });

  it("earns to maturity only while the trade is live", () => {
    expect(calculateExpectedCarryToMaturity(0.054, 0.05, 360_000, END, AS_OF)).toBeCloseTo(440, 8);
    expect(calculateExpectedCarryToMaturity(0.054, 0.05, 360_000, START, AS_OF)).toBe(0);
  });

  it("covers the full life of the trade", () => {
    expect(calculateTotalExpectedCarry(0.054, 0.05, 360_000, START, END)).toBeCloseTo(560, 8);
  });
});

describe("P&L and risk primitives", () => {
  it("expresses P&L in bps of |initial value| by default", () => {
    const pnl = calculateProfitAndLoss(105, 100);
    expect(pnl.pnlUsd).toBe(5);
    expect(pnl.pnlBps).toBeCloseTo(500, 8);
  });

  it("uses an explicit notional for bps when given", () => {
    expect(calculateProfitAndLoss(105, 100, 1000).pnlBps).toBeCloseTo(50, 8);
  });

  it("guards a zero reference", () => {
    expect(calculateProfitAndLoss(10, 0).pnlBps).toBe(0);
    expect(convertToBps(10, 0)).toBe(0);
  });

  it("converts to bps of |notional|", () => {
    expect(convertToBps(250, -1_000_000)).toBeCloseTo(2.5, 10);
  });

  it("computes DV01 on ACT/360", () => {
    expect(calculateDv01(-100_000_000, 360)).toBeCloseTo(10_000, 6);
    expect(calculateDv01(100_000_000, 0)).toBe(0);
  });

  it("prices futures at fair value and inverts back to the rate", () => {
    const fair = calculateFuturesTheoreticalPrice(5000, 0.054, 0.014, 90);
    expect(fair).toBeCloseTo(5050, 8);
    expect(calculateImpliedFinancingRate(fair, 5000, 0.014, 90)).toBeCloseTo(0.054, 10);
  });

  it("returns a zero implied rate without spot or tenor", () => {
    expect(calculateImpliedFinancingRate(5050, 0, 0.014, 90)).toBe(0);
    expect(calculateImpliedFinancingRate(5050, 5000, 0.014, 0)).toBe(0);
  });

  it("sizes weight rebalances in shares", () => {
    expect(calculateSharesToRebalance(0.01, 0.015, 1_000_000, 50)).toBeCloseTo(100, 8);
    expect(calculateSharesToRebalance(0.01, 0.015, 1_000_000, 0)).toBe(0);
  });

  it("values trades on absolute shares", () => {
    expect(calculateTradeValue(-200, 50.5)).toBeCloseTo(10_100, 8);
    expect(calculateTradeValue(100, Number.NaN)).toBe(0);
  });

  it("raises the hedge alert strictly above the threshold", () => {
    expect(checkHedgeAlert(150_000)).toBe(true);
    expect(checkHedgeAlert(-150_000)).toBe(true);
    expect(checkHedgeAlert(100_000)).toBe(false);
    expect(checkHedgeAlert(50_000, 10_000)).toBe(true);
  });
});

describe("computeBasketMetrics", () => {
  it("aggregates exposure, notional and P&L", () => {
    const m = computeBasketMetrics(simpleCarryBasket(), AS_OF);

    expect(m.futuresEquityExposure).toBe(-100_000_000);
    // Exposure falls back to market value when absent or zero
    expect(m.physicalEquityExposure).toBe(99_950_000);
    expect(m.netEquityExposure).toBe(-50_000);
    expect(m.totalEquityExposure).toBe(199_950_000);
    expect(m.hedgeAlert).toBe(false);

    expect(m.longFuturesNotional).toBe(0);
    expect(m.shortFuturesNotional).toBe(100_000_000);
    expect(m.totalNotional).toBe(100_000_000);

    expect(m.totalPnlUsd).toBe(9_000);
    expect(m.totalPnlBps).toBeCloseTo(0.9, 10);
  });

  it("derives carry from futures and cash borrow rates", () => {
    const m = computeBasketMetrics(simpleCarryBasket(), AS_OF);

    expect(m.impliedRate).toBeCloseTo(0.054, 12);
    expect(m.fundingRate).toBeCloseTo(0.05, 12);
    expect(m.startDate?.getTime()).toBe(START.getTime());
    expect(m.endDate?.getTime()).toBe(END.getTime());
    expect(m.daysElapsed).toBe(30);
    expect(m.daysToMaturity).toBe(110);

    expect(m.dailyCarry).toBeCloseTo(1111.1111, 3);
    expect(m.accruedCarry).toBeCloseTo(33_333.3333, 3);
    expect(m.expectedCarryToMaturity).toBeCloseTo(122_222.2222, 3);
    expect(m.totalDv01).toBeCloseTo(3055.5556, 3);
  });

  it("falls back to the default funding rate without a cash borrow", () => {
    const positions = simpleCarryBasket().filter(p => p.positionType !== "CASH_BORROW");
    const m = computeBasketMetrics(positions, AS_OF);

    expect(m.fundingRate).toBeCloseTo(0.053, 12);
    expect(m.dailyCarry).toBeCloseTo(277.7778, 3);
  });

  it("honours a configured funding rate and alert threshold", () => {
    const config = { ...readEngineConfig({}), defaultFundingRate: 0.044, hedgeAlertThresholdUsd: 10_000 };
    const positions = simpleCarryBasket().filter(p => p.positionType !== "CASH_BORROW");
    const m = computeBasketMetrics(positions, AS_OF, config);

    expect(m.fundingRate).toBeCloseTo(0.044, 12);
    expect(m.dailyCarry).toBeCloseTo(2777.7778, 3);
    expect(m.hedgeAlert).toBe(true);
  });

  it("zeroes carry when no futures rate is known", () => {
    const positions = simpleCarryBasket().map(p =>
      p.positionType === "FUTURE" ? { ...p, financingRatePct: null } : p
    );
    const m = computeBasketMetrics(positions, AS_OF);

    expect(m.impliedRate).toBeNull();
    expect(m.fundingRate).toBeNull();
    expect(m.dailyCarry).toBe(0);
    expect(m.accruedCarry).toBe(0);
    expect(m.expectedCarryToMaturity).toBe(0);
  });

  it("zeroes carry when a basket date is missing", () => {
    const positions = simpleCarryBasket().map(p => ({ ...p, startDate: null }));
    const m = computeBasketMetrics(positions, AS_OF);

    expect(m.startDate).toBeNull();
    expect(m.daysElapsed).toBe(0);
    expect(m.dailyCarry).toBe(0);
    // DV01 only needs the end date
    expect(m.totalDv01).toBeCloseTo(3055.5556, 3);
  });

  it("clamps remaining days on a matured basket", () => {
    const m = computeBasketMetrics(simpleCarryBasket(), utc(2026, 7, 1));

    expect(m.daysToMaturity).toBe(0);
    expect(m.expectedCarryToMaturity).toBe(0);
    expect(m.totalDv01).toBe(0);
  });

  it("counts LONG futures as long notional and flags an unhedged basket", () => {
    const positions = [
      createPosition({
        basketId: "Basket2",
        positionType: "FUTURE",
        longShort: "LONG",
        notionalUsd: 75_000_000,
        equityExposureUsd: 75_000_000,
      }),
      createPosition({
        basketId: "Basket2",
        positionType: "EQUITY_BASKET",
        equityExposureUsd: -74_800_000,
      }),
    ];
    const m = computeBasketMetrics(positions, AS_OF);

    expect(m.longFuturesNotional).toBe(75_000_000);
    expect(m.shortFuturesNotional).toBe(0);
    expect(m.netEquityExposure).toBe(200_000);
    expect(m.hedgeAlert).toBe(true);
    expect(m.totalDv01).toBe(0);
  });

  it("returns zeros for an empty basket", () => {
    const m = computeBasketMetrics([], AS_OF);
    expect(m.totalNotional).toBe(0);
    expect(m.totalPnlBps).toBe(0);
    expect(m.hedgeAlert).toBe(false);
    expect(m.startDate).toBeNull();
  });
});

describe("computeBasketComponentTotals", () => {
  it("sums each leg of the requested basket only", () => {
    const positions = [
      ...simpleCarryBasket(),
      createPosition({ basketId: "Basket1", positionType: "STOCK_BORROW", marketValueUsd: 2_500_000 }),
      createPosition({ basketId: "Basket1", positionType: "CASH_LEND", notionalUsd: 5_000_000 }),
      createPosition({ basketId: "Other", positionType: "FUTURE", notionalUsd: 1_000_000, quantity: 8 }),
    ];
    const totals = computeBasketComponentTotals(positions, "Basket1");

    expect(totals).toEqual({
      futuresNotional: -100_000_000,
      futuresContracts: -800,
      cashBorrowNotional: -100_000_000,
      cashLendNotional: 5_000_000,
      stockBorrowNotional: 2_500_000,
      equityMarketValue: 99_950_000,
      equityPositionCount: 2,
      hasFutures: true,
      hasCashBorrow: true,
      hasCashLend: true,
      hasStockBorrow: true,
      hasEquities: true,
    });
  });

  it("reports no legs for an unknown basket", () => {
    const totals = computeBasketComponentTotals(simpleCarryBasket(), "Missing");
    expect(totals.hasFutures).toBe(false);
    expect(totals.equityPositionCount).toBe(0);
  });
});
