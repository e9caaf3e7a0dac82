import { describe, it, expect } from "vitest";
import type { FuturesContract } from "./basketRecords";
import {
  calculateCalendarSpreadCarry,
  calculateCalendarSpreadDv01,
  calculateImpliedForwardRate,
  calculateNotionalFromDv01Budget,
  computeCarryMatrix,
  computeForwardRateMatrix,
  curveDaysToMaturity,
  dynamicDaysToMaturity,
  filterOpportunities,
  getBestOpportunityForTenor,
  getTenorBucket,
  identifyCalendarSpreadOpportunities,
  matrixValue,
} from "./forwardRateEngine";

const AS_OF = new Date(Date.UTC(2026, 1, 28));

// 20, 110, 200 and 200 days out from AS_OF. U6 is unpriced.
const H6: FuturesContract = { code: "AXWH6", price: 44.5, daysToMaturityStatic: 20, maturityDate: new Date(Date.UTC(2026, 2, 20)) };
const M6: FuturesContract = { code: "AXWM6", price: 51.5, daysToMaturityStatic: 110, maturityDate: new Date(Date.UTC(2026, 5, 18)) };
const U6: FuturesContract = { code: "AXWU6", price: null, daysToMaturityStatic: 200, maturityDate: new Date(Date.UTC(2026, 8, 16)) };
const Z6: FuturesContract = { code: "AXWZ6", price: 60, daysToMaturityStatic: 200, maturityDate: new Date(Date.UTC(2026, 8, 16)) };
const UNDATED: FuturesContract = { code: "AXWH7", price: 70, daysToMaturityStatic: 380, maturityDate: null };
const CURVE = [H6, M6, U6, Z6];

describe("calculateImpliedForwardRate", () => {
  it("derives the forward between two maturities", () => {
    const rate = calculateImpliedForwardRate({ fromPrice: 44.5, toPrice: 51.5, daysFrom: 20, daysTo: 110 });
    expect(rate).toBeCloseTo(53.0556, 4);
  });

  it("uses static days for the day-count fraction when given", () => {
    const rate = calculateImpliedForwardRate({
      fromPrice: 44.5,
      toPrice: 51.5,
      daysFrom: 20,
      daysTo: 110,
      daysFromStatic: 22,
      daysToStatic: 112,
    });
    expect(rate).toBeCloseTo(54.0202, 4);
  });

  it("returns null for reversed, equal or expired legs", () => {
    expect(calculateImpliedForwardRate({ fromPrice: 51.5, toPrice: 44.5, daysFrom: 110, daysTo: 20 })).toBeNull();
    expect(calculateImpliedForwardRate({ fromPrice: 44.5, toPrice: 44.5, daysFrom: 20, daysTo: 20 })).toBeNull();
    expect(calculateImpliedForwardRate({ fromPrice: 44.5, toPrice: 51.5, daysFrom: -30, daysTo: 0 })).toBeNull();
  });

  it("returns null when the static days give a zero day-count fraction", () => {
    const rate = calculateImpliedForwardRate({
      fromPrice: 44.5,
      toPrice: 51.5,
      daysFrom: 20,
      daysTo: 110,
      daysFromStatic: 110,
      daysToStatic: 110,
    });
    expect(rate).toBeNull();
  });
});

describe("dynamicDaysToMaturity", () => {
  it("counts days to the maturity date", () => {
    expect(dynamicDaysToMaturity(H6, AS_OF)).toBe(20);
    expect(dynamicDaysToMaturity(M6, AS_OF)).toBe(110);
  });

  it("has no value without a maturity date", () => {
    expect(dynamicDaysToMaturity(UNDATED, AS_OF)).toBeNull();
  });
});

describe("curveDaysToMaturity", () => {
  it("leaves an undated contract empty on a dated curve", () => {
    expect(curveDaysToMaturity([H6, UNDATED, Z6], AS_OF)).toEqual([20, null, 200]);
  });

  it("uses static days when the curve carries no maturity dates", () => {
    const staticOnly = [
      { ...H6, maturityDate: null },
      { ...UNDATED, daysToMaturityStatic: 380 },
    ];
    expect(curveDaysToMaturity(staticOnly, AS_OF)).toEqual([20, 380]);
  });

  it("prices a static-only curve from the static days", () => {
    const staticOnly = [
      { ...H6, maturityDate: null },
      { ...M6, maturityDate: null },
    ];
    expect(matrixValue(computeForwardRateMatrix(staticOnly, AS_OF), "AXWH6", "AXWM6")).toBeCloseTo(53.0556, 4);
  });
});

describe("forward and carry matrices", () => {
  const forward = computeForwardRateMatrix(CURVE, AS_OF);
  const carry = computeCarryMatrix(CURVE, AS_OF);

  it("keeps the input order on both axes", () => {
    expect(forward.contracts).toEqual(["AXWH6", "AXWM6", "AXWU6", "AXWZ6"]);
    expect(carry.contracts).toEqual(forward.contracts);
  });

  it("fills only near-to-far cells with prices", () => {
    expect(matrixValue(forward, "AXWH6", "AXWM6")).toBeCloseTo(53.0556, 4);
    expect(matrixValue(forward, "AXWH6", "AXWZ6")).toBeCloseTo(61.7222, 4);
    expect(matrixValue(forward, "AXWM6", "AXWZ6")).toBeCloseTo(70.3889, 4);

    expect(matrixValue(forward, "AXWM6", "AXWH6")).toBeNull();
    expect(matrixValue(forward, "AXWH6", "AXWH6")).toBeNull();
    expect(matrixValue(forward, "AXWH6", "AXWU6")).toBeNull();
    expect(matrixValue(forward, "AXWU6", "AXWZ6")).toBeNull();
  });

  it("annualizes the price spread over the period", () => {
    expect(matrixValue(carry, "AXWH6", "AXWM6")).toBeCloseTo(28.3889, 4);
    expect(matrixValue(carry, "AXWH6", "AXWZ6")).toBeCloseTo(31.4306, 4);
    expect(matrixValue(carry, "AXWM6", "AXWZ6")).toBeCloseTo(34.4722, 4);
    expect(matrixValue(carry, "AXWZ6", "AXWM6")).toBeNull();
  });

  it("leaves cells of an undated contract empty", () => {
    const curve = [...CURVE, UNDATED];
    const fwd = computeForwardRateMatrix(curve, AS_OF);
    const carry = computeCarryMatrix(curve, AS_OF);

    expect(matrixValue(fwd, "AXWH6", "AXWH7")).toBeNull();
    expect(matrixValue(carry, "AXWH6", "AXWH7")).toBeNull();
    expect(matrixValue(fwd, "AXWH6", "AXWM6")).toBeCloseTo(53.0556, 4);
    expect(filterOpportunities(fwd, carry, curve, {}, AS_OF)).toHaveLength(3);
  });

  it("returns null for codes off the axis", () => {
    expect(matrixValue(forward, "AXWH6", "NOPE")).toBeNull();
  });

  it("handles an empty curve", () => {
    expect(computeForwardRateMatrix([], AS_OF)).toEqual({ contracts: [], cells: [] });
  });
});

describe("filterOpportunities", () => {
  const forward = computeForwardRateMatrix(CURVE, AS_OF);
  const carry = computeCarryMatrix(CURVE, AS_OF);

  it("lists every valued cell in row-major order without criteria", () => {
    const opps = filterOpportunities(forward, carry, CURVE, {}, AS_OF);

    expect(opps.map(o => `${o.fromContract}>${o.toContract}`)).toEqual([
      "AXWH6>AXWM6",
      "AXWH6>AXWZ6",
      "AXWM6>AXWZ6",
    ]);
    expect(opps.map(o => o.periodDays)).toEqual([90, 180, 90]);
  });

  it("applies maturity bounds inclusively", () => {
    const opps = filterOpportunities(forward, carry, CURVE, { minMaturityDays: 90, maxMaturityDays: 90 }, AS_OF);
    expect(opps.map(o => o.toContract)).toEqual(["AXWM6", "AXWZ6"]);
    expect(opps.map(o => o.fromContract)).toEqual(["AXWH6", "AXWM6"]);
  });

  it("filters on forward rate and carry", () => {
    expect(filterOpportunities(forward, carry, CURVE, { minForwardRate: 60 }, AS_OF)).toHaveLength(2);
    const opps = filterOpportunities(forward, carry, CURVE, { minForwardRate: 60, minAnnualizedCarry: 32 }, AS_OF);
    expect(opps).toHaveLength(1);
    expect(opps[0]?.fromContract).toBe("AXWM6");
    expect(opps[0]?.forwardRate).toBeCloseTo(70.3889, 4);
    expect(opps[0]?.annualizedCarry).toBeCloseTo(34.4722, 4);
  });
});

describe("calendar spread analytics", () => {
  it("accrues the spread linearly over the holding period", () => {
    const carry = calculateCalendarSpreadCarry(44.5, 51.5, 90, 100_000_000, 20);

    expect(carry.spreadBps).toBe(7);
    expect(carry.dailyCarryBps).toBeCloseTo(0.077778, 6);
    expect(carry.dailyCarryUsd).toBeCloseTo(777.78, 2);
    expect(carry.totalCarryBps).toBeCloseTo(1.5556, 4);
    expect(carry.totalCarryUsd).toBeCloseTo(15_555.56, 2);
    expect(carry.annualizedCarryBps).toBeCloseTo(28.3889, 4);
    expect(carry.holdingPeriodDays).toBe(20);
    expect(carry.daysBetweenContracts).toBe(90);
  });

  it("holds over the full span by default", () => {
    const carry = calculateCalendarSpreadCarry(44.5, 51.5, 90, -100_000_000);
    expect(carry.holdingPeriodDays).toBe(90);
    expect(carry.totalCarryBps).toBeCloseTo(7, 10);
    expect(carry.totalCarryUsd).toBeCloseTo(70_000, 6);
  });

  it("earns nothing when the contracts share a maturity", () => {
    const carry = calculateCalendarSpreadCarry(44.5, 51.5, 0, 100_000_000);
    expect(carry.dailyCarryBps).toBe(0);
    expect(carry.totalCarryUsd).toBe(0);
  });

  it("sizes notional from a DV01 budget as the inverse of DV01", () => {
    expect(calculateCalendarSpreadDv01(100_000_000, 90)).toBeCloseTo(2500, 8);
    expect(calculateNotionalFromDv01Budget(2500, 90)).toBeCloseTo(100_000_000, 4);
    expect(calculateNotionalFromDv01Budget(2500, 0)).toBe(0);
  });
});

describe("identifyCalendarSpreadOpportunities", () => {
  const matrix = {
    contracts: ["X", "Y", "Z"],
    cells: [
      [null, 120, 15],
      [null, null, 60],
      [null, null, null],
    ],
  };

  it("flags rich and cheap forwards, most extreme first", () => {
    const signals = identifyCalendarSpreadOpportunities(matrix);

    expect(signals).toEqual([
      {
        fromContract: "X",
        toContract: "Y",
        forwardRate: 120,
        signal: "RICH",
        tradeAction: "SELL_SPREAD",
        description: "Sell X/Y spread - implied rate 120.0 bps is high",
      },
      {
        fromContract: "X",
        toContract: "Z",
        forwardRate: 15,
        signal: "CHEAP",
        tradeAction: "BUY_SPREAD",
        description: "Buy X/Z spread - implied rate 15.0 bps is low",
      },
    ]);
  });

  it("treats the thresholds as inclusive", () => {
    const signals = identifyCalendarSpreadOpportunities(matrix, 120, 60);
    expect(signals.map(s => s.signal)).toEqual(["CHEAP", "RICH", "CHEAP"]);
    expect(signals.map(s => s.forwardRate)).toEqual([15, 120, 60]);
  });
});

describe("tenor buckets", () => {
  it("places period days in their bucket", () => {
    expect(getTenorBucket(0).key).toBe("1-3M");
    expect(getTenorBucket(90).key).toBe("1-3M");
    expect(getTenorBucket(91).key).toBe("3-6M");
    expect(getTenorBucket(365).key).toBe("6-12M");
    expect(getTenorBucket(400).key).toBe("12M+");
  });

  it("sends out-of-range days to the longest bucket", () => {
    expect(getTenorBucket(-5).key).toBe("12M+");
  });

  it("picks the highest carry within a bucket", () => {
    const forward = computeForwardRateMatrix(CURVE, AS_OF);
    const carry = computeCarryMatrix(CURVE, AS_OF);
    const opps = filterOpportunities(forward, carry, CURVE, {}, AS_OF);

    const best = getBestOpportunityForTenor(opps, "1-3M");
    expect(best?.fromContract).toBe("AXWM6");
    expect(best?.toContract).toBe("AXWZ6");
    expect(getBestOpportunityForTenor(opps, "3-6M")?.fromContract).toBe("AXWH6");
    expect(getBestOpportunityForTenor(opps, "6-12M")).toBeNull();
  });
});
