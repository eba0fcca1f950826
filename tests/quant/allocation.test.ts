/**
 * Allocation Tests
 *
 * Matrix helpers, single-asset allocation multiples, portfolio weights and
 * stop-loss levels.
 */

import { describe, it, expect } from "vitest";
import { covariance, invert, multiplyVector } from "../../src/quant/matrix.js";
import {
  buildPortfolio,
  singleAllocation,
  stopLoss,
  type Candidate,
  type PortfolioParams,
} from "../../src/quant/allocation.js";

function series(base: number, growth: number, amplitude: number, phase: number, length = 25): number[] {
  return Array.from({ length }, (_, i) => base * (1 + growth) ** i * (1 + amplitude * Math.sin(i * phase)));
}

const PARAMS: PortfolioParams = {
  mode: "std",
  risk: 0.3,
  riskFree: 0,
  freq: 12,
  money: 10_000,
  maxStocks: 10,
  shortSalesConstraint: false,
};

describe("matrix helpers", () => {
  it("should compute the sample covariance of each pair of rows", () => {
    const cov = covariance([
      [1, 2, 3],
      [2, 4, 6],
    ]);
    expect(cov[0][0]).toBeCloseTo(1, 12);
    expect(cov[0][1]).toBeCloseTo(2, 12);
    expect(cov[1][0]).toBeCloseTo(2, 12);
    expect(cov[1][1]).toBeCloseTo(4, 12);
  });

  it("should invert a well-conditioned matrix", () => {
    const inverse = invert([
      [4, 7],
      [2, 6],
    ]);
    expect(inverse).not.toBeNull();
    const product = multiplyVector(inverse ?? [], [4, 2]);
    expect(product[0]).toBeCloseTo(1, 12);
    expect(product[1]).toBeCloseTo(0, 12);
  });

  it("should return null for a singular matrix", () => {
    expect(
      invert([
        [1, 2],
        [2, 4],
      ])
    ).toBeNull();
  });
});

describe("singleAllocation", () => {
  it("should return null when there is less history than one window", () => {
    expect(singleAllocation([100, 101, 102], { mode: "std", risk: 0.3, riskFree: 0, freq: 12 })).toBeNull();
  });

  it("should floor the multiple at 1 for a steadily falling price", () => {
    const closes = [100, 98, 97, 95, 92, 90, 88, 85, 83, 80, 78, 75, 73];
    expect(singleAllocation(closes, { mode: "std", risk: 0.3, riskFree: 0, freq: 12 })).toBe(1);
    expect(singleAllocation(closes, { mode: "lsv", risk: 0.3, riskFree: 0, freq: 12 })).toBe(1);
  });
});

describe("buildPortfolio", () => {
  const candidates: Candidate[] = [
    { id: "a", symbol: "AAA", name: "Alpha", closes: series(100, 0.01, 0.03, 1) },
    { id: "b", symbol: "BBB", name: "Beta", closes: series(50, 0.005, 0.05, 1.7) },
    { id: "c", symbol: "CCC", name: "Costly", closes: series(20_000, 0.01, 0.02, 0.6) },
    { id: "d", symbol: "DDD", name: "Short history", closes: series(10, 0.01, 0.02, 0.9, 12) },
  ];

  it("should drop assets priced above the budget or with too little history", () => {
    const rows = buildPortfolio(candidates, PARAMS);
    expect(rows.map((r) => r.id).sort()).toEqual(["a", "b"]);
  });

  it("should normalise weights so their absolute values sum to 1", () => {
    const rows = buildPortfolio(candidates, PARAMS);
    const total = rows.reduce((s, r) => s + Math.abs(r.weight), 0);
    expect(total).toBeCloseTo(1, 10);
    for (const row of rows) {
      expect(row.amount).toBeCloseTo(row.weight * PARAMS.money, 8);
      expect(row.shares).toBe(Math.floor(Math.abs(row.amount) / row.price));
    }
  });

  it("should keep at most maxStocks assets", () => {
    const rows = buildPortfolio(candidates, { ...PARAMS, maxStocks: 1 });
    expect(rows).toHaveLength(1);
    expect(Math.abs(rows[0].weight)).toBeCloseTo(1, 10);
  });

  it("should return nothing when no asset survives the filters", () => {
    expect(buildPortfolio(candidates, { ...PARAMS, money: 1 })).toEqual([]);
  });

  it("should drop an asset whose returns duplicate another's", () => {
    const twin: Candidate = { id: "a2", symbol: "AAA2", name: "Alpha twin", closes: series(100, 0.01, 0.03, 1) };
    const rows = buildPortfolio([candidates[0], twin], PARAMS);
    expect(rows).toHaveLength(1);
  });
});

describe("stopLoss", () => {
  const closes = [100, 90, 99, 99, 89.1];

  it("should place the stop n average drawdowns below the last close", () => {
    const result = stopLoss(closes, 1, 0.5, 4);
    expect(result?.lastClose).toBe(89.1);
    expect(result?.averageDrawdown).toBeCloseTo(0.1, 10);
    expect(result?.stopLoss).toBeCloseTo(80.19, 8);
  });

  it("should cap the distance at maxPercent", () => {
    expect(stopLoss(closes, 3, 0.2, 4)?.stopLoss).toBeCloseTo(71.28, 8);
  });

  it("should return null without enough history", () => {
    expect(stopLoss(closes, 1, 0.2, 12)).toBeNull();
    expect(stopLoss([], 1, 0.2, 1)).toBeNull();
  });
});
