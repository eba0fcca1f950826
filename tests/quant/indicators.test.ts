/**
 * Return-Series Indicator Tests
 *
 * Sharpe ratio and drawdown figures are checked against values worked out
 * by hand for a ten-period return series.
 */

import { describe, it, expect } from "vitest";
import {
  averageDrawdown,
  continuousDrawdowns,
  lowerSemiVariance,
  mean,
  rollingEconomicDrawdown,
  rsi,
  sharpeRatio,
  simpleReturns,
  stdDev,
} from "../../src/quant/indicators.js";

const RETURNS = [0.003, 0.026, 0.015, -0.009, 0.014, 0.024, 0.015, 0.066, -0.014, 0.039];

describe("simpleReturns", () => {
  it("should start with 0 and follow close-to-close changes", () => {
    const returns = simpleReturns([100, 110, 99]);
    expect(returns[0]).toBe(0);
    expect(returns[1]).toBeCloseTo(0.1, 12);
    expect(returns[2]).toBeCloseTo(-0.1, 12);
  });
});

describe("mean / stdDev", () => {
  it("should use the sample standard deviation", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(stdDev([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  it("should return NaN when there is too little data", () => {
    expect(mean([])).toBeNaN();
    expect(stdDev([1])).toBeNaN();
  });
});

describe("sharpeRatio", () => {
  it("should match the hand-computed value for the reference series", () => {
    expect(sharpeRatio(RETURNS, 10, 0)).toBeCloseTo(0.7705391, 6);
  });

  it("should only look at the last freq observations", () => {
    expect(sharpeRatio([5, -5, ...RETURNS], 10, 0)).toBeCloseTo(0.7705391, 6);
  });

  it("should return null when the series is shorter than the window", () => {
    expect(sharpeRatio(RETURNS, 11, 0)).toBeNull();
  });
});

describe("lowerSemiVariance", () => {
  it("should average the squared negative returns over the window", () => {
    // (0.009² + 0.014²) / 10
    expect(lowerSemiVariance(RETURNS, 10)).toBeCloseTo(0.0000277, 10);
  });
});

describe("continuousDrawdowns", () => {
  it("should report one depth per run of negative returns", () => {
    const drawdowns = continuousDrawdowns(RETURNS, 10);
    expect(drawdowns).toHaveLength(2);
    expect(drawdowns?.[0]).toBeCloseTo(0.009, 12);
    expect(drawdowns?.[1]).toBeCloseTo(0.014, 12);
  });

  it("should compound consecutive losses and keep a run still open at the end", () => {
    const drawdowns = continuousDrawdowns([0.01, -0.1, -0.1], 3);
    expect(drawdowns).toHaveLength(1);
    expect(drawdowns?.[0]).toBeCloseTo(0.19, 12);
  });

  it("should be empty for a series without losses", () => {
    expect(continuousDrawdowns([0.01, 0.02, 0], 3)).toEqual([]);
  });
});

describe("averageDrawdown", () => {
  it("should average the continuous drawdowns", () => {
    expect(averageDrawdown(RETURNS, 10)).toBeCloseTo(0.0115, 12);
  });

  it("should be 0 when there are no drawdowns", () => {
    expect(averageDrawdown([0.01, 0.02], 2)).toBe(0);
  });
});

describe("rollingEconomicDrawdown", () => {
  it("should measure the last close against the window peak", () => {
    expect(rollingEconomicDrawdown([90, 100, 80], 3)).toBeCloseTo(0.2, 12);
    expect(rollingEconomicDrawdown([200, 90, 100, 80], 3)).toBeCloseTo(0.2, 12);
  });

  it("should be 0 at a new high", () => {
    expect(rollingEconomicDrawdown([1, 2, 3], 3)).toBe(0);
  });
});

describe("rsi", () => {
  it("should be 100 for a series that only rises", () => {
    const closes = Array.from({ length: 20 }, (_, i) => 100 + i);
    expect(rsi(closes)).toBe(100);
  });

  it("should be 50 when gains and losses balance", () => {
    const closes = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 100 : 101));
    expect(rsi(closes)).toBeCloseTo(50, 10);
  });

  it("should return null without period + 1 closes", () => {
    expect(rsi([1, 2, 3], 14)).toBeNull();
  });
});
