/**
 * Position sizing from price history.
 *
 * Single-asset allocation scores an instrument by its Sharpe ratio against a
 * risk metric, penalised by the rolling economic drawdown. Portfolio weights
 * are mean-variance weights scaled by a drawdown-control factor, so an asset
 * already deep in drawdown relative to the risk target gets less capital.
 */

import {
  averageDrawdown,
  lowerSemiVariance,
  mean,
  rollingEconomicDrawdown,
  rsi,
  sharpeRatio,
  simpleReturns,
  stdDev,
} from "./indicators.js";
import { covariance, invert, multiplyVector } from "./matrix.js";

export type RiskMode = "std" | "lsv";

export interface AllocationParams {
  mode: RiskMode;
  /** Maximum tolerated drawdown, in (0, 1) */
  risk: number;
  riskFree: number;
  /** Observations per window, e.g. 12 monthly candles for a year */
  freq: number;
}

export interface PortfolioParams extends AllocationParams {
  money: number;
  maxStocks: number;
  minRsi?: number;
  maxRsi?: number;
  shortSalesConstraint: boolean;
}

export interface Candidate {
  id: string;
  symbol: string;
  name: string;
  closes: number[];
}

export interface PortfolioRow {
  id: string;
  symbol: string;
  name: string;
  weight: number;
  price: number;
  amount: number;
  shares: number;
}

export interface StopLossRow {
  id: string;
  symbol: string;
  lastClose: number;
  averageDrawdown: number;
  stopLoss: number;
}

/** Attempts at the weight solve before giving up on a singular covariance */
export const MAX_ALLOCATION_RETRIES = 5;

// ─── Single asset ──────────────────────────────────────────

function riskMetric(returns: number[], mode: RiskMode, freq: number): number | null {
  return mode === "std" ? stdDev(returns) : lowerSemiVariance(returns, freq);
}

export function allocationScore(closes: readonly number[], params: AllocationParams): number | null {
  const { mode, risk, riskFree, freq } = params;
  const returns = simpleReturns(closes);
  const metric = riskMetric(returns, mode, freq);
  const sr = sharpeRatio(returns, freq, riskFree);
  const redp = rollingEconomicDrawdown(closes, freq);
  if (metric === null || sr === null || redp === null) return null;

  const score = (sr / metric + 0.5 / (1 - risk * risk)) * risk - redp / (1 - redp);
  return Number.isFinite(score) ? score : null;
}

/** Allocation multiple, floored at 1 */
export function singleAllocation(closes: readonly number[], params: AllocationParams): number | null {
  const score = allocationScore(closes, params);
  return score === null ? null : Math.max(1, score);
}

// ─── Portfolio ─────────────────────────────────────────────

/**
 * Weights for a set of assets with equally long histories.
 * Returns null when the covariance matrix cannot be inverted.
 */
export function multipleAllocation(
  assets: readonly Candidate[],
  params: AllocationParams & { shortSalesConstraint: boolean }
): Map<string, number> | null {
  const { mode, risk, riskFree, freq, shortSalesConstraint } = params;
  const length = Math.min(...assets.map((a) => a.closes.length));
  const rows: number[][] = [];
  const drift: number[] = [];
  const control: number[] = [];

  for (const asset of assets) {
    const closes = asset.closes.slice(asset.closes.length - length);
    const returns = simpleReturns(closes);
    const metric = riskMetric(returns, mode, freq);
    const redp = rollingEconomicDrawdown(closes, freq);
    if (metric === null || redp === null) return null;

    let mu = mean(returns) - riskFree + metric ** 2 / 2;
    if (shortSalesConstraint) mu = Math.max(mu, 0);
    rows.push(returns);
    drift.push(mu);
    control.push((1 / (1 - risk * risk)) * ((risk - redp) / (1 - redp)));
  }

  const inverse = invert(covariance(rows));
  if (!inverse) return null;

  let weights = multiplyVector(inverse, drift).map((w, i) => w * control[i]);
  if (shortSalesConstraint) weights = weights.map((w) => Math.max(w, 0));

  const total = weights.reduce((s, w) => s + Math.abs(w), 0);
  const result = new Map<string, number>();
  if (!(total > 0)) return result;

  weights.forEach((w, i) => {
    const normalized = w / total;
    if (!shortSalesConstraint || normalized > 0) {
      result.set(assets[i].id, normalized);
    }
  });
  return result;
}

/**
 * Filter candidates, then solve for weights. When more than `maxStocks`
 * survive, or the solve hits a singular covariance, the lowest-Sharpe asset
 * is dropped and the solve retried.
 */
export function buildPortfolio(candidates: readonly Candidate[], params: PortfolioParams): PortfolioRow[] {
  const { freq, riskFree, money, maxStocks, minRsi, maxRsi } = params;

  let pool = candidates
    .filter((c) => c.closes.length > freq)
    .filter((c) => {
      const price = c.closes[c.closes.length - 1];
      return price > 0 && price <= money;
    })
    .filter((c) => {
      if (minRsi === undefined && maxRsi === undefined) return true;
      const value = rsi(c.closes);
      if (value === null) return false;
      return (minRsi === undefined || value >= minRsi) && (maxRsi === undefined || value <= maxRsi);
    })
    .map((c) => ({ candidate: c, sharpe: sharpeRatio(simpleReturns(c.closes), freq, riskFree) ?? -Infinity }))
    .sort((a, b) => b.sharpe - a.sharpe);

  if (pool.length > maxStocks) {
    pool = pool.slice(0, Math.max(0, maxStocks));
  }

  for (let attempt = 0; attempt <= MAX_ALLOCATION_RETRIES && pool.length > 0; attempt++) {
    const weights = multipleAllocation(
      pool.map((p) => p.candidate),
      params
    );
    if (weights) {
      return pool.flatMap(({ candidate }) => {
        const weight = weights.get(candidate.id);
        if (weight === undefined) return [];
        const price = candidate.closes[candidate.closes.length - 1];
        const amount = weight * money;
        return [{
          id: candidate.id,
          symbol: candidate.symbol,
          name: candidate.name,
          weight,
          price,
          amount,
          shares: Math.floor(Math.abs(amount) / price),
        }];
      });
    }
    pool = pool.slice(0, -1);
  }
  return [];
}

// ─── Stop loss ─────────────────────────────────────────────

/** lastClose × (1 − min(n × avgDrawdown, maxPercent)) */
export function stopLoss(
  closes: readonly number[],
  n: number,
  maxPercent: number,
  freq: number
): { lastClose: number; averageDrawdown: number; stopLoss: number } | null {
  if (closes.length === 0) return null;
  const avg = averageDrawdown(simpleReturns(closes), freq);
  if (avg === null) return null;
  const lastClose = closes[closes.length - 1];
  return {
    lastClose,
    averageDrawdown: avg,
    stopLoss: lastClose * (1 - Math.min(n * avg, maxPercent)),
  };
}
