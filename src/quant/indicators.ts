/**
 * Return-series indicators used by the calculator.
 *
 * All functions are pure: closes or returns in, a number out. Windowed
 * indicators look at the last `freq` observations and return null when
 * there are fewer than that.
 */

// ─── Returns & moments ─────────────────────────────────────

/** Simple returns; the first element is 0 so the series aligns with closes */
export function simpleReturns(closes: readonly number[]): number[] {
  return closes.map((close, i) => (i === 0 ? 0 : close / closes[i - 1] - 1));
}

export function mean(xs: readonly number[]): number {
  if (xs.length === 0) return NaN;
  return xs.reduce((s, v) => s + v, 0) / xs.length;
}

/** Sample standard deviation (n - 1) */
export function stdDev(xs: readonly number[]): number {
  if (xs.length < 2) return NaN;
  const m = mean(xs);
  const variance = xs.reduce((s, v) => s + (v - m) ** 2, 0) / (xs.length - 1);
  return Math.sqrt(variance);
}

function lastWindow(xs: readonly number[], freq: number): number[] | null {
  if (freq <= 0 || xs.length < freq) return null;
  return xs.slice(xs.length - freq);
}

// ─── Risk-adjusted return ──────────────────────────────────

export function sharpeRatio(returns: readonly number[], freq: number, riskFree: number): number | null {
  const window = lastWindow(returns, freq);
  if (!window) return null;
  return (mean(window) - riskFree) / stdDev(window);
}

/** Lower semi-variance: mean of squared negative returns */
export function lowerSemiVariance(returns: readonly number[], freq: number): number | null {
  const window = lastWindow(returns, freq);
  if (!window) return null;
  return mean(window.map((r) => Math.min(r, 0) ** 2));
}

// ─── Drawdowns ─────────────────────────────────────────────

/**
 * Depth of every run of consecutive negative returns in the window.
 * A run ends at the next positive return; a run still open at the end of the
 * window is included.
 */
export function continuousDrawdowns(returns: readonly number[], freq: number): number[] | null {
  const window = lastWindow(returns, freq);
  if (!window) return null;

  const drawdowns: number[] = [];
  let level = 1;
  window.forEach((r, i) => {
    if (i === 0) {
      level = r < 0 ? 1 + r : 1;
    } else if (r < 0) {
      level *= 1 + r;
    } else if (r > 0 && level !== 1) {
      drawdowns.push(1 - level);
      level = 1;
    }
  });
  if (level < 1) {
    drawdowns.push(1 - level);
  }
  return drawdowns;
}

/** Mean continuous drawdown; 0 when the window has none */
export function averageDrawdown(returns: readonly number[], freq: number): number | null {
  const drawdowns = continuousDrawdowns(returns, freq);
  if (!drawdowns) return null;
  return drawdowns.length === 0 ? 0 : mean(drawdowns);
}

/** Rolling economic drawdown of price: 1 - last / max over the window */
export function rollingEconomicDrawdown(closes: readonly number[], freq: number): number | null {
  const window = lastWindow(closes, freq);
  if (!window) return null;
  const peak = Math.max(...window);
  if (!Number.isFinite(peak) || peak <= 0) return null;
  return 1 - window[window.length - 1] / peak;
}

// ─── Oscillators ───────────────────────────────────────────

/** RSI with Wilder's smoothing; null when there are not enough closes */
export function rsi(closes: readonly number[], period: number = 14): number | null {
  if (closes.length < period + 1) return null;

  const changes: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    changes.push(closes[i] - closes[i - 1]);
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 0; i < period; i++) {
    if (changes[i] >= 0) avgGain += changes[i];
    else avgLoss += Math.abs(changes[i]);
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period; i < changes.length; i++) {
    const change = changes[i];
    avgGain = (avgGain * (period - 1) + (change >= 0 ? change : 0)) / period;
    avgLoss = (avgLoss * (period - 1) + (change < 0 ? Math.abs(change) : 0)) / period;
  }

  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}
