/**
 * Small dense-matrix helpers for mean-variance weights.
 * Matrices are row-major number[][].
 */

export type Matrix = number[][];

/** Sample covariance of equally long series, one series per row */
export function covariance(series: readonly (readonly number[])[]): Matrix {
  const n = series.length;
  const obs = n > 0 ? series[0].length : 0;
  const means = series.map((row) => row.reduce((s, v) => s + v, 0) / obs);
  const cov: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = i; j < n; j++) {
      let sum = 0;
      for (let k = 0; k < obs; k++) {
        sum += (series[i][k] - means[i]) * (series[j][k] - means[j]);
      }
      const value = sum / (obs - 1);
      cov[i][j] = value;
      cov[j][i] = value;
    }
  }
  return cov;
}

/** Gauss-Jordan inverse with partial pivoting; null when singular */
export function invert(m: Matrix, epsilon: number = 1e-12): Matrix | null {
  const n = m.length;
  const a = m.map((row, i) => [...row, ...Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (!(Math.abs(a[pivot][col]) > epsilon)) return null;
    [a[col], a[pivot]] = [a[pivot], a[col]];

    const p = a[col][col];
    for (let k = 0; k < 2 * n; k++) a[col][k] /= p;

    for (let row = 0; row < n; row++) {
      if (row === col) continue;
      const factor = a[row][col];
      if (factor === 0) continue;
      for (let k = 0; k < 2 * n; k++) a[row][k] -= factor * a[col][k];
    }
  }
  return a.map((row) => row.slice(n));
}

export function multiplyVector(m: Matrix, v: readonly number[]): number[] {
  return m.map((row) => row.reduce((s, x, j) => s + x * v[j], 0));
}
