/**
 * Regression Metrics: OLS, hedge_ratio, spread
 */

import type { HedgeRatioResult, SeriesPoint, ValuePoint } from "./types.js";
import { innerJoin } from "./series.js";
import { mean } from "./statistics.js";

/**
 * Fitted ordinary least squares model
 */
export interface OlsFit {
  /** Coefficients, aligned with the design matrix columns */
  beta: number[];
  /** Standard error of each coefficient */
  stdErrors: number[];
  /** t-statistic of each coefficient */
  tValues: number[];
  /** Sum of squared residuals */
  ssr: number;
  nobs: number;
  /** Akaike information criterion (Gaussian log-likelihood) */
  aic: number;
}

/**
 * Invert a square matrix with Gauss-Jordan elimination and partial pivoting
 *
 * @returns The inverse, or null when the matrix is (numerically) singular
 */
export function invertMatrix(matrix: readonly (readonly number[])[]): number[][] | null {
  const n = matrix.length;
  const a = matrix.map((row, i) => [...row, ...Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))]);

  let scale = 0;
  for (const row of matrix) for (const v of row) scale = Math.max(scale, Math.abs(v));
  const tolerance = Math.max(scale, 1) * 1e-12;

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (Math.abs(a[pivot][col]) <= tolerance) return null;
    [a[col], a[pivot]] = [a[pivot], a[col]];

    const p = a[col][col];
    for (let j = 0; j < 2 * n; j++) a[col][j] /= p;

    for (let row = 0; row < n; row++) {
      if (row === col) continue;
      const factor = a[row][col];
      if (factor === 0) continue;
      for (let j = 0; j < 2 * n; j++) a[row][j] -= factor * a[col][j];
    }
  }

  return a.map((row) => row.slice(n));
}

/**
 * Fit y = Xβ + ε by ordinary least squares (normal equations)
 *
 * @param x - Design matrix, one row per observation (include a constant column for an intercept)
 * @param y - Dependent values
 * @returns The fit, or null when X'X is singular or there are no residual degrees of freedom
 */
export function fitOls(x: readonly (readonly number[])[], y: readonly number[]): OlsFit | null {
  const nobs = y.length;
  if (nobs === 0 || x.length !== nobs) return null;
  const k = x[0].length;
  if (nobs <= k) return null;

  const xtx: number[][] = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  const xty: number[] = new Array<number>(k).fill(0);
  for (let r = 0; r < nobs; r++) {
    const row = x[r];
    for (let i = 0; i < k; i++) {
      xty[i] += row[i] * y[r];
      for (let j = 0; j < k; j++) xtx[i][j] += row[i] * row[j];
    }
  }

  const inv = invertMatrix(xtx);
  if (!inv) return null;

  const beta = inv.map((row) => row.reduce((sum, v, j) => sum + v * xty[j], 0));

  let ssr = 0;
  for (let r = 0; r < nobs; r++) {
    let fitted = 0;
    for (let i = 0; i < k; i++) fitted += x[r][i] * beta[i];
    ssr += (y[r] - fitted) ** 2;
  }

  const sigma2 = ssr / (nobs - k);
  const stdErrors = inv.map((row, i) => Math.sqrt(Math.max(sigma2 * row[i], 0)));
  const tValues = beta.map((b, i) => b / stdErrors[i]);

  const llf = (-nobs / 2) * (Math.log(2 * Math.PI) + Math.log(ssr / nobs) + 1);
  const aic = -2 * llf + 2 * k;

  return { beta, stdErrors, tValues, ssr, nobs, aic };
}

const NO_HEDGE = (observations: number): HedgeRatioResult => ({
  hedgeRatio: 0,
  intercept: 0,
  rSquared: 0,
  observations,
});

/**
 * Calculate the hedge ratio between two price series
 *
 * A = intercept + hedgeRatio · B + ε   (OLS on inner-joined timestamps)
 *
 * The hedge ratio is the number of units of B that offsets one unit of A
 * when building a pairs spread. R² tells how much of A's variance the
 * relationship explains.
 *
 * @param a - Dependent series
 * @param b - Independent (hedge) series
 * @returns Regression result; all zeros with fewer than 2 joined points or
 *   zero variance on either side
 */
export function hedgeRatio(a: readonly SeriesPoint[], b: readonly SeriesPoint[]): HedgeRatioResult {
  const joined = innerJoin(a, b);
  if (joined.length < 2) return NO_HEDGE(joined.length);

  const ys = joined.map((p) => p.a);
  const xs = joined.map((p) => p.b);
  const meanY = mean(ys);
  const meanX = mean(xs);

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < joined.length; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (syy === 0 || sxx === 0) return NO_HEDGE(joined.length);

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let ssRes = 0;
  for (let i = 0; i < joined.length; i++) {
    ssRes += (ys[i] - (intercept + slope * xs[i])) ** 2;
  }

  return {
    hedgeRatio: slope,
    intercept,
    rSquared: 1 - ssRes / syy,
    observations: joined.length,
  };
}

/**
 * Calculate the spread between two series on matching timestamps
 *
 * Spread = A - hedgeRatio · B
 *
 * @param hedge - Units of B per unit of A (1 for a plain difference)
 * @returns Spread series, empty with fewer than 2 joined points
 */
export function spread(a: readonly SeriesPoint[], b: readonly SeriesPoint[], hedge = 1): ValuePoint[] {
  const joined = innerJoin(a, b);
  if (joined.length < 2) return [];
  return joined.map((p) => ({ time: p.time, value: p.a - hedge * p.b }));
}
