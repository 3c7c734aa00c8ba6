/**
 * Stationarity: Augmented Dickey-Fuller test (constant, no trend)
 *
 * Regression:
 *   Δx_t = α + γ·x_{t-1} + Σ_{i=1..p} δ_i·Δx_{t-i} + ε_t
 *
 * The statistic is the t-value of γ. A strongly negative statistic rejects
 * the unit root (the series mean-reverts). The lag count p is chosen by AIC
 * over 0..maxlag on a common sample, with maxlag = ceil(12·(n/100)^¼).
 *
 * p-values use MacKinnon's (1994) response-surface approximation and the
 * critical values use MacKinnon (2010), both for the constant-only case.
 */

import type { AdfResult, CriticalLevel, SeriesPoint } from "./types.js";
import { presentValues } from "./series.js";
import { fitOls, type OlsFit } from "./regression.js";

/** Minimum non-missing observations for the test */
export const ADF_MIN_OBSERVATIONS = 10;

/** p-value below which the series is reported stationary */
export const ADF_SIGNIFICANCE = 0.05;

// MacKinnon (1994) p-value surface, constant-only, one variable
const TAU_MAX = 2.74;
const TAU_MIN = -18.83;
const TAU_STAR = -1.61;
const TAU_SMALL_P = [2.1659, 1.4412, 0.038269];
const TAU_LARGE_P = [1.7339, 0.93202, -0.12745, -0.010368];

// MacKinnon (2010) critical value polynomials in 1/nobs, constant-only
const CRITICAL_COEFFICIENTS: Record<CriticalLevel, number[]> = {
  "1%": [-3.43035, -6.5393, -16.786, -79.433],
  "5%": [-2.86154, -2.8903, -4.234, -40.04],
  "10%": [-2.56677, -1.5384, -2.809, 0],
};

function sentinel(): AdfResult {
  return {
    statistic: 0,
    pValue: 1,
    criticalValues: {},
    usedLag: 0,
    observations: 0,
    isStationary: false,
  };
}

function polyval(coefficients: readonly number[], x: number): number {
  // coefficients are lowest order first
  let result = 0;
  for (let i = coefficients.length - 1; i >= 0; i--) {
    result = result * x + coefficients[i];
  }
  return result;
}

/**
 * Complementary error function (Numerical Recipes erfcc, |error| < 1.2e-7)
 */
function erfc(x: number): number {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const r =
    t *
    Math.exp(
      -z * z -
        1.26551223 +
        t *
          (1.00002368 +
            t *
              (0.37409196 +
                t *
                  (0.09678418 +
                    t * (-0.18628806 + t * (0.27886807 + t * (-1.13520398 + t * (1.48851587 + t * (-0.82215223 + t * 0.17087277))))))))
    );
  return x >= 0 ? r : 2 - r;
}

/**
 * Standard normal cumulative distribution
 */
export function normalCdf(z: number): number {
  return 0.5 * erfc(-z / Math.SQRT2);
}

/**
 * Approximate p-value of an ADF statistic (constant-only regression)
 */
export function mackinnonPValue(statistic: number): number {
  if (statistic > TAU_MAX) return 1;
  if (statistic < TAU_MIN) return 0;
  const coefficients = statistic <= TAU_STAR ? TAU_SMALL_P : TAU_LARGE_P;
  return normalCdf(polyval(coefficients, statistic));
}

/**
 * Finite-sample critical values for a regression with `nobs` observations
 */
export function mackinnonCriticalValues(nobs: number): Record<CriticalLevel, number> {
  const inv = 1 / nobs;
  return {
    "1%": polyval(CRITICAL_COEFFICIENTS["1%"], inv),
    "5%": polyval(CRITICAL_COEFFICIENTS["5%"], inv),
    "10%": polyval(CRITICAL_COEFFICIENTS["10%"], inv),
  };
}

/**
 * Build the ADF design for `lags` lagged differences, starting at `start`
 *
 * Rows cover t = start .. dx.length - 1 with columns
 * [x_t, Δx_{t-1} .. Δx_{t-lags}, 1] and target Δx_t, where Δx_t = x_{t+1} - x_t.
 */
function buildDesign(
  levels: readonly number[],
  dx: readonly number[],
  lags: number,
  start: number
): { x: number[][]; y: number[] } {
  const x: number[][] = [];
  const y: number[] = [];
  for (let t = start; t < dx.length; t++) {
    const row = [levels[t]];
    for (let i = 1; i <= lags; i++) row.push(dx[t - i]);
    row.push(1);
    x.push(row);
    y.push(dx[t]);
  }
  return { x, y };
}

/**
 * Run the Augmented Dickey-Fuller test
 *
 * Gaps are dropped before testing.
 *
 * @returns Test result; the sentinel (pValue 1, not stationary) with fewer
 *   than 10 observations or when a regression is singular
 */
export function adfTest(series: readonly SeriesPoint[]): AdfResult {
  const levels = presentValues(series);
  const n = levels.length;
  if (n < ADF_MIN_OBSERVATIONS) return sentinel();

  // Half the sample, less the constant and level terms
  const maxlag = Math.min(Math.floor(n / 2) - 2, Math.ceil(12 * Math.pow(n / 100, 0.25)));
  if (maxlag < 0) return sentinel();

  const dx: number[] = [];
  for (let i = 1; i < n; i++) dx.push(levels[i] - levels[i - 1]);

  // Lag selection on the common sample that the largest model can use
  let bestLag = 0;
  let bestAic = Infinity;
  for (let lags = 0; lags <= maxlag; lags++) {
    const { x, y } = buildDesign(levels, dx, lags, maxlag);
    const fit = fitOls(x, y);
    if (fit && Number.isFinite(fit.aic) && fit.aic < bestAic) {
      bestAic = fit.aic;
      bestLag = lags;
    }
  }

  const { x, y } = buildDesign(levels, dx, bestLag, bestLag);
  const fit: OlsFit | null = fitOls(x, y);
  if (!fit) return sentinel();

  const statistic = fit.tValues[0];
  if (!Number.isFinite(statistic)) return sentinel();

  const pValue = mackinnonPValue(statistic);

  return {
    statistic,
    pValue,
    criticalValues: mackinnonCriticalValues(fit.nobs),
    usedLag: bestLag,
    observations: fit.nobs,
    isStationary: pValue < ADF_SIGNIFICANCE,
  };
}
