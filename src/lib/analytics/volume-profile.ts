/**
 * Volume Profile
 *
 * Distribution of traded volume across equal-width price bins.
 * The point of control (POC) is the price level where the most volume
 * changed hands, often acting as support/resistance.
 */

import type { SeriesPoint, VolumeProfile } from "./types.js";
import { innerJoin } from "./series.js";

/** Default number of price bins */
export const VOLUME_PROFILE_BINS = 20;

/**
 * Calculate the volume profile of a price/volume pair of series
 *
 * Prices and volumes are matched on time. The observed range
 * [min, max] is split into `bins` equal bins; the maximum price falls in
 * the top bin. A single distinct price produces one bin at that price.
 *
 * @param prices - Price series (e.g., bar closes)
 * @param volumes - Volume series aligned by time
 * @param bins - Number of bins (>= 1)
 */
export function volumeProfile(
  prices: readonly SeriesPoint[],
  volumes: readonly SeriesPoint[],
  bins = VOLUME_PROFILE_BINS
): VolumeProfile {
  const joined = innerJoin(prices, volumes);
  if (joined.length === 0 || !Number.isInteger(bins) || bins < 1) {
    return { priceLevels: [], volumes: [], poc: null };
  }

  let min = Infinity;
  let max = -Infinity;
  for (const { a } of joined) {
    min = Math.min(min, a);
    max = Math.max(max, a);
  }

  if (max === min) {
    const total = joined.reduce((sum, p) => sum + p.b, 0);
    return { priceLevels: [min], volumes: [total], poc: min };
  }

  const width = (max - min) / bins;
  const binVolumes = new Array<number>(bins).fill(0);
  for (const { a: price, b: volume } of joined) {
    const index = Math.min(Math.floor((price - min) / width), bins - 1);
    binVolumes[index] += volume;
  }

  const priceLevels = binVolumes.map((_, i) => min + (i + 0.5) * width);

  let pocIndex = 0;
  for (let i = 1; i < bins; i++) {
    if (binVolumes[i] > binVolumes[pocIndex]) pocIndex = i;
  }

  return { priceLevels, volumes: binVolumes, poc: priceLevels[pocIndex] };
}
