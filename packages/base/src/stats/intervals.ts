import * as assert from '../assert.js';
import { SimpleSummary } from './OnlineStats.js';
import { zValue } from './normal.js';

/**
 * Half-width of the normal-approximation confidence interval for the mean
 * of a sample.
 *
 * @param std - sample standard deviation
 * @param n - sample size
 */
export function marginOfError(std: number, n: number, confidenceLevel: number): number {
  assert.inRange(confidenceLevel, 0, 1);
  assert.gt(n, 0);

  return (zValue(confidenceLevel) * std) / Math.sqrt(n);
}

/**
 * The margin of error relative to the mean. When the mean is zero the ratio
 * is zero if the margin is too, and infinite otherwise.
 */
export function relativeMargin(margin: number, mean: number): number {
  if (mean > 0) return margin / mean;
  return margin === 0 ? 0 : Infinity;
}

/**
 * Size of a sample, with the same mean and standard deviation as the given
 * sample, whose confidence interval has a relative half-width of at most
 * `allowedDeviation`. Never less than 2.
 */
export function requiredSampleSize(
  sample: SimpleSummary<number>,
  allowedDeviation: number,
  confidenceLevel = 0.95,
): number {
  assert.inRange(allowedDeviation, 0, 1);
  assert.gte(sample.N(), 2, 'At least two observations are needed to estimate the spread');

  const mean = sample.mean();
  const std = sample.std(1);
  const z = zValue(confidenceLevel);

  if (mean <= 0) return std === 0 ? 2 : Infinity;

  const n = ((z * std) / (allowedDeviation * mean)) ** 2;
  return Math.max(2, Math.ceil(n));
}
