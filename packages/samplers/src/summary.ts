import { stats } from '@cadence/base';
import { EmptyInputError } from './errors.js';

/** Descriptive statistics of a sample of durations */
export interface Summary {
  count: number;
  min: number;
  max: number;
  mean: number;
  /** Sample standard deviation, zero for a single observation */
  stdev: number;
  /** Sum of the sample, in order */
  total: number;
}

/**
 * Summarize the given sample
 * @throws {EmptyInputError} when the sample is empty
 */
export function describe(sample: ArrayLike<number>): Summary {
  if (sample.length === 0) throw new EmptyInputError();

  const running = new stats.online.Gaussian();
  let total = 0;

  for (let i = 0; i < sample.length; i++) {
    const x = sample[i];
    running.push(x);
    total += x;
  }

  const count = running.N();
  const [min, max] = running.range();

  return {
    count,
    min,
    max,
    // rounding may place the running mean an ulp outside the range
    mean: Math.min(max, Math.max(min, running.mean())),
    stdev: count > 1 ? running.std(1) : 0,
    total,
  };
}
