import { assert, stats, timer, RecursivePartial } from '@cadence/base';
import { TargetInvocationError, TimeBudgetError } from './errors.js';
import * as options from './options.js';

/** Type of function which can be sampled by the stopwatch */
export type SamplerFn<Args extends unknown[]> = (...args: Args) => unknown;

const enum Phase {
  Ready = 0,
  Warmup = 1,
  Sampling = 2,
  Complete = 3,
}

/**
 * Times repeated invocations of a function until the confidence interval of
 * the mean duration is narrow enough, or the sample size limit is reached.
 *
 * Each sampler runs once. Invocations are synchronous and never overlap, and
 * the overhead of the call and of reading the clock is not subtracted.
 */
export class Sampler<Args extends unknown[] = []> {
  readonly opts: options.Options;
  readonly timeSource: timer.TimeSource;

  /** Critical value of the confidence interval */
  readonly z: number;

  private phase = Phase.Ready;

  /**
   * @throws {ConfigurationError} when the options are invalid
   */
  constructor(
    private readonly fn: SamplerFn<Args>,
    opts?: RecursivePartial<options.Options>,
    timeSource?: timer.TimeSource,
  ) {
    this.opts = options.resolve(opts);
    this.timeSource = timeSource ?? timer.create(this.opts.clock);
    this.z = stats.normal.zValue(this.opts.confidenceLevel);
  }

  /**
   * Run the function with the given arguments and return the duration (s)
   * of each measured invocation, in the order they were made.
   *
   * @throws {TargetInvocationError} when the function throws
   * @throws {TimeBudgetError} when the measured invocations exceed `maxTime`
   */
  run(...args: Args): number[] {
    if (this.phase !== Phase.Ready) { throw new Error('The stopwatch has already run'); }

    try {
      this.phase = Phase.Warmup;
      this.warmup(args);

      this.phase = Phase.Sampling;
      return this.sample(args);
    } finally {
      this.phase = Phase.Complete;
    }
  }

  private warmup(args: Args) {
    const { fn, opts } = this;
    if (!opts.warmup.enabled) return;

    for (let i = 0; i < opts.warmup.runs; i++) {
      try {
        fn(...args);
      } catch (e) {
        throw new TargetInvocationError('warmup', i, e);
      }
    }
  }

  private sample(args: Args): number[] {
    const { fn, opts, timeSource } = this;
    const durations: number[] = [];
    const running = new stats.online.Gaussian();
    let elapsed = 0;

    for (;;) {
      let duration: timer.HrTime;

      try {
        timeSource.start();
        fn(...args);
        duration = timeSource.current();
      } catch (e) {
        throw new TargetInvocationError('sampling', durations.length, e);
      }

      const seconds = timer.HrTime.toSeconds(duration);
      assert.gte(seconds, 0, 'The clock went backwards');

      durations.push(seconds);
      running.push(seconds);
      elapsed += seconds;

      if (elapsed > opts.maxTime) {
        throw new TimeBudgetError(elapsed, opts.maxTime);
      }

      if (this.isComplete(running)) {
        return durations;
      }
    }
  }

  /** Whether to stop sampling */
  private isComplete(running: stats.online.Gaussian): boolean {
    const { sampleSize, allowedDeviation } = this.opts;
    const n = running.N();

    // maximum criteria
    if (n >= sampleSize.max) return true;

    // minimum criteria
    if (n < 2 || n < sampleSize.min) return false;

    const margin = (this.z * running.std(1)) / Math.sqrt(n);
    return stats.intervals.relativeMargin(margin, running.mean()) <= allowedDeviation;
  }
}

/**
 * Time the given function, called with the given arguments, until the
 * sample is stable. Returns the duration (s) of each measured invocation.
 *
 * @throws {ConfigurationError} before the function is called, when the options are invalid
 * @throws {TargetInvocationError} when the function throws
 * @throws {TimeBudgetError} when the measured invocations exceed `maxTime`
 */
export function measure<Args extends unknown[]>(
  fn: SamplerFn<Args>,
  opts?: RecursivePartial<options.Options>,
  ...args: Args
): number[] {
  return new Sampler<Args>(fn, opts).run(...args);
}
