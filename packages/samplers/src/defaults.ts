/** Stopwatch sampler defaults */
export const STOPWATCH_SAMPLER = {
  warmup: {
    enabled: true,
    runs: 1,
  },

  /* The range of measured invocations */
  sampleSize: {
    min: 3,
    max: 1_000,
  },

  allowedDeviation: 0.1,
  confidenceLevel: 0.95,
  clock: 'process',

  /* Time budget for the measured invocations (s) */
  maxTime: 600,
} as const satisfies import('./options.js').Options;
