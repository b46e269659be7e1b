import * as q from './quantity.js';
import { As } from './util.js';

/** A measure of time in nanoseconds */
export type HrTime = As<bigint>;

/**
 * The clock a time source reads.
 *  - 'wall': monotonic elapsed real time, unaffected by system clock changes
 *  - 'process': CPU time (user + system) consumed by the current process
 */
export type ClockKind = 'wall' | 'process';

/**
 * Raw source of timing data
 */
export interface TimeSource {
  /** Begin or restart the timer. Returns the current time */
  start(): HrTime;

  /** Get the current elapsed time since the last call to start() */
  current(): HrTime;
}

const NS_PER_SECOND = 1_000_000_000n;

export const HrTime = {
  toSeconds(time: HrTime): number {
    const whole = Number(time / NS_PER_SECOND);
    const frac = Number(time % NS_PER_SECOND) / 1e9;

    return whole + frac;
  },
  from(quantity: q.Quantity): HrTime {
    const us = q.convert(quantity[q.UnitTag]).to(quantity.scalar, 'microsecond').scalar;
    const whole = Math.trunc(us);
    const frac = us - whole;

    return (BigInt(whole) * 1000n + BigInt(Math.round(frac * 1000))) as HrTime;
  },
};

/** Returns a high-resolution timer reading the given clock */
export function create(kind: ClockKind = 'wall'): TimeSource {
  if (typeof process !== 'object' || typeof process.hrtime?.bigint !== 'function') {
    throw new Error('Runtime not supported');
  }

  switch (kind) {
    case 'wall':
      return nodeJSTimer();
    case 'process':
      return cpuTimer();
  }
}

function nodeJSTimer(): TimeSource {
  let now = 0n as HrTime;

  return {
    start() {
      now = process.hrtime.bigint() as HrTime;
      return now;
    },
    current() {
      return (process.hrtime.bigint() - now) as HrTime;
    },
  };
}

function cpuTime(): HrTime {
  const { user, system } = process.cpuUsage();
  return (BigInt(user + system) * 1000n) as HrTime;
}

/** CPU time of this process, at microsecond resolution */
function cpuTimer(): TimeSource {
  let now = 0n as HrTime;

  return {
    start() {
      now = cpuTime();
      return now;
    },
    current() {
      return (cpuTime() - now) as HrTime;
    },
  };
}
