import { assignDeep, isObject, typeName, RecursivePartial, timer } from '@cadence/base';
import { ConfigurationError } from './errors.js';
import * as defaults from './defaults.js';

/** Options of the stopwatch sampler */
export interface Options {
  /** Invocations made, and discarded, before measurement begins */
  readonly warmup: {
    readonly enabled: boolean;
    readonly runs: number;
  };

  /** The range of measured invocations */
  readonly sampleSize: {
    readonly min: number;
    readonly max: number;
  };

  /**
   * The largest relative half-width of the confidence interval of the mean
   * at which the sample is considered stable. In (0, 1)
   */
  readonly allowedDeviation: number;

  /** The confidence level of that interval. In (0, 1) */
  readonly confidenceLevel: number;

  /** The clock each invocation is timed with */
  readonly clock: timer.ClockKind;

  /** Time budget (s) for the measured invocations. May be Infinity */
  readonly maxTime: number;
}

const CLOCKS: readonly timer.ClockKind[] = ['wall', 'process'];

/**
 * Merge the given overrides over the defaults and validate the result
 * @throws {ConfigurationError}
 */
export function resolve(...overrides: (RecursivePartial<Options> | undefined)[]): Options {
  return parse(assignDeep({}, ...overrides));
}

/**
 * Validate options of unknown shape, such as those read from a file, merged
 * over the defaults
 * @throws {ConfigurationError}
 */
export function parse(value: unknown): Options {
  if (!isObject(value)) {
    throw new ConfigurationError('', `Expected an object, got ${typeName(value)}`);
  }

  return validate(assignDeep({}, defaults.STOPWATCH_SAMPLER, value));
}

function validate(value: object): Options {
  const root = fields(value, '', [
    'warmup',
    'sampleSize',
    'allowedDeviation',
    'confidenceLevel',
    'clock',
    'maxTime',
  ]);
  const warmup = fields(root('warmup'), 'warmup', ['enabled', 'runs']);
  const sampleSize = fields(root('sampleSize'), 'sampleSize', ['min', 'max']);

  const opts: Options = {
    warmup: Object.freeze({
      enabled: boolean(warmup('enabled'), 'warmup.enabled'),
      runs: positiveInteger(warmup('runs'), 'warmup.runs'),
    }),
    sampleSize: Object.freeze({
      min: positiveInteger(sampleSize('min'), 'sampleSize.min'),
      max: positiveInteger(sampleSize('max'), 'sampleSize.max'),
    }),
    allowedDeviation: fraction(root('allowedDeviation'), 'allowedDeviation'),
    confidenceLevel: fraction(root('confidenceLevel'), 'confidenceLevel'),
    clock: clockKind(root('clock'), 'clock'),
    maxTime: positive(root('maxTime'), 'maxTime'),
  };

  if (opts.sampleSize.max < opts.sampleSize.min) {
    throw new ConfigurationError(
      'sampleSize.max',
      `Must be at least sampleSize.min (${opts.sampleSize.max} < ${opts.sampleSize.min})`,
    );
  }

  return Object.freeze(opts);
}

/** Check the value is an object with no keys besides the known ones */
function fields<K extends string>(
  value: unknown,
  path: string,
  known: readonly K[],
): (key: K) => unknown {
  if (!isObject(value)) {
    throw new ConfigurationError(path, `Expected an object, got ${typeName(value)}`);
  }

  const entries = new Map<string, unknown>(Object.entries(value));

  for (const key of entries.keys()) {
    if (!known.some(k => k === key)) {
      throw new ConfigurationError(join(path, key), 'Unknown option');
    }
  }

  return (key: K) => entries.get(key);
}

function join(path: string, key: string) {
  return path ? `${path}.${key}` : key;
}

function boolean(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(path, `Expected a boolean, got ${typeName(value)}`);
  }
  return value;
}

function number(value: unknown, path: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(path, `Expected a number, got ${typeName(value)}`);
  }
  return value;
}

function positiveInteger(value: unknown, path: string): number {
  const n = number(value, path);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(path, `Expected a positive integer, got ${n}`);
  }
  return n;
}

function positive(value: unknown, path: string): number {
  const n = number(value, path);
  if (!(n > 0)) {
    throw new ConfigurationError(path, `Expected a positive number, got ${n}`);
  }
  return n;
}

function fraction(value: unknown, path: string): number {
  const n = number(value, path);
  if (!(n > 0 && n < 1)) {
    throw new ConfigurationError(path, `Expected a number in the range (0, 1), got ${n}`);
  }
  return n;
}

function clockKind(value: unknown, path: string): timer.ClockKind {
  const kind = CLOCKS.find(c => c === value);
  if (kind === void 0) {
    throw new ConfigurationError(path, `Expected one of ${CLOCKS.join(', ')}, got ${String(value)}`);
  }
  return kind;
}
