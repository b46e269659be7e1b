import * as options from './options.js';
import * as defaults from './defaults.js';
import { ConfigurationError } from './errors.js';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('resolve', () => {
  test('defaults', () => {
    const opts = options.resolve();

    expect(opts).toEqual(defaults.STOPWATCH_SAMPLER);
    expect(Object.isFrozen(opts)).toBe(true);
    expect(Object.isFrozen(opts.warmup)).toBe(true);
    expect(Object.isFrozen(opts.sampleSize)).toBe(true);
  });

  test('merges nested overrides from left to right', () => {
    const opts = options.resolve(
      { sampleSize: { min: 5 }, clock: 'wall' },
      undefined,
      { sampleSize: { max: 20 }, warmup: { enabled: false } },
    );

    expect(opts.sampleSize).toEqual({ min: 5, max: 20 });
    expect(opts.warmup).toEqual({ enabled: false, runs: 1 });
    expect(opts.clock).toBe('wall');
    expect(opts.allowedDeviation).toBe(0.1);
  });

  test('accepts an unlimited time budget', () => {
    expect(options.resolve({ maxTime: Infinity }).maxTime).toBe(Infinity);
  });

  test('does not modify the defaults', () => {
    options.resolve({ warmup: { runs: 7 } });
    expect(defaults.STOPWATCH_SAMPLER.warmup.runs).toBe(1);
  });

  test('rejects a maximum sample size below the minimum', () => {
    const e = configError(() => options.resolve({ sampleSize: { min: 5, max: 3 } }));

    expect(e.path).toBe('sampleSize.max');
    expect(e.message).toBe('sampleSize.max: Must be at least sampleSize.min (3 < 5)');
  });
});

describe('parse', () => {
  test.each([
    [{ warmup: { runs: 0 } }, 'warmup.runs'],
    [{ warmup: { runs: 1.5 } }, 'warmup.runs'],
    [{ warmup: { enabled: 'yes' } }, 'warmup.enabled'],
    [{ sampleSize: { min: 0 } }, 'sampleSize.min'],
    [{ sampleSize: { max: -1 } }, 'sampleSize.max'],
    [{ allowedDeviation: 0 }, 'allowedDeviation'],
    [{ allowedDeviation: 1 }, 'allowedDeviation'],
    [{ confidenceLevel: 1.2 }, 'confidenceLevel'],
    [{ confidenceLevel: '0.9' }, 'confidenceLevel'],
    [{ clock: 'cpu' }, 'clock'],
    [{ maxTime: 0 }, 'maxTime'],
    [{ maxTime: NaN }, 'maxTime'],
    [{ sampleSize: 10 }, 'sampleSize'],
    [{ sampleSize: { minimum: 3 } }, 'sampleSize.minimum'],
    [{ runs: 3 }, 'runs'],
  ])('rejects %j at %s', (value, path) => {
    expect(configError(() => options.parse(value)).path).toBe(path);
  });

  test('rejects values which are not objects', () => {
    const e = configError(() => options.parse([1, 2]));

    expect(e.path).toBe('');
    expect(e.message).toBe('Expected an object, got array');
  });

  test('describes the offending value', () => {
    const e = configError(() => options.parse({ clock: 'cpu' }));
    expect(e.message).toBe('clock: Expected one of wall, process, got cpu');
  });

  test('merges over the defaults', () => {
    const opts = options.parse({ sampleSize: { min: 10 } });

    expect(opts.sampleSize).toEqual({ min: 10, max: 1_000 });
    expect(opts.clock).toBe('process');
  });
});
