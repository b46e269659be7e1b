import { debug } from 'node:util';
import { RecursivePartial } from '@cadence/base';
import { describe, measure, options, SamplerFn, Summary } from '@cadence/samplers';
import * as config from './config.js';
import { render } from './tableReport.js';

const dbg = debug('cadence:bench');

export interface BenchOptions {
  /** Title of the report (default: the function's name) */
  name?: string;

  /** Directory to search for a configuration file. No file is read when omitted */
  rootDir?: string;

  /** The last directory searched for a configuration file */
  stopDir?: string;

  /** Options applied over those of the configuration file */
  options?: RecursivePartial<options.Options>;

  /** Receives each line of the rendered report. Nothing is rendered when omitted */
  write?: (line: string) => void;

  color?: boolean;
}

export interface BenchResult {
  name: string;
  samples: number[];
  summary: Summary;
}

/**
 * Time the given function with the options of the nearest configuration file
 * and summarize the result.
 */
export async function bench<Args extends unknown[]>(
  fn: SamplerFn<Args>,
  opts: BenchOptions = {},
  ...args: Args
): Promise<BenchResult> {
  const fromFile =
    opts.rootDir !== void 0 ? await config.load(opts.rootDir, { stopDir: opts.stopDir }) : void 0;

  const name = opts.name ?? (fn.name || 'anonymous');
  const samples = measure(fn, options.resolve(fromFile, opts.options), ...args);
  const summary = describe(samples);

  dbg('%s: %d samples', name, samples.length);

  if (opts.write !== void 0) {
    for (const line of render(name, summary, { color: opts.color })) {
      opts.write(line);
    }
  }

  return { name, samples, summary };
}
