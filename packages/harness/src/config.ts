import { debug } from 'node:util';
import { lilconfig } from 'lilconfig';
import { options, ConfigurationError } from '@cadence/samplers';

const dbg = debug('cadence:config');

/** Files searched for configuration in each directory, in order */
export const SEARCH_PLACES = ['package.json', '.cadencerc', '.cadencerc.json', 'cadence.config.json'];

export interface LoadOptions {
  /** The last directory searched (default: the home directory) */
  stopDir?: string;
}

const loadJson = (filepath: string, content: string): unknown => {
  try {
    return JSON.parse(content);
  } catch (e) {
    throw new ConfigurationError('', `Failed to parse ${filepath}: ${e instanceof Error ? e.message : String(e)}`);
  }
};

/**
 * Find the sampler configuration for the given directory, searching it and
 * then its ancestors. The options found are merged over the defaults; the
 * defaults are returned when there are none.
 *
 * @throws {ConfigurationError} when the configuration is malformed
 */
export async function load(rootDir: string, opts: LoadOptions = {}): Promise<options.Options> {
  const explorer = lilconfig('cadence', {
    searchPlaces: SEARCH_PLACES,
    loaders: {
      '.json': loadJson,
      noExt: loadJson,
    },
    cache: false,
    ...(opts.stopDir !== void 0 ? { stopDir: opts.stopDir } : {}),
  });

  const sr = await explorer.search(rootDir);

  if (sr === null || sr.isEmpty) {
    dbg('Config file not found');
    return options.resolve();
  }

  dbg('Loading (%s)', sr.filepath);

  try {
    const config = options.parse(sr.config);
    dbg('%o', config);
    return config;
  } catch (e) {
    if (e instanceof ConfigurationError) {
      throw new ConfigurationError(e.path, `${e.reason} (in ${sr.filepath})`);
    }
    throw e;
  }
}
