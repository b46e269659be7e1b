export * from './errors.js';
export * as options from './options.js';
export * as defaults from './defaults.js';
export * from './stopwatch.js';
export * from './summary.js';
