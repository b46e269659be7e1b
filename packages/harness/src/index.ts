export * as config from './config.js';
export * as tableReport from './tableReport.js';
export * from './bench.js';
