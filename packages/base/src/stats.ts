export * as online from './stats/OnlineStats.js';
export * as normal from './stats/normal.js';
export * as intervals from './stats/intervals.js';
