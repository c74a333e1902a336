export * from './keyword.js';
export * from './temporal.js';
export * from './entry.js';
export * from './query.js';
export * from './config.js';
