/**
 * Aggregation engine - main exports
 */

export * from './types.js';
export * from './errors.js';
export * from './permissions.js';
export * from './merge.js';
export * from './registry.js';
export * from './single-flight.js';
export * from './aggregator.js';
export * from './cache/ttl-cache.js';
export * from './cache/keys.js';
export * from './cache/aggregate-cache.js';
