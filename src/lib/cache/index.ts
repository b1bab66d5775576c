/**
 * Cache System
 * Main export file for the dataset cache
 */

export * from './cache.types';
export * from './cache.manager';
export * from './derived.dataset';
export * from './keyed.datasets';
export * from './refresh.scheduler';
