/**
 * Circuit Breaker
 * Main export file for circuit breakers
 */

export * from './circuit-breaker.types';
export * from './circuit-breaker.manager';
