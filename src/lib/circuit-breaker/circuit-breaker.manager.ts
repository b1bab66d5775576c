/**
 * Circuit Breaker Manager
 * Typed wrapper over opossum that logs state changes
 */

import CircuitBreakerLib from 'opossum';
import { CircuitBreakerConfig } from './circuit-breaker.types';

export class CircuitBreaker<TArgs extends unknown[], TResult> {
  private breaker: CircuitBreakerLib<TArgs, TResult>;
  private config: Required<CircuitBreakerConfig>;

  constructor(
    fn: (...args: TArgs) => Promise<TResult>,
    config?: CircuitBreakerConfig
  ) {
    this.config = {
      name: config?.name || 'CircuitBreaker',
      timeout: config?.timeout || 10000,
      errorThresholdPercentage: config?.errorThresholdPercentage || 50,
      resetTimeout: config?.resetTimeout || 30000,
      monitoringPeriod: config?.monitoringPeriod || 60000,
      minimumRequests: config?.minimumRequests || 5,
      enabled: config?.enabled !== false,
    };

    this.breaker = new CircuitBreakerLib(fn, {
      name: this.config.name,
      timeout: this.config.timeout,
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeout,
      rollingCountTimeout: this.config.monitoringPeriod,
      rollingCountBuckets: 10,
      volumeThreshold: this.config.minimumRequests,
      enabled: this.config.enabled,
    });

    this.breaker.on('open', () => {
      console.warn(`${this.config.name}: circuit opened - too many failures`);
    });

    this.breaker.on('halfOpen', () => {
      console.log(`${this.config.name}: circuit half-open - testing recovery`);
    });

    this.breaker.on('close', () => {
      console.log(`${this.config.name}: circuit closed - provider recovered`);
    });
  }

  /**
   * Execute function through circuit breaker
   */
  execute(...args: TArgs): Promise<TResult> {
    return this.breaker.fire(...args);
  }

  /**
   * Stop the breaker's rolling-window timers
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  config?: CircuitBreakerConfig
): CircuitBreaker<TArgs, TResult> {
  return new CircuitBreaker(fn, config);
}
