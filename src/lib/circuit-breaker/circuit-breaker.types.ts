/**
 * Circuit Breaker Types
 */

/**
 * Options for a provider's breaker. Unset fields take the defaults in
 * `circuit-breaker.manager.ts`.
 */
export interface CircuitBreakerConfig {
  name?: string;
  timeout?: number;                    // Per-call timeout (ms)
  errorThresholdPercentage?: number;   // Failure share (0-100) that opens the circuit
  resetTimeout?: number;               // Open time before a trial call (ms)
  monitoringPeriod?: number;           // Rolling window for the failure share (ms)
  minimumRequests?: number;            // Calls in the window before it may open
  enabled?: boolean;
}
