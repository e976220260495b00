/**
 * Circuit Breaker Types
 * Type definitions for the per-host circuit breaker system
 */

/**
 * Circuit breaker state enumeration
 */
export enum CircuitState {
  CLOSED = 'closed',       // Normal operation, requests pass through
  OPEN = 'open',           // Circuit is open, requests fail immediately
  HALF_OPEN = 'half-open', // One trial request allowed
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  failureThreshold: number;   // Consecutive host failures before opening
  recoveryTimeout: number;    // Time before attempting half-open (ms)
}

/**
 * Circuit breaker statistics
 */
export interface CircuitBreakerStats {
  host: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalFailures: number;
  totalSuccesses: number;
  rejected: number;
  lastFailureTime?: number;
  nextAttempt?: number;
}

/**
 * Circuit breaker event types
 */
export enum CircuitBreakerEvent {
  OPEN = 'open',
  CLOSE = 'close',
  HALF_OPEN = 'half-open',
  FAILURE = 'failure',
  SUCCESS = 'success',
  REJECT = 'reject',
}
