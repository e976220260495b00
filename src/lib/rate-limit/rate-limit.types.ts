/**
 * Rate Limit Types
 * Type definitions for the per-host domain throttle
 */

/**
 * Domain throttle configuration
 */
export interface DomainThrottleConfig {
  maxConcurrentPerDomain: number;  // Requests in flight per host
  requestDelayMs: number;          // Minimum gap between request starts to one host
  acquireTimeoutMs: number;        // How long a caller may wait for a slot
}

export interface AcquireOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Releases a slot; calling it more than once has no effect
 */
export type ReleaseFn = () => void;

export interface DomainSlotStats {
  host: string;
  inFlight: number;
  waiting: number;
  lastStart?: number;
  gapMs: number;
}

/**
 * Domain throttle statistics
 */
export interface DomainThrottleStats {
  activeHosts: number;
  totalInFlight: number;
  totalWaiting: number;
  timedOut: number;
  hosts: DomainSlotStats[];
}
