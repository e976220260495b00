/**
 * Circuit Breaker Manager
 * Per-host circuit breakers built on the opossum library
 */

import CircuitBreakerLib from 'opossum';
import { EventEmitter } from 'events';
import { FetchError } from '../scraping/errors';
import { logger } from '../logger';
import {
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
  CircuitBreakerEvent,
} from './circuit-breaker.types';

type GuardedTask = () => Promise<void>;

function isOpenBreakerError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EOPENBREAKER';
}

/**
 * Only failures the remote host caused count against it. Pool timeouts,
 * launch failures, client errors and cancellations do not.
 */
function isHostFailure(error: unknown): boolean {
  return error instanceof FetchError && error.hostFailure;
}

/**
 * Consecutive-failure breaker for one remote host.
 *
 * opossum owns the open/half-open/closed machinery (rejection while open, the
 * recovery timer, a single trial call while half-open). Its percentage-based
 * tripping is switched off; this class opens the circuit itself once the
 * consecutive failure count reaches the threshold.
 *
 * A failure that is not the host's leaves the count untouched while closed.
 * While half-open it still uses up the trial, so the circuit reopens rather
 * than closing on a call that never reached the host.
 */
export class HostCircuitBreaker extends EventEmitter {
  readonly host: string;
  private breaker: CircuitBreakerLib<[GuardedTask], void>;
  private config: CircuitBreakerConfig;
  private consecutiveFailures: number = 0;
  private totalFailures: number = 0;
  private totalSuccesses: number = 0;
  private rejected: number = 0;
  private lastFailureTime?: number;
  private openedAt?: number;

  constructor(host: string, config: CircuitBreakerConfig) {
    super();
    this.host = host;
    this.config = config;

    this.breaker = new CircuitBreakerLib<[GuardedTask], void>((task: GuardedTask) => task(), {
      name: `circuit:${host}`,
      timeout: false,
      resetTimeout: config.recoveryTimeout,
      errorThresholdPercentage: 100,
      volumeThreshold: Number.MAX_SAFE_INTEGER,
    });

    this.breaker.on('success', () => {
      this.consecutiveFailures = 0;
      this.totalSuccesses++;
      if (this.breaker.halfOpen) {
        this.breaker.close();
      }
      this.emit(CircuitBreakerEvent.SUCCESS, this.host);
    });

    this.breaker.on('failure', (error: unknown) => {
      const wasHalfOpen = this.breaker.halfOpen;

      if (isHostFailure(error)) {
        this.consecutiveFailures++;
        this.totalFailures++;
        this.lastFailureTime = Date.now();
        this.emit(CircuitBreakerEvent.FAILURE, this.host);
      }

      if (wasHalfOpen || this.consecutiveFailures >= this.config.failureThreshold) {
        this.breaker.open();
      }
    });

    this.breaker.on('reject', () => this.recordRejection());

    this.breaker.on('open', () => {
      this.openedAt = Date.now();
      logger.warn(`Circuit for ${this.host} opened (${this.consecutiveFailures} consecutive failures)`);
      this.emit(CircuitBreakerEvent.OPEN, this.host);
      this.emit('stateChange', CircuitState.OPEN);
    });

    this.breaker.on('halfOpen', () => {
      logger.info(`Circuit for ${this.host} half-open - allowing one trial request`);
      this.emit(CircuitBreakerEvent.HALF_OPEN, this.host);
      this.emit('stateChange', CircuitState.HALF_OPEN);
    });

    this.breaker.on('close', () => {
      this.consecutiveFailures = 0;
      this.openedAt = undefined;
      logger.info(`Circuit for ${this.host} closed - host recovered`);
      this.emit(CircuitBreakerEvent.CLOSE, this.host);
      this.emit('stateChange', CircuitState.CLOSED);
    });
  }

  /**
   * Run a task through the breaker. While open, fails with
   * FetchError{CircuitOpen} without calling the task.
   */
  async execute<T>(task: () => Promise<T>): Promise<T> {
    if (this.breaker.opened) {
      this.recordRejection();
      throw this.openError();
    }

    const settled: T[] = [];
    try {
      await this.breaker.fire(async () => {
        settled.push(await task());
      });
    } catch (error) {
      if (isOpenBreakerError(error)) {
        throw this.openError();
      }
      throw error;
    }

    return settled[0];
  }

  /**
   * True while calls are being rejected outright
   */
  isOpen(): boolean {
    return this.breaker.opened;
  }

  getState(): CircuitState {
    if (this.breaker.opened) return CircuitState.OPEN;
    if (this.breaker.halfOpen) return CircuitState.HALF_OPEN;
    return CircuitState.CLOSED;
  }

  getStats(): CircuitBreakerStats {
    const state = this.getState();

    return {
      host: this.host,
      state,
      consecutiveFailures: this.consecutiveFailures,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      rejected: this.rejected,
      lastFailureTime: this.lastFailureTime,
      nextAttempt:
        state === CircuitState.OPEN && this.openedAt !== undefined
          ? this.openedAt + this.config.recoveryTimeout
          : undefined,
    };
  }

  /**
   * Stop timers held by the underlying breaker
   */
  shutdown(): void {
    this.breaker.shutdown();
    this.removeAllListeners();
  }

  /**
   * The error callers get while the circuit is open
   */
  openError(): FetchError {
    return new FetchError('CircuitOpen', `Circuit breaker is open for ${this.host}`, {
      hostFailure: false,
    });
  }

  private recordRejection(): void {
    this.rejected++;
    this.emit(CircuitBreakerEvent.REJECT, this.host);
  }
}

/**
 * Lazily creates one breaker per host; unrelated hosts never share state
 */
export class CircuitBreakerRegistry {
  private breakers: Map<string, HostCircuitBreaker> = new Map();
  private config: CircuitBreakerConfig;

  constructor(config: CircuitBreakerConfig) {
    this.config = config;
  }

  get(host: string): HostCircuitBreaker {
    let breaker = this.breakers.get(host);
    if (!breaker) {
      breaker = new HostCircuitBreaker(host, this.config);
      this.breakers.set(host, breaker);
    }
    return breaker;
  }

  has(host: string): boolean {
    return this.breakers.has(host);
  }

  stats(): CircuitBreakerStats[] {
    return Array.from(this.breakers.values()).map((breaker) => breaker.getStats());
  }

  shutdown(): void {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
    this.breakers.clear();
  }
}
