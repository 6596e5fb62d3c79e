import { createLogger } from '@switchboard/core';
import type { Logger } from '@switchboard/core';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  recoveryTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  failure_count: number;
  threshold: number;
  recovery_timeout_ms: number;
  last_failure_at: string | null;
}

export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 30_000;

/**
 * Failure isolation for one capability.
 *
 * closed -> open once failures reach the threshold. open -> half_open is lazy:
 * it happens inside currentState() once the recovery timeout has passed since
 * the last failure; there is no timer. A failure while half_open reopens at
 * once. A success from any state closes and resets the count.
 */
export class CircuitBreaker {
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;

  private state: CircuitState = 'closed';
  private failures = 0;
  private lastFailureAt = 0;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {},
  ) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.recoveryTimeoutMs = options.recoveryTimeoutMs ?? DEFAULT_RECOVERY_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
    this.logger = (options.logger ?? createLogger('circuit-breaker')).child({ capability: name });
  }

  get failureCount(): number {
    return this.failures;
  }

  /** Reads the state, moving open -> half_open when the recovery timeout has elapsed. */
  currentState(): CircuitState {
    if (this.state === 'open' && this.now() - this.lastFailureAt > this.recoveryTimeoutMs) {
      this.state = 'half_open';
      this.logger.info(`CircuitBreaker[${this.name}]: OPEN -> HALF_OPEN`);
    }
    return this.state;
  }

  isAvailable(): boolean {
    return this.currentState() !== 'open';
  }

  recordSuccess(): void {
    if (this.state !== 'closed') {
      this.logger.info(`CircuitBreaker[${this.name}]: -> CLOSED`);
    }
    this.state = 'closed';
    this.failures = 0;
  }

  recordFailure(): void {
    this.failures += 1;
    this.lastFailureAt = this.now();

    if (this.failures >= this.failureThreshold || this.state === 'half_open') {
      if (this.state !== 'open') {
        this.logger.warn(
          { failures: this.failures },
          `CircuitBreaker[${this.name}]: -> OPEN (failures=${this.failures})`,
        );
      }
      this.state = 'open';
    }
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      name: this.name,
      state: this.currentState(),
      failure_count: this.failures,
      threshold: this.failureThreshold,
      recovery_timeout_ms: this.recoveryTimeoutMs,
      last_failure_at: this.lastFailureAt > 0 ? new Date(this.lastFailureAt).toISOString() : null,
    };
  }
}
