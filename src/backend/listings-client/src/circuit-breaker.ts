/**
 * Circuit Breaker
 *
 * Protects the listings backend from repeated calls while it is failing.
 * After `failureThreshold` consecutive failures the circuit opens and calls
 * are refused until `resetTimeoutMs` has elapsed; a limited number of trial
 * calls are then let through (half-open) and enough successes close it.
 *
 * @tested tests/integration/listings-client.integration.test.ts
 */

/**
 * Circuit breaker states
 */
export enum CircuitState {
  CLOSED = 'CLOSED', // Normal operation
  OPEN = 'OPEN', // Failing, refuse calls
  HALF_OPEN = 'HALF_OPEN', // Testing recovery
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  successThreshold: number;
  resetTimeoutMs: number;
  halfOpenRequests: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeoutMs: 30000,
  halfOpenRequests: 1,
};

export interface CircuitStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private halfOpenRequestCount = 0;
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;

  constructor(config: Partial<CircuitBreakerConfig> = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Current state; an open circuit turns half-open once the reset timeout has passed
   */
  getState(): CircuitState {
    if (this.state === CircuitState.OPEN && this.now() - this.lastFailureTime >= this.config.resetTimeoutMs) {
      this.state = CircuitState.HALF_OPEN;
      this.halfOpenRequestCount = 0;
      this.successCount = 0;
    }
    return this.state;
  }

  allowRequest(): boolean {
    switch (this.getState()) {
      case CircuitState.CLOSED:
        return true;
      case CircuitState.OPEN:
        return false;
      case CircuitState.HALF_OPEN:
        if (this.halfOpenRequestCount < this.config.halfOpenRequests) {
          this.halfOpenRequestCount++;
          return true;
        }
        return false;
    }
  }

  recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      // Each success frees a trial slot
      this.halfOpenRequestCount = Math.max(0, this.halfOpenRequestCount - 1);
      if (this.successCount >= this.config.successThreshold) {
        this.reset();
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in half-open reopens the circuit
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    } else if (this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
    }
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.halfOpenRequestCount = 0;
  }

  getStats(): CircuitStats {
    return {
      state: this.getState(),
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
    };
  }
}
