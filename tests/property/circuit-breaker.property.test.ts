/**
 * Property 9: Circuit Breaker Activation
 *
 * After `failureThreshold` consecutive failures of the listings backend the
 * circuit opens and calls are refused without reaching the backend until
 * the reset timeout elapses. Half-open admits a bounded number of trial
 * calls; enough successes close the circuit and any failure reopens it.
 *
 * @file src/backend/listings-client/src/circuit-breaker.ts
 * @file src/backend/listings-client/src/listings-client.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  CircuitBreaker,
  CircuitState,
  ListingsClient,
  type CircuitBreakerConfig,
  type FetchFn,
} from '../../src/backend/listings-client/src/index.js';
import { ListingsUnavailableError, createLogger } from '../../src/backend/shared/src/index.js';
import { propertyConfig } from '../fixtures/arbitraries.js';

const breakerConfigArb: fc.Arbitrary<CircuitBreakerConfig> = fc.record({
  failureThreshold: fc.integer({ min: 1, max: 10 }),
  successThreshold: fc.integer({ min: 1, max: 5 }),
  resetTimeoutMs: fc.integer({ min: 1, max: 60_000 }),
  halfOpenRequests: fc.integer({ min: 1, max: 5 }),
});

/**
 * A breaker on a hand-driven clock
 */
function breakerAt(config: CircuitBreakerConfig) {
  const clock = { now: 0 };
  const breaker = new CircuitBreaker(config, () => clock.now);
  return { breaker, clock };
}

describe('Property 9: Circuit Breaker Activation', () => {
  it('opens exactly at the failure threshold', () => {
    fc.assert(
      fc.property(breakerConfigArb, (config) => {
        const { breaker } = breakerAt(config);

        for (let i = 1; i < config.failureThreshold; i++) {
          breaker.recordFailure();
          expect(breaker.getState()).toBe(CircuitState.CLOSED);
        }
        breaker.recordFailure();
        expect(breaker.getState()).toBe(CircuitState.OPEN);
      }),
      propertyConfig
    );
  });

  it('refuses calls until the reset timeout has elapsed', () => {
    fc.assert(
      fc.property(breakerConfigArb, fc.double({ min: 0, max: 0.999, noNaN: true }), (config, fraction) => {
        const { breaker, clock } = breakerAt({ ...config, failureThreshold: 1 });
        breaker.recordFailure();

        clock.now = Math.floor(config.resetTimeoutMs * fraction);
        expect(breaker.allowRequest()).toBe(false);

        clock.now = config.resetTimeoutMs;
        expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
      }),
      propertyConfig
    );
  });

  it('half-open admits at most the configured number of trial calls', () => {
    fc.assert(
      fc.property(breakerConfigArb, fc.integer({ min: 0, max: 5 }), (config, extra) => {
        const { breaker, clock } = breakerAt({ ...config, failureThreshold: 1 });
        breaker.recordFailure();
        clock.now = config.resetTimeoutMs;

        const admitted = Array.from({ length: config.halfOpenRequests + extra }, () => breaker.allowRequest());

        expect(admitted.filter(Boolean)).toHaveLength(config.halfOpenRequests);
      }),
      propertyConfig
    );
  });

  it('closes after enough half-open successes and reopens on a half-open failure', () => {
    fc.assert(
      fc.property(breakerConfigArb, fc.boolean(), (config, failTrial) => {
        const { breaker, clock } = breakerAt({ ...config, failureThreshold: 1 });
        breaker.recordFailure();
        clock.now = config.resetTimeoutMs;
        expect(breaker.allowRequest()).toBe(true);

        if (failTrial) {
          breaker.recordFailure();
          expect(breaker.getState()).toBe(CircuitState.OPEN);
          return;
        }

        for (let i = 0; i < config.successThreshold; i++) {
          breaker.recordSuccess();
        }
        expect(breaker.getState()).toBe(CircuitState.CLOSED);
      }),
      propertyConfig
    );
  });

  it('an open circuit stops the client from calling the backend', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 5 }), fc.integer({ min: 1, max: 5 }), async (threshold, extraCalls) => {
        let calls = 0;
        const fetchFn: FetchFn = async () => {
          calls++;
          return { ok: false, status: 503, statusText: 'Service Unavailable', json: async () => ({}) };
        };
        const client = new ListingsClient({
          config: { baseUrl: 'http://listings.test', timeoutMs: 1000 },
          circuitBreaker: { failureThreshold: threshold },
          fetchFn,
          logger: createLogger({ enableConsole: false }),
        });

        for (let i = 0; i < threshold + extraCalls; i++) {
          await expect(client.fetchAll()).rejects.toBeInstanceOf(ListingsUnavailableError);
        }

        expect(calls).toBe(threshold);
        expect(client.getCircuitState()).toBe(CircuitState.OPEN);
      }),
      { ...propertyConfig, numRuns: 25 }
    );
  });
});
