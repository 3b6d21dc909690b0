/**
 * Listings Client
 *
 * Reads rental listings from the listings backend over HTTP. Every call is
 * bounded by a timeout and guarded by a circuit breaker; any transport
 * failure, timeout or non-2xx answer surfaces as ListingsUnavailableError.
 * Listings are returned raw: validation belongs to the filter engine.
 *
 * @tested tests/integration/listings-client.integration.test.ts
 */

import { ListingsUnavailableError, getLogger, type ListingDomain, type Logger } from '@rentmatch/shared';

import { CircuitBreaker, CircuitState, type CircuitBreakerConfig, type CircuitStats } from './circuit-breaker.js';

/**
 * The subset of a fetch Response the client reads
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchFn = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchResponse>;

export interface ListingsClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export const DEFAULT_LISTINGS_CLIENT_CONFIG: ListingsClientConfig = {
  baseUrl: process.env.LISTINGS_API_URL || 'http://localhost:3000',
  timeoutMs: 10000,
};

export interface ListingsClientOptions {
  config?: Partial<ListingsClientConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export interface RequestOptions {
  correlationId?: string;
}

const DEPENDENCY_NAME = 'listings-api';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ListingsClient {
  private readonly config: ListingsClientConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly fetchFn: FetchFn;
  private readonly logger?: Logger;

  constructor(options: ListingsClientOptions = {}) {
    this.config = { ...DEFAULT_LISTINGS_CLIENT_CONFIG, ...options.config };
    this.circuitBreaker = new CircuitBreaker(options.circuitBreaker);
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger;
  }

  /**
   * All listings of every domain
   */
  async fetchAll(options: RequestOptions = {}): Promise<unknown[]> {
    return this.expectArray(await this.get('/listings', options), '/listings');
  }

  /**
   * Listings published by one owner
   */
  async fetchByOwner(ownerId: string, options: RequestOptions = {}): Promise<unknown[]> {
    const path = `/listings?ownerId=${encodeURIComponent(ownerId)}`;
    return this.expectArray(await this.get(path, options), path);
  }

  /**
   * A single listing, or null when the backend does not know the id
   */
  async fetchById(listingId: string, options: RequestOptions = {}): Promise<unknown> {
    return this.get(`/listings/${encodeURIComponent(listingId)}`, options, true);
  }

  /**
   * Listings tagged with one domain
   */
  async fetchByDomain(domain: ListingDomain, options: RequestOptions = {}): Promise<unknown[]> {
    const listings = await this.fetchAll(options);
    return listings.filter((listing) => isRecord(listing) && listing.type === domain);
  }

  getCircuitState(): CircuitState {
    return this.circuitBreaker.getState();
  }

  getCircuitStats(): CircuitStats {
    return this.circuitBreaker.getStats();
  }

  resetCircuitBreaker(): void {
    this.circuitBreaker.reset();
  }

  private log(correlationId?: string): Logger {
    const logger = this.logger ?? getLogger();
    return correlationId ? logger.child(correlationId) : logger;
  }

  private expectArray(body: unknown, path: string): unknown[] {
    if (!Array.isArray(body)) {
      throw new ListingsUnavailableError(`Listings backend returned a non-array body for ${path}`);
    }
    return body;
  }

  private async get(path: string, options: RequestOptions, allowNotFound = false): Promise<unknown> {
    if (!this.circuitBreaker.allowRequest()) {
      throw new ListingsUnavailableError('Listings backend circuit is open');
    }

    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;
    const startTime = Date.now();
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.correlationId) {
      headers['X-Correlation-ID'] = options.correlationId;
    }

    try {
      const body = await this.invoke(url, headers, allowNotFound);
      this.circuitBreaker.recordSuccess();
      this.log(options.correlationId).logDependency(DEPENDENCY_NAME, `GET ${path}`, Date.now() - startTime, true, 'HTTP');
      return body;
    } catch (error) {
      this.circuitBreaker.recordFailure();
      this.log(options.correlationId).logDependency(DEPENDENCY_NAME, `GET ${path}`, Date.now() - startTime, false, 'HTTP');
      if (error instanceof ListingsUnavailableError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : 'Unknown error';
      throw new ListingsUnavailableError(`Listings backend unreachable: ${reason}`);
    }
  }

  private async invoke(url: string, headers: Record<string, string>, allowNotFound: boolean): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchFn(url, { method: 'GET', headers, signal: controller.signal });

      if (allowNotFound && response.status === 404) {
        return null;
      }
      if (!response.ok) {
        throw new ListingsUnavailableError(`Listings backend returned ${response.status}: ${response.statusText}`);
      }

      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ListingsUnavailableError(`Listings backend timeout exceeded (${this.config.timeoutMs}ms)`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createListingsClient(options: ListingsClientOptions = {}): ListingsClient {
  return new ListingsClient(options);
}
