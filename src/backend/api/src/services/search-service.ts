/**
 * Search Service
 *
 * Fetches the candidate collection from a listing source, runs the filter
 * engine and logs the search. Criteria are validated before the source is
 * called, so a malformed request never reaches the listings backend.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import {
  getLogger,
  type ListingDomain,
  type Logger,
  type MultiDomainSearchResponse,
  type SearchResponse,
} from '@rentmatch/shared';

import {
  DEFAULT_ENGINE_CONFIG,
  partitionByDomain,
  searchAcrossDomains,
  searchListings,
  validateCriteria,
  validateSharedCriteria,
  type EngineConfig,
} from '@rentmatch/filter-engine';
import type { CircuitState, RequestOptions } from '@rentmatch/listings-client';

/**
 * Where listings come from; implemented by ListingsClient
 */
export interface ListingSource {
  fetchAll(options?: RequestOptions): Promise<unknown[]>;
  getCircuitState?(): CircuitState;
}

export interface SearchServiceOptions {
  engineConfig?: EngineConfig;
  logger?: Logger;
}

export class SearchService {
  private readonly engineConfig: EngineConfig;
  private readonly logger?: Logger;

  constructor(
    private readonly source: ListingSource,
    options: SearchServiceOptions = {}
  ) {
    this.engineConfig = options.engineConfig ?? DEFAULT_ENGINE_CONFIG;
    this.logger = options.logger;
  }

  /**
   * Searches one domain
   */
  async search(domain: ListingDomain, rawCriteria: unknown, correlationId: string): Promise<SearchResponse> {
    const startTime = Date.now();
    const criteria = validateCriteria(domain, rawCriteria);

    const all = await this.source.fetchAll({ correlationId });
    const candidates = partitionByDomain([domain], all).get(domain) ?? [];
    const response = searchListings({ domain, criteria, listings: candidates }, this.engineConfig);

    this.logResult(response, { ...criteria }, candidates.length, correlationId, startTime);
    return response;
  }

  /**
   * Searches several domains with shared criteria
   */
  async searchAcrossDomains(
    domains: readonly ListingDomain[],
    rawCriteria: unknown,
    correlationId: string
  ): Promise<MultiDomainSearchResponse> {
    const startTime = Date.now();
    const criteria = validateSharedCriteria(rawCriteria);

    const all = await this.source.fetchAll({ correlationId });
    return searchAcrossDomains(
      { domains, sharedCriteria: criteria, listings: all },
      this.engineConfig,
      (response, candidateCount) =>
        this.logResult(response, { ...criteria }, candidateCount, correlationId, startTime)
    );
  }

  private logResult(
    response: SearchResponse,
    criteria: Record<string, unknown>,
    candidateCount: number,
    correlationId: string,
    startTime: number
  ): void {
    (this.logger ?? getLogger()).logSearch({
      correlationId,
      domain: response.domain,
      criteria,
      candidateCount,
      resultCount: response.results.length,
      relaxed: response.relaxation.relaxed,
      fallback: response.relaxation.fallback,
      outcome: response.outcome,
      processingTimeMs: Date.now() - startTime,
    });
  }
}
