/**
 * Search Engine
 *
 * Entry points of the filter engine. A search validates the criteria before
 * any listing is examined, validates every listing against its domain schema,
 * then runs availability filter, strict pass, relaxation, ranking, tagging
 * and assembly. Pure and synchronous: the whole candidate collection is
 * supplied by the caller.
 *
 * @tested tests/integration/search-engine.integration.test.ts
 */

import {
  DataIntegrityError,
  ListingDomain,
  formatValidationErrors,
  type Listing,
  type MultiDomainSearchResponse,
  type SearchResponse,
  type SearchResultItem,
} from '@rentmatch/shared';

import { emptyResponse, assembleResponse } from './assembly/result-assembler.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config/engine-config.js';
import { parseCriteria, validateSharedCriteria } from './criteria/criteria-model.js';
import { accommodationProfile, itemProfile, transportProfile, type DomainProfile } from './domains/index.js';
import { planRelaxation, EMPTY_TRACE, type RelaxationTrace } from './relaxation/relaxation-planner.js';
import { filterAvailable } from './rules/availability-filter.js';
import { compileCriteria, type ActiveCriterion } from './rules/field-rules.js';
import { strictPass } from './rules/predicate-evaluator.js';
import { rankMatches } from './scoring/suitability-ranker.js';
import { tagRankedResults } from './tags/tag-synthesizer.js';

/**
 * A single-domain search request. Criteria and listings are raw values and
 * are validated by the engine.
 */
export interface SearchRequest {
  domain: ListingDomain;
  criteria?: unknown;
  listings: readonly unknown[];
}

/**
 * A search over several domains with criteria that apply to all of them
 */
export interface MultiDomainSearchRequest {
  domains: readonly ListingDomain[];
  sharedCriteria?: unknown;
  listings: readonly unknown[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rawListingId(raw: unknown): string | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const id = raw.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
}

function rawDomainTag(raw: unknown): unknown {
  return isRecord(raw) ? raw.type : undefined;
}

/**
 * Validates every listing of a domain's candidate set
 *
 * @throws DataIntegrityError naming the first offending listing
 */
export function validateListings<C extends object, L extends Listing, R extends SearchResultItem>(
  profile: DomainProfile<C, L, R>,
  rawListings: readonly unknown[]
): L[] {
  return rawListings.map((raw, index) => {
    const listingId = rawListingId(raw);
    const label = listingId !== undefined ? `Listing ${listingId}` : `Listing at index ${index}`;

    const tag = rawDomainTag(raw);
    if (tag !== profile.domain) {
      throw new DataIntegrityError(
        `${label} is tagged ${String(tag)} but was supplied as ${profile.domain}`,
        [{ field: 'type', message: `Expected ${profile.domain}`, code: 'domain_mismatch' }],
        listingId
      );
    }

    const parsed = profile.listingSchema.safeParse(raw);
    if (!parsed.success) {
      const details = formatValidationErrors(parsed.error);
      throw new DataIntegrityError(
        `${label} is not a valid ${profile.noun} listing: ${details.map((d) => d.field).join(', ')}`,
        details,
        listingId
      );
    }
    return parsed.data;
  });
}

function labelsFor<L>(dropped: readonly string[], criteria: readonly ActiveCriterion<L>[]): string[] {
  return dropped.map((field) => criteria.find((c) => c.field === field)?.rule.label ?? field);
}

/**
 * Runs the full pipeline for one domain profile
 */
export function runSearch<C extends object, L extends Listing, R extends SearchResultItem>(
  profile: DomainProfile<C, L, R>,
  rawCriteria: unknown,
  rawListings: readonly unknown[],
  relaxationOrder: readonly string[],
  config: EngineConfig
): SearchResponse {
  const criteria = parseCriteria(profile.domain, profile.criteriaSchema, rawCriteria);
  const listings = validateListings(profile, rawListings);

  if (listings.length === 0) {
    return emptyResponse(profile.domain, profile.noun, 'no_listings');
  }

  const available = filterAvailable(listings, config.bookableStatuses);
  if (available.length === 0) {
    return emptyResponse(profile.domain, profile.noun, 'none_available');
  }

  const active = compileCriteria(criteria, profile.fields, profile.rules);

  let tier = strictPass(available, active);
  let trace: RelaxationTrace = EMPTY_TRACE;
  if (tier.length === 0) {
    const plan = planRelaxation(available, active, relaxationOrder);
    tier = plan.listings;
    trace = plan.trace;
  }

  const ranked = rankMatches(tier, active, config.scoring);
  const tags = tagRankedResults(ranked, trace, config.tags, (listing, tagConfig) =>
    profile.describe(listing, tagConfig)
  );

  return assembleResponse(profile, {
    ranked,
    tags,
    trace,
    droppedLabels: labelsFor(trace.dropped, active),
  });
}

/**
 * Searches one domain
 *
 * @throws InvalidCriteriaError when a criteria value is malformed
 * @throws DataIntegrityError when a listing violates its domain schema
 */
export function searchListings(request: SearchRequest, config: EngineConfig = DEFAULT_ENGINE_CONFIG): SearchResponse {
  const { domain, criteria, listings } = request;
  switch (domain) {
    case ListingDomain.TRANSPORT:
      return runSearch(transportProfile, criteria, listings, config.relaxationOrder.TRANSPORT, config);
    case ListingDomain.ACCOMMODATION:
      return runSearch(accommodationProfile, criteria, listings, config.relaxationOrder.ACCOMMODATION, config);
    case ListingDomain.ITEM:
      return runSearch(itemProfile, criteria, listings, config.relaxationOrder.ITEM, config);
  }
}

/**
 * Splits a mixed collection by domain tag. Records tagged with a domain
 * that was not requested, with an unknown tag or with none are ignored;
 * they are validated only by a search of their own domain.
 */
export function partitionByDomain(
  domains: readonly ListingDomain[],
  rawListings: readonly unknown[]
): Map<ListingDomain, unknown[]> {
  const partitions = new Map<ListingDomain, unknown[]>(domains.map((d) => [d, []]));

  for (const raw of rawListings) {
    const tag = rawDomainTag(raw);
    for (const [domain, bucket] of partitions) {
      if (domain === tag) {
        bucket.push(raw);
      }
    }
  }

  return partitions;
}

export function multiDomainMessage(responses: readonly SearchResponse[]): string {
  const parts = responses.map((r) => `${r.domain.toLowerCase()} (${r.results.length})`);
  const noun = responses.length === 1 ? 'category' : 'categories';
  return `Searched ${responses.length} ${noun}: ${parts.join(', ')}.`;
}

/**
 * Called once per domain of a multi-domain search, in request order
 */
export type DomainSearchObserver = (response: SearchResponse, candidateCount: number) => void;

/**
 * Runs one search per requested domain with shared criteria
 *
 * @throws InvalidCriteriaError when a shared criteria value is malformed
 * @throws DataIntegrityError when a listing of a requested domain is malformed
 */
export function searchAcrossDomains(
  request: MultiDomainSearchRequest,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  onDomainSearched?: DomainSearchObserver
): MultiDomainSearchResponse {
  const criteria = validateSharedCriteria(request.sharedCriteria);
  const partitions = partitionByDomain(request.domains, request.listings);

  const responses: SearchResponse[] = [];
  const domains: MultiDomainSearchResponse['domains'] = {};
  for (const [domain, listings] of partitions) {
    const response = searchListings({ domain, criteria, listings }, config);
    onDomainSearched?.(response, listings.length);
    responses.push(response);
    domains[domain] = response;
  }

  return { message: multiDomainMessage(responses), domains };
}
