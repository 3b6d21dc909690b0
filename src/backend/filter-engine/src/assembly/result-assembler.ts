/**
 * Result Assembler
 *
 * Builds the summary message and projects ranked, tagged matches into the
 * per-domain response records.
 *
 * @tested tests/integration/search-engine.integration.test.ts
 */

import type {
  Listing,
  ListingDomain,
  SearchOutcome,
  SearchResponse,
  SearchResultItem,
} from '@rentmatch/shared';

import type { DomainProfile } from '../domains/domain-profile.js';
import type { RelaxationTrace } from '../relaxation/relaxation-planner.js';
import type { MatchResult } from '../scoring/suitability-ranker.js';

/**
 * Joins labels as "a", "a and b", "a, b and c"
 */
export function joinLabels(labels: readonly string[]): string {
  if (labels.length <= 1) {
    return labels.join('');
  }
  return `${labels.slice(0, -1).join(', ')} and ${labels[labels.length - 1]}`;
}

export function strictMessage(count: number): string {
  return `Found ${count} listing(s) matching your criteria.`;
}

export function relaxedMessage(droppedLabels: readonly string[]): string {
  return `No exact matches; showing closest results without filtering by ${joinLabels(droppedLabels)}.`;
}

export function noListingsMessage(noun: string): string {
  return `No ${noun} listings available.`;
}

export function noneAvailableMessage(noun: string): string {
  return `No ${noun} listings are currently available for booking.`;
}

/**
 * Response for a run that produced no candidates to rank
 */
export function emptyResponse(
  domain: ListingDomain,
  noun: string,
  outcome: Extract<SearchOutcome, 'no_listings' | 'none_available'>
): SearchResponse {
  return {
    domain,
    outcome,
    message: outcome === 'no_listings' ? noListingsMessage(noun) : noneAvailableMessage(noun),
    relaxation: { relaxed: [], fallback: false },
    results: [],
  };
}

export interface AssemblyInput<L extends Listing> {
  ranked: readonly MatchResult<L>[];
  tags: readonly string[][];
  trace: RelaxationTrace;
  /** Human-readable labels of the dropped fields, in drop order */
  droppedLabels: readonly string[];
}

/**
 * Assembles the response for a non-empty ranked result set
 */
export function assembleResponse<C extends object, L extends Listing, R extends SearchResultItem>(
  profile: DomainProfile<C, L, R>,
  input: AssemblyInput<L>
): SearchResponse {
  const { ranked, tags, trace, droppedLabels } = input;
  const relaxed = trace.dropped.length > 0;

  return {
    domain: profile.domain,
    outcome: relaxed ? 'relaxed' : 'exact',
    message: relaxed ? relaxedMessage(droppedLabels) : strictMessage(ranked.length),
    relaxation: { relaxed: [...trace.dropped], fallback: trace.fallback },
    results: ranked.map((match, i) => profile.toResult(match.listing, [...(tags[i] ?? [])])),
  };
}
