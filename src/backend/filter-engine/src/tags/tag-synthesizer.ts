/**
 * Tag Synthesizer
 *
 * Derives short labels for a ranked result. Precedence tags come first in a
 * fixed order (Exact Match, Most Suitable, Budget Friendly, Closest Match),
 * followed by descriptive tags earned by the listing's attributes. A listing
 * that earns no descriptive tag is a "Good Option".
 *
 * @tested tests/property/tag-synthesis.property.test.ts
 */

import { MatchTag, type Listing } from '@rentmatch/shared';

import type { TagConfig } from '../config/engine-config.js';
import type { RelaxationTrace } from '../relaxation/relaxation-planner.js';
import type { MatchResult } from '../scoring/suitability-ranker.js';

export const CHEAPEST_OPTION_TAG = 'Cheapest Option';
export const TOP_RATED_TAG = 'Top Rated';
export const GOOD_OPTION_TAG = 'Good Option';

/**
 * Price spread of the returned result set
 */
export interface PriceRange {
  min: number;
  max: number;
  distinct: number;
}

export function priceRangeOf(prices: readonly number[]): PriceRange {
  if (prices.length === 0) {
    return { min: 0, max: 0, distinct: 0 };
  }
  return {
    min: Math.min(...prices),
    max: Math.max(...prices),
    distinct: new Set(prices).size,
  };
}

/**
 * Lowest `fraction` of the price span, measured over the returned set
 */
export function isBudgetFriendly(price: number, range: PriceRange, fraction: number): boolean {
  const threshold = range.min + (range.max - range.min) * fraction;
  return price <= threshold + 1e-9;
}

export interface TagInput<L extends Listing> {
  match: MatchResult<L>;
  rank: number;
  trace: RelaxationTrace;
  priceRange: PriceRange;
}

/**
 * Tags for one result
 *
 * @param describe - Domain-specific attribute tags
 */
export function synthesizeTags<L extends Listing>(
  input: TagInput<L>,
  config: TagConfig,
  describe?: (listing: L, config: TagConfig) => string[]
): string[] {
  const { match, rank, trace, priceRange } = input;
  const relaxed = trace.dropped.length > 0;
  const tags: string[] = [];

  if (match.strictPass && !relaxed) {
    tags.push(MatchTag.EXACT_MATCH);
  }
  if (rank === 0) {
    tags.push(MatchTag.MOST_SUITABLE);
  }
  if (isBudgetFriendly(match.listing.basePrice, priceRange, config.budgetFriendlyFraction)) {
    tags.push(MatchTag.BUDGET_FRIENDLY);
  }
  if (relaxed) {
    tags.push(MatchTag.CLOSEST_MATCH);
  }

  if (config.includeAttributeTags) {
    const descriptive: string[] = [];
    if (priceRange.distinct > 1 && match.listing.basePrice === priceRange.min) {
      descriptive.push(CHEAPEST_OPTION_TAG);
    }
    const rating = match.listing.averageRating;
    if (rating != null && rating >= config.topRatedThreshold) {
      descriptive.push(TOP_RATED_TAG);
    }
    if (describe) {
      descriptive.push(...describe(match.listing, config));
    }
    tags.push(...(descriptive.length > 0 ? descriptive : [GOOD_OPTION_TAG]));
  }

  return [...new Set(tags)];
}

/**
 * Tags every result of a ranked list
 */
export function tagRankedResults<L extends Listing>(
  ranked: readonly MatchResult<L>[],
  trace: RelaxationTrace,
  config: TagConfig,
  describe?: (listing: L, config: TagConfig) => string[]
): string[][] {
  const priceRange = priceRangeOf(ranked.map((m) => m.listing.basePrice));
  return ranked.map((match, rank) => synthesizeTags({ match, rank, trace, priceRange }, config, describe));
}
