/**
 * Suitability Ranker
 *
 * Scores each candidate against the original, unrelaxed criteria and sorts
 * best-first. Ties on score break by ascending price, then ascending listing
 * id, so the order is total and repeatable.
 *
 * @tested tests/property/suitability-ranking.property.test.ts
 */

import type { Listing } from '@rentmatch/shared';

import { fieldWeight, type ScoringConfig } from '../config/engine-config.js';
import { priceCeiling, type ActiveCriterion } from '../rules/field-rules.js';
import { evaluateFields } from '../rules/predicate-evaluator.js';

/**
 * Scores closer than this are treated as equal
 */
export const SCORE_EPSILON = 1e-9;

/**
 * A listing paired with its evaluation for one search run
 */
export interface MatchResult<L extends Listing> {
  listing: L;
  /** Satisfies every original criterion */
  strictPass: boolean;
  score: number;
  priceBonus: number;
  satisfied: string[];
  violated: string[];
}

/**
 * Bonus for staying under a stated price ceiling: proportional to how far
 * under it the price is. No ceiling, or a price above it, earns nothing.
 */
export function calculatePriceBonus(price: number, ceiling: number | undefined, weight: number): number {
  if (ceiling === undefined || price > ceiling) {
    return 0;
  }
  if (ceiling === 0) {
    return weight;
  }
  return weight * ((ceiling - price) / ceiling);
}

/**
 * Scores one listing against the original criteria
 */
export function scoreListing<L extends Listing>(
  listing: L,
  criteria: readonly ActiveCriterion<L>[],
  scoring: ScoringConfig
): MatchResult<L> {
  const { satisfied, violated } = evaluateFields(listing, criteria);
  const fieldScore = satisfied.reduce((sum, field) => sum + fieldWeight(scoring, field), 0);
  const priceBonus = calculatePriceBonus(listing.basePrice, priceCeiling(criteria), scoring.priceBonusWeight);

  return {
    listing,
    strictPass: violated.length === 0,
    score: scoring.baseScore + fieldScore + priceBonus,
    priceBonus,
    satisfied,
    violated,
  };
}

/**
 * Code-unit comparison, independent of the host locale
 */
function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Best-first comparator: score desc, price asc, id asc
 */
export function compareMatches<L extends Listing>(a: MatchResult<L>, b: MatchResult<L>): number {
  const scoreDiff = b.score - a.score;
  if (Math.abs(scoreDiff) > SCORE_EPSILON) {
    return scoreDiff;
  }

  const priceDiff = a.listing.basePrice - b.listing.basePrice;
  if (priceDiff !== 0) {
    return priceDiff;
  }

  return compareIds(a.listing.id, b.listing.id);
}

/**
 * Scores and sorts a result tier
 */
export function rankMatches<L extends Listing>(
  listings: readonly L[],
  criteria: readonly ActiveCriterion<L>[],
  scoring: ScoringConfig
): MatchResult<L>[] {
  return listings.map((listing) => scoreListing(listing, criteria, scoring)).sort(compareMatches);
}
