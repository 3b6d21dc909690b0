/**
 * Predicate Evaluator
 *
 * Decides whether a listing satisfies a criteria set. Every present field is
 * evaluated, not only until the first failure, so that the per-field result
 * can feed scoring and relaxation.
 *
 * @tested tests/property/predicate-evaluator.property.test.ts
 */

import type { Listing } from '@rentmatch/shared';

import { availabilityFilter } from './availability-filter.js';
import { satisfiesRule, type ActiveCriterion } from './field-rules.js';

/**
 * Result of evaluating one listing
 */
export interface PredicateResult {
  /** Available and every present field satisfied */
  passed: boolean;
  available: boolean;
  fieldResults: Record<string, boolean>;
  satisfied: string[];
  violated: string[];
  availabilityExplanation: string;
}

/**
 * Evaluates each field without regard to availability
 */
export function evaluateFields<L>(
  listing: L,
  criteria: readonly ActiveCriterion<L>[]
): Pick<PredicateResult, 'fieldResults' | 'satisfied' | 'violated'> {
  const fieldResults: Record<string, boolean> = {};
  const satisfied: string[] = [];
  const violated: string[] = [];

  for (const criterion of criteria) {
    const ok = satisfiesRule(criterion.rule, listing, criterion.value);
    fieldResults[criterion.field] = ok;
    if (ok) {
      satisfied.push(criterion.field);
    } else {
      violated.push(criterion.field);
    }
  }

  return { fieldResults, satisfied, violated };
}

/**
 * Evaluates a listing against a criteria set
 */
export function evaluateListing<L extends Listing>(
  listing: L,
  criteria: readonly ActiveCriterion<L>[],
  bookableStatuses: readonly string[]
): PredicateResult {
  const availability = availabilityFilter(listing, bookableStatuses);
  const fields = evaluateFields(listing, criteria);

  return {
    passed: availability.passed && fields.violated.length === 0,
    available: availability.passed,
    ...fields,
    availabilityExplanation: availability.explanation,
  };
}

/**
 * True when every criterion holds; absent fields never exclude
 */
export function matchesAll<L>(listing: L, criteria: readonly ActiveCriterion<L>[]): boolean {
  return criteria.every((criterion) => satisfiesRule(criterion.rule, listing, criterion.value));
}

/**
 * Strict pass over an already availability-filtered candidate set
 */
export function strictPass<L>(available: readonly L[], criteria: readonly ActiveCriterion<L>[]): L[] {
  return available.filter((listing) => matchesAll(listing, criteria));
}
