/**
 * Relaxation Planner
 *
 * Runs only when the strict pass is empty. Drops present criteria one at a
 * time, cumulatively, in the configured order and re-runs the predicate on
 * what remains, stopping at the first non-empty configuration. When every
 * criterion has been dropped the result is all available listings, flagged
 * as a fallback.
 *
 * @tested tests/property/relaxation-planner.property.test.ts
 */

import { matchesAll } from '../rules/predicate-evaluator.js';
import type { ActiveCriterion } from '../rules/field-rules.js';

/**
 * Criteria dropped to reach the returned tier, in drop order
 */
export interface RelaxationTrace {
  dropped: string[];
  fallback: boolean;
}

export const EMPTY_TRACE: RelaxationTrace = Object.freeze({ dropped: [], fallback: false });

export interface RelaxationPlan<L> {
  listings: L[];
  trace: RelaxationTrace;
  /** Number of weaker configurations evaluated */
  attempts: number;
}

/**
 * Order in which the present criteria will be dropped. Fields missing from
 * the configured order go last, in declaration order.
 */
export function dropSequence<L>(criteria: readonly ActiveCriterion<L>[], order: readonly string[]): string[] {
  const present = criteria.map((c) => c.field);
  const ordered = order.filter((field) => present.includes(field));
  const unordered = present.filter((field) => !order.includes(field));
  return [...ordered, ...unordered];
}

/**
 * Finds the least-relaxed criteria configuration that yields a result
 *
 * @param available - Candidates that already passed the availability filter
 * @param criteria - The original present criteria
 * @param order - Relaxation order, least important first
 */
export function planRelaxation<L>(
  available: readonly L[],
  criteria: readonly ActiveCriterion<L>[],
  order: readonly string[]
): RelaxationPlan<L> {
  if (criteria.length === 0) {
    return { listings: [...available], trace: EMPTY_TRACE, attempts: 0 };
  }

  const dropped: string[] = [];
  let remaining = [...criteria];
  let attempts = 0;

  for (const field of dropSequence(criteria, order)) {
    dropped.push(field);
    remaining = remaining.filter((c) => c.field !== field);
    attempts++;

    const matches = available.filter((listing) => matchesAll(listing, remaining));
    if (matches.length > 0) {
      return {
        listings: matches,
        trace: { dropped: [...dropped], fallback: remaining.length === 0 },
        attempts,
      };
    }
  }

  // Only reached when nothing is available at all
  return {
    listings: [...available],
    trace: { dropped: [...dropped], fallback: true },
    attempts,
  };
}
