/**
 * Listing Filter Rules
 *
 * Availability filter, field comparison rules and the predicate evaluator.
 */

export type { FilterResult } from './availability-filter.js';
export { availabilityFilter, filterAvailable, isBookableStatus } from './availability-filter.js';

export * from './field-rules.js';
export * from './predicate-evaluator.js';
