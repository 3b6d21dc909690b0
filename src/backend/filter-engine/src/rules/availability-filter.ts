/**
 * Availability Filter
 *
 * Excludes listings that cannot be booked. Applied before any criteria and
 * never relaxed.
 */

import type { Listing } from '@rentmatch/shared';

export interface FilterResult {
  passed: boolean;
  explanation: string;
}

/**
 * Status comparison is case-insensitive
 */
export function isBookableStatus(status: string, bookableStatuses: readonly string[]): boolean {
  const normalized = status.trim().toUpperCase();
  return bookableStatuses.some((s) => s.trim().toUpperCase() === normalized);
}

export function availabilityFilter(listing: Listing, bookableStatuses: readonly string[]): FilterResult {
  if (!isBookableStatus(listing.status, bookableStatuses)) {
    return {
      passed: false,
      explanation: `Listing ${listing.id} is not available for booking (status: ${listing.status})`,
    };
  }

  return {
    passed: true,
    explanation: `Listing ${listing.id} is available for booking`,
  };
}

/**
 * Keeps only bookable listings, preserving input order
 */
export function filterAvailable<L extends Listing>(listings: readonly L[], bookableStatuses: readonly string[]): L[] {
  return listings.filter((listing) => isBookableStatus(listing.status, bookableStatuses));
}
