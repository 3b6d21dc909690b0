/**
 * Domain Profile
 *
 * Everything the engine needs to know about one listing domain: how to
 * validate its criteria and listings, how each field is compared, how a
 * listing is projected into a search result and which descriptive tags
 * its attributes earn.
 */

import type { z } from 'zod';
import type { Listing, ListingDomain, SearchResultItem } from '@rentmatch/shared';

import type { TagConfig } from '../config/engine-config.js';
import type { FieldRuleTable } from '../rules/field-rules.js';

export interface DomainProfile<C extends object, L extends Listing, R extends SearchResultItem> {
  domain: ListingDomain;
  /** Lower-case name used in messages ("transport", "item") */
  noun: string;
  criteriaSchema: z.ZodType<C, z.ZodTypeDef, unknown>;
  listingSchema: z.ZodType<L, z.ZodTypeDef, unknown>;
  fields: readonly (keyof C & string)[];
  rules: FieldRuleTable<C, L>;
  toResult(listing: L, tags: string[]): R;
  describe(listing: L, config: TagConfig): string[];
}

/**
 * Fields every search result carries
 */
export function baseResult(listing: Listing, tags: string[]) {
  return {
    listingId: listing.id,
    title: listing.title,
    description: listing.description ?? null,
    address: listing.address ?? null,
    pricePerDay: listing.basePrice,
    images: [...listing.images],
    status: listing.status,
    tags,
  };
}

/**
 * Lower-cases an optional attribute for tag lookups
 */
export function lowered(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase();
}
