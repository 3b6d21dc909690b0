/**
 * Search Response Models and Zod Schemas
 *
 * Defines the external response shape of a search: a summary message plus
 * ranked, tagged listing records. Field set is fixed per domain.
 *
 * @tested tests/integration/search-engine.integration.test.ts
 */

import { z } from 'zod';

import { ListingDomainSchema } from './listing.js';

/**
 * Tags emitted by precedence rules
 */
export const MatchTag = {
  EXACT_MATCH: 'Exact Match',
  MOST_SUITABLE: 'Most Suitable',
  BUDGET_FRIENDLY: 'Budget Friendly',
  CLOSEST_MATCH: 'Closest Match',
} as const;

export type MatchTag = (typeof MatchTag)[keyof typeof MatchTag];

const nullableText = z.string().nullable();
const nullableCount = z.number().int().nullable();

/**
 * Fields present on every search result
 */
export const BaseSearchResultSchema = z.object({
  listingId: z.string().min(1),
  title: z.string().min(1),
  description: nullableText,
  address: nullableText,
  pricePerDay: z.number().min(0),
  images: z.array(z.string()),
  status: z.string(),
  tags: z.array(z.string()),
});

export const TransportSearchResultSchema = BaseSearchResultSchema.extend({
  vehicleType: z.string(),
  brand: nullableText,
  model: nullableText,
  year: nullableCount,
  transmission: nullableText,
  fuelType: nullableText,
  seats: nullableCount,
  licensePlate: nullableText,
}).strict();

export type TransportSearchResult = z.infer<typeof TransportSearchResultSchema>;

export const AccommodationSearchResultSchema = BaseSearchResultSchema.extend({
  propertyType: z.string(),
  maxGuests: nullableCount,
  bedCount: nullableCount,
  roomCount: nullableCount,
  bathroomCount: nullableCount,
  amenities: z.array(z.string()),
}).strict();

export type AccommodationSearchResult = z.infer<typeof AccommodationSearchResultSchema>;

export const ItemSearchResultSchema = BaseSearchResultSchema.extend({
  category: z.string(),
  condition: nullableText,
  brand: nullableText,
  model: nullableText,
  deliveryMethod: nullableText,
}).strict();

export type ItemSearchResult = z.infer<typeof ItemSearchResultSchema>;

export type SearchResultItem = TransportSearchResult | AccommodationSearchResult | ItemSearchResult;

/**
 * Which criteria were dropped to produce the result set
 */
export const RelaxationSummarySchema = z.object({
  relaxed: z.array(z.string()),
  fallback: z.boolean(),
});

export type RelaxationSummary = z.infer<typeof RelaxationSummarySchema>;

/**
 * Outcome of a search, distinguishing the empty cases
 * - exact: strict pass produced results
 * - relaxed: one or more criteria were dropped
 * - no_listings: the candidate collection was empty
 * - none_available: no candidate is available for booking
 */
export const SearchOutcomeSchema = z.enum(['exact', 'relaxed', 'no_listings', 'none_available']);

export type SearchOutcome = z.infer<typeof SearchOutcomeSchema>;

export const SearchResponseSchema = z.object({
  domain: ListingDomainSchema,
  outcome: SearchOutcomeSchema,
  message: z.string().min(1),
  relaxation: RelaxationSummarySchema,
  results: z.array(
    z.union([TransportSearchResultSchema, AccommodationSearchResultSchema, ItemSearchResultSchema])
  ),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export const MultiDomainSearchResponseSchema = z.object({
  message: z.string().min(1),
  domains: z.record(ListingDomainSchema, SearchResponseSchema),
});

export type MultiDomainSearchResponse = z.infer<typeof MultiDomainSearchResponseSchema>;
