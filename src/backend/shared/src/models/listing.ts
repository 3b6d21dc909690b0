/**
 * Listing Data Models and Zod Schemas
 *
 * Defines the canonical schema for rental listings as served by the listings
 * backend. Listings are read-only inputs to the filter engine.
 *
 * @tested tests/property/schema-validation.property.test.ts
 */

import { z } from 'zod';

// Listing domain enumeration
export const ListingDomain = {
  TRANSPORT: 'TRANSPORT',
  ACCOMMODATION: 'ACCOMMODATION',
  ITEM: 'ITEM',
} as const;

export type ListingDomain = (typeof ListingDomain)[keyof typeof ListingDomain];

export const ListingDomainSchema = z.enum(['TRANSPORT', 'ACCOMMODATION', 'ITEM']);

export const LISTING_DOMAINS: readonly ListingDomain[] = [
  ListingDomain.TRANSPORT,
  ListingDomain.ACCOMMODATION,
  ListingDomain.ITEM,
];

/**
 * Parses a caller-facing domain name ("transport", "Accommodation", ...)
 * into a ListingDomain. Returns null when the name is not a known domain.
 */
export function parseListingDomain(value: string): ListingDomain | null {
  const parsed = ListingDomainSchema.safeParse(value.trim().toUpperCase());
  return parsed.success ? parsed.data : null;
}

/**
 * Prices come from a decimal column and may be serialized as strings.
 */
const PriceSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/).transform(Number)])
  .pipe(z.number().finite().min(0));

const optionalText = z.string().nullish();
const optionalCount = z.number().int().min(0).nullish();

/**
 * Fields shared by every listing regardless of domain
 */
const BaseListingShape = {
  id: z.union([z.string().min(1), z.number().int().transform(String)]),
  title: z.string().min(1),
  description: z.string().nullish(),
  basePrice: PriceSchema,
  status: z.string().min(1),
  images: z.array(z.string()).nullish().transform((images) => images ?? []),
  address: optionalText,
  lat: z.number().nullish(),
  lng: z.number().nullish(),
  ownerId: z.union([z.string(), z.number().transform(String)]).nullish(),
  averageRating: z.number().min(0).max(5).nullish(),
};

/**
 * Transport (vehicle) listing schema
 * @edgecase vehicleType is required so that the category criterion is decidable
 */
export const TransportListingSchema = z.object({
  ...BaseListingShape,
  type: z.literal(ListingDomain.TRANSPORT),
  vehicleType: z.string().min(1),
  brand: optionalText,
  model: optionalText,
  year: z.number().int().min(1900).max(2100).nullish(),
  transmission: optionalText,
  fuelType: optionalText,
  seats: optionalCount,
  licensePlate: optionalText,
});

export type TransportListing = z.infer<typeof TransportListingSchema>;

/**
 * Accommodation listing schema
 */
export const AccommodationListingSchema = z.object({
  ...BaseListingShape,
  type: z.literal(ListingDomain.ACCOMMODATION),
  propertyType: z.string().min(1),
  maxGuests: optionalCount,
  bedCount: optionalCount,
  roomCount: optionalCount,
  bathroomCount: optionalCount,
  amenities: z.array(z.string()).nullish().transform((amenities) => amenities ?? []),
});

export type AccommodationListing = z.infer<typeof AccommodationListingSchema>;

/**
 * Item listing schema
 */
export const ItemListingSchema = z.object({
  ...BaseListingShape,
  type: z.literal(ListingDomain.ITEM),
  category: z.string().min(1),
  condition: optionalText,
  brand: optionalText,
  model: optionalText,
  deliveryMethod: optionalText,
});

export type ItemListing = z.infer<typeof ItemListingSchema>;

export const ListingSchema = z.discriminatedUnion('type', [
  TransportListingSchema,
  AccommodationListingSchema,
  ItemListingSchema,
]);

export type Listing = z.infer<typeof ListingSchema>;

/**
 * Maps each domain to its listing type
 */
export interface ListingByDomain {
  TRANSPORT: TransportListing;
  ACCOMMODATION: AccommodationListing;
  ITEM: ItemListing;
}

/**
 * Raw listing input as accepted by the schemas (before transforms)
 */
export type ListingInput = z.input<typeof ListingSchema>;

export const LISTING_SCHEMAS = {
  TRANSPORT: TransportListingSchema,
  ACCOMMODATION: AccommodationListingSchema,
  ITEM: ItemListingSchema,
} as const;

/**
 * Validates a listing against its schema
 *
 * @returns Validated Listing or throws ZodError with field-level details
 */
export function validateListing(data: unknown): Listing {
  return ListingSchema.parse(data);
}

/**
 * Safely validates a listing, returning result object instead of throwing
 */
export function safeValidateListing(data: unknown): z.SafeParseReturnType<unknown, Listing> {
  return ListingSchema.safeParse(data);
}

/**
 * Text searched by keyword criteria
 */
export function searchableText(listing: Listing): string {
  return `${listing.title} ${listing.description ?? ''}`;
}
