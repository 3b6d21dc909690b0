/**
 * Property 8: Listing Schema Validation
 *
 * Listings from the backend are validated against their domain schema.
 * Decimal prices serialized as strings and numeric ids are normalized;
 * negative prices, missing domain attributes and unknown domain tags are
 * rejected. Domain names supplied by callers are matched case-insensitively.
 *
 * @file src/backend/shared/src/models/listing.ts
 * @file src/backend/shared/src/models/criteria.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  DomainSelectionSchema,
  LISTING_DOMAINS,
  TransportListingSchema,
  parseListingDomain,
  safeValidateListing,
  validateListing,
} from '../../src/backend/shared/src/index.js';
import { propertyConfig } from '../fixtures/arbitraries.js';
import { accommodationListing, itemListing, transportListing } from '../fixtures/listings.js';

function mixCase(value: string, flags: boolean[]): string {
  return value
    .split('')
    .map((c, i) => (flags[i % flags.length] ? c.toUpperCase() : c.toLowerCase()))
    .join('');
}

const flagsArb = fc.array(fc.boolean(), { minLength: 1, maxLength: 13 });

describe('Property 8: Listing Schema Validation', () => {
  describe('Prices and ids', () => {
    it('accepts prices given as decimal strings', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 100_000 }), fc.integer({ min: 0, max: 99 }), (units, cents) => {
          const text = `${units}.${String(cents).padStart(2, '0')}`;
          const listing = TransportListingSchema.parse(transportListing({ basePrice: text }));

          expect(listing.basePrice).toBe(Number(text));
        }),
        propertyConfig
      );
    });

    it('rejects negative prices in either form', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 100_000 }), (price) => {
          expect(safeValidateListing(transportListing({ basePrice: -price })).success).toBe(false);
          expect(safeValidateListing(transportListing({ basePrice: `-${price}` })).success).toBe(false);
        }),
        propertyConfig
      );
    });

    it('normalizes numeric ids to strings', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1_000_000 }), (id) => {
          expect(validateListing(itemListing({ id })).id).toBe(String(id));
        }),
        propertyConfig
      );
    });

    it('treats missing images as an empty list', () => {
      fc.assert(
        fc.property(fc.constantFrom(null, undefined), (images) => {
          expect(validateListing(accommodationListing({ images })).images).toEqual([]);
        }),
        propertyConfig
      );
    });
  });

  describe('Domain attributes', () => {
    it('dispatches on the domain tag', () => {
      const builders = [transportListing(), accommodationListing(), itemListing()];
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 2 }), (index) => {
          expect(validateListing(builders[index]).type).toBe(LISTING_DOMAINS[index]);
        }),
        propertyConfig
      );
    });

    it('rejects a listing without its category attribute', () => {
      const stripped = [
        transportListing({ vehicleType: undefined }),
        accommodationListing({ propertyType: undefined }),
        itemListing({ category: '' }),
      ];
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 2 }), (index) => {
          expect(safeValidateListing(stripped[index]).success).toBe(false);
        }),
        propertyConfig
      );
    });

    it('rejects unknown domain tags', () => {
      fc.assert(
        fc.property(fc.constantFrom('VEHICLE', 'transport', 'SERVICE', ''), (type) => {
          expect(safeValidateListing({ ...itemListing(), type }).success).toBe(false);
        }),
        propertyConfig
      );
    });

    it('rejects ratings outside 0 to 5', () => {
      fc.assert(
        fc.property(fc.constantFrom(-1, 5.5, 10), (averageRating) => {
          expect(safeValidateListing(itemListing({ averageRating })).success).toBe(false);
        }),
        propertyConfig
      );
    });
  });

  describe('Domain names', () => {
    it('parses domain names in any case', () => {
      fc.assert(
        fc.property(fc.constantFrom(...LISTING_DOMAINS), flagsArb, (domain, flags) => {
          expect(parseListingDomain(` ${mixCase(domain, flags)} `)).toBe(domain);
        }),
        propertyConfig
      );
    });

    it('returns null for names that are not domains', () => {
      const unknown = fc.stringOf(fc.constantFrom(...'xyzqwu'.split('')), { minLength: 0, maxLength: 12 });
      fc.assert(
        fc.property(unknown, (name) => {
          expect(parseListingDomain(name)).toBeNull();
        }),
        propertyConfig
      );
    });

    it('a domain selection is upper-cased and de-duplicated in first-seen order', () => {
      const names = fc.constantFrom('transport', 'ITEM', 'Accommodation', 'item');
      fc.assert(
        fc.property(fc.array(names, { minLength: 1, maxLength: 3 }), (selection) => {
          const expected = [...new Set(selection.map((name) => name.toUpperCase()))];
          expect(DomainSelectionSchema.parse(selection)).toEqual(expected);
        }),
        propertyConfig
      );
    });

    it('rejects an empty selection', () => {
      expect(DomainSelectionSchema.safeParse([]).success).toBe(false);
    });
  });
});
