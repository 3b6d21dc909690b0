/**
 * fast-check arbitraries shared by the property tests
 */

import fc from 'fast-check';

import {
  TRANSPORT_CRITERIA_FIELDS,
  TransportCriteriaSchema,
  TransportListingSchema,
  type TransportCriteria,
  type TransportListing,
} from '../../src/backend/shared/src/index.js';
import {
  TRANSPORT_RULES,
  compileCriteria,
  type ActiveCriterion,
} from '../../src/backend/filter-engine/src/index.js';
import { transportListing } from './listings.js';

export const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

export const lowerWord = fc.stringOf(fc.constantFrom(...'abcdefghij'.split('')), { minLength: 1, maxLength: 12 });

const vehicleShape = fc.record({
  basePrice: fc.integer({ min: 20, max: 400 }),
  vehicleType: fc.constantFrom('car', 'Car', 'van', 'motorcycle'),
  brand: fc.option(fc.constantFrom('Toyota', 'Honda', 'Perodua'), { nil: null }),
  seats: fc.option(fc.integer({ min: 1, max: 9 }), { nil: null }),
  address: fc.constantFrom('Jalan Ampang, Kuala Lumpur', 'Georgetown, Penang', 'Johor Bahru'),
});

/**
 * One to twelve available vehicles with ids v0, v1, ...
 */
export const vehiclesArb: fc.Arbitrary<TransportListing[]> = fc
  .array(vehicleShape, { minLength: 1, maxLength: 12 })
  .map((shapes) => shapes.map((shape, index) => TransportListingSchema.parse(transportListing({ ...shape, id: `v${index}` }))));

/**
 * Any subset of a few transport criteria, validated
 */
export const transportCriteriaArb: fc.Arbitrary<TransportCriteria> = fc
  .record(
    {
      location: fc.constantFrom('kuala lumpur', 'Penang', 'melaka'),
      maxPricePerDay: fc.integer({ min: 0, max: 400 }),
      vehicleType: fc.constantFrom('car', 'VAN', 'helicopter'),
      brand: fc.constantFrom('toyota', 'honda', 'bmw'),
      minSeats: fc.integer({ min: 1, max: 9 }),
    },
    { requiredKeys: [] }
  )
  .map((raw) => TransportCriteriaSchema.parse(raw));

export function activeTransportCriteria(criteria: TransportCriteria): ActiveCriterion<TransportListing>[] {
  return compileCriteria(criteria, TRANSPORT_CRITERIA_FIELDS, TRANSPORT_RULES);
}
