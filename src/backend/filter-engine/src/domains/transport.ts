/**
 * Transport domain profile (vehicle rentals)
 */

import {
  ListingDomain,
  TransportCriteriaSchema,
  TransportListingSchema,
  TRANSPORT_CRITERIA_FIELDS,
  type TransportCriteria,
  type TransportListing,
  type TransportSearchResult,
} from '@rentmatch/shared';

import {
  categorical,
  floor,
  keywordRule,
  locationRule,
  maxPriceRule,
  minRatingRule,
  type FieldRuleTable,
} from '../rules/field-rules.js';
import { baseResult, lowered, type DomainProfile } from './domain-profile.js';

const SPACIOUS_VEHICLES = new Set(['van', 'suv', 'mpv']);
const TWO_WHEELERS = new Set(['motorcycle', 'motorbike', 'bike', 'scooter']);

export const TRANSPORT_RULES: FieldRuleTable<TransportCriteria, TransportListing> = {
  location: locationRule,
  maxPricePerDay: maxPriceRule,
  vehicleType: categorical('vehicle type', (l: TransportListing) => l.vehicleType),
  brand: categorical('brand', (l: TransportListing) => l.brand),
  model: categorical('model', (l: TransportListing) => l.model),
  transmission: categorical('transmission', (l: TransportListing) => l.transmission),
  fuelType: categorical('fuel type', (l: TransportListing) => l.fuelType),
  minYear: floor('minimum year', (l: TransportListing) => l.year),
  minSeats: floor('minimum seats', (l: TransportListing) => l.seats),
  minRating: minRatingRule,
  keyword: keywordRule,
};

export const transportProfile: DomainProfile<TransportCriteria, TransportListing, TransportSearchResult> = {
  domain: ListingDomain.TRANSPORT,
  noun: 'transport',
  criteriaSchema: TransportCriteriaSchema,
  listingSchema: TransportListingSchema,
  fields: TRANSPORT_CRITERIA_FIELDS,
  rules: TRANSPORT_RULES,

  toResult(listing, tags) {
    return {
      ...baseResult(listing, tags),
      vehicleType: listing.vehicleType,
      brand: listing.brand ?? null,
      model: listing.model ?? null,
      year: listing.year ?? null,
      transmission: listing.transmission ?? null,
      fuelType: listing.fuelType ?? null,
      seats: listing.seats ?? null,
      licensePlate: listing.licensePlate ?? null,
    };
  },

  describe(listing, config) {
    const tags: string[] = [];

    if (listing.year != null && listing.year >= config.referenceYear - config.recentModelYears) {
      tags.push('Recent Model');
    } else if (listing.year != null && listing.year >= config.referenceYear - config.wellMaintainedYears) {
      tags.push('Well Maintained');
    }

    const vehicleType = lowered(listing.vehicleType);
    if (vehicleType === 'car') {
      tags.push('Comfortable Ride');
    } else if (SPACIOUS_VEHICLES.has(vehicleType)) {
      tags.push('Spacious');
    } else if (TWO_WHEELERS.has(vehicleType)) {
      tags.push('Fuel Efficient');
    }

    if (lowered(listing.transmission) === 'automatic') {
      tags.push('Easy to Drive');
    }

    if (listing.seats != null && listing.seats >= 7) {
      tags.push('Great for Groups');
    } else if (listing.seats != null && listing.seats >= 5) {
      tags.push('Family Friendly');
    }

    return tags;
  },
};
