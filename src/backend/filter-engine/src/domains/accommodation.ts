/**
 * Accommodation domain profile
 */

import {
  ListingDomain,
  AccommodationCriteriaSchema,
  AccommodationListingSchema,
  ACCOMMODATION_CRITERIA_FIELDS,
  type AccommodationCriteria,
  type AccommodationListing,
  type AccommodationSearchResult,
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

export const ACCOMMODATION_RULES: FieldRuleTable<AccommodationCriteria, AccommodationListing> = {
  location: locationRule,
  maxPricePerDay: maxPriceRule,
  propertyType: categorical('property type', (l: AccommodationListing) => l.propertyType),
  minGuests: floor('guest count', (l: AccommodationListing) => l.maxGuests),
  minBedCount: floor('bed count', (l: AccommodationListing) => l.bedCount),
  minRating: minRatingRule,
  keyword: keywordRule,
};

export const accommodationProfile: DomainProfile<
  AccommodationCriteria,
  AccommodationListing,
  AccommodationSearchResult
> = {
  domain: ListingDomain.ACCOMMODATION,
  noun: 'accommodation',
  criteriaSchema: AccommodationCriteriaSchema,
  listingSchema: AccommodationListingSchema,
  fields: ACCOMMODATION_CRITERIA_FIELDS,
  rules: ACCOMMODATION_RULES,

  toResult(listing, tags) {
    return {
      ...baseResult(listing, tags),
      propertyType: listing.propertyType,
      maxGuests: listing.maxGuests ?? null,
      bedCount: listing.bedCount ?? null,
      roomCount: listing.roomCount ?? null,
      bathroomCount: listing.bathroomCount ?? null,
      amenities: [...listing.amenities],
    };
  },

  describe(listing) {
    const tags: string[] = [];

    if (listing.maxGuests != null && listing.maxGuests >= 6) {
      tags.push('Great for Groups');
    } else if (listing.maxGuests != null && listing.maxGuests >= 4) {
      tags.push('Family Friendly');
    }

    switch (lowered(listing.propertyType)) {
      case 'villa':
      case 'house':
        tags.push('Spacious');
        break;
      case 'apartment':
      case 'condo':
        tags.push('City Living');
        break;
      case 'room':
      case 'homestay':
        tags.push('Cozy Stay');
        break;
    }

    return tags;
  },
};
