/**
 * Item domain profile (electronics, tools, equipment and other goods)
 */

import {
  ListingDomain,
  ItemCriteriaSchema,
  ItemListingSchema,
  ITEM_CRITERIA_FIELDS,
  type ItemCriteria,
  type ItemListing,
  type ItemSearchResult,
} from '@rentmatch/shared';

import {
  categorical,
  keywordRule,
  locationRule,
  maxPriceRule,
  minRatingRule,
  type FieldRuleTable,
} from '../rules/field-rules.js';
import { baseResult, lowered, type DomainProfile } from './domain-profile.js';

const LIKE_NEW_CONDITIONS = new Set(['new', 'like new', 'excellent']);

const CATEGORY_TAGS: ReadonlyMap<string, string> = new Map([
  ['electronics', 'Tech Gear'],
  ['tools', 'DIY Essential'],
  ['furniture', 'Home & Living'],
  ['sports', 'Active Lifestyle'],
]);

export const ITEM_RULES: FieldRuleTable<ItemCriteria, ItemListing> = {
  location: locationRule,
  maxPricePerDay: maxPriceRule,
  category: categorical('category', (l: ItemListing) => l.category),
  condition: categorical('condition', (l: ItemListing) => l.condition),
  brand: categorical('brand', (l: ItemListing) => l.brand),
  deliveryMethod: categorical('delivery method', (l: ItemListing) => l.deliveryMethod),
  minRating: minRatingRule,
  keyword: keywordRule,
};

export const itemProfile: DomainProfile<ItemCriteria, ItemListing, ItemSearchResult> = {
  domain: ListingDomain.ITEM,
  noun: 'item',
  criteriaSchema: ItemCriteriaSchema,
  listingSchema: ItemListingSchema,
  fields: ITEM_CRITERIA_FIELDS,
  rules: ITEM_RULES,

  toResult(listing, tags) {
    return {
      ...baseResult(listing, tags),
      category: listing.category,
      condition: listing.condition ?? null,
      brand: listing.brand ?? null,
      model: listing.model ?? null,
      deliveryMethod: listing.deliveryMethod ?? null,
    };
  },

  describe(listing) {
    const tags: string[] = [];

    const category = lowered(listing.category);
    const categoryTag = CATEGORY_TAGS.get(category);
    if (categoryTag !== undefined) {
      tags.push(categoryTag);
    } else if (category.includes('camera') || lowered(listing.title).includes('camera')) {
      tags.push('Photography Gear');
    }

    const condition = lowered(listing.condition);
    if (LIKE_NEW_CONDITIONS.has(condition)) {
      tags.push('Like New');
    } else if (condition === 'good') {
      tags.push('Good Condition');
    }

    if (lowered(listing.deliveryMethod).includes('deliver')) {
      tags.push('Delivery Available');
    }

    const brand = listing.brand?.trim();
    if (brand) {
      tags.push(`${brand} Brand`);
    }

    return tags;
  },
};
