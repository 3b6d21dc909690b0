/**
 * Search Criteria Models and Zod Schemas
 *
 * One criteria set per listing domain. Every field is optional: an absent
 * field places no constraint on the result. Numeric fields reject negative,
 * non-finite and non-numeric input; text fields are trimmed and lower-cased.
 * Field names may also be given in snake_case (`max_price_per_day`).
 *
 * @tested tests/property/criteria-validation.property.test.ts
 */

import { z } from 'zod';

import type { ListingDomain } from './listing.js';

/**
 * Comparison rule applied to a criteria field
 * - ceiling: listing value <= criterion
 * - floor: listing value >= criterion
 * - categorical: case-insensitive exact match
 * - keyword: case-insensitive substring of title + description
 * - locality: case-insensitive substring of the address
 */
export const CriterionKind = {
  CEILING: 'ceiling',
  FLOOR: 'floor',
  CATEGORICAL: 'categorical',
  KEYWORD: 'keyword',
  LOCALITY: 'locality',
} as const;

export type CriterionKind = (typeof CriterionKind)[keyof typeof CriterionKind];

export const TRANSPORT_CRITERIA_FIELDS = [
  'location',
  'maxPricePerDay',
  'vehicleType',
  'brand',
  'model',
  'transmission',
  'fuelType',
  'minYear',
  'minSeats',
  'minRating',
  'keyword',
] as const;

export const ACCOMMODATION_CRITERIA_FIELDS = [
  'location',
  'maxPricePerDay',
  'propertyType',
  'minGuests',
  'minBedCount',
  'minRating',
  'keyword',
] as const;

export const ITEM_CRITERIA_FIELDS = [
  'location',
  'maxPricePerDay',
  'category',
  'condition',
  'brand',
  'deliveryMethod',
  'minRating',
  'keyword',
] as const;

export type TransportCriteriaField = (typeof TRANSPORT_CRITERIA_FIELDS)[number];
export type AccommodationCriteriaField = (typeof ACCOMMODATION_CRITERIA_FIELDS)[number];
export type ItemCriteriaField = (typeof ITEM_CRITERIA_FIELDS)[number];

export const TransportCriteriaFieldSchema = z.enum(TRANSPORT_CRITERIA_FIELDS);
export const AccommodationCriteriaFieldSchema = z.enum(ACCOMMODATION_CRITERIA_FIELDS);
export const ItemCriteriaFieldSchema = z.enum(ITEM_CRITERIA_FIELDS);

/**
 * null, undefined and blank strings all mean "no constraint"
 */
function toOptionalNumber(value: unknown): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : Number(trimmed);
  }
  return value;
}

function toOptionalText(value: unknown): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    return normalized === '' ? undefined : normalized;
  }
  return value;
}

/**
 * Names callers use for a field other than its camelCase name
 */
export const CRITERIA_FIELD_ALIASES: ReadonlyMap<string, string> = new Map([
  ['make', 'brand'],
  ['item_category', 'category'],
  ['max_guests', 'minGuests'],
]);

function snakeToCamel(key: string): string {
  return key.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/**
 * Renames aliased and snake_case keys to their field names. A key whose
 * field is already present is left as it is, so the strict object rejects it.
 */
export function normalizeCriteriaKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value);
  const given = new Set(entries.map(([key]) => key));
  return Object.fromEntries(
    entries.map(([key, fieldValue]) => {
      const field = CRITERIA_FIELD_ALIASES.get(key) ?? snakeToCamel(key);
      return [field !== key && given.has(field) ? key : field, fieldValue];
    })
  );
}

function criteriaObject<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(normalizeCriteriaKeys, z.object(shape).strict());
}

const numberMessages = {
  invalid_type_error: 'Expected a finite number',
};

const amountCriterion = z.preprocess(
  toOptionalNumber,
  z.number(numberMessages).finite().min(0, 'Must not be negative').optional()
);

const countCriterion = z.preprocess(
  toOptionalNumber,
  z.number(numberMessages).finite().int('Must be a whole number').min(0, 'Must not be negative').optional()
);

const ratingCriterion = z.preprocess(
  toOptionalNumber,
  z.number(numberMessages).finite().min(0, 'Must not be negative').max(5, 'Ratings are out of 5').optional()
);

const textCriterion = z.preprocess(
  toOptionalText,
  z.string({ invalid_type_error: 'Expected text' }).max(200).optional()
);

/**
 * Transport criteria schema
 */
export const TransportCriteriaSchema = criteriaObject({
  location: textCriterion,
  maxPricePerDay: amountCriterion,
  vehicleType: textCriterion,
  brand: textCriterion,
  model: textCriterion,
  transmission: textCriterion,
  fuelType: textCriterion,
  minYear: countCriterion,
  minSeats: countCriterion,
  minRating: ratingCriterion,
  keyword: textCriterion,
} satisfies Record<TransportCriteriaField, z.ZodTypeAny>);

export type TransportCriteria = z.infer<typeof TransportCriteriaSchema>;

/**
 * Accommodation criteria schema
 * @edgecase minGuests is the number of guests the place must accommodate
 */
export const AccommodationCriteriaSchema = criteriaObject({
  location: textCriterion,
  maxPricePerDay: amountCriterion,
  propertyType: textCriterion,
  minGuests: countCriterion,
  minBedCount: countCriterion,
  minRating: ratingCriterion,
  keyword: textCriterion,
} satisfies Record<AccommodationCriteriaField, z.ZodTypeAny>);

export type AccommodationCriteria = z.infer<typeof AccommodationCriteriaSchema>;

/**
 * Item criteria schema
 */
export const ItemCriteriaSchema = criteriaObject({
  location: textCriterion,
  maxPricePerDay: amountCriterion,
  category: textCriterion,
  condition: textCriterion,
  brand: textCriterion,
  deliveryMethod: textCriterion,
  minRating: ratingCriterion,
  keyword: textCriterion,
} satisfies Record<ItemCriteriaField, z.ZodTypeAny>);

export type ItemCriteria = z.infer<typeof ItemCriteriaSchema>;

export interface CriteriaByDomain {
  TRANSPORT: TransportCriteria;
  ACCOMMODATION: AccommodationCriteria;
  ITEM: ItemCriteria;
}

export type CriteriaSet = TransportCriteria | AccommodationCriteria | ItemCriteria;

export const CRITERIA_SCHEMAS = {
  TRANSPORT: TransportCriteriaSchema,
  ACCOMMODATION: AccommodationCriteriaSchema,
  ITEM: ItemCriteriaSchema,
} as const;

/**
 * Criteria that apply to every domain at once (multi-domain search)
 */
export const SharedCriteriaSchema = criteriaObject({
  location: textCriterion,
  maxPricePerDay: amountCriterion,
});

export type SharedCriteria = z.infer<typeof SharedCriteriaSchema>;

/**
 * Domains selected for a multi-domain search ("transport", "ITEM", ...)
 */
export const DomainSelectionSchema = z
  .array(
    z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      z.enum(['TRANSPORT', 'ACCOMMODATION', 'ITEM'])
    )
  )
  .min(1)
  .max(3)
  .transform((domains) => [...new Set(domains)]);

/**
 * Field names accepted for a domain
 */
export function criteriaFieldsFor(domain: ListingDomain): readonly string[] {
  switch (domain) {
    case 'TRANSPORT':
      return TRANSPORT_CRITERIA_FIELDS;
    case 'ACCOMMODATION':
      return ACCOMMODATION_CRITERIA_FIELDS;
    case 'ITEM':
      return ITEM_CRITERIA_FIELDS;
  }
}
