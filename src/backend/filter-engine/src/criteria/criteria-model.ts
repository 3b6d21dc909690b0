/**
 * Criteria Model
 *
 * Turns raw caller-supplied filter values into a validated criteria set for
 * one domain. Each field is validated on its own; malformed values are
 * rejected with InvalidCriteriaError and never coerced into "no constraint".
 *
 * @tested tests/property/criteria-validation.property.test.ts
 */

import type { z } from 'zod';
import {
  InvalidCriteriaError,
  AccommodationCriteriaSchema,
  ItemCriteriaSchema,
  SharedCriteriaSchema,
  TransportCriteriaSchema,
  type AccommodationCriteria,
  type CriteriaSet,
  type ItemCriteria,
  type ListingDomain,
  type SharedCriteria,
  type TransportCriteria,
} from '@rentmatch/shared';

/**
 * Parses raw criteria with a schema; null and undefined mean "no criteria"
 */
export function parseCriteria<C>(
  domain: string,
  schema: z.ZodType<C, z.ZodTypeDef, unknown>,
  raw: unknown
): C {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw InvalidCriteriaError.fromZodError(domain, result.error);
  }
  return result.data;
}

/**
 * Validates raw criteria for a domain
 *
 * @throws InvalidCriteriaError with field-level details
 */
export function validateCriteria(domain: 'TRANSPORT', raw: unknown): TransportCriteria;
export function validateCriteria(domain: 'ACCOMMODATION', raw: unknown): AccommodationCriteria;
export function validateCriteria(domain: 'ITEM', raw: unknown): ItemCriteria;
export function validateCriteria(domain: ListingDomain, raw: unknown): CriteriaSet;
export function validateCriteria(domain: ListingDomain, raw: unknown): CriteriaSet {
  switch (domain) {
    case 'TRANSPORT':
      return parseCriteria(domain, TransportCriteriaSchema, raw);
    case 'ACCOMMODATION':
      return parseCriteria(domain, AccommodationCriteriaSchema, raw);
    case 'ITEM':
      return parseCriteria(domain, ItemCriteriaSchema, raw);
  }
}

/**
 * Validates the criteria applied to every domain of a multi-domain search
 */
export function validateSharedCriteria(raw: unknown): SharedCriteria {
  return parseCriteria('shared', SharedCriteriaSchema, raw);
}

/**
 * Names of the fields that are present (constraining) in a criteria set
 */
export function presentFields(criteria: object): string[] {
  return Object.entries(criteria)
    .filter(([, value]) => value !== undefined)
    .map(([field]) => field);
}
