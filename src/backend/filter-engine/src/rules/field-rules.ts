/**
 * Field Comparison Rules
 *
 * Each criteria field is bound to a comparison kind and an accessor that
 * reads the compared attribute from a listing. A listing that lacks the
 * attribute never satisfies the field.
 */

import { CriterionKind, searchableText, type Listing } from '@rentmatch/shared';

export type NumericKind = typeof CriterionKind.CEILING | typeof CriterionKind.FLOOR;
export type TextKind = typeof CriterionKind.CATEGORICAL | typeof CriterionKind.KEYWORD | typeof CriterionKind.LOCALITY;

export type FieldRule<L> =
  | {
      kind: NumericKind;
      label: string;
      read: (listing: L) => number | null | undefined;
    }
  | {
      kind: TextKind;
      label: string;
      read: (listing: L) => string | null | undefined;
    };

/**
 * One rule for every field of a criteria set
 */
export type FieldRuleTable<C, L> = { readonly [F in keyof C]-?: FieldRule<L> };

export type CriterionValue = string | number;

/**
 * A present criteria field bound to its rule
 */
export interface ActiveCriterion<L> {
  field: string;
  value: CriterionValue;
  rule: FieldRule<L>;
}

export function normalizeText(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Applies a rule to a listing
 */
export function satisfiesRule<L>(rule: FieldRule<L>, listing: L, criterion: CriterionValue): boolean {
  switch (rule.kind) {
    case CriterionKind.CEILING: {
      const value = rule.read(listing);
      return typeof criterion === 'number' && typeof value === 'number' && value <= criterion;
    }
    case CriterionKind.FLOOR: {
      const value = rule.read(listing);
      return typeof criterion === 'number' && typeof value === 'number' && value >= criterion;
    }
    case CriterionKind.CATEGORICAL: {
      const value = rule.read(listing);
      return typeof criterion === 'string' && typeof value === 'string' && normalizeText(value) === normalizeText(criterion);
    }
    case CriterionKind.KEYWORD:
    case CriterionKind.LOCALITY: {
      const value = rule.read(listing);
      return (
        typeof criterion === 'string' &&
        typeof value === 'string' &&
        value.toLowerCase().includes(normalizeText(criterion))
      );
    }
  }
}

/**
 * Collects the present fields of a criteria set, in field declaration order
 */
export function compileCriteria<C extends object, L>(
  criteria: C,
  fields: readonly (keyof C & string)[],
  rules: FieldRuleTable<C, L>
): ActiveCriterion<L>[] {
  const active: ActiveCriterion<L>[] = [];
  for (const field of fields) {
    const value: unknown = criteria[field];
    if (typeof value === 'string' || typeof value === 'number') {
      active.push({ field, value, rule: rules[field] });
    }
  }
  return active;
}

/**
 * Rules shared by all domains
 */
export const locationRule: FieldRule<Listing> = {
  kind: CriterionKind.LOCALITY,
  label: 'location',
  read: (listing) => listing.address,
};

export const maxPriceRule: FieldRule<Listing> = {
  kind: CriterionKind.CEILING,
  label: 'max price per day',
  read: (listing) => listing.basePrice,
};

export const minRatingRule: FieldRule<Listing> = {
  kind: CriterionKind.FLOOR,
  label: 'minimum rating',
  read: (listing) => listing.averageRating,
};

export const keywordRule: FieldRule<Listing> = {
  kind: CriterionKind.KEYWORD,
  label: 'keyword',
  read: searchableText,
};

/**
 * Builds a categorical rule over a text attribute
 */
export function categorical<L>(label: string, read: (listing: L) => string | null | undefined): FieldRule<L> {
  return { kind: CriterionKind.CATEGORICAL, label, read };
}

/**
 * Builds a floor rule over a numeric attribute
 */
export function floor<L>(label: string, read: (listing: L) => number | null | undefined): FieldRule<L> {
  return { kind: CriterionKind.FLOOR, label, read };
}

/**
 * The price ceiling among the active criteria, if one was stated
 */
export function priceCeiling<L>(criteria: readonly ActiveCriterion<L>[]): number | undefined {
  const ceiling = criteria.find((c) => c.field === 'maxPricePerDay');
  return ceiling && typeof ceiling.value === 'number' ? ceiling.value : undefined;
}
