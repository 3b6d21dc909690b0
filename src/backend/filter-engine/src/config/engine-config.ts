/**
 * Engine Configuration
 *
 * All tunable policy of the filter engine: which statuses are bookable, the
 * per-domain relaxation order, scoring weights and tag thresholds. Passed
 * explicitly to the engine entry points; the engine holds no global config.
 *
 * @tested tests/property/configurable-policy.property.test.ts
 */

import { z } from 'zod';
import {
  TransportCriteriaFieldSchema,
  AccommodationCriteriaFieldSchema,
  ItemCriteriaFieldSchema,
} from '@rentmatch/shared';

function uniqueFields<T extends string>(fields: T[]): boolean {
  return new Set(fields).size === fields.length;
}

const duplicateMessage = { message: 'Relaxation order must not repeat a field' };

/**
 * Relaxation order schema: least important criterion first
 */
export const RelaxationOrderSchema = z.object({
  TRANSPORT: z.array(TransportCriteriaFieldSchema).refine(uniqueFields, duplicateMessage),
  ACCOMMODATION: z.array(AccommodationCriteriaFieldSchema).refine(uniqueFields, duplicateMessage),
  ITEM: z.array(ItemCriteriaFieldSchema).refine(uniqueFields, duplicateMessage),
});

export type RelaxationOrder = z.infer<typeof RelaxationOrderSchema>;

/**
 * Suitability scoring configuration
 */
export const ScoringConfigSchema = z.object({
  baseScore: z.number().finite().min(0),
  defaultFieldWeight: z.number().finite().min(0),
  fieldWeights: z.record(z.number().finite().min(0)),
  priceBonusWeight: z.number().finite().min(0),
});

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

/**
 * Tag synthesis configuration
 */
export const TagConfigSchema = z.object({
  budgetFriendlyFraction: z.number().gt(0).max(1),
  includeAttributeTags: z.boolean(),
  topRatedThreshold: z.number().min(0).max(5),
  recentModelYears: z.number().int().min(0),
  wellMaintainedYears: z.number().int().min(0),
  referenceYear: z.number().int().min(1900).max(2100),
});

export type TagConfig = z.infer<typeof TagConfigSchema>;

export const EngineConfigSchema = z.object({
  bookableStatuses: z.array(z.string().trim().min(1)).min(1),
  relaxationOrder: RelaxationOrderSchema,
  scoring: ScoringConfigSchema,
  tags: TagConfigSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Default relaxation order. Descriptive attributes go first, then the price
 * ceiling, then the listing category, and location last.
 */
export const DEFAULT_RELAXATION_ORDER: RelaxationOrder = {
  TRANSPORT: [
    'keyword',
    'model',
    'brand',
    'fuelType',
    'transmission',
    'minSeats',
    'minYear',
    'minRating',
    'maxPricePerDay',
    'vehicleType',
    'location',
  ],
  ACCOMMODATION: ['keyword', 'minBedCount', 'minRating', 'minGuests', 'maxPricePerDay', 'propertyType', 'location'],
  ITEM: ['keyword', 'brand', 'deliveryMethod', 'condition', 'minRating', 'maxPricePerDay', 'category', 'location'],
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  baseScore: 1,
  defaultFieldWeight: 1,
  fieldWeights: {},
  priceBonusWeight: 0.5,
};

export const DEFAULT_TAG_CONFIG: TagConfig = {
  budgetFriendlyFraction: 1 / 3,
  includeAttributeTags: true,
  topRatedThreshold: 4.5,
  recentModelYears: 2,
  wellMaintainedYears: 5,
  referenceYear: new Date().getFullYear(),
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  bookableStatuses: ['AVAILABLE', 'ACTIVE'],
  relaxationOrder: DEFAULT_RELAXATION_ORDER,
  scoring: DEFAULT_SCORING_CONFIG,
  tags: DEFAULT_TAG_CONFIG,
};

/**
 * Partial overrides; nested sections are merged one level deep
 */
export interface EngineConfigOverrides {
  bookableStatuses?: string[];
  relaxationOrder?: Partial<RelaxationOrder>;
  scoring?: Partial<ScoringConfig>;
  tags?: Partial<TagConfig>;
}

/**
 * Builds a validated engine configuration from the defaults and overrides
 *
 * @throws ZodError when the merged configuration is invalid
 */
export function createEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  return EngineConfigSchema.parse({
    bookableStatuses: overrides.bookableStatuses ?? base.bookableStatuses,
    relaxationOrder: { ...base.relaxationOrder, ...overrides.relaxationOrder },
    scoring: {
      ...base.scoring,
      ...overrides.scoring,
      fieldWeights: { ...base.scoring.fieldWeights, ...overrides.scoring?.fieldWeights },
    },
    tags: { ...base.tags, ...overrides.tags },
  });
}

/**
 * Weight of a single satisfied criteria field
 */
export function fieldWeight(scoring: ScoringConfig, field: string): number {
  return scoring.fieldWeights[field] ?? scoring.defaultFieldWeight;
}
