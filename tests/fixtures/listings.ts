/**
 * Listing builders and a small marketplace of sample listings
 */

import type { z } from 'zod';

import type {
  AccommodationListingSchema,
  ItemListingSchema,
  TransportListingSchema,
} from '../../src/backend/shared/src/index.js';

export type TransportInput = z.input<typeof TransportListingSchema>;
export type AccommodationInput = z.input<typeof AccommodationListingSchema>;
export type ItemInput = z.input<typeof ItemListingSchema>;

export function transportListing(overrides: Partial<TransportInput> = {}): TransportInput {
  return {
    id: 'transport-1',
    type: 'TRANSPORT',
    title: 'Test vehicle',
    description: null,
    basePrice: 100,
    status: 'AVAILABLE',
    images: [],
    address: 'Kuala Lumpur',
    vehicleType: 'car',
    ...overrides,
  };
}

export function accommodationListing(overrides: Partial<AccommodationInput> = {}): AccommodationInput {
  return {
    id: 'accommodation-1',
    type: 'ACCOMMODATION',
    title: 'Test stay',
    description: null,
    basePrice: 100,
    status: 'AVAILABLE',
    images: [],
    address: 'Penang',
    propertyType: 'apartment',
    ...overrides,
  };
}

export function itemListing(overrides: Partial<ItemInput> = {}): ItemInput {
  return {
    id: 'item-1',
    type: 'ITEM',
    title: 'Test item',
    description: null,
    basePrice: 10,
    status: 'AVAILABLE',
    images: [],
    address: 'Petaling Jaya',
    category: 'tools',
    ...overrides,
  };
}

/**
 * Five available vehicles: t1 and t2 are cars in Kuala Lumpur at or under 200 a day
 */
export const KL_TRANSPORT: TransportInput[] = [
  transportListing({
    id: 't1',
    title: 'Toyota Vios',
    description: 'Compact sedan, easy to park',
    basePrice: 150,
    images: ['vios.jpg'],
    address: 'Jalan Ampang, Kuala Lumpur',
    brand: 'Toyota',
    model: 'Vios',
    year: 2020,
    transmission: 'automatic',
    fuelType: 'petrol',
    seats: 5,
    licensePlate: 'WXY 1234',
  }),
  transportListing({
    id: 't2',
    title: 'Perodua Myvi',
    basePrice: 180,
    address: 'Bukit Bintang, Kuala Lumpur',
    brand: 'Perodua',
  }),
  transportListing({
    id: 't3',
    title: 'Honda City',
    basePrice: 120,
    address: 'Georgetown, Penang',
    brand: 'Honda',
  }),
  transportListing({
    id: 't4',
    title: 'Toyota Hiace',
    basePrice: 190,
    address: 'Cheras, Kuala Lumpur',
    vehicleType: 'van',
    brand: 'Toyota',
  }),
  transportListing({
    id: 't5',
    title: 'BMW 3 Series',
    basePrice: 250,
    address: 'Mont Kiara, Kuala Lumpur',
    brand: 'BMW',
  }),
];

export const PENANG_STAYS: AccommodationInput[] = [
  accommodationListing({
    id: 'a1',
    title: 'Seaview condo',
    basePrice: 220,
    address: 'Tanjung Bungah, Penang',
    propertyType: 'condo',
    maxGuests: 4,
    bedCount: 2,
  }),
  accommodationListing({
    id: 'a2',
    title: 'Heritage shophouse',
    basePrice: 300,
    address: 'Georgetown, Penang',
    propertyType: 'house',
    maxGuests: 8,
    bedCount: 4,
  }),
  accommodationListing({
    id: 'a3',
    title: 'Budget room',
    basePrice: 60,
    address: 'Bayan Lepas, Penang',
    propertyType: 'room',
    maxGuests: 2,
    bedCount: 1,
  }),
];

export const TOOL_ITEMS: ItemInput[] = [
  itemListing({
    id: 'i1',
    title: 'Cordless Drill',
    description: '18V drill with two batteries',
    basePrice: 30,
    status: 'ACTIVE',
    address: 'Petaling Jaya, Selangor',
    category: 'tools',
    condition: 'Like New',
    brand: 'Bosch',
    deliveryMethod: 'Delivery or pickup',
  }),
];
