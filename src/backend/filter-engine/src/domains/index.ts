/**
 * Domain profiles for the three listing domains
 */

export * from './domain-profile.js';
export { transportProfile, TRANSPORT_RULES } from './transport.js';
export { accommodationProfile, ACCOMMODATION_RULES } from './accommodation.js';
export { itemProfile, ITEM_RULES } from './item.js';
