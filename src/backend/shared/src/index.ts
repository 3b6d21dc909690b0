/**
 * RentMatch Shared Package
 *
 * Exports the shared models, schemas, errors and logging used by the
 * filter engine, the listings client and the API.
 */

// Listing models and schemas
export * from './models/listing.js';

// Criteria models and schemas
export * from './models/criteria.js';

// Search response schemas
export * from './models/search.js';

// Errors
export * from './errors/search-errors.js';

// Logging
export * from './logging/logger.js';
