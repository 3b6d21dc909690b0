/**
 * Listings Client
 *
 * HTTP access to the listings backend with timeout and circuit breaker.
 */

export * from './circuit-breaker.js';
export * from './listings-client.js';
