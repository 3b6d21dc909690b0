/**
 * Integration Tests for API Endpoints
 *
 * Exercises the Express app against an in-process listing source: search
 * routes, error mapping, correlation IDs, health probes and search logging.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';

import { createApp, loadApiConfig, type ListingSource } from '../../src/backend/api/src/index.js';
import { CircuitState } from '../../src/backend/listings-client/src/index.js';
import {
  ListingsUnavailableError,
  LogLevel,
  createLogger,
  type Logger,
} from '../../src/backend/shared/src/index.js';
import { KL_TRANSPORT, PENANG_STAYS, TOOL_ITEMS } from '../fixtures/listings.js';

const ALL_LISTINGS = [...KL_TRANSPORT, ...PENANG_STAYS, ...TOOL_ITEMS];

function fakeSource(listings: unknown[] = ALL_LISTINGS, state: CircuitState = CircuitState.CLOSED) {
  return {
    fetchAll: vi.fn(async () => listings),
    getCircuitState: () => state,
  } satisfies ListingSource;
}

describe('API Endpoints Integration Tests', () => {
  let logger: Logger;
  let source: ReturnType<typeof fakeSource>;
  let app: Express;

  const buildApp = (listingSource: ListingSource) =>
    createApp({
      config: { enableSwagger: false },
      listingSource,
      logger,
    });

  beforeEach(() => {
    logger = createLogger({ enableConsole: false, minLevel: LogLevel.DEBUG });
    source = fakeSource();
    app = buildApp(source);
  });

  describe('Health Check Endpoints', () => {
    it('GET /health returns healthy status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.version).toBe('1.0.0');
      expect(response.body.dependencies[0]).toMatchObject({ name: 'listingsApi', status: 'healthy' });
    });

    it('GET /live returns alive status', async () => {
      const response = await request(app).get('/live');

      expect(response.status).toBe(200);
      expect(response.body.alive).toBe(true);
    });

    it('GET /ready reflects the listings backend circuit', async () => {
      const ready = await request(app).get('/ready');
      const notReady = await request(buildApp(fakeSource(ALL_LISTINGS, CircuitState.OPEN))).get('/ready');

      expect(ready.status).toBe(200);
      expect(ready.body).toMatchObject({ ready: true, checks: { listingsApi: true } });
      expect(notReady.status).toBe(503);
      expect(notReady.body).toMatchObject({ ready: false, checks: { listingsApi: false } });
    });

    it('GET /health reports degraded while the circuit is half-open', async () => {
      const response = await request(buildApp(fakeSource(ALL_LISTINGS, CircuitState.HALF_OPEN))).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('degraded');
    });
  });

  describe('Single-domain search', () => {
    it('POST /api/v1/search/transport returns ranked exact matches', async () => {
      const response = await request(app)
        .post('/api/v1/search/transport')
        .send({ location: 'Kuala Lumpur', maxPricePerDay: 200, vehicleType: 'car' })
        .set('Content-Type', 'application/json');

      expect(response.status).toBe(200);
      expect(response.body.domain).toBe('TRANSPORT');
      expect(response.body.outcome).toBe('exact');
      expect(response.body.message).toBe('Found 2 listing(s) matching your criteria.');
      expect(response.body.results.map((r: { listingId: string }) => r.listingId)).toEqual(['t1', 't2']);
      expect(source.fetchAll).toHaveBeenCalledTimes(1);
    });

    it('accepts snake_case criteria names', async () => {
      const response = await request(app)
        .post('/api/v1/search/transport')
        .send({ location: 'Kuala Lumpur', max_price_per_day: 200, vehicle_type: 'car' });

      expect(response.status).toBe(200);
      expect(response.body.outcome).toBe('exact');
      expect(response.body.results.map((r: { listingId: string }) => r.listingId)).toEqual(['t1', 't2']);
    });

    it('accepts the domain name in any case', async () => {
      const response = await request(app).post('/api/v1/search/Accommodation').send({ minGuests: 6 });

      expect(response.status).toBe(200);
      expect(response.body.results.map((r: { listingId: string }) => r.listingId)).toEqual(['a2']);
    });

    it('treats a missing body as no criteria', async () => {
      const response = await request(app).post('/api/v1/search/item');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Found 1 listing(s) matching your criteria.');
    });

    it('returns relaxation details when nothing matches exactly', async () => {
      const response = await request(app).post('/api/v1/search/transport').send({ vehicleType: 'helicopter' });

      expect(response.status).toBe(200);
      expect(response.body.outcome).toBe('relaxed');
      expect(response.body.relaxation).toEqual({ relaxed: ['vehicleType'], fallback: true });
      expect(response.body.results).toHaveLength(5);
    });

    it('rejects invalid criteria with field details and never calls the backend', async () => {
      const response = await request(app).post('/api/v1/search/transport').send({ maxPricePerDay: -10 });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('ValidationError');
      expect(response.body.message).toBe('Invalid transport criteria: maxPricePerDay');
      expect(response.body.details).toEqual([
        { field: 'maxPricePerDay', message: 'Must not be negative', code: 'too_small' },
      ]);
      expect(source.fetchAll).not.toHaveBeenCalled();
    });

    it('rejects unknown criteria fields', async () => {
      const response = await request(app).post('/api/v1/search/item').send({ colour: 'red' });

      expect(response.status).toBe(400);
      expect(response.body.details[0].code).toBe('unrecognized_keys');
    });

    it('rejects an unknown domain', async () => {
      const response = await request(app).post('/api/v1/search/boats').send({});

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Unknown listing domain: boats');
      expect(response.body.details).toEqual([
        { field: 'domain', message: 'Expected one of transport, accommodation, item', code: 'invalid_enum_value' },
      ]);
    });

    it('rejects a malformed JSON body', async () => {
      const response = await request(app)
        .post('/api/v1/search/transport')
        .set('Content-Type', 'application/json')
        .send('{"maxPricePerDay":');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ error: 'ValidationError', message: 'Request body is not valid JSON' });
    });

    it('maps a malformed backend listing to 502', async () => {
      const broken = buildApp(fakeSource([{ id: 'x9', type: 'TRANSPORT', title: 'No price', status: 'AVAILABLE' }]));

      const response = await request(broken).post('/api/v1/search/transport').send({});

      expect(response.status).toBe(502);
      expect(response.body.error).toBe('DataIntegrityError');
      expect(response.body.details.map((d: { field: string }) => d.field)).toEqual(['basePrice', 'vehicleType']);
    });

    it('ignores backend records that belong to no listing domain', async () => {
      const feed = [...KL_TRANSPORT, { id: 's1', type: 'SERVICE', title: 'House cleaning', basePrice: 80 }];

      const response = await request(buildApp(fakeSource(feed)))
        .post('/api/v1/search/transport')
        .send({ location: 'Kuala Lumpur', maxPricePerDay: 200, vehicleType: 'car' });

      expect(response.status).toBe(200);
      expect(response.body.results.map((r: { listingId: string }) => r.listingId)).toEqual(['t1', 't2']);
    });

    it('maps an unreachable backend to 503', async () => {
      const failing: ListingSource = {
        fetchAll: async () => {
          throw new ListingsUnavailableError('Listings backend unreachable: connection refused');
        },
      };

      const response = await request(buildApp(failing)).post('/api/v1/search/transport').send({});

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({
        error: 'UpstreamUnavailable',
        message: 'Listings backend unreachable: connection refused',
      });
    });

    it('maps unexpected failures to 500 without leaking the cause', async () => {
      const failing: ListingSource = {
        fetchAll: async () => {
          throw new Error('socket hang up');
        },
      };

      const response = await request(buildApp(failing)).post('/api/v1/search/item').send({});

      expect(response.status).toBe(500);
      expect(response.body).toMatchObject({ error: 'InternalError', message: 'An unexpected error occurred' });
    });
  });

  describe('Multi-domain search', () => {
    it('POST /api/v1/search searches each requested domain', async () => {
      const response = await request(app)
        .post('/api/v1/search')
        .send({ domains: ['transport', 'item'], maxPricePerDay: 200 });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Searched 2 categories: transport (4), item (1).');
      expect(Object.keys(response.body.domains)).toEqual(['TRANSPORT', 'ITEM']);
    });

    it('ignores repeated domains', async () => {
      const response = await request(app).post('/api/v1/search').send({ domains: ['item', 'ITEM'] });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Searched 1 category: item (1).');
    });

    it('rejects an unknown domain in the selection', async () => {
      const response = await request(app).post('/api/v1/search').send({ domains: ['transport', 'boats'] });

      expect(response.status).toBe(400);
      expect(response.body.details[0].field).toBe('domains.1');
      expect(source.fetchAll).not.toHaveBeenCalled();
    });

    it('rejects a missing domain selection', async () => {
      const response = await request(app).post('/api/v1/search').send({ location: 'penang' });

      expect(response.status).toBe(400);
      expect(response.body.details[0].field).toBe('domains');
    });

    it('rejects domain-specific criteria', async () => {
      const response = await request(app).post('/api/v1/search').send({ domains: ['transport'], vehicleType: 'car' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Invalid shared criteria: (root)');
    });
  });

  describe('Correlation IDs', () => {
    it('echoes the caller correlation ID', async () => {
      const response = await request(app)
        .post('/api/v1/search/item')
        .set('X-Correlation-ID', 'test-correlation-1')
        .send({});

      expect(response.headers['x-correlation-id']).toBe('test-correlation-1');
    });

    it('generates a correlation ID when none is sent', async () => {
      const response = await request(app).get('/live');

      expect(response.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('includes the correlation ID in error bodies', async () => {
      const response = await request(app)
        .post('/api/v1/search/transport')
        .set('X-Correlation-ID', 'test-correlation-2')
        .send({ minSeats: 2.5 });

      expect(response.status).toBe(400);
      expect(response.body.correlationId).toBe('test-correlation-2');
    });

    it('returns 404 with a correlation ID for unknown routes', async () => {
      const response = await request(app).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('NotFound');
      expect(response.body.correlationId).toBe(response.headers['x-correlation-id']);
    });
  });

  describe('Search logging', () => {
    it('logs each completed search with its outcome', async () => {
      await request(app)
        .post('/api/v1/search/transport')
        .set('X-Correlation-ID', 'test-correlation-3')
        .send({ vehicleType: 'helicopter' });

      const searchEntries = logger.getLogEntries().filter((e) => e.message === 'Search completed');
      expect(searchEntries).toHaveLength(1);
      expect(searchEntries[0].correlationId).toBe('test-correlation-3');
      expect(searchEntries[0].metadata).toMatchObject({
        domain: 'TRANSPORT',
        criteria: { vehicleType: 'helicopter' },
        candidateCount: 5,
        resultCount: 5,
        outcome: 'relaxed',
        relaxed: ['vehicleType'],
        fallback: true,
      });
    });
  });

  describe('Multi-domain search logging', () => {
    it('logs one search entry per requested domain', async () => {
      await request(app).post('/api/v1/search').send({ domains: ['item', 'transport'], maxPricePerDay: 200 });

      const searchEntries = logger.getLogEntries().filter((e) => e.message === 'Search completed');
      expect(searchEntries.map((e) => e.metadata?.domain)).toEqual(['ITEM', 'TRANSPORT']);
      expect(searchEntries.map((e) => e.metadata?.candidateCount)).toEqual([TOOL_ITEMS.length, KL_TRANSPORT.length]);
    });
  });

  describe('Configuration', () => {
    it('reads settings from the environment', () => {
      const config = loadApiConfig({
        PORT: '8080',
        LISTINGS_API_URL: 'http://listings.test:3000',
        LISTINGS_API_TIMEOUT_MS: '2500',
        LOG_LEVEL: 'DEBUG',
      });

      expect(config).toEqual({
        port: 8080,
        listingsApiUrl: 'http://listings.test:3000',
        listingsApiTimeoutMs: 2500,
        logLevel: 'debug',
        enableSwagger: true,
      });
    });

    it('falls back to defaults for unset variables', () => {
      expect(loadApiConfig({ PORT: '' })).toEqual({
        port: 3000,
        listingsApiUrl: 'http://localhost:3000',
        listingsApiTimeoutMs: 10000,
        logLevel: 'info',
        enableSwagger: true,
      });
    });

    it('rejects a malformed timeout', () => {
      expect(() => loadApiConfig({ LISTINGS_API_TIMEOUT_MS: 'soon' })).toThrow();
    });
  });
});
