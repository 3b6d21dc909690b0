/**
 * API Layer Entry Point
 *
 * Express application exposing listing search and health endpoints, with
 * OpenAPI documentation served at /api-docs.
 */

import { fileURLToPath } from 'node:url';

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import { createLogger, getLogger, type Logger } from '@rentmatch/shared';
import type { EngineConfig } from '@rentmatch/filter-engine';
import { ListingsClient } from '@rentmatch/listings-client';

import { loadApiConfig, type ApiConfig } from './config.js';
import { createErrorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestContext } from './middleware/request-context.js';
import { createHealthRouter } from './routes/health.js';
import { createSearchRouter } from './routes/search.js';
import { SearchService, type ListingSource } from './services/search-service.js';

export const VERSION = '1.0.0';

export const defaultApiConfig: ApiConfig = loadApiConfig();

export interface AppOptions {
  config?: Partial<ApiConfig>;
  /** Listing source; defaults to a ListingsClient for config.listingsApiUrl */
  listingSource?: ListingSource;
  engineConfig?: EngineConfig;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadOpenApiDocument(logger: Logger): Record<string, unknown> | null {
  try {
    const openapiPath = fileURLToPath(new URL('./openapi.yaml', import.meta.url));
    const document: unknown = YAML.load(openapiPath);
    return isRecord(document) ? document : null;
  } catch (error) {
    logger.warn('Failed to load OpenAPI document', {
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Creates and configures the Express application
 */
export function createApp(options: AppOptions = {}): Express {
  const config: ApiConfig = { ...defaultApiConfig, ...options.config };
  const logger = options.logger ?? getLogger();
  const source =
    options.listingSource ??
    new ListingsClient({
      config: { baseUrl: config.listingsApiUrl, timeoutMs: config.listingsApiTimeoutMs },
      logger,
    });
  const service = new SearchService(source, { engineConfig: options.engineConfig, logger });

  const app = express();

  app.use(requestContext);
  app.use(express.json());

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Correlation-ID');
    next();
  });

  app.options('*', (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  app.use(
    createHealthRouter({
      version: VERSION,
      listingsCircuitState: () => source.getCircuitState?.(),
    })
  );

  if (config.enableSwagger) {
    const document = loadOpenApiDocument(logger);
    if (document) {
      app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(document));
      app.get('/api-docs.json', (_req: Request, res: Response) => {
        res.json(document);
      });
    }
  }

  app.use('/api/v1/search', createSearchRouter(service));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Starts the API server
 */
export function startServer(config: Partial<ApiConfig> = {}): void {
  const fullConfig: ApiConfig = { ...defaultApiConfig, ...config };
  const logger = createLogger({ minLevel: fullConfig.logLevel });
  const app = createApp({ config: fullConfig, logger });

  app.listen(fullConfig.port, () => {
    logger.info('Search API listening', {
      port: fullConfig.port,
      listingsApiUrl: fullConfig.listingsApiUrl,
      docs: fullConfig.enableSwagger ? `/api-docs` : undefined,
    });
  });
}

export { loadApiConfig, type ApiConfig } from './config.js';
export { createSearchRouter } from './routes/search.js';
export { createHealthRouter, HealthCheckService, HealthStatus } from './routes/health.js';
export { SearchService, type ListingSource, type SearchServiceOptions } from './services/search-service.js';
export { createErrorResponse, mapError, type ApiErrorResponse } from './middleware/error-handler.js';
export { CORRELATION_ID_HEADER, getRequestContext, type RequestContext } from './middleware/request-context.js';

// Start server if run directly
if (process.argv[1] && process.argv[1].endsWith('index.js')) {
  startServer();
}
