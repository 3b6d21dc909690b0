/**
 * Search API Endpoints
 *
 * POST /api/v1/search/:domain runs a single-domain search with the request
 * body as criteria. POST /api/v1/search runs several domains with shared
 * criteria: `{ domains, location?, maxPricePerDay? }`.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  DomainSelectionSchema,
  LISTING_DOMAINS,
  formatValidationErrors,
  parseListingDomain,
} from '@rentmatch/shared';

import { createErrorResponse } from '../middleware/error-handler.js';
import { getRequestContext } from '../middleware/request-context.js';
import type { SearchService } from '../services/search-service.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Request bodies are optional; a missing body means "no criteria"
 */
function bodyOf(req: Request): unknown {
  const body: unknown = req.body;
  return body === undefined ? {} : body;
}

export function createSearchRouter(service: SearchService): Router {
  const router = Router();

  router.post('/:domain', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { correlationId } = getRequestContext(req);
    const domain = parseListingDomain(req.params.domain);

    if (!domain) {
      res.status(400).json(
        createErrorResponse('ValidationError', `Unknown listing domain: ${req.params.domain}`, correlationId, [
          {
            field: 'domain',
            message: `Expected one of ${LISTING_DOMAINS.map((d) => d.toLowerCase()).join(', ')}`,
            code: 'invalid_enum_value',
          },
        ])
      );
      return;
    }

    try {
      res.status(200).json(await service.search(domain, bodyOf(req), correlationId));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { correlationId } = getRequestContext(req);
    const body = bodyOf(req);

    if (!isRecord(body)) {
      res
        .status(400)
        .json(createErrorResponse('ValidationError', 'Request body must be a JSON object', correlationId));
      return;
    }

    const { domains: rawDomains, ...sharedCriteria } = body;
    const domains = DomainSelectionSchema.safeParse(rawDomains);
    if (!domains.success) {
      const details = formatValidationErrors(domains.error).map((d) => ({
        ...d,
        field: d.field ? `domains.${d.field}` : 'domains',
      }));
      res.status(400).json(createErrorResponse('ValidationError', 'Invalid domain selection', correlationId, details));
      return;
    }

    try {
      res.status(200).json(await service.searchAcrossDomains(domains.data, sharedCriteria, correlationId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
