/**
 * Error Responses
 *
 * Maps search errors to HTTP statuses and renders every error in the same
 * `{ error, message, correlationId, details? }` shape.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import type { NextFunction, Request, Response } from 'express';
import {
  DataIntegrityError,
  InvalidCriteriaError,
  ListingsUnavailableError,
  getLogger,
  type FieldErrorDetail,
  type Logger,
} from '@rentmatch/shared';

import { getRequestContext } from './request-context.js';

/**
 * API error response format
 */
export interface ApiErrorResponse {
  error: string;
  message: string;
  correlationId?: string;
  details?: FieldErrorDetail[];
}

export function createErrorResponse(
  error: string,
  message: string,
  correlationId?: string,
  details?: FieldErrorDetail[]
): ApiErrorResponse {
  const response: ApiErrorResponse = { error, message, correlationId };
  if (details && details.length > 0) {
    response.details = details;
  }
  return response;
}

interface MappedError {
  status: number;
  body: ApiErrorResponse;
}

/**
 * Body-parser marks malformed JSON with this type
 */
function isMalformedBody(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function mapError(error: unknown, correlationId: string): MappedError {
  if (error instanceof InvalidCriteriaError) {
    return {
      status: 400,
      body: createErrorResponse('ValidationError', error.message, correlationId, error.details),
    };
  }
  if (error instanceof DataIntegrityError) {
    return {
      status: 502,
      body: createErrorResponse('DataIntegrityError', error.message, correlationId, error.details),
    };
  }
  if (error instanceof ListingsUnavailableError) {
    return {
      status: 503,
      body: createErrorResponse('UpstreamUnavailable', error.message, correlationId),
    };
  }
  if (isMalformedBody(error)) {
    return {
      status: 400,
      body: createErrorResponse('ValidationError', 'Request body is not valid JSON', correlationId),
    };
  }
  return {
    status: 500,
    body: createErrorResponse('InternalError', 'An unexpected error occurred', correlationId),
  };
}

/**
 * Final error-handling middleware
 */
export function createErrorHandler(logger?: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const { correlationId } = getRequestContext(req);
    const { status, body } = mapError(err, correlationId);
    const log = (logger ?? getLogger()).child(correlationId);

    if (status >= 500) {
      log.error(`${req.method} ${req.path} failed`, err instanceof Error ? err : undefined, { status });
    } else {
      log.warn(`${req.method} ${req.path} rejected`, { status, error: body.error });
    }

    res.status(status).json(body);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  const { correlationId } = getRequestContext(req);
  res.status(404).json(createErrorResponse('NotFound', 'The requested resource was not found', correlationId));
}
