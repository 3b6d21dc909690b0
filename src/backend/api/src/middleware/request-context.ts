/**
 * Request Context Middleware
 *
 * Assigns every request a correlation ID (taken from the X-Correlation-ID
 * header when the caller sends one) and echoes it on the response.
 */

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
}

const contexts = new WeakMap<Request, RequestContext>();

function headerValue(req: Request): string | undefined {
  const value = req.get(CORRELATION_ID_HEADER)?.trim();
  return value ? value : undefined;
}

/**
 * Context of a request; created on first access
 */
export function getRequestContext(req: Request): RequestContext {
  let context = contexts.get(req);
  if (!context) {
    context = {
      correlationId: headerValue(req) ?? uuidv4(),
      requestId: uuidv4(),
      startTime: Date.now(),
    };
    contexts.set(req, context);
  }
  return context;
}

export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const context = getRequestContext(req);
  res.setHeader(CORRELATION_ID_HEADER, context.correlationId);
  res.setHeader('X-Request-ID', context.requestId);
  next();
}
