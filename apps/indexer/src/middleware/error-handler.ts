import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger } from '../lib/logger.js';
import { IndexerError } from '../lib/errors.js';

const STATUS_BY_CODE: Record<string, ContentfulStatusCode> = {
  NOT_FOUND: 404,
  CHAIN_NOT_FOUND: 404,
  VALIDATION_ERROR: 422,
  TRANSIENT_STORE: 503,
};

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof IndexerError) {
    const status = STATUS_BY_CODE[err.code] ?? 500;
    logger.warn({ code: err.code, message: err.message, status, path: c.req.path }, 'Indexer error');
    return c.json({ error: { code: err.code, message: err.message, details: err.details } }, status);
  }

  // Zod validation error
  if (err.name === 'ZodError') {
    return c.json({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request data' } }, 422);
  }

  logger.error({ err, path: c.req.path, method: c.req.method }, 'Unhandled error');
  return c.json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } }, 500);
};
