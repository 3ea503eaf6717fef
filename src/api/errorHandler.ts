/**
 * Maps every error to the `{ success: false, error }` payload
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { AppError, BadRequestError, PayloadTooLargeError, errorMessage } from '../domain/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('Api');

/**
 * Translate body-parser failures into our own error types
 */
function fromBodyParser(error: unknown): AppError | undefined {
  if (typeof error !== 'object' || error === null || !('type' in error)) return undefined;
  if (error.type === 'entity.too.large') return new PayloadTooLargeError();
  if (error.type === 'entity.parse.failed') return new BadRequestError('Malformed JSON body');
  return undefined;
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ success: false, error: 'Endpoint not found' });
};

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const known = error instanceof AppError ? error : fromBodyParser(error);

  if (known) {
    if (known.status >= 500) {
      log.error(`${req.method} ${req.path} failed: ${known.message}`);
    } else {
      log.warn(`${req.method} ${req.path} rejected: ${known.message}`);
    }
    res.status(known.status).json({ success: false, error: known.message });
    return;
  }

  log.error(`${req.method} ${req.path} crashed: ${errorMessage(error)}`, {
    stack: error instanceof Error ? error.stack : undefined
  });
  res.status(500).json({ success: false, error: 'Internal server error' });
};
