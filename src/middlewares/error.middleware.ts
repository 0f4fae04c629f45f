import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError, ConflictError } from '../utils/errors';
import { translateDatabaseError } from '../connections/db/integrity';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * body-parser marks malformed payloads with `type` and a 4xx `status`
 */
const isBodyParseError = (err: unknown): err is Error & { type: string; status: number } =>
  err instanceof Error &&
  'type' in err &&
  typeof err.type === 'string' &&
  'status' in err &&
  typeof err.status === 'number' &&
  err.status >= 400 &&
  err.status < 500;

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  logger.debug('[Error Handler]', {
    message: err instanceof Error ? err.message : String(err),
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  if (err instanceof ZodError) {
    ResponseHandler.validationError(res, err.errors);
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode === 401) {
      ResponseHandler.unauthorized(res, err.message);
      return;
    }
    ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
    return;
  }

  if (err instanceof multer.MulterError) {
    ResponseHandler.badRequest(res, err.message, { field: err.field });
    return;
  }

  if (isBodyParseError(err)) {
    ResponseHandler.badRequest(res, 'Malformed request body');
    return;
  }

  // Integrity violations that escaped the write boundary
  const translated = translateDatabaseError(err);
  if (translated instanceof ConflictError) {
    ResponseHandler.conflict(res, translated.message, translated.details);
    return;
  }

  ResponseHandler.internalError(res, 'Internal server error', err);
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Not Found');
};
