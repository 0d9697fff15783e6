import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { HttpError, isPgError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('api');

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof multer.MulterError) {
    return res.status(400).json({
      message: 'upload_rejected',
      detail: err.message,
    });
  }

  if (isPgError(err)) {
    if (err.code === '23505') {
      return res.status(409).json({
        message: 'conflict',
        detail: err.detail,
      });
    }
    if (err.code === '23503') {
      return res.status(400).json({
        message: 'invalid_reference',
        detail: err.detail,
      });
    }
  }

  if (err instanceof Error) {
    logger.error(err.message);
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
