import { Response } from 'express';
import { AppError, toError } from '../domain/common/Errors';
import { ILogger } from '../domain/common/ILogger';

/**
 * Render an error thrown by a service. AppErrors keep their status and
 * code; anything else becomes a 500 INTERNAL_ERROR.
 */
export function handleError(err: unknown, res: Response, logger?: ILogger) {
  if (err instanceof AppError) {
    return res.status(err.statusCode).json(err.toJSON());
  }
  const error = toError(err);
  logger?.error('Unhandled route error', error);
  return res.status(500).json({
    error: true,
    message: error.message,
    code: 'INTERNAL_ERROR'
  });
}
