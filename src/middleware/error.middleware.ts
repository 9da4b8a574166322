import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError } from '../utils/errors';
import { metrics } from '../utils/metrics';
import { ApiResponse } from '../types/api.types';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response<ApiResponse<never>>,
  next: NextFunction
) => {
  if (res.headersSent) {
    return next(err);
  }

  let statusCode = 500;
  let code = 'INTERNAL_ERROR';
  let message = 'Internal server error';

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;
  } else if (err instanceof multer.MulterError) {
    statusCode = 400;
    code = err.code;
    message = err.message;
  } else if (err instanceof SyntaxError && 'body' in err) {
    statusCode = 400;
    code = 'INVALID_JSON';
    message = 'Request body is not valid JSON';
  }

  metrics.recordError(err instanceof Error ? err.name : 'UnknownError');

  if (statusCode >= 500) {
    console.error('Unhandled error:', err);
  }

  res.status(statusCode).json({
    success: false,
    error: { message, code },
  });
};
