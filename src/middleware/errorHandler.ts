import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { logger } from '../utils/logger';

// Sanitize error messages for production
export const sanitizeError = (error: Error): string => {
  if (error.name === 'ValidationError' || error.name === 'ZodError') {
    return 'Invalid request data';
  }
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 'Uploaded file is too large' : 'Invalid multipart upload';
  }
  if (error.message?.includes('ENOENT')) {
    return 'Resource not found';
  }
  if (error.message?.includes('EACCES') || error.message?.includes('EPERM')) {
    return 'Access denied';
  }
  return 'An unexpected error occurred';
};

export const statusCodeFor = (error: Error): number => {
  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }
  const statusCode: unknown = Reflect.get(error, 'statusCode') ?? Reflect.get(error, 'status');
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600) {
    return statusCode;
  }
  return 500;
};

// Global error handler middleware
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = statusCodeFor(err);
  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error({ err, method: req.method, path: req.path }, 'Unhandled request error');
  } else {
    log.warn({ error: err.message, method: req.method, path: req.path }, 'Request rejected');
  }

  const isDev = process.env.NODE_ENV === 'development';
  res.status(statusCode).json({
    error: isDev ? err.message : sanitizeError(err),
    ...(isDev && { stack: err.stack }),
  });
};
