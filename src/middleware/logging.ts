import { Request, Response, NextFunction } from 'express';
import { generateRequestId, createChildLogger, Logger } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      log?: Logger;
    }
  }
}

export const loggingMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const headerId = req.headers['x-request-id'];
  const requestId = (typeof headerId === 'string' && headerId) || generateRequestId();
  const log = createChildLogger(requestId);
  req.requestId = requestId;
  req.log = log;

  res.setHeader('x-request-id', requestId);

  const start = Date.now();
  log.info({ method: req.method, url: req.originalUrl, ip: req.ip }, 'request started');

  res.on('finish', () => {
    log.info(
      { method: req.method, url: req.originalUrl, status: res.statusCode, duration: Date.now() - start },
      'request completed'
    );
  });

  next();
};
