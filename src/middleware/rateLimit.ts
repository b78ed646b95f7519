import { Request, Response } from 'express';
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';

export interface BuildRateLimitOptions {
  buildsPerHour: number;
}

// Build responses are plain text, so the rejection is too
export const rejectBuild = (_req: Request, res: Response): void => {
  res
    .status(429)
    .type('text/plain')
    .send('Error: Too many build requests from this address. Please try again later.');
};

// Each build holds a container for its whole duration
export const createBuildRateLimit = ({ buildsPerHour }: BuildRateLimitOptions): RateLimitRequestHandler =>
  rateLimit({
    windowMs: 60 * 60 * 1000,
    limit: buildsPerHour,
    handler: rejectBuild,
    standardHeaders: true,
    legacyHeaders: false,
  });

// Health and metrics endpoints
export const apiRateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  message: { error: 'Too many requests, please try again later' },
  standardHeaders: true,
  legacyHeaders: false,
});
