import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createBuildRouter } from './api/build.routes';
import { createHealthRouter } from './api/health.routes';
import { errorHandler } from './middleware/errorHandler';
import { loggingMiddleware } from './middleware/logging';
import { metricsMiddleware } from './middleware/metrics';
import { BuildEngine } from './builder/engine';
import { ArchiveStore } from './intake/archiveStore';
import { ContainerRuntime } from './runtime/types';
import { AppConfig } from './utils/env';

export interface AppDeps {
  config: AppConfig;
  runtime: ContainerRuntime;
  engine: BuildEngine;
  store: ArchiveStore;
}

// CORS configuration - restrict to allowed origins
const allowedOrigins = (config: AppConfig): string[] | boolean => {
  if (config.allowedOrigins) return config.allowedOrigins;
  if (config.nodeEnv === 'development') {
    return ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'];
  }
  return false;
};

export const createApp = ({ config, runtime, engine, store }: AppDeps): Express => {
  const app = express();

  if (config.trustProxy) {
    app.set('trust proxy', 1);
  }

  app.use(helmet());
  app.use(cors({
    origin: allowedOrigins(config),
    methods: ['GET', 'POST', 'OPTIONS'],
  }));
  app.use(loggingMiddleware);
  app.use(metricsMiddleware);

  app.use('/api', createHealthRouter(runtime));
  app.use('/api', createBuildRouter({ engine, store }, {
    maxUploadBytes: config.maxUploadBytes,
    buildsPerHour: config.buildsPerHour,
  }));

  // Global error handler - must be after routes
  app.use(errorHandler);

  return app;
};
