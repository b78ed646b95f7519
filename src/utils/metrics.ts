import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

collectDefaultMetrics({ register: registry });

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 30, 120, 600],
  registers: [registry],
});

export type BuildMetricStatus = 'success' | 'failed' | 'error' | 'rejected';

export const buildsTotal = new Counter({
  name: 'builds_total',
  help: 'Total builds by outcome',
  labelNames: ['project_type', 'status'],
  registers: [registry],
});

export const buildsInProgress = new Gauge({
  name: 'builds_in_progress',
  help: 'Builds currently holding an environment',
  labelNames: ['project_type'],
  registers: [registry],
});

export const buildDuration = new Histogram({
  name: 'build_duration_seconds',
  help: 'Build duration in seconds, provisioning through teardown',
  labelNames: ['project_type', 'status'],
  buckets: [5, 15, 30, 60, 120, 300, 600, 1200, 1800],
  registers: [registry],
});

export const getMetrics = async () => registry.metrics();
export const getContentType = () => registry.contentType;
