import { z } from 'zod';
import { LOG_LEVELS, LogLevel, defaultLogLevel, logger } from './logger';

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  TEMP_BUILD_DIR: z.string().min(1).default('./temp_builds'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(100 * 1024 * 1024),
  BUILD_RATE_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(30),
  DOCKER_BIN: z.string().min(1).default('docker'),
  DOCKER_MEMORY_LIMIT: z.string().regex(/^\d+[bkmg]?$/i, 'expected a size such as 512m or 2g').default('2g'),
  DOCKER_CPU_LIMIT: z.coerce.number().positive().default(2),
  DOCKER_PIDS_LIMIT: z.coerce.number().int().positive().default(256),
  DOCKER_NETWORK: z.enum(['bridge', 'none', 'host']).default('bridge'),
  PREPULL_IMAGES: booleanFlag,
  ALLOWED_ORIGINS: z.string().optional(),
  TRUST_PROXY: booleanFlag,
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: LogLevel;
  tempBuildDir: string;
  maxUploadBytes: number;
  buildsPerHour: number;
  prepullImages: boolean;
  allowedOrigins: string[] | null;
  trustProxy: boolean;
  docker: {
    bin: string;
    memory: string;
    cpus: number;
    pidsLimit: number;
    network: 'bridge' | 'none' | 'host';
  };
}

// Empty strings in .env files mean "unset"
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    problems.forEach((p) => logger.error(`Invalid env var ${p}`));
    throw new ConfigError(problems);
  }

  const e = parsed.data;
  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL ?? defaultLogLevel(e.NODE_ENV),
    tempBuildDir: e.TEMP_BUILD_DIR,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    buildsPerHour: e.BUILD_RATE_LIMIT_PER_HOUR,
    prepullImages: e.PREPULL_IMAGES,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
      : null,
    trustProxy: e.TRUST_PROXY,
    docker: Object.freeze({
      bin: e.DOCKER_BIN,
      memory: e.DOCKER_MEMORY_LIMIT,
      cpus: e.DOCKER_CPU_LIMIT,
      pidsLimit: e.DOCKER_PIDS_LIMIT,
      network: e.DOCKER_NETWORK,
    }),
  });
};
