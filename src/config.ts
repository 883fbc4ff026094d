import { tmpdir } from 'os';
import { join } from 'path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

loadEnv();

export interface IntegrationConfig {
  port: number;
  logLevel: LogLevel;
  /** AtomSpace builder base URL (graph construction). */
  builderUrl: string;
  minerUrl: string;
  /** Full annotation endpoint, not a base URL. */
  annotationUrl: string;
  builderTimeoutMs: number;
  minerTimeoutMs: number;
  annotationTimeoutMs: number;
  /** Kept well below the builder timeout: readiness is a single quick probe. */
  readinessTimeoutMs: number;
  /** Volume shared with the builder, where it drops generated artifacts by job id. */
  sharedOutputPath: string;
  tmpDir: string;
  maxUploadBytes: number;
  runHistoryLimit: number;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ATOMSPACE_API_URL: z.string().url(),
  NEURAL_MINER_URL: z.string().url(),
  ANNOTATION_SERVICE_URL: z.string().url(),
  ATOMSPACE_TIMEOUT_MS: positiveInt(1_800_000), // 30 minutes
  MINER_TIMEOUT_MS: positiveInt(600_000), // 10 minutes
  ANNOTATION_TIMEOUT_MS: positiveInt(300_000), // 5 minutes
  READINESS_TIMEOUT_MS: positiveInt(10_000),
  SHARED_OUTPUT_PATH: z.string().min(1).default('/shared/output'),
  INTEGRATION_TMP_DIR: z.string().min(1).optional(),
  MAX_UPLOAD_BYTES: positiveInt(100 * 1024 * 1024),
  RUN_HISTORY_LIMIT: positiveInt(200),
});

/** Empty strings count as unset so `FOO=` in a .env file falls back to the default. */
const dropEmpty = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '',
    ),
  );

const stripTrailingSlash = (url: string) => url.replace(/\/+$/, '');

/**
 * Load and validate service configuration.
 *
 * Downstream URLs have no defaults; a missing one is fatal at startup.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): IntegrationConfig => {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    builderUrl: stripTrailingSlash(vars.ATOMSPACE_API_URL),
    minerUrl: stripTrailingSlash(vars.NEURAL_MINER_URL),
    annotationUrl: vars.ANNOTATION_SERVICE_URL,
    builderTimeoutMs: vars.ATOMSPACE_TIMEOUT_MS,
    minerTimeoutMs: vars.MINER_TIMEOUT_MS,
    annotationTimeoutMs: vars.ANNOTATION_TIMEOUT_MS,
    readinessTimeoutMs: vars.READINESS_TIMEOUT_MS,
    sharedOutputPath: vars.SHARED_OUTPUT_PATH,
    tmpDir: vars.INTEGRATION_TMP_DIR ?? join(tmpdir(), 'integration-service'),
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    runHistoryLimit: vars.RUN_HISTORY_LIMIT,
  };
};
