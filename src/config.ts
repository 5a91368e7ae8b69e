import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';
import { err, ok, type MatchingOptions, type Result } from './core/types.js';

const envSchema = z.object({
  // Catalogue
  JOB_CATALOGUE_PATH: z.string().min(1).default('data/job_info.db'),

  // Matching
  MATCH_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.2),
  MATCH_MAX_CANDIDATES: z.coerce.number().int().positive().default(10),
  MATCH_EXAMPLE_LIMIT: z.coerce.number().int().nonnegative().default(5),
  MATCH_DESCRIPTION_LIMIT: z.coerce.number().int().positive().default(300),
  MATCH_CURRENCY: z.string().length(3).default('USD'),

  // Major-level fan-out
  MATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  MATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Validate configuration from an environment map. Only entry points call
 * this; services receive the resulting values through their constructors.
 */
export function loadConfig(env: Record<string, string | undefined>): Result<AppConfig, string> {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('Config', 'Invalid environment variables', issues);
    return err(issues.join('; '));
  }

  return ok(result.data);
}

/**
 * Load .env into process.env, then validate it
 */
export function loadConfigFromEnv(): Result<AppConfig, string> {
  logger.info('Config', 'Loading environment variables...');
  dotenvConfig();
  const result = loadConfig(process.env);
  if (result.ok) {
    logger.info('Config', 'Environment loaded successfully');
  }
  return result;
}

export function toMatchingOptions(config: AppConfig): MatchingOptions {
  return {
    threshold: config.MATCH_SIMILARITY_THRESHOLD,
    maxCandidates: config.MATCH_MAX_CANDIDATES,
    exampleLimit: config.MATCH_EXAMPLE_LIMIT,
    descriptionLimit: config.MATCH_DESCRIPTION_LIMIT,
    currency: config.MATCH_CURRENCY,
  };
}
