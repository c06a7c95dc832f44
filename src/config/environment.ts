import { z } from 'zod';
import fs from 'fs';
import { DEFAULT_TIMEOUT_SECONDS } from './constants';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvironmentSchema = z.object({
  // Crawl defaults, overridable from the command line
  CRAWL_START_URL: z.string().min(1).optional(),
  CRAWL_OUTPUT: z.string().min(1).optional(),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  CRAWL_DELAY_MS: z.coerce.number().int().min(0).default(0),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);
    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

// Check if running in Docker container
export function isRunningInDocker(): boolean {
  if (process.env.DOCKER_CONTAINER) {
    return true;
  }

  try {
    fs.accessSync('/.dockerenv');
    return true;
  } catch {
    return false;
  }
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
