import { z } from 'zod';
import { ConfigurationError } from '../core/errors';
import { isHttpUrl } from '../utils/urlValidator';
import { DEFAULT_OUTPUT_FILE, DEFAULT_START_URL } from './constants';
import { getEnvironment } from './environment';

const CrawlConfigSchema = z.object({
  startUrl: z.string().min(1, 'start URL is required'),
  outputPath: z.string().min(1, 'output path is required'),
  timeoutSeconds: z.coerce.number().positive('timeout must be a positive number of seconds'),
  delayMs: z.coerce.number().int().min(0, 'delay must not be negative'),
});

export type CrawlConfig = z.infer<typeof CrawlConfigSchema>;

export interface CrawlConfigOverrides {
  startUrl?: string;
  outputPath?: string;
  timeoutSeconds?: string | number;
  delayMs?: string | number;
}

/**
 * Layers command-line overrides on top of the environment and the built-in
 * defaults. Throws `ConfigurationError` for invalid values, including a start
 * URL without an http(s) scheme.
 */
export function resolveCrawlConfig(overrides: CrawlConfigOverrides = {}): CrawlConfig {
  const env = getEnvironment();
  const parsed = CrawlConfigSchema.safeParse({
    startUrl: overrides.startUrl ?? env.CRAWL_START_URL ?? DEFAULT_START_URL,
    outputPath: overrides.outputPath ?? env.CRAWL_OUTPUT ?? DEFAULT_OUTPUT_FILE,
    timeoutSeconds: overrides.timeoutSeconds ?? env.REQUEST_TIMEOUT_SECONDS,
    delayMs: overrides.delayMs ?? env.CRAWL_DELAY_MS,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(issues.join('; '));
  }

  if (!isHttpUrl(parsed.data.startUrl)) {
    throw new ConfigurationError('start URL must begin with http:// or https://');
  }

  return parsed.data;
}

export function toTimeoutMs(config: Pick<CrawlConfig, 'timeoutSeconds'>): number {
  return Math.round(config.timeoutSeconds * 1000);
}
