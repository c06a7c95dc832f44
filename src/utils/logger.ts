import pino from 'pino';
import { APP_NAME } from '../config/constants';
import { getEnvironment } from '../config/environment';
import { getTransport } from './getTransport';

function createLogger(): pino.Logger {
  const env = getEnvironment();
  const defaultLevel = env.NODE_ENV === 'development' ? 'debug' : 'info';
  const transport = getTransport();
  const options: pino.LoggerOptions = {
    name: APP_NAME,
    level: env.LOG_LEVEL ?? defaultLevel,
  };

  // Without a transport pino writes to stdout; keep stdout for the user-facing lines
  return transport ? pino({ ...options, transport }) : pino(options, pino.destination(2));
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

export const logger: pino.Logger = new Proxy({} as pino.Logger, {
  get: (_target, prop: string | symbol) => {
    const real = getLogger();

    const value = (real as unknown as Record<string | symbol, unknown>)[prop];
    if (typeof value === 'function') {
      return (value as (...args: unknown[]) => unknown).bind(real);
    }
    return value as unknown;
  },
});

// Helper function to create child loggers with correlation IDs
export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

// Helper function to generate correlation IDs
export function generateCorrelationId(): string {
  return `crawl-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.debug({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.debug({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
