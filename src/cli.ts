#!/usr/bin/env node

import { parseArgs } from 'util';
import {
  APP_NAME,
  APP_VERSION,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_START_URL,
  DEFAULT_TIMEOUT_SECONDS,
} from './config/constants';
import { resolveCrawlConfig, toTimeoutMs } from './config/crawlConfig';
import { crawlSite } from './core/crawl/crawlSession';
import { ConfigurationError } from './core/errors';
import { logger } from './utils/logger';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Crawl every same-domain page reachable from a start URL and write the main
content of each one to a single markdown file.

Usage: ${APP_NAME} [options]

Options:
  --start-url <url>    Root URL to start crawling from (default: ${DEFAULT_START_URL})
  --output, -o <file>  Output markdown file, truncated first (default: ${DEFAULT_OUTPUT_FILE})
  --timeout <seconds>  HTTP timeout per request (default: ${DEFAULT_TIMEOUT_SECONDS})
  --delay <ms>         Pause between requests (default: 0)
  --help, -h           Show help
  --version            Show version

Environment:
  CRAWL_START_URL, CRAWL_OUTPUT, REQUEST_TIMEOUT_SECONDS, CRAWL_DELAY_MS, LOG_LEVEL

Examples:
  ${APP_NAME} --start-url https://docs.example.com/ --output docs.md
  ${APP_NAME} --timeout 5 --delay 250
`;

interface ParsedArgs {
  values: {
    help?: boolean;
    version?: boolean;
    'start-url'?: string;
    output?: string;
    timeout?: string;
    delay?: string;
  };
  positionals: string[];
}

function parseCliArgs(argv: string[]): ParsedArgs {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
      'start-url': { type: 'string' },
      output: { type: 'string', short: 'o' },
      timeout: { type: 'string' },
      delay: { type: 'string' },
    },
    allowPositionals: false,
  });
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : 'invalid arguments'}`);
    console.error('Use --help for usage information.');
    return 1;
  }
  const { values } = args;

  if (values.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    return 0;
  }

  try {
    const config = resolveCrawlConfig({
      startUrl: values['start-url'],
      outputPath: values.output,
      timeoutSeconds: values.timeout,
      delayMs: values.delay,
    });

    const summary = await crawlSite({
      startUrl: config.startUrl,
      outputPath: config.outputPath,
      timeoutMs: toTimeoutMs(config),
      delayMs: config.delayMs,
    });

    console.log(
      `Done. Wrote pages=${summary.pagesWritten} words=${summary.wordsProcessed} to ${summary.outputPath}`
    );
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return 1;
    }
    logger.error({ error }, 'Crawl failed');
    console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
    return 1;
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
      process.exitCode = 1;
    });
}
