import type pino from 'pino';
import type { Dispatcher } from 'undici';
import { USER_AGENT } from '../../config/constants';
import { getLogger, generateCorrelationId } from '../../utils/logger';
import { getNetworkLocation, isHttpUrl, normalizeUrl } from '../../utils/urlValidator';
import { extractContent } from '../content/htmlContentExtractor';
import type { ExtractionResult } from '../content/types/extraction';
import {
  assertSuccessStatus,
  createDispatcher,
  fetchPage,
  isHtmlContentType,
  type PageFetcher,
} from '../content/httpContentFetcher';
import { ConfigurationError, toCrawlerError } from '../errors';
import { PageWriter } from '../output/pageWriter';
import { Frontier } from './frontier';
import { discoverLinks } from './linkDiscovery';

export interface CrawlProgress {
  pagesWritten: number;
  wordsProcessed: number;
  pageWords: number;
  url: string;
}

export interface CrawlSummary {
  pagesWritten: number;
  wordsProcessed: number;
  // Non-HTML responses, dropped without a warning
  pagesSkipped: number;
  // Fetch or parse failures, each logged as a warning
  pagesFailed: number;
  outputPath: string;
}

export interface CrawlOptions {
  startUrl: string;
  outputPath: string;
  timeoutMs: number;
  delayMs?: number;
  userAgent?: string;
  fetcher?: PageFetcher;
  logger?: pino.Logger;
  onProgress?: (progress: CrawlProgress) => void;
  sleep?: (ms: number) => Promise<void>;
}

type PageOutcome = 'written' | 'skipped' | 'failed';

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * One breadth-first crawl of a site into a single markdown file.
 *
 * The session owns the frontier, the counters and the open output file;
 * `open` validates the start URL before anything touches the network or the
 * filesystem, and `close` releases the file whether or not `run` finished.
 */
export class CrawlSession {
  readonly frontier: Frontier;
  readonly rootNetworkLocation: string;

  private pagesWritten = 0;
  private wordsProcessed = 0;
  private pagesSkipped = 0;
  private pagesFailed = 0;

  private readonly fetcher: PageFetcher;
  // Only created for the built-in fetcher; closed with the session
  private dispatcher: Dispatcher | undefined;
  private readonly log: pino.Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  private constructor(
    private readonly options: CrawlOptions,
    startUrl: string,
    private readonly writer: PageWriter
  ) {
    this.frontier = new Frontier(startUrl);
    this.rootNetworkLocation = getNetworkLocation(startUrl);
    this.fetcher = options.fetcher ?? fetchPage;
    this.dispatcher = options.fetcher ? undefined : createDispatcher();
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? getLogger()).child({ correlationId: generateCorrelationId() });
  }

  static async open(options: CrawlOptions): Promise<CrawlSession> {
    if (!isHttpUrl(options.startUrl)) {
      throw new ConfigurationError('start URL must begin with http:// or https://');
    }
    const startUrl = normalizeUrl(options.startUrl, options.startUrl);
    if (!startUrl) {
      throw new ConfigurationError(`could not normalize start URL ${options.startUrl}`);
    }

    const writer = await PageWriter.open(options.outputPath);
    return new CrawlSession(options, startUrl, writer);
  }

  async run(): Promise<CrawlSummary> {
    const delayMs = this.options.delayMs ?? 0;
    this.log.info(
      { event: 'crawl_start', startUrl: this.frontier.pending()[0], outputPath: this.writer.path },
      'Starting crawl'
    );

    for (let url = this.frontier.dequeue(); url !== undefined; url = this.frontier.dequeue()) {
      if (this.frontier.hasVisited(url)) continue;
      this.frontier.markVisited(url);

      const outcome = await this.processPage(url);
      if (outcome === 'skipped') this.pagesSkipped++;
      if (outcome === 'failed') this.pagesFailed++;

      if (delayMs > 0) await this.sleep(delayMs);
    }

    const summary = this.summary();
    this.log.info({ event: 'crawl_complete', ...summary }, 'Crawl finished');
    return summary;
  }

  summary(): CrawlSummary {
    return {
      pagesWritten: this.pagesWritten,
      wordsProcessed: this.wordsProcessed,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      outputPath: this.writer.path,
    };
  }

  async close(): Promise<void> {
    try {
      await this.writer.close();
    } finally {
      const dispatcher = this.dispatcher;
      this.dispatcher = undefined;
      if (dispatcher) await dispatcher.destroy();
    }
  }

  private async processPage(url: string): Promise<PageOutcome> {
    let html: string;
    try {
      const result = await this.fetcher(url, {
        timeoutMs: this.options.timeoutMs,
        userAgent: this.options.userAgent ?? USER_AGENT,
        logger: this.log,
        dispatcher: this.dispatcher,
      });
      if (!isHtmlContentType(result.contentType)) {
        this.log.debug({ url, contentType: result.contentType }, 'Skipping non-HTML response');
        return 'skipped';
      }
      assertSuccessStatus(result);
      html = result.bodyText;
    } catch (error) {
      this.log.warn({ url, error: toCrawlerError(error, 'fetch').message }, `Failed ${url}`);
      return 'failed';
    }

    let extraction: ExtractionResult;
    try {
      extraction = extractContent(html, { url, logger: this.log });
    } catch (error) {
      this.log.warn({ url, error: toCrawlerError(error, 'extract').message }, `Failed ${url}`);
      return 'failed';
    }

    // Write errors are not per-page failures; they end the crawl
    await this.writer.writePage({
      title: extraction.title,
      sourceUrl: url,
      body: extraction.markdownContent,
    });

    this.pagesWritten++;
    this.wordsProcessed += extraction.wordCount;
    const progress: CrawlProgress = {
      pagesWritten: this.pagesWritten,
      wordsProcessed: this.wordsProcessed,
      pageWords: extraction.wordCount,
      url,
    };
    this.log.info({ event: 'page_written', ...progress }, 'Page written');
    this.options.onProgress?.(progress);

    for (const next of discoverLinks(url, extraction.linkHrefs, this.rootNetworkLocation, this.frontier)) {
      this.frontier.enqueue(next);
    }
    return 'written';
  }
}

/** Opens a session, crawls until the frontier drains, and always closes the output file. */
export async function crawlSite(options: CrawlOptions): Promise<CrawlSummary> {
  const session = await CrawlSession.open(options);
  try {
    return await session.run();
  } finally {
    await session.close();
  }
}
