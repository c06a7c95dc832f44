export { crawlSite, CrawlSession } from './core/crawl/crawlSession';
export type { CrawlOptions, CrawlProgress, CrawlSummary } from './core/crawl/crawlSession';
export { Frontier } from './core/crawl/frontier';
export { discoverLinks } from './core/crawl/linkDiscovery';
export {
  extractContent,
  removeBoilerplate,
  selectContentContainer,
} from './core/content/htmlContentExtractor';
export { extractMarkdown, inferCodeLanguage } from './core/content/extractors/markdownExtractor';
export { cleanText, countWords } from './core/content/extractors/textCleaner';
export { HtmlDocument } from './core/content/htmlDocument';
export { createDispatcher, fetchPage, isHtmlContentType } from './core/content/httpContentFetcher';
export type { FetchOptions, FetchResult, PageFetcher } from './core/content/httpContentFetcher';
export { PageWriter, formatPageRecord } from './core/output/pageWriter';
export type { PageRecord } from './core/output/pageWriter';
export { resolveCrawlConfig } from './config/crawlConfig';
export type { CrawlConfig } from './config/crawlConfig';
export { normalizeUrl, isHttpUrl, isSameDomain, getNetworkLocation } from './utils/urlValidator';
export {
  CrawlerError,
  ConfigurationError,
  ExtractionError,
  NetworkError,
  TimeoutError,
  ErrorCode,
} from './core/errors';
