import { Agent, interceptors, type Dispatcher } from 'undici';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import { TextDecoder } from 'util';
import type pino from 'pino';
import { MAX_REDIRECTIONS, USER_AGENT } from '../../config/constants';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { isHttpUrl } from '../../utils/urlValidator';
import { CrawlerError, NetworkError, TimeoutError } from '../errors';

const { redirect } = interceptors;

export interface FetchOptions {
  timeoutMs: number;
  userAgent?: string;
  logger?: pino.Logger;
  // Shared across a crawl so connections are reused; left open by fetchPage
  dispatcher?: Dispatcher;
}

export interface FetchResult {
  statusCode: number;
  contentType: string;
  // Empty for non-HTML responses, whose bodies are drained unread
  bodyText: string;
}

export type PageFetcher = (url: string, options: FetchOptions) => Promise<FetchResult>;

type ResponseHeaders = Record<string, string | string[] | undefined>;

function headerValue(headers: ResponseHeaders, name: string): string {
  const value = headers[name];
  return (Array.isArray(value) ? value.join(', ') : value) ?? '';
}

export function isHtmlContentType(contentType: string): boolean {
  return contentType.toLowerCase().includes('text/html');
}

export function assertSuccessStatus(result: FetchResult): void {
  if (result.statusCode < 200 || result.statusCode >= 300) {
    throw new NetworkError('HTTP error', result.statusCode);
  }
}

/** Redirect-following dispatcher, one per crawl. The caller destroys it. */
export function createDispatcher(): Dispatcher {
  return new Agent().compose(redirect({ maxRedirections: MAX_REDIRECTIONS }));
}

function charsetOf(contentType: string): string {
  const match = /charset=["']?([^;"'\s]+)/i.exec(contentType);
  return match ? match[1] : 'utf-8';
}

function decodeText(buf: Buffer, contentType: string, log: pino.Logger): string {
  const charset = charsetOf(contentType);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error) {
    log.debug({ charset, error }, 'Unknown charset, decoding as UTF-8');
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(buf);
}

function decodeBody(buf: Buffer, encoding: string, log: pino.Logger): Buffer {
  if (encoding.includes('br')) {
    log.debug({ compressedSize: buf.length }, 'Decompressing with brotli');
    return brotliDecompressSync(buf);
  }
  if (encoding.includes('gzip')) {
    log.debug({ compressedSize: buf.length }, 'Decompressing with gzip');
    return gunzipSync(buf);
  }
  if (encoding.includes('deflate')) {
    log.debug({ compressedSize: buf.length }, 'Decompressing with deflate');
    return inflateSync(buf);
  }
  return buf;
}

async function readResponse(
  dispatcher: Dispatcher,
  request: Dispatcher.RequestOptions,
  log: pino.Logger
): Promise<FetchResult> {
  const res = await dispatcher.request(request);
  const statusCode = res.statusCode;
  const contentType = headerValue(res.headers, 'content-type');

  if (!isHtmlContentType(contentType)) {
    await res.body.dump();
    return { statusCode, contentType, bodyText: '' };
  }

  const encoding = headerValue(res.headers, 'content-encoding').toLowerCase();
  const buf = decodeBody(Buffer.from(await res.body.arrayBuffer()), encoding, log);
  return { statusCode, contentType, bodyText: decodeText(buf, contentType, log) };
}

/**
 * GETs a page, following redirects, bounded by `timeoutMs` from request
 * start to the last body byte. Transport failures surface as
 * `NetworkError`, an elapsed timeout as `TimeoutError`. HTTP status is
 * returned, not checked. Without `options.dispatcher` a dispatcher is created
 * for this one request and destroyed afterwards.
 */
export async function fetchPage(url: string, options: FetchOptions): Promise<FetchResult> {
  const { timeoutMs } = options;

  if (!isHttpUrl(url)) {
    throw new NetworkError('Only http(s) schemes are allowed');
  }

  const log = options.logger ?? createChildLogger(generateCorrelationId());
  const { origin, pathname, search } = new URL(url);
  const controller = new AbortController();
  const ownsDispatcher = options.dispatcher === undefined;
  const dispatcher = options.dispatcher ?? createDispatcher();

  const headers: Record<string, string> = {
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'accept-encoding': 'gzip, br, deflate',
    'accept-language': 'en-US,en;q=0.9',
    'user-agent': options.userAgent ?? USER_AGENT,
  };

  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError('Request timed out', timeoutMs));
    }, timeoutMs);
  });

  try {
    const request: Dispatcher.RequestOptions = {
      origin,
      path: pathname + search,
      method: 'GET',
      headers,
      signal: controller.signal,
    };
    return await withTiming(
      log,
      'http.fetch',
      () => Promise.race([readResponse(dispatcher, request, log), timeout]),
      { url }
    );
  } catch (error) {
    if (error instanceof CrawlerError) throw error;
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError('Request timed out', timeoutMs);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(message, undefined, { cause: error });
  } finally {
    clearTimeout(timeoutId);
    if (ownsDispatcher) {
      try {
        await dispatcher.destroy();
      } catch (err) {
        log.debug({ error: err }, 'Dispatcher teardown failed');
      }
    }
  }
}
