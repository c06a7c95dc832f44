export enum ErrorCode {
  Configuration = 'CONFIGURATION_ERROR',
  Network = 'NETWORK_ERROR',
  Timeout = 'TIMEOUT_ERROR',
  Extraction = 'EXTRACTION_ERROR',
  Internal = 'INTERNAL_ERROR',
}

export class CrawlerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TimeoutError extends CrawlerError {
  constructor(message: string, timeoutMs: number) {
    super(ErrorCode.Timeout, `${message} (timeout: ${timeoutMs}ms)`);
  }
}

export class NetworkError extends CrawlerError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super(ErrorCode.Network, `Network error: ${message}${statusInfo}`, options);
    this.statusCode = statusCode;
  }
}

export class ExtractionError extends CrawlerError {
  constructor(message: string, url?: string) {
    const urlInfo = url ? ` for URL: ${url}` : '';
    super(ErrorCode.Extraction, `Content extraction failed: ${message}${urlInfo}`);
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(message: string) {
    super(ErrorCode.Configuration, `Configuration error: ${message}`);
  }
}

export function toCrawlerError(error: unknown, context?: string): CrawlerError {
  if (error instanceof CrawlerError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new CrawlerError(ErrorCode.Internal, `${prefix}${error.message}`, { cause: error });
  }

  return new CrawlerError(ErrorCode.Internal, `${prefix}Unknown error occurred`);
}
