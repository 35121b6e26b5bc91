export class CrawlkeeperError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CrawlkeeperError';
  }
}

export class ConfigError extends CrawlkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends CrawlkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SourceError extends CrawlkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class NotFoundError extends CrawlkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export type FetchErrorKind = 'timeout' | 'http' | 'network' | 'parse';

/**
 * Raised by the fetcher once a URL has failed on every attempt, or when a
 * response body cannot be decoded into the requested shape.
 */
export class FetchError extends CrawlkeeperError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    details: { url: string; attempts: number; status?: number },
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class AdapterError extends CrawlkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ADAPTER_ERROR', details);
    this.name = 'AdapterError';
  }
}

export class CrawlInProgressError extends CrawlkeeperError {
  constructor(sourceName: string) {
    super(`A crawl is already running for ${sourceName}`, 'CRAWL_IN_PROGRESS', { source: sourceName });
    this.name = 'CrawlInProgressError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
