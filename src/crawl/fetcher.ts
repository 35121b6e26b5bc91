import Parser from 'rss-parser';
import type { CrawlerSettings } from '../shared/config.js';
import { FetchError, type FetchErrorKind } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';

export interface FetcherOptions {
  timeoutMs: number;
  /** Attempts per request when the caller does not pass one. */
  retryAttempts: number;
  /** Fixed delay between attempts. */
  retryDelayMs: number;
  userAgent: string;
  sleep?: (ms: number) => Promise<void>;
}

export interface FeedEntry {
  title?: string;
  link?: string;
  guid?: string;
  author?: string;
  published_at?: string;
  excerpt?: string;
}

export interface FeedDocument {
  title?: string;
  entries: FeedEntry[];
}

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';
const JSON_ACCEPT = 'application/json, */*;q=0.5';

type AttemptResult = { kind: 'ok'; body: string } | { kind: 'not_found' };

const feedParser = new Parser();

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Network retrieval with a per-attempt timeout and fixed-delay retries.
 *
 * A 404 is a definitive answer and resolves to `null` after one attempt.
 * Every other failure (non-2xx status, timeout, transport error) is retried
 * until the attempt budget is spent, then thrown as a {@link FetchError}.
 */
export class Fetcher {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: FetcherOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  static fromConfig(crawler: CrawlerSettings): Fetcher {
    return new Fetcher({
      timeoutMs: crawler.timeout_ms,
      retryAttempts: crawler.retry_attempts,
      retryDelayMs: crawler.retry_delay_ms,
      userAgent: crawler.user_agent,
    });
  }

  async fetchText(url: string, maxRetries?: number): Promise<string | null> {
    const result = await this.request(url, HTML_ACCEPT, maxRetries);
    return result?.body ?? null;
  }

  async fetchJson(url: string, maxRetries?: number): Promise<unknown> {
    const result = await this.request(url, JSON_ACCEPT, maxRetries);
    if (!result) return null;
    try {
      const parsed: unknown = JSON.parse(result.body);
      return parsed;
    } catch (err) {
      throw new FetchError(
        `Invalid JSON from ${url}: ${err instanceof Error ? err.message : String(err)}`,
        'parse',
        { url, attempts: result.attempts },
      );
    }
  }

  async fetchFeed(url: string, maxRetries?: number): Promise<FeedDocument | null> {
    const result = await this.request(url, FEED_ACCEPT, maxRetries);
    if (!result) return null;

    let feed: Awaited<ReturnType<typeof feedParser.parseString>>;
    try {
      feed = await feedParser.parseString(result.body);
    } catch (err) {
      throw new FetchError(
        `Invalid feed from ${url}: ${err instanceof Error ? err.message : String(err)}`,
        'parse',
        { url, attempts: result.attempts },
      );
    }

    const entries: FeedEntry[] = (feed.items ?? []).map((entry) => {
      const fields: Record<string, unknown> = entry;
      return {
        title: optionalString(entry.title),
        link: optionalString(entry.link),
        guid: optionalString(entry.guid) ?? optionalString(fields['id']),
        author: optionalString(entry.creator) ?? optionalString(fields['author']),
        published_at: optionalString(entry.isoDate) ?? optionalString(entry.pubDate),
        excerpt: optionalString(entry.contentSnippet)?.slice(0, 500),
      };
    });

    return { title: optionalString(feed.title), entries };
  }

  private async request(
    url: string,
    accept: string,
    maxRetries?: number,
  ): Promise<{ body: string; attempts: number } | null> {
    const attempts = Math.max(1, maxRetries ?? this.options.retryAttempts);
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const result = await this.attempt(url, accept, attempt);
        if (result.kind === 'not_found') {
          logger.debug({ url }, 'Fetch returned 404');
          return null;
        }
        return { body: result.body, attempts: attempt };
      } catch (err) {
        lastError =
          err instanceof FetchError
            ? err
            : new FetchError(`Fetch failed for ${url}: ${String(err)}`, 'network', { url, attempts: attempt });

        if (attempt < attempts) {
          logger.warn(
            { url, attempt, maxAttempts: attempts, error: lastError.message, nextDelayMs: this.options.retryDelayMs },
            'Fetch attempt failed, retrying',
          );
          await this.sleep(this.options.retryDelayMs);
        }
      }
    }

    const final = lastError ?? new FetchError(`Fetch failed for ${url}`, 'network', { url, attempts });
    logger.warn({ url, attempts, error: final.message }, 'Fetch attempts exhausted');
    throw final;
  }

  private async attempt(url: string, accept: string, attempt: number): Promise<AttemptResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: accept,
          'Accept-Language': 'en-US,en;q=0.5',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.status === 404) {
        await response.body?.cancel();
        return { kind: 'not_found' };
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new FetchError(`Fetch failed: ${response.status} from ${url}`, 'http', {
          url,
          attempts: attempt,
          status: response.status,
        });
      }

      return { kind: 'ok', body: await response.text() };
    } catch (err) {
      if (err instanceof FetchError) throw err;
      const kind: FetchErrorKind =
        err instanceof Error && err.name === 'AbortError' ? 'timeout' : 'network';
      const message =
        kind === 'timeout'
          ? `Fetch timed out after ${this.options.timeoutMs}ms: ${url}`
          : `Fetch failed: ${err instanceof Error ? err.message : String(err)}`;
      throw new FetchError(message, kind, { url, attempts: attempt });
    } finally {
      clearTimeout(timer);
    }
  }
}
