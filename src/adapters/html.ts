import { JSDOM } from 'jsdom';
import type { SourceAdapter, ItemData } from './adapter.js';
import type { SourceConfig } from '../source/types.js';
import type { Fetcher } from '../crawl/fetcher.js';
import { extractArticle } from './article.js';
import { numberSetting, stringSetting } from './settings.js';
import { AdapterError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

function compilePattern(source: SourceConfig): RegExp | null {
  const pattern = stringSetting(source.settings, 'link_pattern');
  if (!pattern) return null;
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new AdapterError(`Invalid link_pattern for ${source.name}: ${pattern}`, {
      source: source.name,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Extract same-host article links from a listing page.
 */
export function extractLinks(html: string, pageUrl: string, pattern: RegExp | null): string[] {
  const dom = new JSDOM(html, { url: pageUrl });
  const page = new URL(pageUrl);
  const links: string[] = [];
  const seen = new Set<string>([page.toString()]);

  for (const anchor of Array.from(dom.window.document.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href');
    if (!href) continue;

    let url: URL;
    try {
      url = new URL(href, pageUrl);
    } catch {
      continue;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') continue;
    if (url.hostname !== page.hostname) continue;
    url.hash = '';

    const absolute = url.toString();
    if (seen.has(absolute)) continue;
    if (pattern && !pattern.test(absolute)) continue;
    seen.add(absolute);
    links.push(absolute);
  }

  dom.window.close();
  return links;
}

/**
 * Discovers candidates by scraping anchors from a listing page.
 *
 * Settings: `list_path` (joined onto `base_url`), `link_pattern` (regex the
 * absolute URL must match), `min_body_chars`.
 */
export class HtmlListAdapter implements SourceAdapter {
  readonly name = 'html';

  constructor(private readonly fetcher: Fetcher) {}

  async listCandidates(source: SourceConfig, limit?: number): Promise<string[]> {
    const pattern = compilePattern(source);
    const listUrl = new URL(stringSetting(source.settings, 'list_path') ?? '', source.base_url).toString();

    const html = await this.fetcher.fetchText(listUrl);
    if (html === null) {
      logger.warn({ source: source.name, listUrl }, 'Listing page not found');
      return [];
    }

    const links = extractLinks(html, listUrl, pattern);
    logger.debug({ source: source.name, count: links.length }, 'Listing candidates found');
    return limit !== undefined ? links.slice(0, limit) : links;
  }

  async parseItem(identifier: string, source: SourceConfig): Promise<ItemData | null> {
    const html = await this.fetcher.fetchText(identifier);
    if (html === null) return null;
    return extractArticle(html, identifier, {
      minBodyChars: numberSetting(source.settings, 'min_body_chars'),
    });
  }
}
