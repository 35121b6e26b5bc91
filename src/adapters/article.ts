import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { franc } from 'franc-min';
import type { ItemData } from './adapter.js';

/**
 * Detect language from text. Maps ISO 639-3 to short codes.
 */
export function detectLanguage(text: string): string | null {
  if (!text || text.length < 20) return null;

  const iso3 = franc(text);
  if (iso3 === 'und') return null;

  const map: Record<string, string> = {
    eng: 'en',
    cmn: 'zh',
    jpn: 'ja',
    kor: 'ko',
    fra: 'fr',
    deu: 'de',
    spa: 'es',
    por: 'pt',
    rus: 'ru',
    arb: 'ar',
    pes: 'fa',
  };

  return map[iso3] ?? iso3;
}

const CJK_CHAR = /[\u4e00-\u9fff\u3400-\u4dbf\uf900-\ufaff]/g;

/**
 * Count words. Whitespace split for Latin text, one per CJK character.
 */
export function countWords(text: string): number {
  if (!text) return 0;
  const cjk = text.match(CJK_CHAR) ?? [];
  const latin = text
    .replace(CJK_CHAR, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 0);
  return cjk.length + latin.length;
}

function metaContent(doc: Document, selectors: string[]): string | null {
  for (const selector of selectors) {
    const value = doc.querySelector(selector)?.getAttribute('content')?.trim();
    if (value) return value;
  }
  return null;
}

function publishedAt(doc: Document): string | null {
  const fromMeta = metaContent(doc, [
    'meta[property="article:published_time"]',
    'meta[name="pubdate"]',
    'meta[name="date"]',
    'meta[itemprop="datePublished"]',
  ]);
  if (fromMeta) return fromMeta;
  return doc.querySelector('time[datetime]')?.getAttribute('datetime')?.trim() || null;
}

function tags(doc: Document): string[] {
  const found = new Set<string>();
  for (const el of Array.from(doc.querySelectorAll('meta[property="article:tag"]'))) {
    const value = el.getAttribute('content')?.trim();
    if (value) found.add(value);
  }
  for (const el of Array.from(doc.querySelectorAll('a[rel="tag"]'))) {
    const value = el.textContent?.trim();
    if (value) found.add(value);
  }
  return [...found];
}

export interface ArticleOptions {
  /** Bodies shorter than this are treated as unparseable. */
  minBodyChars?: number;
}

/**
 * Turn an article page into item data with Readability. Returns null when
 * the page has no title or too little body text.
 */
export function extractArticle(html: string, url: string, options: ArticleOptions = {}): ItemData | null {
  const minBodyChars = options.minBodyChars ?? 200;
  const dom = new JSDOM(html, { url });
  const doc = dom.window.document;

  // Readability mutates the document, so read metadata first.
  const author =
    metaContent(doc, ['meta[name="author"]', 'meta[property="article:author"]']) ??
    (doc.querySelector('[rel="author"]')?.textContent?.trim() || null);
  const published = publishedAt(doc);
  const tagList = tags(doc);
  const fallbackTitle =
    metaContent(doc, ['meta[property="og:title"]']) ?? (doc.querySelector('h1')?.textContent?.trim() || null);

  const article = new Readability(doc).parse();
  dom.window.close();

  const title = article?.title?.trim() || fallbackTitle;
  const body = article?.textContent?.replace(/\s+/g, ' ').trim() ?? '';
  if (!title || body.length < minBodyChars) return null;

  const wordCount = countWords(body);
  return {
    title,
    body,
    meta: {
      author: article?.byline?.trim() || author,
      published_at: published,
      excerpt: article?.excerpt?.trim() || null,
      tags: tagList,
      lang: detectLanguage(body),
      word_count: wordCount,
      read_time_min: Math.max(1, Math.ceil(wordCount / 250)),
    },
  };
}
