import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HtmlListAdapter, extractLinks } from '../html.js';
import { Fetcher } from '../../crawl/fetcher.js';
import { AdapterError } from '../../shared/errors.js';
import { makeSource } from '../../crawl/__tests__/fakes.js';
import { articlePage } from './fixtures.js';

const LISTING = `<html><body>
  <a href="/posts/first-post">First</a>
  <a href="/posts/second-post#comments">Second</a>
  <a href="https://blog.test/posts/first-post">First again</a>
  <a href="/about">About</a>
  <a href="https://elsewhere.test/posts/foreign">Foreign</a>
  <a href="mailto:editor@blog.test">Mail</a>
  <a href="/latest">Self</a>
</body></html>`;

describe('extractLinks', () => {
  it('keeps same-host http links, strips fragments and de-duplicates', () => {
    expect(extractLinks(LISTING, 'https://blog.test/latest', null)).toEqual([
      'https://blog.test/posts/first-post',
      'https://blog.test/posts/second-post',
      'https://blog.test/about',
    ]);
  });

  it('applies the link pattern to the absolute URL', () => {
    expect(extractLinks(LISTING, 'https://blog.test/latest', /\/posts\/[a-z-]+$/)).toEqual([
      'https://blog.test/posts/first-post',
      'https://blog.test/posts/second-post',
    ]);
  });
});

describe('HtmlListAdapter', () => {
  const originalFetch = globalThis.fetch;
  let fetchMock: ReturnType<typeof vi.fn>;
  let adapter: HtmlListAdapter;

  beforeEach(() => {
    fetchMock = vi.fn();
    globalThis.fetch = fetchMock;
    adapter = new HtmlListAdapter(
      new Fetcher({ timeoutMs: 1000, retryAttempts: 1, retryDelayMs: 0, userAgent: 'test-agent' }),
    );
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  const source = makeSource({
    name: 'blog',
    base_url: 'https://blog.test/',
    settings: { adapter: 'html', list_path: '/latest', link_pattern: '/posts/' },
  });

  it('lists matching links from the listing page', async () => {
    fetchMock.mockResolvedValue(new Response(LISTING, { status: 200 }));

    const candidates = await adapter.listCandidates(source, 1);
    expect(candidates).toEqual(['https://blog.test/posts/first-post']);
    expect(fetchMock.mock.calls[0][0]).toBe('https://blog.test/latest');
  });

  it('returns no candidates when the listing page is gone', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404 }));
    await expect(adapter.listCandidates(source)).resolves.toEqual([]);
  });

  it('rejects an invalid link pattern', async () => {
    const broken = makeSource({ settings: { link_pattern: '([' } });
    await expect(adapter.listCandidates(broken)).rejects.toThrow(AdapterError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('parses an article page', async () => {
    fetchMock.mockResolvedValue(new Response(articlePage(), { status: 200 }));

    const item = await adapter.parseItem('https://blog.test/posts/first-post', source);
    expect(item?.title).toBe('Harbor Committee Reviews Tide Tables');
  });

  it('returns null for a missing article', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404 }));
    await expect(adapter.parseItem('https://blog.test/posts/gone', source)).resolves.toBeNull();
  });
});
