import { AdapterRegistry } from './adapter.js';
import { FeedAdapter } from './feed.js';
import { HtmlListAdapter } from './html.js';
import type { Fetcher } from '../crawl/fetcher.js';

export { AdapterRegistry } from './adapter.js';
export type { SourceAdapter, ItemData } from './adapter.js';
export { FeedAdapter } from './feed.js';
export { HtmlListAdapter, extractLinks } from './html.js';

/**
 * Registry with the built-in adapters. Sources choose one through
 * `settings.adapter`.
 */
export function createDefaultRegistry(fetcher: Fetcher): AdapterRegistry {
  return new AdapterRegistry().register(new FeedAdapter(fetcher)).register(new HtmlListAdapter(fetcher));
}
