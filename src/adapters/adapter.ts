import type { SourceConfig } from '../source/types.js';
import { AdapterError } from '../shared/errors.js';

/**
 * Parsed content for one candidate, as produced by an adapter.
 */
export interface ItemData {
  title: string;
  body: string;
  meta?: Record<string, unknown>;
}

/**
 * Site-specific discovery and parsing. Implement one per kind of source.
 *
 * `parseItem` returns null for a candidate that cannot be parsed; throwing is
 * reserved for infrastructure failures. A throw from `listCandidates` fails
 * the whole crawl run.
 */
export interface SourceAdapter {
  readonly name: string;
  listCandidates(source: SourceConfig, limit?: number): Promise<string[]>;
  parseItem(identifier: string, source: SourceConfig): Promise<ItemData | null>;
}

/**
 * Name → adapter mapping, populated at startup.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();

  register(adapter: SourceAdapter): this {
    if (this.adapters.has(adapter.name)) {
      throw new AdapterError(`Adapter '${adapter.name}' is already registered`, {
        adapter: adapter.name,
      });
    }
    this.adapters.set(adapter.name, adapter);
    return this;
  }

  get(name: string): SourceAdapter | undefined {
    return this.adapters.get(name);
  }

  list(): string[] {
    return Array.from(this.adapters.keys()).sort();
  }

  /**
   * Resolve the adapter for a source: `settings.adapter` when set, otherwise
   * an adapter registered under the source's own name.
   */
  resolve(source: SourceConfig): SourceAdapter {
    const configured = source.settings['adapter'];
    const key = typeof configured === 'string' && configured ? configured : source.name;
    const adapter = this.adapters.get(key);
    if (!adapter) {
      throw new AdapterError(`No adapter registered for source ${source.name} (looked up '${key}')`, {
        source: source.name,
        adapter: key,
        available: this.list(),
      });
    }
    return adapter;
  }
}
