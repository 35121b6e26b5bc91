/**
 * Free-form, adapter-specific settings stored with a source.
 */
export type SourceSettings = Record<string, unknown>;

/**
 * One crawlable source as the rest of the system sees it.
 */
export interface SourceConfig {
  name: string;
  base_url: string;
  is_active: boolean;
  crawl_interval_minutes: number;
  settings: SourceSettings;
  /** Last completed run of any kind (ISO-8601). */
  last_crawl: string | null;
  /** Last completed scheduler-triggered run (ISO-8601). */
  last_scheduled_crawl: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Database row shape for the sources table.
 */
export interface SourceRow {
  name: string;
  base_url: string;
  is_active: number;
  crawl_interval_minutes: number;
  settings_json: string;
  last_crawl: string | null;
  last_scheduled_crawl: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Persisted crawled item.
 */
export interface Item {
  id: string;
  source_name: string;
  source_url: string;
  content_hash: string;
  title: string | null;
  body: string | null;
  meta: Record<string, unknown>;
  crawled_at: string;
  is_processed: boolean;
}

/**
 * Database row shape for the items table.
 */
export interface ItemRow {
  id: string;
  source_name: string;
  source_url: string;
  content_hash: string;
  title: string | null;
  body: string | null;
  meta_json: string;
  crawled_at: string;
  is_processed: number;
}
