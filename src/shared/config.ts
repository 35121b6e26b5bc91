import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getCrawlkeeperDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  crawler: z
    .object({
      user_agent: z
        .string()
        .default('Mozilla/5.0 (compatible; crawlkeeper/0.1; +https://example.invalid/bot)'),
      timeout_ms: z.number().int().positive().default(30000),
      max_concurrent: z.number().int().positive().default(10),
      retry_attempts: z.number().int().positive().default(3),
      retry_delay_ms: z.number().int().nonnegative().default(5000),
      candidate_limit: z.number().int().positive().default(50),
    })
    .default({}),

  scheduler: z
    .object({
      enabled: z.boolean().default(true),
      tick_cron: z.string().default('* * * * *'),
      max_parallel_runs: z.number().int().positive().default(2),
      stale_run_minutes: z.number().positive().default(30),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.crawlkeeper/crawlkeeper.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type CrawlerSettings = Config['crawler'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const next = isRecord(existing) ? existing : {};
  raw[key] = next;
  return next;
}

/**
 * Apply CRAWLKEEPER_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const dbPath = env['CRAWLKEEPER_DB_PATH'];
  if (dbPath) {
    section(rawConfig, 'db')['path'] = dbPath;
  }

  const schedulerEnabled = env['CRAWLKEEPER_SCHEDULER_ENABLED'];
  if (schedulerEnabled !== undefined && schedulerEnabled !== '') {
    section(rawConfig, 'scheduler')['enabled'] = !['0', 'false', 'no', 'off'].includes(
      schedulerEnabled.toLowerCase(),
    );
  }

  return rawConfig;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('crawlkeeper', {
    searchPlaces: [
      'crawlkeeper.config.yaml',
      'crawlkeeper.config.yml',
      '.crawlkeeperrc.yaml',
      '.crawlkeeperrc.yml',
    ],
  });

  const envConfigPath = process.env['CRAWLKEEPER_CONFIG'];
  const defaultConfigPath = path.join(getCrawlkeeperDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    const loaded: unknown = result?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    const loaded: unknown = result?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
