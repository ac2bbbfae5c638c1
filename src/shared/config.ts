import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  harvest: z
    .object({
      categories: z.string().default('ALL'),
      max_pins_per_topic: z.number().int().positive().default(100),
      max_pulls: z.number().int().positive().default(50),
      max_retries: z.number().int().min(0).default(3),
      backoff_base_ms: z.number().min(0).default(5000),
      max_concurrent_topics: z.number().int().positive().default(3),
      inter_task_delay_min_ms: z.number().min(0).default(3000),
      inter_task_delay_max_ms: z.number().min(0).default(8000),
    })
    .default({}),

  source: z
    .object({
      headless: z.boolean().default(true),
      timeout_ms: z.number().int().positive().default(45000),
      proxy: z.string().default(''),
      max_stagnant_scrolls: z.number().int().positive().default(3),
      executable_path: z.string().default(''),
    })
    .default({}),

  assets: z
    .object({
      download_images: z.boolean().default(true),
      max_concurrent_downloads: z.number().int().positive().default(10),
      fetch_timeout_ms: z.number().int().positive().default(30000),
      user_agent: z
        .string()
        .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36'),
      referer: z.string().default('https://www.pinterest.com/'),
    })
    .default({}),

  image_filter: z
    .object({
      enabled: z.boolean().default(false),
      backend: z.enum(['score', 'detections']).default('score'),
      endpoint: z.string().default(''),
      threshold: z.number().min(0).max(1).default(0.7),
      timeout_ms: z.number().int().positive().default(20000),
    })
    .default({}),

  output: z
    .object({
      root: z.string().default('pinterest_downloads'),
    })
    .default({}),

  upload: z
    .object({
      enabled: z.boolean().default(false),
      drive_folder_url: z.string().default(''),
      credentials_path: z.string().default('credentials.json'),
      access_token: z.string().default(''),
    })
    .default({}),

  topics_file: z.string().default(''),
  log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

type EnvParser = (value: string) => unknown;

const asString: EnvParser = (v) => v;
const asNumber: EnvParser = (v) => Number(v);
const asBoolean: EnvParser = (v) => v.toLowerCase() === 'true';

/**
 * Environment variable → [section, key, parser]. A null section means a top-level key.
 */
const ENV_OVERRIDES: Record<string, [string | null, string, EnvParser]> = {
  CATEGORIES: ['harvest', 'categories', asString],
  MAX_PINS_PER_TOPIC: ['harvest', 'max_pins_per_topic', asNumber],
  MAX_RETRIES: ['harvest', 'max_retries', asNumber],
  MAX_CONCURRENT_TOPICS: ['harvest', 'max_concurrent_topics', asNumber],
  OUTPUT_FOLDER: ['output', 'root', asString],
  DOWNLOAD_IMAGES: ['assets', 'download_images', asBoolean],
  MAX_CONCURRENT_DOWNLOADS: ['assets', 'max_concurrent_downloads', asNumber],
  HEADLESS: ['source', 'headless', asBoolean],
  TIMEOUT_MS: ['source', 'timeout_ms', asNumber],
  PROXY: ['source', 'proxy', asString],
  CHROMIUM_PATH: ['source', 'executable_path', asString],
  USE_NSFW_DETECTOR: ['image_filter', 'enabled', asBoolean],
  NSFW_THRESHOLD: ['image_filter', 'threshold', asNumber],
  NSFW_BACKEND: ['image_filter', 'backend', asString],
  NSFW_ENDPOINT: ['image_filter', 'endpoint', asString],
  ENABLE_DRIVE_UPLOAD: ['upload', 'enabled', asBoolean],
  DRIVE_FOLDER_URL: ['upload', 'drive_folder_url', asString],
  DRIVE_CREDENTIALS: ['upload', 'credentials_path', asString],
  DRIVE_ACCESS_TOKEN: ['upload', 'access_token', asString],
  TOPICS_FILE: [null, 'topics_file', asString],
  LOG_LEVEL: [null, 'log_level', (v) => v.toLowerCase()],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Layer environment variables over a raw (unvalidated) config object. Empty values are ignored.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...rawConfig };

  for (const [name, [section, key, parse]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    if (section === null) {
      result[key] = parse(value);
      continue;
    }

    const existing = result[section];
    const sectionObj: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
    sectionObj[key] = parse(value);
    result[section] = sectionObj;
  }

  return result;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  const { harvest } = parsed.data;
  if (harvest.inter_task_delay_max_ms < harvest.inter_task_delay_min_ms) {
    throw new ConfigError('inter_task_delay_max_ms must be >= inter_task_delay_min_ms', {
      min: harvest.inter_task_delay_min_ms,
      max: harvest.inter_task_delay_max_ms,
    });
  }
  return parsed.data;
}

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

export interface LoadConfigOptions {
  force?: boolean;
  env?: NodeJS.ProcessEnv;
  searchFrom?: string;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (cachedConfig && !options.force) return cachedConfig;

  const env = options.env ?? process.env;
  const explorer = cosmiconfig('pinharvest', {
    searchPlaces: [
      'pinharvest.config.yaml',
      'pinharvest.config.yml',
      '.pinharvestrc.yaml',
      '.pinharvestrc.yml',
    ],
  });

  let rawConfig: Record<string, unknown> = {};
  const envConfigPath = env['PINHARVEST_CONFIG'];

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    const loaded: unknown = result?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else {
    const result = await explorer.search(options.searchFrom);
    const found: unknown = result?.config;
    if (result && isRecord(found)) {
      rawConfig = found;
      logger.debug({ file: result.filepath }, 'Loaded config file');
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig, env));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
