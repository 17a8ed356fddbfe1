import fs from 'node:fs';
import path from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { DEFAULT_CACHE_TTL_MS } from './documentCache';
import { DEFAULT_TIMESTAMP_TOLERANCE_MS } from './merge';

/**
 * Engine timing used when no configuration is supplied.
 */
export const DEFAULT_ENGINE_SETTINGS = {
  cacheTtlMs: DEFAULT_CACHE_TTL_MS,
  timestampToleranceMs: DEFAULT_TIMESTAMP_TOLERANCE_MS,
  materializeTimeoutMs: 15_000,
  materializePollIntervalMs: 250,
  materializeMaxPollIntervalMs: 2000,
};

export type SyncEngineSettings = typeof DEFAULT_ENGINE_SETTINGS;

export const DEFAULT_RETENTION_DAYS = 30;

const PositiveIntSchema = z.coerce.number().int().positive();
const NonNegativeIntSchema = z.coerce.number().int().nonnegative();

export const SyncConfigSchema = z.object({
  dataDir: z.string().min(1).optional(),
  cacheTtlMs: PositiveIntSchema.default(DEFAULT_ENGINE_SETTINGS.cacheTtlMs),
  timestampToleranceMs: NonNegativeIntSchema.default(DEFAULT_ENGINE_SETTINGS.timestampToleranceMs),
  materializeTimeoutMs: PositiveIntSchema.default(DEFAULT_ENGINE_SETTINGS.materializeTimeoutMs),
  materializePollIntervalMs: PositiveIntSchema.default(
    DEFAULT_ENGINE_SETTINGS.materializePollIntervalMs,
  ),
  materializeMaxPollIntervalMs: PositiveIntSchema.default(
    DEFAULT_ENGINE_SETTINGS.materializeMaxPollIntervalMs,
  ),
  deletedItemRetentionDays: PositiveIntSchema.default(DEFAULT_RETENTION_DAYS),
  fileExtension: z
    .string()
    .regex(/^[a-z0-9]+$/i, 'fileExtension must be alphanumeric without a dot')
    .default('listsync'),
});

export type SyncConfigInput = z.input<typeof SyncConfigSchema>;

export type SyncConfig = Omit<z.output<typeof SyncConfigSchema>, 'dataDir'> & {
  dataDir: string;
};

const CONFIG_FILENAMES = ['listsync.config.json', 'listsync.config.yaml', 'listsync.config.yml'];

const ENV_KEYS = {
  LISTSYNC_DATA_DIR: 'dataDir',
  LISTSYNC_CACHE_TTL_MS: 'cacheTtlMs',
  LISTSYNC_TIMESTAMP_TOLERANCE_MS: 'timestampToleranceMs',
  LISTSYNC_MATERIALIZE_TIMEOUT_MS: 'materializeTimeoutMs',
  LISTSYNC_RETENTION_DAYS: 'deletedItemRetentionDays',
} as const satisfies Record<string, keyof SyncConfigInput>;

export interface LoadSyncConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`Configuration file at ${configPath} could not be parsed: ${detail}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Configuration file at ${configPath} must contain an object`);
  }
  return { ...parsed };
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim().length > 0) {
      values[configKey] = value.trim();
    }
  }
  return values;
}

/**
 * Resolves configuration from environment variables, then the first
 * `listsync.config.{json,yaml,yml}` in `cwd`, then defaults. A relative
 * `dataDir` is resolved against `cwd`.
 */
export function loadSyncConfig(options: LoadSyncConfigOptions = {}): SyncConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const configPath = findConfigFile(cwd);
  const fromFile = configPath ? readConfigFile(configPath) : {};
  const merged = { ...fromFile, ...readEnv(env) };

  const parsed = SyncConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid value';
    const source = configPath ?? 'environment';
    throw new Error(`Invalid configuration (${source}) ${location}`);
  }

  const { dataDir, ...rest } = parsed.data;
  return {
    ...rest,
    dataDir: path.resolve(cwd, dataDir ?? 'data'),
  };
}

export function resolveSyncConfig(input: SyncConfigInput & { dataDir: string }): SyncConfig {
  const { dataDir, ...rest } = SyncConfigSchema.parse(input);
  return { ...rest, dataDir: dataDir ?? input.dataDir };
}
