import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { MockServerConfig, StorageType } from '../types/index.js';
import { ConfigError, errorMessage } from '../errors/index.js';
import { MAX_DELAY_MS, formatDuration, parseDuration } from '../core/delay.js';
import { DEFAULT_CONFIG, DEFAULT_SQLITE_PATH, CONFIG_FILE_NAMES } from './defaults.js';

/** Milliseconds, or a duration string such as `30s` */
const durationSchema = z.union([z.number().nonnegative(), z.string()]);

/**
 * Configuration file structure (YAML format)
 */
const configFileSchema = z.object({
  server: z
    .object({
      port: z.number().int().optional(),
      host: z.string().optional(),
      bodyLimit: z.string().optional(),
    })
    .optional(),
  storage: z
    .object({
      type: z.enum(['file', 'sqlite']).optional(),
      path: z.string().optional(),
    })
    .optional(),
  cors: z
    .object({
      enabled: z.boolean().optional(),
      origins: z.array(z.string()).optional(),
    })
    .optional(),
  delay: z
    .object({
      max: durationSchema.optional(),
    })
    .optional(),
  retention: z
    .object({
      maxRecords: z.number().int().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * CLI options that can override config file
 */
export interface CliOptions {
  port?: string;
  host?: string;
  storage?: string;
  storageType?: string;
  maxDelay?: string;
  maxRecords?: string;
  config?: string;
  cors?: boolean;
}

/**
 * Find config file in the given directory or any of its parents
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Load and parse a YAML config file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${errorMessage(error)}`, { cause: error });
  }

  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Milliseconds from a number or duration string
 */
function toMilliseconds(value: number | string, field: string): number {
  if (typeof value === 'number') {
    return value;
  }
  const ms = parseDuration(value);
  if (ms === null) {
    throw new ConfigError(`Invalid duration for ${field}: ${value}`);
  }
  return ms;
}

/**
 * Convert config file structure to MockServerConfig
 */
export function configFileToConfig(file: ConfigFile): Partial<MockServerConfig> {
  const config: Partial<MockServerConfig> = {};

  if (file.server?.port !== undefined) {
    config.port = file.server.port;
  }

  if (file.server?.host !== undefined) {
    config.host = file.server.host;
  }

  if (file.server?.bodyLimit !== undefined) {
    config.bodyLimit = file.server.bodyLimit;
  }

  if (file.storage !== undefined) {
    const type = file.storage.type ?? DEFAULT_CONFIG.storage.type;
    config.storage = {
      type,
      path: file.storage.path ?? defaultPathFor(type),
    };
  }

  if (file.cors !== undefined) {
    config.cors = {
      enabled: file.cors.enabled ?? DEFAULT_CONFIG.cors?.enabled ?? true,
      origins: file.cors.origins,
    };
  }

  if (file.delay?.max !== undefined) {
    config.delay = { max: toMilliseconds(file.delay.max, 'delay.max') };
  }

  if (file.retention?.maxRecords !== undefined) {
    config.retention = { maxRecords: file.retention.maxRecords };
  }

  return config;
}

function defaultPathFor(type: StorageType): string {
  return type === 'sqlite' ? DEFAULT_SQLITE_PATH : DEFAULT_CONFIG.storage.path;
}

function isStorageType(value: string): value is StorageType {
  return value === 'file' || value === 'sqlite';
}

/**
 * Convert CLI options to MockServerConfig
 */
function cliOptionsToConfig(cli: CliOptions, base: MockServerConfig): Partial<MockServerConfig> {
  const config: Partial<MockServerConfig> = {};

  if (cli.port !== undefined) {
    const port = parseInt(cli.port, 10);
    if (isNaN(port)) {
      throw new ConfigError(`Invalid port: ${cli.port}`);
    }
    config.port = port;
  }

  if (cli.host !== undefined) {
    config.host = cli.host;
  }

  if (cli.storageType !== undefined || cli.storage !== undefined) {
    const type = cli.storageType ?? base.storage.type;
    if (!isStorageType(type)) {
      throw new ConfigError(`Invalid storage type: ${type}. Must be: file or sqlite.`);
    }
    const keepPath = cli.storage === undefined && type === base.storage.type;
    config.storage = {
      type,
      path: cli.storage ?? (keepPath ? base.storage.path : defaultPathFor(type)),
    };
  }

  if (cli.maxDelay !== undefined) {
    config.delay = { max: toMilliseconds(cli.maxDelay, '--max-delay') };
  }

  if (cli.maxRecords !== undefined) {
    const maxRecords = parseInt(cli.maxRecords, 10);
    if (isNaN(maxRecords)) {
      throw new ConfigError(`Invalid max records: ${cli.maxRecords}`);
    }
    config.retention = { maxRecords };
  }

  if (cli.cors !== undefined) {
    config.cors = {
      enabled: cli.cors,
    };
  }

  return config;
}

/**
 * Merge config objects (source overrides target)
 */
export function mergeConfig(
  target: MockServerConfig,
  source: Partial<MockServerConfig>
): MockServerConfig {
  return {
    port: source.port ?? target.port,
    host: source.host ?? target.host,
    storage: source.storage
      ? { ...target.storage, ...source.storage }
      : target.storage,
    cors: source.cors
      ? { ...target.cors, ...source.cors }
      : target.cors,
    delay: source.delay
      ? { ...target.delay, ...source.delay }
      : target.delay,
    retention: source.retention
      ? { ...target.retention, ...source.retention }
      : target.retention,
    bodyLimit: source.bodyLimit ?? target.bodyLimit,
  };
}

export interface LoadedConfig {
  config: MockServerConfig;
  /** File the config was read from, if any */
  path: string | null;
}

/**
 * Load configuration from file and CLI options
 * Priority: CLI options > Config file > Defaults
 */
export async function loadConfig(cliOptions: CliOptions = {}): Promise<LoadedConfig> {
  let fileConfig: Partial<MockServerConfig> = {};

  // Load from specified config file or auto-discover
  const configPath = cliOptions.config ?? await findConfigFile();
  let usedPath: string | null = null;

  if (configPath) {
    const configFile = await loadConfigFile(configPath);
    fileConfig = configFileToConfig(configFile);
    usedPath = resolve(configPath);
  }

  // Merge: defaults <- file <- cli
  const merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  const final = mergeConfig(merged, cliOptionsToConfig(cliOptions, merged));

  return { config: final, path: usedPath };
}

/**
 * Validate configuration
 */
export function validateConfig(config: MockServerConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  // Port 0 asks the OS for a free port
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`Invalid port: ${config.port}. Must be between 0 and 65535.`);
  }

  if (config.host.trim() === '') {
    errors.push('Host must not be empty.');
  }

  if (!isStorageType(config.storage.type)) {
    errors.push(`Invalid storage type: ${config.storage.type}. Must be: file or sqlite.`);
  }

  if (config.storage.path.trim() === '') {
    errors.push('Storage path must not be empty.');
  }

  if (!Number.isFinite(config.delay.max) || config.delay.max < 0) {
    errors.push('Max delay must be >= 0');
  } else if (config.delay.max > MAX_DELAY_MS) {
    errors.push(`Max delay must be at most ${formatDuration(MAX_DELAY_MS)}`);
  }

  if (!Number.isInteger(config.retention.maxRecords) || config.retention.maxRecords < 0) {
    errors.push('Max records must be an integer >= 0 (0 keeps everything)');
  }

  if (!/^\d+(\.\d+)?\s*(b|kb|mb|gb)?$/i.test(config.bodyLimit)) {
    errors.push(`Invalid body limit: ${config.bodyLimit}. Use bytes notation such as 512kb or 1mb.`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
