/**
 * Application configuration loaded from config/esg_fetch.json,
 * with environment and CLI overrides layered on top.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigError, toError } from '@/esg/errors';
import type { SeriesMode } from '@/esg/types';
import { validateConfigFile } from '@/validation/ajv_instance';

export type BackoffStrategy = 'fixed' | 'exponential';

/** Shape of config/esg_fetch.json, see schemas/esg_fetch_config.v1.schema.json */
export interface EsgFetchConfigFile {
  endpoint: string;
  headers: Record<string, string>;
  request_timeout_ms: number;
  rate_limit: {
    max_retries: number;
    backoff_ms: number;
    backoff_strategy: BackoffStrategy;
  };
  network_retries: number;
  delay: {
    min_ms: number;
    max_ms: number;
  };
  input_file: string;
  output_file: string;
  series_mode: SeriesMode;
}

export interface RateLimitConfig {
  maxRetries: number;
  backoffMs: number;
  backoffStrategy: BackoffStrategy;
}

export interface DelayConfig {
  minMs: number;
  maxMs: number;
}

export interface EsgFetchConfig {
  endpoint: string;
  headers: Record<string, string>;
  requestTimeoutMs: number;
  rateLimit: RateLimitConfig;
  networkRetries: number;
  delay: DelayConfig;
  inputFile: string;
  outputFile: string;
  seriesMode: SeriesMode;
}

export interface ConfigOverrides {
  inputFile?: string;
  outputFile?: string;
  seriesMode?: SeriesMode;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

let cachedConfig: EsgFetchConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function resolveConfigPath(projectRoot: string, env: NodeJS.ProcessEnv): string {
  const envPath = env.ESG_CONFIG;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'esg_fetch.json');
}

function readConfigFile(configPath: string): EsgFetchConfigFile {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`, toError(error));
  }

  const result = validateConfigFile(raw);
  if (!result.valid) {
    throw new ConfigError(`Invalid config ${configPath}: ${result.errors.join('; ')}`);
  }
  return result.data;
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseSeriesMode(raw: string | undefined): SeriesMode | undefined {
  if (!raw) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'latest' || normalized === 'history') {
    return normalized;
  }
  throw new ConfigError(`ESG_SERIES_MODE must be "latest" or "history", got "${raw}"`);
}

function normalizeConfig(file: EsgFetchConfigFile): EsgFetchConfig {
  return {
    endpoint: file.endpoint,
    headers: { ...file.headers },
    requestTimeoutMs: file.request_timeout_ms,
    rateLimit: {
      maxRetries: file.rate_limit.max_retries,
      backoffMs: file.rate_limit.backoff_ms,
      backoffStrategy: file.rate_limit.backoff_strategy,
    },
    networkRetries: file.network_retries,
    delay: {
      minMs: file.delay.min_ms,
      maxMs: file.delay.max_ms,
    },
    inputFile: file.input_file,
    outputFile: file.output_file,
    seriesMode: file.series_mode,
  };
}

export function loadConfig(options: LoadConfigOptions = {}): EsgFetchConfig {
  const env = options.env ?? process.env;
  const projectRoot = getProjectRoot();
  const configPath = options.configPath ?? resolveConfigPath(projectRoot, env);

  const config = normalizeConfig(readConfigFile(configPath));

  config.inputFile = env.ESG_INPUT_FILE?.trim() || config.inputFile;
  config.outputFile = env.ESG_OUTPUT_FILE?.trim() || config.outputFile;
  config.seriesMode = parseSeriesMode(env.ESG_SERIES_MODE) ?? config.seriesMode;
  config.delay.minMs = parseIntegerEnv(env, 'ESG_MIN_DELAY_MS') ?? config.delay.minMs;
  config.delay.maxMs = parseIntegerEnv(env, 'ESG_MAX_DELAY_MS') ?? config.delay.maxMs;

  const overrides = options.overrides ?? {};
  config.inputFile = overrides.inputFile ?? config.inputFile;
  config.outputFile = overrides.outputFile ?? config.outputFile;
  config.seriesMode = overrides.seriesMode ?? config.seriesMode;

  if (config.delay.minMs > config.delay.maxMs) {
    throw new ConfigError(
      `Delay range is inverted: min ${config.delay.minMs}ms > max ${config.delay.maxMs}ms`
    );
  }

  return config;
}

export function getConfig(options?: LoadConfigOptions): EsgFetchConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(options);
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
