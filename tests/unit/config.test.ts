import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getConfig, loadConfig, resetConfig, type EsgFetchConfigFile } from '@/core/config';
import { ConfigError } from '@/esg/errors';

let tempDir: string;

function baseConfigFile(): EsgFetchConfigFile {
  return JSON.parse(readFileSync(join(process.cwd(), 'config', 'esg_fetch.json'), 'utf-8'));
}

function writeConfig(content: unknown): string {
  const configPath = join(tempDir, 'esg_fetch.json');
  writeFileSync(configPath, JSON.stringify(content));
  return configPath;
}

describe('config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'esg-config-'));
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the default config file', () => {
    const config = loadConfig({ env: {} });

    expect(config.endpoint).toBe('https://query2.finance.yahoo.com/v1/finance/esgChart');
    expect(config.headers['User-Agent']).toContain('Mozilla/5.0');
    expect(config.requestTimeoutMs).toBe(10_000);
    expect(config.rateLimit).toEqual({ maxRetries: 3, backoffMs: 10_000, backoffStrategy: 'fixed' });
    expect(config.networkRetries).toBe(1);
    expect(config.delay).toEqual({ minMs: 2000, maxMs: 5000 });
    expect(config.inputFile).toBe('sp500_tickers.csv');
    expect(config.outputFile).toBe('historical_esg_data.csv');
    expect(config.seriesMode).toBe('latest');
  });

  it('applies environment overrides', () => {
    const config = loadConfig({
      env: {
        ESG_INPUT_FILE: 'nasdaq.csv',
        ESG_OUTPUT_FILE: 'out/esg.csv',
        ESG_SERIES_MODE: 'History',
        ESG_MIN_DELAY_MS: '100',
        ESG_MAX_DELAY_MS: '200',
      },
    });

    expect(config.inputFile).toBe('nasdaq.csv');
    expect(config.outputFile).toBe('out/esg.csv');
    expect(config.seriesMode).toBe('history');
    expect(config.delay).toEqual({ minMs: 100, maxMs: 200 });
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({
      env: { ESG_INPUT_FILE: 'env.csv' },
      overrides: { inputFile: 'cli.csv', seriesMode: 'history' },
    });

    expect(config.inputFile).toBe('cli.csv');
    expect(config.seriesMode).toBe('history');
  });

  it('reads the config path from ESG_CONFIG', () => {
    const configPath = writeConfig({ ...baseConfigFile(), input_file: 'custom.csv' });

    const config = loadConfig({ env: { ESG_CONFIG: configPath } });

    expect(config.inputFile).toBe('custom.csv');
  });

  it('rejects a config file that does not match the schema', () => {
    const configPath = writeConfig({ ...baseConfigFile(), series_mode: 'weekly' });

    expect(() => loadConfig({ configPath, env: {} })).toThrow(ConfigError);
  });

  it('rejects a missing config file', () => {
    expect(() => loadConfig({ configPath: join(tempDir, 'nope.json'), env: {} })).toThrow(
      `Config file not found: ${join(tempDir, 'nope.json')}`
    );
  });

  it('rejects malformed environment values', () => {
    expect(() => loadConfig({ env: { ESG_MIN_DELAY_MS: 'soon' } })).toThrow(
      'ESG_MIN_DELAY_MS must be a non-negative integer, got "soon"'
    );
    expect(() => loadConfig({ env: { ESG_SERIES_MODE: 'weekly' } })).toThrow(ConfigError);
  });

  it('rejects an inverted delay range', () => {
    expect(() => loadConfig({ env: { ESG_MIN_DELAY_MS: '9000' } })).toThrow(
      'Delay range is inverted: min 9000ms > max 5000ms'
    );
  });

  it('caches the loaded config until reset', () => {
    const first = getConfig({ env: {} });
    const second = getConfig({ env: { ESG_INPUT_FILE: 'ignored.csv' } });
    expect(second).toBe(first);

    resetConfig();
    expect(getConfig({ env: { ESG_INPUT_FILE: 'fresh.csv' } }).inputFile).toBe('fresh.csv');
  });
});
