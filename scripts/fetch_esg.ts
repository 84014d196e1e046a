#!/usr/bin/env tsx
/**
 * ESG Fetch Script
 * Reads tickers, fetches ESG scores one by one and appends them to a CSV file.
 *
 * Usage: npx tsx scripts/fetch_esg.ts [--input=tickers.csv] [--output=out.csv] [--limit=5] [--history]
 */

// Must run before the logger reads LOG_LEVEL
import './load_env';
import { getConfig, type ConfigOverrides } from '../src/core/config';
import { EsgClient } from '../src/esg/client';
import { CsvRowWriter } from '../src/esg/csv_writer';
import { EsgError, toError } from '../src/esg/errors';
import { runEsgFetch } from '../src/esg/runner';
import { readTickers } from '../src/esg/tickers';
import { finishEtlRun, getLastSuccessfulRun, startEtlRun } from '../src/lib/etl_log';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('fetch_esg');

interface FetchEsgCliArgs {
  overrides: ConfigOverrides;
  limit: number | null;
}

function readFlagValue(argv: string[], flagName: string): string | undefined {
  const equalsArg = argv.find((arg) => arg.startsWith(`${flagName}=`));
  if (equalsArg) return equalsArg.slice(flagName.length + 1);
  const index = argv.indexOf(flagName);
  return index >= 0 ? argv[index + 1] : undefined;
}

function parseCliArgs(argv: string[]): FetchEsgCliArgs {
  const overrides: ConfigOverrides = {};

  const input = readFlagValue(argv, '--input');
  if (input) overrides.inputFile = input;

  const output = readFlagValue(argv, '--output');
  if (output) overrides.outputFile = output;

  if (argv.includes('--history')) overrides.seriesMode = 'history';

  const limitRaw = readFlagValue(argv, '--limit');
  let limit: number | null = null;
  if (limitRaw !== undefined) {
    const parsed = Number.parseInt(limitRaw, 10);
    if (Number.isFinite(parsed) && parsed > 0) {
      limit = parsed;
    } else {
      logger.warn({ limit: limitRaw }, 'Ignoring invalid --limit value');
    }
  }

  return { overrides, limit };
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  let runId: string | null = null;
  try {
    const config = getConfig({ overrides: args.overrides });

    let tickers = readTickers(config.inputFile);
    logger.info({ count: tickers.length, inputFile: config.inputFile }, 'Loaded tickers');
    if (args.limit !== null && args.limit < tickers.length) {
      tickers = tickers.slice(0, args.limit);
      logger.info({ limit: args.limit, tickers }, 'Limiting run to first tickers');
    }

    const lastRun = getLastSuccessfulRun('esg_fetch');
    if (lastRun) {
      // Rows are appended, so a second run duplicates the previous output
      logger.info(
        { runId: lastRun.id, finishedAt: lastRun.finished_at, outputFile: lastRun.metadata.outputFile },
        'Previous successful run found'
      );
    }

    runId = startEtlRun('esg_fetch', {
      inputFile: config.inputFile,
      outputFile: config.outputFile,
      seriesMode: config.seriesMode,
    });

    const client = new EsgClient(config);
    const writer = new CsvRowWriter(config.outputFile);
    const summary = await runEsgFetch(tickers, {
      fetcher: client,
      writer,
      delay: config.delay,
    });

    finishEtlRun(runId, 'success', summary.total, null, {
      processed: summary.processed,
      skipped: summary.skipped,
      rowsWritten: summary.rowsWritten,
      failuresByKind: summary.failuresByKind,
      requests: client.getRequestCount(),
    });
    logger.info(
      { outputFile: config.outputFile, rowsWritten: summary.rowsWritten },
      'ESG data saved'
    );
    return 0;
  } catch (error) {
    const err = toError(error);
    if (error instanceof EsgError) {
      logger.error({ kind: error.kind, error: err.message }, 'ESG fetch aborted');
    } else {
      logger.error({ error: err }, 'ESG fetch failed unexpectedly');
    }
    if (runId) {
      finishEtlRun(runId, 'failed', null, err.message);
    }
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error({ error: toError(error) }, 'Unhandled error');
    process.exitCode = 1;
  }
);
