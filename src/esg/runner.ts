/**
 * Sequential fetch loop: fetch, write, log, pause, next ticker.
 * Per-ticker failures are logged and skipped; a WriteError ends the run.
 */

import type { DelayConfig } from '@/core/config';
import { randomDelayMs, sleep as defaultSleep, type SleepFn } from '@/utils/delay';
import { createChildLogger } from '@/utils/logger';
import { NetworkError, WriteError, toError, type EsgErrorKind } from './errors';
import type { EsgFetcher, EsgRowSink, FetchOutcome } from './types';

const logger = createChildLogger('esg_runner');

export interface RunDeps {
  fetcher: EsgFetcher;
  writer: EsgRowSink;
  delay: DelayConfig;
  sleep?: SleepFn;
  random?: () => number;
}

export interface TickerFailure {
  ticker: string;
  kind: EsgErrorKind;
  message: string;
}

export interface RunSummary {
  total: number;
  processed: number;
  skipped: number;
  rowsWritten: number;
  failures: TickerFailure[];
  failuresByKind: Partial<Record<EsgErrorKind, number>>;
}

/** Anything the fetcher throws becomes a NetworkError for that ticker. */
async function fetchTicker(fetcher: EsgFetcher, ticker: string): Promise<FetchOutcome> {
  try {
    return await fetcher.fetchEsg(ticker);
  } catch (error) {
    if (error instanceof WriteError) {
      throw error;
    }
    const cause = toError(error);
    return {
      ok: false,
      ticker,
      error: new NetworkError(`Error processing ${ticker}: ${cause.message}`, ticker, null, cause),
    };
  }
}

export async function runEsgFetch(tickers: string[], deps: RunDeps): Promise<RunSummary> {
  const pause = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const total = tickers.length;

  const summary: RunSummary = {
    total,
    processed: 0,
    skipped: 0,
    rowsWritten: 0,
    failures: [],
    failuresByKind: {},
  };

  deps.writer.ensureHeader();
  logger.info({ total }, 'Starting ESG fetch');

  for (const [i, ticker] of tickers.entries()) {
    const index = i + 1;
    const outcome = await fetchTicker(deps.fetcher, ticker);

    if (outcome.ok) {
      for (const record of outcome.records) {
        deps.writer.append(record);
      }
      summary.processed++;
      summary.rowsWritten += outcome.records.length;
      logger.info(
        { ticker, index, total, rows: outcome.records.length },
        'Ticker processed'
      );
    } else {
      const { error } = outcome;
      summary.skipped++;
      summary.failures.push({ ticker, kind: error.kind, message: error.message });
      summary.failuresByKind[error.kind] = (summary.failuresByKind[error.kind] ?? 0) + 1;

      if (error.kind === 'NoEsgData') {
        logger.info({ ticker, index, total, kind: error.kind }, 'No ESG coverage, skipping');
      } else {
        logger.warn(
          { ticker, index, total, kind: error.kind, reason: error.message },
          'Ticker skipped'
        );
      }
    }

    if (index < total) {
      const waitMs = randomDelayMs(deps.delay.minMs, deps.delay.maxMs, random);
      logger.debug({ waitMs }, 'Pausing before next ticker');
      await pause(waitMs);
    }
  }

  logger.info(
    {
      processed: summary.processed,
      skipped: summary.skipped,
      rowsWritten: summary.rowsWritten,
      failuresByKind: summary.failuresByKind,
    },
    'ESG fetch completed'
  );

  return summary;
}
