/**
 * ESG chart API client
 * One GET per ticker, bounded retries on 429 and on transport failures.
 */

import type { EsgFetchConfig } from '@/core/config';
import { getCurrentDate } from '@/core/time';
import { sleep as defaultSleep, type SleepFn } from '@/utils/delay';
import { createChildLogger } from '@/utils/logger';
import {
  NetworkError,
  NoEsgDataError,
  RateLimitedError,
  toError,
  type EsgFetchError,
} from './errors';
import { parseEsgChart } from './parse';
import type { EsgFetcher, FetchOutcome } from './types';

const logger = createChildLogger('esg_client');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type EsgClientConfig = Pick<
  EsgFetchConfig,
  'endpoint' | 'headers' | 'requestTimeoutMs' | 'rateLimit' | 'networkRetries' | 'seriesMode'
>;

export interface EsgClientOptions {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  now?: () => Date;
}

type Attempt =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'transport'; error: Error };

export class EsgClient implements EsgFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private requestCount = 0;

  constructor(
    private readonly config: EsgClientConfig,
    options: EsgClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? getCurrentDate;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  buildUrl(ticker: string): string {
    const url = new URL(this.config.endpoint);
    url.searchParams.set('symbol', ticker);
    return url.toString();
  }

  backoffFor(rateLimitHits: number): number {
    const { backoffMs, backoffStrategy } = this.config.rateLimit;
    if (backoffStrategy === 'exponential') {
      return backoffMs * Math.pow(2, rateLimitHits - 1);
    }
    return backoffMs;
  }

  async fetchEsg(ticker: string): Promise<FetchOutcome> {
    const fail = (error: EsgFetchError): FetchOutcome => ({ ok: false, ticker, error });

    const { maxRetries } = this.config.rateLimit;
    const networkRetries = this.config.networkRetries;
    const maxAttempts = 1 + maxRetries + networkRetries;
    const url = this.buildUrl(ticker);

    let rateLimitHits = 0;
    let networkFailures = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.send(url);

      if (result.kind === 'response' && result.status === 429) {
        rateLimitHits++;
        if (rateLimitHits > maxRetries) {
          return fail(new RateLimitedError(ticker, attempt));
        }
        const backoffMs = this.backoffFor(rateLimitHits);
        logger.info({ ticker, attempt, backoffMs }, 'Rate limited, backing off');
        await this.sleep(backoffMs);
        continue;
      }

      if (result.kind === 'transport' || result.status < 200 || result.status >= 300) {
        networkFailures++;
        const error =
          result.kind === 'transport'
            ? new NetworkError(
                `Request error for ${ticker}: ${result.error.message}`,
                ticker,
                null,
                result.error
              )
            : new NetworkError(
                `Error fetching data for ${ticker}: HTTP ${result.status}`,
                ticker,
                result.status
              );
        if (networkFailures > networkRetries) {
          return fail(error);
        }
        logger.info({ ticker, attempt, error: error.message }, 'Request failed, retrying');
        continue;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(result.body);
      } catch (error) {
        return fail(
          new NetworkError(`Invalid JSON response for ${ticker}`, ticker, result.status, toError(error))
        );
      }

      const records = parseEsgChart(ticker, payload, {
        mode: this.config.seriesMode,
        runDate: this.now(),
      });
      if (!records) {
        return fail(new NoEsgDataError(ticker));
      }
      return { ok: true, ticker, records };
    }

    return fail(new NetworkError(`Attempt budget exhausted for ${ticker}`, ticker));
  }

  private async send(url: string): Promise<Attempt> {
    this.requestCount++;
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.config.headers,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      const body = await response.text();
      return { kind: 'response', status: response.status, body };
    } catch (error) {
      return { kind: 'transport', error: toError(error) };
    }
  }
}
