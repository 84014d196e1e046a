/**
 * ESG record and fetch outcome types
 */

import type { EsgFetchError } from './errors';

export const ESG_COLUMNS = [
  'ticker',
  'timestamp',
  'last_processing_date',
  'total_score',
  'environment_score',
  'social_score',
  'governance_score',
] as const;

export type EsgColumn = (typeof ESG_COLUMNS)[number];

export interface EsgRecord {
  ticker: string;
  timestamp: string | null;
  last_processing_date: string | null;
  total_score: number | null;
  environment_score: number | null;
  social_score: number | null;
  governance_score: number | null;
}

/** `latest` keeps the newest scored point per ticker, `history` keeps every one. */
export type SeriesMode = 'latest' | 'history';

export type FetchOutcome =
  | { ok: true; ticker: string; records: EsgRecord[] }
  | { ok: false; ticker: string; error: EsgFetchError };

export interface EsgFetcher {
  fetchEsg(ticker: string): Promise<FetchOutcome>;
}

export interface EsgRowSink {
  ensureHeader(): void;
  append(record: EsgRecord): void;
}
