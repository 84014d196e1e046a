/**
 * Turns an esgChart payload into ESG records.
 *
 * Payload shape:
 *   { esgChart: { result: [ { symbol, symbolSeries: { timestamp[], esgScore[],
 *     environmentScore[], socialScore[], governanceScore[] } } ], error } }
 */

import { formatDate, formatEpochSeconds, toDateString } from '@/core/time';
import { validateEsgChart } from '@/validation/ajv_instance';
import type { EsgRecord, SeriesMode } from './types';

type ScoreSeries = Array<number | null>;

export interface EsgSymbolSeries {
  timestamp: number[];
  esgScore?: ScoreSeries;
  environmentScore?: ScoreSeries;
  socialScore?: ScoreSeries;
  governanceScore?: ScoreSeries;
}

export interface EsgChartResult {
  symbol?: string;
  lastProcessingDate?: number | string | null;
  symbolSeries: EsgSymbolSeries;
}

export interface EsgChartResponse {
  esgChart: {
    result: EsgChartResult[];
  };
}

export interface ParseOptions {
  mode: SeriesMode;
  runDate: Date;
}

function scoreAt(series: ScoreSeries | undefined, index: number): number | null {
  const value = series?.[index];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Returns the records for one ticker, or null when the payload has no ESG
 * section or no point carries any score.
 */
export function parseEsgChart(
  ticker: string,
  payload: unknown,
  options: ParseOptions
): EsgRecord[] | null {
  const validation = validateEsgChart(payload);
  if (!validation.valid) {
    return null;
  }

  const [result] = validation.data.esgChart.result;
  const series = result.symbolSeries;
  const processingDate = toDateString(result.lastProcessingDate) ?? formatDate(options.runDate);

  const points: Array<{ epoch: number; record: EsgRecord }> = [];
  series.timestamp.forEach((epoch, index) => {
    const timestamp = formatEpochSeconds(epoch);
    if (timestamp === null) {
      return;
    }

    const record: EsgRecord = {
      ticker,
      timestamp,
      last_processing_date: processingDate,
      total_score: scoreAt(series.esgScore, index),
      environment_score: scoreAt(series.environmentScore, index),
      social_score: scoreAt(series.socialScore, index),
      governance_score: scoreAt(series.governanceScore, index),
    };

    const hasScore =
      record.total_score !== null ||
      record.environment_score !== null ||
      record.social_score !== null ||
      record.governance_score !== null;
    if (hasScore) {
      points.push({ epoch, record });
    }
  });

  if (points.length === 0) {
    return null;
  }

  if (options.mode === 'history') {
    return points.map((p) => p.record);
  }

  const latest = points.reduce((best, p) => (p.epoch > best.epoch ? p : best));
  return [latest.record];
}
