import { describe, expect, it } from 'vitest';
import { parseEsgChart } from '@/esg/parse';
import { toDateString } from '@/core/time';
import { AAPL_POINT, JAN_2023, JAN_2024, JUN_2024, makeEsgChart } from '../fixtures/esg';

const latest = { mode: 'latest' as const, runDate: new Date(2024, 6, 1) };

describe('parseEsgChart', () => {
  it('picks the most recent point regardless of series order', () => {
    const payload = makeEsgChart([
      AAPL_POINT,
      { epoch: JAN_2023, total: 30, environment: 4, social: 13, governance: 13 },
    ]);

    const records = parseEsgChart('AAPL', payload, latest);

    expect(records).toHaveLength(1);
    expect(records?.[0].timestamp).toBe('2024-06-01');
    expect(records?.[0].total_score).toBe(24.1);
  });

  it('skips trailing points without any score', () => {
    const payload = makeEsgChart([
      { epoch: JAN_2024, total: 21.5, environment: 2, social: 9.5, governance: 10 },
      { epoch: JUN_2024, total: null, environment: null, social: null, governance: null },
    ]);

    const records = parseEsgChart('MSFT', payload, latest);

    expect(records?.map((r) => r.timestamp)).toEqual(['2024-01-01']);
  });

  it('keeps missing pillar scores as null', () => {
    const payload = makeEsgChart([
      { epoch: JUN_2024, total: 18, environment: null, social: 7, governance: 6 },
    ]);

    const [record] = parseEsgChart('XOM', payload, latest) ?? [];

    expect(record.environment_score).toBeNull();
    expect(record.total_score).toBe(18);
  });

  it('returns null when no point has a score', () => {
    const payload = makeEsgChart([
      { epoch: JUN_2024, total: null, environment: null, social: null, governance: null },
    ]);

    expect(parseEsgChart('ZZZZ', payload, latest)).toBeNull();
  });

  it('returns null for payloads without the ESG section', () => {
    expect(parseEsgChart('ZZZZ', {}, latest)).toBeNull();
    expect(parseEsgChart('ZZZZ', { esgChart: { result: [], error: null } }, latest)).toBeNull();
    expect(parseEsgChart('ZZZZ', { esgChart: { result: [{ symbol: 'ZZZZ' }] } }, latest)).toBeNull();
    expect(parseEsgChart('ZZZZ', null, latest)).toBeNull();
  });

  it('rejects string values in score series', () => {
    const payload = {
      esgChart: {
        result: [
          {
            symbolSeries: {
              timestamp: [JUN_2024],
              esgScore: ['24.1'],
            },
          },
        ],
      },
    };

    expect(parseEsgChart('AAPL', payload, latest)).toBeNull();
  });

  it('drops points whose epoch is outside the date range', () => {
    const payload = makeEsgChart([
      { epoch: 1e16, total: 30, environment: 4, social: 13, governance: 13 },
      AAPL_POINT,
    ]);

    const records = parseEsgChart('AAPL', payload, latest);

    expect(records?.map((r) => r.timestamp)).toEqual(['2024-06-01']);
    expect(parseEsgChart('BAD', makeEsgChart([{ ...AAPL_POINT, epoch: 1e16 }]), latest)).toBeNull();
  });

  it('falls back to the run date for an out-of-range processing date', () => {
    const records = parseEsgChart('AAPL', makeEsgChart([AAPL_POINT], 1e16), latest);

    expect(records?.[0].last_processing_date).toBe('2024-07-01');
  });

  it('reads an epoch processing date from the payload', () => {
    const payload = makeEsgChart([AAPL_POINT], JAN_2024);

    const records = parseEsgChart('AAPL', payload, latest);

    expect(records?.[0].last_processing_date).toBe('2024-01-01');
  });
});

describe('toDateString', () => {
  it('formats ISO dates and rejects garbage', () => {
    expect(toDateString('2024-03-15')).toBe('2024-03-15');
    expect(toDateString('not a date')).toBeNull();
    expect(toDateString(undefined)).toBeNull();
    expect(toDateString(Number.NaN)).toBeNull();
    expect(toDateString(1e16)).toBeNull();
  });
});
