/**
 * Ticker source - one symbol per line, no header
 */

import { existsSync, readFileSync } from 'fs';
import { EmptyInputError, InputNotFoundError } from './errors';

export function normalizeTicker(raw: string): string {
  const [firstCell = ''] = raw.split(',');
  return firstCell.trim().replace(/^["']|["']$/g, '').trim().toUpperCase();
}

/**
 * Parses ticker lines, skipping blanks and keeping the first occurrence of
 * each symbol.
 */
export function parseTickers(content: string): string[] {
  const tickers: string[] = [];
  const seen = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const ticker = normalizeTicker(line);
    if (ticker && !seen.has(ticker)) {
      seen.add(ticker);
      tickers.push(ticker);
    }
  }
  return tickers;
}

export function readTickers(filePath: string): string[] {
  if (!existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }

  const tickers = parseTickers(readFileSync(filePath, 'utf-8'));
  if (tickers.length === 0) {
    throw new EmptyInputError(filePath);
  }
  return tickers;
}
