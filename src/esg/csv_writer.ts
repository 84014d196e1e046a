/**
 * CSV row writer
 * Appends one row per record; every append is synchronous so rows written
 * before a failure stay on disk.
 */

import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createChildLogger } from '@/utils/logger';
import { toError, WriteError } from './errors';
import { ESG_COLUMNS, type EsgRecord, type EsgRowSink } from './types';

const logger = createChildLogger('csv_writer');

export function escapeCsvCell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsvRow(record: EsgRecord): string {
  return ESG_COLUMNS.map((column) => escapeCsvCell(record[column])).join(',');
}

export const CSV_HEADER = ESG_COLUMNS.join(',');

export class CsvRowWriter implements EsgRowSink {
  private rowsWritten = 0;

  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  getRowsWritten(): number {
    return this.rowsWritten;
  }

  /** Creates the file with a header row unless it already has content. */
  ensureHeader(): void {
    try {
      if (existsSync(this.filePath) && statSync(this.filePath).size > 0) {
        return;
      }
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, `${CSV_HEADER}\n`, 'utf-8');
      logger.debug({ filePath: this.filePath }, 'Created output file with header');
    } catch (error) {
      throw new WriteError(this.filePath, toError(error));
    }
  }

  append(record: EsgRecord): void {
    try {
      appendFileSync(this.filePath, `${formatCsvRow(record)}\n`, 'utf-8');
    } catch (error) {
      throw new WriteError(this.filePath, toError(error));
    }
    this.rowsWritten++;
  }
}
