/**
 * CSV Bar Loader
 *
 * Reads an OHLC table from CSV. The key column (timestamp, time, date or
 * index) holds either numbers or ISO-8601 dates, which become epoch
 * milliseconds. Rows are returned unvalidated.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '@barreplay/utils';
import type { BarTableRow } from '../types/bar.js';
import { logger } from '../logger.js';

export const KEY_COLUMNS = ['timestamp', 'time', 'date', 'index'] as const;

const CsvRecordsSchema = z.array(z.record(z.string()));

function parseCell(value: string): string | number | null {
  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }
  const numeric = Number(trimmed);
  return Number.isFinite(numeric) ? numeric : trimmed;
}

/**
 * Numeric keys are used as-is; anything else is read as an ISO date in UTC
 */
export function parseKey(value: string): number {
  const trimmed = value.trim();
  const numeric = Number(trimmed);
  if (trimmed !== '' && Number.isFinite(numeric)) {
    return numeric;
  }
  const date = DateTime.fromISO(trimmed, { zone: 'utc' });
  return date.isValid ? date.toMillis() : NaN;
}

function readRecords(content: string): Promise<unknown> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        columns: true,
        skip_empty_lines: true,
        trim: true,
      },
      (err, records: unknown) => {
        if (err) reject(err);
        else resolve(records);
      }
    );
  });
}

export async function parseBarsCsv(content: string): Promise<BarTableRow[]> {
  const records = CsvRecordsSchema.parse(await readRecords(content));
  if (records.length === 0) {
    return [];
  }

  const header = Object.keys(records[0]);
  const keyColumn = KEY_COLUMNS.find((column) => header.includes(column));
  if (keyColumn === undefined) {
    throw new ValidationError(`CSV must have a key column (${KEY_COLUMNS.join(', ')})`, {
      header,
    });
  }

  return records.map((record) => {
    const row: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(record)) {
      row[column] = parseCell(value);
    }
    row.key = parseKey(record[keyColumn] ?? '');
    return row;
  });
}

export async function loadBarsFromCsv(csvPath: string): Promise<BarTableRow[]> {
  const filePath = path.isAbsolute(csvPath) ? csvPath : path.join(process.cwd(), csvPath);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    logger.error('Failed to read CSV', error, { path: filePath });
    throw new NotFoundError('CSV file', filePath);
  }

  const rows = await parseBarsCsv(content);
  logger.debug('Loaded bars from CSV', { path: filePath, rows: rows.length });
  return rows;
}
