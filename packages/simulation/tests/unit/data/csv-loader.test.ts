import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { NotFoundError, ValidationError } from '@barreplay/utils';
import { loadBarsFromCsv, parseBarsCsv, parseKey } from '../../../src/data/csv-loader.js';

describe('parseKey', () => {
  it('keeps numeric keys', () => {
    expect(parseKey('42')).toBe(42);
    expect(parseKey(' 1.5 ')).toBe(1.5);
  });

  it('reads ISO dates as UTC epoch milliseconds', () => {
    expect(parseKey('2024-01-01T00:00:00Z')).toBe(1704067200000);
    expect(parseKey('2024-01-01T00:01:00')).toBe(1704067260000);
    expect(parseKey('2024-01-01')).toBe(1704067200000);
  });

  it('returns NaN for anything else', () => {
    expect(parseKey('yesterday')).toBeNaN();
    expect(parseKey('')).toBeNaN();
  });
});

describe('parseBarsCsv', () => {
  it('parses numbers, empty cells and the key column', async () => {
    const rows = await parseBarsCsv(
      [
        'timestamp,open,high,low,close,note',
        '2024-01-01T00:00:00Z,100,101,99,100.5,',
        '2024-01-01T00:01:00Z,100.5,102,100,101,spike',
      ].join('\n')
    );

    expect(rows).toEqual([
      {
        timestamp: '2024-01-01T00:00:00Z',
        open: 100,
        high: 101,
        low: 99,
        close: 100.5,
        note: null,
        key: 1704067200000,
      },
      {
        timestamp: '2024-01-01T00:01:00Z',
        open: 100.5,
        high: 102,
        low: 100,
        close: 101,
        note: 'spike',
        key: 1704067260000,
      },
    ]);
  });

  it('uses the first key column it finds', async () => {
    const rows = await parseBarsCsv('index,open,high,low,close\n7,1,2,0.5,1.5\n8,1.5,2,1,1.8\n');

    expect(rows.map((row) => row.key)).toEqual([7, 8]);
  });

  it('returns no rows for a header-only file', async () => {
    await expect(parseBarsCsv('timestamp,open,high,low,close\n')).resolves.toEqual([]);
  });

  it('rejects a table without a key column', async () => {
    await expect(parseBarsCsv('open,high,low,close\n1,2,0.5,1.5\n')).rejects.toThrow(
      ValidationError
    );
    await expect(parseBarsCsv('open,high,low,close\n1,2,0.5,1.5\n')).rejects.toThrow(
      'CSV must have a key column (timestamp, time, date, index)'
    );
  });
});

describe('loadBarsFromCsv', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'barreplay-csv-'));
    writeFileSync(path.join(dir, 'bars.csv'), 'time,open,high,low,close\n1,10,11,9,10.5\n');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a file from disk', async () => {
    const rows = await loadBarsFromCsv(path.join(dir, 'bars.csv'));

    expect(rows).toEqual([{ time: 1, open: 10, high: 11, low: 9, close: 10.5, key: 1 }]);
  });

  it('reports a missing file as not found', async () => {
    await expect(loadBarsFromCsv(path.join(dir, 'missing.csv'))).rejects.toThrow(NotFoundError);
  });
});
