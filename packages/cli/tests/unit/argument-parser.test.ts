import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '@barreplay/utils';
import { normalizeOptions, parseArguments } from '../../src/core/argument-parser.js';

const schema = z.object({
  csv: z.string(),
  splits: z.number().int().optional().default(1),
});

describe('parseArguments', () => {
  it('returns parsed values with defaults applied', () => {
    expect(parseArguments(schema, { csv: 'bars.csv' })).toEqual({ csv: 'bars.csv', splits: 1 });
  });

  it('lists every issue in the error message', () => {
    let caught: unknown;
    try {
      parseArguments(schema, { splits: 1.5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError ? caught.message : '').toBe(
      [
        'Invalid arguments:',
        '  csv: Required',
        '  splits: Expected integer, received float',
      ].join('\n')
    );
  });
});

describe('normalizeOptions', () => {
  it('drops null and undefined values and keeps keys as given', () => {
    expect(
      normalizeOptions({ makerFee: 0.001, takerFee: undefined, name: null, barsPerYear: 0 })
    ).toEqual({ makerFee: 0.001, barsPerYear: 0 });
  });
});
