import { describe, it, expect } from 'vitest';
import { AggregateValidationError, ValidationError } from '@barreplay/utils';
import { formatError, handleError } from '../../src/core/error-handler.js';

describe('formatError', () => {
  it('lists aggregated validation failures line by line', () => {
    const error = new AggregateValidationError([
      new ValidationError('balance_init must be greater than 0'),
      new ValidationError('table must contain at least one bar'),
    ]);

    expect(formatError(error)).toEqual([
      'Invalid arguments:',
      '  - balance_init must be greater than 0',
      '  - table must contain at least one bar',
    ]);
  });

  it('uses the message of plain errors and strings', () => {
    expect(formatError(new Error('boom'))).toEqual(['boom']);
    expect(formatError('stopped')).toEqual(['stopped']);
  });

  it('hides values that are not errors', () => {
    expect(formatError({ code: 7 })).toEqual(['An unexpected error occurred']);
  });
});

describe('handleError', () => {
  it('returns the display lines', () => {
    expect(handleError(new ValidationError('bad csv'), { command: 'run' })).toEqual(['bad csv']);
  });
});
