/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers/booleans) but NEVER rename keys.
 */

import { ValidationError } from '@barreplay/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Coerce a value to an integer (negative allowed)
 */
export function coerceInteger(v: unknown, name: string): number | undefined {
  const n = coerceNumber(v, name);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new ValidationError(`Invalid integer for ${name}`, { name, value: v });
  }
  return n;
}

/**
 * Coerce a value to a boolean
 * Accepts:
 * - Boolean: returns as-is
 * - String: 'true'/'false'/'1'/'0'/'yes'/'no'/'on'/'off' (case-insensitive)
 * - Number: 1 -> true, 0 -> false
 * - undefined/null returns undefined
 */
export function coerceBoolean(v: unknown, name: string): boolean | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v !== 0;
  if (isString(v)) {
    const lower = v.trim().toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on') return true;
    if (lower === 'false' || lower === '0' || lower === 'no' || lower === 'off') return false;
    throw new ValidationError(`Invalid boolean for ${name}`, { name, value: v });
  }
  throw new ValidationError(`Invalid boolean for ${name}`, { name, value: v });
}
