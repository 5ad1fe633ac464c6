/**
 * Bar Types
 */

/**
 * Strictly increasing, unique bar key (epoch milliseconds or a plain sequence number)
 */
export type BarKey = number;

export interface Bar {
  key: BarKey;
  open: number;
  high: number;
  low: number;
  close: number;
}

/**
 * A validated bar plus any extra columns from the input table.
 * Extra columns reach the strategy untouched.
 */
export type BarRecord = Bar & Readonly<Record<string, unknown>>;

/**
 * Raw, unvalidated input row
 */
export type BarTableRow = Readonly<Record<string, unknown>>;

export type BarTable = readonly BarTableRow[];

export const REQUIRED_BAR_COLUMNS = ['open', 'high', 'low', 'close'] as const;

export type RequiredBarColumn = (typeof REQUIRED_BAR_COLUMNS)[number];
