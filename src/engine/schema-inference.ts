import type { CellValue, ColumnType, InferredColumn, MergedDataset } from './types';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export const SQL_TYPES: Record<ColumnType, string> = {
  integer: 'INTEGER',
  real: 'REAL',
  text: 'TEXT',
};

const isInt64 = (value: string): boolean => {
  if (!INTEGER_PATTERN.test(value)) return false;
  const parsed = BigInt(value);
  return parsed >= INT64_MIN && parsed <= INT64_MAX;
};

/**
 * Classify one fully merged column.
 *
 * integer: at least one value, no nulls, every value a 64-bit integer literal.
 * real:    every non-null value numeric; nulls allowed, so a column that has rows
 *          but only nulls is real.
 * text:    everything else, including a column without rows and integer literals
 *          outside the 64-bit range.
 */
export const inferColumnType = (values: readonly CellValue[]): ColumnType => {
  if (values.length === 0) return 'text';

  let sawNull = false;
  let allIntegral = true;

  for (const raw of values) {
    if (raw === null) {
      sawNull = true;
      continue;
    }
    const value = raw.trim();
    if (INTEGER_PATTERN.test(value)) {
      if (!isInt64(value)) return 'text';
      continue;
    }
    if (!REAL_PATTERN.test(value)) return 'text';
    allIntegral = false;
  }

  return allIntegral && !sawNull ? 'integer' : 'real';
};

export const inferSchema = (dataset: MergedDataset): InferredColumn[] =>
  dataset.columns.map((name, index) => ({
    name,
    type: inferColumnType(dataset.rows.map((row) => row[index] ?? null)),
  }));

/**
 * Convert a CSV cell to the value bound for its column type.
 */
export const coerceCell = (type: ColumnType, value: CellValue): string | number | null => {
  if (value === null) return null;
  if (type === 'text') return value;
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  // integers past 2^53 are bound as text and cast by the server
  if (type === 'integer' && !Number.isSafeInteger(parsed)) return trimmed;
  return parsed;
};
