import type { SqlExecutor, SqlValue, TargetConnection } from '../dialects/target';
import { IngestError } from './errors';
import { qualifiedTable, quoteIdentifier } from './identifiers';
import { log, formatGroupKey } from './logger';
import { coerceCell } from './schema-inference';
import type { GroupKey, ImageRecord, InferredColumn, LoadOptions, MergedDataset } from './types';

export const IMAGE_COLUMNS: ReadonlyArray<string> = ['file_name', 'url'];

/** Bind parameters the server accepts in one statement */
export const MAX_BIND_PARAMETERS = 65535;

const buildValuesPlaceholder = (columnCount: number, rowCount: number): string => {
  const row = `(${Array.from({ length: columnCount }, () => '?').join(', ')})`;
  return Array.from({ length: rowCount }, () => row).join(', ');
};

/**
 * `INSERT INTO "schema"."table" ("a", "b") VALUES (?, ?), ... <conflict clause>`
 */
export const buildInsert = (
  key: GroupKey,
  columns: readonly string[],
  rowCount: number,
  conflictTarget?: string
): string => {
  const columnList = columns.map(quoteIdentifier).join(', ');
  const onConflict = conflictTarget ? `ON CONFLICT (${quoteIdentifier(conflictTarget)}) DO NOTHING` : 'ON CONFLICT DO NOTHING';
  return `INSERT INTO ${qualifiedTable(key)} (${columnList}) VALUES ${buildValuesPlaceholder(columns.length, rowCount)} ${onConflict}`;
};

type InsertPlan = {
  key: GroupKey;
  columns: readonly string[];
  rows: SqlValue[][];
  conflictTarget?: string;
};

/**
 * Rows per statement: `batchSize`, lowered for wide tables so that
 * rows × columns stays within MAX_BIND_PARAMETERS.
 */
export const rowsPerStatement = (columnCount: number, batchSize: number): number =>
  Math.max(1, Math.min(batchSize, Math.floor(MAX_BIND_PARAMETERS / Math.max(1, columnCount))));

/**
 * Submit every row of a group inside one transaction, in chunks sized by
 * `rowsPerStatement`. The commit happens once, after the last chunk.
 */
const insertAll = async (conn: TargetConnection, plan: InsertPlan, options: LoadOptions): Promise<number> => {
  if (plan.rows.length === 0) {
    return 0;
  }

  const batchSize = rowsPerStatement(plan.columns.length, options.batchSize);
  const start = Date.now();

  const inserted = await conn
    .transaction(async (tx: SqlExecutor) => {
      let count = 0;
      for (let i = 0; i < plan.rows.length; i += batchSize) {
        const batch = plan.rows.slice(i, i + batchSize);
        const sql = buildInsert(plan.key, plan.columns, batch.length, plan.conflictTarget);
        const result = await tx.execute(sql, batch.flat());
        count += result.rowCount;
      }
      return count;
    })
    .catch((err: unknown) => {
      if (err instanceof IngestError) throw err;
      throw new IngestError('load', `Failed to load rows into ${formatGroupKey(plan.key)}`, { cause: err });
    });

  log.db('inserted', inserted, Date.now() - start);
  return inserted;
};

/**
 * Load a merged dataset. Tabular tables carry no unique constraint, so the
 * conflict clause never fires and a reload appends the rows again.
 */
export const loadRows = async (
  conn: TargetConnection,
  key: GroupKey,
  columns: readonly InferredColumn[],
  dataset: MergedDataset,
  options: LoadOptions
): Promise<number> => {
  const rows = dataset.rows.map((row) => columns.map((column, i) => coerceCell(column.type, row[i] ?? null)));
  return insertAll(
    conn,
    { key, columns: columns.map((column) => column.name), rows },
    options
  );
};

/**
 * Load image references. The url column is unique, so a reload is a no-op.
 */
export const loadImages = async (
  conn: TargetConnection,
  key: GroupKey,
  records: readonly ImageRecord[],
  options: LoadOptions
): Promise<number> => {
  const rows = records.map((record): SqlValue[] => [record.fileName, record.url]);
  return insertAll(conn, { key, columns: IMAGE_COLUMNS, rows, conflictTarget: 'url' }, options);
};
