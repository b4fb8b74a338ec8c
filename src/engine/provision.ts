import type { SqlExecutor } from '../dialects/target';
import { IngestError } from './errors';
import { qualifiedTable, quoteIdentifier } from './identifiers';
import { log, formatGroupKey } from './logger';
import { SQL_TYPES } from './schema-inference';
import type { GroupKey, InferredColumn } from './types';

export type DatabaseProvisioning = 'created' | 'exists';

const wrap = async <T>(what: string, work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (err) {
    if (err instanceof IngestError) throw err;
    throw new IngestError('provision', `Failed to provision ${what}`, { cause: err });
  }
};

/**
 * Create the database when the server catalog does not list it.
 * `admin` must be a plain connection: CREATE DATABASE cannot run inside a transaction block.
 */
export const ensureDatabase = async (admin: SqlExecutor, database: string): Promise<DatabaseProvisioning> => {
  const quoted = quoteIdentifier(database);
  return wrap(`database ${database}`, async () => {
    const existing = await admin.execute('SELECT 1 FROM pg_database WHERE datname = ?', [database]);
    if (existing.rows.length > 0) {
      log.info(`Database ${database} already exists`);
      return 'exists';
    }

    await admin.execute(`CREATE DATABASE ${quoted}`);
    log.success(`Database ${database} created`);
    return 'created';
  });
};

export const ensureSchema = async (conn: SqlExecutor, schema: string): Promise<void> => {
  const quoted = quoteIdentifier(schema);
  await wrap(`schema ${schema}`, () => conn.execute(`CREATE SCHEMA IF NOT EXISTS ${quoted}`));
};

export const buildCreateTable = (key: GroupKey, columns: readonly InferredColumn[]): string => {
  const definitions = columns.map((column) => `${quoteIdentifier(column.name)} ${SQL_TYPES[column.type]}`);
  return `CREATE TABLE IF NOT EXISTS ${qualifiedTable(key)} (${definitions.join(', ')})`;
};

export const buildCreateImageTable = (key: GroupKey): string =>
  `CREATE TABLE IF NOT EXISTS ${qualifiedTable(key)} (
    id SERIAL PRIMARY KEY,
    file_name TEXT NOT NULL,
    url TEXT NOT NULL UNIQUE
  )`;

/**
 * Create the schema and a table with one column per inferred column.
 * An existing table is left as it is.
 */
export const ensureTable = async (conn: SqlExecutor, key: GroupKey, columns: readonly InferredColumn[]): Promise<void> => {
  const ddl = buildCreateTable(key, columns);
  await ensureSchema(conn, key.schema);
  await wrap(`table ${formatGroupKey(key)}`, () => conn.execute(ddl));
};

/**
 * Create the schema and the image-metadata table (generated id, unique url).
 */
export const ensureImageTable = async (conn: SqlExecutor, key: GroupKey): Promise<void> => {
  const ddl = buildCreateImageTable(key);
  await ensureSchema(conn, key.schema);
  await wrap(`table ${formatGroupKey(key)}`, () => conn.execute(ddl));
};
