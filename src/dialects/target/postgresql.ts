import Knex, { type Knex as KnexType } from 'knex';
import type { ConnectionFactory, SqlExecutor, SqlResult, SqlValue, TargetConfig, TargetConnection } from '../target';
import { registerTarget } from '../target-registry';
import { log } from '../../engine/logger';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/**
 * Narrow the pg driver's QueryResult returned through `knex.raw`.
 */
export const toSqlResult = (raw: unknown): SqlResult => {
  if (!isRecord(raw)) {
    return { rows: [], rowCount: 0 };
  }
  const rows = Array.isArray(raw.rows) ? raw.rows.filter(isRecord) : [];
  const rowCount = typeof raw.rowCount === 'number' ? raw.rowCount : rows.length;
  return { rows, rowCount };
};

const runRaw = async (client: KnexType, sql: string, bindings?: readonly SqlValue[]) => {
  const result: unknown = bindings && bindings.length > 0 ? await client.raw(sql, [...bindings]) : await client.raw(sql);
  return toSqlResult(result);
};

/**
 * PostgreSQL target connection.
 * A Knex instance whose pool holds a single connection to one database.
 */
class PostgreSQLConnection implements TargetConnection {
  readonly name = 'postgresql';

  readonly database: string;
  private readonly client: KnexType;

  constructor(config: TargetConfig, database: string) {
    if (config.type !== 'postgresql') {
      throw new Error('Invalid config type for PostgreSQL target');
    }

    const sslConfig = config.ssl ? { rejectUnauthorized: false } : false;

    this.database = database;
    this.client = Knex({
      client: 'pg',
      connection: {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database,
        application_name: 'bucketload',
        ssl: sslConfig,
      },
      pool: { min: 0, max: 1 },
      log: {
        warn: log.knex.warn,
        error: log.knex.error,
        deprecate: log.knex.deprecate,
        debug() {},
      },
    });
  }

  execute(sql: string, bindings?: readonly SqlValue[]): Promise<SqlResult> {
    return runRaw(this.client, sql, bindings);
  }

  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.client.transaction((trx) =>
      work({
        execute: (sql, bindings) => runRaw(trx, sql, bindings),
      })
    );
  }

  async close(): Promise<void> {
    await this.client.destroy();
  }
}

// One factory per server; each call opens a connection to the named database
registerTarget('postgresql', (config): ConnectionFactory => (database: string) => new PostgreSQLConnection(config, database));
