import type {
  ConnectionFactory,
  SqlExecutor,
  SqlResult,
  SqlValue,
  TargetConnection,
} from '../dialects/target';

export type FakeRow = Record<string, SqlValue>;

export type FakeColumn = {
  name: string;
  type: string;
  serial: boolean;
  unique: boolean;
  notNull: boolean;
};

type FakeTable = {
  columns: FakeColumn[];
  rows: FakeRow[];
  nextId: number;
};

type FakeDatabase = {
  schemas: Set<string>;
  tables: Map<string, FakeTable>;
};

export type RecordedStatement = {
  database: string;
  sql: string;
  bindings: SqlValue[];
  inTransaction: boolean;
};

/** Carries the fields the pg driver puts on server errors */
export class FakePgError extends Error {
  readonly severity = 'ERROR';

  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'FakePgError';
  }
}

const IDENT = '"((?:[^"]|"")*)"';
// the query builder turns `\?` into a literal `?` before the server sees it
const unquote = (raw: string): string => raw.replace(/""/g, '"').replace(/\\\?/g, '?');
const PLACEHOLDER = /(?<!\\)\?/g;

const SELECT_DATABASE = /^SELECT 1 FROM pg_database WHERE datname = \?$/;
const CREATE_DATABASE = new RegExp(`^CREATE DATABASE ${IDENT}$`);
const CREATE_SCHEMA = new RegExp(`^CREATE SCHEMA IF NOT EXISTS ${IDENT}$`);
const CREATE_TABLE = new RegExp(`^CREATE TABLE IF NOT EXISTS ${IDENT}\\.${IDENT} \\((.*)\\)$`);
const INSERT = new RegExp(
  `^INSERT INTO ${IDENT}\\.${IDENT} \\((.*?)\\) VALUES (.*) ON CONFLICT (?:\\(${IDENT}\\) )?DO NOTHING$`
);
const COLUMN_DEF = new RegExp(`(?:${IDENT}|([a-z_]+)) ([A-Z]+)([^,]*)`, 'g');
const IDENT_GLOBAL = new RegExp(IDENT, 'g');

const parseColumns = (definitions: string): FakeColumn[] =>
  Array.from(definitions.matchAll(COLUMN_DEF), (match) => {
    const rest = match[4] ?? '';
    return {
      name: match[1] !== undefined ? unquote(match[1]) : match[2] ?? '',
      type: match[3] ?? '',
      serial: match[3] === 'SERIAL',
      unique: rest.includes('UNIQUE') || rest.includes('PRIMARY KEY'),
      notNull: rest.includes('NOT NULL') || rest.includes('PRIMARY KEY'),
    };
  });

const tableId = (schema: string, table: string): string => `${schema}.${table}`;

const cloneDatabase = (db: FakeDatabase): FakeDatabase => ({
  schemas: new Set(db.schemas),
  tables: new Map(
    Array.from(db.tables, ([id, table]) => [id, { ...table, rows: table.rows.map((row) => ({ ...row })) }])
  ),
});

/**
 * In-process stand-in for a PostgreSQL server. It understands exactly the
 * statements this project emits and records every one of them.
 */
export class FakePostgresServer {
  readonly statements: RecordedStatement[] = [];
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  commits = 0;
  rollbacks = 0;

  private readonly databases = new Map<string, FakeDatabase>();
  private failure?: { match: (sql: string) => boolean; error: Error };

  constructor(existingDatabases: readonly string[] = ['postgres']) {
    for (const name of existingDatabases) {
      this.databases.set(name, { schemas: new Set(['public']), tables: new Map() });
    }
  }

  readonly connect: ConnectionFactory = (database: string) => {
    this.opened.push(database);
    return new FakeConnection(this, database);
  };

  /** Make every statement matching `match` fail with `error` */
  failOn(match: (sql: string) => boolean, error: Error): void {
    this.failure = { match, error };
  }

  hasDatabase(name: string): boolean {
    return this.databases.has(name);
  }

  hasSchema(database: string, schema: string): boolean {
    return this.databases.get(database)?.schemas.has(schema) ?? false;
  }

  columns(database: string, schema: string, table: string): FakeColumn[] | undefined {
    return this.databases.get(database)?.tables.get(tableId(schema, table))?.columns;
  }

  rows(database: string, schema: string, table: string): FakeRow[] {
    return this.databases.get(database)?.tables.get(tableId(schema, table))?.rows ?? [];
  }

  statementsFor(database: string): string[] {
    return this.statements.filter((s) => s.database === database).map((s) => s.sql);
  }

  snapshot(database: string): FakeDatabase | undefined {
    const db = this.databases.get(database);
    return db ? cloneDatabase(db) : undefined;
  }

  restore(database: string, state: FakeDatabase): void {
    this.databases.set(database, state);
  }

  execute(database: string, rawSql: string, bindings: SqlValue[], inTransaction: boolean): SqlResult {
    const sql = rawSql.replace(/\s+/g, ' ').trim();
    this.statements.push({ database, sql, bindings, inTransaction });

    if (this.failure?.match(sql)) {
      throw this.failure.error;
    }

    const placeholders = sql.match(PLACEHOLDER)?.length ?? 0;
    if (placeholders !== bindings.length) {
      throw new FakePgError(
        '08P01',
        `bind message supplies ${bindings.length} parameters, but prepared statement requires ${placeholders}`
      );
    }

    const db = this.databases.get(database);
    if (!db) {
      throw new FakePgError('3D000', `database "${database}" does not exist`);
    }

    if (SELECT_DATABASE.test(sql)) {
      const exists = typeof bindings[0] === 'string' && this.databases.has(bindings[0]);
      return exists ? { rows: [{ '?column?': 1 }], rowCount: 1 } : { rows: [], rowCount: 0 };
    }

    const createDatabase = CREATE_DATABASE.exec(sql);
    if (createDatabase) {
      if (inTransaction) {
        throw new FakePgError('25001', 'CREATE DATABASE cannot run inside a transaction block');
      }
      const name = unquote(createDatabase[1]);
      if (this.databases.has(name)) {
        throw new FakePgError('42P04', `database "${name}" already exists`);
      }
      this.databases.set(name, { schemas: new Set(['public']), tables: new Map() });
      return { rows: [], rowCount: 0 };
    }

    const createSchema = CREATE_SCHEMA.exec(sql);
    if (createSchema) {
      db.schemas.add(unquote(createSchema[1]));
      return { rows: [], rowCount: 0 };
    }

    const createTable = CREATE_TABLE.exec(sql);
    if (createTable) {
      const schema = unquote(createTable[1]);
      const table = unquote(createTable[2]);
      if (!db.schemas.has(schema)) {
        throw new FakePgError('3F000', `schema "${schema}" does not exist`);
      }
      const id = tableId(schema, table);
      if (!db.tables.has(id)) {
        db.tables.set(id, { columns: parseColumns(createTable[3]), rows: [], nextId: 1 });
      }
      return { rows: [], rowCount: 0 };
    }

    const insert = INSERT.exec(sql);
    if (insert) {
      return this.insert(db, insert, bindings);
    }

    throw new FakePgError('42601', `unsupported statement: ${sql}`);
  }

  private insert(db: FakeDatabase, match: RegExpExecArray, bindings: SqlValue[]): SqlResult {
    const schema = unquote(match[1]);
    const table = unquote(match[2]);
    const target = db.tables.get(tableId(schema, table));
    if (!target) {
      throw new FakePgError('42P01', `relation "${schema}.${table}" does not exist`);
    }

    const columns = Array.from(match[3].matchAll(IDENT_GLOBAL), (m) => unquote(m[1]));
    const conflictColumn = match[5] !== undefined ? unquote(match[5]) : undefined;
    if (conflictColumn && !target.columns.some((c) => c.name === conflictColumn && c.unique)) {
      throw new FakePgError('42P10', 'there is no unique or exclusion constraint matching the ON CONFLICT specification');
    }

    let inserted = 0;
    for (let i = 0; i < bindings.length; i += columns.length) {
      const row: FakeRow = {};
      columns.forEach((name, j) => {
        row[name] = bindings[i + j] ?? null;
      });

      for (const column of target.columns) {
        if (column.serial && row[column.name] === undefined) {
          row[column.name] = target.nextId++;
        }
        if (column.notNull && (row[column.name] === undefined || row[column.name] === null)) {
          throw new FakePgError('23502', `null value in column "${column.name}" violates not-null constraint`);
        }
      }

      const duplicate = target.columns.some(
        (column) => column.unique && target.rows.some((existing) => existing[column.name] === row[column.name])
      );
      if (duplicate) {
        continue;
      }

      target.rows.push(row);
      inserted++;
    }

    return { rows: [], rowCount: inserted };
  }
}

class FakeConnection implements TargetConnection {
  readonly name = 'fake-postgresql';
  closeCount = 0;

  constructor(
    private readonly server: FakePostgresServer,
    readonly database: string
  ) {}

  async execute(sql: string, bindings: readonly SqlValue[] = []): Promise<SqlResult> {
    this.assertOpen();
    return this.server.execute(this.database, sql, [...bindings], false);
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.assertOpen();
    const before = this.server.snapshot(this.database);
    try {
      const result = await work({
        execute: async (sql, bindings = []) => this.server.execute(this.database, sql, [...bindings], true),
      });
      this.server.commits++;
      return result;
    } catch (err) {
      if (before) {
        this.server.restore(this.database, before);
      }
      this.server.rollbacks++;
      throw err;
    }
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.server.closed.push(this.database);
  }

  private assertOpen(): void {
    if (this.closeCount > 0) {
      throw new Error(`Connection to ${this.database} is closed`);
    }
  }
}
