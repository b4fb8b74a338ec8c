/** Values this project binds into statements */
export type SqlValue = string | number | null;

export type SqlResult = {
  rows: Record<string, unknown>[];
  rowCount: number;
};

export interface SqlExecutor {
  /** Run one statement; `?` placeholders are filled from `bindings`, and `\?` is a literal `?` */
  execute(sql: string, bindings?: readonly SqlValue[]): Promise<SqlResult>;
}

/**
 * Target connection interface.
 * One instance is bound to one database for its whole lifetime.
 */
export interface TargetConnection extends SqlExecutor {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  readonly database: string;

  /** Run `work` in a transaction; commits when it resolves, rolls back when it throws */
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

/** Opens a connection to the named database on the configured server */
export type ConnectionFactory = (database: string) => TargetConnection;

/**
 * Configuration for target dialects
 */
export type TargetConfig =
  | {
      type: 'postgresql';
      host: string;
      port: number;
      user: string;
      password: string;
      ssl: boolean;
      /** Database used to look up and create target databases */
      adminDatabase: string;
    }
  | { type: 'custom'; [key: string]: unknown };
