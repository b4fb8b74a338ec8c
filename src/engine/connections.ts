import type { ConnectionFactory, TargetConnection } from '../dialects/target';
import { IngestError } from './errors';
import { log, formatDbError } from './logger';
import { ensureDatabase } from './provision';

/**
 * Owns one live connection per target database for the duration of a run.
 *
 * The first `acquire` for a database checks for it (and creates it) through a
 * short-lived connection to the administrative database, then opens and caches
 * a connection to the target. `closeAll` releases everything exactly once.
 */
export class ConnectionManager {
  private readonly connections = new Map<string, TargetConnection>();
  private closed = false;

  constructor(
    private readonly connect: ConnectionFactory,
    private readonly adminDatabase: string
  ) {}

  async acquire(database: string): Promise<TargetConnection> {
    if (this.closed) {
      throw new IngestError('connection', 'Connection manager is already closed');
    }

    const existing = this.connections.get(database);
    if (existing) {
      return existing;
    }

    const admin = this.open(this.adminDatabase);
    try {
      await ensureDatabase(admin, database);
    } catch (err) {
      // the provisioning error is the one to report
      await admin.close().catch((closeErr: unknown) => {
        log.error(`Failed to close connection to ${this.adminDatabase}: ${formatDbError(closeErr)}`);
      });
      throw err;
    }
    await admin.close().catch((closeErr: unknown) => {
      throw new IngestError('connection', `Failed to close connection to ${this.adminDatabase}`, { cause: closeErr });
    });

    const connection = this.open(database);
    this.connections.set(database, connection);
    log.info(`Connected to ${database}`);
    return connection;
  }

  openDatabases(): string[] {
    return Array.from(this.connections.keys());
  }

  /**
   * Close every cached connection. A failing close does not stop the others;
   * the first failure is rethrown once all have been attempted.
   */
  async closeAll(): Promise<void> {
    this.closed = true;
    const failures: unknown[] = [];

    for (const [database, connection] of this.connections) {
      try {
        await connection.close();
      } catch (err) {
        log.error(`Failed to close connection to ${database}`);
        failures.push(err);
      }
    }
    this.connections.clear();

    if (failures.length > 0) {
      throw new IngestError('connection', `Failed to close ${failures.length} connection(s)`, { cause: failures[0] });
    }
  }

  private open(database: string): TargetConnection {
    try {
      return this.connect(database);
    } catch (err) {
      throw new IngestError('connection', `Cannot open a connection to ${database}`, { cause: err });
    }
  }
}
