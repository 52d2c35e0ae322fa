/**
 * Database connection lifecycle and schema management
 */

import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger';
import { StorageUnavailableError } from './errors';
import { SqlValue } from './models';
import { SCHEMA_STATEMENTS } from './schema';

export interface DatabaseConfig {
  filename: string; // file path or ':memory:'
  timeoutMs?: number; // how long the engine waits on a locked file
  readonly?: boolean;
}

export interface ConnectionStatus {
  open: boolean;
  filename?: string;
  foreignKeys?: boolean;
  inTransaction?: boolean;
}

const DEFAULT_TIMEOUT_MS = 5000;

export class DatabaseConnection {
  private db: Database.Database | null = null;
  private filename: string;
  private logger = createLogger('DatabaseConnection');

  constructor(private config: DatabaseConfig) {
    this.filename = config.filename;
  }

  /**
   * Opens (or creates) the database file and turns on foreign key
   * enforcement for this connection. SQLite leaves it off by default, and
   * without it the ON DELETE CASCADE clauses are ignored.
   */
  open(filename: string = this.config.filename): void {
    if (this.db) {
      return;
    }

    let handle: Database.Database | undefined;
    try {
      handle = new Database(filename, {
        timeout: this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        readonly: this.config.readonly ?? false,
      });

      handle.pragma('foreign_keys = ON');
      if (handle.pragma('foreign_keys', { simple: true }) !== 1) {
        throw new Error('Foreign key enforcement could not be enabled');
      }

      // Fails on files that are not SQLite databases
      handle.prepare('SELECT count(*) FROM sqlite_master').get();
    } catch (error) {
      handle?.close();
      this.logger.error('Failed to open database', {
        filename,
        error: error instanceof Error ? error.message : error,
      });
      throw new StorageUnavailableError(filename, error);
    }

    this.db = handle;
    this.filename = filename;
    this.logger.info('Database opened', { filename });
  }

  /**
   * Creates any missing tables. Safe to call on every start.
   */
  ensureSchema(): void {
    const db = this.requireOpen();

    try {
      db.transaction(() => {
        this.checkSiteLayout(db);
        for (const statement of SCHEMA_STATEMENTS) {
          db.exec(statement);
        }
      })();
    } catch (error) {
      this.logger.error('Failed to create schema', {
        filename: this.filename,
        error: error instanceof Error ? error.message : error,
      });
      throw new StorageUnavailableError(this.filename, error);
    }

    this.logger.debug('Schema ensured', { filename: this.filename });
  }

  /**
   * Execute a write statement with bound parameters
   */
  run(sql: string, params: readonly SqlValue[] = []): Database.RunResult {
    const db = this.requireOpen();
    return this.timed(sql, params, () => db.prepare<SqlValue[]>(sql).run(...params));
  }

  /**
   * Fetch every row of a query
   */
  all<T>(sql: string, params: readonly SqlValue[] = []): T[] {
    const db = this.requireOpen();
    return this.timed(sql, params, () => db.prepare<SqlValue[], T>(sql).all(...params));
  }

  /**
   * Fetch the first row of a query, if any
   */
  get<T>(sql: string, params: readonly SqlValue[] = []): T | undefined {
    const db = this.requireOpen();
    return this.timed(sql, params, () => db.prepare<SqlValue[], T>(sql).get(...params));
  }

  /**
   * Execute a unit of work in a transaction. Commits when the callback
   * returns and rolls back when it throws.
   */
  transaction<T>(callback: () => T): T {
    const db = this.requireOpen();
    return db.transaction(callback)();
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.logger.info('Database connection closed', { filename: this.filename });
    }
  }

  getStatus(): ConnectionStatus {
    if (!this.db) {
      return { open: false };
    }

    return {
      open: true,
      filename: this.filename,
      foreignKeys: this.db.pragma('foreign_keys', { simple: true }) === 1,
      inTransaction: this.db.inTransaction,
    };
  }

  // Older files key sites by channel_id; they are refused rather than migrated
  private checkSiteLayout(db: Database.Database): void {
    const columns = db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('sites')")
      .all()
      .map((column) => column.name);

    if (columns.length > 0 && !columns.includes('parent_id')) {
      const legacy = columns.includes('channel_id') ? ' (legacy channel_id layout)' : '';
      throw new Error(`sites table has no parent_id column${legacy}; migrate or remove the file`);
    }
  }

  private requireOpen(): Database.Database {
    if (!this.db) {
      throw new StorageUnavailableError(
        this.filename,
        new Error('Database not open. Call open() first.'),
      );
    }
    return this.db;
  }

  private timed<T>(sql: string, params: readonly SqlValue[], execute: () => T): T {
    const start = Date.now();

    try {
      const result = execute();
      this.logger.debug(`Query executed in ${Date.now() - start}ms`, {
        query: sql,
        params,
      });
      return result;
    } catch (error) {
      this.logger.warn('Query execution failed', {
        query: sql,
        params,
        error: error instanceof Error ? error.message : error,
      });
      throw error;
    }
  }
}

export default DatabaseConnection;
