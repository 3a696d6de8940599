import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DatabaseError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

type SqlParam = string | number | bigint | Buffer | null;

/**
 * SQLite database adapter
 * Domain layer never imports this - accessed via dependency injection
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    try {
      if (env.SQLITE_DB_PATH !== ':memory:') {
        mkdirSync(dirname(env.SQLITE_DB_PATH), { recursive: true });
      }
      this.db = new Database(env.SQLITE_DB_PATH);
      this.db.pragma('journal_mode = WAL'); // Write-Ahead Logging for better concurrency
      this.db.pragma('foreign_keys = ON');
      this.initializeSchema();
      logger.info('Database initialized', { path: env.SQLITE_DB_PATH });
    } catch (error) {
      throw wrapError('Failed to initialize database', error);
    }
  }

  private initializeSchema(): void {
    const schemaPath = join(__dirname, 'db', 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug('Database schema initialized');
  }

  /**
   * Execute a query with parameters
   * Wraps errors in DatabaseError
   */
  query<T>(sql: string, params: SqlParam[] = []): T[] {
    try {
      const stmt = this.db.prepare<SqlParam[], T>(sql);
      return stmt.all(...params);
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw wrapError('Query execution failed', error, sql);
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: SqlParam[] = []): T | null {
    try {
      const stmt = this.db.prepare<SqlParam[], T>(sql);
      return stmt.get(...params) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw wrapError('QueryOne execution failed', error, sql);
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows
   */
  execute(sql: string, params: SqlParam[] = []): number {
    try {
      const stmt = this.db.prepare<SqlParam[]>(sql);
      const result = stmt.run(...params);
      return result.changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw wrapError('Execute failed', error, sql);
    }
  }

  isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}

function wrapError(message: string, error: unknown, sql?: string): DatabaseError {
  const sqliteCode = error instanceof Database.SqliteError ? error.code : null;
  const cause = error instanceof Error ? error.message : String(error);
  return new DatabaseError(`${message}: ${cause}`, sqliteCode, { sql, sqliteCode });
}
