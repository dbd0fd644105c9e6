/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database. When opened with a file path it loads the file on
 * startup and writes it back atomically after every committed mutation.
 * Without a path the database lives only in memory (tests, dry runs).
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import { createLogger } from '../utils/logger';

const logger = createLogger('db');

/**
 * Values that can be bound to SQL parameters in sql.js.
 */
export type { SqlValue };

/**
 * Parameter array accepted by Database.run() / Database.query().
 */
export type SqlParams = SqlValue[];

/** A result row keyed by column name. */
export type SqlRow = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface Database {
  close(): void;
  save(): void;

  // Raw SQL access
  run(sql: string, params?: SqlParams): void;
  exec(sql: string): void;
  query(sql: string, params?: SqlParams): SqlRow[];
  /** Rows touched by the last INSERT/UPDATE/DELETE */
  changes(): number;

  /**
   * Run `fn` atomically. The outermost call opens a transaction; nested calls
   * open savepoints, so an inner failure rolls back only the inner work.
   * `fn` must be synchronous.
   */
  transaction<T>(fn: () => T): T;
  inTransaction(): boolean;
}

export interface DatabaseOptions {
  /** Path of the SQLite file. Omit for a memory-only database. */
  file?: string | null;
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

/**
 * Open a database handle. Each call returns an independent handle.
 */
export async function createDatabase(options: DatabaseOptions = {}): Promise<Database> {
  const file = options.file ?? null;

  // Initialize sql.js WASM
  const SQL = await initSqlJs();

  let sqlJsDb: SqlJsDatabase;
  if (file && existsSync(file)) {
    logger.info(`Opening database: ${file}`);
    sqlJsDb = new SQL.Database(readFileSync(file));
  } else {
    if (file) {
      mkdirSync(dirname(file), { recursive: true });
      logger.info(`Creating database: ${file}`);
    }
    sqlJsDb = new SQL.Database();
  }

  const db = sqlJsDb;
  let open = true;
  let depth = 0;
  let savepointSeq = 0;

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  function saveDb(): void {
    if (!file || !open) return;
    const buffer = Buffer.from(db.export());
    const tmpPath = file + '.tmp';
    writeFileSync(tmpPath, buffer);
    renameSync(tmpPath, file);
  }

  /** Persist unless a transaction is still open. */
  function persistIfIdle(): void {
    if (depth === 0) saveDb();
  }

  function rollback(savepoint: string | null): void {
    try {
      if (savepoint) {
        db.run(`ROLLBACK TO ${savepoint}`);
        db.run(`RELEASE ${savepoint}`);
      } else {
        db.run('ROLLBACK');
      }
    } catch (err) {
      logger.error({ err, savepoint }, 'Rollback failed');
    }
  }

  // -------------------------------------------------------------------------
  // Build Database instance
  // -------------------------------------------------------------------------

  const instance: Database = {
    // -- Lifecycle --

    close() {
      if (!open) return;
      saveDb();
      db.close();
      open = false;
    },

    save() {
      saveDb();
    },

    // -- Raw SQL --

    run(sql: string, params: SqlParams = []): void {
      db.run(sql, params);
      persistIfIdle();
    },

    exec(sql: string): void {
      db.exec(sql);
      persistIfIdle();
    },

    query(sql: string, params: SqlParams = []): SqlRow[] {
      const stmt = db.prepare(sql);
      try {
        stmt.bind(params);
        const results: SqlRow[] = [];
        while (stmt.step()) {
          results.push(stmt.getAsObject());
        }
        return results;
      } finally {
        stmt.free();
      }
    },

    changes(): number {
      return db.getRowsModified();
    },

    // -- Transactions --

    transaction<T>(fn: () => T): T {
      const savepoint = depth === 0 ? null : `sp_${++savepointSeq}`;
      db.run(savepoint ? `SAVEPOINT ${savepoint}` : 'BEGIN');
      depth++;

      let result: T;
      try {
        result = fn();
      } catch (err) {
        depth--;
        rollback(savepoint);
        throw err;
      }

      depth--;
      db.run(savepoint ? `RELEASE ${savepoint}` : 'COMMIT');
      persistIfIdle();
      return result;
    },

    inTransaction(): boolean {
      return depth > 0;
    },
  };

  saveDb();
  return instance;
}
