/**
 * Database Migrations - Versioned schema management
 *
 * Migrations run in version order, each inside its own transaction, and are
 * recorded in the _migrations table. Schema changes only move forward.
 */

import type { Database } from './index';
import { readNumber, readString } from './rows';
import { createLogger } from '../utils/logger';
import { MIGRATION_001_UP } from './migration-001-automation';
import { MIGRATION_002_UP } from './migration-002-reviews';

const logger = createLogger('migrations');

export interface Migration {
  /** Migration version (sequential number) */
  version: number;
  /** Migration name for display */
  name: string;
  /** SQL applying the migration */
  up: string;
}

/** Migration status record */
export interface MigrationStatus {
  version: number;
  name: string;
  appliedAt: Date;
}

/** All migrations in order */
const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'automation_records',
    up: MIGRATION_001_UP,
  },
  {
    version: 2,
    name: 'review_metrics',
    up: MIGRATION_002_UP,
  },
];

// =============================================================================
// Migration Runner
// =============================================================================

export interface MigrationRunner {
  /** Get current database version */
  getCurrentVersion(): number;

  /** Get all applied migrations */
  getAppliedMigrations(): MigrationStatus[];

  /** Get pending migrations */
  getPendingMigrations(): Migration[];

  /** Run all pending migrations */
  migrate(): void;
}

export function createMigrationRunner(
  db: Database,
  migrations: readonly Migration[] = MIGRATIONS,
): MigrationRunner {
  db.run(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  function getCurrentVersion(): number {
    const rows = db.query('SELECT MAX(version) as version FROM _migrations');
    return rows.length > 0 ? readNumber(rows[0], 'version') : 0;
  }

  function getAppliedMigrations(): MigrationStatus[] {
    return db
      .query('SELECT version, name, applied_at FROM _migrations ORDER BY version')
      .map((row) => ({
        version: readNumber(row, 'version'),
        name: readString(row, 'name'),
        appliedAt: new Date(readNumber(row, 'applied_at')),
      }));
  }

  function getPendingMigrations(): Migration[] {
    const currentVersion = getCurrentVersion();
    return migrations.filter((m) => m.version > currentVersion);
  }

  function applyMigration(migration: Migration): void {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration');

    try {
      db.transaction(() => {
        db.exec(migration.up);
        db.run('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)', [
          migration.version,
          migration.name,
          Date.now(),
        ]);
      });
      logger.info({ version: migration.version }, 'Migration applied');
    } catch (err) {
      logger.error({ err, version: migration.version }, 'Migration failed');
      throw err;
    }
  }

  return {
    getCurrentVersion,
    getAppliedMigrations,
    getPendingMigrations,

    migrate() {
      const pending = getPendingMigrations();

      if (pending.length === 0) {
        logger.info('Database is up to date');
        return;
      }

      logger.info({ count: pending.length }, 'Running migrations');

      for (const migration of pending) {
        applyMigration(migration);
      }

      logger.info({ version: getCurrentVersion() }, 'Migrations complete');
    },
  };
}
