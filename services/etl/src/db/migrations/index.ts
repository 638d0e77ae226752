import type { Database as BetterSqlite3Database } from 'better-sqlite3';

import { createDimensionalModelMigration } from './001_create_dimensional_model';
import { createRunLockMigration } from './002_create_run_lock';
import { createReportingViewsMigration } from './003_create_reporting_views';

type Migration = {
  id: string;
  run: (db: BetterSqlite3Database) => void;
};

const migrations: Migration[] = [
  createDimensionalModelMigration,
  createRunLockMigration,
  createReportingViewsMigration
];

/** Applies pending migrations in order and returns the ids that ran. */
export function migrateIfNeeded(db: BetterSqlite3Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);

  const appliedRows = db.prepare<[], { id: string }>('SELECT id FROM schema_migrations').all();
  const applied = new Set(appliedRows.map((row) => row.id));
  const ran: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    db.transaction(() => {
      migration.run(db);
      const appliedAt = new Date().toISOString();
      db.prepare('INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)').run(migration.id, appliedAt);
    })();
    ran.push(migration.id);
  }

  return ran;
}
