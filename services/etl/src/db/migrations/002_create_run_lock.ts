import type { Database as BetterSqlite3Database } from 'better-sqlite3';

export const createRunLockMigration = {
  id: '002_create_run_lock',
  run(db: BetterSqlite3Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS etl_run_lock (
        nombre TEXT PRIMARY KEY,
        titular TEXT NOT NULL,
        adquirido_en TEXT NOT NULL,
        expira_en TEXT NOT NULL
      );
    `);
  }
};
