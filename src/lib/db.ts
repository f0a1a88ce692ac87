import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export interface Db {
  sqlite: Database.Database;
}

const SCHEMA_VERSION = 1;

export function openDb(dbPath: string): Db {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  return { sqlite };
}

export function migrate(db: Db) {
  const sqlite = db.sqlite;

  sqlite.exec(
    `CREATE TABLE IF NOT EXISTS schema_meta (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL,
      updated_at TEXT NOT NULL
    );`
  );

  const row = sqlite.prepare('SELECT version FROM schema_meta WHERE id=1').get() as { version?: number } | undefined;
  const current = row?.version ?? 0;
  if (current === SCHEMA_VERSION) return;

  // v1 bootstrap
  if (current === 0) {
    sqlite.exec(
      `CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        started_at TEXT NOT NULL,
        finished_at TEXT,
        status TEXT NOT NULL,
        local_date TEXT,
        local_hour INTEGER,
        stats_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at);
      CREATE INDEX IF NOT EXISTS idx_runs_local_date ON runs(local_date);
      `
    );

    sqlite
      .prepare('INSERT OR REPLACE INTO schema_meta (id, version, updated_at) VALUES (1, ?, ?)')
      .run(1, new Date().toISOString());
  }
}

export function closeDb(db: Db) {
  db.sqlite.close();
}
