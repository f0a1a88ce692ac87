import type { Db } from './db.js';
import type { LocalClock } from './types.js';

export type RunStatus = 'running' | 'sent' | 'skipped' | 'error';

export interface RunRow {
  run_id: string;
  kind: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  local_date: string | null;
  local_hour: number | null;
  stats_json: string;
}

export function insertRun(db: Db, runId: string, startedAt: string, clock: LocalClock | null) {
  db.sqlite.prepare(
    `INSERT INTO runs (run_id, kind, started_at, finished_at, status, local_date, local_hour, stats_json)
     VALUES (?, 'send', ?, NULL, 'running', ?, ?, ?)`
  ).run(runId, startedAt, clock?.dateIso ?? null, clock?.hour ?? null, JSON.stringify({}));
}

export function finalizeRun(db: Db, runId: string, status: Exclude<RunStatus, 'running'>, stats: unknown) {
  db.sqlite.prepare('UPDATE runs SET finished_at=?, status=?, stats_json=? WHERE run_id=?')
    .run(new Date().toISOString(), status, JSON.stringify(stats), runId);
}

export function getRun(db: Db, runId: string): RunRow | undefined {
  return db.sqlite.prepare('SELECT * FROM runs WHERE run_id=?').get(runId) as RunRow | undefined;
}

export function listRecentRuns(db: Db, limit = 20): RunRow[] {
  return db.sqlite
    .prepare('SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(limit) as RunRow[];
}
