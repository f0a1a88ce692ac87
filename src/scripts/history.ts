import path from 'node:path';

import { loadConfig } from '../lib/config.js';
import { openDb, migrate, closeDb } from '../lib/db.js';
import { listRecentRuns } from '../lib/runs.js';

const repoRoot = path.resolve(process.cwd());
const config = loadConfig(repoRoot);

const limitArg = process.argv[2];
const limit = limitArg ? Number.parseInt(limitArg, 10) : 20;
if (!Number.isInteger(limit) || limit < 1) {
  throw new Error('Usage: tsx src/scripts/history.ts [limit]');
}

const db = openDb(config.storage.historyDb);
try {
  migrate(db);
  const runs = listRecentRuns(db, limit);
  if (runs.length === 0) {
    console.log('No runs recorded yet.');
  }
  for (const r of runs) {
    const slot = r.local_date ? `${r.local_date} ${String(r.local_hour ?? 0).padStart(2, '0')}h` : '-';
    console.log(`${r.started_at}  ${slot}  ${r.status.padEnd(7)}  ${r.stats_json}`);
  }
} finally {
  closeDb(db);
}
