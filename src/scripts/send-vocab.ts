import path from 'node:path';

import { loadConfig } from '../lib/config.js';
import { runVocabSend } from '../lib/runners/send.js';
import { errorMessage } from '../lib/errors.js';

// Meant to be triggered hourly; the send guard decides whether this run sends.
const repoRoot = path.resolve(process.cwd());

try {
  const config = loadConfig(repoRoot);
  const res = await runVocabSend({ config });

  console.log(JSON.stringify({
    kind: 'vocabRun',
    status: res.status,
    date: res.clock.dateIso,
    hour: res.clock.hour,
    reason: res.status === 'skipped' || res.status === 'error' ? res.reason : null,
    deliveries: res.status === 'sent' ? res.deliveries : [],
  }));

  // Only a vocabulary list smaller than the batch is fatal; delivery failures are not.
  if (res.status === 'error') process.exitCode = 1;
} catch (e) {
  console.error(`vocab run failed: ${errorMessage(e)}`);
  process.exitCode = 1;
}
