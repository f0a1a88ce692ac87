import path from 'node:path';

import { loadConfig } from '../lib/config.js';
import { runVocabSend } from '../lib/runners/send.js';
import { errorMessage } from '../lib/errors.js';

// Renders the next batch without sending or touching state.json.
const repoRoot = path.resolve(process.cwd());

try {
  const config = loadConfig(repoRoot);
  await runVocabSend({ config, dryRun: true });
} catch (e) {
  console.error(`preview failed: ${errorMessage(e)}`);
  process.exitCode = 1;
}
