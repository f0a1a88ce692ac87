import crypto from 'node:crypto';

import type { AppConfig, LocalClock, VocabularyEntry } from '../types.js';
import { openDb, migrate, closeDb, type Db } from '../db.js';
import { insertRun, finalizeRun } from '../runs.js';
import { checkSendGuard, describeBlock, localClock } from '../schedule/guard.js';
import { loadState, recordSend, saveState } from '../state.js';
import { loadVocab } from '../vocab.js';
import { pickWords, type RandomFn } from '../select/pick.js';
import { renderVocabMessage } from '../digest/render.js';
import { deliverToChannels, summarizeOutcomes, type DeliveryOutcome } from '../notify/orchestrator.js';
import type { Channel } from '../notify/channel.js';
import { telegramChannel } from '../notify/telegram.js';
import { whatsappChannel } from '../notify/whatsapp.js';
import { errorMessage } from '../errors.js';

export interface VocabRunOptions {
  config: AppConfig;
  now?: Date;
  random?: RandomFn;
  channels?: Channel[]; // default: Telegram + WhatsApp from config
  dryRun?: boolean; // render only; no guard, no delivery, no writes
}

export type VocabRunResult =
  | {
      status: 'sent';
      runId: string;
      clock: LocalClock;
      words: VocabularyEntry[];
      message: string;
      reset: boolean;
      deliveries: DeliveryOutcome[];
    }
  | { status: 'skipped'; runId: string; clock: LocalClock; reason: 'schedule' | 'duplicate' }
  | { status: 'preview'; clock: LocalClock; words: VocabularyEntry[]; message: string }
  | { status: 'error'; runId: string; clock: LocalClock; reason: 'insufficient-vocabulary'; message: string };

export function defaultChannels(config: AppConfig): Channel[] {
  const http = { timeoutMs: config.delivery.timeoutMs };
  return [
    telegramChannel(config.delivery.telegram, http),
    whatsappChannel(config.delivery.whatsapp, http),
  ];
}

function previewRun(opts: VocabRunOptions, clock: LocalClock): VocabRunResult {
  const { config, random = Math.random } = opts;
  const state = loadState(config.stateJson);
  const vocab = loadVocab(config.vocabCsv);
  const pick = pickWords(vocab, state.used, config.wordsPerRun, random);
  const message = renderVocabMessage(pick.chosen, clock.dateIso);
  console.log(message);
  return { status: 'preview', clock, words: pick.chosen, message };
}

async function sendRun(db: Db, runId: string, opts: VocabRunOptions, clock: LocalClock): Promise<VocabRunResult> {
  const { config, random = Math.random, channels = defaultChannels(config) } = opts;

  const state = loadState(config.stateJson);
  const decision = checkSendGuard({
    hour: clock.hour,
    targetHours: config.schedule.targetHours,
    sentHoursToday: state.sentHours.get(clock.dateIso) ?? [],
    force: config.schedule.force,
  });

  if (!decision.allowed) {
    console.log(describeBlock(decision.reason, clock, config.timezone));
    finalizeRun(db, runId, 'skipped', { reason: decision.reason });
    return { status: 'skipped', runId, clock, reason: decision.reason };
  }

  const vocab = loadVocab(config.vocabCsv);
  if (vocab.length < config.wordsPerRun) {
    const message = `Vocab list too small: ${vocab.length} entries, need ${config.wordsPerRun}.`;
    console.error(message);
    finalizeRun(db, runId, 'error', { reason: 'insufficient-vocabulary', entries: vocab.length });
    return { status: 'error', runId, clock, reason: 'insufficient-vocabulary', message };
  }

  const pick = pickWords(vocab, state.used, config.wordsPerRun, random);
  if (pick.reset) console.log(`All ${vocab.length} words used; starting a new cycle.`);

  const message = renderVocabMessage(pick.chosen, clock.dateIso);
  const deliveries = await deliverToChannels(channels, message);

  // State is saved whatever the deliveries did.
  saveState(config.stateJson, recordSend(state, pick.used, clock.dateIso, clock.hour, config.state.retainDays));
  console.log(message);

  finalizeRun(db, runId, 'sent', {
    forced: decision.forced,
    words: pick.chosen.map((w) => w.headword),
    indices: pick.indices,
    reset: pick.reset,
    deliveries,
  });
  console.log(`Deliveries: ${summarizeOutcomes(deliveries)}`);

  return { status: 'sent', runId, clock, words: pick.chosen, message, reset: pick.reset, deliveries };
}

export async function runVocabSend(opts: VocabRunOptions): Promise<VocabRunResult> {
  const { config, now = new Date(), dryRun = false } = opts;
  const clock = localClock(now, config.timezone);

  if (dryRun) return previewRun(opts, clock);

  const db = openDb(config.storage.historyDb);
  try {
    migrate(db);
    const runId = crypto.randomUUID();
    insertRun(db, runId, now.toISOString(), clock);

    try {
      return await sendRun(db, runId, opts, clock);
    } catch (e) {
      finalizeRun(db, runId, 'error', { error: errorMessage(e) });
      throw e;
    }
  } finally {
    closeDb(db);
  }
}
