import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { AppConfig } from '../types.js';
import type { Channel, ChannelName } from '../notify/channel.js';
import { openDb, closeDb } from '../db.js';
import { listRecentRuns } from '../runs.js';
import { defaultChannels, runVocabSend } from './send.js';

function mkTmpDir() {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'vocab-drip-run-'));
}

const CSV = [
  'es,pos,de,example',
  'uno,num,eins,Uno más.',
  'dos,num,zwei,Dos veces.',
  'tres,num,drei,Tres tristes tigres.',
  'cuatro,num,vier,Cuatro estaciones.',
  'cinco,num,fünf,Cinco dedos.',
].join('\n');

function baseConfig(dir: string, overrides: Partial<AppConfig['schedule']> = {}): AppConfig {
  const vocabCsv = path.join(dir, 'vocab.csv');
  fs.writeFileSync(vocabCsv, CSV);
  return {
    vocabCsv,
    stateJson: path.join(dir, 'state.json'),
    wordsPerRun: 3,
    timezone: 'Europe/Berlin',
    schedule: { targetHours: [9, 15, 21], force: false, ...overrides },
    state: { retainDays: 2 },
    storage: { historyDb: path.join(dir, 'history.sqlite') },
    delivery: { telegram: null, whatsapp: null, timeoutMs: 20_000 },
  };
}

function recorder(name: ChannelName, sent: string[], fail = false): Channel {
  return {
    name,
    label: name,
    maxChars: 4096,
    send: async (text) => {
      if (fail) throw new Error(`${name} down`);
      sent.push(`${name}:${text}`);
      return { status: 200, body: 'ok' };
    },
  };
}

// 14:00Z is 15:00 in Berlin in January; 09:00Z is 10:00.
const AT_15 = new Date('2024-01-01T14:00:00Z');
const AT_10 = new Date('2024-01-01T09:00:00Z');
const first = () => 0;

function readState(config: AppConfig): unknown {
  return JSON.parse(fs.readFileSync(config.stateJson, 'utf8'));
}

describe('runVocabSend', () => {
  const originalLog = console.log;
  const originalError = console.error;

  beforeAll(() => {
    console.log = () => {};
    console.error = () => {};
  });

  afterAll(() => {
    console.log = originalLog;
    console.error = originalError;
  });

  it('sends at a target hour and persists state', async () => {
    const config = baseConfig(mkTmpDir());
    const sent: string[] = [];

    const res = await runVocabSend({ config, now: AT_15, random: first, channels: [recorder('telegram', sent)] });

    expect(res.status).toBe('sent');
    if (res.status !== 'sent') return;
    expect(res.clock).toEqual({ dateIso: '2024-01-01', hour: 15 });
    expect(res.words.map((w) => w.headword)).toEqual(['uno', 'dos', 'tres']);
    expect(sent).toEqual([`telegram:${res.message}`]);
    expect(res.message).toContain('1. uno [num] — eins');
    expect(readState(config)).toEqual({
      used: [0, 1, 2],
      last_sent: '2024-01-01',
      sent_hours: { '2024-01-01': [15] },
    });

    const db = openDb(config.storage.historyDb);
    const runs = listRecentRuns(db);
    expect(runs.map((r) => r.status)).toEqual(['sent']);
    expect(runs[0]?.started_at).toBe('2024-01-01T14:00:00.000Z');
    closeDb(db);
  });

  it('skips a second run in the same hour', async () => {
    const config = baseConfig(mkTmpDir());
    const sent: string[] = [];
    await runVocabSend({ config, now: AT_15, random: first, channels: [recorder('telegram', sent)] });
    const before = readState(config);

    const res = await runVocabSend({ config, now: AT_15, random: first, channels: [recorder('telegram', sent)] });

    expect(res).toMatchObject({ status: 'skipped', reason: 'duplicate' });
    expect(sent).toHaveLength(1);
    expect(readState(config)).toEqual(before);
  });

  it('skips outside the target hours without touching state', async () => {
    const config = baseConfig(mkTmpDir());
    const sent: string[] = [];

    const res = await runVocabSend({ config, now: AT_10, channels: [recorder('telegram', sent)] });

    expect(res).toMatchObject({ status: 'skipped', reason: 'schedule' });
    expect(sent).toEqual([]);
    expect(fs.existsSync(config.stateJson)).toBe(false);
  });

  it('force sends outside the schedule and records the hour', async () => {
    const config = baseConfig(mkTmpDir(), { force: true });
    const sent: string[] = [];

    const res = await runVocabSend({ config, now: AT_10, random: first, channels: [recorder('telegram', sent)] });

    expect(res.status).toBe('sent');
    expect(readState(config)).toMatchObject({ sent_hours: { '2024-01-01': [10] } });
  });

  it('continues to the next channel and saves state when one fails', async () => {
    const config = baseConfig(mkTmpDir());
    const sent: string[] = [];

    const res = await runVocabSend({
      config,
      now: AT_15,
      random: first,
      channels: [recorder('telegram', sent, true), recorder('whatsapp', sent)],
    });

    expect(res.status).toBe('sent');
    if (res.status !== 'sent') return;
    expect(res.deliveries.map((d) => d.status)).toEqual(['failed', 'sent']);
    expect(sent).toHaveLength(1);
    expect(sent[0]?.startsWith('whatsapp:')).toBe(true);
    expect(readState(config)).toMatchObject({ used: [0, 1, 2] });
  });

  it('reports an error when the list is smaller than the batch', async () => {
    const config = { ...baseConfig(mkTmpDir()), wordsPerRun: 6 };
    const sent: string[] = [];

    const res = await runVocabSend({ config, now: AT_15, channels: [recorder('telegram', sent)] });

    expect(res).toMatchObject({ status: 'error', reason: 'insufficient-vocabulary' });
    expect(sent).toEqual([]);
    expect(fs.existsSync(config.stateJson)).toBe(false);
  });

  it('starts a new cycle once every word has been used', async () => {
    const config = baseConfig(mkTmpDir(), { targetHours: [] });
    fs.writeFileSync(config.stateJson, JSON.stringify({ used: [0, 1, 2, 3], last_sent: '2023-12-31', sent_hours: {} }));

    const res = await runVocabSend({ config, now: AT_10, random: first, channels: [] });

    expect(res).toMatchObject({ status: 'sent', reset: true });
    expect(readState(config)).toMatchObject({ used: [0, 1, 2] });
  });

  it('previews without sending or writing anything', async () => {
    const config = baseConfig(mkTmpDir());
    const sent: string[] = [];

    const res = await runVocabSend({ config, now: AT_10, random: first, channels: [recorder('telegram', sent)], dryRun: true });

    expect(res.status).toBe('preview');
    expect(sent).toEqual([]);
    expect(fs.existsSync(config.stateJson)).toBe(false);
    expect(fs.existsSync(config.storage.historyDb)).toBe(false);
  });

  it('builds both channels from config, unconfigured by default', () => {
    const channels = defaultChannels(baseConfig(mkTmpDir()));
    expect(channels.map((c) => [c.name, c.send === null])).toEqual([
      ['telegram', true],
      ['whatsapp', true],
    ]);
  });
});
