import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig } from './config.js';
import { VocabError } from './errors.js';

function mkTmpDir() {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'vocab-drip-config-'));
}

describe('loadConfig', () => {
  it('uses defaults without config.yml or env', () => {
    const root = mkTmpDir();
    const c = loadConfig(root, {});
    expect(c).toEqual({
      vocabCsv: path.join(root, 'data', 'vocab_es_b2c1.csv'),
      stateJson: path.join(root, 'state.json'),
      wordsPerRun: 3,
      timezone: 'Europe/Berlin',
      schedule: { targetHours: [], force: false },
      state: { retainDays: 2 },
      storage: { historyDb: path.join(root, 'data', 'history.sqlite') },
      delivery: { telegram: null, whatsapp: null, timeoutMs: 20_000 },
    });
  });

  it('applies env overrides and credentials', () => {
    const root = mkTmpDir();
    const c = loadConfig(root, {
      N_WORDS: '5',
      TZ: 'America/New_York',
      TARGET_HOURS: '21, 9',
      FORCE_SEND: '1',
      STATE_JSON: '/tmp/elsewhere/state.json',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: '42',
      TWILIO_ACCOUNT_SID: 'AC-test',
      TWILIO_AUTH_TOKEN: 'test-secret',
      TWILIO_WHATSAPP_FROM: 'whatsapp:+10000000000',
    });
    expect(c.wordsPerRun).toBe(5);
    expect(c.timezone).toBe('America/New_York');
    expect(c.schedule).toEqual({ targetHours: [9, 21], force: true });
    expect(c.stateJson).toBe('/tmp/elsewhere/state.json');
    expect(c.delivery.telegram).toEqual({ botToken: 'test-token', chatId: '42' });
    // TWILIO_WHATSAPP_TO missing
    expect(c.delivery.whatsapp).toBeNull();
  });

  it('only treats FORCE_SEND=1 as forcing', () => {
    const c = loadConfig(mkTmpDir(), { FORCE_SEND: 'true' });
    expect(c.schedule.force).toBe(false);
  });

  it('keeps force from config.yml when FORCE_SEND is blank', () => {
    const root = mkTmpDir();
    fs.writeFileSync(path.join(root, 'config.yml'), ['schedule:', '  force: true'].join('\n'));
    expect(loadConfig(root, { FORCE_SEND: '' }).schedule.force).toBe(true);
    expect(loadConfig(root, { FORCE_SEND: '0' }).schedule.force).toBe(false);
  });

  it('accepts a large word count', () => {
    expect(loadConfig(mkTmpDir(), { N_WORDS: '100' }).wordsPerRun).toBe(100);
  });

  it('reads config.yml and lets env win', () => {
    const root = mkTmpDir();
    fs.writeFileSync(
      path.join(root, 'config.yml'),
      ['wordsPerRun: 4', 'timezone: Europe/Madrid', 'schedule:', '  targetHours: [8, 20]', 'state:', '  retainDays: 7'].join('\n')
    );
    const c = loadConfig(root, { TZ: 'UTC' });
    expect(c.wordsPerRun).toBe(4);
    expect(c.timezone).toBe('UTC');
    expect(c.schedule.targetHours).toEqual([8, 20]);
    expect(c.state.retainDays).toBe(7);
  });

  it('rejects an unknown time zone', () => {
    expect(() => loadConfig(mkTmpDir(), { TZ: 'Mars/Olympus' })).toThrow(VocabError);
  });

  it('rejects a non-positive word count', () => {
    expect(() => loadConfig(mkTmpDir(), { N_WORDS: '0' })).toThrow(/wordsPerRun/);
  });
});
