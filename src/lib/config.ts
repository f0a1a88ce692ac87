import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { IANAZone } from 'luxon';
import { z } from 'zod';

import type { AppConfig, TelegramConfig, WhatsAppConfig } from './types.js';
import { VocabError } from './errors.js';
import { parseTargetHours } from './schedule/guard.js';

export type Env = Record<string, string | undefined>;

const hour = z.number().int().min(0).max(23);

const FileConfigSchema = z.object({
  vocabCsv: z.string().min(1).default('data/vocab_es_b2c1.csv'),
  stateJson: z.string().min(1).default('state.json'),
  wordsPerRun: z.coerce.number().int().min(1).default(3),
  timezone: z
    .string()
    .default('Europe/Berlin')
    .refine((tz) => IANAZone.isValidZone(tz), { message: 'unknown IANA time zone' }),
  schedule: z
    .object({
      targetHours: z.array(hour).default([]),
      force: z.boolean().default(false),
    })
    .default({}),
  state: z
    .object({
      retainDays: z.number().int().min(0).default(2),
    })
    .default({}),
  storage: z
    .object({
      historyDb: z.string().min(1).default('data/history.sqlite'),
    })
    .default({}),
  delivery: z
    .object({
      timeoutMs: z.number().int().min(1000).default(20_000),
    })
    .default({}),
});

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = raw[key];
  return isRecord(v) ? { ...v } : {};
}

function nonEmpty(v: string | undefined): string | null {
  const t = v?.trim();
  return t ? t : null;
}

export function telegramFromEnv(env: Env): TelegramConfig | null {
  const botToken = nonEmpty(env.TELEGRAM_BOT_TOKEN);
  const chatId = nonEmpty(env.TELEGRAM_CHAT_ID);
  if (!botToken || !chatId) return null;
  return { botToken, chatId };
}

export function whatsappFromEnv(env: Env): WhatsAppConfig | null {
  const accountSid = nonEmpty(env.TWILIO_ACCOUNT_SID);
  const authToken = nonEmpty(env.TWILIO_AUTH_TOKEN);
  const from = nonEmpty(env.TWILIO_WHATSAPP_FROM);
  const to = nonEmpty(env.TWILIO_WHATSAPP_TO);
  if (!accountSid || !authToken || !from || !to) return null;
  return { accountSid, authToken, from, to };
}

/**
 * Overlays environment variables on top of the (optional) YAML file.
 * Credentials only ever come from the environment.
 */
function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  const schedule = section(raw, 'schedule');
  const storage = section(raw, 'storage');

  if (nonEmpty(env.VOCAB_CSV)) out.vocabCsv = env.VOCAB_CSV;
  if (nonEmpty(env.STATE_JSON)) out.stateJson = env.STATE_JSON;
  if (nonEmpty(env.N_WORDS)) out.wordsPerRun = env.N_WORDS;
  if (nonEmpty(env.TZ)) out.timezone = env.TZ;
  if (env.TARGET_HOURS !== undefined) schedule.targetHours = parseTargetHours(env.TARGET_HOURS);
  const force = nonEmpty(env.FORCE_SEND);
  if (force) schedule.force = force === '1';
  if (nonEmpty(env.HISTORY_DB)) storage.historyDb = env.HISTORY_DB;

  out.schedule = schedule;
  out.storage = storage;
  return out;
}

export function loadConfig(repoRoot: string, env: Env = process.env): AppConfig {
  const configPath = path.join(repoRoot, 'config.yml');
  let raw: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    const parsed = loadYamlFile(configPath);
    if (isRecord(parsed)) {
      raw = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new VocabError('config', `config.yml at ${configPath} must be a mapping`);
    }
  }

  const result = FileConfigSchema.safeParse(applyEnv(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new VocabError('config', `Invalid configuration: ${issues}`);
  }
  const c = result.data;

  return {
    vocabCsv: path.resolve(repoRoot, c.vocabCsv),
    stateJson: path.resolve(repoRoot, c.stateJson),
    wordsPerRun: c.wordsPerRun,
    timezone: c.timezone,
    schedule: {
      targetHours: Array.from(new Set(c.schedule.targetHours)).sort((a, b) => a - b),
      force: c.schedule.force,
    },
    state: { retainDays: c.state.retainDays },
    storage: { historyDb: path.resolve(repoRoot, c.storage.historyDb) },
    delivery: {
      telegram: telegramFromEnv(env),
      whatsapp: whatsappFromEnv(env),
      timeoutMs: c.delivery.timeoutMs,
    },
  };
}
