import fs from 'node:fs';
import { DateTime } from 'luxon';
import { z } from 'zod';

import type { IsoDate, PersistedState } from './types.js';
import { VocabError, errorMessage } from './errors.js';
import { ensureParentDir } from './storage.js';

const StateFileSchema = z.object({
  used: z.array(z.number().int().min(0)).default([]),
  last_sent: z.string().nullable().optional(),
  sent_hours: z.record(z.array(z.number().int().min(0).max(23))).default({}),
});

export type StateFile = z.infer<typeof StateFileSchema>;

export function emptyState(): PersistedState {
  return { used: new Set(), lastSent: null, sentHours: new Map() };
}

export function fromStateFile(file: StateFile): PersistedState {
  const sentHours = new Map<IsoDate, Set<number>>();
  for (const [date, hours] of Object.entries(file.sent_hours)) {
    sentHours.set(date, new Set(hours));
  }
  return {
    used: new Set(file.used),
    lastSent: file.last_sent ? file.last_sent : null,
    sentHours,
  };
}

export function toStateFile(state: PersistedState): StateFile {
  const sent_hours: Record<string, number[]> = {};
  for (const date of Array.from(state.sentHours.keys()).sort()) {
    const hours = state.sentHours.get(date) ?? new Set<number>();
    sent_hours[date] = Array.from(hours).sort((a, b) => a - b);
  }
  return {
    used: Array.from(state.used).sort((a, b) => a - b),
    last_sent: state.lastSent,
    sent_hours,
  };
}

export function loadState(statePath: string): PersistedState {
  if (!fs.existsSync(statePath)) return emptyState();

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(statePath, 'utf8'));
  } catch (e) {
    throw new VocabError('state-unreadable', `Cannot read state file ${statePath}: ${errorMessage(e)}`);
  }

  const result = StateFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new VocabError('state-unreadable', `State file ${statePath} has an unexpected shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return fromStateFile(result.data);
}

export function saveState(statePath: string, state: PersistedState) {
  ensureParentDir(statePath);
  const tmpPath = `${statePath}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(toStateFile(state), null, 2) + '\n', 'utf8');
  fs.renameSync(tmpPath, statePath);
}

/**
 * Keeps only sent-hour entries from the last `retainDays` days (plus today and
 * anything dated later). Keys that are not ISO dates are dropped.
 */
export function pruneSentHours(
  sentHours: ReadonlyMap<IsoDate, Set<number>>,
  todayIso: IsoDate,
  retainDays: number
): Map<IsoDate, Set<number>> {
  const today = DateTime.fromISO(todayIso, { zone: 'utc' });
  if (!today.isValid) return new Map(sentHours);
  const cutoff = today.minus({ days: retainDays });

  const out = new Map<IsoDate, Set<number>>();
  for (const [date, hours] of sentHours) {
    const d = DateTime.fromISO(date, { zone: 'utc' });
    if (!d.isValid || !/^\d{4}-\d{2}-\d{2}$/.test(date)) continue;
    if (d.toMillis() < cutoff.toMillis()) continue;
    out.set(date, hours);
  }
  return out;
}

export function recordSend(
  state: PersistedState,
  used: Set<number>,
  todayIso: IsoDate,
  hour: number,
  retainDays: number
): PersistedState {
  const sentHours = new Map(state.sentHours);
  const today = new Set(sentHours.get(todayIso) ?? []);
  today.add(hour);
  sentHours.set(todayIso, today);
  return {
    used: new Set(used),
    lastSent: todayIso,
    sentHours: pruneSentHours(sentHours, todayIso, retainDays),
  };
}
