import { DateTime } from 'luxon';

import type { LocalClock } from '../types.js';
import { VocabError } from '../errors.js';

export type GuardDecision =
  | { allowed: true; forced: boolean }
  | { allowed: false; reason: 'schedule' | 'duplicate' };

export interface GuardInput {
  hour: number;
  targetHours: Iterable<number>;
  sentHoursToday: Iterable<number>;
  force: boolean;
}

/**
 * Parses a comma-separated hour list such as "9,15,21".
 * A single bad token invalidates the whole list, which then means "any hour".
 */
export function parseTargetHours(raw: string): number[] {
  const tokens = raw.split(',').map((t) => t.trim()).filter(Boolean);
  const hours: number[] = [];
  for (const t of tokens) {
    if (!/^\d{1,2}$/.test(t)) return [];
    const h = Number(t);
    if (h > 23) return [];
    hours.push(h);
  }
  return Array.from(new Set(hours)).sort((a, b) => a - b);
}

export function localClock(now: Date, timeZone: string): LocalClock {
  const local = DateTime.fromJSDate(now, { zone: timeZone });
  if (!local.isValid) {
    throw new VocabError('config', `Cannot resolve local time in zone "${timeZone}": ${local.invalidExplanation ?? local.invalidReason ?? 'invalid'}`);
  }
  return { dateIso: local.toFormat('yyyy-LL-dd'), hour: local.hour };
}

export function checkSendGuard(input: GuardInput): GuardDecision {
  if (input.force) return { allowed: true, forced: true };

  const targets = new Set(input.targetHours);
  if (targets.size > 0 && !targets.has(input.hour)) {
    return { allowed: false, reason: 'schedule' };
  }

  if (new Set(input.sentHoursToday).has(input.hour)) {
    return { allowed: false, reason: 'duplicate' };
  }

  return { allowed: true, forced: false };
}

export function shouldSend(input: GuardInput): boolean {
  return checkSendGuard(input).allowed;
}

export function describeBlock(reason: 'schedule' | 'duplicate', clock: LocalClock, timeZone: string): string {
  if (reason === 'schedule') {
    return `Schedule guard: not a target hour (${clock.hour}) in ${timeZone}. Skipping send.`;
  }
  return `Already sent for ${clock.dateIso} at hour ${clock.hour}. Skipping duplicate.`;
}
