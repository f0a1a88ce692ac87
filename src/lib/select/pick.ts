import type { VocabularyEntry } from '../types.js';
import { InsufficientVocabularyError } from '../errors.js';

export type RandomFn = () => number;

export interface PickResult {
  chosen: VocabularyEntry[];
  indices: number[]; // draw order
  used: Set<number>;
  reset: boolean;
}

/**
 * Draws `n` distinct items from `pool` without replacement (partial Fisher–Yates).
 * `random` must return values in [0, 1).
 */
export function sampleWithoutReplacement<T>(pool: readonly T[], n: number, random: RandomFn = Math.random): T[] {
  const arr = pool.slice();
  const out: T[] = [];
  const k = Math.min(n, arr.length);
  for (let i = 0; i < k; i += 1) {
    const j = i + Math.min(arr.length - i - 1, Math.floor(random() * (arr.length - i)));
    const picked = arr[j];
    const current = arr[i];
    if (picked === undefined || current === undefined) break;
    arr[j] = current;
    arr[i] = picked;
    out.push(picked);
  }
  return out;
}

export function pickWords(
  entries: readonly VocabularyEntry[],
  used: ReadonlySet<number>,
  n: number,
  random: RandomFn = Math.random
): PickResult {
  const total = entries.length;
  if (n < 1 || total < n) throw new InsufficientVocabularyError(total, n);

  // Indices past the end (the list shrank since last run) no longer count.
  let nextUsed = new Set(Array.from(used).filter((i) => Number.isInteger(i) && i >= 0 && i < total));
  let available: number[] = [];
  for (let i = 0; i < total; i += 1) {
    if (!nextUsed.has(i)) available.push(i);
  }

  let reset = false;
  if (available.length < n) {
    reset = true;
    nextUsed = new Set();
    available = Array.from({ length: total }, (_, i) => i);
  }

  const indices = sampleWithoutReplacement(available, n, random);
  const chosen: VocabularyEntry[] = [];
  for (const i of indices) {
    const entry = entries[i];
    if (entry) chosen.push(entry);
    nextUsed.add(i);
  }

  return { chosen, indices, used: nextUsed, reset };
}
