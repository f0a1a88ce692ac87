import type { IsoDate, VocabularyEntry } from '../types.js';

export function renderEntry(position: number, entry: VocabularyEntry): string {
  return `${position}. ${entry.headword} [${entry.partOfSpeech}] — ${entry.translation}\n   ↪ Ej.: ${entry.example}`;
}

export function renderVocabMessage(entries: readonly VocabularyEntry[], dateIso: IsoDate): string {
  const lines: string[] = [];
  lines.push(`📚 Palabras del día (${dateIso}):`);

  entries.forEach((entry, i) => {
    lines.push('');
    lines.push(renderEntry(i + 1, entry));
  });

  lines.push('');
  lines.push('¡Ánimo! 💪');
  return lines.join('\n');
}
