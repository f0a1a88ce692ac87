import fs from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import type { VocabularyEntry } from './types.js';

const cell = z.string().optional().default('');

const VocabRowSchema = z.object({
  es: cell,
  pos: cell,
  de: cell,
  example: cell,
});

const VocabRowsSchema = z.array(VocabRowSchema);

export function parseVocabCsv(text: string): VocabularyEntry[] {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  return VocabRowsSchema.parse(records)
    .filter((r) => r.es.length > 0)
    .map((r) => ({
      headword: r.es,
      partOfSpeech: r.pos,
      translation: r.de,
      example: r.example,
    }));
}

export function loadVocab(csvPath: string): VocabularyEntry[] {
  if (!fs.existsSync(csvPath)) {
    throw new Error(`Missing vocabulary CSV at ${csvPath}`);
  }
  return parseVocabCsv(fs.readFileSync(csvPath, 'utf8'));
}
