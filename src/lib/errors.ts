export type VocabErrorCode =
  | 'config'
  | 'insufficient-vocabulary'
  | 'state-unreadable';

export class VocabError extends Error {
  readonly code: VocabErrorCode;

  constructor(code: VocabErrorCode, message: string) {
    super(message);
    this.name = 'VocabError';
    this.code = code;
  }
}

export class InsufficientVocabularyError extends VocabError {
  constructor(total: number, wanted: number) {
    super('insufficient-vocabulary', `Vocab list too small: ${total} entries, need ${wanted}.`);
    this.name = 'InsufficientVocabularyError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
