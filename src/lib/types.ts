export type IsoDate = string; // YYYY-MM-DD

export interface VocabularyEntry {
  headword: string;
  partOfSpeech: string;
  translation: string;
  example: string;
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface WhatsAppConfig {
  accountSid: string;
  authToken: string;
  from: string; // e.g. whatsapp:+14155238886
  to: string;
}

export interface AppConfig {
  vocabCsv: string;
  stateJson: string;
  wordsPerRun: number;
  timezone: string;
  schedule: {
    targetHours: number[]; // empty = any hour
    force: boolean;
  };
  state: {
    retainDays: number;
  };
  storage: {
    historyDb: string;
  };
  delivery: {
    telegram: TelegramConfig | null;
    whatsapp: WhatsAppConfig | null;
    timeoutMs: number;
  };
}

export interface PersistedState {
  used: Set<number>;
  lastSent: IsoDate | null;
  sentHours: Map<IsoDate, Set<number>>;
}

export interface LocalClock {
  dateIso: IsoDate;
  hour: number;
}
