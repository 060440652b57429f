/**
 * Job configuration types
 *
 * A JobConfig is built once per run (see main/config.ts), frozen, and handed to each
 * client constructor. Nothing in the pipeline reads process.env directly.
 */

import { CuePolicy } from './subtitles';

/** Languages offered for translation, by display name */
export const LANGUAGE_NAMES = [
  'English',
  'Simplified Chinese',
  'Traditional Chinese',
  'Japanese',
  'Korean',
  'French',
  'German',
  'Spanish',
  'Russian',
  'Portuguese',
  'Turkish',
  'Cantonese',
] as const;

export type Language = typeof LANGUAGE_NAMES[number];

/**
 * ISO-639-1 code sent to ASR backends as a language hint.
 * Both Chinese scripts and Cantonese are recognized as 'zh'.
 */
export const LANGUAGE_CODES: Record<Language, string> = {
  English: 'en',
  'Simplified Chinese': 'zh',
  'Traditional Chinese': 'zh',
  Japanese: 'ja',
  Korean: 'ko',
  French: 'fr',
  German: 'de',
  Spanish: 'es',
  Russian: 'ru',
  Portuguese: 'pt',
  Turkish: 'tr',
  Cantonese: 'zh',
};

export function isLanguage(value: string): value is Language {
  return LANGUAGE_NAMES.some((name) => name === value);
}

export type AsrBackendName = 'openai' | 'gemini';
export type TranslationBackendName = 'openai' | 'gemini';

export interface RetryPolicy {
  /** Total attempts including the first call */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface Credentials {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  geminiApiKey?: string;
}

export interface MediaConfig {
  ffmpegPath?: string;
  ffprobePath?: string;
  timeoutMs: number;
  sampleRate: number;
  channels: number;
  workDir: string;
}

export interface JobConfig {
  sourceLanguage?: Language;
  targetLanguage?: Language;
  asr: {
    backend: AsrBackendName;
    model: string;
  };
  translation: {
    backend: TranslationBackendName;
    model: string;
    batchSize: number;
  };
  credentials: Credentials;
  media: MediaConfig;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  cuePolicy: CuePolicy;
}
