import * as os from 'os';
import * as path from 'path';
import {
  AsrBackendName,
  JobConfig,
  Language,
  LANGUAGE_NAMES,
  TranslationBackendName,
  isLanguage,
} from '../types/config';
import { DEFAULT_CUE_POLICY } from '../types/subtitles';
import { ConfigError } from './errors';
import { DEFAULT_RETRY_POLICY } from './services/retry';

type Env = Record<string, string | undefined>;

/** Values the CLI may supply on top of the environment */
export interface ConfigOverrides {
  sourceLanguage?: string;
  targetLanguage?: string;
  asrBackend?: string;
  translationBackend?: string;
}

const DEFAULT_MODELS = {
  asr: { openai: 'whisper-1', gemini: 'gemini-2.5-flash' },
  translation: { openai: 'gpt-4o-mini', gemini: 'gemini-2.5-flash' },
} as const;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readBackend(value: string | undefined, key: string): 'openai' | 'gemini' {
  if (value === undefined) return 'openai';
  const normalized = value.toLowerCase();
  if (normalized === 'openai' || normalized === 'gemini') return normalized;
  throw new ConfigError(`${key} must be 'openai' or 'gemini', got '${value}'`);
}

function readLanguage(value: string | undefined, key: string): Language | undefined {
  if (value === undefined) return undefined;
  if (isLanguage(value)) return value;
  throw new ConfigError(`${key} '${value}' is not supported. Choose one of: ${LANGUAGE_NAMES.join(', ')}`);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the job configuration once per run.
 *
 * Credentials are copied here and nowhere else; clients receive this object through
 * their constructors. The result is frozen.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): JobConfig {
  const asrBackend: AsrBackendName = readBackend(overrides.asrBackend ?? read(env, 'ASR_BACKEND'), 'ASR_BACKEND');
  const translationBackend: TranslationBackendName = readBackend(
    overrides.translationBackend ?? read(env, 'TRANSLATION_BACKEND'),
    'TRANSLATION_BACKEND'
  );

  const minDurationMs = readInt(env, 'MIN_CUE_MS', DEFAULT_CUE_POLICY.minDurationMs, 1);
  const maxDurationMs = readInt(env, 'MAX_CUE_MS', DEFAULT_CUE_POLICY.maxDurationMs, 2);
  if (maxDurationMs <= minDurationMs) {
    throw new ConfigError(`MAX_CUE_MS (${maxDurationMs}) must be greater than MIN_CUE_MS (${minDurationMs})`);
  }

  const config: JobConfig = {
    sourceLanguage: readLanguage(overrides.sourceLanguage ?? read(env, 'SOURCE_LANGUAGE'), 'SOURCE_LANGUAGE'),
    targetLanguage: readLanguage(overrides.targetLanguage ?? read(env, 'TARGET_LANGUAGE'), 'TARGET_LANGUAGE'),
    asr: {
      backend: asrBackend,
      model: read(env, 'TRANSCRIBE_MODEL') ?? DEFAULT_MODELS.asr[asrBackend],
    },
    translation: {
      backend: translationBackend,
      model: read(env, 'TRANSLATION_MODEL') ?? DEFAULT_MODELS.translation[translationBackend],
      batchSize: readInt(env, 'TRANSLATION_BATCH_SIZE', 20, 1),
    },
    credentials: {
      openaiApiKey: read(env, 'OPENAI_API_KEY'),
      openaiBaseUrl: read(env, 'OPENAI_BASE_URL'),
      geminiApiKey: read(env, 'GEMINI_API_KEY'),
    },
    media: {
      ffmpegPath: read(env, 'FFMPEG_PATH'),
      ffprobePath: read(env, 'FFPROBE_PATH'),
      timeoutMs: readInt(env, 'FFMPEG_TIMEOUT_MS', 600_000, 1000),
      sampleRate: 16000,
      channels: 1,
      workDir: read(env, 'WORK_DIR') ?? path.join(os.tmpdir(), 'subtitle-assistant'),
    },
    retry: {
      maxAttempts: readInt(env, 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts, 1),
      baseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs, 0),
      maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
    },
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', 120_000, 1000),
    cuePolicy: {
      minDurationMs,
      maxDurationMs,
      maxCharsPerLine: readInt(env, 'MAX_CHARS_PER_LINE', DEFAULT_CUE_POLICY.maxCharsPerLine, 1),
    },
  };

  return deepFreeze(config);
}
