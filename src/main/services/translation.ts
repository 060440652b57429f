/**
 * Subtitle translation through an LLM provider.
 *
 * Cues go out in batches as a JSON object keyed "1".."n" and must come back with the same
 * keys. A batch whose count does not match, that the service refuses, or whose transient
 * failures outlast the retry policy leaves its cues untranslated and is reported as a TranslationFailure; the other
 * batches carry on. Only ServiceAuthError aborts the whole translation.
 */

import OpenAI from 'openai';
import { GoogleGenAI } from '@google/genai';
import { JobConfig, Language, RetryPolicy } from '../../types/config';
import { SubtitleCue } from '../../types/subtitles';
import {
  ServiceAuthError,
  TransientServiceError,
  TranslationBatchError,
  TranslationCountMismatchError,
  errorMessage,
} from '../errors';
import { withRetry, withTimeout } from './retry';

/** One translation provider. Selected once from configuration. */
export interface TranslationProvider {
  readonly name: string;
  /** Returns translations in input order; the client checks the count */
  translateBatch(texts: string[], targetLanguage: Language, sourceLanguage?: Language): Promise<string[]>;
}

export interface TranslationFailure {
  batchIndex: number;
  /** 1-based indices of the cues left untranslated */
  cueIndices: number[];
  error: TranslationCountMismatchError | TransientServiceError | TranslationBatchError;
}

export interface TranslationResult {
  cues: SubtitleCue[];
  failures: TranslationFailure[];
  degraded: boolean;
}

export function buildSystemPrompt(targetLanguage: Language, sourceLanguage?: Language): string {
  const from = sourceLanguage ? ` from ${sourceLanguage}` : '';
  return [
    `You are a professional subtitle translator. Translate subtitles${from} into ${targetLanguage}.`,
    'The input is a JSON object whose keys are subtitle numbers and whose values are subtitle lines.',
    'Return a JSON object with exactly the same keys, each value being the translation of that line.',
    'Never merge, split, drop or reorder lines. Keep each translation concise enough to read on screen.',
    'Output only the JSON object.',
  ].join('\n');
}

export function buildUserPayload(texts: string[]): string {
  const payload: Record<string, string> = {};
  texts.forEach((text, i) => {
    payload[String(i + 1)] = text;
  });
  return JSON.stringify(payload);
}

function extractJsonObject(raw: string): unknown {
  const unfenced = raw.replace(/```(?:json)?/gi, '').trim();
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  try {
    return JSON.parse(unfenced.slice(start, end + 1));
  } catch {
    return null;
  }
}

/**
 * Read the translations for keys "1".."expected" in order.
 *
 * Missing keys are left out rather than filled, so a short reply shows up as a count
 * mismatch. Unparseable output yields an empty list. Keys beyond `expected` are counted
 * too, so an over-long reply is a mismatch as well.
 */
export function parseTranslationResponse(raw: string, expected: number): string[] {
  const parsed = extractJsonObject(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return [];

  const entries = new Map(Object.entries(parsed));
  const out: string[] = [];
  for (let i = 1; i <= expected; i += 1) {
    const value = entries.get(String(i));
    if (typeof value === 'string') out.push(value.trim());
  }
  const extra = [...entries.keys()].filter((k) => !/^\d+$/.test(k) || Number(k) < 1 || Number(k) > expected);
  for (const key of extra) {
    const value = entries.get(key);
    if (typeof value === 'string') out.push(value.trim());
  }
  return out;
}

/** OpenAI chat completions; OPENAI_BASE_URL lets any compatible endpoint stand in */
export class OpenAiTranslationProvider implements TranslationProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: Pick<JobConfig, 'credentials' | 'translation' | 'requestTimeoutMs'>) {
    const apiKey = config.credentials.openaiApiKey;
    if (!apiKey) {
      throw new ServiceAuthError('translation', 'OPENAI_API_KEY is not set');
    }
    this.client = new OpenAI({
      apiKey,
      baseURL: config.credentials.openaiBaseUrl || undefined,
      timeout: config.requestTimeoutMs,
      maxRetries: 0,
    });
    this.model = config.translation.model;
  }

  async translateBatch(texts: string[], targetLanguage: Language, sourceLanguage?: Language): Promise<string[]> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0.3,
      messages: [
        { role: 'system', content: buildSystemPrompt(targetLanguage, sourceLanguage) },
        { role: 'user', content: buildUserPayload(texts) },
      ],
    });
    const content = completion.choices[0]?.message?.content ?? '';
    return parseTranslationResponse(content, texts.length);
  }
}

export class GeminiTranslationProvider implements TranslationProvider {
  readonly name = 'gemini';
  private readonly ai: GoogleGenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<JobConfig, 'credentials' | 'translation' | 'requestTimeoutMs'>) {
    const apiKey = config.credentials.geminiApiKey;
    if (!apiKey) {
      throw new ServiceAuthError('translation', 'GEMINI_API_KEY is not set');
    }
    this.ai = new GoogleGenAI({ apiKey });
    this.model = config.translation.model;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async translateBatch(texts: string[], targetLanguage: Language, sourceLanguage?: Language): Promise<string[]> {
    const call = this.ai.models.generateContent({
      model: this.model,
      contents: buildUserPayload(texts),
      config: {
        systemInstruction: buildSystemPrompt(targetLanguage, sourceLanguage),
        responseMimeType: 'application/json',
        temperature: 0.3,
      },
    });
    const response = await withTimeout(
      call,
      this.timeoutMs,
      () => new TransientServiceError('translation', `Gemini translation timed out after ${this.timeoutMs}ms`)
    );
    return parseTranslationResponse(response.text ?? '', texts.length);
  }
}

export function createTranslationProvider(config: JobConfig): TranslationProvider {
  switch (config.translation.backend) {
    case 'gemini':
      return new GeminiTranslationProvider(config);
    case 'openai':
    default:
      return new OpenAiTranslationProvider(config);
  }
}

export interface TranslationClientOptions {
  batchSize: number;
  retry: RetryPolicy;
}

/**
 * Stage 4 of the pipeline: cues in, the same cues with translatedText out.
 * Output always has the input's length and order.
 */
export class TranslationClient {
  constructor(
    private readonly provider: TranslationProvider,
    private readonly options: TranslationClientOptions
  ) {}

  async translateCues(
    cues: SubtitleCue[],
    targetLanguage: Language,
    sourceLanguage?: Language
  ): Promise<TranslationResult> {
    const result = cues.map((cue) => ({ ...cue }));
    const failures: TranslationFailure[] = [];
    if (cues.length === 0) {
      return { cues: result, failures, degraded: false };
    }

    const batchSize = Math.max(1, this.options.batchSize);
    const totalBatches = Math.ceil(cues.length / batchSize);
    console.log(
      `[TRANSLATE] ${cues.length} cues -> ${targetLanguage} via ${this.provider.name} (${totalBatches} batches)`
    );

    for (let b = 0; b < totalBatches; b += 1) {
      const batch = result.slice(b * batchSize, (b + 1) * batchSize);
      const texts = batch.map((cue) => cue.sourceText);
      const label = `translation batch ${b + 1}/${totalBatches}`;

      try {
        const translated = await withRetry(
          () => this.provider.translateBatch(texts, targetLanguage, sourceLanguage),
          { service: 'translation', policy: this.options.retry, label }
        );
        if (translated.length !== texts.length) {
          throw new TranslationCountMismatchError(texts.length, translated.length, b);
        }
        batch.forEach((cue, i) => {
          cue.translatedText = translated[i];
        });
      } catch (e) {
        if (e instanceof ServiceAuthError) {
          console.error(`[TRANSLATE] ${label} failed: ${errorMessage(e)}`);
          throw e;
        }
        const error =
          e instanceof TranslationCountMismatchError || e instanceof TransientServiceError
            ? e
            : new TranslationBatchError(b, errorMessage(e), { cause: e });
        console.warn(`[TRANSLATE] ${label} left untranslated: ${error.message}`);
        batch.forEach((cue) => {
          cue.translatedText = null;
        });
        failures.push({ batchIndex: b, cueIndices: batch.map((cue) => cue.index), error });
      }
    }

    const translatedCount = result.filter((cue) => cue.translatedText !== null).length;
    console.log(`[TRANSLATE] Completed: ${translatedCount}/${cues.length} cues translated`);
    return { cues: result, failures, degraded: failures.length > 0 };
  }
}
