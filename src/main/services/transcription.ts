import OpenAI from 'openai';
import { GoogleGenAI, Type } from '@google/genai';
import * as fs from 'fs';
import { JobConfig, LANGUAGE_CODES, Language, RetryPolicy } from '../../types/config';
import { AudioArtifact, TranscriptData, TranscriptSegment } from '../../types/subtitles';
import { ServiceAuthError, TranscriptionError, TransientServiceError, errorMessage } from '../errors';
import { isEmptyAudio } from './ffmpeg';
import { withRetry, withTimeout } from './retry';

/** One ASR provider. Selected once from configuration, never branched on mid-pipeline. */
export interface AsrBackend {
  readonly name: string;
  /** `languageCode` is ISO-639-1 */
  transcribe(audio: AudioArtifact, languageCode?: string): Promise<TranscriptData>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSeconds(value: unknown): number {
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/**
 * Map a `verbose_json` transcription response to TranscriptData.
 *
 * A response without a `segments` array that still carries text becomes a single segment
 * spanning the whole audio. A response with neither is malformed.
 */
export function mapVerboseTranscript(resp: unknown, audioDurationSec: number): TranscriptData {
  if (!isRecord(resp)) {
    throw new TranscriptionError('Transcription response is not an object');
  }
  const language = typeof resp.language === 'string' ? resp.language : undefined;
  const text = typeof resp.text === 'string' ? resp.text : '';

  if (Array.isArray(resp.segments)) {
    const segments: TranscriptSegment[] = resp.segments.filter(isRecord).map((s) => ({
      start: toSeconds(s.start),
      end: toSeconds(s.end),
      text: String(s.text ?? ''),
    }));
    return { segments, language };
  }

  if (text.trim().length > 0) {
    console.warn('[TRANSCRIBE] No segments provided; returning a single segment over the whole audio');
    return { segments: [{ start: 0, end: audioDurationSec, text }], language };
  }

  throw new TranscriptionError('Transcription response has no segments and no text');
}

/**
 * OpenAI audio transcription (Whisper / GPT-4o Transcribe).
 *
 * gpt-4o-transcribe models reject `verbose_json`, which is the only format with segment
 * timestamps, so a 400 on those falls back to whisper-1.
 */
export class OpenAiAsrBackend implements AsrBackend {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: Pick<JobConfig, 'credentials' | 'asr' | 'requestTimeoutMs'>) {
    const apiKey = config.credentials.openaiApiKey;
    if (!apiKey) {
      throw new ServiceAuthError('asr', 'OPENAI_API_KEY is not set');
    }
    this.model = config.asr.model;
    // Retries are ours (TranscriptionClient), not the SDK's
    this.client = new OpenAI({
      apiKey,
      baseURL: config.credentials.openaiBaseUrl || undefined,
      timeout: config.requestTimeoutMs,
      maxRetries: 0,
    });
  }

  private async request(model: string, audioPath: string, languageCode?: string): Promise<unknown> {
    console.log(`[TRANSCRIBE] Attempting model='${model}' with response_format='verbose_json'`);
    const resp: unknown = await this.client.audio.transcriptions.create({
      file: fs.createReadStream(audioPath),
      model,
      response_format: 'verbose_json',
      language: languageCode,
    });
    return resp;
  }

  async transcribe(audio: AudioArtifact, languageCode?: string): Promise<TranscriptData> {
    let resp: unknown;
    try {
      resp = await this.request(this.model, audio.path, languageCode);
    } catch (e) {
      const status = typeof e === 'object' && e !== null && 'status' in e ? e.status : undefined;
      const usedGpt4o = /gpt-4o.*transcribe/i.test(this.model);
      if (status === 400 && usedGpt4o) {
        const fallback = 'whisper-1';
        console.warn(`[TRANSCRIBE] Model '${this.model}' rejected verbose_json; falling back to '${fallback}'`);
        resp = await this.request(fallback, audio.path, languageCode);
      } else {
        throw e;
      }
    }
    return mapVerboseTranscript(resp, audio.durationSec);
  }
}

/** Parse the JSON array a Gemini model returns for the transcription schema */
export function parseGeminiTranscript(text: string | undefined): TranscriptData {
  if (text === undefined) {
    throw new TranscriptionError('Gemini returned an empty response');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.trim());
  } catch (e) {
    throw new TranscriptionError('Gemini returned invalid JSON', { cause: e });
  }
  if (!Array.isArray(parsed)) {
    throw new TranscriptionError('Gemini response is not a segment array');
  }
  return {
    segments: parsed.filter(isRecord).map((s) => ({
      start: toSeconds(s.start),
      end: toSeconds(s.end),
      text: String(s.text ?? ''),
    })),
  };
}

const GEMINI_TRANSCRIBE_PROMPT = `Transcribe all speech in this audio from start to finish.
Return a JSON array of segments in chronological order. Each segment is one sentence or short phrase:
{ "start": seconds from the start of the audio, "end": seconds, "text": exact transcription }.
Return an empty array if there is no speech.`;

/** Gemini multimodal transcription with the audio sent inline */
export class GeminiAsrBackend implements AsrBackend {
  readonly name = 'gemini';
  private readonly ai: GoogleGenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<JobConfig, 'credentials' | 'asr' | 'requestTimeoutMs'>) {
    const apiKey = config.credentials.geminiApiKey;
    if (!apiKey) {
      throw new ServiceAuthError('asr', 'GEMINI_API_KEY is not set');
    }
    this.ai = new GoogleGenAI({ apiKey });
    this.model = config.asr.model;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async transcribe(audio: AudioArtifact, languageCode?: string): Promise<TranscriptData> {
    const data = (await fs.promises.readFile(audio.path)).toString('base64');
    const prompt = languageCode
      ? `${GEMINI_TRANSCRIBE_PROMPT}\nThe spoken language is '${languageCode}'.`
      : GEMINI_TRANSCRIBE_PROMPT;

    const call = this.ai.models.generateContent({
      model: this.model,
      contents: [{ parts: [{ text: prompt }, { inlineData: { mimeType: 'audio/wav', data } }] }],
      config: {
        responseMimeType: 'application/json',
        responseSchema: {
          type: Type.ARRAY,
          items: {
            type: Type.OBJECT,
            properties: {
              start: { type: Type.NUMBER },
              end: { type: Type.NUMBER },
              text: { type: Type.STRING },
            },
            required: ['start', 'end', 'text'],
          },
        },
      },
    });
    const response = await withTimeout(
      call,
      this.timeoutMs,
      () => new TransientServiceError('asr', `Gemini transcription timed out after ${this.timeoutMs}ms`)
    );
    const result = parseGeminiTranscript(response.text);
    return { ...result, language: languageCode };
  }
}

export function createAsrBackend(config: JobConfig): AsrBackend {
  switch (config.asr.backend) {
    case 'gemini':
      return new GeminiAsrBackend(config);
    case 'openai':
    default:
      return new OpenAiAsrBackend(config);
  }
}

/**
 * Throws TranscriptionError when segment start times go backwards.
 * Equal starts are allowed.
 */
export function assertMonotonic(segments: TranscriptSegment[]): void {
  for (let i = 1; i < segments.length; i += 1) {
    if (segments[i].start < segments[i - 1].start) {
      throw new TranscriptionError(
        `Transcript timestamps out of order at segment ${i + 1} (${segments[i].start}s after ${segments[i - 1].start}s)`
      );
    }
  }
}

/**
 * Stage 2 of the pipeline: audio in, ordered transcript segments out.
 *
 * Wraps an AsrBackend with the retry policy and local validation. Transient failures are
 * retried; once attempts run out they surface as TranscriptionError, as does any other
 * service failure. ServiceAuthError is thrown as is on the first occurrence.
 */
export class TranscriptionClient {
  constructor(
    private readonly backend: AsrBackend,
    private readonly retry: RetryPolicy
  ) {}

  async transcribe(audio: AudioArtifact, sourceLanguage?: Language): Promise<TranscriptSegment[]> {
    if (isEmptyAudio(audio)) {
      console.log('[TRANSCRIBE] Audio is empty; skipping recognition');
      return [];
    }

    const languageCode = sourceLanguage ? LANGUAGE_CODES[sourceLanguage] : undefined;
    let data: TranscriptData;
    try {
      data = await withRetry(() => this.backend.transcribe(audio, languageCode), {
        service: 'asr',
        policy: this.retry,
        label: `${this.backend.name} transcription`,
      });
    } catch (e) {
      if (e instanceof TransientServiceError) {
        throw new TranscriptionError(`Transcription failed after ${this.retry.maxAttempts} attempts: ${e.message}`, {
          cause: e,
        });
      }
      if (e instanceof ServiceAuthError || e instanceof TranscriptionError) {
        throw e;
      }
      throw new TranscriptionError(`Transcription failed: ${errorMessage(e)}`, { cause: e });
    }

    assertMonotonic(data.segments);
    console.log(`[TRANSCRIBE] ${data.segments.length} segments (${this.backend.name}, language=${data.language ?? 'auto'})`);
    return data.segments;
  }
}
