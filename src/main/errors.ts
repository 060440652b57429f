/**
 * Error taxonomy for the subtitle pipeline
 *
 * Every error carries the pipeline stage it belongs to so the surface can say where a
 * job failed. Transient errors are retried inside the clients and escalated to the
 * fatal kind for their stage once attempts run out.
 */

export type PipelineStage = 'config' | 'extract' | 'transcribe' | 'build' | 'translate' | 'export';

export type ServiceName = 'asr' | 'translation';

export class SubtitleAssistantError extends Error {
  readonly stage: PipelineStage;

  constructor(message: string, stage: PipelineStage, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** Invalid configuration value (bad enum, non-numeric limit, ...) */
export class ConfigError extends SubtitleAssistantError {
  constructor(message: string) {
    super(message, 'config');
  }
}

/** Input cannot be decoded: unsupported container, corrupt file, no audio, ffmpeg failure */
export class MediaDecodeError extends SubtitleAssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extract', options);
  }
}

/** ASR failed for this job: malformed output, out-of-order timestamps, retries exhausted */
export class TranscriptionError extends SubtitleAssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transcribe', options);
  }
}

/** A translation batch came back with a different number of texts than it sent */
export class TranslationCountMismatchError extends SubtitleAssistantError {
  readonly expected: number;
  readonly received: number;
  readonly batchIndex: number;

  constructor(expected: number, received: number, batchIndex: number) {
    super(
      `Translation batch ${batchIndex + 1} returned ${received} texts for ${expected} cues`,
      'translate'
    );
    this.expected = expected;
    this.received = received;
    this.batchIndex = batchIndex;
  }
}

/** A translation batch the service refused outright (content filter, bad request, ...) */
export class TranslationBatchError extends SubtitleAssistantError {
  readonly batchIndex: number;

  constructor(batchIndex: number, message: string, options?: { cause?: unknown }) {
    super(`Translation batch ${batchIndex + 1} rejected: ${message}`, 'translate', options);
    this.batchIndex = batchIndex;
  }
}

/** Missing or rejected credentials; never retried */
export class ServiceAuthError extends SubtitleAssistantError {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(service: ServiceName, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, service === 'asr' ? 'transcribe' : 'translate', options);
    this.service = service;
    this.status = options?.status;
  }
}

/** Timeout, connection failure, rate limit or 5xx; expected to succeed on retry */
export class TransientServiceError extends SubtitleAssistantError {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(service: ServiceName, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, service === 'asr' ? 'transcribe' : 'translate', options);
    this.service = service;
    this.status = options?.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** How each stage is named in user-facing messages */
export const STAGE_LABELS: Record<PipelineStage, string> = {
  config: 'Configuration',
  extract: 'Audio extraction',
  transcribe: 'Speech recognition',
  build: 'Subtitle building',
  translate: 'Translation',
  export: 'Subtitle export',
};
