import { JobConfig, Language, isLanguage } from '../../types/config';
import { ConfigError } from '../errors';
import { FfmpegMediaExtractor, MediaExtractor, configureBinaries } from '../services/ffmpeg';
import { PipelineDeps } from '../services/pipeline';
import { TranscriptionClient, createAsrBackend } from '../services/transcription';
import { TranslationClient, createTranslationProvider } from '../services/translation';

/**
 * Everything the job handlers need, built from one JobConfig.
 *
 * Network clients are created per job, so a missing key for a service the job does not
 * use (e.g. translation when no target language is chosen) is never an error.
 */
export interface SubtitleServices {
  config: JobConfig;
  extractor: MediaExtractor;
  createTranscriber(): PipelineDeps['transcriber'];
  createTranslator(): NonNullable<PipelineDeps['translator']>;
}

export function createSubtitleServices(config: JobConfig): SubtitleServices {
  configureBinaries(config.media);
  return {
    config,
    extractor: new FfmpegMediaExtractor(config.media),
    createTranscriber: () => new TranscriptionClient(createAsrBackend(config), config.retry),
    createTranslator: () =>
      new TranslationClient(createTranslationProvider(config), {
        batchSize: config.translation.batchSize,
        retry: config.retry,
      }),
  };
}

/** Validate a language name from a request; fall back to the configured one when absent */
export function resolveLanguage(value: string | undefined, fallback: Language | undefined, field: string): Language | undefined {
  if (value === undefined || value === '') return fallback;
  if (!isLanguage(value)) {
    throw new ConfigError(`Unsupported ${field}: '${value}'`);
  }
  return value;
}
