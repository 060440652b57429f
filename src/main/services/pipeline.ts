/**
 * Subtitle Pipeline
 *
 * extract -> transcribe -> build -> translate -> export, run as one sequential job.
 *
 * The function never throws for a stage failure: it maps (input, dependencies, options)
 * to a result carrying the cues produced so far, the SRT text, and the stage errors.
 * Abandonment is checked before each stage.
 */

import { Language } from '../../types/config';
import { AudioArtifact, CuePolicy, SubtitleCue, SubtitleLayout, TranscriptSegment } from '../../types/subtitles';
import { PipelineStage, SubtitleAssistantError, errorMessage } from '../errors';
import { MediaExtractor, MediaInput } from './ffmpeg';
import { exportSrt } from './srt';
import { buildCues } from './subtitleBuilder';
import { TranslationFailure, TranslationResult } from './translation';

export type PipelineStatus = 'complete' | 'degraded' | 'failed' | 'abandoned';

export interface StageError {
  stage: PipelineStage;
  /** Error class name, e.g. 'MediaDecodeError' */
  kind: string;
  message: string;
}

export interface PipelineResult {
  status: PipelineStatus;
  cues: SubtitleCue[];
  srt: string;
  errors: StageError[];
  translationFailures: TranslationFailure[];
}

export type PipelinePhase = 'extracting_audio' | 'transcribing' | 'building_cues' | 'translating' | 'exporting' | 'complete';

export interface PipelineProgressEvent {
  phase: PipelinePhase;
  message: string;
  /** 0..100 */
  progress: number;
}

/** The parts of the clients the pipeline calls; fakes implement these in tests */
export interface PipelineDeps {
  extractor: MediaExtractor;
  transcriber: {
    transcribe(audio: AudioArtifact, sourceLanguage?: Language): Promise<TranscriptSegment[]>;
  };
  translator?: {
    translateCues(cues: SubtitleCue[], target: Language, source?: Language): Promise<TranslationResult>;
  };
}

export interface PipelineOptions {
  cuePolicy: CuePolicy;
  sourceLanguage?: Language;
  /** Translation runs only when set and a translator is supplied */
  targetLanguage?: Language;
  layout?: SubtitleLayout;
  isAbandoned?: () => boolean;
  onProgress?: (event: PipelineProgressEvent) => void;
}

export function toStageError(error: unknown, fallbackStage: PipelineStage): StageError {
  if (error instanceof SubtitleAssistantError) {
    return { stage: error.stage, kind: error.name, message: error.message };
  }
  return {
    stage: fallbackStage,
    kind: error instanceof Error ? error.name : 'Error',
    message: errorMessage(error),
  };
}

/**
 * Steps shared by the video workflow and the SRT-translation workflow: optional
 * translation of existing cues, then export.
 */
export async function translateAndExport(
  cues: SubtitleCue[],
  deps: Pick<PipelineDeps, 'translator'>,
  options: Omit<PipelineOptions, 'cuePolicy'>
): Promise<PipelineResult> {
  const { targetLanguage, sourceLanguage, isAbandoned = () => false, onProgress } = options;
  let current = cues;
  let translationFailures: TranslationFailure[] = [];
  const abandoned = (): PipelineResult => ({
    status: 'abandoned',
    cues: current,
    srt: '',
    errors: [],
    translationFailures,
  });

  if (targetLanguage && deps.translator) {
    if (isAbandoned()) return abandoned();
    onProgress?.({ phase: 'translating', message: `Translating to ${targetLanguage}...`, progress: 70 });
    try {
      const translated = await deps.translator.translateCues(current, targetLanguage, sourceLanguage);
      current = translated.cues;
      translationFailures = translated.failures;
    } catch (e) {
      console.error('[PIPELINE] Translation failed:', errorMessage(e));
      return { status: 'failed', cues: current, srt: '', errors: [toStageError(e, 'translate')], translationFailures };
    }
  }

  if (isAbandoned()) return abandoned();
  onProgress?.({ phase: 'exporting', message: 'Generating SRT...', progress: 90 });
  const layout = options.layout ?? (targetLanguage && deps.translator ? 'translated' : 'source');
  const srt = exportSrt(current, layout);

  const errors = translationFailures.map((f) => toStageError(f.error, 'translate'));
  const status: PipelineStatus = translationFailures.length > 0 ? 'degraded' : 'complete';
  onProgress?.({ phase: 'complete', message: 'Subtitles ready', progress: 100 });
  return { status, cues: current, srt, errors, translationFailures };
}

export async function runPipeline(
  input: MediaInput,
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineResult> {
  const { cuePolicy, sourceLanguage, isAbandoned = () => false, onProgress } = options;
  const failed = (error: unknown, stage: PipelineStage, cues: SubtitleCue[] = []): PipelineResult => {
    const stageError = toStageError(error, stage);
    console.error(`[PIPELINE] Stage '${stageError.stage}' failed: ${stageError.message}`);
    return { status: 'failed', cues, srt: '', errors: [stageError], translationFailures: [] };
  };
  const abandoned = (cues: SubtitleCue[] = []): PipelineResult => {
    console.log('[PIPELINE] Job abandoned by user');
    return { status: 'abandoned', cues, srt: '', errors: [], translationFailures: [] };
  };

  if (isAbandoned()) return abandoned();
  onProgress?.({ phase: 'extracting_audio', message: 'Extracting audio...', progress: 5 });
  let audio: AudioArtifact;
  try {
    audio = await deps.extractor.extract(input);
  } catch (e) {
    return failed(e, 'extract');
  }

  let segments: TranscriptSegment[];
  try {
    if (isAbandoned()) return abandoned();
    onProgress?.({ phase: 'transcribing', message: 'Transcribing audio...', progress: 30 });
    segments = await deps.transcriber.transcribe(audio, sourceLanguage);
  } catch (e) {
    return failed(e, 'transcribe');
  } finally {
    await deps.extractor.cleanup(audio);
  }

  if (isAbandoned()) return abandoned();
  onProgress?.({ phase: 'building_cues', message: 'Building subtitle cues...', progress: 60 });
  let cues: SubtitleCue[];
  try {
    cues = buildCues(segments, cuePolicy);
  } catch (e) {
    return failed(e, 'build');
  }
  console.log(`[PIPELINE] ${segments.length} segments -> ${cues.length} cues`);

  return translateAndExport(cues, deps, options);
}
