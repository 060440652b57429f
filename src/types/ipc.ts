/**
 * Handler Channel Definitions and Type Safety
 *
 * WHY THIS FILE EXISTS:
 * - Centralizes all channel names as constants to prevent typos
 * - Provides TypeScript type definitions for request/response messages
 * - Ties each invoke channel to its request and response type
 *
 * NAMING CONVENTION:
 * - Channel names use kebab-case (e.g., 'generate-subtitles')
 * - Constant names use SCREAMING_SNAKE_CASE (e.g., GENERATE_SUBTITLES)
 * - Request/Response interfaces use PascalCase with suffix (e.g., GenerateSubtitlesRequest)
 */

import type { PipelineStage } from '../main/errors';
import type { PipelinePhase, PipelineStatus, StageError } from '../main/services/pipeline';
import type { TranslationFailure } from '../main/services/translation';
import type { SubtitleCue, SubtitleLayout } from './subtitles';

/**
 * IPC_CHANNELS - All available channel names
 *
 * Using 'as const' makes this a readonly object with literal string types
 */
export const IPC_CHANNELS = {
  /** Run extract -> transcribe -> build -> (translate) -> export on one video */
  GENERATE_SUBTITLES: 'generate-subtitles',

  /** Streaming progress events for subtitle generation */
  GENERATE_SUBTITLES_PROGRESS: 'generate-subtitles-progress',

  /** Translate an existing SRT file */
  TRANSLATE_SUBTITLES: 'translate-subtitles',

  /** Write edited cues to disk as SRT or VTT */
  EXPORT_SUBTITLES: 'export-subtitles',

  /** Read a text file (SRT, VTT or ASS) from disk */
  READ_TEXT_FILE: 'read-text-file',
} as const;

export type IPCChannel = typeof IPC_CHANNELS[keyof typeof IPC_CHANNELS];

// ============================================================================
// GENERATE SUBTITLES
// ============================================================================

export interface GenerateSubtitlesRequest {
  /** Absolute path to the uploaded video */
  videoPath?: string;
  /** In-memory upload, used when there is no path */
  video?: { data: Buffer; filename: string };
  sourceLanguage?: string;
  /** Translate after recognition when set */
  targetLanguage?: string;
  layout?: SubtitleLayout;
}

export interface SubtitleJobResponse {
  success: true;
  status: PipelineStatus;
  cues: SubtitleCue[];
  srt: string;
  errors: StageError[];
  translationFailures: TranslationFailure[];
}

export type GenerateSubtitlesResponse = SubtitleJobResponse;

export interface GenerateSubtitlesProgressEvent {
  phase: PipelinePhase | 'error';
  message?: string;
  progress?: number;
  errorMessage?: string;
}

// ============================================================================
// TRANSLATE SUBTITLES
// ============================================================================

export interface TranslateSubtitlesRequest {
  /** Absolute path to an SRT, WebVTT or ASS file */
  srtPath?: string;
  /** Subtitle text in any of those formats, used when there is no path */
  srtContent?: string;
  targetLanguage: string;
  sourceLanguage?: string;
  layout?: SubtitleLayout;
}

export type TranslateSubtitlesResponse = SubtitleJobResponse;

// ============================================================================
// EXPORT / FILES
// ============================================================================

export interface ExportSubtitlesRequest {
  cues: SubtitleCue[];
  outputPath: string;
  format?: 'srt' | 'vtt';
  layout?: SubtitleLayout;
}

export interface ExportSubtitlesResponse {
  success: true;
  outputPath: string;
  /** Number of cue blocks written */
  cueCount: number;
}

export interface ReadTextFileRequest {
  path: string;
  encoding?: BufferEncoding;
}

export interface ReadTextFileResponse {
  success: true;
  content: string;
}

/**
 * Error response structure used across all handlers
 *
 * - error: user-facing message
 * - details: technical details (for logging/debugging)
 * - stage: which pipeline stage failed, when known
 */
export interface IPCErrorResponse {
  success: false;
  error: string;
  details?: string;
  stage?: PipelineStage;
}

// ============================================================================
// TYPE HELPERS
// ============================================================================

export function isIPCError(response: unknown): response is IPCErrorResponse {
  return (
    typeof response === 'object' &&
    response !== null &&
    'success' in response &&
    response.success === false
  );
}

/** Request and response types for every invoke channel */
export interface IPCInvokeMap {
  [IPC_CHANNELS.GENERATE_SUBTITLES]: { request: GenerateSubtitlesRequest; response: GenerateSubtitlesResponse };
  [IPC_CHANNELS.TRANSLATE_SUBTITLES]: { request: TranslateSubtitlesRequest; response: TranslateSubtitlesResponse };
  [IPC_CHANNELS.EXPORT_SUBTITLES]: { request: ExportSubtitlesRequest; response: ExportSubtitlesResponse };
  [IPC_CHANNELS.READ_TEXT_FILE]: { request: ReadTextFileRequest; response: ReadTextFileResponse };
}

export type InvokeChannel = keyof IPCInvokeMap;

/**
 * Combined response type that includes potential errors
 * This is what handlers should return
 */
export type IPCResult<T> = T | IPCErrorResponse;

/** Progress and other one-way events a handler may emit while it runs */
export interface IPCEventMap {
  [IPC_CHANNELS.GENERATE_SUBTITLES_PROGRESS]: GenerateSubtitlesProgressEvent;
}
