/**
 * Subtitle types shared by the pipeline, the session store and the preview
 */

/** Raw unit returned by an ASR backend */
export interface TranscriptSegment {
  /** start time in seconds */
  start: number;
  /** end time in seconds */
  end: number;
  /** transcript text */
  text: string;
}

export interface TranscriptData {
  /** ordered list of segments */
  segments: TranscriptSegment[];
  /** optional language code reported by the backend (e.g., 'en') */
  language?: string;
}

/**
 * One subtitle display unit.
 *
 * Timestamps are whole milliseconds so that SRT export and parse round-trip exactly.
 * `index` is 1-based and gap-free within a built sequence; user edits may leave gaps,
 * which the exporter renumbers.
 */
export interface SubtitleCue {
  index: number;
  startMs: number;
  endMs: number;
  sourceText: string;
  /** null until translated, or when the cue's translation batch failed */
  translatedText: string | null;
}

/** Duration and length limits applied by the subtitle builder */
export interface CuePolicy {
  minDurationMs: number;
  maxDurationMs: number;
  maxCharsPerLine: number;
}

export const DEFAULT_CUE_POLICY: CuePolicy = {
  minDurationMs: 1000,
  maxDurationMs: 7000,
  maxCharsPerLine: 42,
};

/** Which text an exported SRT block carries */
export type SubtitleLayout = 'source' | 'translated' | 'bilingual';

/** Intermediate WAV produced by the media extractor */
export interface AudioArtifact {
  /** Absolute path to the WAV file */
  path: string;
  /** Duration in seconds (from ffprobe) */
  durationSec: number;
  /** File size in bytes */
  sizeBytes: number;
}
