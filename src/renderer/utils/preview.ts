import { SubtitleCue } from '../../types/subtitles';

/**
 * Format milliseconds as mm:ss.mmm, or hh:mm:ss.mmm from one hour on
 */
export function formatTime(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const seconds = Math.floor((total % 60000) / 1000);
  const millis = total % 1000;
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');

  const base = `${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
  return hours > 0 ? `${pad(hours)}:${base}` : base;
}

/** Readable duration: "1h 2m 3s", "2m 3s" or "3s" */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export interface PreviewRow {
  index: number;
  start: string;
  end: string;
  /** seconds, one decimal */
  durationSec: number;
  text: string;
  translation: string | null;
}

/**
 * Rows for the preview table, filtered by a case-insensitive keyword over both texts.
 * Row numbers follow presentation order, as in the exported file.
 */
export function buildPreviewRows(cues: SubtitleCue[], searchTerm = ''): PreviewRow[] {
  const needle = searchTerm.trim().toLowerCase();
  return cues
    .map((cue, i) => ({
      index: i + 1,
      start: formatTime(cue.startMs),
      end: formatTime(cue.endMs),
      durationSec: Math.round((cue.endMs - cue.startMs) / 100) / 10,
      text: cue.sourceText.trim(),
      translation: cue.translatedText,
    }))
    .filter(
      (row) =>
        !needle ||
        row.text.toLowerCase().includes(needle) ||
        (row.translation ?? '').toLowerCase().includes(needle)
    );
}

export interface SubtitleStats {
  segments: number;
  totalDurationMs: number;
  totalChars: number;
  averageDurationMs: number;
}

export function computeStats(cues: SubtitleCue[]): SubtitleStats {
  const totalDurationMs = cues.reduce((acc, cue) => acc + (cue.endMs - cue.startMs), 0);
  const totalChars = cues.reduce((acc, cue) => acc + cue.sourceText.trim().length, 0);
  return {
    segments: cues.length,
    totalDurationMs,
    totalChars,
    averageDurationMs: cues.length > 0 ? totalDurationMs / cues.length : 0,
  };
}

function truncate(text: string, width: number): string {
  const flat = text.replace(/\n/g, ' / ');
  return flat.length > width ? `${flat.slice(0, width - 1)}…` : flat;
}

/**
 * Plain-text table for the terminal. The translation column only appears when at least
 * one row has a translation.
 */
export function renderPreviewTable(rows: PreviewRow[], maxTextWidth = 60): string {
  if (rows.length === 0) return 'No subtitles.';

  const withTranslation = rows.some((row) => row.translation !== null);
  const headers = ['#', 'Start', 'End', 'Dur (s)', 'Text', ...(withTranslation ? ['Translation'] : [])];
  const body = rows.map((row) => [
    String(row.index),
    row.start,
    row.end,
    row.durationSec.toFixed(1),
    truncate(row.text, maxTextWidth),
    ...(withTranslation ? [truncate(row.translation ?? '', maxTextWidth)] : []),
  ]);

  const widths = headers.map((h, col) => Math.max(h.length, ...body.map((cells) => cells[col].length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join(' | ')
      .trimEnd();

  return [line(headers), widths.map((w) => '-'.repeat(w)).join('-+-'), ...body.map(line)].join('\n');
}

export function renderStats(stats: SubtitleStats): string {
  return [
    `Subtitle Segments: ${stats.segments}`,
    `Total Duration: ${formatDuration(stats.totalDurationMs)}`,
    `Total Characters: ${stats.totalChars}`,
    `Average Duration: ${(stats.averageDurationMs / 1000).toFixed(1)}s`,
  ].join('\n');
}
