import { SubtitleCue, SubtitleLayout } from '../../types/subtitles';

/**
 * Convert milliseconds to SRT timestamp (HH:MM:SS,mmm)
 */
export function toSrtTimestamp(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const h = Math.floor(total / 3600000);
  const m = Math.floor((total % 3600000) / 60000);
  const s = Math.floor((total % 60000) / 1000);
  const mm = total % 1000;
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(mm, 3)}`;
}

const TIMESTAMP = /^(?:(\d+):)?(\d{2}):(\d{2})[,.](\d{1,3})$/;
const TIMING_LINE = /^\s*((?:\d+:)?\d{2}:\d{2}[,.]\d{1,3})\s*-->\s*((?:\d+:)?\d{2}:\d{2}[,.]\d{1,3})/;

/**
 * Parse HH:MM:SS,mmm (or with '.') to milliseconds; null when malformed.
 * The hours may be left out, as WebVTT allows. A two-digit fraction (ASS centiseconds) is hundredths.
 */
export function parseSrtTimestamp(ts: string): number | null {
  const m = ts.trim().match(TIMESTAMP);
  if (!m) return null;
  const h = m[1] === undefined ? 0 : Number(m[1]);
  const mn = Number(m[2]);
  const s = Number(m[3]);
  const ms = Number(m[4].padEnd(3, '0'));
  return ((h * 60 + mn) * 60 + s) * 1000 + ms;
}

/** Text a cue contributes to an export, with blank lines removed so a block never ends early */
export function cueText(cue: SubtitleCue, layout: SubtitleLayout = 'source'): string {
  let text: string;
  switch (layout) {
    case 'translated':
      text = cue.translatedText ?? cue.sourceText;
      break;
    case 'bilingual':
      text = cue.translatedText ? `${cue.translatedText}\n${cue.sourceText}` : cue.sourceText;
      break;
    case 'source':
    default:
      text = cue.sourceText;
  }
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Stage 5 of the pipeline: render cues as SRT.
 *
 * Blocks are numbered 1..n in array order whatever `index` the cues carry, so gaps left by
 * edits disappear. Output depends only on the input, so exporting twice is byte-identical.
 */
export function exportSrt(cues: SubtitleCue[], layout: SubtitleLayout = 'source'): string {
  return cues
    .map((cue, i) => {
      const timing = `${toSrtTimestamp(cue.startMs)} --> ${toSrtTimestamp(cue.endMs)}`;
      return `${i + 1}\n${timing}\n${cueText(cue, layout)}\n\n`;
    })
    .join('');
}

/**
 * Parse SRT text into cues (translatedText null, indices renumbered from 1).
 * Accepts CRLF line endings, a leading BOM, '.' before milliseconds and blocks without an
 * index line. Blocks with an unreadable timing line are skipped, so WebVTT parses too:
 * its header and NOTE blocks have no timing line and cue identifiers stand where the index would.
 */
export function parseSrt(content: string): SubtitleCue[] {
  const lines = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const cues: SubtitleCue[] = [];
  let i = 0;

  while (i < lines.length) {
    while (i < lines.length && lines[i].trim() === '') i++;
    if (i >= lines.length) break;

    // Optional index line
    if (!TIMING_LINE.test(lines[i])) {
      if (i + 1 < lines.length && TIMING_LINE.test(lines[i + 1])) {
        i++;
      } else {
        i++;
        continue;
      }
    }

    const timing = lines[i++].match(TIMING_LINE);
    const startMs = timing ? parseSrtTimestamp(timing[1]) : null;
    const endMs = timing ? parseSrtTimestamp(timing[2]) : null;

    const textLines: string[] = [];
    while (i < lines.length && lines[i].trim() !== '') {
      textLines.push(lines[i++].trim());
    }
    if (startMs === null || endMs === null) continue;

    cues.push({
      index: cues.length + 1,
      startMs,
      endMs,
      sourceText: textLines.join('\n'),
      translatedText: null,
    });
  }
  return cues;
}

export type SubtitleFileFormat = 'srt' | 'vtt' | 'ass';

const ASS_SECTION = /^\s*\[(script info|v4\+? styles|events)\]\s*$/im;

/** Guess the format of a subtitle file from its content */
export function detectSubtitleFormat(content: string): SubtitleFileFormat {
  const text = content.replace(/^\uFEFF/, '');
  if (ASS_SECTION.test(text)) return 'ass';
  if (/^WEBVTT(?:[ \t\n]|$)/.test(text)) return 'vtt';
  return 'srt';
}

const ASS_DEFAULT_FORMAT = ['layer', 'start', 'end', 'style', 'name', 'marginl', 'marginr', 'marginv', 'effect', 'text'];

/** Dialogue text without override blocks, with ASS line breaks and hard spaces resolved */
function assText(raw: string): string {
  return raw
    .replace(/\{[^}]*\}/g, '')
    .replace(/\\[Nn]/g, '\n')
    .replace(/\\h/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Parse the Dialogue lines of an ASS/SSA script into cues, ordered by start time.
 * The [Events] Format line decides the column order; lines without text or a readable
 * time range are skipped.
 */
export function parseAss(content: string): SubtitleCue[] {
  const lines = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  let columns = ASS_DEFAULT_FORMAT;
  let inEvents = false;
  const parsed: Array<Omit<SubtitleCue, 'index'>> = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.startsWith('[')) {
      inEvents = trimmed.toLowerCase() === '[events]';
      continue;
    }
    if (!inEvents) continue;

    const colon = trimmed.indexOf(':');
    if (colon < 0) continue;
    const key = trimmed.slice(0, colon).trim().toLowerCase();
    const value = trimmed.slice(colon + 1);

    if (key === 'format') {
      columns = value.split(',').map((c) => c.trim().toLowerCase());
      continue;
    }
    if (key !== 'dialogue') continue;

    // Text is the last column and may itself contain commas
    const fields = value.split(',');
    const head = fields.slice(0, columns.length - 1).map((f) => f.trim());
    const text = assText(fields.slice(columns.length - 1).join(','));
    const startMs = parseSrtTimestamp(head[columns.indexOf('start')] ?? '');
    const endMs = parseSrtTimestamp(head[columns.indexOf('end')] ?? '');
    if (startMs === null || endMs === null || endMs <= startMs || !text) continue;

    parsed.push({ startMs, endMs, sourceText: text, translatedText: null });
  }

  return parsed
    .sort((a, b) => a.startMs - b.startMs)
    .map((cue, i) => ({ index: i + 1, ...cue }));
}

/** Parse an SRT, WebVTT or ASS file, whichever the content looks like */
export function parseSubtitles(content: string): SubtitleCue[] {
  return detectSubtitleFormat(content) === 'ass' ? parseAss(content) : parseSrt(content);
}
