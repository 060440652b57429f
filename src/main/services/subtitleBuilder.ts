import { CuePolicy, DEFAULT_CUE_POLICY, SubtitleCue, TranscriptSegment } from '../../types/subtitles';

interface WorkingSegment {
  startMs: number;
  endMs: number;
  text: string;
}

const SENTENCE_END = /[.!?。！？]/;
const CLAUSE_END = /[,;:，；：、]/;
/** Full-width punctuation needs no trailing space to end a sentence or clause */
const FULL_WIDTH_PUNCT = /[。！？，；：、]/;
/** Kana, CJK ideographs, CJK symbols and full-width forms; Hangul is spaced so it is excluded */
const CJK = /[\u3000-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff\uff00-\uffef]/;

const duration = (seg: WorkingSegment) => seg.endMs - seg.startMs;

/**
 * Join two pieces of cue text: one space between them, or none when either side of the
 * join is a CJK character.
 */
export function joinText(left: string, right: string): string {
  if (!left) return right;
  if (!right) return left;
  const last = left[left.length - 1];
  const first = right[0];
  return CJK.test(last) || CJK.test(first) ? `${left}${right}` : `${left} ${right}`;
}

function normalize(segments: TranscriptSegment[], policy: CuePolicy): WorkingSegment[] {
  const out: WorkingSegment[] = [];
  for (const seg of segments) {
    const text = seg.text.replace(/\s+/g, ' ').trim();
    if (!text) continue;
    const startMs = Math.max(0, Math.round(seg.start * 1000));
    let endMs = Math.round(seg.end * 1000);
    if (endMs <= startMs) {
      endMs = startMs + Math.max(1, policy.minDurationMs);
    }
    out.push({ startMs, endMs, text });
  }
  // Overlapping segments end where the next one starts, when that leaves them a length
  for (let i = 0; i + 1 < out.length; i += 1) {
    const nextStart = out[i + 1].startMs;
    if (out[i].endMs > nextStart && nextStart > out[i].startMs) {
      out[i].endMs = nextStart;
    }
  }
  return out;
}

function nearestToMiddle(candidates: number[], length: number): number | null {
  let best: number | null = null;
  for (const p of candidates) {
    if (best === null || Math.abs(p - length / 2) < Math.abs(best - length / 2)) {
      best = p;
    }
  }
  return best;
}

/**
 * Character offset just after the sentence/clause punctuation closest to the middle of
 * `text`, or null when there is none. ASCII punctuation only counts when followed by
 * whitespace, so "3.5" or "e.g" are never split. Ties go to the earlier boundary.
 */
export function findBoundary(text: string): number | null {
  const candidates: number[] = [];
  for (let i = 0; i < text.length - 1; i += 1) {
    const ch = text[i];
    if (!SENTENCE_END.test(ch) && !CLAUSE_END.test(ch)) continue;
    if (!FULL_WIDTH_PUNCT.test(ch) && !/\s/.test(text[i + 1])) continue;
    const p = i + 1;
    if (text.slice(0, p).trim() && text.slice(p).trim()) {
      candidates.push(p);
    }
  }
  return nearestToMiddle(candidates, text.length);
}

function splitAt(text: string, offset: number): [string, string] {
  return [text.slice(0, offset).trim(), text.slice(offset).trim()];
}

/** Text split for a midpoint-time cut: the space nearest the middle, or the middle CJK character */
function splitTextInHalf(text: string): [string, string] | null {
  const spaces: number[] = [];
  for (let i = 1; i < text.length - 1; i += 1) {
    if (text[i] === ' ') spaces.push(i);
  }
  const space = nearestToMiddle(spaces, text.length);
  if (space !== null) {
    return splitAt(text, space);
  }
  if (text.length >= 2 && CJK.test(text)) {
    return splitAt(text, Math.floor(text.length / 2));
  }
  return null;
}

function splitOnce(seg: WorkingSegment): [WorkingSegment, WorkingSegment] | null {
  const total = duration(seg);
  const boundary = findBoundary(seg.text);

  let at: number;
  let texts: [string, string] | null;
  if (boundary !== null) {
    at = seg.startMs + Math.round((total * boundary) / seg.text.length);
    texts = splitAt(seg.text, boundary);
  } else {
    at = seg.startMs + Math.floor(total / 2);
    texts = splitTextInHalf(seg.text);
  }
  if (!texts) return null;

  at = Math.min(seg.endMs - 1, Math.max(seg.startMs + 1, at));
  return [
    { startMs: seg.startMs, endMs: at, text: texts[0] },
    { startMs: at, endMs: seg.endMs, text: texts[1] },
  ];
}

function splitToFit(seg: WorkingSegment, policy: CuePolicy, out: WorkingSegment[]): void {
  if (duration(seg) <= policy.maxDurationMs) {
    out.push(seg);
    return;
  }
  const parts = splitOnce(seg);
  if (!parts) {
    out.push(seg);
    return;
  }
  splitToFit(parts[0], policy, out);
  splitToFit(parts[1], policy, out);
}

function mergePair(a: WorkingSegment, b: WorkingSegment, policy: CuePolicy): WorkingSegment | null {
  const text = joinText(a.text, b.text);
  if (text.length > policy.maxCharsPerLine) return null;
  const merged = { startMs: a.startMs, endMs: Math.max(a.endMs, b.endMs), text };
  return duration(merged) <= policy.maxDurationMs ? merged : null;
}

function mergeShort(segments: WorkingSegment[], policy: CuePolicy): WorkingSegment[] {
  const out: WorkingSegment[] = [];
  for (let i = 0; i < segments.length; i += 1) {
    let cur = segments[i];

    // Prefer absorbing the following segment(s)
    while (duration(cur) < policy.minDurationMs && i + 1 < segments.length) {
      const merged = mergePair(cur, segments[i + 1], policy);
      if (!merged) break;
      cur = merged;
      i += 1;
    }

    if (duration(cur) < policy.minDurationMs && out.length > 0) {
      const merged = mergePair(out[out.length - 1], cur, policy);
      if (merged) {
        out[out.length - 1] = merged;
        continue;
      }
    }
    out.push(cur);
  }
  return out;
}

/**
 * Stage 3 of the pipeline: transcript segments to subtitle cues.
 *
 * Long segments are split first, then short ones merged greedily left to right. The same
 * segments and policy always produce the same cues, in start-time order even when the
 * segments overlap.
 */
export function buildCues(segments: TranscriptSegment[], policy: CuePolicy = DEFAULT_CUE_POLICY): SubtitleCue[] {
  const normalized = normalize(segments, policy);

  const split: WorkingSegment[] = [];
  for (const seg of normalized) {
    splitToFit(seg, policy, split);
  }
  // Segments sharing a start time cannot be trimmed, so their parts may interleave
  split.sort((a, b) => a.startMs - b.startMs);

  return mergeShort(split, policy).map((seg, i) => ({
    index: i + 1,
    startMs: seg.startMs,
    endMs: seg.endMs,
    sourceText: seg.text,
    translatedText: null,
  }));
}

/** Re-number cues 1..n in their current order */
export function renumberCues(cues: SubtitleCue[]): SubtitleCue[] {
  return cues.map((cue, i) => (cue.index === i + 1 ? cue : { ...cue, index: i + 1 }));
}
