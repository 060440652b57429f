/**
 * Convert SRT subtitle text to WebVTT format.
 * Minimal conversion: add WEBVTT header and replace comma decimal separators in timestamps.
 */
export function srtToVtt(srt: string): string {
  // Normalize newlines
  const normalized = srt.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  // Replace comma decimals in timestamps with dot (00:00:01,000 -> 00:00:01.000)
  const body = normalized.replace(/(\d\d:\d\d:\d\d),(\d{3})/g, '$1.$2');
  // Ensure a WEBVTT header
  return `WEBVTT\n\n${body}`;
}

/** File name for an export next to the source: `clip.mp4` -> `clip.srt` / `clip_translated.srt` */
export function exportFileName(sourceName: string, format: 'srt' | 'vtt', suffix?: 'translated' | 'edited'): string {
  const dot = sourceName.lastIndexOf('.');
  const stem = dot > 0 ? sourceName.slice(0, dot) : sourceName;
  return `${stem}${suffix ? `_${suffix}` : ''}.${format}`;
}
