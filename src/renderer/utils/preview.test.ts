import { describe, it, expect } from 'vitest';
import { SubtitleCue } from '../../types/subtitles';
import {
  buildPreviewRows,
  computeStats,
  formatDuration,
  formatTime,
  renderPreviewTable,
  renderStats,
} from './preview';

const cues: SubtitleCue[] = [
  { index: 1, startMs: 0, endMs: 1500, sourceText: 'First', translatedText: 'Premier' },
  { index: 2, startMs: 1500, endMs: 3000, sourceText: 'Second', translatedText: 'Deuxième' },
  { index: 3, startMs: 3000, endMs: 4500, sourceText: 'Third', translatedText: null },
];

describe('formatTime', () => {
  it('shows hours only when needed', () => {
    expect(formatTime(0)).toBe('00:00.000');
    expect(formatTime(61234)).toBe('01:01.234');
    expect(formatTime(3723004)).toBe('01:02:03.004');
  });
});

describe('formatDuration', () => {
  it('drops leading zero units', () => {
    expect(formatDuration(3723004)).toBe('1h 2m 3s');
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(4999)).toBe('4s');
  });
});

describe('buildPreviewRows', () => {
  it('filters on either text, ignoring case', () => {
    expect(buildPreviewRows(cues, 'prem')).toEqual([
      { index: 1, start: '00:00.000', end: '00:01.500', durationSec: 1.5, text: 'First', translation: 'Premier' },
    ]);
    expect(buildPreviewRows(cues, 'DEUX').map((row) => row.index)).toEqual([2]);
    expect(buildPreviewRows(cues, '  ')).toHaveLength(3);
  });
});

describe('computeStats', () => {
  it('totals duration and characters', () => {
    const stats = computeStats(cues);

    expect(stats).toEqual({ segments: 3, totalDurationMs: 4500, totalChars: 16, averageDurationMs: 1500 });
    expect(renderStats(stats)).toBe(
      'Subtitle Segments: 3\nTotal Duration: 4s\nTotal Characters: 16\nAverage Duration: 1.5s'
    );
  });

  it('handles no cues', () => {
    expect(computeStats([])).toEqual({ segments: 0, totalDurationMs: 0, totalChars: 0, averageDurationMs: 0 });
  });
});

describe('renderPreviewTable', () => {
  it('aligns columns', () => {
    const rows = buildPreviewRows([
      { index: 1, startMs: 0, endMs: 1500, sourceText: 'Hello', translatedText: null },
      { index: 2, startMs: 1500, endMs: 3250, sourceText: 'World again', translatedText: null },
    ]);

    expect(renderPreviewTable(rows).split('\n')).toEqual([
      '# | Start     | End       | Dur (s) | Text',
      '--+-----------+-----------+---------+------------',
      '1 | 00:00.000 | 00:01.500 | 1.5     | Hello',
      '2 | 00:01.500 | 00:03.250 | 1.8     | World again',
    ]);
  });

  it('adds a translation column when any row is translated', () => {
    const [header] = renderPreviewTable(buildPreviewRows(cues.slice(0, 1))).split('\n');

    expect(header).toBe('# | Start     | End       | Dur (s) | Text  | Translation');
  });

  it('flattens and truncates long text', () => {
    const rows = buildPreviewRows([
      { index: 1, startMs: 0, endMs: 1000, sourceText: 'abcdefghij', translatedText: null },
      { index: 2, startMs: 1000, endMs: 2000, sourceText: 'a\nb', translatedText: null },
    ]);
    const lines = renderPreviewTable(rows, 5).split('\n');

    expect(lines[2].endsWith('| abcd…')).toBe(true);
    expect(lines[3].endsWith('| a / b')).toBe(true);
  });

  it('says so when there is nothing to show', () => {
    expect(renderPreviewTable([])).toBe('No subtitles.');
  });
});
