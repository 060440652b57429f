import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LANGUAGE_NAMES } from '../types/config';
import { CliCommand, USAGE, defaultOutputPath, parseCliArgs, runCli } from './cli';

describe('parseCliArgs', () => {
  it('reads a transcribe command with options', () => {
    expect(
      parseCliArgs(['transcribe', '/videos/talk.mp4', '--target', 'French', '--layout', 'bilingual', '--search', 'hi'])
    ).toEqual({
      command: 'transcribe',
      input: '/videos/talk.mp4',
      format: 'srt',
      layout: 'bilingual',
      search: 'hi',
      overrides: { targetLanguage: 'French' },
      edits: [],
    });
  });

  it('reads edits in the order they are applied', () => {
    const parsed = parseCliArgs([
      'edit',
      '/subs/talk.srt',
      '--delete',
      '2',
      '--time',
      '1=00:00:07,000 --> 00:00:08,500',
      '--text',
      '3=Last line',
      '--translation',
      '3=Dernière ligne',
    ]);

    expect(parsed).toMatchObject({
      command: 'edit',
      input: '/subs/talk.srt',
      edits: [
        { kind: 'text', index: 3, field: 'sourceText', text: 'Last line' },
        { kind: 'text', index: 3, field: 'translatedText', text: 'Dernière ligne' },
        { kind: 'timing', index: 1, startMs: 7000, endMs: 8500 },
        { kind: 'delete', index: 2 },
      ],
    });
  });

  it('rejects malformed edits', () => {
    expect(parseCliArgs(['edit', 'a.srt', '--text', 'Hello'])).toEqual({
      command: 'error',
      message: "--text expects <n>=<text>, got 'Hello'",
    });
    expect(parseCliArgs(['edit', 'a.srt', '--time', '2=00:00:05,000'])).toEqual({
      command: 'error',
      message: "--time expects <n>=<start>-<end>, got '2=00:00:05,000'",
    });
    expect(parseCliArgs(['edit', 'a.srt', '--time', '2=00:00:05,000-00:00:04,000'])).toEqual({
      command: 'error',
      message: '--time 2: the start must come before the end',
    });
    expect(parseCliArgs(['edit', 'a.srt', '--delete', '0'])).toEqual({
      command: 'error',
      message: "--delete expects a cue number, got '0'",
    });
  });

  it('shows help without a command', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help' });
    expect(parseCliArgs(['translate', 'a.srt', '-h'])).toEqual({ command: 'help' });
    expect(parseCliArgs(['languages'])).toEqual({ command: 'languages' });
  });

  it('reports usage errors', () => {
    expect(parseCliArgs(['transcribe'])).toEqual({ command: 'error', message: "'transcribe' needs an input file" });
    expect(parseCliArgs(['convert', 'a.mp4'])).toEqual({ command: 'error', message: "Unknown command 'convert'" });
    expect(parseCliArgs(['transcribe', 'a.mp4', '--format', 'ass'])).toEqual({
      command: 'error',
      message: "--format must be srt or vtt, got 'ass'",
    });
    expect(parseCliArgs(['transcribe', 'a.mp4', '--layout', 'stacked'])).toEqual({
      command: 'error',
      message: '--layout must be one of source, translated, bilingual',
    });
    expect(parseCliArgs(['transcribe', 'a.mp4', '--bogus'])).toMatchObject({ command: 'error' });
  });
});

describe('defaultOutputPath', () => {
  it('writes next to the input', () => {
    const parsed = parseCliArgs(['translate', '/data/talk.srt', '--format', 'vtt']);
    if (parsed.command !== 'translate') throw new Error(`unexpected command ${parsed.command}`);
    const cmd: CliCommand = parsed;

    expect(defaultOutputPath(cmd, true)).toBe('/data/talk_translated.vtt');
    expect(defaultOutputPath(cmd, false)).toBe('/data/talk.vtt');
  });

  it('marks edited files', () => {
    const parsed = parseCliArgs(['edit', '/data/talk.srt']);
    if (parsed.command !== 'edit') throw new Error(`unexpected command ${parsed.command}`);

    expect(defaultOutputPath(parsed, false)).toBe('/data/talk_edited.srt');
  });
});

describe('runCli', () => {
  let tmp: string;
  let srtPath: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'subtitle-cli-test-'));
    srtPath = path.join(tmp, 'talk.srt');
    fs.writeFileSync(srtPath, '1\n00:00:01,000 --> 00:00:02,000\nHello\n\n');
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('prints usage and languages', async () => {
    await expect(runCli([], {})).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);

    await expect(runCli(['languages'], {})).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(LANGUAGE_NAMES.join('\n'));
  });

  it('exits with 2 on bad arguments or configuration', async () => {
    await expect(runCli(['transcribe'], {})).resolves.toBe(2);
    await expect(runCli(['translate', srtPath], { MIN_CUE_MS: 'soon' })).resolves.toBe(2);
    expect(error).toHaveBeenLastCalledWith("[CLI] MIN_CUE_MS must be an integer >= 1, got 'soon'");
  });

  it('exits with 1 when the job fails', async () => {
    await expect(runCli(['translate', srtPath], {})).resolves.toBe(1);
    expect(error).toHaveBeenLastCalledWith('[CLI] A target language is required');
  });

  it('fails without an API key for the translation backend', async () => {
    await expect(runCli(['translate', srtPath, '--target', 'French'], {})).resolves.toBe(1);
    expect(fs.existsSync(path.join(tmp, 'talk_translated.srt'))).toBe(false);
  });

  it('edits a subtitle file and writes it beside the original', async () => {
    fs.writeFileSync(
      srtPath,
      '1\n00:00:01,000 --> 00:00:02,000\nHello\n\n2\n00:00:03,000 --> 00:00:04,000\nSecond\n\n3\n00:00:05,000 --> 00:00:06,000\nThird\n\n'
    );

    await expect(
      runCli(['edit', srtPath, '--text', '3=Last line', '--time', '1=00:00:07,000-00:00:08,500', '--delete', '2'], {})
    ).resolves.toBe(0);

    expect(fs.readFileSync(path.join(tmp, 'talk_edited.srt'), 'utf8')).toBe(
      '1\n00:00:05,000 --> 00:00:06,000\nLast line\n\n2\n00:00:07,000 --> 00:00:08,500\nHello\n\n'
    );
  });

  it('warns about edits for cues that do not exist', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await expect(runCli(['edit', srtPath, '--delete', '9', '--out', path.join(tmp, 'out.vtt'), '--format', 'vtt'], {})).resolves.toBe(0);

    expect(warn).toHaveBeenCalledWith('[CLI] No cue 9 to delete');
    expect(fs.readFileSync(path.join(tmp, 'out.vtt'), 'utf8')).toBe('WEBVTT\n\n1\n00:00:01.000 --> 00:00:02.000\nHello\n\n');
  });

  it('fails to edit a file without subtitles', async () => {
    fs.writeFileSync(srtPath, 'no cues here\n');

    await expect(runCli(['edit', srtPath], {})).resolves.toBe(1);
    expect(error).toHaveBeenLastCalledWith('[CLI] No subtitles found in talk.srt');
  });

  it('does not leave a SIGINT listener behind', async () => {
    const before = process.listenerCount('SIGINT');

    await runCli(['translate', srtPath], {});

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
