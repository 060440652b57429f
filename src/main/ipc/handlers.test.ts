import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GenerateSubtitlesProgressEvent, IPC_CHANNELS } from '../../types/ipc';
import { AudioArtifact, SubtitleCue } from '../../types/subtitles';
import { loadConfig } from '../config';
import { ConfigError, MediaDecodeError } from '../errors';
import { TranslationClient } from '../services/translation';
import { HandlerContext, hasHandler, invoke, registerHandler, unregisterHandler } from './handlers';
import { registerSubtitleHandlers } from './index';
import { SubtitleServices } from './services';

const audio: AudioArtifact = { path: '/tmp/work/job.wav', durationSec: 5, sizeBytes: 160_044 };

function fakeServices(overrides: Partial<SubtitleServices> = {}): SubtitleServices {
  const config = loadConfig({ RETRY_BASE_DELAY_MS: '0' });
  return {
    config,
    extractor: { extract: async () => audio, cleanup: async () => undefined },
    createTranscriber: () => ({
      transcribe: async () => [
        { start: 0, end: 2, text: 'Hello there' },
        { start: 2.5, end: 5, text: 'General Kenobi' },
      ],
    }),
    createTranslator: () =>
      new TranslationClient(
        { name: 'fake', translateBatch: async (texts) => texts.map((t) => `[fr] ${t}`) },
        { batchSize: 20, retry: config.retry }
      ),
    ...overrides,
  };
}

function recordingContext(events: GenerateSubtitlesProgressEvent[]): HandlerContext {
  return {
    send: (_channel, payload) => {
      events.push(payload);
    },
    isAbandoned: () => false,
  };
}

describe('handler registry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('answers an unregistered channel with an error response', async () => {
    unregisterHandler(IPC_CHANNELS.READ_TEXT_FILE);

    expect(hasHandler(IPC_CHANNELS.READ_TEXT_FILE)).toBe(false);
    await expect(invoke(IPC_CHANNELS.READ_TEXT_FILE, { path: '/tmp/a.srt' })).resolves.toEqual({
      success: false,
      error: "No handler registered for 'read-text-file'",
    });
  });

  it('turns a thrown error into a response tagged with its stage', async () => {
    registerHandler(IPC_CHANNELS.EXPORT_SUBTITLES, async () => {
      throw new ConfigError('bad layout');
    });

    await expect(invoke(IPC_CHANNELS.EXPORT_SUBTITLES, { cues: [], outputPath: '/tmp/x.srt' })).resolves.toMatchObject({
      success: false,
      error: 'bad layout',
      stage: 'config',
    });
  });
});

describe('subtitle handlers', () => {
  let tmp: string;
  let videoPath: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'subtitle-handlers-test-'));
    videoPath = path.join(tmp, 'talk.mp4');
    fs.writeFileSync(videoPath, 'video');
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('generates and translates subtitles for a video', async () => {
    registerSubtitleHandlers(fakeServices());
    const events: GenerateSubtitlesProgressEvent[] = [];

    const result = await invoke(
      IPC_CHANNELS.GENERATE_SUBTITLES,
      { videoPath, targetLanguage: 'French' },
      recordingContext(events)
    );

    expect(result).toMatchObject({
      success: true,
      status: 'complete',
      cues: [{ translatedText: '[fr] Hello there' }, { translatedText: '[fr] General Kenobi' }],
      errors: [],
    });
    expect(events.map((e) => e.phase)).toEqual([
      'extracting_audio',
      'transcribing',
      'building_cues',
      'translating',
      'exporting',
      'complete',
    ]);
  });

  it('requires a video', async () => {
    registerSubtitleHandlers(fakeServices());

    await expect(invoke(IPC_CHANNELS.GENERATE_SUBTITLES, { videoPath: path.join(tmp, 'gone.mp4') })).resolves.toEqual({
      success: false,
      error: 'Invalid or missing videoPath',
      stage: 'extract',
    });
  });

  it('rejects an unknown language', async () => {
    registerSubtitleHandlers(fakeServices());

    await expect(
      invoke(IPC_CHANNELS.GENERATE_SUBTITLES, { videoPath, targetLanguage: 'Elvish' })
    ).resolves.toMatchObject({ success: false, error: "Unsupported target language: 'Elvish'", stage: 'config' });
  });

  it('names the failed stage and emits an error event', async () => {
    registerSubtitleHandlers(
      fakeServices({
        extractor: {
          extract: async () => {
            throw new MediaDecodeError('No audio stream found in talk.mp4');
          },
          cleanup: async () => undefined,
        },
      })
    );
    const events: GenerateSubtitlesProgressEvent[] = [];

    const result = await invoke(IPC_CHANNELS.GENERATE_SUBTITLES, { videoPath }, recordingContext(events));

    expect(result).toEqual({
      success: false,
      error: 'Audio extraction failed',
      details: 'MediaDecodeError: No audio stream found in talk.mp4',
      stage: 'extract',
    });
    expect(events[events.length - 1]).toEqual({
      phase: 'error',
      errorMessage: 'MediaDecodeError: No audio stream found in talk.mp4',
    });
  });

  it('translates an existing SRT into a bilingual file', async () => {
    registerSubtitleHandlers(fakeServices());
    const srtContent = '1\n00:00:01,000 --> 00:00:02,000\nGood morning\n\n2\n00:00:02,500 --> 00:00:04,000\nSee you\n\n';

    const result = await invoke(IPC_CHANNELS.TRANSLATE_SUBTITLES, {
      srtContent,
      targetLanguage: 'French',
      layout: 'bilingual',
    });

    expect(result).toMatchObject({
      success: true,
      status: 'complete',
      srt:
        '1\n00:00:01,000 --> 00:00:02,000\n[fr] Good morning\nGood morning\n\n' +
        '2\n00:00:02,500 --> 00:00:04,000\n[fr] See you\nSee you\n\n',
    });
  });

  it('translates WebVTT text and an ASS file', async () => {
    registerSubtitleHandlers(fakeServices());
    const assPath = path.join(tmp, 'talk.ass');
    fs.writeFileSync(
      assPath,
      '[Events]\nFormat: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text\n' +
        'Dialogue: 0,0:00:03.00,0:00:04.50,Default,,0,0,0,,See you\n'
    );

    await expect(
      invoke(IPC_CHANNELS.TRANSLATE_SUBTITLES, {
        srtContent: 'WEBVTT\n\n00:01.000 --> 00:02.000\nGood morning\n',
        targetLanguage: 'French',
        layout: 'translated',
      })
    ).resolves.toMatchObject({ success: true, srt: '1\n00:00:01,000 --> 00:00:02,000\n[fr] Good morning\n\n' });
    await expect(
      invoke(IPC_CHANNELS.TRANSLATE_SUBTITLES, { srtPath: assPath, targetLanguage: 'French', layout: 'translated' })
    ).resolves.toMatchObject({ success: true, srt: '1\n00:00:03,000 --> 00:00:04,500\n[fr] See you\n\n' });
  });

  it('needs a target language and at least one cue to translate', async () => {
    registerSubtitleHandlers(fakeServices());

    await expect(
      invoke(IPC_CHANNELS.TRANSLATE_SUBTITLES, { srtContent: '1\n00:00:01,000 --> 00:00:02,000\nHi\n', targetLanguage: '' })
    ).resolves.toEqual({ success: false, error: 'A target language is required', stage: 'translate' });
    await expect(
      invoke(IPC_CHANNELS.TRANSLATE_SUBTITLES, { srtContent: 'just text', targetLanguage: 'French' })
    ).resolves.toEqual({ success: false, error: 'No subtitles found in file', stage: 'translate' });
  });

  it('exports WebVTT and reads it back', async () => {
    registerSubtitleHandlers(fakeServices());
    const cues: SubtitleCue[] = [{ index: 4, startMs: 1000, endMs: 2500, sourceText: 'Hi', translatedText: null }];
    const outputPath = path.join(tmp, 'out', 'talk.vtt');

    await expect(invoke(IPC_CHANNELS.EXPORT_SUBTITLES, { cues, outputPath, format: 'vtt' })).resolves.toEqual({
      success: true,
      outputPath,
      cueCount: 1,
    });
    await expect(invoke(IPC_CHANNELS.READ_TEXT_FILE, { path: outputPath })).resolves.toEqual({
      success: true,
      content: 'WEBVTT\n\n1\n00:00:01.000 --> 00:00:02.500\nHi\n\n',
    });
  });

  it('refuses relative paths when reading', async () => {
    registerSubtitleHandlers(fakeServices());

    await expect(invoke(IPC_CHANNELS.READ_TEXT_FILE, { path: 'out/talk.srt' })).resolves.toEqual({
      success: false,
      error: 'Path must be absolute',
    });
  });

  it('reports a missing subtitle file at the translate stage', async () => {
    registerSubtitleHandlers(fakeServices());
    const srtPath = path.join(tmp, 'missing.srt');

    await expect(
      invoke(IPC_CHANNELS.TRANSLATE_SUBTITLES, { srtPath, targetLanguage: 'French' })
    ).resolves.toEqual({ success: false, error: 'File does not exist', details: srtPath, stage: 'translate' });
  });

  it('drops a byte-order mark when reading', async () => {
    registerSubtitleHandlers(fakeServices());
    const file = path.join(tmp, 'bom.srt');
    fs.writeFileSync(file, '\uFEFF1\n00:00:01,000 --> 00:00:02,000\nHi\n');

    await expect(invoke(IPC_CHANNELS.READ_TEXT_FILE, { path: file })).resolves.toEqual({
      success: true,
      content: '1\n00:00:01,000 --> 00:00:02,000\nHi\n',
    });
  });
});
