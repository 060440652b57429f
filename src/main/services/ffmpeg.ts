/**
 * FFmpeg Service Module
 *
 * WHY THIS FILE EXISTS:
 * - Probes uploaded media with FFprobe (duration, audio stream, size)
 * - Extracts the audio track as mono 16kHz PCM WAV for the ASR backends
 * - Centralizes all FFmpeg-related operations and maps their failures to MediaDecodeError
 *
 * DEPENDENCIES:
 * - fluent-ffmpeg: High-level FFmpeg API for Node.js
 * - ffprobe-static: Pre-bundled FFprobe binary
 * - ffmpeg itself comes from FFMPEG_PATH or the system PATH
 *
 * Decode failures are deterministic, so nothing here retries.
 */

import ffmpeg from 'fluent-ffmpeg';
import { createRequire } from 'module';
import * as path from 'path';
import * as fs from 'fs';
import { MediaConfig } from '../../types/config';
import { AudioArtifact } from '../../types/subtitles';
import { MediaDecodeError, errorMessage } from '../errors';
import { withTimeout } from './retry';

export const SUPPORTED_CONTAINERS = ['mp4', 'mov', 'avi', 'mkv', 'flv', 'wmv', 'webm', 'm4v'] as const;

/** A RIFF/WAVE header with no samples */
const WAV_HEADER_BYTES = 44;

export type MediaInput =
  | { kind: 'path'; path: string }
  | { kind: 'buffer'; data: Buffer; filename: string };

export interface MediaInfo {
  durationSec: number;
  hasAudio: boolean;
  sizeBytes: number;
  formatName: string;
}

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  timeoutMs: number;
}

/** Stage 1 of the pipeline: video in, WAV out */
export interface MediaExtractor {
  extract(input: MediaInput): Promise<AudioArtifact>;
  cleanup(audio: AudioArtifact): Promise<void>;
}

const localRequire = createRequire(import.meta.url);

function safeRequire(id: string): unknown {
  try {
    return localRequire(id);
  } catch {
    return null;
  }
}

function bundledFfprobePath(): string | null {
  const mod = safeRequire('ffprobe-static');
  if (typeof mod === 'object' && mod !== null && 'path' in mod && typeof mod.path === 'string') {
    return fs.existsSync(mod.path) ? mod.path : null;
  }
  return null;
}

/**
 * Point fluent-ffmpeg at the configured binaries.
 *
 * ffmpeg: FFMPEG_PATH when set, otherwise fluent-ffmpeg's own lookup (PATH).
 * ffprobe: FFPROBE_PATH, then the ffprobe-static binary, then PATH.
 */
export function configureBinaries(media: Pick<MediaConfig, 'ffmpegPath' | 'ffprobePath'>): void {
  if (media.ffmpegPath) {
    ffmpeg.setFfmpegPath(media.ffmpegPath);
  }

  const ffprobePath = media.ffprobePath || bundledFfprobePath();
  if (ffprobePath) {
    // Packaging may drop the execute bit on the bundled binary
    if (process.platform !== 'win32' && !media.ffprobePath) {
      try {
        fs.chmodSync(ffprobePath, 0o755);
      } catch (chmodError) {
        console.warn('[FFMPEG] Could not set permissions (may already be set):', chmodError);
      }
    }
    ffmpeg.setFfprobePath(ffprobePath);
  }

  console.log('[FFMPEG] FFmpeg binary path:', media.ffmpegPath || '(system PATH)');
  console.log('[FFMPEG] FFprobe binary path:', ffprobePath || '(system PATH)');
}

export function containerOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

export function isSupportedContainer(filePath: string): boolean {
  const ext = containerOf(filePath);
  return SUPPORTED_CONTAINERS.some((c) => c === ext);
}

/**
 * Extract media info using FFprobe.
 *
 * Corrupted files and unknown formats make ffprobe fail; both become MediaDecodeError,
 * as does a probe that outlives `timeoutMs`. fluent-ffmpeg keeps no handle on the ffprobe
 * process, so a late reply after the timeout is ignored rather than the process killed.
 */
export function probeMedia(filePath: string, timeoutMs: number): Promise<MediaInfo> {
  const probe = new Promise<MediaInfo>((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, metadata) => {
      if (err) {
        console.error('[FFMPEG] Error extracting metadata:', err);
        reject(new MediaDecodeError(`Failed to read media: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      const info: MediaInfo = {
        durationSec: metadata.format.duration || 0,
        hasAudio: metadata.streams.some((stream) => stream.codec_type === 'audio'),
        sizeBytes: metadata.format.size || 0,
        formatName: metadata.format.format_name || 'unknown',
      };
      if (info.sizeBytes) {
        resolve(info);
        return;
      }
      fs.promises.stat(filePath).then(
        (stat) => resolve({ ...info, sizeBytes: stat.size }),
        (e: unknown) => reject(new MediaDecodeError(`Failed to read media: ${errorMessage(e)}`, { cause: e }))
      );
    });
  });

  return withTimeout(probe, timeoutMs, () => new MediaDecodeError(`Media probe timed out after ${timeoutMs}ms`));
}

/**
 * Extract audio track from a video into WAV (PCM s16le).
 * Defaults (mono, 16kHz) are what the transcription models expect.
 * fluent-ffmpeg kills the process when `timeoutMs` elapses and reports it as an error.
 */
export function extractAudioToWav(inputVideoPath: string, outputWavPath: string, format: AudioFormat): Promise<void> {
  return new Promise((resolve, reject) => {
    const outDir = path.dirname(outputWavPath);
    if (!fs.existsSync(outDir)) {
      fs.mkdirSync(outDir, { recursive: true });
    }

    ffmpeg(inputVideoPath, { timeout: Math.max(1, Math.ceil(format.timeoutMs / 1000)) })
      .noVideo()
      .audioChannels(format.channels)
      .audioFrequency(format.sampleRate)
      .audioCodec('pcm_s16le')
      .format('wav')
      .on('end', () => resolve())
      .on('error', (err: Error) => {
        console.error('[FFMPEG] Audio extraction failed:', err.message);
        reject(new MediaDecodeError(`Audio extraction failed: ${err.message}`, { cause: err }));
      })
      .save(outputWavPath);
  });
}

function generateJobId(): string {
  const timestamp = Date.now();
  const randomString = Math.random().toString(36).substring(2, 8);
  return `${timestamp}-${randomString}`;
}

async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * MediaExtractor backed by ffprobe + ffmpeg.
 *
 * Buffers are written into the work directory first; that copy is removed once the WAV
 * exists (or extraction failed). The WAV itself stays until `cleanup`.
 */
export class FfmpegMediaExtractor implements MediaExtractor {
  constructor(private readonly media: MediaConfig) {}

  async extract(input: MediaInput): Promise<AudioArtifact> {
    const displayName = input.kind === 'path' ? input.path : input.filename;
    if (!isSupportedContainer(displayName)) {
      throw new MediaDecodeError(
        `Unsupported container '${containerOf(displayName) || '(none)'}'. Supported: ${SUPPORTED_CONTAINERS.join(', ')}`
      );
    }

    await fs.promises.mkdir(this.media.workDir, { recursive: true });
    const jobId = generateJobId();

    let videoPath: string;
    let ownsVideo = false;
    if (input.kind === 'path') {
      if (!fs.existsSync(input.path) || !fs.statSync(input.path).isFile()) {
        throw new MediaDecodeError(`Video file not found: ${input.path}`);
      }
      videoPath = input.path;
    } else {
      if (input.data.length === 0) {
        throw new MediaDecodeError(`Uploaded file is empty: ${input.filename}`);
      }
      videoPath = path.join(this.media.workDir, `${jobId}-${path.basename(input.filename)}`);
      await fs.promises.writeFile(videoPath, input.data);
      ownsVideo = true;
      console.log(`[FFMPEG] Saved upload to: ${videoPath}`);
    }

    const wavPath = path.join(this.media.workDir, `${jobId}.wav`);
    try {
      const info = await probeMedia(videoPath, this.media.timeoutMs);
      if (!info.hasAudio) {
        throw new MediaDecodeError(`No audio stream found in ${path.basename(displayName)}`);
      }

      console.log(`[FFMPEG] Extracting audio (${info.formatName}, ${info.durationSec.toFixed(1)}s) to: ${wavPath}`);
      await extractAudioToWav(videoPath, wavPath, {
        sampleRate: this.media.sampleRate,
        channels: this.media.channels,
        timeoutMs: this.media.timeoutMs,
      });

      const stats = await fs.promises.stat(wavPath);
      return {
        path: wavPath,
        durationSec: info.durationSec,
        sizeBytes: stats.size,
      };
    } catch (e) {
      await removeFile(wavPath);
      throw e instanceof MediaDecodeError ? e : new MediaDecodeError(errorMessage(e), { cause: e });
    } finally {
      if (ownsVideo) {
        await removeFile(videoPath);
      }
    }
  }

  async cleanup(audio: AudioArtifact): Promise<void> {
    console.log(`[FFMPEG] Removing temporary audio file: ${audio.path}`);
    await removeFile(audio.path);
  }
}

/** True when the WAV carries no samples worth sending to an ASR backend */
export function isEmptyAudio(audio: AudioArtifact): boolean {
  return audio.durationSec <= 0 || audio.sizeBytes <= WAV_HEADER_BYTES;
}
