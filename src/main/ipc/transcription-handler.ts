import * as fs from 'fs';
import {
  GenerateSubtitlesProgressEvent,
  GenerateSubtitlesRequest,
  GenerateSubtitlesResponse,
  IPCErrorResponse,
  IPCResult,
  IPC_CHANNELS,
} from '../../types/ipc';
import { STAGE_LABELS } from '../errors';
import { MediaInput } from '../services/ffmpeg';
import { PipelineResult, runPipeline } from '../services/pipeline';
import { HandlerContext, IPCHandler } from './handlers';
import { SubtitleServices, resolveLanguage } from './services';

/** Turn a failed job into the error response the surface shows */
export function jobFailure(result: PipelineResult): IPCErrorResponse {
  const first = result.errors[0];
  if (!first) {
    return { success: false, error: 'Subtitle job failed' };
  }
  return {
    success: false,
    error: `${STAGE_LABELS[first.stage]} failed`,
    details: `${first.kind}: ${first.message}`,
    stage: first.stage,
  };
}

function toMediaInput(req: GenerateSubtitlesRequest): MediaInput | IPCErrorResponse {
  if (req.videoPath) {
    if (!fs.existsSync(req.videoPath)) {
      return { success: false, error: 'Invalid or missing videoPath', stage: 'extract' };
    }
    return { kind: 'path', path: req.videoPath };
  }
  if (req.video && Buffer.isBuffer(req.video.data) && req.video.filename) {
    return { kind: 'buffer', data: req.video.data, filename: req.video.filename };
  }
  return { success: false, error: 'A videoPath or an in-memory video is required', stage: 'extract' };
}

/**
 * generate-subtitles: one video through the whole pipeline.
 * Progress goes out on GENERATE_SUBTITLES_PROGRESS; a failed stage comes back as an error
 * response naming that stage.
 */
export function createGenerateSubtitlesHandler(services: SubtitleServices): IPCHandler<typeof IPC_CHANNELS.GENERATE_SUBTITLES> {
  return async (
    context: HandlerContext,
    req: GenerateSubtitlesRequest
  ): Promise<IPCResult<GenerateSubtitlesResponse>> => {
    const input = toMediaInput(req ?? {});
    if ('success' in input) {
      return input;
    }

    const { config } = services;
    const sourceLanguage = resolveLanguage(req.sourceLanguage, config.sourceLanguage, 'source language');
    const targetLanguage = resolveLanguage(req.targetLanguage, config.targetLanguage, 'target language');

    const sendProgress = (e: GenerateSubtitlesProgressEvent) => {
      context.send(IPC_CHANNELS.GENERATE_SUBTITLES_PROGRESS, e);
    };

    const result = await runPipeline(
      input,
      {
        extractor: services.extractor,
        transcriber: services.createTranscriber(),
        translator: targetLanguage ? services.createTranslator() : undefined,
      },
      {
        cuePolicy: config.cuePolicy,
        sourceLanguage,
        targetLanguage,
        layout: req.layout,
        isAbandoned: () => context.isAbandoned(),
        onProgress: sendProgress,
      }
    );

    if (result.status === 'failed') {
      const err = jobFailure(result);
      sendProgress({ phase: 'error', errorMessage: err.details ?? err.error });
      return err;
    }

    const ok: GenerateSubtitlesResponse = { success: true, ...result };
    return ok;
  };
}
