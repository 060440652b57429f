import {
  IPCErrorResponse,
  IPCResult,
  IPC_CHANNELS,
  TranslateSubtitlesRequest,
  TranslateSubtitlesResponse,
} from '../../types/ipc';
import { parseSubtitles } from '../services/srt';
import { translateAndExport } from '../services/pipeline';
import { readTextFile } from './fs-bridge';
import { HandlerContext, IPCHandler } from './handlers';
import { SubtitleServices, resolveLanguage } from './services';
import { jobFailure } from './transcription-handler';

async function loadSrt(req: TranslateSubtitlesRequest): Promise<string | IPCErrorResponse> {
  if (req.srtPath) {
    const content = await readTextFile(req.srtPath);
    return typeof content === 'string' ? content : { ...content, stage: 'translate' };
  }
  if (typeof req.srtContent === 'string') {
    return req.srtContent;
  }
  return { success: false, error: 'An srtPath or srtContent is required' };
}

/** translate-subtitles: parse an existing SRT, WebVTT or ASS file, translate every cue, export as SRT */
export function createTranslateSubtitlesHandler(
  services: SubtitleServices
): IPCHandler<typeof IPC_CHANNELS.TRANSLATE_SUBTITLES> {
  return async (
    context: HandlerContext,
    req: TranslateSubtitlesRequest
  ): Promise<IPCResult<TranslateSubtitlesResponse>> => {
    const { config } = services;
    const targetLanguage = resolveLanguage(req?.targetLanguage, config.targetLanguage, 'target language');
    if (!targetLanguage) {
      const err: IPCErrorResponse = { success: false, error: 'A target language is required', stage: 'translate' };
      return err;
    }
    const sourceLanguage = resolveLanguage(req.sourceLanguage, config.sourceLanguage, 'source language');

    const content = await loadSrt(req);
    if (typeof content !== 'string') {
      return content;
    }
    const cues = parseSubtitles(content);
    if (cues.length === 0) {
      const err: IPCErrorResponse = { success: false, error: 'No subtitles found in file', stage: 'translate' };
      return err;
    }
    console.log(`[TRANSLATE] Number of subtitle segments to translate: ${cues.length}`);

    const result = await translateAndExport(
      cues,
      { translator: services.createTranslator() },
      {
        targetLanguage,
        sourceLanguage,
        layout: req.layout,
        isAbandoned: () => context.isAbandoned(),
      }
    );
    if (result.status === 'failed') {
      return jobFailure(result);
    }

    const ok: TranslateSubtitlesResponse = { success: true, ...result };
    return ok;
  };
}
