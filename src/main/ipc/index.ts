import { IPC_CHANNELS } from '../../types/ipc';
import { handleExportSubtitles, handleReadTextFile } from './fs-bridge';
import { registerHandler } from './handlers';
import { SubtitleServices } from './services';
import { createGenerateSubtitlesHandler } from './transcription-handler';
import { createTranslateSubtitlesHandler } from './translation-handler';

/** Register every channel the surface uses */
export function registerSubtitleHandlers(services: SubtitleServices): void {
  registerHandler(IPC_CHANNELS.GENERATE_SUBTITLES, createGenerateSubtitlesHandler(services));
  registerHandler(IPC_CHANNELS.TRANSLATE_SUBTITLES, createTranslateSubtitlesHandler(services));
  registerHandler(IPC_CHANNELS.EXPORT_SUBTITLES, handleExportSubtitles);
  registerHandler(IPC_CHANNELS.READ_TEXT_FILE, handleReadTextFile);
}
