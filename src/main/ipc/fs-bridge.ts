import * as fs from 'fs';
import * as path from 'path';
import {
  ExportSubtitlesRequest,
  ExportSubtitlesResponse,
  IPCErrorResponse,
  IPCResult,
  ReadTextFileRequest,
  ReadTextFileResponse,
} from '../../types/ipc';
import { exportSrt } from '../services/srt';
import { srtToVtt } from '../../renderer/utils/captions';
import { HandlerContext } from './handlers';

/** Subtitle files are small; anything larger is almost certainly the wrong file */
export const MAX_TEXT_FILE_BYTES = 10 * 1024 * 1024;

/**
 * Check that `filePath` names a readable, reasonably sized file.
 * Returns the path on success so callers can chain on it.
 */
async function checkTextFile(filePath: unknown): Promise<string | IPCErrorResponse> {
  if (!filePath || typeof filePath !== 'string') {
    return { success: false, error: 'Invalid or missing path' };
  }
  if (!path.isAbsolute(filePath)) {
    return { success: false, error: 'Path must be absolute' };
  }

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(filePath);
  } catch {
    return { success: false, error: 'File does not exist', details: filePath };
  }
  if (!stat.isFile()) {
    return { success: false, error: 'Path is not a file', details: filePath };
  }
  if (stat.size > MAX_TEXT_FILE_BYTES) {
    return {
      success: false,
      error: 'File is too large',
      details: `${stat.size} bytes (limit ${MAX_TEXT_FILE_BYTES})`,
    };
  }
  return filePath;
}

/**
 * Read a checked text file with any leading byte-order mark dropped.
 * Returns the content, or the error response for the surface.
 */
export async function readTextFile(
  filePath: unknown,
  encoding: BufferEncoding = 'utf8'
): Promise<string | IPCErrorResponse> {
  const checked = await checkTextFile(filePath);
  if (typeof checked !== 'string') {
    return checked;
  }

  try {
    const data = await fs.promises.readFile(checked, { encoding });
    return data.replace(/^\uFEFF/, '');
  } catch (e) {
    const err: IPCErrorResponse = {
      success: false,
      error: 'Failed to read file',
      details: e instanceof Error ? e.message : String(e),
    };
    return err;
  }
}

/** read-text-file: load a subtitle file (or any text file) for editing or translation */
export async function handleReadTextFile(
  _context: HandlerContext,
  request: ReadTextFileRequest
): Promise<IPCResult<ReadTextFileResponse>> {
  const content = await readTextFile(request?.path, request?.encoding);
  if (typeof content !== 'string') {
    return content;
  }
  const ok: ReadTextFileResponse = { success: true, content };
  return ok;
}

/**
 * Write cues (possibly edited) to disk as SRT or WebVTT.
 * Blocks are renumbered on the way out, so deleted cues leave no gaps.
 */
export async function handleExportSubtitles(
  _context: HandlerContext,
  request: ExportSubtitlesRequest
): Promise<IPCResult<ExportSubtitlesResponse>> {
  if (!request || !Array.isArray(request.cues) || !request.outputPath) {
    const err: IPCErrorResponse = {
      success: false,
      error: 'Invalid request payload: cues and outputPath are required',
      stage: 'export',
    };
    return err;
  }

  const outputPath = path.resolve(request.outputPath);
  try {
    const srt = exportSrt(request.cues, request.layout ?? 'source');
    const content = request.format === 'vtt' ? srtToVtt(srt) : srt;
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, content, 'utf8');
    console.log(`[EXPORT] Wrote ${request.cues.length} cues to: ${outputPath}`);

    const ok: ExportSubtitlesResponse = { success: true, outputPath, cueCount: request.cues.length };
    return ok;
  } catch (e) {
    const err: IPCErrorResponse = {
      success: false,
      error: 'Failed to write subtitle file',
      details: e instanceof Error ? e.message : String(e),
      stage: 'export',
    };
    return err;
  }
}
