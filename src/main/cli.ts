import * as path from 'path';
import { parseArgs } from 'util';
import { JobConfig, LANGUAGE_NAMES } from '../types/config';
import { IPC_CHANNELS, IPCErrorResponse, isIPCError } from '../types/ipc';
import { SubtitleLayout } from '../types/subtitles';
import { ConfigOverrides, loadConfig } from './config';
import { ConfigError } from './errors';
import { parseSrtTimestamp, parseSubtitles } from './services/srt';
import { HandlerContext, invoke } from './ipc/handlers';
import { registerSubtitleHandlers } from './ipc';
import { createSubtitleServices } from './ipc/services';
import { createSubtitleStore, EditableTextField, SubtitleStore } from '../renderer/stores/subtitleStore';
import { exportFileName } from '../renderer/utils/captions';
import { buildPreviewRows, computeStats, renderPreviewTable, renderStats } from '../renderer/utils/preview';

export const USAGE = `Usage:
  subtitle-assistant transcribe <video> [options]   Recognize speech and write subtitles
  subtitle-assistant translate <file> [options]     Translate an existing SRT, VTT or ASS file
  subtitle-assistant edit <file> [options]          Edit an existing subtitle file
  subtitle-assistant languages                      List target languages

Options:
  --target <language>     Translate into this language
  --source <language>     Spoken/source language hint
  --out <path>            Output file (default: next to the input)
  --format <srt|vtt>      Output format (default: srt)
  --layout <source|translated|bilingual>
  --search <keyword>      Only show matching cues in the preview
  --asr <openai|gemini>   ASR backend
  --translator <openai|gemini>
  -h, --help

Edits (repeatable, applied before export; <n> is the cue number shown in the preview):
  --text <n>=<text>           Replace the source text of cue n
  --translation <n>=<text>    Replace the translated text of cue n
  --time <n>=<start>-<end>    Retime cue n, e.g. 2=00:00:05,000-00:00:07,500
  --delete <n>                Remove cue n`;

export type CueEdit =
  | { kind: 'text'; index: number; field: EditableTextField; text: string }
  | { kind: 'timing'; index: number; startMs: number; endMs: number }
  | { kind: 'delete'; index: number };

export interface CliCommand {
  command: 'transcribe' | 'translate' | 'edit';
  input: string;
  out?: string;
  format: 'srt' | 'vtt';
  layout?: SubtitleLayout;
  search: string;
  overrides: ConfigOverrides;
  edits: CueEdit[];
}

export type ParsedCli = CliCommand | { command: 'languages' } | { command: 'help' } | { command: 'error'; message: string };

const LAYOUTS: SubtitleLayout[] = ['source', 'translated', 'bilingual'];

function isLayout(value: string): value is SubtitleLayout {
  return LAYOUTS.some((layout) => layout === value);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      target: { type: 'string' },
      source: { type: 'string' },
      out: { type: 'string' },
      format: { type: 'string' },
      layout: { type: 'string' },
      search: { type: 'string' },
      asr: { type: 'string' },
      translator: { type: 'string' },
      text: { type: 'string', multiple: true },
      translation: { type: 'string', multiple: true },
      time: { type: 'string', multiple: true },
      delete: { type: 'string', multiple: true },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

type EditValues = Pick<ReturnType<typeof readArgs>['values'], 'text' | 'translation' | 'time' | 'delete'>;

function cueNumber(raw: string): number | null {
  return /^\d+$/.test(raw) && Number(raw) > 0 ? Number(raw) : null;
}

/** `<n>=<value>` with n a cue number */
function splitAssignment(raw: string): { index: number; value: string } | null {
  const eq = raw.indexOf('=');
  const index = eq > 0 ? cueNumber(raw.slice(0, eq)) : null;
  return index === null ? null : { index, value: raw.slice(eq + 1) };
}

/**
 * Edits in the order they are applied: text, then timing, then deletions, so every flag
 * addresses cues by the numbers shown before editing.
 */
function parseEdits(values: EditValues): CueEdit[] | string {
  const edits: CueEdit[] = [];
  const textFlags: Array<[string[] | undefined, EditableTextField, string]> = [
    [values.text, 'sourceText', '--text'],
    [values.translation, 'translatedText', '--translation'],
  ];
  for (const [raws, field, flag] of textFlags) {
    for (const raw of raws ?? []) {
      const assignment = splitAssignment(raw);
      if (!assignment) return `${flag} expects <n>=<text>, got '${raw}'`;
      edits.push({ kind: 'text', index: assignment.index, field, text: assignment.value });
    }
  }

  for (const raw of values.time ?? []) {
    const assignment = splitAssignment(raw);
    const range = assignment?.value.match(/^(.+?)\s*(?:-->|-)\s*(.+)$/);
    const startMs = range ? parseSrtTimestamp(range[1]) : null;
    const endMs = range ? parseSrtTimestamp(range[2]) : null;
    if (!assignment || startMs === null || endMs === null) {
      return `--time expects <n>=<start>-<end>, got '${raw}'`;
    }
    if (startMs >= endMs) return `--time ${assignment.index}: the start must come before the end`;
    edits.push({ kind: 'timing', index: assignment.index, startMs, endMs });
  }

  for (const raw of values.delete ?? []) {
    const index = cueNumber(raw);
    if (index === null) return `--delete expects a cue number, got '${raw}'`;
    edits.push({ kind: 'delete', index });
  }
  return edits;
}

export function parseCliArgs(argv: string[]): ParsedCli {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (e) {
    return { command: 'error', message: e instanceof Error ? e.message : String(e) };
  }

  const { values, positionals } = parsed;
  const [command, input] = positionals;
  if (values.help || command === undefined) return { command: 'help' };
  if (command === 'languages') return { command: 'languages' };
  if (command !== 'transcribe' && command !== 'translate' && command !== 'edit') {
    return { command: 'error', message: `Unknown command '${command}'` };
  }
  if (!input) {
    return { command: 'error', message: `'${command}' needs an input file` };
  }

  const format = values.format ?? 'srt';
  if (format !== 'srt' && format !== 'vtt') {
    return { command: 'error', message: `--format must be srt or vtt, got '${format}'` };
  }
  if (values.layout !== undefined && !isLayout(values.layout)) {
    return { command: 'error', message: `--layout must be one of ${LAYOUTS.join(', ')}` };
  }
  const edits = parseEdits(values);
  if (typeof edits === 'string') {
    return { command: 'error', message: edits };
  }
  return {
    command,
    input: path.resolve(input),
    out: values.out,
    format,
    layout: values.layout,
    search: values.search ?? '',
    overrides: {
      targetLanguage: values.target,
      sourceLanguage: values.source,
      asrBackend: values.asr,
      translationBackend: values.translator,
    },
    edits,
  };
}

/**
 * Default output path: beside the input, `_edited` for the edit command and `_translated`
 * when the text is translated.
 */
export function defaultOutputPath(cmd: CliCommand, translated: boolean): string {
  const suffix = cmd.command === 'edit' ? 'edited' : translated ? 'translated' : undefined;
  return path.join(path.dirname(cmd.input), exportFileName(path.basename(cmd.input), cmd.format, suffix));
}

/**
 * Apply edits through the store, then renumber. Returns a message for each edit that named
 * a cue which does not exist.
 */
export function applyEdits(store: SubtitleStore, edits: CueEdit[]): string[] {
  if (edits.length === 0) return [];
  const { updateCueText, updateCueTiming, deleteCue, renumber } = store.getState();
  const rejected: string[] = [];
  for (const edit of edits) {
    const applied =
      edit.kind === 'delete'
        ? deleteCue(edit.index)
        : edit.kind === 'timing'
          ? updateCueTiming(edit.index, edit.startMs, edit.endMs)
          : updateCueText(edit.index, edit.field, edit.text);
    if (!applied) rejected.push(`No cue ${edit.index} to ${edit.kind === 'delete' ? 'delete' : 'edit'}`);
  }
  renumber();
  return rejected;
}

function report(error: IPCErrorResponse): void {
  console.error(`[CLI] ${error.error}${error.details ? `: ${error.details}` : ''}`);
}

function printResult(store: SubtitleStore): void {
  const state = store.getState();
  console.log('');
  console.log(renderPreviewTable(buildPreviewRows(state.cues, state.searchTerm)));
  console.log('');
  console.log(renderStats(computeStats(state.cues)));
  for (const failure of state.translationFailures) {
    console.warn(
      `[CLI] Cues ${failure.cueIndices[0]}-${failure.cueIndices[failure.cueIndices.length - 1]} left untranslated: ${failure.error.message}`
    );
  }
}

/** Load an existing subtitle file into the store; returns an exit code on failure */
async function loadSubtitleFile(filePath: string, store: SubtitleStore): Promise<number | null> {
  const read = await invoke(IPC_CHANNELS.READ_TEXT_FILE, { path: filePath });
  if (isIPCError(read)) {
    report(read);
    return 1;
  }
  const cues = parseSubtitles(read.content);
  if (cues.length === 0) {
    console.error(`[CLI] No subtitles found in ${path.basename(filePath)}`);
    return 1;
  }
  store.getState().loadCues(path.basename(filePath), cues);
  return null;
}

/** Run a transcribe or translate job into the store; returns an exit code on failure */
async function runJob(cmd: CliCommand, store: SubtitleStore, context: HandlerContext): Promise<number | null> {
  const result =
    cmd.command === 'transcribe'
      ? await invoke(
          IPC_CHANNELS.GENERATE_SUBTITLES,
          { videoPath: cmd.input, targetLanguage: cmd.overrides.targetLanguage, layout: cmd.layout },
          context
        )
      : await invoke(
          IPC_CHANNELS.TRANSLATE_SUBTITLES,
          { srtPath: cmd.input, targetLanguage: cmd.overrides.targetLanguage ?? '', layout: cmd.layout },
          context
        );

  if (isIPCError(result)) {
    store.getState().failJob(result);
    report(result);
    return 1;
  }
  store.getState().loadResult(result);
  return null;
}

/**
 * Run one command. Returns the process exit code: 0 done (possibly degraded), 1 job
 * failed, 2 usage or configuration error, 130 abandoned. Edits that name a missing cue are
 * reported and skipped.
 */
export async function runCli(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const cmd = parseCliArgs(argv);
  if (cmd.command === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (cmd.command === 'languages') {
    console.log(LANGUAGE_NAMES.join('\n'));
    return 0;
  }
  if (cmd.command === 'error') {
    console.error(`[CLI] ${cmd.message}\n\n${USAGE}`);
    return 2;
  }

  let config: JobConfig;
  try {
    config = loadConfig(env, cmd.overrides);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[CLI] ${e.message}`);
      return 2;
    }
    throw e;
  }

  registerSubtitleHandlers(createSubtitleServices(config));
  const store = createSubtitleStore();
  store.getState().startJob(path.basename(cmd.input));

  const onSigint = () => {
    console.warn('[CLI] Abandoning job after the current stage...');
    store.getState().abandon();
  };
  process.once('SIGINT', onSigint);

  const context: HandlerContext = {
    send(_channel, payload) {
      store.getState().setProgress(payload);
      if (payload.message) console.log(`[CLI] ${payload.progress ?? 0}% ${payload.message}`);
    },
    isAbandoned: () => store.getState().abandoned,
  };

  try {
    const failed = cmd.command === 'edit' ? await loadSubtitleFile(cmd.input, store) : await runJob(cmd, store, context);
    if (failed !== null) {
      return failed;
    }
    store.getState().setSearchTerm(cmd.search);
    if (store.getState().status === 'abandoned') {
      printResult(store);
      return 130;
    }

    for (const message of applyEdits(store, cmd.edits)) {
      console.warn(`[CLI] ${message}`);
    }
    printResult(store);

    const { cues, status } = store.getState();
    const translated = cues.some((cue) => cue.translatedText !== null);
    const layout = cmd.layout ?? (translated ? 'translated' : 'source');
    const exported = await invoke(IPC_CHANNELS.EXPORT_SUBTITLES, {
      cues,
      outputPath: cmd.out ?? defaultOutputPath(cmd, layout !== 'source'),
      format: cmd.format,
      layout,
    });
    if (isIPCError(exported)) {
      report(exported);
      return 1;
    }

    console.log(`[CLI] ${status === 'degraded' ? 'Saved (partially translated)' : 'Saved'}: ${exported.outputPath}`);
    return 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
