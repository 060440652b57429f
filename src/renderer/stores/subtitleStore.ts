import { createStore } from 'zustand/vanilla';
import { GenerateSubtitlesProgressEvent, IPCErrorResponse, SubtitleJobResponse } from '../../types/ipc';
import { SubtitleCue } from '../../types/subtitles';
import type { PipelineStatus, StageError } from '../../main/services/pipeline';
import type { TranslationFailure } from '../../main/services/translation';
import { renumberCues } from '../../main/services/subtitleBuilder';

export type SessionStatus = 'idle' | 'running' | PipelineStatus;

export type EditableTextField = 'sourceText' | 'translatedText';

export interface SubtitleSessionData {
  /** File name of the video or SRT this session works on */
  sourceName: string | null;
  cues: SubtitleCue[];
  status: SessionStatus;
  errors: StageError[];
  translationFailures: TranslationFailure[];
  /** Last user-visible failure message */
  errorMessage: string | null;
  progress: GenerateSubtitlesProgressEvent | null;
  searchTerm: string;
  /** Checked by the pipeline before each stage */
  abandoned: boolean;
}

export interface SubtitleSessionState extends SubtitleSessionData {
  startJob: (sourceName: string) => void;
  setProgress: (event: GenerateSubtitlesProgressEvent) => void;
  loadResult: (result: SubtitleJobResponse) => void;
  loadCues: (sourceName: string, cues: SubtitleCue[]) => void;
  failJob: (error: IPCErrorResponse) => void;
  abandon: () => void;
  updateCueText: (index: number, field: EditableTextField, text: string) => boolean;
  updateCueTiming: (index: number, startMs: number, endMs: number) => boolean;
  deleteCue: (index: number) => boolean;
  renumber: () => void;
  setSearchTerm: (term: string) => void;
  reset: () => void;
}

const initialState: SubtitleSessionData = {
  sourceName: null,
  cues: [],
  status: 'idle',
  errors: [],
  translationFailures: [],
  errorMessage: null,
  progress: null,
  searchTerm: '',
  abandoned: false,
};

/**
 * Session state for one video (or SRT file) at a time.
 *
 * Cues are replaced wholesale by a job result (or a loaded subtitle file) and edited in
 * place by the user afterwards. Edits address cues by their `index`, which stays put while
 * a batch of edits is applied; `renumber()` then closes the gaps and restores 1..n in
 * presentation order. Starting a new job or loading a file discards the previous session.
 */
export function createSubtitleStore() {
  return createStore<SubtitleSessionState>()((set, get) => ({
    ...initialState,

    startJob: (sourceName) => {
      set({ ...initialState, sourceName, status: 'running' });
    },

    setProgress: (event) => set({ progress: event }),

    loadResult: (result) => {
      set({
        cues: result.cues,
        status: result.status,
        errors: result.errors,
        translationFailures: result.translationFailures,
        errorMessage: null,
      });
    },

    loadCues: (sourceName, cues) => {
      set({ ...initialState, sourceName, cues, status: 'complete' });
    },

    failJob: (error) => {
      set({
        status: 'failed',
        errorMessage: error.details ? `${error.error}: ${error.details}` : error.error,
      });
    },

    abandon: () => set({ abandoned: true }),

    updateCueText: (index, field, text) => {
      if (!get().cues.some((cue) => cue.index === index)) return false;
      set((state) => ({
        cues: state.cues.map((cue) => {
          if (cue.index !== index) return cue;
          return field === 'sourceText' ? { ...cue, sourceText: text } : { ...cue, translatedText: text };
        }),
      }));
      return true;
    },

    updateCueTiming: (index, startMs, endMs) => {
      const valid = Number.isInteger(startMs) && Number.isInteger(endMs) && startMs >= 0 && startMs < endMs;
      if (!valid || !get().cues.some((cue) => cue.index === index)) {
        console.warn(`[SUBTITLE STORE] Rejected timing edit for cue ${index}: ${startMs} -> ${endMs}`);
        return false;
      }
      set((state) => ({
        // Stable sort keeps the order of cues that share a start time
        cues: state.cues
          .map((cue) => (cue.index === index ? { ...cue, startMs, endMs } : cue))
          .sort((a, b) => a.startMs - b.startMs),
      }));
      return true;
    },

    deleteCue: (index) => {
      const before = get().cues.length;
      set((state) => ({ cues: state.cues.filter((cue) => cue.index !== index) }));
      return get().cues.length < before;
    },

    renumber: () => set((state) => ({ cues: renumberCues(state.cues) })),

    setSearchTerm: (term) => set({ searchTerm: term }),

    reset: () => set({ ...initialState }),
  }));
}

export type SubtitleStore = ReturnType<typeof createSubtitleStore>;
