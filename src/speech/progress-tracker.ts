// progress-tracker.ts: merges the char and word aligners into one cursor
// confirmedOffset only moves forward within a session; jumpTo() is the single
// sanctioned way back.

import { collapseWhitespace, normalize } from '../logic/normalize';
import { alignCharacters } from './char-aligner';
import { alignWords } from './word-aligner';

export interface ReferenceScript {
  readonly original: string; // whitespace-collapsed script as displayed
  readonly normalized: string;
  readonly length: number; // code points of `original`
}

export interface AlignmentState {
  matchStartOffset: number;
  confirmedOffset: number;
}

export type ProgressUpdate = {
  confirmedOffset: number;
  advanced: boolean;
  charCount: number;
  wordCount: number;
};

export interface ProgressTracker {
  start(referenceText: string): ReferenceScript;
  onRecognized(spokenText: string): ProgressUpdate;
  jumpTo(offset: number): number;
  resume(): void;
  reset(): void;
  getState(): Readonly<AlignmentState>;
  getReference(): ReferenceScript | null;
}

export function createReferenceScript(text: string): ReferenceScript {
  const original = collapseWhitespace(text);
  return Object.freeze({
    original,
    normalized: normalize(original),
    length: Array.from(original).length,
  });
}

export function createProgressTracker(): ProgressTracker {
  let reference: ReferenceScript | null = null;
  let chars: string[] = [];
  const state: AlignmentState = { matchStartOffset: 0, confirmedOffset: 0 };

  function clampOffset(offset: number): number {
    const max = reference ? reference.length : 0;
    if (!Number.isFinite(offset)) return 0;
    return Math.max(0, Math.min(max, Math.floor(offset)));
  }

  function start(referenceText: string): ReferenceScript {
    reference = createReferenceScript(referenceText);
    chars = Array.from(reference.original);
    state.matchStartOffset = 0;
    state.confirmedOffset = 0;
    return reference;
  }

  function onRecognized(spokenText: string): ProgressUpdate {
    if (!reference || !spokenText) {
      return { confirmedOffset: state.confirmedOffset, advanced: false, charCount: 0, wordCount: 0 };
    }
    const window = chars.slice(state.matchStartOffset).join('');
    const charCount = alignCharacters(window, spokenText);
    const wordCount = alignWords(window, spokenText);
    const candidate = clampOffset(state.matchStartOffset + Math.max(charCount, wordCount));
    const advanced = candidate > state.confirmedOffset;
    if (advanced) state.confirmedOffset = candidate;
    return { confirmedOffset: state.confirmedOffset, advanced, charCount, wordCount };
  }

  function jumpTo(offset: number): number {
    const next = clampOffset(offset);
    state.matchStartOffset = next;
    state.confirmedOffset = next;
    return next;
  }

  // A fresh recognition session transcribes from scratch, so matching restarts
  // at the reader's current position.
  function resume() {
    state.matchStartOffset = state.confirmedOffset;
  }

  function reset() {
    reference = null;
    chars = [];
    state.matchStartOffset = 0;
    state.confirmedOffset = 0;
  }

  return {
    start,
    onRecognized,
    jumpTo,
    resume,
    reset,
    getState: () => ({ ...state }),
    getReference: () => reference,
  };
}
