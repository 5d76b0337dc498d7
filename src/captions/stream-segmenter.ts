// stream-segmenter.ts: turns revisable partial transcripts into committed chunks
//
// Per transcript: the trailing 0-2 words are too likely to be rewritten and are
// held back; the rest is appended once to the pending buffer. A change inside
// the already-appended span means the recognizer rewrote history, so the stale
// buffer is dropped instead of being extended. Commits fire on a final result,
// buffer size, terminal punctuation, elapsed time, silence, or stop.

import { collapseWhitespace, normalize } from '../logic/normalize';
import { splitWords } from '../logic/tokens';

export const TERMINAL_PUNCTUATION = '.!?;:';
export const SHORT_FLUSH_MS = 1500; // >= 2 buffered words
export const LONG_FLUSH_MS = 3000; // >= 1 buffered word

export type SegmentCommit = {
  sequence: number;
  sourceText: string;
  createdAt: number;
  reason: CommitReason;
};

export type CommitReason = 'final' | 'size' | 'punctuation' | 'elapsed' | 'silence' | 'stop';

export interface SegmenterState {
  pending: string[]; // PendingWordBuffer
  committedPrefix: string[]; // words of the current utterance already committed
  stableCount: number; // words appended to `pending` past the committed prefix
  lastSnapshot: string[];
  lastTranscript: string;
  lastCommittedText: string;
  lastCommitAt: number;
  nextSequence: number;
}

export type SegmenterStep = {
  transcript: string;
  commits: SegmentCommit[];
  backtracked: boolean;
  stableWords: number;
};

export type SegmenterOptions = {
  targetWordCount: number;
};

export interface StreamSegmenter {
  push(text: string, isFinal: boolean, now: number): SegmenterStep;
  onSilence(transcript: string, now: number): SegmentCommit[];
  flush(now: number): SegmentCommit[];
  reset(now: number, opts?: { keepSequence?: boolean }): void;
  getState(): Readonly<SegmenterState>;
}

export function unstableTailCount(wordCount: number, isFinal: boolean): number {
  if (isFinal) return 0;
  if (wordCount >= 6) return 2;
  if (wordCount >= 3) return 1;
  return 0;
}

export function endsWithTerminalPunctuation(word: string | undefined): boolean {
  if (!word) return false;
  return TERMINAL_PUNCTUATION.includes(word.charAt(word.length - 1));
}

function sameWords(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// Committed words are compared loosely so a re-punctuated prefix
// ("hello world" -> "Hello, world") is still the same utterance.
function startsWithLoose(words: string[], prefix: string[]): boolean {
  if (words.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (normalize(words[i]) !== normalize(prefix[i])) return false;
  }
  return true;
}

export function createInitialState(now: number): SegmenterState {
  return {
    pending: [],
    committedPrefix: [],
    stableCount: 0,
    lastSnapshot: [],
    lastTranscript: '',
    lastCommittedText: '',
    lastCommitAt: now,
    nextSequence: 0,
  };
}

export function createStreamSegmenter(opts: SegmenterOptions, now = Date.now()): StreamSegmenter {
  const targetWords = Math.max(2, Math.floor(opts.targetWordCount));
  let state = createInitialState(now);

  function commitWords(words: string[], reason: CommitReason, at: number): SegmentCommit[] {
    const sourceText = collapseWhitespace(words.join(' '));
    if (!sourceText) return [];
    if (sourceText === state.lastCommittedText) return [];
    const commit: SegmentCommit = { sequence: state.nextSequence, sourceText, createdAt: at, reason };
    state.nextSequence += 1;
    state.lastCommittedText = sourceText;
    state.lastCommitAt = at;
    return [commit];
  }

  function bufferTrigger(at: number): CommitReason | null {
    const pending = state.pending;
    if (!pending.length) return null;
    const elapsed = at - state.lastCommitAt;
    if (pending.length >= targetWords) return 'size';
    if (endsWithTerminalPunctuation(pending[pending.length - 1])) return 'punctuation';
    if (pending.length >= 2 && elapsed >= SHORT_FLUSH_MS) return 'elapsed';
    if (pending.length >= 1 && elapsed >= LONG_FLUSH_MS) return 'elapsed';
    return null;
  }

  function startNewUtterance() {
    state.pending = [];
    state.committedPrefix = [];
    state.stableCount = 0;
    state.lastSnapshot = [];
  }

  // Commits everything of the latest transcript not committed yet, unstable tail included.
  function commitRemainder(reason: CommitReason, at: number): SegmentCommit[] {
    const remainder = state.lastSnapshot.slice(state.committedPrefix.length);
    const commits = commitWords(remainder, reason, at);
    state.committedPrefix = [...state.lastSnapshot];
    state.pending = [];
    state.stableCount = 0;
    return commits;
  }

  function push(text: string, isFinal: boolean, at: number): SegmenterStep {
    const transcript = collapseWhitespace(text);
    const words = splitWords(transcript);
    if (!words.length) {
      return { transcript, commits: [], backtracked: false, stableWords: 0 };
    }

    if (state.committedPrefix.length && !startsWithLoose(words, state.committedPrefix)) {
      startNewUtterance();
    }
    const base = state.committedPrefix.length;

    let backtracked = false;
    if (state.lastSnapshot.length && state.stableCount > 0) {
      const appendedEnd = base + state.stableCount;
      const compareCount = Math.min(state.stableCount, words.length - base, state.lastSnapshot.length - base);
      const shrunk = words.length < appendedEnd;
      const rewritten = compareCount > 0
        && !sameWords(words.slice(base, base + compareCount), state.lastSnapshot.slice(base, base + compareCount));
      if (shrunk || rewritten) {
        state.pending = [];
        state.stableCount = 0;
        backtracked = true;
      }
    }

    const stableEnd = Math.max(words.length - unstableTailCount(words.length, isFinal), 0);
    const appendedEnd = base + state.stableCount;
    if (stableEnd > appendedEnd) {
      state.pending.push(...words.slice(appendedEnd, stableEnd));
      state.stableCount = stableEnd - base;
    }

    state.lastSnapshot = words;
    state.lastTranscript = transcript;

    let commits: SegmentCommit[] = [];
    if (isFinal) {
      commits = commitRemainder('final', at);
      startNewUtterance();
    } else {
      const reason = bufferTrigger(at);
      if (reason) {
        commits = commitWords(state.pending, reason, at);
        state.committedPrefix = words.slice(0, base + state.stableCount);
        state.pending = [];
        state.stableCount = 0;
      }
    }

    return { transcript, commits, backtracked, stableWords: stableEnd };
  }

  function onSilence(transcript: string, at: number): SegmentCommit[] {
    const current = collapseWhitespace(transcript);
    if (!current || current !== state.lastTranscript) return [];
    if (state.lastSnapshot.length <= state.committedPrefix.length) return [];
    return commitRemainder('silence', at);
  }

  function flush(at: number): SegmentCommit[] {
    if (state.lastSnapshot.length <= state.committedPrefix.length) return [];
    const commits = commitRemainder('stop', at);
    startNewUtterance();
    return commits;
  }

  function reset(at: number, resetOpts?: { keepSequence?: boolean }) {
    const nextSequence = resetOpts?.keepSequence ? state.nextSequence : 0;
    const lastCommittedText = resetOpts?.keepSequence ? state.lastCommittedText : '';
    state = { ...createInitialState(at), nextSequence, lastCommittedText };
  }

  return {
    push,
    onSilence,
    flush,
    reset,
    getState: () => ({
      ...state,
      pending: [...state.pending],
      committedPrefix: [...state.committedPrefix],
      lastSnapshot: [...state.lastSnapshot],
    }),
  };
}
