// Recognizer capability seen by the sessions. Anything that can produce
// partial/final transcripts (a cloud stream, a local model, a test script)
// sits behind this interface.

import type { FailureClass } from './errors';

export type PartialEvent = { kind: 'partial'; text: string };
export type FinalEvent = { kind: 'final'; text: string };
export type FailureEvent = { kind: 'failure'; failure: FailureClass; message?: string };
// RMS of one audio buffer, 0..1 before gain
export type LevelEvent = { kind: 'level'; rms: number };

export type TranscriptEvent = PartialEvent | FinalEvent | FailureEvent | LevelEvent;

export type SourceStatus = {
  kind: string;
  ready: boolean;
  error?: string;
};

export type RecognitionOptions = {
  locale: string;
};

export interface TranscriptSource {
  /** Begins a fresh recognition session; transcripts restart from empty. */
  start(options: RecognitionOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(listener: (event: TranscriptEvent) => void): () => void; // subscribe/unsub
  status(): SourceStatus;
}
