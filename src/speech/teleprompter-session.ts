// teleprompter-session.ts: follows a reader through a fixed script
// Recognizer events, restart timers and source start results all go through
// one serial queue; the progress cursor and retry state are only touched
// from there.

import { AsrError, classifyFailure, isRecoverable, type AsrErrorCode, type FailureClass } from '../asr/errors';
import { createLevelMeter } from '../asr/level-meter';
import { createRecoveryScheduler } from '../asr/recovery';
import type { TranscriptEvent, TranscriptSource } from '../asr/transcript-source';
import { normalizeConfig, type SessionConfig } from '../config/session-config';
import { createSerialQueue } from '../core/serial-queue';
import { systemTimers, type TimerApi } from '../core/timer-slot';
import { errorLog, infoLog, probeLog, warnLog } from '../env/logging';
import { createProgressTracker, type ReferenceScript } from './progress-tracker';

export interface TeleprompterStatus {
  isListening: boolean;
  isSpeaking: boolean;
  error: string | null;
  errorCode: AsrErrorCode | null;
  confirmedOffset: number;
  matchStartOffset: number;
  referenceLength: number;
  lastSpokenText: string;
  retryCount: number;
}

export type TeleprompterOptions = {
  source: TranscriptSource;
  config?: Partial<SessionConfig>;
  timers?: TimerApi;
};

export interface TeleprompterSession {
  start(referenceText: string): void;
  stop(): void;
  resume(): void;
  jumpTo(charOffset: number): void;
  getStatus(): TeleprompterStatus;
  getReference(): ReferenceScript | null;
  subscribe(listener: (status: TeleprompterStatus) => void): () => void;
}

type SessionEvent =
  | { kind: 'recognized'; generation: number; text: string; isFinal: boolean }
  | { kind: 'failure'; generation: number; failure: FailureClass; message?: string }
  | { kind: 'started'; generation: number }
  | { kind: 'restart' };

export function createTeleprompterSession(opts: TeleprompterOptions): TeleprompterSession {
  const config = normalizeConfig(opts.config);
  const source = opts.source;
  const tracker = createProgressTracker();
  const meter = createLevelMeter(config.teleprompterMeter);
  const listeners = new Set<(status: TeleprompterStatus) => void>();

  let shouldRun = false; // cleared by stop() and by fatal errors
  let isListening = false;
  let error: AsrError | null = null;
  let lastSpokenText = '';
  let generation = 0;
  let unsubscribe: (() => void) | null = null;
  let sourceRunning = false;

  const queue = createSerialQueue<SessionEvent>(handle, (err, event) => {
    errorLog('[teleprompter] event handler failed', { kind: event.kind, err });
  });

  const recovery = createRecoveryScheduler({
    maxRetries: config.maxRetries,
    timers: opts.timers ?? systemTimers,
    onRestart: () => queue.post({ kind: 'restart' }),
  });

  function getStatus(): TeleprompterStatus {
    const state = tracker.getState();
    return {
      isListening,
      isSpeaking: meter.isSpeaking(),
      error: error ? error.message : null,
      errorCode: error ? error.code : null,
      confirmedOffset: state.confirmedOffset,
      matchStartOffset: state.matchStartOffset,
      referenceLength: tracker.getReference()?.length ?? 0,
      lastSpokenText,
      retryCount: recovery.getState().retryCount,
    };
  }

  function notify() {
    const status = getStatus();
    for (const fn of listeners) {
      try {
        fn(status);
      } catch (err) {
        warnLog('[teleprompter] listener failed', err);
      }
    }
  }

  // Releases the recognizer; any event it still delivers is from a dead generation.
  function cleanupRecognition() {
    recovery.cancel();
    generation += 1;
    unsubscribe?.();
    unsubscribe = null;
    if (sourceRunning) {
      sourceRunning = false;
      source.stop().catch((err: unknown) => warnLog('[teleprompter] source stop failed', err));
    }
  }

  function beginRecognition() {
    if (!shouldRun) return;
    cleanupRecognition();
    const gen = generation;
    unsubscribe = source.onEvent((event: TranscriptEvent) => {
      if (event.kind === 'level') {
        meter.push(event.rms);
        return;
      }
      if (event.kind === 'failure') {
        queue.post({ kind: 'failure', generation: gen, failure: event.failure, message: event.message });
        return;
      }
      queue.post({ kind: 'recognized', generation: gen, text: event.text, isFinal: event.kind === 'final' });
    });
    sourceRunning = true;
    source.start({ locale: config.locale }).then(
      () => queue.post({ kind: 'started', generation: gen }),
      (err: unknown) => {
        const { failure, message } = classifyFailure(err);
        queue.post({ kind: 'failure', generation: gen, failure, message });
      },
    );
  }

  function failTerminal(code: AsrErrorCode, message?: string) {
    error = new AsrError(code, message);
    shouldRun = false;
    isListening = false;
    cleanupRecognition();
    errorLog('[teleprompter] stopped', { code, message: error.message });
  }

  function handleFailure(failure: FailureClass, message?: string) {
    if (!shouldRun) return; // error after an intentional stop: no retry
    if (!isRecoverable(failure)) {
      failTerminal(failure, message);
      return;
    }
    cleanupRecognition();
    const decision = recovery.noteFailure(failure);
    if (decision.kind === 'exhausted') {
      failTerminal('retries-exhausted');
    }
  }

  function handle(event: SessionEvent) {
    if (event.kind === 'restart') {
      // the new recognition transcribes from empty, so match from the confirmed position
      tracker.resume();
      beginRecognition();
      notify();
      return;
    }
    if (event.generation !== generation) return;
    switch (event.kind) {
      case 'started':
        isListening = true;
        infoLog('[teleprompter] listening', { locale: config.locale });
        break;
      case 'recognized': {
        recovery.noteSuccess();
        lastSpokenText = event.text;
        const update = tracker.onRecognized(event.text);
        probeLog('[teleprompter] match', { offset: update.confirmedOffset, char: update.charCount, word: update.wordCount });
        break;
      }
      case 'failure':
        handleFailure(event.failure, event.message);
        break;
    }
    notify();
  }

  function start(referenceText: string) {
    cleanupRecognition();
    tracker.start(referenceText);
    recovery.reset();
    meter.clear();
    error = null;
    lastSpokenText = '';
    isListening = false;
    shouldRun = true;
    beginRecognition();
    notify();
  }

  function stop() {
    shouldRun = false;
    isListening = false;
    cleanupRecognition();
    notify();
  }

  function resume() {
    if (!tracker.getReference()) return;
    recovery.reset();
    tracker.resume();
    error = null;
    shouldRun = true;
    beginRecognition();
    notify();
  }

  function jumpTo(charOffset: number) {
    tracker.jumpTo(charOffset);
    recovery.reset();
    if (shouldRun) {
      // fresh recognition so the old transcript cannot drag the cursor back
      cleanupRecognition();
      recovery.noteFailure('restart');
    }
    notify();
  }

  return {
    start,
    stop,
    resume,
    jumpTo,
    getStatus,
    getReference: () => tracker.getReference(),
    subscribe(listener) {
      listeners.add(listener);
      listener(getStatus());
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
