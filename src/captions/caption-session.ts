// caption-session.ts: live captions from a revisable transcript stream
// partial/final -> StreamSegmenter -> CaptionStore -> sinks, with translation
// filled in afterwards. Nothing downstream of the segmenter can hold it up.

import { AsrError, classifyFailure, isRecoverable, type AsrErrorCode, type FailureClass } from '../asr/errors';
import { createLevelMeter } from '../asr/level-meter';
import { createRecoveryScheduler } from '../asr/recovery';
import type { TranscriptEvent, TranscriptSource } from '../asr/transcript-source';
import { normalizeConfig, type SessionConfig } from '../config/session-config';
import { createSerialQueue } from '../core/serial-queue';
import { createTimerSlot, systemTimers, type TimerApi } from '../core/timer-slot';
import { debugLog, errorLog, infoLog, warnLog } from '../env/logging';
import type { CaptionSink } from '../sinks/caption-sink';
import { createTextFileSink } from '../sinks/text-file-sink';
import { createCaptionTranslator, type Translator } from '../translate/translator';
import { createCaptionStore, joinTranslated, type CaptionSegment } from './caption-store';
import { resolveSourceLanguage } from './language';
import { createStreamSegmenter, type SegmentCommit } from './stream-segmenter';

export interface CaptionStatus {
  isListening: boolean;
  isSpeaking: boolean;
  error: string | null;
  errorCode: AsrErrorCode | null;
  transcript: string; // latest partial, uncommitted
  outputText: string; // what the sinks were last given
  segmentCount: number;
  retryCount: number;
  levels: number[];
}

export type CaptionSessionOptions = {
  source: TranscriptSource;
  translator?: Translator;
  sinks?: CaptionSink[];
  config?: Partial<SessionConfig>;
  timers?: TimerApi;
  now?: () => number;
};

export interface CaptionSession {
  startListening(): void;
  stopListening(): void;
  clearOutput(): void;
  getStatus(): CaptionStatus;
  getSegments(): CaptionSegment[];
  subscribe(listener: (status: CaptionStatus) => void): () => void;
}

type CaptionEvent =
  | { kind: 'transcript'; generation: number; text: string; isFinal: boolean }
  | { kind: 'failure'; generation: number; failure: FailureClass; message?: string }
  | { kind: 'started'; generation: number }
  | { kind: 'silence'; generation: number; transcript: string }
  | { kind: 'translated'; epoch: number; sequence: number; text: string }
  | { kind: 'restart' };

export function createCaptionSession(opts: CaptionSessionOptions): CaptionSession {
  const config = normalizeConfig(opts.config);
  const source = opts.source;
  const timers = opts.timers ?? systemTimers;
  const now = opts.now ?? Date.now;
  const translator = opts.translator ?? createCaptionTranslator({ timeoutMs: config.translationTimeoutMs, timers });
  const sinks: CaptionSink[] = opts.sinks ?? (config.outputPath ? [createTextFileSink(config.outputPath)] : []);

  const segmenter = createStreamSegmenter({ targetWordCount: config.streamingBufferWordCount }, now());
  const store = createCaptionStore({
    maxVisibleLines: config.maxVisibleLines,
    limit: config.storeLimit,
    keep: config.storeKeep,
  });
  const meter = createLevelMeter(config.captionMeter);
  const silence = createTimerSlot(timers);
  const listeners = new Set<(status: CaptionStatus) => void>();

  let shouldRun = false;
  let isListening = false;
  let error: AsrError | null = null;
  let transcript = '';
  let outputText = '';
  let generation = 0;
  let epoch = 0; // bumped by clearOutput; late translations from before are dropped
  let unsubscribe: (() => void) | null = null;
  let sourceRunning = false;

  const queue = createSerialQueue<CaptionEvent>(handle, (err, event) => {
    errorLog('[captions] event handler failed', { kind: event.kind, err });
  });

  const recovery = createRecoveryScheduler({
    maxRetries: config.maxRetries,
    timers,
    onRestart: () => queue.post({ kind: 'restart' }),
  });

  function getStatus(): CaptionStatus {
    return {
      isListening,
      isSpeaking: meter.isSpeaking(),
      error: error ? error.message : null,
      errorCode: error ? error.code : null,
      transcript,
      outputText,
      segmentCount: store.size(),
      retryCount: recovery.getState().retryCount,
      levels: meter.levels(),
    };
  }

  function notify() {
    const status = getStatus();
    for (const fn of listeners) {
      try {
        fn(status);
      } catch (err) {
        warnLog('[captions] listener failed', err);
      }
    }
  }

  function publishVisible() {
    const visible = store.visible();
    outputText = joinTranslated(visible);
    for (const sink of sinks) {
      Promise.resolve()
        .then(() => sink.publish(visible))
        .catch((err: unknown) => warnLog('[captions] sink publish failed', err));
    }
  }

  function clearSinks() {
    outputText = '';
    for (const sink of sinks) {
      Promise.resolve()
        .then(() => sink.clear())
        .catch((err: unknown) => warnLog('[captions] sink clear failed', err));
    }
  }

  function requestTranslation(segment: CaptionSegment) {
    const requestEpoch = epoch;
    const sourceLanguage = segment.sourceLanguage ?? undefined;
    translator.translate(segment.sourceText, sourceLanguage, config.targetLanguage).then(
      (text) => queue.post({ kind: 'translated', epoch: requestEpoch, sequence: segment.sequence, text: text || segment.sourceText }),
      (err: unknown) => {
        warnLog('[captions] translation failed', { sequence: segment.sequence, err });
        queue.post({ kind: 'translated', epoch: requestEpoch, sequence: segment.sequence, text: segment.sourceText });
      },
    );
  }

  function applyCommits(commits: SegmentCommit[]) {
    if (!commits.length) return;
    const added: CaptionSegment[] = [];
    for (const commit of commits) {
      const segment: CaptionSegment = {
        sequence: commit.sequence,
        sourceText: commit.sourceText,
        translatedText: null,
        sourceLanguage: resolveSourceLanguage(commit.sourceText, config) ?? null,
        createdAt: commit.createdAt,
      };
      store.add(segment);
      added.push(segment);
      debugLog('[captions] commit', { sequence: commit.sequence, reason: commit.reason, text: commit.sourceText });
    }
    publishVisible();
    for (const segment of added) requestTranslation(segment);
  }

  function cleanupRecognition() {
    recovery.cancel();
    silence.cancel();
    generation += 1;
    unsubscribe?.();
    unsubscribe = null;
    if (sourceRunning) {
      sourceRunning = false;
      source.stop().catch((err: unknown) => warnLog('[captions] source stop failed', err));
    }
  }

  function beginRecognition() {
    if (!shouldRun) return;
    cleanupRecognition();
    const gen = generation;
    unsubscribe = source.onEvent((event: TranscriptEvent) => {
      switch (event.kind) {
        case 'level':
          meter.push(event.rms);
          return;
        case 'failure':
          queue.post({ kind: 'failure', generation: gen, failure: event.failure, message: event.message });
          return;
        case 'partial':
        case 'final':
          queue.post({ kind: 'transcript', generation: gen, text: event.text, isFinal: event.kind === 'final' });
      }
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
    applyCommits(segmenter.flush(now()));
    cleanupRecognition();
    errorLog('[captions] stopped', { code, message: error.message });
  }

  function handleFailure(failure: FailureClass, message?: string) {
    if (!shouldRun) return;
    if (!isRecoverable(failure)) {
      failTerminal(failure, message);
      return;
    }
    // the restarted source transcribes from empty; what was heard so far is final
    applyCommits(segmenter.flush(now()));
    transcript = '';
    cleanupRecognition();
    if (recovery.noteFailure(failure).kind === 'exhausted') {
      failTerminal('retries-exhausted');
    }
  }

  function handleTranscript(text: string, isFinal: boolean) {
    recovery.noteSuccess();
    const step = segmenter.push(text, isFinal, now());
    if (step.backtracked) debugLog('[captions] recognizer rewrote transcript', { transcript: step.transcript });
    transcript = isFinal ? '' : step.transcript;
    if (isFinal) {
      silence.cancel();
    } else {
      const gen = generation;
      const snapshot = step.transcript;
      silence.schedule(config.silenceFinalizeMs, () => queue.post({ kind: 'silence', generation: gen, transcript: snapshot }));
    }
    applyCommits(step.commits);
  }

  function handle(event: CaptionEvent) {
    switch (event.kind) {
      case 'restart':
        beginRecognition();
        break;
      case 'translated': {
        if (event.epoch !== epoch) return;
        if (!store.fillTranslation(event.sequence, event.text)) return; // pruned meanwhile
        publishVisible();
        break;
      }
      default: {
        if (event.generation !== generation) return;
        if (event.kind === 'started') {
          isListening = true;
          infoLog('[captions] listening', { locale: config.locale });
        } else if (event.kind === 'transcript') {
          handleTranscript(event.text, event.isFinal);
        } else if (event.kind === 'silence') {
          const commits = segmenter.onSilence(event.transcript, now());
          if (commits.length) transcript = '';
          applyCommits(commits);
        } else {
          handleFailure(event.failure, event.message);
        }
      }
    }
    notify();
  }

  function startListening() {
    if (shouldRun) return;
    error = null;
    transcript = '';
    recovery.reset();
    meter.clear();
    segmenter.reset(now(), { keepSequence: true });
    shouldRun = true;
    beginRecognition();
    notify();
  }

  function stopListening() {
    const wasRunning = shouldRun;
    shouldRun = false;
    isListening = false;
    silence.cancel();
    if (wasRunning) applyCommits(segmenter.flush(now()));
    transcript = '';
    cleanupRecognition();
    notify();
  }

  function clearOutput() {
    epoch += 1;
    store.clear();
    segmenter.reset(now());
    transcript = '';
    clearSinks();
    notify();
  }

  return {
    startListening,
    stopListening,
    clearOutput,
    getStatus,
    getSegments: () => store.all(),
    subscribe(listener) {
      listeners.add(listener);
      listener(getStatus());
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
