// Push-driven TranscriptSource. A host wires its recognizer callbacks to
// emitPartial/emitFinal/emitFailure/emitLevel; tests drive it directly.

import { debugLog, warnLog } from '../env/logging';
import { AsrError, type FailureClass } from './errors';
import type { RecognitionOptions, SourceStatus, TranscriptEvent, TranscriptSource } from './transcript-source';

export interface ManualSource extends TranscriptSource {
  emitPartial(text: string): void;
  emitFinal(text: string): void;
  emitFailure(failure: FailureClass, message?: string): void;
  emitLevel(rms: number): void;
  /** Makes the next start() reject with the given failure. */
  failNextStart(failure: FailureClass, message?: string): void;
  startCount(): number;
  lastOptions(): RecognitionOptions | null;
}

export function createManualSource(kind = 'manual'): ManualSource {
  const subs = new Set<(event: TranscriptEvent) => void>();
  let ready = false;
  let error: string | undefined;
  let starts = 0;
  let options: RecognitionOptions | null = null;
  let nextStartFailure: AsrError | null = null;

  function status(): SourceStatus {
    return error ? { kind, ready, error } : { kind, ready };
  }

  function emit(event: TranscriptEvent) {
    if (!ready && event.kind !== 'failure') return;
    for (const fn of [...subs]) {
      try {
        fn(event);
      } catch (err) {
        warnLog('[manual-source] listener failed', err);
      }
    }
  }

  async function start(opts: RecognitionOptions): Promise<void> {
    starts += 1;
    options = opts;
    if (nextStartFailure) {
      const failure = nextStartFailure;
      nextStartFailure = null;
      error = failure.message;
      ready = false;
      throw failure;
    }
    error = undefined;
    ready = true;
    debugLog('[manual-source] started', { locale: opts.locale, starts });
  }

  async function stop(): Promise<void> {
    ready = false;
  }

  return {
    start,
    stop,
    status,
    onEvent(listener) {
      subs.add(listener);
      return () => {
        subs.delete(listener);
      };
    },
    emitPartial: (text) => emit({ kind: 'partial', text }),
    emitFinal: (text) => emit({ kind: 'final', text }),
    emitFailure: (failure, message) => emit(message ? { kind: 'failure', failure, message } : { kind: 'failure', failure }),
    emitLevel: (rms) => emit({ kind: 'level', rms }),
    failNextStart(failure, message) {
      nextStartFailure = new AsrError(failure, message);
    },
    startCount: () => starts,
    lastOptions: () => options,
  };
}
