// Capped, coalesced restart policy for the upstream recognizer.
// At most one restart is pending; a new one replaces it. Running past
// maxRetries is terminal and schedules nothing.

import { createTimerSlot, systemTimers, type TimerApi } from '../core/timer-slot';
import { debugLog, warnLog } from '../env/logging';
import type { RecoverableFailure } from './errors';

export const TRANSIENT_FORMAT_DELAY_MS = 300;
export const DEVICE_CHANGE_DELAY_MS = 500;
export const STREAM_ERROR_STEP_MS = 500;
export const STREAM_ERROR_MAX_DELAY_MS = 1500;

// 'restart' is an explicit restart (jump, device settle) with a fresh retry budget
export type RestartReason = RecoverableFailure | 'restart';

export interface RecoveryState {
  retryCount: number;
  lastFailureClass: RestartReason | null;
}

export type RecoveryDecision =
  | { kind: 'scheduled'; delayMs: number; attempt: number }
  | { kind: 'exhausted'; attempts: number };

export type RecoveryOptions = {
  maxRetries: number;
  onRestart: () => void;
  timers?: TimerApi;
};

export interface RecoveryScheduler {
  noteFailure(reason: RestartReason): RecoveryDecision;
  noteSuccess(): void;
  reset(): void;
  cancel(): void;
  isPending(): boolean;
  getState(): Readonly<RecoveryState>;
}

export function restartDelayMs(reason: RestartReason, retryCount: number): number {
  switch (reason) {
    case 'transient-audio-format':
      return TRANSIENT_FORMAT_DELAY_MS;
    case 'device-change':
    case 'restart':
      return DEVICE_CHANGE_DELAY_MS;
    case 'stream-error':
      return Math.min(retryCount * STREAM_ERROR_STEP_MS, STREAM_ERROR_MAX_DELAY_MS);
  }
}

export function createRecoveryScheduler(opts: RecoveryOptions): RecoveryScheduler {
  const slot = createTimerSlot(opts.timers ?? systemTimers);
  const maxRetries = Math.max(0, Math.floor(opts.maxRetries));
  const state: RecoveryState = { retryCount: 0, lastFailureClass: null };

  function noteFailure(reason: RestartReason): RecoveryDecision {
    state.lastFailureClass = reason;
    // device changes and explicit restarts get a full set of attempts
    if (reason === 'device-change' || reason === 'restart') state.retryCount = 0;

    if (reason === 'restart') {
      slot.schedule(DEVICE_CHANGE_DELAY_MS, opts.onRestart);
      debugLog('[recovery] explicit restart scheduled', { delayMs: DEVICE_CHANGE_DELAY_MS });
      return { kind: 'scheduled', delayMs: DEVICE_CHANGE_DELAY_MS, attempt: 0 };
    }

    if (state.retryCount >= maxRetries) {
      slot.cancel();
      warnLog('[recovery] retries exhausted', { reason, attempts: state.retryCount });
      return { kind: 'exhausted', attempts: state.retryCount };
    }

    state.retryCount += 1;
    const delayMs = restartDelayMs(reason, state.retryCount);
    slot.schedule(delayMs, opts.onRestart);
    debugLog('[recovery] restart scheduled', { reason, attempt: state.retryCount, delayMs });
    return { kind: 'scheduled', delayMs, attempt: state.retryCount };
  }

  function reset() {
    state.retryCount = 0;
    state.lastFailureClass = null;
  }

  return {
    noteFailure,
    noteSuccess: reset,
    reset,
    cancel: () => slot.cancel(),
    isPending: () => slot.isPending(),
    getState: () => ({ ...state }),
  };
}
