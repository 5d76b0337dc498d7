// Single-shot, coalescing timer: scheduling replaces whatever was pending.
// One slot per timer role (silence finalize, recognizer restart).

export type TimerHandle = ReturnType<typeof setTimeout>;

export interface TimerApi {
  setTimeout(fn: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const systemTimers: TimerApi = {
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

export interface TimerSlot {
  schedule(delayMs: number, fire: () => void): void;
  cancel(): void;
  isPending(): boolean;
}

export function createTimerSlot(timers: TimerApi = systemTimers): TimerSlot {
  let handle: TimerHandle | null = null;

  function cancel() {
    if (handle !== null) {
      timers.clearTimeout(handle);
      handle = null;
    }
  }

  function schedule(delayMs: number, fire: () => void) {
    cancel();
    const current = timers.setTimeout(() => {
      if (handle !== current) return;
      handle = null;
      fire();
    }, Math.max(0, delayMs));
    handle = current;
  }

  return { schedule, cancel, isPending: () => handle !== null };
}
