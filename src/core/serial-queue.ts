// Session actor: every state change goes through one FIFO drained by a single
// loop, so a firing timer can never interleave with a recognizer event.
// Events posted while a handler runs are queued behind it.

export interface SerialQueue<E> {
  post(event: E): void;
}

export function createSerialQueue<E>(
  handle: (event: E) => void,
  onError: (err: unknown, event: E) => void,
): SerialQueue<E> {
  const pending: E[] = [];
  let draining = false;

  function drain() {
    draining = true;
    try {
      while (pending.length) {
        const [event] = pending.splice(0, 1);
        try {
          handle(event);
        } catch (err) {
          onError(err, event);
        }
      }
    } finally {
      draining = false;
    }
  }

  return {
    post(event: E) {
      pending.push(event);
      if (!draining) drain();
    },
  };
}
