// Recognizer failure taxonomy.
// permission-denied / recognizer-unavailable: fatal, no retry
// transient-audio-format / stream-error / device-change: recoverable
// retries-exhausted: terminal, produced by the recovery policy

export type FailureClass =
  | 'permission-denied'
  | 'recognizer-unavailable'
  | 'transient-audio-format'
  | 'stream-error'
  | 'device-change';

export type AsrErrorCode = FailureClass | 'retries-exhausted';

export type RecoverableFailure = Extract<FailureClass, 'transient-audio-format' | 'stream-error' | 'device-change'>;

const FAILURE_CLASSES: readonly FailureClass[] = [
  'permission-denied',
  'recognizer-unavailable',
  'transient-audio-format',
  'stream-error',
  'device-change',
];

const DEFAULT_MESSAGES: Record<AsrErrorCode, string> = {
  'permission-denied': 'Speech or microphone permission denied',
  'recognizer-unavailable': 'Speech recognizer not available',
  'transient-audio-format': 'Audio input format unavailable',
  'stream-error': 'Recognition stream failed',
  'device-change': 'Audio device configuration changed',
  'retries-exhausted': 'Audio input unavailable',
};

export class AsrError extends Error {
  readonly code: AsrErrorCode;

  constructor(code: AsrErrorCode, message?: string) {
    super(message || DEFAULT_MESSAGES[code]);
    this.name = 'AsrError';
    this.code = code;
  }
}

export function isFailureClass(value: unknown): value is FailureClass {
  return FAILURE_CLASSES.some((c) => c === value);
}

export function isRecoverable(failure: FailureClass): failure is RecoverableFailure {
  return failure === 'transient-audio-format' || failure === 'stream-error' || failure === 'device-change';
}

// Only these reach the user; the rest stay internal unless retries run out.
export function isUserVisible(code: AsrErrorCode): boolean {
  return code === 'permission-denied' || code === 'recognizer-unavailable' || code === 'retries-exhausted';
}

export function classifyFailure(err: unknown): { failure: FailureClass; message: string } {
  if (err instanceof AsrError && err.code !== 'retries-exhausted') {
    return { failure: err.code, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { failure: 'stream-error', message };
}
