// Logging helpers with a CI quiet-mode gate on top of the dev log levels.

import { shouldLogLevel, shouldLogTag } from './dev-log';

export function isQuietEnv(): boolean {
  return Boolean(process.env.CI) && process.env.CUETRACK_LOG_IN_CI !== '1';
}

export function debugLog(...args: unknown[]): void {
  if (isQuietEnv() || !shouldLogLevel(2)) return;
  console.debug(...args);
}

export function infoLog(...args: unknown[]): void {
  if (isQuietEnv() || !shouldLogLevel(1)) return;
  console.log(...args);
}

export function warnLog(...args: unknown[]): void {
  if (isQuietEnv() || !shouldLogLevel(1)) return;
  console.warn(...args);
}

export function errorLog(...args: unknown[]): void {
  if (isQuietEnv() || !shouldLogLevel(1)) return;
  console.error(...args);
}

// Throttled per tag; for per-event probes (every partial result).
export function probeLog(tag: string, payload?: unknown): void {
  if (isQuietEnv() || !shouldLogTag(tag, 2, 250)) return;
  console.debug(tag, payload ?? '');
}
