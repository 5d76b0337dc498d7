// Centralized log-level helpers.
// Levels:
// 0 = silent
// 1 = state transitions + warnings/errors
// 2 = verbose probes
// 3 = trace/stack heavy diagnostics

const MIN_LOG_LEVEL = 0;
const MAX_LOG_LEVEL = 3;
const DEFAULT_LOG_LEVEL = 0;
const LOG_LEVEL_ENV = 'CUETRACK_LOG_LEVEL';

const tagLastAt = new Map<string, number>();
let runtimeLevel: number | null = null;

function clampLogLevel(value: number): number {
  if (!Number.isFinite(value)) return MIN_LOG_LEVEL;
  return Math.max(MIN_LOG_LEVEL, Math.min(MAX_LOG_LEVEL, Math.floor(value)));
}

function parseLogLevelRaw(value: unknown): number | null {
  if (value == null || value === '') return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return null;
  return clampLogLevel(parsed);
}

/** Runtime override; `null` falls back to the environment. */
export function setLogLevel(level: number | null): void {
  runtimeLevel = level == null ? null : clampLogLevel(level);
}

export function getLogLevel(): number {
  if (runtimeLevel != null) return runtimeLevel;
  return parseLogLevelRaw(process.env[LOG_LEVEL_ENV]) ?? DEFAULT_LOG_LEVEL;
}

export function shouldLogLevel(minLevel: number): boolean {
  return getLogLevel() >= clampLogLevel(minLevel);
}

export function shouldLogTag(
  tag: string,
  minLevel = 2,
  throttleMs = 500,
): boolean {
  if (!shouldLogLevel(minLevel)) return false;
  const throttle = Math.max(0, Math.floor(throttleMs));
  if (!tag || throttle <= 0) return true;
  const now = Date.now();
  const last = tagLastAt.get(tag) ?? 0;
  if (now - last < throttle) return false;
  tagLastAt.set(tag, now);
  return true;
}

export function resetLogThrottle(): void {
  tagLastAt.clear();
}
