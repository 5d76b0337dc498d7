// src/config/session-config.ts
// Settings are resolved once and handed to each session; nothing in the
// matching/segmenting path reads process-wide state.

export type LevelMeterConfig = {
  capacity: number; // ring buffer size, oldest samples dropped
  window: number; // most recent samples averaged
  threshold: number; // 0..1 average level that counts as speech
};

export interface SessionConfig {
  locale: string;
  maxRetries: number;
  silenceFinalizeMs: number;
  streamingBufferWordCount: number;
  maxVisibleLines: number;
  sourceLanguage: string; // 'auto' or a language code
  targetLanguage: string;
  translationTimeoutMs: number;
  storeLimit: number;
  storeKeep: number;
  teleprompterMeter: LevelMeterConfig;
  captionMeter: LevelMeterConfig;
  outputPath?: string;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  locale: 'en-US',
  maxRetries: 10,
  silenceFinalizeMs: 1100,
  streamingBufferWordCount: 8,
  maxVisibleLines: 3,
  sourceLanguage: 'auto',
  targetLanguage: 'en',
  translationTimeoutMs: 1400,
  storeLimit: 120,
  storeKeep: 60,
  teleprompterMeter: { capacity: 30, window: 10, threshold: 0.08 },
  captionMeter: { capacity: 24, window: 6, threshold: 0.04 },
};

export interface StoreLike {
  get(key: string): unknown;
}

function clampNumber(value: unknown, min: number, max: number, fallback: number, round = true): number {
  const raw = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof raw !== 'number' || !Number.isFinite(raw)) return fallback;
  const v = round ? Math.round(raw) : raw;
  return Math.max(min, Math.min(max, v));
}

function pickString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function normalizeMeter(meter: Partial<LevelMeterConfig> | undefined, base: LevelMeterConfig): LevelMeterConfig {
  const capacity = clampNumber(meter?.capacity, 1, 512, base.capacity);
  return {
    capacity,
    window: clampNumber(meter?.window, 1, capacity, Math.min(base.window, capacity)),
    threshold: clampNumber(meter?.threshold, 0, 1, base.threshold, false),
  };
}

export function normalizeConfig(partial: Partial<SessionConfig> = {}): SessionConfig {
  const base = DEFAULT_SESSION_CONFIG;
  const storeLimit = clampNumber(partial.storeLimit, 2, 10_000, base.storeLimit);
  const outputPath = typeof partial.outputPath === 'string' && partial.outputPath.trim()
    ? partial.outputPath.trim()
    : undefined;
  return {
    locale: pickString(partial.locale, base.locale),
    maxRetries: clampNumber(partial.maxRetries, 0, 100, base.maxRetries),
    silenceFinalizeMs: clampNumber(partial.silenceFinalizeMs, 100, 30_000, base.silenceFinalizeMs),
    // a one-word target would commit every word on arrival
    streamingBufferWordCount: clampNumber(partial.streamingBufferWordCount, 2, 200, base.streamingBufferWordCount),
    maxVisibleLines: clampNumber(partial.maxVisibleLines, 1, 100, base.maxVisibleLines),
    sourceLanguage: pickString(partial.sourceLanguage, base.sourceLanguage),
    targetLanguage: pickString(partial.targetLanguage, base.targetLanguage),
    translationTimeoutMs: clampNumber(partial.translationTimeoutMs, 100, 60_000, base.translationTimeoutMs),
    storeLimit,
    storeKeep: clampNumber(partial.storeKeep, 1, storeLimit, Math.min(base.storeKeep, storeLimit)),
    teleprompterMeter: normalizeMeter(partial.teleprompterMeter, base.teleprompterMeter),
    captionMeter: normalizeMeter(partial.captionMeter, base.captionMeter),
    ...(outputPath ? { outputPath } : {}),
  };
}

export function getSessionConfig(store: StoreLike | null): SessionConfig {
  if (!store) return normalizeConfig();
  const num = (key: string): number | undefined => {
    const raw = store.get(key);
    if (typeof raw === 'number') return raw;
    if (typeof raw === 'string' && raw.trim() !== '') return Number(raw);
    return undefined;
  };
  const str = (key: string): string | undefined => {
    const raw = store.get(key);
    return typeof raw === 'string' ? raw : undefined;
  };
  return normalizeConfig({
    locale: str('locale'),
    maxRetries: num('maxRetries'),
    silenceFinalizeMs: num('silenceFinalizeMs'),
    streamingBufferWordCount: num('streamingBufferWordCount'),
    maxVisibleLines: num('maxVisibleLines'),
    sourceLanguage: str('sourceLanguage'),
    targetLanguage: str('targetLanguage'),
    translationTimeoutMs: num('translationTimeoutMs'),
    storeLimit: num('storeLimit'),
    storeKeep: num('storeKeep'),
    outputPath: str('outputPath'),
  });
}

const ENV_KEYS: Record<string, string> = {
  locale: 'CUETRACK_LOCALE',
  maxRetries: 'CUETRACK_MAX_RETRIES',
  silenceFinalizeMs: 'CUETRACK_SILENCE_MS',
  streamingBufferWordCount: 'CUETRACK_BUFFER_WORDS',
  maxVisibleLines: 'CUETRACK_VISIBLE_LINES',
  sourceLanguage: 'CUETRACK_SOURCE_LANG',
  targetLanguage: 'CUETRACK_TARGET_LANG',
  translationTimeoutMs: 'CUETRACK_TRANSLATE_TIMEOUT_MS',
  storeLimit: 'CUETRACK_STORE_LIMIT',
  storeKeep: 'CUETRACK_STORE_KEEP',
  outputPath: 'CUETRACK_OUTPUT_PATH',
};

/** Exposes `CUETRACK_*` variables under the config key names. */
export function envStore(env: NodeJS.ProcessEnv): StoreLike {
  return {
    get(key: string) {
      const name = ENV_KEYS[key];
      return name ? env[name] : undefined;
    },
  };
}
