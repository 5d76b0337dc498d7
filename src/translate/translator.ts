// Translation collaborators for committed caption segments.
// The segmenter never waits on these; a translator that is slow or fails
// degrades to the word-table fallback, then to the source text itself.

import { createTimerSlot, systemTimers, type TimerApi } from '../core/timer-slot';
import { debugLog, warnLog } from '../env/logging';
import dictionaries from './fallback-dictionary.json';

export interface Translator {
  translate(text: string, sourceLanguage: string | undefined, targetLanguage: string): Promise<string>;
}

const WORD_TABLES: Record<string, Record<string, string>> = dictionaries;
const EDGE_PUNCTUATION = /^(\p{P}*)(.*?)(\p{P}*)$/su;

export function languageRoot(code: string | null | undefined): string | undefined {
  if (!code) return undefined;
  const root = code.split(/[-_]/)[0]?.toLowerCase();
  return root || undefined;
}

function preserveCapitalization(original: string, translated: string): string {
  const first = original.charAt(0);
  if (!first || first === first.toLowerCase()) return translated;
  return translated.charAt(0).toUpperCase() + translated.slice(1);
}

function replaceToken(token: string, table: Record<string, string>): string {
  const m = EDGE_PUNCTUATION.exec(token);
  if (!m || !m[2]) return token;
  const [, leading, core, trailing] = m;
  const translated = table[core.toLowerCase()];
  if (!translated) return token;
  return leading + preserveCapitalization(core, translated) + trailing;
}

/**
 * Word-for-word table lookup. Only pairs with a table are touched; anything
 * else comes back unchanged.
 */
export function createWordTableTranslator(): Translator {
  return {
    async translate(text, sourceLanguage, targetLanguage) {
      const table = WORD_TABLES[`${languageRoot(sourceLanguage)}>${languageRoot(targetLanguage)}`];
      if (!table) return text;
      const out = text.split(/\s+/).filter(Boolean).map((tok) => replaceToken(tok, table)).join(' ');
      return out || text;
    },
  };
}

export type CaptionTranslatorOptions = {
  primary?: Translator;
  fallback?: Translator;
  timeoutMs: number;
  timers?: TimerApi;
};

// Resolves to null when the primary is slow, fails or answers empty.
function raceWithTimeout(
  primary: Translator,
  args: [string, string | undefined, string],
  timeoutMs: number,
  timers: TimerApi,
): Promise<string | null> {
  const slot = createTimerSlot(timers);
  return new Promise<string | null>((resolve) => {
    slot.schedule(timeoutMs, () => {
      debugLog('[translate] primary timed out', { timeoutMs });
      resolve(null);
    });
    primary.translate(...args).then(
      (result) => {
        slot.cancel();
        resolve(result && result.trim() ? result.trim() : null);
      },
      (err: unknown) => {
        slot.cancel();
        warnLog('[translate] primary translator failed', err);
        resolve(null);
      },
    );
  });
}

/**
 * Translator used by the caption session: trims, passes same-language text
 * through, gives the primary `timeoutMs`, then falls back.
 */
export function createCaptionTranslator(opts: CaptionTranslatorOptions): Translator {
  const fallback = opts.fallback ?? createWordTableTranslator();
  const timers = opts.timers ?? systemTimers;

  return {
    async translate(text, sourceLanguage, targetLanguage) {
      const normalized = text.trim();
      if (!normalized) return '';
      if (languageRoot(sourceLanguage) === languageRoot(targetLanguage)) return normalized;

      if (opts.primary) {
        const translated = await raceWithTimeout(
          opts.primary,
          [normalized, sourceLanguage, targetLanguage],
          opts.timeoutMs,
          timers,
        );
        if (translated) return translated;
      }
      return fallback.translate(normalized, sourceLanguage, targetLanguage);
    },
  };
}
