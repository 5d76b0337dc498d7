// Bounded, sequence-ordered store of committed caption segments.
// Translations land in any order; display order is always by sequence.

export interface CaptionSegment {
  readonly sequence: number;
  readonly sourceText: string;
  readonly translatedText: string | null; // null until the translator answers
  readonly sourceLanguage: string | null;
  readonly createdAt: number;
}

export type CaptionStoreOptions = {
  maxVisibleLines: number;
  limit: number; // prune once the store holds more than this
  keep: number; // newest segments kept by a prune
};

export interface CaptionStore {
  add(segment: CaptionSegment): void;
  fillTranslation(sequence: number, translatedText: string): CaptionSegment | null;
  get(sequence: number): CaptionSegment | undefined;
  all(): CaptionSegment[];
  visible(): CaptionSegment[];
  size(): number;
  clear(): void;
}

export function createCaptionStore(opts: CaptionStoreOptions): CaptionStore {
  const segments = new Map<number, CaptionSegment>();

  function all(): CaptionSegment[] {
    return [...segments.values()].sort((a, b) => a.sequence - b.sequence);
  }

  function prune() {
    if (segments.size <= opts.limit) return;
    const ordered = all();
    for (const seg of ordered.slice(0, Math.max(0, ordered.length - opts.keep))) {
      segments.delete(seg.sequence);
    }
  }

  return {
    add(segment) {
      segments.set(segment.sequence, Object.freeze({ ...segment }));
      prune();
    },
    fillTranslation(sequence, translatedText) {
      const current = segments.get(sequence);
      if (!current) return null;
      const next = Object.freeze({ ...current, translatedText });
      segments.set(sequence, next);
      return next;
    },
    get: (sequence) => segments.get(sequence),
    all,
    visible: () => all().slice(-Math.max(1, opts.maxVisibleLines)),
    size: () => segments.size,
    clear() {
      segments.clear();
    },
  };
}

// Text shown to a viewer: translated lines of the visible window, one per line.
export function joinTranslated(lines: readonly CaptionSegment[]): string {
  return lines
    .map((line) => line.translatedText)
    .filter((text): text is string => typeof text === 'string' && text.length > 0)
    .join('\n');
}
