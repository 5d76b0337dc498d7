import { createCaptionStore, joinTranslated, type CaptionSegment } from '../../src/captions/caption-store';

function segment(sequence: number, translatedText: string | null = null): CaptionSegment {
  return { sequence, sourceText: `line ${sequence}`, translatedText, sourceLanguage: 'en', createdAt: sequence };
}

describe('caption store', () => {
  test('prunes to the newest segments once over the limit', () => {
    const store = createCaptionStore({ maxVisibleLines: 3, limit: 120, keep: 60 });
    for (let i = 0; i < 120; i++) store.add(segment(i));
    expect(store.size()).toBe(120);
    store.add(segment(120));
    expect(store.size()).toBe(60);
    const all = store.all();
    expect(all[0].sequence).toBe(61);
    expect(all[all.length - 1].sequence).toBe(120);
  });

  test('orders by sequence and exposes the visible window', () => {
    const store = createCaptionStore({ maxVisibleLines: 2, limit: 10, keep: 5 });
    store.add(segment(2));
    store.add(segment(0));
    store.add(segment(1));
    expect(store.all().map((s) => s.sequence)).toEqual([0, 1, 2]);
    expect(store.visible().map((s) => s.sequence)).toEqual([1, 2]);
  });

  test('translations fill in place and segments stay frozen', () => {
    const store = createCaptionStore({ maxVisibleLines: 3, limit: 10, keep: 5 });
    store.add(segment(0));
    store.add(segment(1));
    const filled = store.fillTranslation(1, 'uno');
    expect(filled?.translatedText).toBe('uno');
    expect(store.get(0)?.translatedText).toBeNull();
    expect(Object.isFrozen(store.get(1))).toBe(true);
    expect(store.fillTranslation(7, 'missing')).toBeNull();
  });

  test('joinTranslated skips untranslated lines', () => {
    expect(joinTranslated([segment(0, 'one'), segment(1), segment(2, 'three')])).toBe('one\nthree');
    expect(joinTranslated([])).toBe('');
  });
});
