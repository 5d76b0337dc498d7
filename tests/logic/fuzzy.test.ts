import { isFuzzyMatch } from '../../src/logic/fuzzy';

describe('isFuzzyMatch', () => {
  test('empty never matches', () => {
    expect(isFuzzyMatch('', 'a')).toBe(false);
    expect(isFuzzyMatch('a', '')).toBe(false);
    expect(isFuzzyMatch('', '')).toBe(false);
  });

  test('exact, prefix and substring', () => {
    expect(isFuzzyMatch('fox', 'fox')).toBe(true);
    expect(isFuzzyMatch('not', 'notch')).toBe(true);
    expect(isFuzzyMatch('notch', 'not')).toBe(true);
    expect(isFuzzyMatch('ring', 'spring')).toBe(true);
  });

  test('shared leading run', () => {
    // "the" shared, shorter 5 -> needs 3
    expect(isFuzzyMatch('their', 'there')).toBe(true);
  });

  test('edit distance scales with word length', () => {
    expect(isFuzzyMatch('notification', 'notifocation')).toBe(true);
    expect(isFuzzyMatch('fox', 'box')).toBe(true);
    expect(isFuzzyMatch('fox', 'cat')).toBe(false);
    expect(isFuzzyMatch('banana', 'date')).toBe(false);
  });

  test('is symmetric', () => {
    const pairs: Array<[string, string]> = [['their', 'there'], ['not', 'notch'], ['fox', 'cat'], ['teleprompter', 'teleprompting']];
    for (const [a, b] of pairs) {
      expect(isFuzzyMatch(a, b)).toBe(isFuzzyMatch(b, a));
    }
  });
});
