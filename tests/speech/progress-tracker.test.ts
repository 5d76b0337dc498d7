import { createProgressTracker, createReferenceScript } from '../../src/speech/progress-tracker';

describe('createReferenceScript', () => {
  test('collapses whitespace and counts code points', () => {
    const ref = createReferenceScript('  The   quick\n fox! ');
    expect(ref.original).toBe('The quick fox!');
    expect(ref.normalized).toBe('the quick fox');
    expect(ref.length).toBe(14);
    expect(Object.isFrozen(ref)).toBe(true);
  });
});

describe('progress tracker', () => {
  test('exact read reaches the end of the script', () => {
    const t = createProgressTracker();
    t.start('the quick brown fox');
    const update = t.onRecognized('the quick brown fox');
    expect(update.confirmedOffset).toBe(19);
    expect(update.advanced).toBe(true);
  });

  test('annotations do not hold the cursor back', () => {
    const t = createProgressTracker();
    t.start('hello [pause] world');
    const update = t.onRecognized('hello world');
    expect(update.charCount).toBe(12);
    expect(update.wordCount).toBe(19);
    expect(update.confirmedOffset).toBe(19);
  });

  test('confirmed offset never moves backward', () => {
    const t = createProgressTracker();
    t.start('the quick brown fox');
    expect(t.onRecognized('the quick').confirmedOffset).toBe(10);
    const again = t.onRecognized('the');
    expect(again.confirmedOffset).toBe(10);
    expect(again.advanced).toBe(false);
  });

  test('jumpTo clamps and moves both offsets', () => {
    const t = createProgressTracker();
    t.start('the quick brown fox');
    expect(t.jumpTo(-5)).toBe(0);
    expect(t.jumpTo(999)).toBe(19);
    expect(t.jumpTo(Number.NaN)).toBe(0);
    expect(t.jumpTo(4)).toBe(4);
    expect(t.getState()).toEqual({ matchStartOffset: 4, confirmedOffset: 4 });
  });

  test('matching after a jump starts at the jump target', () => {
    const t = createProgressTracker();
    t.start('the quick brown fox');
    t.jumpTo(4);
    expect(t.onRecognized('quick brown').confirmedOffset).toBe(16);
  });

  test('resume restarts matching at the confirmed offset', () => {
    const t = createProgressTracker();
    t.start('the quick brown fox');
    t.onRecognized('the quick');
    expect(t.getState().matchStartOffset).toBe(0);
    t.resume();
    expect(t.getState()).toEqual({ matchStartOffset: 10, confirmedOffset: 10 });
    expect(t.onRecognized('brown fox').confirmedOffset).toBe(19);
  });

  test('recognition before start is a no-op', () => {
    const t = createProgressTracker();
    expect(t.onRecognized('anything')).toEqual({ confirmedOffset: 0, advanced: false, charCount: 0, wordCount: 0 });
  });
});
