import { alignWords } from '../../src/speech/word-aligner';

describe('alignWords', () => {
  test('each word counts its length plus the following space', () => {
    expect(alignWords('the quick brown fox', 'the quick brown fox')).toBe(19);
    expect(alignWords('the quick brown fox', 'the quick')).toBe(10);
  });

  test('annotations are passed without being spoken', () => {
    expect(alignWords('hello [pause] world', 'hello world')).toBe(19);
    expect(alignWords('hello world [beat]', 'hello world')).toBe(18);
    expect(alignWords('hi 😀 there', 'hi there')).toBe(10);
  });

  test('recognizer substitutions still count', () => {
    expect(alignWords('over there now', 'over their now')).toBe(14);
  });

  test('skips filler words in the transcript', () => {
    expect(alignWords('the fox jumps', 'the um uh fox jumps')).toBe(13);
  });

  test('skips script words the reader left out', () => {
    expect(alignWords('apple banana cherry date', 'apple date')).toBe(24);
  });

  test('unrelated speech matches nothing', () => {
    expect(alignWords('apple banana', 'xylophone')).toBe(0);
  });
});
