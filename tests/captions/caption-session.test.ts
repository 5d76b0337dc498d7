import { createManualSource } from '../../src/asr/manual-source';
import { createCaptionSession } from '../../src/captions/caption-session';
import type { CaptionSegment } from '../../src/captions/caption-store';
import type { CaptionSink } from '../../src/sinks/caption-sink';
import type { Translator } from '../../src/translate/translator';

async function settle() {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

function recordingSink() {
  const published: CaptionSegment[][] = [];
  let clears = 0;
  const sink: CaptionSink = {
    publish(lines) {
      published.push([...lines]);
    },
    clear() {
      clears += 1;
    },
  };
  return { sink, published, clears: () => clears };
}

const upper: Translator = { translate: async (text) => text.toUpperCase() };

describe('caption session', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('silence commits the partial, then the translation lands', async () => {
    const source = createManualSource();
    const { sink, published } = recordingSink();
    const session = createCaptionSession({ source, translator: upper, sinks: [sink] });
    session.startListening();
    await settle();
    expect(session.getStatus().isListening).toBe(true);

    source.emitPartial('hello world');
    expect(session.getStatus().transcript).toBe('hello world');
    expect(session.getSegments()).toEqual([]);

    jest.advanceTimersByTime(1100);
    expect(session.getSegments().map((s) => s.sourceText)).toEqual(['hello world']);
    await settle();

    const [segment] = session.getSegments();
    expect(segment).toMatchObject({ sequence: 0, sourceText: 'hello world', translatedText: 'HELLO WORLD', sourceLanguage: 'en' });
    expect(session.getStatus().outputText).toBe('HELLO WORLD');
    expect(session.getStatus().transcript).toBe('');
    expect(published).toHaveLength(2);
    expect(published[0][0].translatedText).toBeNull();
    expect(published[1][0].translatedText).toBe('HELLO WORLD');
  });

  test('a newer partial pushes the silence deadline back', async () => {
    const source = createManualSource();
    const session = createCaptionSession({ source, translator: upper, sinks: [] });
    session.startListening();
    await settle();
    source.emitPartial('hello');
    jest.advanceTimersByTime(1000);
    source.emitPartial('hello there');
    jest.advanceTimersByTime(1000);
    expect(session.getSegments()).toEqual([]);
    jest.advanceTimersByTime(100);
    expect(session.getSegments().map((s) => s.sourceText)).toEqual(['hello there']);
  });

  test('final results commit immediately and are not duplicated by silence', async () => {
    const source = createManualSource();
    const session = createCaptionSession({ source, translator: upper, sinks: [] });
    session.startListening();
    await settle();
    source.emitPartial('good morning');
    source.emitFinal('good morning everyone');
    jest.advanceTimersByTime(5000);
    await settle();
    expect(session.getSegments().map((s) => [s.sequence, s.sourceText, s.translatedText])).toEqual([
      [0, 'good morning everyone', 'GOOD MORNING EVERYONE'],
    ]);
  });

  test('buffer size commits while the speaker keeps going', async () => {
    const source = createManualSource();
    const session = createCaptionSession({
      source,
      translator: upper,
      sinks: [],
      config: { streamingBufferWordCount: 3 },
    });
    session.startListening();
    await settle();
    source.emitPartial('one two three four');
    expect(session.getSegments().map((s) => s.sourceText)).toEqual(['one two three']);
  });

  test('stopListening flushes the pending text and cancels silence', async () => {
    const source = createManualSource();
    const session = createCaptionSession({ source, translator: upper, sinks: [] });
    session.startListening();
    await settle();
    source.emitPartial('we are live');
    session.stopListening();
    jest.advanceTimersByTime(5000);
    await settle();
    expect(session.getStatus().isListening).toBe(false);
    expect(session.getSegments().map((s) => [s.sourceText, s.translatedText])).toEqual([['we are live', 'WE ARE LIVE']]);
  });

  test('clearOutput empties the store and drops late translations', async () => {
    const source = createManualSource();
    const { sink, clears } = recordingSink();
    const resolvers: Array<(text: string) => void> = [];
    const deferred: Translator = {
      translate: () => new Promise<string>((resolve) => {
        resolvers.push(resolve);
      }),
    };
    const session = createCaptionSession({ source, translator: deferred, sinks: [sink] });
    session.startListening();
    await settle();
    source.emitFinal('first line');
    expect(session.getSegments()).toHaveLength(1);

    session.clearOutput();
    resolvers[0]('FIRST');
    await settle();
    expect(session.getSegments()).toEqual([]);
    expect(session.getStatus().outputText).toBe('');
    expect(clears()).toBe(1);

    source.emitFinal('second line');
    expect(session.getSegments().map((s) => s.sequence)).toEqual([0]);
  });

  test('a failed translation shows the source text', async () => {
    const source = createManualSource();
    const failing: Translator = { translate: async () => Promise.reject(new Error('offline')) };
    const session = createCaptionSession({ source, translator: failing, sinks: [] });
    session.startListening();
    await settle();
    source.emitFinal('still readable');
    await settle();
    expect(session.getSegments()[0].translatedText).toBe('still readable');
  });

  test('a throwing sink does not stop segmentation', async () => {
    const source = createManualSource();
    const broken: CaptionSink = {
      publish() {
        throw new Error('disk full');
      },
      clear() {
        throw new Error('disk full');
      },
    };
    const session = createCaptionSession({ source, translator: upper, sinks: [broken] });
    session.startListening();
    await settle();
    source.emitFinal('one');
    source.emitFinal('two');
    await settle();
    expect(session.getSegments().map((s) => s.translatedText)).toEqual(['ONE', 'TWO']);
  });

  test('recoverable failures restart the source, fatal ones stop', async () => {
    const source = createManualSource();
    const session = createCaptionSession({ source, translator: upper, sinks: [] });
    session.startListening();
    await settle();
    source.emitFailure('transient-audio-format');
    jest.advanceTimersByTime(300);
    expect(source.startCount()).toBe(2);
    await settle();

    source.emitPartial('almost there');
    source.emitFailure('recognizer-unavailable', 'model missing');
    const status = session.getStatus();
    expect(status).toMatchObject({ isListening: false, errorCode: 'recognizer-unavailable', error: 'model missing' });
    expect(session.getSegments().map((s) => s.sourceText)).toEqual(['almost there']);
  });

  test('a recoverable failure commits what was heard before the restart', async () => {
    const source = createManualSource();
    const session = createCaptionSession({ source, translator: upper, sinks: [] });
    session.startListening();
    await settle();
    source.emitPartial('welcome to the quarterly review');
    source.emitFailure('stream-error');
    expect(session.getSegments().map((s) => [s.sourceText, s.translatedText])).toEqual([
      ['welcome to the quarterly review', null],
    ]);
    expect(session.getStatus().transcript).toBe('');

    jest.advanceTimersByTime(500);
    expect(source.startCount()).toBe(2);
    await settle();
    source.emitPartial('next topic');
    jest.advanceTimersByTime(1100);
    await settle();
    expect(session.getSegments().map((s) => [s.sequence, s.sourceText])).toEqual([
      [0, 'welcome to the quarterly review'],
      [1, 'next topic'],
    ]);
  });

  test('uses the default translator when none is given', async () => {
    const source = createManualSource();
    const session = createCaptionSession({
      source,
      sinks: [],
      config: { sourceLanguage: 'tr', targetLanguage: 'en' },
    });
    session.startListening();
    await settle();
    source.emitFinal('Merhaba, nasılsın?');
    await settle();
    expect(session.getSegments()[0]).toMatchObject({ sourceLanguage: 'tr', translatedText: 'Hello, how are you?' });
  });
});
