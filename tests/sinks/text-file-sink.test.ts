import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CaptionSegment } from '../../src/captions/caption-store';
import { createTextFileSink } from '../../src/sinks/text-file-sink';

function line(sequence: number, translatedText: string | null): CaptionSegment {
  return { sequence, sourceText: `src ${sequence}`, translatedText, sourceLanguage: 'tr', createdAt: 0 };
}

describe('text file sink', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cuetrack-sink-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('writes the translated window and clears it', async () => {
    const target = path.join(dir, 'nested', 'captions.txt');
    const sink = createTextFileSink(target);
    await sink.publish([line(0, 'one'), line(1, null), line(2, 'three')]);
    expect(await fs.readFile(target, 'utf8')).toBe('one\nthree');

    await sink.clear();
    expect(await fs.readFile(target, 'utf8')).toBe('');
    expect(await fs.readdir(path.dirname(target))).toEqual(['captions.txt']);
  });

  test('later writes win', async () => {
    const target = path.join(dir, 'captions.txt');
    const sink = createTextFileSink(target);
    void sink.publish([line(0, 'first')]);
    void sink.publish([line(0, 'first'), line(1, 'second')]);
    await sink.idle();
    expect(await fs.readFile(target, 'utf8')).toBe('first\nsecond');
  });

  test('an unwritable path is logged and skipped', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const sink = createTextFileSink(path.join(blocker, 'captions.txt'));
    await expect(sink.publish([line(0, 'one')])).resolves.toBeUndefined();
    await expect(sink.idle()).resolves.toBeUndefined();
  });
});
