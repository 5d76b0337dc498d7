// Plain-text sink for streaming tools that poll a file (OBS text source etc).
// Writes are serialized and atomic (temp file + rename); failures are logged
// and dropped.

import fs from 'node:fs/promises';
import path from 'node:path';
import { joinTranslated } from '../captions/caption-store';
import { warnLog } from '../env/logging';
import type { CaptionSink } from './caption-sink';

export interface TextFileSink extends CaptionSink {
  /** Resolves once every write queued so far has settled. */
  idle(): Promise<void>;
}

export function createTextFileSink(outputPath: string): TextFileSink {
  const destination = path.resolve(outputPath);
  let chain: Promise<void> = Promise.resolve();
  let writes = 0;

  async function writeAtomic(text: string): Promise<void> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const tmp = `${destination}.${process.pid}.${++writes}.tmp`;
    try {
      await fs.writeFile(tmp, text, 'utf8');
      await fs.rename(tmp, destination);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }

  function enqueue(text: string): Promise<void> {
    chain = chain
      .then(() => writeAtomic(text))
      .catch((err: unknown) => {
        warnLog('[text-sink] write failed', { path: destination, err });
      });
    return chain;
  }

  return {
    publish: (lines) => enqueue(joinTranslated(lines)),
    clear: () => enqueue(''),
    idle: () => chain,
  };
}
