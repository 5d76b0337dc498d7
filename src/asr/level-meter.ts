// Audio level meter: a fixed-size ring of recent buffer levels feeding a
// single "is speech detected" flag. Independent of alignment state.

import type { LevelMeterConfig } from '../config/session-config';

const GAIN = 5;

export interface LevelMeter {
  push(rms: number): void;
  isSpeaking(): boolean;
  levels(): number[]; // oldest first
  clear(): void;
}

// Scale a raw RMS value the way the level bars display it.
export function levelFromRms(rms: number): number {
  if (!Number.isFinite(rms) || rms <= 0) return 0;
  return Math.min(rms * GAIN, 1);
}

export function createLevelMeter(config: LevelMeterConfig): LevelMeter {
  const capacity = Math.max(1, Math.floor(config.capacity));
  const ring: number[] = new Array(capacity).fill(0);
  let head = 0; // next write position
  let count = 0;

  function levels(): number[] {
    const out: number[] = [];
    const start = (head - count + capacity) % capacity;
    for (let i = 0; i < count; i++) out.push(ring[(start + i) % capacity]);
    return out;
  }

  function isSpeaking(): boolean {
    const recent = levels().slice(-Math.max(1, config.window));
    if (!recent.length) return false;
    const avg = recent.reduce((sum, v) => sum + v, 0) / recent.length;
    return avg > config.threshold;
  }

  return {
    push(rms: number) {
      ring[head] = levelFromRms(rms);
      head = (head + 1) % capacity;
      count = Math.min(capacity, count + 1);
    },
    isSpeaking,
    levels,
    clear() {
      ring.fill(0);
      head = 0;
      count = 0;
    },
  };
}
