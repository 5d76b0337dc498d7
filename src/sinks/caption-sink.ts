import type { CaptionSegment } from '../captions/caption-store';

// Downstream consumer of the visible caption window. Best-effort: a failing
// sink never affects segmentation.
export interface CaptionSink {
  publish(lines: readonly CaptionSegment[]): void | Promise<void>;
  clear(): void | Promise<void>;
}
