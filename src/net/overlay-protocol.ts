import type { CaptionSegment } from '../captions/caption-store';

export type OverlayRole = 'controller' | 'overlay';

export type OverlayHello = {
  type: 'hello';
  role?: OverlayRole;
  token?: string;
};

export type OverlayCaptionsMessage = {
  type: 'captions';
  lines: CaptionSegment[];
  text: string; // joined translated text, one line per segment
  ts: number;
};

export type OverlayProgressMessage = {
  type: 'progress';
  confirmedOffset: number;
  referenceLength: number;
  isListening: boolean;
  ts: number;
};

export type OverlayStatusMessage = {
  type: 'overlay-status';
  connected: number;
};

export type OverlayMessage = OverlayCaptionsMessage | OverlayProgressMessage | OverlayStatusMessage;

export interface OverlayRelayOptions {
  token?: string; // required in overlay hellos when set
  path?: string; // upgrade path, default /ws/overlay
}
