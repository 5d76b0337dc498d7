// Public surface of cuetrack.

export { createTeleprompterSession } from './speech/teleprompter-session';
export type { TeleprompterOptions, TeleprompterSession, TeleprompterStatus } from './speech/teleprompter-session';
export { createProgressTracker, createReferenceScript } from './speech/progress-tracker';
export type { AlignmentState, ProgressTracker, ProgressUpdate, ReferenceScript } from './speech/progress-tracker';
export { alignCharacters } from './speech/char-aligner';
export { alignWords } from './speech/word-aligner';

export { createCaptionSession } from './captions/caption-session';
export type { CaptionSession, CaptionSessionOptions, CaptionStatus } from './captions/caption-session';
export { createStreamSegmenter } from './captions/stream-segmenter';
export type { CommitReason, SegmentCommit, SegmenterStep, StreamSegmenter } from './captions/stream-segmenter';
export { createCaptionStore, joinTranslated } from './captions/caption-store';
export type { CaptionSegment, CaptionStore } from './captions/caption-store';
export { detectLanguageHeuristic, resolveSourceLanguage } from './captions/language';

export { AsrError, classifyFailure, isRecoverable, isUserVisible } from './asr/errors';
export type { AsrErrorCode, FailureClass } from './asr/errors';
export { createManualSource } from './asr/manual-source';
export type { ManualSource } from './asr/manual-source';
export type { RecognitionOptions, SourceStatus, TranscriptEvent, TranscriptSource } from './asr/transcript-source';
export { createRecoveryScheduler, restartDelayMs } from './asr/recovery';
export type { RecoveryDecision, RecoveryScheduler, RestartReason } from './asr/recovery';
export { createLevelMeter, levelFromRms } from './asr/level-meter';

export { createCaptionTranslator, createWordTableTranslator, languageRoot } from './translate/translator';
export type { Translator } from './translate/translator';
export type { CaptionSink } from './sinks/caption-sink';
export { createTextFileSink } from './sinks/text-file-sink';
export { createOverlayRelay } from './net/overlay-relay';
export type { OverlayRelay } from './net/overlay-relay';
export type { OverlayMessage, OverlayRelayOptions } from './net/overlay-protocol';

export { DEFAULT_SESSION_CONFIG, envStore, getSessionConfig, normalizeConfig } from './config/session-config';
export type { LevelMeterConfig, SessionConfig, StoreLike } from './config/session-config';
export { normalize } from './logic/normalize';
export { isFuzzyMatch } from './logic/fuzzy';
export { editDistance } from './logic/edit-distance';
export { setLogLevel, getLogLevel } from './env/dev-log';
