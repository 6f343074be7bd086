export { ZipNavigator } from './ZipNavigator.js';
export { ArchiveView } from './archive/ArchiveView.js';
export { compressionMethodName } from './archive/methods.js';
export { BatchExtractor } from './extract/BatchExtractor.js';
export { drawSeed, shuffleWithSeed } from './extract/shuffle.js';
export type { ExtractionState } from './extract/state.js';
export { ArchiveError } from './errors.js';
export type { ArchiveErrorCode } from './errors.js';
export { resolvePath, toDisplayPath } from './path/resolve.js';
export { isSafeMemberName } from './path/safety.js';
export { extensionOf, normalizeExtensions } from './path/extensions.js';
export { DEFAULT_EXTRACTION_SETTINGS } from './settings.js';
export type {
  BatchExtractorOptions,
  ExtractionPhase,
  ExtractionSettings,
  ExtractionStatus,
  ExtractProgressEvent,
  ExtractWarning,
  ExtractWarningCode,
  FreeSpaceProbe,
  InitializeOptions,
  ListOptions,
  MemberInfo,
  MemberRecord,
  MemberSource,
  OnErrorPolicy,
  ProgressOptions,
  ZipNavigatorOptions
} from './types.js';
