import { ArchiveError } from './errors.js';

/** Tunables shared by the navigator and the batch extractor. */
export type ExtractionSettings = {
  /** File name of the persisted state inside the extraction directory. */
  stateFileName?: string;
  /** Extraction subdirectory used when `initialize` names none. */
  defaultSubdir?: string;
  /** Fractional margin added to a batch's uncompressed size before the space check. */
  spaceMarginRatio?: number;
  /** Fixed headroom, in bytes, required on top of the margin. */
  spaceHeadroomBytes?: number;
  /** Chunk size used when streaming a member to disk in verified mode. */
  copyChunkBytes?: number;
  /** Number of most recent failures reported by `status()`. */
  failureTailLength?: number;
};

const DEFAULT_SETTINGS = Object.freeze({
  stateFileName: '.zip_iter_state.json',
  defaultSubdir: 'extracted',
  spaceMarginRatio: 0.05,
  spaceHeadroomBytes: 16 * 1024 * 1024,
  copyChunkBytes: 1024 * 1024,
  failureTailLength: 10
} satisfies Required<ExtractionSettings>);

export const DEFAULT_EXTRACTION_SETTINGS: Readonly<Required<ExtractionSettings>> = DEFAULT_SETTINGS;

/** Defaults for the arguments of `initialize`. */
export const DEFAULT_INITIALIZE_ARGUMENTS = Object.freeze({
  batchSize: 100,
  reset: false,
  onError: 'skip',
  maxRetries: 1,
  validateCrc: false
} as const);

/** Merge explicit settings over the defaults; fields left undefined keep the default. */
export function resolveSettings(settings?: ExtractionSettings): Required<ExtractionSettings> {
  const out: Required<ExtractionSettings> = { ...DEFAULT_EXTRACTION_SETTINGS };
  if (!settings) return out;
  if (settings.stateFileName !== undefined) out.stateFileName = settings.stateFileName;
  if (settings.defaultSubdir !== undefined) out.defaultSubdir = settings.defaultSubdir;
  if (settings.spaceMarginRatio !== undefined) out.spaceMarginRatio = settings.spaceMarginRatio;
  if (settings.spaceHeadroomBytes !== undefined) out.spaceHeadroomBytes = settings.spaceHeadroomBytes;
  if (settings.copyChunkBytes !== undefined) out.copyChunkBytes = settings.copyChunkBytes;
  if (settings.failureTailLength !== undefined) out.failureTailLength = settings.failureTailLength;
  validateSettings(out);
  return out;
}

function validateSettings(settings: Required<ExtractionSettings>): void {
  if (settings.stateFileName.length === 0 || /[\\/]/.test(settings.stateFileName)) {
    throw invalidSetting('stateFileName', 'must be a plain file name');
  }
  if (settings.defaultSubdir.length === 0) {
    throw invalidSetting('defaultSubdir', 'must not be empty');
  }
  if (!Number.isFinite(settings.spaceMarginRatio) || settings.spaceMarginRatio < 0) {
    throw invalidSetting('spaceMarginRatio', 'must be a finite number >= 0');
  }
  if (!Number.isSafeInteger(settings.spaceHeadroomBytes) || settings.spaceHeadroomBytes < 0) {
    throw invalidSetting('spaceHeadroomBytes', 'must be an integer >= 0');
  }
  if (!Number.isSafeInteger(settings.copyChunkBytes) || settings.copyChunkBytes <= 0) {
    throw invalidSetting('copyChunkBytes', 'must be an integer > 0');
  }
  if (!Number.isSafeInteger(settings.failureTailLength) || settings.failureTailLength < 0) {
    throw invalidSetting('failureTailLength', 'must be an integer >= 0');
  }
}

function invalidSetting(name: string, requirement: string): ArchiveError {
  return new ArchiveError('ARCHIVE_INVALID_ARGUMENT', `${name} ${requirement}`, { context: { setting: name } });
}
