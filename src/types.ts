import type { ExtractionSettings } from './settings.js';
export type { ExtractionSettings } from './settings.js';

/** Metadata of one file member, as read from the archive's central directory. */
export type MemberRecord = {
  name: string;
  size: number;
  compressedSize: number;
  modified: Date;
  crc32: number;
  method: number;
  encrypted: boolean;
};

/** Result of `info()`. */
export type MemberInfo = {
  name: string;
  size: number;
  compressedSize: number;
  modified: Date;
  crc32: number;
  /** `STORED`, `DEFLATED`, ... or the decimal method id when unknown. */
  compression: string;
};

export type ListOptions = {
  recursive?: boolean;
};

/** What a batch does with a member that cannot be extracted. */
export type OnErrorPolicy = 'skip' | 'abort';

/** Arguments of `initialize`. */
export type InitializeOptions = {
  outputDir: string;
  batchSize?: number;
  subdir?: string;
  reset?: boolean;
  seed?: number;
  /** Extensions to keep, such as `['.csv']`; `null` or empty keeps every file. */
  extensions?: readonly string[] | null;
  onError?: OnErrorPolicy;
  maxRetries?: number;
  validateCrc?: boolean;
};

export type ExtractionPhase = 'active' | 'exhausted';

/** Snapshot returned by `status()`. */
export type ExtractionStatus =
  | { active: false }
  | {
      active: true;
      phase: ExtractionPhase;
      archive: string;
      baseDirectory: string;
      batchSize: number;
      seed: number;
      extensionFilter: string[] | null;
      totalFiles: number;
      /**
       * Members consumed so far minus those recorded as failed. Batches that
       * skip members therefore advance this by less than their size.
       */
      extractedSoFar: number;
      remaining: number;
      failedSoFar: number;
      recentFailures: string[];
      extractDir: string;
      stateFile: string;
      onError: OnErrorPolicy;
      maxRetries: number;
      validateCrc: boolean;
    };

/** Progress event emitted while a batch is extracted. */
export type ExtractProgressEvent = {
  kind: 'extract';
  memberName?: string;
  membersDone: number;
  membersTotal: number;
  bytesOut: bigint;
};

export type ExtractWarningCode =
  | 'MEMBER_RETRY'
  | 'MEMBER_SKIPPED'
  | 'MEMBER_UNSAFE'
  | 'CANDIDATE_UNSAFE'
  | 'BASE_ADOPTED';

/** Non-fatal event recorded by the extractor. */
export type ExtractWarning = {
  code: ExtractWarningCode;
  message: string;
  memberName?: string;
};

/** Progress callback and throttling options. */
export type ProgressOptions = {
  onProgress?: (event: ExtractProgressEvent) => void;
  progressIntervalMs?: number;
  progressChunkInterval?: number;
};

/** Free bytes available to the directory at `dir`. */
export type FreeSpaceProbe = (dir: string) => Promise<number>;

/** Options of a `BatchExtractor`. */
export type BatchExtractorOptions = ProgressOptions &
  ExtractionSettings & {
    onWarning?: (warning: ExtractWarning) => void;
    freeSpace?: FreeSpaceProbe;
  };

/** Options of `ZipNavigator.open`. */
export type ZipNavigatorOptions = BatchExtractorOptions;

/** Archive access the batch extractor needs. */
export interface MemberSource {
  /** Absolute path of the archive. */
  readonly archivePath: string;
  /** Root-relative base of the navigation cursor (`''` for the root). */
  baseDirectory(): string;
  /** Move the navigation cursor to a persisted base directory. */
  adoptBaseDirectory(base: string): void;
  /** Every file member below a resolved base; empty when the base is not a directory. */
  scanFilesUnder(base: string): string[];
  memberRecord(name: string): MemberRecord | undefined;
  /** Let the archive library write `name` below `extractDir`, keeping its path. */
  extractMemberTo(name: string, extractDir: string): void;
  /** Raw (still compressed) bytes of `name`. */
  compressedBytes(name: string): Uint8Array;
}
