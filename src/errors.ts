import { REPORT_SCHEMA_VERSION } from './reportSchema.js';

/** Stable error codes for navigation and extraction failures. */
export type ArchiveErrorCode =
  | 'ARCHIVE_INVALID_ARGUMENT'
  | 'ARCHIVE_NOT_FOUND'
  | 'ARCHIVE_NOT_A_DIRECTORY'
  | 'ARCHIVE_IS_A_DIRECTORY'
  | 'ARCHIVE_STATE_CONFLICT'
  | 'ARCHIVE_STATE_INVALID'
  | 'ARCHIVE_NOT_INITIALIZED'
  | 'ARCHIVE_INSUFFICIENT_SPACE'
  | 'ARCHIVE_UNSAFE_MEMBER'
  | 'ARCHIVE_EXTRACTION_FAILED'
  | 'ARCHIVE_BAD_CRC'
  | 'ARCHIVE_UNSUPPORTED_FEATURE'
  | 'ARCHIVE_UNREADABLE'
  | 'ARCHIVE_CLOSED';

const SERIALIZED_FIELDS: readonly string[] = ['schemaVersion', 'name', 'code', 'message', 'hint', 'context', 'memberName'];

/** Error thrown by the navigator, the view and the batch extractor. */
export class ArchiveError extends Error {
  /** Machine-readable error code. */
  readonly code: ArchiveErrorCode;
  /** Archive member related to the error, if any. */
  readonly memberName?: string | undefined;
  /** Underlying cause, if any. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: ArchiveErrorCode,
    message: string,
    options?: {
      memberName?: string | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ArchiveError';
    this.code = code;
    this.memberName = options?.memberName;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ArchiveErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    memberName?: string;
  } {
    const context: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context ?? {})) {
      // Keys that would shadow a top-level field are dropped.
      if (SERIALIZED_FIELDS.includes(key)) continue;
      context[key] = value;
    }
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: hintFor(this.code, this.message),
      context,
      ...(this.memberName !== undefined ? { memberName: this.memberName } : {})
    };
  }
}

function hintFor(code: ArchiveErrorCode, message: string): string {
  switch (code) {
    case 'ARCHIVE_STATE_CONFLICT':
      return 'Initialize with reset enabled or choose another extraction subdirectory.';
    case 'ARCHIVE_INSUFFICIENT_SPACE':
      return 'Free disk space or lower the batch size.';
    case 'ARCHIVE_NOT_INITIALIZED':
      return 'Call initialize() or resume() before requesting batches.';
    case 'ARCHIVE_CLOSED':
      return 'Open the archive again.';
    default:
      return message;
  }
}

/** Node.js system error code of `err`, if it carries one. */
export function systemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
