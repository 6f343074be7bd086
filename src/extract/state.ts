import { readFile, rename, writeFile } from 'node:fs/promises';
import { ArchiveError, describeError, systemErrorCode } from '../errors.js';
import { normalizeExtensions } from '../path/extensions.js';
import type { OnErrorPolicy } from '../types.js';

/**
 * The persisted unit of an extraction run. Key names are the on-disk
 * schema and must stay stable.
 */
export type ExtractionState = {
  archive_identity: string;
  base_directory: string;
  order: string[];
  cursor: number;
  batch_size: number;
  seed: number;
  extension_filter: string[];
  failed: string[];
  on_error: OnErrorPolicy;
  max_retries: number;
  validate_crc: boolean;
};

/** Suffix of the sibling file a state is written to before being renamed into place. */
export const STATE_TEMP_SUFFIX = '.tmp';

export function isOnErrorPolicy(value: unknown): value is OnErrorPolicy {
  return value === 'skip' || value === 'abort';
}

/** Write `state` next to `statePath` and rename it over the canonical file. */
export async function saveState(statePath: string, state: ExtractionState): Promise<void> {
  const tempPath = `${statePath}${STATE_TEMP_SUFFIX}`;
  await writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
  await rename(tempPath, statePath);
}

/**
 * Read and validate a state file.
 *
 * @throws ArchiveError `ARCHIVE_NOT_FOUND` when the file is absent,
 * `ARCHIVE_STATE_INVALID` when it is not a well-formed state.
 */
export async function loadState(statePath: string): Promise<ExtractionState> {
  let text: string;
  try {
    text = await readFile(statePath, 'utf8');
  } catch (err) {
    if (systemErrorCode(err) === 'ENOENT') {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No extraction state at ${statePath}`, {
        context: { stateFile: statePath },
        cause: err
      });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw invalidState(statePath, `not valid JSON (${describeError(err)})`, err);
  }
  return parseState(parsed, statePath);
}

export function parseState(value: unknown, source = 'state'): ExtractionState {
  if (!isRecord(value)) throw invalidState(source, 'not a JSON object');

  const archiveIdentity = value['archive_identity'];
  const baseDirectory = value['base_directory'];
  const order = value['order'];
  const cursor = value['cursor'];
  const batchSize = value['batch_size'];
  const seed = value['seed'];
  const extensionFilter = value['extension_filter'];
  const failed = value['failed'];
  const onError = value['on_error'];
  const maxRetries = value['max_retries'];
  const validateCrc = value['validate_crc'];

  if (typeof archiveIdentity !== 'string' || archiveIdentity.length === 0) {
    throw invalidState(source, 'archive_identity must be a non-empty string');
  }
  if (typeof baseDirectory !== 'string') throw invalidState(source, 'base_directory must be a string');
  if (!isStringArray(order)) throw invalidState(source, 'order must be an array of strings');
  if (!isNonNegativeInteger(cursor) || cursor > order.length) {
    throw invalidState(source, `cursor must be an integer between 0 and ${order.length}`);
  }
  if (!isNonNegativeInteger(batchSize) || batchSize === 0) {
    throw invalidState(source, 'batch_size must be a positive integer');
  }
  if (typeof seed !== 'number' || !Number.isSafeInteger(seed)) {
    throw invalidState(source, 'seed must be a safe integer');
  }
  if (!isStringArray(extensionFilter)) throw invalidState(source, 'extension_filter must be an array of strings');
  if (!isStringArray(failed)) throw invalidState(source, 'failed must be an array of strings');
  if (!isOnErrorPolicy(onError)) throw invalidState(source, 'on_error must be "skip" or "abort"');
  if (!isNonNegativeInteger(maxRetries)) throw invalidState(source, 'max_retries must be an integer >= 0');
  if (typeof validateCrc !== 'boolean') throw invalidState(source, 'validate_crc must be a boolean');

  return {
    archive_identity: archiveIdentity,
    base_directory: baseDirectory,
    order: [...order],
    cursor,
    batch_size: batchSize,
    seed,
    extension_filter: normalizeExtensions(extensionFilter) ?? [],
    failed: [...new Set(failed)],
    on_error: onError,
    max_retries: maxRetries,
    validate_crc: validateCrc
  };
}

function invalidState(source: string, reason: string, cause?: unknown): ArchiveError {
  return new ArchiveError('ARCHIVE_STATE_INVALID', `Invalid extraction state in ${source}: ${reason}`, {
    context: { stateFile: source },
    cause
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}
