import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { ArchiveError, describeError } from '../errors.js';
import { extensionOf, normalizeExtensions, sameExtensionFilter } from '../path/extensions.js';
import { collapseSegments } from '../path/resolve.js';
import { isSafeMemberName, memberOutputPath } from '../path/safety.js';
import { DEFAULT_INITIALIZE_ARGUMENTS, resolveSettings, type ExtractionSettings } from '../settings.js';
import { createProgressTracker } from '../streams/progress.js';
import type {
  BatchExtractorOptions,
  ExtractionPhase,
  ExtractionStatus,
  ExtractWarning,
  FreeSpaceProbe,
  InitializeOptions,
  MemberSource,
  OnErrorPolicy
} from '../types.js';
import { clearDirectory } from './clear.js';
import { assertFreeSpace, spaceRequirement, statfsFreeSpace } from './preflight.js';
import { drawSeed, shuffleWithSeed } from './shuffle.js';
import { STATE_TEMP_SUFFIX, isOnErrorPolicy, loadState, saveState, type ExtractionState } from './state.js';
import { discardPartialOutput, extractRaw, extractVerified } from './writeMember.js';

/** Live run: the persisted state plus where it lives on disk. */
type ActiveRun = {
  state: ExtractionState;
  extractDir: string;
  statePath: string;
};

type InitializeArguments = {
  outputDir: string;
  batchSize: number;
  subdir: string;
  reset: boolean;
  seed: number | undefined;
  extensions: string[] | null;
  onError: OnErrorPolicy;
  maxRetries: number;
  validateCrc: boolean;
};

type AttemptOutcome = { ok: true; path: string } | { ok: false; error: unknown; attempts: number };

/**
 * Resumable, batched extraction over the files below the navigation cursor.
 *
 * The extraction directory holds at most one batch at a time. After every
 * completed batch the whole state is rewritten atomically, so a new process
 * can pick up at the next batch with `resume()`. Calls that change the run
 * (`initialize`, `next`, `reset`, `resume`) are queued and run one at a time.
 * One extractor owns an extraction directory; other processes sharing it are
 * not guarded against.
 */
export class BatchExtractor implements AsyncIterableIterator<string[]> {
  private run: ActiveRun | null = null;
  private readonly settings: Required<ExtractionSettings>;
  private readonly freeSpace: FreeSpaceProbe;
  private readonly recorded: ExtractWarning[] = [];
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly source: MemberSource,
    private readonly options: BatchExtractorOptions = {}
  ) {
    this.settings = resolveSettings(options);
    this.freeSpace = options.freeSpace ?? statfsFreeSpace;
  }

  get phase(): 'uninitialized' | ExtractionPhase {
    if (!this.run) return 'uninitialized';
    return this.run.state.cursor >= this.run.state.order.length ? 'exhausted' : 'active';
  }

  /**
   * Start a run, or pick up the compatible run already persisted in the
   * extraction directory. A persisted run keeps its own batch size and
   * failure policy whatever the arguments say.
   */
  initialize(options: InitializeOptions): Promise<void> {
    return this.exclusive(() => this.startRun(options));
  }

  private async startRun(options: InitializeOptions): Promise<void> {
    const args = this.validateInitialize(options);
    const { extractDir, statePath } = this.locate(args.outputDir, args.subdir);

    if (args.reset) await rm(extractDir, { recursive: true, force: true });
    await mkdir(extractDir, { recursive: true });

    const base = this.source.baseDirectory();
    const existing = args.reset ? null : await loadExistingState(statePath);
    let state: ExtractionState;
    if (existing) {
      this.assertSameArchive(existing, statePath);
      if (existing.base_directory !== base) {
        throw new ArchiveError(
          'ARCHIVE_STATE_CONFLICT',
          `State in ${statePath} was started from /${existing.base_directory}, not /${base}`,
          { context: { stateFile: statePath, expected: existing.base_directory, actual: base } }
        );
      }
      const persistedFilter = existing.extension_filter.length > 0 ? existing.extension_filter : null;
      if (!sameExtensionFilter(persistedFilter, args.extensions)) {
        throw new ArchiveError('ARCHIVE_STATE_CONFLICT', `State in ${statePath} uses a different extension filter`, {
          context: {
            stateFile: statePath,
            expected: existing.extension_filter.join(','),
            actual: (args.extensions ?? []).join(',')
          }
        });
      }
      state = existing;
    } else {
      state = this.freshState(base, extractDir, args);
      await saveState(statePath, state);
    }
    this.run = { state, extractDir, statePath };
  }

  hasNext(): boolean {
    const run = this.requireRun();
    return run.state.cursor < run.state.order.length;
  }

  /**
   * Extract the next batch and return the absolute paths written.
   * Members that fail under `skip` are left out of the result and recorded
   * in the persisted failure list.
   *
   * @throws ArchiveError `ARCHIVE_INSUFFICIENT_SPACE` before anything is written,
   * `ARCHIVE_UNSAFE_MEMBER` or `ARCHIVE_EXTRACTION_FAILED` under `abort`.
   */
  next(): Promise<IteratorResult<string[], undefined>> {
    return this.exclusive(() => this.extractBatch());
  }

  private async extractBatch(): Promise<IteratorResult<string[], undefined>> {
    const run = this.requireRun();
    const { state } = run;
    if (state.cursor >= state.order.length) return { done: true, value: undefined };

    const end = Math.min(state.cursor + state.batch_size, state.order.length);
    const batch = state.order.slice(state.cursor, end);

    await clearDirectory(run.extractDir, this.stateFiles());
    const payload = batch.reduce((sum, name) => sum + (this.source.memberRecord(name)?.size ?? 0), 0);
    await assertFreeSpace(
      run.extractDir,
      spaceRequirement(payload, this.settings.spaceMarginRatio, this.settings.spaceHeadroomBytes),
      this.freeSpace
    );

    const tracker = createProgressTracker(this.options, batch.length);
    const extracted: string[] = [];
    const failedNow: string[] = [];
    for (const member of batch) {
      const unsafe = this.unsafeReason(run.extractDir, member);
      if (unsafe !== undefined) {
        const error = new ArchiveError('ARCHIVE_UNSAFE_MEMBER', unsafe, { memberName: member });
        if (state.on_error === 'abort') throw error;
        failedNow.push(member);
        this.warn({ code: 'MEMBER_UNSAFE', message: error.message, memberName: member });
        tracker?.update(member, 0);
        continue;
      }

      const outcome = await this.extractWithRetries(run, member);
      if (outcome.ok) {
        extracted.push(outcome.path);
        tracker?.update(member, this.source.memberRecord(member)?.size ?? 0);
        continue;
      }
      if (state.on_error === 'abort') {
        throw new ArchiveError('ARCHIVE_EXTRACTION_FAILED', `Error extracting ${member}: ${describeError(outcome.error)}`, {
          memberName: member,
          context: { attempts: String(outcome.attempts) },
          cause: outcome.error
        });
      }
      failedNow.push(member);
      this.warn({
        code: 'MEMBER_SKIPPED',
        message: `Skipped ${member} after ${outcome.attempts} attempt(s): ${describeError(outcome.error)}`,
        memberName: member
      });
      tracker?.update(member, 0);
    }
    tracker?.flush();

    const failed = [...state.failed];
    for (const member of failedNow) {
      if (!failed.includes(member)) failed.push(member);
    }
    const nextState: ExtractionState = { ...state, cursor: end, failed };
    await saveState(run.statePath, nextState);
    run.state = nextState;
    return { done: false, value: extracted };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /** Snapshot of the current run, computed on each call. */
  status(): ExtractionStatus {
    if (!this.run) return { active: false };
    const { state, extractDir, statePath } = this.run;
    const tail = this.settings.failureTailLength;
    return {
      active: true,
      phase: state.cursor >= state.order.length ? 'exhausted' : 'active',
      archive: state.archive_identity,
      baseDirectory: state.base_directory.length === 0 ? '/' : state.base_directory,
      batchSize: state.batch_size,
      seed: state.seed,
      extensionFilter: state.extension_filter.length > 0 ? [...state.extension_filter] : null,
      totalFiles: state.order.length,
      extractedSoFar: state.cursor - state.failed.length,
      remaining: state.order.length - state.cursor,
      failedSoFar: state.failed.length,
      recentFailures: tail === 0 ? [] : state.failed.slice(-tail),
      extractDir,
      stateFile: statePath,
      onError: state.on_error,
      maxRetries: state.max_retries,
      validateCrc: state.validate_crc
    };
  }

  /** Delete the extracted files and the state file, then forget the run. */
  reset(): Promise<void> {
    return this.exclusive(() => this.discardRun());
  }

  private async discardRun(): Promise<void> {
    const run = this.run;
    this.run = null;
    if (!run) return;
    await clearDirectory(run.extractDir);
    await rm(run.statePath, { force: true });
    await rm(`${run.statePath}${STATE_TEMP_SUFFIX}`, { force: true });
  }

  /**
   * Continue a persisted run without a prior `initialize` in this process.
   * The navigation cursor moves to the run's base directory if needed.
   */
  resume(outputDir: string, subdir?: string): Promise<void> {
    return this.exclusive(() => this.adoptRun(outputDir, subdir));
  }

  private async adoptRun(outputDir: string, subdir: string | undefined): Promise<void> {
    if (typeof outputDir !== 'string' || outputDir.length === 0) {
      throw invalidArgument('outputDir', 'must be a non-empty path');
    }
    const { extractDir, statePath } = this.locate(outputDir, this.checkSubdir(subdir ?? this.settings.defaultSubdir));
    const state = await loadState(statePath);
    this.assertSameArchive(state, statePath);

    const base = this.source.baseDirectory();
    if (base !== state.base_directory) {
      this.source.adoptBaseDirectory(state.base_directory);
      this.warn({
        code: 'BASE_ADOPTED',
        message: `Navigation moved from /${base} to the run's base /${state.base_directory}`
      });
    }
    this.run = { state, extractDir, statePath };
  }

  /** Warnings recorded since construction, oldest first. */
  warnings(): ExtractWarning[] {
    return [...this.recorded];
  }

  private freshState(base: string, extractDir: string, args: InitializeArguments): ExtractionState {
    const candidates: string[] = [];
    for (const name of this.source.scanFilesUnder(base)) {
      const unsafe = this.unsafeReason(extractDir, name);
      if (unsafe !== undefined) {
        this.warn({ code: 'CANDIDATE_UNSAFE', message: `Ignoring member. ${unsafe}`, memberName: name });
        continue;
      }
      if (args.extensions && !args.extensions.includes(extensionOf(name))) continue;
      candidates.push(name);
    }
    if (candidates.length === 0) {
      const filter = args.extensions ? ` matching ${args.extensions.join(', ')}` : '';
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No files${filter} under /${base}`, {
        context: { baseDirectory: base, extensions: (args.extensions ?? []).join(',') }
      });
    }

    const seed = args.seed ?? drawSeed();
    return {
      archive_identity: this.source.archivePath,
      base_directory: base,
      order: shuffleWithSeed(candidates, seed),
      cursor: 0,
      batch_size: args.batchSize,
      seed,
      extension_filter: args.extensions ?? [],
      failed: [],
      on_error: args.onError,
      max_retries: args.maxRetries,
      validate_crc: args.validateCrc
    };
  }

  private async extractWithRetries(run: ActiveRun, member: string): Promise<AttemptOutcome> {
    const attempts = run.state.max_retries + 1;
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const written = run.state.validate_crc
          ? await extractVerified(this.source, member, run.extractDir, this.settings.copyChunkBytes)
          : await extractRaw(this.source, member, run.extractDir);
        return { ok: true, path: written };
      } catch (err) {
        lastError = err;
        await discardPartialOutput(run.extractDir, member);
        if (attempt < attempts) {
          this.warn({
            code: 'MEMBER_RETRY',
            message: `Attempt ${attempt}/${attempts} failed for ${member}: ${describeError(err)}`,
            memberName: member
          });
        }
      }
    }
    return { ok: false, error: lastError, attempts };
  }

  private validateInitialize(options: InitializeOptions): InitializeArguments {
    const outputDir = options.outputDir;
    if (typeof outputDir !== 'string' || outputDir.length === 0) {
      throw invalidArgument('outputDir', 'must be a non-empty path');
    }
    const batchSize = options.batchSize ?? DEFAULT_INITIALIZE_ARGUMENTS.batchSize;
    if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
      throw invalidArgument('batchSize', `must be a positive integer, got ${String(batchSize)}`);
    }
    const onError: unknown = options.onError ?? DEFAULT_INITIALIZE_ARGUMENTS.onError;
    if (!isOnErrorPolicy(onError)) {
      throw invalidArgument('onError', `must be "skip" or "abort", got ${String(onError)}`);
    }
    const maxRetries = options.maxRetries ?? DEFAULT_INITIALIZE_ARGUMENTS.maxRetries;
    if (!Number.isSafeInteger(maxRetries) || maxRetries < 0) {
      throw invalidArgument('maxRetries', `must be an integer >= 0, got ${String(maxRetries)}`);
    }
    const extensions: unknown = options.extensions;
    if (
      extensions !== undefined &&
      extensions !== null &&
      !(Array.isArray(extensions) && extensions.every((ext: unknown) => typeof ext === 'string'))
    ) {
      throw invalidArgument('extensions', `must be an array of strings, got ${JSON.stringify(extensions)}`);
    }
    if (options.seed !== undefined && !Number.isSafeInteger(options.seed)) {
      throw invalidArgument('seed', `must be a safe integer, got ${String(options.seed)}`);
    }
    return {
      outputDir,
      batchSize,
      subdir: this.checkSubdir(options.subdir ?? this.settings.defaultSubdir),
      reset: options.reset ?? DEFAULT_INITIALIZE_ARGUMENTS.reset,
      seed: options.seed,
      extensions: normalizeExtensions(options.extensions),
      onError,
      maxRetries,
      validateCrc: options.validateCrc ?? DEFAULT_INITIALIZE_ARGUMENTS.validateCrc
    };
  }

  private checkSubdir(subdir: string): string {
    const normalized = subdir.replace(/\\/g, '/');
    const segments = collapseSegments(normalized);
    if (path.isAbsolute(subdir) || normalized.startsWith('/') || segments.length === 0 || segments[0] === '..') {
      throw invalidArgument('subdir', `must be a relative path inside outputDir, got ${JSON.stringify(subdir)}`);
    }
    return segments.join('/');
  }

  private locate(outputDir: string, subdir: string): { extractDir: string; statePath: string } {
    const extractDir = path.resolve(outputDir, subdir);
    return { extractDir, statePath: path.join(extractDir, this.settings.stateFileName) };
  }

  private assertSameArchive(state: ExtractionState, statePath: string): void {
    if (state.archive_identity === this.source.archivePath) return;
    throw new ArchiveError(
      'ARCHIVE_STATE_CONFLICT',
      `State in ${statePath} belongs to ${state.archive_identity}, not ${this.source.archivePath}`,
      { context: { stateFile: statePath, expected: state.archive_identity, actual: this.source.archivePath } }
    );
  }

  /** Why `name` cannot be written below `extractDir`, or undefined when it can. */
  private unsafeReason(extractDir: string, name: string): string | undefined {
    if (!isSafeMemberName(name)) return `Unsafe member name: ${name}`;
    const target = memberOutputPath(extractDir, name);
    for (const reserved of this.stateFiles()) {
      const reservedPath = path.join(extractDir, reserved);
      if (target === reservedPath || target.startsWith(reservedPath + path.sep)) {
        return `Member would overwrite the extraction state: ${name}`;
      }
    }
    return undefined;
  }

  /** Run `operation` once every earlier queued call has settled. */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.pending.then(operation);
    // Rejections reach the caller through `result`; the queue only tracks settlement.
    this.pending = result.then(settled, settled);
    return result;
  }

  private stateFiles(): ReadonlySet<string> {
    const name = this.settings.stateFileName;
    return new Set([name, `${name}${STATE_TEMP_SUFFIX}`]);
  }

  private requireRun(): ActiveRun {
    if (!this.run) {
      throw new ArchiveError('ARCHIVE_NOT_INITIALIZED', 'No active extraction run');
    }
    return this.run;
  }

  private warn(warning: ExtractWarning): void {
    this.recorded.push(warning);
    this.options.onWarning?.(warning);
  }
}

function settled(): undefined {
  return undefined;
}

async function loadExistingState(statePath: string): Promise<ExtractionState | null> {
  try {
    return await loadState(statePath);
  } catch (err) {
    if (err instanceof ArchiveError && err.code === 'ARCHIVE_NOT_FOUND') return null;
    throw err;
  }
}

function invalidArgument(name: string, requirement: string): ArchiveError {
  return new ArchiveError('ARCHIVE_INVALID_ARGUMENT', `${name} ${requirement}`, { context: { argument: name } });
}
