import { ArchiveView } from './archive/ArchiveView.js';
import { ArchiveError } from './errors.js';
import { BatchExtractor } from './extract/BatchExtractor.js';
import type {
  ExtractionPhase,
  ExtractionStatus,
  ExtractWarning,
  InitializeOptions,
  ListOptions,
  MemberInfo,
  ZipNavigatorOptions
} from './types.js';

/**
 * A ZIP archive opened for browsing and resumable batch extraction.
 *
 * Navigation and extraction share one cursor: `initialize` picks its
 * candidates below the current `pwd()`. Release the archive with `close()`
 * or `await using`.
 *
 * @example
 * await using nav = await ZipNavigator.open('dataset.zip');
 * nav.cd('payload');
 * await nav.initialize({ outputDir: 'out', batchSize: 50, extensions: ['.csv'] });
 * for await (const paths of nav) {
 *   await ingest(paths);
 * }
 */
export class ZipNavigator implements AsyncIterable<string[]> {
  private constructor(
    private readonly view: ArchiveView,
    private readonly extractor: BatchExtractor
  ) {}

  static async open(archivePath: string, options: ZipNavigatorOptions = {}): Promise<ZipNavigator> {
    const view = await ArchiveView.open(archivePath);
    try {
      return new ZipNavigator(view, new BatchExtractor(view, options));
    } catch (err) {
      view.close();
      throw err;
    }
  }

  get archivePath(): string {
    return this.view.archivePath;
  }

  get phase(): 'uninitialized' | ExtractionPhase {
    return this.extractor.phase;
  }

  pwd(): string {
    return this.view.pwd();
  }

  ls(target?: string | null, options?: ListOptions): string[] {
    return this.view.ls(target, options);
  }

  cd(target: string): string {
    return this.view.cd(target);
  }

  cat(target: string): string;
  cat(target: string, encoding: BufferEncoding): string;
  cat(target: string, encoding: null): Buffer;
  cat(target: string, encoding: BufferEncoding | null = 'utf8'): string | Buffer {
    return encoding === null ? this.view.cat(target, null) : this.view.cat(target, encoding);
  }

  exists(target: string): boolean {
    return this.view.exists(target);
  }

  isDir(target: string): boolean {
    return this.view.isDir(target);
  }

  isFile(target: string): boolean {
    return this.view.isFile(target);
  }

  info(target: string): MemberInfo {
    return this.view.info(target);
  }

  async initialize(options: InitializeOptions): Promise<void> {
    this.ensureOpen();
    await this.extractor.initialize(options);
  }

  hasNext(): boolean {
    this.ensureOpen();
    return this.extractor.hasNext();
  }

  async next(): Promise<IteratorResult<string[], undefined>> {
    this.ensureOpen();
    return this.extractor.next();
  }

  [Symbol.asyncIterator](): AsyncIterator<string[], undefined> {
    this.ensureOpen();
    return { next: () => this.next() };
  }

  status(): ExtractionStatus {
    return this.extractor.status();
  }

  async reset(): Promise<void> {
    await this.extractor.reset();
  }

  async resume(outputDir: string, subdir?: string): Promise<void> {
    this.ensureOpen();
    await this.extractor.resume(outputDir, subdir);
  }

  warnings(): ExtractWarning[] {
    return this.extractor.warnings();
  }

  get closed(): boolean {
    return !this.view.isOpen;
  }

  async close(): Promise<void> {
    this.view.close();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }

  private ensureOpen(): void {
    if (!this.view.isOpen) {
      throw new ArchiveError('ARCHIVE_CLOSED', `Archive is closed: ${this.view.archivePath}`);
    }
  }
}
