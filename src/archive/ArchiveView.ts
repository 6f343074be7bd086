import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import AdmZip from 'adm-zip';
import { ArchiveError, describeError, systemErrorCode } from '../errors.js';
import { resolvePath, stripTrailingSlash, toDisplayPath } from '../path/resolve.js';
import type { ListOptions, MemberInfo, MemberRecord, MemberSource } from '../types.js';
import { MemberIndex, type IndexedEntry } from './MemberIndex.js';
import { compressionMethodName } from './methods.js';

type PathKind = 'directory' | 'file' | 'missing';

/**
 * Read-only, filesystem-like view of a ZIP archive.
 *
 * Directories are implicit: they exist because member names share a prefix.
 * The view tracks a current directory that every relative path resolves
 * against and that can never leave the archive root.
 */
export class ArchiveView implements MemberSource {
  private zip: AdmZip | null;
  private cursor = '';

  private constructor(
    readonly archivePath: string,
    zip: AdmZip,
    private readonly index: MemberIndex
  ) {
    this.zip = zip;
  }

  static async open(archivePath: string): Promise<ArchiveView> {
    const resolved = path.resolve(archivePath);
    const info = await stat(resolved).catch((err: unknown) => {
      if (systemErrorCode(err) === 'ENOENT') {
        throw new ArchiveError('ARCHIVE_NOT_FOUND', `Archive not found: ${resolved}`, {
          context: { path: resolved },
          cause: err
        });
      }
      throw err;
    });
    if (!info.isFile()) {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `Archive is not a regular file: ${resolved}`, {
        context: { path: resolved }
      });
    }

    const data = await readFile(resolved);
    let zip: AdmZip;
    let entries: IndexedEntry[];
    try {
      zip = new AdmZip(data);
      entries = zip.getEntries().map(toIndexedEntry);
    } catch (err) {
      throw new ArchiveError('ARCHIVE_UNREADABLE', `Cannot read archive ${resolved}: ${describeError(err)}`, {
        context: { path: resolved },
        cause: err
      });
    }
    return new ArchiveView(resolved, zip, new MemberIndex(entries));
  }

  /** Current directory, `/` at the root and `/dir/` below it. */
  pwd(): string {
    this.ensureOpen();
    return toDisplayPath(this.cursor);
  }

  /** Normalized current directory without its trailing slash (`''` for the root). */
  baseDirectory(): string {
    return resolvePath(this.cursor);
  }

  adoptBaseDirectory(base: string): void {
    const resolved = stripTrailingSlash(resolvePath('', base));
    this.cursor = resolved.length === 0 ? '' : `${resolved}/`;
  }

  ls(target?: string | null, options?: ListOptions): string[] {
    this.ensureOpen();
    const rel = resolvePath(this.cursor, target);
    const kind = this.classify(rel);
    if (kind === 'file') {
      throw new ArchiveError('ARCHIVE_NOT_A_DIRECTORY', `Not a directory: ${rel}`, { context: { path: rel } });
    }
    if (kind === 'missing') {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such directory: ${rel}`, { context: { path: rel } });
    }
    return this.index.children(rel, options?.recursive ?? false);
  }

  /** Change the current directory; returns the new `pwd()`. Files are never a valid target. */
  cd(target: string): string {
    this.ensureOpen();
    const rel = resolvePath(this.cursor, target);
    if (rel.length === 0) {
      this.cursor = '';
    } else if (this.index.hasDirectory(rel)) {
      this.cursor = `${stripTrailingSlash(rel)}/`;
    } else if (this.index.hasFile(stripTrailingSlash(rel))) {
      throw new ArchiveError('ARCHIVE_NOT_A_DIRECTORY', `Not a directory: ${rel}`, { context: { path: rel } });
    } else {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such directory: ${rel}`, { context: { path: rel } });
    }
    return this.pwd();
  }

  /** Contents of a file member, decoded as UTF-8 unless another encoding (or `null` for bytes) is given. */
  cat(target: string): string;
  cat(target: string, encoding: BufferEncoding): string;
  cat(target: string, encoding: null): Buffer;
  cat(target: string, encoding: BufferEncoding | null = 'utf8'): string | Buffer {
    const zip = this.ensureOpen();
    const rel = this.requireFile(target);
    const entry = zip.getEntry(rel);
    let data: Buffer | null;
    try {
      data = entry ? zip.readFile(entry) : null;
    } catch (err) {
      throw new ArchiveError('ARCHIVE_UNREADABLE', `Cannot read member ${rel}: ${describeError(err)}`, {
        memberName: rel,
        cause: err
      });
    }
    if (!data) {
      throw new ArchiveError('ARCHIVE_UNREADABLE', `Cannot read member ${rel}`, { memberName: rel });
    }
    return encoding === null ? data : data.toString(encoding);
  }

  exists(target: string): boolean {
    this.ensureOpen();
    return this.classify(resolvePath(this.cursor, target)) !== 'missing';
  }

  isDir(target: string): boolean {
    this.ensureOpen();
    return this.classify(resolvePath(this.cursor, target)) === 'directory';
  }

  isFile(target: string): boolean {
    this.ensureOpen();
    return this.classify(resolvePath(this.cursor, target)) === 'file';
  }

  info(target: string): MemberInfo {
    this.ensureOpen();
    const rel = this.requireFile(target);
    const record = this.index.getFile(rel);
    if (!record) {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such file: ${rel}`, { context: { path: rel } });
    }
    return {
      name: record.name,
      size: record.size,
      compressedSize: record.compressedSize,
      modified: new Date(record.modified.getTime()),
      crc32: record.crc32,
      compression: compressionMethodName(record.method)
    };
  }

  /** Every file below a root-relative base, for building extraction candidates. */
  scanFilesUnder(base: string): string[] {
    this.ensureOpen();
    const rel = resolvePath('', base);
    if (this.classify(rel) !== 'directory') return [];
    return this.index.filesUnder(rel);
  }

  memberRecord(name: string): MemberRecord | undefined {
    return this.index.getFile(name);
  }

  extractMemberTo(name: string, extractDir: string): void {
    const zip = this.ensureOpen();
    const entry = zip.getEntry(name);
    if (!entry) {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such member: ${name}`, { memberName: name });
    }
    if (!zip.extractEntryTo(entry, extractDir, true, true)) {
      throw new ArchiveError('ARCHIVE_EXTRACTION_FAILED', `Archive library refused to write ${name}`, {
        memberName: name
      });
    }
  }

  compressedBytes(name: string): Uint8Array {
    const zip = this.ensureOpen();
    const entry = zip.getEntry(name);
    if (!entry) {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such member: ${name}`, { memberName: name });
    }
    return entry.getCompressedData();
  }

  get isOpen(): boolean {
    return this.zip !== null;
  }

  /** Release the archive; later calls fail with `ARCHIVE_CLOSED`. Closing twice is a no-op. */
  close(): void {
    this.zip = null;
  }

  private requireFile(target: string): string {
    const rel = resolvePath(this.cursor, target);
    const kind = this.classify(rel);
    if (kind === 'directory') {
      throw new ArchiveError('ARCHIVE_IS_A_DIRECTORY', `Is a directory: ${rel}`, { context: { path: rel } });
    }
    if (kind === 'missing') {
      throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such file: ${rel}`, { context: { path: rel } });
    }
    return rel;
  }

  // An exact file name wins; otherwise retry as a directory before giving up.
  private classify(rel: string): PathKind {
    if (rel.length === 0) return 'directory';
    if (rel.endsWith('/')) return this.index.hasDirectory(rel) ? 'directory' : 'missing';
    if (this.index.hasFile(rel)) return 'file';
    if (this.index.hasDirectory(rel)) return 'directory';
    return 'missing';
  }

  private ensureOpen(): AdmZip {
    if (!this.zip) {
      throw new ArchiveError('ARCHIVE_CLOSED', `Archive is closed: ${this.archivePath}`);
    }
    return this.zip;
  }
}

function toIndexedEntry(entry: AdmZip.IZipEntry): IndexedEntry {
  const header = entry.header;
  return {
    name: entry.entryName,
    isDirectory: entry.isDirectory,
    size: header.size,
    compressedSize: header.compressedSize,
    modified: header.time,
    crc32: header.crc >>> 0,
    method: header.method,
    encrypted: (header.flags & 0x1) !== 0
  };
}
