import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { Readable, type Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createInflateRaw } from 'node:zlib';
import { METHOD_DEFLATED, METHOD_STORED, compressionMethodName } from '../archive/methods.js';
import { ArchiveError } from '../errors.js';
import { memberOutputPath } from '../path/safety.js';
import { createCrcCheck, type CrcCheckResult } from '../streams/crcTransform.js';
import type { MemberRecord, MemberSource } from '../types.js';

/** Whole-member extraction delegated to the archive library. */
export async function extractRaw(source: MemberSource, memberName: string, extractDir: string): Promise<string> {
  const target = memberOutputPath(extractDir, memberName);
  await mkdir(path.dirname(target), { recursive: true });
  source.extractMemberTo(memberName, extractDir);
  return target;
}

/**
 * Stream a member to disk chunk by chunk through the decompressor and a
 * CRC/length check; a mismatch rejects after the bytes were written.
 */
export async function extractVerified(
  source: MemberSource,
  memberName: string,
  extractDir: string,
  chunkBytes: number
): Promise<string> {
  const record = source.memberRecord(memberName);
  if (!record) {
    throw new ArchiveError('ARCHIVE_NOT_FOUND', `No such member: ${memberName}`, { memberName });
  }
  if (record.encrypted) {
    throw new ArchiveError('ARCHIVE_UNSUPPORTED_FEATURE', `Encrypted member cannot be verified: ${memberName}`, {
      memberName
    });
  }
  const decoders = decodersFor(record);
  const target = memberOutputPath(extractDir, memberName);
  await mkdir(path.dirname(target), { recursive: true });

  const compressed = source.compressedBytes(memberName);
  const result: CrcCheckResult = { crc32: 0, bytes: 0 };
  await pipeline([
    Readable.from(chunksOf(compressed, chunkBytes)),
    ...decoders,
    createCrcCheck(result, { memberName, expectedCrc: record.crc32, expectedSize: record.size }),
    createWriteStream(target)
  ]);
  return target;
}

/** Remove whatever a failed attempt left behind for `memberName`. */
export async function discardPartialOutput(extractDir: string, memberName: string): Promise<void> {
  await rm(memberOutputPath(extractDir, memberName), { force: true });
}

function decodersFor(record: MemberRecord): Transform[] {
  if (record.method === METHOD_STORED) return [];
  if (record.method === METHOD_DEFLATED) return [createInflateRaw()];
  throw new ArchiveError(
    'ARCHIVE_UNSUPPORTED_FEATURE',
    `Compression method ${compressionMethodName(record.method)} cannot be verified: ${record.name}`,
    { memberName: record.name, context: { method: String(record.method) } }
  );
}

function* chunksOf(bytes: Uint8Array, size: number): Generator<Uint8Array> {
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}
