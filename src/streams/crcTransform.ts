import { Transform, type TransformCallback } from 'node:stream';
import { Crc32 } from '../crc32.js';
import { ArchiveError } from '../errors.js';

export interface CrcCheckResult {
  crc32: number;
  bytes: number;
}

export interface CrcCheckOptions {
  memberName: string;
  expectedCrc: number;
  expectedSize: number;
}

/**
 * Pass-through transform that checksums everything it forwards and fails
 * the pipeline at end of stream when CRC or length disagree with the
 * central directory.
 */
export function createCrcCheck(result: CrcCheckResult, options: CrcCheckOptions): Transform {
  const crc = new Crc32();
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      crc.update(chunk);
      result.bytes += chunk.length;
      callback(null, chunk);
    },
    flush(callback: TransformCallback) {
      result.crc32 = crc.digest();
      if (result.bytes !== options.expectedSize) {
        callback(
          new ArchiveError('ARCHIVE_BAD_CRC', `Uncompressed size mismatch for ${options.memberName}`, {
            memberName: options.memberName,
            context: { expectedSize: String(options.expectedSize), actualSize: String(result.bytes) }
          })
        );
        return;
      }
      if (result.crc32 !== options.expectedCrc) {
        callback(
          new ArchiveError('ARCHIVE_BAD_CRC', `CRC32 mismatch for ${options.memberName}`, {
            memberName: options.memberName,
            context: { expectedCrc: hex32(options.expectedCrc), actualCrc: hex32(result.crc32) }
          })
        );
        return;
      }
      callback();
    }
  });
}

function hex32(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}
