import path from 'node:path';
import { ArchiveError } from '../errors.js';
import { collapseSegments } from './resolve.js';

/**
 * Whether a member name can be written below an extraction directory.
 * Absolute names, drive-letter prefixes, NUL bytes and names that collapse
 * to `..` (or start with `../`) are rejected.
 */
export function isSafeMemberName(name: string): boolean {
  if (name.includes('\u0000')) return false;
  const normalized = name.replace(/\\/g, '/');
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) return false;
  const segments = collapseSegments(normalized);
  if (segments.length === 0) return false;
  return segments[0] !== '..';
}

/**
 * Absolute output path of `memberName` below `extractDir`.
 *
 * @throws ArchiveError `ARCHIVE_UNSAFE_MEMBER` if the name is unsafe or the
 * joined path would leave `extractDir`.
 */
export function memberOutputPath(extractDir: string, memberName: string): string {
  if (!isSafeMemberName(memberName)) {
    throw new ArchiveError('ARCHIVE_UNSAFE_MEMBER', `Unsafe member name: ${memberName}`, { memberName });
  }
  const segments = collapseSegments(memberName.replace(/\\/g, '/'));
  const baseResolved = path.resolve(extractDir);
  const resolved = path.resolve(baseResolved, ...segments);
  if (!resolved.startsWith(baseResolved + path.sep)) {
    throw new ArchiveError('ARCHIVE_UNSAFE_MEMBER', `Member path escapes the extraction directory: ${memberName}`, {
      memberName
    });
  }
  return resolved;
}
