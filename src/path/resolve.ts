import { ArchiveError } from '../errors.js';

/**
 * Lexically collapse a slash-separated path into segments.
 * `.` and empty segments vanish; `..` pops the previous segment or, with
 * nothing left to pop, stays as a leading `..`.
 */
export function collapseSegments(path: string): string[] {
  const segments: string[] = [];
  for (const part of path.split('/')) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      const last = segments[segments.length - 1];
      if (last !== undefined && last !== '..') {
        segments.pop();
      } else {
        segments.push('..');
      }
      continue;
    }
    segments.push(part);
  }
  return segments;
}

/**
 * Resolve a user-supplied path against the navigation cursor.
 *
 * The result is relative to the archive root: `''` is the root itself,
 * anything else is a run of non-empty segments. A trailing `/` on the input
 * survives on a non-root result so callers can tell "the directory" from
 * "a file of that name".
 *
 * @throws ArchiveError `ARCHIVE_INVALID_ARGUMENT` when the path climbs above the root.
 */
export function resolvePath(currentBase: string, input?: string | null): string {
  const raw = input ? input.replace(/\\/g, '/') : '';
  const hadTrailingSlash = raw.endsWith('/');

  let joined: string;
  if (raw.length === 0) {
    joined = currentBase;
  } else if (raw.startsWith('/')) {
    joined = raw;
  } else {
    joined = `${currentBase}/${raw}`;
  }

  const segments = collapseSegments(joined);
  if (segments[0] === '..') {
    throw new ArchiveError('ARCHIVE_INVALID_ARGUMENT', `Path escapes the archive root: ${input ?? ''}`, {
      context: { path: input ?? '' }
    });
  }

  const canonical = segments.join('/');
  return hadTrailingSlash && canonical.length > 0 ? `${canonical}/` : canonical;
}

/** Drop the directory marker from a resolved path. */
export function stripTrailingSlash(path: string): string {
  return path.endsWith('/') ? path.slice(0, -1) : path;
}

/** Render a root-relative path the way `pwd()` shows it. */
export function toDisplayPath(path: string): string {
  return path.length === 0 ? '/' : `/${path}`;
}
