/**
 * Normalize an extension filter: trimmed, lowercased, dot-prefixed, unique
 * and sorted. An absent or effectively empty filter yields `null`.
 */
export function normalizeExtensions(extensions?: readonly string[] | null): string[] | null {
  if (extensions === undefined || extensions === null) return null;
  const normalized = new Set<string>();
  for (const candidate of extensions) {
    let ext = candidate.trim().toLowerCase();
    if (ext.length === 0) continue;
    if (!ext.startsWith('.')) ext = `.${ext}`;
    normalized.add(ext);
  }
  if (normalized.size === 0) return null;
  return [...normalized].sort();
}

/** Lowercased final suffix of the basename (`a.tar.gz` → `.gz`); leading dots do not start a suffix. */
export function extensionOf(name: string): string {
  const slash = name.lastIndexOf('/');
  const base = name.slice(slash + 1);
  let start = 0;
  while (start < base.length && base[start] === '.') start += 1;
  const dot = base.lastIndexOf('.');
  if (dot < start) return '';
  return base.slice(dot).toLowerCase();
}

export function sameExtensionFilter(a: readonly string[] | null, b: readonly string[] | null): boolean {
  const left = a ?? [];
  const right = b ?? [];
  if (left.length !== right.length) return false;
  return left.every((ext, index) => ext === right[index]);
}
