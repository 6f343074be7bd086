import type { MemberRecord } from '../types.js';
import { stripTrailingSlash } from '../path/resolve.js';

/** One central-directory entry as handed to the index. */
export type IndexedEntry = MemberRecord & { isDirectory: boolean };

/**
 * Sorted view over an archive's flat member-name list.
 *
 * Directories are not tracked on their own: a directory exists when some
 * name starts with `dir + '/'`. Names are kept sorted so that test is a
 * binary search followed by one prefix comparison.
 */
export class MemberIndex {
  private readonly names: string[];
  private readonly files = new Map<string, MemberRecord>();

  constructor(entries: Iterable<IndexedEntry>) {
    const names = new Set<string>();
    for (const entry of entries) {
      names.add(entry.name);
      if (entry.isDirectory || entry.name.endsWith('/')) continue;
      const { isDirectory: _isDirectory, ...record } = entry;
      this.files.set(entry.name, record);
    }
    this.names = [...names].sort();
  }

  /** Number of file members. */
  get fileCount(): number {
    return this.files.size;
  }

  hasFile(name: string): boolean {
    return this.files.has(name);
  }

  getFile(name: string): MemberRecord | undefined {
    return this.files.get(name);
  }

  hasDirectory(dir: string): boolean {
    const prefix = directoryPrefix(dir);
    if (prefix.length === 0) return true;
    const candidate = this.names[this.lowerBound(prefix)];
    return candidate !== undefined && candidate.startsWith(prefix);
  }

  /**
   * Children of `dir` as root-relative paths, directories suffixed with `/`.
   * With `recursive`, every descendant is listed.
   */
  children(dir: string, recursive: boolean): string[] {
    const prefix = directoryPrefix(dir);
    const out = new Set<string>();
    for (const name of this.namesWithPrefix(prefix)) {
      const parts = name.slice(prefix.length).split('/');
      const leaf = parts.pop() ?? '';
      if (!recursive) {
        const first = parts[0];
        if (first !== undefined) {
          if (isListable(first)) out.add(`${prefix}${first}/`);
        } else if (isListable(leaf)) {
          out.add(`${prefix}${leaf}`);
        }
        continue;
      }
      let current = prefix;
      let listable = true;
      for (const part of parts) {
        if (!isListable(part)) {
          listable = false;
          break;
        }
        current = `${current}${part}/`;
        out.add(current);
      }
      if (listable && isListable(leaf)) out.add(`${current}${leaf}`);
    }
    return [...out].sort();
  }

  /** Every file member below `dir`, in sorted order. */
  filesUnder(dir: string): string[] {
    const out: string[] = [];
    for (const name of this.namesWithPrefix(directoryPrefix(dir))) {
      if (this.files.has(name)) out.push(name);
    }
    return out;
  }

  private *namesWithPrefix(prefix: string): Generator<string> {
    for (let i = this.lowerBound(prefix); i < this.names.length; i += 1) {
      const name = this.names[i];
      if (name === undefined || !name.startsWith(prefix)) return;
      yield name;
    }
  }

  private lowerBound(target: string): number {
    let low = 0;
    let high = this.names.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const name = this.names[mid];
      if (name !== undefined && name < target) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}

function directoryPrefix(dir: string): string {
  const trimmed = stripTrailingSlash(dir);
  return trimmed.length === 0 ? '' : `${trimmed}/`;
}

function isListable(segment: string): boolean {
  return segment.length > 0 && segment !== '.' && segment !== '..';
}
