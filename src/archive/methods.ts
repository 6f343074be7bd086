const METHOD_NAMES: ReadonlyMap<number, string> = new Map([
  [0, 'STORED'],
  [8, 'DEFLATED'],
  [9, 'DEFLATE64'],
  [12, 'BZIP2'],
  [14, 'LZMA'],
  [93, 'ZSTD'],
  [95, 'XZ']
]);

export const METHOD_STORED = 0;
export const METHOD_DEFLATED = 8;

/** Readable name of a ZIP compression method id. */
export function compressionMethodName(method: number): string {
  return METHOD_NAMES.get(method) ?? String(method);
}
