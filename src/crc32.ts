const CRC32_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n += 1) {
    let c = n;
    for (let bit = 0; bit < 8; bit += 1) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

/** Incremental CRC-32 (IEEE), the checksum ZIP stores per member. */
export class Crc32 {
  private value = 0xffffffff;

  update(chunk: Uint8Array): this {
    let crc = this.value;
    for (const byte of chunk) {
      crc = CRC32_TABLE[(crc ^ byte) & 0xff]! ^ (crc >>> 8);
    }
    this.value = crc >>> 0;
    return this;
  }

  digest(): number {
    return (this.value ^ 0xffffffff) >>> 0;
  }
}

export function crc32(data: Uint8Array): number {
  return new Crc32().update(data).digest();
}
