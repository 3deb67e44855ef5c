/**
 * CRC32 (IEEE 802.3), as stored in every gzip member trailer
 */

let crc32Table: Uint32Array | undefined;

function getCRC32Table(): Uint32Array {
  if (crc32Table === undefined) {
    const table = new Uint32Array(256);

    for (let i = 0; i < 256; i++) {
      let crc = i;
      for (let j = 0; j < 8; j++) {
        crc = crc & 1 ? 0xedb88320 ^ (crc >>> 1) : crc >>> 1;
      }
      table[i] = crc;
    }

    crc32Table = table;
  }

  return crc32Table;
}

/**
 * Update a running CRC32 with more data
 *
 * Start from 0; feeding the data in pieces gives the same result as one call
 * over the whole buffer.
 *
 * @example
 * ```typescript
 * crc32(new TextEncoder().encode("123456789")); // 0xcbf43926
 * ```
 */
export function crc32(data: Uint8Array, previous = 0): number {
  const table = getCRC32Table();

  let crc = (previous ^ 0xffffffff) >>> 0;
  for (let i = 0; i < data.length; i++) {
    crc = table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }

  return (crc ^ 0xffffffff) >>> 0;
}
