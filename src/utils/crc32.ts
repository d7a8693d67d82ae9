import { hex } from './hex';

// CRC-32/IEEE (reflected, poly 0xEDB88320), processed a nibble at a time
const NIBBLE_TABLE = Uint32Array.from({ length: 16 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 4; k++) c = (c >>> 1) ^ (c & 1 ? 0xEDB88320 : 0);
  return c >>> 0;
});

// Fingerprint of one or more byte chunks, as if they were concatenated
export function crc32(...chunks: Uint8Array[]): number {
  let crc = 0xFFFFFFFF;
  for (const chunk of chunks) {
    for (const b of chunk) {
      crc = (crc >>> 4) ^ NIBBLE_TABLE[(crc ^ b) & 0x0F];
      crc = (crc >>> 4) ^ NIBBLE_TABLE[(crc ^ (b >>> 4)) & 0x0F];
    }
  }
  return (crc ^ 0xFFFFFFFF) >>> 0;
}

export const crc32Hex = (...chunks: Uint8Array[]): string => `0x${hex(crc32(...chunks), 8)}`;
