import type { ByteshiftTable } from '../../types/index.js';

function assertMask(key: ByteshiftTable['bytes'], mask: number): void {
  if (key.length === 0 || mask < 0 || mask >= key.length) {
    throw new RangeError(`mask 0x${mask.toString(16)} does not index a ${key.length}-byte key`);
  }
}

/**
 * buffer[i] = buffer[i] + key[i & mask] + i (mod 256), for i >= offset.
 * Mutates and returns `buffer`.
 */
export function applyByteshift(
  buffer: Uint8Array,
  key: ByteshiftTable['bytes'],
  offset: number,
  mask: number
): Uint8Array {
  assertMask(key, mask);
  for (let i = offset; i < buffer.length; i++) {
    buffer[i] = (buffer[i] + key[i & mask] + i) & 0xff;
  }
  return buffer;
}

/** Exact inverse of {@link applyByteshift} for the same key/offset/mask. */
export function undoByteshift(
  buffer: Uint8Array,
  key: ByteshiftTable['bytes'],
  offset: number,
  mask: number
): Uint8Array {
  assertMask(key, mask);
  for (let i = offset; i < buffer.length; i++) {
    buffer[i] = (buffer[i] - key[i & mask] - i) & 0xff;
  }
  return buffer;
}
