import { FormatError } from '../../errors/FormatError.js';
import type { BytecodeHeader } from '../../types/index.js';

const LUAJIT_SIGNATURE = [0x1b, 0x4c, 0x4a];
const LUAJIT_ENCODED_FLAG = 0xfc;

/** Marker written in front of an encoded Luau buffer. */
export const LUAU_MARKER = 0x02;
export const LUAU_DLC_MARKER = 0x03;

export function isLuajitBytecode(buffer: Uint8Array): boolean {
  return buffer.length >= 5 && LUAJIT_SIGNATURE.every((byte, i) => buffer[i] === byte);
}

function detectLuau(b0: number, b1: number, b2: number): Omit<BytecodeHeader, 'format'> | undefined {
  if (b0 === 0x03 && b1 === 0x00 && b2 === 0xf2) return { version: 6, encoded: true, variant: true };
  if (b0 === 0x02 && b1 === 0xef) return { version: 3, encoded: true, variant: false };
  if (b0 === 0x03 && b1 === 0xfd) return { version: 3, encoded: true, variant: true };
  if (b0 === 0x02 && b1 === 0xf0) return { version: 4, encoded: true, variant: false };
  if (b0 === 0x02 && b1 === 0xf2) return { version: 6, encoded: true, variant: false };
  if (b0 === 0x06 && b1 === 0x03) return { version: 6, encoded: false, variant: false };
  if (b0 === 0x03) return { version: 3, encoded: false, variant: false };
  if (b0 === 0x04) return { version: 4, encoded: false, variant: false };
  return undefined;
}

/**
 * Classify a raw buffer by its leading bytes. Order matters: the encoded
 * DLC v6 header also starts with 0x03, so it is tested before plain v3.
 */
export function detectBytecodeHeader(buffer: Uint8Array): BytecodeHeader {
  if (isLuajitBytecode(buffer)) {
    return {
      format: 'luajit',
      version: buffer[3],
      encoded: buffer[4] === LUAJIT_ENCODED_FLAG,
      variant: false,
    };
  }

  if (buffer.length < 3) {
    throw new FormatError('TRUNCATED', 'Buffer too short for a bytecode header', {
      offset: buffer.length,
      field: 'header',
      expected: 3,
      found: buffer.length,
    });
  }

  const luau = detectLuau(buffer[0], buffer[1], buffer[2]);
  if (!luau) {
    throw new FormatError('UNKNOWN_HEADER', 'Unsupported/unknown bytecode', {
      offset: 0,
      field: 'header',
      found: Array.from(buffer.subarray(0, 3), (b) => `0x${b.toString(16).padStart(2, '0')}`).join(' '),
    });
  }

  return { format: 'luau', ...luau };
}
