/**
 * Removes (and re-applies) the byteshift obfuscation that keeps the stock
 * runtime from loading shipped script bytecode.
 *
 * The game's loader decodes with the forward shift, so decoding here is
 * `applyByteshift` and encoding is `undoByteshift`.
 */
import { FormatError } from '../../errors/FormatError.js';
import { TransformError } from '../../errors/TransformError.js';
import type { BytecodeHeader } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { applyByteshift, undoByteshift } from './Byteshift.js';
import { LUAU_DLC_MARKER, LUAU_MARKER, detectBytecodeHeader } from './BytecodeHeader.js';
import { getLuajitTable, getLuauTable } from './ByteshiftTables.js';

export interface DecodedBytecode {
  header: BytecodeHeader;
  /** Plain bytecode as the stock runtime (and decompiler) expects it. */
  bytecode: Uint8Array;
}

/** LuaJIT buffers carry this in byte 3 once decoded. */
const LUAJIT_DECODED_VERSION = 0x02;

export function decodeBytecode(raw: Uint8Array): DecodedBytecode {
  const header = detectBytecodeHeader(raw);
  // Stages own their buffer; never shift the caller's bytes in place.
  const buffer = Uint8Array.from(raw);

  if (!header.encoded) {
    return { header, bytecode: buffer };
  }

  if (header.format === 'luajit') {
    const table = getLuajitTable(header.version);
    if (!table) {
      throw new TransformError('Unable to decode, no valid byteshift table found', {
        format: header.format,
        version: header.version,
      });
    }
    applyByteshift(buffer, table.bytes, table.offset, table.mask);
    buffer[3] = LUAJIT_DECODED_VERSION;
    logger.debug(`[BytecodeCodec] Decoded LuaJIT v${header.version} (${buffer.length} bytes)`);
    return { header, bytecode: buffer };
  }

  const table = getLuauTable(header.version, header.variant);
  if (!table) {
    throw new TransformError('Unable to decode, no valid byteshift table found', {
      format: header.format,
      version: header.version,
      variant: header.variant,
    });
  }

  applyByteshift(buffer, table.bytes, table.offset, table.mask);
  logger.debug(
    `[BytecodeCodec] Decoded Luau v${header.version}${header.variant ? ' (dlc)' : ''} (${buffer.length - 1} bytes)`
  );
  // Drop the marker byte; the real version byte follows it.
  return { header, bytecode: buffer.slice(1) };
}

/**
 * Obfuscate plain Luau bytecode so the game will load it. Inverse of
 * {@link decodeBytecode} for every key in the catalog.
 */
export function encodeBytecode(plain: Uint8Array, options: { variant?: boolean } = {}): Uint8Array {
  const variant = options.variant ?? false;

  if (plain.length === 0) {
    throw new FormatError('TRUNCATED', 'Cannot encode an empty buffer', {
      offset: 0,
      field: 'version',
    });
  }

  const version = plain[0];
  const table = getLuauTable(version, variant);
  if (!table) {
    throw new TransformError(`Missing bytecode shift table for version ${version}`, {
      format: 'luau',
      version,
      variant,
    });
  }

  const buffer = new Uint8Array(plain.length + 1);
  buffer.set(plain, 1);
  undoByteshift(buffer, table.bytes, table.offset, table.mask);
  buffer[0] = variant ? LUAU_DLC_MARKER : LUAU_MARKER;
  return buffer;
}
