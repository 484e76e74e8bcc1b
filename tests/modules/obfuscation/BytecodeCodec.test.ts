import { describe, expect, it } from 'vitest';
import { FormatError } from '../../../src/errors/FormatError.js';
import { TransformError } from '../../../src/errors/TransformError.js';
import { applyByteshift } from '../../../src/modules/obfuscation/Byteshift.js';
import { decodeBytecode, encodeBytecode } from '../../../src/modules/obfuscation/BytecodeCodec.js';
import { getLuajitTable } from '../../../src/modules/obfuscation/ByteshiftTables.js';
import { detectBytecodeHeader } from '../../../src/modules/obfuscation/BytecodeHeader.js';
import { buildModule } from '../../helpers/BytecodeWriter.js';

describe('BytecodeCodec', () => {
  const v3 = buildModule({ version: 3, prototypes: [{ name: 'init', params: ['a'] }] });
  const v6 = buildModule({ version: 6, typesVersion: 3, prototypes: [{ name: 'init', params: ['a'] }] });

  it.each([
    ['v3 base', v3, false, 3],
    ['v3 alternate', v3, true, 3],
    ['v6 base', v6, false, 6],
    ['v6 alternate', v6, true, 6],
  ])('encodes and decodes %s back to the same bytes', (_label, plain, variant, version) => {
    const encoded = encodeBytecode(plain, { variant });

    expect(encoded.length).toBe(plain.length + 1);
    expect(detectBytecodeHeader(encoded)).toEqual({ format: 'luau', version, encoded: true, variant });

    const { header, bytecode } = decodeBytecode(encoded);
    expect(header.encoded).toBe(true);
    expect(Array.from(bytecode)).toEqual(Array.from(plain));
  });

  it('marks encoded buffers with 0x02, or 0x03 for the alternate keys', () => {
    expect(encodeBytecode(v3)[0]).toBe(0x02);
    expect(encodeBytecode(v3, { variant: true })[0]).toBe(0x03);
  });

  it('returns an unencoded buffer unchanged, as a copy', () => {
    const { header, bytecode } = decodeBytecode(v3);
    expect(header.encoded).toBe(false);
    expect(Array.from(bytecode)).toEqual(Array.from(v3));
    expect(bytecode).not.toBe(v3);
  });

  it('never mutates the caller buffer', () => {
    const encoded = encodeBytecode(v3);
    const before = Array.from(encoded);
    decodeBytecode(encoded);
    expect(Array.from(encoded)).toEqual(before);
  });

  it('fails with a transform error for encoded v4, which has no table', () => {
    const encoded = Uint8Array.from([0x02, 0xf0, 0x00, 0x00]);
    expect(() => decodeBytecode(encoded)).toThrow(TransformError);
    expect(() => decodeBytecode(encoded)).toThrow('Unable to decode, no valid byteshift table found');
  });

  it('refuses to encode a version without a table', () => {
    expect(() => encodeBytecode(Uint8Array.from([0x04, 0x00]))).toThrow(TransformError);
    expect(() => encodeBytecode(new Uint8Array(0))).toThrow(FormatError);
  });

  it('decodes LuaJIT from byte 4 on and rewrites the version byte', () => {
    const table = getLuajitTable(3);
    expect(table).toBeDefined();
    if (!table) return;

    const payload = [0x1b, 0x4c, 0x4a, 0x03, 0x00, 0x10, 0x20, 0x30];
    // Produce the stored form by reversing the decode shift.
    const stored = Uint8Array.from(payload);
    for (let i = table.offset; i < stored.length; i++) {
      stored[i] = (stored[i] - table.bytes[i & table.mask] - i) & 0xff;
    }
    stored[4] = 0xfc;

    const { header, bytecode } = decodeBytecode(stored);
    expect(header).toEqual({ format: 'luajit', version: 3, encoded: true, variant: false });

    const expected = applyByteshift(Uint8Array.from(stored), table.bytes, table.offset, table.mask);
    expected[3] = 0x02;
    expect(Array.from(bytecode)).toEqual(Array.from(expected));
    expect(Array.from(bytecode.subarray(5))).toEqual([0x10, 0x20, 0x30]);
  });
});
