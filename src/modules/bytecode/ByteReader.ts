import { FormatError } from '../../errors/FormatError.js';

/** Varints in the container are u32; five 7-bit groups cover that. */
const MAX_VARINT_BYTES = 5;

/**
 * Forward-only cursor over a bytecode buffer. Every read names the field it
 * is for, so a short read reports where and what was being decoded.
 */
export class ByteReader {
  private position = 0;

  constructor(private readonly buffer: Uint8Array) {}

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.buffer.length - this.position;
  }

  private ensure(length: number, field: string): void {
    if (length < 0 || this.position + length > this.buffer.length) {
      throw new FormatError('TRUNCATED', `Unexpected end of bytecode, needed ${length} byte(s)`, {
        offset: this.position,
        field,
        expected: length,
        found: Math.max(0, this.remaining),
      });
    }
  }

  peekU8(field: string): number {
    this.ensure(1, field);
    return this.buffer[this.position];
  }

  u8(field: string): number {
    this.ensure(1, field);
    return this.buffer[this.position++];
  }

  u32(field: string): number {
    this.ensure(4, field);
    const p = this.position;
    const value =
      (this.buffer[p] |
        (this.buffer[p + 1] << 8) |
        (this.buffer[p + 2] << 16) |
        (this.buffer[p + 3] << 24)) >>>
      0;
    this.position += 4;
    return value;
  }

  /** Unsigned LEB128. */
  varint(field: string): number {
    const start = this.position;
    let result = 0;
    let shift = 0;

    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const byte = this.u8(field);
      result += (byte & 0x7f) * 2 ** shift;
      if ((byte & 0x80) === 0) {
        return result;
      }
      shift += 7;
    }

    throw new FormatError('MALFORMED_VARINT', 'Variable-length integer is too long', {
      offset: start,
      field,
    });
  }

  bytes(length: number, field: string): Uint8Array {
    this.ensure(length, field);
    const slice = this.buffer.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  skip(length: number, field: string): void {
    this.ensure(length, field);
    this.position += length;
  }

  /** Varint length followed by that many raw bytes. */
  string(field: string): Uint8Array {
    const length = this.varint(`${field}.length`);
    return this.bytes(length, field);
  }

  /** Varint count followed by `count` items read by `item`. */
  list<T>(field: string, item: (index: number) => T): T[] {
    const count = this.varint(`${field}.count`);
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(item(i));
    }
    return items;
  }
}
