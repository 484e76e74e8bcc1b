/**
 * Structural decoder for Luau bytecode containers.
 *
 * Only what the reattachment step needs is kept: prototype names, named
 * locals/upvalues and a line anchor. Instructions, constants, child lists
 * and type info are walked for their size and dropped.
 */
import { FormatError } from '../../errors/FormatError.js';
import type { Local } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { ByteReader } from './ByteReader.js';
import { Prototype } from './Prototype.js';

export const SUPPORTED_VERSIONS: ReadonlySet<number> = new Set([3, 4, 6]);
export const MAX_TYPES_VERSION = 3;

export const INVALID_UTF8 = 'INVALID_UTF8';
/** Stands in for a local or upvalue whose name is not valid UTF-8. */
export const UNREADABLE_NAME = 'NOT_FOUND';

export interface DecodedModule {
  version: number;
  typesVersion: number;
  /** Index into `prototypes` of the top-level chunk. */
  mainIndex: number;
  prototypes: Prototype[];
  symbolTable: string[];
}

enum ConstantTag {
  Nil = 0,
  Boolean = 1,
  Number = 2,
  String = 3,
  Import = 4,
  Table = 5,
  Closure = 6,
  Vector = 7,
  TableWithConstants = 8,
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8.decode(bytes);
  } catch {
    return undefined;
  }
}

class SymbolTable {
  private readonly entries: Array<string | undefined>;

  constructor(raw: Uint8Array[]) {
    this.entries = raw.map(decodeUtf8);
  }

  /**
   * 1-based lookup; 0 means "no name". Entries that are not valid UTF-8
   * resolve to `unreadable`, which by default drops them like unnamed ones.
   */
  resolve(index: number, field: string, offset: number, unreadable?: string): string | undefined {
    if (index === 0) {
      return undefined;
    }
    if (index > this.entries.length) {
      throw new FormatError('SYMBOL_OUT_OF_RANGE', `Symbol index ${index} is out of range`, {
        offset,
        field,
        expected: `1..${this.entries.length}`,
        found: index,
      });
    }
    return this.entries[index - 1] ?? unreadable;
  }

  toStrings(): string[] {
    return this.entries.map((entry) => entry ?? INVALID_UTF8);
  }
}

export class BytecodeDecoder {
  private readonly reader: ByteReader;

  constructor(buffer: Uint8Array) {
    this.reader = new ByteReader(buffer);
  }

  static decode(buffer: Uint8Array): DecodedModule {
    return new BytecodeDecoder(buffer).decode();
  }

  decode(): DecodedModule {
    const r = this.reader;

    const version = r.u8('version');
    if (!SUPPORTED_VERSIONS.has(version)) {
      throw new FormatError('UNSUPPORTED_VERSION', `Unsupported bytecode version ${version}`, {
        offset: 0,
        field: 'version',
        expected: Array.from(SUPPORTED_VERSIONS),
        found: version,
      });
    }

    let typesVersion = 0;
    if (version >= 4) {
      const typesOffset = r.offset;
      typesVersion = r.u8('typesVersion');
      if (typesVersion > MAX_TYPES_VERSION) {
        throw new FormatError('UNSUPPORTED_TYPES_VERSION', `Unsupported types version ${typesVersion}`, {
          offset: typesOffset,
          field: 'typesVersion',
          expected: `<= ${MAX_TYPES_VERSION}`,
          found: typesVersion,
        });
      }
    }

    const symbols = new SymbolTable(r.list('symbolTable', () => r.string('symbol')));

    if (typesVersion === MAX_TYPES_VERSION) {
      this.skipUserdataTypes();
    }

    const prototypes = r.list('prototypes', (index) => this.readPrototype(index, version, symbols));
    const mainIndex = r.varint('mainIndex');

    if (r.remaining > 0) {
      logger.debug(`[BytecodeDecoder] ${r.remaining} trailing byte(s) after main index`);
    }

    return {
      version,
      typesVersion,
      mainIndex,
      prototypes,
      symbolTable: symbols.toStrings(),
    };
  }

  /** Varints until a lone 0x00 terminator. */
  private skipUserdataTypes(): void {
    const r = this.reader;
    while (r.peekU8('userdataTypes') !== 0) {
      r.varint('userdataTypes');
    }
    r.u8('userdataTypes.end');
  }

  private readPrototype(index: number, version: number, symbols: SymbolTable): Prototype {
    const r = this.reader;
    const field = (name: string) => `prototypes[${index}].${name}`;

    const maxStackSize = r.u8(field('maxStackSize'));
    const parameterCount = r.u8(field('numParams'));
    const upvalueCount = r.u8(field('numUpvalues'));
    const isVararg = r.u8(field('isVararg')) !== 0;

    if (version >= 4) {
      r.u8(field('flags'));
      r.skip(r.varint(field('typeInfo.length')), field('typeInfo'));
    }

    const instructionCount = r.varint(field('instructions.count'));
    r.skip(instructionCount * 4, field('instructions'));

    r.list(field('constants'), () => this.skipConstant(field('constants')));
    r.list(field('children'), () => r.varint(field('children')));

    const lineDefined = r.varint(field('lineDefined'));
    const nameOffset = r.offset;
    const name = symbols.resolve(r.varint(field('debugName')), field('debugName'), nameOffset);

    let lineAnchor: number | undefined;
    if (r.u8(field('hasLineInfo')) !== 0) {
      const lineGapLog2 = r.u8(field('lineGapLog2'));
      r.skip(instructionCount, field('lineInfo'));
      const intervals = Math.ceil(instructionCount / 2 ** lineGapLog2);
      for (let i = 0; i < intervals; i++) {
        lineAnchor = r.u32(field('absLineInfo'));
      }
    }

    const locals: Local[] = [];
    const upvalues: string[] = [];

    if (r.u8(field('hasDebugInfo')) !== 0) {
      const localCount = r.varint(field('locals.count'));
      for (let i = 0; i < localCount; i++) {
        const offset = r.offset;
        const localName = symbols.resolve(r.varint(field('locals.name')), field('locals.name'), offset, UNREADABLE_NAME);
        const scopeStart = r.varint(field('locals.scopeStart'));
        const scopeEnd = r.varint(field('locals.scopeEnd'));
        const register = r.u8(field('locals.register'));

        if (localName !== undefined) {
          locals.push({ name: localName, scopeStart, scopeEnd, register });
        }
      }

      const upvalueNameCount = r.varint(field('upvalues.count'));
      for (let i = 0; i < upvalueNameCount; i++) {
        const offset = r.offset;
        const upvalueName = symbols.resolve(r.varint(field('upvalues.name')), field('upvalues.name'), offset, UNREADABLE_NAME);
        if (upvalueName !== undefined) {
          upvalues.push(upvalueName);
        }
      }
    }

    return new Prototype({
      index,
      name,
      maxStackSize,
      parameterCount,
      upvalueCount,
      isVararg,
      lineDefined,
      instructionCount,
      locals,
      upvalues,
      lineAnchor,
    });
  }

  private skipConstant(field: string): void {
    const r = this.reader;
    const tagOffset = r.offset;
    const tag = r.u8(`${field}.tag`);

    switch (tag) {
      case ConstantTag.Nil:
        return;
      case ConstantTag.Boolean:
        r.skip(1, `${field}.boolean`);
        return;
      case ConstantTag.Number:
        r.skip(8, `${field}.number`);
        return;
      case ConstantTag.String:
        r.varint(`${field}.string`);
        return;
      case ConstantTag.Import:
        r.skip(4, `${field}.import`);
        return;
      case ConstantTag.Table:
        r.list(`${field}.table`, () => r.varint(`${field}.table.key`));
        return;
      case ConstantTag.Closure:
        r.varint(`${field}.closure`);
        return;
      case ConstantTag.Vector:
        r.skip(16, `${field}.vector`);
        return;
      case ConstantTag.TableWithConstants:
        r.list(`${field}.table`, () => {
          r.varint(`${field}.table.key`);
          r.skip(4, `${field}.table.value`);
        });
        return;
      default:
        throw new FormatError('UNKNOWN_CONSTANT', `Unknown constant type ${tag}`, {
          offset: tagOffset,
          field: `${field}.tag`,
          found: tag,
        });
    }
  }
}
