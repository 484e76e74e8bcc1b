export interface ByteshiftTable {
  readonly bytes: readonly number[];
  readonly offset: number;
  readonly mask: number;
}

export type BytecodeFormat = 'luau' | 'luajit';

export interface BytecodeHeader {
  format: BytecodeFormat;
  version: number;
  encoded: boolean;
  /** Alternate (DLC) key set. Always false for LuaJIT. */
  variant: boolean;
}

export interface Local {
  name: string;
  scopeStart: number;
  scopeEnd: number;
  register: number;
}

export interface DecompileOptions {
  emitSymbolTable: boolean;
  emitLineNumbers: boolean;
  emitVariableComments: boolean;
}

export const DEFAULT_DECOMPILE_OPTIONS: Readonly<DecompileOptions> = Object.freeze({
  emitSymbolTable: false,
  emitLineNumbers: false,
  emitVariableComments: false,
});
