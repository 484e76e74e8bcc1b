import type { Local } from '../../types/index.js';

export interface PrototypeInit {
  index: number;
  name?: string;
  maxStackSize: number;
  parameterCount: number;
  upvalueCount: number;
  isVararg: boolean;
  lineDefined: number;
  instructionCount: number;
  locals: Local[];
  upvalues: string[];
  lineAnchor?: number;
}

/**
 * Decoded view of one compiled function, read-only once built.
 *
 * `locals` mixes parameters (scopeStart 0, live at entry) and true locals;
 * the accessors below split and order them.
 */
export class Prototype {
  readonly index: number;
  readonly name?: string;
  readonly maxStackSize: number;
  /** Header parameter count; may differ from the named parameters when debug info is partial. */
  readonly parameterCount: number;
  readonly upvalueCount: number;
  readonly isVararg: boolean;
  readonly lineDefined: number;
  readonly instructionCount: number;
  readonly locals: readonly Local[];
  readonly upvalues: readonly string[];
  /** Last absolute line-info value; used as the starting-line hint. */
  readonly lineAnchor?: number;

  constructor(init: PrototypeInit) {
    this.index = init.index;
    this.name = init.name;
    this.maxStackSize = init.maxStackSize;
    this.parameterCount = init.parameterCount;
    this.upvalueCount = init.upvalueCount;
    this.isVararg = init.isVararg;
    this.lineDefined = init.lineDefined;
    this.instructionCount = init.instructionCount;
    this.locals = Object.freeze([...init.locals]);
    this.upvalues = Object.freeze([...init.upvalues]);
    this.lineAnchor = init.lineAnchor;
  }

  /** Parameter names, ascending by register. */
  getParameters(): string[] {
    return this.locals
      .filter((local) => local.scopeStart === 0)
      .sort((a, b) => a.register - b.register)
      .map((local) => local.name);
  }

  /** True local names, ascending by scope start. */
  getLocals(): string[] {
    return this.locals
      .filter((local) => local.scopeStart > 0)
      .sort((a, b) => a.scopeStart - b.scopeStart)
      .map((local) => local.name);
  }

  toJSON(): Record<string, unknown> {
    return {
      index: this.index,
      name: this.name ?? null,
      parameters: this.getParameters(),
      locals: this.getLocals(),
      upvalues: [...this.upvalues],
      maxStackSize: this.maxStackSize,
      parameterCount: this.parameterCount,
      upvalueCount: this.upvalueCount,
      isVararg: this.isVararg,
      lineDefined: this.lineDefined,
      instructionCount: this.instructionCount,
      lineAnchor: this.lineAnchor ?? null,
    };
  }
}
