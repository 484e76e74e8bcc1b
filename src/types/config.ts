import type { LogLevel } from '../utils/logger.js';

export interface Config {
  logLevel: LogLevel;
  decompiler: DecompilerConfig;
  output: OutputConfig;
  performance: PerformanceConfig;
}

export interface DecompilerConfig {
  luau: {
    command: string;
    /** Argument template; `{indent}` is replaced by the indentation level. */
    args: string[];
  };
  luajit: {
    command: string;
  };
  timeoutMs: number;
  /** Decompiler output beyond this many bytes is a failure. */
  maxOutputBytes: number;
}

export interface OutputConfig {
  emitSymbolTable: boolean;
  emitLineNumbers: boolean;
  emitVariableComments: boolean;
}

export interface PerformanceConfig {
  maxConcurrentFiles: number;
}
