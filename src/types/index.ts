export type {
  Config,
  DecompilerConfig,
  OutputConfig,
  PerformanceConfig,
} from './config.js';
export type {
  ByteshiftTable,
  BytecodeFormat,
  BytecodeHeader,
  Local,
  DecompileOptions,
} from './bytecode.js';
export { DEFAULT_DECOMPILE_OPTIONS } from './bytecode.js';
