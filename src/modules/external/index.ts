import type { DecompilerConfig } from '../../types/index.js';
import { ExternalDecompiler } from './ExternalDecompiler.js';
import { ExternalToolRunner } from './ExternalToolRunner.js';
import { ToolRegistry } from './ToolRegistry.js';
import type { Decompiler } from './types.js';

export { ExternalDecompiler, expandArgs } from './ExternalDecompiler.js';
export { ExternalToolRunner } from './ExternalToolRunner.js';
export { ToolRegistry, createDefaultSpecs } from './ToolRegistry.js';
export type { Decompiler, ExternalToolName, ExternalToolSpec, ToolRunRequest, ToolRunResult, ToolStatus } from './types.js';

export interface DecompilerSet {
  luau: Decompiler;
  luajit?: Decompiler;
}

export function createDecompilers(config: DecompilerConfig): { decompilers: DecompilerSet; runner: ExternalToolRunner } {
  const runner = new ExternalToolRunner(ToolRegistry.fromConfig(config));
  return {
    runner,
    decompilers: {
      luau: new ExternalDecompiler(runner, {
        tool: 'luau.decompiler',
        args: config.luau.args,
        timeoutMs: config.timeoutMs,
        maxOutputBytes: config.maxOutputBytes,
      }),
      luajit: new ExternalDecompiler(runner, {
        tool: 'luajit.decompiler',
        args: [],
        timeoutMs: config.timeoutMs,
        maxOutputBytes: config.maxOutputBytes,
        fileInput: true,
      }),
    },
  };
}
