/**
 * End-to-end processing of one raw buffer: header detection, byteshift
 * removal, structural decode, external decompile and debug-info reattachment.
 *
 * Every fatal error surfaces before the decompiler runs, so a malformed file
 * never costs a process spawn.
 */
import { ToolError } from '../../errors/ToolError.js';
import type { BytecodeHeader, DecompileOptions } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { BytecodeDecoder, type DecodedModule } from '../bytecode/BytecodeDecoder.js';
import type { DecompilerSet } from '../external/index.js';
import { decodeBytecode } from '../obfuscation/BytecodeCodec.js';
import { DebugInfoReattacher, type ReattachStats } from '../reattach/DebugInfoReattacher.js';

/** Indentation level handed to the decompiler. */
export const DECOMPILER_INDENT = 1;

export interface DecompileResult {
  header: BytecodeHeader;
  /** Final pseudocode bytes. */
  output: Uint8Array;
  /** Absent for LuaJIT, which carries no structure this tool reads. */
  module?: DecodedModule;
  stats?: ReattachStats;
}

export interface InspectResult {
  header: BytecodeHeader;
  module: DecodedModule;
}

export async function decompileBytecode(
  raw: Uint8Array,
  decompilers: DecompilerSet,
  options: DecompileOptions,
): Promise<DecompileResult> {
  const { header, bytecode } = decodeBytecode(raw);

  if (header.format === 'luajit') {
    if (!decompilers.luajit) {
      throw new ToolError('DECOMPILER', 'No LuaJIT decompiler configured');
    }
    const output = await decompilers.luajit.decompile(bytecode, DECOMPILER_INDENT);
    return { header, output };
  }

  const module = BytecodeDecoder.decode(bytecode);
  logger.debug(
    `[DecompilePipeline] v${module.version}: ${module.prototypes.length} prototype(s), ${module.symbolTable.length} symbol(s)`
  );

  const pseudocode = await decompilers.luau.decompile(bytecode, DECOMPILER_INDENT);
  const reattacher = new DebugInfoReattacher(options);
  const output = reattacher.reattachBytes(pseudocode, module);

  return { header, output, module, stats: reattacher.getStats() };
}

/** Structural model only; no decompiler involved. */
export function inspectBytecode(raw: Uint8Array): InspectResult {
  const { header, bytecode } = decodeBytecode(raw);
  if (header.format === 'luajit') {
    throw new ToolError('VALIDATION', 'Inspect supports Luau bytecode only', {
      details: { format: header.format, version: header.version },
    });
  }
  return { header, module: BytecodeDecoder.decode(bytecode) };
}
