/**
 * Runs the pipeline over a file or a directory of `.l64` files, mirroring
 * the input layout under an output root. Each file succeeds or fails on its
 * own; a failure is reported with its path and never stops the others.
 */
import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { dirname, extname, join, resolve } from 'node:path';
import { ToolError, attachFile } from '../../errors/ToolError.js';
import type { DecompileOptions } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { BYTECODE_EXTENSION, mirrorOutputPath } from '../../utils/outputPaths.js';
import { parallelExecute } from '../../utils/parallel.js';
import type { DecompilerSet } from '../external/index.js';
import { decodeBytecode, encodeBytecode } from '../obfuscation/BytecodeCodec.js';
import { decompileBytecode } from './DecompilePipeline.js';

export type BatchMode = 'decompile' | 'decode' | 'encode';

/** Schema dumps shipped next to the scripts; never bytecode. */
const SKIPPED_NAME = 'XMLSchema';

export interface BatchOptions {
  input: string;
  /** Output root. Defaults to the input root when decompiling. */
  output?: string;
  mode: BatchMode;
  recursive?: boolean;
  maxConcurrency?: number;
  decompileOptions: DecompileOptions;
  /** Required for `decompile`. */
  decompilers?: DecompilerSet;
  /** Encode with the alternate (DLC) key set. */
  variant?: boolean;
}

export interface FileOutcome {
  input: string;
  output: string;
  bytes: number;
  duration: number;
}

export interface BatchReport {
  succeeded: FileOutcome[];
  failed: ToolError[];
}

export async function collectInputFiles(input: string, recursive = false): Promise<string[]> {
  const root = resolve(input);
  const info = await stat(root).catch((error: unknown) => {
    throw new ToolError('NOT_FOUND', `Input path does not exist: ${input}`, { cause: error });
  });

  if (info.isFile()) {
    return [root];
  }

  const files: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) await walk(full);
      } else if (
        entry.isFile() &&
        extname(entry.name).toLowerCase() === BYTECODE_EXTENSION &&
        !entry.name.includes(SKIPPED_NAME)
      ) {
        files.push(full);
      }
    }
  };
  await walk(root);
  return files.sort();
}

async function transformFile(raw: Uint8Array, options: BatchOptions): Promise<Uint8Array> {
  switch (options.mode) {
    case 'decode':
      return decodeBytecode(raw).bytecode;
    case 'encode':
      return encodeBytecode(raw, { variant: options.variant });
    case 'decompile': {
      if (!options.decompilers) {
        throw new ToolError('VALIDATION', 'Decompile mode needs a decompiler');
      }
      const result = await decompileBytecode(raw, options.decompilers, options.decompileOptions);
      return result.output;
    }
  }
}

export async function processBatch(options: BatchOptions): Promise<BatchReport> {
  const inputPath = resolve(options.input);
  const files = await collectInputFiles(inputPath, options.recursive);
  const inputIsFile = files.length === 1 && files[0] === inputPath;
  const inputRoot = inputIsFile ? dirname(inputPath) : inputPath;

  if (!options.output && options.mode !== 'decompile') {
    throw new ToolError('VALIDATION', `An output directory is required for ${options.mode}`);
  }
  const outputRoot = resolve(options.output ?? inputRoot);

  if (files.length === 0) {
    logger.warn(`No ${BYTECODE_EXTENSION} files found in ${inputPath}`);
    return { succeeded: [], failed: [] };
  }
  logger.info(`Processing ${files.length} file(s) from ${inputRoot}`);

  const results = await parallelExecute(
    files,
    async (file) => {
      try {
        const raw = await readFile(file);
        const bytes = await transformFile(raw, options);
        const target = mirrorOutputPath({
          file,
          inputRoot,
          outputRoot,
          decompiled: options.mode === 'decompile',
        });
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, bytes);
        logger.debug(`${file} -> ${target}`);
        return { input: file, output: target, bytes: bytes.length };
      } catch (error) {
        throw attachFile(error, file);
      }
    },
    { maxConcurrency: options.maxConcurrency }
  );

  const report: BatchReport = { succeeded: [], failed: [] };
  results.forEach((result, i) => {
    if (result.success) {
      report.succeeded.push({ ...result.data, duration: result.duration });
    } else {
      const failure = attachFile(result.error, files[i]);
      logger.error(failure.message);
      report.failed.push(failure);
    }
  });

  logger.info(`Done: ${report.succeeded.length} succeeded, ${report.failed.length} failed`);
  return report;
}
