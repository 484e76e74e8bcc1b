import { readFileSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { ToolError } from './errors/ToolError.js';
import { createDecompilers, type DecompilerSet, type ToolStatus } from './modules/external/index.js';
import { decodeBytecode, encodeBytecode } from './modules/obfuscation/BytecodeCodec.js';
import { type BatchMode, type BatchReport, processBatch } from './modules/pipeline/BatchProcessor.js';
import { decompileBytecode, inspectBytecode } from './modules/pipeline/DecompilePipeline.js';
import type { Config, DecompileOptions } from './types/index.js';
import { getConfig } from './utils/config.js';
import { logger } from './utils/logger.js';
import { getProjectRoot } from './utils/outputPaths.js';

export interface CliContext {
  config: Config;
  decompilers: () => DecompilerSet;
  checkTools: () => Promise<ToolStatus[]>;
  write: (chunk: Uint8Array | string) => void;
}

interface CommonFlags {
  output?: string;
  recursive?: boolean;
  silent?: boolean;
  concurrency?: number;
}

interface DecompileFlags extends CommonFlags {
  symbolTable?: boolean;
  lineNumbers?: boolean;
  variableComments?: boolean;
}

interface EncodeFlags extends CommonFlags {
  dlc?: boolean;
}

const PackageInfo = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

function readPackageInfo(): z.infer<typeof PackageInfo> {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(getProjectRoot(), 'package.json'), 'utf-8'));
    return PackageInfo.parse(raw);
  } catch (error) {
    logger.debug('package.json not readable, using built-in name', error);
    return { name: 'luau-restore', version: '0.0.0' };
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function defaultContext(): CliContext {
  const config = getConfig();
  let created: ReturnType<typeof createDecompilers> | undefined;
  const ensure = () => (created ??= createDecompilers(config.decompiler));
  return {
    config,
    decompilers: () => ensure().decompilers,
    checkTools: () => ensure().runner.checkTools(true),
    write: (chunk) => {
      process.stdout.write(chunk);
    },
  };
}

function resolveOptions(flags: DecompileFlags, config: Config): DecompileOptions {
  return {
    emitSymbolTable: flags.symbolTable ?? config.output.emitSymbolTable,
    emitLineNumbers: flags.lineNumbers ?? config.output.emitLineNumbers,
    emitVariableComments: flags.variableComments ?? config.output.emitVariableComments,
  };
}

function applyCommonFlags(flags: CommonFlags): void {
  if (flags.silent) {
    logger.setLevel('error');
  }
}

function finishBatch(report: BatchReport): void {
  if (report.failed.length > 0) {
    process.exitCode = 1;
  }
}

function formatToolStatus(status: ToolStatus): string {
  const label = `${status.name} (${status.command})`;
  if (status.available) {
    return `ok       ${label} ${status.version ?? 'unknown version'}`;
  }
  return `${status.required ? 'missing' : 'absent '}  ${label}: ${status.reason ?? 'not found'}`;
}

/** A single file with no output directory goes to stdout. */
async function isStdoutTarget(input: string, flags: CommonFlags): Promise<boolean> {
  if (flags.output) {
    return false;
  }
  const info = await stat(input).catch((error: unknown) => {
    throw new ToolError('NOT_FOUND', `Input path does not exist: ${input}`, { cause: error });
  });
  return info.isFile();
}

async function runBatch(
  ctx: CliContext,
  mode: BatchMode,
  input: string,
  flags: CommonFlags,
  extra: { decompileOptions?: DecompileOptions; variant?: boolean } = {},
): Promise<void> {
  const report = await processBatch({
    input,
    output: flags.output,
    mode,
    recursive: flags.recursive,
    maxConcurrency: flags.concurrency ?? ctx.config.performance.maxConcurrentFiles,
    decompileOptions: extra.decompileOptions ?? resolveOptions({}, ctx.config),
    decompilers: mode === 'decompile' ? ctx.decompilers() : undefined,
    variant: extra.variant,
  });
  finishBatch(report);
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-o, --output <dir>', 'output directory (a single file without it goes to stdout)')
    .option('-r, --recursive', 'descend into subdirectories')
    .option('-s, --silent', 'only log errors')
    .option('-c, --concurrency <n>', 'files processed at once', parsePositiveInt);
}

export function createProgram(ctx: CliContext = defaultContext()): Command {
  const pkg = readPackageInfo();
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description ?? 'Decode, decompile and annotate Luau bytecode')
    .version(pkg.version);

  addCommonOptions(
    program
      .command('decompile')
      .description('decode and decompile bytecode, reattaching debug names')
      .argument('<input>', '.l64 file or directory')
  )
    .option('--symbol-table', 'prepend the symbol table as a block comment')
    .option('--line-numbers', 'annotate functions with their starting line')
    .option('--variable-comments', 'annotate functions with local and upvalue names')
    .action(async (input: string, flags: DecompileFlags) => {
      applyCommonFlags(flags);
      const options = resolveOptions(flags, ctx.config);
      if (await isStdoutTarget(input, flags)) {
        const result = await decompileBytecode(await readFile(input), ctx.decompilers(), options);
        ctx.write(result.output);
        return;
      }
      await runBatch(ctx, 'decompile', input, flags, { decompileOptions: options });
    });

  addCommonOptions(
    program
      .command('decode')
      .description('remove the byteshift obfuscation and write plain bytecode')
      .argument('<input>', '.l64 file or directory')
  ).action(async (input: string, flags: CommonFlags) => {
    applyCommonFlags(flags);
    if (await isStdoutTarget(input, flags)) {
      ctx.write(decodeBytecode(await readFile(input)).bytecode);
      return;
    }
    await runBatch(ctx, 'decode', input, flags);
  });

  addCommonOptions(
    program
      .command('encode')
      .description('apply the byteshift obfuscation to plain bytecode')
      .argument('<input>', 'plain bytecode file or directory')
  )
    .option('--dlc', 'use the alternate key set')
    .action(async (input: string, flags: EncodeFlags) => {
      applyCommonFlags(flags);
      if (await isStdoutTarget(input, flags)) {
        ctx.write(encodeBytecode(await readFile(input), { variant: flags.dlc }));
        return;
      }
      await runBatch(ctx, 'encode', input, flags, { variant: flags.dlc });
    });

  program
    .command('inspect')
    .description('print the decoded structure as JSON')
    .argument('<file>', '.l64 file')
    .action(async (file: string) => {
      const { header, module } = inspectBytecode(await readFile(file));
      ctx.write(`${JSON.stringify({ header, ...module }, null, 2)}\n`);
    });

  program
    .command('tools')
    .description('check that the configured decompilers can be run')
    .action(async () => {
      const statuses = await ctx.checkTools();
      for (const status of statuses) {
        ctx.write(`${formatToolStatus(status)}\n`);
        if (status.required && !status.available) {
          process.exitCode = 1;
        }
      }
    });

  return program;
}
