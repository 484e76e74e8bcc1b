/**
 * Decompiler backed by an external executable.
 *
 * Luau bytecode is piped over stdin; the argument template may carry an
 * `{indent}` placeholder. The LuaJIT decompiler only reads from a file, so
 * its input is staged in a private temp directory that is removed afterwards.
 */
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ToolError } from '../../errors/ToolError.js';
import { logger } from '../../utils/logger.js';
import type { ExternalToolRunner } from './ExternalToolRunner.js';
import type { Decompiler, ExternalToolName, ToolRunResult } from './types.js';

const INDENT_PLACEHOLDER = '{indent}';
const INPUT_PLACEHOLDER = '{input}';

export interface ExternalDecompilerOptions {
  tool: ExternalToolName;
  /** Argument template; `{indent}` and `{input}` are substituted per call. */
  args: string[];
  timeoutMs: number;
  maxOutputBytes?: number;
  /** Pass bytecode as a file path instead of on stdin. */
  fileInput?: boolean;
}

export function expandArgs(template: readonly string[], values: { indent: number; input?: string }): string[] {
  return template.map((arg) =>
    arg
      .split(INDENT_PLACEHOLDER).join(String(values.indent))
      .split(INPUT_PLACEHOLDER).join(values.input ?? '')
  );
}

export class ExternalDecompiler implements Decompiler {
  constructor(
    private readonly runner: ExternalToolRunner,
    private readonly options: ExternalDecompilerOptions,
  ) {}

  async decompile(bytecode: Uint8Array, indent: number): Promise<Uint8Array> {
    if (!this.options.fileInput) {
      const result = await this.runner.run({
        tool: this.options.tool,
        args: expandArgs(this.options.args, { indent }),
        stdin: bytecode,
        timeoutMs: this.options.timeoutMs,
        maxStdoutBytes: this.options.maxOutputBytes,
      });
      return this.unwrap(result);
    }

    const dir = await mkdtemp(join(tmpdir(), 'luau-restore-'));
    try {
      const input = join(dir, 'input.ljbc');
      await writeFile(input, bytecode);
      const args = this.options.args.some((arg) => arg.includes(INPUT_PLACEHOLDER))
        ? expandArgs(this.options.args, { indent, input })
        : [...expandArgs(this.options.args, { indent }), input];
      const result = await this.runner.run({
        tool: this.options.tool,
        args,
        cwd: dir,
        timeoutMs: this.options.timeoutMs,
        maxStdoutBytes: this.options.maxOutputBytes,
      });
      return this.unwrap(result);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private unwrap(result: ToolRunResult): Uint8Array {
    if (!result.ok) {
      const reason = result.stderr.trim() || (result.signal ? `killed by ${result.signal}` : `exit code ${result.exitCode}`);
      throw new ToolError('DECOMPILER', `Decompiler '${this.options.tool}' failed: ${reason}`, {
        details: { exitCode: result.exitCode, signal: result.signal },
      });
    }
    if (result.truncated) {
      throw new ToolError('DECOMPILER', `Decompiler '${this.options.tool}' output exceeded the capture limit`, {
        details: { bytes: result.stdout.length },
      });
    }
    logger.debug(`[ExternalDecompiler] ${this.options.tool} produced ${result.stdout.length} bytes`);
    return result.stdout;
  }
}
