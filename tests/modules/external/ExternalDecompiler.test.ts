import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ToolError } from '../../../src/errors/ToolError.js';
import { ExternalDecompiler, expandArgs } from '../../../src/modules/external/ExternalDecompiler.js';
import { ExternalToolRunner } from '../../../src/modules/external/ExternalToolRunner.js';
import { ToolRegistry } from '../../../src/modules/external/ToolRegistry.js';
import type { ToolRunResult } from '../../../src/modules/external/types.js';

function result(overrides: Partial<ToolRunResult> = {}): ToolRunResult {
  return {
    ok: true,
    exitCode: 0,
    signal: null,
    stdout: Buffer.from('return 1\n'),
    stderr: '',
    durationMs: 1,
    truncated: false,
    ...overrides,
  };
}

function createRunner(): ExternalToolRunner {
  return new ExternalToolRunner(
    ToolRegistry.fromConfig({
      luau: { command: 'luau-lifter', args: [] },
      luajit: { command: 'luajit-decompiler' },
      timeoutMs: 30000,
      maxOutputBytes: 1024 * 1024,
    })
  );
}

describe('expandArgs', () => {
  it('substitutes indent and input placeholders', () => {
    expect(expandArgs(['--indent', '{indent}', '--in={input}'], { indent: 2, input: 'a.bin' })).toEqual([
      '--indent',
      '2',
      '--in=a.bin',
    ]);
  });
});

describe('ExternalDecompiler', () => {
  it('pipes bytecode to the Luau decompiler on stdin', async () => {
    const runner = createRunner();
    const run = vi.spyOn(runner, 'run').mockResolvedValue(result());
    const decompiler = new ExternalDecompiler(runner, {
      tool: 'luau.decompiler',
      args: ['--indent', '{indent}'],
      timeoutMs: 5000,
      maxOutputBytes: 2048,
    });
    const bytecode = Uint8Array.from([3, 0]);

    const output = await decompiler.decompile(bytecode, 1);

    expect(Buffer.from(output).toString()).toBe('return 1\n');
    expect(run).toHaveBeenCalledWith({
      tool: 'luau.decompiler',
      args: ['--indent', '1'],
      stdin: bytecode,
      timeoutMs: 5000,
      maxStdoutBytes: 2048,
    });
  });

  it('throws a decompiler error with stderr on failure', async () => {
    const runner = createRunner();
    vi.spyOn(runner, 'run').mockResolvedValue(result({ ok: false, exitCode: 101, stderr: 'panicked\n' }));
    const decompiler = new ExternalDecompiler(runner, { tool: 'luau.decompiler', args: [], timeoutMs: 5000 });

    const failure = decompiler.decompile(new Uint8Array(1), 1);
    await expect(failure).rejects.toThrow(ToolError);
    await expect(decompiler.decompile(new Uint8Array(1), 1)).rejects.toThrow(
      "Decompiler 'luau.decompiler' failed: panicked"
    );
  });

  it('refuses output cut off at the capture limit', async () => {
    const runner = createRunner();
    vi.spyOn(runner, 'run').mockResolvedValue(result({ stdout: Buffer.from('local v1 = '), truncated: true }));
    const decompiler = new ExternalDecompiler(runner, { tool: 'luau.decompiler', args: [], timeoutMs: 5000 });

    await expect(decompiler.decompile(new Uint8Array(1), 1)).rejects.toMatchObject({
      code: 'DECOMPILER',
      message: "Decompiler 'luau.decompiler' output exceeded the capture limit",
    });
  });

  it('stages LuaJIT input in a temp file and cleans it up', async () => {
    const runner = createRunner();
    let stagedPath = '';
    const run = vi.spyOn(runner, 'run').mockImplementation(async (request) => {
      stagedPath = request.args[request.args.length - 1] ?? '';
      expect(existsSync(stagedPath)).toBe(true);
      expect(request.cwd).toBe(dirname(stagedPath));
      return result({ stdout: Buffer.from('-- luajit\n') });
    });
    const decompiler = new ExternalDecompiler(runner, {
      tool: 'luajit.decompiler',
      args: [],
      timeoutMs: 5000,
      fileInput: true,
    });

    const output = await decompiler.decompile(Uint8Array.from([0x1b, 0x4c, 0x4a, 0x02]), 1);

    expect(Buffer.from(output).toString()).toBe('-- luajit\n');
    expect(run).toHaveBeenCalledTimes(1);
    expect(stagedPath.endsWith('input.ljbc')).toBe(true);
    expect(existsSync(dirname(stagedPath))).toBe(false);
  });
});
