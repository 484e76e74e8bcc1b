import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import type { Decompiler } from '../../../src/modules/external/types.js';
import { encodeBytecode } from '../../../src/modules/obfuscation/BytecodeCodec.js';
import { collectInputFiles, processBatch } from '../../../src/modules/pipeline/BatchProcessor.js';
import { DEFAULT_DECOMPILE_OPTIONS } from '../../../src/types/index.js';
import { buildModule } from '../../helpers/BytecodeWriter.js';

const plain = buildModule({ prototypes: [{ name: 'run', params: ['speed'] }, {}] });

const decompiler: Decompiler = {
  decompile: async () => new TextEncoder().encode('function run(p1)\n\treturn p1\nend\n'),
};

describe('BatchProcessor', () => {
  let root: string;
  let input: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'luau-restore-batch-'));
    input = join(root, 'in');
    await mkdir(join(input, 'sub'), { recursive: true });
    await writeFile(join(input, 'a.l64'), encodeBytecode(plain));
    await writeFile(join(input, 'sub', 'b.l64'), encodeBytecode(plain, { variant: true }));
    await writeFile(join(input, 'XMLSchema.l64'), 'not bytecode');
    await writeFile(join(input, 'notes.txt'), 'ignored');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('collects .l64 files, skipping schema files and honouring recursion', async () => {
    await expect(collectInputFiles(input)).resolves.toEqual([join(input, 'a.l64')]);
    await expect(collectInputFiles(input, true)).resolves.toEqual([
      join(input, 'a.l64'),
      join(input, 'sub', 'b.l64'),
    ]);
  });

  it('treats a file path as a single input', async () => {
    await expect(collectInputFiles(join(input, 'notes.txt'))).resolves.toEqual([join(input, 'notes.txt')]);
  });

  it('reports a missing input path', async () => {
    await expect(collectInputFiles(join(root, 'missing'))).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('decodes a tree into a mirrored output directory', async () => {
    const output = join(root, 'out');
    const report = await processBatch({
      input,
      output,
      mode: 'decode',
      recursive: true,
      decompileOptions: DEFAULT_DECOMPILE_OPTIONS,
    });

    expect(report.failed).toEqual([]);
    expect(report.succeeded.map((s) => s.output)).toEqual([join(output, 'a.l64'), join(output, 'sub', 'b.l64')]);
    expect(Array.from(await readFile(join(output, 'a.l64')))).toEqual(Array.from(plain));
    expect(Array.from(await readFile(join(output, 'sub', 'b.l64')))).toEqual(Array.from(plain));
  });

  it('decompiles to .lua files and reports failures per file', async () => {
    await writeFile(join(input, 'broken.l64'), Uint8Array.from([0x07, 0x00, 0x00]));
    const output = join(root, 'out');

    const report = await processBatch({
      input,
      output,
      mode: 'decompile',
      maxConcurrency: 2,
      decompileOptions: DEFAULT_DECOMPILE_OPTIONS,
      decompilers: { luau: decompiler },
    });

    expect(report.succeeded.map((s) => s.input)).toEqual([join(input, 'a.l64')]);
    expect(await readFile(join(output, 'a.lua'), 'utf-8')).toBe('\nfunction run(speed)\n\treturn speed\nend\n');

    expect(report.failed).toHaveLength(1);
    const [failure] = report.failed;
    expect(failure.code).toBe('FORMAT');
    expect(failure.file).toBe(join(input, 'broken.l64'));
    expect(failure.message).toBe(
      `${join(input, 'broken.l64')}: Unsupported/unknown bytecode (field 'header' at offset 0)`
    );
    expect(existsSync(join(output, 'broken.lua'))).toBe(false);
  });

  it('writes decompiled output beside the input when no output root is given', async () => {
    const report = await processBatch({
      input: join(input, 'a.l64'),
      mode: 'decompile',
      decompileOptions: DEFAULT_DECOMPILE_OPTIONS,
      decompilers: { luau: decompiler },
    });

    expect(report.succeeded.map((s) => s.output)).toEqual([join(input, 'a.lua')]);
  });

  it('requires an output root for decode and encode', async () => {
    await expect(
      processBatch({ input, mode: 'encode', decompileOptions: DEFAULT_DECOMPILE_OPTIONS })
    ).rejects.toMatchObject({ code: 'VALIDATION' });
  });

  it('encodes plain bytecode with the requested key set', async () => {
    const plainDir = join(root, 'plain');
    const output = join(root, 'encoded');
    await mkdir(plainDir);
    await writeFile(join(plainDir, 'c.l64'), plain);

    const report = await processBatch({
      input: plainDir,
      output,
      mode: 'encode',
      variant: true,
      decompileOptions: DEFAULT_DECOMPILE_OPTIONS,
    });

    expect(report.failed).toEqual([]);
    const encoded = await readFile(join(output, 'c.l64'));
    expect(Array.from(encoded)).toEqual(Array.from(encodeBytecode(plain, { variant: true })));
  });
});
