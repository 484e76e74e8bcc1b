import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EventEmitter } from 'node:events';

const state = vi.hoisted(() => {
  const spawn = vi.fn();
  const getProjectRoot = vi.fn(() => '/repo/root');
  const processLimit = vi.fn(async (task: () => Promise<unknown>) => task());
  const probeCommand = vi.fn();
  return { spawn, getProjectRoot, processLimit, probeCommand };
});

vi.mock('node:child_process', () => ({
  spawn: state.spawn,
}));

vi.mock('../../../src/utils/outputPaths.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/utils/outputPaths.js')>()),
  getProjectRoot: state.getProjectRoot,
}));

vi.mock('../../../src/utils/concurrency.js', () => ({
  processLimit: state.processLimit,
}));

vi.mock('../../../src/modules/external/ToolProbe.js', () => ({
  probeCommand: state.probeCommand,
}));

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ExternalToolRunner } from '../../../src/modules/external/ExternalToolRunner.js';
import { ToolRegistry } from '../../../src/modules/external/ToolRegistry.js';

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  stdin = Object.assign(new EventEmitter(), { end: vi.fn() });
  kill = vi.fn();
}

function createRegistry(): ToolRegistry {
  return new ToolRegistry([{ name: 'luau.decompiler', command: 'lifter-bin', required: true }]);
}

function startChild(): FakeChild {
  const child = new FakeChild();
  state.spawn.mockReturnValue(child);
  return child;
}

describe('ExternalToolRunner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useRealTimers();
  });

  it('returns early when the cached probe marks the tool unavailable', async () => {
    state.probeCommand.mockResolvedValue({ available: false, reason: 'missing' });
    const registry = createRegistry();
    await registry.probeAll();
    const runner = new ExternalToolRunner(registry);

    const result = await runner.run({ tool: 'luau.decompiler', args: [] });

    expect(result.ok).toBe(false);
    expect(result.stderr).toBe("Tool 'luau.decompiler' (lifter-bin) is not available: missing");
    expect(state.spawn).not.toHaveBeenCalled();
  });

  it('merges availability with each registered spec', async () => {
    state.probeCommand.mockImplementation(async (command: string) =>
      command === 'lifter-bin'
        ? { available: true, path: '/usr/bin/lifter-bin', version: '1.0.0' }
        : { available: false, reason: 'not found in PATH' }
    );
    const runner = new ExternalToolRunner(
      new ToolRegistry([
        { name: 'luau.decompiler', command: 'lifter-bin', required: true },
        { name: 'luajit.decompiler', command: 'jit-bin', required: false },
      ])
    );

    const statuses = await runner.checkTools(true);

    expect(statuses).toEqual([
      {
        name: 'luau.decompiler',
        command: 'lifter-bin',
        required: true,
        available: true,
        path: '/usr/bin/lifter-bin',
        version: '1.0.0',
      },
      { name: 'luajit.decompiler', command: 'jit-bin', required: false, available: false, reason: 'not found in PATH' },
    ]);
  });

  it('spawns with the request args, pipes stdin and captures raw bytes', async () => {
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());
    const input = Uint8Array.from([3, 0, 1]);

    const pending = runner.run({ tool: 'luau.decompiler', args: ['--indent', '1'], stdin: input });

    child.stdout.emit('data', Buffer.from([0xff, 0x41]));
    child.stdout.emit('data', Buffer.from([0x42]));
    child.stderr.emit('data', Buffer.from('warn'));
    child.emit('close', 0, null);

    const result = await pending;

    expect(state.spawn).toHaveBeenCalledWith(
      'lifter-bin',
      ['--indent', '1'],
      expect.objectContaining({ cwd: '/repo/root', shell: false })
    );
    expect(child.stdin.end).toHaveBeenCalledWith(input);
    expect(Array.from(result.stdout)).toEqual([0xff, 0x41, 0x42]);
    expect(result).toMatchObject({ ok: true, exitCode: 0, stderr: 'warn', truncated: false });
    expect(state.processLimit).toHaveBeenCalledTimes(1);
  });

  it('truncates stdout when maxStdoutBytes is exceeded', async () => {
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());

    const pending = runner.run({ tool: 'luau.decompiler', args: [], maxStdoutBytes: 4 });

    child.stdout.emit('data', Buffer.from('abcdef'));
    child.emit('close', 0, null);

    const result = await pending;
    expect(result.stdout.toString()).toBe('abcd');
    expect(result.truncated).toBe(true);
  });

  it('reports a non-zero exit as a failed run', async () => {
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());

    const pending = runner.run({ tool: 'luau.decompiler', args: [] });
    child.emit('close', 2, null);

    await expect(pending).resolves.toMatchObject({ ok: false, exitCode: 2 });
  });

  it('reports spawn errors through stderr', async () => {
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());

    const pending = runner.run({ tool: 'luau.decompiler', args: [] });
    child.emit('error', new Error('spawn lifter-bin ENOENT'));

    const result = await pending;
    expect(result.ok).toBe(false);
    expect(result.stderr).toBe('\nSpawn error: spawn lifter-bin ENOENT');
  });

  it('uses project root when cwd is outside allowed boundaries', async () => {
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());

    const pending = runner.run({ tool: 'luau.decompiler', args: [], cwd: '/etc' });
    child.emit('close', 0, null);
    await pending;

    expect(state.spawn).toHaveBeenCalledWith('lifter-bin', [], expect.objectContaining({ cwd: '/repo/root' }));
  });

  it('allows a working directory under the system temp dir', async () => {
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());

    const pending = runner.run({ tool: 'luau.decompiler', args: [], cwd: '/tmp/luau-restore-abc' });
    child.emit('close', 0, null);
    await pending;

    expect(state.spawn).toHaveBeenCalledWith(
      'lifter-bin',
      [],
      expect.objectContaining({ cwd: '/tmp/luau-restore-abc' })
    );
  });

  it('kills hung process on timeout and reports SIGKILL', async () => {
    vi.useFakeTimers();
    const child = startChild();
    const runner = new ExternalToolRunner(createRegistry());

    const pending = runner.run({ tool: 'luau.decompiler', args: [], timeoutMs: 10 });

    await vi.advanceTimersByTimeAsync(11);
    await vi.advanceTimersByTimeAsync(2001);
    const result = await pending;

    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    expect(result.signal).toBe('SIGKILL');
    expect(result.ok).toBe(false);
    vi.useRealTimers();
  });
});
