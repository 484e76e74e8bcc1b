/**
 * ExternalToolRunner: safe, unified external CLI invocation.
 *
 * - Only registered tools can be invoked (ToolRegistry allowlist)
 * - Always spawns with shell:false; arguments are array-only
 * - stdout is captured as raw bytes and bounded (truncation on overflow)
 * - Timeout enforced per invocation
 * - CWD boundary checked against project root
 */

import { spawn } from 'node:child_process';
import { resolve } from 'node:path';
import { getProjectRoot, isInside } from '../../utils/outputPaths.js';
import { logger } from '../../utils/logger.js';
import { processLimit } from '../../utils/concurrency.js';
import type { ToolRegistry } from './ToolRegistry.js';
import type {
  ToolRunRequest,
  ToolRunResult,
  ToolStatus,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_STDOUT = 64 * 1024 * 1024; // 64MB
const MAX_STDERR_BYTES = 1 * 1024 * 1024;  // 1MB
const KILL_GRACE_MS = 2000;

export class ExternalToolRunner {
  constructor(private readonly registry: ToolRegistry) {}

  /**
   * Probe every registered tool. A required tool that is missing makes the
   * set unusable; optional ones only limit which inputs can be handled.
   */
  async checkTools(force = false): Promise<ToolStatus[]> {
    const probes = await this.registry.probeAll(force);
    return this.registry.getRegisteredTools().map((name) => {
      const spec = this.registry.getSpec(name);
      const probe = probes.get(name) ?? { available: false, reason: 'not probed' };
      return { name, command: spec.command, required: spec.required, ...probe };
    });
  }

  /**
   * Run an external tool. Wrapped in processLimit for global concurrency control.
   */
  async run(request: ToolRunRequest): Promise<ToolRunResult> {
    return processLimit(() => this._run(request));
  }

  private async _run(request: ToolRunRequest): Promise<ToolRunResult> {
    const spec = this.registry.getSpec(request.tool);

    const probe = this.registry.getCachedProbe(request.tool);
    if (probe && !probe.available) {
      return {
        ok: false,
        exitCode: null,
        signal: null,
        stdout: Buffer.alloc(0),
        stderr: `Tool '${request.tool}' (${spec.command}) is not available: ${probe.reason}`,
        durationMs: 0,
        truncated: false,
      };
    }

    const cwd = this.validateCwd(request.cwd);

    // Minimal environment
    const env: Record<string, string> = { PATH: process.env.PATH || '' };
    if (process.platform === 'win32') {
      env.SYSTEMROOT = process.env.SYSTEMROOT || 'C:\\Windows';
      env.TEMP = process.env.TEMP || '';
      env.TMP = process.env.TMP || '';
    }

    const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const maxStdout = request.maxStdoutBytes ?? DEFAULT_MAX_STDOUT;

    logger.debug(`[ExternalToolRunner] Running: ${spec.command} ${request.args.join(' ')}`);
    const startTime = Date.now();

    return new Promise<ToolRunResult>((resolvePromise) => {
      const child = spawn(spec.command, request.args, {
        cwd,
        env,
        shell: false,
        windowsHide: true,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const stdoutChunks: Buffer[] = [];
      let stdoutBytes = 0;
      let stderr = '';
      let stdoutTruncated = false;
      let stderrTruncated = false;
      let settled = false;
      let killHandle: ReturnType<typeof setTimeout> | undefined;

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        if (killHandle) clearTimeout(killHandle);

        const durationMs = Date.now() - startTime;
        const result: ToolRunResult = {
          ok: exitCode === 0,
          exitCode,
          signal,
          stdout: Buffer.concat(stdoutChunks, stdoutBytes),
          stderr,
          durationMs,
          truncated: stdoutTruncated,
        };

        if (stderrTruncated) {
          logger.debug(`[ExternalToolRunner] ${spec.command} stderr cut at ${MAX_STDERR_BYTES} bytes`);
        }
        if (result.ok) {
          logger.debug(`[ExternalToolRunner] ${spec.command} completed in ${durationMs}ms`);
        } else {
          logger.warn(`[ExternalToolRunner] ${spec.command} failed (exit=${exitCode}, signal=${signal}) in ${durationMs}ms`);
        }

        resolvePromise(result);
      };

      const timeoutHandle = setTimeout(() => {
        if (settled) return;
        child.kill('SIGTERM');
        killHandle = setTimeout(() => {
          if (!settled) {
            child.kill('SIGKILL');
            finish(null, 'SIGKILL');
          }
        }, KILL_GRACE_MS);
      }, timeoutMs);

      // A decompiler that exits before reading all of stdin raises EPIPE here.
      child.stdin.on('error', (err) => {
        logger.debug(`[ExternalToolRunner] ${spec.command} stdin closed early`, err);
      });
      if (request.stdin !== undefined) {
        child.stdin.end(request.stdin);
      } else {
        child.stdin.end();
      }

      child.stdout.on('data', (chunk: Buffer) => {
        if (stdoutBytes < maxStdout) {
          const take = chunk.subarray(0, maxStdout - stdoutBytes);
          stdoutChunks.push(take);
          stdoutBytes += take.length;
          if (take.length < chunk.length) stdoutTruncated = true;
        } else if (chunk.length > 0) {
          stdoutTruncated = true;
        }
      });

      child.stderr.on('data', (chunk: Buffer) => {
        if (stderr.length < MAX_STDERR_BYTES) {
          const remaining = MAX_STDERR_BYTES - stderr.length;
          stderr += chunk.toString('utf-8', 0, Math.min(chunk.length, remaining));
          if (chunk.length > remaining) stderrTruncated = true;
        }
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        finish(code, signal);
      });

      child.on('error', (err) => {
        stderr += `\nSpawn error: ${err.message}`;
        finish(1, null);
      });
    });
  }

  /**
   * Validate that the CWD is within the project root or system temp.
   */
  private validateCwd(requestedCwd?: string): string {
    const projectRoot = getProjectRoot();
    if (!requestedCwd) {
      return projectRoot;
    }

    const resolved = resolve(requestedCwd);
    if (isInside(projectRoot, resolved)) {
      return resolved;
    }

    const tmpDirs = [process.env.TEMP, process.env.TMP, process.env.TMPDIR, '/tmp', '/var/tmp'];
    for (const tmp of tmpDirs) {
      if (tmp && (resolved === resolve(tmp) || isInside(resolve(tmp), resolved))) {
        return resolved;
      }
    }

    logger.warn(`[ExternalToolRunner] CWD '${requestedCwd}' outside allowed boundaries, using project root`);
    return projectRoot;
  }
}
