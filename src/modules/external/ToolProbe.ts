/**
 * Tool availability probe.
 * Detects whether the external decompilers are available on the system.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '../../utils/logger.js';
import type { ToolProbeResult } from './types.js';

const execFileAsync = promisify(execFile);

export type ProbeResult = ToolProbeResult;

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return String(err.code);
  }
  return undefined;
}

/**
 * Check if a command exists and optionally extract its version.
 */
export async function probeCommand(
  command: string,
  versionArgs: string[] = ['--version'],
  timeoutMs = 5000
): Promise<ProbeResult> {
  try {
    // On Windows, use 'where'; on Unix, use 'which'
    const whichCmd = process.platform === 'win32' ? 'where' : 'which';
    const { stdout: pathOutput } = await execFileAsync(whichCmd, [command], {
      timeout: timeoutMs,
      windowsHide: true,
    });
    const resolvedPath = pathOutput.trim().split(/\r?\n/)[0];

    let version: string | undefined;
    try {
      const { stdout: versionOutput } = await execFileAsync(command, versionArgs, {
        timeout: timeoutMs,
        windowsHide: true,
      });
      const firstLine = versionOutput.trim().split(/\r?\n/)[0];
      version = firstLine ? firstLine.substring(0, 100) : undefined;
    } catch (err) {
      // Many decompilers have no version flag; the tool is still usable.
      logger.debug(`[ToolProbe] ${command} did not report a version`, err);
    }

    return { available: true, path: resolvedPath, version };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      available: false,
      reason: errorCode(err) === 'ENOENT'
        ? `Command '${command}' not found in PATH`
        : `Probe failed: ${message.substring(0, 200)}`,
    };
  }
}
