/**
 * External Tool Runner types
 * Unified interface for safely invoking the external decompilers.
 */

export type ExternalToolName =
  | 'luau.decompiler'
  | 'luajit.decompiler';

export interface ExternalToolSpec {
  /** Unique tool identifier */
  name: ExternalToolName;
  /** Executable command name (resolved via PATH or absolute) */
  command: string;
  /** Arguments to check version (e.g. ['--version']) */
  versionArgs?: string[];
  /** If true, probe failure is a hard error; if false, tool is optional */
  required: boolean;
}

export interface ToolRunRequest {
  /** Which tool to invoke */
  tool: ExternalToolName;
  /** Arguments (array form only, never a shell string) */
  args: string[];
  /** Working directory for the child process */
  cwd?: string;
  /** Timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Max stdout bytes before truncation (default: 64MB) */
  maxStdoutBytes?: number;
  /** Optional stdin data to pipe; bytecode is passed as raw bytes */
  stdin?: Uint8Array | string;
}

export interface ToolRunResult {
  ok: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Raw bytes; decompiler output is not guaranteed to be UTF-8. */
  stdout: Buffer;
  stderr: string;
  durationMs: number;
  /** Stdout hit the byte cap; stderr is cut silently. */
  truncated: boolean;
}

export interface ToolProbeResult {
  available: boolean;
  path?: string;
  version?: string;
  reason?: string;
}

export interface ToolStatus extends ToolProbeResult {
  name: ExternalToolName;
  command: string;
  required: boolean;
}

/** Anything that turns plain bytecode into pseudocode bytes. */
export interface Decompiler {
  decompile(bytecode: Uint8Array, indent: number): Promise<Uint8Array>;
}
