/**
 * Classified pipeline error with structured error codes.
 *
 * Every stage throws one of these instead of a bare `Error`, so the batch
 * driver and the CLI can tell a malformed input apart from a missing tool
 * and report it against the file it came from.
 */

export type ToolErrorCode =
  | 'FORMAT'        // malformed or unsupported bytecode container
  | 'TRANSFORM'     // no byteshift table for the detected header
  | 'DECOMPILER'    // external decompiler missing or failed
  | 'VALIDATION'    // invalid arguments or configuration
  | 'NOT_FOUND'     // input path does not exist
  | 'IO';           // read/write failure

/** Codes that mean "this input is bad", as opposed to an environment problem. */
export const INPUT_ERROR_CODES: ReadonlySet<ToolErrorCode> = new Set([
  'FORMAT',
  'TRANSFORM',
]);

export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly file?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ToolErrorCode,
    message: string,
    options?: {
      file?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ToolError';
    this.code = code;
    this.file = options?.file;
    this.details = options?.details;
  }
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}

/**
 * Wrap any failure with the file it came from, keeping the original code
 * (or `IO` for non-classified errors) and the original error as `cause`.
 */
export function attachFile(error: unknown, file: string): ToolError {
  if (error instanceof ToolError && error.file === file) {
    return error;
  }
  const code: ToolErrorCode = error instanceof ToolError ? error.code : 'IO';
  const message = error instanceof Error ? error.message : String(error);
  const details = error instanceof ToolError ? error.details : undefined;
  return new ToolError(code, `${file}: ${message}`, { file, details, cause: error });
}
