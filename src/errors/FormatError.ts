/**
 * Thrown by the structural decoder and header detection when the bytecode
 * container is malformed or of a version this tool does not read.
 *
 * Carries the byte offset and the field being read so a failure can be
 * located in a hex dump.
 */
import { ToolError } from './ToolError.js';

export type FormatErrorReason =
  | 'UNSUPPORTED_VERSION'
  | 'UNSUPPORTED_TYPES_VERSION'
  | 'UNKNOWN_HEADER'
  | 'TRUNCATED'
  | 'MALFORMED_VARINT'
  | 'SYMBOL_OUT_OF_RANGE'
  | 'UNKNOWN_CONSTANT';

export class FormatError extends ToolError {
  readonly reason: FormatErrorReason;
  readonly offset: number;
  readonly field: string;

  constructor(
    reason: FormatErrorReason,
    message: string,
    context: { offset: number; field: string; expected?: unknown; found?: unknown },
  ) {
    super('FORMAT', `${message} (field '${context.field}' at offset ${context.offset})`, {
      details: { reason, ...context },
    });
    this.name = 'FormatError';
    this.reason = reason;
    this.offset = context.offset;
    this.field = context.field;
  }
}
