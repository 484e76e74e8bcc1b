import { ToolError } from './ToolError.js';

/** No byteshift table is registered for the detected header key. */
export class TransformError extends ToolError {
  constructor(message: string, key: Record<string, unknown>) {
    super('TRANSFORM', message, { details: key });
    this.name = 'TransformError';
  }
}
