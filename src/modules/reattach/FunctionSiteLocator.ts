/**
 * Finds where a function's textual definition begins in decompiled output.
 *
 * Pattern: optional `local`, the `function` keyword, an optional qualified
 * prefix ending in `.` or `:`, the exact name, then `(`. This is a finder,
 * not a parser; a stricter implementation can replace these functions
 * without touching the reattachment engine.
 */
import { logger } from '../../utils/logger.js';
import { escapeRegExp } from './TextBuffer.js';

/** A body that closes on the signature line: `function f(a) return a end`. */
const INLINE_END = /(?<![A-Za-z0-9_.:])end\s*$/;

export function buildSitePattern(name: string): RegExp | undefined {
  try {
    return new RegExp(
      `(?:local\\s+)?function\\s+(?:[A-Za-z0-9_.:]*[.:])?${escapeRegExp(name)}\\(`,
      'g'
    );
  } catch (error) {
    logger.debug(`[FunctionSiteLocator] Pattern for '${name}' does not compile`, error);
    return undefined;
  }
}

/** Offset of the first site for `name` at or after `from`. */
export function locateFunction(text: string, name: string, from = 0): number | undefined {
  if (!name) {
    return undefined;
  }
  const pattern = buildSitePattern(name);
  if (!pattern) {
    return undefined;
  }
  pattern.lastIndex = Math.max(0, from);
  const match = pattern.exec(text);
  return match ? match.index : undefined;
}

/** Leading whitespace of the line containing `position`. */
export function lineIndentation(text: string, position: number): string {
  const lineStart = text.lastIndexOf('\n', position - 1) + 1;
  const indent = /^[ \t]*/.exec(text.slice(lineStart, position));
  return indent ? indent[0] : '';
}

/**
 * End of the function starting at `from`: the end of the signature line when
 * the body closes on that line, otherwise just past the first `end` at
 * `indent` on its own line. Falls back to the end of text.
 */
export function findFunctionEnd(text: string, from: number, indent: string): number {
  const signature = readSignatureLine(text, from);
  const close = signature.indexOf(')');
  if (close !== -1 && INLINE_END.test(signature.slice(close + 1))) {
    return from + signature.length;
  }
  const pattern = new RegExp(`\\n${escapeRegExp(indent)}end(?![A-Za-z0-9_])`, 'g');
  pattern.lastIndex = from;
  const match = pattern.exec(text);
  return match ? match.index + match[0].length : text.length;
}

/** Offset of the line break ending the line that contains `position`, or the text length. */
export function signatureLineEnd(text: string, position: number): number {
  const lineEnd = text.indexOf('\n', position);
  return lineEnd === -1 ? text.length : lineEnd;
}

/** Text from `position` to the end of its line, without the line break. */
export function readSignatureLine(text: string, position: number): string {
  const line = text.slice(position, signatureLineEnd(text, position));
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
