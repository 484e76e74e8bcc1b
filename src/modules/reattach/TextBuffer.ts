/**
 * Mutable text with live anchors.
 *
 * Every edit goes through {@link TextBuffer.splice}, which shifts the
 * anchors registered on the buffer. Positions held as anchors therefore stay
 * valid across insertions and renames made anywhere else in the text.
 */

export interface Anchor {
  readonly position: number;
}

class LiveAnchor implements Anchor {
  constructor(public position: number) {}
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

/**
 * Matches whole identifiers only: not part of a longer name, not a field
 * or method name after a single `.` or `:` (a `..` concatenation still
 * counts as a boundary).
 */
function identifierPattern(names: Iterable<string>): RegExp {
  const alternatives = Array.from(names, escapeRegExp)
    .sort((a, b) => b.length - a.length)
    .join('|');
  return new RegExp(`(?<![A-Za-z0-9_:])(?<!(?<!\\.)\\.)(?:${alternatives})(?![A-Za-z0-9_])`, 'g');
}

export class TextBuffer {
  private value: string;
  private readonly anchors = new Set<LiveAnchor>();

  constructor(text: string) {
    this.value = text;
  }

  toString(): string {
    return this.value;
  }

  slice(start: number, end?: number): string {
    return this.value.slice(start, end);
  }

  /** Track `position` through later edits. Anchors at an insertion point stay put. */
  anchor(position: number): Anchor {
    const anchor = new LiveAnchor(Math.max(0, Math.min(position, this.value.length)));
    this.anchors.add(anchor);
    return anchor;
  }

  release(anchor: Anchor): void {
    if (anchor instanceof LiveAnchor) {
      this.anchors.delete(anchor);
    }
  }

  splice(start: number, end: number, replacement: string): void {
    if (start < 0 || end < start || end > this.value.length) {
      throw new RangeError(`Invalid splice range ${start}..${end} (length ${this.value.length})`);
    }
    const delta = replacement.length - (end - start);
    this.value = this.value.slice(0, start) + replacement + this.value.slice(end);

    for (const anchor of this.anchors) {
      if (anchor.position <= start) continue;
      anchor.position = anchor.position >= end ? anchor.position + delta : start;
    }
  }

  insert(position: number, text: string): void {
    this.splice(position, position, text);
  }

  /**
   * Replace the first occurrence of `search` at or after `from`.
   * Returns the end of the inserted text, or undefined when not found.
   */
  replaceFirst(search: string, replacement: string, from = 0): number | undefined {
    const index = this.value.indexOf(search, from);
    if (index === -1) {
      return undefined;
    }
    this.splice(index, index + search.length, replacement);
    return index + replacement.length;
  }

  /** Replace `search` only if the text at `position` starts with it. */
  replaceAt(position: number, search: string, replacement: string): boolean {
    if (this.value.slice(position, position + search.length) !== search) {
      return false;
    }
    this.splice(position, position + search.length, replacement);
    return true;
  }

  /**
   * Rename whole identifiers inside [start, end) in one pass, so a mapping
   * like `a -> b, b -> a` swaps instead of collapsing. Returns the number
   * of replacements.
   */
  replaceIdentifiers(mapping: ReadonlyMap<string, string>, start = 0, end = this.value.length): number {
    const entries = Array.from(mapping).filter(([from, to]) => from !== to && isIdentifier(from));
    if (entries.length === 0 || end <= start) {
      return 0;
    }
    const renames = new Map(entries);
    const pattern = identifierPattern(renames.keys());
    const region = this.value.slice(start, end);

    const hits: Array<{ index: number; from: string; to: string }> = [];
    for (const match of region.matchAll(pattern)) {
      const to = renames.get(match[0]);
      if (match.index !== undefined && to !== undefined) {
        hits.push({ index: start + match.index, from: match[0], to });
      }
    }

    // Back to front so earlier hit positions remain correct.
    for (let i = hits.length - 1; i >= 0; i--) {
      const hit = hits[i];
      this.splice(hit.index, hit.index + hit.from.length, hit.to);
    }
    return hits.length;
  }
}
