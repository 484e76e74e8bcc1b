import { logger } from '../../utils/logger.js';
import {
  findFunctionEnd,
  lineIndentation,
  readSignatureLine,
} from './FunctionSiteLocator.js';
import type { Anchor, TextBuffer } from './TextBuffer.js';

const PARAMETER_LIST = /\((.*?)\)/;
const CLASS_PATH = /\b(\w+\.\w+)\(/;

/** Placeholder the decompiler uses for bindings that are never read. */
const UNUSED_PARAMETER = '_';

/**
 * One located function definition, bound to a {@link TextBuffer}.
 *
 * Created only when the textual parameter list has exactly as many entries
 * as the bytecode names; otherwise nothing about the site is touched.
 */
export class FunctionSite {
  hasSelf = false;

  private constructor(
    readonly name: string,
    /** Names recovered from debug info. */
    readonly parameters: readonly string[],
    /** Raw entries of the textual parameter list, untrimmed. */
    readonly definitionParameters: readonly string[],
    readonly definitionParametersText: string,
    /** Signature line as it was before any edit. */
    readonly definition: string,
    private readonly start: Anchor,
    private readonly end: Anchor,
  ) {}

  get position(): number {
    return this.start.position;
  }

  get extentEnd(): number {
    return this.end.position;
  }

  /**
   * Validate the signature at `match` and claim the site: a line break is
   * inserted before the definition so annotations land on their own lines.
   */
  static fromMatch(
    buffer: TextBuffer,
    name: string,
    parameters: readonly string[],
    match: number,
  ): FunctionSite | undefined {
    const text = buffer.toString();
    const definition = readSignatureLine(text, match);

    const list = PARAMETER_LIST.exec(definition);
    if (!list || list[1].length === 0) {
      logger.debug(`[FunctionSite] '${name}' has no textual parameter list`);
      return undefined;
    }

    const definitionParametersText = list[1];
    const definitionParameters = definitionParametersText.split(',');
    if (definitionParameters.length !== parameters.length) {
      logger.debug(
        `[FunctionSite] '${name}' arity mismatch: text has ${definitionParameters.length}, bytecode has ${parameters.length}`
      );
      return undefined;
    }

    const indent = lineIndentation(text, match);
    buffer.insert(match, '\n');
    const position = match + 1;
    const end = findFunctionEnd(buffer.toString(), position, indent);

    return new FunctionSite(
      name,
      parameters,
      definitionParameters,
      definitionParametersText,
      definition,
      buffer.anchor(position),
      buffer.anchor(end),
    );
  }

  /**
   * Swap the textual parameter list for the recovered names, then rename
   * each parameter through the rest of the function body.
   */
  renameParameters(buffer: TextBuffer): void {
    const bodyStart = buffer.replaceFirst(
      `(${this.definitionParametersText})`,
      `(${this.parameters.join(', ')})`,
      this.position,
    );

    const renames = new Map<string, string>();
    this.definitionParameters.forEach((raw, i) => {
      const original = raw.trim();
      const recovered = this.parameters[i];

      if (original === 'self' || recovered === 'self') {
        this.hasSelf = true;
      }
      if (original !== UNUSED_PARAMETER) {
        renames.set(original, recovered);
      }
    });

    buffer.replaceIdentifiers(renames, bodyStart ?? this.position, this.extentEnd);
  }

  /**
   * `function T.m(self, x)` -> `function T:m(x)` and
   * `function T.m(self)` -> `function T:m()`.
   */
  renameSelf(buffer: TextBuffer): void {
    if (!this.hasSelf) {
      return;
    }
    const classPath = this.getClassPath();
    if (!classPath) {
      return;
    }

    const methodPath = classPath.replace('.', ':');
    if (this.definitionParameters.length === 1) {
      buffer.replaceAt(this.position, `function ${classPath}(self)`, `function ${methodPath}()`);
    } else {
      buffer.replaceAt(this.position, `function ${classPath}(self, `, `function ${methodPath}(`);
    }
  }

  /** `Table.member` when the definition is a two-segment table function. */
  getClassPath(): string | undefined {
    return CLASS_PATH.exec(this.definition)?.[1];
  }

  release(buffer: TextBuffer): void {
    buffer.release(this.start);
    buffer.release(this.end);
  }
}
