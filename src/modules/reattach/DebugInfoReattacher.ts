/**
 * Reattaches bytecode debug info onto decompiled pseudocode.
 *
 * One linear pass over the prototypes in decode order, each making small
 * local edits at its own site. Every prototype that cannot be matched
 * exactly is skipped whole; the output is best effort and some functions
 * keep the decompiler's generic parameter names.
 */
import type { DecompileOptions } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { Prototype } from '../bytecode/Prototype.js';
import { formatLineComment, formatLocalsComment, formatUpvaluesComment } from './comments.js';
import { FunctionSite } from './FunctionSite.js';
import { locateFunction, signatureLineEnd } from './FunctionSiteLocator.js';
import { formatSymbolTable } from './SymbolTablePreamble.js';
import { type Anchor, TextBuffer } from './TextBuffer.js';

/** Name the decompiler gives a captured variable it could not resolve. */
const UPVALUE_PLACEHOLDER = /\bv_u_\d+_\b/g;

export interface DebugInfo {
  mainIndex: number;
  prototypes: readonly Prototype[];
  symbolTable: readonly string[];
}

export interface ReattachStats {
  located: number;
  skipped: number;
  upvaluesRenamed: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

export class DebugInfoReattacher {
  private stats: ReattachStats = { located: 0, skipped: 0, upvaluesRenamed: 0 };

  constructor(private readonly options: DecompileOptions) {}

  getStats(): ReattachStats {
    return { ...this.stats };
  }

  /**
   * Byte-level entry point. Output that is not valid UTF-8 cannot be
   * searched, so every prototype is skipped and only the preamble applies.
   */
  reattachBytes(source: Uint8Array, info: DebugInfo): Uint8Array {
    let text: string;
    try {
      text = utf8.decode(source);
    } catch (error) {
      logger.debug('[DebugInfoReattacher] Decompiled output is not valid UTF-8, skipping all prototypes', error);
      this.stats = { located: 0, skipped: info.prototypes.length, upvaluesRenamed: 0 };
      const preamble = this.options.emitSymbolTable ? formatSymbolTable(info.symbolTable) : '';
      if (!preamble) {
        return Uint8Array.from(source);
      }
      const head = encoder.encode(preamble);
      const out = new Uint8Array(head.length + source.length);
      out.set(head, 0);
      out.set(source, head.length);
      return out;
    }
    return encoder.encode(this.reattach(text, info));
  }

  reattach(text: string, info: DebugInfo): string {
    const { mainIndex, prototypes, symbolTable } = info;
    const buffer = new TextBuffer(text);
    // Where the next search for a given name resumes: past the signature line
    // of the previous site under that name, so repeats map to successive sites.
    const cursors = new Map<string, Anchor>();
    let nearest: Anchor | undefined;

    this.stats = { located: 0, skipped: 0, upvaluesRenamed: 0 };

    prototypes.forEach((prototype, i) => {
      const site = this.locateSite(buffer, prototype, cursors);

      if (site) {
        this.stats.located++;
        site.renameParameters(buffer);
        site.renameSelf(buffer);

        if (!nearest || site.position < nearest.position) {
          if (nearest) buffer.release(nearest);
          nearest = buffer.anchor(site.position);
        }
      } else if (prototype.name) {
        this.stats.skipped++;
      }

      if (this.options.emitVariableComments) {
        this.insertVariableComments(buffer, prototype, site, i === mainIndex);
      }

      if (this.options.emitLineNumbers && site && prototype.lineAnchor !== undefined) {
        buffer.insert(site.position, formatLineComment(prototype.lineAnchor));
      }

      site?.release(buffer);
    });

    this.stats.upvaluesRenamed = this.renameNearestUpvalues(buffer, mainIndex, prototypes, nearest);

    if (this.options.emitSymbolTable) {
      buffer.insert(0, formatSymbolTable(symbolTable));
    }

    logger.debug(
      `[DebugInfoReattacher] ${this.stats.located} located, ${this.stats.skipped} skipped, ${this.stats.upvaluesRenamed} upvalue placeholder(s) renamed`
    );
    return buffer.toString();
  }

  private locateSite(
    buffer: TextBuffer,
    prototype: Prototype,
    cursors: Map<string, Anchor>,
  ): FunctionSite | undefined {
    const name = prototype.name;
    const parameters = prototype.getParameters();

    // Anonymous and parameterless functions are not worth disambiguating.
    if (!name || parameters.length === 0) {
      return undefined;
    }

    const cursor = cursors.get(name);
    const text = buffer.toString();
    const match = locateFunction(text, name, cursor ? cursor.position : 0);
    if (match === undefined) {
      logger.debug(`[DebugInfoReattacher] No site found for '${name}'`);
      return undefined;
    }

    // Anchored before the site edits its own line, so it follows them.
    const next = buffer.anchor(signatureLineEnd(text, match));
    if (cursor) buffer.release(cursor);
    cursors.set(name, next);
    return FunctionSite.fromMatch(buffer, name, parameters, match);
  }

  private insertVariableComments(
    buffer: TextBuffer,
    prototype: Prototype,
    site: FunctionSite | undefined,
    isMain: boolean,
  ): void {
    const localNames = prototype.getLocals();

    if (site) {
      if (localNames.length > 0) {
        buffer.insert(site.position, formatLocalsComment(localNames));
      }
      if (prototype.upvalues.length > 0) {
        buffer.insert(site.position, formatUpvaluesComment(prototype.upvalues));
      }
      return;
    }

    if (isMain && localNames.length > 0) {
      buffer.insert(0, formatLocalsComment(localNames));
    }
  }

  /**
   * Best effort: unresolved captured variables before the first located
   * function are usually the main chunk's locals in declaration order.
   * Distinct placeholders are paired with those names until either runs out.
   */
  private renameNearestUpvalues(
    buffer: TextBuffer,
    mainIndex: number,
    prototypes: readonly Prototype[],
    nearest: Anchor | undefined,
  ): number {
    if (prototypes.length === 1 || !nearest) {
      return 0;
    }
    const main = prototypes[mainIndex];
    if (!main) {
      return 0;
    }

    const names = main.getLocals();
    const placeholders: string[] = [];
    for (const match of buffer.slice(0, nearest.position).matchAll(UPVALUE_PLACEHOLDER)) {
      if (!placeholders.includes(match[0])) {
        placeholders.push(match[0]);
      }
    }

    const renames = new Map<string, string>();
    for (let i = 0; i < placeholders.length && i < names.length; i++) {
      renames.set(placeholders[i], names[i]);
    }

    buffer.release(nearest);
    buffer.replaceIdentifiers(renames);
    return renames.size;
  }
}
