import { dirname, extname, isAbsolute, relative, resolve, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

const currentFile = fileURLToPath(import.meta.url);
const currentDir = dirname(currentFile);
// src/utils or dist/src/utils; walk up until we leave the source tree.
const projectRoot = currentDir.includes(`${sep}dist${sep}`)
  ? resolve(currentDir, '..', '..', '..')
  : resolve(currentDir, '..', '..');

export const BYTECODE_EXTENSION = '.l64';
export const SOURCE_EXTENSION = '.lua';

export function getProjectRoot(): string {
  return projectRoot;
}

export function isInside(baseDir: string, targetPath: string): boolean {
  const rel = relative(baseDir, targetPath);
  if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return false;
  }
  return true;
}

/** `foo.l64` -> `foo.lua`; any other extension is kept. */
export function toSourceExtension(filePath: string): string {
  if (extname(filePath).toLowerCase() !== BYTECODE_EXTENSION) {
    return filePath;
  }
  return filePath.slice(0, -BYTECODE_EXTENSION.length) + SOURCE_EXTENSION;
}

/**
 * Map a file found under `inputRoot` to the same relative location under
 * `outputRoot`. Decompiled output switches the extension to `.lua`.
 */
export function mirrorOutputPath(options: {
  file: string;
  inputRoot: string;
  outputRoot: string;
  decompiled: boolean;
}): string {
  const { file, inputRoot, outputRoot, decompiled } = options;
  const absoluteFile = resolve(file);
  const absoluteRoot = resolve(inputRoot);
  const rel = isInside(absoluteRoot, absoluteFile)
    ? relative(absoluteRoot, absoluteFile)
    : absoluteFile.split(/[\\/]/).pop() || 'output';
  const target = resolve(outputRoot, rel);
  return decompiled ? toSourceExtension(target) : target;
}
