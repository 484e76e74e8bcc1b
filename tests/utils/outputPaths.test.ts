import { describe, expect, it } from 'vitest';
import { join, resolve } from 'node:path';
import { existsSync } from 'node:fs';
import {
  getProjectRoot,
  isInside,
  mirrorOutputPath,
  toSourceExtension,
} from '../../src/utils/outputPaths.js';

describe('outputPaths', () => {
  it('resolves the project root to the directory holding package.json', () => {
    expect(existsSync(join(getProjectRoot(), 'package.json'))).toBe(true);
  });

  it('switches only the bytecode extension to .lua', () => {
    expect(toSourceExtension('a/b/init.l64')).toBe('a/b/init.lua');
    expect(toSourceExtension('a/b/init.L64')).toBe('a/b/init.lua');
    expect(toSourceExtension('a/b/data.bin')).toBe('a/b/data.bin');
  });

  it('checks containment without prefix confusion', () => {
    expect(isInside('/data/in', '/data/in/x.l64')).toBe(true);
    expect(isInside('/data/in', '/data/input/x.l64')).toBe(false);
    expect(isInside('/data/in', '/data/in')).toBe(false);
  });

  it('mirrors the relative layout under the output root', () => {
    expect(
      mirrorOutputPath({ file: '/in/scripts/ui/menu.l64', inputRoot: '/in', outputRoot: '/out', decompiled: true })
    ).toBe(resolve('/out/scripts/ui/menu.lua'));
    expect(
      mirrorOutputPath({ file: '/in/scripts/menu.l64', inputRoot: '/in', outputRoot: '/out', decompiled: false })
    ).toBe(resolve('/out/scripts/menu.l64'));
  });

  it('falls back to the file name for files outside the input root', () => {
    expect(
      mirrorOutputPath({ file: '/elsewhere/menu.l64', inputRoot: '/in', outputRoot: '/out', decompiled: true })
    ).toBe(resolve('/out/menu.lua'));
  });
});
