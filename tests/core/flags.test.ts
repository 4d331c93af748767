/**
 * Tests for flags.ts
 */
import {
  flagKey,
  mergeFlags,
  quoteArgument,
  splitCommandLine,
  includeFlags,
  splitMarch,
  hasCustomExtension,
  findArchitecture,
  resolveTargetOptions,
  resolveFileFlags,
} from '../../src/core/flags';
import { resolveCompilerProfile } from '../../src/core/toolchain';
import { TargetType } from '../../src/types';
import type { SourceFile, Target } from '../../src/types';

function makeTarget(overrides: Partial<Target> = {}): Target {
  return {
    title: 'App',
    type: TargetType.Executable,
    output: 'build/app.elf',
    objectOutput: 'obj/App',
    compilerId: 'riscv32-v2',
    compilerOptions: [],
    includeDirs: [],
    linkerOptions: [],
    projectLibraries: [],
    libraries: [],
    libraryDirs: [],
    externalDeps: [],
    extraCommands: { before: [], after: [] },
    ...overrides,
  };
}

function makeSource(overrides: Partial<SourceFile> = {}): SourceFile {
  return {
    filename: 'src/main.c',
    compile: true,
    link: true,
    compilerOptions: [],
    includeDirs: [],
    buildCommands: [],
    ...overrides,
  };
}

describe('flagKey', () => {
  it('should group optimization levels', () => {
    expect(flagKey('-O0')).toBe('-O');
    expect(flagKey('-Os')).toBe('-O');
    expect(flagKey('-O')).toBe('-O');
  });

  it('should group defines and undefines by name', () => {
    expect(flagKey('-DDEBUG')).toBe('-DDEBUG');
    expect(flagKey('-DDEBUG=1')).toBe('-DDEBUG');
    expect(flagKey('-UDEBUG')).toBe('-DDEBUG');
    expect(flagKey('-D DEBUG')).toBe('-DDEBUG');
  });

  it('should group assignments by option name', () => {
    expect(flagKey('-march=rv32imac')).toBe('-march=');
    expect(flagKey('--std=c99')).toBe('--std=');
  });

  it('should keep other flags literal', () => {
    expect(flagKey('-Wall')).toBe('-Wall');
    expect(flagKey('-Werror=return-type')).toBe('-Werror=return-type');
    expect(flagKey('--param=max-inline-insns-single=100')).toBe('--param=max-inline-insns-single=100');
  });
});

describe('mergeFlags', () => {
  it('should let later layers replace flags in place', () => {
    expect(mergeFlags(['-march=rv32imac', '-mabi=ilp32'], ['-O2', '-march=rv32imafc', '-Wall', '-O2'])).toEqual([
      '-march=rv32imafc',
      '-mabi=ilp32',
      '-O2',
      '-Wall',
    ]);
  });

  it('should let an undefine replace a define', () => {
    expect(mergeFlags(['-DDEBUG', '-Wall'], ['-UDEBUG'])).toEqual(['-UDEBUG', '-Wall']);
  });

  it('should keep every value of a repeatable option', () => {
    expect(
      mergeFlags(
        ['-Werror=return-type', '-Werror=implicit-function-declaration'],
        ['-fsanitize=address', '-fsanitize=undefined', '-Werror=return-type']
      )
    ).toEqual([
      '-Werror=return-type',
      '-Werror=implicit-function-declaration',
      '-fsanitize=address',
      '-fsanitize=undefined',
    ]);
  });

  it('should skip blank flags', () => {
    expect(mergeFlags(['  -g  ', ''], ['   '])).toEqual(['-g']);
  });
});

describe('command-line helpers', () => {
  it('should quote arguments with whitespace', () => {
    expect(quoteArgument('plain')).toBe('plain');
    expect(quoteArgument('my dir')).toBe('"my dir"');
    expect(quoteArgument('"already quoted"')).toBe('"already quoted"');
  });

  it('should split on whitespace outside quotes', () => {
    expect(splitCommandLine('-DNAME="a b"  -Wall')).toEqual(['-DNAME=a b', '-Wall']);
    expect(splitCommandLine('-T link.ld')).toEqual(['-T', 'link.ld']);
    expect(splitCommandLine('')).toEqual([]);
  });

  it('should build unique include flags', () => {
    expect(includeFlags(['inc', 'inc', 'my dir'])).toEqual(['-Iinc', '-I"my dir"']);
  });
});

describe('splitMarch', () => {
  it('should leave standard ISA strings whole', () => {
    expect(splitMarch('rv32imac')).toEqual({ full: 'rv32imac', base: 'rv32imac', extension: '' });
    expect(splitMarch('rv32gc')).toEqual({ full: 'rv32gc', base: 'rv32gc', extension: '' });
    expect(splitMarch('rv32imac_zicsr_zifencei').extension).toBe('');
  });

  it('should split a single-letter vendor tail', () => {
    expect(splitMarch('rv32imacxw')).toEqual({ full: 'rv32imacxw', base: 'rv32imac', extension: 'xw' });
  });

  it('should split at the first unrecognized multi-letter extension', () => {
    expect(splitMarch('rv32imac_zicsr_xhwacc_zba')).toEqual({
      full: 'rv32imac_zicsr_xhwacc_zba',
      base: 'rv32imac_zicsr',
      extension: 'xhwacc_zba',
    });
    expect(splitMarch('rv32imac_xsample')).toEqual({
      full: 'rv32imac_xsample',
      base: 'rv32imac',
      extension: 'xsample',
    });
  });

  it('should accept version numbers on extensions', () => {
    expect(splitMarch('rv32i2p0m2a_zicsr2p0').extension).toBe('');
  });

  it('should be stable on its own base', () => {
    const split = splitMarch('rv32imac_zicsr_xhwacc');
    expect(splitMarch(split.base)).toEqual({ full: split.base, base: split.base, extension: '' });
  });

  it('should return non-RISC-V values unsplit', () => {
    expect(splitMarch('armv7-a')).toEqual({ full: 'armv7-a', base: 'armv7-a', extension: '' });
  });

  it('should report vendor extensions', () => {
    expect(hasCustomExtension(splitMarch('rv32imacxw'))).toBe(true);
    expect(hasCustomExtension(splitMarch('rv32imac'))).toBe(false);
  });
});

describe('findArchitecture', () => {
  it('should use the last -march flag', () => {
    expect(findArchitecture(['-march=rv32imac', '-O2', '-march=rv32imacxw'])?.base).toBe('rv32imac');
    expect(findArchitecture(['-march=rv32imac', '-O2', '-march=rv32imacxw'])?.full).toBe('rv32imacxw');
  });

  it('should return undefined without -march', () => {
    expect(findArchitecture(['-O2'])).toBeUndefined();
  });
});

describe('resolveTargetOptions', () => {
  it('should overlay target flags on the profile defaults', () => {
    const profile = resolveCompilerProfile('riscv32-v3').profile;
    const resolved = resolveTargetOptions(
      makeTarget({ compilerOptions: ['-march=rv32imac_xcustom', '-O2'], includeDirs: ['include'] }),
      profile
    );

    expect(resolved.compileFlags).toEqual(['-march=rv32imac_xcustom', '-mabi=ilp32', '-O2']);
    expect(resolved.includeFlags).toEqual(['-Iinclude']);
    expect(resolved.architecture).toEqual({ full: 'rv32imac_xcustom', base: 'rv32imac', extension: 'xcustom' });
  });
});

describe('resolveFileFlags', () => {
  const target = makeTarget({ compilerOptions: ['-O2', '-Wall'], includeDirs: ['include'] });
  const options = resolveTargetOptions(target, resolveCompilerProfile('riscv32-v2').profile);

  it('should reuse the target flags for plain files', () => {
    expect(resolveFileFlags(target, options, makeSource())).toEqual({
      flags: ['-march=rv32imac', '-mabi=ilp32', '-O2', '-Wall'],
      includeFlags: ['-Iinclude'],
    });
  });

  it('should let per-file flags win', () => {
    expect(
      resolveFileFlags(target, options, makeSource({ compilerOptions: ['-O3'], includeDirs: ['fast/include'] }))
    ).toEqual({
      flags: ['-march=rv32imac', '-mabi=ilp32', '-O3', '-Wall'],
      includeFlags: ['-Iinclude', '-Ifast/include'],
    });
  });
});
