/**
 * Tests for libraries.ts
 */
import {
  isPathReference,
  toLinkArgument,
  resolveLibrarySet,
  extractLinkScripts,
  toLdOptions,
  planLink,
} from '../../src/core/libraries';
import type { LinkContext } from '../../src/core/libraries';
import { LibraryResolutionError } from '../../src/core/errors';
import { LinkerType, TargetType } from '../../src/types';
import type { ProjectInfo, Target } from '../../src/types';

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

function makeProject(targets: Target[]): ProjectInfo {
  return {
    title: 'demo',
    compilerOptions: [],
    includeDirs: [],
    linkerOptions: [],
    libraries: [],
    libraryDirs: [],
    extraCommands: { before: [], after: [] },
    targets,
    sources: [],
    virtualTargets: {},
  };
}

function context(target: Target, overrides: Partial<LinkContext> = {}, others: Target[] = []): LinkContext {
  return {
    project: makeProject([...others, target]),
    target,
    linker: LinkerType.Gcc,
    usesCpp: false,
    profileLibraries: [],
    ...overrides,
  };
}

describe('library references', () => {
  it('should recognize path references', () => {
    expect(isPathReference('lib/libx.a')).toBe(true);
    expect(isPathReference('C:\\libs\\y')).toBe(true);
    expect(isPathReference('crt0.o')).toBe(true);
    expect(isPathReference('m')).toBe(false);
  });

  it('should normalize name references', () => {
    expect(toLinkArgument('m')).toEqual({ argument: '-lm', isPath: false });
    expect(toLinkArgument('libm')).toEqual({ argument: '-lm', isPath: false });
    expect(toLinkArgument('-lm')).toEqual({ argument: '-lm', isPath: false });
    expect(toLinkArgument('lib')).toEqual({ argument: '-llib', isPath: false });
  });

  it('should keep path references as files', () => {
    expect(toLinkArgument('C:\\libs\\y.a')).toEqual({ argument: 'C:/libs/y.a', isPath: true });
  });

  it('should keep the first occurrence of a library', () => {
    const libraries = resolveLibrarySet([['m', 'drivers'], ['libm', 'c', ' '], ['-ldrivers']]);
    expect(libraries.map(library => library.reference)).toEqual(['m', 'drivers', 'c']);
    expect(libraries.map(library => library.argument)).toEqual(['-lm', '-ldrivers', '-lc']);
  });
});

describe('extractLinkScripts', () => {
  it('should pull scripts out of every spelling', () => {
    expect(
      extractLinkScripts([
        '-T link.ld',
        '-Wl,--gc-sections,-T,boot.ld',
        '-Wl,--script=extra.ld',
        '-Tother.ld',
        '-Ttext=0x0',
        '-nostartfiles',
      ])
    ).toEqual({
      options: ['-Wl,--gc-sections', '-Ttext=0x0', '-nostartfiles'],
      scripts: ['link.ld', 'boot.ld', 'extra.ld', 'other.ld'],
    });
  });

  it('should normalize script paths', () => {
    expect(extractLinkScripts(['-T ld\\flash.ld']).scripts).toEqual(['ld/flash.ld']);
  });
});

describe('toLdOptions', () => {
  it('should drop driver-only options and unwrap linker options', () => {
    expect(
      toLdOptions([
        '-nostartfiles',
        '-march=rv32imac',
        '-Wl,--gc-sections,-Map=out.map',
        '-static',
        '-e',
        'reset_handler',
        '-O2',
        '-ffunction-sections',
        '-Wall',
        '-specs=nano.specs',
      ])
    ).toEqual({ options: ['--gc-sections', '-Map=out.map', '-static', '-O2'], entry: 'reset_handler' });
  });

  it('should read every entry spelling', () => {
    expect(toLdOptions(['-ereset']).entry).toBe('reset');
    expect(toLdOptions(['--entry=main']).entry).toBe('main');
    expect(toLdOptions(['-Xlinker', '--entry', '-Xlinker', 'boot']).entry).toBe('boot');
    expect(toLdOptions(['--gc-sections']).entry).toBeUndefined();
  });
});

describe('planLink', () => {
  const app = makeTarget({
    linkerOptions: ['-T link.ld', '-Wl,--gc-sections'],
    projectLibraries: ['m'],
    libraryDirs: ['libs'],
  });

  it('should plan a driver link', () => {
    const plan = planLink(context(app));

    expect(plan.driver).toBe('cc');
    expect(plan.preFlags).toEqual(['-Wl,--gc-sections', '-T', 'link.ld', '-Llibs']);
    expect(plan.libraryFlags).toEqual(['-lm']);
    expect(plan.runtimeFlags).toEqual([]);
    expect(plan.linkScripts).toEqual(['link.ld']);
    expect(plan.implicitDeps).toEqual(['link.ld']);
    expect(plan.entry).toBeUndefined();
  });

  it('should plan a raw ld link with the same library order', () => {
    const gcc = planLink(context(app));
    const ld = planLink(context(app, { linker: LinkerType.Ld, runtimeLibraryDir: '/opt/rv/lib/gcc' }));

    expect(ld.driver).toBe('ld');
    expect(ld.preFlags).toEqual(['--gc-sections', '-e', '_start', '-T', 'link.ld', '-Llibs', '-L/opt/rv/lib/gcc']);
    expect(ld.runtimeFlags).toEqual(['-lgcc', '-lc']);
    expect(ld.entry).toBe('_start');
    expect(ld.libraryFlags).toEqual(gcc.libraryFlags);
  });

  it('should use the C++ driver for C++ targets', () => {
    expect(planLink(context(app, { usesCpp: true })).driver).toBe('cxx');
  });

  it('should append profile libraries last', () => {
    const plan = planLink(context(makeTarget({ libraries: ['drivers'] }), { profileLibraries: ['c', 'drivers'] }));
    expect(plan.libraryFlags).toEqual(['-ldrivers', '-lc']);
  });

  it('should mark dynamic libraries as shared', () => {
    const plan = planLink(context(makeTarget({ type: TargetType.DynamicLibrary, output: 'libdrv.so' })));
    expect(plan.preFlags).toEqual(['-shared']);
  });

  it('should archive static libraries without link flags', () => {
    const plan = planLink(
      context(makeTarget({ type: TargetType.StaticLibrary, output: 'lib/libutil.a', externalDeps: ['config.h'] }))
    );
    expect(plan.driver).toBe('ar');
    expect(plan.preFlags).toEqual([]);
    expect(plan.implicitDeps).toEqual(['config.h']);
  });

  it('should schedule same-project libraries referenced by name', () => {
    const util = makeTarget({ title: 'util', type: TargetType.StaticLibrary, output: 'lib/libutil.a' });
    const plan = planLink(context(makeTarget({ libraries: ['util'] }), {}, [util]));

    expect(plan.implicitDeps).toEqual(['lib/libutil.a']);
    expect(plan.intermediateTargets).toEqual(['util']);
    expect(plan.preFlags).toEqual(['-Llib']);
    expect(plan.libraryFlags).toEqual(['-lutil']);
  });

  it('should schedule same-project libraries referenced by path', () => {
    const util = makeTarget({ title: 'util', type: TargetType.StaticLibrary, output: 'lib/libutil.a' });
    const plan = planLink(context(makeTarget({ libraries: ['./lib/libutil.a'] }), {}, [util]));

    expect(plan.implicitDeps).toEqual(['lib/libutil.a']);
    expect(plan.preFlags).toEqual([]);
    expect(plan.libraryFlags).toEqual(['./lib/libutil.a']);
  });

  it('should reject a library that is the target itself', () => {
    const self = makeTarget({ title: 'util', type: TargetType.StaticLibrary, output: 'libutil.a' });
    const linked = makeTarget({ title: 'util', type: TargetType.DynamicLibrary, output: 'libutil.so', libraries: ['util'] });
    expect(() => planLink(context(linked, {}, [self]))).toThrow(LibraryResolutionError);
    expect(() => planLink(context(makeTarget({ libraries: ['build/app.elf'] })))).toThrow(
      'Target "App": cannot resolve library "build/app.elf": it is the output of the target itself'
    );
  });

  it('should reject a library produced by an executable', () => {
    const tool = makeTarget({ title: 'tool', output: 'libtool.a', type: TargetType.Executable });
    expect(() => planLink(context(makeTarget({ libraries: ['tool'] }), {}, [tool]))).toThrow(
      'Target "App": cannot resolve library "tool": target "tool" does not produce a library'
    );
  });

  it('should add existing library files as dependencies', () => {
    const existing = new Set(['vendor/libfoo.a', 'ext/bar.a']);
    const plan = planLink(
      context(makeTarget({ libraries: ['foo', 'ext/bar.a', 'missing'], libraryDirs: ['vendor'], externalDeps: ['gen.h'] }), {
        fileExists: relativePath => existing.has(relativePath),
      })
    );
    expect(plan.implicitDeps).toEqual(['vendor/libfoo.a', 'ext/bar.a', 'gen.h']);
  });
});
