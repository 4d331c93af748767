/**
 * Library and link resolution
 *
 * Turns a target's linker options and library references into the pieces of
 * its link statement. The library order is decided here once and is the
 * same for both linker types.
 */
import * as path from 'path';
import { LinkerType, TargetType } from '../types/index.js';
import type { ProjectInfo, Target } from '../types/index.js';
import { LibraryResolutionError } from './errors.js';
import { splitCommandLine } from './flags.js';
import { toPosixPath } from './sources.js';

/**
 * A library reference and the argument it becomes on the link command
 */
export interface LibraryReference {
  /** As written in the project file */
  reference: string;
  argument: string;
  /** Path-qualified: passed to the linker as a file */
  isPath: boolean;
}

/**
 * Linker options with link scripts pulled out
 */
export interface LinkScriptExtraction {
  options: string[];
  scripts: string[];
}

/**
 * Everything the link statement of one target needs
 */
export interface LinkPlan {
  linker: LinkerType;
  /** Tool that runs the statement */
  driver: 'cc' | 'cxx' | 'ld' | 'ar';
  /** Options, link scripts and `-L` dirs, placed before the objects */
  preFlags: string[];
  /** Library arguments, placed after the objects */
  libraryFlags: string[];
  /** Runtime libraries appended after the library group (`ld` only) */
  runtimeFlags: string[];
  libraries: LibraryReference[];
  linkScripts: string[];
  /** Entry symbol (`ld` only) */
  entry?: string;
  /** Files that force a relink without being passed as inputs */
  implicitDeps: string[];
  /** Titles of same-project library targets this link depends on */
  intermediateTargets: string[];
}

/**
 * What the link resolver needs to know about the environment
 */
export interface LinkContext {
  project: ProjectInfo;
  target: Target;
  linker: LinkerType;
  /** Whether the target compiles C++ sources */
  usesCpp: boolean;
  /** Additional libraries of the compiler profile */
  profileLibraries: string[];
  /** libgcc directory for `ld` links */
  runtimeLibraryDir?: string;
  /** Probe for library files, relative to the project dir */
  fileExists?: (relativePath: string) => boolean;
}

const LIBRARY_FILE_PATTERN = /\.(a|o|so|lib|obj)$/i;
const SECTION_ADDRESS_PATTERN = /^-T(bss|data|text|text-segment|rodata-segment|ldata-segment)=/;
const DEFAULT_ENTRY = '_start';
const RUNTIME_LIBRARIES = ['-lgcc', '-lc'];

/**
 * Whether a reference names a file rather than a library to search for
 */
export function isPathReference(reference: string): boolean {
  return /[\\/]/.test(reference) || /^[A-Za-z]:/.test(reference) || LIBRARY_FILE_PATTERN.test(reference);
}

/**
 * Link argument for a library reference
 *
 * `m`, `libm` and `-lm` all become `-lm`; path-qualified references stay as written.
 */
export function toLinkArgument(reference: string): { argument: string; isPath: boolean } {
  if (isPathReference(reference)) {
    return { argument: toPosixPath(reference), isPath: true };
  }
  if (reference.startsWith('-l')) {
    return { argument: reference, isPath: false };
  }

  const name = reference.startsWith('lib') && reference.length > 3 ? reference.substring(3) : reference;
  return { argument: `-l${name}`, isPath: false };
}

/**
 * Concatenate library layers and drop repeats, keeping the first occurrence
 */
export function resolveLibrarySet(layers: string[][]): LibraryReference[] {
  const seen = new Set<string>();
  const result: LibraryReference[] = [];

  for (const layer of layers) {
    for (const raw of layer) {
      const reference = raw.trim();
      if (!reference) continue;

      const { argument, isPath } = toLinkArgument(reference);
      if (seen.has(argument)) continue;
      seen.add(argument);
      result.push({ reference, argument, isPath });
    }
  }

  return result;
}

/**
 * Split `-Wl,` arguments into the linker options they carry
 */
function unwrapLinkerArgument(token: string): string[] {
  return token
    .substring('-Wl,'.length)
    .split(',')
    .filter(part => part.length > 0);
}

/** `-T<file>`, but not a section address such as `-Ttext=0x0` */
function isAttachedScript(token: string): boolean {
  return token.startsWith('-T') && token.length > 2 && !SECTION_ADDRESS_PATTERN.test(token);
}

/**
 * Pull link scripts out of linker options
 *
 * Recognizes `-T <file>`, `-T<file>`, `--script=<file>` and the same inside
 * `-Wl,` (`-Wl,-T,<file>`, `-Wl,-T<file>`, `-Wl,--script=<file>`). Other
 * linker arguments sharing a `-Wl,` group are kept.
 */
export function extractLinkScripts(options: string[]): LinkScriptExtraction {
  const tokens = options.flatMap(option => splitCommandLine(option));
  const result: LinkScriptExtraction = { options: [], scripts: [] };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token === '-T') {
      if (i + 1 < tokens.length) result.scripts.push(tokens[++i]);
      continue;
    }
    if (token.startsWith('--script=')) {
      result.scripts.push(token.substring('--script='.length));
      continue;
    }
    if (isAttachedScript(token)) {
      result.scripts.push(token.substring(2));
      continue;
    }

    if (token.startsWith('-Wl,')) {
      const parts = unwrapLinkerArgument(token);
      const kept: string[] = [];
      for (let j = 0; j < parts.length; j++) {
        const part = parts[j];
        if (part === '-T' && j + 1 < parts.length) {
          result.scripts.push(parts[++j]);
        } else if (part.startsWith('--script=')) {
          result.scripts.push(part.substring('--script='.length));
        } else if (isAttachedScript(part)) {
          result.scripts.push(part.substring(2));
        } else {
          kept.push(part);
        }
      }
      if (kept.length > 0) result.options.push(`-Wl,${kept.join(',')}`);
      continue;
    }

    result.options.push(token);
  }

  result.scripts = result.scripts.map(toPosixPath);
  return result;
}

/**
 * Whether a compiler-driver option has no meaning to `ld`
 */
function isDriverOnlyFlag(flag: string): boolean {
  if (flag.startsWith('-Wl,')) return false;
  return (
    /^-m./.test(flag) ||
    /^--?specs=/.test(flag) ||
    flag === '-nostartfiles' ||
    flag === '-nodefaultlibs' ||
    flag === '-pipe' ||
    /^-f/.test(flag) ||
    /^-W/.test(flag)
  );
}

/**
 * Translate driver options for a raw `ld` invocation
 *
 * @returns The options `ld` understands and the entry symbol, if one was given
 */
export function toLdOptions(options: string[]): { options: string[]; entry?: string } {
  const tokens: string[] = [];
  for (let i = 0; i < options.length; i++) {
    const option = options[i];
    if (option === '-Xlinker') {
      if (i + 1 < options.length) tokens.push(options[++i]);
    } else if (option.startsWith('-Wl,')) {
      tokens.push(...unwrapLinkerArgument(option));
    } else if (!isDriverOnlyFlag(option)) {
      tokens.push(option);
    }
  }

  const result: string[] = [];
  let entry: string | undefined;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === '-e' || token === '--entry') {
      if (i + 1 < tokens.length) entry = tokens[++i];
    } else if (token.startsWith('--entry=')) {
      entry = token.substring('--entry='.length);
    } else if (/^-e[^-]/.test(token)) {
      entry = token.substring(2);
    } else {
      result.push(token);
    }
  }

  return { options: result, entry };
}

function normalizeReferencePath(value: string): string {
  return path.posix.normalize(toPosixPath(value));
}

/**
 * Find the same-project target whose output a library reference names
 */
function findProducingTarget(library: LibraryReference, targets: Target[]): Target | undefined {
  return targets.find(candidate => {
    if (!candidate.output) return false;
    const output = normalizeReferencePath(candidate.output);
    const outputName = path.posix.basename(output);

    if (library.isPath) {
      const reference = normalizeReferencePath(library.reference);
      return reference === output || (!reference.includes('/') && reference === outputName);
    }

    const name = library.argument.substring(2);
    return outputName === `lib${name}.a` || outputName === `lib${name}.so`;
  });
}

/**
 * Library file a reference resolves to on disk, if the probe finds one
 */
function probeLibraryFile(
  library: LibraryReference,
  libraryDirs: string[],
  fileExists: (relativePath: string) => boolean
): string | undefined {
  if (library.isPath) {
    return fileExists(library.argument) ? library.argument : undefined;
  }

  const name = library.argument.substring(2);
  for (const dir of libraryDirs) {
    for (const fileName of [`lib${name}.a`, `lib${name}.so`]) {
      const candidate = path.posix.join(toPosixPath(dir), fileName);
      if (fileExists(candidate)) return candidate;
    }
  }
  return undefined;
}

function pushUnique(values: string[], value: string): void {
  if (!values.includes(value)) values.push(value);
}

/**
 * Plan the link (or archive) step of a target
 *
 * @throws LibraryResolutionError when a library names the target's own output
 *   or the output of a same-project target that is not a library
 */
export function planLink(context: LinkContext): LinkPlan {
  const { project, target, linker } = context;
  const implicitDeps: string[] = [];
  const intermediateTargets: string[] = [];

  if (target.type === TargetType.StaticLibrary) {
    target.externalDeps.forEach(dep => pushUnique(implicitDeps, dep));
    return {
      linker,
      driver: 'ar',
      preFlags: [],
      libraryFlags: [],
      runtimeFlags: [],
      libraries: [],
      linkScripts: [],
      implicitDeps,
      intermediateTargets,
    };
  }

  const libraries = resolveLibrarySet([target.projectLibraries, target.libraries, context.profileLibraries]);
  const libraryDirs = [...target.libraryDirs];

  for (const library of libraries) {
    const producer = findProducingTarget(library, project.targets);

    if (producer) {
      if (producer.title === target.title) {
        throw new LibraryResolutionError(target.title, library.reference, 'it is the output of the target itself');
      }
      if (producer.type !== TargetType.StaticLibrary && producer.type !== TargetType.DynamicLibrary) {
        throw new LibraryResolutionError(
          target.title,
          library.reference,
          `target "${producer.title}" does not produce a library`
        );
      }

      pushUnique(implicitDeps, normalizeReferencePath(producer.output));
      pushUnique(intermediateTargets, producer.title);
      if (!library.isPath) {
        const dir = path.posix.dirname(normalizeReferencePath(producer.output));
        if (!libraryDirs.includes(dir)) libraryDirs.push(dir);
      }
      continue;
    }

    if (context.fileExists) {
      const found = probeLibraryFile(library, libraryDirs, context.fileExists);
      if (found) pushUnique(implicitDeps, found);
    }
  }

  const extraction = extractLinkScripts(target.linkerOptions);
  extraction.scripts.forEach(script => pushUnique(implicitDeps, script));
  target.externalDeps.forEach(dep => pushUnique(implicitDeps, dep));

  const scriptFlags = extraction.scripts.flatMap(script => ['-T', script]);
  const dirFlags = libraryDirs.map(dir => `-L${dir}`);
  const shared = target.type === TargetType.DynamicLibrary ? ['-shared'] : [];
  const libraryFlags = libraries.map(library => library.argument);

  if (linker === LinkerType.Ld) {
    const ld = toLdOptions(extraction.options);
    const entry = target.type === TargetType.Executable ? ld.entry ?? DEFAULT_ENTRY : undefined;
    const runtimeDirFlags = context.runtimeLibraryDir ? [`-L${toPosixPath(context.runtimeLibraryDir)}`] : [];

    return {
      linker,
      driver: 'ld',
      preFlags: [
        ...shared,
        ...ld.options,
        ...(entry ? ['-e', entry] : []),
        ...scriptFlags,
        ...dirFlags,
        ...runtimeDirFlags,
      ],
      libraryFlags,
      runtimeFlags: RUNTIME_LIBRARIES,
      libraries,
      linkScripts: extraction.scripts,
      entry,
      implicitDeps,
      intermediateTargets,
    };
  }

  return {
    linker,
    driver: context.usesCpp ? 'cxx' : 'cc',
    preFlags: [...shared, ...extraction.options, ...scriptFlags, ...dirFlags],
    libraryFlags,
    runtimeFlags: [],
    libraries,
    linkScripts: extraction.scripts,
    implicitDeps,
    intermediateTargets,
  };
}
