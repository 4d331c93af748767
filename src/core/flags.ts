/**
 * Compiler flag analysis
 *
 * Merges profile defaults, target flags and per-file flags, and decomposes the
 * RISC-V `-march=` value into the base ISA and the vendor extension tail.
 */
import type { ArchitectureSplit, SourceFile, Target } from '../types/index.js';
import type { CompilerProfile } from './toolchain.js';

const MARCH_PREFIX = '-march=';

/** Single-letter standard extensions after the base integer ISA */
const STANDARD_EXTENSION_LETTERS = 'mafdqlcbkjtpvnh';

const BASE_PATTERN = /^(rv(?:32|64|128))([ieg])/;
const VERSION_PATTERN = /\d+(?:p\d+)?/y;
const MULTI_LETTER_PATTERN = /^(?:[zsh][a-z][a-z0-9]*|[mafdqlcbkjtpvnh])(?:\d+(?:p\d+)?)?$/;

/** Options that take exactly one value; the last one given wins */
const SINGLE_VALUED_OPTIONS = new Set(['-std=', '--std=', '-march=', '-mabi=', '-mcmodel=', '-mcpu=', '-mtune=']);

/**
 * Flags resolved for one target
 */
export interface ResolvedOptions {
  profile: CompilerProfile;
  /** Profile defaults overlaid with the target's flags */
  compileFlags: string[];
  /** `-I` flags in declaration order */
  includeFlags: string[];
  architecture?: ArchitectureSplit;
}

/**
 * Identity of a flag for merging
 *
 * Two flags with the same key configure the same thing, so the later one
 * replaces the earlier. Repeatable options such as `-Werror=` or
 * `-fsanitize=` are keyed by the whole flag.
 */
export function flagKey(flag: string): string {
  if (/^-O(\d|s|z|g|fast)?$/.test(flag)) return '-O';

  const define = /^-([DU])\s*([^=\s]+)/.exec(flag);
  if (define) return `-D${define[2]}`;

  const assignment = /^(-{1,2}[A-Za-z][\w-]*=)/.exec(flag);
  if (assignment && SINGLE_VALUED_OPTIONS.has(assignment[1])) return assignment[1];

  return flag;
}

/**
 * Merge flag layers; later layers win
 *
 * A replaced flag keeps the position of the flag it replaces, so the order
 * of the first layer is preserved. Exact duplicates collapse.
 */
export function mergeFlags(...layers: string[][]): string[] {
  const result: string[] = [];
  const positions = new Map<string, number>();

  for (const layer of layers) {
    for (const raw of layer) {
      const flag = raw.trim();
      if (!flag) continue;

      const key = flagKey(flag);
      const position = positions.get(key);
      if (position === undefined) {
        positions.set(key, result.length);
        result.push(flag);
      } else {
        result[position] = flag;
      }
    }
  }

  return result;
}

/**
 * Quote a command-line argument containing whitespace
 */
export function quoteArgument(arg: string): string {
  if (!/\s/.test(arg) || /^".*"$/.test(arg)) return arg;
  return `"${arg.replace(/"/g, '\\"')}"`;
}

/**
 * Split an option string into arguments, honoring double quotes
 */
export function splitCommandLine(value: string): string[] {
  const args: string[] = [];
  let current = '';
  let inQuote = false;
  let hasToken = false;

  for (const ch of value) {
    if (ch === '"') {
      inQuote = !inQuote;
      hasToken = true;
    } else if (!inQuote && /\s/.test(ch)) {
      if (hasToken) args.push(current);
      current = '';
      hasToken = false;
    } else {
      current += ch;
      hasToken = true;
    }
  }
  if (hasToken) args.push(current);

  return args;
}

/**
 * Turn include directories into `-I` flags, dropping duplicates
 */
export function includeFlags(dirs: string[]): string[] {
  return [...new Set(dirs)].map(dir => `-I${quoteArgument(dir)}`);
}

/**
 * Split a `-march=` value into base ISA and vendor extension
 *
 * Recognized: `rv32|rv64|rv128`, base `i|e|g`, standard single-letter
 * extensions, and `_`-separated multi-letter `z*`, `s*`, `h*` extensions.
 * Everything from the first unrecognized component on is the extension.
 * Values that are not RISC-V ISA strings are returned unsplit.
 */
export function splitMarch(value: string): ArchitectureSplit {
  const base = BASE_PATTERN.exec(value);
  if (!base) {
    return { full: value, base: value, extension: '' };
  }

  let pos = base[0].length;
  const skipVersion = () => {
    VERSION_PATTERN.lastIndex = pos;
    const version = VERSION_PATTERN.exec(value);
    if (version) pos += version[0].length;
  };

  skipVersion();
  while (pos < value.length && STANDARD_EXTENSION_LETTERS.includes(value[pos])) {
    pos++;
    skipVersion();
  }

  if (pos >= value.length) {
    return { full: value, base: value, extension: '' };
  }

  if (value[pos] !== '_') {
    return { full: value, base: value.substring(0, pos), extension: value.substring(pos) };
  }

  // Multi-letter extensions
  const tokens = value.substring(pos + 1).split('_');
  let recognized = 0;
  while (recognized < tokens.length && MULTI_LETTER_PATTERN.test(tokens[recognized])) {
    recognized++;
  }

  const baseTokens = tokens.slice(0, recognized);
  return {
    full: value,
    base: [value.substring(0, pos), ...baseTokens].join('_'),
    extension: tokens.slice(recognized).join('_'),
  };
}

/**
 * Whether the split found a vendor extension
 */
export function hasCustomExtension(split: ArchitectureSplit): boolean {
  return split.extension.length > 0;
}

/**
 * Locate the effective `-march=` flag (the last one) and split it
 */
export function findArchitecture(flags: string[]): ArchitectureSplit | undefined {
  let value: string | undefined;
  for (const flag of flags) {
    if (flag.startsWith(MARCH_PREFIX)) {
      value = flag.substring(MARCH_PREFIX.length);
    }
  }
  return value === undefined ? undefined : splitMarch(value);
}

/**
 * Resolve a target's flags against its compiler profile
 */
export function resolveTargetOptions(target: Target, profile: CompilerProfile): ResolvedOptions {
  const compileFlags = mergeFlags(profile.release.defaultFlags, target.compilerOptions);
  return {
    profile,
    compileFlags,
    includeFlags: includeFlags(target.includeDirs),
    architecture: findArchitecture(compileFlags),
  };
}

/**
 * Flags for one file of a target
 *
 * Per-file flags win over target flags with the same key; per-file include
 * directories are appended to the target's.
 */
export function resolveFileFlags(
  target: Target,
  options: ResolvedOptions,
  source: SourceFile
): { flags: string[]; includeFlags: string[] } {
  if (source.compilerOptions.length === 0 && source.includeDirs.length === 0) {
    return { flags: options.compileFlags, includeFlags: options.includeFlags };
  }

  return {
    flags: mergeFlags(options.compileFlags, source.compilerOptions),
    includeFlags: includeFlags([...target.includeDirs, ...source.includeDirs]),
  };
}
