/**
 * .clangd configuration
 *
 * clang does not know the vendor extensions of the RISC-V toolchains, so the
 * `-march=` clangd sees is reduced to the base ISA, and GCC-only options are
 * removed.
 */
import type { ArchitectureSplit } from '../types/index.js';
import { splitCommandLine } from '../core/flags.js';
import { C_EXTENSIONS, CPP_EXTENSIONS, toPosixPath } from '../core/sources.js';

/** GCC-only options clang rejects */
export const CLANGD_REMOVED_FLAGS = ['-mjump-tables-in-text'];

const C_HEADER_EXTENSIONS = ['.h'];
const CPP_HEADER_EXTENSIONS = ['.hpp', '.hh', '.hxx'];

/**
 * PathMatch regex for a set of extensions, matched case-sensitively
 */
export function extensionPathMatch(extensions: Iterable<string>): string {
  const alternatives = [...extensions].map(ext => ext.slice(1).replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return `.*\\.(${alternatives.join('|')})$`;
}

const C_PATH_MATCH = extensionPathMatch([...C_EXTENSIONS, ...C_HEADER_EXTENSIONS]);
const CPP_PATH_MATCH = extensionPathMatch([...CPP_EXTENSIONS, ...CPP_HEADER_EXTENSIONS]);

const C_STANDARD = /^-std=(c|gnu)\d/;
const CPP_STANDARD = /^-std=(c|gnu)\+\+/;

/**
 * What the clangd configuration is built from
 */
export interface ClangdInput {
  /** Effective compile flags of the active target */
  compileFlags: string[];
  /** Project include directories */
  includeDirs: string[];
  /** Toolchain system include directories */
  systemIncludeDirs: string[];
  architecture?: ArchitectureSplit;
  headerInsertion: boolean;
}

/**
 * Double-quoted YAML scalar
 */
function yamlString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Target triple matching the architecture's register width
 */
export function targetTriple(architecture?: ArchitectureSplit): string {
  const xlen = /^rv(32|64|128)/.exec(architecture?.full ?? '')?.[1] ?? '32';
  return `riscv${xlen}-unknown-elf`;
}

/**
 * Flags clangd adds for one language
 */
export function clangdAddFlags(input: ClangdInput, language: 'c' | 'c++'): string[] {
  const foreignStandard = language === 'c' ? CPP_STANDARD : C_STANDARD;
  const flags = input.compileFlags
    .flatMap(splitCommandLine)
    .filter(flag => !flag.startsWith('-march='))
    .filter(flag => !CLANGD_REMOVED_FLAGS.includes(flag))
    .filter(flag => !foreignStandard.test(flag));

  const add = [
    `-x${language}`,
    `--target=${targetTriple(input.architecture)}`,
    ...input.systemIncludeDirs.map(dir => `-isystem${dir}`),
    ...input.includeDirs.map(dir => `-I${toPosixPath(dir)}`),
    ...flags,
  ];

  if (input.architecture) {
    const march = input.architecture.extension ? input.architecture.base : input.architecture.full;
    add.push(`-march=${march}`);
  }

  return add;
}

/**
 * Flags clangd removes from compilation database commands
 */
export function clangdRemoveFlags(input: ClangdInput): string[] {
  const remove = input.architecture ? [`-march=${input.architecture.full}`] : [];
  return [...remove, ...CLANGD_REMOVED_FLAGS];
}

function fragment(pathMatch: string, add: string[], remove: string[]): string[] {
  return [
    'If:',
    `  PathMatch: '${pathMatch}'`,
    'CompileFlags:',
    '  Add:',
    ...add.map(flag => `    - ${yamlString(flag)}`),
    '  Remove:',
    ...remove.map(flag => `    - ${yamlString(flag)}`),
  ];
}

/**
 * Render the .clangd file: a C fragment, a C++ fragment and completion settings
 */
export function formatClangd(input: ClangdInput): string {
  const remove = clangdRemoveFlags(input);
  const documents = [
    fragment(C_PATH_MATCH, clangdAddFlags(input, 'c'), remove),
    fragment(CPP_PATH_MATCH, clangdAddFlags(input, 'c++'), remove),
  ];

  if (!input.headerInsertion) {
    documents.push(['Completion:', '  HeaderInsertion: Never']);
  }

  return documents.map(lines => lines.join('\n')).join('\n---\n') + '\n';
}
