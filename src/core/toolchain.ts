/**
 * Compiler profiles for the supported RISC-V toolchains
 *
 * A compiler ID from the project maps to one of the known toolchain releases,
 * or to the fallback profile, which behaves like the V2 release.
 */
import * as path from 'path';
import type { ConversionWarning } from '../types/index.js';

/**
 * Installed toolchain release
 */
export interface ToolchainRelease {
  versionName: 'V1' | 'V2' | 'V3';
  gccVersion: string;
  /** Flags every compile gets unless the project overrides the same flag */
  defaultFlags: string[];
  /** Libraries appended after project and target libraries */
  defaultLibraries: string[];
}

export type KnownCompilerId = 'riscv32-v1' | 'riscv32-v2' | 'riscv32-v3';

export type CompilerProfile =
  | { kind: KnownCompilerId; release: ToolchainRelease }
  | { kind: 'fallback'; requestedId: string; release: ToolchainRelease };

/**
 * Tool invocations for a profile
 */
export interface ToolPaths {
  cc: string;
  cxx: string;
  ld: string;
  ar: string;
  /** Directory holding the tools, when installed under a known root */
  binDir?: string;
}

/**
 * Default install location of the RV32 toolchains
 */
export const DEFAULT_TOOLCHAIN_ROOT = 'C:\\Program Files (x86)\\RV32-Toolchain';

const TOOL_PREFIX = 'riscv32-elf';

const RELEASES: Record<KnownCompilerId, ToolchainRelease> = {
  'riscv32-v1': {
    versionName: 'V1',
    gccVersion: '6.1.0',
    defaultFlags: ['-march=rv32imac', '-mabi=ilp32'],
    defaultLibraries: [],
  },
  'riscv32-v2': {
    versionName: 'V2',
    gccVersion: '10.2.0',
    defaultFlags: ['-march=rv32imac', '-mabi=ilp32'],
    defaultLibraries: [],
  },
  'riscv32-v3': {
    versionName: 'V3',
    gccVersion: '14.2.0',
    // GCC 12 moved CSR and fence.i out of the base ISA
    defaultFlags: ['-march=rv32imac_zicsr_zifencei', '-mabi=ilp32'],
    defaultLibraries: [],
  },
};

const FALLBACK_ID: KnownCompilerId = 'riscv32-v2';

/**
 * Check if a compiler ID names one of the supported toolchains
 */
export function isKnownCompilerId(id: string): id is KnownCompilerId {
  return Object.prototype.hasOwnProperty.call(RELEASES, id);
}

/**
 * Map a compiler ID to its profile
 *
 * Unknown IDs never fail: they get the fallback profile and a warning.
 */
export function resolveCompilerProfile(compilerId: string): {
  profile: CompilerProfile;
  warning?: ConversionWarning;
} {
  if (isKnownCompilerId(compilerId)) {
    return { profile: { kind: compilerId, release: RELEASES[compilerId] } };
  }

  return {
    profile: { kind: 'fallback', requestedId: compilerId, release: RELEASES[FALLBACK_ID] },
    warning: {
      code: 'unrecognized-compiler',
      message: `Unknown compiler '${compilerId}', falling back to ${FALLBACK_ID}`,
    },
  };
}

/**
 * Short identifier used to name build rules of a profile
 */
export function profileKey(profile: CompilerProfile): string {
  return `rv32_${profile.release.versionName.toLowerCase()}`;
}

/**
 * Human-readable profile name
 */
export function describeProfile(profile: CompilerProfile): string {
  switch (profile.kind) {
    case 'riscv32-v1':
    case 'riscv32-v2':
    case 'riscv32-v3':
      return `${profile.kind} (GCC ${profile.release.gccVersion})`;
    case 'fallback':
      return `${profile.requestedId} (unrecognized, using ${FALLBACK_ID} defaults)`;
  }
}

function isWindowsRoot(root: string): boolean {
  return /^[A-Za-z]:/.test(root) || root.includes('\\');
}

function joinToolchainPath(root: string, ...segments: string[]): string {
  return isWindowsRoot(root) ? path.win32.join(root, ...segments) : path.posix.join(root, ...segments);
}

function releaseDir(profile: CompilerProfile, root: string): string {
  return joinToolchainPath(root, `RV32-${profile.release.versionName}`);
}

/**
 * Tool invocations for a profile
 *
 * Without a toolchain root the bare tool names are used and resolved through PATH.
 */
export function toolPaths(profile: CompilerProfile, toolchainRoot?: string): ToolPaths {
  if (!toolchainRoot) {
    return {
      cc: `${TOOL_PREFIX}-gcc`,
      cxx: `${TOOL_PREFIX}-g++`,
      ld: `${TOOL_PREFIX}-ld`,
      ar: `${TOOL_PREFIX}-ar`,
    };
  }

  const binDir = joinToolchainPath(releaseDir(profile, toolchainRoot), 'bin');
  const exe = isWindowsRoot(toolchainRoot) ? '.exe' : '';
  const tool = (name: string) => joinToolchainPath(binDir, `${TOOL_PREFIX}-${name}${exe}`);

  return {
    cc: tool('gcc'),
    cxx: tool('g++'),
    ld: tool('ld'),
    ar: tool('ar'),
    binDir,
  };
}

/**
 * System include directories of a toolchain install, for the language server
 */
export function toolchainIncludeDirs(profile: CompilerProfile, toolchainRoot?: string): string[] {
  if (!toolchainRoot) return [];

  const base = releaseDir(profile, toolchainRoot);
  const gccDir = joinToolchainPath(base, 'lib', 'gcc', TOOL_PREFIX, profile.release.gccVersion);
  return [
    joinToolchainPath(gccDir, 'include'),
    joinToolchainPath(gccDir, 'include-fixed'),
    joinToolchainPath(base, TOOL_PREFIX, 'include'),
  ];
}

/**
 * Directory holding libgcc, needed when linking with raw ld
 */
export function runtimeLibraryDir(profile: CompilerProfile, toolchainRoot?: string): string | undefined {
  if (!toolchainRoot) return undefined;
  return joinToolchainPath(releaseDir(profile, toolchainRoot), 'lib', 'gcc', TOOL_PREFIX, profile.release.gccVersion);
}
