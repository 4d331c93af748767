/**
 * TypeScript interfaces for cbp2clangd
 */

/**
 * Kind of output a build target produces (Code::Blocks `<Option type>`)
 */
export enum TargetType {
  Executable = 'executable',
  StaticLibrary = 'static-library',
  DynamicLibrary = 'dynamic-library',
  CommandsOnly = 'commands-only',
}

/**
 * How the final link step is invoked
 */
export enum LinkerType {
  /** Through the compiler driver, which supplies entry point, startup files and runtime libs */
  Gcc = 'gcc',
  /** Raw `ld`; everything the driver would add has to be spelled out */
  Ld = 'ld',
}

/**
 * Language / rule family of a source file
 */
export enum SourceKind {
  C = 'c',
  Cpp = 'cpp',
  /** `.S`, run through the preprocessor */
  AssemblyWithCpp = 'assembly-with-cpp',
  /** `.s` */
  Assembly = 'assembly',
  /** Non-standard extension built by the unit's own build command */
  Custom = 'custom',
  /** Headers, linker scripts, docs: never compiled */
  None = 'none',
}

/**
 * Code::Blocks option relation between project and target scope
 */
export enum OptionRelation {
  TargetOnly = 0,
  ProjectOnly = 1,
  TargetThenProject = 2,
  ProjectThenTarget = 3,
}

/**
 * Output format for the console summary
 */
export enum OutputFormat {
  Text = 'text',
  JSON = 'json',
}

/**
 * Shell the generated build commands are written for
 */
export type HostShell = 'cmd' | 'sh';

/**
 * Pre/post build commands
 */
export interface ExtraCommands {
  before: string[];
  after: string[];
}

/**
 * A named build configuration
 */
export interface Target {
  title: string;
  type: TargetType;
  /** Resolved output path, placeholders substituted */
  output: string;
  /** Directory object files go to */
  objectOutput: string;
  workingDir?: string;
  compilerId: string;
  /** Effective compiler flags (project and target merged per relation) */
  compilerOptions: string[];
  includeDirs: string[];
  linkerOptions: string[];
  /** Project-level library references, placeholders substituted for this target */
  projectLibraries: string[];
  /** Target-level library references */
  libraries: string[];
  libraryDirs: string[];
  /** Files whose change forces a relink */
  externalDeps: string[];
  extraCommands: ExtraCommands;
}

/**
 * A custom build command declared on a unit for one compiler
 */
export interface UnitBuildCommand {
  compilerId: string;
  command: string;
}

/**
 * A unit (source file) of the project
 */
export interface SourceFile {
  /** Path as written in the project file, relative to the project dir */
  filename: string;
  compile: boolean;
  link: boolean;
  /** `CC` or `CPP` when the unit forces the compiler variant */
  compilerVar?: 'CC' | 'CPP';
  /** Per-file compiler flags; these win over target flags with the same key */
  compilerOptions: string[];
  includeDirs: string[];
  buildCommands: UnitBuildCommand[];
  /** Targets this unit belongs to; undefined means every target */
  targets?: string[];
}

/**
 * Normalized Code::Blocks project
 */
export interface ProjectInfo {
  title: string;
  fileVersion?: { major: number; minor: number };
  /** Project-wide compiler ID, when declared */
  compilerId?: string;
  compilerOptions: string[];
  includeDirs: string[];
  linkerOptions: string[];
  libraries: string[];
  libraryDirs: string[];
  extraCommands: ExtraCommands;
  targets: Target[];
  sources: SourceFile[];
  virtualTargets: Record<string, string[]>;
  defaultTarget?: string;
}

/**
 * `-march=` value decomposed into base ISA and vendor extension
 */
export interface ArchitectureSplit {
  /** The complete value after `-march=` */
  full: string;
  /** Canonical base ISA and standard extensions */
  base: string;
  /** Vendor / unrecognized tail, empty when there is none */
  extension: string;
}

/**
 * Non-fatal issue found during conversion
 */
export interface ConversionWarning {
  code:
    | 'file-version'
    | 'unrecognized-compiler'
    | 'duplicate-target'
    | 'unit-without-filename'
    | 'blank-build-command'
    | 'no-build-command'
    | 'empty-target'
    | 'duplicate-unit';
  message: string;
}

/**
 * Build rule of the generated graph
 */
export interface BuildRule {
  name: string;
  command: string;
  description?: string;
  depfile?: string;
  deps?: 'gcc';
}

/**
 * One build statement of the generated graph
 */
export interface BuildStatement {
  outputs: string[];
  rule: string;
  inputs: string[];
  implicitInputs: string[];
  orderOnlyInputs: string[];
  variables: Record<string, string>;
}

/**
 * Declarative build graph, serialized as build.ninja
 */
export interface BuildGraph {
  rules: BuildRule[];
  statements: BuildStatement[];
  defaults: string[];
}

/**
 * Entry of compile_commands.json
 */
export interface CompileCommand {
  directory: string;
  arguments: string[];
  file: string;
  output: string;
}

/**
 * Conversion options (validated, see core/config.ts)
 */
export interface ConvertOptions {
  linker: LinkerType;
  /** Override for the ninja executable used by build.bat */
  ninjaPath?: string;
  /** Active target title */
  target?: string;
  /** Root of the RV32 toolchain installs; bare tool names when absent */
  toolchainRoot?: string;
  /** Shell of the archive rule and the wrapper script */
  hostShell: HostShell;
  headerInsertion: boolean;
  verbose: boolean;
}

/**
 * Per-target line of the console summary
 */
export interface TargetSummary {
  title: string;
  type: TargetType;
  /** Output path, or the phony name of a commands-only target */
  output: string;
  compiler: string;
  sources: number;
  architecture?: ArchitectureSplit;
}

/**
 * What a conversion did, for the console summary
 */
export interface ConversionSummary {
  projectTitle: string;
  projectFile: string;
  outputDir: string;
  activeTargets: string[];
  linker: LinkerType;
  targets: TargetSummary[];
  rules: number;
  statements: number;
  compileCommands: number;
  warnings: ConversionWarning[];
  /** Files written, or that would be written in a dry run */
  files: string[];
  dryRun: boolean;
  duration: number;
}
