/**
 * Builds the normalized project model from a Code::Blocks document
 *
 * Targets inherit project-level settings and overlay their own, following the
 * option relations Code::Blocks stores per target. Output names are never
 * invented: a target without a declared output is an error.
 */
import * as path from 'path';
import { OptionRelation, TargetType } from '../types/index.js';
import type { ConversionWarning, ExtraCommands, ProjectInfo, SourceFile, Target, UnitBuildCommand } from '../types/index.js';
import { SemanticModelError, StructuralParseError } from '../core/errors.js';
import { childElements, firstChild, optionValue, optionValues, parseProjectDocument } from './xml-document.js';
import type { XmlElement } from './xml-document.js';
import { cleanSubstitutedPath, substitutePlaceholders, targetPlaceholders } from './variables.js';
import type { PlaceholderMap } from './variables.js';

/**
 * Unit target value Code::Blocks writes for files that belong to no target
 */
export const NO_TARGET = '<{~None~}>';

const DEFAULT_PROJECT_TITLE = 'untitled';

/**
 * Result of building the project model
 */
export interface ParsedProject {
  project: ProjectInfo;
  warnings: ConversionWarning[];
}

interface CompilerBlock {
  options: string[];
  includeDirs: string[];
}

interface LinkerBlock {
  options: string[];
  libraries: string[];
  libraryDirs: string[];
}

/**
 * Read `<Add option>` / `<Add directory>` entries of a `<Compiler>` element
 */
function readCompilerBlock(element: XmlElement | undefined): CompilerBlock {
  const block: CompilerBlock = { options: [], includeDirs: [] };
  if (!element) return block;

  for (const add of childElements(element, 'Add')) {
    const option = add.attributes.option?.trim();
    if (option) block.options.push(option);
    const directory = add.attributes.directory?.trim();
    if (directory) block.includeDirs.push(directory);
  }
  return block;
}

/**
 * Read `<Add option>` / `<Add library>` / `<Add directory>` entries of a `<Linker>` element
 */
function readLinkerBlock(element: XmlElement | undefined): LinkerBlock {
  const block: LinkerBlock = { options: [], libraries: [], libraryDirs: [] };
  if (!element) return block;

  for (const add of childElements(element, 'Add')) {
    const option = add.attributes.option?.trim();
    if (option) block.options.push(option);
    const library = add.attributes.library?.trim();
    if (library) block.libraries.push(library);
    const directory = add.attributes.directory?.trim();
    if (directory) block.libraryDirs.push(directory);
  }
  return block;
}

/**
 * Read `<ExtraCommands>`; blank commands are dropped
 */
function readExtraCommands(element: XmlElement | undefined): ExtraCommands {
  const commands: ExtraCommands = { before: [], after: [] };
  if (!element) return commands;

  for (const add of childElements(element, 'Add')) {
    const before = add.attributes.before?.trim();
    if (before) commands.before.push(before);
    const after = add.attributes.after?.trim();
    if (after) commands.after.push(after);
  }
  return commands;
}

/**
 * Parse a Code::Blocks option relation value, defaulting to "project then target"
 */
export function parseOptionRelation(value: string | undefined): OptionRelation {
  switch (value?.trim()) {
    case '0':
      return OptionRelation.TargetOnly;
    case '1':
      return OptionRelation.ProjectOnly;
    case '2':
      return OptionRelation.TargetThenProject;
    default:
      return OptionRelation.ProjectThenTarget;
  }
}

/**
 * Combine project and target lists according to a relation
 */
export function mergeByRelation<T>(projectValues: T[], targetValues: T[], relation: OptionRelation): T[] {
  switch (relation) {
    case OptionRelation.TargetOnly:
      return [...targetValues];
    case OptionRelation.ProjectOnly:
      return [...projectValues];
    case OptionRelation.TargetThenProject:
      return [...targetValues, ...projectValues];
    case OptionRelation.ProjectThenTarget:
      return [...projectValues, ...targetValues];
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Map `<Option type>` to a target type
 */
export function parseTargetType(value: string | undefined): TargetType {
  switch (value?.trim()) {
    case '2':
      return TargetType.StaticLibrary;
    case '3':
      return TargetType.DynamicLibrary;
    case '4':
      return TargetType.CommandsOnly;
    default:
      return TargetType.Executable;
  }
}

const DEFAULT_EXTENSIONS: Record<TargetType, string> = {
  [TargetType.Executable]: '.elf',
  [TargetType.StaticLibrary]: '.a',
  [TargetType.DynamicLibrary]: '.so',
  [TargetType.CommandsOnly]: '',
};

/**
 * Apply `prefix_auto` / `extension_auto` to a declared output path
 *
 * Only adds what is missing; a fully spelled-out path comes back unchanged.
 */
export function applyOutputNaming(
  output: string,
  type: TargetType,
  naming: { prefixAuto: boolean; extensionAuto: boolean }
): string {
  const separator = Math.max(output.lastIndexOf('/'), output.lastIndexOf('\\'));
  const dir = output.substring(0, separator + 1);
  let fileName = output.substring(separator + 1);

  const isLibrary = type === TargetType.StaticLibrary || type === TargetType.DynamicLibrary;
  if (naming.prefixAuto && isLibrary && !fileName.startsWith('lib')) {
    fileName = `lib${fileName}`;
  }

  if (naming.extensionAuto && path.posix.extname(fileName) === '') {
    fileName += DEFAULT_EXTENSIONS[type];
  }

  return dir + fileName;
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(';')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function parseFileVersion(root: XmlElement, warnings: ConversionWarning[]): ProjectInfo['fileVersion'] {
  const element = firstChild(root, 'FileVersion');
  if (!element) {
    warnings.push({ code: 'file-version', message: 'No <FileVersion> found' });
    return undefined;
  }

  const major = Number.parseInt(element.attributes.major ?? '', 10);
  const minor = Number.parseInt(element.attributes.minor ?? '', 10);
  if (Number.isNaN(major) || Number.isNaN(minor)) {
    warnings.push({ code: 'file-version', message: 'Invalid <FileVersion> format' });
    return undefined;
  }

  if (major !== 1 || minor < 6) {
    warnings.push({
      code: 'file-version',
      message: `FileVersion ${major}.${minor} may be incompatible (expected 1.6 or later)`,
    });
  }
  return { major, minor };
}

interface ProjectScope {
  title: string;
  compilerId?: string;
  compiler: CompilerBlock;
  linker: LinkerBlock;
}

function buildTarget(element: XmlElement, scope: ProjectScope): Target {
  const title = element.attributes.title?.trim();
  if (!title) {
    throw new SemanticModelError('<Target> without a title attribute');
  }

  const compilerId = optionValue(element, 'compiler')?.trim() || scope.compilerId;
  if (!compilerId) {
    throw new StructuralParseError(`Missing <Option compiler> for target "${title}" and no project-level compiler`);
  }

  const type = parseTargetType(optionValue(element, 'type'));
  const compiler = readCompilerBlock(firstChild(element, 'Compiler'));
  const linker = readLinkerBlock(firstChild(element, 'Linker'));

  const compilerRelation = parseOptionRelation(optionValue(element, 'projectCompilerOptionsRelation'));
  const linkerRelation = parseOptionRelation(optionValue(element, 'projectLinkerOptionsRelation'));
  const includeRelation = parseOptionRelation(optionValue(element, 'projectIncludeDirsRelation'));
  const libDirRelation = parseOptionRelation(optionValue(element, 'projectLibDirsRelation'));

  // Output and object dir first: every other placeholder depends on them
  const baseValues = { projectName: scope.title, targetName: title };
  const rawObjectDir = optionValue(element, 'object_output')?.trim() || `obj/${title}`;
  const objectOutput = cleanSubstitutedPath(
    substitutePlaceholders(rawObjectDir, targetPlaceholders({ ...baseValues, objectDir: '' }))
  );

  let output = '';
  const rawOutput = optionValue(element, 'output')?.trim();
  if (rawOutput) {
    const substituted = cleanSubstitutedPath(
      substitutePlaceholders(rawOutput, targetPlaceholders({ ...baseValues, objectDir: objectOutput }))
    );
    output = applyOutputNaming(substituted, type, {
      prefixAuto: optionValue(element, 'prefix_auto') === '1',
      extensionAuto: optionValue(element, 'extension_auto') === '1',
    });
  } else if (type !== TargetType.CommandsOnly) {
    throw new SemanticModelError('no output file declared (<Option output>)', title);
  }

  const placeholders: PlaceholderMap = targetPlaceholders({
    ...baseValues,
    objectDir: objectOutput,
    output: output || undefined,
  });
  const substitute = (values: string[]) => values.map(value => substitutePlaceholders(value, placeholders));
  const substitutePaths = (values: string[]) => substitute(values).map(cleanSubstitutedPath);

  const workingDir = optionValue(element, 'working_dir')?.trim();
  const targetCommands = readExtraCommands(firstChild(element, 'ExtraCommands'));

  return {
    title,
    type,
    output,
    objectOutput,
    workingDir: workingDir ? cleanSubstitutedPath(substitutePlaceholders(workingDir, placeholders)) : undefined,
    compilerId,
    compilerOptions: substitute(mergeByRelation(scope.compiler.options, compiler.options, compilerRelation)),
    includeDirs: unique(substitutePaths(mergeByRelation(scope.compiler.includeDirs, compiler.includeDirs, includeRelation))),
    linkerOptions: substitute(mergeByRelation(scope.linker.options, linker.options, linkerRelation)),
    projectLibraries: substitutePaths(scope.linker.libraries),
    libraries: substitutePaths(linker.libraries),
    libraryDirs: unique(substitutePaths(mergeByRelation(scope.linker.libraryDirs, linker.libraryDirs, libDirRelation))),
    externalDeps: substitutePaths(splitList(optionValue(element, 'external_deps'))),
    extraCommands: {
      before: substitute(targetCommands.before),
      after: substitute(targetCommands.after),
    },
  };
}

function buildSourceFile(unit: XmlElement, warnings: ConversionWarning[]): SourceFile | undefined {
  const filename = unit.attributes.filename?.trim();
  if (!filename) {
    warnings.push({ code: 'unit-without-filename', message: '<Unit> without a filename attribute was skipped' });
    return undefined;
  }

  const compileValue = optionValue(unit, 'compile');
  const linkValue = optionValue(unit, 'link');
  const compilerVar = optionValue(unit, 'compilerVar')?.trim().toUpperCase();

  const buildCommands: UnitBuildCommand[] = [];
  for (const option of childElements(unit, 'Option')) {
    const { compiler, buildCommand, use } = option.attributes;
    if (compiler === undefined || buildCommand === undefined) continue;
    if (use !== '1') continue;

    const command = buildCommand.trim();
    if (!command) {
      warnings.push({
        code: 'blank-build-command',
        message: `Unit "${filename}" has an empty build command for compiler '${compiler}'; it is ignored`,
      });
      continue;
    }
    buildCommands.push({ compilerId: compiler, command });
  }

  const targetValues = optionValues(unit, 'target').map(value => value.trim());
  let targets: string[] | undefined;
  if (targetValues.length > 0) {
    targets = targetValues.filter(value => value !== NO_TARGET && value.length > 0);
  }

  const overrides = readCompilerBlock(firstChild(unit, 'Compiler'));

  return {
    filename,
    compile: compileValue === undefined ? true : compileValue === '1',
    link: linkValue === undefined ? true : linkValue === '1',
    compilerVar: compilerVar === 'CC' || compilerVar === 'CPP' ? compilerVar : undefined,
    compilerOptions: overrides.options,
    includeDirs: overrides.includeDirs,
    buildCommands,
    targets,
  };
}

function readVirtualTargets(project: XmlElement, targetTitles: Set<string>): Record<string, string[]> {
  const virtualTargets = new Map<string, string[]>();
  const element = firstChild(project, 'VirtualTargets');
  if (!element) return {};

  for (const add of childElements(element, 'Add')) {
    const alias = add.attributes.alias?.trim();
    if (!alias) continue;
    const members = splitList(add.attributes.targets);
    for (const member of members) {
      if (!targetTitles.has(member)) {
        throw new SemanticModelError(`Virtual target "${alias}" refers to unknown target "${member}"`);
      }
    }
    virtualTargets.set(alias, members);
  }
  return Object.fromEntries(virtualTargets);
}

/**
 * Parse a Code::Blocks project document into the normalized model
 *
 * @param content The raw .cbp file content
 * @returns The project model and any non-fatal warnings
 * @throws StructuralParseError for malformed or incomplete documents
 * @throws SemanticModelError for missing mandatory values
 */
export function parseCbpProject(content: string): ParsedProject {
  const { root, project } = parseProjectDocument(content);
  const warnings: ConversionWarning[] = [];

  const fileVersion = parseFileVersion(root, warnings);
  const compilerBlock = readCompilerBlock(firstChild(project, 'Compiler'));
  const linkerBlock = readLinkerBlock(firstChild(project, 'Linker'));

  const scope: ProjectScope = {
    title: optionValue(project, 'title')?.trim() || DEFAULT_PROJECT_TITLE,
    compilerId: optionValue(project, 'compiler')?.trim() || undefined,
    compiler: compilerBlock,
    linker: linkerBlock,
  };

  // Document order decides the default target; a redefined title replaces the earlier one
  const targets: Target[] = [];
  for (const build of childElements(project, 'Build')) {
    for (const element of childElements(build, 'Target')) {
      const target = buildTarget(element, scope);
      const existing = targets.findIndex(t => t.title === target.title);
      if (existing !== -1) {
        warnings.push({
          code: 'duplicate-target',
          message: `Target "${target.title}" is defined more than once; the last definition is used`,
        });
        targets.splice(existing, 1);
      }
      targets.push(target);
    }
  }

  const sources: SourceFile[] = [];
  const seenUnits = new Set<string>();
  for (const unit of childElements(project, 'Unit')) {
    const source = buildSourceFile(unit, warnings);
    if (!source) continue;

    const key = source.filename.replace(/\\/g, '/');
    if (seenUnits.has(key)) {
      warnings.push({
        code: 'duplicate-unit',
        message: `Unit "${source.filename}" is listed more than once; the first entry is used`,
      });
      continue;
    }
    seenUnits.add(key);
    sources.push(source);
  }

  const targetTitles = new Set(targets.map(t => t.title));
  const virtualTargets = readVirtualTargets(project, targetTitles);

  const defaultTarget = optionValue(project, 'default_target')?.trim() || undefined;
  if (defaultTarget && !targetTitles.has(defaultTarget) && !Object.hasOwn(virtualTargets, defaultTarget)) {
    throw new SemanticModelError(`Default target "${defaultTarget}" is not defined`);
  }

  return {
    project: {
      title: scope.title,
      fileVersion,
      compilerId: scope.compilerId,
      compilerOptions: compilerBlock.options,
      includeDirs: compilerBlock.includeDirs,
      linkerOptions: linkerBlock.options,
      libraries: linkerBlock.libraries,
      libraryDirs: linkerBlock.libraryDirs,
      extraCommands: readExtraCommands(firstChild(project, 'ExtraCommands')),
      targets,
      sources,
      virtualTargets,
      defaultTarget,
    },
    warnings,
  };
}
