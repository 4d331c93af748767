/**
 * Build graph synthesis
 *
 * Plans every target of the project (compile units, link step) and turns the
 * plans into ninja rules and statements. All paths in the graph are relative
 * to the project directory, which is where the build runs.
 */
import * as path from 'path';
import { LinkerType, SourceKind, TargetType } from '../types/index.js';
import type {
  BuildGraph,
  BuildRule,
  BuildStatement,
  ConversionWarning,
  HostShell,
  ProjectInfo,
  SourceFile,
  Target,
} from '../types/index.js';
import { substitutePlaceholders, cleanSubstitutedPath, targetPlaceholders } from '../parsers/variables.js';
import type { PlaceholderMap } from '../parsers/variables.js';
import { PathMappingError, SemanticModelError } from './errors.js';
import { quoteArgument, resolveFileFlags, resolveTargetOptions } from './flags.js';
import type { ResolvedOptions } from './flags.js';
import { planLink } from './libraries.js';
import type { LinkPlan } from './libraries.js';
import { classifySource, mapObjectPaths, toPosixPath } from './sources.js';
import { profileKey, resolveCompilerProfile, runtimeLibraryDir, toolPaths } from './toolchain.js';
import type { CompilerProfile, ToolPaths } from './toolchain.js';

/**
 * One source compiled for one target
 */
export interface CompileUnit {
  source: SourceFile;
  kind: SourceKind;
  /** Output of the compile step: the mapped object, or the custom command's `-o` */
  objectPath: string;
  /** Compiler driver the unit is built with */
  tool: 'cc' | 'cxx';
  /** `-x` selection, when the extension alone would pick the wrong language */
  languageFlags: string[];
  flags: string[];
  includeFlags: string[];
  /** Passed to the link step; otherwise only an implicit input */
  linked: boolean;
  /** Fully substituted command of a custom-built unit */
  customCommand?: string;
}

/**
 * Everything needed to build one target
 */
export interface TargetPlan {
  target: Target;
  profile: CompilerProfile;
  options: ResolvedOptions;
  tools: ToolPaths;
  compileUnits: CompileUnit[];
  link: LinkPlan;
}

/**
 * Inputs of the planner besides the project model
 */
export interface PlanContext {
  linker: LinkerType;
  toolchainRoot?: string;
  /** Probe for library files relative to the project dir */
  fileExists?: (relativePath: string) => boolean;
}

/**
 * Planned targets and the warnings raised while planning
 */
export interface ProjectPlan {
  plans: TargetPlan[];
  warnings: ConversionWarning[];
}

const NINJA_DEPFILE = '$out.d';

/**
 * Whether a unit belongs to a target
 */
export function isTargetMember(source: SourceFile, title: string): boolean {
  return source.targets === undefined || source.targets.includes(title);
}

/**
 * Titles of the targets an active-target name stands for
 *
 * The name may be a target title or a virtual target alias. Without a name the
 * project's default target is used, and without that the first target.
 *
 * @throws SemanticModelError when the name is neither
 */
export function resolveActiveTargets(project: ProjectInfo, name?: string): string[] {
  const active = name ?? project.defaultTarget ?? project.targets[0]?.title;
  if (active === undefined) {
    throw new SemanticModelError('Project has no targets');
  }

  if (project.targets.some(target => target.title === active)) {
    return [active];
  }
  if (Object.hasOwn(project.virtualTargets, active)) {
    return [...project.virtualTargets[active]];
  }

  const known = [...project.targets.map(t => t.title), ...Object.keys(project.virtualTargets)];
  throw new SemanticModelError(`Unknown target "${active}" (available: ${known.join(', ')})`);
}

function languageFlagsFor(kind: SourceKind, filename: string): string[] {
  const ext = path.posix.extname(toPosixPath(filename));
  if (kind === SourceKind.C && ext !== '.c') return ['-x', 'c'];
  if (kind === SourceKind.AssemblyWithCpp) return ['-x', 'assembler-with-cpp'];
  return [];
}

/**
 * Pick the build command of a custom unit for a compiler
 *
 * Falls back to the first declared command when none names the compiler.
 */
function selectBuildCommand(
  source: SourceFile,
  compilerId: string,
  warnings: ConversionWarning[]
): string | undefined {
  const exact = source.buildCommands.find(command => command.compilerId === compilerId);
  if (exact) return exact.command;

  const first = source.buildCommands[0];
  if (first) {
    warnings.push({
      code: 'no-build-command',
      message: `Unit "${source.filename}" has no build command for compiler '${compilerId}'; using the one for '${first.compilerId}'`,
    });
  }
  return first?.command;
}

const CUSTOM_MACRO_PATTERN = /\$(compiler|options|includes|file|object)\b/g;
const OUTPUT_FLAG_PATTERN = /(?:^|\s)-o\s*("[^"]+"|\S+)/;

/**
 * Expand the macros of a custom build command and find its output
 */
export function expandCustomCommand(
  command: string,
  values: { compiler: string; options: string; includes: string; file: string; object: string },
  placeholders: PlaceholderMap
): { command: string; output: string } {
  const withMacros = command.replace(CUSTOM_MACRO_PATTERN, (_match, macro: keyof typeof values) => values[macro]);
  const expanded = substitutePlaceholders(withMacros, placeholders);

  const outputFlag = OUTPUT_FLAG_PATTERN.exec(expanded);
  const output = outputFlag
    ? cleanSubstitutedPath(toPosixPath(outputFlag[1].replace(/^"|"$/g, '')))
    : values.object;

  return { command: expanded, output };
}

function planCompileUnits(
  project: ProjectInfo,
  target: Target,
  options: ResolvedOptions,
  tools: ToolPaths,
  warnings: ConversionWarning[]
): CompileUnit[] {
  if (target.type === TargetType.CommandsOnly) return [];

  const members = project.sources
    .filter(source => source.compile && isTargetMember(source, target.title))
    .map(source => ({ source, kind: classifySource(source) }))
    .filter(member => member.kind !== SourceKind.None);

  const objectPaths = mapObjectPaths(
    members.map(member => member.source.filename),
    target.objectOutput
  );

  const placeholders = targetPlaceholders({
    projectName: project.title,
    targetName: target.title,
    objectDir: target.objectOutput,
    output: target.output || undefined,
    compilerDir: tools.binDir,
  });

  return members.map(({ source, kind }) => {
    const file = toPosixPath(source.filename);
    const fileFlags = resolveFileFlags(target, options, source);
    const mapped = objectPaths.get(source.filename) ?? '';
    const unit: CompileUnit = {
      source,
      kind,
      objectPath: mapped,
      tool: kind === SourceKind.Cpp ? 'cxx' : 'cc',
      languageFlags: languageFlagsFor(kind, source.filename),
      flags: fileFlags.flags,
      includeFlags: fileFlags.includeFlags,
      linked: source.link && kind !== SourceKind.Custom,
    };

    if (kind === SourceKind.Custom) {
      const command = selectBuildCommand(source, target.compilerId, warnings);
      if (command !== undefined) {
        const expanded = expandCustomCommand(
          command,
          {
            compiler: quoteArgument(tools.cc),
            options: fileFlags.flags.join(' '),
            includes: fileFlags.includeFlags.join(' '),
            file,
            object: mapped,
          },
          placeholders
        );
        unit.customCommand = expanded.command;
        unit.objectPath = expanded.output;
      }
    }

    return unit;
  });
}

/**
 * Plan compile units and link steps for every target
 *
 * @throws SemanticModelError when no target has anything to compile
 */
export function planTargets(project: ProjectInfo, context: PlanContext): ProjectPlan {
  const warnings: ConversionWarning[] = [];
  const reportedCompilers = new Set<string>();

  const plans = project.targets.map(target => {
    const { profile, warning } = resolveCompilerProfile(target.compilerId);
    if (warning && !reportedCompilers.has(target.compilerId)) {
      reportedCompilers.add(target.compilerId);
      warnings.push(warning);
    }

    const tools = toolPaths(profile, context.toolchainRoot);
    const options = resolveTargetOptions(target, profile);
    const compileUnits = planCompileUnits(project, target, options, tools, warnings);

    const link = planLink({
      project,
      target,
      linker: context.linker,
      usesCpp: compileUnits.some(unit => unit.kind === SourceKind.Cpp),
      profileLibraries: profile.release.defaultLibraries,
      runtimeLibraryDir: runtimeLibraryDir(profile, context.toolchainRoot),
      fileExists: context.fileExists,
    });

    return { target, profile, options, tools, compileUnits, link };
  });

  if (!plans.some(producesObjects)) {
    throw new SemanticModelError('No compilable source files (C, C++, assembly or custom-built) in any target');
  }

  for (const plan of plans) {
    if (plan.target.type !== TargetType.CommandsOnly && !producesObjects(plan)) {
      warnings.push({
        code: 'empty-target',
        message: `Target "${plan.target.title}" has no source files to build; no link statement is written for it`,
      });
    }
  }

  return { plans, warnings };
}

/**
 * Whether any unit of a plan gets a build statement
 */
export function producesObjects(plan: TargetPlan): boolean {
  return plan.compileUnits.some(unit => unit.kind !== SourceKind.Custom || unit.customCommand !== undefined);
}

/**
 * Escape `$` for use inside a ninja rule command
 */
export function escapeNinjaCommand(command: string): string {
  return command.replace(/\$/g, '$$$$');
}

function sanitizeRuleName(value: string): string {
  return value.replace(/[^A-Za-z0-9_]/g, '_');
}

/**
 * Output a target's build statement produces, or its phony name
 */
export function targetOutput(target: Target): string {
  return target.type === TargetType.CommandsOnly ? target.title : toPosixPath(target.output);
}

interface OwnedStatement {
  statement: BuildStatement;
  owner: string;
}

/**
 * Accumulates rules and statements, enforcing one producer per output
 */
class GraphBuilder {
  private readonly rules = new Map<string, BuildRule>();
  private readonly statements: OwnedStatement[] = [];
  private readonly byOutput = new Map<string, OwnedStatement>();

  rule(rule: BuildRule): string {
    if (!this.rules.has(rule.name)) {
      this.rules.set(rule.name, rule);
    }
    return rule.name;
  }

  /** Rule name for a custom command; a differing command under the same name gets the target's name too */
  customRule(fileName: string, targetTitle: string, command: string): string {
    const escaped = escapeNinjaCommand(command);
    const baseName = `special_${sanitizeRuleName(fileName)}`;
    const existing = this.rules.get(baseName);
    const name =
      existing === undefined || existing.command === escaped
        ? baseName
        : `special_${sanitizeRuleName(targetTitle)}_${sanitizeRuleName(fileName)}`;
    return this.rule({ name, command: escaped, description: `CUSTOM ${fileName}` });
  }

  hasOutput(output: string): boolean {
    return this.byOutput.has(output.toLowerCase());
  }

  add(statement: BuildStatement, owner: string): void {
    const key = statement.outputs[0].toLowerCase();
    const existing = this.byOutput.get(key);
    if (existing) {
      if (JSON.stringify(existing.statement) === JSON.stringify(statement)) return;
      throw new PathMappingError(statement.outputs[0], [existing.owner, owner]);
    }

    const owned = { statement, owner };
    this.byOutput.set(key, owned);
    this.statements.push(owned);
  }

  build(defaults: string[]): BuildGraph {
    return {
      rules: [...this.rules.values()],
      statements: this.statements.map(owned => owned.statement),
      defaults,
    };
  }
}

function quoteTool(tool: string): string {
  return quoteArgument(tool);
}

function compileRule(builder: GraphBuilder, plan: TargetPlan, unit: CompileUnit): string {
  const key = profileKey(plan.profile);
  const tool = quoteTool(unit.tool === 'cxx' ? plan.tools.cxx : plan.tools.cc);

  if (unit.kind === SourceKind.Assembly) {
    return builder.rule({
      name: `as_${key}`,
      command: `${tool} $flags -c $in -o $out`,
      description: 'AS $out',
    });
  }

  const name =
    unit.kind === SourceKind.AssemblyWithCpp ? `ascpp_${key}` : unit.tool === 'cxx' ? `cxx_${key}` : `cc_${key}`;
  const label = unit.kind === SourceKind.AssemblyWithCpp ? 'AS' : unit.tool === 'cxx' ? 'CXX' : 'CC';
  return builder.rule({
    name,
    command: `${tool} $flags -MMD -MF $out.d -c $in -o $out`,
    description: `${label} $out`,
    depfile: NINJA_DEPFILE,
    deps: 'gcc',
  });
}

function linkRule(builder: GraphBuilder, plan: TargetPlan, hostShell: HostShell): string {
  const key = profileKey(plan.profile);
  const { tools } = plan;

  switch (plan.link.driver) {
    case 'ar': {
      const ar = quoteTool(tools.ar);
      const command =
        hostShell === 'cmd'
          ? `cmd /c (if exist "$out" del /q "$out") & ${ar} crs $out $in`
          : `rm -f $out && ${ar} crs $out $in`;
      return builder.rule({ name: `ar_${key}`, command, description: 'AR $out' });
    }
    case 'ld':
      return builder.rule({
        name: `ld_${key}`,
        command: `${quoteTool(tools.ld)} $pre_flags $in --start-group $lib_flags --end-group $runtime_libs -o $out`,
        description: 'LINK $out',
      });
    case 'cxx':
      return builder.rule({
        name: `linkxx_${key}`,
        command: `${quoteTool(tools.cxx)} $pre_flags $in $lib_flags -o $out`,
        description: 'LINK $out',
      });
    case 'cc':
      return builder.rule({
        name: `link_${key}`,
        command: `${quoteTool(tools.cc)} $pre_flags $in $lib_flags -o $out`,
        description: 'LINK $out',
      });
  }
}

function statement(
  outputs: string[],
  rule: string,
  inputs: string[],
  implicitInputs: string[] = [],
  variables: Record<string, string> = {}
): BuildStatement {
  return { outputs, rule, inputs, implicitInputs, orderOnlyInputs: [], variables };
}

function joinFlags(flags: string[]): string {
  return flags.join(' ');
}

function addTargetStatements(builder: GraphBuilder, plan: TargetPlan, hostShell: HostShell): void {
  const { target } = plan;

  if (target.type === TargetType.CommandsOnly) {
    builder.add(statement([target.title], 'phony', []), target.title);
    return;
  }

  const linked: string[] = [];
  const unlinked: string[] = [];

  for (const unit of plan.compileUnits) {
    const file = toPosixPath(unit.source.filename);

    if (unit.kind === SourceKind.Custom) {
      // Blank or missing commands never produce a statement
      if (unit.customCommand === undefined) continue;
      const rule = builder.customRule(file, target.title, unit.customCommand);
      builder.add(statement([unit.objectPath], rule, [file]), file);
      unlinked.push(unit.objectPath);
      continue;
    }

    const rule = compileRule(builder, plan, unit);
    const flags = joinFlags([...unit.languageFlags, ...unit.flags, ...unit.includeFlags]);
    builder.add(statement([unit.objectPath], rule, [file], [], { flags }), file);
    (unit.linked ? linked : unlinked).push(unit.objectPath);
  }

  if (linked.length === 0 && unlinked.length === 0) return;

  const linkRuleName = linkRule(builder, plan, hostShell);
  const variables: Record<string, string> = {};
  if (plan.link.preFlags.length > 0) variables.pre_flags = plan.link.preFlags.map(quoteArgument).join(' ');
  if (plan.link.libraryFlags.length > 0) variables.lib_flags = plan.link.libraryFlags.map(quoteArgument).join(' ');
  if (plan.link.runtimeFlags.length > 0) variables.runtime_libs = plan.link.runtimeFlags.join(' ');

  const implicitInputs = [...new Set([...unlinked, ...plan.link.implicitDeps])];
  builder.add(statement([targetOutput(target)], linkRuleName, linked, implicitInputs, variables), target.title);
}

/**
 * Turn target plans into the build graph
 *
 * @param activeTargets Titles whose outputs (and intermediate libraries) are built by default
 * @throws PathMappingError when two statements would produce the same output differently
 */
export function synthesizeBuildGraph(
  project: ProjectInfo,
  plans: TargetPlan[],
  activeTargets: string[],
  hostShell: HostShell
): BuildGraph {
  const builder = new GraphBuilder();

  for (const plan of plans) {
    addTargetStatements(builder, plan, hostShell);
  }

  // Aliases so targets can be built by title
  for (const plan of plans) {
    const output = targetOutput(plan.target);
    if (!builder.hasOutput(output)) continue;
    if (output !== plan.target.title && !builder.hasOutput(plan.target.title)) {
      builder.add(statement([plan.target.title], 'phony', [output]), plan.target.title);
    }
  }

  const outputsByTitle = new Map(
    plans
      .map(plan => [plan.target.title, targetOutput(plan.target)] as const)
      .filter(([, output]) => builder.hasOutput(output))
  );
  const outputOf = (title: string): string | undefined => outputsByTitle.get(title);
  const builtOutputs = (titles: string[]): string[] =>
    titles.flatMap(title => {
      const output = outputOf(title);
      return output === undefined ? [] : [output];
    });

  for (const [alias, members] of Object.entries(project.virtualTargets)) {
    const outputs = builtOutputs(members);
    if (builder.hasOutput(alias) || outputs.length === 0) continue;
    builder.add(statement([alias], 'phony', outputs), alias);
  }

  const defaults: string[] = [];
  for (const title of activeTargets) {
    const plan = plans.find(candidate => candidate.target.title === title);
    for (const output of builtOutputs([...(plan?.link.intermediateTargets ?? []), title])) {
      if (!defaults.includes(output)) defaults.push(output);
    }
  }

  return builder.build(defaults);
}
