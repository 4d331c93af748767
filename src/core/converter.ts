/**
 * Conversion pipeline
 *
 * Runs parse, plan and synthesis once and renders every artifact in memory.
 * Nothing is written here, so a failure at any stage leaves no partial output.
 */
import * as path from 'path';
import type {
  BuildGraph,
  CompileCommand,
  ConversionSummary,
  ConversionWarning,
  ConvertOptions,
  ProjectInfo,
} from '../types/index.js';
import { parseCbpProject } from '../parsers/cbp-parser.js';
import { substitutePlaceholders, targetPlaceholders } from '../parsers/variables.js';
import type { PlaceholderMap } from '../parsers/variables.js';
import { planTargets, resolveActiveTargets, synthesizeBuildGraph, targetOutput } from './build-graph.js';
import type { TargetPlan } from './build-graph.js';
import { toPosixPath } from './sources.js';
import { describeProfile, toolchainIncludeDirs } from './toolchain.js';
import { buildCompileCommands, formatCompileCommands } from '../formatters/compile-commands.js';
import { formatClangd } from '../formatters/clangd.js';
import { formatNinja } from '../formatters/ninja.js';
import { buildScriptName, formatBuildScript } from '../formatters/build-script.js';

export const COMPILE_COMMANDS_FILE = 'compile_commands.json';
export const CLANGD_FILE = '.clangd';
export const NINJA_FILE = 'build.ninja';

export interface ConvertInput {
  /** Raw .cbp content */
  content: string;
  /** Absolute directory of the project file; build paths are relative to it */
  projectDir: string;
  /** Directory the artifacts go to; the project directory when absent */
  outputDir?: string;
  options: ConvertOptions;
  /** Probe for library files relative to the project directory */
  fileExists?: (relativePath: string) => boolean;
}

/**
 * A rendered output file
 */
export interface Artifact {
  fileName: string;
  content: string;
}

export interface ConversionResult {
  project: ProjectInfo;
  plans: TargetPlan[];
  activeTargets: string[];
  graph: BuildGraph;
  compileCommands: CompileCommand[];
  warnings: ConversionWarning[];
  /** compile_commands.json, .clangd, build.ninja and the wrapper script, in that order */
  artifacts: Artifact[];
  duration: number;
}

/**
 * Pre- and post-build commands: project commands first, then each target's
 */
function extraCommands(project: ProjectInfo, plans: TargetPlan[]): { before: string[]; after: string[] } {
  const first = plans[0];
  const placeholders: PlaceholderMap = first
    ? targetPlaceholders({
        projectName: project.title,
        targetName: first.target.title,
        objectDir: first.target.objectOutput,
        output: first.target.output || undefined,
        compilerDir: first.tools.binDir,
      })
    : { PROJECT_NAME: project.title, PROJECT_DIR: './' };
  const substitute = (commands: string[]) => commands.map(command => substitutePlaceholders(command, placeholders));

  return {
    before: [...substitute(project.extraCommands.before), ...plans.flatMap(plan => plan.target.extraCommands.before)],
    after: [...substitute(project.extraCommands.after), ...plans.flatMap(plan => plan.target.extraCommands.after)],
  };
}

/**
 * Convert a Code::Blocks project
 *
 * @throws ConversionError subclasses, tagged with the failing stage
 */
export function convert(input: ConvertInput): ConversionResult {
  const startTime = Date.now();
  const { options } = input;
  const outputDir = input.outputDir ?? input.projectDir;

  const debug = (message: string) => {
    if (options.verbose) {
      console.error(`[cbp2clangd] ${message}`);
    }
  };

  const { project, warnings: parseWarnings } = parseCbpProject(input.content);
  debug(`Parsed project "${project.title}": ${project.targets.length} target(s), ${project.sources.length} unit(s)`);

  const activeTargets = resolveActiveTargets(project, options.target);
  debug(`Active target(s): ${activeTargets.join(', ')}`);

  const { plans, warnings: planWarnings } = planTargets(project, {
    linker: options.linker,
    toolchainRoot: options.toolchainRoot,
    fileExists: input.fileExists,
  });
  for (const plan of plans) {
    debug(`Target "${plan.target.title}": ${describeProfile(plan.profile)}, ${plan.compileUnits.length} unit(s)`);
  }

  const graph = synthesizeBuildGraph(project, plans, activeTargets, options.hostShell);
  debug(`Build graph: ${graph.rules.length} rule(s), ${graph.statements.length} statement(s)`);

  const activePlans = activeTargets
    .map(title => plans.find(plan => plan.target.title === title))
    .filter((plan): plan is TargetPlan => plan !== undefined);
  const primary = activePlans.find(plan => plan.compileUnits.length > 0) ?? activePlans[0];

  const compileCommands = buildCompileCommands(activePlans, input.projectDir);

  const clangd = formatClangd({
    compileFlags: primary?.options.compileFlags ?? [],
    includeDirs: primary?.target.includeDirs ?? [],
    systemIncludeDirs: primary ? toolchainIncludeDirs(primary.profile, options.toolchainRoot) : [],
    architecture: primary?.options.architecture,
    headerInsertion: options.headerInsertion,
  });

  const relativeOutputDir = toPosixPath(path.relative(input.projectDir, outputDir));
  const commands = extraCommands(project, activePlans);
  const buildScript = formatBuildScript({
    projectTitle: project.title,
    hostShell: options.hostShell,
    toolBinDir: primary?.tools.binDir,
    projectDirFromScript: toPosixPath(path.relative(outputDir, input.projectDir)),
    ninjaFile: relativeOutputDir ? `${relativeOutputDir}/${NINJA_FILE}` : NINJA_FILE,
    ninjaPath: options.ninjaPath,
    before: commands.before,
    after: commands.after,
  });

  return {
    project,
    plans,
    activeTargets,
    graph,
    compileCommands,
    warnings: [...parseWarnings, ...planWarnings],
    artifacts: [
      { fileName: COMPILE_COMMANDS_FILE, content: formatCompileCommands(compileCommands) },
      { fileName: CLANGD_FILE, content: clangd },
      { fileName: NINJA_FILE, content: formatNinja(graph, project.title) },
      { fileName: buildScriptName(options.hostShell), content: buildScript },
    ],
    duration: Date.now() - startTime,
  };
}

/**
 * Summary of a conversion for the console
 */
export function summarize(
  result: ConversionResult,
  context: { projectFile: string; outputDir: string; linker: ConvertOptions['linker']; files: string[]; dryRun: boolean }
): ConversionSummary {
  return {
    projectTitle: result.project.title,
    projectFile: context.projectFile,
    outputDir: context.outputDir,
    activeTargets: result.activeTargets,
    linker: context.linker,
    targets: result.plans.map(plan => ({
      title: plan.target.title,
      type: plan.target.type,
      output: targetOutput(plan.target),
      compiler: describeProfile(plan.profile),
      sources: plan.compileUnits.length,
      architecture: plan.options.architecture,
    })),
    rules: result.graph.rules.length,
    statements: result.graph.statements.length,
    compileCommands: result.compileCommands.length,
    warnings: result.warnings,
    files: context.files,
    dryRun: context.dryRun,
    duration: result.duration,
  };
}
