/**
 * compile_commands.json
 */
import { SourceKind } from '../types/index.js';
import type { CompileCommand } from '../types/index.js';
import type { TargetPlan } from '../core/build-graph.js';
import { splitCommandLine } from '../core/flags.js';
import { toPosixPath } from '../core/sources.js';

/**
 * Compilation database entries for the given targets
 *
 * Covers every C, C++ and assembly unit. A file shared by several targets is
 * listed once, with the flags of the first target that compiles it.
 *
 * @param directory Absolute project directory; every path is relative to it
 */
export function buildCompileCommands(plans: TargetPlan[], directory: string): CompileCommand[] {
  const seen = new Set<string>();
  const commands: CompileCommand[] = [];

  for (const plan of plans) {
    for (const unit of plan.compileUnits) {
      if (unit.kind === SourceKind.Custom) continue;

      const file = toPosixPath(unit.source.filename);
      if (seen.has(file)) continue;
      seen.add(file);

      const compiler = unit.tool === 'cxx' ? plan.tools.cxx : plan.tools.cc;
      commands.push({
        directory,
        arguments: [
          compiler,
          ...unit.languageFlags,
          ...unit.flags.flatMap(splitCommandLine),
          ...unit.includeFlags.flatMap(splitCommandLine),
          '-c',
          file,
          '-o',
          unit.objectPath,
        ],
        file,
        output: unit.objectPath,
      });
    }
  }

  return commands;
}

/**
 * Serialize compilation database entries
 */
export function formatCompileCommands(commands: CompileCommand[]): string {
  return JSON.stringify(commands, null, 2) + '\n';
}
