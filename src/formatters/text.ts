/**
 * Text formatter for the console summary
 */
import chalk from 'chalk';
import { TargetType } from '../types/index.js';
import type { ConversionSummary, TargetSummary } from '../types/index.js';

function formatTargetType(type: TargetType): string {
  switch (type) {
    case TargetType.Executable:
      return 'executable';
    case TargetType.StaticLibrary:
      return 'static library';
    case TargetType.DynamicLibrary:
      return 'dynamic library';
    case TargetType.CommandsOnly:
      return 'commands only';
  }
}

/**
 * Format a single target line
 */
function formatTarget(target: TargetSummary, active: boolean): string[] {
  const marker = active ? chalk.green('*') : ' ';
  const lines = [
    `${marker} ${chalk.bold(target.title)} ${chalk.dim(`(${formatTargetType(target.type)})`)} → ${target.output}`,
    chalk.dim(`    ${target.compiler}, ${target.sources} source file(s)`),
  ];

  if (target.architecture) {
    const { full, base, extension } = target.architecture;
    const arch = extension ? `${full} (base ${base}, extension ${extension})` : full;
    lines.push(chalk.dim(`    -march=${arch}`));
  }

  return lines;
}

/**
 * Format a conversion summary as text
 */
export function formatText(summary: ConversionSummary): string {
  const lines: string[] = [];

  lines.push(chalk.bold.underline(`cbp2clangd: ${summary.projectTitle}`));
  lines.push(`Project: ${summary.projectFile}`);
  lines.push(`Output:  ${summary.outputDir}`);
  lines.push(`Linker:  ${summary.linker}`);
  lines.push('');

  lines.push(chalk.bold('Targets:'));
  for (const target of summary.targets) {
    lines.push(...formatTarget(target, summary.activeTargets.includes(target.title)));
  }
  lines.push('');

  lines.push(
    `Build graph: ${summary.rules} rule(s), ${summary.statements} statement(s); ` +
      `${summary.compileCommands} compile command(s)`
  );

  if (summary.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow.bold(`Warnings (${summary.warnings.length}):`));
    for (const warning of summary.warnings) {
      lines.push(chalk.yellow(`  [${warning.code}] ${warning.message}`));
    }
  }

  lines.push('');
  lines.push(chalk.bold(summary.dryRun ? 'Would write:' : 'Wrote:'));
  for (const file of summary.files) {
    lines.push(`  ${file}`);
  }

  lines.push('');
  lines.push(chalk.green(`Done in ${summary.duration}ms`));

  return lines.join('\n');
}
