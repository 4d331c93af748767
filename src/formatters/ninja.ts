/**
 * build.ninja serializer
 */
import type { BuildGraph, BuildRule, BuildStatement } from '../types/index.js';

/** deps = gcc needs 1.3; 1.5 for implicit outputs and default handling */
export const NINJA_REQUIRED_VERSION = '1.5';

/**
 * Escape a path for a build line
 */
export function escapeNinjaPath(value: string): string {
  return value.replace(/\$/g, '$$$$').replace(/ /g, '$ ').replace(/:/g, '$:');
}

/**
 * Escape a variable value
 */
export function escapeNinjaValue(value: string): string {
  return value.replace(/\$/g, '$$$$');
}

function formatRule(rule: BuildRule): string[] {
  const lines = [`rule ${rule.name}`, `  command = ${rule.command}`];
  if (rule.description) lines.push(`  description = ${rule.description}`);
  if (rule.depfile) lines.push(`  depfile = ${rule.depfile}`);
  if (rule.deps) lines.push(`  deps = ${rule.deps}`);
  return lines;
}

function formatStatement(statement: BuildStatement): string[] {
  const paths = (values: string[]) => values.map(escapeNinjaPath).join(' ');

  let line = `build ${paths(statement.outputs)}: ${statement.rule}`;
  if (statement.inputs.length > 0) line += ` ${paths(statement.inputs)}`;
  if (statement.implicitInputs.length > 0) line += ` | ${paths(statement.implicitInputs)}`;
  if (statement.orderOnlyInputs.length > 0) line += ` || ${paths(statement.orderOnlyInputs)}`;

  const lines = [line];
  for (const [name, value] of Object.entries(statement.variables)) {
    lines.push(`  ${name} = ${escapeNinjaValue(value)}`);
  }
  return lines;
}

/**
 * Serialize a build graph
 *
 * Rule commands are written as they are; they already use ninja syntax.
 */
export function formatNinja(graph: BuildGraph, projectTitle: string): string {
  const sections: string[][] = [
    [`# Generated by cbp2clangd from project "${projectTitle}"`, `ninja_required_version = ${NINJA_REQUIRED_VERSION}`],
    ...graph.rules.map(formatRule),
    ...graph.statements.map(formatStatement),
  ];

  if (graph.defaults.length > 0) {
    sections.push([`default ${graph.defaults.map(escapeNinjaPath).join(' ')}`]);
  }

  return sections.map(section => section.join('\n')).join('\n\n') + '\n';
}
