/**
 * Formatters module exports
 */
import type { ConversionSummary } from '../types/index.js';
import { OutputFormat } from '../types/index.js';
import { formatText } from './text.js';
import { formatJSON } from './json.js';

export { formatText } from './text.js';
export { formatJSON } from './json.js';
export { buildCompileCommands, formatCompileCommands } from './compile-commands.js';
export { formatClangd, clangdAddFlags, clangdRemoveFlags, targetTriple } from './clangd.js';
export type { ClangdInput } from './clangd.js';
export { formatNinja, escapeNinjaPath, escapeNinjaValue } from './ninja.js';
export { formatBuildScript, buildScriptName } from './build-script.js';
export type { BuildScriptInput } from './build-script.js';

/**
 * Format the conversion summary based on output format
 */
export function format(summary: ConversionSummary, outputFormat: OutputFormat): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatText(summary);
    case OutputFormat.JSON:
      return formatJSON(summary);
  }
}
