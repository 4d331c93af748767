/**
 * Conversion options
 *
 * Defaults come from an optional `.cbp2clangd.json` beside the project file;
 * command-line values override it.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LinkerType } from '../types/index.js';
import type { ConvertOptions } from '../types/index.js';
import { ConfigError } from './errors.js';

export const CONFIG_FILE_NAME = '.cbp2clangd.json';

/**
 * One layer of options; every field optional
 */
export const optionsLayerSchema = z
  .object({
    linker: z.nativeEnum(LinkerType).optional(),
    ninjaPath: z.string().min(1).optional(),
    target: z.string().min(1).optional(),
    toolchainRoot: z.string().min(1).optional(),
    hostShell: z.enum(['cmd', 'sh']).optional(),
    headerInsertion: z.boolean().optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export type OptionsLayer = z.infer<typeof optionsLayerSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate one options layer
 *
 * @param source Where the values came from, for error messages
 */
export function parseOptionsLayer(value: unknown, source: string): OptionsLayer {
  const result = optionsLayerSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid options in ${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read the config file of a project directory, if there is one
 */
export function loadConfigFile(projectDir: string): OptionsLayer {
  const configPath = path.join(projectDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${configPath}: ${reason}`);
  }
  return parseOptionsLayer(raw, configPath);
}

/**
 * Combine layers (later wins) and fill in defaults
 */
export function resolveOptions(...layers: OptionsLayer[]): ConvertOptions {
  const merged: OptionsLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  return {
    linker: merged.linker ?? LinkerType.Gcc,
    ninjaPath: merged.ninjaPath,
    target: merged.target,
    toolchainRoot: merged.toolchainRoot,
    hostShell: merged.hostShell ?? 'cmd',
    headerInsertion: merged.headerInsertion ?? true,
    verbose: merged.verbose ?? false,
  };
}
