#!/usr/bin/env node
/**
 * cbp2clangd CLI
 *
 * Generates compile_commands.json, .clangd, build.ninja and a build script
 * from a Code::Blocks project
 */
import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { convert, summarize } from '../core/converter.js';
import { loadConfigFile, parseOptionsLayer, resolveOptions } from '../core/config.js';
import { ConfigError, ConversionError } from '../core/errors.js';
import { DEFAULT_TOOLCHAIN_ROOT } from '../core/toolchain.js';
import { format } from '../formatters/index.js';
import { OutputFormat } from '../types/index.js';
import { SAMPLE_PROJECT, SAMPLE_PROJECT_FILE_NAME } from './sample-project.js';
import packageJson from '../../package.json';

interface CliOptions {
  linker?: string;
  ninja?: string;
  target?: string;
  toolchainRoot?: string;
  hostShell?: string;
  headerInsertion: boolean;
  test: boolean;
  debug: boolean;
  format: string;
  dryRun: boolean;
}

const program = new Command();

program
  .name('cbp2clangd')
  .description('Generate compile_commands.json, .clangd and build.ninja from a Code::Blocks project')
  .version(packageJson.version)
  .argument('[project]', 'Code::Blocks project file (.cbp)')
  .argument('[outputDir]', 'Directory for the generated files (default: the project directory)')
  .option('-l, --linker <type>', 'Linker type: gcc or ld')
  .option('-n, --ninja <path>', 'Ninja executable called by the build script')
  .option('-t, --target <name>', 'Active build target or virtual target')
  .option('--toolchain-root <dir>', 'Root directory of the RV32 toolchain installs')
  .option('--host-shell <shell>', 'Shell for build commands: cmd or sh')
  .option('--no-header-insertion', 'Disable header insertion in clangd completion')
  .option('--test', 'Convert the built-in sample project', false)
  .option('--debug', 'Show per-stage progress and error stacks', false)
  .option('-f, --format <format>', 'Summary format: text, json', 'text')
  .option('--dry-run', 'Render every file but write nothing', false)
  .action((projectArg: string | undefined, outputArg: string | undefined, options: CliOptions) => {
    try {
      run(projectArg, outputArg, options);
    } catch (error) {
      if (error instanceof ConversionError) {
        console.error(`Error [${error.stage}]: ${error.message}`);
      } else if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error('An unknown error occurred');
      }
      if (options.debug && error instanceof Error) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

function run(projectArg: string | undefined, outputArg: string | undefined, options: CliOptions): void {
  const outputFormat = parseOutputFormat(options.format);

  if (!options.test && !projectArg) {
    throw new ConfigError('Missing project file. Usage: cbp2clangd [options] <project.cbp> [outputDir]');
  }

  const projectFile = options.test || !projectArg ? path.resolve(SAMPLE_PROJECT_FILE_NAME) : path.resolve(projectArg);
  const projectDir = path.dirname(projectFile);
  const outputDir = outputArg ? path.resolve(projectDir, outputArg) : projectDir;

  const content = options.test ? SAMPLE_PROJECT : readProjectFile(projectFile);

  const cliLayer = parseOptionsLayer(
    {
      linker: options.linker,
      ninjaPath: options.ninja,
      target: options.target,
      toolchainRoot: options.toolchainRoot,
      hostShell: options.hostShell,
      headerInsertion: options.headerInsertion ? undefined : false,
      verbose: options.debug ? true : undefined,
    },
    'command line'
  );
  const convertOptions = resolveOptions(loadConfigFile(projectDir), cliLayer);
  if (!convertOptions.toolchainRoot && fs.existsSync(DEFAULT_TOOLCHAIN_ROOT)) {
    convertOptions.toolchainRoot = DEFAULT_TOOLCHAIN_ROOT;
  }

  const result = convert({
    content,
    projectDir,
    outputDir,
    options: convertOptions,
    fileExists: relativePath => fs.existsSync(path.resolve(projectDir, relativePath)),
  });

  // Every artifact is rendered before the first write
  const files = result.artifacts.map(artifact => path.join(outputDir, artifact.fileName));
  if (!options.dryRun) {
    fs.mkdirSync(outputDir, { recursive: true });
    result.artifacts.forEach((artifact, index) => fs.writeFileSync(files[index], artifact.content, 'utf-8'));
  }

  const summary = summarize(result, {
    projectFile,
    outputDir,
    linker: convertOptions.linker,
    files,
    dryRun: options.dryRun,
  });
  console.log(format(summary, outputFormat));
}

function readProjectFile(projectFile: string): string {
  if (!fs.existsSync(projectFile)) {
    throw new ConfigError(`Project file not found: ${projectFile}`);
  }
  return fs.readFileSync(projectFile, 'utf-8');
}

function parseOutputFormat(format: string): OutputFormat {
  switch (format.toLowerCase()) {
    case 'text':
      return OutputFormat.Text;
    case 'json':
      return OutputFormat.JSON;
    default:
      throw new ConfigError(`Unknown output format: ${format}. Use text or json.`);
  }
}

program.parse();
