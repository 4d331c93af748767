/**
 * cbp2clangd - Code::Blocks project converter
 *
 * Main library entry point for programmatic usage
 */

// Types
export * from './types/index.js';

// Parsers
export * from './parsers/index.js';

// Core
export * from './core/errors.js';
export { convert, summarize, COMPILE_COMMANDS_FILE, CLANGD_FILE, NINJA_FILE } from './core/converter.js';
export type { Artifact, ConversionResult, ConvertInput } from './core/converter.js';
export { loadConfigFile, parseOptionsLayer, resolveOptions, CONFIG_FILE_NAME } from './core/config.js';
export type { OptionsLayer } from './core/config.js';
export {
  resolveCompilerProfile,
  toolPaths,
  toolchainIncludeDirs,
  DEFAULT_TOOLCHAIN_ROOT,
} from './core/toolchain.js';
export type { CompilerProfile, KnownCompilerId, ToolPaths } from './core/toolchain.js';
export { mergeFlags, splitMarch, findArchitecture } from './core/flags.js';
export { resolveLibrarySet, extractLinkScripts, planLink } from './core/libraries.js';
export type { LibraryReference, LinkPlan } from './core/libraries.js';
export { classifySource, mapObjectPaths, objectRelativePath } from './core/sources.js';
export { planTargets, synthesizeBuildGraph, resolveActiveTargets } from './core/build-graph.js';
export type { CompileUnit, TargetPlan } from './core/build-graph.js';

// Formatters
export * from './formatters/index.js';
