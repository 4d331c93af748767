/**
 * Errors raised by the conversion pipeline
 *
 * Every fatal error aborts the conversion before anything is written.
 */

/**
 * Pipeline stage an error was raised in
 */
export type ConversionStage = 'config' | 'parse' | 'model' | 'link' | 'objects';

/**
 * Base class for fatal conversion errors
 */
export class ConversionError extends Error {
  constructor(public readonly stage: ConversionStage, message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

/**
 * Malformed or incomplete project document
 */
export class StructuralParseError extends ConversionError {
  constructor(message: string, public readonly line?: number, public readonly column?: number) {
    super('parse', line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message);
    this.name = 'StructuralParseError';
  }
}

/**
 * Document is well-formed but a mandatory value is missing or inconsistent
 */
export class SemanticModelError extends ConversionError {
  constructor(message: string, public readonly target?: string) {
    super('model', target ? `Target "${target}": ${message}` : message);
    this.name = 'SemanticModelError';
  }
}

/**
 * A library reference that has to be built by this project cannot be scheduled
 */
export class LibraryResolutionError extends ConversionError {
  constructor(public readonly target: string, public readonly library: string, reason: string) {
    super('link', `Target "${target}": cannot resolve library "${library}": ${reason}`);
    this.name = 'LibraryResolutionError';
  }
}

/**
 * Two sources would write the same object file
 */
export class PathMappingError extends ConversionError {
  constructor(public readonly objectPath: string, public readonly sources: string[]) {
    super('objects', `Object file "${objectPath}" would be produced by ${sources.map(s => `"${s}"`).join(' and ')}`);
    this.name = 'PathMappingError';
  }
}

/**
 * Invalid command line or configuration file values
 */
export class ConfigError extends ConversionError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}
