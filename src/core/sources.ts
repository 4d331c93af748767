/**
 * Source classification and object-path mapping
 *
 * Object files mirror the source tree under the target's object directory.
 * Parent-directory segments are folded into a token instead of being
 * resolved, so `../a/x.c` and `a/x.c` never share an object file. Tokens
 * start with `_`; source segments that do get one more `_`.
 */
import * as path from 'path';
import { SourceKind } from '../types/index.js';
import type { SourceFile } from '../types/index.js';
import { PathMappingError } from './errors.js';

export const OBJECT_EXTENSION = '.o';

/** Replaces a `..` segment in object paths */
export const PARENT_DIR_TOKEN = '__up__';

/** First segment of object paths for absolute sources */
export const ROOT_TOKEN = '_root';

export const C_EXTENSIONS: ReadonlySet<string> = new Set(['.c', '.C']);
export const CPP_EXTENSIONS: ReadonlySet<string> = new Set(['.cpp', '.CPP', '.cc', '.cxx', '.c++', '.Cpp']);

/**
 * Normalize separators to `/`
 */
export function toPosixPath(value: string): string {
  return value.replace(/\\/g, '/');
}

/**
 * Classify a unit by extension
 *
 * `compilerVar` switches between C and C++; files with any other extension
 * are only compiled when the unit carries its own build command.
 */
export function classifySource(source: SourceFile): SourceKind {
  const ext = path.posix.extname(toPosixPath(source.filename));

  let kind: SourceKind;
  if (C_EXTENSIONS.has(ext)) {
    kind = SourceKind.C;
  } else if (CPP_EXTENSIONS.has(ext)) {
    kind = SourceKind.Cpp;
  } else if (ext === '.S') {
    kind = SourceKind.AssemblyWithCpp;
  } else if (ext === '.s') {
    kind = SourceKind.Assembly;
  } else {
    return source.buildCommands.length > 0 ? SourceKind.Custom : SourceKind.None;
  }

  if (source.compilerVar === 'CPP' && kind === SourceKind.C) return SourceKind.Cpp;
  if (source.compilerVar === 'CC' && kind === SourceKind.Cpp) return SourceKind.C;
  return kind;
}

/**
 * C and C++ sources, built by the standard compile rules
 */
export function isNormalSource(kind: SourceKind): boolean {
  return kind === SourceKind.C || kind === SourceKind.Cpp;
}

/**
 * Assembly and custom-command sources, built by dedicated rules
 */
export function isSpecialSource(kind: SourceKind): boolean {
  return kind === SourceKind.Assembly || kind === SourceKind.AssemblyWithCpp || kind === SourceKind.Custom;
}

/**
 * Object path of a source relative to the object directory
 *
 * @param keepExtension Append `.o` to the full file name instead of replacing the extension
 */
export function objectRelativePath(filename: string, keepExtension: boolean = false): string {
  const segments = toPosixPath(filename).split('/');
  const mapped: string[] = [];

  if (segments[0] === '') {
    mapped.push(ROOT_TOKEN);
  } else if (/^[A-Za-z]:$/.test(segments[0])) {
    mapped.push(ROOT_TOKEN, `${segments[0][0]}_`);
    segments.shift();
  }

  for (const segment of segments) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      mapped.push(PARENT_DIR_TOKEN);
    } else {
      mapped.push(segment.startsWith('_') ? `_${segment}` : segment);
    }
  }

  const fileName = mapped.pop() ?? '';
  const ext = path.posix.extname(fileName);
  const stem = keepExtension || ext === '' ? fileName : fileName.substring(0, fileName.length - ext.length);
  mapped.push(`${stem}${OBJECT_EXTENSION}`);

  return mapped.join('/');
}

/**
 * Join an object directory and a relative object path
 */
export function joinObjectPath(objectDir: string, relative: string): string {
  const dir = toPosixPath(objectDir).replace(/\/+$/, '');
  if (dir === '' || dir === '.') return relative;
  return `${dir}/${relative}`;
}

/**
 * Map sources to object paths under one object directory
 *
 * Sources whose stems collide (`foo.c` and `foo.cpp`) keep their full file
 * name. Paths are compared case-insensitively.
 *
 * @throws PathMappingError when two sources still map to the same object
 */
export function mapObjectPaths(filenames: string[], objectDir: string): Map<string, string> {
  const unique = [...new Set(filenames)];

  const byCandidate = new Map<string, string[]>();
  for (const filename of unique) {
    const key = objectRelativePath(filename).toLowerCase();
    const group = byCandidate.get(key) ?? [];
    group.push(filename);
    byCandidate.set(key, group);
  }

  const mapping = new Map<string, string>();
  for (const filename of unique) {
    const collides = (byCandidate.get(objectRelativePath(filename).toLowerCase())?.length ?? 0) > 1;
    mapping.set(filename, joinObjectPath(objectDir, objectRelativePath(filename, collides)));
  }

  const owners = new Map<string, string>();
  for (const [filename, objectPath] of mapping) {
    const key = objectPath.toLowerCase();
    const owner = owners.get(key);
    if (owner !== undefined) {
      throw new PathMappingError(objectPath, [owner, filename]);
    }
    owners.set(key, filename);
  }

  return mapping;
}
